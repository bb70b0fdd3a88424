/**
 * Unit tests for MessagingBackend against an in-process fake backend
 */

import { describe, expect, test } from "vitest";
import { MessagingBackend } from "../backend";
import { API_BASE, QR_IMAGE_BYTES, QR_IMAGE_URL, createFakeBackend, createTestLogger, jsonResponse } from "./helpers/test-env";

function createBackend(fake: ReturnType<typeof createFakeBackend>): MessagingBackend {
  return new MessagingBackend({ baseUrl: () => API_BASE, logger: createTestLogger(), fetch: fake.fetch });
}

describe("MessagingBackend", () => {
  test("sendText posts the text payload", async () => {
    const fake = createFakeBackend();
    expect(await createBackend(fake).sendText("wxid_bot", "wxid_ops", "hello")).toBe(true);
    expect(fake.calls).toEqual([
      {
        method: "POST",
        path: "/VXAPI/Msg/SendTxt",
        body: { Wxid: "wxid_bot", ToWxid: "wxid_ops", Content: "hello", Type: 1, At: "" },
      },
    ]);
  });

  test("sendText reports HTTP errors as failure", async () => {
    const fake = createFakeBackend({ "/VXAPI/Msg/SendTxt": () => jsonResponse({ Success: true }, 500) });
    expect(await createBackend(fake).sendText("wxid_bot", "wxid_ops", "hello")).toBe(false);
  });

  test("sendText reports malformed JSON as failure", async () => {
    const fake = createFakeBackend({ "/VXAPI/Msg/SendTxt": () => new Response("<html>oops</html>", { status: 200 }) });
    expect(await createBackend(fake).sendText("wxid_bot", "wxid_ops", "hello")).toBe(false);
  });

  test("sendText requires Success to be true", async () => {
    const fake = createFakeBackend({ "/VXAPI/Msg/SendTxt": () => jsonResponse({ Success: false, Message: "offline" }) });
    expect(await createBackend(fake).sendText("wxid_bot", "wxid_ops", "hello")).toBe(false);
  });

  test("sendText reports transport errors as failure", async () => {
    const fake = createFakeBackend({
      "/VXAPI/Msg/SendTxt": () => {
        throw new TypeError("fetch failed");
      },
    });
    expect(await createBackend(fake).sendText("wxid_bot", "wxid_ops", "hello")).toBe(false);
  });

  test("requestLoginQr returns the QR url and uuid", async () => {
    const fake = createFakeBackend();
    const qr = await createBackend(fake).requestLoginQr({ deviceId: "49abc", deviceName: "Bob Jones's iPad" });

    expect(qr).toEqual({ qrUrl: QR_IMAGE_URL, uuid: "uuid-1" });
    expect(fake.calls[0]?.body).toEqual({ DeviceName: "Bob Jones's iPad", DeviceID: "49abc" });
  });

  test("requestLoginQr rejects responses without QR data", async () => {
    const fake = createFakeBackend({ "/VXAPI/Login/GetQR": () => jsonResponse({ Success: true, Data: { Uuid: "u" } }) });
    expect(await createBackend(fake).requestLoginQr({ deviceId: "49abc", deviceName: "x" })).toBeNull();
  });

  test("downloadImage returns the image bytes", async () => {
    const fake = createFakeBackend();
    expect(await createBackend(fake).downloadImage(QR_IMAGE_URL)).toEqual(QR_IMAGE_BYTES);
    expect(fake.calls).toEqual([{ method: "GET", path: "/images/abc.png", body: undefined }]);
  });

  test("downloadImage returns null on a missing image", async () => {
    const fake = createFakeBackend();
    expect(await createBackend(fake).downloadImage("http://qr.test/images/missing.png")).toBeNull();
  });

  test("uploadImage sends base64 content", async () => {
    const fake = createFakeBackend();
    expect(await createBackend(fake).uploadImage("wxid_bot", "wxid_ops", "AQID")).toBe(true);
    expect(fake.calls[0]).toEqual({
      method: "POST",
      path: "/VXAPI/Msg/UploadImg",
      body: { ToWxid: "wxid_ops", Base64: "AQID", Wxid: "wxid_bot" },
    });
  });
});
