/**
 * Messaging backend client.
 *
 * Uses ky for HTTP with per-call timeouts. Every call reports failure as
 * `false` or `null` after logging it; nothing here throws to the caller.
 */

import ky, { type KyInstance } from "ky";
import type { Logger } from "winston";
import { z } from "zod";
import { DOWNLOAD_IMAGE_TIMEOUT_MS, GET_QR_TIMEOUT_MS, SEND_TEXT_TIMEOUT_MS, UPLOAD_IMAGE_TIMEOUT_MS } from "./constants";
import type { DeviceIdentity, FetchFn, LoginQr } from "./types";
import { describeError } from "./utils";

const EnvelopeSchema = z.object({
  Success: z.boolean().optional(),
  Message: z.string().optional(),
  Data: z.unknown().optional(),
});

const LoginQrDataSchema = z.object({
  QrUrl: z.string().min(1),
  Uuid: z.string().min(1),
});

type Envelope = z.infer<typeof EnvelopeSchema>;

export type MessagingBackendConfig = {
  /** Read on every call so config reloads take effect. */
  baseUrl: () => string;
  logger: Logger;
  fetch?: FetchFn;
};

export class MessagingBackend {
  private readonly http: KyInstance;
  private readonly baseUrl: () => string;
  private readonly logger: Logger;

  constructor(config: MessagingBackendConfig) {
    this.baseUrl = config.baseUrl;
    this.logger = config.logger;
    this.http = ky.create({
      retry: 0,
      ...(config.fetch ? { fetch: config.fetch } : {}),
    });
  }

  async sendText(fromId: string, toId: string, content: string): Promise<boolean> {
    const envelope = await this.postJson("/Msg/SendTxt", { Wxid: fromId, ToWxid: toId, Content: content, Type: 1, At: "" }, SEND_TEXT_TIMEOUT_MS);
    if (!envelope) return false;
    if (envelope.Success !== true) {
      this.logger.error("Text message rejected", { toId, message: envelope.Message ?? "unknown error" });
      return false;
    }
    return true;
  }

  async requestLoginQr(device: DeviceIdentity): Promise<LoginQr | null> {
    const envelope = await this.postJson("/Login/GetQR", { DeviceName: device.deviceName, DeviceID: device.deviceId }, GET_QR_TIMEOUT_MS);
    if (!envelope) return null;
    if (envelope.Success !== true) {
      this.logger.error("Login QR request rejected", { message: envelope.Message ?? "unknown error" });
      return null;
    }

    const data = LoginQrDataSchema.safeParse(envelope.Data);
    if (!data.success) {
      this.logger.error("Login QR response is missing QrUrl or Uuid");
      return null;
    }
    return { qrUrl: data.data.QrUrl, uuid: data.data.Uuid };
  }

  async downloadImage(url: string): Promise<Uint8Array | null> {
    try {
      const buffer = await this.http.get(url, { timeout: DOWNLOAD_IMAGE_TIMEOUT_MS }).arrayBuffer();
      return new Uint8Array(buffer);
    } catch (error) {
      this.logger.error("Failed to download QR image", { url, error: describeError(error) });
      return null;
    }
  }

  async uploadImage(fromId: string, toId: string, base64: string): Promise<boolean> {
    this.logger.debug("Uploading image", { fromId, toId, base64Length: base64.length });
    const envelope = await this.postJson("/Msg/UploadImg", { ToWxid: toId, Base64: base64, Wxid: fromId }, UPLOAD_IMAGE_TIMEOUT_MS);
    if (!envelope) return false;
    if (envelope.Success !== true) {
      this.logger.error("Image message rejected", { toId, message: envelope.Message ?? "unknown error" });
      return false;
    }
    this.logger.info("Image message sent", { toId });
    return true;
  }

  private async postJson(endpoint: string, body: Record<string, unknown>, timeout: number): Promise<Envelope | null> {
    const url = `${this.baseUrl()}${endpoint}`;
    try {
      const raw = await this.http.post(url, { json: body, timeout }).json<unknown>();
      const envelope = EnvelopeSchema.safeParse(raw);
      if (envelope.success) return envelope.data;
      this.logger.error("Backend returned an unexpected payload", { endpoint });
      return null;
    } catch (error) {
      this.logger.error("Backend request failed", { endpoint, error: describeError(error) });
      return null;
    }
  }
}
