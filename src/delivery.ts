/**
 * Warning delivery: text notice, short pause, then a fresh login QR image.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "winston";
import type { MessagingBackend } from "./backend";
import { QR_SEND_DELAY_MS } from "./constants";
import { createDeviceIdentity } from "./device";
import type { LoginStateReader } from "./login";
import { buildWarningText } from "./report";
import type { DeliveryResult, DeviceIdentity, ExpiryReport, PauseFn } from "./types";
import { describeError } from "./utils";

export type WarningDeliveryDeps = {
  backend: MessagingBackend;
  login: LoginStateReader;
  scratchDir: string;
  logger: Logger;
  pause?: PauseFn;
  now?: () => number;
  createDevice?: () => DeviceIdentity;
};

const defaultPause: PauseFn = async (ms) => {
  await delay(ms);
};

/**
 * Writes `bytes` to a scratch file, hands its path to `use`, and removes the
 * file on every exit path.
 */
export async function withScratchFile<T>(
  dir: string,
  fileName: string,
  bytes: Uint8Array,
  logger: Logger,
  use: (filePath: string) => Promise<T>,
): Promise<T> {
  const filePath = path.join(dir, fileName);
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, bytes);
    return await use(filePath);
  } finally {
    await fs.rm(filePath, { force: true }).catch((error: unknown) => {
      logger.warn("Failed to remove scratch file", { filePath, error: describeError(error) });
    });
  }
}

export class WarningDelivery {
  private readonly pending = new Set<Promise<void>>();
  private readonly pause: PauseFn;
  private readonly now: () => number;
  private readonly createDevice: () => DeviceIdentity;

  constructor(private readonly deps: WarningDeliveryDeps) {
    this.pause = deps.pause ?? defaultPause;
    this.now = deps.now ?? Date.now;
    this.createDevice = deps.createDevice ?? (() => createDeviceIdentity());
  }

  /** Text first; the QR step only runs after the text went through. */
  async sendWarning(target: string, report: ExpiryReport): Promise<DeliveryResult> {
    const { backend, login, logger } = this.deps;

    const identity = await login.refreshIdentity();
    if (!identity) {
      logger.error("Cannot send warning without a login identity");
      return { textSent: false, imageSent: false };
    }

    const textSent = await backend.sendText(identity.id, target, buildWarningText(report));
    if (!textSent) {
      logger.error("Warning text failed, skipping QR code", { target });
      return { textSent: false, imageSent: false };
    }
    logger.info("Warning text sent", { target });

    await this.pause(QR_SEND_DELAY_MS);

    const imageSent = await this.sendLoginQr(identity.id, target);
    if (imageSent) {
      logger.info("Warning QR code sent", { target });
    } else {
      logger.warn("Warning QR code failed", { target });
    }
    return { textSent: true, imageSent };
  }

  async sendLoginQr(senderId: string, target: string): Promise<boolean> {
    const { backend, logger, scratchDir } = this.deps;

    const qr = await backend.requestLoginQr(this.createDevice());
    if (!qr) return false;

    const bytes = await backend.downloadImage(qr.qrUrl);
    if (!bytes) return false;

    const fileName = `qr_${qr.uuid}_${Math.floor(this.now() / 1000)}.png`;
    try {
      return await withScratchFile(scratchDir, fileName, bytes, logger, async (filePath) => {
        const base64 = (await fs.readFile(filePath)).toString("base64");
        return backend.uploadImage(senderId, target, base64);
      });
    } catch (error) {
      logger.error("Failed to stage QR image", { error: describeError(error) });
      return false;
    }
  }

  /** Sends a login QR after the usual pause without blocking the caller. */
  scheduleLoginQr(senderId: string, target: string): void {
    const { logger } = this.deps;
    const task = (async () => {
      await this.pause(QR_SEND_DELAY_MS);
      const sent = await this.sendLoginQr(senderId, target);
      if (sent) logger.info("Test QR code sent", { target });
      else logger.error("Test QR code failed", { target });
    })()
      .catch((error: unknown) => {
        logger.error("Scheduled QR delivery failed", { target, error: describeError(error) });
      })
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
  }

  /** Resolves once every scheduled QR delivery has settled. */
  async whenIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
