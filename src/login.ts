/**
 * Read-only access to the bot's device-info and login-stat files.
 */

import { promises as fs } from "node:fs";
import type { Logger } from "winston";
import { z } from "zod";
import type { Identity, StatePaths } from "./types";
import { describeError } from "./utils";

// Fields are read independently; a bad value drops only that field.
const LoginStateFileSchema = z.object({
  wxid: z.string().optional().catch(undefined),
  id: z.string().optional().catch(undefined),
  device_id: z.string().optional().catch(undefined),
  login_time: z.number().optional().catch(undefined),
});

type LoginStateFile = z.infer<typeof LoginStateFileSchema>;

/**
 * Resolves identity and login time from the external state files and caches
 * the last identity it managed to read.
 */
export class LoginStateReader {
  private cached: Identity | null = null;

  constructor(
    private readonly paths: StatePaths,
    private readonly logger: Logger,
  ) {}

  get identity(): Identity | null {
    return this.cached;
  }

  /** Re-reads the device-info file; keeps the previous identity when it can't. */
  async refreshIdentity(): Promise<Identity | null> {
    const info = await this.readStateFile(this.paths.deviceInfoPath);
    if (!info) {
      this.logger.warn("Device info file unavailable", { path: this.paths.deviceInfoPath });
      return this.cached;
    }

    const id = info.wxid || info.id || "";
    if (!id) {
      this.logger.warn("Device info file has no account id", { path: this.paths.deviceInfoPath });
      return this.cached;
    }

    this.cached = { id, deviceId: info.device_id ?? "" };
    this.logger.debug("Loaded login identity", { id });
    return this.cached;
  }

  /** Login time in epoch milliseconds, or null when no source has one. */
  async readLoginTime(): Promise<number | null> {
    for (const candidate of [this.paths.deviceInfoPath, ...this.paths.loginStatPaths]) {
      const state = await this.readStateFile(candidate);
      const seconds = state?.login_time ?? 0;
      if (seconds > 0) {
        this.logger.debug("Resolved login time", { path: candidate, loginTime: seconds });
        return seconds * 1000;
      }
    }

    this.logger.warn("Unable to resolve login time");
    return null;
  }

  private async readStateFile(filePath: string): Promise<LoginStateFile | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch {
      return null;
    }

    try {
      const parsed = LoginStateFileSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
      this.logger.error("Login state file has an unexpected shape", { path: filePath, issues: parsed.error.issues.length });
    } catch (error) {
      this.logger.error("Failed to parse login state file", { path: filePath, error: describeError(error) });
    }
    return null;
  }
}
