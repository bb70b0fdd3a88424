/**
 * Persisted plugin configuration: schema, file IO, and the in-memory settings holder.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import type { Logger } from "winston";
import { z } from "zod";
import {
  DEFAULT_API_HOST,
  DEFAULT_API_PATH_PREFIX,
  DEFAULT_API_PORT,
  DEFAULT_POLL_INTERVAL_HOURS,
  DEFAULT_SESSION_LIFETIME_HOURS,
  DEFAULT_THRESHOLD_HOURS,
  MAX_THRESHOLD_HOURS,
} from "./constants";
import type { Settings } from "./types";
import { describeError } from "./utils";

// Each field falls back to its own default, so one bad value never discards the rest.
export const PluginConfigSchema = z.object({
  auto_session_warning_enabled: z.boolean().catch(true),
  auto_session_warning_threshold: z.number().min(0).max(MAX_THRESHOLD_HOURS).catch(DEFAULT_THRESHOLD_HOURS),
  auto_session_warning_target: z.string().catch(""),
  api_host: z.string().min(1).catch(DEFAULT_API_HOST),
  api_port: z.number().int().min(1).max(65_535).catch(DEFAULT_API_PORT),
  api_path_prefix: z.string().catch(DEFAULT_API_PATH_PREFIX),
  session_duration_hours: z.number().positive().finite().catch(DEFAULT_SESSION_LIFETIME_HOURS),
  check_interval_hours: z.number().positive().finite().catch(DEFAULT_POLL_INTERVAL_HOURS),
});

export type PluginConfig = z.infer<typeof PluginConfigSchema>;

export function defaultPluginConfig(): PluginConfig {
  return PluginConfigSchema.parse({});
}

export function toSettings(config: PluginConfig): Settings {
  return {
    enabled: config.auto_session_warning_enabled,
    thresholdHours: config.auto_session_warning_threshold,
    target: config.auto_session_warning_target,
    apiHost: config.api_host,
    apiPort: config.api_port,
    apiPathPrefix: config.api_path_prefix,
    apiBaseUrl: `http://${config.api_host}:${config.api_port}${config.api_path_prefix}`,
    sessionLifetimeHours: config.session_duration_hours,
    pollIntervalHours: config.check_interval_hours,
  };
}

async function readJsonObject(configPath: string): Promise<Record<string, unknown> | null> {
  const raw = await fs.readFile(configPath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return null;
  return { ...parsed };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function readPluginConfig(configPath: string, logger: Logger): Promise<PluginConfig> {
  try {
    const root = await readJsonObject(configPath);
    if (!root) {
      logger.warn("Config file is not a JSON object, using defaults", { configPath });
      return defaultPluginConfig();
    }
    return PluginConfigSchema.parse(root);
  } catch (error) {
    if (isMissingFile(error)) {
      logger.info("No config file yet, using defaults", { configPath });
    } else {
      logger.warn("Failed to read config file, using defaults", { configPath, error: describeError(error) });
    }
    return defaultPluginConfig();
  }
}

export async function writePluginConfig(configPath: string, config: PluginConfig): Promise<void> {
  let root: Record<string, unknown> = {};
  try {
    root = (await readJsonObject(configPath)) ?? {};
  } catch {
    root = {};
  }

  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, JSON.stringify({ ...root, ...config }, null, 2) + "\n", "utf8");
}

/**
 * Holds the current configuration. Commands are the only writers; each write is
 * persisted first and then applied.
 */
export class ConfigStore {
  private config: PluginConfig;

  constructor(
    private readonly configPath: string,
    private readonly logger: Logger,
    initial: PluginConfig = defaultPluginConfig(),
  ) {
    this.config = initial;
  }

  static async load(configPath: string, logger: Logger): Promise<ConfigStore> {
    return new ConfigStore(configPath, logger, await readPluginConfig(configPath, logger));
  }

  get path(): string {
    return this.configPath;
  }

  get settings(): Settings {
    return toSettings(this.config);
  }

  get snapshot(): PluginConfig {
    return { ...this.config };
  }

  async setEnabled(enabled: boolean): Promise<void> {
    await this.commit({ ...this.config, auto_session_warning_enabled: enabled });
  }

  async setThreshold(thresholdHours: number): Promise<void> {
    await this.commit({ ...this.config, auto_session_warning_threshold: thresholdHours });
  }

  async reload(): Promise<Settings> {
    this.config = await readPluginConfig(this.configPath, this.logger);
    return this.settings;
  }

  /** Memory only changes once the file write has succeeded. */
  private async commit(next: PluginConfig): Promise<void> {
    await writePluginConfig(this.configPath, next);
    this.config = next;
    this.logger.debug("Config saved", { configPath: this.configPath });
  }
}
