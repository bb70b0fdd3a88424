/**
 * Wires config, login state, backend, delivery, monitor, and commands together.
 */

import type { Logger } from "winston";
import { MessagingBackend } from "./backend";
import { CommandRouter } from "./commands";
import { ConfigStore } from "./config";
import { WarningDelivery } from "./delivery";
import { createComponentLogger } from "./logger";
import { LoginStateReader } from "./login";
import { ExpiryMonitor } from "./monitor";
import { getBotRootDir, getConfigPath, resolveStatePaths } from "./paths";
import type { FetchFn, PauseFn, SleepFn } from "./types";

export type SessionWarningPluginOptions = {
  logger: Logger;
  configPath?: string;
  botRootDir?: string;
  fetch?: FetchFn;
  now?: () => number;
  sleep?: SleepFn;
  pause?: PauseFn;
};

export class SessionWarningPlugin {
  private constructor(
    readonly config: ConfigStore,
    readonly login: LoginStateReader,
    readonly delivery: WarningDelivery,
    readonly monitor: ExpiryMonitor,
    readonly commands: CommandRouter,
    private readonly logger: Logger,
  ) {}

  /** Loads the config and starts the monitor when warnings are enabled. */
  static async load(options: SessionWarningPluginOptions): Promise<SessionWarningPlugin> {
    const { logger, now } = options;
    const config = await ConfigStore.load(options.configPath ?? getConfigPath(), createComponentLogger("config", logger));
    const paths = resolveStatePaths(options.botRootDir ?? getBotRootDir());

    const login = new LoginStateReader(paths, createComponentLogger("login", logger));
    const backend = new MessagingBackend({
      baseUrl: () => config.settings.apiBaseUrl,
      logger: createComponentLogger("backend", logger),
      fetch: options.fetch,
    });
    const delivery = new WarningDelivery({
      backend,
      login,
      scratchDir: paths.scratchDir,
      logger: createComponentLogger("delivery", logger),
      pause: options.pause,
      now,
    });
    const monitor = new ExpiryMonitor({
      config,
      login,
      delivery,
      logger: createComponentLogger("monitor", logger),
      now,
      sleep: options.sleep,
    });
    const commands = new CommandRouter({
      config,
      login,
      monitor,
      delivery,
      logger: createComponentLogger("commands", logger),
      now,
    });

    const plugin = new SessionWarningPlugin(config, login, delivery, monitor, commands, logger);
    if (config.settings.enabled) monitor.start();
    logger.info("Session warning plugin loaded", { configPath: config.path, enabled: config.settings.enabled });
    return plugin;
  }

  /** Re-reads the config file and brings the loop in line with it. */
  async reload(): Promise<void> {
    await this.monitor.stop();
    const settings = await this.config.reload();
    if (settings.enabled) this.monitor.start();
    this.logger.info("Session warning plugin reloaded", { enabled: settings.enabled });
  }

  /** Stops the loop. Background QR sends are left to finish on their own timeouts. */
  async shutdown(): Promise<void> {
    await this.monitor.stop();
  }
}
