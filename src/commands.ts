/**
 * Chat command router for the six `$预警…` commands.
 */

import type { Logger } from "winston";
import { parseThresholdArgs } from "./args";
import type { ConfigStore } from "./config";
import {
  COMMAND_CONFIG,
  COMMAND_DISABLE,
  COMMAND_ENABLE,
  COMMAND_STATUS,
  COMMAND_TEST,
  COMMAND_THRESHOLD,
} from "./constants";
import type { WarningDelivery } from "./delivery";
import { computeExpiry } from "./expiry";
import type { LoginStateReader } from "./login";
import type { ExpiryMonitor } from "./monitor";
import {
  DISABLED_TEXT,
  ENABLED_TEXT,
  MISSING_IDENTITY_TEXT,
  MISSING_LOGIN_TIME_TEXT,
  MISSING_RECIPIENT_TEXT,
  buildConfigText,
  buildFailureText,
  buildStatusText,
  buildTestText,
  buildThresholdText,
} from "./report";
import type { ExpiryReport, Identity } from "./types";
import { describeError, normalizeInputText } from "./utils";

export type CommandRouterDeps = {
  config: ConfigStore;
  login: LoginStateReader;
  monitor: ExpiryMonitor;
  delivery: WarningDelivery;
  logger: Logger;
  now?: () => number;
};

type CurrentSession = { identity: Identity; report: ExpiryReport } | { error: string };

export class CommandRouter {
  private readonly now: () => number;

  constructor(private readonly deps: CommandRouterDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Handles one incoming text. Returns the reply, or null when the text is not
   * one of the warning commands.
   *
   * @param senderId - who sent the command; the test QR goes there when set
   */
  async handle(content: string, senderId?: string): Promise<string | null> {
    const text = normalizeInputText(content);

    if (text === COMMAND_STATUS) return this.guard("查询预警状态", () => this.status());
    if (text === COMMAND_CONFIG) return this.guard("查询配置信息", () => this.configDump());
    if (text === COMMAND_ENABLE) return this.guard("启用预警", () => this.enable());
    if (text === COMMAND_DISABLE) return this.guard("禁用预警", () => this.disable());
    if (text.startsWith(COMMAND_THRESHOLD)) return this.guard("设置阈值", () => this.threshold(text));
    if (text === COMMAND_TEST) return this.guard("预警测试", () => this.test(senderId));

    return null;
  }

  private async guard(operation: string, run: () => Promise<string>): Promise<string> {
    try {
      return await run();
    } catch (error) {
      const message = describeError(error);
      this.deps.logger.error(`${operation} failed`, { error: message });
      return buildFailureText(operation, message);
    }
  }

  private async currentSession(): Promise<CurrentSession> {
    const { config, login } = this.deps;

    const identity = await login.refreshIdentity();
    if (!identity) return { error: MISSING_IDENTITY_TEXT };

    const loginTimeMs = await login.readLoginTime();
    if (loginTimeMs === null) return { error: MISSING_LOGIN_TIME_TEXT };

    return { identity, report: computeExpiry(this.now(), loginTimeMs, config.settings.sessionLifetimeHours) };
  }

  private async status(): Promise<string> {
    const session = await this.currentSession();
    if ("error" in session) return session.error;
    return buildStatusText(session.report);
  }

  private async configDump(): Promise<string> {
    const { config, login, monitor } = this.deps;
    await login.refreshIdentity();
    return buildConfigText(config.settings, login.identity, monitor.state);
  }

  private async enable(): Promise<string> {
    await this.deps.config.setEnabled(true);
    this.deps.monitor.start();
    return ENABLED_TEXT;
  }

  private async disable(): Promise<string> {
    await this.deps.config.setEnabled(false);
    await this.deps.monitor.stop();
    return DISABLED_TEXT;
  }

  private async threshold(text: string): Promise<string> {
    const parsed = parseThresholdArgs(text);
    if (parsed.error !== undefined || parsed.thresholdHours === undefined) {
      return parsed.error ?? buildFailureText("设置阈值", "invalid threshold");
    }

    await this.deps.config.setThreshold(parsed.thresholdHours);
    return buildThresholdText(parsed.thresholdHours, this.deps.config.settings.sessionLifetimeHours);
  }

  private async test(senderId: string | undefined): Promise<string> {
    const session = await this.currentSession();
    if ("error" in session) return session.error;

    const recipient = senderId || this.deps.config.settings.target;
    if (!recipient) return MISSING_RECIPIENT_TEXT;

    this.deps.delivery.scheduleLoginQr(session.identity.id, recipient);
    return buildTestText(session.report);
  }
}
