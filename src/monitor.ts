/**
 * Background expiry monitor.
 *
 * Owns the polling loop and the last-warning record. `start()` and `stop()`
 * are the only ways to change whether the loop runs.
 */

import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "winston";
import type { ConfigStore } from "./config";
import { HOUR_MS, LOOP_ERROR_BACKOFF_MS, LOOP_JOIN_TIMEOUT_MS, MAX_TIMER_MS } from "./constants";
import type { WarningDelivery } from "./delivery";
import { computeExpiry, isCooldownElapsed, isWarningDue } from "./expiry";
import type { LoginStateReader } from "./login";
import type { MonitorState, SleepFn } from "./types";
import { describeError } from "./utils";

export type ExpiryMonitorDeps = {
  config: ConfigStore;
  login: LoginStateReader;
  delivery: WarningDelivery;
  logger: Logger;
  now?: () => number;
  sleep?: SleepFn;
  errorBackoffMs?: number;
  joinTimeoutMs?: number;
};

export const sleepUnlessAborted: SleepFn = async (ms, signal) => {
  if (signal.aborted) return false;
  try {
    await delay(Math.min(Math.max(ms, 0), MAX_TIMER_MS), undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
};

async function joinWithin(task: Promise<void>, timeoutMs: number): Promise<boolean> {
  const timer = new AbortController();
  try {
    return await Promise.race([task.then(() => true), delay(timeoutMs, false, { signal: timer.signal, ref: false })]);
  } finally {
    timer.abort();
  }
}

export class ExpiryMonitor {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private lastWarningAt: number | null = null;
  // Outlives stop(): a loop that missed the join deadline may still be sending.
  private checking: Promise<boolean> | null = null;

  private readonly now: () => number;
  private readonly sleep: SleepFn;
  private readonly errorBackoffMs: number;
  private readonly joinTimeoutMs: number;

  constructor(private readonly deps: ExpiryMonitorDeps) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleepUnlessAborted;
    this.errorBackoffMs = deps.errorBackoffMs ?? LOOP_ERROR_BACKOFF_MS;
    this.joinTimeoutMs = deps.joinTimeoutMs ?? LOOP_JOIN_TIMEOUT_MS;
  }

  get state(): MonitorState {
    return this.controller ? "running" : "stopped";
  }

  get lastFiredAt(): number | null {
    return this.lastWarningAt;
  }

  start(): void {
    if (this.controller) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.deps.logger.info("Expiry monitor started", { pollIntervalHours: this.deps.config.settings.pollIntervalHours });
  }

  async stop(): Promise<void> {
    const { controller, loop } = this;
    if (!controller || !loop) return;

    this.controller = null;
    this.loop = null;
    controller.abort();

    if (!(await joinWithin(loop, this.joinTimeoutMs))) {
      this.deps.logger.warn("Expiry monitor did not stop in time, continuing shutdown", { timeoutMs: this.joinTimeoutMs });
      return;
    }
    this.deps.logger.info("Expiry monitor stopped");
  }

  /**
   * One evaluation with the cooldown applied. Returns true when a warning went out.
   */
  async checkOnce(): Promise<boolean> {
    if (this.checking) {
      this.deps.logger.debug("Previous check still in flight, skipping");
      return false;
    }

    const checking = this.evaluate();
    this.checking = checking;
    try {
      return await checking;
    } finally {
      if (this.checking === checking) this.checking = null;
    }
  }

  private async evaluate(): Promise<boolean> {
    const { config, login, delivery, logger } = this.deps;
    const settings = config.settings;
    if (!settings.enabled || !settings.target) return false;

    const loginTimeMs = await login.readLoginTime();
    if (loginTimeMs === null) return false;

    const now = this.now();
    const due = isWarningDue({
      enabled: settings.enabled,
      target: settings.target,
      loginTimeMs,
      now,
      sessionLifetimeHours: settings.sessionLifetimeHours,
      thresholdHours: settings.thresholdHours,
    });
    if (!due) return false;

    if (!isCooldownElapsed(now, this.lastWarningAt)) {
      logger.debug("Warning due but still cooling down", { lastWarningAt: this.lastWarningAt });
      return false;
    }

    const report = computeExpiry(now, loginTimeMs, settings.sessionLifetimeHours);
    logger.info("Session close to expiry, sending warning", {
      onlineHours: report.onlineHours,
      remainingHours: report.remainingHours,
    });

    const result = await delivery.sendWarning(settings.target, report);
    if (!result.textSent) return false;

    this.lastWarningAt = this.now();
    return true;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const { config, logger } = this.deps;

    while (!signal.aborted) {
      let waitMs = config.settings.pollIntervalHours * HOUR_MS;
      try {
        await this.checkOnce();
      } catch (error) {
        logger.error("Expiry check failed, backing off", { error: describeError(error), backoffMs: this.errorBackoffMs });
        waitMs = this.errorBackoffMs;
      }

      try {
        if (!(await this.sleep(waitMs, signal))) break;
      } catch (error) {
        logger.error("Monitor sleep failed, stopping loop", { error: describeError(error) });
        if (this.controller?.signal === signal) {
          this.controller = null;
          this.loop = null;
        }
        break;
      }
    }
  }
}
