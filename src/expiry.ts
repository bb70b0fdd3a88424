/**
 * Expiry arithmetic and the warning-due decision. Pure functions of their inputs.
 */

import { HOUR_MS, WARNING_COOLDOWN_MS } from "./constants";
import type { ExpiryReport, WarningInputs } from "./types";

export function computeExpiry(now: number, loginTimeMs: number, sessionLifetimeHours: number): ExpiryReport {
  const onlineHours = (now - loginTimeMs) / HOUR_MS;
  const remainingHours = sessionLifetimeHours - onlineHours;
  return { onlineHours, remainingHours, expired: remainingHours <= 0 };
}

/** Elapsed online hours at which a warning becomes due. */
export function triggerHours(sessionLifetimeHours: number, thresholdHours: number): number {
  return sessionLifetimeHours - thresholdHours;
}

export function isWarningDue(inputs: WarningInputs): boolean {
  if (!inputs.enabled || !inputs.target || inputs.loginTimeMs === null) return false;
  const { onlineHours } = computeExpiry(inputs.now, inputs.loginTimeMs, inputs.sessionLifetimeHours);
  return onlineHours >= triggerHours(inputs.sessionLifetimeHours, inputs.thresholdHours);
}

export function isCooldownElapsed(now: number, lastFiredAt: number | null, cooldownMs: number = WARNING_COOLDOWN_MS): boolean {
  return lastFiredAt === null || now - lastFiredAt > cooldownMs;
}
