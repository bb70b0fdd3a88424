/**
 * Shared domain types for the expiry monitor, delivery workflow, and commands.
 */

export type Settings = {
  enabled: boolean;
  thresholdHours: number;
  target: string;
  apiHost: string;
  apiPort: number;
  apiPathPrefix: string;
  apiBaseUrl: string;
  sessionLifetimeHours: number;
  pollIntervalHours: number;
};

export type Identity = {
  id: string;
  deviceId: string;
};

export type StatePaths = {
  deviceInfoPath: string;
  loginStatPaths: string[];
  scratchDir: string;
};

export type ExpiryReport = {
  onlineHours: number;
  remainingHours: number;
  expired: boolean;
};

export type WarningInputs = {
  enabled: boolean;
  target: string;
  loginTimeMs: number | null;
  now: number;
  sessionLifetimeHours: number;
  thresholdHours: number;
};

export type DeviceIdentity = {
  deviceId: string;
  deviceName: string;
};

export type LoginQr = {
  qrUrl: string;
  uuid: string;
};

export type DeliveryResult = {
  textSent: boolean;
  imageSent: boolean;
};

export type MonitorState = "stopped" | "running";

export type ParsedThresholdArgs = {
  thresholdHours?: number;
  error?: string;
};

/** Resolves after `ms`, or early with `false` once `signal` aborts. */
export type SleepFn = (ms: number, signal: AbortSignal) => Promise<boolean>;

/** Non-cancellable pause between delivery steps. */
export type PauseFn = (ms: number) => Promise<void>;

export type FetchFn = typeof globalThis.fetch;
