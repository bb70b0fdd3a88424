/**
 * Extension-wide constants, defaults, and command literals.
 */

export const STATUS_KEY = "session-warning";
export const REPORT_MESSAGE_TYPE = "session-warning-report";
export const LOG_COMPONENT = "session-warning";

export const DEFAULT_THRESHOLD_HOURS = 2;
export const MAX_THRESHOLD_HOURS = 72;
export const DEFAULT_SESSION_LIFETIME_HOURS = 72;
export const DEFAULT_POLL_INTERVAL_HOURS = 2;
export const DEFAULT_API_HOST = "127.0.0.1";
export const DEFAULT_API_PORT = 9000;
export const DEFAULT_API_PATH_PREFIX = "/VXAPI";

export const HOUR_MS = 3_600_000;
export const WARNING_COOLDOWN_MS = HOUR_MS;
export const LOOP_ERROR_BACKOFF_MS = 60_000;
export const LOOP_JOIN_TIMEOUT_MS = 5_000;
export const QR_SEND_DELAY_MS = 1_000;
// setTimeout overflows past 2^31 - 1 ms
export const MAX_TIMER_MS = 2_147_483_647;

export const SEND_TEXT_TIMEOUT_MS = 10_000;
export const GET_QR_TIMEOUT_MS = 15_000;
export const DOWNLOAD_IMAGE_TIMEOUT_MS = 10_000;
export const UPLOAD_IMAGE_TIMEOUT_MS = 30_000;

export const DEVICE_ID_PREFIX = "49";
export const DEVICE_SEED_LENGTH = 15;

export const COMMAND_STATUS = "$预警状态";
export const COMMAND_CONFIG = "$预警配置";
export const COMMAND_ENABLE = "$预警启用";
export const COMMAND_DISABLE = "$预警禁用";
export const COMMAND_THRESHOLD = "$预警阈值";
export const COMMAND_TEST = "$预警测试";
