/**
 * Command argument parsers.
 */

import { MAX_THRESHOLD_HOURS } from "./constants";
import type { ParsedThresholdArgs } from "./types";

export const THRESHOLD_FORMAT_ERROR = "❌ 指令格式错误，请使用：$预警阈值 xh（如：$预警阈值 2h）";
export const THRESHOLD_UNIT_ERROR = "❌ 阈值格式错误，请使用小时单位，如：2h";
export const THRESHOLD_NUMBER_ERROR = "❌ 阈值必须是数字，如：2h";
export const THRESHOLD_RANGE_ERROR = `❌ 阈值范围必须在0-${MAX_THRESHOLD_HOURS}小时之间`;

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;

/** Parses `$预警阈值 <N>h` (the whole command text). */
export function parseThresholdArgs(content: string): ParsedThresholdArgs {
  const tokens = content
    .trim()
    .split(/\s+/)
    .filter(Boolean);

  const raw = tokens[1];
  if (tokens.length !== 2 || raw === undefined) {
    return { error: THRESHOLD_FORMAT_ERROR };
  }

  const normalized = raw.toLowerCase();
  if (!normalized.endsWith("h")) {
    return { error: THRESHOLD_UNIT_ERROR };
  }

  const numeric = normalized.slice(0, -1);
  const value = Number(numeric);
  if (!DECIMAL_PATTERN.test(numeric) || !Number.isFinite(value)) {
    return { error: THRESHOLD_NUMBER_ERROR };
  }

  if (value < 0 || value > MAX_THRESHOLD_HOURS) {
    return { error: THRESHOLD_RANGE_ERROR };
  }

  return { thresholdHours: value };
}
