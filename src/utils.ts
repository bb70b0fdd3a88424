/**
 * Small text/format helpers shared by replies, logging, and the status line.
 */

import { HTTPError, TimeoutError } from "ky";

export function formatHours(hours: number, digits: number): string {
  if (!Number.isFinite(hours)) return "-";
  const text = hours.toFixed(digits);
  // toFixed keeps the sign of values that round to zero
  return Number(text) === 0 ? (0).toFixed(digits) : text;
}

export function formatThreshold(hours: number): string {
  return Number.isInteger(hours) ? String(hours) : String(Number(hours.toFixed(4)));
}

export function normalizeInputText(text: string): string {
  return text.trim().replace(/\s+/g, " ");
}

export function describeError(error: unknown): string {
  if (error instanceof HTTPError) return `HTTP ${error.response.status} ${error.response.statusText}`.trim();
  if (error instanceof TimeoutError) return `timeout: ${error.request.method} ${error.request.url}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
