import { describe, expect, test } from "vitest";
import {
  THRESHOLD_FORMAT_ERROR,
  THRESHOLD_NUMBER_ERROR,
  THRESHOLD_RANGE_ERROR,
  THRESHOLD_UNIT_ERROR,
  parseThresholdArgs,
} from "../args";

describe("parseThresholdArgs", () => {
  test("parses hours with the h suffix", () => {
    expect(parseThresholdArgs("$预警阈值 2h")).toEqual({ thresholdHours: 2 });
    expect(parseThresholdArgs("$预警阈值 1.5H")).toEqual({ thresholdHours: 1.5 });
    expect(parseThresholdArgs("  $预警阈值   0h ")).toEqual({ thresholdHours: 0 });
    expect(parseThresholdArgs("$预警阈值 72h")).toEqual({ thresholdHours: 72 });
  });

  test("rejects the wrong number of tokens", () => {
    expect(parseThresholdArgs("$预警阈值")).toEqual({ error: THRESHOLD_FORMAT_ERROR });
    expect(parseThresholdArgs("$预警阈值 2h extra")).toEqual({ error: THRESHOLD_FORMAT_ERROR });
    expect(parseThresholdArgs("$预警阈值2h")).toEqual({ error: THRESHOLD_FORMAT_ERROR });
  });

  test("rejects values without the hour suffix", () => {
    expect(parseThresholdArgs("$预警阈值 2")).toEqual({ error: THRESHOLD_UNIT_ERROR });
    expect(parseThresholdArgs("$预警阈值 abcs")).toEqual({ error: THRESHOLD_UNIT_ERROR });
  });

  test("rejects non-numeric values", () => {
    expect(parseThresholdArgs("$预警阈值 abch")).toEqual({ error: THRESHOLD_NUMBER_ERROR });
    expect(parseThresholdArgs("$预警阈值 h")).toEqual({ error: THRESHOLD_NUMBER_ERROR });
    expect(parseThresholdArgs("$预警阈值 nanh")).toEqual({ error: THRESHOLD_NUMBER_ERROR });
    expect(parseThresholdArgs("$预警阈值 0x10h")).toEqual({ error: THRESHOLD_NUMBER_ERROR });
  });

  test("rejects values outside 0-72 hours", () => {
    expect(parseThresholdArgs("$预警阈值 90h")).toEqual({ error: THRESHOLD_RANGE_ERROR });
    expect(parseThresholdArgs("$预警阈值 -1h")).toEqual({ error: THRESHOLD_RANGE_ERROR });
    expect(parseThresholdArgs("$预警阈值 72.5h")).toEqual({ error: THRESHOLD_RANGE_ERROR });
  });

  test("gives each failure its own message", () => {
    expect(new Set([THRESHOLD_FORMAT_ERROR, THRESHOLD_UNIT_ERROR, THRESHOLD_NUMBER_ERROR, THRESHOLD_RANGE_ERROR]).size).toBe(4);
  });
});
