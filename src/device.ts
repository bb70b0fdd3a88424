/**
 * Throwaway device identities presented when requesting a login QR code.
 */

import { createHash, randomInt } from "node:crypto";
import { DEVICE_ID_PREFIX, DEVICE_SEED_LENGTH } from "./constants";
import type { DeviceIdentity } from "./types";

const LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const FIRST_NAMES = ["Alice", "Bob", "Charlie", "Diana", "Edward", "Fiona"];
const LAST_NAMES = ["Smith", "Johnson", "Williams", "Brown", "Jones", "Garcia"];

/** Returns an integer in [0, max). */
export type RandomIndex = (max: number) => number;

function pick(values: readonly string[], random: RandomIndex): string {
  return values[random(values.length)] ?? values[0] ?? "";
}

export function createDeviceId(random: RandomIndex = randomInt): string {
  let seed = "";
  for (let i = 0; i < DEVICE_SEED_LENGTH; i++) {
    seed += LETTERS.charAt(random(LETTERS.length));
  }
  const digest = createHash("md5").update(seed).digest("hex");
  return DEVICE_ID_PREFIX + digest.slice(DEVICE_ID_PREFIX.length);
}

export function createDeviceName(random: RandomIndex = randomInt): string {
  return `${pick(FIRST_NAMES, random)} ${pick(LAST_NAMES, random)}'s iPad`;
}

export function createDeviceIdentity(random: RandomIndex = randomInt): DeviceIdentity {
  return { deviceId: createDeviceId(random), deviceName: createDeviceName(random) };
}
