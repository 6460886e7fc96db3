/**
 * Default clock and random source.
 */

import { randomBytes } from "node:crypto";
import type { Clock, RandomSource } from "../types/index.js";

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Cryptographically secure 64-bit values.
 * Unpredictable codes cannot be enumerated by guessing.
 */
export const cryptoRandom: RandomSource = {
  nextUint64: () => randomBytes(8).readBigUInt64LE(0),
};
