/**
 * Short Code Generation Module
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. GENERATION  - Digest-derived and pure-random Base62 codes           │
 * │ 2. VALIDATION  - Custom code shape checking                            │
 * │ 3. UTILITIES   - Digest folding and Base62 emission helpers            │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Strategy: SHA-256 digest → 64-bit integer → Base62
 * - Input: seed (the long URL) ‖ unix seconds ‖ random 64-bit nonce
 * - Alphabet: 0-9A-Za-z (62 URL-safe characters)
 * - Uniqueness is NOT guaranteed here. Callers check existence and retry.
 */

import { createHash } from "node:crypto";
import { SHORTCODE_CONFIG } from "../constants/index.js";
import { ValidationError } from "../errors.js";
import type { Clock, RandomSource, ValidationResult } from "../types/index.js";
import { cryptoRandom, systemClock } from "./random.js";

const UINT64_MASK = (1n << 64n) - 1n;
const BASE = 62n;

// =============================================================================
// TYPES
// =============================================================================

/**
 * Short code strategy. Injected into the link service so alternative
 * generators can be swapped in.
 */
export interface ShortCodeGenerator {
  /**
   * Produce a candidate code of exactly `length` characters.
   *
   * @param seed - Input mixed into the code (usually the long URL)
   */
  generate(seed: string, length: number): string;

  /**
   * Validate a caller-supplied code and return it unchanged.
   *
   * @throws ValidationError if the code is empty, longer than 20 characters,
   *   or contains anything other than letters, digits and hyphens
   */
  generateCustom(code: string): string;
}

export interface GeneratorOptions {
  random?: RandomSource;
  clock?: Clock;
}

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Digest-based generator.
 *
 * @example
 * ```ts
 * const generator = new DigestShortCodeGenerator();
 * generator.generate("https://example.com/a/long/path", 8); // "k3Q9xZa1"
 * ```
 */
export class DigestShortCodeGenerator implements ShortCodeGenerator {
  private readonly random: RandomSource;
  private readonly clock: Clock;

  constructor(options: GeneratorOptions = {}) {
    this.random = options.random ?? cryptoRandom;
    this.clock = options.clock ?? systemClock;
  }

  generate(seed: string, length: number): string {
    const timestamp = Math.floor(this.clock.now() / 1000);
    const nonce = this.random.nextUint64();

    const digest = createHash("sha256")
      .update(seed)
      .update(timestamp.toString())
      .update(nonce.toString())
      .digest();

    return toBase62(foldDigest(digest), length, () => this.random.nextUint64());
  }

  generateCustom(code: string): string {
    return assertCustomCode(code);
  }
}

/**
 * Pure-random generator: every character drawn independently.
 * Ignores the seed.
 */
export class RandomShortCodeGenerator implements ShortCodeGenerator {
  private readonly random: RandomSource;

  constructor(options: Pick<GeneratorOptions, "random"> = {}) {
    this.random = options.random ?? cryptoRandom;
  }

  generate(_seed: string, length: number): string {
    const { ALPHABET } = SHORTCODE_CONFIG;
    let code = "";

    for (let i = 0; i < length; i++) {
      // Modulo bias of 2^64 % 62 is negligible
      code += ALPHABET[Number(this.random.nextUint64() % BASE)];
    }

    return code;
  }

  generateCustom(code: string): string {
    return assertCustomCode(code);
  }
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

/**
 * Validate a caller-supplied custom code.
 *
 * Rules:
 * - Length: 1-20 characters
 * - Characters: A-Z, a-z, 0-9 and hyphen (-)
 *
 * The character class is ASCII only: non-ASCII letters such as "é" are
 * rejected on purpose, so every accepted code is URL-safe without
 * percent-encoding.
 *
 * @example
 * ```ts
 * validateCustomCode("abc-123") // { valid: true }
 * validateCustomCode("abc!")    // { valid: false, error: "..." }
 * ```
 */
export function validateCustomCode(code: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = SHORTCODE_CONFIG.CUSTOM_CODE;

  if (code.length < MIN_LENGTH || code.length > MAX_LENGTH) {
    return {
      valid: false,
      error: `Custom code must be between ${MIN_LENGTH} and ${MAX_LENGTH} characters`,
    };
  }

  if (!PATTERN.test(code)) {
    return {
      valid: false,
      error: "Custom code can only contain alphanumeric characters and hyphens",
    };
  }

  return { valid: true };
}

function assertCustomCode(code: string): string {
  const result = validateCustomCode(code);
  if (!result.valid) {
    throw new ValidationError(result.error ?? "Invalid custom code");
  }
  return code;
}

// =============================================================================
// SECTION 3: UTILITIES
// =============================================================================

/**
 * Fold the first 8 bytes of a digest into an unsigned 64-bit integer,
 * least significant byte first.
 */
export function foldDigest(bytes: Uint8Array): bigint {
  let value = 0n;

  for (let i = 0; i < Math.min(8, bytes.length); i++) {
    value = (value + (BigInt(bytes[i]) << BigInt(i * 8))) & UINT64_MASK;
  }

  return value;
}

/**
 * Emit exactly `length` Base62 characters from `value`, least significant
 * digit first. Whenever the accumulator is exhausted it is refilled from
 * `reseed`.
 *
 * @example
 * ```ts
 * toBase62(125n, 2, () => 0n) // "12"
 * ```
 */
export function toBase62(value: bigint, length: number, reseed: () => bigint): string {
  const { ALPHABET } = SHORTCODE_CONFIG;
  let num = value & UINT64_MASK;
  let result = "";

  while (result.length < length) {
    result += ALPHABET[Number(num % BASE)];
    num /= BASE;

    if (num === 0n) {
      num = reseed() & UINT64_MASK;
    }
  }

  return result;
}
