/**
 * Short Code Configuration Constants
 *
 * Single source of truth for generation and validation parameters.
 */
export const SHORTCODE_CONFIG = {
  /**
   * Default length for generated short codes.
   * 8 chars = 62^8 = ~218 trillion combinations.
   */
  DEFAULT_LENGTH: 8,

  /**
   * Base62 alphabet: 0-9A-Za-z
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz",

  /** Collision retry attempts before generation is reported as exhausted */
  MAX_ATTEMPTS: 10,

  /**
   * Custom code constraints (caller-supplied short codes).
   * Bounded by the short_code VARCHAR(20) column.
   */
  CUSTOM_CODE: {
    MIN_LENGTH: 1,
    MAX_LENGTH: 20,
    PATTERN: /^[A-Za-z0-9-]+$/,
  },
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length accepted for shortening */
  MAX_LENGTH: 2048,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Cache key helpers.
 *
 * The resolved URL is stored under the bare short code; the click counter
 * lives beside it under a "clicks:" prefix.
 */
export const CACHE_KEYS = {
  CLICKS_PREFIX: "clicks:",
} as const;

export function clicksKey(shortCode: string): string {
  return `${CACHE_KEYS.CLICKS_PREFIX}${shortCode}`;
}
