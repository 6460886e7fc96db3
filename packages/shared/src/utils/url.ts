import { URL_CONFIG } from "../constants/index.js";
import { ValidationError, ErrorCode } from "../errors.js";
import type { ValidationResult } from "../types/index.js";

/**
 * Validate a long URL before it is shortened.
 *
 * Rules:
 * - Parses as an absolute URL
 * - http: or https: only
 * - At most URL_CONFIG.MAX_LENGTH characters
 */
export function validateLongUrl(url: string): ValidationResult {
  if (url.length === 0) {
    return { valid: false, error: "URL is required" };
  }

  if (url.length > URL_CONFIG.MAX_LENGTH) {
    return {
      valid: false,
      error: `URL too long (max ${URL_CONFIG.MAX_LENGTH} characters)`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: "Invalid URL format" };
  }

  const protocols: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!protocols.includes(parsed.protocol)) {
    return { valid: false, error: `Unsupported protocol '${parsed.protocol}'` };
  }

  return { valid: true };
}

/**
 * @throws ValidationError with code INVALID_URL
 */
export function assertValidLongUrl(url: string): void {
  const result = validateLongUrl(url);
  if (!result.valid) {
    throw new ValidationError(result.error ?? "Invalid URL", ErrorCode.INVALID_URL);
  }
}
