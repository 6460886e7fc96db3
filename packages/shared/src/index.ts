/**
 * @urlkit/shared - Shared Package Exports
 *
 * Central export point for shared types, utilities, errors and constants.
 *
 * ```ts
 * import { DigestShortCodeGenerator, NotFoundError } from "@urlkit/shared";
 * ```
 */

// Types (ShortLink, CreateUrlRequest, Clock, RandomSource, ...)
export * from "./types/index.js";

// Utilities (short code generation, URL validation, default capabilities)
export * from "./utils/index.js";

// Constants (SHORTCODE_CONFIG, URL_CONFIG, cache keys)
export * from "./constants/index.js";

// Error taxonomy
export * from "./errors.js";
