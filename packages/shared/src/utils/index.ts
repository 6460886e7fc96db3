/**
 * Shared Utility Functions
 */

// Generation
export {
  DigestShortCodeGenerator,
  RandomShortCodeGenerator,
  foldDigest,
  toBase62,
} from "./shortcode.js";

// Validation
export { validateCustomCode } from "./shortcode.js";
export { validateLongUrl, assertValidLongUrl } from "./url.js";

// Capabilities
export { systemClock, cryptoRandom } from "./random.js";

// Types
export type { ShortCodeGenerator, GeneratorOptions } from "./shortcode.js";
