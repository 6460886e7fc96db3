/**
 * Shared Type Definitions
 */

// =============================================================================
// Link Types
// =============================================================================

/**
 * Durable short link record.
 * Owned by the repository; the service only reads and writes it through that contract.
 */
export interface ShortLink {
  /** Store-assigned identifier */
  id: number;

  /** Unique short code (generated Base62 or custom) */
  shortCode: string;

  /** Original destination URL */
  longUrl: string;

  /** Persisted click count */
  clickCount: number;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields supplied when persisting a new link. The store assigns the id.
 */
export type NewShortLink = Omit<ShortLink, "id">;

/**
 * Link creation request
 */
export interface CreateUrlRequest {
  /** URL to shorten */
  url: string;

  /** Optional caller-chosen short code */
  customCode?: string;
}

/**
 * Link creation response
 */
export interface CreateUrlResponse {
  /** Base URL joined with the short code */
  shortUrl: string;

  longUrl: string;

  shortCode: string;
}

/**
 * Link statistics
 */
export interface UrlStats {
  shortCode: string;
  longUrl: string;

  /** Cached counter when present, persisted count otherwise */
  clicks: number;

  createdAt: Date;
  updatedAt: Date;
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Time source. Injected so expiry and timestamps can be driven from tests.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

/**
 * Source of unsigned 64-bit random integers.
 */
export interface RandomSource {
  nextUint64(): bigint;
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}
