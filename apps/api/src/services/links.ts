/**
 * Link Service
 *
 * Orchestrates the durable store, the tiered cache and the code generator.
 *
 * Click counting:
 * - Cache hit: detached INCR on `clicks:{code}`; the store is not touched.
 * - Cache miss: detached store update with clickCount + 1 from the record
 *   just read. Two concurrent misses on one code both write the same
 *   "+1 from that base", so one click is lost. Counts are approximate.
 *
 * Consistency between cache and store is eventual; no operation spans both
 * transactionally.
 */

import type { CacheService } from "@urlkit/cache";
import type { LinkRepository } from "@urlkit/db";
import { createLogger, type Logger } from "@urlkit/logger";
import {
  AlreadyExistsError,
  clicksKey,
  InternalError,
  NotFoundError,
  SHORTCODE_CONFIG,
  assertValidLongUrl,
  systemClock,
  type Clock,
  type CreateUrlRequest,
  type CreateUrlResponse,
  type ShortCodeGenerator,
  type UrlStats,
} from "@urlkit/shared";

// ============================================================================
// Types
// ============================================================================

export interface LinkServiceOptions {
  repository: LinkRepository;
  cache: CacheService;
  generator: ShortCodeGenerator;
  /** Prefix of every short URL, e.g. "https://sho.rt" */
  baseUrl: string;
  /** Length of generated codes (default: 8) */
  codeLength?: number;
  /** TTL of cached mappings in seconds (default: 3600) */
  cacheTtlSeconds?: number;
  clock?: Clock;
  logger?: Logger;
}

const DEFAULT_CACHE_TTL = 3600;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

// ============================================================================
// Link Service
// ============================================================================

export class LinkService {
  private readonly repository: LinkRepository;
  private readonly cache: CacheService;
  private readonly generator: ShortCodeGenerator;
  private readonly baseUrl: string;
  private readonly codeLength: number;
  private readonly cacheTtlSeconds: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly pending = new Set<Promise<void>>();

  constructor(options: LinkServiceOptions) {
    this.repository = options.repository;
    this.cache = options.cache;
    this.generator = options.generator;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.codeLength = options.codeLength ?? SHORTCODE_CONFIG.DEFAULT_LENGTH;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? DEFAULT_CACHE_TTL;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("links");
  }

  /**
   * Shorten a URL. The URL and any custom code are validated first; after
   * that, an existing link for the same long URL is returned as-is, even
   * when a custom code was requested.
   *
   * @throws ValidationError for a malformed URL or custom code
   * @throws AlreadyExistsError when the custom code is taken
   * @throws InternalError when no free code was found in 10 attempts
   */
  async createShortUrl(request: CreateUrlRequest): Promise<CreateUrlResponse> {
    assertValidLongUrl(request.url);
    const customCode =
      request.customCode === undefined ? undefined : this.generator.generateCustom(request.customCode);

    const existing = await this.repository.findByLongUrl(request.url);
    if (existing) {
      this.logger.debug({ shortCode: existing.shortCode }, "Returning existing link");
      return this.toResponse(existing.shortCode, existing.longUrl);
    }

    const shortCode = await this.resolveShortCode(request.url, customCode);
    const now = new Date(this.clock.now());

    const link = await this.repository.create({
      shortCode,
      longUrl: request.url,
      clickCount: 0,
      createdAt: now,
      updatedAt: now,
    });

    await this.cache.set(link.shortCode, link.longUrl, this.cacheTtlSeconds);

    this.logger.info({ shortCode: link.shortCode }, "Link created");
    return this.toResponse(link.shortCode, link.longUrl);
  }

  /**
   * Resolve a code to its long URL and count the click.
   *
   * @throws NotFoundError when the code is unknown
   */
  async getOriginalUrl(shortCode: string): Promise<string> {
    const cached = await this.cache.get(shortCode);
    if (cached !== null) {
      this.detach("click increment", async () => {
        await this.cache.increment(clicksKey(shortCode));
      });
      return cached;
    }

    const link = await this.repository.findByShortCode(shortCode);
    if (!link) {
      throw new NotFoundError(`Short code '${shortCode}' not found`);
    }

    await this.cache.set(shortCode, link.longUrl, this.cacheTtlSeconds);

    const counted = {
      ...link,
      clickCount: link.clickCount + 1,
      updatedAt: new Date(this.clock.now()),
    };
    this.detach("click count update", async () => {
      await this.repository.update(counted);
    });

    return link.longUrl;
  }

  /**
   * Link statistics. A cached click counter wins over the stored count.
   *
   * @throws NotFoundError when the code is unknown
   */
  async getUrlStats(shortCode: string): Promise<UrlStats> {
    const link = await this.repository.getStats(shortCode);
    if (!link) {
      throw new NotFoundError(`Short code '${shortCode}' not found`);
    }

    const cachedClicks = await this.cache.get(clicksKey(shortCode));

    return {
      shortCode: link.shortCode,
      longUrl: link.longUrl,
      clicks: parseClicks(cachedClicks) ?? link.clickCount,
      createdAt: link.createdAt,
      updatedAt: link.updatedAt,
    };
  }

  /**
   * Evict both cache keys, then delete the record.
   *
   * @returns Whether a stored link was removed
   */
  async deleteUrl(shortCode: string): Promise<boolean> {
    await this.cache.delete(shortCode);
    await this.cache.delete(clicksKey(shortCode));

    const deleted = await this.repository.deleteByShortCode(shortCode);
    if (deleted) {
      this.logger.info({ shortCode }, "Link deleted");
    }
    return deleted;
  }

  /** Background tasks still running */
  get pendingTasks(): number {
    return this.pending.size;
  }

  /**
   * Wait for background tasks, including any they schedule, up to `maxWaitMs`.
   *
   * @returns True when nothing is left pending
   */
  async drain(maxWaitMs = 5000): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), maxWaitMs);
    });

    try {
      while (this.pending.size > 0) {
        const outcome = await Promise.race([
          Promise.allSettled([...this.pending]).then(() => "settled" as const),
          timeout,
        ]);
        if (outcome === "timeout") {
          this.logger.warn({ pending: this.pending.size }, "Background tasks still pending");
          return false;
        }
      }
      return true;
    } finally {
      clearTimeout(timer);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async resolveShortCode(url: string, customCode?: string): Promise<string> {
    if (customCode !== undefined) {
      if (await this.repository.exists(customCode)) {
        throw new AlreadyExistsError(`Custom code '${customCode}' already exists`);
      }
      return customCode;
    }

    for (let attempt = 1; attempt <= SHORTCODE_CONFIG.MAX_ATTEMPTS; attempt++) {
      const code = this.generator.generate(url, this.codeLength);
      if (!(await this.repository.exists(code))) {
        return code;
      }
      this.logger.debug({ attempt, code }, "Short code collision");
    }

    this.logger.error({ attempts: SHORTCODE_CONFIG.MAX_ATTEMPTS }, "Short code generation exhausted");
    throw new InternalError("Failed to generate unique short code after maximum attempts");
  }

  private toResponse(shortCode: string, longUrl: string): CreateUrlResponse {
    return {
      shortUrl: `${this.baseUrl}/${shortCode}`,
      longUrl,
      shortCode,
    };
  }

  /**
   * Run `task` without blocking the caller. Failures are logged only.
   */
  private detach(name: string, task: () => Promise<void>): void {
    const promise = task()
      .catch((err: unknown) => {
        this.logger.error({ err, task: name }, "Background task failed");
      })
      .finally(() => {
        this.pending.delete(promise);
      });
    this.pending.add(promise);
  }
}

/**
 * Parse a cached counter as a 32-bit integer; null when it is not one.
 */
export function parseClicks(value: string | null): number | null {
  if (value === null || !/^[+-]?\d+$/.test(value)) return null;

  const clicks = Number.parseInt(value, 10);
  return clicks >= INT32_MIN && clicks <= INT32_MAX ? clicks : null;
}
