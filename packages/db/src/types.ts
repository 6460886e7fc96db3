/**
 * Repository Contract
 *
 * Durable storage for short links. The store owns short-code uniqueness;
 * the link service only talks to it through this interface.
 */

import type { NewShortLink, ShortLink } from "@urlkit/shared";

export interface LinkRepository {
  /**
   * Persist a new link and return it with its assigned id.
   * @throws AlreadyExistsError if the short code is taken
   */
  create(link: NewShortLink): Promise<ShortLink>;

  findByShortCode(shortCode: string): Promise<ShortLink | null>;

  /**
   * Most recently created link for this exact long URL.
   */
  findByLongUrl(longUrl: string): Promise<ShortLink | null>;

  /**
   * Overwrite long URL, click count and updated timestamp of the link
   * with the same short code.
   * @throws NotFoundError if no such link exists
   */
  update(link: ShortLink): Promise<ShortLink>;

  /**
   * @returns Whether a row was removed
   */
  deleteByShortCode(shortCode: string): Promise<boolean>;

  /** Link record for statistics */
  getStats(shortCode: string): Promise<ShortLink | null>;

  exists(shortCode: string): Promise<boolean>;

  /** True when the store answers */
  ping(): Promise<boolean>;
}
