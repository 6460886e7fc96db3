/**
 * In-memory LinkRepository.
 *
 * Same contract as the PostgreSQL repository, for tests and for running
 * without a database.
 */

import {
  AlreadyExistsError,
  NotFoundError,
  systemClock,
  type Clock,
  type NewShortLink,
  type ShortLink,
} from "@urlkit/shared";
import type { LinkRepository } from "./types.js";

export class InMemoryLinkRepository implements LinkRepository {
  private readonly links = new Map<string, ShortLink>();
  private nextId = 1;

  constructor(private readonly clock: Clock = systemClock) {}

  async create(link: NewShortLink): Promise<ShortLink> {
    if (this.links.has(link.shortCode)) {
      throw new AlreadyExistsError(`Short code '${link.shortCode}' already exists`);
    }

    const stored: ShortLink = { ...link, id: this.nextId++ };
    this.links.set(stored.shortCode, stored);
    return { ...stored };
  }

  async findByShortCode(shortCode: string): Promise<ShortLink | null> {
    const link = this.links.get(shortCode);
    return link ? { ...link } : null;
  }

  async findByLongUrl(longUrl: string): Promise<ShortLink | null> {
    let latest: ShortLink | null = null;

    for (const link of this.links.values()) {
      if (link.longUrl !== longUrl) continue;
      if (
        !latest ||
        link.createdAt.getTime() > latest.createdAt.getTime() ||
        (link.createdAt.getTime() === latest.createdAt.getTime() && link.id > latest.id)
      ) {
        latest = link;
      }
    }

    return latest ? { ...latest } : null;
  }

  async update(link: ShortLink): Promise<ShortLink> {
    const current = this.links.get(link.shortCode);
    if (!current) {
      throw new NotFoundError(`Short code '${link.shortCode}' not found`);
    }

    const updated: ShortLink = {
      ...current,
      longUrl: link.longUrl,
      clickCount: link.clickCount,
      updatedAt: new Date(this.clock.now()),
    };
    this.links.set(updated.shortCode, updated);
    return { ...updated };
  }

  async deleteByShortCode(shortCode: string): Promise<boolean> {
    return this.links.delete(shortCode);
  }

  async getStats(shortCode: string): Promise<ShortLink | null> {
    return this.findByShortCode(shortCode);
  }

  async exists(shortCode: string): Promise<boolean> {
    return this.links.has(shortCode);
  }

  async ping(): Promise<boolean> {
    return true;
  }

  get size(): number {
    return this.links.size;
  }
}
