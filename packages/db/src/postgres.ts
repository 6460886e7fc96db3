/**
 * PostgreSQL Link Repository
 */

import { createLogger, type Logger } from "@urlkit/logger";
import {
  AlreadyExistsError,
  NotFoundError,
  type NewShortLink,
  type ShortLink,
} from "@urlkit/shared";
import type { QueryResultRow } from "pg";
import type { Queryable } from "./client.js";
import {
  DELETE_SQL,
  EXISTS_SQL,
  FIND_BY_LONG_URL_SQL,
  FIND_BY_SHORT_CODE_SQL,
  HEALTH_SQL,
  INSERT_SQL,
  SCHEMA_SQL,
  UPDATE_SQL,
} from "./sql.js";
import type { LinkRepository } from "./types.js";

/** SQLSTATE unique_violation */
const UNIQUE_VIOLATION = "23505";

export class PostgresLinkRepository implements LinkRepository {
  private readonly logger: Logger;

  constructor(
    private readonly db: Queryable,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("db");
  }

  /**
   * Create the table, indexes and updated_at trigger if missing.
   */
  async init(): Promise<void> {
    await this.db.query(SCHEMA_SQL);
    this.logger.info("Database schema ready");
  }

  async create(link: NewShortLink): Promise<ShortLink> {
    try {
      const result = await this.db.query(INSERT_SQL, [
        link.shortCode,
        link.longUrl,
        link.clickCount,
        link.createdAt,
        link.updatedAt,
      ]);
      return toShortLink(result.rows[0]);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new AlreadyExistsError(`Short code '${link.shortCode}' already exists`, { cause: err });
      }
      throw err;
    }
  }

  async findByShortCode(shortCode: string): Promise<ShortLink | null> {
    const result = await this.db.query(FIND_BY_SHORT_CODE_SQL, [shortCode]);
    return result.rows.length > 0 ? toShortLink(result.rows[0]) : null;
  }

  async findByLongUrl(longUrl: string): Promise<ShortLink | null> {
    const result = await this.db.query(FIND_BY_LONG_URL_SQL, [longUrl]);
    return result.rows.length > 0 ? toShortLink(result.rows[0]) : null;
  }

  async update(link: ShortLink): Promise<ShortLink> {
    const result = await this.db.query(UPDATE_SQL, [
      link.shortCode,
      link.longUrl,
      link.clickCount,
      link.updatedAt,
    ]);

    if (result.rows.length === 0) {
      throw new NotFoundError(`Short code '${link.shortCode}' not found`);
    }
    return toShortLink(result.rows[0]);
  }

  async deleteByShortCode(shortCode: string): Promise<boolean> {
    const result = await this.db.query(DELETE_SQL, [shortCode]);
    return (result.rowCount ?? 0) > 0;
  }

  async getStats(shortCode: string): Promise<ShortLink | null> {
    return this.findByShortCode(shortCode);
  }

  async exists(shortCode: string): Promise<boolean> {
    const result = await this.db.query(EXISTS_SQL, [shortCode]);
    return result.rows.length > 0;
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.query(HEALTH_SQL);
      return true;
    } catch (err) {
      this.logger.warn({ err }, "Database ping failed");
      return false;
    }
  }
}

function toShortLink(row: QueryResultRow): ShortLink {
  return {
    id: Number(row.id),
    shortCode: String(row.short_code),
    longUrl: String(row.long_url),
    clickCount: Number(row.clicks),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function isUniqueViolation(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === UNIQUE_VIOLATION;
}
