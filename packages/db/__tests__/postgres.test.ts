import { describe, expect, it, jest } from "@jest/globals";
import { createSilentLogger } from "@urlkit/logger";
import { AlreadyExistsError, NotFoundError } from "@urlkit/shared";
import type { QueryResult, QueryResultRow } from "pg";
import type { Queryable } from "../src/client.js";
import { PostgresLinkRepository } from "../src/postgres.js";

const CREATED = new Date("2024-03-01T10:00:00.000Z");
const UPDATED = new Date("2024-03-02T10:00:00.000Z");

function result(rows: QueryResultRow[], rowCount = rows.length): QueryResult<QueryResultRow> {
  return { command: "SELECT", rowCount, oid: 0, fields: [], rows };
}

const row = {
  id: 7,
  short_code: "abc123",
  long_url: "https://example.com/page",
  clicks: 4,
  created_at: CREATED,
  updated_at: UPDATED,
};

function fakeDb(respond: (text: string, values?: unknown[]) => QueryResult<QueryResultRow>) {
  const query = jest.fn(async (text: string, values?: unknown[]) => respond(text, values));
  const db: Queryable = { query };
  return { db, query };
}

function uniqueViolation(): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint "short_links_short_code_key"'), {
    code: "23505",
  });
}

describe("PostgresLinkRepository", () => {
  const logger = createSilentLogger();

  it("maps rows to ShortLink records", async () => {
    const { db, query } = fakeDb(() => result([row]));
    const repo = new PostgresLinkRepository(db, logger);

    const link = await repo.findByShortCode("abc123");

    expect(link).toEqual({
      id: 7,
      shortCode: "abc123",
      longUrl: "https://example.com/page",
      clickCount: 4,
      createdAt: CREATED,
      updatedAt: UPDATED,
    });
    expect(query.mock.calls[0][1]).toEqual(["abc123"]);
  });

  it("returns null when no row matches", async () => {
    const { db } = fakeDb(() => result([]));
    const repo = new PostgresLinkRepository(db, logger);

    expect(await repo.findByShortCode("missing")).toBeNull();
    expect(await repo.findByLongUrl("https://example.com/none")).toBeNull();
    expect(await repo.exists("missing")).toBe(false);
  });

  it("orders long URL lookups newest first", async () => {
    const { db, query } = fakeDb(() => result([row]));
    const repo = new PostgresLinkRepository(db, logger);

    await repo.findByLongUrl("https://example.com/page");

    expect(query.mock.calls[0][0]).toContain("ORDER BY created_at DESC");
    expect(query.mock.calls[0][1]).toEqual(["https://example.com/page"]);
  });

  it("inserts every field of a new link", async () => {
    const { db, query } = fakeDb(() => result([{ ...row, clicks: 0 }]));
    const repo = new PostgresLinkRepository(db, logger);

    const link = await repo.create({
      shortCode: "abc123",
      longUrl: "https://example.com/page",
      clickCount: 0,
      createdAt: CREATED,
      updatedAt: CREATED,
    });

    expect(link.id).toBe(7);
    expect(link.clickCount).toBe(0);
    expect(query.mock.calls[0][1]).toEqual(["abc123", "https://example.com/page", 0, CREATED, CREATED]);
  });

  it("turns a unique violation into AlreadyExistsError", async () => {
    const { db } = fakeDb(() => {
      throw uniqueViolation();
    });
    const repo = new PostgresLinkRepository(db, logger);

    await expect(
      repo.create({
        shortCode: "taken",
        longUrl: "https://example.com",
        clickCount: 0,
        createdAt: CREATED,
        updatedAt: CREATED,
      })
    ).rejects.toBeInstanceOf(AlreadyExistsError);
  });

  it("propagates other store errors unchanged", async () => {
    const failure = new Error("connection terminated");
    const { db } = fakeDb(() => {
      throw failure;
    });
    const repo = new PostgresLinkRepository(db, logger);

    await expect(repo.findByShortCode("abc123")).rejects.toBe(failure);
  });

  it("throws NotFoundError when an update matches nothing", async () => {
    const { db } = fakeDb(() => result([]));
    const repo = new PostgresLinkRepository(db, logger);

    await expect(
      repo.update({
        id: 1,
        shortCode: "gone",
        longUrl: "https://example.com",
        clickCount: 2,
        createdAt: CREATED,
        updatedAt: UPDATED,
      })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports deletes by affected row count", async () => {
    const counts = [1, 0];
    const { db } = fakeDb(() => result([], counts.shift() ?? 0));
    const repo = new PostgresLinkRepository(db, logger);

    expect(await repo.deleteByShortCode("abc123")).toBe(true);
    expect(await repo.deleteByShortCode("abc123")).toBe(false);
  });

  it("answers ping false when the query fails", async () => {
    const { db } = fakeDb(() => {
      throw new Error("ECONNREFUSED");
    });
    const repo = new PostgresLinkRepository(db, logger);

    expect(await repo.ping()).toBe(false);
  });

  it("creates the schema on init", async () => {
    const { db, query } = fakeDb(() => result([]));
    const repo = new PostgresLinkRepository(db, logger);

    await repo.init();

    expect(query).toHaveBeenCalledTimes(1);
    expect(query.mock.calls[0][0]).toContain("CREATE TABLE IF NOT EXISTS short_links");
  });
});
