/**
 * SQL for the short_links table.
 *
 * Raw queries through `pg`; every statement is parameterised.
 */

const COLUMNS = "id, short_code, long_url, clicks, created_at, updated_at";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS short_links (
    id SERIAL PRIMARY KEY,
    short_code VARCHAR(20) NOT NULL UNIQUE,
    long_url TEXT NOT NULL,
    clicks INTEGER NOT NULL DEFAULT 0,
    created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );

  CREATE INDEX IF NOT EXISTS idx_short_links_long_url ON short_links(long_url);
  CREATE INDEX IF NOT EXISTS idx_short_links_created_at ON short_links(created_at);

  CREATE OR REPLACE FUNCTION short_links_touch_updated_at()
  RETURNS TRIGGER AS $$
  BEGIN
    NEW.updated_at = NOW();
    RETURN NEW;
  END;
  $$ LANGUAGE plpgsql;

  DROP TRIGGER IF EXISTS short_links_updated_at ON short_links;
  CREATE TRIGGER short_links_updated_at
    BEFORE UPDATE ON short_links
    FOR EACH ROW
    EXECUTE FUNCTION short_links_touch_updated_at();
`;

export const INSERT_SQL = `
  INSERT INTO short_links (short_code, long_url, clicks, created_at, updated_at)
  VALUES ($1, $2, $3, $4, $5)
  RETURNING ${COLUMNS}
`;

export const FIND_BY_SHORT_CODE_SQL = `
  SELECT ${COLUMNS}
  FROM short_links
  WHERE short_code = $1
`;

export const FIND_BY_LONG_URL_SQL = `
  SELECT ${COLUMNS}
  FROM short_links
  WHERE long_url = $1
  ORDER BY created_at DESC, id DESC
  LIMIT 1
`;

export const UPDATE_SQL = `
  UPDATE short_links
  SET long_url = $2, clicks = $3, updated_at = $4
  WHERE short_code = $1
  RETURNING ${COLUMNS}
`;

export const DELETE_SQL = "DELETE FROM short_links WHERE short_code = $1";

export const EXISTS_SQL = "SELECT 1 FROM short_links WHERE short_code = $1 LIMIT 1";

export const HEALTH_SQL = "SELECT 1";
