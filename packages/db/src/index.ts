export { createPool, asQueryable, type Queryable, type PoolOptions } from "./client.js";
export { PostgresLinkRepository } from "./postgres.js";
export { InMemoryLinkRepository } from "./memory.js";
export { SCHEMA_SQL } from "./sql.js";
export type { LinkRepository } from "./types.js";
