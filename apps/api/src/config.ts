/**
 * Configuration Module
 *
 * Loads configuration from environment variables once at startup.
 * Fails fast when a required variable is missing.
 */

import type { LogLevel } from "@urlkit/logger";

export interface Config {
  nodeEnv: string;

  // Server
  port: number;
  host: string;
  baseUrl: string;

  // Database
  databaseUrl: string;
  dbPoolMax: number;

  // Redis (absent means in-memory cache only)
  redisUrl: string | undefined;
  redisTimeoutMs: number;

  // Links
  shortCodeLength: number;
  cacheTtlSeconds: number;

  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * @throws Error if a required variable is missing
 */
export function loadConfig(env: Env = process.env): Config {
  const host = optional(env, "HOST", "127.0.0.1");
  const port = optionalInt(env, "PORT", 8080);

  return {
    nodeEnv: optional(env, "NODE_ENV", "development"),

    port,
    host,
    baseUrl: env.BASE_URL || deriveBaseUrl(host, port),

    databaseUrl: required(env, "DATABASE_URL"),
    dbPoolMax: optionalInt(env, "DB_POOL_MAX", 20),

    redisUrl: env.REDIS_URL || undefined,
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 50),

    shortCodeLength: optionalInt(env, "SHORT_CODE_LENGTH", 8),
    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", 3600),

    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
  };
}

/**
 * Base URL for short links when BASE_URL is not set.
 * Port 443 implies https; the default ports are left out.
 */
export function deriveBaseUrl(host: string, port: number): string {
  const scheme = port === 443 ? "https" : "http";
  const suffix = port === 80 || port === 443 ? "" : `:${port}`;
  return `${scheme}://${host}${suffix}`;
}

function parseLogLevel(level: string): LogLevel {
  const normalized = level.toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? "info";
}

/**
 * Sanity-check values that parse but are unusable or unwise.
 *
 * @returns Warnings to log; empty when the configuration looks fine
 * @throws Error for values the service cannot run with
 */
export function validateConfig(config: Config): string[] {
  if (config.shortCodeLength < 1 || config.shortCodeLength > 20) {
    throw new Error(`SHORT_CODE_LENGTH must be between 1 and 20, got ${config.shortCodeLength}`);
  }

  if (config.cacheTtlSeconds < 1) {
    throw new Error(`CACHE_TTL_SECONDS must be positive, got ${config.cacheTtlSeconds}`);
  }

  const warnings: string[] = [];

  if (config.redisTimeoutMs > 100) {
    warnings.push(`REDIS_TIMEOUT_MS=${config.redisTimeoutMs}ms is high. Consider <=50ms for low latency.`);
  }

  if (config.cacheTtlSeconds < 60) {
    warnings.push(`CACHE_TTL_SECONDS=${config.cacheTtlSeconds}s is short. This may cause high DB load.`);
  }

  if (config.shortCodeLength < 6) {
    warnings.push(`SHORT_CODE_LENGTH=${config.shortCodeLength} leaves few codes. Expect collisions.`);
  }

  if (!config.redisUrl && config.nodeEnv === "production") {
    warnings.push("REDIS_URL is not set. Each instance will cache and count clicks on its own.");
  }

  return warnings;
}
