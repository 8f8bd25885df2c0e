import { env } from "process";
import type { PoolConfig } from "./adapters/pool";

type Env = Record<string, string | undefined>;

function intFromEnv(source: Env, name: string, def: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const v = source[name];
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}, got "${v}"`);
  }
  return n;
}

function listFromEnv(source: Env, name: string): string[] {
  return (source[name] || "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();

export type GatewayConfig = {
  databaseUrl: string;
  schema: string;
  port: number;
  pool: PoolConfig;
  statementTimeoutMs: number;
  extraForbiddenKeywords: string[];
};

export function loadConfig(source: Env = env): GatewayConfig {
  const databaseUrl = source.DATABASE_URL || "";
  if (!databaseUrl) throw new Error("DATABASE_URL missing");

  const pool: PoolConfig = {
    minSize: intFromEnv(source, "DB_POOL_MIN_SIZE", 5, 1, 100),
    maxSize: intFromEnv(source, "DB_POOL_MAX_SIZE", 20, 1, 100),
    acquireTimeoutMs: intFromEnv(source, "DB_POOL_TIMEOUT_MS", 30_000, 1),
  };
  if (pool.minSize > pool.maxSize) {
    throw new Error(`DB_POOL_MIN_SIZE (${pool.minSize}) exceeds DB_POOL_MAX_SIZE (${pool.maxSize})`);
  }

  return {
    databaseUrl,
    schema: source.DB_SCHEMA || "public",
    port: intFromEnv(source, "PORT", 18790, 1, 65535),
    pool,
    statementTimeoutMs: intFromEnv(source, "STATEMENT_TIMEOUT_MS", 3000, 1),
    extraForbiddenKeywords: listFromEnv(source, "FORBIDDEN_KEYWORDS_EXTRA"),
  };
}
