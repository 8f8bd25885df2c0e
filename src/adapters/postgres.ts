import { Pool, PoolClient, TypeOverrides } from "pg";
import type { QueryArrayConfig } from "pg";
import { TEXT_PARSERS } from "../schema/marshal";
import { logger } from "../utils/logger";
import type { BackendClient, PoolBackend, RawResult } from "./db";
import type { PoolConfig } from "./pool";

export function resultTypes(): TypeOverrides {
  const overrides = new TypeOverrides();
  for (const [oid, parse] of TEXT_PARSERS) overrides.setTypeParser(oid, "text", parse);
  return overrides;
}

/**
 * Extended protocol even without parameters: the server then accepts exactly
 * one statement per call, whatever the text contains.
 */
export function arrayQuery(
  text: string,
  values?: unknown[],
): QueryArrayConfig<unknown[]> & { queryMode: "extended" } {
  return { text, values: values ?? [], rowMode: "array", queryMode: "extended" };
}

function wrapClient(client: PoolClient): BackendClient {
  return {
    async query(text: string, values?: unknown[]): Promise<RawResult> {
      const res = await client.query(arrayQuery(text, values));
      return {
        fields: res.fields.map((f) => ({ name: f.name, dataTypeID: f.dataTypeID })),
        rows: res.rows,
      };
    },
    release(destroy: boolean) {
      client.release(destroy);
    },
  };
}

/**
 * pg.Pool as the driver side of ConnectionPool. Sizing mirrors the gateway
 * pool so pg never queues on its own.
 */
export function createPgBackend(databaseUrl: string, config: PoolConfig): PoolBackend {
  const pool = new Pool({
    connectionString: databaseUrl,
    min: config.minSize,
    max: config.maxSize,
    connectionTimeoutMillis: config.acquireTimeoutMs,
    application_name: "sql-gateway",
    types: resultTypes(),
  });
  // Idle clients can lose their socket; without a listener pg would crash the process.
  pool.on("error", (err) => {
    logger.error("pg_idle_client_error", { message: err.message });
  });

  return {
    async connect() {
      return wrapClient(await pool.connect());
    },
    end() {
      return pool.end();
    },
  };
}
