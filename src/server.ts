import express from "express";
import type { Server } from "http";
import type { GatewayConfig } from "./config";
import { logger } from "./utils/logger";
import { ValidationError } from "./errors";
import { ConnectionPool } from "./adapters/pool";
import { createPgBackend } from "./adapters/postgres";
import { QueryExecutor } from "./adapters/executor";
import type { PoolBackend, TableMetadata, TableSchema } from "./adapters/db";
import { QueryValidator } from "./guards/sqlGuard";
import { SchemaIntrospector } from "./schema/introspect";
import { DEFAULT_PAGE_SIZE } from "./schema/pagination";
import type { PaginationInfo } from "./schema/pagination";
import type {
  HealthResponse,
  QueryRequest,
  QueryResponse,
  SchemaResponse,
  TableResponse,
  TablesResponse,
} from "./types";
import { errorHandler } from "./middleware/error";

const MAX_QUERY_LENGTH = 100_000;

export type GatewayServices = {
  pool: ConnectionPool;
  validator: QueryValidator;
  executor: QueryExecutor;
  introspector: SchemaIntrospector;
};

export function createServices(config: GatewayConfig, backend?: PoolBackend): GatewayServices {
  const pool = new ConnectionPool(config.pool, backend ?? createPgBackend(config.databaseUrl, config.pool));
  const executor = new QueryExecutor(pool, { statementTimeoutMs: config.statementTimeoutMs });
  return {
    pool,
    validator: new QueryValidator(config.extraForbiddenKeywords),
    executor,
    introspector: new SchemaIntrospector(executor, config.schema),
  };
}

// Validations
function validateBody(body: unknown): asserts body is QueryRequest {
  if (!body || typeof body !== "object") throw new ValidationError("Invalid body");
  if (!("query" in body) || typeof body.query !== "string") {
    throw new ValidationError("query must be a string");
  }
  if (body.query.length > MAX_QUERY_LENGTH) {
    throw new ValidationError(`query exceeds ${MAX_QUERY_LENGTH} characters`);
  }
}

function intParam(value: unknown, name: string, def: number): number {
  if (value === undefined || value === "") return def;
  if (typeof value !== "string" || !/^-?\d+$/.test(value)) {
    throw new ValidationError(`${name} must be an integer`);
  }
  return Number(value);
}

function toTableResponse(t: TableMetadata): TableResponse {
  return {
    table_name: t.name,
    table_type: t.type,
    table_size: t.sizePretty,
    size_bytes: t.sizeBytes,
    column_count: t.columnCount,
    table_comment: t.comment,
  };
}

function toTablesResponse(tables: TableMetadata[], p: PaginationInfo): TablesResponse {
  return {
    tables: tables.map(toTableResponse),
    pagination: { page: p.page, page_size: p.pageSize, total_count: p.totalCount, total_pages: p.totalPages },
  };
}

function toSchemaResponse({ table, columns, indexes }: TableSchema): SchemaResponse {
  return {
    table_name: table.name,
    table_comment: table.comment,
    column_count: columns.length,
    columns: columns.map((c) => ({
      column_name: c.name,
      data_type: c.dataType,
      is_nullable: c.nullable,
      is_primary_key: c.isPrimaryKey,
      is_foreign_key: c.isForeignKey,
      column_comment: c.comment,
    })),
    indexes: indexes.map((i) => ({
      index_name: i.name,
      columns: i.columns,
      is_unique: i.isUnique,
      is_primary: i.isPrimary,
    })),
  };
}

export function createApp(services: GatewayServices) {
  const { pool, validator, executor, introspector } = services;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", (_req, res) => {
    const s = pool.stats();
    const body: HealthResponse = { ok: true, pool: { max_size: s.maxSize, checked_out: s.checkedOut, waiting: s.waiting } };
    res.json(body);
  });

  app.get("/api/tables", async (req, res, next) => {
    try {
      const page = intParam(req.query.page, "page", 1);
      const pageSize = intParam(req.query.page_size, "page_size", DEFAULT_PAGE_SIZE);
      const { tables, pagination } = await introspector.listTables(page, pageSize);
      res.json(toTablesResponse(tables, pagination));
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/tables/:tableName/schema", async (req, res, next) => {
    try {
      const schema = await introspector.getTableSchema(req.params.tableName);
      res.json(toSchemaResponse(schema));
    } catch (err) {
      next(err);
    }
  });

  app.post("/api/query", async (req, res, next) => {
    try {
      const body: unknown = req.body;
      validateBody(body);
      validator.assertReadOnly(body.query);
      const result = await executor.execute(body.query);
      const response: QueryResponse = { columns: result.columns, rows: result.rows, row_count: result.rowCount };
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}

/** Warms the pool, listens, and closes everything on SIGINT/SIGTERM. */
export async function start(config: GatewayConfig): Promise<Server> {
  const services = createServices(config);
  await services.pool.warmUp();
  logger.info("pool_ready", { ...services.pool.stats(), minSize: config.pool.minSize });

  const app = createApp(services);
  const server = app.listen(config.port, () => {
    logger.info("server_listening", { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info("server_stopping", { signal });
    server.close(() => {
      services.pool.close().then(
        () => logger.info("pool_closed"),
        (err: unknown) => logger.error("pool_close_failed", { error: String(err) }),
      );
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
  return server;
}
