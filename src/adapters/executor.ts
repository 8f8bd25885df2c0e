import { ExecutionError, QueryTimeoutError, isConnectionFault, toGatewayError } from "../errors";
import { marshalResult } from "../schema/marshal";
import { withDeadline } from "../utils/deadline";
import { logger } from "../utils/logger";
import type { QueryResult, RunQuery } from "./db";
import type { ConnectionPool, PooledConnection } from "./pool";

export type ExecutorOptions = {
  statementTimeoutMs: number;
  /** Extra time the client waits past the server-side statement_timeout before giving up on the socket. */
  clientGraceMs?: number;
};

const DEFAULT_CLIENT_GRACE_MS = 250;

export class QueryExecutor {
  constructor(private pool: ConnectionPool, private options: ExecutorOptions) {}

  async execute(sql: string, timeoutMs: number = this.options.statementTimeoutMs): Promise<QueryResult> {
    const started = Date.now();
    const raw = await this.readOnly((run) => run(sql), { timeoutMs });
    const result = marshalResult(raw);
    logger.info("query_ok", { rowCount: result.rowCount, columns: result.columns.length, durationMs: Date.now() - started });
    return result;
  }

  /**
   * Runs `work` inside one read-only REPEATABLE READ transaction on a pooled
   * connection, so every statement it issues sees the same snapshot.
   */
  async readOnly<T>(work: (run: RunQuery) => Promise<T>, opts: { timeoutMs?: number } = {}): Promise<T> {
    const timeoutMs = Math.trunc(opts.timeoutMs ?? this.options.statementTimeoutMs);
    try {
      return await this.pool.withConnection((conn) => this.inTransaction(conn, timeoutMs, work), {
        discardOn: isConnectionFault,
      });
    } catch (err) {
      const mapped = toGatewayError(err);
      logger.warn("query_failed", {
        code: mapped.code,
        sqlState: mapped instanceof ExecutionError ? mapped.sqlState : undefined,
        cause: err instanceof Error ? err.message : String(err),
      });
      throw mapped;
    }
  }

  private async inTransaction<T>(conn: PooledConnection, timeoutMs: number, work: (run: RunQuery) => Promise<T>): Promise<T> {
    const deadline = Date.now() + timeoutMs + (this.options.clientGraceMs ?? DEFAULT_CLIENT_GRACE_MS);
    const run: RunQuery = (text, values) => {
      logger.debug("sql_try", { connection: conn.id, sql: text, params: values ?? [] });
      return withDeadline(conn.query(text, values), deadline - Date.now(), () => new QueryTimeoutError());
    };

    await run("BEGIN TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY");
    try {
      // SET does not take bind parameters; timeoutMs is an integer.
      await run(`SET LOCAL statement_timeout = ${timeoutMs}`);
      const out = await work(run);
      await run("COMMIT");
      return out;
    } catch (err) {
      // A faulty connection is destroyed on release, which ends the transaction server-side.
      if (!isConnectionFault(err)) await this.rollback(conn, run);
      throw err;
    }
  }

  private async rollback(conn: PooledConnection, run: RunQuery): Promise<void> {
    try {
      await run("ROLLBACK");
    } catch (rollbackErr) {
      conn.markBroken();
      logger.warn("rollback_failed", {
        connection: conn.id,
        cause: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
      });
    }
  }
}
