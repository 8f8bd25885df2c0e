import { PoolExhaustedError, UnavailableError } from "../errors";
import { withDeadline } from "../utils/deadline";
import { logger } from "../utils/logger";
import type { BackendClient, PoolBackend, RawResult } from "./db";

export type PoolConfig = {
  minSize: number;
  maxSize: number;
  acquireTimeoutMs: number;
};

export type PoolStats = { maxSize: number; checkedOut: number; waiting: number };

type Waiter = { resolve: () => void; timer: NodeJS.Timeout };

const log = logger.child({ component: "pool" });

export class PooledConnection {
  private client: BackendClient | undefined;
  private broken = false;

  constructor(readonly id: number, client: BackendClient) {
    this.client = client;
  }

  get released(): boolean {
    return this.client === undefined;
  }

  query(text: string, values?: unknown[]): Promise<RawResult> {
    if (!this.client) return Promise.reject(new Error(`Connection ${this.id} used after release`));
    return this.client.query(text, values);
  }

  /** Marks the session as unusable; the pool destroys it on release whatever the caller asks for. */
  markBroken(): void {
    this.broken = true;
  }

  get isBroken(): boolean {
    return this.broken;
  }

  detach(): BackendClient {
    const client = this.client;
    if (!client) throw new Error(`Connection ${this.id} already released`);
    this.client = undefined;
    return client;
  }
}

/**
 * Bounded admission in front of the driver pool. At most `maxSize`
 * connections are checked out; extra callers queue FIFO until a slot frees
 * up or their acquire deadline passes.
 */
export class ConnectionPool {
  private checkedOut = 0;
  private waiters: Waiter[] = [];
  private seq = 0;
  private closed = false;

  constructor(private config: PoolConfig, private backend: PoolBackend) {
    if (config.maxSize < 1) throw new RangeError("maxSize must be at least 1");
    if (config.minSize < 0 || config.minSize > config.maxSize) {
      throw new RangeError(`minSize must be between 0 and maxSize (${config.maxSize})`);
    }
    if (config.acquireTimeoutMs <= 0) throw new RangeError("acquireTimeoutMs must be positive");
  }

  async acquire(timeoutMs: number = this.config.acquireTimeoutMs): Promise<PooledConnection> {
    if (this.closed) throw new UnavailableError("Connection pool is closed");
    const started = Date.now();
    await this.reserveSlot(timeoutMs);
    let client: BackendClient;
    try {
      client = await this.openClient(timeoutMs - (Date.now() - started));
    } catch (err) {
      this.freeSlot();
      throw err;
    }
    return new PooledConnection(++this.seq, client);
  }

  release(conn: PooledConnection, discard = false): void {
    const destroy = discard || conn.isBroken;
    const client = conn.detach();
    client.release(destroy);
    if (destroy) log.warn("pool_connection_discarded", { connection: conn.id });
    this.freeSlot();
  }

  /**
   * Runs `fn` on a checked-out connection and releases it on every exit path.
   * By default any error thrown by `fn` discards the connection.
   */
  async withConnection<T>(
    fn: (conn: PooledConnection) => Promise<T>,
    opts: { timeoutMs?: number; discardOn?: (err: unknown) => boolean } = {},
  ): Promise<T> {
    const conn = await this.acquire(opts.timeoutMs);
    let result: T;
    try {
      result = await fn(conn);
    } catch (err) {
      this.release(conn, opts.discardOn ? opts.discardOn(err) : true);
      throw err;
    }
    this.release(conn);
    return result;
  }

  /** Opens `minSize` connections up front so the first requests do not pay for the handshake. */
  async warmUp(): Promise<void> {
    const attempts = await Promise.allSettled(Array.from({ length: this.config.minSize }, () => this.acquire()));
    let failure: unknown;
    for (const attempt of attempts) {
      if (attempt.status === "fulfilled") this.release(attempt.value);
      else failure ??= attempt.reason;
    }
    if (failure !== undefined) throw failure;
  }

  stats(): PoolStats {
    return { maxSize: this.config.maxSize, checkedOut: this.checkedOut, waiting: this.waiters.length };
  }

  async close(): Promise<void> {
    this.closed = true;
    const pending = this.waiters.splice(0);
    for (const w of pending) clearTimeout(w.timer);
    // resolve() on a closed pool rejects the waiter
    for (const w of pending) w.resolve();
    await this.backend.end();
  }

  private reserveSlot(timeoutMs: number): Promise<void> {
    if (this.checkedOut < this.config.maxSize) {
      this.checkedOut++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: () => {
          if (this.closed) {
            reject(new UnavailableError("Connection pool is closed"));
            return;
          }
          resolve();
        },
        timer: setTimeout(() => {
          const i = this.waiters.indexOf(waiter);
          if (i >= 0) this.waiters.splice(i, 1);
          log.warn("pool_exhausted", { ...this.stats(), timeoutMs });
          reject(new PoolExhaustedError());
        }, Math.max(0, timeoutMs)),
      };
      this.waiters.push(waiter);
    });
  }

  // A freed slot passes straight to the oldest waiter, so checkedOut only drops when nobody waits.
  private freeSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve();
      return;
    }
    this.checkedOut--;
  }

  private async openClient(timeoutMs: number): Promise<BackendClient> {
    const pending = this.backend.connect();
    try {
      return await withDeadline(pending, timeoutMs, () => {
        pending.then(
          (late) => late.release(false),
          (err: unknown) => log.warn("pool_late_connect_failed", { error: String(err) }),
        );
        return new PoolExhaustedError();
      });
    } catch (err) {
      if (err instanceof PoolExhaustedError) throw err;
      log.error("pool_connect_failed", { error: err instanceof Error ? err.message : String(err) });
      throw new UnavailableError();
    }
  }
}
