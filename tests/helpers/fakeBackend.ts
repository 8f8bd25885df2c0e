import type { BackendClient, PoolBackend, RawResult } from "../../src/adapters/db";

export type Responder = (text: string, values?: unknown[]) => RawResult | Promise<RawResult>;

export function result(columns: string[], rows: unknown[][]): RawResult {
  return { fields: columns.map((name) => ({ name, dataTypeID: 25 })), rows };
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const TX_CONTROL = /^(BEGIN|SET LOCAL|COMMIT|ROLLBACK)\b/;

/** In-process stand-in for pg.Pool: counts connections and records every statement. */
export class FakeBackend implements PoolBackend {
  opened = 0;
  live = 0;
  maxLive = 0;
  returned = 0;
  destroyed = 0;
  ended = false;
  connectDelayMs = 0;
  connectError: Error | undefined;
  rollbackError: Error | undefined;
  statements: string[] = [];

  constructor(private respond: Responder = () => result([], [])) {}

  async connect(): Promise<BackendClient> {
    if (this.connectDelayMs > 0) await sleep(this.connectDelayMs);
    if (this.connectError) throw this.connectError;
    this.opened++;
    this.live++;
    this.maxLive = Math.max(this.maxLive, this.live);
    return {
      query: async (text, values) => {
        this.statements.push(text);
        if (text === "ROLLBACK" && this.rollbackError) throw this.rollbackError;
        if (TX_CONTROL.test(text)) return result([], []);
        return this.respond(text, values);
      },
      release: (destroy) => {
        this.live--;
        if (destroy) this.destroyed++;
        else this.returned++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}
