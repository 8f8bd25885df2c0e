type Level = "debug" | "info" | "warn" | "error";
type Threshold = Level | "silent";

import { LOG_LEVEL } from "../config";

const levelOrder: Record<Threshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const threshold = ((): Threshold => {
  if (LOG_LEVEL === "debug" || LOG_LEVEL === "info" || LOG_LEVEL === "warn" || LOG_LEVEL === "error" || LOG_LEVEL === "silent") {
    return LOG_LEVEL;
  }
  return "info";
})();

export type LogFields = Record<string, unknown>;

function log(level: Level, msg: string, bindings: LogFields, extra?: LogFields) {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...bindings,
    ...extra,
  };
  const line = JSON.stringify(payload);
  // eslint-disable-next-line no-console
  if (levelOrder[level] >= levelOrder.warn) console.error(line);
  // eslint-disable-next-line no-console
  else console.log(line);
}

export type Logger = {
  debug(msg: string, extra?: LogFields): void;
  info(msg: string, extra?: LogFields): void;
  warn(msg: string, extra?: LogFields): void;
  error(msg: string, extra?: LogFields): void;
  child(bindings: LogFields): Logger;
};

function createLogger(bindings: LogFields): Logger {
  return {
    debug: (msg, extra) => log("debug", msg, bindings, extra),
    info: (msg, extra) => log("info", msg, bindings, extra),
    warn: (msg, extra) => log("warn", msg, bindings, extra),
    error: (msg, extra) => log("error", msg, bindings, extra),
    child: (more) => createLogger({ ...bindings, ...more }),
  };
}

export const logger = createLogger({});
