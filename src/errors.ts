import { DatabaseError } from "pg";

export class GatewayError extends Error {
  public readonly status: number;
  public readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = "GatewayError";
    this.status = status;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** The request itself is unacceptable: bad parameters or a query that is not a single read. */
export class ValidationError extends GatewayError {
  constructor(message: string) {
    super(message, 400, "validation_error");
    this.name = "ValidationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string) {
    super(message, 404, "not_found");
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Database side cannot serve the request right now; callers may retry. */
export class UnavailableError extends GatewayError {
  constructor(message = "Database unavailable, retry later", code = "unavailable") {
    super(message, 503, code);
    this.name = "UnavailableError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PoolExhaustedError extends UnavailableError {
  constructor() {
    super("No database connection available, retry later", "pool_exhausted");
    this.name = "PoolExhaustedError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class QueryTimeoutError extends UnavailableError {
  constructor() {
    super("Query exceeded the statement timeout, retry later", "timeout");
    this.name = "QueryTimeoutError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ExecutionError extends GatewayError {
  public readonly sqlState: string | undefined;

  constructor(message: string, status: 400 | 500, sqlState?: string) {
    super(message, status, "execution_error");
    this.name = "ExecutionError";
    this.sqlState = sqlState;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const QUERY_CANCELED = "57014";

// SQLSTATE classes that describe the server or the session, not the query text.
const SERVER_SIDE_CLASSES = new Set(["08", "40", "53", "57", "58", "F0", "XX"]);

const CONNECTION_URL = /\bpostgres(?:ql)?:\/\/\S+/gi;

export function sanitizeMessage(message: string): string {
  return message.replace(CONNECTION_URL, "[redacted]").split("\n")[0].trim();
}

function isServerSide(err: DatabaseError): boolean {
  return SERVER_SIDE_CLASSES.has((err.code ?? "").slice(0, 2));
}

/**
 * True when the connection an error came from can no longer be trusted and
 * must be destroyed instead of going back to the idle set.
 */
export function isConnectionFault(err: unknown): boolean {
  if (err instanceof QueryTimeoutError) return true;
  if (err instanceof GatewayError) return false;
  if (err instanceof DatabaseError) return isServerSide(err);
  return true;
}

export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  if (err instanceof DatabaseError) {
    if (err.code === QUERY_CANCELED) return new QueryTimeoutError();
    if (isServerSide(err)) return new ExecutionError("Query execution failed", 500, err.code);
    return new ExecutionError(`Query execution failed: ${sanitizeMessage(err.message)}`, 400, err.code);
  }
  return new ExecutionError("Query execution failed", 500);
}
