import { parse as parseArray } from "postgres-array";
import type { JsonValue, QueryResult, RawResult } from "../adapters/db";

export const PG_OID = {
  INT8: 20,
  DATE: 1082,
  TIMESTAMP: 1114,
  INTERVAL: 1186,
  NUMERIC: 1700,
  INT8_ARRAY: 1016,
  TIMESTAMP_ARRAY: 1115,
  DATE_ARRAY: 1182,
  INTERVAL_ARRAY: 1187,
  NUMERIC_ARRAY: 1231,
} as const;

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);

function fitsNumber(n: bigint): boolean {
  return n <= MAX_SAFE && n >= MIN_SAFE;
}

/** int8 → number while it round-trips exactly, otherwise the decimal text. */
export function parseInt8(raw: string): number | string {
  const n = BigInt(raw);
  return fitsNumber(n) ? Number(n) : raw;
}

/**
 * `timestamp without time zone` has no offset to convert from, so keep the
 * wall-clock value and only switch to the ISO `T` separator.
 */
export function parseLocalTimestamp(raw: string): string {
  return /^\d{4,}-\d{2}-\d{2} \d/.test(raw) ? raw.replace(" ", "T") : raw;
}

function keepText(raw: string): string {
  return raw;
}

function arrayOf(parseElement: (raw: string) => unknown): (raw: string) => unknown {
  return (raw) => parseArray(raw, parseElement);
}

// numeric stays text: a float cannot carry arbitrary precision.
export const TEXT_PARSERS: ReadonlyArray<[number, (raw: string) => unknown]> = [
  [PG_OID.INT8, parseInt8],
  [PG_OID.NUMERIC, keepText],
  [PG_OID.DATE, keepText],
  [PG_OID.TIMESTAMP, parseLocalTimestamp],
  [PG_OID.INTERVAL, keepText],
  [PG_OID.INT8_ARRAY, arrayOf(parseInt8)],
  [PG_OID.NUMERIC_ARRAY, arrayOf(keepText)],
  [PG_OID.DATE_ARRAY, arrayOf(keepText)],
  [PG_OID.TIMESTAMP_ARRAY, arrayOf(parseLocalTimestamp)],
  [PG_OID.INTERVAL_ARRAY, arrayOf(keepText)],
];

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function marshalValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (typeof value === "bigint") return fitsNumber(value) ? Number(value) : value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (value instanceof Uint8Array) return `\\x${Buffer.from(value).toString("hex")}`;
  if (Array.isArray(value)) return value.map(marshalValue);
  if (typeof value === "object" && isPlainObject(value)) {
    const out: { [key: string]: JsonValue } = {};
    for (const [k, v] of Object.entries(value)) out[k] = marshalValue(v);
    return out;
  }
  return String(value);
}

export function marshalResult(raw: RawResult): QueryResult {
  const rows = raw.rows.map((row) => row.map(marshalValue));
  return {
    columns: raw.fields.map((f) => f.name),
    rows,
    rowCount: rows.length,
  };
}
