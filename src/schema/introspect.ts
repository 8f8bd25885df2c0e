import { NotFoundError, ValidationError } from "../errors";
import type { ColumnMetadata, IndexMetadata, RawResult, TableMetadata, TableSchema, TableType } from "../adapters/db";
import type { QueryExecutor } from "../adapters/executor";
import { buildPagination, checkPage, pageOffset } from "./pagination";
import type { PaginationInfo } from "./pagination";

const RELATION_KINDS = "('r', 'p', 'v', 'm')"; // table, partitioned table, view, matview

const TABLE_SELECT = `
  SELECT c.relname AS table_name,
         CASE c.relkind WHEN 'v' THEN 'VIEW' WHEN 'm' THEN 'MATERIALIZED VIEW' ELSE 'BASE TABLE' END AS table_type,
         pg_total_relation_size(c.oid) AS size_bytes,
         pg_size_pretty(pg_total_relation_size(c.oid)) AS table_size,
         (SELECT count(*) FROM pg_attribute a
           WHERE a.attrelid = c.oid AND a.attnum > 0 AND NOT a.attisdropped) AS column_count,
         obj_description(c.oid, 'pg_class') AS table_comment
  FROM pg_class c
  JOIN pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = $1 AND c.relkind IN ${RELATION_KINDS}`;

export const CATALOG_SQL = {
  countTables: `
    SELECT count(*) AS total
    FROM pg_class c
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1 AND c.relkind IN ${RELATION_KINDS}`,

  listTables: `${TABLE_SELECT}
  ORDER BY c.relname COLLATE "C"
  LIMIT $2 OFFSET $3`,

  describeTable: `${TABLE_SELECT}
    AND c.relname = $2`,

  columns: `
    SELECT a.attname AS column_name,
           pg_catalog.format_type(a.atttypid, a.atttypmod) AS data_type,
           NOT a.attnotnull AS is_nullable,
           EXISTS (
             SELECT 1 FROM pg_constraint con
             WHERE con.conrelid = a.attrelid AND con.contype = 'p' AND a.attnum = ANY (con.conkey)
           ) AS is_primary_key,
           EXISTS (
             SELECT 1 FROM pg_constraint con
             WHERE con.conrelid = a.attrelid AND con.contype = 'f' AND a.attnum = ANY (con.conkey)
           ) AS is_foreign_key,
           col_description(a.attrelid, a.attnum) AS column_comment,
           a.attnum AS ordinal_position
    FROM pg_attribute a
    JOIN pg_class c ON c.oid = a.attrelid
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped
    ORDER BY a.attnum`,

  // indkey holds 0 for an expression key; only those fall back to pg_get_indexdef text.
  indexes: `
    SELECT i.relname AS index_name,
           ARRAY(
             SELECT CASE WHEN ix.indkey[k - 1] = 0
                         THEN pg_get_indexdef(ix.indexrelid, k, true)
                         ELSE a.attname::text END
             FROM generate_series(1, ix.indnkeyatts) AS k
             LEFT JOIN pg_attribute a ON a.attrelid = ix.indrelid AND a.attnum = ix.indkey[k - 1]
             ORDER BY k
           ) AS columns,
           ix.indisunique AS is_unique,
           ix.indisprimary AS is_primary
    FROM pg_index ix
    JOIN pg_class t ON t.oid = ix.indrelid
    JOIN pg_class i ON i.oid = ix.indexrelid
    JOIN pg_namespace n ON n.oid = t.relnamespace
    WHERE n.nspname = $1 AND t.relname = $2
    ORDER BY ix.indisprimary DESC, i.relname COLLATE "C"`,
} as const;

type Row = Record<string, unknown>;

function records(raw: RawResult): Row[] {
  return raw.rows.map((values) => {
    const row: Row = {};
    raw.fields.forEach((f, i) => {
      row[f.name] = values[i];
    });
    return row;
  });
}

function catalogShape(key: string, expected: string): Error {
  return new Error(`catalog column ${key} is not ${expected}`);
}

function text(row: Row, key: string): string {
  const v = row[key];
  if (typeof v !== "string") throw catalogShape(key, "text");
  return v;
}

function textOrNull(row: Row, key: string): string | null {
  return row[key] === null || row[key] === undefined ? null : text(row, key);
}

function int(row: Row, key: string): number {
  const v = row[key];
  const n = typeof v === "string" ? Number(v) : v;
  if (typeof n !== "number" || !Number.isFinite(n)) throw catalogShape(key, "a number");
  return n;
}

function flag(row: Row, key: string): boolean {
  const v = row[key];
  if (typeof v !== "boolean") throw catalogShape(key, "boolean");
  return v;
}

function textList(row: Row, key: string): string[] {
  const v = row[key];
  if (!Array.isArray(v)) throw catalogShape(key, "an array");
  return v.map((item) => {
    if (typeof item !== "string") throw catalogShape(key, "an array of text");
    return item;
  });
}

function tableType(row: Row): TableType {
  const t = text(row, "table_type");
  if (t === "BASE TABLE" || t === "VIEW" || t === "MATERIALIZED VIEW") return t;
  throw catalogShape("table_type", "a known relation type");
}

function toTable(row: Row): TableMetadata {
  return {
    name: text(row, "table_name"),
    type: tableType(row),
    sizeBytes: int(row, "size_bytes"),
    sizePretty: textOrNull(row, "table_size"),
    columnCount: int(row, "column_count"),
    comment: textOrNull(row, "table_comment"),
  };
}

function toColumn(row: Row): ColumnMetadata {
  return {
    name: text(row, "column_name"),
    dataType: text(row, "data_type"),
    nullable: flag(row, "is_nullable"),
    isPrimaryKey: flag(row, "is_primary_key"),
    isForeignKey: flag(row, "is_foreign_key"),
    comment: textOrNull(row, "column_comment"),
    ordinalPosition: int(row, "ordinal_position"),
  };
}

function toIndex(row: Row): IndexMetadata {
  return {
    name: text(row, "index_name"),
    columns: textList(row, "columns"),
    isUnique: flag(row, "is_unique"),
    isPrimary: flag(row, "is_primary"),
  };
}

export class SchemaIntrospector {
  constructor(private executor: QueryExecutor, private schema = "public") {}

  async listTables(page: number, pageSize: number): Promise<{ tables: TableMetadata[]; pagination: PaginationInfo }> {
    checkPage(page, pageSize);
    // count and page share the transaction snapshot
    return this.executor.readOnly(async (run) => {
      const [countRow] = records(await run(CATALOG_SQL.countTables, [this.schema]));
      const totalCount = countRow ? int(countRow, "total") : 0;
      const rows = records(await run(CATALOG_SQL.listTables, [this.schema, pageSize, pageOffset(page, pageSize)]));
      return { tables: rows.map(toTable), pagination: buildPagination(page, pageSize, totalCount) };
    });
  }

  async getTableSchema(tableName: string): Promise<TableSchema> {
    if (!tableName) throw new ValidationError("table name is required");
    return this.executor.readOnly(async (run) => {
      const [tableRow] = records(await run(CATALOG_SQL.describeTable, [this.schema, tableName]));
      if (!tableRow) throw new NotFoundError(`Table '${tableName}' not found`);
      const columns = records(await run(CATALOG_SQL.columns, [this.schema, tableName])).map(toColumn);
      const indexes = records(await run(CATALOG_SQL.indexes, [this.schema, tableName])).map(toIndex);
      return { table: toTable(tableRow), columns, indexes };
    });
  }
}
