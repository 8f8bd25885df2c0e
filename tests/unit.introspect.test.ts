import { describe, it, expect } from "vitest";
import { ConnectionPool } from "../src/adapters/pool";
import { QueryExecutor } from "../src/adapters/executor";
import { CATALOG_SQL, SchemaIntrospector } from "../src/schema/introspect";
import { NotFoundError, ValidationError } from "../src/errors";
import { FakeBackend, result } from "./helpers/fakeBackend";
import type { Responder } from "./helpers/fakeBackend";

const TABLE_COLUMNS = ["table_name", "table_type", "size_bytes", "table_size", "column_count", "table_comment"];
const NAMES = ["app_logs", "audit_view", "dict_currencies", "orders", "users"];

function tableRow(name: string): unknown[] {
  return [name, name.endsWith("_view") ? "VIEW" : "BASE TABLE", "16384", "16 kB", "3", null];
}

// Mimics the catalog: count, then LIMIT/OFFSET over the sorted names.
const catalog: Responder = (text, values = []) => {
  if (text === CATALOG_SQL.countTables) return result(["total"], [[String(NAMES.length)]]);
  if (text === CATALOG_SQL.listTables) {
    const [, limit, offset] = values.map(Number);
    return result(TABLE_COLUMNS, NAMES.slice(offset, offset + limit).map(tableRow));
  }
  if (text === CATALOG_SQL.describeTable) {
    return NAMES.includes(String(values[1])) ? result(TABLE_COLUMNS, [tableRow(String(values[1]))]) : result(TABLE_COLUMNS, []);
  }
  if (text === CATALOG_SQL.columns) {
    return result(
      ["column_name", "data_type", "is_nullable", "is_primary_key", "is_foreign_key", "column_comment", "ordinal_position"],
      [
        ["id", "integer", false, true, false, null, 1],
        ["code", "character varying(3)", false, false, false, "ISO 4217 code", 2],
        ["owner_id", "integer", true, false, true, null, 3],
      ],
    );
  }
  if (text === CATALOG_SQL.indexes) {
    return result(
      ["index_name", "columns", "is_unique", "is_primary"],
      [
        [`${String(values[1])}_pkey`, ["id"], true, true],
        [`${String(values[1])}_code_lower_idx`, ["lower((code)::text)", "id"], false, false],
      ],
    );
  }
  throw new Error(`unexpected statement: ${text}`);
};

function setup(respond: Responder = catalog) {
  const backend = new FakeBackend(respond);
  const pool = new ConnectionPool({ minSize: 0, maxSize: 2, acquireTimeoutMs: 100 }, backend);
  const introspector = new SchemaIntrospector(new QueryExecutor(pool, { statementTimeoutMs: 1000 }), "public");
  return { backend, introspector };
}

describe("SchemaIntrospector.listTables", () => {
  it("returns the requested page with totals from the same transaction", async () => {
    const { backend, introspector } = setup();
    const { tables, pagination } = await introspector.listTables(2, 2);
    expect(tables.map((t) => t.name)).toEqual(["dict_currencies", "orders"]);
    expect(tables[0]).toEqual({
      name: "dict_currencies",
      type: "BASE TABLE",
      sizeBytes: 16384,
      sizePretty: "16 kB",
      columnCount: 3,
      comment: null,
    });
    expect(pagination).toEqual({ page: 2, pageSize: 2, totalCount: 5, totalPages: 3 });
    expect(backend.statements.filter((s) => s.startsWith("BEGIN"))).toHaveLength(1);
    expect(backend.statements.at(-1)).toBe("COMMIT");
  });

  it("fits everything on one page when the page is large enough", async () => {
    const { introspector } = setup();
    const { tables, pagination } = await introspector.listTables(1, 10);
    expect(tables).toHaveLength(5);
    expect(tables[1].type).toBe("VIEW");
    expect(pagination.totalPages).toBe(1);
  });

  it("returns an empty page past the end", async () => {
    const { introspector } = setup();
    const { tables, pagination } = await introspector.listTables(4, 2);
    expect(tables).toEqual([]);
    expect(pagination).toEqual({ page: 4, pageSize: 2, totalCount: 5, totalPages: 3 });
  });

  it("rejects bad paging before touching the database", async () => {
    const { backend, introspector } = setup();
    await expect(introspector.listTables(0, 10)).rejects.toThrow("page must be an integer >= 1");
    await expect(introspector.listTables(1, 101)).rejects.toBeInstanceOf(ValidationError);
    expect(backend.statements).toEqual([]);
  });
});

describe("SchemaIntrospector.getTableSchema", () => {
  it("describes columns and indexes in key order", async () => {
    const { backend, introspector } = setup();
    const schema = await introspector.getTableSchema("dict_currencies");
    expect(schema.table.name).toBe("dict_currencies");
    expect(schema.columns.map((c) => c.name)).toEqual(["id", "code", "owner_id"]);
    expect(schema.columns[0]).toEqual({
      name: "id",
      dataType: "integer",
      nullable: false,
      isPrimaryKey: true,
      isForeignKey: false,
      comment: null,
      ordinalPosition: 1,
    });
    expect(schema.columns[1].comment).toBe("ISO 4217 code");
    expect(schema.columns[2]).toMatchObject({ nullable: true, isForeignKey: true });
    expect(schema.indexes).toEqual([
      { name: "dict_currencies_pkey", columns: ["id"], isUnique: true, isPrimary: true },
      { name: "dict_currencies_code_lower_idx", columns: ["lower((code)::text)", "id"], isUnique: false, isPrimary: false },
    ]);
    expect(backend.statements.filter((s) => s.startsWith("BEGIN"))).toHaveLength(1);
  });

  it("raises NotFoundError for an unknown table and keeps the connection", async () => {
    const { backend, introspector } = setup();
    const err = await introspector.getTableSchema("no_such_table").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ status: 404, message: "Table 'no_such_table' not found" });
    expect(backend.statements.at(-1)).toBe("ROLLBACK");
    expect(backend.returned).toBe(1);
    expect(backend.destroyed).toBe(0);
  });

  it("requires a table name", async () => {
    const { introspector } = setup();
    await expect(introspector.getTableSchema("")).rejects.toThrow("table name is required");
  });

  it("fails loudly when the catalog returns an unexpected shape", async () => {
    const { introspector } = setup((text, values) =>
      text === CATALOG_SQL.countTables ? result(["total"], [["many"]]) : catalog(text, values),
    );
    await expect(introspector.listTables(1, 10)).rejects.toMatchObject({ status: 500, message: "Query execution failed" });
  });
});
