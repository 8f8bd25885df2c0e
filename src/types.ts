import type { JsonValue } from "./adapters/db";

export type QueryRequest = {
  query: string;
};

export type TableResponse = {
  table_name: string;
  table_type: string;
  table_size: string | null;
  size_bytes: number;
  column_count: number;
  table_comment: string | null;
};

export type PaginationResponse = {
  page: number;
  page_size: number;
  total_count: number;
  total_pages: number;
};

export type TablesResponse = {
  tables: TableResponse[];
  pagination: PaginationResponse;
};

export type ColumnResponse = {
  column_name: string;
  data_type: string;
  is_nullable: boolean;
  is_primary_key: boolean;
  is_foreign_key: boolean;
  column_comment: string | null;
};

export type IndexResponse = {
  index_name: string;
  columns: string[];
  is_unique: boolean;
  is_primary: boolean;
};

export type SchemaResponse = {
  table_name: string;
  table_comment: string | null;
  column_count: number;
  columns: ColumnResponse[];
  indexes: IndexResponse[];
};

export type QueryResponse = {
  columns: string[];
  rows: JsonValue[][];
  row_count: number;
};

export type HealthResponse = {
  ok: true;
  pool: { max_size: number; checked_out: number; waiting: number };
};

export type ErrorResponse = {
  error: string;
  code: string;
};
