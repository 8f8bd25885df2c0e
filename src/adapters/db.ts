export type TableType = "BASE TABLE" | "VIEW" | "MATERIALIZED VIEW";

export type TableMetadata = {
  name: string;
  type: TableType;
  sizeBytes: number;
  sizePretty: string | null;
  columnCount: number;
  comment: string | null;
};

export type ColumnMetadata = {
  name: string;
  dataType: string; // format_type output, e.g. "character varying(3)"
  nullable: boolean;
  isPrimaryKey: boolean;
  isForeignKey: boolean;
  comment: string | null;
  ordinalPosition: number;
};

export type IndexMetadata = {
  name: string;
  columns: string[]; // key order
  isUnique: boolean;
  isPrimary: boolean;
};

export type TableSchema = {
  table: TableMetadata;
  columns: ColumnMetadata[];
  indexes: IndexMetadata[];
};

export type JsonScalar = string | number | boolean | null;
export type JsonValue = JsonScalar | JsonValue[] | { [key: string]: JsonValue };

export type QueryResult = {
  columns: string[];
  rows: JsonValue[][];
  rowCount: number;
};

export type FieldInfo = { name: string; dataTypeID: number };

/** Driver result in array row mode: one entry per output column, duplicates kept. */
export type RawResult = { fields: FieldInfo[]; rows: unknown[][] };

export type RunQuery = (text: string, values?: unknown[]) => Promise<RawResult>;

export interface BackendClient {
  query(text: string, values?: unknown[]): Promise<RawResult>;
  /** Hand the connection back to the driver; `destroy` closes it instead of keeping it idle. */
  release(destroy: boolean): void;
}

export interface PoolBackend {
  connect(): Promise<BackendClient>;
  end(): Promise<void>;
}
