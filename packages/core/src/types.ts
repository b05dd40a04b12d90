// --------------------
// JSON values
// --------------------
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

// --------------------
// Inbound request
// --------------------
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface NormalizedRequest {
  readonly method: HttpMethod;
  readonly path: readonly string[];     // decoded segments, e.g. ['api','v2','warehouses','W1']
  readonly customAction?: string;       // text after the last ':' of the path
  readonly queryParams: Readonly<Record<string, string>>;
  readonly body: Readonly<JsonObject>;
}

// --------------------
// Rows
// --------------------
// RawRow: verbatim SHOW/DESCRIBE output. Row: typed + filtered.
export type RawRow = Record<string, string | null>;
export type Row = { [key: string]: JsonValue };

export type BridgeResult = Row | Row[];

// found / not-found variant returned by describe lookups
export type Lookup<T> = { found: true; value: T } | { found: false };

export const found = <T>(value: T): Lookup<T> => ({ found: true, value });
export const notFound = <T>(): Lookup<T> => ({ found: false });

// --------------------
// Engine (backend adapter)
// --------------------
export interface ColumnMeta {
  name: string;
  type?: string;
}

export interface TabularResult {
  columns: ColumnMeta[];
  rows: (string | null)[][];
  queryId?: string;
}

export interface EngineHealth {
  ok: boolean;
  engine: string;
  error?: string;
}

export interface StatementEngine {
  readonly name: string;
  run(sql: string): Promise<TabularResult>;
  health(): Promise<EngineHealth>;
  close?(): Promise<void>;
}

// --------------------
// Resource metadata
// --------------------
export type ResourceKind =
  | 'database'
  | 'schema'
  | 'table'
  | 'task'
  | 'warehouse'
  | 'compute-pool'
  | 'service'
  | 'image-repository';

// owning database/schema identity, already normalized
export interface ParentHandle {
  database?: string;
  schema?: string;
}

export type CreateMode = 'errorIfExists' | 'ifNotExists' | 'orReplace';
