// packages/sql-api/src/native-error.ts

// failure families reported by the backend, before REST mapping
export type NativeErrorClass =
  | 'interface'
  | 'revocation'
  | 'operational'
  | 'integrity'
  | 'internal'
  | 'programming'
  | 'database'
  | 'forbidden'
  | 'timeout'
  | 'unavailable';

export interface NativeErrorInfo {
  errno?: number;
  sqlState?: string;
  queryId?: string;
  httpStatus?: number;
}

export class NativeError extends Error {
  readonly errorClass: NativeErrorClass;
  readonly errno?: number;
  readonly sqlState?: string;
  readonly queryId?: string;
  readonly httpStatus?: number;

  constructor(errorClass: NativeErrorClass, message: string, info: NativeErrorInfo = {}) {
    super(message);
    this.name = 'NativeError';
    this.errorClass = errorClass;
    this.errno = info.errno;
    this.sqlState = info.sqlState;
    this.queryId = info.queryId;
    this.httpStatus = info.httpStatus;
  }
}

// ---- well-known codes ----
export const SESSION_EXPIRED_CODE = '390112';
export const ER_FAILED_TO_CONNECT = 250001;
export const ER_STATEMENT_TIMEOUT = 630;

// API error codes are zero-padded strings ("002003")
export function parseErrno(code: string | number | undefined): number | undefined {
  if (code === undefined) return undefined;
  const n = typeof code === 'number' ? code : Number.parseInt(code, 10);
  return Number.isFinite(n) ? n : undefined;
}

// HTTP status of a failed SQL API call -> native class
export function classForHttpStatus(status: number): NativeErrorClass {
  if (status === 400) return 'interface';
  if (status === 401) return 'database';
  if (status === 403) return 'forbidden';
  if (status === 408 || status === 504) return 'timeout';
  if (status === 422) return 'programming';
  if (status === 429 || status === 503) return 'unavailable';
  if (status === 502) return 'operational';
  return 'internal';
}
