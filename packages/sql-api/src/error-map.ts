// packages/sql-api/src/error-map.ts
import {
  BadGateway,
  BadRequest,
  Conflict,
  Forbidden,
  GatewayTimeout,
  InternalServerError,
  NotFound,
  ServiceUnavailable,
  Unauthorized,
  type ErrorDetails,
  type RestError,
  type RestErrorClass,
} from '@ddlbridge/core';
import type { NativeError, NativeErrorClass } from './native-error';

// exact native codes that win over the class default
const CODE_OVERRIDES: ReadonlyMap<number, RestErrorClass> = new Map<number, RestErrorClass>([
  [2002, Conflict],             // object already exists
  [2003, NotFound],             // object does not exist or not authorized
  [3001, Forbidden],            // insufficient privileges
  [630, GatewayTimeout],        // statement timeout
  [253001, BadRequest],         // stage file system error
  [253002, BadRequest],         // stage file not found
  [250001, BadGateway],         // failed to connect
  [250003, BadGateway],         // failed to request
  [253003, BadGateway],         // failed to upload to stage
]);

const CODE_RANGES: ReadonlyArray<{ from: number; to: number; error: RestErrorClass }> = [
  { from: 390100, to: 390199, error: Unauthorized },   // authentication
  { from: 254000, to: 254999, error: Unauthorized },   // certificate revocation
];

const CLASS_DEFAULTS: Readonly<Record<NativeErrorClass, RestErrorClass>> = {
  interface: BadRequest,
  programming: BadRequest,
  database: Unauthorized,
  forbidden: Forbidden,
  timeout: GatewayTimeout,
  unavailable: ServiceUnavailable,
  operational: BadGateway,
  revocation: InternalServerError,
  integrity: InternalServerError,
  internal: InternalServerError,
};

export function restErrorClassFor(err: NativeError): RestErrorClass {
  if (err.errno !== undefined) {
    const exact = CODE_OVERRIDES.get(err.errno);
    if (exact) return exact;
    const ranged = CODE_RANGES.find((r) => err.errno !== undefined && err.errno >= r.from && err.errno <= r.to);
    if (ranged) return ranged.error;
  }
  return CLASS_DEFAULTS[err.errorClass] ?? InternalServerError;
}

export function nativeErrorDetails(err: NativeError, sql: string): ErrorDetails {
  return {
    errno: err.errno ?? null,
    query: sql,
    sqlstate: err.sqlState ?? null,
    sfqid: err.queryId ?? null,
  };
}

export function mapNativeError(err: NativeError, sql: string): RestError {
  const ErrorClass = restErrorClassFor(err);
  return new ErrorClass(err.message, nativeErrorDetails(err, sql));
}
