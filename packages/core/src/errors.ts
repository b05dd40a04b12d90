// packages/core/src/errors.ts
import { ZodError } from 'zod';
import type { JsonObject, JsonValue } from './types';

export type RestStatus = 400 | 401 | 403 | 404 | 409 | 500 | 502 | 503 | 504;

export type ErrorDetails = { [key: string]: JsonValue };

export class RestError extends Error {
  readonly status: RestStatus;
  readonly details?: ErrorDetails;

  constructor(status: RestStatus, message = 'Unknown Error', details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

// ---- client ----
export class BadRequest extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(400, message, details); }
}
export class Unauthorized extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(401, message, details); }
}
export class Forbidden extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(403, message, details); }
}
export class NotFound extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(404, message, details); }
}
export class Conflict extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(409, message, details); }
}

// ---- server ----
export class InternalServerError extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(500, message, details); }
}
export class BadGateway extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(502, message, details); }
}
export class ServiceUnavailable extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(503, message, details); }
}
export class GatewayTimeout extends RestError {
  constructor(message?: string, details?: ErrorDetails) { super(504, message, details); }
}

export type RestErrorClass = new (message?: string, details?: ErrorDetails) => RestError;

export function isRestError(e: unknown): e is RestError {
  return e instanceof RestError;
}

// ZodError -> BadRequest with {path,msg,code} per issue
export function fromZodError(err: ZodError, what = 'request'): BadRequest {
  const issues: JsonValue[] = err.issues.map((i) => ({
    path: i.path.join('.'),
    msg: i.message,
    code: i.code,
  }));
  return new BadRequest(`Invalid ${what}`, { issues });
}

/** Coerce anything thrown into a RestError; unknown failures become 500. */
export function asRestError(e: unknown): RestError {
  if (isRestError(e)) return e;
  if (e instanceof ZodError) return fromZodError(e);
  const message = e instanceof Error ? e.message : String(e);
  return new InternalServerError(message);
}

// --------------------
// Outward envelope
// --------------------
export interface ErrorEnvelopeBody extends JsonObject {
  error_code: string;
  request_id: null;
  message: string;
}

export interface ErrorEnvelope {
  statusCode: RestStatus;
  body: ErrorEnvelopeBody;
}

export function toErrorEnvelope(e: unknown): ErrorEnvelope {
  const err = asRestError(e);
  const details = err.details ? JSON.stringify(err.details) : 'null';
  return {
    statusCode: err.status,
    body: {
      error_code: String(err.status),
      request_id: null,
      message: `{error: "${err.message}", details: "${details}"}`,
    },
  };
}
