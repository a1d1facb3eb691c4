import type { PgfErrorCode } from "./errors.js";

export interface PgfQueryError {
  code: PgfErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export type PgfResult<T> = PgfSuccess<T> | PgfFailure;

export interface PgfSuccess<T> {
  ok: true;
  value: T;
}

export interface PgfFailure {
  ok: false;
  error: PgfQueryError;
}

export function createError(
  code: PgfErrorCode,
  message: string,
  details?: Record<string, unknown>
): PgfQueryError {
  return details ? { code, message, details } : { code, message };
}

export function ok<T>(value: T): PgfSuccess<T> {
  return { ok: true, value };
}

export function fail(error: PgfQueryError): PgfFailure {
  return { ok: false, error };
}
