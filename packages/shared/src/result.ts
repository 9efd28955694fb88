import type { QrPassError } from "./errors.js";

export type Result<T, E = QrPassError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E = QrPassError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
