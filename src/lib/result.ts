import type { AppError } from "./errors";

export type Result<T, E = AppError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function fail<E = AppError>(error: E): Result<never, E> {
	return { ok: false, error };
}
