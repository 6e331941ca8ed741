export type ErrorCode =
	| "CONFIG_ERROR"
	| "SENSOR_ERROR"
	| "LOCAL_WRITE_ERROR"
	| "REMOTE_UPLOAD_ERROR"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function sensorError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "SENSOR_ERROR",
		message,
		details,
		cause
	});
}

export function localWriteError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "LOCAL_WRITE_ERROR",
		message,
		details,
		cause
	});
}

export function remoteUploadError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "REMOTE_UPLOAD_ERROR",
		message,
		details,
		cause
	});
}

/**
 * One-line description for log output: the message plus the cause's message, if any.
 */
export function describeError(err: unknown): string {
	const e = asAppError(err);
	const cause = e.cause !== undefined ? errorMessage(e.cause) : "";
	return cause && cause !== e.message ? `${e.code}: ${e.message} (${cause})` : `${e.code}: ${e.message}`;
}
