import {
	D0001,
	D0003,
	type DiagnosticArgs,
	ErrorCategory,
	ErrorCode,
	type ErrorDef,
	interpolateMessage,
} from '@corvid/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** A driver-category failure: its code plus the interpolated message. */
export interface DriverFailure {
	readonly code: ErrorCode
	readonly message: string
}

export function driverFailure(def: ErrorDef, args: DiagnosticArgs): DriverFailure {
	return {
		code: new ErrorCode(ErrorCategory.Driver, def.code),
		message: interpolateMessage(def.message, args),
	}
}

/** `[D0001] file not found: main.cz` */
export function formatFailure(failure: DriverFailure): string {
	return `[${failure.code.toString()}] ${failure.message}`
}

export type ReadFailureKind = 'not-found' | 'open-failed'

export interface ReadFailure extends DriverFailure {
	readonly kind: ReadFailureKind
}

/** Classify a failed read of `path`: ENOENT is D0001, anything else D0003. */
export function formatReadError(path: string, error: unknown): ReadFailure {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return { ...driverFailure(D0001, { path }), kind: 'not-found' }
	}
	return { ...driverFailure(D0003, { path, reason: getErrorMessage(error) }), kind: 'open-failed' }
}

export type OutputFormat = 'text' | 'json'

export function isOutputFormat(value: string): value is OutputFormat {
	return value === 'text' || value === 'json'
}
