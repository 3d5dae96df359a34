/**
 * Driver diagnostic definitions (category D).
 * Operational failures around a phase: missing files, size limits, I/O.
 */

import type { ErrorDef } from './types.ts'

export const D0001: ErrorDef = {
	brief: 'input file not found',
	code: 1,
	key: 'driver.file_not_found',
	message: 'file not found: {path}',
}

export const D0002: ErrorDef = {
	brief: 'input file exceeds the size limit',
	code: 2,
	key: 'driver.file_too_large',
	message: 'file too large: {path} ({size} bytes, limit {limit})',
}

export const D0003: ErrorDef = {
	brief: 'input file could not be read',
	code: 3,
	key: 'driver.open_failed',
	message: 'failed to open file: {path}: {reason}',
}

export const D0010: ErrorDef = {
	brief: 'output file could not be written',
	code: 10,
	key: 'driver.write_failed',
	message: 'failed to write output file: {path}: {reason}',
}

export const DRIVER_ERRORS: readonly ErrorDef[] = [D0001, D0002, D0003, D0010]
