import { type DiagnosticArgs, getLexerError, interpolateMessage, type LexerErrorCode } from '../core/diagnostics.ts'
import type { SourceLocation } from '../core/tokens.ts'
import type { SourceManager } from './source-manager.ts'

/**
 * A malformed-input fact found during one scan pass.
 */
export interface LexerError {
	readonly code: LexerErrorCode
	/** Where the offending construct starts */
	readonly location: SourceLocation
	/** Bytes covered by the construct; at least 1 */
	readonly length: number
	readonly message: string
}

export function createLexerError(
	code: LexerErrorCode,
	location: SourceLocation,
	length: number,
	args?: DiagnosticArgs
): LexerError {
	return {
		code,
		length: Math.max(1, length),
		location,
		message: interpolateMessage(getLexerError(code).message, args),
	}
}

/** `L` followed by the four-digit code. */
export function codeString(code: LexerErrorCode): string {
	return `L${String(code).padStart(4, '0')}`
}

/**
 * Locations of the macro expansions the error came through, innermost first.
 * Always empty until expansions are produced.
 */
export function getExpansionChain(_error: LexerError, _sm: SourceManager): SourceLocation[] {
	return []
}

/** `file:line:col: L1021: message`, plus one line per expansion. */
export function formatLexerError(error: LexerError, sm: SourceManager): string {
	const name = (buffer: SourceLocation['buffer']) => sm.getFilename(buffer) || '<unknown>'
	const { location } = error
	let out = `${name(location.buffer)}:${location.line}:${location.column}: ${codeString(error.code)}: ${error.message}`
	for (const site of getExpansionChain(error, sm)) {
		out += `\n  expanded from ${name(site.buffer)}:${site.line}:${site.column}`
	}
	return out
}

/**
 * Accumulates lexer errors in the order they are found.
 */
export class ErrorCollector {
	private readonly items: LexerError[] = []

	add(error: LexerError): void {
		this.items.push(error)
	}

	errors(): readonly LexerError[] {
		return this.items
	}

	hasErrors(): boolean {
		return this.items.length > 0
	}

	count(): number {
		return this.items.length
	}

	clear(): void {
		this.items.length = 0
	}
}
