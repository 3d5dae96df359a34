import { type DiagnosticArgs, LexerErrorCode } from '../core/diagnostics.ts'
import { LIMITS } from '../core/limits.ts'
import { createToken, type SourceLocation, type Token, TokenKind } from '../core/tokens.ts'
import { createLexerError, type ErrorCollector } from './lexer-error.ts'
import type { SourceReader } from './source-reader.ts'

/** Value range and escapes for string-like tokens. */
export interface TokenValue {
	readonly offset: number
	readonly length: number
	readonly escapes?: number
}

function charCode(char: string): number {
	return char.charCodeAt(0)
}

/**
 * What a scanner sees: the cursor plus the error sink.
 */
export class ScanContext {
	constructor(
		private readonly reader: SourceReader,
		private readonly collector: ErrorCollector
	) {}

	get offset(): number {
		return this.reader.offset
	}

	current(): number | undefined {
		return this.reader.current()
	}

	peek(n: number): number | undefined {
		return this.reader.peek(n)
	}

	isAtEnd(): boolean {
		return this.reader.isAtEnd()
	}

	location(): SourceLocation {
		return this.reader.location()
	}

	advance(count = 1): void {
		this.reader.advance(count)
	}

	/** True when the byte `n` ahead (default: current) is the ASCII `char`. */
	check(char: string, n = 0): boolean {
		return this.reader.peek(n) === charCode(char)
	}

	/** Consume `text` if the input continues with it. */
	match(text: string): boolean {
		for (let i = 0; i < text.length; i++) {
			if (this.reader.peek(i) !== text.charCodeAt(i)) return false
		}
		this.reader.advance(text.length)
		return true
	}

	/** Up to `n` upcoming bytes as Latin-1 text; shorter near the end. */
	peekText(n: number): string {
		let text = ''
		for (let i = 0; i < n; i++) {
			const byte = this.reader.peek(i)
			if (byte === undefined) break
			text += String.fromCharCode(byte)
		}
		return text
	}

	/** Length of the well-formed multi-byte sequence at the cursor, or 0. */
	sequenceLength(): number {
		return this.reader.sequenceLength()
	}

	textFrom(start: number): string {
		return this.reader.textFrom(start)
	}

	reportError(code: LexerErrorCode, location: SourceLocation, length: number, args?: DiagnosticArgs): void {
		this.collector.add(createLexerError(code, location, length, args))
	}

	/** Report with a message other than the catalog template. */
	reportMessage(code: LexerErrorCode, location: SourceLocation, length: number, message: string): void {
		this.collector.add({ ...createLexerError(code, location, length), message })
	}

	/** Bytes consumed since `start`. */
	spanFrom(start: SourceLocation): number {
		return this.reader.offset - start.offset
	}

	/**
	 * Token from `start` to the cursor. Over-long tokens are reported but
	 * still returned whole.
	 */
	makeToken(kind: TokenKind, start: SourceLocation, value?: TokenValue): Token {
		const length = this.spanFrom(start)
		if (length > LIMITS.maxTokenLength) {
			this.reportError(LexerErrorCode.TokenTooLong, start, length, {
				length,
				max: LIMITS.maxTokenLength,
			})
		}
		if (value === undefined) return createToken({ kind, length, location: start })
		return createToken({
			kind,
			length,
			location: start,
			valueLength: value.length,
			valueOffset: value.offset,
			...(value.escapes !== undefined ? { escapes: value.escapes } : {}),
		})
	}

	makeUnknown(start: SourceLocation): Token {
		return this.makeToken(TokenKind.Unknown, start)
	}
}

/** Printable form of a byte for messages: the character, or `\xNN`. */
export function displayByte(byte: number): string {
	if (byte >= 0x20 && byte < 0x7f) return String.fromCharCode(byte)
	return `\\x${hexByte(byte)}`
}

/** Two upper-case hex digits. */
export function hexByte(byte: number): string {
	return byte.toString(16).toUpperCase().padStart(2, '0')
}
