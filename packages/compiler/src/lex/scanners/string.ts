import { LexerErrorCode } from '../../core/diagnostics.ts'
import { EscapeFlags, type SourceLocation, type Token, TokenKind } from '../../core/tokens.ts'
import { displayByte, type ScanContext } from '../scan-context.ts'
import { isHexDigit, isUnicodeScalar } from '../utf8.ts'

const QUOTE = 0x22
const HASH = 0x23
const BACKSLASH = 0x5c
const LF = 0x0a
const CR = 0x0d

/** Escapes that stand for one fixed character. */
const NAMED_ESCAPES: ReadonlySet<string> = new Set(['n', 'r', 't', '\\', '"', "'", '0'])

const UNTERMINATED_AT_EOL = 'unterminated string literal (missing closing quote before end of line)'

function isControl(byte: number): boolean {
	return byte < 0x20 || byte === 0x7f
}

export function canScanString(ctx: ScanContext): boolean {
	if (ctx.check('"')) return true
	if (ctx.check('t')) return ctx.check('"', 1)
	if (!ctx.check('r')) return false

	let n = 1
	while (ctx.peek(n) === HASH) n++
	return ctx.peek(n) === QUOTE
}

/**
 * `"…"` with escapes, raw `r#"…"#` and templated `t"…"` strings. The token
 * value is the content between the delimiters.
 */
export function scanString(ctx: ScanContext): Token {
	const start = ctx.location()
	if (ctx.check('r')) return scanRawString(ctx, start)
	if (ctx.check('t')) return scanTexString(ctx, start)
	return scanNormalString(ctx, start)
}

function scanNormalString(ctx: ScanContext, start: SourceLocation): Token {
	ctx.advance()
	const valueStart = ctx.offset
	let valueEnd: number
	let escapes: number = EscapeFlags.None

	for (;;) {
		const byte = ctx.current()
		if (byte === undefined) {
			valueEnd = ctx.offset
			ctx.reportError(LexerErrorCode.UnterminatedString, start, ctx.spanFrom(start))
			break
		}
		if (byte === QUOTE) {
			valueEnd = ctx.offset
			ctx.advance()
			break
		}
		if (byte === LF || byte === CR) {
			valueEnd = ctx.offset
			ctx.reportMessage(LexerErrorCode.UnterminatedString, start, ctx.spanFrom(start), UNTERMINATED_AT_EOL)
			break
		}
		if (byte === BACKSLASH) {
			escapes |= scanEscape(ctx)
			continue
		}
		if (isControl(byte)) escapes |= EscapeFlags.LiteralControl
		ctx.advance()
	}

	return ctx.makeToken(TokenKind.LitString, start, { escapes, length: valueEnd - valueStart, offset: valueStart })
}

/**
 * One escape sequence starting at the backslash. A line break after the
 * backslash is left for the string loop to report.
 */
function scanEscape(ctx: ScanContext): number {
	const start = ctx.location()
	ctx.advance()

	const byte = ctx.current()
	if (byte === undefined || byte === LF || byte === CR) return EscapeFlags.None

	const char = String.fromCharCode(byte)
	if (NAMED_ESCAPES.has(char)) {
		ctx.advance()
		return EscapeFlags.Named
	}
	if (char === 'x') {
		ctx.advance()
		if (isHexDigit(ctx.current()) && isHexDigit(ctx.peek(1))) {
			ctx.advance(2)
		} else {
			if (isHexDigit(ctx.current())) ctx.advance()
			ctx.reportError(LexerErrorCode.InvalidHexEscape, start, ctx.spanFrom(start))
		}
		return EscapeFlags.Hex
	}
	if (char === 'u') {
		ctx.advance()
		if (!scanUnicodeEscape(ctx)) {
			ctx.reportError(LexerErrorCode.InvalidUnicodeEscape, start, ctx.spanFrom(start), {
				text: ctx.textFrom(start.offset),
			})
		}
		return EscapeFlags.Unicode
	}

	const length = byte < 0x80 ? 1 : Math.max(1, ctx.sequenceLength())
	const charStart = ctx.offset
	ctx.advance(length)
	ctx.reportError(LexerErrorCode.InvalidEscapeSequence, start, ctx.spanFrom(start), {
		char: length === 1 ? displayByte(byte) : ctx.textFrom(charStart),
	})
	return EscapeFlags.None
}

/** `{H…}` after `\u`: one to six hex digits naming a Unicode scalar value. */
function scanUnicodeEscape(ctx: ScanContext): boolean {
	if (!ctx.match('{')) return false

	const digitsStart = ctx.offset
	while (isHexDigit(ctx.current())) ctx.advance()
	const digits = ctx.textFrom(digitsStart)

	if (!ctx.match('}')) return false
	return digits.length >= 1 && digits.length <= 6 && isUnicodeScalar(Number.parseInt(digits, 16))
}

function scanRawString(ctx: ScanContext, start: SourceLocation): Token {
	ctx.advance()
	let hashes = 0
	while (ctx.check('#')) {
		hashes++
		ctx.advance()
	}
	ctx.advance()

	const valueStart = ctx.offset
	let escapes: number = EscapeFlags.None

	for (;;) {
		const byte = ctx.current()
		if (byte === undefined) {
			ctx.reportError(LexerErrorCode.UnterminatedRawString, start, ctx.spanFrom(start))
			return ctx.makeToken(TokenKind.LitRawString, start, {
				escapes,
				length: ctx.offset - valueStart,
				offset: valueStart,
			})
		}
		if (byte === QUOTE && closesRaw(ctx, hashes)) {
			const valueEnd = ctx.offset
			ctx.advance(1 + hashes)
			return ctx.makeToken(TokenKind.LitRawString, start, {
				escapes,
				length: valueEnd - valueStart,
				offset: valueStart,
			})
		}
		if (isControl(byte)) escapes |= EscapeFlags.LiteralControl
		ctx.advance()
	}
}

function closesRaw(ctx: ScanContext, hashes: number): boolean {
	for (let i = 1; i <= hashes; i++) {
		if (ctx.peek(i) !== HASH) return false
	}
	return true
}

function scanTexString(ctx: ScanContext, start: SourceLocation): Token {
	ctx.advance(2)
	const valueStart = ctx.offset
	let valueEnd: number
	let escapes: number = EscapeFlags.None

	for (;;) {
		const byte = ctx.current()
		if (byte === undefined) {
			valueEnd = ctx.offset
			ctx.reportError(LexerErrorCode.UnterminatedString, start, ctx.spanFrom(start))
			break
		}
		if (byte === QUOTE) {
			valueEnd = ctx.offset
			ctx.advance()
			break
		}
		if (byte === BACKSLASH && ctx.peek(1) === QUOTE) {
			escapes |= EscapeFlags.Named
			ctx.advance(2)
			continue
		}
		if (isControl(byte)) escapes |= EscapeFlags.LiteralControl
		ctx.advance()
	}

	return ctx.makeToken(TokenKind.LitTexString, start, { escapes, length: valueEnd - valueStart, offset: valueStart })
}
