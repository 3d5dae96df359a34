import { LexerErrorCode } from '../../core/diagnostics.ts'
import { type SourceLocation, type Token, TokenKind } from '../../core/tokens.ts'
import type { ScanContext } from '../scan-context.ts'
import { isAsciiDigit, isAsciiIdentContinue, isHexDigit } from '../utf8.ts'

const UNDERSCORE = 0x5f

const VALID_SUFFIXES: ReadonlySet<string> = new Set([
	'i8',
	'i16',
	'i32',
	'i64',
	'u8',
	'u16',
	'u32',
	'u64',
	'f32',
	'f64',
])

interface Radix {
	readonly isDigit: (byte: number | undefined) => boolean
	readonly missing: LexerErrorCode
}

const RADIXES: ReadonlyMap<string, Radix> = new Map<string, Radix>([
	['b', { isDigit: (byte) => byte === 0x30 || byte === 0x31, missing: LexerErrorCode.MissingBinaryDigits }],
	['o', { isDigit: (byte) => byte !== undefined && byte >= 0x30 && byte <= 0x37, missing: LexerErrorCode.MissingOctalDigits }],
	['x', { isDigit: isHexDigit, missing: LexerErrorCode.MissingHexDigits }],
])

export function canScanNumber(ctx: ScanContext): boolean {
	return isAsciiDigit(ctx.current())
}

/**
 * Integer, float or decimal literal, with `0x`/`0b`/`0o` prefixes, `_`
 * separators, an exponent and a type suffix.
 */
export function scanNumber(ctx: ScanContext): Token {
	const start = ctx.location()
	const second = ctx.peek(1)
	if (ctx.check('0') && second !== undefined) {
		const radix = RADIXES.get(String.fromCharCode(second).toLowerCase())
		if (radix !== undefined) return scanPrefixed(ctx, start, radix)
	}
	return scanDecimal(ctx, start)
}

/** Consume digits and `_`; returns the number of digits. */
function consumeDigits(ctx: ScanContext, isDigit: (byte: number | undefined) => boolean): number {
	let digits = 0
	for (;;) {
		const byte = ctx.current()
		if (isDigit(byte)) {
			digits++
		} else if (byte !== UNDERSCORE) {
			return digits
		}
		ctx.advance()
	}
}

function scanPrefixed(ctx: ScanContext, start: SourceLocation, radix: Radix): Token {
	const prefix = ctx.peekText(2)
	ctx.advance(2)
	if (consumeDigits(ctx, radix.isDigit) === 0) {
		ctx.reportError(radix.missing, start, ctx.spanFrom(start), { prefix })
	}
	scanSuffix(ctx, start)
	scanTrailing(ctx, start)
	return ctx.makeToken(TokenKind.LitInt, start)
}

function scanDecimal(ctx: ScanContext, start: SourceLocation): Token {
	consumeDigits(ctx, isAsciiDigit)

	let isFloat = false
	if (ctx.check('.') && isAsciiDigit(ctx.peek(1))) {
		ctx.advance()
		consumeDigits(ctx, isAsciiDigit)
		isFloat = true
	}

	if (ctx.check('e') || ctx.check('E')) {
		ctx.advance()
		if (ctx.check('+') || ctx.check('-')) ctx.advance()
		if (consumeDigits(ctx, isAsciiDigit) === 0) {
			ctx.reportError(LexerErrorCode.MissingExponentDigits, start, ctx.spanFrom(start))
		}
		isFloat = true
	}

	const isDecimal = scanSuffix(ctx, start) === 'decimal'
	scanTrailing(ctx, start)

	if (isDecimal) return ctx.makeToken(TokenKind.LitDecimal, start)
	return ctx.makeToken(isFloat ? TokenKind.LitFloat : TokenKind.LitInt, start)
}

/**
 * `d`/`dec64` or a sized `i`/`u`/`f` suffix. Unknown sizes are reported.
 */
function scanSuffix(ctx: ScanContext, start: SourceLocation): 'decimal' | 'sized' | 'none' {
	if (ctx.check('d')) {
		ctx.advance()
		ctx.match('ec64')
		return 'decimal'
	}

	if (!ctx.check('i') && !ctx.check('u') && !ctx.check('f')) return 'none'

	const suffixStart = ctx.offset
	ctx.advance()
	while (isAsciiDigit(ctx.current())) ctx.advance()

	const suffix = ctx.textFrom(suffixStart)
	if (!VALID_SUFFIXES.has(suffix)) {
		ctx.reportError(LexerErrorCode.InvalidNumberSuffix, start, ctx.spanFrom(start), { suffix })
	}
	return 'sized'
}

/** Letters, digits or `_` glued to the literal are reported and absorbed. */
function scanTrailing(ctx: ScanContext, start: SourceLocation): void {
	const first = ctx.current()
	if (first === undefined || !isAsciiIdentContinue(first)) return

	while (isAsciiIdentContinue(ctx.current())) ctx.advance()
	ctx.reportError(LexerErrorCode.InvalidTrailingChar, start, ctx.spanFrom(start), {
		char: String.fromCharCode(first),
	})
}
