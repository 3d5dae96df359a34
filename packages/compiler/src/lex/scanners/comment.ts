import { LexerErrorCode } from '../../core/diagnostics.ts'
import { type SourceLocation, type Token, TokenKind } from '../../core/tokens.ts'
import type { ScanContext } from '../scan-context.ts'

const SLASH = 0x2f
const STAR = 0x2a
const LF = 0x0a
const CR = 0x0d

export function canScanComment(ctx: ScanContext): boolean {
	if (ctx.current() !== SLASH) return false
	const next = ctx.peek(1)
	return next === SLASH || next === STAR
}

/**
 * Scan a `//` or `/* *\/` comment. `///` and `/**` (but not `/**\/`) are doc
 * comments. Line comments stop before the line break.
 */
export function scanComment(ctx: ScanContext): Token {
	const start = ctx.location()
	return ctx.peek(1) === SLASH ? scanLineComment(ctx, start) : scanBlockComment(ctx, start)
}

function scanLineComment(ctx: ScanContext, start: SourceLocation): Token {
	const isDoc = ctx.peek(2) === SLASH
	ctx.advance(2)
	while (!ctx.isAtEnd()) {
		const byte = ctx.current()
		if (byte === LF || byte === CR) break
		ctx.advance()
	}
	return ctx.makeToken(isDoc ? TokenKind.CommentDoc : TokenKind.CommentLine, start)
}

function scanBlockComment(ctx: ScanContext, start: SourceLocation): Token {
	const afterStar = ctx.peek(3)
	const isDoc = ctx.peek(2) === STAR && afterStar !== undefined && afterStar !== SLASH
	ctx.advance(2)

	while (!ctx.isAtEnd()) {
		if (ctx.current() === STAR && ctx.peek(1) === SLASH) {
			ctx.advance(2)
			return ctx.makeToken(isDoc ? TokenKind.CommentDoc : TokenKind.CommentBlock, start)
		}
		ctx.advance()
	}

	ctx.reportError(LexerErrorCode.UnterminatedBlockComment, start, ctx.spanFrom(start))
	return ctx.makeToken(isDoc ? TokenKind.CommentDoc : TokenKind.CommentBlock, start)
}
