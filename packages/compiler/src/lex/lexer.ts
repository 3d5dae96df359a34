/**
 * Lexer facade.
 *
 * Two modes share the scanners:
 * - plain: whitespace and comments are skipped
 * - trivia: whitespace, line breaks and comments are attached to tokens
 *   (leading trivia up to the token, trailing trivia up to the line break)
 */

import { LexerErrorCode } from '../core/diagnostics.ts'
import {
	type BufferId,
	createEofToken,
	type Token,
	TokenKind,
	type Trivia,
	type TriviaKind,
	withTrivia,
} from '../core/tokens.ts'
import { ErrorCollector, type LexerError } from './lexer-error.ts'
import { displayByte, hexByte, ScanContext } from './scan-context.ts'
import { canScanComment, scanComment } from './scanners/comment.ts'
import { canScanIdent, scanIdent } from './scanners/ident.ts'
import { canScanNumber, scanNumber } from './scanners/number.ts'
import { canScanOperator, scanOperator } from './scanners/operator.ts'
import { canScanString, scanString } from './scanners/string.ts'
import type { SourceManager } from './source-manager.ts'
import { SourceReader } from './source-reader.ts'

const SPACE = 0x20
const TAB = 0x09
const LF = 0x0a
const CR = 0x0d
const SLASH = 0x2f

function isBlank(byte: number | undefined): boolean {
	return byte === SPACE || byte === TAB
}

function isLineBreak(byte: number | undefined): boolean {
	return byte === LF || byte === CR
}

export class Lexer {
	private readonly reader: SourceReader
	private readonly collector = new ErrorCollector()
	private readonly ctx: ScanContext

	constructor(sm: SourceManager, buffer: BufferId) {
		this.reader = new SourceReader(sm, buffer)
		this.ctx = new ScanContext(this.reader, this.collector)
	}

	// ===========================================================================
	// PLAIN MODE
	// ===========================================================================

	nextToken(): Token {
		this.skipWhitespaceAndComments()
		if (this.reader.isAtEnd()) return createEofToken(this.reader.location())
		return this.scanToken()
	}

	/** All tokens; the last one is always TOKEN_EOF. */
	tokenize(): Token[] {
		return this.collect(() => this.nextToken())
	}

	// ===========================================================================
	// TRIVIA MODE
	// ===========================================================================

	nextTokenWithTrivia(): Token {
		const leading = this.collectLeadingTrivia()
		if (this.reader.isAtEnd()) return withTrivia(createEofToken(this.reader.location()), leading, [])

		const token = this.scanToken()
		return withTrivia(token, leading, this.collectTrailingTrivia())
	}

	tokenizeWithTrivia(): Token[] {
		return this.collect(() => this.nextTokenWithTrivia())
	}

	// ===========================================================================
	// ERRORS
	// ===========================================================================

	errors(): readonly LexerError[] {
		return this.collector.errors()
	}

	hasErrors(): boolean {
		return this.collector.hasErrors()
	}

	// ===========================================================================
	// INTERNALS
	// ===========================================================================

	private collect(next: () => Token): Token[] {
		const tokens: Token[] = []
		for (;;) {
			const token = next()
			tokens.push(token)
			if (token.kind === TokenKind.Eof) return tokens
		}
	}

	/** Scanners in priority order; the first that accepts the cursor wins. */
	private scanToken(): Token {
		const { ctx } = this
		if (canScanString(ctx)) return scanString(ctx)
		if (canScanIdent(ctx)) return scanIdent(ctx)
		if (canScanNumber(ctx)) return scanNumber(ctx)
		if (canScanOperator(ctx)) return scanOperator(ctx)
		return this.scanUnknown()
	}

	private scanUnknown(): Token {
		const { ctx } = this
		const start = ctx.location()
		const byte = ctx.current()
		if (byte !== undefined) {
			if (byte >= 0x80) {
				ctx.reportError(LexerErrorCode.InvalidUtf8Sequence, start, 1, { byte: hexByte(byte) })
			} else {
				ctx.reportError(LexerErrorCode.InvalidCharacter, start, 1, { char: displayByte(byte) })
			}
			ctx.advance()
		}
		return ctx.makeUnknown(start)
	}

	private skipWhitespaceAndComments(): void {
		for (;;) {
			while (isBlank(this.reader.current()) || isLineBreak(this.reader.current())) {
				this.reader.advance()
			}
			if (!canScanComment(this.ctx)) return
			scanComment(this.ctx)
		}
	}

	private collectLeadingTrivia(): Trivia[] {
		const trivia: Trivia[] = []
		for (;;) {
			const byte = this.reader.current()
			if (isBlank(byte)) {
				trivia.push(this.blankRun())
			} else if (isLineBreak(byte)) {
				const start = this.reader.offset
				this.reader.advance()
				trivia.push(this.trivia('newline', start))
			} else if (canScanComment(this.ctx)) {
				trivia.push(this.comment())
			} else {
				return trivia
			}
		}
	}

	/** Same-line blanks and `//` comments; the line break stays for the next token. */
	private collectTrailingTrivia(): Trivia[] {
		const trivia: Trivia[] = []
		for (;;) {
			const byte = this.reader.current()
			if (isBlank(byte)) {
				trivia.push(this.blankRun())
			} else if (byte === SLASH && this.reader.peek(1) === SLASH) {
				trivia.push(this.comment())
			} else {
				return trivia
			}
		}
	}

	private blankRun(): Trivia {
		const start = this.reader.offset
		while (isBlank(this.reader.current())) this.reader.advance()
		return this.trivia('whitespace', start)
	}

	private comment(): Trivia {
		const start = this.reader.offset
		scanComment(this.ctx)
		return this.trivia('comment', start)
	}

	private trivia(kind: TriviaKind, start: number): Trivia {
		return { buffer: this.reader.buffer, kind, length: this.reader.offset - start, offset: start }
	}
}
