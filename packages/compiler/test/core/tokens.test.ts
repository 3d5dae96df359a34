import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	bufferId,
	createEofToken,
	createToken,
	EscapeFlags,
	hasEscape,
	hasTrivia,
	INVALID_BUFFER,
	isDelimiter,
	isKeyword,
	isLiteral,
	isOperator,
	isStringLiteral,
	lookupKeyword,
	type SourceLocation,
	TokenKind,
	tokenRawLiteral,
	tokenValue,
	triviaText,
	withTrivia,
} from '../../src/core/tokens.ts'
import { SourceManager } from '../../src/lex/source-manager.ts'

const at = (offset: number): SourceLocation => ({ buffer: bufferId(1), column: offset + 1, line: 1, offset })

describe('core/tokens', () => {
	describe('TokenKind', () => {
		it('should use display names as values', () => {
			assert.strictEqual(TokenKind.KwLet, 'KW_LET')
			assert.strictEqual(TokenKind.OpDotDotEq, 'OP_DOT_DOT_EQ')
			assert.strictEqual(TokenKind.Eof, 'TOKEN_EOF')
			assert.strictEqual(TokenKind.Unknown, 'TOKEN_UNKNOWN')
		})

		it('should classify kinds by family', () => {
			assert.strictEqual(isKeyword(TokenKind.KwWhile), true)
			assert.strictEqual(isKeyword(TokenKind.Identifier), false)
			assert.strictEqual(isLiteral(TokenKind.LitNull), true)
			assert.strictEqual(isOperator(TokenKind.OpHash), true)
			assert.strictEqual(isDelimiter(TokenKind.DelimUnderscore), true)
			assert.strictEqual(isDelimiter(TokenKind.OpDot), false)
		})

		it('should recognize the three string kinds', () => {
			assert.strictEqual(isStringLiteral(TokenKind.LitString), true)
			assert.strictEqual(isStringLiteral(TokenKind.LitRawString), true)
			assert.strictEqual(isStringLiteral(TokenKind.LitTexString), true)
			assert.strictEqual(isStringLiteral(TokenKind.LitInt), false)
		})
	})

	describe('lookupKeyword', () => {
		it('should map keywords and keyword-like literals', () => {
			assert.strictEqual(lookupKeyword('fn'), TokenKind.KwFn)
			assert.strictEqual(lookupKeyword('true'), TokenKind.LitTrue)
			assert.strictEqual(lookupKeyword('null'), TokenKind.LitNull)
			assert.strictEqual(lookupKeyword('_'), TokenKind.DelimUnderscore)
		})

		it('should be case-sensitive and exact', () => {
			assert.strictEqual(lookupKeyword('Let'), undefined)
			assert.strictEqual(lookupKeyword('lets'), undefined)
			assert.strictEqual(lookupKeyword(''), undefined)
		})
	})

	describe('EscapeFlags', () => {
		it('should test individual bits', () => {
			const flags = EscapeFlags.Named | EscapeFlags.Unicode
			assert.strictEqual(hasEscape(flags, EscapeFlags.Named), true)
			assert.strictEqual(hasEscape(flags, EscapeFlags.Unicode), true)
			assert.strictEqual(hasEscape(flags, EscapeFlags.Hex), false)
			assert.strictEqual(hasEscape(flags, EscapeFlags.LiteralControl), false)
		})
	})

	describe('createToken', () => {
		it('should default the value range to the raw range', () => {
			const token = createToken({ kind: TokenKind.Identifier, length: 3, location: at(4) })
			assert.strictEqual(token.offset, 4)
			assert.strictEqual(token.valueOffset, 4)
			assert.strictEqual(token.valueLength, 3)
			assert.strictEqual(token.escapes, EscapeFlags.None)
			assert.strictEqual(token.expansion, null)
			assert.strictEqual(hasTrivia(token), false)
		})

		it('should create a zero-length EOF token', () => {
			const eof = createEofToken(at(9))
			assert.strictEqual(eof.kind, TokenKind.Eof)
			assert.strictEqual(eof.length, 0)
			assert.strictEqual(eof.offset, 9)
		})
	})

	describe('text resolution', () => {
		it('should resolve value and raw literal through the source', () => {
			const sm = new SourceManager()
			const buffer = sm.addBuffer('x = "hi"', 'a.cz')
			const token = createToken({
				kind: TokenKind.LitString,
				length: 4,
				location: { buffer, column: 5, line: 1, offset: 4 },
				valueLength: 2,
				valueOffset: 5,
			})

			assert.strictEqual(tokenValue(token, sm), 'hi')
			assert.strictEqual(tokenRawLiteral(token, sm), '"hi"')
		})

		it('should attach trivia without changing the token', () => {
			const sm = new SourceManager()
			const buffer = sm.addBuffer('  x', 'a.cz')
			const token = createToken({ kind: TokenKind.Identifier, length: 1, location: { buffer, column: 3, line: 1, offset: 2 } })
			const space = { buffer, kind: 'whitespace' as const, length: 2, offset: 0 }
			const decorated = withTrivia(token, [space], [])

			assert.strictEqual(hasTrivia(decorated), true)
			assert.strictEqual(hasTrivia(token), false)
			assert.strictEqual(triviaText(space, sm), '  ')
		})
	})

	it('should reserve 0 as the invalid buffer', () => {
		assert.strictEqual(INVALID_BUFFER, 0)
	})
})
