import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind } from '../../src/core/tokens.ts'
import { codes, kinds, lex, single, values } from './helpers.ts'

describe('lex/identifiers', () => {
	it('should scan ASCII identifiers', () => {
		const result = lex('foo _bar baz_9')
		assert.deepStrictEqual(values(result), ['foo', '_bar', 'baz_9'])
		assert.deepStrictEqual(kinds('foo _bar baz_9'), [TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier])
	})

	it('should recognize every keyword', () => {
		const source = 'let var fn struct enum type impl trait return if else while for in break continue match import as'
		assert.deepStrictEqual(kinds(source), [
			TokenKind.KwLet,
			TokenKind.KwVar,
			TokenKind.KwFn,
			TokenKind.KwStruct,
			TokenKind.KwEnum,
			TokenKind.KwType,
			TokenKind.KwImpl,
			TokenKind.KwTrait,
			TokenKind.KwReturn,
			TokenKind.KwIf,
			TokenKind.KwElse,
			TokenKind.KwWhile,
			TokenKind.KwFor,
			TokenKind.KwIn,
			TokenKind.KwBreak,
			TokenKind.KwContinue,
			TokenKind.KwMatch,
			TokenKind.KwImport,
			TokenKind.KwAs,
		])
	})

	it('should give literal kinds to true, false and null', () => {
		assert.deepStrictEqual(kinds('true false null'), [TokenKind.LitTrue, TokenKind.LitFalse, TokenKind.LitNull])
	})

	it('should give a lone underscore its own kind', () => {
		assert.deepStrictEqual(kinds('_ __'), [TokenKind.DelimUnderscore, TokenKind.Identifier])
	})

	it('should not match keyword prefixes', () => {
		assert.deepStrictEqual(kinds('letter iff Fn'), [TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier])
	})

	it('should accept multi-byte characters', () => {
		const { result, token } = single('变量x')
		assert.strictEqual(token.kind, TokenKind.Identifier)
		assert.strictEqual(token.length, 7)
		assert.deepStrictEqual(values(result), ['变量x'])
		assert.strictEqual(result.errors.length, 0)
	})

	it('should not treat r or t alone as string prefixes', () => {
		assert.deepStrictEqual(kinds('r t rx'), [TokenKind.Identifier, TokenKind.Identifier, TokenKind.Identifier])
	})

	describe('malformed UTF-8', () => {
		it('should end an identifier silently at a malformed sequence', () => {
			// 'ab', then a lead byte whose continuation is missing
			const result = lex(new Uint8Array([0x61, 0x62, 0xc3, 0x41]))
			const [ident, unknown, rest] = result.tokens
			assert.strictEqual(ident?.kind, TokenKind.Identifier)
			assert.strictEqual(ident?.length, 2)
			// the stray lead byte is then reported on its own
			assert.strictEqual(unknown?.kind, TokenKind.Unknown)
			assert.strictEqual(unknown?.length, 1)
			assert.strictEqual(rest?.kind, TokenKind.Identifier)
			assert.deepStrictEqual(
				result.errors.map((e) => [e.code, e.location.offset, e.message]),
				[[1022, 2, 'invalid UTF-8 sequence (byte 0xC3)']]
			)
		})

		it('should report a malformed sequence at the start', () => {
			const result = lex(new Uint8Array([0xe6, 0x41]))
			assert.deepStrictEqual(
				result.tokens.map((token) => [token.kind, token.length]),
				[
					[TokenKind.Unknown, 1],
					[TokenKind.Identifier, 1],
					[TokenKind.Eof, 0],
				]
			)
			assert.deepStrictEqual(codes(new Uint8Array([0xe6, 0x41])), [1022])
			assert.strictEqual(result.errors[0]?.message, 'invalid UTF-8 sequence (byte 0xE6)')
		})

		it('should report stray continuation bytes as invalid UTF-8', () => {
			const result = lex(new Uint8Array([0x80]))
			assert.strictEqual(result.tokens[0]?.kind, TokenKind.Unknown)
			assert.strictEqual(result.errors[0]?.message, 'invalid UTF-8 sequence (byte 0x80)')
		})
	})
})
