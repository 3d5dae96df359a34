import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Lexer, SourceManager, type Token } from '@corvid/compiler'
import { createFormatter } from '../../src/output/formatter.ts'
import { JsonFormatter } from '../../src/output/json.ts'
import { escapeValue, TextFormatter } from '../../src/output/text.ts'

function lex(source: string, trivia = false): { sm: SourceManager; tokens: Token[] } {
	const sm = new SourceManager()
	const lexer = new Lexer(sm, sm.addBuffer(source, 'fmt.cz'))
	return { sm, tokens: trivia ? lexer.tokenizeWithTrivia() : lexer.tokenize() }
}

describe('output/text', () => {
	describe('escapeValue', () => {
		it('should escape line breaks, tabs, quotes and backslashes', () => {
			assert.strictEqual(escapeValue('a\nb\rc\td'), 'a\\nb\\rc\\td')
			assert.strictEqual(escapeValue('say "hi"'), 'say \\"hi\\"')
			assert.strictEqual(escapeValue('c:\\tmp'), 'c:\\\\tmp')
		})

		it('should write other control characters as short lower-case hex', () => {
			assert.strictEqual(escapeValue('\x01'), '\\x1')
			assert.strictEqual(escapeValue('\x1b['), '\\x1b[')
		})

		it('should leave printable and non-ASCII text alone', () => {
			assert.strictEqual(escapeValue('héllo 世界'), 'héllo 世界')
		})
	})

	describe('TextFormatter', () => {
		it('should print a header and one line per token', () => {
			const { sm, tokens } = lex('let x = 42')
			assert.strictEqual(
				new TextFormatter().format(tokens, sm),
				[
					'=== Lexical Analysis Result ===',
					'Total tokens: 5',
					'',
					'[1:1] KW_LET "let"',
					'[1:5] IDENTIFIER "x"',
					'[1:7] OP_ASSIGN "="',
					'[1:9] LIT_INT "42"',
					'[1:11] TOKEN_EOF',
					'',
				].join('\n')
			)
		})

		it('should omit an empty value', () => {
			const { sm, tokens } = lex('""')
			const lines = new TextFormatter().format(tokens, sm).split('\n')
			assert.strictEqual(lines[3], '[1:1] LIT_STRING')
			assert.strictEqual(lines[4], '[1:3] TOKEN_EOF')
		})

		it('should print string content without quotes and escaped', () => {
			const { sm, tokens } = lex('"a\\tb"')
			const lines = new TextFormatter().format(tokens, sm).split('\n')
			assert.strictEqual(lines[3], '[1:1] LIT_STRING "a\\\\tb"')
		})

		it('should list leading and trailing trivia', () => {
			const { sm, tokens } = lex('x // c\ny', true)
			assert.strictEqual(
				new TextFormatter().format(tokens, sm),
				[
					'=== Lexical Analysis Result ===',
					'Total tokens: 3',
					'',
					'[1:1] IDENTIFIER "x"',
					'  (trailing trivia: whitespace)',
					'  (trailing trivia: comment)',
					'[2:1] IDENTIFIER "y"',
					'  (leading trivia: newline)',
					'[2:2] TOKEN_EOF',
					'',
				].join('\n')
			)
		})
	})
})

describe('output/json', () => {
	it('should write one JSON document with a token array', () => {
		const { sm, tokens } = lex('x = 1')
		const out = new JsonFormatter().format(tokens, sm)

		assert.ok(out.endsWith('}\n'))
		assert.deepStrictEqual(JSON.parse(out), {
			count: 4,
			success: true,
			tokens: [
				{ column: 1, length: 1, line: 1, offset: 0, type: 'IDENTIFIER', value: 'x' },
				{ column: 3, length: 1, line: 1, offset: 2, type: 'OP_ASSIGN', value: '=' },
				{ column: 5, length: 1, line: 1, offset: 4, type: 'LIT_INT', value: '1' },
				{ column: 6, length: 0, line: 1, offset: 5, type: 'TOKEN_EOF', value: '' },
			],
		})
	})

	it('should keep keys in wire order', () => {
		const { sm, tokens } = lex('')
		assert.strictEqual(
			new JsonFormatter().format(tokens, sm),
			'{"success":true,"count":1,"tokens":[{"type":"TOKEN_EOF","value":"","line":1,"column":1,"offset":0,"length":0}]}\n'
		)
	})

	it('should give string values without their quotes', () => {
		const { sm, tokens } = lex('"hi"')
		const document: unknown = JSON.parse(new JsonFormatter().format(tokens, sm))
		assert.deepStrictEqual(document, {
			count: 2,
			success: true,
			tokens: [
				{ column: 1, length: 4, line: 1, offset: 0, type: 'LIT_STRING', value: 'hi' },
				{ column: 5, length: 0, line: 1, offset: 4, type: 'TOKEN_EOF', value: '' },
			],
		})
	})
})

describe('createFormatter', () => {
	it('should pick the formatter for the format', () => {
		assert.ok(createFormatter('text') instanceof TextFormatter)
		assert.ok(createFormatter('json') instanceof JsonFormatter)
	})
})
