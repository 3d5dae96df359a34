import type { BufferId, Token, TokenKind } from '../../src/core/tokens.ts'
import { tokenValue } from '../../src/core/tokens.ts'
import { Lexer } from '../../src/lex/lexer.ts'
import type { LexerError } from '../../src/lex/lexer-error.ts'
import { SourceManager } from '../../src/lex/source-manager.ts'

export interface LexResult {
	sm: SourceManager
	buffer: BufferId
	tokens: Token[]
	errors: readonly LexerError[]
}

export function lex(source: string | Uint8Array, options: { trivia?: boolean } = {}): LexResult {
	const sm = new SourceManager()
	const buffer = sm.addBuffer(source, 'test.cz')
	const lexer = new Lexer(sm, buffer)
	const tokens = options.trivia ? lexer.tokenizeWithTrivia() : lexer.tokenize()
	return { buffer, errors: lexer.errors(), sm, tokens }
}

/** Kinds without the trailing EOF. */
export function kinds(source: string | Uint8Array): TokenKind[] {
	return lex(source)
		.tokens.slice(0, -1)
		.map((token) => token.kind)
}

export function values(result: LexResult): string[] {
	return result.tokens.slice(0, -1).map((token) => tokenValue(token, result.sm))
}

export function codes(source: string | Uint8Array): number[] {
	return lex(source).errors.map((error) => error.code)
}

/** The only non-EOF token of `source`; fails when there is not exactly one. */
export function single(source: string | Uint8Array): { result: LexResult; token: Token } {
	const result = lex(source)
	const [token, eof] = result.tokens
	if (token === undefined || eof === undefined || result.tokens.length !== 2) {
		throw new Error(`expected one token in ${JSON.stringify(source)}, got ${result.tokens.length - 1}`)
	}
	return { result, token }
}
