import { type TextSource, type Token, TokenKind, type Trivia, tokenValue } from '@corvid/compiler'
import type { TokenFormatter } from './formatter.ts'

const ESCAPES: Readonly<Record<string, string>> = {
	'\n': '\\n',
	'\r': '\\r',
	'\t': '\\t',
	'"': '\\"',
	'\\': '\\\\',
}

/** Quote-safe rendering of a token value; other control characters become `\xN`. */
export function escapeValue(value: string): string {
	let out = ''
	for (const char of value) {
		const named = ESCAPES[char]
		if (named !== undefined) {
			out += named
			continue
		}
		const code = char.codePointAt(0) ?? 0
		out += code < 0x20 ? `\\x${code.toString(16)}` : char
	}
	return out
}

function triviaLines(position: 'leading' | 'trailing', trivia: readonly Trivia[]): string {
	return trivia.map((t) => `  (${position} trivia: ${t.kind})\n`).join('')
}

/**
 * ```
 * === Lexical Analysis Result ===
 * Total tokens: 2
 *
 * [1:1] IDENTIFIER "x"
 * [1:2] TOKEN_EOF
 * ```
 */
export class TextFormatter implements TokenFormatter {
	format(tokens: readonly Token[], source: TextSource): string {
		let out = `=== Lexical Analysis Result ===\nTotal tokens: ${tokens.length}\n\n`
		for (const token of tokens) {
			out += `[${token.location.line}:${token.location.column}] ${token.kind}`
			const value = token.kind === TokenKind.Eof ? '' : tokenValue(token, source)
			if (value !== '') out += ` "${escapeValue(value)}"`
			out += '\n'
			out += triviaLines('leading', token.leadingTrivia)
			out += triviaLines('trailing', token.trailingTrivia)
		}
		return out
	}
}
