import { type TextSource, type Token, tokenValue } from '@corvid/compiler'
import type { TokenFormatter } from './formatter.ts'

interface JsonToken {
	type: string
	value: string
	line: number
	column: number
	offset: number
	length: number
}

export interface JsonTokenDocument {
	success: true
	count: number
	tokens: JsonToken[]
}

/** One-line JSON document; keys keep the order consumers read them in. */
export class JsonFormatter implements TokenFormatter {
	format(tokens: readonly Token[], source: TextSource): string {
		const document: JsonTokenDocument = {
			success: true,
			count: tokens.length,
			tokens: tokens.map((token) => ({
				type: token.kind,
				value: tokenValue(token, source),
				line: token.location.line,
				column: token.location.column,
				offset: token.offset,
				length: token.length,
			})),
		}
		return `${JSON.stringify(document)}\n`
	}
}
