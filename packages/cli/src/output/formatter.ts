import type { TextSource, Token } from '@corvid/compiler'
import type { OutputFormat } from '../utils.ts'
import { JsonFormatter } from './json.ts'
import { TextFormatter } from './text.ts'

/** Renders a token stream for stdout or an output file. */
export interface TokenFormatter {
	format(tokens: readonly Token[], source: TextSource): string
}

export function createFormatter(format: OutputFormat): TokenFormatter {
	return format === 'json' ? new JsonFormatter() : new TextFormatter()
}
