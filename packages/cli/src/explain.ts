import { type ErrorCode, ErrorRegistry, parseErrorCode, type Translator } from '@corvid/diagnostics'

export interface Explanation {
	readonly code: ErrorCode
	readonly brief: string
	/** Plain text; empty when no explanation is translated */
	readonly explanation: string
}

/**
 * Look up a code such as `L1021`. Undefined when the text is not a code or the
 * code is not registered.
 */
export function explain(
	text: string,
	translator: Translator,
	registry: ErrorRegistry = ErrorRegistry.global()
): Explanation | undefined {
	const code = parseErrorCode(text)
	if (code === undefined || !registry.isRegistered(code)) return undefined
	return {
		brief: translator.getErrorBrief(code, registry),
		code,
		explanation: translator.getErrorExplanation(code, registry).renderPlainText(),
	}
}

export function formatExplanation(entry: Explanation): string {
	const head = `${entry.code.toString()}: ${entry.brief}\n`
	return entry.explanation === '' ? head : `${head}\n${entry.explanation}\n`
}
