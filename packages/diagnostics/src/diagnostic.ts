import type { ErrorCode } from './error-code.ts'
import { Message } from './message.ts'
import { MultiSpan, type Span } from './span.ts'
import type { Level } from './types.ts'

/** How safely a suggestion can be applied by a tool. */
export const Applicability = {
	HasPlaceholders: 'has-placeholders',
	MachineApplicable: 'machine-applicable',
	MaybeIncorrect: 'maybe-incorrect',
	Unspecified: 'unspecified',
} as const

export type Applicability = (typeof Applicability)[keyof typeof Applicability]

export interface Suggestion {
	readonly span: Span
	readonly replacement: string
	readonly message: string
	readonly applicability: Applicability
}

/** A note or help line attached to a diagnostic. */
export interface SubDiagnostic {
	readonly level: Level
	readonly message: string
	readonly span?: Span
}

/**
 * One structured report. Built once (usually through DiagBuilder) and then
 * handed to DiagContext.emit.
 */
export interface Diagnostic {
	readonly level: Level
	readonly message: Message
	readonly code: ErrorCode | null
	readonly spans: MultiSpan
	readonly children: readonly SubDiagnostic[]
	readonly suggestions: readonly Suggestion[]
}

export function createDiagnostic(
	level: Level,
	message: Message | string,
	code: ErrorCode | null = null
): Diagnostic {
	return {
		children: [],
		code,
		level,
		message: typeof message === 'string' ? new Message(message) : message,
		spans: new MultiSpan(),
		suggestions: [],
	}
}

/** Same diagnostic at a different level. */
export function withLevel(diagnostic: Diagnostic, level: Level): Diagnostic {
	return diagnostic.level === level ? diagnostic : { ...diagnostic, level }
}
