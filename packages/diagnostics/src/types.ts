/**
 * Diagnostic levels, ordered by severity.
 */
export const Level = {
	Bug: 5,
	Error: 3,
	Fatal: 4,
	Help: 1,
	Note: 0,
	Warning: 2,
} as const

export type Level = (typeof Level)[keyof typeof Level]

const LEVEL_NAMES: Record<Level, string> = {
	[Level.Note]: 'note',
	[Level.Help]: 'help',
	[Level.Warning]: 'warning',
	[Level.Error]: 'error',
	[Level.Fatal]: 'fatal error',
	[Level.Bug]: 'internal compiler error',
}

export function levelToString(level: Level): string {
	return LEVEL_NAMES[level]
}

/** True for the levels that count as errors. */
export function isErrorLevel(level: Level): boolean {
	return level >= Level.Error
}

/**
 * Template arguments for diagnostic messages.
 * Named (`{path}`) or positional (`{0}`).
 */
export type DiagnosticArgs = Readonly<Record<string, string | number>> | readonly (string | number)[]

/**
 * Error definition in a catalog.
 */
export interface ErrorDef {
	/** Numeric code within its category */
	readonly code: number
	/** One-line description shown by `explain` and the registry */
	readonly brief: string
	/** Translation key prefix (`<key>.label`, `<key>.help`, `<key>.explanation`) */
	readonly key: string
	/** Message template with `{placeholder}` arguments */
	readonly message: string
}
