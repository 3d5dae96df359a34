import type { DiagnosticArgs } from './types.ts'

function isPositional(args: DiagnosticArgs): args is readonly (string | number)[] {
	return Array.isArray(args)
}

function lookupArg(args: DiagnosticArgs, key: string): string | number | undefined {
	if (isPositional(args)) {
		return /^\d+$/.test(key) ? args[Number(key)] : undefined
	}
	return Object.hasOwn(args, key) ? args[key] : undefined
}

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
		const value = lookupArg(args, key)
		return value !== undefined ? String(value) : placeholder
	})
}
