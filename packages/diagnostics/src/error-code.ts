import { DRIVER_ERRORS } from './driver.ts'
import { LEXER_ERRORS } from './lexer.ts'
import type { ErrorDef } from './types.ts'

/** Compiler phase an error code belongs to. */
export const ErrorCategory = {
	Codegen: 4,
	Driver: 5,
	Lexer: 1,
	Parser: 2,
	Sema: 3,
} as const

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory]

const CATEGORY_PREFIX: Record<ErrorCategory, string> = {
	[ErrorCategory.Lexer]: 'L',
	[ErrorCategory.Parser]: 'P',
	[ErrorCategory.Sema]: 'S',
	[ErrorCategory.Codegen]: 'C',
	[ErrorCategory.Driver]: 'D',
}

export function categoryPrefix(category: ErrorCategory): string {
	return CATEGORY_PREFIX[category]
}

/**
 * `(category, code)` pair rendered as `<Letter><NNNN>`, e.g. `L1021`.
 */
export class ErrorCode {
	readonly category: ErrorCategory
	readonly code: number

	constructor(category: ErrorCategory, code: number) {
		if (!Number.isInteger(code) || code < 0 || code > 9999) {
			throw new Error(`Error code out of range: ${code}`)
		}
		this.category = category
		this.code = code
	}

	toString(): string {
		return `${categoryPrefix(this.category)}${String(this.code).padStart(4, '0')}`
	}

	equals(other: ErrorCode): boolean {
		return this.category === other.category && this.code === other.code
	}

	/** Orders by category, then by number. */
	static compare(a: ErrorCode, b: ErrorCode): number {
		return a.category - b.category || a.code - b.code
	}
}

const CATEGORIES: readonly ErrorCategory[] = Object.values(ErrorCategory)

function categoryFromPrefix(prefix: string): ErrorCategory | undefined {
	return CATEGORIES.find((category) => CATEGORY_PREFIX[category] === prefix)
}

/**
 * Parse `L1021` (case-insensitive letter) into an ErrorCode.
 */
export function parseErrorCode(text: string): ErrorCode | undefined {
	const match = /^([A-Za-z])(\d{4})$/.exec(text.trim())
	if (!match?.[1] || !match[2]) return undefined
	const category = categoryFromPrefix(match[1].toUpperCase())
	if (category === undefined) return undefined
	return new ErrorCode(category, Number(match[2]))
}

export interface ErrorEntry {
	readonly code: ErrorCode
	readonly brief: string
	readonly explanationKey: string
}

/**
 * Central table of known error codes. Registration is idempotent.
 */
export class ErrorRegistry {
	private static shared: ErrorRegistry | null = null

	private readonly entries: Map<string, ErrorEntry> = new Map()

	/** Process-wide registry, pre-filled with the lexer and driver catalogs. */
	static global(): ErrorRegistry {
		if (ErrorRegistry.shared === null) {
			const registry = new ErrorRegistry()
			registry.registerCatalog(ErrorCategory.Lexer, LEXER_ERRORS)
			registry.registerCatalog(ErrorCategory.Driver, DRIVER_ERRORS)
			ErrorRegistry.shared = registry
		}
		return ErrorRegistry.shared
	}

	register(code: ErrorCode, brief: string, explanationKey = ''): void {
		this.entries.set(code.toString(), { brief, code, explanationKey })
	}

	registerCatalog(category: ErrorCategory, defs: readonly ErrorDef[]): void {
		for (const def of defs) {
			this.register(new ErrorCode(category, def.code), def.brief, def.key)
		}
	}

	lookup(code: ErrorCode): ErrorEntry | undefined {
		return this.entries.get(code.toString())
	}

	isRegistered(code: ErrorCode): boolean {
		return this.entries.has(code.toString())
	}

	/** All registered codes in category/number order. */
	allCodes(): ErrorCode[] {
		return [...this.entries.values()].map((entry) => entry.code).sort(ErrorCode.compare)
	}
}
