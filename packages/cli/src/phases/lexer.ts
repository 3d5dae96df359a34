import { readFile, stat } from 'node:fs/promises'
import {
	type BufferId,
	emitLexerErrors,
	Lexer,
	type LexerError,
	LIMITS,
	SourceManager,
	type Token,
} from '@corvid/compiler'
import { D0002, type DiagContext } from '@corvid/diagnostics'
import { type DriverFailure, driverFailure, formatReadError } from '../utils.ts'

export interface LexerPhaseOptions {
	/** Attach whitespace and comments to tokens */
	readonly preserveTrivia: boolean
	/** Largest accepted input, in bytes */
	readonly maxFileSize: number
}

export const DEFAULT_LEXER_PHASE_OPTIONS: LexerPhaseOptions = {
	maxFileSize: LIMITS.maxFileSize,
	preserveTrivia: false,
}

export type LexerPhaseErrorKind = 'not-found' | 'too-large' | 'open-failed'

export interface LexerPhaseError extends DriverFailure {
	readonly kind: LexerPhaseErrorKind
}

export interface LexResult {
	readonly buffer: BufferId
	readonly tokens: Token[]
	readonly hasErrors: boolean
	readonly errors: readonly LexerError[]
}

export type PhaseResult<T> = { ok: true; value: T } | { ok: false; error: LexerPhaseError }

const encoder = new TextEncoder()

/**
 * Runs the lexer over one input and reports its errors to the diagnostics
 * context. Sources stay in `sourceManager` for formatting afterwards.
 */
export class LexerPhase {
	readonly sourceManager = new SourceManager()
	readonly options: LexerPhaseOptions

	constructor(
		private readonly dcx: DiagContext,
		options: Partial<LexerPhaseOptions> = {}
	) {
		this.options = { ...DEFAULT_LEXER_PHASE_OPTIONS, ...options }
	}

	async runOnFile(path: string): Promise<PhaseResult<LexResult>> {
		let size: number
		try {
			size = (await stat(path)).size
		} catch (error: unknown) {
			return { error: formatReadError(path, error), ok: false }
		}
		if (size > this.options.maxFileSize) {
			return { error: this.tooLarge(path, size), ok: false }
		}

		let bytes: Uint8Array
		try {
			bytes = await readFile(path)
		} catch (error: unknown) {
			return { error: formatReadError(path, error), ok: false }
		}
		return { ok: true, value: this.lex(this.sourceManager.addBuffer(bytes, path)) }
	}

	runOnSource(source: string, name = '<input>'): PhaseResult<LexResult> {
		const bytes = encoder.encode(source)
		if (bytes.length > this.options.maxFileSize) {
			return { error: this.tooLarge(name, bytes.length), ok: false }
		}
		return { ok: true, value: this.lex(this.sourceManager.addBuffer(bytes, name)) }
	}

	private tooLarge(path: string, size: number): LexerPhaseError {
		return { ...driverFailure(D0002, { limit: this.options.maxFileSize, path, size }), kind: 'too-large' }
	}

	private lex(buffer: BufferId): LexResult {
		const lexer = new Lexer(this.sourceManager, buffer)
		const tokens = this.options.preserveTrivia ? lexer.tokenizeWithTrivia() : lexer.tokenize()
		const errors = lexer.errors()
		if (errors.length > 0) {
			emitLexerErrors(this.dcx, errors, this.sourceManager)
		}
		return { buffer, errors, hasErrors: lexer.hasErrors(), tokens }
	}
}
