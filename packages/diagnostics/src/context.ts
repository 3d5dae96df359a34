/**
 * The diagnostics sink shared by every compiler phase.
 *
 * Emit pipeline, in order:
 * 1. promote Warning to Error under `treatWarningsAsErrors`
 * 2. drop a diagnostic whose (message, code, primary span start) was already seen
 * 3. update counters
 * 4. suppress output once `maxErrors` is exceeded (the diagnostic is still counted)
 * 5. forward to the emitter
 *
 * Node runs each emit to completion, so the dedup set and counters need no lock.
 */

import { createDiagnostic, type Diagnostic, withLevel } from './diagnostic.ts'
import type { Emitter } from './emitter.ts'
import type { ErrorCode } from './error-code.ts'
import { type ErrorGuaranteed, issueErrorGuaranteed } from './error-guaranteed.ts'
import { Translator } from './i18n.ts'
import { Message } from './message.ts'
import type { SourceLocator } from './source-locator.ts'
import type { Span } from './span.ts'
import { type DiagnosticStats, StatsCounter } from './stats.ts'
import { Level } from './types.ts'

export interface DiagConfig {
	/** Drop repeated diagnostics */
	readonly deduplicate: boolean
	/** Stop emitting after this many errors; 0 means no limit */
	readonly maxErrors: number
	/** Report warnings as errors (-Werror) */
	readonly treatWarningsAsErrors: boolean
	/** Emitters may consult this when they are created from the context's config */
	readonly colorOutput: boolean
}

export const DEFAULT_DIAG_CONFIG: DiagConfig = {
	colorOutput: true,
	deduplicate: true,
	maxErrors: 0,
	treatWarningsAsErrors: false,
}

export interface DiagContextOptions {
	readonly config?: Partial<DiagConfig>
	readonly translator?: Translator
	readonly locator?: SourceLocator | null
}

function dedupKey(diagnostic: Diagnostic): string {
	const primary = diagnostic.spans.primary()
	const where = primary === undefined ? '-' : `${primary.span.fileId}:${primary.span.start}`
	return `${diagnostic.message.markdown}\u0000${diagnostic.code?.toString() ?? ''}\u0000${where}`
}

export class DiagContext {
	readonly config: DiagConfig
	readonly translator: Translator

	private readonly emitter: Emitter
	private sourceLocator: SourceLocator | null
	private readonly seen: Set<string> = new Set()
	private readonly counter = new StatsCounter()

	constructor(emitter: Emitter, options: DiagContextOptions = {}) {
		this.emitter = emitter
		this.config = { ...DEFAULT_DIAG_CONFIG, ...options.config }
		this.translator = options.translator ?? new Translator()
		this.sourceLocator = options.locator ?? null
	}

	// ===========================================================================
	// EMISSION
	// ===========================================================================

	emit(diagnostic: Diagnostic): void {
		const promoted =
			this.config.treatWarningsAsErrors && diagnostic.level === Level.Warning
				? withLevel(diagnostic, Level.Error)
				: diagnostic

		if (this.config.deduplicate) {
			const key = dedupKey(promoted)
			if (this.seen.has(key)) return
			this.seen.add(key)
		}

		this.counter.record(promoted)

		if (this.config.maxErrors > 0 && this.counter.errorCount > this.config.maxErrors) {
			return
		}

		this.emitter.emit(promoted, this.sourceLocator)
	}

	/** Emit at Error level or above and return the proof that an error was reported. */
	emitError(diagnostic: Diagnostic): ErrorGuaranteed {
		this.emit(diagnostic.level < Level.Error ? withLevel(diagnostic, Level.Error) : diagnostic)
		return issueErrorGuaranteed()
	}

	emitWarning(diagnostic: Diagnostic): void {
		this.emit(withLevel(diagnostic, Level.Warning))
	}

	emitNote(diagnostic: Diagnostic): void {
		this.emit(withLevel(diagnostic, Level.Note))
	}

	/** Report an error with a message only, or with a code and optional location. */
	error(message: string): ErrorGuaranteed
	error(code: ErrorCode, message: string, span?: Span): ErrorGuaranteed
	error(codeOrMessage: ErrorCode | string, message?: string, span?: Span): ErrorGuaranteed {
		if (typeof codeOrMessage === 'string') {
			return this.emitError(createDiagnostic(Level.Error, Message.text(codeOrMessage)))
		}
		const diagnostic = createDiagnostic(Level.Error, Message.text(message ?? ''), codeOrMessage)
		if (span !== undefined) diagnostic.spans.addPrimary(span)
		return this.emitError(diagnostic)
	}

	warning(message: string): void {
		this.emit(createDiagnostic(Level.Warning, Message.text(message)))
	}

	note(message: string): void {
		this.emit(createDiagnostic(Level.Note, Message.text(message)))
	}

	// ===========================================================================
	// QUERIES
	// ===========================================================================

	errorCount(): number {
		return this.counter.errorCount
	}

	warningCount(): number {
		return this.counter.warningCount
	}

	noteCount(): number {
		return this.counter.noteCount
	}

	hasErrors(): boolean {
		return this.counter.errorCount > 0
	}

	hadFatal(): boolean {
		return this.counter.hadFatal
	}

	stats(): DiagnosticStats {
		return this.counter.snapshot()
	}

	/** True after a fatal diagnostic or once the error limit is reached. Poll between phases. */
	shouldAbort(): boolean {
		if (this.counter.hadFatal) return true
		return this.config.maxErrors > 0 && this.counter.errorCount >= this.config.maxErrors
	}

	// ===========================================================================
	// OUTPUT
	// ===========================================================================

	emitSummary(): void {
		this.emitter.emitSummary(this.counter.snapshot())
	}

	flush(): void {
		this.emitter.flush()
	}

	setLocator(locator: SourceLocator | null): void {
		this.sourceLocator = locator
	}

	get locator(): SourceLocator | null {
		return this.sourceLocator
	}
}
