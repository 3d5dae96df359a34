import type { Diagnostic } from './diagnostic.ts'
import type { SourceLocator } from './source-locator.ts'
import type { DiagnosticStats } from './stats.ts'

/**
 * Renders diagnostics into a concrete output form.
 */
export interface Emitter {
	emit(diagnostic: Diagnostic, locator: SourceLocator | null): void
	emitSummary(stats: DiagnosticStats): void
	flush(): void
}

/** Anything text can be written to: process.stderr, a file stream, a test buffer. */
export interface OutputSink {
	write(chunk: string): unknown
}
