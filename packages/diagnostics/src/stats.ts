import type { Diagnostic } from './diagnostic.ts'
import { ErrorCode } from './error-code.ts'
import { Level } from './types.ts'

/**
 * Running counters for one DiagContext.
 */
export interface DiagnosticStats {
	readonly errorCount: number
	readonly warningCount: number
	readonly noteCount: number
	/** Distinct codes of error-level diagnostics, in category/number order */
	readonly uniqueErrorCodes: readonly ErrorCode[]
}

export class StatsCounter {
	errorCount = 0
	warningCount = 0
	noteCount = 0
	hadFatal = false
	private readonly codes: Map<string, ErrorCode> = new Map()

	record(diagnostic: Diagnostic): void {
		switch (diagnostic.level) {
			case Level.Fatal:
				this.hadFatal = true
				this.countError(diagnostic.code)
				break
			case Level.Error:
			case Level.Bug:
				this.countError(diagnostic.code)
				break
			case Level.Warning:
				this.warningCount++
				break
			case Level.Note:
			case Level.Help:
				this.noteCount++
				break
		}
	}

	snapshot(): DiagnosticStats {
		return {
			errorCount: this.errorCount,
			noteCount: this.noteCount,
			uniqueErrorCodes: [...this.codes.values()].sort(ErrorCode.compare),
			warningCount: this.warningCount,
		}
	}

	private countError(code: ErrorCode | null): void {
		this.errorCount++
		if (code !== null) this.codes.set(code.toString(), code)
	}
}
