import type { Diagnostic } from '../src/diagnostic.ts'
import type { Emitter } from '../src/emitter.ts'
import type { LineColumn, SourceLocator } from '../src/source-locator.ts'
import type { Span } from '../src/span.ts'
import type { DiagnosticStats } from '../src/stats.ts'

export class CollectingEmitter implements Emitter {
	readonly diagnostics: Diagnostic[] = []
	readonly summaries: DiagnosticStats[] = []
	flushes = 0

	emit(diagnostic: Diagnostic): void {
		this.diagnostics.push(diagnostic)
	}

	emitSummary(stats: DiagnosticStats): void {
		this.summaries.push(stats)
	}

	flush(): void {
		this.flushes++
	}
}

export class StringSink {
	text = ''

	write(chunk: string): boolean {
		this.text += chunk
		return true
	}
}

/**
 * Locator over a single in-memory ASCII file with id 1.
 */
export class MemoryLocator implements SourceLocator {
	private readonly lines: string[]

	constructor(
		private readonly filename: string,
		private readonly text: string
	) {
		this.lines = text.split('\n')
	}

	getFilename(): string {
		return this.filename
	}

	getLineColumn(_fileId: number, offset: number): LineColumn {
		let line = 1
		let lineStart = 0
		for (let i = 0; i < offset && i < this.text.length; i++) {
			if (this.text[i] === '\n') {
				line++
				lineStart = i + 1
			}
		}
		return { column: offset - lineStart + 1, line }
	}

	getLineContent(_fileId: number, line: number): string {
		return this.lines[line - 1] ?? ''
	}

	getSourceSlice(span: Span): string {
		return this.text.slice(span.start, span.end)
	}
}
