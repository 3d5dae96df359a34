import type { Diagnostic } from '../diagnostic.ts'
import type { Emitter, OutputSink } from '../emitter.ts'
import { renderMarkdown } from '../markdown.ts'
import type { SourceLocator } from '../source-locator.ts'
import { isValidSpan, type Span } from '../span.ts'
import { type DiagnosticStats, StatsCounter } from '../stats.ts'
import { levelToString } from '../types.ts'

interface JsonSpan {
	file_id: number
	start: number
	end: number
	file?: string
	line?: number
	column?: number
}

interface JsonDiagnostic {
	level: string
	code?: string
	message: string
	spans: JsonSpan[]
	children: { level: string; message: string }[]
	suggestions: { message: string; replacement: string }[]
}

interface JsonStats {
	error_count: number
	warning_count: number
	note_count: number
	unique_error_codes: string[]
}

export interface JsonDocument {
	diagnostics: JsonDiagnostic[]
	stats: JsonStats
}

export interface JsonEmitterOptions {
	/** Indent the document with two spaces */
	readonly pretty?: boolean
}

function spanToJson(span: Span, locator: SourceLocator | null): JsonSpan {
	const out: JsonSpan = { end: span.end, file_id: span.fileId, start: span.start }
	if (locator !== null && isValidSpan(span)) {
		const lc = locator.getLineColumn(span.fileId, span.start)
		out.file = locator.getFilename(span)
		out.line = lc.line
		out.column = lc.column
	}
	return out
}

function diagnosticToJson(diagnostic: Diagnostic, locator: SourceLocator | null): JsonDiagnostic {
	const out: JsonDiagnostic = {
		children: diagnostic.children.map((child) => ({
			level: levelToString(child.level),
			message: renderMarkdown(child.message),
		})),
		level: levelToString(diagnostic.level),
		message: diagnostic.message.renderPlainText(),
		spans: diagnostic.spans.all().map((labeled) => spanToJson(labeled.span, locator)),
		suggestions: diagnostic.suggestions.map((s) => ({ message: s.message, replacement: s.replacement })),
	}
	if (diagnostic.code !== null) out.code = diagnostic.code.toString()
	return out
}

/**
 * Machine-readable emitter. Diagnostics are collected and written as one
 * document by `emitSummary`, or by `flush` when no summary was requested.
 */
export class JsonEmitter implements Emitter {
	private readonly sink: OutputSink
	private readonly pretty: boolean
	private readonly diagnostics: JsonDiagnostic[] = []
	private readonly counter = new StatsCounter()
	private written = false

	constructor(sink: OutputSink, options: JsonEmitterOptions = {}) {
		this.sink = sink
		this.pretty = options.pretty ?? false
	}

	emit(diagnostic: Diagnostic, locator: SourceLocator | null): void {
		this.diagnostics.push(diagnosticToJson(diagnostic, locator))
		this.counter.record(diagnostic)
	}

	emitSummary(stats: DiagnosticStats): void {
		this.write(stats)
	}

	flush(): void {
		if (!this.written) this.write(this.counter.snapshot())
	}

	getDocument(stats: DiagnosticStats = this.counter.snapshot()): JsonDocument {
		return {
			diagnostics: [...this.diagnostics],
			stats: {
				error_count: stats.errorCount,
				note_count: stats.noteCount,
				unique_error_codes: stats.uniqueErrorCodes.map((code) => code.toString()),
				warning_count: stats.warningCount,
			},
		}
	}

	getOutput(stats?: DiagnosticStats): string {
		return JSON.stringify(this.getDocument(stats), null, this.pretty ? 2 : undefined)
	}

	private write(stats: DiagnosticStats): void {
		this.sink.write(`${this.getOutput(stats)}\n`)
		this.written = true
	}
}
