import type { Diagnostic } from '../diagnostic.ts'
import type { Emitter, OutputSink } from '../emitter.ts'
import type { SourceLocator } from '../source-locator.ts'
import type { DiagnosticStats } from '../stats.ts'
import { type AnsiStyle, AnsiRenderer, defaultStyle } from './ansi-renderer.ts'

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? '' : 's'}`
}

/**
 * Human-readable emitter. Each diagnostic is written as soon as it is emitted.
 */
export class TextEmitter implements Emitter {
	private readonly sink: OutputSink
	private readonly renderer: AnsiRenderer

	constructor(sink: OutputSink, style: AnsiStyle = defaultStyle()) {
		this.sink = sink
		this.renderer = new AnsiRenderer(style)
	}

	emit(diagnostic: Diagnostic, locator: SourceLocator | null): void {
		this.sink.write(this.renderer.renderDiagnostic(diagnostic, locator))
	}

	emitSummary(stats: DiagnosticStats): void {
		const { errorCount, warningCount, uniqueErrorCodes } = stats
		const r = this.renderer

		if (errorCount > 0) {
			let line = `${r.wrapBold(r.wrapColor('error', r.style.errorColor))}: aborting due to `
			line += errorCount === 1 ? '1 previous error' : `${errorCount} previous errors`
			if (warningCount > 0) {
				line += `; ${plural(warningCount, 'warning')} emitted`
			}
			this.sink.write(`\n${line}\n`)

			const first = uniqueErrorCodes[0]
			if (first !== undefined) {
				this.sink.write(`\nFor more information about this error, try \`corvid explain ${first.toString()}\`.\n`)
			}
			return
		}

		if (warningCount > 0) {
			const label = r.wrapBold(r.wrapColor('warning', r.style.warningColor))
			this.sink.write(`\n${label}: ${plural(warningCount, 'warning')} emitted\n`)
		}
	}

	/** Output is written eagerly, so there is nothing to flush. */
	flush(): void {}
}
