/**
 * Runs one `corvid lex` invocation: builds the diagnostics context from the
 * options, lexes the input and writes tokens. Returns the process exit code.
 */

import { writeFile } from 'node:fs/promises'
import {
	D0010,
	defaultStyle,
	DiagContext,
	type Emitter,
	JsonEmitter,
	loadDefaultResources,
	noColorStyle,
	type OutputSink,
	parseLocale,
	TextEmitter,
	Translator,
} from '@corvid/diagnostics'
import { createFormatter } from './output/formatter.ts'
import { LexerPhase } from './phases/lexer.ts'
import { driverFailure, getErrorMessage, type OutputFormat } from './utils.ts'

export interface DriverOptions {
	readonly input: string
	/** Token output file; stdout when undefined */
	readonly output: string | undefined
	readonly format: OutputFormat
	readonly diagnosticFormat: OutputFormat
	readonly preserveTrivia: boolean
	readonly colorOutput: boolean
	readonly treatWarningsAsErrors: boolean
	readonly maxErrors: number
	/** Locale tag such as `zh_CN.UTF-8`; English when undefined */
	readonly locale: string | undefined
	readonly verbose: boolean
	readonly quiet: boolean
}

export interface DriverLogger {
	info(message: string): void
}

export interface DriverIo {
	readonly stdout: OutputSink
	readonly stderr: OutputSink
	readonly writeFile: (path: string, content: string) => Promise<void>
	readonly logger: DriverLogger
}

export function defaultIo(logger: DriverLogger): DriverIo {
	return {
		logger,
		stderr: process.stderr,
		stdout: process.stdout,
		writeFile: (path, content) => writeFile(path, content, 'utf-8'),
	}
}

export class Driver {
	constructor(
		private readonly options: DriverOptions,
		private readonly io: DriverIo
	) {}

	async runLexer(): Promise<number> {
		const { options } = this
		const dcx = this.createContext()
		const phase = new LexerPhase(dcx, { preserveTrivia: options.preserveTrivia })

		const result = await phase.runOnFile(options.input)
		let tokenCount = 0
		if (!result.ok) {
			dcx.error(result.error.code, result.error.message)
		} else if (!result.value.hasErrors) {
			tokenCount = result.value.tokens.length
			const text = createFormatter(options.format).format(result.value.tokens, phase.sourceManager)
			await this.writeTokens(dcx, text)
		}

		if (!options.quiet) dcx.emitSummary()
		dcx.flush()

		if (options.verbose && !options.quiet) {
			this.io.logger.info(`lexed ${options.input}: ${tokenCount} tokens, ${dcx.errorCount()} errors`)
		}
		return dcx.hasErrors() ? 1 : 0
	}

	private createContext(): DiagContext {
		const { options } = this
		const translator = new Translator()
		loadDefaultResources(translator)
		if (options.locale !== undefined) translator.setLocale(parseLocale(options.locale))

		return new DiagContext(this.createEmitter(), {
			config: {
				colorOutput: options.colorOutput,
				maxErrors: options.maxErrors,
				treatWarningsAsErrors: options.treatWarningsAsErrors,
			},
			translator,
		})
	}

	private createEmitter(): Emitter {
		const { options, io } = this
		if (options.diagnosticFormat === 'json') return new JsonEmitter(io.stderr)
		return new TextEmitter(io.stderr, options.colorOutput ? defaultStyle() : noColorStyle())
	}

	private async writeTokens(dcx: DiagContext, text: string): Promise<void> {
		const path = this.options.output
		if (path === undefined) {
			this.io.stdout.write(text)
			return
		}
		try {
			await this.io.writeFile(path, text)
		} catch (error: unknown) {
			const failure = driverFailure(D0010, { path, reason: getErrorMessage(error) })
			dcx.error(failure.code, failure.message)
		}
	}
}
