import { args, BaseCommand, flags } from '@adonisjs/ace'
import { defaultIo, Driver } from '../driver.ts'
import { isOutputFormat } from '../utils.ts'

export default class LexCommand extends BaseCommand {
	static override commandName = 'lex'
	static override description = 'Tokenize a Corvid source file'

	@args.string({ description: 'Input .cz file to tokenize' })
	declare input: string

	@flags.boolean({ alias: 't', description: 'Keep whitespace and comments as token trivia' })
	declare trivia: boolean

	@flags.string({ alias: 'f', default: 'text', description: 'Token output format: text or json' })
	declare format: string

	@flags.string({ alias: 'o', description: 'Write tokens to this file instead of stdout' })
	declare output?: string

	@flags.string({ default: 'text', description: 'Diagnostic output format: text or json' })
	declare diagnosticFormat: string

	@flags.boolean({ default: true, description: 'Colorize diagnostics', showNegatedVariantInHelp: true })
	declare color: boolean

	@flags.boolean({ description: 'Treat warnings as errors' })
	declare werror: boolean

	@flags.number({ default: 0, description: 'Stop reporting after this many errors (0 for no limit)' })
	declare maxErrors: number

	@flags.string({ description: 'Message locale, for example en or zh-CN' })
	declare locale?: string

	@flags.boolean({ alias: 'v', description: 'Log a summary line' })
	declare verbose: boolean

	@flags.boolean({ alias: 'q', description: 'Suppress info lines and the diagnostic summary' })
	declare quiet: boolean

	override async run(): Promise<void> {
		const { diagnosticFormat, format } = this
		if (!isOutputFormat(format)) {
			this.logger.error(`Invalid format "${format}". Use "text" or "json".`)
			this.exitCode = 1
			return
		}
		if (!isOutputFormat(diagnosticFormat)) {
			this.logger.error(`Invalid diagnostic format "${diagnosticFormat}". Use "text" or "json".`)
			this.exitCode = 1
			return
		}

		const driver = new Driver(
			{
				colorOutput: this.color,
				diagnosticFormat,
				format,
				input: this.input,
				locale: this.locale ?? process.env.LC_ALL ?? process.env.LANG,
				maxErrors: this.maxErrors,
				output: this.output,
				preserveTrivia: this.trivia,
				quiet: this.quiet,
				treatWarningsAsErrors: this.werror,
				verbose: this.verbose,
			},
			defaultIo(this.logger)
		)
		this.exitCode = await driver.runLexer()
	}
}
