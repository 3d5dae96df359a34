import { args, BaseCommand } from '@adonisjs/ace'
import { loadDefaultResources, parseLocale, Translator } from '@corvid/diagnostics'
import { explain, formatExplanation } from '../explain.ts'

export default class ExplainCommand extends BaseCommand {
	static override commandName = 'explain'
	static override description = 'Explain an error code, for example L1021'

	@args.string({ description: 'Error code' })
	declare code: string

	override async run(): Promise<void> {
		const translator = new Translator()
		loadDefaultResources(translator)
		const tag = process.env.LC_ALL ?? process.env.LANG
		if (tag !== undefined) translator.setLocale(parseLocale(tag))

		const entry = explain(this.code, translator)
		if (entry === undefined) {
			this.logger.error(`Unknown error code "${this.code}"`)
			this.exitCode = 1
			return
		}
		process.stdout.write(formatExplanation(entry))
	}
}
