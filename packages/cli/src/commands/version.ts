import { BaseCommand } from '@adonisjs/ace'
import { VERSION } from '../version.ts'

export default class VersionCommand extends BaseCommand {
	static override commandName = 'version'
	static override description = 'Print the corvid version'

	override async run(): Promise<void> {
		this.logger.log(`corvid version ${VERSION}`)
	}
}
