#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import ExplainCommand from './commands/explain.ts'
import LexCommand from './commands/lex.ts'
import VersionCommand from './commands/version.ts'
import { VERSION } from './version.ts'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'corvid')
	kernel.info.set('version', VERSION)

	kernel.addLoader(new ListLoader([LexCommand, ExplainCommand, VersionCommand, HelpCommand]))

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
