#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import CheckCommand from './commands/check.ts'
import CoverageCommand from './commands/coverage.ts'
import DepsCommand from './commands/deps.ts'
import ExplainCommand from './commands/explain.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'plcheck')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(
		new ListLoader([CheckCommand, DepsCommand, CoverageCommand, ExplainCommand, HelpCommand])
	)

	kernel.on('finding:command', async () => {
		console.log(`plcheck v${version}`)
		console.log('')
		console.log('Usage: plcheck [command] [options]')
		console.log('')
		console.log('Run "plcheck --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
	process.exitCode = kernel.exitCode ?? 0
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
