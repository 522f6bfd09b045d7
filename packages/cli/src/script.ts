import { readFile } from 'node:fs/promises'
import type { BaseCommand } from '@adonisjs/ace'
import { type LoadedScript, MemoryBridge } from '@plcheck/checker/memory'
import { formatReadError, formatScriptError } from './utils.ts'

export interface OpenedScript {
	readonly bridge: MemoryBridge
	readonly script: LoadedScript
}

/**
 * Read a definition script and load it into a fresh in-process catalog.
 * Failures are logged on the command, which gets exit code 1.
 */
export async function openScript(command: BaseCommand, path: string): Promise<OpenedScript | null> {
	let text: string
	try {
		text = await readFile(path, 'utf-8')
	} catch (error: unknown) {
		command.logger.error(formatReadError(path, error))
		command.exitCode = 1
		return null
	}

	try {
		const opened = MemoryBridge.fromScript(text)
		for (const problem of opened.script.problems) {
			command.logger.error(`${path}:${problem.line}: ${problem.object}: ${problem.message}`)
			command.exitCode = 1
		}
		return opened
	} catch (error: unknown) {
		command.logger.error(formatScriptError(error))
		command.exitCode = 1
		return null
	}
}
