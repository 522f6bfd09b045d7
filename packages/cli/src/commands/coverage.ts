import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	coverage,
	resolveRoutine,
	type Routine,
	type StatementCounters,
	statementInventory,
} from '@plcheck/checker'
import { openScript } from '../script.ts'
import {
	formatCheckError,
	formatPercent,
	formatProfileError,
	formatReadError,
	getErrorMessage,
	parseProfileCounters,
	routineRef,
} from '../utils.ts'

export default class CoverageCommand extends BaseCommand {
	static override commandName = 'coverage'
	static override description = 'Statement and branch coverage of a routine from profiler counters'

	@args.string({ description: 'SQL script with the definitions' })
	declare input: string

	@flags.string({ alias: 'f', description: 'Routine name or signature', required: true })
	declare function: string

	@flags.string({ alias: 'p', description: 'JSON file with statement counters', required: true })
	declare profile: string

	private async readCounters(): Promise<Map<number, StatementCounters> | null> {
		let text: string
		try {
			text = await readFile(this.profile, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.profile, error))
			this.exitCode = 1
			return null
		}
		try {
			return parseProfileCounters(text)
		} catch (error: unknown) {
			this.logger.error(formatProfileError(getErrorMessage(error)))
			this.exitCode = 1
			return null
		}
	}

	private printStatements(
		routine: Routine,
		counters: ReadonlyMap<number, StatementCounters>
	): void {
		const inventory = statementInventory(routine)
		for (const stmt of inventory.statements) {
			const count = counters.get(stmt.id)?.execCount ?? 0
			const indent = '  '.repeat(stmt.depth)
			const line = String(stmt.line).padStart(5)
			console.log(`${line} ${String(count).padStart(8)}  ${indent}${stmt.name}`)
		}
		const result = coverage(inventory, counters)
		console.log('')
		const statements = `${result.executedStatements}/${result.totalStatements}`
		const branches = `${result.executedBranches}/${result.totalBranches}`
		console.log(`statements: ${statements} (${formatPercent(result.statements)})`)
		console.log(`branches: ${branches} (${formatPercent(result.branches)})`)
	}

	override async run(): Promise<void> {
		const opened = await openScript(this, this.input)
		if (opened === null) return

		let routine: Routine
		try {
			routine = resolveRoutine(opened.bridge, routineRef(this.function))
		} catch (error: unknown) {
			this.logger.error(formatCheckError(error))
			this.exitCode = 1
			return
		}

		const counters = await this.readCounters()
		if (counters === null) return

		this.printStatements(routine, counters)
	}
}
