import { args, BaseCommand, flags } from '@adonisjs/ace'
import { checkRoutine, DEPENDENCY_COLUMNS, dependencyRows, renderTable } from '@plcheck/checker'
import { openScript } from '../script.ts'
import { formatCheckError, routineRef } from '../utils.ts'

export default class DepsCommand extends BaseCommand {
	static override commandName = 'deps'
	static override description = 'List the relations, routines and operators a routine uses'

	@args.string({ description: 'SQL script with the definitions' })
	declare input: string

	@flags.string({ alias: 'f', description: 'Routine name or signature', required: true })
	declare function: string

	@flags.string({ description: 'Relation a trigger routine is checked against' })
	declare triggerRelation?: string

	override async run(): Promise<void> {
		const opened = await openScript(this, this.input)
		if (opened === null) return

		try {
			const result = checkRoutine(opened.bridge, {
				routine: routineRef(this.function),
				...(this.triggerRelation ? { triggerRelation: this.triggerRelation } : {}),
			})
			console.log(renderTable(DEPENDENCY_COLUMNS, dependencyRows(result.dependencies)))
		} catch (error: unknown) {
			this.logger.error(formatCheckError(error))
			this.exitCode = 1
		}
	}
}
