import { args, BaseCommand, flags } from '@adonisjs/ace'
import {
	type CheckOptionsInput,
	type CheckResult,
	checkRoutine,
	isError,
	type OutputFormat,
	type Routine,
	renderReport,
} from '@plcheck/checker'
import { type MemoryBridge, PROCEDURAL_LANGUAGE } from '@plcheck/checker/memory'
import { openScript } from '../script.ts'
import {
	formatCheckError,
	formatFormatError,
	parseFormat,
	parseSubstitutions,
	routineRef,
	warningCategories,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check the procedural routines of a definition script'

	@args.string({ description: 'SQL script with the definitions to check' })
	declare input: string

	@flags.string({ alias: 'f', description: 'Check only this routine (name or signature)' })
	declare function?: string

	@flags.string({ default: 'text', description: 'Report format: text, json, xml or tabular' })
	declare format: string

	@flags.boolean({ description: 'Stop at the first error' })
	declare fatalErrors: boolean

	@flags.boolean({ description: 'Report performance warnings' })
	declare performance: boolean

	@flags.boolean({ description: 'Report security warnings' })
	declare security: boolean

	@flags.boolean({ description: 'Report compatibility warnings' })
	declare compatibility: boolean

	@flags.boolean({
		default: true,
		description: 'Report extra warnings',
		showNegatedVariantInHelp: true,
	})
	declare extra: boolean

	@flags.boolean({
		default: true,
		description: 'Report other warnings',
		showNegatedVariantInHelp: true,
	})
	declare other: boolean

	@flags.string({ description: 'Relation a trigger routine is checked against' })
	declare triggerRelation?: string

	@flags.array({ description: 'Polymorphic type substitution, e.g. anyelement=integer' })
	declare substitute?: string[]

	private checkOne(
		bridge: MemoryBridge,
		target: Routine | string,
		options: CheckOptionsInput
	): CheckResult | null {
		try {
			return checkRoutine(bridge, {
				options,
				routine: typeof target === 'string' ? routineRef(target) : target,
				...(this.triggerRelation ? { triggerRelation: this.triggerRelation } : {}),
			})
		} catch (error: unknown) {
			this.logger.error(formatCheckError(error))
			this.exitCode = 1
			return null
		}
	}

	private buildOptions(): CheckOptionsInput | null {
		const format = parseFormat(this.format)
		if (format === null) {
			this.logger.error(formatFormatError(this.format))
			this.exitCode = 1
			return null
		}
		try {
			return {
				fatalErrors: this.fatalErrors,
				format,
				substitutions: parseSubstitutions(this.substitute ?? []),
				warnings: warningCategories(this),
			}
		} catch (error: unknown) {
			this.logger.error(formatCheckError(error))
			this.exitCode = 1
			return null
		}
	}

	private report(result: CheckResult, format: OutputFormat): void {
		for (const notice of result.notices) {
			this.logger.info(notice)
		}
		if (result.cancelled) {
			this.logger.warning(`check of ${result.routine.signature} was cancelled`)
		}
		if (result.diagnostics.length > 0 || format !== 'text') {
			console.log(renderReport(format, result.routine.identity, result.diagnostics))
		}
		if (result.diagnostics.some(isError)) {
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const options = this.buildOptions()
		if (options === null) return

		const opened = await openScript(this, this.input)
		if (opened === null) return

		const targets =
			this.function !== undefined
				? [this.function]
				: opened.script.routines.filter((routine) => routine.language === PROCEDURAL_LANGUAGE)
		if (targets.length === 0) {
			this.logger.info('no procedural routines to check')
			return
		}

		for (const target of targets) {
			const result = this.checkOne(opened.bridge, target, options)
			if (result !== null) this.report(result, options.format ?? 'text')
		}
	}
}
