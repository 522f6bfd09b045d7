import { args, BaseCommand } from '@adonisjs/ace'
import { getDiagnostic, isValidDiagnosticCode } from '@plcheck/diagnostics'

export default class ExplainCommand extends BaseCommand {
	static override commandName = 'explain'
	static override description = 'Describe a diagnostic code'

	@args.string({ description: 'Diagnostic code, e.g. PCFLOW002' })
	declare code: string

	override async run(): Promise<void> {
		const code = this.code.toUpperCase()
		if (!isValidDiagnosticCode(code)) {
			this.logger.error(`unknown diagnostic code "${this.code}"`)
			this.exitCode = 1
			return
		}
		const def = getDiagnostic(code)
		console.log(`${def.code} (${def.level}, SQLSTATE ${def.sqlstate})`)
		console.log(`  ${def.message}`)
		console.log('')
		console.log(def.description)
		if (def.detail !== undefined) console.log(`Detail: ${def.detail}`)
		if (def.hint !== undefined) console.log(`Hint: ${def.hint}`)
	}
}
