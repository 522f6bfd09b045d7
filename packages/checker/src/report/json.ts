import type { Diagnostic } from '../core/diagnostics.ts'

interface JsonIssue {
	level: string
	message: string
	statement?: { lineNumber: string; text: string }
	hint?: string
	detail?: string
	query?: { position: string; text: string }
	context?: string
	sqlState: string
}

function toIssue(diagnostic: Diagnostic): JsonIssue {
	return {
		level: diagnostic.level,
		message: diagnostic.message,
		...(diagnostic.line !== undefined && diagnostic.statement
			? { statement: { lineNumber: String(diagnostic.line), text: diagnostic.statement } }
			: {}),
		...(diagnostic.hint !== undefined ? { hint: diagnostic.hint } : {}),
		...(diagnostic.detail !== undefined ? { detail: diagnostic.detail } : {}),
		...(diagnostic.query !== undefined
			? { query: { position: String(diagnostic.position ?? 0), text: diagnostic.query } }
			: {}),
		...(diagnostic.context !== undefined ? { context: diagnostic.context } : {}),
		sqlState: diagnostic.sqlstate,
	}
}

/**
 * JSON document with the routine identity and one issue per diagnostic.
 */
export function renderJson(identity: number, diagnostics: readonly Diagnostic[]): string {
	return JSON.stringify({ function: String(identity), issues: diagnostics.map(toIssue) }, null, 2)
}
