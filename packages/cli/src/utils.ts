import {
	AnalysisFault,
	InvalidInputError,
	isOutputFormat,
	type OutputFormat,
	type RoutineRef,
	type StatementCounters,
	type WarningCategories,
} from '@plcheck/checker'
import { ScriptSyntaxError } from '@plcheck/checker/memory'
import {
	type DiagnosticDef,
	interpolateMessage,
	PCCLI001,
	PCCLI002,
	PCCLI003,
	PCCLI004,
	PCCLI005,
	PCCLI006,
	PCCLI007,
} from '@plcheck/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

function formatCliDiagnostic(def: DiagnosticDef, args: Record<string, string>): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliDiagnostic(PCCLI001, { path: filePath })
	}
	return formatCliDiagnostic(PCCLI002, { reason: getErrorMessage(error) })
}

export function formatScriptError(error: unknown): string {
	const reason =
		error instanceof ScriptSyntaxError
			? `line ${error.line}: ${error.message}`
			: getErrorMessage(error)
	return formatCliDiagnostic(PCCLI003, { reason })
}

export function formatFormatError(format: string): string {
	return formatCliDiagnostic(PCCLI004, { format })
}

export function formatCheckError(error: unknown): string {
	if (error instanceof InvalidInputError) {
		return formatCliDiagnostic(PCCLI005, { reason: error.message })
	}
	if (error instanceof AnalysisFault) {
		return formatCliDiagnostic(PCCLI006, { reason: `${error.error.sqlstate}: ${error.message}` })
	}
	return formatCliDiagnostic(PCCLI006, { reason: getErrorMessage(error) })
}

export function formatProfileError(reason: string): string {
	return formatCliDiagnostic(PCCLI007, { reason })
}

export function parseFormat(value: string): OutputFormat | null {
	const format = value.toLowerCase()
	return isOutputFormat(format) ? format : null
}

/**
 * Parse `name=type` pairs into a substitution map. Throws on a pair
 * without both sides.
 */
export function parseSubstitutions(pairs: readonly string[]): Record<string, string> {
	const substitutions: Record<string, string> = {}
	for (const pair of pairs) {
		const separator = pair.indexOf('=')
		const name = separator < 0 ? '' : pair.slice(0, separator).trim().toLowerCase()
		const type = separator < 0 ? '' : pair.slice(separator + 1).trim()
		if (name === '' || type === '') {
			throw new InvalidInputError(`substitution "${pair}" must have the form name=type`)
		}
		substitutions[name] = type
	}
	return substitutions
}

export interface WarningFlags {
	readonly other: boolean
	readonly extra: boolean
	readonly performance: boolean
	readonly security: boolean
	readonly compatibility: boolean
}

export function warningCategories(flags: WarningFlags): WarningCategories {
	return {
		compatibility: flags.compatibility,
		extra: flags.extra,
		other: flags.other,
		performance: flags.performance,
		security: flags.security,
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function counterField(entry: Record<string, unknown>, field: string, index: number): number {
	const value = entry[field]
	if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
		throw new Error(`statements[${index}].${field} must be a non-negative number`)
	}
	return value
}

/**
 * Read profiler counters from `{ "statements": [{ "stmtid", "execCount",
 * "totalTime", "maxTime" }] }`. Throws with the offending field.
 */
export function parseProfileCounters(text: string): Map<number, StatementCounters> {
	const document: unknown = JSON.parse(text)
	const statements: unknown = isRecord(document) ? document['statements'] : undefined
	if (!Array.isArray(statements)) {
		throw new Error('expected an object with a "statements" array')
	}
	const counters = new Map<number, StatementCounters>()
	statements.forEach((entry: unknown, index: number) => {
		if (!isRecord(entry)) throw new Error(`statements[${index}] must be an object`)
		const stmtId = counterField(entry, 'stmtid', index)
		counters.set(stmtId, {
			execCount: counterField(entry, 'execCount', index),
			maxTime: counterField(entry, 'maxTime', index),
			totalTime: counterField(entry, 'totalTime', index),
		})
	})
	return counters
}

export function formatPercent(ratio: number): string {
	return `${(ratio * 100).toFixed(1)}%`
}

/** A name with an argument list is a signature, anything else a plain name. */
export function routineRef(name: string): RoutineRef {
	return name.includes('(') ? { by: 'signature', signature: name } : { by: 'name', name }
}
