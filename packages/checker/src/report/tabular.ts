/**
 * Row-per-diagnostic and row-per-dependency tables.
 */

import type { Dependency } from '../check/dependencies.ts'
import type { Diagnostic } from '../core/diagnostics.ts'

export interface DiagnosticRow {
	readonly functionid: number
	readonly lineno: number | null
	readonly statement: string | null
	readonly sqlstate: string
	readonly message: string
	readonly detail: string | null
	readonly hint: string | null
	readonly level: string
	readonly position: number | null
	readonly query: string | null
	readonly context: string | null
}

export const DIAGNOSTIC_COLUMNS: readonly (keyof DiagnosticRow)[] = [
	'functionid',
	'lineno',
	'statement',
	'sqlstate',
	'message',
	'detail',
	'hint',
	'level',
	'position',
	'query',
	'context',
]

export function diagnosticRows(
	identity: number,
	diagnostics: readonly Diagnostic[]
): DiagnosticRow[] {
	return diagnostics.map((diagnostic) => ({
		context: diagnostic.context ?? null,
		detail: diagnostic.detail ?? null,
		functionid: identity,
		hint: diagnostic.hint ?? null,
		level: diagnostic.level,
		lineno: diagnostic.line ?? null,
		message: diagnostic.message,
		position: diagnostic.position ?? null,
		query: diagnostic.query ?? null,
		sqlstate: diagnostic.sqlstate,
		statement: diagnostic.statement ?? null,
	}))
}

export interface DependencyRow {
	readonly type: string
	readonly oid: number
	readonly schema: string
	readonly name: string
	readonly params: string | null
}

export const DEPENDENCY_COLUMNS: readonly (keyof DependencyRow)[] = [
	'type',
	'oid',
	'schema',
	'name',
	'params',
]

/** Dependency rows ordered by type, schema and name. */
export function dependencyRows(dependencies: readonly Dependency[]): DependencyRow[] {
	return dependencies
		.map((dependency) => ({
			name: dependency.name,
			oid: dependency.identity,
			params: dependency.params,
			schema: dependency.schema,
			type: dependency.kind,
		}))
		.sort(
			(a, b) =>
				a.type.localeCompare(b.type) ||
				a.schema.localeCompare(b.schema) ||
				a.name.localeCompare(b.name)
		)
}

/**
 * Render rows as a `|` separated table with a header line.
 */
export function renderTable<Row extends object>(
	columns: readonly (keyof Row & string)[],
	rows: readonly Row[]
): string {
	const cells = (row: Row): string[] =>
		columns.map((column) => {
			const value: unknown = row[column]
			return value === null || value === undefined ? '' : String(value)
		})
	return [columns.join(' | '), ...rows.map((row) => cells(row).join(' | '))].join('\n')
}
