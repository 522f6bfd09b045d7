/**
 * Diagnostic records produced by a check run.
 */

import {
	CHECKER_DIAGNOSTICS,
	type CheckerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticLevel,
	interpolateMessage,
	interpolateOptional,
} from '@plcheck/diagnostics'

export {
	type CheckerDiagnosticCode,
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticLevel,
} from '@plcheck/diagnostics'

export interface Diagnostic {
	/** Catalog code, e.g. `PCFLOW002` */
	readonly code: CheckerDiagnosticCode
	readonly level: DiagnosticLevel
	readonly sqlstate: string
	readonly message: string
	readonly detail?: string
	readonly hint?: string
	/** Statement line in the routine body; absent for routine-level findings */
	readonly line?: number
	/** Statement display name, `DECLARE` for declaration findings */
	readonly statement?: string
	/** 1-based offset of the problem inside `query` */
	readonly position?: number
	readonly query?: string
	readonly context?: string
}

/**
 * Overrides applied on top of the catalog entry when a diagnostic is built.
 */
export interface DiagnosticOverrides {
	readonly sqlstate?: string
	readonly detail?: string
	readonly hint?: string
	readonly position?: number
	readonly query?: string
	readonly context?: string
}

export function getCheckerDiagnostic(code: CheckerDiagnosticCode): DiagnosticDef {
	return CHECKER_DIAGNOSTICS[code]
}

/**
 * Build a diagnostic from its catalog entry. Location fields are added by
 * the check state, which knows the current statement.
 */
export function buildDiagnostic(
	code: CheckerDiagnosticCode,
	args?: DiagnosticArgs,
	overrides: DiagnosticOverrides = {}
): Diagnostic {
	const def = getCheckerDiagnostic(code)
	const detail = overrides.detail ?? interpolateOptional(def.detail, args)
	const hint = overrides.hint ?? interpolateOptional(def.hint, args)
	return {
		code,
		level: def.level,
		message: interpolateMessage(def.message, args),
		sqlstate: overrides.sqlstate ?? def.sqlstate,
		...(detail !== undefined ? { detail } : {}),
		...(hint !== undefined ? { hint } : {}),
		...(overrides.position !== undefined && overrides.position > 0
			? { position: overrides.position }
			: {}),
		...(overrides.query !== undefined ? { query: overrides.query } : {}),
		...(overrides.context !== undefined ? { context: overrides.context } : {}),
	}
}

export function isError(diagnostic: Diagnostic): boolean {
	return diagnostic.level === DiagnosticLevel.Error
}
