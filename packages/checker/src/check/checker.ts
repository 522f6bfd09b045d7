/**
 * Check entry point: resolve the routine, run one check, tear down.
 */

import type { Routine, RoutineRef } from '../host/ast.ts'
import type { CatalogBridge } from '../host/bridge.ts'
import type { Closing } from '../core/closing.ts'
import { ClosingStatus } from '../core/closing.ts'
import type { Diagnostic } from '../core/diagnostics.ts'
import { CheckCancelledError, InvalidInputError } from '../core/errors.ts'
import type { Dependency } from './dependencies.ts'
import {
	type CheckerProfile,
	type CheckOptionsInput,
	DEFAULT_PROFILE,
	profileForRoutine,
	resolveOptions,
} from './options.ts'
import { hasOutParams } from './returns.ts'
import { beginCheck, type CheckState, endCheck } from './state.ts'
import { reportUsage } from './usage.ts'
import { reportVolatility } from './volatility.ts'
import { checkStmt } from './walker.ts'

export interface CheckRequest {
	readonly routine: RoutineRef | Routine
	/** Relation a DML trigger is bound to */
	readonly triggerRelation?: string
	readonly options?: CheckOptionsInput
	/** Process-wide defaults; the routine's own settings apply on top */
	readonly profile?: CheckerProfile
}

export interface CheckResult {
	readonly routine: Routine
	/** False when checking is disabled for the routine */
	readonly checked: boolean
	readonly diagnostics: readonly Diagnostic[]
	readonly dependencies: readonly Dependency[]
	/** Informational output: pragma echo and status, disabled checker */
	readonly notices: readonly string[]
	readonly cancelled: boolean
	/** Verdict of the routine body, null when not checked */
	readonly closing: Closing | null
}

function describeRef(ref: RoutineRef): string {
	switch (ref.by) {
		case 'identity':
			return String(ref.identity)
		case 'signature':
			return ref.signature
		case 'name':
			return ref.name
	}
}

/**
 * Find exactly one routine for a reference.
 *
 * @throws InvalidInputError when none or several match
 */
export function resolveRoutine(bridge: CatalogBridge, ref: RoutineRef | Routine): Routine {
	if (!('by' in ref)) return ref
	const found = bridge.findRoutines(ref)
	const [routine] = found
	if (routine === undefined) {
		throw new InvalidInputError(`function "${describeRef(ref)}" does not exist`)
	}
	if (found.length > 1) {
		throw new InvalidInputError(`more than one function is named "${describeRef(ref)}"`)
	}
	return routine
}

/** Functions that must end in RETURN: no procedure, void, set or OUT result. */
export function mustReturn(routine: Routine): boolean {
	return (
		routine.kind === 'function' &&
		routine.trigger !== 'event' &&
		!routine.returnsSet &&
		routine.returnType.name !== 'void' &&
		!hasOutParams(routine)
	)
}

function rootSlots(routine: Routine): number[] {
	return routine.datums
		.filter((datum) => datum.kind !== 'recfield')
		.filter((datum) => datum.origin === 'param' || datum.origin === 'implicit')
		.map((datum) => datum.slot)
}

/**
 * Walk the routine body and run the end-of-routine checks.
 */
export function runCheck(state: CheckState): Closing {
	const routine = state.routine
	state.namespace.push('routine', routine.name, rootSlots(routine))
	const closing = checkStmt(state, routine.body)
	state.namespace.pop()
	if (state.stopped) return closing

	if (mustReturn(routine)) {
		if (closing.status === ClosingStatus.Unclosed) state.reportRoutine('PCFLOW002')
		if (closing.status === ClosingStatus.PossiblyClosed) state.reportRoutine('PCFLOW003')
	}
	reportUsage(state)
	reportVolatility(state)
	return closing
}

/**
 * Check one routine.
 *
 * @throws InvalidInputError for usage errors, before any statement is examined
 */
export function checkRoutine(bridge: CatalogBridge, request: CheckRequest): CheckResult {
	const routine = resolveRoutine(bridge, request.routine)
	const profile = profileForRoutine(request.profile ?? DEFAULT_PROFILE, routine.settings)

	if (profile.mode === 'disabled') {
		return {
			cancelled: false,
			checked: false,
			closing: null,
			dependencies: [],
			diagnostics: [],
			notices: ['checker is disabled'],
			routine,
		}
	}

	const options = resolveOptions({
		fatalErrors: profile.fatalErrors,
		...request.options,
		warnings: { ...profile.warnings, ...request.options?.warnings },
	})
	const state = beginCheck(bridge, routine, options, request.triggerRelation ?? null)

	let closing: Closing | null = null
	let cancelled = false
	let dependencies: Dependency[] = []
	try {
		closing = runCheck(state)
	} catch (error) {
		if (!(error instanceof CheckCancelledError)) throw error
		cancelled = true
	} finally {
		dependencies = state.dependencies.list()
		endCheck(state)
	}

	return {
		cancelled,
		checked: true,
		closing,
		dependencies,
		diagnostics: cancelled && state.stopped ? [] : [...state.diagnostics],
		notices: [...state.notices],
		routine,
	}
}
