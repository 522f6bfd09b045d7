/**
 * Exception conditions raised by RAISE and caught by handlers.
 */

import type { ConditionRef } from '../host/ast.ts'
import type { CheckState } from './state.ts'

export const DEFAULT_RAISE_CODE = 'P0001'

/** Conditions OTHERS does not catch: query cancellation and assertion failure. */
const NOT_CAUGHT_BY_OTHERS = new Set(['57014', 'P0004'])

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/

export function isSqlstate(value: string): boolean {
	return SQLSTATE_PATTERN.test(value)
}

/**
 * Condition code of a reference. `others` maps to null, as does an unknown
 * name (reported as an error).
 */
export function conditionCode(state: CheckState, ref: ConditionRef): string | null {
	if (ref.kind === 'sqlstate') return ref.code.toUpperCase()
	const name = ref.name.toLowerCase()
	if (name === 'others') return null
	const code = state.bridge.conditionCode(name)
	if (code === null) state.report('PCFLOW011', { name: ref.name })
	return code
}

function catchesCode(ref: ConditionRef, handlerCode: string | null, raised: string): boolean {
	if (ref.kind === 'name' && ref.name.toLowerCase() === 'others') {
		return !NOT_CAUGHT_BY_OTHERS.has(raised)
	}
	if (handlerCode === null) return false
	if (handlerCode.endsWith('000')) return raised.startsWith(handlerCode.slice(0, 2))
	return handlerCode === raised
}

export interface HandlerConditions {
	readonly refs: readonly ConditionRef[]
	readonly codes: readonly (string | null)[]
}

/** Resolve a handler's condition list once, reporting unknown names. */
export function resolveHandlerConditions(
	state: CheckState,
	refs: readonly ConditionRef[]
): HandlerConditions {
	return { codes: refs.map((ref) => conditionCode(state, ref)), refs }
}

export function handlerCatches(conditions: HandlerConditions, raised: string): boolean {
	return conditions.refs.some((ref, i) => catchesCode(ref, conditions.codes[i] ?? null, raised))
}
