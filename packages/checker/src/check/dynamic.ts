/**
 * Dynamic SQL: EXECUTE, FOR ... IN EXECUTE, OPEN ... FOR EXECUTE and
 * RETURN QUERY EXECUTE.
 *
 * A constant query string is analyzed like static SQL with `$n` bound to
 * the USING values. Anything else is opaque: record targets degrade and
 * the text goes through the injection heuristic.
 */

import type { IntoClause, SqlFragment } from '../host/ast.ts'
import type { ResolvedQuery } from '../host/query.ts'
import { walkQuery } from '../host/query.ts'
import type { TypeRef } from '../host/types.ts'
import { checkInjection } from './injection.ts'
import { degradeRecord } from './records.ts'
import { analyzeText, assignInto, checkExprAsRvalue } from './resolver.ts'
import type { CheckState } from './state.ts'

export interface DynamicQuery {
	/** Resolved tree of a constant query string, null when opaque */
	readonly query: ResolvedQuery | null
}

function usedPositionals(query: ResolvedQuery): Set<number> {
	const used = new Set<number>()
	walkQuery(query, {
		node: (node) => {
			if (node.kind === 'positional') used.add(node.index)
		},
	})
	return used
}

/**
 * Resolve a dynamic query and its USING values.
 */
export function checkDynamicQuery(
	state: CheckState,
	fragment: SqlFragment,
	params: readonly SqlFragment[]
): DynamicQuery {
	const text = checkExprAsRvalue(state, fragment)
	const positional: TypeRef[] = params.map((param) => checkExprAsRvalue(state, param).type)

	const node = text.node
	if (node?.kind === 'const' && node.value !== null) {
		if (params.length === 0) state.report('PCDYN002')
		const query = analyzeText(state, node.value, 'statement', positional)
		const used = usedPositionals(query)
		if (params.some((_, i) => !used.has(i + 1))) state.report('PCDYN003')
		if (query.transactionControl) state.report('PCSQL006')
		return { query }
	}

	state.volatility.markDynamic()
	if (node) checkInjection(state, node, fragment.text)
	return { query: null }
}

/**
 * Targets filled by an opaque query. Record targets lose their shape
 * unless a pragma pinned it.
 */
export function degradeTargets(state: CheckState, targets: readonly number[]): void {
	for (const slot of targets) {
		state.usage.markWrite(slot)
		if (degradeRecord(state, slot)) state.report('PCDYN004')
	}
}

/**
 * Check `EXECUTE text [INTO targets] [USING params]`.
 */
export function checkDynamicExecute(
	state: CheckState,
	fragment: SqlFragment,
	into: IntoClause | null,
	params: readonly SqlFragment[]
): void {
	const { query } = checkDynamicQuery(state, fragment, params)
	if (!into) return
	if (query === null) {
		degradeTargets(state, into.targets)
		return
	}
	if (!query.returnsData) {
		state.report('PCREC009')
		return
	}
	assignInto(state, into.targets, query.columns)
}
