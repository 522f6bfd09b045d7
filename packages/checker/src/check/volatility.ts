/**
 * Volatility inference: the strictest class the routine could be marked
 * with, given what its queries touch.
 */

import type { ResolvedQuery } from '../host/query.ts'
import { walkQuery } from '../host/query.ts'
import { Volatility, weakerVolatility } from '../host/types.ts'
import type { CheckState } from './state.ts'

export class VolatilityTracker {
	private inferred: Volatility = Volatility.Immutable
	private dynamicSql = false

	get current(): Volatility {
		return this.inferred
	}

	get usesDynamicSql(): boolean {
		return this.dynamicSql
	}

	observe(volatility: Volatility): void {
		this.inferred = weakerVolatility(this.inferred, volatility)
	}

	markDynamic(): void {
		this.dynamicSql = true
	}

	/** Fold everything a resolved query reads, writes or calls. */
	observeQuery(query: ResolvedQuery): void {
		walkQuery(query, {
			node: (node) => {
				if (node.kind === 'func') this.observe(node.routine.volatility)
				if (node.kind === 'op') this.observe(node.operator.volatility)
			},
			query: (q) => {
				if (q.command === 'insert' || q.command === 'update' || q.command === 'delete') {
					this.observe(Volatility.Volatile)
				} else if (q.relations.length > 0) {
					this.observe(Volatility.Stable)
				}
			},
		})
	}

	clear(): void {
		this.inferred = Volatility.Immutable
		this.dynamicSql = false
	}
}

function suggestion(state: CheckState): Volatility | null {
	const routine = state.routine
	const inferred = state.volatility.current
	if (routine.volatility === Volatility.Volatile) {
		if (inferred === Volatility.Immutable) return inferred
		if (inferred === Volatility.Stable && routine.returnType.name !== 'void') return inferred
		return null
	}
	if (routine.volatility === Volatility.Stable && inferred === Volatility.Immutable) {
		return inferred
	}
	return null
}

/**
 * Advise a stricter volatility class. Functions only: triggers, procedures
 * and set-returning functions are skipped.
 */
export function reportVolatility(state: CheckState): void {
	const routine = state.routine
	if (routine.kind !== 'function' || routine.trigger !== 'none' || routine.returnsSet) return

	const inferred = suggestion(state)
	if (inferred === null) return
	state.reportRoutine(
		'PCPERF002',
		{ inferred: inferred.toUpperCase(), marked: routine.volatility.toUpperCase() },
		state.volatility.usesDynamicSql
			? { detail: 'attention: cannot to determine volatility of used dynamic SQL' }
			: {}
	)
}
