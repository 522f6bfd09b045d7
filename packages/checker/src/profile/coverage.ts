import type { StatementInventory } from './inventory.ts'
import type { StatementCounters } from './store.ts'

export interface Coverage {
	readonly executedStatements: number
	readonly totalStatements: number
	readonly executedBranches: number
	readonly totalBranches: number
	/** executed / total, 1 when there is nothing to cover */
	readonly statements: number
	readonly branches: number
}

function ratio(executed: number, total: number): number {
	return total === 0 ? 1 : executed / total
}

/**
 * Statement and branch coverage of one routine version.
 */
export function coverage(
	inventory: StatementInventory,
	counters: ReadonlyMap<number, StatementCounters>
): Coverage {
	const count = (id: number): number => counters.get(id)?.execCount ?? 0

	const executedStatements = inventory.statements.filter((stmt) => count(stmt.id) > 0).length
	const totalStatements = inventory.statements.length

	let executedBranches = 0
	for (const branch of inventory.branches) {
		const executions =
			branch.first !== null
				? count(branch.first)
				: count(branch.owner) - branch.siblings.reduce((sum, id) => sum + count(id), 0)
		if (executions > 0) executedBranches++
	}
	const totalBranches = inventory.branches.length

	return {
		branches: ratio(executedBranches, totalBranches),
		executedBranches,
		executedStatements,
		statements: ratio(executedStatements, totalStatements),
		totalBranches,
		totalStatements,
	}
}
