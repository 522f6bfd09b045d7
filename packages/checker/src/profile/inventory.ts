/**
 * Statement and branch inventory of a routine, used to relate profiler
 * counters to the statement tree.
 */

import { childLists, type Routine, type Stmt, stmtTypeName } from '../host/ast.ts'

export interface StatementInfo {
	readonly id: number
	readonly parent: number | null
	readonly line: number
	readonly name: string
	readonly depth: number
}

/**
 * One way control can go at a branching statement. `first` is the first
 * statement of the branch; an implicit ELSE has none and is derived from
 * its parent's count minus the explicit branches in `siblings`. Branches
 * without statements cannot be measured and are left out.
 */
export interface BranchInfo {
	readonly owner: number
	readonly label: string
	readonly first: number | null
	readonly siblings: readonly number[]
}

export interface StatementInventory {
	/** Every statement except the routine's outer block, in source order */
	readonly statements: readonly StatementInfo[]
	readonly branches: readonly BranchInfo[]
}

function firstId(stmts: readonly Stmt[]): number | null {
	return stmts[0]?.id ?? null
}

function branchesOf(stmt: Stmt): BranchInfo[] {
	const owner = stmt.id
	switch (stmt.kind) {
		case 'if': {
			const explicit = [
				{ first: firstId(stmt.then), label: 'then' },
				...stmt.elsifs.map((clause, i) => ({
					first: firstId(clause.body),
					label: `elsif ${i + 1}`,
				})),
			]
			return withElse(owner, explicit, stmt.otherwise)
		}
		case 'case': {
			const explicit = stmt.whens.map((when, i) => ({
				first: firstId(when.body),
				label: `when ${i + 1}`,
			}))
			return withElse(owner, explicit, stmt.otherwise)
		}
		case 'loop':
		case 'while':
		case 'fori':
		case 'fors':
		case 'forc':
		case 'dynfors':
		case 'foreach': {
			const first = firstId(stmt.body)
			return first === null ? [] : [{ first, label: 'loop body', owner, siblings: [] }]
		}
		default:
			return []
	}
}

function withElse(
	owner: number,
	explicit: readonly { first: number | null; label: string }[],
	otherwise: readonly Stmt[] | null
): BranchInfo[] {
	const branches: BranchInfo[] = explicit
		.filter((branch) => branch.first !== null)
		.map((branch) => ({ ...branch, owner, siblings: [] }))
	if (otherwise) {
		const first = firstId(otherwise)
		if (first !== null) branches.push({ first, label: 'else', owner, siblings: [] })
		return branches
	}
	const firsts = explicit.map((branch) => branch.first)
	const siblings = firsts.filter((id): id is number => id !== null)
	if (siblings.length === firsts.length) {
		branches.push({ first: null, label: 'else', owner, siblings })
	}
	return branches
}

export function statementInventory(routine: Routine): StatementInventory {
	const statements: StatementInfo[] = []
	const branches: BranchInfo[] = []

	const visit = (stmt: Stmt, parent: number | null, depth: number): void => {
		statements.push({ depth, id: stmt.id, line: stmt.line, name: stmtTypeName(stmt), parent })
		branches.push(...branchesOf(stmt))
		for (const list of childLists(stmt)) {
			for (const child of list) visit(child, stmt.id, depth + 1)
		}
	}

	for (const list of childLists(routine.body)) {
		for (const stmt of list) visit(stmt, null, 0)
	}
	return { branches, statements }
}
