/**
 * Relations, routines and operators a routine depends on.
 */

import type { ResolvedQuery } from '../host/query.ts'
import { walkQuery } from '../host/query.ts'
import type { TypeRef, TypeSystem } from '../host/types.ts'

export type DependencyKind = 'RELATION' | 'FUNCTION' | 'PROCEDURE' | 'OPERATOR'

export interface Dependency {
	readonly kind: DependencyKind
	readonly identity: number
	readonly schema: string
	readonly name: string
	/** Rendered parameter types: `(integer,text)`; null for relations */
	readonly params: string | null
}

export class DependencyCollector {
	private readonly seen = new Map<string, Dependency>()

	/** Add a dependency unless one with the same kind and identity exists. */
	add(dependency: Dependency): void {
		const key = `${dependency.kind}:${dependency.identity}`
		if (!this.seen.has(key)) this.seen.set(key, dependency)
	}

	/** Dependencies in discovery order. */
	list(): Dependency[] {
		return [...this.seen.values()]
	}

	get size(): number {
		return this.seen.size
	}

	clear(): void {
		this.seen.clear()
	}
}

function operatorSide(types: TypeSystem, type: TypeRef | null): string {
	return type ? types.format(type) : '-'
}

/**
 * Collect the dependencies of one resolved query. Built-in routines and
 * operators are skipped. Relations declared by a `table:` or `sequence:`
 * directive are listed under `pg_temp` with a negative identity.
 */
export function collectDependencies(
	collector: DependencyCollector,
	query: ResolvedQuery,
	types: TypeSystem
): void {
	walkQuery(query, {
		node: (node) => {
			if (node.kind === 'func' && !node.routine.builtin && node.form === 'call') {
				const routine = node.routine
				collector.add({
					identity: routine.identity,
					kind: routine.kind === 'procedure' ? 'PROCEDURE' : 'FUNCTION',
					name: routine.name,
					params: `(${routine.args.map((type) => types.format(type)).join(',')})`,
					schema: routine.schema,
				})
			}
			if (node.kind === 'op' && !node.operator.builtin) {
				const operator = node.operator
				collector.add({
					identity: operator.identity,
					kind: 'OPERATOR',
					name: operator.name,
					params: `(${operatorSide(types, operator.left)},${operatorSide(types, operator.right)})`,
					schema: operator.schema,
				})
			}
		},
		query: (q) => {
			for (const relation of q.relations) {
				collector.add({
					identity: relation.identity,
					kind: 'RELATION',
					name: relation.name,
					params: null,
					schema: relation.schema,
				})
			}
		},
	})
}
