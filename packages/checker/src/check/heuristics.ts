/**
 * Call and predicate heuristics run on every resolved query.
 */

import type { FuncNode, QueryNode, ResolvedQuery, VarNode } from '../host/query.ts'
import { nodeChildren, walkQuery } from '../host/query.ts'
import { RelationKind } from '../host/types.ts'
import type { CheckState } from './state.ts'

const SEQUENCE_FUNCTIONS = new Set(['nextval', 'currval', 'setval'])

// =============================================================================
// FORMAT STRINGS
// =============================================================================

export type FormatConversion = 's' | 'I' | 'L' | 'width'

export interface FormatSpec {
	/** 0-based index into the arguments after the format string */
	readonly arg: number
	readonly conversion: FormatConversion
}

const SPEC_PATTERN = /(?:(\d+)\$)?-?(?:(\*)(?:(\d+)\$)?|\d+)?([sIL])/y

function toConversion(letter: string | undefined): FormatConversion | null {
	if (letter === 's' || letter === 'I' || letter === 'L') return letter
	return null
}

/**
 * Argument references of a `format()` string, or null when the string
 * is not a valid format.
 */
export function parseFormat(format: string): FormatSpec[] | null {
	const specs: FormatSpec[] = []
	let next = 0
	let i = 0
	while (i < format.length) {
		if (format[i] !== '%') {
			i++
			continue
		}
		if (format[i + 1] === '%') {
			i += 2
			continue
		}
		SPEC_PATTERN.lastIndex = i + 1
		const match = SPEC_PATTERN.exec(format)
		const conversion = toConversion(match?.[4])
		if (match === null || conversion === null) return null

		const [, position, star, starPosition] = match
		if (star !== undefined) {
			specs.push({ arg: starPosition ? Number(starPosition) - 1 : next++, conversion: 'width' })
		}
		if (position !== undefined) {
			const index = Number(position) - 1
			specs.push({ arg: index, conversion })
			next = index + 1
		} else {
			specs.push({ arg: next++, conversion })
		}
		i = SPEC_PATTERN.lastIndex
	}
	return specs
}

/** Constant text of a node, looking through casts. */
export function constantText(node: QueryNode | undefined): string | null {
	let current = node
	while (current?.kind === 'func' && current.form !== 'call' && current.args.length === 1) {
		current = current.args[0]
	}
	return current?.kind === 'const' ? current.value : null
}

function isBuiltinCall(node: QueryNode, names: ReadonlySet<string>): node is FuncNode {
	return (
		node.kind === 'func' &&
		node.form === 'call' &&
		node.routine.builtin &&
		names.has(node.routine.name)
	)
}

const FORMAT = new Set(['format'])

export function isFormatCall(node: QueryNode): node is FuncNode {
	return isBuiltinCall(node, FORMAT)
}

/**
 * Compare placeholders of `format()` calls with constant format strings
 * against the arguments passed.
 */
export function checkFormatCalls(state: CheckState, query: ResolvedQuery, text: string): void {
	walkQuery(query, {
		node: (node) => {
			if (!isFormatCall(node)) return
			const format = constantText(node.args[0])
			if (format === null) return
			const specs = parseFormat(format)
			if (specs === null) return
			const needed = specs.reduce((max, spec) => Math.max(max, spec.arg + 1), 0)
			const given = node.args.length - 1
			if (needed > given) {
				state.report('PCSQL004', undefined, { position: node.location, query: text })
			} else if (needed < given) {
				state.report('PCSQL005', undefined, { position: node.location, query: text })
			}
		},
	})
}

// =============================================================================
// SEQUENCES
// =============================================================================

/**
 * A constant relation argument of a sequence function must name a sequence.
 */
export function checkSequenceCalls(state: CheckState, query: ResolvedQuery, text: string): void {
	walkQuery(query, {
		node: (node) => {
			if (!isBuiltinCall(node, SEQUENCE_FUNCTIONS)) return
			const name = constantText(node.args[0])
			if (name === null) return
			const relation = state.findRelation(name)
			if (relation === null) {
				state.report(
					'PCSQL001',
					{ message: `relation "${name}" does not exist` },
					{ position: node.location, query: text, sqlstate: '42P01' }
				)
				return
			}
			if (relation.kind !== RelationKind.Sequence) {
				state.report('PCSQL003', { name }, { position: node.location, query: text })
			}
		},
	})
}

// =============================================================================
// IMPLICIT CASTS IN PREDICATES
// =============================================================================

function isCastColumn(node: QueryNode | undefined): boolean {
	return node?.kind === 'func' && node.form === 'implicit-cast' && node.args[0]?.kind === 'column'
}

function variableOf(node: QueryNode | undefined): VarNode | null {
	let current = node
	while (current?.kind === 'func' && current.form !== 'call' && current.args.length === 1) {
		current = current.args[0]
	}
	return current?.kind === 'var' ? current : null
}

function scanPredicate(state: CheckState, node: QueryNode, text: string): void {
	if (node.kind === 'op' && node.args.length === 2) {
		const [left, right] = node.args
		const variable = isCastColumn(left)
			? variableOf(right)
			: isCastColumn(right)
				? variableOf(left)
				: null
		if (variable) {
			state.report('PCPERF001', undefined, { position: variable.location, query: text })
		}
	}
	for (const child of nodeChildren(node)) scanPredicate(state, child, text)
}

/**
 * Find table columns implicitly cast to a variable's type in WHERE.
 * Such a predicate usually cannot use an index on the column.
 */
export function checkImplicitCasts(state: CheckState, query: ResolvedQuery, text: string): void {
	if (!state.options.heuristics.implicitCasts) return
	walkQuery(query, {
		query: (q) => {
			if (q.where) scanPredicate(state, q.where, text)
		},
	})
}
