/**
 * SQL injection heuristic for dynamic SQL text.
 *
 * A string-typed variable reaching the text unquoted is unsafe unless it was
 * assigned only from sanitized values. Sanitizer functions come from the
 * heuristic options; `format()` is safe for `%I` and `%L` conversions.
 */

import type { QueryNode } from '../host/query.ts'
import { TypeCategory } from '../host/types.ts'
import { constantText, isFormatCall, parseFormat } from './heuristics.ts'
import type { CheckState } from './state.ts'

function isString(state: CheckState, node: QueryNode): boolean {
	const category = state.types.category(node.type)
	return category === TypeCategory.String || category === TypeCategory.Unknown
}

function firstUnsafe(state: CheckState, nodes: readonly QueryNode[]): QueryNode | null {
	for (const node of nodes) {
		const unsafe = findUnsafe(state, node)
		if (unsafe) return unsafe
	}
	return null
}

function unsafeFormatArgument(state: CheckState, args: readonly QueryNode[]): QueryNode | null {
	const format = constantText(args[0])
	const values = args.slice(1)
	if (format === null) return firstUnsafe(state, args)
	const specs = parseFormat(format)
	if (specs === null) return firstUnsafe(state, values)
	for (const spec of specs) {
		if (spec.conversion !== 's') continue
		const value = values[spec.arg]
		const unsafe = value ? findUnsafe(state, value) : null
		if (unsafe) return unsafe
	}
	return null
}

/**
 * The first node making an expression unsafe as SQL text, or null.
 */
export function findUnsafe(state: CheckState, node: QueryNode): QueryNode | null {
	switch (node.kind) {
		case 'const':
		case 'positional':
		case 'column':
			return null
		case 'var': {
			if (!isString(state, node)) return null
			if (node.field === null && state.datum(node.slot).safe) return null
			return node
		}
		case 'func': {
			const sanitizers = state.options.heuristics.sanitizers
			if (node.form === 'call' && sanitizers.includes(node.routine.name)) return null
			const call: QueryNode = node
			if (isFormatCall(call)) return unsafeFormatArgument(state, call.args)
			if (!isString(state, node)) return null
			return firstUnsafe(state, node.args)
		}
		case 'op':
		case 'bool':
		case 'other':
			if (!isString(state, node) && node.kind !== 'other') return null
			return firstUnsafe(state, node.args)
		case 'sublink':
			return node
	}
}

/**
 * Report the EXECUTE text expression when it is not injection safe.
 */
export function checkInjection(state: CheckState, node: QueryNode, text: string): void {
	const unsafe = findUnsafe(state, node)
	if (unsafe === null) return
	const position = { position: unsafe.location, query: text }
	if (unsafe.kind === 'var') {
		state.report('PCSEC001', undefined, position)
	} else {
		state.report('PCSEC002', undefined, position)
	}
}
