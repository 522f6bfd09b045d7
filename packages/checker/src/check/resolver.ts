/**
 * Expression and query resolution.
 *
 * Every embedded fragment goes to the host with the variables visible at
 * the current statement. Host errors abort the statement as an
 * AnalysisFault; resolved trees feed usage tracking, the heuristics, the
 * dependency collector and volatility inference.
 */

import type { IntoClause, SqlFragment } from '../host/ast.ts'
import type { AnalyzeMode, HostError } from '../host/bridge.ts'
import type { QueryNode, ResolvedQuery } from '../host/query.ts'
import { walkQuery } from '../host/query.ts'
import {
	type Column,
	isUnresolved,
	sameType,
	type TupleShape,
	TypeCategory,
	type TypeRef,
	typeRef,
} from '../host/types.ts'
import { AnalysisFault } from '../core/errors.ts'
import { collectDependencies } from './dependencies.ts'
import { checkFormatCalls, checkImplicitCasts, checkSequenceCalls } from './heuristics.ts'
import { findUnsafe } from './injection.ts'
import { assignTupdesc, checkTarget, RECORD_TYPE, type TargetType } from './records.ts'
import type { CheckState } from './state.ts'

export const BOOLEAN_TYPE: TypeRef = typeRef('boolean')

// =============================================================================
// HOST CALLS
// =============================================================================

/** Report a host error at the current statement. */
export function reportHostError(
	state: CheckState,
	error: HostError,
	query: string | null
): void {
	state.report(
		'PCSQL001',
		{ message: error.message },
		{
			...(query !== null ? { query } : {}),
			sqlstate: error.sqlstate,
			...(error.detail !== undefined ? { detail: error.detail } : {}),
			...(error.hint !== undefined ? { hint: error.hint } : {}),
			...(error.position !== undefined ? { position: error.position } : {}),
			...(error.context !== undefined ? { context: error.context } : {}),
		}
	)
}

function markReads(state: CheckState, query: ResolvedQuery): void {
	walkQuery(query, {
		node: (node) => {
			if (node.kind === 'var') state.usage.markRead(node.slot)
		},
	})
}

/**
 * Analyze SQL text against the current variables.
 *
 * @throws AnalysisFault when the host rejects the text
 */
export function analyzeText(
	state: CheckState,
	text: string,
	mode: AnalyzeMode,
	positional?: readonly TypeRef[]
): ResolvedQuery {
	state.pollCancel()
	const result = state.bridge.analyze({
		mode,
		syntheticRelations: state.syntheticRelations,
		text,
		transitionTables: state.transitionTables,
		variables: state.variableBindings(),
		...(positional ? { positional } : {}),
	})
	if (!result.ok) throw new AnalysisFault(result.error, text)

	const query = result.query
	markReads(state, query)
	checkSequenceCalls(state, query, text)
	checkFormatCalls(state, query, text)
	checkImplicitCasts(state, query, text)
	collectDependencies(state.dependencies, query, state.types)
	state.volatility.observeQuery(query)
	return query
}

/** Resolve an expression; returns its tree. */
export function checkExpr(state: CheckState, fragment: SqlFragment): ResolvedQuery {
	return analyzeText(state, fragment.text, 'expression')
}

/** Resolve a statement (SELECT, DML, CALL or utility). */
export function checkQuery(state: CheckState, fragment: SqlFragment): ResolvedQuery {
	const query = analyzeText(state, fragment.text, 'statement')
	if (query.transactionControl) state.report('PCSQL006')
	return query
}

export interface RvalueInfo {
	readonly type: TypeRef
	readonly node: QueryNode | null
	readonly query: ResolvedQuery
}

/** Resolve an expression that must yield exactly one value. */
export function checkExprAsRvalue(state: CheckState, fragment: SqlFragment): RvalueInfo {
	const query = checkExpr(state, fragment)
	const column = query.columns[0]
	if (query.columns.length !== 1 || column === undefined) {
		throw new AnalysisFault({
			message: `query "${fragment.text}" returned ${query.columns.length} columns`,
			sqlstate: '42601',
		})
	}
	return { node: query.targetList[0] ?? null, query, type: column.type }
}

// =============================================================================
// ASSIGNMENT TYPING
// =============================================================================

function isComposite(state: CheckState, type: TypeRef): boolean {
	return type.name === RECORD_TYPE.name || state.types.category(type) === TypeCategory.Composite
}

/**
 * Compare a value's type with the type expected by its target.
 */
export function checkAssignType(
	state: CheckState,
	target: TypeRef,
	source: TypeRef,
	isLiteral = false
): void {
	if (isUnresolved(source) || isUnresolved(target)) return
	const types = state.types
	const targetComposite = isComposite(state, target)
	const sourceComposite = isComposite(state, source)

	if (targetComposite) {
		if (!sourceComposite && types.category(source) !== TypeCategory.Unknown) {
			state.report('PCTYPE002')
		}
		return
	}
	if (sourceComposite) {
		state.report('PCTYPE001')
		return
	}
	if (sameType(source, target) || isLiteral) return
	if (types.category(source) === TypeCategory.Unknown) return

	const args = { source: types.format(source), target: types.format(target) }
	if (!types.canCoerce(source, target, 'explicit')) {
		state.report('PCTYPE003', args)
	} else if (!types.canCoerce(source, target, 'assignment')) {
		state.report('PCTYPE004', args)
	} else if (
		types.category(source) !== TypeCategory.String ||
		types.category(target) !== TypeCategory.String
	) {
		state.report('PCTYPE005', args)
	}
}

function shapeOf(state: CheckState, info: RvalueInfo): TupleShape | null {
	const node = info.node
	if (node?.kind === 'var' && node.field === null) {
		const datum = state.datum(node.slot)
		if (datum.template.kind === 'row' || datum.template.kind === 'rec') return datum.fields
	}
	if (info.type.name === RECORD_TYPE.name) return null
	return state.types.compositeShape(info.type)
}

/** Match a row of values against composite target fields. */
function checkFields(
	state: CheckState,
	fields: TupleShape,
	columns: TupleShape,
	tooFew: 'PCREC002' | 'PCREC004',
	tooMany: 'PCREC003' | 'PCREC005'
): void {
	if (columns.length < fields.length) state.report(tooFew)
	if (columns.length > fields.length) state.report(tooMany)
	const count = Math.min(columns.length, fields.length)
	for (let i = 0; i < count; i++) {
		const field = fields[i]
		const column = columns[i]
		if (field && column) checkAssignType(state, field.type, column.type)
	}
}

function isSafeValue(state: CheckState, info: RvalueInfo): boolean {
	return info.node !== null && findUnsafe(state, info.node) === null
}

/**
 * Check `target := expr`.
 */
export function checkAssignment(state: CheckState, slot: number, fragment: SqlFragment): void {
	const info = checkExprAsRvalue(state, fragment)
	const target = checkTarget(state, slot)
	state.usage.markWrite(slot)
	if (target === null) return
	assignValue(state, slot, target, info)
}

/** Apply a resolved value to an assignment target. */
export function assignValue(
	state: CheckState,
	slot: number,
	target: TargetType,
	info: RvalueInfo
): void {
	const datum = state.datum(slot)
	const template = datum.template
	const unknown = state.types.category(info.type) === TypeCategory.Unknown

	if (template.kind === 'rec') {
		if (unknown) return
		if (!isComposite(state, info.type) && !isUnresolved(info.type)) {
			state.report('PCTYPE002')
			return
		}
		const shape = shapeOf(state, info)
		if (shape) assignTupdesc(state, slot, shape, 'query')
		return
	}
	if (template.kind === 'row') {
		if (unknown) return
		const shape = shapeOf(state, info)
		if (!isComposite(state, info.type) && !isUnresolved(info.type)) {
			state.report('PCTYPE002')
			return
		}
		if (shape && target.fields) checkFields(state, target.fields, shape, 'PCREC004', 'PCREC005')
		return
	}

	if (
		template.kind === 'var' &&
		target.type.name === 'refcursor' &&
		(unknown || state.types.category(info.type) === TypeCategory.String)
	) {
		state.report('PCCOMPAT001')
		return
	}

	const isLiteral = info.node?.kind === 'const'
	checkAssignType(state, target.type, info.type, isLiteral)
	datum.safe = isSafeValue(state, info)
}

/** Check an expression used as a condition. */
export function checkBoolExpr(state: CheckState, fragment: SqlFragment): void {
	const info = checkExprAsRvalue(state, fragment)
	checkAssignType(state, BOOLEAN_TYPE, info.type, info.node?.kind === 'const')
}

// =============================================================================
// INTO TARGETS
// =============================================================================

/**
 * Assign result columns to INTO targets. A single record or row target
 * takes the whole row; otherwise columns map to targets one by one.
 */
export function assignInto(
	state: CheckState,
	targets: readonly number[],
	columns: TupleShape
): void {
	const [first] = targets
	if (first === undefined) return

	if (targets.length === 1) {
		const template = state.datum(first).template
		if (template.kind === 'rec') {
			state.usage.markWrite(first)
			assignTupdesc(state, first, columns, 'query')
			return
		}
		if (template.kind === 'row') {
			state.usage.markWrite(first)
			const target = checkTarget(state, first)
			if (target?.fields) checkFields(state, target.fields, columns, 'PCREC004', 'PCREC005')
			return
		}
	}

	const fields: Column[] = []
	for (const slot of targets) {
		state.usage.markWrite(slot)
		const target = checkTarget(state, slot)
		if (target === null) return
		fields.push({ name: state.datum(slot).template.name, type: target.type })
	}
	if (columns.length < fields.length) state.report('PCREC002')
	if (columns.length > fields.length) state.report('PCREC003')
	const count = Math.min(columns.length, fields.length)
	for (let i = 0; i < count; i++) {
		const field = fields[i]
		const column = columns[i]
		if (field && column) checkAssignType(state, field.type, column.type)
	}
}

/**
 * Check a static SQL statement with an optional INTO clause.
 */
export function checkSqlStatement(
	state: CheckState,
	fragment: SqlFragment,
	into: IntoClause | null
): ResolvedQuery {
	const query = checkQuery(state, fragment)
	if (into) {
		if (!query.returnsData) {
			state.report('PCREC009')
			return query
		}
		assignInto(state, into.targets, query.columns)
		return query
	}
	if (query.returnsData && query.command !== 'call' && query.command !== 'utility') {
		state.report('PCREC008')
	}
	return query
}
