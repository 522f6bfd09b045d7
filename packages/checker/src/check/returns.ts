/**
 * Checks of RETURN, RETURN NEXT and RETURN QUERY against the routine's
 * declared result.
 */

import type { ReturnNextStmt, ReturnQueryStmt, ReturnStmt, Routine } from '../host/ast.ts'
import {
	isUnresolved,
	type TupleShape,
	TypeCategory,
	type TypeRef,
	type TypeSystem,
} from '../host/types.ts'
import { checkDynamicQuery } from './dynamic.ts'
import { RECORD_TYPE } from './records.ts'
import { checkAssignType, checkExprAsRvalue, checkQuery, type RvalueInfo } from './resolver.ts'
import type { CheckState } from './state.ts'

export type ResultShape =
	| { readonly kind: 'void' }
	| { readonly kind: 'trigger' }
	| { readonly kind: 'record' }
	| { readonly kind: 'scalar'; readonly type: TypeRef }
	| { readonly kind: 'composite'; readonly type: TypeRef; readonly fields: TupleShape }

/**
 * What one returned row looks like. OUT parameters override the declared
 * return type: one gives a scalar, several a composite.
 */
export function resultShape(
	routine: Routine,
	types: TypeSystem,
	substitute: (type: TypeRef) => TypeRef
): ResultShape {
	if (routine.kind === 'procedure') return { kind: 'void' }
	if (routine.trigger !== 'none') return { kind: 'trigger' }

	const outs = routine.params.filter((param) => param.mode === 'out' || param.mode === 'inout')
	const [onlyOut] = outs
	if (outs.length === 1 && onlyOut) return { kind: 'scalar', type: substitute(onlyOut.type) }
	if (outs.length > 1) {
		return {
			fields: outs.map((param) => ({ name: param.name, type: substitute(param.type) })),
			kind: 'composite',
			type: RECORD_TYPE,
		}
	}

	const type = substitute(routine.returnType)
	if (type.name === 'void') return { kind: 'void' }
	if (type.name === RECORD_TYPE.name) return { kind: 'record' }
	const fields = types.compositeShape(type)
	if (fields) return { fields, kind: 'composite', type }
	return { kind: 'scalar', type }
}

export function hasOutParams(routine: Routine): boolean {
	return routine.params.some((param) => param.mode === 'out' || param.mode === 'inout')
}

function sameColumnType(types: TypeSystem, a: TypeRef, b: TypeRef): boolean {
	if (a.name === b.name || isUnresolved(a) || isUnresolved(b)) return true
	const category = types.category(a)
	return category === TypeCategory.String && types.category(b) === TypeCategory.String
}

/**
 * Explain why a returned tuple does not fit the expected one, or null
 * when it fits.
 */
export function shapeMismatch(
	types: TypeSystem,
	expected: TupleShape,
	actual: TupleShape
): string | null {
	if (expected.length !== actual.length) {
		return (
			`Number of returned columns (${actual.length}) does not match ` +
			`expected column count (${expected.length}).`
		)
	}
	for (let i = 0; i < expected.length; i++) {
		const want = expected[i]
		const got = actual[i]
		if (!want || !got || sameColumnType(types, want.type, got.type)) continue
		return (
			`Returned type ${types.format(got.type)} does not match ` +
			`expected type ${types.format(want.type)} in column ${i + 1}.`
		)
	}
	return null
}

function returnedFields(state: CheckState, info: RvalueInfo): TupleShape | null {
	const node = info.node
	if (node?.kind === 'var' && node.field === null) {
		const datum = state.datum(node.slot)
		if (datum.template.kind === 'row' || datum.template.kind === 'rec') return datum.fields
	}
	if (info.type.name === RECORD_TYPE.name) return null
	return state.types.compositeShape(info.type)
}

function isCompositeValue(state: CheckState, type: TypeRef): boolean {
	if (isUnresolved(type) || type.name === RECORD_TYPE.name) return true
	const category = state.types.category(type)
	return category === TypeCategory.Composite || category === TypeCategory.Unknown
}

/** Check one returned value against the expected row. */
function checkReturnedValue(state: CheckState, shape: ResultShape, info: RvalueInfo): void {
	switch (shape.kind) {
		case 'void':
		case 'trigger':
			return
		case 'scalar':
			checkAssignType(state, shape.type, info.type, info.node?.kind === 'const')
			return
		case 'record':
			if (!isCompositeValue(state, info.type)) state.report('PCTYPE006')
			return
		case 'composite': {
			if (!isCompositeValue(state, info.type)) {
				state.report('PCTYPE006')
				return
			}
			const fields = returnedFields(state, info)
			if (fields === null) return
			const detail = shapeMismatch(state.types, shape.fields, fields)
			if (detail) state.report('PCTYPE008', undefined, { detail })
			return
		}
	}
}

export function checkReturn(state: CheckState, stmt: ReturnStmt): void {
	const routine = state.routine
	if (routine.kind === 'procedure') {
		if (stmt.expr) state.report('PCTYPE013')
		return
	}
	if (routine.returnsSet) {
		if (stmt.expr) state.report('PCTYPE012')
		return
	}
	const shape = resultShape(routine, state.types, state.substitute)
	if (stmt.expr === null) {
		if (shape.kind !== 'void' && !hasOutParams(routine)) state.report('PCTYPE014')
		return
	}
	if (shape.kind === 'void' && routine.trigger === 'none') {
		state.report('PCTYPE011')
		return
	}
	const info = checkExprAsRvalue(state, stmt.expr)
	checkReturnedValue(state, shape, info)
}

export function checkReturnNext(state: CheckState, stmt: ReturnNextStmt): void {
	const routine = state.routine
	if (!routine.returnsSet) {
		state.report('PCTYPE009')
		return
	}
	if (stmt.expr === null) return
	const info = checkExprAsRvalue(state, stmt.expr)
	checkReturnedValue(state, resultShape(routine, state.types, state.substitute), info)
}

export function checkReturnQuery(state: CheckState, stmt: ReturnQueryStmt): void {
	const routine = state.routine
	if (!routine.returnsSet) {
		state.report('PCTYPE010')
		return
	}

	let columns: TupleShape | null = null
	if (stmt.query) {
		columns = checkQuery(state, stmt.query).columns
	} else if (stmt.dynamic) {
		columns = checkDynamicQuery(state, stmt.dynamic, stmt.params).query?.columns ?? null
	}
	if (columns === null) return

	const shape = resultShape(routine, state.types, state.substitute)
	const expected: TupleShape | null =
		shape.kind === 'scalar'
			? [{ name: routine.name, type: shape.type }]
			: shape.kind === 'composite'
				? shape.fields
				: null
	if (expected === null) return
	const detail = shapeMismatch(state.types, expected, columns)
	if (detail) state.report('PCTYPE007', undefined, { detail })
}
