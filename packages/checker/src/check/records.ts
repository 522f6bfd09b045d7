/**
 * Type and record propagation.
 *
 * Scalars and rows keep the type they were declared with. Records start
 * shapeless and take the shape of the first row assigned to them. A record
 * filled from a source whose shape is unknowable (dynamic SQL, an unbound
 * refcursor) is degraded: its fields resolve to UNRESOLVED and checks that
 * depend on them are skipped instead of reporting false alarms.
 */

import type { Datum } from '../host/ast.ts'
import type { VariableBinding } from '../host/bridge.ts'
import {
	formatShape,
	type TupleShape,
	type TypeRef,
	type TypeSystem,
	typeRef,
	UNRESOLVED,
} from '../host/types.ts'
import type { CheckState } from './state.ts'

export type RecordState = 'unassigned' | 'shaped' | 'degraded'

/** Where a record's shape came from. */
export type ShapeOrigin = 'query' | 'pragma' | 'trigger'

export const RECORD_TYPE: TypeRef = typeRef('record')

/**
 * Run-time copy of a datum. Templates from the host are never mutated.
 */
export interface RuntimeDatum {
	readonly template: Datum
	readonly type: TypeRef
	fields: TupleShape | null
	state: RecordState
	/** Shape fixed by a pragma; later assignments do not replace it */
	pinned: boolean
	/** String value known to be quoted for use in dynamic SQL */
	safe: boolean
}

export type Substitute = (type: TypeRef) => TypeRef

export function copyDatum(template: Datum, substitute: Substitute): RuntimeDatum {
	switch (template.kind) {
		case 'var':
			return {
				fields: null,
				pinned: false,
				safe: false,
				state: 'shaped',
				template,
				type: substitute(template.type),
			}
		case 'row':
			return {
				fields: template.fields.map((field) => ({
					name: field.name,
					type: substitute(field.type),
				})),
				pinned: false,
				safe: false,
				state: 'shaped',
				template,
				type: template.type,
			}
		case 'rec':
			return {
				fields: null,
				pinned: false,
				safe: false,
				state: 'unassigned',
				template,
				type: RECORD_TYPE,
			}
		case 'recfield':
			return {
				fields: null,
				pinned: false,
				safe: false,
				state: 'shaped',
				template,
				type: UNRESOLVED,
			}
	}
}

export function sameShape(a: TupleShape, b: TupleShape): boolean {
	if (a.length !== b.length) return false
	return a.every((column, i) => {
		const other = b[i]
		return other !== undefined && other.name === column.name && other.type.name === column.type.name
	})
}

/**
 * Give a record its tuple shape.
 *
 * Reassigning a shaped record with a different shape is reported as drift
 * (a warning) and the new shape wins. A pinned record keeps its shape.
 */
export function assignTupdesc(
	state: CheckState,
	slot: number,
	shape: TupleShape,
	origin: ShapeOrigin
): void {
	const datum = state.datum(slot)
	if (datum.template.kind !== 'rec') return

	if (origin === 'pragma') {
		datum.fields = shape
		datum.state = 'shaped'
		datum.pinned = true
		return
	}
	if (datum.pinned) return

	if (datum.state === 'shaped' && datum.fields && !sameShape(datum.fields, shape)) {
		state.report('PCREC006', {
			current: formatShape(state.types, shape),
			name: datum.template.name,
			previous: formatShape(state.types, datum.fields),
		})
	}
	datum.fields = shape
	datum.state = 'shaped'
}

/**
 * Mark a record as filled from a source of unknown shape. Returns false
 * when the record is pinned and keeps its shape.
 */
export function degradeRecord(state: CheckState, slot: number): boolean {
	const datum = state.datum(slot)
	if (datum.template.kind !== 'rec') return false
	if (datum.pinned) return false
	datum.fields = null
	datum.state = 'degraded'
	return true
}

export interface TargetType {
	readonly type: TypeRef
	readonly typmod: number
	/** Field list when the target is a row or a shaped record */
	readonly fields: TupleShape | null
}

/**
 * Type expected by an assignment target. Returns null (after reporting)
 * when the target cannot be assigned at all.
 */
export function checkTarget(state: CheckState, slot: number): TargetType | null {
	const datum = state.datum(slot)
	const template = datum.template
	switch (template.kind) {
		case 'var':
			if (template.isConst) {
				state.report('PCREC010', { name: template.name })
				return null
			}
			return { fields: null, type: datum.type, typmod: datum.type.typmod }
		case 'row':
			return { fields: datum.fields, type: datum.type, typmod: -1 }
		case 'rec':
			return { fields: datum.fields, type: RECORD_TYPE, typmod: -1 }
		case 'recfield': {
			const parent = state.datum(template.parent)
			const parentName = parent.template.name
			if (parent.state === 'degraded') return { fields: null, type: UNRESOLVED, typmod: -1 }
			if (parent.state === 'unassigned' || parent.fields === null) {
				state.report('PCREC001', { name: parentName })
				return null
			}
			const field = parent.fields.find((column) => column.name === template.field)
			if (!field) {
				state.report('PCREC007', { field: template.field, name: parentName })
				return null
			}
			return { fields: null, type: field.type, typmod: field.type.typmod }
		}
	}
}

/**
 * Describe a datum to the host's analyzer.
 */
export function toBinding(
	datum: RuntimeDatum,
	qualifier: string | null,
	types: TypeSystem
): VariableBinding | null {
	const template = datum.template
	switch (template.kind) {
		case 'var':
			return {
				degraded: false,
				fields: null,
				kind: 'scalar',
				name: template.name,
				qualifier,
				slot: template.slot,
				type: datum.type,
			}
		case 'row':
			return {
				degraded: false,
				fields: datum.fields ?? types.compositeShape(datum.type),
				kind: 'row',
				name: template.name,
				qualifier,
				slot: template.slot,
				type: datum.type,
			}
		case 'rec':
			return {
				degraded: datum.state === 'degraded',
				fields: datum.fields,
				kind: 'record',
				name: template.name,
				qualifier,
				slot: template.slot,
				type: RECORD_TYPE,
			}
		case 'recfield':
			return null
	}
}
