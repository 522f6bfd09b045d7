/**
 * In-memory catalog: relations, composite and enum types, functions and
 * operators known to the in-process host.
 */

import type { Routine } from '../host/ast.ts'
import type { CalledRoutine, OperatorInfo } from '../host/query.ts'
import {
	type Relation,
	RelationKind,
	type TupleShape,
	type TypeRef,
	typeRef,
	Volatility,
} from '../host/types.ts'
import functionData from './data/functions.json' with { type: 'json' }
import { MemoryTypeSystem } from './types.ts'

export const DEFAULT_SCHEMA = 'public'
export const CATALOG_SCHEMA = 'pg_catalog'

/** First identity handed out to user objects. */
const FIRST_USER_IDENTITY = 16384

/** A callable entry as overload resolution sees it. */
export interface FunctionEntry {
	readonly called: CalledRoutine
	/** Fixed parameters, IN and INOUT only */
	readonly params: readonly TypeRef[]
	/** Element type accepted by a trailing VARIADIC parameter */
	readonly variadic: TypeRef | null
	readonly returns: TypeRef
	readonly returnsSet: boolean
	/** Output columns when the function returns a row */
	readonly columns: TupleShape | null
	readonly aggregate: boolean
}

export interface OperatorEntry {
	readonly info: OperatorInfo
	readonly result: TypeRef
}

function toVolatility(text: string): Volatility {
	switch (text) {
		case 'immutable':
			return Volatility.Immutable
		case 'stable':
			return Volatility.Stable
		default:
			return Volatility.Volatile
	}
}

function splitName(name: string): { schema: string | null; name: string } {
	const parts = name.toLowerCase().split('.')
	const last = parts[parts.length - 1] ?? ''
	return { name: last, schema: parts.length > 1 ? (parts[0] ?? null) : null }
}

export class MemoryCatalog {
	readonly types: MemoryTypeSystem

	private nextIdentity = FIRST_USER_IDENTITY
	private readonly relations = new Map<number, Relation>()
	private readonly enums = new Map<string, readonly string[]>()
	private readonly functions: FunctionEntry[] = []
	private readonly operators: OperatorEntry[] = []
	private readonly routines = new Map<number, Routine>()

	constructor() {
		this.types = new MemoryTypeSystem({
			compositeShape: (name) => this.compositeShape(name),
			isEnum: (name) => this.enums.has(name),
		})
		functionData.functions.forEach((entry, index) => {
			const variadic =
				'variadic' in entry && typeof entry.variadic === 'string' ? typeRef(entry.variadic) : null
			this.functions.push({
				aggregate: 'aggregate' in entry && entry.aggregate === true,
				called: {
					args: [...entry.args.map((arg) => typeRef(arg)), ...(variadic ? [variadic] : [])],
					builtin: true,
					identity: 1000 + index,
					kind: 'function',
					name: entry.name,
					schema: CATALOG_SCHEMA,
					volatility: toVolatility(entry.volatility),
				},
				columns: null,
				params: entry.args.map((arg) => typeRef(arg)),
				returns: typeRef(entry.returns),
				returnsSet: 'returnsSet' in entry && entry.returnsSet === true,
				variadic,
			})
		})
	}

	allocateIdentity(): number {
		return this.nextIdentity++
	}

	// =========================================================================
	// RELATIONS AND TYPES
	// =========================================================================

	addRelation(
		qualifiedName: string,
		kind: RelationKind,
		columns: TupleShape,
		identity = this.allocateIdentity()
	): Relation {
		const { name, schema } = splitName(qualifiedName)
		const relation: Relation = { columns, identity, kind, name, schema: schema ?? DEFAULT_SCHEMA }
		this.relations.set(identity, relation)
		return relation
	}

	addEnum(name: string, labels: readonly string[]): void {
		this.enums.set(name.toLowerCase(), labels)
	}

	findRelation(qualifiedName: string): Relation | null {
		const { name, schema } = splitName(qualifiedName)
		for (const relation of this.relations.values()) {
			if (relation.name !== name) continue
			if (schema === null || relation.schema === schema) return relation
		}
		return null
	}

	relationById(identity: number): Relation | null {
		return this.relations.get(identity) ?? null
	}

	private compositeShape(name: string): TupleShape | null {
		const relation = this.findRelation(name)
		return relation && relation.kind !== RelationKind.Sequence ? relation.columns : null
	}

	// =========================================================================
	// FUNCTIONS AND OPERATORS
	// =========================================================================

	addFunction(entry: FunctionEntry): void {
		this.functions.push(entry)
	}

	functionsNamed(qualifiedName: string): FunctionEntry[] {
		const { name, schema } = splitName(qualifiedName)
		return this.functions.filter(
			(entry) =>
				entry.called.name === name && (schema === null || entry.called.schema === schema)
		)
	}

	addOperator(entry: OperatorEntry): void {
		this.operators.push(entry)
	}

	operatorsNamed(name: string): OperatorEntry[] {
		return this.operators.filter((entry) => entry.info.name === name)
	}

	// =========================================================================
	// ROUTINES
	// =========================================================================

	addRoutine(routine: Routine): void {
		this.routines.set(routine.identity, routine)
	}

	routine(identity: number): Routine | null {
		return this.routines.get(identity) ?? null
	}

	allRoutines(): Routine[] {
		return [...this.routines.values()]
	}

	routinesNamed(qualifiedName: string): Routine[] {
		const { name, schema } = splitName(qualifiedName)
		return this.allRoutines().filter(
			(routine) => routine.name === name && (schema === null || routine.schema === schema)
		)
	}
}
