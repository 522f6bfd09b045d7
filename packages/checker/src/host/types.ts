/**
 * Type and relation vocabulary shared between the checker and its host.
 *
 * Types are referred to by their canonical host name plus a type modifier.
 * The host owns every rule about them (categories, casts, composite shapes);
 * the checker only asks.
 */

export interface TypeRef {
	readonly name: string
	/** Type modifier such as a length or precision, -1 when absent */
	readonly typmod: number
}

export function typeRef(name: string, typmod = -1): TypeRef {
	return { name, typmod }
}

/**
 * Placeholder type for values whose type cannot be known statically, such
 * as fields of a record filled by dynamic SQL. Checks involving it are skipped.
 */
export const UNRESOLVED: TypeRef = { name: 'unresolved', typmod: -1 }

export function isUnresolved(type: TypeRef): boolean {
	return type.name === UNRESOLVED.name
}

export function sameType(a: TypeRef, b: TypeRef): boolean {
	return a.name === b.name
}

/**
 * Host type categories (one letter each, as the host catalogs them).
 */
export const TypeCategory = {
	Array: 'A',
	BitString: 'V',
	Boolean: 'B',
	Composite: 'C',
	DateTime: 'D',
	Enum: 'E',
	Geometric: 'G',
	Network: 'I',
	Numeric: 'N',
	Pseudo: 'P',
	Range: 'R',
	String: 'S',
	Timespan: 'T',
	Unknown: 'X',
	User: 'U',
} as const

export type TypeCategory = (typeof TypeCategory)[keyof typeof TypeCategory]

export type CoercionContext = 'implicit' | 'assignment' | 'explicit'

export interface Column {
	readonly name: string
	readonly type: TypeRef
}

/** Ordered (name, type) list describing a row or a query result. */
export type TupleShape = readonly Column[]

export const Volatility = {
	Immutable: 'immutable',
	Stable: 'stable',
	Volatile: 'volatile',
} as const

export type Volatility = (typeof Volatility)[keyof typeof Volatility]

const volatilityRank: Record<Volatility, number> = {
	[Volatility.Immutable]: 0,
	[Volatility.Stable]: 1,
	[Volatility.Volatile]: 2,
}

/** The less strict of two volatility classes. */
export function weakerVolatility(a: Volatility, b: Volatility): Volatility {
	return volatilityRank[a] >= volatilityRank[b] ? a : b
}

export const RelationKind = {
	CompositeType: 'composite',
	Sequence: 'sequence',
	Table: 'table',
	View: 'view',
} as const

export type RelationKind = (typeof RelationKind)[keyof typeof RelationKind]

export interface Relation {
	readonly identity: number
	readonly schema: string
	readonly name: string
	readonly kind: RelationKind
	readonly columns: TupleShape
}

/**
 * Type rules the host exposes to the checker.
 */
export interface TypeSystem {
	category(type: TypeRef): TypeCategory
	/** Field list of a composite type, null for anything else */
	compositeShape(type: TypeRef): TupleShape | null
	canCoerce(source: TypeRef, target: TypeRef, context: CoercionContext): boolean
	isPolymorphic(type: TypeRef): boolean
	/** Resolve a type name as written in source, null when unknown */
	resolve(name: string): TypeRef | null
	/** Display form used in messages and signatures */
	format(type: TypeRef): string
}

export function formatShape(types: TypeSystem, shape: TupleShape): string {
	return shape.map((column) => `${column.name} ${types.format(column.type)}`).join(', ')
}
