/**
 * Type rules of the in-process host.
 *
 * Built-in types come from `data/types.json`. Composite types (tables,
 * views, `CREATE TYPE ... AS (...)`) and enums are looked up through the
 * catalog the type system is attached to.
 */

import {
	type CoercionContext,
	type TupleShape,
	TypeCategory,
	type TypeRef,
	type TypeSystem,
	typeRef,
} from '../host/types.ts'
import typeData from './data/types.json' with { type: 'json' }

interface BuiltinType {
	readonly name: string
	readonly category: TypeCategory
	readonly rank: number
	readonly polymorphic: boolean
	readonly preferred: boolean
}

/** What the type system needs from the catalog. */
export interface UserTypes {
	compositeShape(name: string): TupleShape | null
	isEnum(name: string): boolean
}

const contextRank: Readonly<Record<CoercionContext, number>> = {
	assignment: 1,
	explicit: 2,
	implicit: 0,
}

function toCategory(letter: string): TypeCategory {
	for (const category of Object.values(TypeCategory)) {
		if (category === letter) return category
	}
	throw new Error(`Unknown type category '${letter}'`)
}

const builtins = new Map<string, BuiltinType>()
const aliases = new Map<string, string>()

for (const entry of typeData.types) {
	builtins.set(entry.name, {
		category: toCategory(entry.category),
		name: entry.name,
		polymorphic: 'polymorphic' in entry && entry.polymorphic === true,
		preferred: 'preferred' in entry && entry.preferred === true,
		rank: 'rank' in entry && typeof entry.rank === 'number' ? entry.rank : 0,
	})
	for (const alias of entry.aliases) aliases.set(alias, entry.name)
}

const castTable = new Map<string, CoercionContext>()
for (const cast of typeData.casts) {
	const context = cast.context
	if (context !== 'implicit' && context !== 'assignment' && context !== 'explicit') {
		throw new Error(`Unknown cast context '${context}'`)
	}
	castTable.set(`${cast.source}->${cast.target}`, context)
}

// =============================================================================
// NAME HELPERS
// =============================================================================

export const ARRAY_SUFFIX = '[]'

export function isArrayName(name: string): boolean {
	return name.endsWith(ARRAY_SUFFIX)
}

export function arrayOf(type: TypeRef): TypeRef {
	return typeRef(`${type.name}${ARRAY_SUFFIX}`)
}

export function elementOf(type: TypeRef): TypeRef | null {
	return isArrayName(type.name) ? typeRef(type.name.slice(0, -ARRAY_SUFFIX.length)) : null
}

/** Lower-case a type name as written, keeping quoted parts and collapsing blanks. */
function normalizeName(text: string): string {
	return text
		.trim()
		.replace(/"([^"]*)"|[^"]+/g, (part, quoted: string | undefined) =>
			quoted !== undefined ? quoted : part.toLowerCase()
		)
		.replace(/\s+/g, ' ')
		.replace(/\s*\[\s*\d*\s*\]/g, ARRAY_SUFFIX)
}

interface ParsedTypeName {
	readonly base: string
	readonly typmod: number
	readonly dimensions: number
}

function parseTypeName(text: string): ParsedTypeName {
	let name = normalizeName(text)
	let dimensions = 0
	while (isArrayName(name)) {
		dimensions++
		name = name.slice(0, -ARRAY_SUFFIX.length).trim()
	}
	let typmod = -1
	const modifier = /^(.*?)\s*\(\s*(\d+)\s*(?:,\s*\d+\s*)?\)(.*)$/.exec(name)
	if (modifier) {
		typmod = Number(modifier[2])
		name = `${modifier[1] ?? ''}${modifier[3] ?? ''}`.trim()
	}
	if (name.startsWith('pg_catalog.')) name = name.slice('pg_catalog.'.length)
	return { base: name, dimensions, typmod }
}

// =============================================================================
// TYPE SYSTEM
// =============================================================================

export class MemoryTypeSystem implements TypeSystem {
	constructor(private readonly user: UserTypes) {}

	private builtin(type: TypeRef): BuiltinType | undefined {
		return builtins.get(type.name)
	}

	category(type: TypeRef): TypeCategory {
		if (isArrayName(type.name)) return TypeCategory.Array
		const builtin = this.builtin(type)
		if (builtin) return builtin.category
		if (this.user.isEnum(type.name)) return TypeCategory.Enum
		if (this.user.compositeShape(type.name)) return TypeCategory.Composite
		return TypeCategory.Unknown
	}

	compositeShape(type: TypeRef): TupleShape | null {
		if (this.builtin(type) || isArrayName(type.name)) return null
		return this.user.compositeShape(type.name)
	}

	isPolymorphic(type: TypeRef): boolean {
		return this.builtin(type)?.polymorphic ?? false
	}

	/** Position of a numeric or date/time type in its promotion chain, 0 when it has none. */
	rank(type: TypeRef): number {
		return this.builtin(type)?.rank ?? 0
	}

	isPreferred(type: TypeRef): boolean {
		return this.builtin(type)?.preferred ?? false
	}

	canCoerce(source: TypeRef, target: TypeRef, context: CoercionContext): boolean {
		if (source.name === target.name) return true
		if (source.name === 'unknown') return true
		const allowed = (castContext: CoercionContext): boolean =>
			contextRank[castContext] <= contextRank[context]

		const sourceCategory = this.category(source)
		const targetCategory = this.category(target)

		if (this.isPolymorphic(target)) {
			if (target.name.endsWith('nonarray')) return sourceCategory !== TypeCategory.Array
			if (target.name.endsWith('array')) return sourceCategory === TypeCategory.Array
			return true
		}
		if (target.name === 'record') return sourceCategory === TypeCategory.Composite

		const listed = castTable.get(`${source.name}->${target.name}`)
		if (listed) return allowed(listed)

		const sourceElement = elementOf(source)
		const targetElement = elementOf(target)
		if (sourceElement && targetElement) return this.canCoerce(sourceElement, targetElement, context)

		if (targetCategory === TypeCategory.String) {
			return sourceCategory === TypeCategory.String || allowed('assignment')
		}
		if (sourceCategory === TypeCategory.String) return allowed('explicit')

		const sameChain =
			sourceCategory === targetCategory &&
			(sourceCategory === TypeCategory.Numeric || sourceCategory === TypeCategory.DateTime)
		const sourceRank = this.rank(source)
		const targetRank = this.rank(target)
		if (sameChain && sourceRank > 0 && targetRank > 0) {
			return sourceRank < targetRank ? true : allowed('assignment')
		}
		return false
	}

	resolve(name: string): TypeRef | null {
		const parsed = parseTypeName(name)
		const canonical = aliases.get(parsed.base) ?? parsed.base
		const known =
			builtins.has(canonical) ||
			this.user.isEnum(canonical) ||
			this.user.compositeShape(canonical) !== null
		if (!known) return null
		const base =
			this.builtin(typeRef(canonical))?.category === TypeCategory.String ? parsed.typmod : -1
		let type = typeRef(canonical, parsed.dimensions > 0 ? -1 : base)
		for (let i = 0; i < parsed.dimensions; i++) type = arrayOf(type)
		return type
	}

	format(type: TypeRef): string {
		if (type.typmod >= 0 && type.name !== 'text') return `${type.name}(${type.typmod})`
		return type.name
	}
}
