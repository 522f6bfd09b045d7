import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TypeCategory, typeRef } from '../../src/host/types.ts'
import { arrayOf, elementOf, MemoryTypeSystem } from '../../src/memory/types.ts'

const types = new MemoryTypeSystem({
	compositeShape: (name) =>
		name === 'pair'
			? [
					{ name: 'a', type: typeRef('integer') },
					{ name: 'b', type: typeRef('text') },
				]
			: null,
	isEnum: (name) => name === 'mood',
})

const integer = typeRef('integer')
const bigint = typeRef('bigint')
const text = typeRef('text')

describe('memory/types', () => {
	describe('resolve', () => {
		it('should map aliases to canonical names', () => {
			assert.deepStrictEqual(types.resolve('int4'), integer)
			assert.deepStrictEqual(types.resolve('INT'), integer)
			assert.deepStrictEqual(types.resolve('timestamp'), typeRef('timestamp without time zone'))
			assert.deepStrictEqual(types.resolve('pg_catalog.int8'), bigint)
		})

		it('should keep string length modifiers', () => {
			assert.deepStrictEqual(types.resolve('varchar(20)'), typeRef('character varying', 20))
		})

		it('should drop numeric modifiers', () => {
			assert.deepStrictEqual(types.resolve('numeric(10,2)'), typeRef('numeric'))
		})

		it('should resolve array types', () => {
			assert.deepStrictEqual(types.resolve('text[]'), typeRef('text[]'))
			assert.deepStrictEqual(types.resolve('INTEGER [ ]'), typeRef('integer[]'))
			assert.deepStrictEqual(types.resolve('int[][]'), typeRef('integer[][]'))
		})

		it('should resolve user types', () => {
			assert.deepStrictEqual(types.resolve('pair'), typeRef('pair'))
			assert.deepStrictEqual(types.resolve('Mood'), typeRef('mood'))
		})

		it('should return null for unknown names', () => {
			assert.strictEqual(types.resolve('nosuch'), null)
		})
	})

	describe('format', () => {
		it('should print modifiers', () => {
			assert.strictEqual(types.format(typeRef('character varying', 20)), 'character varying(20)')
			assert.strictEqual(types.format(integer), 'integer')
		})
	})

	describe('category', () => {
		it('should classify builtin and user types', () => {
			assert.strictEqual(types.category(integer), TypeCategory.Numeric)
			assert.strictEqual(types.category(text), TypeCategory.String)
			assert.strictEqual(types.category(typeRef('integer[]')), TypeCategory.Array)
			assert.strictEqual(types.category(typeRef('mood')), TypeCategory.Enum)
			assert.strictEqual(types.category(typeRef('pair')), TypeCategory.Composite)
			assert.strictEqual(types.category(typeRef('nosuch')), TypeCategory.Unknown)
		})
	})

	describe('compositeShape', () => {
		it('should return user composite columns', () => {
			assert.deepStrictEqual(
				types.compositeShape(typeRef('pair'))?.map((column) => column.name),
				['a', 'b']
			)
		})

		it('should return null for scalars', () => {
			assert.strictEqual(types.compositeShape(integer), null)
		})
	})

	describe('canCoerce', () => {
		it('should widen numbers implicitly', () => {
			assert.strictEqual(types.canCoerce(integer, bigint, 'implicit'), true)
		})

		it('should narrow numbers only on assignment', () => {
			assert.strictEqual(types.canCoerce(bigint, integer, 'implicit'), false)
			assert.strictEqual(types.canCoerce(bigint, integer, 'assignment'), true)
		})

		it('should convert to text on assignment', () => {
			assert.strictEqual(types.canCoerce(integer, text, 'implicit'), false)
			assert.strictEqual(types.canCoerce(integer, text, 'assignment'), true)
		})

		it('should convert from text only explicitly', () => {
			assert.strictEqual(types.canCoerce(text, integer, 'assignment'), false)
			assert.strictEqual(types.canCoerce(text, integer, 'explicit'), true)
		})

		it('should follow listed casts', () => {
			assert.strictEqual(types.canCoerce(integer, typeRef('boolean'), 'assignment'), false)
			assert.strictEqual(types.canCoerce(integer, typeRef('boolean'), 'explicit'), true)
			assert.strictEqual(
				types.canCoerce(typeRef('date'), typeRef('timestamp with time zone'), 'implicit'),
				true
			)
		})

		it('should accept unknown literals anywhere', () => {
			assert.strictEqual(types.canCoerce(typeRef('unknown'), integer, 'implicit'), true)
		})

		it('should coerce arrays by element', () => {
			assert.strictEqual(types.canCoerce(typeRef('integer[]'), typeRef('bigint[]'), 'implicit'), true)
			assert.strictEqual(types.canCoerce(typeRef('text[]'), typeRef('integer[]'), 'assignment'), false)
		})

		it('should match polymorphic targets by array-ness', () => {
			assert.strictEqual(types.canCoerce(typeRef('integer[]'), typeRef('anyarray'), 'implicit'), true)
			assert.strictEqual(types.canCoerce(integer, typeRef('anyarray'), 'implicit'), false)
			assert.strictEqual(
				types.canCoerce(typeRef('integer[]'), typeRef('anynonarray'), 'implicit'),
				false
			)
			assert.strictEqual(types.canCoerce(integer, typeRef('anyelement'), 'implicit'), true)
		})

		it('should accept only composites as record', () => {
			assert.strictEqual(types.canCoerce(typeRef('pair'), typeRef('record'), 'implicit'), true)
			assert.strictEqual(types.canCoerce(integer, typeRef('record'), 'explicit'), false)
		})
	})

	describe('array helpers', () => {
		it('should build and split array types', () => {
			assert.deepStrictEqual(arrayOf(integer), typeRef('integer[]'))
			assert.deepStrictEqual(elementOf(typeRef('integer[]')), integer)
			assert.strictEqual(elementOf(integer), null)
		})
	})
})
