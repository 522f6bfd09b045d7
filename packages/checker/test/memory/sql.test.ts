import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { AnalyzeRequest, AnalyzeResult, VariableBinding } from '../../src/host/bridge.ts'
import type { ResolvedQuery } from '../../src/host/query.ts'
import { RelationKind, typeRef } from '../../src/host/types.ts'
import { MemoryCatalog } from '../../src/memory/catalog.ts'
import { analyzeSql } from '../../src/memory/sql/analyzer.ts'
import { parseExpression, parseStatement } from '../../src/memory/sql/parser.ts'

function createCatalog(): MemoryCatalog {
	const catalog = new MemoryCatalog()
	catalog.addRelation('accounts', RelationKind.Table, [
		{ name: 'id', type: typeRef('integer') },
		{ name: 'owner', type: typeRef('text') },
		{ name: 'balance', type: typeRef('numeric') },
	])
	return catalog
}

function scalar(name: string, slot: number, type: string): VariableBinding {
	return {
		degraded: false,
		fields: null,
		kind: 'scalar',
		name,
		qualifier: 'fx',
		slot,
		type: typeRef(type),
	}
}

function analyze(text: string, extra: Partial<AnalyzeRequest> = {}): AnalyzeResult {
	return analyzeSql(createCatalog(), {
		mode: 'statement',
		syntheticRelations: [],
		text,
		transitionTables: [],
		variables: [],
		...extra,
	})
}

function expectQuery(result: AnalyzeResult): ResolvedQuery {
	if (!result.ok) assert.fail(`unexpected error: ${result.error.message}`)
	return result.query
}

describe('memory/sql', () => {
	describe('parser', () => {
		it('should fold unquoted names and keep quoted ones', () => {
			const parsed = parseExpression('Accounts."Owner"')
			assert.ok(parsed.ok)
			assert.deepStrictEqual(parsed.value, { kind: 'ref', location: 1, parts: ['accounts', 'Owner'] })
		})

		it('should report the end of input', () => {
			const parsed = parseStatement('SELECT 1 +')
			assert.deepStrictEqual(parsed, {
				error: { message: 'syntax error at end of input', position: 11, sqlstate: '42601' },
				ok: false,
			})
		})

		it('should classify transaction control', () => {
			const parsed = parseStatement('COMMIT')
			assert.deepStrictEqual(parsed, {
				ok: true,
				value: { kind: 'utility', tag: 'COMMIT', transactionControl: true },
			})
		})
	})

	describe('analyzer', () => {
		it('should resolve columns and relations', () => {
			const query = expectQuery(analyze('SELECT id, owner FROM accounts WHERE balance > 0'))
			assert.strictEqual(query.command, 'select')
			assert.deepStrictEqual(query.columns, [
				{ name: 'id', type: typeRef('integer') },
				{ name: 'owner', type: typeRef('text') },
			])
			assert.deepStrictEqual(query.relations, [
				{ identity: 16384, kind: 'table', name: 'accounts', schema: 'public' },
			])
		})

		it('should cast the lower side of a numeric comparison', () => {
			const query = expectQuery(analyze('SELECT id FROM accounts WHERE balance > 0'))
			const where = query.where
			assert.ok(where?.kind === 'op')
			const right = where.args[1]
			assert.ok(right?.kind === 'func')
			assert.strictEqual(right.form, 'implicit-cast')
			assert.strictEqual(right.type.name, 'numeric')
		})

		it('should report unknown relations with a position', () => {
			assert.deepStrictEqual(analyze('SELECT * FROM missing'), {
				error: { message: 'relation "missing" does not exist', position: 15, sqlstate: '42P01' },
				ok: false,
			})
		})

		it('should report unknown columns', () => {
			assert.deepStrictEqual(analyze('SELECT nosuch FROM accounts'), {
				error: { message: 'column "nosuch" does not exist', position: 8, sqlstate: '42703' },
				ok: false,
			})
		})

		it('should bind routine variables', () => {
			const query = expectQuery(
				analyze('SELECT id FROM accounts WHERE owner = v_owner', {
					variables: [scalar('v_owner', 3, 'text')],
				})
			)
			const where = query.where
			assert.ok(where?.kind === 'op')
			assert.deepStrictEqual(where.args[1], {
				field: null,
				kind: 'var',
				location: 39,
				slot: 3,
				type: typeRef('text'),
			})
		})

		it('should reject a name that is both a column and a variable', () => {
			const result = analyze('SELECT owner FROM accounts', { variables: [scalar('owner', 0, 'text')] })
			assert.deepStrictEqual(result, {
				error: {
					detail: 'It could refer to either a routine variable or a table column.',
					message: 'column reference "owner" is ambiguous',
					position: 8,
					sqlstate: '42702',
				},
				ok: false,
			})
		})

		it('should type expressions', () => {
			const query = expectQuery(analyze('1 + 2', { mode: 'expression' }))
			assert.deepStrictEqual(query.columns, [{ name: '?column?', type: typeRef('integer') }])
		})

		it('should name function results after the function', () => {
			const query = expectQuery(analyze("length('abc')", { mode: 'expression' }))
			assert.deepStrictEqual(query.columns, [{ name: 'length', type: typeRef('integer') }])
		})

		it('should report unknown functions with the argument types', () => {
			const result = analyze('foo(1)', { mode: 'expression' })
			assert.ok(!result.ok)
			assert.strictEqual(result.error.sqlstate, '42883')
			assert.strictEqual(result.error.message, 'function foo(integer) does not exist')
		})

		it('should reject fields of an unassigned record', () => {
			const record: VariableBinding = {
				degraded: false,
				fields: null,
				kind: 'record',
				name: 'r',
				qualifier: 'fx',
				slot: 0,
				type: typeRef('record'),
			}
			const result = analyze('r.id', { mode: 'expression', variables: [record] })
			assert.ok(!result.ok)
			assert.strictEqual(result.error.sqlstate, '55000')
			assert.strictEqual(result.error.message, 'record "r" is not assigned yet')
		})

		it('should let degraded records pass', () => {
			const record: VariableBinding = {
				degraded: true,
				fields: null,
				kind: 'record',
				name: 'r',
				qualifier: 'fx',
				slot: 0,
				type: typeRef('record'),
			}
			const query = expectQuery(analyze('r.id', { mode: 'expression', variables: [record] }))
			assert.deepStrictEqual(query.columns, [{ name: 'id', type: typeRef('unresolved') }])
		})

		it('should check assignment to table columns', () => {
			const result = analyze('INSERT INTO accounts (id) VALUES (true)')
			assert.deepStrictEqual(result, {
				error: {
					hint: 'You will need to rewrite or cast the expression.',
					message: 'column "id" is of type integer but expression is of type boolean',
					position: 35,
					sqlstate: '42804',
				},
				ok: false,
			})
		})

		it('should resolve positional parameters only when declared', () => {
			const query = expectQuery(
				analyze('$1 + 1', { mode: 'expression', positional: [typeRef('integer')] })
			)
			assert.deepStrictEqual(query.columns, [{ name: '?column?', type: typeRef('integer') }])
			assert.deepStrictEqual(analyze('$1 + 1', { mode: 'expression' }), {
				error: { message: 'there is no parameter $1', position: 1, sqlstate: '42P02' },
				ok: false,
			})
		})

		it('should report transaction control statements', () => {
			const query = expectQuery(analyze('COMMIT'))
			assert.strictEqual(query.command, 'utility')
			assert.strictEqual(query.transactionControl, true)
			assert.strictEqual(query.utilityTag, 'COMMIT')
		})
	})
})
