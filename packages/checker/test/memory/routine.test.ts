import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { Routine } from '../../src/host/ast.ts'
import { RelationKind, typeRef, Volatility } from '../../src/host/types.ts'
import { MemoryCatalog } from '../../src/memory/catalog.ts'
import {
	CompileError,
	compileRoutine,
	formatSignature,
	type RoutineHeader,
} from '../../src/memory/routine/compiler.ts'
import { extractInto } from '../../src/memory/routine/into.ts'
import { parseRoutineBody, RoutineSyntaxError } from '../../src/memory/routine/parser.ts'

function createCatalog(): MemoryCatalog {
	const catalog = new MemoryCatalog()
	catalog.addRelation('accounts', RelationKind.Table, [
		{ name: 'id', type: typeRef('integer') },
		{ name: 'owner', type: typeRef('text') },
	])
	return catalog
}

function header(body: string, overrides: Partial<RoutineHeader> = {}): RoutineHeader {
	return {
		body,
		fingerprint: 'v1',
		identity: 20000,
		kind: 'function',
		language: 'plpgsql',
		name: 'fx',
		params: [],
		returnType: typeRef('integer'),
		returnsSet: false,
		schema: 'public',
		settings: {},
		volatility: Volatility.Volatile,
		...overrides,
	}
}

function compile(body: string, overrides: Partial<RoutineHeader> = {}): Routine {
	return compileRoutine(header(body, overrides), createCatalog())
}

function slotOf(routine: Routine, name: string): number {
	const datum = routine.datums.find((candidate) => candidate.name === name)
	if (datum === undefined) assert.fail(`no datum named ${name}`)
	return datum.slot
}

describe('memory/routine', () => {
	describe('parseRoutineBody', () => {
		it('should capture statements with their lines', () => {
			const block = parseRoutineBody(`
DECLARE
  total integer := 0;
BEGIN
  total := total + 1;
  IF total > 1 THEN
    RETURN total;
  END IF;
  RETURN 0;
END`)
			assert.strictEqual(block.line, 2)
			assert.strictEqual(block.label, null)
			assert.deepStrictEqual(block.declarations, [
				{
					defaultExpr: { line: 3, text: '0' },
					isConst: false,
					kind: 'variable',
					line: 3,
					name: 'total',
					notNull: false,
					typeText: 'integer',
				},
			])
			assert.deepStrictEqual(block.body, [
				{ expr: { line: 5, text: 'total + 1' }, kind: 'assign', line: 5, target: ['total'] },
				{
					cond: { line: 6, text: 'total > 1' },
					elsifs: [],
					kind: 'if',
					line: 6,
					otherwise: null,
					then: [{ expr: { line: 7, text: 'total' }, kind: 'return', line: 7 }],
				},
				{ expr: { line: 9, text: '0' }, kind: 'return', line: 9 },
			])
		})

		it('should fold identifiers and keep quoted ones', () => {
			const block = parseRoutineBody('BEGIN Total := 1; "Mixed" := 2; END')
			const [first, second] = block.body
			assert.ok(first?.kind === 'assign')
			assert.deepStrictEqual(first.target, ['total'])
			assert.ok(second?.kind === 'assign')
			assert.deepStrictEqual(second.target, ['Mixed'])
		})

		it('should treat unrecognised statements as SQL', () => {
			const block = parseRoutineBody("BEGIN\n  UPDATE accounts SET owner = 'x';\nEND")
			assert.deepStrictEqual(block.body, [
				{ kind: 'sql', line: 2, query: { line: 2, text: "UPDATE accounts SET owner = 'x'" } },
			])
		})

		it('should keep labels on blocks', () => {
			const block = parseRoutineBody('<<outer>>\nBEGIN\nNULL;\nEND')
			assert.strictEqual(block.label, 'outer')
			assert.strictEqual(block.line, 1)
			assert.deepStrictEqual(block.body, [{ kind: 'null', line: 3 }])
		})

		it('should reject a body without END', () => {
			assert.throws(
				() => parseRoutineBody('BEGIN\n  RETURN 1;\n'),
				(error: unknown) =>
					error instanceof RoutineSyntaxError &&
					error.message.startsWith('syntax error in routine body: ')
			)
		})
	})

	describe('extractInto', () => {
		it('should blank the INTO clause and keep positions', () => {
			const extracted = extractInto('SELECT a, b INTO x, r.f FROM t')
			assert.deepStrictEqual(extracted.into, { strict: false, targets: [['x'], ['r', 'f']] })
			assert.strictEqual(extracted.text, `SELECT a, b ${' '.repeat(11)} FROM t`)
			assert.strictEqual(extracted.text.length, 'SELECT a, b INTO x, r.f FROM t'.length)
		})

		it('should read STRICT', () => {
			assert.deepStrictEqual(extractInto('SELECT 1 INTO STRICT v').into, {
				strict: true,
				targets: [['v']],
			})
		})

		it('should skip the INTO of an INSERT', () => {
			const extracted = extractInto('INSERT INTO t VALUES (1) RETURNING id INTO v')
			assert.deepStrictEqual(extracted.into, { strict: false, targets: [['v']] })
			assert.strictEqual(extracted.text.startsWith('INSERT INTO t'), true)
		})

		it('should ignore INTO inside literals and parentheses', () => {
			assert.strictEqual(extractInto("SELECT 'into x'").into, null)
			assert.strictEqual(extractInto('SELECT (SELECT 1 INTO y)').into, null)
		})

		it('should leave statements without INTO unchanged', () => {
			assert.deepStrictEqual(extractInto('SELECT 1'), { into: null, text: 'SELECT 1' })
		})
	})

	describe('compileRoutine', () => {
		it('should put parameters before implicit variables', () => {
			const routine = compile('BEGIN RETURN a; END', {
				params: [{ mode: 'in', name: 'a', type: typeRef('integer') }],
			})
			assert.strictEqual(routine.signature, 'fx(integer)')
			assert.deepStrictEqual(
				routine.datums.map((datum) => [datum.slot, datum.name, datum.origin]),
				[
					[0, 'a', 'param'],
					[1, 'found', 'implicit'],
				]
			)
			assert.deepStrictEqual(routine.params, [
				{ mode: 'in', name: 'a', slot: 0, type: typeRef('integer') },
			])
		})

		it('should number blocks and statements in order', () => {
			const routine = compile('BEGIN x := 1; BEGIN RETURN x; END; END', {
				params: [{ mode: 'in', name: 'x', type: typeRef('integer') }],
			})
			assert.strictEqual(routine.body.id, 1)
			const [assign, inner] = routine.body.body
			assert.strictEqual(assign?.id, 2)
			assert.ok(inner?.kind === 'block')
			assert.strictEqual(inner.id, 3)
			assert.strictEqual(inner.body[0]?.id, 4)
		})

		it('should name unnamed parameters through ALIAS FOR', () => {
			const routine = compile('DECLARE p ALIAS FOR $1; BEGIN RETURN p; END', {
				params: [{ mode: 'in', name: null, type: typeRef('text') }],
			})
			assert.deepStrictEqual(routine.params[0], {
				mode: 'in',
				name: 'p',
				slot: 0,
				type: typeRef('text'),
			})
			assert.deepStrictEqual(routine.body.declarations, [])
		})

		it('should move INTO targets out of the query text', () => {
			const routine = compile('DECLARE v integer; BEGIN SELECT 1 INTO v; END')
			const [stmt] = routine.body.body
			assert.ok(stmt?.kind === 'execsql')
			assert.deepStrictEqual(stmt.into, { strict: false, targets: [slotOf(routine, 'v')] })
			assert.deepStrictEqual(stmt.query, { line: 1, text: 'SELECT 1' })
		})

		it('should create record field datums on first use', () => {
			const routine = compile('DECLARE r record; BEGIN r.a := 1; r.a := 2; END')
			const field = routine.datums.find((datum) => datum.kind === 'recfield')
			assert.ok(field?.kind === 'recfield')
			assert.strictEqual(field.name, 'r.a')
			assert.strictEqual(field.parent, slotOf(routine, 'r'))
			const targets = routine.body.body.map((stmt) => (stmt.kind === 'assign' ? stmt.target : -1))
			assert.deepStrictEqual(targets, [field.slot, field.slot])
		})

		it('should resolve label-qualified names to the outer variable', () => {
			const routine = compile(
				'<<outer>> DECLARE x integer; BEGIN DECLARE x integer; BEGIN outer.x := 1; END; END'
			)
			assert.deepStrictEqual(routine.body.declarations, [1])
			const [inner] = routine.body.body
			assert.ok(inner?.kind === 'block')
			assert.deepStrictEqual(inner.declarations, [2])
			const [assign] = inner.body
			assert.ok(assign?.kind === 'assign')
			assert.strictEqual(assign.target, 1)
		})

		it('should type %ROWTYPE declarations from the relation', () => {
			const routine = compile('DECLARE a accounts%ROWTYPE; BEGIN NULL; END')
			const datum = routine.datums[slotOf(routine, 'a')]
			assert.ok(datum?.kind === 'row')
			assert.deepStrictEqual(
				datum.fields.map((field) => field.name),
				['id', 'owner']
			)
		})

		it('should scope integer loop counters', () => {
			const routine = compile('BEGIN FOR i IN 1..3 LOOP NULL; END LOOP; END')
			const [loop] = routine.body.body
			assert.ok(loop?.kind === 'fori')
			assert.deepStrictEqual(loop.lower, { line: 1, text: '1' })
			assert.deepStrictEqual(loop.upper, { line: 1, text: '3' })
			const counter = routine.datums[loop.variable]
			assert.ok(counter?.kind === 'var')
			assert.strictEqual(counter.origin, 'scoped')
			assert.strictEqual(counter.type.name, 'integer')
		})

		it('should bind cursors and check cursor statements', () => {
			const routine = compile('DECLARE c CURSOR FOR SELECT 1; BEGIN OPEN c; CLOSE c; END')
			const cursor = routine.datums[slotOf(routine, 'c')]
			assert.ok(cursor?.kind === 'var')
			assert.deepStrictEqual(cursor.cursor, { args: [], query: { line: 1, text: 'SELECT 1' } })
			const kinds = routine.body.body.map((stmt) => stmt.kind)
			assert.deepStrictEqual(kinds, ['open', 'close'])
		})

		it('should declare trigger variables for trigger functions', () => {
			const routine = compile('BEGIN RETURN NEW; END', { returnType: typeRef('trigger') })
			assert.strictEqual(routine.trigger, 'dml')
			assert.deepStrictEqual(
				routine.datums.slice(0, 4).map((datum) => datum.name),
				['found', 'new', 'old', 'tg_name']
			)
			assert.strictEqual(routine.datums[1]?.kind, 'rec')
		})

		it('should give other languages an empty body', () => {
			const routine = compile('SELECT 1', { language: 'sql' })
			assert.deepStrictEqual(routine.body.body, [])
			assert.deepStrictEqual(
				routine.datums.map((datum) => datum.name),
				['found']
			)
		})

		describe('errors', () => {
			function compileError(body: string): CompileError {
				try {
					compile(body)
				} catch (error) {
					if (error instanceof CompileError) return error
					throw error
				}
				return assert.fail('expected a compile error')
			}

			it('should reject unknown assignment targets', () => {
				const error = compileError('BEGIN y := 1; END')
				assert.strictEqual(error.message, '"y" is not a known variable')
				assert.strictEqual(error.line, 1)
			})

			it('should reject unknown types', () => {
				const error = compileError('\nDECLARE x nosuch;\nBEGIN\nNULL;\nEND')
				assert.strictEqual(error.message, 'type "nosuch" does not exist')
				assert.strictEqual(error.line, 2)
			})

			it('should reject %ROWTYPE of a missing relation', () => {
				const error = compileError('DECLARE x missing%ROWTYPE; BEGIN NULL; END')
				assert.strictEqual(error.message, 'relation "missing" does not exist')
			})

			it('should reject cursor statements on other variables', () => {
				const error = compileError('DECLARE n integer; BEGIN CLOSE n; END')
				assert.strictEqual(error.message, 'variable "n" must be of type cursor or refcursor')
			})

			it('should turn syntax errors into compile errors', () => {
				const error = compileError('BEGIN\n  RETURN 1;\n')
				assert.ok(error.message.startsWith('syntax error in routine body: '))
			})
		})
	})

	describe('formatSignature', () => {
		it('should list input parameters only', () => {
			const signature = formatSignature(createCatalog(), 'fx', [
				{ mode: 'in', name: 'a', type: typeRef('integer') },
				{ mode: 'out', name: 'b', type: typeRef('text') },
				{ mode: 'inout', name: 'c', type: typeRef('boolean') },
			])
			assert.strictEqual(signature, 'fx(integer,boolean)')
		})
	})
})
