import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type CheckResult, checkRoutine } from '../../src/check/checker.ts'
import { markerArguments, PragmaStack, parsePragma } from '../../src/check/pragma.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

function check(body: string, header = 'CREATE FUNCTION fx() RETURNS void'): CheckResult {
	const { bridge, script } = MemoryBridge.fromScript(`CREATE TABLE accounts (id integer, owner text);
${header} AS $$
${body}
$$ LANGUAGE plpgsql;`)
	assert.deepStrictEqual(script.problems, [])
	const routine = script.routines.at(-1)
	assert.ok(routine)
	return checkRoutine(bridge, { routine })
}

function invalidReasons(result: CheckResult): (string | undefined)[] {
	return result.diagnostics.filter((d) => d.code === 'PCPRAGMA001').map((d) => d.detail)
}

describe('check/pragma', () => {
	describe('parsePragma', () => {
		it('should parse toggles case-insensitively', () => {
			assert.deepStrictEqual(parsePragma('disable:check'), {
				action: { feature: 'check', kind: 'disable' },
				ok: true,
			})
			assert.deepStrictEqual(parsePragma('ENABLE:Extra_Warnings'), {
				action: { feature: 'extra_warnings', kind: 'enable' },
				ok: true,
			})
			assert.deepStrictEqual(parsePragma('status:check'), {
				action: { feature: 'check', kind: 'status' },
				ok: true,
			})
		})

		it('should parse record type hints with fields', () => {
			assert.deepStrictEqual(parsePragma('type:r(id integer, owner text)'), {
				action: {
					fields: [
						{ name: 'id', type: 'integer' },
						{ name: 'owner', type: 'text' },
					],
					kind: 'type',
					target: ['r'],
					typeName: null,
				},
				ok: true,
			})
		})

		it('should parse record type hints naming a type', () => {
			assert.deepStrictEqual(parsePragma('type:r accounts'), {
				action: { fields: null, kind: 'type', target: ['r'], typeName: 'accounts' },
				ok: true,
			})
		})

		it('should parse table definitions', () => {
			assert.deepStrictEqual(parsePragma('table:tmp(like accounts)'), {
				action: { columns: null, kind: 'table', like: ['accounts'], name: ['tmp'] },
				ok: true,
			})
			assert.deepStrictEqual(parsePragma('table:tmp(id integer)'), {
				action: {
					columns: [{ name: 'id', type: 'integer' }],
					kind: 'table',
					like: null,
					name: ['tmp'],
				},
				ok: true,
			})
		})

		it('should parse qualified sequence names', () => {
			assert.deepStrictEqual(parsePragma('sequence:public.seq'), {
				action: { kind: 'sequence', name: ['public', 'seq'] },
				ok: true,
			})
		})

		it('should trim echo text', () => {
			assert.deepStrictEqual(parsePragma('echo: hello'), {
				action: { kind: 'echo', text: 'hello' },
				ok: true,
			})
		})

		it('should reject unknown directives', () => {
			assert.strictEqual(parsePragma('nonsense').ok, false)
			assert.strictEqual(parsePragma('').ok, false)
		})
	})

	describe('markerArguments', () => {
		it('should return the directive strings', () => {
			assert.deepStrictEqual(markerArguments("plcheck_pragma('a', 'b')"), ['a', 'b'])
		})

		it('should accept a SELECT prefix and doubled quotes', () => {
			assert.deepStrictEqual(markerArguments("SELECT plcheck_pragma('it''s')"), ["it's"])
		})

		it('should return null for other calls', () => {
			assert.strictEqual(markerArguments('length(x)'), null)
		})
	})

	describe('PragmaStack', () => {
		it('should drop block toggles on pop', () => {
			const stack = new PragmaStack()
			stack.push()
			stack.set('check', false, 'block')
			assert.deepStrictEqual(stack.current(), { check: false })
			stack.pop()
			assert.deepStrictEqual(stack.current(), {})
		})

		it('should inherit toggles into nested frames', () => {
			const stack = new PragmaStack()
			stack.set('security_warnings', true, 'block')
			stack.push()
			assert.deepStrictEqual(stack.current(), { security_warnings: true })
		})

		it('should apply routine toggles to every frame', () => {
			const stack = new PragmaStack()
			stack.push()
			stack.set('extra_warnings', false, 'routine')
			stack.pop()
			assert.deepStrictEqual(stack.current(), { extra_warnings: false })
		})

		it('should never pop the base frame', () => {
			const stack = new PragmaStack()
			stack.set('check', false, 'block')
			stack.pop()
			assert.deepStrictEqual(stack.current(), { check: false })
			stack.clear()
			assert.deepStrictEqual(stack.current(), {})
		})
	})

	describe('in a routine', () => {
		it('should apply a marker in the declaration section to the whole routine', () => {
			const result = check(`DECLARE
  p integer := plcheck_pragma('disable:extra_warnings');
  r record;
BEGIN
  SELECT id INTO r FROM accounts;
  SELECT owner INTO r FROM accounts;
  PERFORM r.owner;
END`)
			assert.deepStrictEqual(result.diagnostics, [])
		})

		it('should echo routine details', () => {
			const result = check(
				`BEGIN
  PERFORM plcheck_pragma('echo:@@signature is @@name');
  RETURN n;
END`,
				'CREATE FUNCTION fx(n integer) RETURNS integer'
			)
			assert.deepStrictEqual(result.notices, ['fx(integer) is fx'])
		})

		it('should report the toggle state', () => {
			const result = check(`BEGIN
  PERFORM plcheck_pragma('status:security_warnings', 'enable:security_warnings');
  PERFORM plcheck_pragma('status:security_warnings');
END`)
			assert.deepStrictEqual(result.notices, [
				'security_warnings is disabled',
				'security_warnings is enabled',
			])
		})

		it('should explain type hints it cannot apply', () => {
			const result = check(`DECLARE
  v integer;
  r record;
BEGIN
  PERFORM plcheck_pragma('type:nosuch(id integer)');
  PERFORM plcheck_pragma('type:v(id integer)');
  PERFORM plcheck_pragma('type:r(id nosuchtype)');
  PERFORM plcheck_pragma('type:r integer');
END`)
			assert.deepStrictEqual(invalidReasons(result), [
				'variable "nosuch" does not exist',
				'variable "v" is not a record',
				'type "nosuchtype" does not exist',
				'type "integer" is not a composite type',
			])
		})

		it('should copy columns of an existing table', () => {
			const result = check(
				`DECLARE
  v text;
BEGIN
  PERFORM plcheck_pragma('table:tmp(like accounts)', 'table:bad(like missing)');
  SELECT owner INTO v FROM tmp;
  RETURN v;
END`,
				'CREATE FUNCTION fx() RETURNS text'
			)
			assert.deepStrictEqual(invalidReasons(result), ['relation "missing" does not exist'])
			assert.strictEqual(result.diagnostics.length, 1)
		})
	})
})
