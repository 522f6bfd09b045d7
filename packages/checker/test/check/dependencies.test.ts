import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type CheckResult, checkRoutine } from '../../src/check/checker.ts'
import { type Dependency, DependencyCollector } from '../../src/check/dependencies.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

function check(script: string): CheckResult {
	const { bridge, script: loaded } = MemoryBridge.fromScript(script)
	assert.deepStrictEqual(loaded.problems, [])
	const routine = loaded.routines.at(-1)
	assert.ok(routine)
	return checkRoutine(bridge, { routine })
}

const accounts: Dependency = {
	identity: 16384,
	kind: 'RELATION',
	name: 'accounts',
	params: null,
	schema: 'public',
}

describe('check/dependencies', () => {
	describe('DependencyCollector', () => {
		it('should keep the first entry for a kind and identity', () => {
			const collector = new DependencyCollector()
			collector.add(accounts)
			collector.add({ ...accounts, name: 'renamed' })
			collector.add({ ...accounts, kind: 'FUNCTION', params: '()' })
			assert.strictEqual(collector.size, 2)
			assert.deepStrictEqual(
				collector.list().map((d) => `${d.kind} ${d.name}`),
				['RELATION accounts', 'FUNCTION accounts']
			)
			collector.clear()
			assert.deepStrictEqual(collector.list(), [])
		})
	})

	describe('in a routine', () => {
		it('should list relations and user functions in discovery order', () => {
			const result = check(`CREATE TABLE accounts (id integer, owner text);
CREATE FUNCTION add_one(n integer) RETURNS integer AS $$
BEGIN
  RETURN n + 1;
END
$$ LANGUAGE plpgsql;
CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  v integer;
BEGIN
  SELECT add_one(id) INTO v FROM accounts WHERE length(owner) > 1;
  PERFORM id FROM accounts;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.dependencies, [
				accounts,
				{
					identity: 16385,
					kind: 'FUNCTION',
					name: 'add_one',
					params: '(integer)',
					schema: 'public',
				},
			])
		})

		it('should list called procedures', () => {
			const result = check(`CREATE PROCEDURE audit(n integer) AS $$
BEGIN
  PERFORM n;
END
$$ LANGUAGE plpgsql;
CREATE FUNCTION fx(n integer) RETURNS void AS $$
BEGIN
  CALL audit(n);
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.dependencies, [
				{
					identity: 16384,
					kind: 'PROCEDURE',
					name: 'audit',
					params: '(integer)',
					schema: 'public',
				},
			])
		})

		it('should list relations declared for the run under pg_temp', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  v integer;
BEGIN
  PERFORM plcheck_pragma('table:tmp(id integer)');
  SELECT id INTO v FROM tmp;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.dependencies, [
				{ identity: -1, kind: 'RELATION', name: 'tmp', params: null, schema: 'pg_temp' },
			])
		})
	})
})
