import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type CheckRequest, type CheckResult, checkRoutine } from '../../src/check/checker.ts'
import { CLOSED, UNCLOSED } from '../../src/core/closing.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

const accounts = 'CREATE TABLE accounts (id integer, owner text);\n'

function run(script: string, request: Omit<CheckRequest, 'routine'> = {}): CheckResult {
	const { bridge, script: loaded } = MemoryBridge.fromScript(script)
	assert.deepStrictEqual(loaded.problems, [])
	const routine = loaded.routines.at(-1)
	assert.ok(routine)
	return checkRoutine(bridge, { ...request, routine })
}

function brief(result: CheckResult): string[] {
	return result.diagnostics.map((d) => `${d.line ?? '-'} ${d.code} ${d.message}`)
}

describe('check/scenarios', () => {
	describe('control flow', () => {
		it('should accept a routine that always returns', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  RETURN n + 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
			assert.deepStrictEqual(result.dependencies, [])
			assert.strictEqual(result.checked, true)
			assert.strictEqual(result.cancelled, false)
		})

		it('should report a missing RETURN', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  NULL;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'- PCFLOW002 control reached end of function without RETURN',
			])
		})

		it('should report a RETURN reached on some paths only', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  IF n > 0 THEN
    RETURN 1;
  END IF;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'- PCFLOW003 control reached end of function without RETURN',
			])
		})

		it('should report a missing RETURN after a loop left by EXIT', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  LOOP
    IF n > 0 THEN
      EXIT;
    END IF;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'- PCFLOW002 control reached end of function without RETURN',
			])
			assert.deepStrictEqual(result.closing, UNCLOSED)
		})

		it('should report a missing RETURN after a block left by EXIT', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  <<b>>
  BEGIN
    EXIT b;
  END;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'- PCFLOW002 control reached end of function without RETURN',
			])
			assert.deepStrictEqual(result.closing, UNCLOSED)
		})

		it('should report a missing RETURN after a loop that only continues', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  WHILE n > 0 LOOP
    CONTINUE;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'- PCFLOW002 control reached end of function without RETURN',
			])
			assert.deepStrictEqual(result.closing, UNCLOSED)
		})

		it('should report unreachable code once', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RETURN 1;
  RETURN 2;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), ['4 PCFLOW001 unreachable code'])
		})

		it('should not flag a trailing RETURN in a set-returning function', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS SETOF integer AS $$
BEGIN
  RETURN QUERY SELECT 1;
  RETURN;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [])
		})
	})

	describe('assignments', () => {
		it('should report text assigned to an integer', () => {
			const result = run(`CREATE FUNCTION fx(t text) RETURNS integer AS $$
DECLARE
  total integer;
BEGIN
  total := t;
  RETURN total;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'5 PCTYPE004 target type is different type than source type',
			])
			const [diagnostic] = result.diagnostics
			assert.strictEqual(diagnostic?.detail, 'cast "text" value to "integer" type')
			assert.strictEqual(diagnostic.statement, 'assignment')
		})

		it('should report a date assigned to an integer', () => {
			const result = run(`CREATE FUNCTION fx(d date) RETURNS integer AS $$
DECLARE
  total integer;
BEGIN
  total := d;
  RETURN total;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'5 PCTYPE003 target type is different type than source type',
			])
		})
	})

	describe('embedded SQL', () => {
		it('should report a missing relation with its position', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  PERFORM id FROM missing;
END
$$ LANGUAGE plpgsql;`)
			assert.strictEqual(result.diagnostics.length, 1)
			const [diagnostic] = result.diagnostics
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.code, 'PCSQL001')
			assert.strictEqual(diagnostic.level, 'error')
			assert.strictEqual(diagnostic.message, 'relation "missing" does not exist')
			assert.strictEqual(diagnostic.sqlstate, '42P01')
			assert.strictEqual(diagnostic.position, 16)
			assert.strictEqual(diagnostic.query, 'SELECT id FROM missing')
			assert.strictEqual(diagnostic.line, 3)
			assert.strictEqual(diagnostic.statement, 'PERFORM')
		})

		it('should report a SELECT without INTO', () => {
			const result = run(`${accounts}CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  SELECT id FROM accounts;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => [d.line, d.code, d.hint]),
				[[3, 'PCREC008', 'If you want to discard the results of a SELECT, use PERFORM instead.']]
			)
		})

		it('should report INTO on a command that returns nothing', () => {
			const result = run(`${accounts}CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  v integer;
BEGIN
  UPDATE accounts SET owner = 'x' INTO v;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'5 PCREC009 INTO used with a command that cannot return data',
			])
		})

		it('should report too few columns for the INTO targets', () => {
			const result = run(`${accounts}CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  a integer;
  b integer;
BEGIN
  SELECT id INTO a, b FROM accounts;
  RETURN a + b;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'6 PCREC002 too few attributes for target variables',
			])
		})
	})

	describe('records', () => {
		it('should report a field read from an unassigned record', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  RETURN r.id;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'5 PCSQL001 record "r" is not assigned yet',
				'3 PCDECL001 unused variable "r"',
			])
		})

		it('should report a record reassigned with a different shape', () => {
			const result = run(`${accounts}CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  SELECT id, owner INTO r FROM accounts;
  SELECT owner INTO r FROM accounts;
  RETURN r.id;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'6 PCREC006 record "r" is reassigned with a different structure',
				'7 PCSQL001 record "r" has no field "id"',
				'3 PCDECL002 never read variable "r"',
			])
			assert.strictEqual(
				result.diagnostics[0]?.detail,
				'previous shape (id integer, owner text), new shape (owner text)'
			)
		})
	})

	describe('dynamic SQL', () => {
		const injectable = `CREATE FUNCTION fx(tbl text) RETURNS void AS $$
BEGIN
  EXECUTE 'DELETE FROM ' || tbl;
END
$$ LANGUAGE plpgsql;`

		it('should report an injectable variable when security warnings are on', () => {
			const result = run(injectable, { options: { warnings: { security: true } } })
			assert.strictEqual(result.diagnostics.length, 1)
			const [diagnostic] = result.diagnostics
			assert.ok(diagnostic)
			assert.strictEqual(diagnostic.code, 'PCSEC001')
			assert.strictEqual(diagnostic.level, 'security')
			assert.strictEqual(diagnostic.position, 19)
			assert.strictEqual(diagnostic.query, "'DELETE FROM ' || tbl")
			assert.strictEqual(diagnostic.line, 3)
			assert.strictEqual(diagnostic.statement, 'EXECUTE')
		})

		it('should stay silent about injection by default', () => {
			assert.deepStrictEqual(run(injectable).diagnostics, [])
		})

		it('should accept a quoted identifier', () => {
			const result = run(
				`CREATE FUNCTION fx(tbl text) RETURNS void AS $$
BEGIN
  EXECUTE 'DELETE FROM ' || quote_ident(tbl);
END
$$ LANGUAGE plpgsql;`,
				{ options: { warnings: { security: true } } }
			)
			assert.deepStrictEqual(result.diagnostics, [])
		})

		it('should report values passed by USING but never referenced', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
DECLARE
  v integer;
BEGIN
  EXECUTE 'SELECT 1' INTO v USING n;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => d.code),
				['PCDYN003']
			)
		})

		it('should report a record filled by dynamic SQL', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  EXECUTE 'SELECT ' || n INTO r;
  RETURN r.id;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'5 PCDYN004 cannot determinate a result of dynamic SQL',
			])
		})
	})

	describe('RAISE and handlers', () => {
		function raising(statement: string): CheckResult {
			return run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  ${statement}
END
$$ LANGUAGE plpgsql;`)
		}

		it('should report too few RAISE parameters', () => {
			assert.deepStrictEqual(brief(raising("RAISE NOTICE 'a % b %', 1;")), [
				'3 PCFLOW007 too few parameters specified for RAISE',
			])
		})

		it('should report too many RAISE parameters', () => {
			assert.deepStrictEqual(brief(raising("RAISE NOTICE 'a', 1;")), [
				'3 PCFLOW008 too many parameters specified for RAISE',
			])
		})

		it('should report a re-raise outside a handler', () => {
			assert.deepStrictEqual(brief(raising('RAISE;')), [
				'3 PCFLOW012 RAISE without parameters cannot be used outside an exception handler',
			])
		})

		it('should report a repeated RAISE option', () => {
			assert.deepStrictEqual(
				brief(raising("RAISE NOTICE 'x' USING HINT = 'a', HINT = 'b';")),
				['3 PCFLOW009 RAISE option already specified: HINT']
			)
		})

		it('should treat a handled exception as a return path', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RAISE EXCEPTION 'boom';
EXCEPTION WHEN others THEN
  RETURN 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
		})

		it('should keep exceptions a handler does not catch', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RAISE EXCEPTION 'boom';
EXCEPTION WHEN division_by_zero THEN
  RETURN 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, {
				raises: ['P0001'],
				status: 'closed-by-exceptions',
			})
		})

		it('should report an unknown condition name', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RETURN 1;
EXCEPTION WHEN no_such_thing THEN
  RETURN 2;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => [d.line, d.code, d.message, d.statement]),
				[[2, 'PCFLOW011', 'unrecognized exception condition "no_such_thing"', 'statement block']]
			)
		})
	})

	describe('labels and transactions', () => {
		it('should report misused EXIT and CONTINUE', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  EXIT WHEN true;
  LOOP
    CONTINUE missing WHEN true;
    EXIT;
  END LOOP;
  <<blk>>
  BEGIN
    CONTINUE blk WHEN true;
  END;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'3 PCFLOW006 EXIT cannot be used outside a loop',
				'5 PCFLOW004 label "missing" does not exist',
				'10 PCFLOW005 block label "blk" cannot be used in CONTINUE',
			])
		})

		it('should report COMMIT inside a function', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  COMMIT;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), ['3 PCFLOW010 invalid transaction termination'])
		})

		it('should accept COMMIT inside a procedure', () => {
			const result = run(`CREATE PROCEDURE px() AS $$
BEGIN
  COMMIT;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})
	})

	describe('declarations', () => {
		it('should report a variable that hides a parameter', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
DECLARE
  n integer := 1;
BEGIN
  RETURN n;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'3 PCDECL007 parameter "n" is overlapped',
				'- PCDECL003 unused parameter "n"',
			])
		})
	})

	describe('pragmas', () => {
		it('should suspend checking between disable and enable', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  PERFORM plcheck_pragma('disable:check');
  SELECT 1;
  PERFORM plcheck_pragma('enable:check');
  SELECT 2;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code}`),
				['6 PCREC008']
			)
		})

		it('should scope a pragma to its block', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  BEGIN
    PERFORM plcheck_pragma('disable:check');
    SELECT 1;
  END;
  SELECT 2;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code}`),
				['7 PCREC008']
			)
		})

		it('should emit status and echo notices', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  PERFORM plcheck_pragma('status:extra_warnings');
  PERFORM plcheck_pragma('echo:checking @@name');
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.notices, ['extra_warnings is enabled', 'checking fx'])
		})

		it('should give a record the shape of a type pragma', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  PERFORM plcheck_pragma('type:r(id integer, owner text)');
  RETURN r.id;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})

		it('should know tables declared by a pragma', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS integer AS $$
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

		it('should report malformed pragmas', () => {
			const result = run(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  PERFORM plcheck_pragma('bogus');
  PERFORM plcheck_pragma('enable:nosuch');
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(brief(result), [
				'3 PCPRAGMA001 invalid pragma "bogus"',
				'4 PCPRAGMA001 invalid pragma "enable:nosuch"',
			])
			assert.strictEqual(result.diagnostics[1]?.detail, 'unknown feature "nosuch"')
		})
	})

	describe('end to end', () => {
		it('should report a field missing from a star query once', () => {
			const result = run(`CREATE TABLE t1 (a integer, b integer);
CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  SELECT * INTO r FROM t1;
  RETURN r.c;
END
$$ LANGUAGE plpgsql;`)
			const errors = result.diagnostics.filter((d) => d.level === 'error')
			assert.deepStrictEqual(
				errors.map((d) => [d.line, d.sqlstate, d.message]),
				[[6, '42703', 'record "r" has no field "c"']]
			)
		})

		it('should check a dynamically filled record through its type pragma', () => {
			const result = run(`CREATE FUNCTION fx(tbl text) RETURNS integer AS $$
DECLARE
  r record;
BEGIN
  PERFORM plcheck_pragma('type:r(id int, processed bool)');
  EXECUTE format('SELECT id, processed FROM %I', tbl) INTO r;
  IF NOT r.processed THEN
    RETURN r.id;
  END IF;
  RETURN 0;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})

		it('should close an IF whose branches both return', () => {
			const result = run(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  IF n > 0 THEN
    RETURN 1;
  ELSE
    RETURN 0;
  END IF;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
		})
	})
})
