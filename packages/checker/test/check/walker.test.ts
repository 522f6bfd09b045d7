import assert from 'node:assert'
import { describe, it } from 'node:test'
import { type CheckResult, checkRoutine } from '../../src/check/checker.ts'
import { countPlaceholders } from '../../src/check/walker.ts'
import { CLOSED, POSSIBLY_CLOSED, UNCLOSED } from '../../src/core/closing.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

function check(script: string): CheckResult {
	const { bridge, script: loaded } = MemoryBridge.fromScript(script)
	assert.deepStrictEqual(loaded.problems, [])
	const routine = loaded.routines.at(-1)
	assert.ok(routine)
	return checkRoutine(bridge, { routine })
}

function codes(result: CheckResult): string[] {
	return result.diagnostics.map((d) => `${d.line ?? '-'} ${d.code}`)
}

describe('check/walker', () => {
	describe('countPlaceholders', () => {
		it('should count single percent signs', () => {
			assert.strictEqual(countPlaceholders('a % b %'), 2)
		})

		it('should skip escaped percent signs', () => {
			assert.strictEqual(countPlaceholders('100%% sure, %'), 1)
		})

		it('should return zero for plain text', () => {
			assert.strictEqual(countPlaceholders(''), 0)
			assert.strictEqual(countPlaceholders('done'), 0)
		})
	})

	describe('loops', () => {
		it('should treat a plain loop that returns as closed', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  LOOP
    RETURN 1;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
		})

		it('should treat a WHILE body as possibly skipped', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  WHILE n > 0 LOOP
    RETURN n;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['- PCFLOW003'])
		})

		it('should continue after a loop left by EXIT', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  LOOP
    EXIT;
  END LOOP;
  RETURN 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
		})

		it('should accept an integer FOR loop', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
DECLARE
  total integer := 0;
BEGIN
  FOR i IN 1..n LOOP
    total := total + i;
  END LOOP;
  RETURN total;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})

		it('should report FOREACH over a value that is not an array', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS void AS $$
DECLARE
  x integer;
BEGIN
  FOREACH x IN ARRAY n LOOP
    PERFORM x;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code} ${d.message}`),
				['5 PCTYPE015 FOREACH expression must yield an array, not type integer']
			)
		})
	})

	describe('EXIT and CONTINUE', () => {
		it('should leave a loop unclosed when EXIT is its only way out', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  LOOP
    EXIT WHEN n > 0;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['- PCFLOW002'])
			assert.deepStrictEqual(result.closing, UNCLOSED)
		})

		it('should treat a returning loop with an EXIT as possibly closed', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  LOOP
    IF n > 0 THEN
      EXIT;
    END IF;
    RETURN n;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['- PCFLOW003'])
			assert.deepStrictEqual(result.closing, POSSIBLY_CLOSED)
		})

		it('should not count statements after an EXIT', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  LOOP
    EXIT;
    RETURN 1;
  END LOOP;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['5 PCFLOW001', '- PCFLOW002'])
			assert.deepStrictEqual(result.closing, UNCLOSED)
		})

		it('should report the statement after a CONTINUE as unreachable', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  i integer := 0;
BEGIN
  WHILE i < 3 LOOP
    CONTINUE;
    i := i + 1;
  END LOOP;
  RETURN i;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['7 PCFLOW001'])
			assert.deepStrictEqual(result.closing, CLOSED)
		})

		it('should treat a returning block left by EXIT as possibly closed', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  <<b>>
  BEGIN
    IF n > 0 THEN
      EXIT b;
    END IF;
    RETURN n;
  END;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['- PCFLOW003'])
			assert.deepStrictEqual(result.closing, POSSIBLY_CLOSED)
		})
	})

	describe('branches', () => {
		it('should treat CASE without ELSE as possibly closed when every WHEN returns', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  CASE
    WHEN n > 0 THEN
      RETURN 1;
    WHEN n < 0 THEN
      RETURN 2;
  END CASE;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['- PCFLOW003'])
			assert.deepStrictEqual(result.closing, POSSIBLY_CLOSED)
		})

		it('should close CASE when ELSE returns too', () => {
			const result = check(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  CASE
    WHEN n > 0 THEN
      RETURN 1;
    ELSE
      RETURN 2;
  END CASE;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, CLOSED)
		})
	})

	describe('exception handlers', () => {
		it('should not let OTHERS catch a query cancellation', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RAISE query_canceled;
EXCEPTION WHEN others THEN
  RETURN 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
			assert.deepStrictEqual(result.closing, {
				raises: ['57014'],
				status: 'closed-by-exceptions',
			})
		})

		it('should let a class code catch its members', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RAISE division_by_zero;
EXCEPTION WHEN SQLSTATE '22000' THEN
  RETURN 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.closing, CLOSED)
		})

		it('should accept a re-raise inside a handler', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
  NULL;
EXCEPTION WHEN others THEN
  RAISE;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})
	})

	describe('declarations', () => {
		it('should report NOT NULL variables without a value', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  v integer NOT NULL;
  w integer NOT NULL := NULL;
BEGIN
  RETURN v + w;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code} ${d.statement}`),
				['3 PCDECL008 DECLARE', '4 PCDECL008 DECLARE']
			)
		})

		it('should report a variable hiding an outer variable', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  v integer := 1;
BEGIN
  DECLARE
    v integer := 2;
  BEGIN
    PERFORM v;
  END;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code} ${d.message}`),
				['6 PCDECL006 variable "v" shadows a previously defined variable']
			)
		})
	})

	describe('cursors', () => {
		it('should check bound cursor arguments', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS void AS $$
DECLARE
  c CURSOR (k integer) FOR SELECT k;
BEGIN
  OPEN c;
  CLOSE c;
  OPEN c(1, 2);
  CLOSE c;
  OPEN c FOR SELECT 1;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code} ${d.message}`),
				[
					'5 PCCUR001 not enough arguments for cursor "c"',
					'7 PCCUR002 too many arguments for cursor "c"',
					'9 PCCUR003 cursor "c" is already bound to a query',
				]
			)
		})

		it('should assign fetched rows from the opened query', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  c refcursor;
  v integer;
BEGIN
  OPEN c FOR SELECT 1, 2;
  FETCH c INTO v;
  CLOSE c;
  RETURN v;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(codes(result), ['7 PCREC003'])
		})
	})

	describe('GET DIAGNOSTICS', () => {
		it('should accept a row count in a bigint', () => {
			const result = check(`CREATE FUNCTION fx() RETURNS bigint AS $$
DECLARE
  n bigint;
BEGIN
  GET DIAGNOSTICS n = ROW_COUNT;
  RETURN n;
END
$$ LANGUAGE plpgsql;`)
			assert.deepStrictEqual(result.diagnostics, [])
		})
	})
})
