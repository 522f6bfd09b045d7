import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { type CheckRequest, type CheckResult, checkRoutine } from '../../src/check/checker.ts'
import { CLOSED } from '../../src/core/closing.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

function check(script: string, request: Omit<CheckRequest, 'routine'> = {}): CheckResult {
	const { bridge, script: loaded } = MemoryBridge.fromScript(script)
	assert.deepStrictEqual(loaded.problems, [])
	const routine = loaded.routines.at(-1)
	assert.ok(routine)
	return checkRoutine(bridge, { ...request, routine })
}

function lines(result: CheckResult): string[] {
	return result.diagnostics.map((d) => `${d.line ?? '-'} ${d.code} ${d.message}`)
}

function withUnused(count: number): string {
	const declarations = Array.from({ length: count }, (_, i) => `  v${i} integer;\n`).join('')
	return `CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  used integer := 1;
${declarations}BEGIN
  RETURN used;
END
$$ LANGUAGE plpgsql;`
}

function withMissing(count: number): string {
	const statements = '  PERFORM id FROM missing;\n'.repeat(count)
	return `CREATE FUNCTION fx() RETURNS void AS $$
BEGIN
${statements}END
$$ LANGUAGE plpgsql;`
}

describe('check/checker properties', () => {
	it('should close any routine returning a literal', () => {
		fc.assert(
			fc.property(fc.integer({ max: 100000, min: 0 }), (value) => {
				const result = check(`CREATE FUNCTION fx() RETURNS integer AS $$
BEGIN
  RETURN ${value};
END
$$ LANGUAGE plpgsql;`)
				assert.deepStrictEqual(result.diagnostics, [])
				assert.deepStrictEqual(result.closing, CLOSED)
			}),
			{ numRuns: 30 }
		)
	})

	it('should report every unused variable at its own line', () => {
		fc.assert(
			fc.property(fc.integer({ max: 6, min: 0 }), (count) => {
				const expected = Array.from(
					{ length: count },
					(_, i) => `${i + 4} PCDECL001 unused variable "v${i}"`
				)
				assert.deepStrictEqual(lines(check(withUnused(count))), expected)
			}),
			{ numRuns: 20 }
		)
	})

	it('should give the same result on every run', () => {
		fc.assert(
			fc.property(fc.integer({ max: 6, min: 0 }), (count) => {
				const script = withUnused(count)
				assert.deepStrictEqual(check(script).diagnostics, check(script).diagnostics)
			}),
			{ numRuns: 10 }
		)
	})

	it('should stop at the first error only when errors are fatal', () => {
		fc.assert(
			fc.property(fc.integer({ max: 5, min: 1 }), (count) => {
				const script = withMissing(count)
				const all = lines(check(script))
				assert.deepStrictEqual(
					all,
					Array.from(
						{ length: count },
						(_, i) => `${i + 3} PCSQL001 relation "missing" does not exist`
					)
				)
				assert.deepStrictEqual(lines(check(script, { options: { fatalErrors: true } })), [
					all[0],
				])
			}),
			{ numRuns: 10 }
		)
	})
})
