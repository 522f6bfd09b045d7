import assert from 'node:assert'
import { describe, it } from 'node:test'
import { AnalysisFault, InvalidInputError } from '@plcheck/checker'
import { ScriptSyntaxError } from '@plcheck/checker/memory'
import {
	formatCheckError,
	formatFormatError,
	formatPercent,
	formatProfileError,
	formatReadError,
	formatScriptError,
	getErrorMessage,
	isNodeError,
	parseFormat,
	parseProfileCounters,
	parseSubstitutions,
	routineRef,
	warningCategories,
} from '../src/utils.ts'

function nodeError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code })
}

describe('isNodeError', () => {
	it('should return true for Error with code property', () => {
		assert.strictEqual(isNodeError(nodeError('test', 'ENOENT')), true)
	})

	it('should return false for plain Error', () => {
		assert.strictEqual(isNodeError(new Error('test')), false)
	})

	it('should return false for non-Error', () => {
		assert.strictEqual(isNodeError('string'), false)
		assert.strictEqual(isNodeError(null), false)
		assert.strictEqual(isNodeError(undefined), false)
		assert.strictEqual(isNodeError(42), false)
	})
})

describe('getErrorMessage', () => {
	it('should extract message from Error', () => {
		assert.strictEqual(getErrorMessage(new Error('test message')), 'test message')
	})

	it('should convert non-Error to string', () => {
		assert.strictEqual(getErrorMessage('string error'), 'string error')
		assert.strictEqual(getErrorMessage(42), '42')
		assert.strictEqual(getErrorMessage(null), 'null')
	})
})

describe('formatReadError', () => {
	it('should format ENOENT as file not found', () => {
		assert.strictEqual(
			formatReadError('/path/to/schema.sql', nodeError('no such file', 'ENOENT')),
			'[PCCLI001] file not found: /path/to/schema.sql'
		)
	})

	it('should format other errors with their message', () => {
		assert.strictEqual(
			formatReadError('/path/to/schema.sql', nodeError('permission denied', 'EACCES')),
			'[PCCLI002] cannot read file: permission denied'
		)
	})
})

describe('formatScriptError', () => {
	it('should include the line of a syntax error', () => {
		assert.strictEqual(
			formatScriptError(new ScriptSyntaxError('unexpected end of input', 4)),
			'[PCCLI003] cannot load script: line 4: unexpected end of input'
		)
	})

	it('should format other errors with their message', () => {
		assert.strictEqual(
			formatScriptError(new Error('boom')),
			'[PCCLI003] cannot load script: boom'
		)
	})
})

describe('formatCheckError', () => {
	it('should report invalid input', () => {
		assert.strictEqual(
			formatCheckError(new InvalidInputError('function "fx" does not exist')),
			'[PCCLI005] invalid input: function "fx" does not exist'
		)
	})

	it('should include the SQLSTATE of an analysis fault', () => {
		const fault = new AnalysisFault({ message: 'relation "t" does not exist', sqlstate: '42P01' })
		assert.strictEqual(
			formatCheckError(fault),
			'[PCCLI006] check failed: 42P01: relation "t" does not exist'
		)
	})

	it('should report anything else as a failed check', () => {
		assert.strictEqual(formatCheckError('boom'), '[PCCLI006] check failed: boom')
	})
})

describe('formatFormatError and formatProfileError', () => {
	it('should name the rejected value', () => {
		assert.strictEqual(formatFormatError('yaml'), '[PCCLI004] unknown format "yaml"')
		assert.strictEqual(formatProfileError('bad json'), '[PCCLI007] invalid profile: bad json')
	})
})

describe('parseFormat', () => {
	it('should accept known formats in any case', () => {
		assert.strictEqual(parseFormat('json'), 'json')
		assert.strictEqual(parseFormat('XML'), 'xml')
	})

	it('should return null for unknown formats', () => {
		assert.strictEqual(parseFormat('yaml'), null)
	})
})

describe('parseSubstitutions', () => {
	it('should map lowercased names to types', () => {
		assert.deepStrictEqual(parseSubstitutions(['AnyElement = text', 'anyarray=text[]']), {
			anyarray: 'text[]',
			anyelement: 'text',
		})
	})

	it('should reject pairs without both sides', () => {
		assert.throws(() => parseSubstitutions(['anyelement']), {
			message: 'substitution "anyelement" must have the form name=type',
			name: 'InvalidInputError',
		})
		assert.throws(() => parseSubstitutions(['anyelement=']), { name: 'InvalidInputError' })
	})
})

describe('warningCategories', () => {
	it('should copy each flag', () => {
		assert.deepStrictEqual(
			warningCategories({
				compatibility: false,
				extra: true,
				other: true,
				performance: true,
				security: false,
			}),
			{ compatibility: false, extra: true, other: true, performance: true, security: false }
		)
	})
})

describe('parseProfileCounters', () => {
	it('should read counters by statement id', () => {
		const counters = parseProfileCounters(
			'{"statements":[{"stmtid":2,"execCount":3,"totalTime":1.5,"maxTime":0.75}]}'
		)
		assert.deepStrictEqual([...counters.entries()], [
			[2, { execCount: 3, maxTime: 0.75, totalTime: 1.5 }],
		])
	})

	it('should reject a document without statements', () => {
		assert.throws(() => parseProfileCounters('[]'), {
			message: 'expected an object with a "statements" array',
		})
	})

	it('should name the offending field', () => {
		assert.throws(
			() => parseProfileCounters('{"statements":[{"stmtid":1,"execCount":-1}]}'),
			{ message: 'statements[0].execCount must be a non-negative number' }
		)
		assert.throws(() => parseProfileCounters('{"statements":[7]}'), {
			message: 'statements[0] must be an object',
		})
	})
})

describe('formatPercent', () => {
	it('should render one decimal', () => {
		assert.strictEqual(formatPercent(0.5), '50.0%')
		assert.strictEqual(formatPercent(2 / 3), '66.7%')
	})
})

describe('routineRef', () => {
	it('should treat an argument list as a signature', () => {
		assert.deepStrictEqual(routineRef('fx(integer)'), { by: 'signature', signature: 'fx(integer)' })
		assert.deepStrictEqual(routineRef('fx'), { by: 'name', name: 'fx' })
	})
})
