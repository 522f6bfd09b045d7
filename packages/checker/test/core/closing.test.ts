import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	CLOSED,
	ClosingStatus,
	closedByException,
	isClosedForm,
	mergeAll,
	mergeBranches,
	POSSIBLY_CLOSED,
	possiblyClosed,
	sequence,
	UNCLOSED,
} from '../../src/core/closing.ts'

describe('core/closing', () => {
	describe('closedByException', () => {
		it('should sort and deduplicate condition codes', () => {
			const closing = closedByException('P0001', '22012', 'P0001')
			assert.strictEqual(closing.status, ClosingStatus.ClosedByExceptions)
			assert.deepStrictEqual(closing.raises, ['22012', 'P0001'])
		})
	})

	describe('isClosedForm', () => {
		it('should accept closed and closed by exceptions', () => {
			assert.strictEqual(isClosedForm(CLOSED), true)
			assert.strictEqual(isClosedForm(closedByException('P0001')), true)
		})

		it('should reject open verdicts', () => {
			assert.strictEqual(isClosedForm(UNCLOSED), false)
			assert.strictEqual(isClosedForm(POSSIBLY_CLOSED), false)
		})
	})

	describe('mergeBranches', () => {
		it('should keep equal verdicts', () => {
			assert.strictEqual(mergeBranches(CLOSED, CLOSED), CLOSED)
			assert.strictEqual(mergeBranches(UNCLOSED, UNCLOSED), UNCLOSED)
		})

		it('should unite exception codes', () => {
			const merged = mergeBranches(closedByException('P0001'), closedByException('22012'))
			assert.deepStrictEqual(merged, closedByException('22012', 'P0001'))
		})

		it('should close when closed meets closed by exceptions', () => {
			assert.strictEqual(mergeBranches(CLOSED, closedByException('P0001')), CLOSED)
			assert.strictEqual(mergeBranches(closedByException('P0001'), CLOSED), CLOSED)
		})

		it('should give possibly closed for any other mix', () => {
			assert.strictEqual(mergeBranches(CLOSED, UNCLOSED), POSSIBLY_CLOSED)
			assert.strictEqual(mergeBranches(UNCLOSED, closedByException('P0001')), POSSIBLY_CLOSED)
			assert.strictEqual(mergeBranches(POSSIBLY_CLOSED, CLOSED), POSSIBLY_CLOSED)
		})
	})

	describe('mergeAll', () => {
		it('should treat an empty list as unclosed', () => {
			assert.strictEqual(mergeAll([]), UNCLOSED)
		})

		it('should fold every path', () => {
			assert.strictEqual(mergeAll([CLOSED, CLOSED, UNCLOSED]), POSSIBLY_CLOSED)
			assert.strictEqual(mergeAll([CLOSED, closedByException('P0001'), CLOSED]), CLOSED)
		})
	})

	describe('possiblyClosed', () => {
		it('should keep unclosed', () => {
			assert.strictEqual(possiblyClosed(UNCLOSED), UNCLOSED)
		})

		it('should weaken every other verdict', () => {
			assert.strictEqual(possiblyClosed(CLOSED), POSSIBLY_CLOSED)
			assert.strictEqual(possiblyClosed(closedByException('P0001')), POSSIBLY_CLOSED)
			assert.strictEqual(possiblyClosed(POSSIBLY_CLOSED), POSSIBLY_CLOSED)
		})
	})

	describe('sequence', () => {
		it('should let closed absorb', () => {
			assert.strictEqual(sequence(UNCLOSED, CLOSED), CLOSED)
			assert.strictEqual(sequence(CLOSED, UNCLOSED), CLOSED)
			assert.strictEqual(sequence(CLOSED, closedByException('P0001')), CLOSED)
		})

		it('should keep an exception closing unless closed', () => {
			const raised = closedByException('P0001')
			assert.strictEqual(sequence(UNCLOSED, raised), raised)
			assert.strictEqual(sequence(POSSIBLY_CLOSED, raised), raised)
			assert.strictEqual(sequence(raised, UNCLOSED), raised)
		})

		it('should only lift unclosed to possibly closed', () => {
			assert.strictEqual(sequence(UNCLOSED, POSSIBLY_CLOSED), POSSIBLY_CLOSED)
			assert.strictEqual(sequence(CLOSED, POSSIBLY_CLOSED), CLOSED)
			assert.strictEqual(sequence(POSSIBLY_CLOSED, UNCLOSED), POSSIBLY_CLOSED)
		})
	})
})
