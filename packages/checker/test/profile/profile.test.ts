import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { Routine } from '../../src/host/ast.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'
import {
	coverage,
	ProfileStore,
	type StatementCounters,
	statementInventory,
} from '../../src/profile/index.ts'

function branching(): Routine {
	const { script } = MemoryBridge.fromScript(`CREATE FUNCTION fx(n integer) RETURNS integer AS $$
BEGIN
  IF n > 0 THEN
    RETURN 1;
  END IF;
  RETURN 0;
END
$$ LANGUAGE plpgsql;`)
	assert.deepStrictEqual(script.problems, [])
	const routine = script.routines.at(-1)
	assert.ok(routine)
	return routine
}

function counts(entries: [number, number][]): Map<number, StatementCounters> {
	return new Map(
		entries.map(([id, execCount]): [number, StatementCounters] => [
			id,
			{ execCount, maxTime: 0, totalTime: 0 },
		])
	)
}

describe('profile/inventory', () => {
	it('should list statements below the outer block in source order', () => {
		const inventory = statementInventory(branching())
		assert.deepStrictEqual(inventory.statements, [
			{ depth: 0, id: 2, line: 3, name: 'IF', parent: null },
			{ depth: 1, id: 3, line: 4, name: 'RETURN', parent: 2 },
			{ depth: 0, id: 4, line: 6, name: 'RETURN', parent: null },
		])
	})

	it('should add an implicit else branch to an IF without ELSE', () => {
		assert.deepStrictEqual(statementInventory(branching()).branches, [
			{ first: 3, label: 'then', owner: 2, siblings: [] },
			{ first: null, label: 'else', owner: 2, siblings: [3] },
		])
	})
})

describe('profile/coverage', () => {
	it('should count both branches when each ran', () => {
		const result = coverage(
			statementInventory(branching()),
			counts([
				[2, 3],
				[3, 1],
				[4, 2],
			])
		)
		assert.deepStrictEqual(result, {
			branches: 1,
			executedBranches: 2,
			executedStatements: 3,
			statements: 1,
			totalBranches: 2,
			totalStatements: 3,
		})
	})

	it('should derive the implicit else from the parent count', () => {
		const result = coverage(
			statementInventory(branching()),
			counts([
				[2, 1],
				[3, 1],
			])
		)
		assert.strictEqual(result.executedStatements, 2)
		assert.strictEqual(result.executedBranches, 1)
		assert.strictEqual(result.branches, 0.5)
	})

	it('should report full coverage when there is nothing to cover', () => {
		const result = coverage({ branches: [], statements: [] }, new Map())
		assert.strictEqual(result.statements, 1)
		assert.strictEqual(result.branches, 1)
	})
})

describe('profile/store', () => {
	it('should accumulate counters per statement', () => {
		const store = new ProfileStore(2)
		assert.strictEqual(store.record(1, 'a', 5, 10), true)
		assert.strictEqual(store.record(1, 'a', 5, 30), true)
		assert.deepStrictEqual(store.counters(1, 'a').get(5), {
			execCount: 2,
			maxTime: 30,
			totalTime: 40,
		})
	})

	it('should drop counters of an older routine version', () => {
		const store = new ProfileStore(2)
		store.record(1, 'a', 5, 10)
		assert.strictEqual(store.counters(1, 'b').size, 0)
		store.record(1, 'b', 6, 1)
		assert.strictEqual(store.counters(1, 'a').size, 0)
		assert.deepStrictEqual([...store.counters(1, 'b').keys()], [6])
	})

	it('should skip updates while an entry is locked', () => {
		const store = new ProfileStore(2)
		const lease = store.acquire(1, 'a')
		assert.ok(lease)
		assert.strictEqual(store.acquire(1, 'a'), null)
		assert.strictEqual(store.record(1, 'a', 5, 1), false)
		assert.strictEqual(store.skipped, 2)
		lease.release()
		assert.strictEqual(store.record(1, 'a', 5, 1), true)
		assert.throws(() => lease.record(5, 1), { message: 'profile lease used after release' })
	})

	it('should refuse new entries beyond capacity', () => {
		const store = new ProfileStore(1)
		assert.strictEqual(store.record(1, 'a', 5, 1), true)
		assert.strictEqual(store.record(2, 'a', 5, 1), false)
		assert.strictEqual(store.size, 1)
		assert.strictEqual(store.skipped, 1)
	})

	it('should reset one entry or everything', () => {
		const store = new ProfileStore(1)
		store.record(1, 'a', 5, 1)
		store.record(2, 'a', 5, 1)
		store.reset(1)
		assert.strictEqual(store.size, 0)
		assert.strictEqual(store.skipped, 1)
		store.record(2, 'a', 5, 1)
		store.reset()
		assert.strictEqual(store.size, 0)
		assert.strictEqual(store.skipped, 0)
	})
})
