import assert from 'node:assert'
import { describe, it } from 'node:test'
import { checkRoutine } from '../../src/check/checker.ts'
import { resolveOptions } from '../../src/check/options.ts'
import {
	assignTupdesc,
	checkTarget,
	copyDatum,
	degradeRecord,
	RECORD_TYPE,
	sameShape,
	toBinding,
} from '../../src/check/records.ts'
import { beginCheck, type CheckState, endCheck } from '../../src/check/state.ts'
import { typeRef, UNRESOLVED } from '../../src/host/types.ts'
import { MemoryBridge } from '../../src/memory/bridge.ts'

const script = `CREATE TABLE accounts (id integer, owner text);
CREATE FUNCTION fx() RETURNS integer AS $$
DECLARE
  r record;
  total integer;
BEGIN
  r.id := 1;
  RETURN total;
END
$$ LANGUAGE plpgsql;`

const idOwner = [
	{ name: 'id', type: typeRef('integer') },
	{ name: 'owner', type: typeRef('text') },
]
const ownerOnly = [{ name: 'owner', type: typeRef('text') }]

function withState(run: (state: CheckState, slots: Map<string, number>) => void): void {
	const { bridge, script: loaded } = MemoryBridge.fromScript(script)
	const routine = loaded.routines.at(-1)
	assert.ok(routine)
	const state = beginCheck(bridge, routine, resolveOptions())
	const slots = new Map<string, number>()
	for (const datum of routine.datums) {
		const key = datum.kind === 'recfield' ? `field:${datum.field}` : datum.name
		slots.set(key, datum.slot)
	}
	try {
		run(state, slots)
	} finally {
		endCheck(state)
	}
}

function slotOf(slots: Map<string, number>, name: string): number {
	const slot = slots.get(name)
	assert.ok(slot !== undefined, `no slot for ${name}`)
	return slot
}

describe('check/records', () => {
	describe('sameShape', () => {
		it('should compare names and types in order', () => {
			assert.strictEqual(sameShape(idOwner, [...idOwner]), true)
			assert.strictEqual(sameShape(idOwner, ownerOnly), false)
			assert.strictEqual(sameShape(idOwner, [...idOwner].reverse()), false)
			assert.strictEqual(
				sameShape(ownerOnly, [{ name: 'owner', type: typeRef('integer') }]),
				false
			)
		})
	})

	describe('copyDatum', () => {
		it('should start records unassigned', () => {
			const copy = copyDatum(
				{ defaultExpr: null, kind: 'rec', line: 3, name: 'r', origin: 'declared', slot: 7 },
				(type) => type
			)
			assert.strictEqual(copy.state, 'unassigned')
			assert.strictEqual(copy.fields, null)
			assert.deepStrictEqual(copy.type, RECORD_TYPE)
		})
	})

	describe('assignTupdesc', () => {
		it('should shape a record and report a later different shape', () => {
			withState((state, slots) => {
				const r = slotOf(slots, 'r')
				assignTupdesc(state, r, idOwner, 'query')
				assert.strictEqual(state.datum(r).state, 'shaped')
				assert.deepStrictEqual<typeof state.diagnostics>(state.diagnostics, [])

				assignTupdesc(state, r, ownerOnly, 'query')
				assert.deepStrictEqual(state.datum(r).fields, ownerOnly)
				assert.deepStrictEqual(
					state.diagnostics.map((d) => [d.code, d.detail]),
					[['PCREC006', 'previous shape (id integer, owner text), new shape (owner text)']]
				)
			})
		})

		it('should keep a shape pinned by a pragma', () => {
			withState((state, slots) => {
				const r = slotOf(slots, 'r')
				assignTupdesc(state, r, idOwner, 'pragma')
				assignTupdesc(state, r, ownerOnly, 'query')
				assert.deepStrictEqual(state.datum(r).fields, idOwner)
				assert.strictEqual(degradeRecord(state, r), false)
				assert.deepStrictEqual(state.diagnostics, [])
			})
		})

		it('should ignore scalar variables', () => {
			withState((state, slots) => {
				const total = slotOf(slots, 'total')
				assignTupdesc(state, total, idOwner, 'query')
				assert.strictEqual(state.datum(total).fields, null)
			})
		})
	})

	describe('degradeRecord', () => {
		it('should drop the shape of a record', () => {
			withState((state, slots) => {
				const r = slotOf(slots, 'r')
				assignTupdesc(state, r, idOwner, 'query')
				assert.strictEqual(degradeRecord(state, r), true)
				assert.strictEqual(state.datum(r).state, 'degraded')
				assert.strictEqual(state.datum(r).fields, null)
			})
		})
	})

	describe('checkTarget', () => {
		it('should report a field of an unassigned record', () => {
			withState((state, slots) => {
				assert.strictEqual(checkTarget(state, slotOf(slots, 'field:id')), null)
				assert.deepStrictEqual(
					state.diagnostics.map((d) => d.message),
					['record "r" is not assigned yet']
				)
			})
		})

		it('should type a field from the record shape', () => {
			withState((state, slots) => {
				assignTupdesc(state, slotOf(slots, 'r'), idOwner, 'query')
				assert.deepStrictEqual(checkTarget(state, slotOf(slots, 'field:id')), {
					fields: null,
					type: typeRef('integer'),
					typmod: -1,
				})
			})
		})

		it('should report a field missing from the shape', () => {
			withState((state, slots) => {
				assignTupdesc(state, slotOf(slots, 'r'), ownerOnly, 'query')
				assert.strictEqual(checkTarget(state, slotOf(slots, 'field:id')), null)
				assert.deepStrictEqual(
					state.diagnostics.map((d) => [d.code, d.message]),
					[['PCREC007', 'record "r" has no field "id"']]
				)
			})
		})

		it('should leave fields of a degraded record unresolved', () => {
			withState((state, slots) => {
				degradeRecord(state, slotOf(slots, 'r'))
				assert.deepStrictEqual(checkTarget(state, slotOf(slots, 'field:id'))?.type, UNRESOLVED)
				assert.deepStrictEqual(state.diagnostics, [])
			})
		})
	})

	describe('toBinding', () => {
		it('should describe a degraded record to the analyzer', () => {
			withState((state, slots) => {
				const r = slotOf(slots, 'r')
				degradeRecord(state, r)
				const binding = toBinding(state.datum(r), null, state.types)
				assert.ok(binding?.kind === 'record')
				assert.strictEqual(binding.degraded, true)
				assert.strictEqual(binding.fields, null)
			})
		})
	})

	describe('in a routine', () => {
		it('should report a field assignment before the record has a shape', () => {
			const { bridge, script: loaded } = MemoryBridge.fromScript(script)
			const routine = loaded.routines.at(-1)
			assert.ok(routine)
			const result = checkRoutine(bridge, { routine })
			assert.deepStrictEqual(
				result.diagnostics.map((d) => `${d.line} ${d.code}`),
				['6 PCREC001', '3 PCDECL001']
			)
		})
	})
})
