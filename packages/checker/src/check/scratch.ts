/**
 * Per-run scratch memory.
 *
 * Every store a run allocates (datum copies, synthetic relations, cursor
 * shapes) is owned by one scope and released in one step, on normal and
 * faulted exits alike. Using a store after release is a programming error.
 */

interface Clearable {
	clear(): void
}

export class ScratchScope {
	private readonly stores = new Set<Clearable>()
	private released = false

	/** Register a store with this scope and return it. */
	own<T extends Clearable>(store: T): T {
		this.assertLive()
		this.stores.add(store)
		return store
	}

	get isReleased(): boolean {
		return this.released
	}

	assertLive(): void {
		if (this.released) throw new Error('scratch scope used after release')
	}

	/** Release every owned store. Idempotent. */
	release(): void {
		for (const store of this.stores) store.clear()
		this.stores.clear()
		this.released = true
	}
}
