/**
 * Bounded profiler storage.
 *
 * One entry per routine holds statement counters. Updates go through a
 * lease that locks the entry; a second lease on a locked entry, or a new
 * entry beyond capacity, is refused and counted as skipped. Nothing ever
 * waits.
 */

export interface StatementCounters {
	execCount: number
	/** Milliseconds */
	totalTime: number
	maxTime: number
}

interface ProfileEntry {
	fingerprint: string
	locked: boolean
	readonly counters: Map<number, StatementCounters>
}

export interface ProfileLease {
	record(stmtId: number, elapsed: number): void
	release(): void
}

export class ProfileStore {
	private readonly entries = new Map<number, ProfileEntry>()
	private skippedUpdates = 0

	constructor(readonly capacity: number) {}

	get skipped(): number {
		return this.skippedUpdates
	}

	get size(): number {
		return this.entries.size
	}

	private entryFor(identity: number, fingerprint: string): ProfileEntry | null {
		const existing = this.entries.get(identity)
		if (existing) return existing
		if (this.entries.size >= this.capacity) return null
		const entry: ProfileEntry = { counters: new Map(), fingerprint, locked: false }
		this.entries.set(identity, entry)
		return entry
	}

	/**
	 * Lock a routine's entry for updates. Returns null, counting a skipped
	 * update, when the entry is locked or the store is full.
	 */
	acquire(identity: number, fingerprint: string): ProfileLease | null {
		const entry = this.entryFor(identity, fingerprint)
		if (entry === null || entry.locked) {
			this.skippedUpdates++
			return null
		}
		if (entry.fingerprint !== fingerprint) {
			entry.counters.clear()
			entry.fingerprint = fingerprint
		}
		entry.locked = true
		let released = false

		return {
			record: (stmtId, elapsed) => {
				if (released) throw new Error('profile lease used after release')
				const counters = entry.counters.get(stmtId) ?? { execCount: 0, maxTime: 0, totalTime: 0 }
				counters.execCount++
				counters.totalTime += elapsed
				counters.maxTime = Math.max(counters.maxTime, elapsed)
				entry.counters.set(stmtId, counters)
			},
			release: () => {
				released = true
				entry.locked = false
			},
		}
	}

	/** Record one statement execution under a short-lived lease. */
	record(identity: number, fingerprint: string, stmtId: number, elapsed: number): boolean {
		const lease = this.acquire(identity, fingerprint)
		if (lease === null) return false
		try {
			lease.record(stmtId, elapsed)
		} finally {
			lease.release()
		}
		return true
	}

	/** Counters of a routine version, empty when unknown or stale. */
	counters(identity: number, fingerprint: string): ReadonlyMap<number, StatementCounters> {
		const entry = this.entries.get(identity)
		if (!entry || entry.fingerprint !== fingerprint) return new Map()
		return entry.counters
	}

	reset(identity?: number): void {
		if (identity === undefined) {
			this.entries.clear()
			this.skippedUpdates = 0
			return
		}
		this.entries.delete(identity)
	}
}
