/**
 * Record of routine versions already checked, keyed by routine identity
 * and invalidated when the definition fingerprint changes.
 */

export interface CheckedCache {
	isChecked(identity: number, fingerprint: string): boolean
	markChecked(identity: number, fingerprint: string): void
	clear(): void
}

export class MemoryCheckedCache implements CheckedCache {
	private readonly entries = new Map<number, string>()

	isChecked(identity: number, fingerprint: string): boolean {
		const stored = this.entries.get(identity)
		if (stored === undefined) return false
		if (stored !== fingerprint) {
			this.entries.delete(identity)
			return false
		}
		return true
	}

	markChecked(identity: number, fingerprint: string): void {
		this.entries.set(identity, fingerprint)
	}

	get size(): number {
		return this.entries.size
	}

	clear(): void {
		this.entries.clear()
	}
}
