/**
 * Call-time checking: the host calls `onCall` before running a routine.
 */

import type { Routine } from '../host/ast.ts'
import type { CatalogBridge } from '../host/bridge.ts'
import type { CheckedCache } from './cache.ts'
import { type CheckResult, checkRoutine } from './checker.ts'
import { type CheckerProfile, type CheckOptionsInput, profileForRoutine } from './options.ts'

export interface PassiveCheckerOptions {
	readonly bridge: CatalogBridge
	readonly cache: CheckedCache
	readonly profile: CheckerProfile
	readonly options?: CheckOptionsInput
}

export class PassiveChecker {
	private readonly bridge: CatalogBridge
	private readonly cache: CheckedCache
	private readonly profile: CheckerProfile
	private readonly options: CheckOptionsInput

	constructor(options: PassiveCheckerOptions) {
		this.bridge = options.bridge
		this.cache = options.cache
		this.profile = options.profile
		this.options = options.options ?? {}
	}

	/**
	 * Check a routine about to run, when the profile asks for it. Returns
	 * null when no check ran.
	 */
	onCall(routine: Routine, triggerRelation?: string): CheckResult | null {
		const profile = profileForRoutine(this.profile, routine.settings)
		switch (profile.mode) {
			case 'disabled':
			case 'by_function':
				return null
			case 'fresh_start':
				if (this.cache.isChecked(routine.identity, routine.fingerprint)) return null
				break
			case 'every_start':
				break
		}

		const result = checkRoutine(this.bridge, {
			options: this.options,
			profile: this.profile,
			routine,
			...(triggerRelation !== undefined ? { triggerRelation } : {}),
		})
		if (!result.cancelled) this.cache.markChecked(routine.identity, routine.fingerprint)
		return result
	}
}
