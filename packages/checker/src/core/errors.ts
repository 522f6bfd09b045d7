import type { HostError } from '../host/bridge.ts'

/**
 * The call cannot be checked as requested (wrong language, missing or
 * unexpected trigger relation, unknown routine, invalid type substitution).
 * Raised before any statement is examined.
 */
export class InvalidInputError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'InvalidInputError'
	}
}

/**
 * The host interrupted a run. Not resumable.
 */
export class CheckCancelledError extends Error {
	constructor(message = 'canceling statement due to user request') {
		super(message)
		this.name = 'CheckCancelledError'
	}
}

/**
 * The host rejected something mid-resolution. Caught at the statement
 * boundary and turned into an error diagnostic for that statement.
 */
export class AnalysisFault extends Error {
	readonly error: HostError
	/** Text the host was analyzing, when there was one */
	readonly query: string | null

	constructor(error: HostError, query: string | null = null) {
		super(error.message)
		this.name = 'AnalysisFault'
		this.error = error
		this.query = query
	}
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}
