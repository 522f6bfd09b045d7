/**
 * Control-flow closing verdicts and their composition.
 *
 * A verdict says whether a statement sequence is guaranteed to leave the
 * routine. Exception closings carry the condition codes they may raise so
 * handlers can tell whether they catch them.
 */

export const ClosingStatus = {
	Closed: 'closed',
	ClosedByExceptions: 'closed-by-exceptions',
	PossiblyClosed: 'possibly-closed',
	Unclosed: 'unclosed',
} as const

export type ClosingStatus = (typeof ClosingStatus)[keyof typeof ClosingStatus]

export interface Closing {
	readonly status: ClosingStatus
	/** Condition codes raised, meaningful for ClosedByExceptions only */
	readonly raises: readonly string[]
}

export const UNCLOSED: Closing = { raises: [], status: ClosingStatus.Unclosed }
export const CLOSED: Closing = { raises: [], status: ClosingStatus.Closed }
export const POSSIBLY_CLOSED: Closing = { raises: [], status: ClosingStatus.PossiblyClosed }

export function closedByException(...codes: string[]): Closing {
	return { raises: [...new Set(codes)].sort(), status: ClosingStatus.ClosedByExceptions }
}

function unionRaises(a: readonly string[], b: readonly string[]): string[] {
	return [...new Set([...a, ...b])].sort()
}

export function isClosedForm(closing: Closing): boolean {
	return (
		closing.status === ClosingStatus.Closed || closing.status === ClosingStatus.ClosedByExceptions
	)
}

/**
 * Merge the verdicts of two alternative paths (branches, handlers).
 *
 * Equal verdicts are kept; CLOSED and CLOSED_BY_EXCEPTIONS give CLOSED; any
 * other mix means only some paths close. Commutative and associative.
 */
export function mergeBranches(a: Closing, b: Closing): Closing {
	if (a.status === b.status) {
		if (a.status === ClosingStatus.ClosedByExceptions) {
			return closedByException(...unionRaises(a.raises, b.raises))
		}
		return a
	}
	if (isClosedForm(a) && isClosedForm(b)) return CLOSED
	return POSSIBLY_CLOSED
}

/** Merge a non-empty list of alternative paths. */
export function mergeAll(closings: readonly Closing[]): Closing {
	const [first, ...rest] = closings
	if (first === undefined) return UNCLOSED
	return rest.reduce(mergeBranches, first)
}

/**
 * Verdict of a construct that may skip its body entirely (a loop with a
 * condition, an IF without ELSE).
 */
export function possiblyClosed(closing: Closing): Closing {
	return closing.status === ClosingStatus.Unclosed ? UNCLOSED : POSSIBLY_CLOSED
}

/**
 * Fold the verdict of the next statement into the verdict of the sequence
 * so far. Once a sequence closes, later statements cannot reopen it.
 */
export function sequence(current: Closing, next: Closing): Closing {
	switch (next.status) {
		case ClosingStatus.Closed:
			return CLOSED
		case ClosingStatus.ClosedByExceptions:
			return current.status === ClosingStatus.Closed ? current : next
		case ClosingStatus.PossiblyClosed:
			return current.status === ClosingStatus.Unclosed ? POSSIBLY_CLOSED : current
		case ClosingStatus.Unclosed:
			return current
	}
}
