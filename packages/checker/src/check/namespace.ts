/**
 * Lexical frames of the walk: the routine, blocks, loops (with their
 * counters) and scoped constructs (handler variables, cursor arguments).
 * Labels and variable visibility are both answered from here.
 */

export type FrameKind = 'routine' | 'block' | 'loop' | 'scope'

export interface Frame {
	readonly kind: FrameKind
	readonly label: string | null
	readonly slots: readonly number[]
	/** Set when an EXIT leaves this loop or block */
	exited: boolean
}

export interface VisibleSlot {
	readonly slot: number
	readonly qualifier: string | null
}

export class Namespace {
	private readonly frames: Frame[] = []

	push(kind: FrameKind, label: string | null, slots: readonly number[] = []): Frame {
		const frame: Frame = { exited: false, kind, label: label?.toLowerCase() ?? null, slots }
		this.frames.push(frame)
		return frame
	}

	pop(): void {
		this.frames.pop()
	}

	get depth(): number {
		return this.frames.length
	}

	/** Innermost frame carrying the label, loops and blocks only. */
	findLabel(label: string): Frame | null {
		const wanted = label.toLowerCase()
		for (let i = this.frames.length - 1; i >= 0; i--) {
			const frame = this.frames[i]
			if (frame && (frame.kind === 'loop' || frame.kind === 'block') && frame.label === wanted) {
				return frame
			}
		}
		return null
	}

	innermostLoop(): Frame | null {
		for (let i = this.frames.length - 1; i >= 0; i--) {
			const frame = this.frames[i]
			if (frame?.kind === 'loop') return frame
		}
		return null
	}

	/** Slots visible at this point, innermost first. */
	visible(): VisibleSlot[] {
		const result: VisibleSlot[] = []
		for (let i = this.frames.length - 1; i >= 0; i--) {
			const frame = this.frames[i]
			if (!frame) continue
			for (const slot of frame.slots) result.push({ qualifier: frame.label, slot })
		}
		return result
	}

	/** Slots declared in frames enclosing the innermost one. */
	outerSlots(): number[] {
		return this.frames.slice(0, -1).flatMap((frame) => [...frame.slots])
	}
}
