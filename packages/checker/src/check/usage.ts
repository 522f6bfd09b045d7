/**
 * Per-slot read/write tracking and the end-of-run usage report.
 */

import type { Datum, RoutineParam } from '../host/ast.ts'
import type { CheckState } from './state.ts'

export class VariableUsage {
	private readonly reads = new Set<number>()
	private readonly writes = new Set<number>()
	/** Variables whose default is a pragma marker */
	private readonly exempt = new Set<number>()

	markRead(slot: number): void {
		this.reads.add(slot)
	}

	markWrite(slot: number): void {
		this.writes.add(slot)
	}

	markExempt(slot: number): void {
		this.exempt.add(slot)
	}

	isRead(slot: number): boolean {
		return this.reads.has(slot)
	}

	isWritten(slot: number): boolean {
		return this.writes.has(slot)
	}

	isExempt(slot: number): boolean {
		return this.exempt.has(slot)
	}

	clear(): void {
		this.reads.clear()
		this.writes.clear()
		this.exempt.clear()
	}
}

function reportDeclared(state: CheckState, datum: Datum): void {
	const usage = state.usage
	if (datum.kind === 'recfield' || usage.isExempt(datum.slot)) return
	if (datum.kind === 'var' && datum.cursor !== null && usage.isRead(datum.slot)) return

	if (!usage.isRead(datum.slot)) {
		const code = usage.isWritten(datum.slot) ? 'PCDECL002' : 'PCDECL001'
		state.reportDeclaration(datum, code, { name: datum.name })
	}
}

function reportParam(state: CheckState, param: RoutineParam): void {
	const usage = state.usage
	if (param.slot < 0) return
	const read = usage.isRead(param.slot)
	const written = usage.isWritten(param.slot)

	switch (param.mode) {
		case 'in':
		case 'variadic':
			if (!read) state.reportRoutine(written ? 'PCDECL004' : 'PCDECL003', { name: param.name })
			return
		case 'inout':
			if (!read && !written) {
				state.reportRoutine('PCDECL003', { name: param.name })
				return
			}
			if (!written) state.reportRoutine('PCDECL005', { name: param.name })
			return
		case 'out':
			if (!written) state.reportRoutine('PCDECL005', { name: param.name })
			return
	}
}

/**
 * Report unused and never-read variables and parameters. Implicit and
 * scoped variables are never reported.
 */
export function reportUsage(state: CheckState): void {
	for (const param of state.routine.params) reportParam(state, param)
	for (const datum of state.routine.datums) {
		if (datum.origin === 'declared') reportDeclared(state, datum)
	}
}
