/**
 * Contract of the host compiler and catalog.
 *
 * Everything the checker knows about types, relations and embedded SQL comes
 * through this interface. Calls are synchronous request/response.
 */

import type { Routine, RoutineRef } from './ast.ts'
import type { ResolvedQuery } from './query.ts'
import type { Relation, TupleShape, TypeRef, TypeSystem } from './types.ts'

export type VariableKind = 'scalar' | 'row' | 'record'

/**
 * A routine variable visible to an embedded SQL fragment.
 */
export interface VariableBinding {
	readonly name: string
	/** Block label or routine name that may qualify the name */
	readonly qualifier: string | null
	readonly slot: number
	readonly kind: VariableKind
	readonly type: TypeRef
	/** Field list of rows and shaped records, null for unassigned records */
	readonly fields: TupleShape | null
	/** Record filled from a source whose shape is unknown */
	readonly degraded: boolean
}

export interface TransitionTable {
	readonly name: string
	readonly relation: Relation
}

export type AnalyzeMode = 'expression' | 'statement'

export interface AnalyzeRequest {
	readonly text: string
	readonly mode: AnalyzeMode
	readonly variables: readonly VariableBinding[]
	/** Types of `$1..$n` for dynamic SQL; absent when positional params are not allowed */
	readonly positional?: readonly TypeRef[]
	/** Relations registered for this run only (pragma `table:` / `sequence:`) */
	readonly syntheticRelations: readonly Relation[]
	readonly transitionTables: readonly TransitionTable[]
}

/** Structured host error, reported to the user unchanged. */
export interface HostError {
	readonly sqlstate: string
	readonly message: string
	readonly detail?: string
	readonly hint?: string
	/** 1-based character offset in the analyzed text */
	readonly position?: number
	readonly context?: string
}

export type AnalyzeResult =
	| { readonly ok: true; readonly query: ResolvedQuery }
	| { readonly ok: false; readonly error: HostError }

export interface CatalogBridge {
	readonly types: TypeSystem
	/** Name of the procedural language the checker supports */
	readonly language: string
	findRoutines(ref: RoutineRef): readonly Routine[]
	findRelation(name: string): Relation | null
	relationById(identity: number): Relation | null
	/** Condition code for an exception condition name, null when unknown */
	conditionCode(name: string): string | null
	analyze(request: AnalyzeRequest): AnalyzeResult
}
