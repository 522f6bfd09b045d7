/**
 * Per-run check state: created by `beginCheck`, released by `endCheck`,
 * never reused.
 */

import type { DiagnosticArgs } from '@plcheck/diagnostics'
import { DiagnosticLevel } from '@plcheck/diagnostics'
import { type Datum, type Routine, type Stmt, stmtTypeName } from '../host/ast.ts'
import type { CatalogBridge, TransitionTable, VariableBinding } from '../host/bridge.ts'
import type { Relation, RelationKind, TupleShape, TypeRef, TypeSystem } from '../host/types.ts'
import {
	buildDiagnostic,
	type CheckerDiagnosticCode,
	type Diagnostic,
	type DiagnosticOverrides,
} from '../core/diagnostics.ts'
import { CheckCancelledError, InvalidInputError } from '../core/errors.ts'
import { DependencyCollector } from './dependencies.ts'
import { Namespace } from './namespace.ts'
import type { CheckOptions, WarningCategory } from './options.ts'
import { categoryFeature, isFeatureEnabled, PragmaStack } from './pragma.ts'
import {
	assignTupdesc,
	copyDatum,
	type RuntimeDatum,
	type Substitute,
	toBinding,
} from './records.ts'
import { ScratchScope } from './scratch.ts'
import { VariableUsage } from './usage.ts'
import { VolatilityTracker } from './volatility.ts'

const levelCategory: Readonly<Record<DiagnosticLevel, WarningCategory | null>> = {
	[DiagnosticLevel.Error]: null,
	[DiagnosticLevel.WarningCompatibility]: 'compatibility',
	[DiagnosticLevel.WarningExtra]: 'extra',
	[DiagnosticLevel.WarningOther]: 'other',
	[DiagnosticLevel.WarningPerformance]: 'performance',
	[DiagnosticLevel.WarningSecurity]: 'security',
}

const SYNTHETIC_SCHEMA = 'pg_temp'

interface Location {
	readonly line?: number
	readonly statement?: string
}

export class CheckState {
	readonly types: TypeSystem
	readonly scratch = new ScratchScope()
	readonly namespace = new Namespace()
	readonly pragmas: PragmaStack
	readonly usage: VariableUsage
	readonly dependencies: DependencyCollector
	readonly volatility: VolatilityTracker
	/** Shapes of cursor variables opened with a static query */
	readonly cursorShapes: Map<number, TupleShape>
	readonly notices: string[] = []
	readonly transitionTables: TransitionTable[] = []

	currentStmt: Stmt | null = null
	/** Set once fatal-errors mode has seen an error */
	stopped = false
	/** Number of exception handlers enclosing the current statement */
	handlerDepth = 0

	private readonly datums: Map<number, RuntimeDatum>
	private readonly synthetic: Map<string, Relation>
	private readonly diagnosticList: Diagnostic[] = []
	private nextSyntheticIdentity = -1

	constructor(
		readonly bridge: CatalogBridge,
		readonly routine: Routine,
		readonly options: CheckOptions,
		readonly triggerRelation: Relation | null,
		/** Maps polymorphic types to their substitutes */
		readonly substitute: Substitute
	) {
		this.types = bridge.types
		this.pragmas = this.scratch.own(new PragmaStack())
		this.usage = this.scratch.own(new VariableUsage())
		this.dependencies = this.scratch.own(new DependencyCollector())
		this.volatility = this.scratch.own(new VolatilityTracker())
		this.cursorShapes = this.scratch.own(new Map<number, TupleShape>())
		this.datums = this.scratch.own(new Map<number, RuntimeDatum>())
		this.synthetic = this.scratch.own(new Map<string, Relation>())
	}

	get diagnostics(): readonly Diagnostic[] {
		return this.diagnosticList
	}

	// =========================================================================
	// DATUMS
	// =========================================================================

	install(datum: RuntimeDatum): void {
		this.datums.set(datum.template.slot, datum)
	}

	datum(slot: number): RuntimeDatum {
		this.scratch.assertLive()
		const datum = this.datums.get(slot)
		if (datum === undefined) throw new Error(`no variable in slot ${slot}`)
		return datum
	}

	/** Bindings for every variable visible at the current statement. */
	variableBindings(): VariableBinding[] {
		const bindings: VariableBinding[] = []
		for (const visible of this.namespace.visible()) {
			const binding = toBinding(this.datum(visible.slot), visible.qualifier, this.types)
			if (binding) bindings.push(binding)
		}
		return bindings
	}

	/** Slot of a visible variable named `name` or `qualifier.name`. */
	lookupVariable(parts: readonly string[]): number | null {
		const name = parts[parts.length - 1]?.toLowerCase()
		const qualifier = parts.length > 1 ? parts[0]?.toLowerCase() : undefined
		for (const visible of this.namespace.visible()) {
			const datum = this.datum(visible.slot).template
			if (datum.name.toLowerCase() !== name) continue
			if (qualifier !== undefined && visible.qualifier !== qualifier) continue
			return visible.slot
		}
		return null
	}

	// =========================================================================
	// RELATIONS
	// =========================================================================

	get syntheticRelations(): Relation[] {
		return [...this.synthetic.values()]
	}

	findRelation(name: string): Relation | null {
		const parts = name.toLowerCase().split('.')
		const key = parts[parts.length - 1] ?? ''
		const local = this.synthetic.get(key)
		if (local && (parts.length === 1 || parts[0] === local.schema)) return local
		return this.bridge.findRelation(name)
	}

	/** Register a relation that exists for this run only. */
	registerRelation(
		nameParts: readonly string[],
		kind: RelationKind,
		columns: TupleShape
	): Relation {
		const name = nameParts[nameParts.length - 1] ?? ''
		const schema = nameParts.length > 1 ? (nameParts[0] ?? SYNTHETIC_SCHEMA) : SYNTHETIC_SCHEMA
		const relation: Relation = {
			columns,
			identity: this.nextSyntheticIdentity--,
			kind,
			name,
			schema,
		}
		this.synthetic.set(name.toLowerCase(), relation)
		return relation
	}

	// =========================================================================
	// DIAGNOSTICS
	// =========================================================================

	private accepts(level: DiagnosticLevel): boolean {
		if (this.stopped) return false
		if (!isFeatureEnabled(this, 'check')) return false
		const category = levelCategory[level]
		return category === null || isFeatureEnabled(this, categoryFeature(category))
	}

	private push(
		code: CheckerDiagnosticCode,
		args: DiagnosticArgs | undefined,
		overrides: DiagnosticOverrides,
		location: Location
	): void {
		const diagnostic = { ...buildDiagnostic(code, args, overrides), ...location }
		if (!this.accepts(diagnostic.level)) return
		this.diagnosticList.push(diagnostic)
		if (diagnostic.level === DiagnosticLevel.Error && this.options.fatalErrors) {
			this.stopped = true
		}
	}

	/** Report a finding at the current statement. */
	report(
		code: CheckerDiagnosticCode,
		args?: DiagnosticArgs,
		overrides: DiagnosticOverrides = {}
	): void {
		const stmt = this.currentStmt
		const location = stmt ? { line: stmt.line, statement: stmtTypeName(stmt) } : {}
		this.push(code, args, overrides, location)
	}

	/** Report a finding about a declaration. */
	reportDeclaration(
		datum: Datum,
		code: CheckerDiagnosticCode,
		args?: DiagnosticArgs,
		overrides: DiagnosticOverrides = {}
	): void {
		this.push(code, args, overrides, { line: datum.line, statement: 'DECLARE' })
	}

	/** Report a finding about the routine as a whole. */
	reportRoutine(
		code: CheckerDiagnosticCode,
		args?: DiagnosticArgs,
		overrides: DiagnosticOverrides = {}
	): void {
		this.push(code, args, overrides, {})
	}

	notice(text: string): void {
		this.notices.push(text)
	}

	pollCancel(): void {
		if (this.options.signal?.aborted) throw new CheckCancelledError()
	}
}

// =============================================================================
// SETUP AND TEARDOWN
// =============================================================================

function buildSubstitute(
	types: TypeSystem,
	substitutions: Readonly<Record<string, string>>
): Substitute {
	const table = new Map<string, TypeRef>()
	for (const [from, to] of Object.entries(substitutions)) {
		const polymorphic = types.resolve(from)
		if (polymorphic === null || !types.isPolymorphic(polymorphic)) {
			throw new InvalidInputError(`"${from}" is not a polymorphic type`)
		}
		const concrete = types.resolve(to)
		if (concrete === null) throw new InvalidInputError(`type "${to}" does not exist`)
		if (types.isPolymorphic(concrete)) {
			throw new InvalidInputError(
				`polymorphic type "${from}" cannot be substituted by polymorphic type "${to}"`
			)
		}
		table.set(polymorphic.name, concrete)
	}

	return (type) => {
		if (!types.isPolymorphic(type)) return type
		const concrete = table.get(type.name)
		if (concrete === undefined) {
			throw new InvalidInputError(`polymorphic type "${type.name}" has no substitution`)
		}
		return concrete
	}
}

function resolveTriggerRelation(
	bridge: CatalogBridge,
	routine: Routine,
	relationName: string | null
): Relation | null {
	if (routine.trigger === 'dml') {
		if (relationName === null) throw new InvalidInputError('missing trigger relation')
		const relation = bridge.findRelation(relationName)
		if (relation === null) throw new InvalidInputError(`relation "${relationName}" does not exist`)
		return relation
	}
	if (relationName !== null) {
		throw new InvalidInputError(`${routine.signature} is not a DML trigger function`)
	}
	return null
}

/**
 * Validate the request and build the state for one run.
 *
 * @throws InvalidInputError before any statement is examined
 */
export function beginCheck(
	bridge: CatalogBridge,
	routine: Routine,
	options: CheckOptions,
	triggerRelationName: string | null = null
): CheckState {
	if (routine.language.toLowerCase() !== bridge.language.toLowerCase()) {
		throw new InvalidInputError(`${routine.signature} is not a ${bridge.language} function`)
	}
	const relation = resolveTriggerRelation(bridge, routine, triggerRelationName)
	const substitute = buildSubstitute(bridge.types, options.substitutions)

	const state = new CheckState(bridge, routine, options, relation, substitute)
	try {
		for (const template of routine.datums) state.install(copyDatum(template, substitute))
	} catch (error) {
		state.scratch.release()
		throw error
	}

	if (relation) {
		for (const template of routine.datums) {
			const name = template.name.toLowerCase()
			if (template.origin === 'implicit' && (name === 'new' || name === 'old')) {
				assignTupdesc(state, template.slot, relation.columns, 'trigger')
			}
		}
		for (const name of [options.transitionTables.newTable, options.transitionTables.oldTable]) {
			if (name) state.transitionTables.push({ name, relation })
		}
	}
	return state
}

/**
 * Release the run's scratch memory and hand back its diagnostics.
 */
export function endCheck(state: CheckState): readonly Diagnostic[] {
	state.scratch.release()
	return state.diagnostics
}
