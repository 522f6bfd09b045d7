/**
 * Compiled routine as delivered by the host compiler.
 *
 * Statements form a closed tagged union; every consumer switches on `kind`
 * and ends with an exhaustiveness check.
 */

import type { TupleShape, TypeRef, Volatility } from './types.ts'

// =============================================================================
// ROUTINE
// =============================================================================

export type RoutineKind = 'function' | 'procedure'

export type TriggerKind = 'none' | 'dml' | 'event'

export type ParamMode = 'in' | 'out' | 'inout' | 'variadic'

export interface RoutineParam {
	readonly name: string
	readonly type: TypeRef
	readonly mode: ParamMode
	/** Datum slot holding the parameter, -1 for unnamed parameters */
	readonly slot: number
}

export interface Routine {
	readonly identity: number
	readonly schema: string
	readonly name: string
	/** Display signature, e.g. `fx(integer,text)` */
	readonly signature: string
	readonly language: string
	readonly kind: RoutineKind
	readonly trigger: TriggerKind
	readonly returnType: TypeRef
	readonly returnsSet: boolean
	readonly volatility: Volatility
	readonly params: readonly RoutineParam[]
	/** Every variable of the routine; a datum's slot is its index */
	readonly datums: readonly Datum[]
	readonly body: BlockStmt
	readonly source: string
	/** Per-routine configuration (`SET name = value` in the definition) */
	readonly settings: Readonly<Record<string, string>>
	/** Changes whenever the definition changes */
	readonly fingerprint: string
}

export type RoutineRef =
	| { readonly by: 'identity'; readonly identity: number }
	| { readonly by: 'signature'; readonly signature: string }
	| { readonly by: 'name'; readonly name: string }

// =============================================================================
// DATUMS
// =============================================================================

/**
 * Where a variable comes from. `implicit` variables (FOUND, trigger
 * variables) are visible in the whole body; `scoped` ones (integer loop
 * counters, SQLSTATE/SQLERRM in handlers, cursor arguments) only inside
 * their construct. Neither is reported as unused.
 */
export type DatumOrigin = 'param' | 'declared' | 'implicit' | 'scoped'

interface DatumBase {
	readonly slot: number
	readonly name: string
	/** Declaration line, 0 for parameters and implicit variables */
	readonly line: number
	readonly origin: DatumOrigin
}

export interface CursorSpec {
	/** Slots of the cursor's argument variables */
	readonly args: readonly number[]
	readonly query: SqlFragment
}

export interface VarDatum extends DatumBase {
	readonly kind: 'var'
	readonly type: TypeRef
	readonly isConst: boolean
	readonly notNull: boolean
	readonly defaultExpr: SqlFragment | null
	/** Present on bound cursor variables */
	readonly cursor: CursorSpec | null
}

export interface RowDatum extends DatumBase {
	readonly kind: 'row'
	readonly type: TypeRef
	readonly fields: TupleShape
	readonly defaultExpr: SqlFragment | null
}

export interface RecDatum extends DatumBase {
	readonly kind: 'rec'
	readonly defaultExpr: SqlFragment | null
}

export interface RecFieldDatum extends DatumBase {
	readonly kind: 'recfield'
	/** Slot of the record or row the field belongs to */
	readonly parent: number
	readonly field: string
}

export type Datum = VarDatum | RowDatum | RecDatum | RecFieldDatum

// =============================================================================
// STATEMENTS
// =============================================================================

/** Embedded SQL text with the body line it starts on. */
export interface SqlFragment {
	readonly text: string
	readonly line: number
}

interface StmtBase {
	readonly id: number
	readonly line: number
}

export type ConditionRef =
	| { readonly kind: 'name'; readonly name: string }
	| { readonly kind: 'sqlstate'; readonly code: string }

export interface ExceptionHandler {
	readonly line: number
	readonly conditions: readonly ConditionRef[]
	/** SQLSTATE and SQLERRM slots visible in the handler */
	readonly variables: readonly number[]
	readonly body: readonly Stmt[]
}

export interface BlockStmt extends StmtBase {
	readonly kind: 'block'
	readonly label: string | null
	/** Slots declared by this block, in declaration order */
	readonly declarations: readonly number[]
	readonly body: readonly Stmt[]
	readonly handlers: readonly ExceptionHandler[] | null
}

export interface AssignStmt extends StmtBase {
	readonly kind: 'assign'
	readonly target: number
	readonly expr: SqlFragment
}

export interface ElsifClause {
	readonly line: number
	readonly cond: SqlFragment
	readonly body: readonly Stmt[]
}

export interface IfStmt extends StmtBase {
	readonly kind: 'if'
	readonly cond: SqlFragment
	readonly then: readonly Stmt[]
	readonly elsifs: readonly ElsifClause[]
	readonly otherwise: readonly Stmt[] | null
}

export interface CaseWhen {
	readonly line: number
	readonly expr: SqlFragment
	readonly body: readonly Stmt[]
}

export interface CaseStmt extends StmtBase {
	readonly kind: 'case'
	/** Subject of a simple CASE, null for a searched CASE */
	readonly subject: SqlFragment | null
	readonly whens: readonly CaseWhen[]
	readonly otherwise: readonly Stmt[] | null
}

interface LoopBase extends StmtBase {
	readonly label: string | null
	readonly body: readonly Stmt[]
}

export interface LoopStmt extends LoopBase {
	readonly kind: 'loop'
}

export interface WhileStmt extends LoopBase {
	readonly kind: 'while'
	readonly cond: SqlFragment
}

export interface ForiStmt extends LoopBase {
	readonly kind: 'fori'
	readonly variable: number
	readonly lower: SqlFragment
	readonly upper: SqlFragment
	readonly step: SqlFragment | null
	readonly reverse: boolean
}

export interface ForsStmt extends LoopBase {
	readonly kind: 'fors'
	readonly targets: readonly number[]
	readonly query: SqlFragment
}

export interface ForcStmt extends LoopBase {
	readonly kind: 'forc'
	readonly target: number
	readonly cursor: number
	readonly args: readonly SqlFragment[] | null
}

export interface DynforsStmt extends LoopBase {
	readonly kind: 'dynfors'
	readonly targets: readonly number[]
	readonly query: SqlFragment
	readonly params: readonly SqlFragment[]
}

export interface ForeachStmt extends LoopBase {
	readonly kind: 'foreach'
	readonly targets: readonly number[]
	readonly slice: number
	readonly expr: SqlFragment
}

export interface ExitStmt extends StmtBase {
	readonly kind: 'exit'
	/** false for CONTINUE */
	readonly isExit: boolean
	readonly label: string | null
	readonly cond: SqlFragment | null
}

export interface ReturnStmt extends StmtBase {
	readonly kind: 'return'
	readonly expr: SqlFragment | null
}

export interface ReturnNextStmt extends StmtBase {
	readonly kind: 'return_next'
	readonly expr: SqlFragment | null
}

export interface ReturnQueryStmt extends StmtBase {
	readonly kind: 'return_query'
	readonly query: SqlFragment | null
	readonly dynamic: SqlFragment | null
	readonly params: readonly SqlFragment[]
}

export type RaiseLevel = 'debug' | 'log' | 'info' | 'notice' | 'warning' | 'exception'

export interface RaiseOption {
	readonly name: string
	readonly expr: SqlFragment
}

export interface RaiseStmt extends StmtBase {
	readonly kind: 'raise'
	readonly level: RaiseLevel
	readonly condition: ConditionRef | null
	/** Format string without quotes, null when absent */
	readonly message: string | null
	readonly params: readonly SqlFragment[]
	readonly options: readonly RaiseOption[]
	/** Bare `RAISE;` re-throwing the current exception */
	readonly reraise: boolean
}

export interface AssertStmt extends StmtBase {
	readonly kind: 'assert'
	readonly cond: SqlFragment
	readonly message: SqlFragment | null
}

export interface IntoClause {
	readonly targets: readonly number[]
	readonly strict: boolean
}

export interface ExecSqlStmt extends StmtBase {
	readonly kind: 'execsql'
	readonly query: SqlFragment
	readonly into: IntoClause | null
}

export interface DynExecuteStmt extends StmtBase {
	readonly kind: 'dynexecute'
	readonly query: SqlFragment
	readonly into: IntoClause | null
	readonly params: readonly SqlFragment[]
}

export interface PerformStmt extends StmtBase {
	readonly kind: 'perform'
	readonly query: SqlFragment
}

export interface OpenStmt extends StmtBase {
	readonly kind: 'open'
	readonly cursor: number
	readonly args: readonly SqlFragment[] | null
	readonly query: SqlFragment | null
	readonly dynamic: SqlFragment | null
	readonly params: readonly SqlFragment[]
}

export interface FetchStmt extends StmtBase {
	readonly kind: 'fetch'
	readonly cursor: number
	readonly targets: readonly number[]
	readonly isMove: boolean
}

export interface CloseStmt extends StmtBase {
	readonly kind: 'close'
	readonly cursor: number
}

export interface DiagItem {
	readonly target: number
	readonly item: string
}

export interface GetDiagStmt extends StmtBase {
	readonly kind: 'getdiag'
	readonly stacked: boolean
	readonly items: readonly DiagItem[]
}

export interface CommitStmt extends StmtBase {
	readonly kind: 'commit'
}

export interface RollbackStmt extends StmtBase {
	readonly kind: 'rollback'
}

export interface CallStmt extends StmtBase {
	readonly kind: 'call'
	readonly query: SqlFragment
}

export interface NullStmt extends StmtBase {
	readonly kind: 'null'
}

export type Stmt =
	| BlockStmt
	| AssignStmt
	| IfStmt
	| CaseStmt
	| LoopStmt
	| WhileStmt
	| ForiStmt
	| ForsStmt
	| ForcStmt
	| DynforsStmt
	| ForeachStmt
	| ExitStmt
	| ReturnStmt
	| ReturnNextStmt
	| ReturnQueryStmt
	| RaiseStmt
	| AssertStmt
	| ExecSqlStmt
	| DynExecuteStmt
	| PerformStmt
	| OpenStmt
	| FetchStmt
	| CloseStmt
	| GetDiagStmt
	| CommitStmt
	| RollbackStmt
	| CallStmt
	| NullStmt

export type StmtKind = Stmt['kind']

export function assertNever(value: never): never {
	throw new Error(`Unhandled statement: ${JSON.stringify(value)}`)
}

/**
 * Display name of a statement, as used in reports.
 */
export function stmtTypeName(stmt: Stmt): string {
	switch (stmt.kind) {
		case 'block':
			return 'statement block'
		case 'assign':
			return 'assignment'
		case 'if':
			return 'IF'
		case 'case':
			return 'CASE'
		case 'loop':
			return 'LOOP'
		case 'while':
			return 'WHILE'
		case 'fori':
			return 'FOR with integer loop variable'
		case 'fors':
			return 'FOR over SELECT rows'
		case 'forc':
			return 'FOR over cursor'
		case 'dynfors':
			return 'FOR over EXECUTE statement'
		case 'foreach':
			return 'FOREACH over array'
		case 'exit':
			return stmt.isExit ? 'EXIT' : 'CONTINUE'
		case 'return':
			return 'RETURN'
		case 'return_next':
			return 'RETURN NEXT'
		case 'return_query':
			return 'RETURN QUERY'
		case 'raise':
			return 'RAISE'
		case 'assert':
			return 'ASSERT'
		case 'execsql':
			return 'SQL statement'
		case 'dynexecute':
			return 'EXECUTE'
		case 'perform':
			return 'PERFORM'
		case 'open':
			return 'OPEN'
		case 'fetch':
			return stmt.isMove ? 'MOVE' : 'FETCH'
		case 'close':
			return 'CLOSE'
		case 'getdiag':
			return 'GET DIAGNOSTICS'
		case 'commit':
			return 'COMMIT'
		case 'rollback':
			return 'ROLLBACK'
		case 'call':
			return 'CALL'
		case 'null':
			return 'NULL'
		default:
			return assertNever(stmt)
	}
}

/**
 * Child statement lists of a statement, in source order. Used by every pass
 * that needs a plain traversal rather than per-kind semantics.
 */
export function childLists(stmt: Stmt): (readonly Stmt[])[] {
	switch (stmt.kind) {
		case 'block':
			return [stmt.body, ...(stmt.handlers ?? []).map((handler) => handler.body)]
		case 'if':
			return [
				stmt.then,
				...stmt.elsifs.map((clause) => clause.body),
				...(stmt.otherwise ? [stmt.otherwise] : []),
			]
		case 'case':
			return [...stmt.whens.map((when) => when.body), ...(stmt.otherwise ? [stmt.otherwise] : [])]
		case 'loop':
		case 'while':
		case 'fori':
		case 'fors':
		case 'forc':
		case 'dynfors':
		case 'foreach':
			return [stmt.body]
		default:
			return []
	}
}
