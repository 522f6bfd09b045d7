/**
 * Statement and control-flow walker.
 *
 * Each statement is checked once, in source order, and yields a closing
 * verdict. Loop bodies are walked exactly once. Host faults are caught per
 * expression so the rest of the statement and the routine are still checked.
 */

import type {
	BlockStmt,
	CaseStmt,
	DynforsStmt,
	ExitStmt,
	FetchStmt,
	ForcStmt,
	ForeachStmt,
	ForiStmt,
	ForsStmt,
	GetDiagStmt,
	IfStmt,
	OpenStmt,
	RaiseStmt,
	SqlFragment,
	Stmt,
	VarDatum,
} from '../host/ast.ts'
import { assertNever } from '../host/ast.ts'
import {
	isUnresolved,
	type TupleShape,
	TypeCategory,
	type TypeRef,
	typeRef,
} from '../host/types.ts'
import {
	CLOSED,
	type Closing,
	closedByException,
	isClosedForm,
	mergeAll,
	possiblyClosed,
	sequence,
	UNCLOSED,
} from '../core/closing.ts'
import { AnalysisFault, CheckCancelledError, getErrorMessage } from '../core/errors.ts'
import {
	DEFAULT_RAISE_CODE,
	conditionCode,
	handlerCatches,
	isSqlstate,
	resolveHandlerConditions,
} from './conditions.ts'
import { checkDynamicExecute, checkDynamicQuery, degradeTargets } from './dynamic.ts'
import { constantText } from './heuristics.ts'
import { applyMarker } from './pragma.ts'
import { checkTarget, degradeRecord } from './records.ts'
import {
	assignInto,
	assignValue,
	checkAssignment,
	checkAssignType,
	checkBoolExpr,
	checkExpr,
	checkExprAsRvalue,
	checkQuery,
	checkSqlStatement,
	reportHostError,
} from './resolver.ts'
import { checkReturn, checkReturnNext, checkReturnQuery } from './returns.ts'
import type { CheckState } from './state.ts'

// =============================================================================
// FAULT BOUNDARY
// =============================================================================

/**
 * Run one check, turning host faults into diagnostics at the current
 * statement. Returns false when the check faulted.
 */
function guarded(state: CheckState, check: () => void): boolean {
	if (state.stopped) return false
	try {
		check()
		return true
	} catch (error) {
		if (error instanceof CheckCancelledError) throw error
		if (error instanceof AnalysisFault) {
			reportHostError(state, error.error, error.query)
		} else {
			state.report('PCSQL002', { reason: getErrorMessage(error) })
		}
		return false
	}
}

// =============================================================================
// SEQUENCES
// =============================================================================

function isTrailingReturn(state: CheckState, stmt: Stmt): boolean {
	return stmt.kind === 'return' && stmt.expr === null && state.routine.returnsSet
}

/** EXIT or CONTINUE without WHEN: leaves the list but does not close the routine. */
function isJump(stmt: Stmt): boolean {
	return stmt.kind === 'exit' && stmt.cond === null
}

/**
 * Check a statement list. The first statement after a closing point or an
 * unconditional jump is reported once; the walk continues past it. Verdicts
 * of statements after a jump do not count.
 */
export function checkStmts(state: CheckState, stmts: readonly Stmt[]): Closing {
	const previous = state.currentStmt
	let closing = UNCLOSED
	let jumped = false
	let deadReported = false
	for (const stmt of stmts) {
		if (state.stopped) break
		if ((jumped || isClosedForm(closing)) && !deadReported) {
			deadReported = true
			if (!isTrailingReturn(state, stmt)) {
				state.currentStmt = stmt
				state.report('PCFLOW001')
			}
		}
		const next = checkStmt(state, stmt)
		if (!jumped) closing = sequence(closing, next)
		if (isJump(stmt)) jumped = true
	}
	state.currentStmt = previous
	return closing
}

export function checkStmt(state: CheckState, stmt: Stmt): Closing {
	state.pollCancel()
	const previous = state.currentStmt
	state.currentStmt = stmt
	try {
		return dispatch(state, stmt)
	} finally {
		state.currentStmt = previous
	}
}

function withCurrent<T>(state: CheckState, stmt: Stmt, run: () => T): T {
	state.currentStmt = stmt
	return run()
}

function dispatch(state: CheckState, stmt: Stmt): Closing {
	switch (stmt.kind) {
		case 'block':
			return checkBlock(state, stmt)
		case 'assign':
			guarded(state, () => checkAssignment(state, stmt.target, stmt.expr))
			return UNCLOSED
		case 'if':
			return checkIf(state, stmt)
		case 'case':
			return checkCase(state, stmt)
		case 'loop':
			return checkLoop(state, stmt, { plain: true })
		case 'while':
			return checkLoop(state, stmt, {
				prepare: () => guarded(state, () => checkBoolExpr(state, stmt.cond)),
			})
		case 'fori':
			return checkFori(state, stmt)
		case 'fors':
			return checkFors(state, stmt)
		case 'forc':
			return checkForc(state, stmt)
		case 'dynfors':
			return checkDynfors(state, stmt)
		case 'foreach':
			return checkForeach(state, stmt)
		case 'exit':
			return checkExit(state, stmt)
		case 'return':
			guarded(state, () => checkReturn(state, stmt))
			return CLOSED
		case 'return_next':
			guarded(state, () => checkReturnNext(state, stmt))
			return UNCLOSED
		case 'return_query':
			guarded(state, () => checkReturnQuery(state, stmt))
			return CLOSED
		case 'raise':
			return checkRaise(state, stmt)
		case 'assert':
			guarded(state, () => checkBoolExpr(state, stmt.cond))
			if (stmt.message) {
				const message = stmt.message
				guarded(state, () => checkExprAsRvalue(state, message))
			}
			return UNCLOSED
		case 'execsql':
			guarded(state, () => checkSqlStatement(state, stmt.query, stmt.into))
			return UNCLOSED
		case 'dynexecute':
			guarded(state, () => checkDynamicExecute(state, stmt.query, stmt.into, stmt.params))
			return UNCLOSED
		case 'perform':
			if (!applyMarker(state, stmt.query.text, 'block')) {
				const query = { line: stmt.query.line, text: `SELECT ${stmt.query.text}` }
				guarded(state, () => checkQuery(state, query))
			}
			return UNCLOSED
		case 'open':
			guarded(state, () => checkOpen(state, stmt))
			return UNCLOSED
		case 'fetch':
			guarded(state, () => checkFetch(state, stmt))
			return UNCLOSED
		case 'close':
			state.usage.markRead(stmt.cursor)
			return UNCLOSED
		case 'getdiag':
			guarded(state, () => checkGetDiag(state, stmt))
			return UNCLOSED
		case 'commit':
		case 'rollback':
			if (state.routine.kind !== 'procedure') state.report('PCFLOW010')
			return UNCLOSED
		case 'call':
			guarded(state, () => checkQuery(state, stmt.query))
			return UNCLOSED
		case 'null':
			return UNCLOSED
		default:
			return assertNever(stmt)
	}
}

// =============================================================================
// BLOCKS
// =============================================================================

function checkShadowing(state: CheckState, slot: number): void {
	const datum = state.datum(slot).template
	const name = datum.name.toLowerCase()
	for (const outer of state.namespace.outerSlots()) {
		const other = state.datum(outer).template
		if (other.name.toLowerCase() !== name) continue
		if (other.origin === 'param') {
			state.reportDeclaration(datum, 'PCDECL007', { name: datum.name })
			return
		}
		if (other.origin === 'declared') {
			state.reportDeclaration(datum, 'PCDECL006', { name: datum.name })
			return
		}
	}
}

function checkDefault(state: CheckState, slot: number, expr: SqlFragment): void {
	const datum = state.datum(slot)
	const info = checkExprAsRvalue(state, expr)
	const template = datum.template
	const isNull = info.node?.kind === 'const' && info.node.value === null
	if (template.kind === 'var' && template.notNull && isNull) {
		state.reportDeclaration(template, 'PCDECL008', { name: template.name })
		return
	}
	const target = { fields: datum.fields, type: datum.type, typmod: datum.type.typmod }
	assignValue(state, slot, target, info)
}

function checkDeclarations(state: CheckState, block: BlockStmt): void {
	const scope = block === state.routine.body ? 'routine' : 'block'
	for (const slot of block.declarations) {
		const template = state.datum(slot).template
		if (template.kind === 'recfield') continue
		checkShadowing(state, slot)

		const expr = template.defaultExpr
		if (expr && applyMarker(state, expr.text, scope)) {
			state.usage.markExempt(slot)
			continue
		}
		if (template.kind === 'var' && template.notNull && expr === null) {
			state.reportDeclaration(template, 'PCDECL008', { name: template.name })
		}
		if (expr) guarded(state, () => checkDefault(state, slot, expr))
	}
}

function checkHandlers(state: CheckState, block: BlockStmt, body: Closing): Closing {
	const handlers = block.handlers ?? []
	const results = handlers.map((handler) => {
		const conditions = withCurrent(state, block, () =>
			resolveHandlerConditions(state, handler.conditions)
		)
		state.namespace.push('scope', null, handler.variables)
		state.handlerDepth++
		const closing = checkStmts(state, handler.body)
		state.handlerDepth--
		state.namespace.pop()
		return { closing, conditions }
	})

	if (body.status !== 'closed-by-exceptions') {
		return mergeAll([body, ...results.map((result) => result.closing)])
	}

	const catching = results.filter((result) =>
		body.raises.some((code) => handlerCatches(result.conditions, code))
	)
	const uncaught = body.raises.filter(
		(code) => !results.some((result) => handlerCatches(result.conditions, code))
	)
	if (catching.length === 0) return body
	return mergeAll([
		...catching.map((result) => result.closing),
		...(uncaught.length > 0 ? [closedByException(...uncaught)] : []),
	])
}

function checkBlock(state: CheckState, block: BlockStmt): Closing {
	state.pragmas.push()
	const frame = state.namespace.push('block', block.label, block.declarations)
	let closing = UNCLOSED
	try {
		checkDeclarations(state, block)
		closing = checkStmts(state, block.body)
		if (block.handlers) closing = checkHandlers(state, block, closing)
	} finally {
		state.namespace.pop()
		state.pragmas.pop()
	}
	return frame.exited ? possiblyClosed(closing) : closing
}

// =============================================================================
// BRANCHES
// =============================================================================

function checkIf(state: CheckState, stmt: IfStmt): Closing {
	guarded(state, () => checkBoolExpr(state, stmt.cond))
	const branches: Closing[] = [checkStmts(state, stmt.then)]
	for (const clause of stmt.elsifs) {
		withCurrent(state, stmt, () => guarded(state, () => checkBoolExpr(state, clause.cond)))
		branches.push(checkStmts(state, clause.body))
	}
	branches.push(stmt.otherwise ? checkStmts(state, stmt.otherwise) : UNCLOSED)
	return mergeAll(branches)
}

function checkCase(state: CheckState, stmt: CaseStmt): Closing {
	const subject = stmt.subject
	if (subject) guarded(state, () => checkExprAsRvalue(state, subject))
	const branches: Closing[] = []
	for (const when of stmt.whens) {
		const check = subject ? checkExpr : checkBoolExpr
		withCurrent(state, stmt, () => guarded(state, () => check(state, when.expr)))
		branches.push(checkStmts(state, when.body))
	}
	branches.push(stmt.otherwise ? checkStmts(state, stmt.otherwise) : UNCLOSED)
	return mergeAll(branches)
}

// =============================================================================
// LOOPS
// =============================================================================

type LoopStmt = Extract<Stmt, { readonly label: string | null; readonly body: readonly Stmt[] }>

interface LoopOptions {
	/** Checks of the loop header, run before the body */
	readonly prepare?: () => void
	/** Plain LOOP: the body always runs */
	readonly plain?: boolean
	/** Variables scoped to the loop */
	readonly slots?: readonly number[]
}

/**
 * Walk a loop body once inside a loop frame. A plain LOOP passes its body
 * verdict through; other loops may run zero times.
 */
function checkLoop(state: CheckState, stmt: LoopStmt, options: LoopOptions = {}): Closing {
	options.prepare?.()
	const frame = state.namespace.push('loop', stmt.label, options.slots ?? [])
	let body = UNCLOSED
	try {
		body = checkStmts(state, stmt.body)
	} finally {
		state.namespace.pop()
	}
	if (frame.exited || !options.plain) return possiblyClosed(body)
	return body
}

const INTEGER = typeRef('integer')

function checkFori(state: CheckState, stmt: ForiStmt): Closing {
	const prepare = (): void => {
		for (const bound of [stmt.lower, stmt.upper, stmt.step]) {
			if (bound === null) continue
			guarded(state, () => {
				const info = checkExprAsRvalue(state, bound)
				checkAssignType(state, INTEGER, info.type, info.node?.kind === 'const')
			})
		}
		state.usage.markWrite(stmt.variable)
	}
	return checkLoop(state, stmt, { prepare, slots: [stmt.variable] })
}

function checkFors(state: CheckState, stmt: ForsStmt): Closing {
	const prepare = (): void => {
		guarded(state, () => {
			const query = checkQuery(state, stmt.query)
			assignInto(state, stmt.targets, query.columns)
		})
	}
	return checkLoop(state, stmt, { prepare })
}

function checkDynfors(state: CheckState, stmt: DynforsStmt): Closing {
	const prepare = (): void => {
		guarded(state, () => {
			const { query } = checkDynamicQuery(state, stmt.query, stmt.params)
			if (query === null) {
				degradeTargets(state, stmt.targets)
			} else {
				assignInto(state, stmt.targets, query.columns)
			}
		})
	}
	return checkLoop(state, stmt, { prepare })
}

function cursorDatum(state: CheckState, slot: number): VarDatum | null {
	const template = state.datum(slot).template
	return template.kind === 'var' ? template : null
}

/**
 * Check the arguments of a bound cursor and resolve its query with the
 * argument variables in scope. Returns the result columns.
 */
function openBoundCursor(
	state: CheckState,
	cursor: VarDatum,
	args: readonly SqlFragment[] | null
): TupleShape | null {
	const spec = cursor.cursor
	if (spec === null) return null
	const given = args?.length ?? 0
	if (given < spec.args.length) state.report('PCCUR001', { name: cursor.name })
	if (given > spec.args.length) state.report('PCCUR002', { name: cursor.name })

	spec.args.forEach((slot, i) => {
		const arg = args?.[i]
		if (arg === undefined) return
		const datum = state.datum(slot)
		const info = checkExprAsRvalue(state, arg)
		assignValue(state, slot, { fields: null, type: datum.type, typmod: datum.type.typmod }, info)
		state.usage.markWrite(slot)
	})

	state.namespace.push('scope', null, spec.args)
	try {
		return checkQuery(state, spec.query).columns
	} finally {
		state.namespace.pop()
	}
}

function checkForc(state: CheckState, stmt: ForcStmt): Closing {
	const prepare = (): void => {
		guarded(state, () => {
			state.usage.markRead(stmt.cursor)
			const cursor = cursorDatum(state, stmt.cursor)
			if (cursor === null) return
			const columns = openBoundCursor(state, cursor, stmt.args)
			if (columns) assignInto(state, [stmt.target], columns)
		})
	}
	return checkLoop(state, stmt, { prepare, slots: [stmt.target] })
}

function checkForeach(state: CheckState, stmt: ForeachStmt): Closing {
	const prepare = (): void => {
		guarded(state, () => {
			const info = checkExprAsRvalue(state, stmt.expr)
			for (const slot of stmt.targets) state.usage.markWrite(slot)
			if (isUnresolved(info.type)) return
			if (state.types.category(info.type) !== TypeCategory.Array) {
				state.report('PCTYPE015', { type: state.types.format(info.type) })
				return
			}
			const element =
				stmt.slice > 0 ? info.type : typeRef(info.type.name.replace(/\[\]$/, ''), info.type.typmod)
			const shape = state.types.compositeShape(element)
			if (shape) {
				assignInto(state, stmt.targets, shape)
				return
			}
			const [target] = stmt.targets
			if (target !== undefined && stmt.targets.length === 1) {
				const datum = state.datum(target)
				checkAssignType(state, datum.type, element)
			}
		})
	}
	return checkLoop(state, stmt, { prepare })
}

// =============================================================================
// EXIT, RAISE
// =============================================================================

function checkExit(state: CheckState, stmt: ExitStmt): Closing {
	const cond = stmt.cond
	if (cond) guarded(state, () => checkBoolExpr(state, cond))
	if (stmt.label !== null) {
		const frame = state.namespace.findLabel(stmt.label)
		if (frame === null) {
			state.report('PCFLOW004', { label: stmt.label })
		} else if (frame.kind === 'block' && !stmt.isExit) {
			state.report('PCFLOW005', { label: stmt.label })
		} else if (stmt.isExit) {
			frame.exited = true
		}
		return UNCLOSED
	}

	const loop = state.namespace.innermostLoop()
	if (loop === null) {
		state.report('PCFLOW006', { statement: stmt.isExit ? 'EXIT' : 'CONTINUE' })
	} else if (stmt.isExit) {
		loop.exited = true
	}
	return UNCLOSED
}

/** Number of `%` placeholders, `%%` being a literal percent sign. */
export function countPlaceholders(message: string): number {
	let count = 0
	for (let i = 0; i < message.length; i++) {
		if (message[i] !== '%') continue
		if (message[i + 1] === '%') {
			i++
			continue
		}
		count++
	}
	return count
}

function raisedCode(state: CheckState, stmt: RaiseStmt): string {
	let code = stmt.condition ? conditionCode(state, stmt.condition) : null
	for (const option of stmt.options) {
		if (option.name.toLowerCase() !== 'errcode') continue
		guarded(state, () => {
			const info = checkExprAsRvalue(state, option.expr)
			const value = info.node ? constantText(info.node) : null
			if (value === null) return
			code = isSqlstate(value) ? value : state.bridge.conditionCode(value.toLowerCase())
		})
	}
	return code ?? DEFAULT_RAISE_CODE
}

function checkRaise(state: CheckState, stmt: RaiseStmt): Closing {
	if (stmt.reraise) {
		if (state.handlerDepth === 0) state.report('PCFLOW012')
		return CLOSED
	}

	for (const param of stmt.params) guarded(state, () => checkExprAsRvalue(state, param))
	if (stmt.message !== null) {
		const expected = countPlaceholders(stmt.message)
		if (expected > stmt.params.length) state.report('PCFLOW007')
		if (expected < stmt.params.length) state.report('PCFLOW008')
	}

	const seen = new Set<string>()
	for (const option of stmt.options) {
		const name = option.name.toUpperCase()
		if (seen.has(name)) state.report('PCFLOW009', { option: name })
		seen.add(name)
		if (name !== 'ERRCODE') guarded(state, () => checkExprAsRvalue(state, option.expr))
	}

	const code = raisedCode(state, stmt)
	return stmt.level === 'exception' ? closedByException(code) : UNCLOSED
}

// =============================================================================
// CURSORS AND DIAGNOSTICS
// =============================================================================

function checkOpen(state: CheckState, stmt: OpenStmt): void {
	state.usage.markRead(stmt.cursor)
	state.usage.markWrite(stmt.cursor)
	const cursor = cursorDatum(state, stmt.cursor)
	if (cursor === null) return

	if (stmt.query || stmt.dynamic) {
		if (cursor.cursor !== null) {
			state.report('PCCUR003', { name: cursor.name })
			return
		}
		if (stmt.query) {
			state.cursorShapes.set(stmt.cursor, checkQuery(state, stmt.query).columns)
			return
		}
		if (stmt.dynamic) {
			const { query } = checkDynamicQuery(state, stmt.dynamic, stmt.params)
			if (query) {
				state.cursorShapes.set(stmt.cursor, query.columns)
			} else {
				state.cursorShapes.delete(stmt.cursor)
			}
		}
		return
	}

	const columns = openBoundCursor(state, cursor, stmt.args)
	if (columns) state.cursorShapes.set(stmt.cursor, columns)
}

function checkFetch(state: CheckState, stmt: FetchStmt): void {
	state.usage.markRead(stmt.cursor)
	if (stmt.isMove) return
	const shape = state.cursorShapes.get(stmt.cursor)
	if (shape) {
		assignInto(state, stmt.targets, shape)
		return
	}
	for (const slot of stmt.targets) {
		state.usage.markWrite(slot)
		degradeRecord(state, slot)
	}
}

const BIGINT = typeRef('bigint')
const TEXT = typeRef('text')
const OID = typeRef('oid')

function diagnosticsItemType(item: string): TypeRef {
	switch (item.toLowerCase()) {
		case 'row_count':
			return BIGINT
		case 'pg_routine_oid':
			return OID
		default:
			return TEXT
	}
}

function checkGetDiag(state: CheckState, stmt: GetDiagStmt): void {
	for (const item of stmt.items) {
		state.usage.markWrite(item.target)
		const target = checkTarget(state, item.target)
		if (target === null || target.fields !== null) continue
		checkAssignType(state, target.type, diagnosticsItemType(item.item))
	}
}
