/**
 * Routine compiler of the in-process host.
 *
 * Turns a parsed body into the host `Routine`: allocates a datum for every
 * variable, resolves assignment targets, cursors and loop variables to
 * slots, and numbers statements in source order.
 */

import type {
	BlockStmt,
	CursorSpec,
	Datum,
	DatumOrigin,
	ExceptionHandler,
	IntoClause,
	ParamMode,
	RecFieldDatum,
	Routine,
	RoutineKind,
	RoutineParam,
	SqlFragment,
	Stmt,
	TriggerKind,
} from '../../host/ast.ts'
import { type TupleShape, type TypeRef, typeRef, type Volatility } from '../../host/types.ts'
import type { MemoryCatalog } from '../catalog.ts'
import { extractInto } from './into.ts'
import { parseRoutineBody, RoutineSyntaxError } from './parser.ts'
import type { Block, Declaration, Handler, Into, Statement, Target } from './syntax.ts'

export interface HeaderParam {
	readonly name: string | null
	readonly type: TypeRef
	readonly mode: ParamMode
}

/** Everything the definition says about a routine apart from its body. */
export interface RoutineHeader {
	readonly identity: number
	readonly schema: string
	readonly name: string
	readonly kind: RoutineKind
	readonly language: string
	readonly returnType: TypeRef
	readonly returnsSet: boolean
	readonly volatility: Volatility
	readonly params: readonly HeaderParam[]
	readonly settings: Readonly<Record<string, string>>
	/** Text between the dollar quotes */
	readonly body: string
	readonly fingerprint: string
}

export class CompileError extends Error {
	constructor(
		message: string,
		readonly line: number
	) {
		super(message)
		this.name = 'CompileError'
	}
}

/** The only language whose bodies are compiled; others get an empty body. */
export const PROCEDURAL_LANGUAGE = 'plpgsql'

const EMPTY_BODY: Block = {
	body: [],
	declarations: [],
	handlers: null,
	kind: 'block',
	label: null,
	line: 1,
}

const REFCURSOR = typeRef('refcursor')
const TEXT = typeRef('text')
const NAME = typeRef('name')

const dmlTriggerVariables: readonly [string, TypeRef][] = [
	['tg_name', NAME],
	['tg_when', TEXT],
	['tg_level', TEXT],
	['tg_op', TEXT],
	['tg_relid', typeRef('oid')],
	['tg_relname', NAME],
	['tg_table_name', NAME],
	['tg_table_schema', NAME],
	['tg_nargs', typeRef('integer')],
	['tg_argv', typeRef('text[]')],
]

const eventTriggerVariables: readonly [string, TypeRef][] = [
	['tg_event', TEXT],
	['tg_tag', TEXT],
]

export function triggerKind(returnType: TypeRef): TriggerKind {
	if (returnType.name === 'trigger') return 'dml'
	if (returnType.name === 'event_trigger') return 'event'
	return 'none'
}

/** Display signature: `name(type,type)` over input parameters. */
export function formatSignature(
	catalog: MemoryCatalog,
	name: string,
	params: readonly HeaderParam[]
): string {
	const inputs = params.filter((param) => param.mode !== 'out')
	return `${name}(${inputs.map((param) => catalog.types.format(param.type)).join(',')})`
}

type ValueShape =
	| { readonly kind: 'var'; readonly type: TypeRef }
	| { readonly kind: 'row'; readonly type: TypeRef; readonly fields: TupleShape }
	| { readonly kind: 'rec' }

interface DatumExtras {
	readonly defaultExpr?: SqlFragment | null
	readonly isConst?: boolean
	readonly notNull?: boolean
	readonly cursor?: CursorSpec
}

interface Scope {
	readonly label: string | null
	readonly names: Map<string, number>
}

class RoutineCompiler {
	private readonly datums: Datum[] = []
	private readonly scopes: Scope[] = []
	private readonly fields = new Map<string, number>()
	private params: RoutineParam[] = []
	private nextId = 1

	constructor(
		private readonly header: RoutineHeader,
		private readonly catalog: MemoryCatalog
	) {}

	compile(): Routine {
		const header = this.header
		const trigger = triggerKind(header.returnType)
		const block =
			header.language.toLowerCase() === PROCEDURAL_LANGUAGE
				? parseRoutineBody(header.body)
				: EMPTY_BODY

		const root: Scope = { label: header.name, names: new Map() }
		this.scopes.push(root)
		const aliased = unnamedAliases(block)
		this.params = header.params.map((param, index) => {
			const name = param.name ?? aliased.get(index + 1) ?? null
			if (name === null) return { mode: param.mode, name: '', slot: -1, type: param.type }
			const slot = this.addDatum(name, this.shapeOf(param.type), 0, 'param')
			root.names.set(name, slot)
			return { mode: param.mode, name, slot, type: param.type }
		})

		this.declareImplicit('found', { kind: 'var', type: typeRef('boolean') })
		if (trigger === 'dml') {
			this.declareImplicit('new', { kind: 'rec' })
			this.declareImplicit('old', { kind: 'rec' })
		}
		const triggerVariables =
			trigger === 'dml' ? dmlTriggerVariables : trigger === 'event' ? eventTriggerVariables : []
		for (const [name, type] of triggerVariables) this.declareImplicit(name, { kind: 'var', type })

		const body = this.block(block)
		const signature = formatSignature(this.catalog, header.name, header.params)
		return {
			body,
			datums: this.datums,
			fingerprint: header.fingerprint,
			identity: header.identity,
			kind: header.kind,
			language: header.language,
			name: header.name,
			params: this.params,
			returnType: header.returnType,
			returnsSet: header.returnsSet,
			schema: header.schema,
			settings: header.settings,
			signature,
			source: header.body,
			trigger,
			volatility: header.volatility,
		}
	}

	// =========================================================================
	// DATUMS
	// =========================================================================

	private addDatum(
		name: string,
		shape: ValueShape,
		line: number,
		origin: DatumOrigin,
		extra: DatumExtras = {}
	): number {
		const slot = this.datums.length
		const defaultExpr = extra.defaultExpr ?? null
		switch (shape.kind) {
			case 'var':
				this.datums.push({
					cursor: extra.cursor ?? null,
					defaultExpr,
					isConst: extra.isConst ?? false,
					kind: 'var',
					line,
					name,
					notNull: extra.notNull ?? false,
					origin,
					slot,
					type: shape.type,
				})
				break
			case 'row':
				this.datums.push({
					defaultExpr,
					fields: shape.fields,
					kind: 'row',
					line,
					name,
					origin,
					slot,
					type: shape.type,
				})
				break
			case 'rec':
				this.datums.push({ defaultExpr, kind: 'rec', line, name, origin, slot })
				break
		}
		return slot
	}

	private declareImplicit(name: string, shape: ValueShape): void {
		const slot = this.addDatum(name, shape, 0, 'implicit')
		this.scopes[0]?.names.set(name, slot)
	}

	private shapeOf(type: TypeRef): ValueShape {
		if (type.name === 'record') return { kind: 'rec' }
		const fields = this.catalog.types.compositeShape(type)
		return fields ? { fields, kind: 'row', type } : { kind: 'var', type }
	}

	private resolveType(text: string, line: number): ValueShape {
		const lowered = text.toLowerCase()
		if (lowered.endsWith('%rowtype')) {
			const name = text.slice(0, -'%rowtype'.length).trim()
			const relation = this.catalog.findRelation(name)
			if (relation === null) throw new CompileError(`relation "${name}" does not exist`, line)
			return { fields: relation.columns, kind: 'row', type: typeRef(relation.name) }
		}
		if (lowered.endsWith('%type')) {
			return this.referencedType(text.slice(0, -'%type'.length).trim(), line)
		}

		const type = this.catalog.types.resolve(text)
		if (type === null) throw new CompileError(`type "${text}" does not exist`, line)
		return this.shapeOf(type)
	}

	/** `variable%TYPE` or `table.column%TYPE` */
	private referencedType(reference: string, line: number): ValueShape {
		const parts = reference.toLowerCase().split('.')
		const slot = this.lookup(parts)
		if (slot !== null) {
			const datum = this.datums[slot]
			if (datum === undefined) {
				throw new CompileError(`"${reference}" is not a known variable`, line)
			}
			return this.datumShape(datum)
		}
		const column = parts.pop() ?? ''
		const relation = this.catalog.findRelation(parts.join('.'))
		const found = relation?.columns.find((candidate) => candidate.name === column)
		if (!found) throw new CompileError(`invalid type name "${reference}%TYPE"`, line)
		return this.shapeOf(found.type)
	}

	private datumShape(datum: Datum): ValueShape {
		switch (datum.kind) {
			case 'var':
				return { kind: 'var', type: datum.type }
			case 'row':
				return { fields: datum.fields, kind: 'row', type: datum.type }
			case 'rec':
				return { kind: 'rec' }
			case 'recfield': {
				const parent = this.datums[datum.parent]
				const field =
					parent?.kind === 'row'
						? parent.fields.find((candidate) => candidate.name === datum.field)
						: undefined
				return field ? this.shapeOf(field.type) : { kind: 'rec' }
			}
		}
	}

	private declare(declaration: Declaration, scope: Scope): number | null {
		switch (declaration.kind) {
			case 'alias': {
				const slot = declaration.target.startsWith('$')
					? this.positionalSlot(Number(declaration.target.slice(1)))
					: this.lookup([declaration.target])
				if (slot === null) {
					throw new CompileError(
						`variable "${declaration.target}" does not exist`,
						declaration.line
					)
				}
				scope.names.set(declaration.name, slot)
				return null
			}
			case 'cursor': {
				const line = declaration.line
				const args = declaration.args.map((arg) =>
					this.addDatum(arg.name, this.resolveType(arg.typeText, line), line, 'scoped')
				)
				const slot = this.addDatum(
					declaration.name,
					{ kind: 'var', type: REFCURSOR },
					declaration.line,
					'declared',
					{ cursor: { args, query: declaration.query } }
				)
				scope.names.set(declaration.name, slot)
				return slot
			}
			case 'variable': {
				const shape = this.resolveType(declaration.typeText, declaration.line)
				const slot = this.addDatum(declaration.name, shape, declaration.line, 'declared', {
					defaultExpr: declaration.defaultExpr,
					isConst: declaration.isConst,
					notNull: declaration.notNull,
				})
				scope.names.set(declaration.name, slot)
				return slot
			}
		}
	}

	private positionalSlot(position: number): number | null {
		const slot = this.params[position - 1]?.slot ?? -1
		return slot >= 0 ? slot : null
	}

	// =========================================================================
	// NAME RESOLUTION
	// =========================================================================

	private lookupName(name: string, label: string | null = null): number | null {
		for (let i = this.scopes.length - 1; i >= 0; i--) {
			const scope = this.scopes[i]
			if (!scope || (label !== null && scope.label !== label)) continue
			const slot = scope.names.get(name)
			if (slot !== undefined) return slot
			if (label !== null) return null
		}
		return null
	}

	private recordField(parent: number, field: string): number | null {
		const datum = this.datums[parent]
		if (datum?.kind !== 'rec' && datum?.kind !== 'row') return null
		const key = `${parent}.${field}`
		const existing = this.fields.get(key)
		if (existing !== undefined) return existing
		const slot = this.datums.length
		const recfield: RecFieldDatum = {
			field,
			kind: 'recfield',
			line: 0,
			name: `${datum.name}.${field}`,
			origin: datum.origin,
			parent,
			slot,
		}
		this.datums.push(recfield)
		this.fields.set(key, slot)
		return slot
	}

	/** Resolve `name`, `label.name`, `record.field` or `label.record.field`. */
	private lookup(parts: Target): number | null {
		const [first, second, third] = parts
		if (first === undefined) return null
		if (parts.length === 1) return this.lookupName(first)
		if (parts.length === 2 && second !== undefined) {
			const qualified = this.lookupName(second, first)
			if (qualified !== null) return qualified
			const record = this.lookupName(first)
			return record === null ? null : this.recordField(record, second)
		}
		if (parts.length === 3 && second !== undefined && third !== undefined) {
			const record = this.lookupName(second, first)
			return record === null ? null : this.recordField(record, third)
		}
		return null
	}

	private target(parts: Target, line: number): number {
		const slot = this.lookup(parts)
		if (slot === null) throw new CompileError(`"${parts.join('.')}" is not a known variable`, line)
		return slot
	}

	private cursor(name: string, line: number): number {
		const slot = this.target([name], line)
		const datum = this.datums[slot]
		if (datum?.kind !== 'var' || datum.type.name !== REFCURSOR.name) {
			throw new CompileError(`variable "${name}" must be of type cursor or refcursor`, line)
		}
		return slot
	}

	private into(into: Into | null, line: number): IntoClause | null {
		if (into === null) return null
		return { strict: into.strict, targets: into.targets.map((target) => this.target(target, line)) }
	}

	// =========================================================================
	// STATEMENTS
	// =========================================================================

	private withScope<T>(label: string | null, build: (scope: Scope) => T): T {
		const scope: Scope = { label, names: new Map() }
		this.scopes.push(scope)
		try {
			return build(scope)
		} finally {
			this.scopes.pop()
		}
	}

	private block(block: Block): BlockStmt {
		const id = this.nextId++
		return this.withScope(block.label, (scope) => {
			const declarations: number[] = []
			for (const declaration of block.declarations) {
				const slot = this.declare(declaration, scope)
				if (slot !== null) declarations.push(slot)
			}
			return {
				body: this.stmts(block.body),
				declarations,
				handlers: block.handlers ? block.handlers.map((handler) => this.handler(handler)) : null,
				id,
				kind: 'block',
				label: block.label,
				line: block.line,
			}
		})
	}

	private handler(handler: Handler): ExceptionHandler {
		return this.withScope(null, (scope) => {
			const variables = ['sqlstate', 'sqlerrm'].map((name) => {
				const slot = this.addDatum(name, { kind: 'var', type: TEXT }, handler.line, 'scoped')
				scope.names.set(name, slot)
				return slot
			})
			return {
				body: this.stmts(handler.body),
				conditions: handler.conditions,
				line: handler.line,
				variables,
			}
		})
	}

	private stmts(statements: readonly Statement[]): Stmt[] {
		return statements.map((statement) => this.stmt(statement))
	}

	private loopBody(
		label: string | null,
		body: readonly Statement[],
		bind?: (scope: Scope) => void
	): Stmt[] {
		return this.withScope(label, (scope) => {
			bind?.(scope)
			return this.stmts(body)
		})
	}

	private stmt(statement: Statement): Stmt {
		if (statement.kind === 'block') return this.block(statement)
		const id = this.nextId++
		const line = statement.line
		switch (statement.kind) {
			case 'assign':
				return {
					expr: statement.expr,
					id,
					kind: 'assign',
					line,
					target: this.target(statement.target, line),
				}
			case 'if': {
				// ids follow source order
				const then = this.stmts(statement.then)
				const elsifs = statement.elsifs.map((clause) => ({
					...clause,
					body: this.stmts(clause.body),
				}))
				const otherwise = statement.otherwise ? this.stmts(statement.otherwise) : null
				return { cond: statement.cond, elsifs, id, kind: 'if', line, otherwise, then }
			}
			case 'case': {
				const whens = statement.whens.map((when) => ({ ...when, body: this.stmts(when.body) }))
				const otherwise = statement.otherwise ? this.stmts(statement.otherwise) : null
				return { id, kind: 'case', line, otherwise, subject: statement.subject, whens }
			}
			case 'loop':
				return {
					body: this.loopBody(statement.label, statement.body),
					id,
					kind: 'loop',
					label: statement.label,
					line,
				}
			case 'while':
				return {
					body: this.loopBody(statement.label, statement.body),
					cond: statement.cond,
					id,
					kind: 'while',
					label: statement.label,
					line,
				}
			case 'fori': {
				const counter: ValueShape = { kind: 'var', type: typeRef('integer') }
				const variable = this.addDatum(statement.variable, counter, line, 'scoped')
				return {
					body: this.loopBody(statement.label, statement.body, (scope) =>
						scope.names.set(statement.variable, variable)
					),
					id,
					kind: 'fori',
					label: statement.label,
					line,
					lower: statement.lower,
					reverse: statement.reverse,
					step: statement.step,
					upper: statement.upper,
					variable,
				}
			}
			case 'fors':
				return {
					body: this.loopBody(statement.label, statement.body),
					id,
					kind: 'fors',
					label: statement.label,
					line,
					query: statement.query,
					targets: statement.targets.map((target) => this.target(target, line)),
				}
			case 'forc': {
				const cursor = this.cursor(statement.cursor, line)
				const target = this.addDatum(statement.target, { kind: 'rec' }, line, 'scoped')
				return {
					args: statement.args,
					body: this.loopBody(statement.label, statement.body, (scope) =>
						scope.names.set(statement.target, target)
					),
					cursor,
					id,
					kind: 'forc',
					label: statement.label,
					line,
					target,
				}
			}
			case 'dynfors':
				return {
					body: this.loopBody(statement.label, statement.body),
					id,
					kind: 'dynfors',
					label: statement.label,
					line,
					params: statement.params,
					query: statement.query,
					targets: statement.targets.map((target) => this.target(target, line)),
				}
			case 'foreach':
				return {
					body: this.loopBody(statement.label, statement.body),
					expr: statement.expr,
					id,
					kind: 'foreach',
					label: statement.label,
					line,
					slice: statement.slice,
					targets: statement.targets.map((target) => this.target(target, line)),
				}
			case 'exit':
				return { ...statement, id }
			case 'return':
			case 'return_next':
				return { ...statement, id }
			case 'return_query':
				return { ...statement, id }
			case 'raise':
				return { ...statement, id }
			case 'assert':
				return { ...statement, id }
			case 'sql': {
				const extracted = extractInto(statement.query.text)
				return {
					id,
					into: this.into(extracted.into, line),
					kind: 'execsql',
					line,
					query: { line: statement.query.line, text: extracted.text.trimEnd() },
				}
			}
			case 'dynexecute':
				return {
					id,
					into: this.into(statement.into, line),
					kind: 'dynexecute',
					line,
					params: statement.params,
					query: statement.query,
				}
			case 'perform':
				return { ...statement, id }
			case 'open':
				return {
					args: statement.args,
					cursor: this.cursor(statement.cursor, line),
					dynamic: statement.dynamic,
					id,
					kind: 'open',
					line,
					params: statement.params,
					query: statement.query,
				}
			case 'fetch':
				return {
					cursor: this.cursor(statement.cursor, line),
					id,
					isMove: statement.isMove,
					kind: 'fetch',
					line,
					targets: statement.targets.map((target) => this.target(target, line)),
				}
			case 'close':
				return { cursor: this.cursor(statement.cursor, line), id, kind: 'close', line }
			case 'getdiag':
				return {
					id,
					items: statement.items.map((item) => ({
						item: item.item,
						target: this.target(item.target, line),
					})),
					kind: 'getdiag',
					line,
					stacked: statement.stacked,
				}
			case 'commit':
				return { id, kind: 'commit', line }
			case 'rollback':
				return { id, kind: 'rollback', line }
			case 'null':
				return { id, kind: 'null', line }
			case 'call':
				return { ...statement, id }
		}
	}
}

/** Names given by `ALIAS FOR $n` in the outermost block to parameters declared without one. */
function unnamedAliases(block: Block): Map<number, string> {
	const names = new Map<number, string>()
	for (const declaration of block.declarations) {
		if (declaration.kind === 'alias' && declaration.target.startsWith('$')) {
			names.set(Number(declaration.target.slice(1)), declaration.name)
		}
	}
	return names
}

/**
 * Compile a routine body against the catalog.
 *
 * @throws CompileError for syntax errors, unknown types and unknown variables
 */
export function compileRoutine(header: RoutineHeader, catalog: MemoryCatalog): Routine {
	try {
		return new RoutineCompiler(header, catalog).compile()
	} catch (error) {
		if (error instanceof RoutineSyntaxError) throw new CompileError(error.message, error.line)
		throw error
	}
}
