/**
 * Semantic analysis of parsed SQL against the in-memory catalog and the
 * routine variables visible to the fragment.
 *
 * Errors carry the SQLSTATE, message, hint and position the host reports for
 * the same mistake. The first error stops the analysis.
 */

import type {
	AnalyzeRequest,
	AnalyzeResult,
	HostError,
	VariableBinding,
} from '../../host/bridge.ts'
import type {
	CalledRoutine,
	ConstNode,
	OperatorInfo,
	QueryNode,
	RelationRef,
	ResolvedQuery,
} from '../../host/query.ts'
import {
	type Column,
	isUnresolved,
	type Relation,
	RelationKind,
	type TupleShape,
	TypeCategory,
	type TypeRef,
	typeRef,
	UNRESOLVED,
	Volatility,
} from '../../host/types.ts'
import { CATALOG_SCHEMA, type FunctionEntry, type MemoryCatalog } from '../catalog.ts'
import { arrayOf, elementOf } from '../types.ts'
import type {
	CallExpr,
	CaseExpr,
	DeleteStmt,
	FromItem,
	InsertStmt,
	LikeExpr,
	LiteralExpr,
	SelectCore,
	SelectItem,
	SelectStmt,
	SqlExpr,
	SqlStatement,
	UpdateStmt,
} from './ast.ts'
import { parseExpression, parseStatement } from './parser.ts'

const BOOLEAN = typeRef('boolean')
const TEXT = typeRef('text')
const UNKNOWN = typeRef('unknown')
const RECORD = typeRef('record')
const INTEGER = typeRef('integer')

const UNDEFINED_FUNCTION_HINT =
	'No function matches the given name and argument types. You might need to add explicit type casts.'
const UNDEFINED_OPERATOR_HINT =
	'No operator matches the given name and argument types. You might need to add explicit type casts.'

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '<>', '<', '>', '<=', '>='])
const ARITHMETIC_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/', '%', '^'])

/** Raised inside the analyzer and turned into a failed result at the boundary. */
class SqlError extends Error {
	readonly error: HostError

	constructor(error: HostError) {
		super(error.message)
		this.name = 'SqlError'
		this.error = error
	}
}

function fail(
	sqlstate: string,
	message: string,
	extra: Omit<HostError, 'sqlstate' | 'message'> = {}
): never {
	throw new SqlError({ message, sqlstate, ...extra })
}

interface RangeEntry {
	readonly alias: string
	readonly relation: RelationRef | null
	readonly columns: TupleShape
}

interface Scope {
	readonly entries: RangeEntry[]
	readonly parent: Scope | null
}

/** Relations and subqueries met while analyzing one query level. */
interface Collector {
	readonly relations: RelationRef[]
	readonly subqueries: ResolvedQuery[]
}

function newCollector(): Collector {
	return { relations: [], subqueries: [] }
}

function toRef(relation: Relation): RelationRef {
	return {
		identity: relation.identity,
		kind: relation.kind,
		name: relation.name,
		schema: relation.schema,
	}
}

function builtinOperator(name: string, left: TypeRef | null, right: TypeRef | null): OperatorInfo {
	return {
		builtin: true,
		identity: 0,
		left,
		name,
		right,
		schema: CATALOG_SCHEMA,
		volatility: Volatility.Immutable,
	}
}

function castRoutine(source: TypeRef, target: TypeRef): CalledRoutine {
	return {
		args: [source],
		builtin: true,
		identity: 0,
		kind: 'function',
		name: target.name,
		schema: CATALOG_SCHEMA,
		volatility: Volatility.Immutable,
	}
}

/** Output column name the host derives for a select-list expression. */
function columnName(expr: SqlExpr): string {
	switch (expr.kind) {
		case 'ref':
			return expr.parts[expr.parts.length - 1] ?? '?column?'
		case 'call':
			return expr.name[expr.name.length - 1] ?? '?column?'
		case 'cast': {
			const inner = columnName(expr.operand)
			return inner === '?column?' ? expr.typeName.trim().toLowerCase() : inner
		}
		case 'field':
			return expr.field
		case 'case':
			return 'case'
		case 'sublink':
			return expr.mode === 'scalar' ? '?column?' : expr.mode
		case 'array':
			return 'array'
		case 'row':
			return 'row'
		default:
			return '?column?'
	}
}

function selectQuery(columns: TupleShape, targets: QueryNode[]): Omit<
	ResolvedQuery,
	'where' | 'otherExprs' | 'relations' | 'subqueries'
> {
	return {
		columns,
		command: 'select',
		returnsData: true,
		targetList: targets,
		transactionControl: false,
		utilityTag: null,
	}
}

export class SqlAnalyzer {
	constructor(
		private readonly catalog: MemoryCatalog,
		private readonly request: AnalyzeRequest
	) {}

	private get types() {
		return this.catalog.types
	}

	run(): AnalyzeResult {
		try {
			if (this.request.mode === 'expression') {
				const parsed = parseExpression(this.request.text)
				if (!parsed.ok) return { error: parsed.error, ok: false }
				return { ok: true, query: this.expressionQuery(parsed.value) }
			}
			const parsed = parseStatement(this.request.text)
			if (!parsed.ok) return { error: parsed.error, ok: false }
			return { ok: true, query: this.statement(parsed.value) }
		} catch (error) {
			if (error instanceof SqlError) return { error: error.error, ok: false }
			throw error
		}
	}

	private format(type: TypeRef): string {
		return this.types.format(type)
	}

	// =========================================================================
	// STATEMENTS
	// =========================================================================

	private expressionQuery(expr: SqlExpr): ResolvedQuery {
		const collector = newCollector()
		const node = this.expr(expr, { entries: [], parent: null }, collector)
		return {
			...selectQuery([{ name: columnName(expr), type: node.type }], [node]),
			otherExprs: [],
			relations: collector.relations,
			subqueries: collector.subqueries,
			where: null,
		}
	}

	private statement(statement: SqlStatement): ResolvedQuery {
		switch (statement.kind) {
			case 'select':
				return this.select(statement, null)
			case 'insert':
				return this.insert(statement)
			case 'update':
				return this.update(statement)
			case 'delete':
				return this.delete(statement)
			case 'call': {
				const collector = newCollector()
				const node = this.call(statement.call, { entries: [], parent: null }, collector, true)
				return {
					columns: [],
					command: 'call',
					otherExprs: [node],
					relations: collector.relations,
					returnsData: false,
					subqueries: collector.subqueries,
					targetList: [],
					transactionControl: false,
					utilityTag: null,
					where: null,
				}
			}
			case 'utility':
				return {
					columns: [],
					command: 'utility',
					otherExprs: [],
					relations: [],
					returnsData: false,
					subqueries: [],
					targetList: [],
					transactionControl: statement.transactionControl,
					utilityTag: statement.tag,
					where: null,
				}
		}
	}

	private select(stmt: SelectStmt, parent: Scope | null): ResolvedQuery {
		const collector = newCollector()
		const [first, ...rest] = stmt.cores
		if (!first) fail('42601', 'syntax error at end of input')
		const head = this.selectCore(first, parent, collector)
		for (const core of rest) {
			const other = this.selectCore(core, parent, collector)
			if (other.columns.length !== head.columns.length) {
				fail('42601', 'each UNION query must have the same number of columns')
			}
			collector.subqueries.push({
				...selectQuery(other.columns, other.targets),
				otherExprs: other.other,
				relations: [],
				subqueries: [],
				where: other.where,
			})
		}
		const outputNames = new Set(head.columns.map((column) => column.name))
		const ordering: QueryNode[] = []
		for (const expr of stmt.orderBy) {
			const alias = expr.kind === 'ref' && expr.parts.length === 1 ? expr.parts[0] : undefined
			if (alias !== undefined && outputNames.has(alias)) continue
			ordering.push(this.expr(expr, head.scope, collector))
		}
		const bounds = [stmt.limit, stmt.offset].flatMap((expr) =>
			expr ? [this.expr(expr, { entries: [], parent }, collector)] : []
		)
		return {
			...selectQuery(head.columns, head.targets),
			otherExprs: [...head.other, ...ordering, ...bounds],
			relations: collector.relations,
			subqueries: collector.subqueries,
			where: head.where,
		}
	}

	private selectCore(core: SelectCore, parent: Scope | null, collector: Collector) {
		const scope: Scope = { entries: [], parent }
		const other: QueryNode[] = []
		for (const item of core.from) this.fromItem(item, scope, collector, other)
		const { columns, targets } = this.selectList(core.items, scope, collector)
		const where = core.where ? this.condition(core.where, scope, collector, 'WHERE') : null
		for (const expr of core.groupBy) other.push(this.expr(expr, scope, collector))
		if (core.having) other.push(this.condition(core.having, scope, collector, 'HAVING'))
		return { columns, other, scope, targets, where }
	}

	private selectList(items: readonly SelectItem[], scope: Scope, collector: Collector) {
		const columns: Column[] = []
		const targets: QueryNode[] = []
		const expand = (entry: RangeEntry): void => {
			for (const column of entry.columns) {
				columns.push(column)
				targets.push({
					kind: 'column',
					location: 0,
					name: column.name,
					relation: entry.relation?.identity ?? null,
					type: column.type,
				})
			}
		}
		for (const item of items) {
			switch (item.kind) {
				case 'star':
					if (scope.entries.length === 0) {
						fail('42601', 'SELECT * with no tables specified is not valid')
					}
					for (const entry of scope.entries) expand(entry)
					break
				case 'qualifiedStar': {
					const entry = scope.entries.find((candidate) => candidate.alias === item.qualifier)
					if (!entry) {
						fail('42P01', `missing FROM-clause entry for table "${item.qualifier}"`, {
							position: item.location,
						})
					}
					expand(entry)
					break
				}
				case 'expr': {
					const node = this.expr(item.expr, scope, collector)
					columns.push({ name: item.alias ?? columnName(item.expr), type: node.type })
					targets.push(node)
					break
				}
			}
		}
		return { columns, targets }
	}

	private lookupRelation(parts: readonly string[], location: number): Relation {
		const name = parts.join('.')
		const last = parts[parts.length - 1] ?? ''
		const schema = parts.length > 1 ? parts[0] : undefined
		const synthetic = this.request.syntheticRelations.find(
			(relation) => relation.name === last && (schema === undefined || relation.schema === schema)
		)
		if (synthetic) return synthetic
		if (schema === undefined) {
			const transition = this.request.transitionTables.find((table) => table.name === last)
			if (transition) return transition.relation
		}
		const relation = this.catalog.findRelation(name)
		if (!relation) fail('42P01', `relation "${name}" does not exist`, { position: location })
		return relation
	}

	private fromItem(item: FromItem, scope: Scope, collector: Collector, other: QueryNode[]): void {
		switch (item.kind) {
			case 'table': {
				const relation = this.lookupRelation(item.name, item.location)
				if (relation.kind === RelationKind.CompositeType) {
					fail('42809', `"${relation.name}" is a composite type`, { position: item.location })
				}
				collector.relations.push(toRef(relation))
				scope.entries.push({
					alias: item.alias ?? relation.name,
					columns: relation.columns,
					relation: toRef(relation),
				})
				return
			}
			case 'subquery': {
				const query = this.select(item.query, scope.parent)
				collector.subqueries.push(query)
				scope.entries.push({ alias: item.alias, columns: query.columns, relation: null })
				return
			}
			case 'function': {
				const node = this.call(item.call, { entries: [], parent: scope.parent }, collector, false)
				other.push(node)
				const name = item.alias ?? columnName(item.call)
				const entry = this.functionEntry(item.call, node)
				const columns = entry?.columns ?? this.types.compositeShape(node.type) ?? [
					{ name, type: node.type },
				]
				scope.entries.push({ alias: name, columns, relation: null })
				return
			}
			case 'join': {
				this.fromItem(item.left, scope, collector, other)
				this.fromItem(item.right, scope, collector, other)
				if (item.on) other.push(this.condition(item.on, scope, collector, 'JOIN/ON'))
				return
			}
		}
	}

	private functionEntry(call: CallExpr, node: QueryNode): FunctionEntry | null {
		if (node.kind !== 'func') return null
		return (
			this.catalog
				.functionsNamed(call.name.join('.'))
				.find((entry) => entry.called.identity === node.routine.identity) ?? null
		)
	}

	private insert(stmt: InsertStmt): ResolvedQuery {
		const collector = newCollector()
		const relation = this.lookupRelation(stmt.table, stmt.location)
		collector.relations.push(toRef(relation))
		const targets = (stmt.columns ?? relation.columns.map((column) => column.name)).map((name) =>
			this.targetColumn(relation, name, stmt.location)
		)
		const other: QueryNode[] = []
		const source = stmt.source
		if (source.kind === 'values') {
			for (const row of source.rows) {
				const extra = row[targets.length]
				if (extra) {
					fail('42601', 'INSERT has more expressions than target columns', {
						position: extra.location,
					})
				}
				if (stmt.columns && row.length < targets.length) {
					fail('42601', 'INSERT has more target columns than expressions')
				}
				row.forEach((expr, index) => {
					const target = targets[index]
					const node = this.expr(expr, { entries: [], parent: null }, collector)
					other.push(target ? this.assignColumn(target, node, expr.location) : node)
				})
			}
		} else if (source.kind === 'select') {
			const query = this.select(source.query, null)
			collector.subqueries.push(query)
			if (query.columns.length > targets.length) {
				fail('42601', 'INSERT has more expressions than target columns')
			}
			query.columns.forEach((column, index) => {
				const target = targets[index]
				if (target) this.checkAssignable(target, column.type, 0)
			})
		}
		const scope: Scope = {
			entries: [{ alias: relation.name, columns: relation.columns, relation: toRef(relation) }],
			parent: null,
		}
		return this.modification('insert', stmt.returning, scope, collector, other, null)
	}

	private update(stmt: UpdateStmt): ResolvedQuery {
		const collector = newCollector()
		const scope: Scope = { entries: [], parent: null }
		const other: QueryNode[] = []
		this.fromItem(stmt.table, scope, collector, other)
		const target =
			stmt.table.kind === 'table'
				? this.lookupRelation(stmt.table.name, stmt.table.location)
				: null
		for (const item of stmt.from) this.fromItem(item, scope, collector, other)
		for (const set of stmt.sets) {
			const node = this.expr(set.expr, scope, collector)
			if (target) {
				const column = this.targetColumn(target, set.column, set.location)
				other.push(this.assignColumn(column, node, set.expr.location))
			} else {
				other.push(node)
			}
		}
		const where = stmt.where ? this.condition(stmt.where, scope, collector, 'WHERE') : null
		return this.modification('update', stmt.returning, scope, collector, other, where)
	}

	private delete(stmt: DeleteStmt): ResolvedQuery {
		const collector = newCollector()
		const scope: Scope = { entries: [], parent: null }
		const other: QueryNode[] = []
		this.fromItem(stmt.table, scope, collector, other)
		for (const item of stmt.using) this.fromItem(item, scope, collector, other)
		const where = stmt.where ? this.condition(stmt.where, scope, collector, 'WHERE') : null
		return this.modification('delete', stmt.returning, scope, collector, other, where)
	}

	private modification(
		command: 'insert' | 'update' | 'delete',
		returning: readonly SelectItem[] | null,
		scope: Scope,
		collector: Collector,
		other: QueryNode[],
		where: QueryNode | null
	): ResolvedQuery {
		const output = returning
			? this.selectList(returning, scope, collector)
			: { columns: [], targets: [] }
		return {
			columns: output.columns,
			command,
			otherExprs: other,
			relations: collector.relations,
			returnsData: returning !== null,
			subqueries: collector.subqueries,
			targetList: output.targets,
			transactionControl: false,
			utilityTag: null,
			where,
		}
	}

	private targetColumn(relation: Relation, name: string, location: number): Column {
		const column = relation.columns.find((candidate) => candidate.name === name)
		if (!column) {
			fail('42703', `column "${name}" of relation "${relation.name}" does not exist`, {
				position: location,
			})
		}
		return column
	}

	private checkAssignable(target: Column, source: TypeRef, location: number): void {
		if (isUnresolved(source) || this.types.canCoerce(source, target.type, 'assignment')) return
		fail(
			'42804',
			`column "${target.name}" is of type ${this.format(target.type)} but expression is of type ${this.format(source)}`,
			{
				hint: 'You will need to rewrite or cast the expression.',
				...(location > 0 ? { position: location } : {}),
			}
		)
	}

	private assignColumn(target: Column, node: QueryNode, location: number): QueryNode {
		this.checkAssignable(target, node.type, location)
		if (node.kind === 'const' && node.type.name === UNKNOWN.name) {
			return { ...node, type: target.type }
		}
		return node
	}

	// =========================================================================
	// EXPRESSIONS
	// =========================================================================

	private condition(expr: SqlExpr, scope: Scope, collector: Collector, clause: string): QueryNode {
		const node = this.expr(expr, scope, collector)
		this.requireBoolean(node, clause, expr.location)
		return node.kind === 'const' && node.type.name === UNKNOWN.name
			? { ...node, type: BOOLEAN }
			: node
	}

	private requireBoolean(node: QueryNode, construct: string, location: number): void {
		const name = node.type.name
		if (name === BOOLEAN.name || name === UNKNOWN.name || isUnresolved(node.type)) return
		const actual = this.format(node.type)
		fail('42804', `argument of ${construct} must be type boolean, not type ${actual}`, {
			position: location,
		})
	}

	private expr(expr: SqlExpr, scope: Scope, collector: Collector): QueryNode {
		switch (expr.kind) {
			case 'literal':
				return this.literal(expr)
			case 'param':
				return this.positional(expr.index, expr.location)
			case 'ref':
				return this.reference(expr.parts, expr.location, scope)
			case 'call':
				return this.call(expr, scope, collector, false)
			case 'binary':
				return this.operator(
					expr.op,
					this.expr(expr.left, scope, collector),
					this.expr(expr.right, scope, collector),
					expr.location
				)
			case 'unary': {
				const operand = this.expr(expr.operand, scope, collector)
				const category = this.types.category(operand.type)
				if (category !== TypeCategory.Numeric && !isUnresolved(operand.type)) {
					fail('42883', `operator does not exist: ${expr.op} ${this.format(operand.type)}`, {
						hint: UNDEFINED_OPERATOR_HINT,
						position: expr.location,
					})
				}
				return {
					args: [operand],
					kind: 'op',
					location: expr.location,
					operator: builtinOperator(expr.op, null, operand.type),
					type: operand.type,
				}
			}
			case 'logical': {
				const construct = expr.op.toUpperCase()
				const args = expr.args.map((arg) => {
					const node = this.expr(arg, scope, collector)
					this.requireBoolean(node, construct, arg.location)
					return node
				})
				return { args, kind: 'bool', location: expr.location, op: expr.op, type: BOOLEAN }
			}
			case 'test': {
				const operand = this.expr(expr.operand, scope, collector)
				const label = `IS ${expr.negated ? 'NOT ' : ''}${expr.test.toUpperCase()}`
				return { args: [operand], kind: 'other', label, location: expr.location, type: BOOLEAN }
			}
			case 'distinct': {
				const comparison = this.compare(
					'=',
					this.expr(expr.left, scope, collector),
					this.expr(expr.right, scope, collector),
					expr.location
				)
				return {
					args: comparison.kind === 'op' ? comparison.args : [comparison],
					kind: 'other',
					label: expr.negated ? 'IS NOT DISTINCT FROM' : 'IS DISTINCT FROM',
					location: expr.location,
					type: BOOLEAN,
				}
			}
			case 'in': {
				const operand = this.expr(expr.operand, scope, collector)
				const args: QueryNode[] = []
				if (expr.query) {
					const sublink = this.sublink('scalar', expr.query, scope, expr.location)
					args.push(this.compare('=', operand, sublink, expr.location))
				}
				for (const item of expr.list ?? []) {
					args.push(this.compare('=', operand, this.expr(item, scope, collector), item.location))
				}
				const label = expr.negated ? 'NOT IN' : 'IN'
				return { args, kind: 'other', label, location: expr.location, type: BOOLEAN }
			}
			case 'between': {
				const operand = this.expr(expr.operand, scope, collector)
				const lowBound = this.expr(expr.low, scope, collector)
				const highBound = this.expr(expr.high, scope, collector)
				const low = this.compare('>=', operand, lowBound, expr.location)
				const high = this.compare('<=', operand, highBound, expr.location)
				const label = expr.negated ? 'NOT BETWEEN' : 'BETWEEN'
				return { args: [low, high], kind: 'other', label, location: expr.location, type: BOOLEAN }
			}
			case 'like':
				return this.like(expr, scope, collector)
			case 'cast':
				return this.cast(expr.operand, expr.typeName, expr.location, scope, collector)
			case 'subscript': {
				const operand = this.expr(expr.operand, scope, collector)
				const index = this.expr(expr.index, scope, collector)
				const element = elementOf(operand.type)
				if (!element && !isUnresolved(operand.type)) {
					fail(
						'42804',
						`cannot subscript type ${this.format(operand.type)} because it does not support subscripting`,
						{ position: expr.location }
					)
				}
				return {
					args: [operand, index],
					kind: 'other',
					label: 'SUBSCRIPT',
					location: expr.location,
					type: element ?? UNRESOLVED,
				}
			}
			case 'field':
				return this.field(this.expr(expr.operand, scope, collector), expr.field, expr.location)
			case 'sublink':
				return this.sublink(expr.mode, expr.query, scope, expr.location)
			case 'array': {
				const elements = expr.elements.map((element) => this.expr(element, scope, collector))
				if (elements.length === 0) {
					fail('42P18', 'cannot determine type of empty array', {
						hint: 'Explicitly cast to the desired type, for example ARRAY[]::integer[].',
						position: expr.location,
					})
				}
				const element = this.commonType(elements, 'ARRAY')
				return {
					args: elements.map((node) => this.coerce(node, element)),
					kind: 'other',
					label: 'ARRAY',
					location: expr.location,
					type: arrayOf(element),
				}
			}
			case 'row': {
				const args = expr.elements.map((element) => this.expr(element, scope, collector))
				return { args, kind: 'other', label: 'ROW', location: expr.location, type: RECORD }
			}
			case 'case':
				return this.caseExpr(expr, scope, collector)
		}
	}

	private literal(expr: LiteralExpr): ConstNode {
		const base = { kind: 'const', location: expr.location, value: expr.value } as const
		switch (expr.literal) {
			case 'string':
			case 'null':
				return { ...base, type: UNKNOWN }
			case 'boolean':
				return { ...base, type: BOOLEAN }
			case 'numeric':
				return { ...base, type: typeRef('numeric') }
			case 'integer': {
				const value = Number(expr.value)
				const type = Math.abs(value) > 2147483647 ? typeRef('bigint') : INTEGER
				return { ...base, type }
			}
		}
	}

	private positional(index: number, location: number): QueryNode {
		const type = this.request.positional?.[index - 1]
		if (!type) fail('42P02', `there is no parameter $${index}`, { position: location })
		return { index, kind: 'positional', location, type }
	}

	// =========================================================================
	// NAMES
	// =========================================================================

	private findColumn(scope: Scope, name: string, location: number) {
		for (let level: Scope | null = scope; level; level = level.parent) {
			const matches = level.entries.flatMap((entry) =>
				entry.columns.filter((column) => column.name === name).map((column) => ({ column, entry }))
			)
			if (matches.length > 1) {
				fail('42702', `column reference "${name}" is ambiguous`, { position: location })
			}
			const match = matches[0]
			if (match) return match
		}
		return null
	}

	private findEntry(scope: Scope, alias: string): RangeEntry | null {
		for (let level: Scope | null = scope; level; level = level.parent) {
			const entry = level.entries.find((candidate) => candidate.alias === alias)
			if (entry) return entry
		}
		return null
	}

	private findVariable(qualifier: string | null, name: string): VariableBinding | null {
		return (
			this.request.variables.find(
				(variable) =>
					variable.name.toLowerCase() === name &&
					(qualifier === null || variable.qualifier === qualifier)
			) ?? null
		)
	}

	private columnNode(entry: RangeEntry, column: Column, location: number): QueryNode {
		return {
			kind: 'column',
			location,
			name: column.name,
			relation: entry.relation?.identity ?? null,
			type: column.type,
		}
	}

	private reference(parts: readonly string[], location: number, scope: Scope): QueryNode {
		const [first, second, third] = parts
		if (first === undefined) fail('42601', 'syntax error at end of input')
		if (parts.length > 3) {
			fail('42601', `improper qualified name (too many dotted names): ${parts.join('.')}`, {
				position: location,
			})
		}
		if (second === undefined) {
			const column = this.findColumn(scope, first, location)
			const variable = this.findVariable(null, first)
			if (column && variable) {
				fail('42702', `column reference "${first}" is ambiguous`, {
					detail: 'It could refer to either a routine variable or a table column.',
					position: location,
				})
			}
			if (column) return this.columnNode(column.entry, column.column, location)
			if (variable) return this.variable(variable, null, location)
			const entry = this.findEntry(scope, first)
			if (entry) {
				const type = entry.relation ? typeRef(entry.relation.name) : RECORD
				return { args: [], kind: 'other', label: 'WHOLE ROW', location, type }
			}
			fail('42703', `column "${first}" does not exist`, { position: location })
		}
		if (third === undefined) {
			const entry = this.findEntry(scope, first)
			if (entry) {
				const column = entry.columns.find((candidate) => candidate.name === second)
				if (!column) {
					fail('42703', `column ${first}.${second} does not exist`, { position: location })
				}
				return this.columnNode(entry, column, location)
			}
			const qualified = this.findVariable(first, second)
			if (qualified) return this.variable(qualified, null, location)
			const variable = this.findVariable(null, first)
			if (variable && variable.kind !== 'scalar') return this.variable(variable, second, location)
			fail('42P01', `missing FROM-clause entry for table "${first}"`, { position: location })
		}
		const qualified = this.findVariable(first, second)
		if (qualified && qualified.kind !== 'scalar') return this.variable(qualified, third, location)
		fail('42P01', `missing FROM-clause entry for table "${second}"`, { position: location })
	}

	private variable(binding: VariableBinding, field: string | null, location: number): QueryNode {
		const node = (type: TypeRef): QueryNode => ({
			field,
			kind: 'var',
			location,
			slot: binding.slot,
			type,
		})
		if (binding.kind === 'scalar') return node(binding.type)
		if (binding.kind === 'record' && binding.degraded) {
			return node(field === null ? RECORD : UNRESOLVED)
		}
		if (binding.fields === null) {
			fail('55000', `record "${binding.name}" is not assigned yet`, {
				detail: 'The tuple structure of a not-yet-assigned record is indeterminate.',
				position: location,
			})
		}
		if (field === null) return node(binding.type)
		const column = binding.fields.find((candidate) => candidate.name === field)
		if (!column) {
			fail('42703', `record "${binding.name}" has no field "${field}"`, { position: location })
		}
		return node(column.type)
	}

	private field(operand: QueryNode, field: string, location: number): QueryNode {
		if (operand.kind === 'var' && operand.field === null) {
			const binding = this.request.variables.find((variable) => variable.slot === operand.slot)
			if (binding && binding.kind !== 'scalar') return this.variable(binding, field, location)
		}
		if (isUnresolved(operand.type)) {
			return { args: [operand], kind: 'other', label: 'FIELD', location, type: UNRESOLVED }
		}
		const shape = this.types.compositeShape(operand.type)
		const column = shape?.find((candidate) => candidate.name === field)
		if (!column) {
			fail('42703', `column "${field}" not found in data type ${this.format(operand.type)}`, {
				position: location,
			})
		}
		return { args: [operand], kind: 'other', label: 'FIELD', location, type: column.type }
	}

	private sublink(
		mode: 'scalar' | 'exists' | 'array',
		stmt: SelectStmt,
		scope: Scope,
		location: number
	): QueryNode {
		const query = this.select(stmt, scope)
		if (mode === 'exists') return { kind: 'sublink', location, query, type: BOOLEAN }
		const [column, ...rest] = query.columns
		if (!column || rest.length > 0) {
			fail('42601', 'subquery must return only one column', { position: location })
		}
		const type = mode === 'array' ? arrayOf(column.type) : column.type
		return { kind: 'sublink', location, query, type }
	}

	// =========================================================================
	// TYPES AND COERCION
	// =========================================================================

	private implicitCast(node: QueryNode, target: TypeRef): QueryNode {
		return {
			args: [node],
			form: 'implicit-cast',
			kind: 'func',
			location: node.location,
			routine: castRoutine(node.type, target),
			type: target,
		}
	}

	/** Give an untyped literal its type, or wrap a typed value in an implicit cast. */
	private coerce(node: QueryNode, target: TypeRef): QueryNode {
		if (node.type.name === target.name || isUnresolved(node.type) || isUnresolved(target)) {
			return node
		}
		if (node.type.name === UNKNOWN.name) {
			return node.kind === 'const' ? { ...node, type: target } : node
		}
		const stringToString =
			this.types.category(node.type) === TypeCategory.String &&
			this.types.category(target) === TypeCategory.String
		if (stringToString) return node
		return this.implicitCast(node, target)
	}

	private commonType(nodes: readonly QueryNode[], construct: string): TypeRef {
		let result: TypeRef | null = null
		for (const node of nodes) {
			const type = node.type
			if (type.name === UNKNOWN.name || isUnresolved(type)) continue
			if (result === null || result.name === type.name) {
				result = type
				continue
			}
			if (this.types.canCoerce(type, result, 'implicit')) continue
			if (this.types.canCoerce(result, type, 'implicit')) {
				result = type
				continue
			}
			const pair = `${this.format(result)} and ${this.format(type)}`
			fail('42804', `${construct} types ${pair} cannot be matched`, {
				position: node.location,
			})
		}
		return result ?? TEXT
	}

	private cast(
		operandExpr: SqlExpr,
		typeName: string,
		location: number,
		scope: Scope,
		collector: Collector
	): QueryNode {
		const target = this.types.resolve(typeName)
		if (!target) fail('42704', `type "${typeName.trim()}" does not exist`, { position: location })
		if (operandExpr.kind === 'array' && operandExpr.elements.length === 0) {
			return {
				args: [],
				kind: 'other',
				label: 'ARRAY',
				location: operandExpr.location,
				type: target,
			}
		}
		const operand = this.expr(operandExpr, scope, collector)
		if (operand.kind === 'const' && operand.type.name === UNKNOWN.name) {
			return { ...operand, type: target }
		}
		if (!isUnresolved(operand.type) && !this.types.canCoerce(operand.type, target, 'explicit')) {
			fail('42846', `cannot cast type ${this.format(operand.type)} to ${this.format(target)}`, {
				position: location,
			})
		}
		return {
			args: [operand],
			form: 'explicit-cast',
			kind: 'func',
			location,
			routine: castRoutine(operand.type, target),
			type: target,
		}
	}

	private caseExpr(expr: CaseExpr, scope: Scope, collector: Collector): QueryNode {
		const args: QueryNode[] = []
		const subject = expr.subject ? this.expr(expr.subject, scope, collector) : null
		const results: QueryNode[] = []
		for (const when of expr.whens) {
			const condition = this.expr(when.when, scope, collector)
			if (subject) args.push(this.compare('=', subject, condition, when.when.location))
			else {
				this.requireBoolean(condition, 'CASE/WHEN', when.when.location)
				args.push(condition)
			}
			results.push(this.expr(when.then, scope, collector))
		}
		if (expr.otherwise) results.push(this.expr(expr.otherwise, scope, collector))
		const type = this.commonType(results, 'CASE')
		args.push(...results.map((node) => this.coerce(node, type)))
		return { args, kind: 'other', label: 'CASE', location: expr.location, type }
	}

	private like(expr: LikeExpr, scope: Scope, collector: Collector): QueryNode {
		const operand = this.expr(expr.operand, scope, collector)
		const pattern = this.expr(expr.pattern, scope, collector)
		const name = `${expr.negated ? '!' : ''}~~${expr.caseInsensitive ? '*' : ''}`
		const textual = (type: TypeRef): boolean =>
			type.name === UNKNOWN.name ||
			isUnresolved(type) ||
			this.types.category(type) === TypeCategory.String
		if (!textual(operand.type) || !textual(pattern.type)) {
			fail(
				'42883',
				`operator does not exist: ${this.format(operand.type)} ${name} ${this.format(pattern.type)}`,
				{ hint: UNDEFINED_OPERATOR_HINT, position: expr.location }
			)
		}
		return {
			args: [this.coerce(operand, TEXT), this.coerce(pattern, TEXT)],
			kind: 'op',
			location: expr.location,
			operator: builtinOperator(name, TEXT, TEXT),
			type: BOOLEAN,
		}
	}

	private undefinedOperator(
		op: string,
		left: QueryNode,
		right: QueryNode,
		location: number
	): never {
		return fail(
			'42883',
			`operator does not exist: ${this.format(left.type)} ${op} ${this.format(right.type)}`,
			{ hint: UNDEFINED_OPERATOR_HINT, position: location }
		)
	}

	private opNode(
		operator: OperatorInfo,
		left: QueryNode,
		right: QueryNode,
		type: TypeRef,
		location: number
	): QueryNode {
		return { args: [left, right], kind: 'op', location, operator, type }
	}

	/**
	 * Comparison with the host's promotion rules: untyped literals take the
	 * other side's type; within a numeric or date/time chain the lower side is
	 * cast up; otherwise whichever side converts implicitly is cast.
	 */
	private compare(op: string, left: QueryNode, right: QueryNode, location: number): QueryNode {
		const lt = left.type
		const rt = right.type
		const done = (l: QueryNode, r: QueryNode): QueryNode =>
			this.opNode(builtinOperator(op, l.type, r.type), l, r, BOOLEAN, location)
		if (isUnresolved(lt) || isUnresolved(rt) || lt.name === rt.name) return done(left, right)
		if (lt.name === UNKNOWN.name) return done(this.coerce(left, rt), right)
		if (rt.name === UNKNOWN.name) return done(left, this.coerce(right, lt))
		const lc = this.types.category(lt)
		const rc = this.types.category(rt)
		if (lc === TypeCategory.String && rc === TypeCategory.String) return done(left, right)
		const chained = lc === rc && (lc === TypeCategory.Numeric || lc === TypeCategory.DateTime)
		const lr = this.types.rank(lt)
		const rr = this.types.rank(rt)
		if (chained && lr > 0 && rr > 0) {
			if (lr < rr) return done(this.implicitCast(left, rt), right)
			if (rr < lr) return done(left, this.implicitCast(right, lt))
			return done(left, right)
		}
		if (this.types.canCoerce(lt, rt, 'implicit')) return done(this.implicitCast(left, rt), right)
		if (this.types.canCoerce(rt, lt, 'implicit')) return done(left, this.implicitCast(right, lt))
		return this.undefinedOperator(op, left, right, location)
	}

	private operator(op: string, left: QueryNode, right: QueryNode, location: number): QueryNode {
		for (const entry of this.catalog.operatorsNamed(op)) {
			const { left: wantLeft, right: wantRight } = entry.info
			if (!wantLeft || !wantRight) continue
			const fits = (node: QueryNode, want: TypeRef): boolean =>
				isUnresolved(node.type) || this.types.canCoerce(node.type, want, 'implicit')
			if (fits(left, wantLeft) && fits(right, wantRight)) {
				return this.opNode(
					entry.info,
					this.coerce(left, wantLeft),
					this.coerce(right, wantRight),
					entry.result,
					location
				)
			}
		}
		if (COMPARISON_OPERATORS.has(op)) return this.compare(op, left, right, location)
		if (ARITHMETIC_OPERATORS.has(op)) return this.arithmetic(op, left, right, location)
		if (op === '||') return this.concatenate(left, right, location)
		return this.undefinedOperator(op, left, right, location)
	}

	private arithmetic(op: string, left: QueryNode, right: QueryNode, location: number): QueryNode {
		const lt = left.type.name === UNKNOWN.name ? right.type : left.type
		const rt = right.type.name === UNKNOWN.name ? left.type : right.type
		const finish = (l: QueryNode, r: QueryNode, type: TypeRef): QueryNode =>
			this.opNode(builtinOperator(op, l.type, r.type), l, r, type, location)
		if (isUnresolved(lt) || isUnresolved(rt)) return finish(left, right, UNRESOLVED)
		const lc = this.types.category(lt)
		const rc = this.types.category(rt)
		if (lc === TypeCategory.Numeric && rc === TypeCategory.Numeric) {
			const type = this.types.rank(lt) >= this.types.rank(rt) ? lt : rt
			return finish(this.coerce(left, type), this.coerce(right, type), type)
		}
		if (lc === TypeCategory.DateTime || lc === TypeCategory.Timespan) {
			if (op === '-' && lc === rc && lc === TypeCategory.DateTime) {
				const type = lt.name === 'date' && rt.name === 'date' ? INTEGER : typeRef('interval')
				return finish(this.coerce(left, lt), this.coerce(right, rt), type)
			}
			const shifts = rc === TypeCategory.Timespan || rc === TypeCategory.Numeric
			if ((op === '+' || op === '-') && shifts) {
				return finish(this.coerce(left, lt), this.coerce(right, rt), lt)
			}
		}
		return this.undefinedOperator(op, left, right, location)
	}

	private concatenate(left: QueryNode, right: QueryNode, location: number): QueryNode {
		const leftArray = elementOf(left.type)
		const rightArray = elementOf(right.type)
		if (leftArray || rightArray) {
			const type = leftArray ? left.type : right.type
			return this.opNode(builtinOperator('||', left.type, right.type), left, right, type, location)
		}
		const textual = (node: QueryNode): boolean =>
			node.type.name === UNKNOWN.name ||
			isUnresolved(node.type) ||
			this.types.category(node.type) === TypeCategory.String
		if (!textual(left) && !textual(right)) {
			return this.undefinedOperator('||', left, right, location)
		}
		const l = left.type.name === UNKNOWN.name ? this.coerce(left, TEXT) : left
		const r = right.type.name === UNKNOWN.name ? this.coerce(right, TEXT) : right
		return this.opNode(builtinOperator('||', l.type, r.type), l, r, TEXT, location)
	}

	// =========================================================================
	// CALLS
	// =========================================================================

	private call(
		call: CallExpr,
		scope: Scope,
		collector: Collector,
		asProcedure: boolean
	): QueryNode {
		const args = call.args.map((arg) => this.expr(arg, scope, collector))
		const name = call.name.join('.')
		const display = `${name}(${args.map((arg) => this.format(arg.type)).join(', ')})`
		const chosen = this.chooseFunction(name, args, call.star)
		if (!chosen) {
			fail('42883', `function ${display} does not exist`, {
				hint: UNDEFINED_FUNCTION_HINT,
				position: call.location,
			})
		}
		const isProcedure = chosen.called.kind === 'procedure'
		if (isProcedure && !asProcedure) {
			fail('42809', `${display} is a procedure`, {
				hint: 'To call a procedure, use CALL.',
				position: call.location,
			})
		}
		if (!isProcedure && asProcedure) {
			fail('42809', `${display} is not a procedure`, {
				hint: 'To call a function, use SELECT.',
				position: call.location,
			})
		}
		const bound = this.bindPolymorphic(chosen, args)
		const resolveParam = (param: TypeRef): TypeRef => {
			if (!this.types.isPolymorphic(param)) return param
			if (param.name === 'any') return TEXT
			if (param.name.endsWith('array') && !param.name.endsWith('nonarray')) return arrayOf(bound)
			return bound
		}
		const coerced = args.map((arg, index) => {
			const param = chosen.params[index] ?? chosen.variadic
			return param ? this.coerce(arg, resolveParam(param)) : arg
		})
		return {
			args: coerced,
			form: 'call',
			kind: 'func',
			location: call.location,
			routine: chosen.called,
			type: resolveParam(chosen.returns),
		}
	}

	private accepts(entry: FunctionEntry, args: readonly QueryNode[], star: boolean): number | null {
		if (star) {
			return entry.params.length === 0 && entry.variadic === null && entry.aggregate ? 0 : null
		}
		if (args.length < entry.params.length) return null
		if (args.length > entry.params.length && entry.variadic === null) return null
		let exact = 0
		for (const [index, arg] of args.entries()) {
			const param = entry.params[index] ?? entry.variadic
			if (!param) return null
			if (param.name === arg.type.name) {
				exact++
				continue
			}
			const fits =
				arg.type.name === UNKNOWN.name ||
				isUnresolved(arg.type) ||
				this.types.canCoerce(arg.type, param, 'implicit')
			if (!fits) return null
		}
		return exact
	}

	private chooseFunction(
		name: string,
		args: readonly QueryNode[],
		star: boolean
	): FunctionEntry | null {
		let best: FunctionEntry | null = null
		let bestScore = -1
		for (const entry of this.catalog.functionsNamed(name)) {
			const score = this.accepts(entry, args, star)
			if (score !== null && score > bestScore) {
				best = entry
				bestScore = score
			}
		}
		return best
	}

	/** Element type the polymorphic parameters bind to. */
	private bindPolymorphic(entry: FunctionEntry, args: readonly QueryNode[]): TypeRef {
		for (const [index, arg] of args.entries()) {
			const param = entry.params[index] ?? entry.variadic
			if (!param || !this.types.isPolymorphic(param) || param.name === 'any') continue
			if (arg.type.name === UNKNOWN.name || isUnresolved(arg.type)) continue
			const isArrayParam = param.name.endsWith('array') && !param.name.endsWith('nonarray')
			return isArrayParam ? (elementOf(arg.type) ?? arg.type) : arg.type
		}
		return TEXT
	}
}

export function analyzeSql(catalog: MemoryCatalog, request: AnalyzeRequest): AnalyzeResult {
	return new SqlAnalyzer(catalog, request).run()
}
