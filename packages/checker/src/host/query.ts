/**
 * Resolved query trees returned by the host's SQL analysis service.
 *
 * Only the parts the checker inspects are modelled: result shape, variable
 * references, calls, operators, relations and the WHERE predicate.
 */

import type { RoutineKind } from './ast.ts'
import type { Relation, TupleShape, TypeRef, Volatility } from './types.ts'

export interface CalledRoutine {
	readonly identity: number
	readonly schema: string
	readonly name: string
	readonly kind: RoutineKind
	readonly volatility: Volatility
	/** Declared parameter types */
	readonly args: readonly TypeRef[]
	/** Part of the host's built-in catalog */
	readonly builtin: boolean
}

export interface OperatorInfo {
	readonly identity: number
	readonly schema: string
	readonly name: string
	readonly left: TypeRef | null
	readonly right: TypeRef | null
	readonly volatility: Volatility
	readonly builtin: boolean
}

export type RelationRef = Omit<Relation, 'columns'>

/** How a function node came to be: written by the user or inserted by coercion. */
export type CallForm = 'call' | 'implicit-cast' | 'explicit-cast'

interface NodeBase {
	readonly type: TypeRef
	/** 1-based character offset in the analyzed text, 0 when unknown */
	readonly location: number
}

export interface ConstNode extends NodeBase {
	readonly kind: 'const'
	/** Literal text, null for NULL */
	readonly value: string | null
}

/** Reference to a routine variable, optionally to one of its fields. */
export interface VarNode extends NodeBase {
	readonly kind: 'var'
	readonly slot: number
	readonly field: string | null
}

/** `$n` reference in dynamic SQL. */
export interface PositionalNode extends NodeBase {
	readonly kind: 'positional'
	readonly index: number
}

export interface ColumnNode extends NodeBase {
	readonly kind: 'column'
	readonly relation: number | null
	readonly name: string
}

export interface FuncNode extends NodeBase {
	readonly kind: 'func'
	readonly routine: CalledRoutine
	readonly form: CallForm
	readonly args: readonly QueryNode[]
}

export interface OpNode extends NodeBase {
	readonly kind: 'op'
	readonly operator: OperatorInfo
	readonly args: readonly QueryNode[]
}

export interface BoolNode extends NodeBase {
	readonly kind: 'bool'
	readonly op: 'and' | 'or' | 'not'
	readonly args: readonly QueryNode[]
}

export interface SublinkNode extends NodeBase {
	readonly kind: 'sublink'
	readonly query: ResolvedQuery
}

/** Any other construct (CASE, ROW, ARRAY, IS NULL ...) */
export interface OtherNode extends NodeBase {
	readonly kind: 'other'
	readonly label: string
	readonly args: readonly QueryNode[]
}

export type QueryNode =
	| ConstNode
	| VarNode
	| PositionalNode
	| ColumnNode
	| FuncNode
	| OpNode
	| BoolNode
	| SublinkNode
	| OtherNode

export type QueryCommand = 'select' | 'insert' | 'update' | 'delete' | 'call' | 'utility'

export interface ResolvedQuery {
	readonly command: QueryCommand
	/** Command tag of a utility statement, e.g. `COMMIT` */
	readonly utilityTag: string | null
	readonly transactionControl: boolean
	/** Result columns; an expression has exactly one */
	readonly columns: TupleShape
	readonly returnsData: boolean
	readonly targetList: readonly QueryNode[]
	readonly where: QueryNode | null
	/** Every other expression of the query (join conditions, values, SET ...) */
	readonly otherExprs: readonly QueryNode[]
	readonly relations: readonly RelationRef[]
	readonly subqueries: readonly ResolvedQuery[]
}

/**
 * Direct children of a node, subqueries excluded.
 */
export function nodeChildren(node: QueryNode): readonly QueryNode[] {
	switch (node.kind) {
		case 'func':
		case 'op':
		case 'bool':
		case 'other':
			return node.args
		default:
			return []
	}
}

/**
 * Visit every node of a query tree, including nested subqueries. The visitor
 * sees queries and nodes in discovery order.
 */
export interface QueryVisitor {
	query?(query: ResolvedQuery): void
	node?(node: QueryNode): void
}

export function walkQuery(query: ResolvedQuery, visitor: QueryVisitor): void {
	visitor.query?.(query)
	const visitNode = (node: QueryNode): void => {
		visitor.node?.(node)
		if (node.kind === 'sublink') {
			walkQuery(node.query, visitor)
			return
		}
		for (const child of nodeChildren(node)) visitNode(child)
	}
	for (const node of query.targetList) visitNode(node)
	if (query.where) visitNode(query.where)
	for (const node of query.otherExprs) visitNode(node)
	for (const sub of query.subqueries) walkQuery(sub, visitor)
}
