/**
 * Parse tree of the SQL subset understood by the in-process host. Names
 * are already case-folded; `location` is a 1-based offset in the parsed text.
 */

export type LiteralKind = 'string' | 'integer' | 'numeric' | 'boolean' | 'null'

interface ExprBase {
	readonly location: number
}

export interface LiteralExpr extends ExprBase {
	readonly kind: 'literal'
	readonly literal: LiteralKind
	readonly value: string | null
}

export interface RefExpr extends ExprBase {
	readonly kind: 'ref'
	readonly parts: readonly string[]
}

export interface ParamExpr extends ExprBase {
	readonly kind: 'param'
	readonly index: number
}

export interface CallExpr extends ExprBase {
	readonly kind: 'call'
	readonly name: readonly string[]
	readonly args: readonly SqlExpr[]
	/** `count(*)` */
	readonly star: boolean
}

export interface BinaryExpr extends ExprBase {
	readonly kind: 'binary'
	readonly op: string
	readonly left: SqlExpr
	readonly right: SqlExpr
}

export interface UnaryExpr extends ExprBase {
	readonly kind: 'unary'
	readonly op: string
	readonly operand: SqlExpr
}

export interface LogicalExpr extends ExprBase {
	readonly kind: 'logical'
	readonly op: 'and' | 'or' | 'not'
	readonly args: readonly SqlExpr[]
}

export interface TestExpr extends ExprBase {
	readonly kind: 'test'
	/** IS [NOT] NULL / TRUE / FALSE */
	readonly test: 'null' | 'true' | 'false'
	readonly negated: boolean
	readonly operand: SqlExpr
}

export interface DistinctExpr extends ExprBase {
	readonly kind: 'distinct'
	readonly negated: boolean
	readonly left: SqlExpr
	readonly right: SqlExpr
}

export interface InExpr extends ExprBase {
	readonly kind: 'in'
	readonly negated: boolean
	readonly operand: SqlExpr
	readonly list: readonly SqlExpr[] | null
	readonly query: SelectStmt | null
}

export interface BetweenExpr extends ExprBase {
	readonly kind: 'between'
	readonly negated: boolean
	readonly operand: SqlExpr
	readonly low: SqlExpr
	readonly high: SqlExpr
}

export interface LikeExpr extends ExprBase {
	readonly kind: 'like'
	readonly negated: boolean
	readonly caseInsensitive: boolean
	readonly operand: SqlExpr
	readonly pattern: SqlExpr
}

export interface CastExpr extends ExprBase {
	readonly kind: 'cast'
	readonly operand: SqlExpr
	readonly typeName: string
}

export interface SubscriptExpr extends ExprBase {
	readonly kind: 'subscript'
	readonly operand: SqlExpr
	readonly index: SqlExpr
}

export interface FieldExpr extends ExprBase {
	readonly kind: 'field'
	readonly operand: SqlExpr
	readonly field: string
}

export interface SublinkExpr extends ExprBase {
	readonly kind: 'sublink'
	readonly mode: 'scalar' | 'exists' | 'array'
	readonly query: SelectStmt
}

export interface ArrayExpr extends ExprBase {
	readonly kind: 'array'
	readonly elements: readonly SqlExpr[]
}

export interface RowExpr extends ExprBase {
	readonly kind: 'row'
	readonly elements: readonly SqlExpr[]
}

export interface CaseExpr extends ExprBase {
	readonly kind: 'case'
	readonly subject: SqlExpr | null
	readonly whens: readonly { readonly when: SqlExpr; readonly then: SqlExpr }[]
	readonly otherwise: SqlExpr | null
}

export type SqlExpr =
	| LiteralExpr
	| RefExpr
	| ParamExpr
	| CallExpr
	| BinaryExpr
	| UnaryExpr
	| LogicalExpr
	| TestExpr
	| DistinctExpr
	| InExpr
	| BetweenExpr
	| LikeExpr
	| CastExpr
	| SubscriptExpr
	| FieldExpr
	| SublinkExpr
	| ArrayExpr
	| RowExpr
	| CaseExpr

// =============================================================================
// STATEMENTS
// =============================================================================

export type SelectItem =
	| { readonly kind: 'star' }
	| { readonly kind: 'qualifiedStar'; readonly qualifier: string; readonly location: number }
	| { readonly kind: 'expr'; readonly expr: SqlExpr; readonly alias: string | null }

export type FromItem =
	| {
			readonly kind: 'table'
			readonly name: readonly string[]
			readonly alias: string | null
			readonly location: number
	  }
	| { readonly kind: 'subquery'; readonly query: SelectStmt; readonly alias: string }
	| { readonly kind: 'function'; readonly call: CallExpr; readonly alias: string | null }
	| {
			readonly kind: 'join'
			readonly left: FromItem
			readonly right: FromItem
			readonly on: SqlExpr | null
	  }

export interface SelectCore {
	readonly items: readonly SelectItem[]
	readonly from: readonly FromItem[]
	readonly where: SqlExpr | null
	readonly groupBy: readonly SqlExpr[]
	readonly having: SqlExpr | null
}

export interface SelectStmt {
	readonly kind: 'select'
	readonly cores: readonly SelectCore[]
	readonly orderBy: readonly SqlExpr[]
	readonly limit: SqlExpr | null
	readonly offset: SqlExpr | null
}

export type InsertSource =
	| { readonly kind: 'values'; readonly rows: readonly (readonly SqlExpr[])[] }
	| { readonly kind: 'select'; readonly query: SelectStmt }
	| { readonly kind: 'defaults' }

export interface InsertStmt {
	readonly kind: 'insert'
	readonly table: readonly string[]
	readonly location: number
	readonly columns: readonly string[] | null
	readonly source: InsertSource
	readonly returning: readonly SelectItem[] | null
}

export interface SetClause {
	readonly column: string
	readonly location: number
	readonly expr: SqlExpr
}

export interface UpdateStmt {
	readonly kind: 'update'
	readonly table: FromItem
	readonly sets: readonly SetClause[]
	readonly from: readonly FromItem[]
	readonly where: SqlExpr | null
	readonly returning: readonly SelectItem[] | null
}

export interface DeleteStmt {
	readonly kind: 'delete'
	readonly table: FromItem
	readonly using: readonly FromItem[]
	readonly where: SqlExpr | null
	readonly returning: readonly SelectItem[] | null
}

export interface CallStmt {
	readonly kind: 'call'
	readonly call: CallExpr
}

export interface UtilityStmt {
	readonly kind: 'utility'
	/** Upper-case command tag */
	readonly tag: string
	readonly transactionControl: boolean
}

export type SqlStatement =
	| SelectStmt
	| InsertStmt
	| UpdateStmt
	| DeleteStmt
	| CallStmt
	| UtilityStmt
