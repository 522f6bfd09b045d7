/**
 * Parser for the SQL subset analyzed by the in-process host.
 */

import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { keywordGrammar } from '../../core/grammar.ts'
import type { HostError } from '../../host/bridge.ts'
import type {
	CallExpr,
	FromItem,
	InsertSource,
	SelectCore,
	SelectItem,
	SelectStmt,
	SetClause,
	SqlExpr,
	SqlStatement,
} from './ast.ts'

const grammarSource = String.raw`
HostSql {
  StatementText = Statement ";"?
  ExpressionText = Expr

  Statement = SelectStmt | InsertStmt | UpdateStmt | DeleteStmt | CallStmt | UtilityStmt

  // Queries
  SelectStmt = SelectCore SetTail* OrderBy? Limit? Offset?
  SetTail = SetOp SelectCore
  SetOp = kw<"union"> kw<"all">?  -- union
        | kw<"intersect">         -- intersect
        | kw<"except">            -- except

  SelectCore = kw<"select"> Quantifier? NonemptyListOf<SelectItem, ","> FromClause? WhereClause? GroupBy? Having?
  Quantifier = kw<"distinct"> | kw<"all">
  SelectItem = "*"                  -- star
             | ident "." "*"        -- qualifiedStar
             | Expr kw<"as"> anyIdent  -- as
             | Expr alias           -- aliased
             | Expr                 -- plain

  FromClause = kw<"from"> NonemptyListOf<FromItem, ",">
  FromItem = FromItem JoinType? kw<"join"> TableRef JoinCond?  -- join
           | FromItem kw<"cross"> kw<"join"> TableRef           -- cross
           | TableRef
  JoinType = kw<"inner">              -- inner
           | JoinSide kw<"outer">?    -- outer
  JoinSide = kw<"left"> | kw<"right"> | kw<"full">
  JoinCond = kw<"on"> Expr                                 -- on
           | kw<"using"> "(" NonemptyListOf<ident, ","> ")"  -- using
  TableRef = "(" SelectStmt ")" kw<"as">? alias  -- subquery
           | FuncCall AliasClause?               -- function
           | QualifiedName AliasClause?          -- table
  AliasClause = kw<"as">? alias

  WhereClause = kw<"where"> Expr
  GroupBy = kw<"group"> kw<"by"> NonemptyListOf<Expr, ",">
  Having = kw<"having"> Expr
  OrderBy = kw<"order"> kw<"by"> NonemptyListOf<OrderItem, ",">
  OrderItem = Expr Direction?
  Direction = kw<"asc"> | kw<"desc">
  Limit = kw<"limit"> Expr
  Offset = kw<"offset"> Expr

  // Data modification
  InsertStmt = kw<"insert"> kw<"into"> QualifiedName ColumnList? InsertSource Returning?
  ColumnList = "(" NonemptyListOf<ident, ","> ")"
  InsertSource = kw<"default"> kw<"values">                   -- defaults
               | kw<"values"> NonemptyListOf<ValuesRow, ",">  -- values
               | SelectStmt                                   -- select
  ValuesRow = "(" NonemptyListOf<ValuesItem, ","> ")"
  ValuesItem = kw<"default">  -- default
             | Expr           -- expr
  UpdateStmt = kw<"update"> TableRef kw<"set"> NonemptyListOf<SetItem, ","> FromClause? WhereClause? Returning?
  SetItem = ident "=" Expr
  DeleteStmt = kw<"delete"> kw<"from"> TableRef UsingClause? WhereClause? Returning?
  UsingClause = kw<"using"> NonemptyListOf<FromItem, ",">
  Returning = kw<"returning"> NonemptyListOf<SelectItem, ",">

  CallStmt = kw<"call"> FuncCall

  UtilityStmt = transactionWord utilityRest  -- transaction
              | utilityWord utilityRest      -- other
  transactionWord = kw<"begin"> | kw<"commit"> | kw<"rollback"> | kw<"savepoint">
                  | kw<"release"> | kw<"start"> | kw<"end"> | kw<"abort">
  utilityWord = kw<"create"> | kw<"drop"> | kw<"alter"> | kw<"truncate"> | kw<"lock">
              | kw<"analyze"> | kw<"vacuum"> | kw<"grant"> | kw<"revoke"> | kw<"set">
              | kw<"reset"> | kw<"notify"> | kw<"listen"> | kw<"discard"> | kw<"comment">
              | kw<"refresh"> | kw<"reindex"> | kw<"cluster">
  utilityRest = (~";" any)*

  // Expressions
  Expr = OrExpr
  OrExpr = OrExpr kw<"or"> AndExpr  -- or
         | AndExpr
  AndExpr = AndExpr kw<"and"> NotExpr  -- and
          | NotExpr
  NotExpr = kw<"not"> NotExpr  -- not
          | IsExpr
  IsExpr = IsExpr kw<"is"> kw<"not">? kw<"null">                            -- null
         | IsExpr kw<"is"> kw<"not">? BoolWord                               -- bool
         | IsExpr kw<"is"> kw<"not">? kw<"distinct"> kw<"from"> CompareExpr  -- distinct
         | CompareExpr
  BoolWord = kw<"true"> | kw<"false">
  CompareExpr = OpExpr compareOp OpExpr                                      -- binary
              | OpExpr kw<"not">? kw<"in"> "(" SelectStmt ")"                -- inQuery
              | OpExpr kw<"not">? kw<"in"> "(" NonemptyListOf<Expr, ","> ")"  -- inList
              | OpExpr kw<"not">? kw<"between"> OpExpr kw<"and"> OpExpr      -- between
              | OpExpr kw<"not">? LikeWord OpExpr                            -- like
              | OpExpr
  LikeWord = kw<"like"> | kw<"ilike">
  OpExpr = OpExpr userOp AddExpr  -- binary
         | AddExpr
  AddExpr = AddExpr addOp MulExpr  -- binary
          | MulExpr
  MulExpr = MulExpr mulOp UnaryExpr  -- binary
          | UnaryExpr
  UnaryExpr = signOp UnaryExpr  -- sign
            | PostfixExpr
  PostfixExpr = PostfixExpr "::" TypeName     -- cast
              | PostfixExpr "[" Expr "]"      -- subscript
              | PostfixExpr "." anyIdent      -- field
              | Primary
  Primary = "(" SelectStmt ")"                          -- subquery
          | kw<"exists"> "(" SelectStmt ")"             -- exists
          | kw<"array"> "(" SelectStmt ")"              -- arrayQuery
          | kw<"array"> "[" ListOf<Expr, ","> "]"       -- array
          | kw<"row"> "(" ListOf<Expr, ","> ")"         -- row
          | "(" Expr "," NonemptyListOf<Expr, ","> ")"  -- tuple
          | "(" Expr ")"                                -- paren
          | kw<"cast"> "(" Expr kw<"as"> TypeName ")"   -- cast
          | CaseExpr
          | FuncCall
          | literal
          | param
          | ColumnRef

  CaseExpr = kw<"case"> CaseSubject? CaseWhen+ CaseElse? kw<"end">
  CaseSubject = ~kw<"when"> Expr
  CaseWhen = kw<"when"> Expr kw<"then"> Expr
  CaseElse = kw<"else"> Expr

  FuncCall = QualifiedName "(" FuncArgs ")"
  FuncArgs = "*"                                -- star
           | kw<"distinct">? ListOf<Expr, ",">  -- list

  ColumnRef = NonemptyListOf<ident, ".">
  QualifiedName = NonemptyListOf<ident, ".">

  TypeName = TypeWords TypeModifier? ArrayBounds*
  TypeWords = kw<"double"> kw<"precision">   -- double
            | kw<"character"> kw<"varying">  -- varying
            | TimeWord TimeZone              -- zoned
            | QualifiedName                  -- simple
  TimeWord = kw<"timestamp"> | kw<"time">
  TimeZone = WithWord kw<"time"> kw<"zone">
  WithWord = kw<"with"> | kw<"without">
  TypeModifier = "(" NonemptyListOf<numberLit, ","> ")"
  ArrayBounds = "[" numberLit? "]"

  // Operators
  compareOp = ("<>" | "<=" | ">=" | "!=" | "=" | "<" | ">") ~opChar
  addOp = ("+" | "-") ~opChar
  mulOp = ("*" | "/" | "%") ~opChar
  signOp = "-" | "+"
  userOp = ~compareOp ~addOp ~mulOp opChar+
  opChar = "+" | "-" | "*" | "/" | "<" | ">" | "=" | "~" | "!" | "@" | "#" | "%" | "^" | "&" | "|" | "?"

  // Tokens
  literal = stringLit
          | numberLit
          | kw<"null">   -- null
          | kw<"true">   -- true
          | kw<"false">  -- false
  stringLit = escapeMark? "'" stringChar* "'"
  escapeMark = "E" | "e"
  stringChar = "''"     -- quote
             | ~"'" any  -- char
  numberLit = digit+ ("." digit+)?
  param = "$" digit+

  kw<word> = word ~identPart
  alias = ~reserved ident
  ident = quotedIdent | ~reserved plainIdent
  anyIdent = quotedIdent | plainIdent
  plainIdent = identStart identPart*
  quotedIdent = "\"" quotedChar* "\""
  quotedChar = "\"\""    -- quote
             | ~"\"" any  -- char
  identStart = letter | "_"
  identPart = alnum | "_" | "$"

  reserved = kw<"all"> | kw<"and"> | kw<"array"> | kw<"as"> | kw<"asc"> | kw<"between">
           | kw<"by"> | kw<"case"> | kw<"cast"> | kw<"cross"> | kw<"default"> | kw<"desc">
           | kw<"distinct"> | kw<"else"> | kw<"end"> | kw<"except"> | kw<"exists">
           | kw<"false"> | kw<"for"> | kw<"from"> | kw<"full"> | kw<"group"> | kw<"having">
           | kw<"ilike"> | kw<"in"> | kw<"inner"> | kw<"intersect"> | kw<"into"> | kw<"is">
           | kw<"join"> | kw<"left"> | kw<"like"> | kw<"limit"> | kw<"not"> | kw<"null">
           | kw<"offset"> | kw<"on"> | kw<"or"> | kw<"order"> | kw<"outer"> | kw<"returning">
           | kw<"right"> | kw<"row"> | kw<"select"> | kw<"set"> | kw<"then"> | kw<"true">
           | kw<"union"> | kw<"using"> | kw<"values"> | kw<"when"> | kw<"where"> | kw<"with">

  space += comment
  comment = "--" (~"\n" any)*             -- line
          | "/*" (~"*/" any)* "*/"        -- block
}
`

export const HostSqlGrammar = keywordGrammar(grammarSource)

function location(node: Node): number {
	return node.source.startIdx + 1
}

function optional<T>(node: Node, operation: string): T | null {
	const child = node.children[0]
	return child !== undefined ? child[operation]() : null
}

function list<T>(node: Node, operation: string): T[] {
	return node.asIteration().children.map((child: Node) => child[operation]())
}

function isNegated(node: Node): boolean {
	return node.children.length > 0
}

function createSemantics(): ohm.Semantics {
	const semantics = HostSqlGrammar.createSemantics()

	semantics.addOperation<string>('ident', {
		plainIdent(_start: Node, _rest: Node) {
			return this.sourceString.toLowerCase()
		},
		quotedIdent(_open: Node, chars: Node, _close: Node) {
			return chars.sourceString.replaceAll('""', '"')
		},
		AliasClause(_as: Node, alias: Node) {
			return alias['ident']()
		},
	})

	semantics.addOperation<string[]>('names', {
		ColumnRef(parts: Node) {
			return list<string>(parts, 'ident')
		},
		QualifiedName(parts: Node) {
			return list<string>(parts, 'ident')
		},
		ColumnList(_open: Node, names: Node, _close: Node) {
			return list<string>(names, 'ident')
		},
	})

	// =========================================================================
	// STATEMENTS
	// =========================================================================

	semantics.addOperation<SqlStatement>('statement', {
		StatementText(statement: Node, _semicolon: Node) {
			return statement['statement']()
		},
		SelectStmt(_core: Node, _tails: Node, _order: Node, _limit: Node, _offset: Node) {
			return this['select']()
		},
		InsertStmt(
			_insert: Node,
			_into: Node,
			name: Node,
			columns: Node,
			source: Node,
			returning: Node
		) {
			return {
				columns: optional<string[]>(columns, 'names'),
				kind: 'insert',
				location: location(name),
				returning: optional<SelectItem[]>(returning, 'items'),
				source: source['insertSource'](),
				table: name['names'](),
			}
		},
		UpdateStmt(
			_update: Node,
			table: Node,
			_set: Node,
			sets: Node,
			from: Node,
			where: Node,
			returning: Node
		) {
			return {
				from: optional<FromItem[]>(from, 'fromList') ?? [],
				kind: 'update',
				returning: optional<SelectItem[]>(returning, 'items'),
				sets: list<SetClause>(sets, 'setClause'),
				table: table['fromItem'](),
				where: optional<SqlExpr>(where, 'expr'),
			}
		},
		DeleteStmt(_delete: Node, _from: Node, table: Node, using: Node, where: Node, returning: Node) {
			return {
				kind: 'delete',
				returning: optional<SelectItem[]>(returning, 'items'),
				table: table['fromItem'](),
				using: optional<FromItem[]>(using, 'fromList') ?? [],
				where: optional<SqlExpr>(where, 'expr'),
			}
		},
		CallStmt(_call: Node, call: Node) {
			return { call: call['call'](), kind: 'call' }
		},
		UtilityStmt_transaction(word: Node, _rest: Node) {
			return { kind: 'utility', tag: word.sourceString.toUpperCase(), transactionControl: true }
		},
		UtilityStmt_other(word: Node, _rest: Node) {
			return { kind: 'utility', tag: word.sourceString.toUpperCase(), transactionControl: false }
		},
	})

	semantics.addOperation<InsertSource>('insertSource', {
		InsertSource_defaults(_default: Node, _values: Node) {
			return { kind: 'defaults' }
		},
		InsertSource_values(_values: Node, rows: Node) {
			return { kind: 'values', rows: list<SqlExpr[]>(rows, 'row') }
		},
		InsertSource_select(query: Node) {
			return { kind: 'select', query: query['select']() }
		},
	})

	semantics.addOperation<SqlExpr[]>('row', {
		ValuesRow(_open: Node, items: Node, _close: Node) {
			return list<SqlExpr>(items, 'expr')
		},
	})

	semantics.addOperation<SetClause>('setClause', {
		SetItem(column: Node, _equals: Node, expr: Node) {
			return { column: column['ident'](), expr: expr['expr'](), location: location(column) }
		},
	})

	// =========================================================================
	// QUERIES
	// =========================================================================

	semantics.addOperation<SelectStmt>('select', {
		SelectStmt(core: Node, tails: Node, order: Node, limit: Node, offset: Node) {
			return {
				cores: [core['core'](), ...tails.children.map((tail: Node) => tail['core']())],
				kind: 'select',
				limit: optional<SqlExpr>(limit, 'expr'),
				offset: optional<SqlExpr>(offset, 'expr'),
				orderBy: optional<SqlExpr[]>(order, 'exprList') ?? [],
			}
		},
	})

	semantics.addOperation<SelectCore>('core', {
		SetTail(_op: Node, core: Node) {
			return core['core']()
		},
		SelectCore(
			_select: Node,
			_quantifier: Node,
			items: Node,
			from: Node,
			where: Node,
			groupBy: Node,
			having: Node
		) {
			return {
				from: optional<FromItem[]>(from, 'fromList') ?? [],
				groupBy: optional<SqlExpr[]>(groupBy, 'exprList') ?? [],
				having: optional<SqlExpr>(having, 'expr'),
				items: list<SelectItem>(items, 'item'),
				where: optional<SqlExpr>(where, 'expr'),
			}
		},
	})

	semantics.addOperation<SelectItem[]>('items', {
		Returning(_returning: Node, items: Node) {
			return list<SelectItem>(items, 'item')
		},
	})

	semantics.addOperation<SelectItem>('item', {
		SelectItem_star(_star: Node) {
			return { kind: 'star' }
		},
		SelectItem_qualifiedStar(qualifier: Node, _dot: Node, _star: Node) {
			return {
				kind: 'qualifiedStar',
				location: location(qualifier),
				qualifier: qualifier['ident'](),
			}
		},
		SelectItem_as(expr: Node, _as: Node, alias: Node) {
			return { alias: alias['ident'](), expr: expr['expr'](), kind: 'expr' }
		},
		SelectItem_aliased(expr: Node, alias: Node) {
			return { alias: alias['ident'](), expr: expr['expr'](), kind: 'expr' }
		},
		SelectItem_plain(expr: Node) {
			return { alias: null, expr: expr['expr'](), kind: 'expr' }
		},
	})

	semantics.addOperation<FromItem[]>('fromList', {
		FromClause(_from: Node, items: Node) {
			return list<FromItem>(items, 'fromItem')
		},
		UsingClause(_using: Node, items: Node) {
			return list<FromItem>(items, 'fromItem')
		},
	})

	semantics.addOperation<FromItem>('fromItem', {
		FromItem_join(left: Node, _type: Node, _join: Node, right: Node, condition: Node) {
			return {
				kind: 'join',
				left: left['fromItem'](),
				on: optional<SqlExpr | null>(condition, 'joinCondition'),
				right: right['fromItem'](),
			}
		},
		FromItem_cross(left: Node, _cross: Node, _join: Node, right: Node) {
			return { kind: 'join', left: left['fromItem'](), on: null, right: right['fromItem']() }
		},
		TableRef_subquery(_open: Node, query: Node, _close: Node, _as: Node, alias: Node) {
			return { alias: alias['ident'](), kind: 'subquery', query: query['select']() }
		},
		TableRef_function(call: Node, alias: Node) {
			return { alias: optional<string>(alias, 'ident'), call: call['call'](), kind: 'function' }
		},
		TableRef_table(name: Node, alias: Node) {
			return {
				alias: optional<string>(alias, 'ident'),
				kind: 'table',
				location: location(name),
				name: name['names'](),
			}
		},
	})

	semantics.addOperation<SqlExpr | null>('joinCondition', {
		JoinCond_on(_on: Node, expr: Node) {
			return expr['expr']()
		},
		JoinCond_using(_using: Node, _open: Node, _names: Node, _close: Node) {
			return null
		},
	})

	semantics.addOperation<SqlExpr[]>('exprList', {
		GroupBy(_group: Node, _by: Node, exprs: Node) {
			return list<SqlExpr>(exprs, 'expr')
		},
		OrderBy(_order: Node, _by: Node, items: Node) {
			return list<SqlExpr>(items, 'expr')
		},
	})

	// =========================================================================
	// EXPRESSIONS
	// =========================================================================

	semantics.addOperation<CallExpr>('call', {
		FuncCall(name: Node, _open: Node, args: Node, _close: Node) {
			const star = args.sourceString.trim() === '*'
			return {
				args: star ? [] : args['args'](),
				kind: 'call',
				location: location(this),
				name: name['names'](),
				star,
			}
		},
	})

	semantics.addOperation<SqlExpr[]>('args', {
		FuncArgs_list(_distinct: Node, exprs: Node) {
			return list<SqlExpr>(exprs, 'expr')
		},
	})

	semantics.addOperation<{ when: SqlExpr; then: SqlExpr }>('when', {
		CaseWhen(_when: Node, when: Node, _then: Node, then: Node) {
			return { then: then['expr'](), when: when['expr']() }
		},
	})

	semantics.addOperation<SqlExpr>('expr', {
		WhereClause(_where: Node, expr: Node) {
			return expr['expr']()
		},
		Having(_having: Node, expr: Node) {
			return expr['expr']()
		},
		Limit(_limit: Node, expr: Node) {
			return expr['expr']()
		},
		Offset(_offset: Node, expr: Node) {
			return expr['expr']()
		},
		OrderItem(expr: Node, _direction: Node) {
			return expr['expr']()
		},
		ValuesItem_default(keyword: Node) {
			return { kind: 'literal', literal: 'null', location: location(keyword), value: null }
		},
		OrExpr_or(left: Node, _or: Node, right: Node) {
			return {
				args: [left['expr'](), right['expr']()],
				kind: 'logical',
				location: location(this),
				op: 'or',
			}
		},
		AndExpr_and(left: Node, _and: Node, right: Node) {
			return {
				args: [left['expr'](), right['expr']()],
				kind: 'logical',
				location: location(this),
				op: 'and',
			}
		},
		NotExpr_not(_not: Node, operand: Node) {
			return { args: [operand['expr']()], kind: 'logical', location: location(this), op: 'not' }
		},
		IsExpr_null(operand: Node, _is: Node, not: Node, _null: Node) {
			return {
				kind: 'test',
				location: location(this),
				negated: isNegated(not),
				operand: operand['expr'](),
				test: 'null',
			}
		},
		IsExpr_bool(operand: Node, _is: Node, not: Node, word: Node) {
			return {
				kind: 'test',
				location: location(this),
				negated: isNegated(not),
				operand: operand['expr'](),
				test: word.sourceString.toLowerCase() === 'true' ? 'true' : 'false',
			}
		},
		IsExpr_distinct(left: Node, _is: Node, not: Node, _distinct: Node, _from: Node, right: Node) {
			return {
				kind: 'distinct',
				left: left['expr'](),
				location: location(this),
				negated: isNegated(not),
				right: right['expr'](),
			}
		},
		CompareExpr_binary(left: Node, op: Node, right: Node) {
			const operator = op.sourceString === '!=' ? '<>' : op.sourceString
			return {
				kind: 'binary',
				left: left['expr'](),
				location: location(op),
				op: operator,
				right: right['expr'](),
			}
		},
		CompareExpr_inQuery(
			operand: Node,
			not: Node,
			_in: Node,
			_open: Node,
			query: Node,
			_close: Node
		) {
			return {
				kind: 'in',
				list: null,
				location: location(this),
				negated: isNegated(not),
				operand: operand['expr'](),
				query: query['select'](),
			}
		},
		CompareExpr_inList(
			operand: Node,
			not: Node,
			_in: Node,
			_open: Node,
			items: Node,
			_close: Node
		) {
			return {
				kind: 'in',
				list: list<SqlExpr>(items, 'expr'),
				location: location(this),
				negated: isNegated(not),
				operand: operand['expr'](),
				query: null,
			}
		},
		CompareExpr_between(
			operand: Node,
			not: Node,
			_between: Node,
			low: Node,
			_and: Node,
			high: Node
		) {
			return {
				high: high['expr'](),
				kind: 'between',
				location: location(this),
				low: low['expr'](),
				negated: isNegated(not),
				operand: operand['expr'](),
			}
		},
		CompareExpr_like(operand: Node, not: Node, word: Node, pattern: Node) {
			return {
				caseInsensitive: word.sourceString.toLowerCase() === 'ilike',
				kind: 'like',
				location: location(this),
				negated: isNegated(not),
				operand: operand['expr'](),
				pattern: pattern['expr'](),
			}
		},
		OpExpr_binary(left: Node, op: Node, right: Node) {
			return binary(left, op, right)
		},
		AddExpr_binary(left: Node, op: Node, right: Node) {
			return binary(left, op, right)
		},
		MulExpr_binary(left: Node, op: Node, right: Node) {
			return binary(left, op, right)
		},
		UnaryExpr_sign(op: Node, operand: Node) {
			const inner: SqlExpr = operand['expr']()
			if (
				inner.kind === 'literal' &&
				(inner.literal === 'integer' || inner.literal === 'numeric')
			) {
				const value = op.sourceString === '-' ? `-${inner.value ?? ''}` : inner.value
				return { ...inner, location: location(this), value }
			}
			return { kind: 'unary', location: location(this), op: op.sourceString, operand: inner }
		},
		PostfixExpr_cast(operand: Node, colons: Node, type: Node) {
			return {
				kind: 'cast',
				location: location(colons),
				operand: operand['expr'](),
				typeName: type.sourceString,
			}
		},
		PostfixExpr_subscript(operand: Node, _open: Node, index: Node, _close: Node) {
			return {
				index: index['expr'](),
				kind: 'subscript',
				location: location(this),
				operand: operand['expr'](),
			}
		},
		PostfixExpr_field(operand: Node, _dot: Node, field: Node) {
			return {
				field: field['ident'](),
				kind: 'field',
				location: location(this),
				operand: operand['expr'](),
			}
		},
		Primary_subquery(_open: Node, query: Node, _close: Node) {
			return { kind: 'sublink', location: location(this), mode: 'scalar', query: query['select']() }
		},
		Primary_exists(_exists: Node, _open: Node, query: Node, _close: Node) {
			return { kind: 'sublink', location: location(this), mode: 'exists', query: query['select']() }
		},
		Primary_arrayQuery(_array: Node, _open: Node, query: Node, _close: Node) {
			return { kind: 'sublink', location: location(this), mode: 'array', query: query['select']() }
		},
		Primary_array(_array: Node, _open: Node, elements: Node, _close: Node) {
			return { elements: list<SqlExpr>(elements, 'expr'), kind: 'array', location: location(this) }
		},
		Primary_row(_row: Node, _open: Node, elements: Node, _close: Node) {
			return { elements: list<SqlExpr>(elements, 'expr'), kind: 'row', location: location(this) }
		},
		Primary_tuple(_open: Node, first: Node, _comma: Node, rest: Node, _close: Node) {
			return {
				elements: [first['expr'](), ...list<SqlExpr>(rest, 'expr')],
				kind: 'row',
				location: location(this),
			}
		},
		Primary_paren(_open: Node, expr: Node, _close: Node) {
			return expr['expr']()
		},
		Primary_cast(_cast: Node, _open: Node, expr: Node, _as: Node, type: Node, _close: Node) {
			return {
				kind: 'cast',
				location: location(this),
				operand: expr['expr'](),
				typeName: type.sourceString,
			}
		},
		CaseExpr(_case: Node, subject: Node, whens: Node, otherwise: Node, _end: Node) {
			return {
				kind: 'case',
				location: location(this),
				otherwise: optional<SqlExpr>(otherwise, 'expr'),
				subject: optional<SqlExpr>(subject, 'expr'),
				whens: whens.children.map((when: Node) => when['when']()),
			}
		},
		CaseElse(_else: Node, expr: Node) {
			return expr['expr']()
		},
		FuncCall(_name: Node, _open: Node, _args: Node, _close: Node) {
			return this['call']()
		},
		ColumnRef(_parts: Node) {
			return { kind: 'ref', location: location(this), parts: this['names']() }
		},
		literal_null(_null: Node) {
			return { kind: 'literal', literal: 'null', location: location(this), value: null }
		},
		literal_true(_true: Node) {
			return { kind: 'literal', literal: 'boolean', location: location(this), value: 'true' }
		},
		literal_false(_false: Node) {
			return { kind: 'literal', literal: 'boolean', location: location(this), value: 'false' }
		},
		stringLit(_escape: Node, _open: Node, chars: Node, _close: Node) {
			return {
				kind: 'literal',
				literal: 'string',
				location: location(this),
				value: chars.sourceString.replaceAll("''", "'"),
			}
		},
		numberLit(_whole: Node, _dot: Node, _fraction: Node) {
			const text = this.sourceString
			return {
				kind: 'literal',
				literal: text.includes('.') ? 'numeric' : 'integer',
				location: location(this),
				value: text,
			}
		},
		param(_dollar: Node, digits: Node) {
			return { index: Number(digits.sourceString), kind: 'param', location: location(this) }
		},
	})

	return semantics
}

function binary(left: Node, op: Node, right: Node): SqlExpr {
	return {
		kind: 'binary',
		left: left['expr'](),
		location: location(op),
		op: op.sourceString,
		right: right['expr'](),
	}
}

const semantics = createSemantics()

export type ParseOutcome<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: HostError }

/**
 * Host-style syntax error for a failed match: the token at the failure
 * offset, or the end of input.
 */
export function syntaxError(text: string, shortMessage: string | undefined): HostError {
	const place = /^Line (\d+), col (\d+)/.exec(shortMessage ?? '')
	let offset = text.length
	if (place) {
		const lines = text.split('\n')
		const line = Number(place[1])
		const column = Number(place[2])
		const before = lines.slice(0, line - 1).reduce((sum, current) => sum + current.length + 1, 0)
		offset = before + column - 1
	}
	const rest = text.slice(offset).trimStart()
	offset = text.length - rest.length
	const token = /^("(?:[^"]|"")*"|'(?:[^']|'')*'|[\w$]+|\S)/.exec(rest)?.[1]
	if (token === undefined) {
		return { message: 'syntax error at end of input', position: text.length + 1, sqlstate: '42601' }
	}
	return { message: `syntax error at or near "${token}"`, position: offset + 1, sqlstate: '42601' }
}

export function parseStatement(text: string): ParseOutcome<SqlStatement> {
	const match = HostSqlGrammar.match(text, 'StatementText')
	if (match.failed()) return { error: syntaxError(text, match.shortMessage), ok: false }
	return { ok: true, value: semantics(match)['statement']() }
}

export function parseExpression(text: string): ParseOutcome<SqlExpr> {
	const match = HostSqlGrammar.match(text, 'ExpressionText')
	if (match.failed()) return { error: syntaxError(text, match.shortMessage), ok: false }
	return { ok: true, value: semantics(match)['expr']() }
}
