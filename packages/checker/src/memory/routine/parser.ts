/**
 * Parser for routine bodies of the procedural language.
 *
 * Embedded SQL and expressions are not parsed here: they are captured as
 * text fragments (with their body line) and handed to the SQL analyzer later.
 */

import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { keywordGrammar } from '../../core/grammar.ts'
import type { ConditionRef, RaiseLevel, SqlFragment } from '../../host/ast.ts'
import type {
	Block,
	CursorArg,
	Declaration,
	Handler,
	Into,
	Statement,
	Target,
} from './syntax.ts'

const grammarSource = String.raw`
Routine {
  Body = Block ";"?

  Block = Label? DeclareSection? kw<"begin"> Stmt* ExceptionSection? kw<"end"> ident?
  Label = "<<" ident ">>"

  // Declarations
  DeclareSection = kw<"declare"> Declaration*
  Declaration = ident kw<"alias"> kw<"for"> aliasTarget ";"                                       -- alias
              | ident CursorWord CursorParams? IsFor sqlUntil<";"> ";"                            -- cursor
              | ident kw<"constant">? declType Collate? NotNull? DeclDefault? ";"                 -- variable
  aliasTarget = "$" digit+  -- positional
              | ident       -- named
  CursorWord = Scroll? kw<"cursor">
  Scroll = kw<"no">? kw<"scroll">
  IsFor = kw<"for"> | kw<"is">
  CursorParams = "(" NonemptyListOf<CursorParam, ","> ")"
  CursorParam = ident declType
  Collate = kw<"collate"> ident
  NotNull = kw<"not"> kw<"null">
  DeclDefault = AssignOp sqlUntil<";">  -- assign
              | kw<"default"> sqlUntil<";">  -- default
  declType = (~declStop declAtom)+
  declStop = kw<"not"> | kw<"default"> | kw<"collate"> | ":=" | "=" | ";" | "," | ")"
  declAtom = "(" (~")" any)* ")"  -- paren
           | quotedIdent
           | word
           | any

  ExceptionSection = kw<"exception"> Handler+
  Handler = kw<"when"> NonemptyListOf<Condition, kwOr> kw<"then"> Stmt*
  Condition = kw<"sqlstate"> stringLit  -- sqlstate
            | ident                     -- name
  kwOr = kw<"or">

  // Statements
  Stmt = Block ";"  -- block
       | IfStmt
       | CaseStmt
       | LoopStmt
       | WhileStmt
       | ForStmt
       | ForeachStmt
       | ExitStmt
       | ReturnStmt
       | RaiseStmt
       | AssertStmt
       | PerformStmt
       | ExecuteStmt
       | OpenStmt
       | FetchStmt
       | CloseStmt
       | GetDiagStmt
       | CommitStmt
       | RollbackStmt
       | CallStmt
       | NullStmt
       | AssignStmt
       | SqlStmt

  IfStmt = kw<"if"> sqlUntil<kwThen> kw<"then"> Stmt* ElsIf* Else? kw<"end"> kw<"if"> ";"
  ElsIf = elsifWord sqlUntil<kwThen> kw<"then"> Stmt*
  elsifWord = kw<"elsif"> | kw<"elseif">
  Else = kw<"else"> Stmt*

  CaseStmt = kw<"case"> CaseSubject? CaseWhen+ Else? kw<"end"> kw<"case"> ";"
  CaseSubject = ~kw<"when"> sqlUntil<kwWhen>
  CaseWhen = kw<"when"> sqlUntil<kwThen> kw<"then"> Stmt*

  LoopStmt = Label? kw<"loop"> LoopEnd
  WhileStmt = Label? kw<"while"> sqlUntil<kwLoop> kw<"loop"> LoopEnd
  ForStmt = Label? kw<"for"> ForHeader kw<"loop"> LoopEnd
  ForeachStmt = Label? kw<"foreach"> Targets Slice? kw<"in"> kw<"array"> sqlUntil<kwLoop> kw<"loop"> LoopEnd
  LoopEnd = Stmt* kw<"end"> kw<"loop"> ident? ";"
  Slice = kw<"slice"> digit+

  ForHeader = Targets kw<"in"> kw<"execute"> sqlUntil<usingOrLoop> Using?                      -- dynamic
            | ident kw<"in"> kw<"reverse">? sqlUntil<dotsOrLoop> ".." sqlUntil<byOrLoop> Step?  -- range
            | ident kw<"in"> ident CursorArgs? &kw<"loop">                                   -- cursor
            | Targets kw<"in"> sqlUntil<kwLoop>                                              -- query
  Step = kw<"by"> sqlUntil<kwLoop>
  CursorArgs = "(" NonemptyListOf<CursorArg, ","> ")"
  CursorArg = sqlUntil<argStop>

  ExitStmt = exitWord ident? ExitWhen? ";"
  exitWord = kw<"exit"> | kw<"continue">
  ExitWhen = kw<"when"> sqlUntil<semicolon>

  ReturnStmt = kw<"return"> kw<"next"> sqlUntil<semicolon>? ";"                                 -- next
             | kw<"return"> kw<"query"> kw<"execute"> sqlUntil<usingOrSemicolon> Using? ";"      -- dynamic
             | kw<"return"> kw<"query"> sqlUntil<semicolon> ";"                                  -- query
             | kw<"return"> sqlUntil<semicolon>? ";"                                             -- plain

  RaiseStmt = kw<"raise"> ";"                                            -- reraise
            | kw<"raise"> RaiseLevel? RaiseWhat? RaiseUsing? ";"        -- full
  RaiseLevel = kw<"debug"> | kw<"log"> | kw<"info"> | kw<"notice"> | kw<"warning"> | kw<"exception">
  RaiseWhat = stringLit RaiseParam*    -- format
            | kw<"sqlstate"> stringLit  -- sqlstate
            | ~kw<"using"> ident       -- condition
  RaiseParam = "," sqlUntil<raiseArgStop>
  RaiseUsing = kw<"using"> NonemptyListOf<RaiseOption, ",">
  RaiseOption = ident AssignOp sqlUntil<argStop>

  AssertStmt = kw<"assert"> sqlUntil<comma> AssertMessage? ";"
  AssertMessage = "," sqlUntil<semicolon>

  PerformStmt = kw<"perform"> sqlUntil<semicolon> ";"

  ExecuteStmt = kw<"execute"> sqlUntil<execStop> ExecTail* ";"
  ExecTail = Into   -- into
           | Using  -- using
  Into = kw<"into"> kw<"strict">? Targets
  Using = kw<"using"> NonemptyListOf<UsingArg, ",">
  UsingArg = sqlUntil<usingArgStop>

  OpenStmt = kw<"open"> ident OpenSource? ";"
  OpenSource = Scroll? kw<"for"> kw<"execute"> sqlUntil<usingOrSemicolon> Using?  -- dynamic
             | Scroll? kw<"for"> sqlUntil<semicolon>                              -- query
             | CursorArgs                                                          -- args

  FetchStmt = fetchWord FetchDirection? FromIn? ident Into? ";"
  fetchWord = kw<"fetch"> | kw<"move">
  FetchDirection = directionWord directionCount?
  directionWord = kw<"next"> | kw<"prior"> | kw<"first"> | kw<"last"> | kw<"absolute">
                | kw<"relative"> | kw<"forward"> | kw<"backward">
  directionCount = "-"? digit+  -- count
                 | kw<"all">    -- all
  FromIn = kw<"from"> | kw<"in">

  CloseStmt = kw<"close"> ident ";"

  GetDiagStmt = kw<"get"> DiagScope? kw<"diagnostics"> NonemptyListOf<DiagItem, ","> ";"
  DiagScope = kw<"stacked"> | kw<"current">
  DiagItem = Target AssignOp ident

  CommitStmt = kw<"commit"> Chain? ";"
  RollbackStmt = kw<"rollback"> Chain? ";"
  Chain = kw<"and"> kw<"no">? kw<"chain">

  CallStmt = kw<"call"> sqlUntil<semicolon> ";"
  NullStmt = kw<"null"> ";"
  AssignStmt = Target AssignOp sqlUntil<semicolon> ";"
  SqlStmt = ~stmtStop sqlUntil<semicolon> ";"

  Targets = NonemptyListOf<Target, ",">
  Target = NonemptyListOf<ident, ".">
  AssignOp = ":=" | "="

  // Embedded SQL, captured as text
  sqlUntil<stop> = (~stop sqlAtom)+
  sqlAtom = comment
          | dollarString
          | stringLit
          | quotedIdent
          | caseGroup
          | "(" (~")" sqlAtom)* ")"  -- paren
          | "[" (~"]" sqlAtom)* "]"  -- bracket
          | word
          | number
          | ~";" any                 -- char
  caseGroup = kw<"case"> (~kw<"end"> sqlAtom)* kw<"end">
  dollarString = "$" dollarTag? "$" (~("$" dollarTag? "$") any)* "$" dollarTag? "$"
  dollarTag = identStart identPart*

  stmtStop = kw<"end"> | kw<"else"> | kw<"elsif"> | kw<"elseif"> | kw<"when"> | kw<"exception">
  semicolon = ";"
  comma = ","
  kwThen = kw<"then">
  kwWhen = kw<"when">
  kwLoop = kw<"loop">
  usingOrLoop = kw<"using"> | kw<"loop">
  usingOrSemicolon = kw<"using"> | ";"
  dotsOrLoop = ".." | kw<"loop">
  byOrLoop = kw<"by"> | kw<"loop">
  execStop = kw<"into"> | kw<"using">
  argStop = "," | ")"
  raiseArgStop = "," | kw<"using">
  usingArgStop = "," | kw<"into"> | kw<"loop">

  // Tokens
  stringLit = escapeMark? "'" stringChar* "'"
  escapeMark = "E" | "e"
  stringChar = "''"      -- quote
             | ~"'" any  -- char
  number = digit+ ("." digit+)?
  word = identStart identPart*

  kw<w> = w ~identPart
  ident = quotedIdent | ~reserved plainIdent
  plainIdent = identStart identPart*
  quotedIdent = "\"" quotedChar* "\""
  quotedChar = "\"\""    -- quote
             | ~"\"" any  -- char
  identStart = letter | "_"
  identPart = alnum | "_" | "$"

  reserved = kw<"all"> | kw<"and"> | kw<"begin"> | kw<"by"> | kw<"case"> | kw<"declare">
           | kw<"else"> | kw<"elsif"> | kw<"elseif"> | kw<"end"> | kw<"exception">
           | kw<"execute"> | kw<"for"> | kw<"foreach"> | kw<"from"> | kw<"if"> | kw<"in">
           | kw<"into"> | kw<"loop"> | kw<"not"> | kw<"null"> | kw<"or"> | kw<"strict">
           | kw<"then"> | kw<"to"> | kw<"using"> | kw<"when"> | kw<"while">

  space += comment
  comment = "--" (~"\n" any)*       -- line
          | "/*" (~"*/" any)* "*/"  -- block
}
`

export const RoutineGrammar = keywordGrammar(grammarSource)

/** Body line of a node, 1-based. */
function lineOf(node: Node): number {
	const before = node.source.sourceString.substring(0, node.source.startIdx)
	let line = 1
	for (const char of before) if (char === '\n') line++
	return line
}

function optional<T>(node: Node, operation: string): T | null {
	const child = node.children[0]
	return child !== undefined ? child[operation]() : null
}

function list<T>(node: Node, operation: string): T[] {
	return node.asIteration().children.map((child: Node) => child[operation]())
}

function each<T>(node: Node, operation: string): T[] {
	return node.children.map((child: Node) => child[operation]())
}

function unquote(literal: string): string {
	const start = literal.indexOf("'")
	return literal.slice(start + 1, -1).replaceAll("''", "'")
}

const raiseLevels: readonly RaiseLevel[] = [
	'debug',
	'log',
	'info',
	'notice',
	'warning',
	'exception',
]

function toRaiseLevel(text: string): RaiseLevel {
	const level = raiseLevels.find((candidate) => candidate === text.toLowerCase())
	if (level === undefined) throw new Error(`Unknown RAISE level '${text}'`)
	return level
}

interface LoopParts {
	readonly body: Statement[]
}

interface RaiseParts {
	readonly condition: ConditionRef | null
	readonly message: string | null
	readonly params: SqlFragment[]
}

interface OpenParts {
	readonly args: SqlFragment[] | null
	readonly query: SqlFragment | null
	readonly dynamic: SqlFragment | null
	readonly params: SqlFragment[]
}

interface ExecTail {
	readonly into?: Into
	readonly params?: SqlFragment[]
}

interface RaiseOption {
	readonly name: string
	readonly expr: SqlFragment
}

interface ForParts {
	readonly header:
		| {
				readonly kind: 'dynfors'
				readonly targets: Target[]
				readonly query: SqlFragment
				readonly params: SqlFragment[]
		  }
		| {
				readonly kind: 'fori'
				readonly variable: string
				readonly lower: SqlFragment
				readonly upper: SqlFragment
				readonly step: SqlFragment | null
				readonly reverse: boolean
		  }
		| {
				readonly kind: 'forc'
				readonly target: string
				readonly cursor: string
				readonly args: SqlFragment[] | null
		  }
		| { readonly kind: 'fors'; readonly targets: Target[]; readonly query: SqlFragment }
}

function createSemantics(): ohm.Semantics {
	const semantics = RoutineGrammar.createSemantics()

	semantics.addOperation<string>('ident', {
		plainIdent(_start: Node, _rest: Node) {
			return this.sourceString.toLowerCase()
		},
		quotedIdent(_open: Node, chars: Node, _close: Node) {
			return chars.sourceString.replaceAll('""', '"')
		},
		Label(_open: Node, name: Node, _close: Node) {
			return name['ident']()
		},
	})

	semantics.addOperation<SqlFragment>('fragment', {
		sqlUntil(_atoms: Node) {
			return { line: lineOf(this), text: this.sourceString.trim() }
		},
		CursorArg(expr: Node) {
			return expr['fragment']()
		},
		UsingArg(expr: Node) {
			return expr['fragment']()
		},
		RaiseParam(_comma: Node, expr: Node) {
			return expr['fragment']()
		},
		AssertMessage(_comma: Node, expr: Node) {
			return expr['fragment']()
		},
		ExitWhen(_when: Node, expr: Node) {
			return expr['fragment']()
		},
		Step(_by: Node, expr: Node) {
			return expr['fragment']()
		},
		CaseSubject(expr: Node) {
			return expr['fragment']()
		},
		DeclDefault_assign(_op: Node, expr: Node) {
			return expr['fragment']()
		},
		DeclDefault_default(_default: Node, expr: Node) {
			return expr['fragment']()
		},
	})

	semantics.addOperation<SqlFragment[]>('fragments', {
		CursorArgs(_open: Node, args: Node, _close: Node) {
			return list<SqlFragment>(args, 'fragment')
		},
		Using(_using: Node, args: Node) {
			return list<SqlFragment>(args, 'fragment')
		},
	})

	semantics.addOperation<Target>('target', {
		Target(parts: Node) {
			return list<string>(parts, 'ident')
		},
	})

	semantics.addOperation<Target[]>('targets', {
		Targets(targets: Node) {
			return list<Target>(targets, 'target')
		},
	})

	semantics.addOperation<Into>('into', {
		Into(_into: Node, strict: Node, targets: Node) {
			return { strict: strict.children.length > 0, targets: targets['targets']() }
		},
	})

	// =========================================================================
	// BLOCKS AND DECLARATIONS
	// =========================================================================

	semantics.addOperation<Block>('block', {
		Body(block: Node, _semicolon: Node) {
			return block['block']()
		},
		Block(
			label: Node,
			declare: Node,
			begin: Node,
			stmts: Node,
			exceptions: Node,
			_end: Node,
			_name: Node
		) {
			const start = label.children[0] ?? declare.children[0] ?? begin
			return {
				body: each<Statement>(stmts, 'stmt'),
				declarations: optional<Declaration[]>(declare, 'declarations') ?? [],
				handlers: optional<Handler[]>(exceptions, 'handlers'),
				kind: 'block',
				label: optional<string>(label, 'ident'),
				line: lineOf(start),
			}
		},
	})

	semantics.addOperation<Declaration[]>('declarations', {
		DeclareSection(_declare: Node, declarations: Node) {
			return each<Declaration>(declarations, 'declaration')
		},
	})

	semantics.addOperation<Declaration>('declaration', {
		Declaration_alias(name: Node, _alias: Node, _for: Node, target: Node, _semicolon: Node) {
			return {
				kind: 'alias',
				line: lineOf(name),
				name: name['ident'](),
				target: target['aliasTarget'](),
			}
		},
		Declaration_cursor(
			name: Node,
			_cursor: Node,
			params: Node,
			_for: Node,
			query: Node,
			_semicolon: Node
		) {
			return {
				args: optional<CursorArg[]>(params, 'cursorParams') ?? [],
				kind: 'cursor',
				line: lineOf(name),
				name: name['ident'](),
				query: query['fragment'](),
			}
		},
		Declaration_variable(
			name: Node,
			constant: Node,
			type: Node,
			_collate: Node,
			notNull: Node,
			defaultExpr: Node,
			_semicolon: Node
		) {
			return {
				defaultExpr: optional<SqlFragment>(defaultExpr, 'fragment'),
				isConst: constant.children.length > 0,
				kind: 'variable',
				line: lineOf(name),
				name: name['ident'](),
				notNull: notNull.children.length > 0,
				typeText: type.sourceString.trim(),
			}
		},
	})

	semantics.addOperation<string>('aliasTarget', {
		aliasTarget_positional(_dollar: Node, _digits: Node) {
			return this.sourceString
		},
		aliasTarget_named(name: Node) {
			return name['ident']()
		},
	})

	semantics.addOperation<CursorArg[]>('cursorParams', {
		CursorParams(_open: Node, params: Node, _close: Node) {
			return list<CursorArg>(params, 'cursorParam')
		},
	})

	semantics.addOperation<CursorArg>('cursorParam', {
		CursorParam(name: Node, type: Node) {
			return { name: name['ident'](), typeText: type.sourceString.trim() }
		},
	})

	semantics.addOperation<Handler[]>('handlers', {
		ExceptionSection(_exception: Node, handlers: Node) {
			return each<Handler>(handlers, 'handler')
		},
	})

	semantics.addOperation<Handler>('handler', {
		Handler(when: Node, conditions: Node, _then: Node, stmts: Node) {
			return {
				body: each<Statement>(stmts, 'stmt'),
				conditions: list<ConditionRef>(conditions, 'condition'),
				line: lineOf(when),
			}
		},
	})

	semantics.addOperation<ConditionRef>('condition', {
		Condition_sqlstate(_sqlstate: Node, code: Node) {
			return { code: unquote(code.sourceString), kind: 'sqlstate' }
		},
		Condition_name(name: Node) {
			return { kind: 'name', name: name['ident']() }
		},
	})

	// =========================================================================
	// STATEMENTS
	// =========================================================================

	semantics.addOperation<LoopParts>('loopEnd', {
		LoopEnd(stmts: Node, _end: Node, _loop: Node, _name: Node, _semicolon: Node) {
			return { body: each<Statement>(stmts, 'stmt') }
		},
	})

	semantics.addOperation<ForParts>('forHeader', {
		ForHeader_dynamic(targets: Node, _in: Node, _execute: Node, query: Node, using: Node) {
			return {
				header: {
					kind: 'dynfors',
					params: optional<SqlFragment[]>(using, 'fragments') ?? [],
					query: query['fragment'](),
					targets: targets['targets'](),
				},
			}
		},
		ForHeader_range(
			variable: Node,
			_in: Node,
			reverse: Node,
			lower: Node,
			_dots: Node,
			upper: Node,
			step: Node
		) {
			return {
				header: {
					kind: 'fori',
					lower: lower['fragment'](),
					reverse: reverse.children.length > 0,
					step: optional<SqlFragment>(step, 'fragment'),
					upper: upper['fragment'](),
					variable: variable['ident'](),
				},
			}
		},
		ForHeader_cursor(target: Node, _in: Node, cursor: Node, args: Node, _loop: Node) {
			return {
				header: {
					args: optional<SqlFragment[]>(args, 'fragments'),
					cursor: cursor['ident'](),
					kind: 'forc',
					target: target['ident'](),
				},
			}
		},
		ForHeader_query(targets: Node, _in: Node, query: Node) {
			return { header: { kind: 'fors', query: query['fragment'](), targets: targets['targets']() } }
		},
	})

	semantics.addOperation<RaiseParts>('raiseWhat', {
		RaiseWhat_format(message: Node, params: Node) {
			return {
				condition: null,
				message: unquote(message.sourceString),
				params: each<SqlFragment>(params, 'fragment'),
			}
		},
		RaiseWhat_sqlstate(_sqlstate: Node, code: Node) {
			return {
				condition: { code: unquote(code.sourceString), kind: 'sqlstate' },
				message: null,
				params: [],
			}
		},
		RaiseWhat_condition(name: Node) {
			return { condition: { kind: 'name', name: name['ident']() }, message: null, params: [] }
		},
	})

	semantics.addOperation<RaiseOption[]>('raiseOptions', {
		RaiseUsing(_using: Node, options: Node) {
			return list<RaiseOption>(options, 'raiseOption')
		},
	})

	semantics.addOperation<RaiseOption>('raiseOption', {
		RaiseOption(name: Node, _op: Node, expr: Node) {
			return { expr: expr['fragment'](), name: name['ident']() }
		},
	})

	semantics.addOperation<ExecTail>('execTail', {
		ExecTail_into(into: Node) {
			return { into: into['into']() }
		},
		ExecTail_using(using: Node) {
			return { params: using['fragments']() }
		},
	})

	semantics.addOperation<OpenParts>('openSource', {
		OpenSource_dynamic(_scroll: Node, _for: Node, _execute: Node, query: Node, using: Node) {
			return {
				args: null,
				dynamic: query['fragment'](),
				params: optional<SqlFragment[]>(using, 'fragments') ?? [],
				query: null,
			}
		},
		OpenSource_query(_scroll: Node, _for: Node, query: Node) {
			return { args: null, dynamic: null, params: [], query: query['fragment']() }
		},
		OpenSource_args(args: Node) {
			return { args: args['fragments'](), dynamic: null, params: [], query: null }
		},
	})

	semantics.addOperation<{ target: Target; item: string }>('diagItem', {
		DiagItem(target: Node, _op: Node, item: Node) {
			return { item: item.sourceString.toUpperCase(), target: target['target']() }
		},
	})

	semantics.addOperation<Statement>('stmt', {
		Stmt_block(block: Node, _semicolon: Node) {
			return block['block']()
		},
		IfStmt(
			ifWord: Node,
			cond: Node,
			_then: Node,
			stmts: Node,
			elsifs: Node,
			otherwise: Node,
			_end: Node,
			_if: Node,
			_semicolon: Node
		) {
			return {
				cond: cond['fragment'](),
				elsifs: elsifs.children.map((clause: Node) => clause['elsif']()),
				kind: 'if',
				line: lineOf(ifWord),
				otherwise: optional<Statement[]>(otherwise, 'elseBody'),
				then: each<Statement>(stmts, 'stmt'),
			}
		},
		CaseStmt(
			caseWord: Node,
			subject: Node,
			whens: Node,
			otherwise: Node,
			_end: Node,
			_case: Node,
			_semicolon: Node
		) {
			return {
				kind: 'case',
				line: lineOf(caseWord),
				otherwise: optional<Statement[]>(otherwise, 'elseBody'),
				subject: optional<SqlFragment>(subject, 'fragment'),
				whens: whens.children.map((when: Node) => when['caseWhen']()),
			}
		},
		LoopStmt(label: Node, loop: Node, end: Node) {
			return {
				...end['loopEnd'](),
				kind: 'loop',
				label: optional<string>(label, 'ident'),
				line: lineOf(label.children[0] ?? loop),
			}
		},
		WhileStmt(label: Node, whileWord: Node, cond: Node, _loop: Node, end: Node) {
			return {
				...end['loopEnd'](),
				cond: cond['fragment'](),
				kind: 'while',
				label: optional<string>(label, 'ident'),
				line: lineOf(label.children[0] ?? whileWord),
			}
		},
		ForStmt(label: Node, forWord: Node, header: Node, _loop: Node, end: Node) {
			const { header: parts } = header['forHeader']()
			return {
				...end['loopEnd'](),
				...parts,
				label: optional<string>(label, 'ident'),
				line: lineOf(label.children[0] ?? forWord),
			}
		},
		ForeachStmt(
			label: Node,
			foreach: Node,
			targets: Node,
			slice: Node,
			_in: Node,
			_array: Node,
			expr: Node,
			_loop: Node,
			end: Node
		) {
			return {
				...end['loopEnd'](),
				expr: expr['fragment'](),
				kind: 'foreach',
				label: optional<string>(label, 'ident'),
				line: lineOf(label.children[0] ?? foreach),
				slice: optional<number>(slice, 'slice') ?? 0,
				targets: targets['targets'](),
			}
		},
		ExitStmt(word: Node, label: Node, when: Node, _semicolon: Node) {
			return {
				cond: optional<SqlFragment>(when, 'fragment'),
				isExit: word.sourceString.toLowerCase() === 'exit',
				kind: 'exit',
				label: optional<string>(label, 'ident'),
				line: lineOf(word),
			}
		},
		ReturnStmt_next(returnWord: Node, _next: Node, expr: Node, _semicolon: Node) {
			return {
				expr: optional<SqlFragment>(expr, 'fragment'),
				kind: 'return_next',
				line: lineOf(returnWord),
			}
		},
		ReturnStmt_dynamic(
			returnWord: Node,
			_query: Node,
			_execute: Node,
			dynamic: Node,
			using: Node,
			_semicolon: Node
		) {
			return {
				dynamic: dynamic['fragment'](),
				kind: 'return_query',
				line: lineOf(returnWord),
				params: optional<SqlFragment[]>(using, 'fragments') ?? [],
				query: null,
			}
		},
		ReturnStmt_query(returnWord: Node, _query: Node, query: Node, _semicolon: Node) {
			return {
				dynamic: null,
				kind: 'return_query',
				line: lineOf(returnWord),
				params: [],
				query: query['fragment'](),
			}
		},
		ReturnStmt_plain(returnWord: Node, expr: Node, _semicolon: Node) {
			return {
				expr: optional<SqlFragment>(expr, 'fragment'),
				kind: 'return',
				line: lineOf(returnWord),
			}
		},
		RaiseStmt_reraise(raise: Node, _semicolon: Node) {
			return {
				condition: null,
				kind: 'raise',
				level: 'exception',
				line: lineOf(raise),
				message: null,
				options: [],
				params: [],
				reraise: true,
			}
		},
		RaiseStmt_full(raise: Node, level: Node, what: Node, using: Node, _semicolon: Node) {
			const parts = optional<RaiseParts>(what, 'raiseWhat')
			return {
				condition: parts?.condition ?? null,
				kind: 'raise',
				level: toRaiseLevel(level.children[0]?.sourceString ?? 'exception'),
				line: lineOf(raise),
				message: parts?.message ?? null,
				options: optional<RaiseOption[]>(using, 'raiseOptions') ?? [],
				params: parts?.params ?? [],
				reraise: false,
			}
		},
		AssertStmt(assert: Node, cond: Node, message: Node, _semicolon: Node) {
			return {
				cond: cond['fragment'](),
				kind: 'assert',
				line: lineOf(assert),
				message: optional<SqlFragment>(message, 'fragment'),
			}
		},
		PerformStmt(perform: Node, query: Node, _semicolon: Node) {
			return { kind: 'perform', line: lineOf(perform), query: query['fragment']() }
		},
		ExecuteStmt(execute: Node, query: Node, tails: Node, _semicolon: Node) {
			const parts = each<ExecTail>(tails, 'execTail')
			return {
				into: parts.find((part) => part.into)?.into ?? null,
				kind: 'dynexecute',
				line: lineOf(execute),
				params: parts.flatMap((part) => part.params ?? []),
				query: query['fragment'](),
			}
		},
		OpenStmt(open: Node, cursor: Node, source: Node, _semicolon: Node) {
			const parts = optional<OpenParts>(source, 'openSource')
			return {
				args: parts?.args ?? null,
				cursor: cursor['ident'](),
				dynamic: parts?.dynamic ?? null,
				kind: 'open',
				line: lineOf(open),
				params: parts?.params ?? [],
				query: parts?.query ?? null,
			}
		},
		FetchStmt(
			word: Node,
			_direction: Node,
			_from: Node,
			cursor: Node,
			into: Node,
			_semicolon: Node
		) {
			return {
				cursor: cursor['ident'](),
				isMove: word.sourceString.toLowerCase() === 'move',
				kind: 'fetch',
				line: lineOf(word),
				targets: optional<Into>(into, 'into')?.targets ?? [],
			}
		},
		CloseStmt(close: Node, cursor: Node, _semicolon: Node) {
			return { cursor: cursor['ident'](), kind: 'close', line: lineOf(close) }
		},
		GetDiagStmt(get: Node, scope: Node, _diagnostics: Node, items: Node, _semicolon: Node) {
			return {
				items: list<{ target: Target; item: string }>(items, 'diagItem'),
				kind: 'getdiag',
				line: lineOf(get),
				stacked: scope.sourceString.toLowerCase() === 'stacked',
			}
		},
		CommitStmt(commit: Node, _chain: Node, _semicolon: Node) {
			return { kind: 'commit', line: lineOf(commit) }
		},
		RollbackStmt(rollback: Node, _chain: Node, _semicolon: Node) {
			return { kind: 'rollback', line: lineOf(rollback) }
		},
		CallStmt(call: Node, rest: Node, _semicolon: Node) {
			const text = call.source.sourceString.substring(call.source.startIdx, rest.source.endIdx)
			return { kind: 'call', line: lineOf(call), query: { line: lineOf(call), text: text.trim() } }
		},
		NullStmt(nullWord: Node, _semicolon: Node) {
			return { kind: 'null', line: lineOf(nullWord) }
		},
		AssignStmt(target: Node, _op: Node, expr: Node, _semicolon: Node) {
			return {
				expr: expr['fragment'](),
				kind: 'assign',
				line: lineOf(target),
				target: target['target'](),
			}
		},
		SqlStmt(query: Node, _semicolon: Node) {
			const fragment: SqlFragment = query['fragment']()
			return { kind: 'sql', line: fragment.line, query: fragment }
		},
	})

	semantics.addOperation<number>('slice', {
		Slice(_slice: Node, digits: Node) {
			return Number(digits.sourceString)
		},
	})

	semantics.addOperation<Statement[]>('elseBody', {
		Else(_else: Node, stmts: Node) {
			return each<Statement>(stmts, 'stmt')
		},
	})

	semantics.addOperation<{ line: number; cond: SqlFragment; body: Statement[] }>('elsif', {
		ElsIf(word: Node, cond: Node, _then: Node, stmts: Node) {
			return { body: each<Statement>(stmts, 'stmt'), cond: cond['fragment'](), line: lineOf(word) }
		},
	})

	semantics.addOperation<{ line: number; expr: SqlFragment; body: Statement[] }>('caseWhen', {
		CaseWhen(when: Node, expr: Node, _then: Node, stmts: Node) {
			return { body: each<Statement>(stmts, 'stmt'), expr: expr['fragment'](), line: lineOf(when) }
		},
	})

	return semantics
}

const semantics = createSemantics()

export class RoutineSyntaxError extends Error {
	constructor(
		message: string,
		readonly line: number
	) {
		super(message)
		this.name = 'RoutineSyntaxError'
	}
}

/**
 * Parse a routine body (the text between the dollar quotes). Line 1 is the
 * line the body text starts on.
 */
export function parseRoutineBody(body: string): Block {
	const match = RoutineGrammar.match(body, 'Body')
	if (match.failed()) {
		const position = /Line (\d+), col \d+/.exec(match.shortMessage ?? '')
		throw new RoutineSyntaxError(
			`syntax error in routine body: ${match.shortMessage ?? 'unexpected input'}`,
			position ? Number(position[1]) : 1
		)
	}
	return semantics(match)['block']()
}
