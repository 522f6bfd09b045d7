/**
 * Loader for definition scripts: tables, sequences, views, types,
 * operators, functions and procedures.
 *
 * Objects are registered in script order; routine bodies are compiled once
 * the whole script is known, so a body may refer to objects defined later.
 */

import { createHash } from 'node:crypto'
import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { keywordGrammar } from '../core/grammar.ts'
import type { ParamMode, Routine, RoutineKind } from '../host/ast.ts'
import {
	type Column,
	RelationKind,
	type TupleShape,
	type TypeRef,
	typeRef,
	Volatility,
} from '../host/types.ts'
import { CATALOG_SCHEMA, DEFAULT_SCHEMA, type MemoryCatalog } from './catalog.ts'
import {
	CompileError,
	compileRoutine,
	formatSignature,
	type HeaderParam,
	type RoutineHeader,
} from './routine/compiler.ts'
import { analyzeSql } from './sql/analyzer.ts'
import { elementOf } from './types.ts'

const grammarSource = String.raw`
Script {
  Script = Item* Statement?
  Item = Statement ";"  -- statement
       | ";"            -- empty

  Statement = CreateTable
            | CreateSequence
            | CreateView
            | CreateType
            | CreateOperator
            | CreateRoutine
            | Other

  CreateTable = kw<"create"> Temporary? kw<"table"> IfNotExists? QualifiedName "(" ListOf<TableElement, ","> ")" tail
  Temporary = kw<"temporary"> | kw<"temp"> | kw<"unlogged">
  IfNotExists = kw<"if"> kw<"not"> kw<"exists">
  TableElement = constraintWord elementRest  -- constraint
               | ident columnType elementRest   -- column

  CreateSequence = kw<"create"> Temporary? kw<"sequence"> IfNotExists? QualifiedName tail

  CreateView = kw<"create"> OrReplace? Temporary? kw<"view"> QualifiedName ColumnNames? kw<"as"> tail
  ColumnNames = "(" NonemptyListOf<ident, ","> ")"

  CreateType = kw<"create"> kw<"type"> QualifiedName kw<"as"> kw<"enum"> "(" ListOf<stringLit, ","> ")"  -- enum
             | kw<"create"> kw<"type"> QualifiedName kw<"as"> "(" ListOf<Attribute, ","> ")"             -- composite
  Attribute = ident columnType elementRest

  CreateOperator = kw<"create"> kw<"operator"> operatorName "(" ListOf<OperatorOption, ","> ")"
  operatorName = (ident ".")? opChar+
  OperatorOption = ident "=" elementRest

  CreateRoutine = kw<"create"> OrReplace? routineWord QualifiedName "(" ListOf<Param, ","> ")" Returns? RoutineOption*
  OrReplace = kw<"or"> kw<"replace">
  routineWord = kw<"function"> | kw<"procedure">
  Param = elementRest
  Returns = kw<"returns"> kw<"table"> "(" ListOf<Param, ","> ")"  -- table
          | kw<"returns"> kw<"setof"> returnType                   -- setof
          | kw<"returns"> returnType                               -- plain
  RoutineOption = kw<"language"> ident                           -- language
                | kw<"as"> dollarString                          -- dollarBody
                | kw<"as"> stringLit                             -- stringBody
                | volatilityWord                                 -- volatility
                | kw<"set"> QualifiedName settingAssign settingValue  -- setting
                | optionWord                                     -- other
  volatilityWord = kw<"immutable"> | kw<"stable"> | kw<"volatile">
  settingAssign = "=" | kw<"to">
  settingValue = stringLit | (~";" ~space any)+
  optionWord = ~kw<"as"> ~kw<"language"> ~kw<"set"> ~volatilityWord (letter | digit | "_" | ".")+

  Other = (~";" atom)+

  QualifiedName = NonemptyListOf<ident, ".">

  // Free text pieces
  tail = (~";" atom)*
  elementRest = (~("," | ")") atom)*
  columnType = (~typeStop atom)+
  typeStop = constraintWord | kw<"not"> | kw<"null"> | kw<"default"> | kw<"references">
           | kw<"collate"> | kw<"generated"> | "," | ")"
  constraintWord = kw<"constraint"> | kw<"primary"> | kw<"unique"> | kw<"check">
                 | kw<"foreign"> | kw<"exclude">
  returnType = (~returnStop atom)+
  returnStop = kw<"language"> | kw<"as"> | volatilityWord | kw<"strict"> | kw<"security">
             | kw<"called"> | kw<"cost"> | kw<"rows"> | kw<"parallel"> | kw<"set">
             | kw<"leakproof"> | kw<"window"> | ";"
  atom = comment
       | dollarString
       | stringLit
       | quotedIdent
       | "(" (~")" atom)* ")"  -- paren
       | word
       | ~";" any               -- char
  word = identStart identPart*

  // Tokens
  dollarString = "$" dollarTag? "$" (~("$" dollarTag? "$") any)* "$" dollarTag? "$"
  dollarTag = identStart identPart*
  stringLit = escapeMark? "'" stringChar* "'"
  escapeMark = "E" | "e"
  stringChar = "''"      -- quote
             | ~"'" any  -- char
  opChar = "+" | "-" | "*" | "/" | "<" | ">" | "=" | "~" | "!" | "@" | "#" | "%" | "^" | "&" | "|" | "?"

  kw<w> = w ~identPart
  ident = quotedIdent | plainIdent
  plainIdent = identStart identPart*
  quotedIdent = "\"" quotedChar* "\""
  quotedChar = "\"\""    -- quote
             | ~"\"" any  -- char
  identStart = letter | "_"
  identPart = alnum | "_" | "$"

  space += comment
  comment = "--" (~"\n" any)*       -- line
          | "/*" (~"*/" any)* "*/"  -- block
}
`

export const ScriptGrammar = keywordGrammar(grammarSource)

// =============================================================================
// DEFINITIONS
// =============================================================================

interface ColumnText {
	readonly name: string
	readonly typeText: string
}

interface RoutineOptions {
	readonly language: string | null
	readonly body: string | null
	readonly volatility: Volatility | null
	readonly settings: Readonly<Record<string, string>>
}

type ReturnsText =
	| { readonly kind: 'plain'; readonly typeText: string }
	| { readonly kind: 'setof'; readonly typeText: string }
	| { readonly kind: 'table'; readonly columns: readonly string[] }

type Definition =
	| {
			readonly kind: 'table'
			readonly name: string
			readonly columns: readonly ColumnText[]
			readonly line: number
	  }
	| { readonly kind: 'sequence'; readonly name: string; readonly line: number }
	| {
			readonly kind: 'view'
			readonly name: string
			readonly columnNames: readonly string[] | null
			readonly query: string
			readonly line: number
	  }
	| { readonly kind: 'enum'; readonly name: string; readonly labels: readonly string[] }
	| {
			readonly kind: 'composite'
			readonly name: string
			readonly columns: readonly ColumnText[]
			readonly line: number
	  }
	| {
			readonly kind: 'operator'
			readonly name: string
			readonly options: Readonly<Record<string, string>>
			readonly line: number
	  }
	| {
			readonly kind: 'routine'
			readonly routineKind: RoutineKind
			readonly name: string
			readonly params: readonly string[]
			readonly returns: ReturnsText | null
			readonly options: RoutineOptions
			readonly text: string
			readonly line: number
			/** Script line the body text starts on */
			readonly bodyLine: number
	  }
	| { readonly kind: 'other' }

function lineAt(text: string, index: number): number {
	let line = 1
	for (let i = 0; i < index; i++) if (text[i] === '\n') line++
	return line
}

function lineOf(node: Node): number {
	return lineAt(node.source.sourceString, node.source.startIdx)
}

function unquote(literal: string): string {
	const start = literal.indexOf("'")
	return literal.slice(start + 1, -1).replaceAll("''", "'")
}

function undollar(text: string): string {
	const tag = /^\$[A-Za-z_0-9]*\$/.exec(text)?.[0] ?? '$$'
	return text.slice(tag.length, -tag.length)
}

function list<T>(node: Node, operation: string): T[] {
	return node.asIteration().children.map((child: Node) => child[operation]())
}

function toVolatility(word: string): Volatility {
	switch (word.toLowerCase()) {
		case 'immutable':
			return Volatility.Immutable
		case 'stable':
			return Volatility.Stable
		default:
			return Volatility.Volatile
	}
}

type OptionPart =
	| { readonly kind: 'language'; readonly language: string }
	| { readonly kind: 'body'; readonly body: string; readonly bodyStart: number }
	| { readonly kind: 'volatility'; readonly volatility: Volatility }
	| { readonly kind: 'setting'; readonly name: string; readonly value: string }
	| { readonly kind: 'other' }

function createSemantics(): ohm.Semantics {
	const semantics = ScriptGrammar.createSemantics()

	semantics.addOperation<string>('ident', {
		plainIdent(_start: Node, _rest: Node) {
			return this.sourceString.toLowerCase()
		},
		quotedIdent(_open: Node, chars: Node, _close: Node) {
			return chars.sourceString.replaceAll('""', '"')
		},
		QualifiedName(parts: Node) {
			return list<string>(parts, 'ident').join('.')
		},
	})

	semantics.addOperation<Definition[]>('definitions', {
		Script(items: Node, last: Node) {
			const all: Definition[] = [
				...items.children.flatMap((item: Node) => item['definitions']()),
				...last.children.map((statement: Node) => statement['definition']()),
			]
			return all.filter((definition) => definition.kind !== 'other')
		},
		Item_statement(statement: Node, _semicolon: Node) {
			return [statement['definition']()]
		},
		Item_empty(_semicolon: Node) {
			return []
		},
	})

	semantics.addOperation<ColumnText[]>('tableColumns', {
		TableElement_column(name: Node, type: Node, _rest: Node) {
			return [{ name: name['ident'](), typeText: type.sourceString.trim() }]
		},
		TableElement_constraint(_word: Node, _rest: Node) {
			return []
		},
	})

	semantics.addOperation<string[]>('names', {
		ColumnNames(_open: Node, names: Node, _close: Node) {
			return list<string>(names, 'ident')
		},
	})

	semantics.addOperation<ColumnText>('column', {
		Attribute(name: Node, type: Node, _rest: Node) {
			return { name: name['ident'](), typeText: type.sourceString.trim() }
		},
	})

	semantics.addOperation<[string, string]>('operatorOption', {
		OperatorOption(name: Node, _equals: Node, value: Node) {
			return [name['ident'](), value.sourceString.trim()]
		},
	})

	semantics.addOperation<ReturnsText>('returns', {
		Returns_table(_returns: Node, _table: Node, _open: Node, columns: Node, _close: Node) {
			return {
				columns: columns.asIteration().children.map((column: Node) => column.sourceString.trim()),
				kind: 'table',
			}
		},
		Returns_setof(_returns: Node, _setof: Node, type: Node) {
			return { kind: 'setof', typeText: type.sourceString.trim() }
		},
		Returns_plain(_returns: Node, type: Node) {
			return { kind: 'plain', typeText: type.sourceString.trim() }
		},
	})

	semantics.addOperation<OptionPart>('option', {
		RoutineOption_language(_language: Node, name: Node) {
			return { kind: 'language', language: name['ident']() }
		},
		RoutineOption_dollarBody(_as: Node, body: Node) {
			const tag = /^\$[A-Za-z_0-9]*\$/.exec(body.sourceString)?.[0] ?? '$$'
			return {
				body: undollar(body.sourceString),
				bodyStart: body.source.startIdx + tag.length,
				kind: 'body',
			}
		},
		RoutineOption_stringBody(_as: Node, body: Node) {
			return {
				body: unquote(body.sourceString),
				bodyStart: body.source.startIdx + 1,
				kind: 'body',
			}
		},
		RoutineOption_volatility(word: Node) {
			return { kind: 'volatility', volatility: toVolatility(word.sourceString) }
		},
		RoutineOption_setting(_set: Node, name: Node, _assign: Node, value: Node) {
			const raw = value.sourceString.trim()
			return {
				kind: 'setting',
				name: name['ident'](),
				value: raw.startsWith("'") ? unquote(raw) : raw,
			}
		},
		RoutineOption_other(_word: Node) {
			return { kind: 'other' }
		},
	})

	semantics.addOperation<Definition>('definition', {
		CreateTable(
			create: Node,
			_temporary: Node,
			_table: Node,
			_ifNotExists: Node,
			name: Node,
			_open: Node,
			elements: Node,
			_close: Node,
			_tail: Node
		) {
			const columns = elements
				.asIteration()
				.children.flatMap((element: Node) => element['tableColumns']())
			return { columns, kind: 'table', line: lineOf(create), name: name['ident']() }
		},
		CreateSequence(
			create: Node,
			_temporary: Node,
			_sequence: Node,
			_ifNotExists: Node,
			name: Node,
			_tail: Node
		) {
			return { kind: 'sequence', line: lineOf(create), name: name['ident']() }
		},
		CreateView(
			create: Node,
			_orReplace: Node,
			_temporary: Node,
			_view: Node,
			name: Node,
			columnNames: Node,
			_as: Node,
			query: Node
		) {
			const names = columnNames.children[0]
			return {
				columnNames: names ? names['names']() : null,
				kind: 'view',
				line: lineOf(create),
				name: name['ident'](),
				query: query.sourceString.trim(),
			}
		},
		CreateType_enum(
			_create: Node,
			_type: Node,
			name: Node,
			_as: Node,
			_enum: Node,
			_open: Node,
			labels: Node,
			_close: Node
		) {
			return {
				kind: 'enum',
				labels: labels.asIteration().children.map((label: Node) => unquote(label.sourceString)),
				name: name['ident'](),
			}
		},
		CreateType_composite(
			create: Node,
			_type: Node,
			name: Node,
			_as: Node,
			_open: Node,
			attributes: Node,
			_close: Node
		) {
			return {
				columns: list<ColumnText>(attributes, 'column'),
				kind: 'composite',
				line: lineOf(create),
				name: name['ident'](),
			}
		},
		CreateOperator(
			create: Node,
			_operator: Node,
			name: Node,
			_open: Node,
			options: Node,
			_close: Node
		) {
			const entries = list<[string, string]>(options, 'operatorOption')
			return {
				kind: 'operator',
				line: lineOf(create),
				name: name.sourceString.replace(/^.*\./, ''),
				options: Object.fromEntries(entries.map(([key, value]) => [key.toLowerCase(), value])),
			}
		},
		CreateRoutine(
			create: Node,
			_orReplace: Node,
			word: Node,
			name: Node,
			_open: Node,
			params: Node,
			_close: Node,
			returns: Node,
			options: Node
		) {
			const parts: OptionPart[] = options.children.map((option: Node) => option['option']())
			let language: string | null = null
			let body: string | null = null
			let bodyStart = create.source.startIdx
			let volatility: Volatility | null = null
			const settings: Record<string, string> = {}
			for (const part of parts) {
				switch (part.kind) {
					case 'language':
						language = part.language
						break
					case 'body':
						body = part.body
						bodyStart = part.bodyStart
						break
					case 'volatility':
						volatility = part.volatility
						break
					case 'setting':
						settings[part.name] = part.value
						break
				}
			}
			const returnsNode = returns.children[0]
			return {
				bodyLine: lineAt(create.source.sourceString, bodyStart),
				kind: 'routine',
				line: lineOf(create),
				name: name['ident'](),
				options: { body, language, settings, volatility },
				params: params.asIteration().children.map((param: Node) => param.sourceString.trim()),
				returns: returnsNode ? returnsNode['returns']() : null,
				routineKind: word.sourceString.toLowerCase() === 'procedure' ? 'procedure' : 'function',
				text: this.sourceString,
			}
		},
		Other(_atoms: Node) {
			return { kind: 'other' }
		},
	})

	return semantics
}

const semantics = createSemantics()

// =============================================================================
// LOADING
// =============================================================================

export class ScriptSyntaxError extends Error {
	constructor(
		message: string,
		readonly line: number
	) {
		super(message)
		this.name = 'ScriptSyntaxError'
	}
}

/** A definition the loader could not register or compile. */
export interface ScriptProblem {
	readonly object: string
	/** Script line */
	readonly line: number
	readonly message: string
}

export interface LoadedScript {
	readonly routines: readonly Routine[]
	readonly problems: readonly ScriptProblem[]
}

class DefinitionError extends Error {}

const paramModes: readonly ParamMode[] = ['in', 'out', 'inout', 'variadic']

/**
 * Split a parameter as written (`[mode] [name] type [DEFAULT expr]`). The
 * name is optional, so the text is first tried as a bare type.
 */
function parseParam(catalog: MemoryCatalog, text: string): HeaderParam {
	let rest = text.replace(/\s+default\s+[\s\S]*$/i, '').replace(/\s*=[\s\S]*$/, '').trim()
	let mode: ParamMode = 'in'
	const first = /^\S+/.exec(rest)?.[0].toLowerCase() ?? ''
	const written = paramModes.find((candidate) => candidate === first)
	if (written !== undefined && rest.length > first.length) {
		mode = written
		rest = rest.slice(first.length).trim()
	}

	const bare = catalog.types.resolve(rest)
	if (bare) return { mode, name: null, type: bare }

	const named = /^("(?:[^"]|"")*"|\S+)\s+([\s\S]+)$/.exec(rest)
	const rawName = named?.[1]
	const typeText = named?.[2]
	if (rawName === undefined || typeText === undefined) {
		throw new DefinitionError(`type "${rest}" does not exist`)
	}
	const type = catalog.types.resolve(typeText)
	if (type === null) throw new DefinitionError(`type "${typeText}" does not exist`)
	const name = rawName.startsWith('"')
		? rawName.slice(1, -1).replaceAll('""', '"')
		: rawName.toLowerCase()
	return { mode, name, type }
}

function resolveType(catalog: MemoryCatalog, text: string): TypeRef {
	const type = catalog.types.resolve(text)
	if (type === null) throw new DefinitionError(`type "${text}" does not exist`)
	return type
}

function resolveColumns(catalog: MemoryCatalog, columns: readonly ColumnText[]): Column[] {
	return columns.map((column) => ({
		name: column.name,
		type: resolveType(catalog, column.typeText),
	}))
}

function splitName(qualified: string): { schema: string; name: string } {
	const dot = qualified.lastIndexOf('.')
	if (dot < 0) return { name: qualified, schema: DEFAULT_SCHEMA }
	return { name: qualified.slice(dot + 1), schema: qualified.slice(0, dot) }
}

type RoutineDefinition = Extract<Definition, { kind: 'routine' }>

interface PendingRoutine {
	readonly definition: RoutineDefinition
	readonly header: RoutineHeader
}

/** Result shape of a routine: declared return type, OUT parameters or TABLE columns. */
function routineResult(
	catalog: MemoryCatalog,
	definition: RoutineDefinition,
	params: HeaderParam[]
): { returnType: TypeRef; returnsSet: boolean; columns: TupleShape | null } {
	const returns = definition.returns
	if (returns?.kind === 'table') {
		for (const column of returns.columns) {
			params.push({ ...parseParam(catalog, column), mode: 'out' })
		}
	}
	const outs: Column[] = params
		.filter((param) => param.mode === 'out' || param.mode === 'inout')
		.map((param, index) => ({ name: param.name ?? `column${index + 1}`, type: param.type }))
	const fromOuts = (): TypeRef => {
		const [only] = outs
		if (only && outs.length === 1) return only.type
		return typeRef(outs.length > 1 ? 'record' : 'void')
	}
	const columns = outs.length > 1 ? outs : null

	switch (returns?.kind) {
		case 'table':
			return { columns, returnType: fromOuts(), returnsSet: true }
		case 'setof': {
			const returnType = resolveType(catalog, returns.typeText)
			const shape = columns ?? catalog.types.compositeShape(returnType)
			return { columns: shape, returnType, returnsSet: true }
		}
		case 'plain': {
			const returnType = resolveType(catalog, returns.typeText)
			const shape = columns ?? catalog.types.compositeShape(returnType)
			return { columns: shape, returnType, returnsSet: false }
		}
		default:
			return { columns, returnType: fromOuts(), returnsSet: false }
	}
}

class ScriptLoader {
	private readonly problems: ScriptProblem[] = []
	private readonly pending: PendingRoutine[] = []

	constructor(private readonly catalog: MemoryCatalog) {}

	load(definitions: readonly Definition[]): LoadedScript {
		for (const definition of definitions) {
			try {
				this.register(definition)
			} catch (error) {
				if (!(error instanceof DefinitionError)) throw error
				this.problems.push({
					line: 'line' in definition ? definition.line : 0,
					message: error.message,
					object: 'name' in definition ? definition.name : '',
				})
			}
		}

		const routines: Routine[] = []
		for (const { definition, header } of this.pending) {
			try {
				const routine = compileRoutine(header, this.catalog)
				this.catalog.addRoutine(routine)
				routines.push(routine)
			} catch (error) {
				if (!(error instanceof CompileError)) throw error
				this.problems.push({
					line: definition.bodyLine + error.line - 1,
					message: error.message,
					object: formatSignature(this.catalog, header.name, header.params),
				})
			}
		}
		return { problems: this.problems, routines }
	}

	private register(definition: Definition): void {
		const catalog = this.catalog
		switch (definition.kind) {
			case 'table':
				catalog.addRelation(
					definition.name,
					RelationKind.Table,
					resolveColumns(catalog, definition.columns)
				)
				return
			case 'composite':
				catalog.addRelation(
					definition.name,
					RelationKind.CompositeType,
					resolveColumns(catalog, definition.columns)
				)
				return
			case 'sequence':
				catalog.addRelation(definition.name, RelationKind.Sequence, [
					{ name: 'last_value', type: typeRef('bigint') },
					{ name: 'is_called', type: typeRef('boolean') },
				])
				return
			case 'enum':
				catalog.addEnum(definition.name, definition.labels)
				return
			case 'view':
				this.registerView(definition)
				return
			case 'operator':
				this.registerOperator(definition)
				return
			case 'routine':
				this.registerRoutine(definition)
				return
			case 'other':
				return
		}
	}

	private registerView(definition: Extract<Definition, { kind: 'view' }>): void {
		const result = analyzeSql(this.catalog, {
			mode: 'statement',
			syntheticRelations: [],
			text: definition.query,
			transitionTables: [],
			variables: [],
		})
		if (!result.ok) throw new DefinitionError(result.error.message)
		const names = definition.columnNames
		const columns = result.query.columns.map((column, index) => ({
			name: names?.[index] ?? column.name,
			type: column.type,
		}))
		this.catalog.addRelation(definition.name, RelationKind.View, columns)
	}

	private registerOperator(definition: Extract<Definition, { kind: 'operator' }>): void {
		const catalog = this.catalog
		const options = definition.options
		const side = (key: string): TypeRef | null => {
			const text = options[key]
			return text === undefined ? null : resolveType(catalog, text)
		}
		const functionName = options['function'] ?? options['procedure']
		if (functionName === undefined) {
			throw new DefinitionError('operator function must be specified')
		}
		const left = side('leftarg')
		const right = side('rightarg')
		const implementation = catalog
			.functionsNamed(functionName)
			.find((entry) => entry.params.length === (left ? 1 : 0) + (right ? 1 : 0))
		if (implementation === undefined) {
			throw new DefinitionError(`function ${functionName} does not exist`)
		}
		catalog.addOperator({
			info: {
				builtin: false,
				identity: catalog.allocateIdentity(),
				left,
				name: definition.name,
				right,
				schema: DEFAULT_SCHEMA,
				volatility: implementation.called.volatility,
			},
			result: implementation.returns,
		})
	}

	private registerRoutine(definition: RoutineDefinition): void {
		const catalog = this.catalog
		const params = definition.params
			.filter((text) => text.length > 0)
			.map((text) => parseParam(catalog, text))
		const { columns, returnType, returnsSet } = routineResult(catalog, definition, params)
		const hasOuts = params.some((param) => param.mode === 'out' || param.mode === 'inout')
		if (definition.routineKind === 'function' && definition.returns === null && !hasOuts) {
			throw new DefinitionError('function result type must be specified')
		}

		const { name, schema } = splitName(definition.name)
		const identity = catalog.allocateIdentity()
		const volatility = definition.options.volatility ?? Volatility.Volatile
		const inputs = params.filter((param) => param.mode !== 'out')
		const variadic = inputs.find((param) => param.mode === 'variadic')
		catalog.addFunction({
			aggregate: false,
			called: {
				args: inputs.map((param) => param.type),
				builtin: schema === CATALOG_SCHEMA,
				identity,
				kind: definition.routineKind,
				name,
				schema,
				volatility,
			},
			columns,
			params: inputs.filter((param) => param !== variadic).map((param) => param.type),
			returns: returnType,
			returnsSet,
			variadic: variadic ? (elementOf(variadic.type) ?? variadic.type) : null,
		})

		const body = definition.options.body
		if (body === null) throw new DefinitionError('no function body specified')
		this.pending.push({
			definition,
			header: {
				body,
				fingerprint: createHash('sha1').update(definition.text).digest('hex'),
				identity,
				kind: definition.routineKind,
				language: definition.options.language ?? 'sql',
				name,
				params,
				returnType,
				returnsSet,
				schema,
				settings: definition.options.settings,
				volatility,
			},
		})
	}
}

/**
 * Register every object of a definition script in the catalog and compile
 * its routines.
 *
 * @throws ScriptSyntaxError when the script cannot be split into statements
 */
export function loadScript(catalog: MemoryCatalog, text: string): LoadedScript {
	const match = ScriptGrammar.match(text)
	if (match.failed()) {
		const position = /Line (\d+), col \d+/.exec(match.shortMessage ?? '')
		throw new ScriptSyntaxError(
			match.shortMessage ?? 'syntax error',
			position ? Number(position[1]) : 1
		)
	}
	return new ScriptLoader(catalog).load(semantics(match)['definitions']())
}
