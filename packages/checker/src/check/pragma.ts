/**
 * Inline directives.
 *
 * A directive travels as a string argument of the marker function
 * `plcheck_pragma(...)`, called by a PERFORM statement or used as a
 * declaration's default value. Toggles last to the end of the enclosing
 * block; in the top block's declaration section they cover the whole run.
 * Shapes and synthetic relations stay for the rest of the run.
 */

import type { Node } from 'ohm-js'
import * as ohm from 'ohm-js'
import { keywordGrammar } from '../core/grammar.ts'
import { RelationKind, type TupleShape, type TypeRef } from '../host/types.ts'
import type { WarningCategory } from './options.ts'
import { assignTupdesc } from './records.ts'
import type { CheckState } from './state.ts'

// =============================================================================
// DIRECTIVES
// =============================================================================

export type PragmaFeature =
	| 'check'
	| 'other_warnings'
	| 'extra_warnings'
	| 'performance_warnings'
	| 'security_warnings'
	| 'compatibility_warnings'

const FEATURES: readonly PragmaFeature[] = [
	'check',
	'other_warnings',
	'extra_warnings',
	'performance_warnings',
	'security_warnings',
	'compatibility_warnings',
]

const featureCategory: Readonly<Record<PragmaFeature, WarningCategory | null>> = {
	check: null,
	compatibility_warnings: 'compatibility',
	extra_warnings: 'extra',
	other_warnings: 'other',
	performance_warnings: 'performance',
	security_warnings: 'security',
}

export interface FieldSpec {
	readonly name: string
	readonly type: string
}

export type PragmaAction =
	| { readonly kind: 'enable' | 'disable' | 'status'; readonly feature: string }
	| {
			readonly kind: 'type'
			readonly target: readonly string[]
			readonly fields: readonly FieldSpec[] | null
			readonly typeName: string | null
	  }
	| {
			readonly kind: 'table'
			readonly name: readonly string[]
			readonly columns: readonly FieldSpec[] | null
			readonly like: readonly string[] | null
	  }
	| { readonly kind: 'sequence'; readonly name: readonly string[] }
	| { readonly kind: 'echo'; readonly text: string }

export type PragmaScope = 'block' | 'routine'

export interface PragmaDirective {
	readonly scope: PragmaScope
	readonly action: PragmaAction
}

const grammarSource = String.raw`
PlcheckPragma {
  Directive = Toggle | TypeHint | TableDef | SequenceDef | Echo

  Toggle = toggleVerb ":" ident
  toggleVerb = kw<"enable"> | kw<"disable"> | kw<"status">

  TypeHint = kw<"type"> ":" QualifiedName TypeSpec
  TypeSpec = "(" NonemptyListOf<Field, ","> ")"  -- fields
           | typeName                            -- named

  TableDef = kw<"table"> ":" QualifiedName "(" TableBody ")"
  TableBody = kw<"like"> QualifiedName           -- like
            | NonemptyListOf<Field, ",">         -- columns

  SequenceDef = kw<"sequence"> ":" QualifiedName

  Echo = kw<"echo"> ":" echoText
  echoText = any*

  Field = ident typeName
  QualifiedName = NonemptyListOf<ident, ".">

  typeName = typePart+
  typePart = "(" (~")" any)* ")"  -- modifier
           | ~("," | ")" | "(") any  -- char

  Marker = (kw<"select">)? MarkerName "(" ListOf<stringLit, ","> ")" ";"?
  MarkerName = (ident ".")? kw<"plcheck_pragma">

  stringLit = "'" stringChar* "'"
  stringChar = "''"  -- quote
             | ~"'" any  -- char

  kw<word> = word ~identPart
  ident = quotedIdent | plainIdent
  plainIdent = identStart identPart*
  quotedIdent = "\"" quotedChar* "\""
  quotedChar = "\"\""  -- quote
             | ~"\"" any  -- char
  identStart = letter | "_"
  identPart = alnum | "_" | "$"
}
`

const PragmaGrammar = keywordGrammar(grammarSource)

function identText(node: Node): string {
	return node['ident']()
}

function createSemantics(): ohm.Semantics {
	const semantics = PragmaGrammar.createSemantics()

	semantics.addOperation<string>('ident', {
		ident(inner: Node) {
			return inner['ident']()
		},
		plainIdent(_start: Node, _rest: Node) {
			return this.sourceString.toLowerCase()
		},
		quotedIdent(_open: Node, chars: Node, _close: Node) {
			return chars.sourceString.replaceAll('""', '"')
		},
	})

	semantics.addOperation<string[]>('names', {
		QualifiedName(list: Node) {
			return list.asIteration().children.map(identText)
		},
	})

	semantics.addOperation<FieldSpec>('field', {
		Field(name: Node, type: Node) {
			return { name: identText(name), type: type.sourceString.trim() }
		},
	})

	semantics.addOperation<string>('literal', {
		stringLit(_open: Node, chars: Node, _close: Node) {
			return chars.sourceString.replaceAll("''", "'")
		},
	})

	semantics.addOperation<string[]>('markerArgs', {
		Marker(_select: Node, _name: Node, _open: Node, args: Node, _close: Node, _semi: Node) {
			return args.asIteration().children.map((arg: Node) => arg['literal']())
		},
	})

	semantics.addOperation<PragmaAction>('action', {
		Directive(inner: Node) {
			return inner['action']()
		},
		Echo(_kw: Node, _colon: Node, text: Node) {
			return { kind: 'echo', text: text.sourceString.trim() }
		},
		SequenceDef(_kw: Node, _colon: Node, name: Node) {
			return { kind: 'sequence', name: name['names']() }
		},
		TableDef(_kw: Node, _colon: Node, name: Node, _open: Node, body: Node, _close: Node) {
			return { kind: 'table', name: name['names'](), ...body['tableBody']() }
		},
		Toggle(verb: Node, _colon: Node, feature: Node) {
			const kind = verb.sourceString.toLowerCase()
			const verbKind = kind === 'enable' ? 'enable' : kind === 'disable' ? 'disable' : 'status'
			return { feature: identText(feature), kind: verbKind }
		},
		TypeHint(_kw: Node, _colon: Node, target: Node, spec: Node) {
			return { kind: 'type', target: target['names'](), ...spec['typeSpec']() }
		},
	})

	semantics.addOperation<{ columns: FieldSpec[] | null; like: string[] | null }>('tableBody', {
		TableBody_columns(list: Node) {
			return { columns: list.asIteration().children.map((f: Node) => f['field']()), like: null }
		},
		TableBody_like(_kw: Node, name: Node) {
			return { columns: null, like: name['names']() }
		},
	})

	semantics.addOperation<{ fields: FieldSpec[] | null; typeName: string | null }>('typeSpec', {
		TypeSpec_fields(_open: Node, list: Node, _close: Node) {
			return { fields: list.asIteration().children.map((f: Node) => f['field']()), typeName: null }
		},
		TypeSpec_named(name: Node) {
			return { fields: null, typeName: name.sourceString.trim() }
		},
	})

	return semantics
}

const semantics = createSemantics()

export type ParsedPragma =
	| { readonly ok: true; readonly action: PragmaAction }
	| { readonly ok: false; readonly reason: string }

/**
 * Parse one directive string.
 */
export function parsePragma(text: string): ParsedPragma {
	const match = PragmaGrammar.match(text, 'Directive')
	if (match.failed()) {
		return { ok: false, reason: match.shortMessage ?? 'syntax error' }
	}
	return { action: semantics(match)['action'](), ok: true }
}

/**
 * Directive strings carried by a marker call, or null when the SQL text is
 * not a marker call.
 */
export function markerArguments(sql: string): string[] | null {
	const match = PragmaGrammar.match(sql, 'Marker')
	if (match.failed()) return null
	return semantics(match)['markerArgs']()
}

// =============================================================================
// SCOPED TOGGLES
// =============================================================================

/** Feature toggles set by directives; absent features follow the run options. */
export type PragmaVector = Partial<Record<PragmaFeature, boolean>>

export class PragmaStack {
	private readonly frames: PragmaVector[] = [{}]

	push(): void {
		this.frames.push({ ...this.current() })
	}

	pop(): void {
		if (this.frames.length > 1) this.frames.pop()
	}

	current(): PragmaVector {
		const top = this.frames[this.frames.length - 1]
		if (top === undefined) throw new Error('pragma stack is empty')
		return top
	}

	set(feature: PragmaFeature, enabled: boolean, scope: PragmaScope): void {
		if (scope === 'routine') {
			for (const frame of this.frames) frame[feature] = enabled
			return
		}
		this.current()[feature] = enabled
	}

	clear(): void {
		this.frames.length = 0
		this.frames.push({})
	}
}

export function isFeature(value: string): value is PragmaFeature {
	return FEATURES.some((feature) => feature === value)
}

export function categoryFeature(category: WarningCategory): PragmaFeature {
	const found = FEATURES.find((feature) => featureCategory[feature] === category)
	if (found === undefined) throw new Error(`no pragma feature for ${category}`)
	return found
}

export function isFeatureEnabled(state: CheckState, feature: PragmaFeature): boolean {
	const toggled = state.pragmas.current()[feature]
	if (toggled !== undefined) return toggled
	const category = featureCategory[feature]
	return category === null ? true : state.options.warnings[category]
}

// =============================================================================
// APPLICATION
// =============================================================================

function invalid(state: CheckState, text: string, reason: string): void {
	state.report('PCPRAGMA001', { reason, text })
}

function resolveFields(
	state: CheckState,
	text: string,
	specs: readonly FieldSpec[]
): TupleShape | null {
	const fields: { name: string; type: TypeRef }[] = []
	for (const spec of specs) {
		const type = state.types.resolve(spec.type)
		if (type === null) {
			invalid(state, text, `type "${spec.type}" does not exist`)
			return null
		}
		fields.push({ name: spec.name, type })
	}
	return fields
}

function applyTypeHint(
	state: CheckState,
	text: string,
	action: Extract<PragmaAction, { kind: 'type' }>
): void {
	const slot = state.lookupVariable(action.target)
	if (slot === null) {
		invalid(state, text, `variable "${action.target.join('.')}" does not exist`)
		return
	}
	const datum = state.datum(slot)
	if (datum.template.kind !== 'rec') {
		invalid(state, text, `variable "${datum.template.name}" is not a record`)
		return
	}
	let shape: TupleShape | null = null
	if (action.fields) {
		shape = resolveFields(state, text, action.fields)
	} else if (action.typeName !== null) {
		const type = state.types.resolve(action.typeName)
		shape = type ? state.types.compositeShape(type) : null
		if (shape === null) {
			invalid(state, text, `type "${action.typeName}" is not a composite type`)
			return
		}
	}
	if (shape) assignTupdesc(state, slot, shape, 'pragma')
}

function applyTable(
	state: CheckState,
	text: string,
	action: Extract<PragmaAction, { kind: 'table' }>
): void {
	let columns: TupleShape | null = null
	if (action.like) {
		const source = state.findRelation(action.like.join('.'))
		if (!source) {
			invalid(state, text, `relation "${action.like.join('.')}" does not exist`)
			return
		}
		columns = source.columns
	} else if (action.columns) {
		columns = resolveFields(state, text, action.columns)
	}
	if (columns) state.registerRelation(action.name, RelationKind.Table, columns)
}

function expandEcho(state: CheckState, text: string): string {
	const routine = state.routine
	return text
		.replaceAll('@@id', String(routine.identity))
		.replaceAll('@@name', routine.name)
		.replaceAll('@@signature', routine.signature)
}

function applyAction(state: CheckState, text: string, directive: PragmaDirective): void {
	const action = directive.action
	switch (action.kind) {
		case 'enable':
		case 'disable':
		case 'status': {
			const feature = action.feature
			if (!isFeature(feature)) {
				invalid(state, text, `unknown feature "${feature}"`)
				return
			}
			if (action.kind === 'status') {
				const enabled = isFeatureEnabled(state, feature)
				state.notice(`${feature} is ${enabled ? 'enabled' : 'disabled'}`)
				return
			}
			state.pragmas.set(feature, action.kind === 'enable', directive.scope)
			return
		}
		case 'type':
			applyTypeHint(state, text, action)
			return
		case 'table':
			applyTable(state, text, action)
			return
		case 'sequence':
			state.registerRelation(action.name, RelationKind.Sequence, [])
			return
		case 'echo':
			state.notice(expandEcho(state, action.text))
			return
	}
}

/**
 * Apply every directive of a marker call. Returns false when the SQL text
 * is not a marker call at all.
 */
export function applyMarker(state: CheckState, sql: string, scope: PragmaScope): boolean {
	const args = markerArguments(sql)
	if (args === null) return false
	for (const text of args) {
		const parsed = parsePragma(text)
		if (!parsed.ok) {
			invalid(state, text, parsed.reason)
			continue
		}
		applyAction(state, text, { action: parsed.action, scope })
	}
	return true
}
