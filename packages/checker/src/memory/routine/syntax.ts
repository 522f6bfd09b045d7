/**
 * Unresolved parse tree of a routine body. Variables are still names and
 * statements carry no ids; the compiler turns this into a host `Routine`.
 */

import type { ConditionRef, RaiseLevel, SqlFragment } from '../../host/ast.ts'

/** Dotted variable reference as written, lower-cased unless quoted. */
export type Target = readonly string[]

// =============================================================================
// DECLARATIONS
// =============================================================================

export interface VariableDecl {
	readonly kind: 'variable'
	readonly name: string
	readonly line: number
	readonly isConst: boolean
	/** Type as written, including `%TYPE` / `%ROWTYPE` suffixes */
	readonly typeText: string
	readonly notNull: boolean
	readonly defaultExpr: SqlFragment | null
}

export interface AliasDecl {
	readonly kind: 'alias'
	readonly name: string
	readonly line: number
	/** `$n` or a parameter name */
	readonly target: string
}

export interface CursorArg {
	readonly name: string
	readonly typeText: string
}

export interface CursorDecl {
	readonly kind: 'cursor'
	readonly name: string
	readonly line: number
	readonly args: readonly CursorArg[]
	readonly query: SqlFragment
}

export type Declaration = VariableDecl | AliasDecl | CursorDecl

// =============================================================================
// STATEMENTS
// =============================================================================

interface Base {
	readonly line: number
}

export interface Handler {
	readonly line: number
	readonly conditions: readonly ConditionRef[]
	readonly body: readonly Statement[]
}

export interface Block extends Base {
	readonly kind: 'block'
	readonly label: string | null
	readonly declarations: readonly Declaration[]
	readonly body: readonly Statement[]
	readonly handlers: readonly Handler[] | null
}

export interface Into {
	readonly targets: readonly Target[]
	readonly strict: boolean
}

interface Loop extends Base {
	readonly label: string | null
	readonly body: readonly Statement[]
}

export type Statement =
	| Block
	| (Base & { readonly kind: 'assign'; readonly target: Target; readonly expr: SqlFragment })
	| (Base & {
			readonly kind: 'if'
			readonly cond: SqlFragment
			readonly then: readonly Statement[]
			readonly elsifs: readonly {
				readonly line: number
				readonly cond: SqlFragment
				readonly body: readonly Statement[]
			}[]
			readonly otherwise: readonly Statement[] | null
	  })
	| (Base & {
			readonly kind: 'case'
			readonly subject: SqlFragment | null
			readonly whens: readonly {
				readonly line: number
				readonly expr: SqlFragment
				readonly body: readonly Statement[]
			}[]
			readonly otherwise: readonly Statement[] | null
	  })
	| (Loop & { readonly kind: 'loop' })
	| (Loop & { readonly kind: 'while'; readonly cond: SqlFragment })
	| (Loop & {
			readonly kind: 'fori'
			readonly variable: string
			readonly lower: SqlFragment
			readonly upper: SqlFragment
			readonly step: SqlFragment | null
			readonly reverse: boolean
	  })
	| (Loop & {
			readonly kind: 'fors'
			readonly targets: readonly Target[]
			readonly query: SqlFragment
	  })
	| (Loop & {
			readonly kind: 'forc'
			readonly target: string
			readonly cursor: string
			readonly args: readonly SqlFragment[] | null
	  })
	| (Loop & {
			readonly kind: 'dynfors'
			readonly targets: readonly Target[]
			readonly query: SqlFragment
			readonly params: readonly SqlFragment[]
	  })
	| (Loop & {
			readonly kind: 'foreach'
			readonly targets: readonly Target[]
			readonly slice: number
			readonly expr: SqlFragment
	  })
	| (Base & {
			readonly kind: 'exit'
			readonly isExit: boolean
			readonly label: string | null
			readonly cond: SqlFragment | null
	  })
	| (Base & { readonly kind: 'return'; readonly expr: SqlFragment | null })
	| (Base & { readonly kind: 'return_next'; readonly expr: SqlFragment | null })
	| (Base & {
			readonly kind: 'return_query'
			readonly query: SqlFragment | null
			readonly dynamic: SqlFragment | null
			readonly params: readonly SqlFragment[]
	  })
	| (Base & {
			readonly kind: 'raise'
			readonly level: RaiseLevel
			readonly condition: ConditionRef | null
			readonly message: string | null
			readonly params: readonly SqlFragment[]
			readonly options: readonly { readonly name: string; readonly expr: SqlFragment }[]
			readonly reraise: boolean
	  })
	| (Base & {
			readonly kind: 'assert'
			readonly cond: SqlFragment
			readonly message: SqlFragment | null
	  })
	| (Base & { readonly kind: 'sql'; readonly query: SqlFragment })
	| (Base & {
			readonly kind: 'dynexecute'
			readonly query: SqlFragment
			readonly into: Into | null
			readonly params: readonly SqlFragment[]
	  })
	| (Base & { readonly kind: 'perform'; readonly query: SqlFragment })
	| (Base & {
			readonly kind: 'open'
			readonly cursor: string
			readonly args: readonly SqlFragment[] | null
			readonly query: SqlFragment | null
			readonly dynamic: SqlFragment | null
			readonly params: readonly SqlFragment[]
	  })
	| (Base & {
			readonly kind: 'fetch'
			readonly cursor: string
			readonly targets: readonly Target[]
			readonly isMove: boolean
	  })
	| (Base & { readonly kind: 'close'; readonly cursor: string })
	| (Base & {
			readonly kind: 'getdiag'
			readonly stacked: boolean
			readonly items: readonly { readonly target: Target; readonly item: string }[]
	  })
	| (Base & { readonly kind: 'commit' })
	| (Base & { readonly kind: 'rollback' })
	| (Base & { readonly kind: 'call'; readonly query: SqlFragment })
	| (Base & { readonly kind: 'null' })
