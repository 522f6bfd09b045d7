/**
 * Run options and process-wide checker profile.
 */

export type OutputFormat = 'text' | 'tabular' | 'json' | 'xml'

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'tabular', 'json', 'xml']

export function isOutputFormat(value: string): value is OutputFormat {
	return OUTPUT_FORMATS.some((format) => format === value)
}

/** Warning categories that can be switched on and off. */
export type WarningCategory = 'other' | 'extra' | 'performance' | 'security' | 'compatibility'

export type WarningCategories = Readonly<Record<WarningCategory, boolean>>

/**
 * Tuning of the best-effort heuristics. Neither is a sound analysis.
 */
export interface HeuristicOptions {
	/** Functions whose result is trusted inside dynamic SQL text */
	readonly sanitizers: readonly string[]
	/** Report columns implicitly cast to a variable's type in WHERE */
	readonly implicitCasts: boolean
}

export interface TransitionTableNames {
	readonly newTable: string | null
	readonly oldTable: string | null
}

export interface CheckOptions {
	readonly warnings: WarningCategories
	readonly fatalErrors: boolean
	readonly format: OutputFormat
	/** Polymorphic type name to concrete type name */
	readonly substitutions: Readonly<Record<string, string>>
	readonly transitionTables: TransitionTableNames
	readonly heuristics: HeuristicOptions
	readonly signal: AbortSignal | null
}

export interface CheckOptionsInput {
	readonly warnings?: Partial<WarningCategories>
	readonly fatalErrors?: boolean
	readonly format?: OutputFormat
	readonly substitutions?: Readonly<Record<string, string>>
	readonly transitionTables?: Partial<TransitionTableNames>
	readonly heuristics?: Partial<HeuristicOptions>
	readonly signal?: AbortSignal
}

export const DEFAULT_SUBSTITUTIONS: Readonly<Record<string, string>> = {
	anyarray: 'integer[]',
	anycompatible: 'integer',
	anycompatiblearray: 'integer[]',
	anycompatiblenonarray: 'integer',
	anyelement: 'integer',
	anynonarray: 'integer',
}

export const DEFAULT_CHECK_OPTIONS: CheckOptions = {
	fatalErrors: false,
	format: 'text',
	heuristics: {
		implicitCasts: true,
		sanitizers: ['quote_ident', 'quote_literal', 'quote_nullable'],
	},
	signal: null,
	substitutions: DEFAULT_SUBSTITUTIONS,
	transitionTables: { newTable: null, oldTable: null },
	warnings: {
		compatibility: false,
		extra: true,
		other: true,
		performance: false,
		security: false,
	},
}

export function resolveOptions(input: CheckOptionsInput = {}): CheckOptions {
	const base = DEFAULT_CHECK_OPTIONS
	return {
		fatalErrors: input.fatalErrors ?? base.fatalErrors,
		format: input.format ?? base.format,
		heuristics: { ...base.heuristics, ...input.heuristics },
		signal: input.signal ?? null,
		substitutions: { ...base.substitutions, ...input.substitutions },
		transitionTables: { ...base.transitionTables, ...input.transitionTables },
		warnings: { ...base.warnings, ...input.warnings },
	}
}

// =============================================================================
// PROCESS-WIDE PROFILE
// =============================================================================

/**
 * When routines are checked without an explicit request.
 * - `disabled`: never, and explicit requests report "not checked"
 * - `by_function`: only on explicit request
 * - `fresh_start`: on the first call of each routine version
 * - `every_start`: on every call
 */
export type CheckMode = 'disabled' | 'by_function' | 'fresh_start' | 'every_start'

export const CHECK_MODES: readonly CheckMode[] = [
	'disabled',
	'by_function',
	'fresh_start',
	'every_start',
]

export interface CheckerProfile {
	readonly mode: CheckMode
	readonly warnings: WarningCategories
	readonly fatalErrors: boolean
}

export const DEFAULT_PROFILE: CheckerProfile = {
	fatalErrors: false,
	mode: 'by_function',
	warnings: DEFAULT_CHECK_OPTIONS.warnings,
}

const SETTING_PREFIX = 'plcheck.'

const settingToCategory: Readonly<Record<string, WarningCategory>> = {
	compatibility_warnings: 'compatibility',
	extra_warnings: 'extra',
	other_warnings: 'other',
	performance_warnings: 'performance',
	security_warnings: 'security',
}

function parseBoolean(value: string): boolean | null {
	switch (value.trim().toLowerCase()) {
		case 'on':
		case 'true':
		case 'yes':
		case '1':
			return true
		case 'off':
		case 'false':
		case 'no':
		case '0':
			return false
		default:
			return null
	}
}

function isCheckMode(value: string): value is CheckMode {
	return CHECK_MODES.some((mode) => mode === value)
}

/**
 * Apply a routine's own `plcheck.*` settings on top of the process profile.
 * Unrecognized settings and values are ignored.
 */
export function profileForRoutine(
	profile: CheckerProfile,
	settings: Readonly<Record<string, string>>
): CheckerProfile {
	let mode = profile.mode
	let fatalErrors = profile.fatalErrors
	const warnings: Record<WarningCategory, boolean> = { ...profile.warnings }

	for (const [key, value] of Object.entries(settings)) {
		if (!key.startsWith(SETTING_PREFIX)) continue
		const name = key.slice(SETTING_PREFIX.length)
		if (name === 'mode') {
			const normalized = value.trim().toLowerCase()
			if (isCheckMode(normalized)) mode = normalized
			continue
		}
		const flag = parseBoolean(value)
		if (flag === null) continue
		if (name === 'fatal_errors') {
			fatalErrors = flag
			continue
		}
		const category = settingToCategory[name]
		if (category !== undefined) warnings[category] = flag
	}

	return { fatalErrors, mode, warnings }
}
