/**
 * Static checker for procedural SQL routines.
 *
 * The checker walks a compiled routine body, resolves every embedded
 * expression and query through a `CatalogBridge`, and reports diagnostics.
 * An in-process host lives under the `./memory` entry point.
 */

export { type CheckedCache, MemoryCheckedCache } from './check/cache.ts'
export {
	type CheckRequest,
	type CheckResult,
	checkRoutine,
	mustReturn,
	resolveRoutine,
} from './check/checker.ts'
export {
	type Dependency,
	DependencyCollector,
	type DependencyKind,
} from './check/dependencies.ts'
export {
	CHECK_MODES,
	type CheckerProfile,
	type CheckMode,
	type CheckOptions,
	type CheckOptionsInput,
	DEFAULT_CHECK_OPTIONS,
	DEFAULT_PROFILE,
	DEFAULT_SUBSTITUTIONS,
	type HeuristicOptions,
	isOutputFormat,
	OUTPUT_FORMATS,
	type OutputFormat,
	profileForRoutine,
	resolveOptions,
	type TransitionTableNames,
	type WarningCategories,
	type WarningCategory,
} from './check/options.ts'
export { PassiveChecker, type PassiveCheckerOptions } from './check/passive.ts'
export { type ParsedPragma, type PragmaDirective, parsePragma } from './check/pragma.ts'
export * from './core/index.ts'
export * from './host/index.ts'
export * from './profile/index.ts'
export * from './report/index.ts'
