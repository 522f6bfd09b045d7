export { MemoryBridge } from './bridge.ts'
export { DEFAULT_SCHEMA, type FunctionEntry, MemoryCatalog, type OperatorEntry } from './catalog.ts'
export {
	CompileError,
	compileRoutine,
	formatSignature,
	type HeaderParam,
	PROCEDURAL_LANGUAGE,
	type RoutineHeader,
} from './routine/compiler.ts'
export { extractInto } from './routine/into.ts'
export { parseRoutineBody, RoutineSyntaxError } from './routine/parser.ts'
export { type LoadedScript, loadScript, type ScriptProblem, ScriptSyntaxError } from './script.ts'
export { analyzeSql } from './sql/analyzer.ts'
export { parseExpression, parseStatement } from './sql/parser.ts'
export { MemoryTypeSystem } from './types.ts'
