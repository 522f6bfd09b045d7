/**
 * Checker diagnostic definitions.
 *
 * Code format: PC<AREA><NUMBER>
 * - PCSQL: embedded SQL resolution (passthrough and call checks)
 * - PCFLOW: control flow and statement structure
 * - PCTYPE: assignment and return typing
 * - PCREC: records, rows and INTO targets
 * - PCCUR: cursors
 * - PCDYN: dynamic SQL
 * - PCSEC: security heuristics
 * - PCPERF: performance heuristics
 * - PCCOMPAT: compatibility
 * - PCDECL: declarations and variable usage
 * - PCPRAGMA: inline directives
 */

import { type DiagnosticDef, DiagnosticLevel } from './types.ts'

// =============================================================================
// EMBEDDED SQL (PCSQL001-099)
// =============================================================================

export const PCSQL001: DiagnosticDef = {
	code: 'PCSQL001',
	description:
		'The host rejected an embedded query or expression while resolving names and types. The message, condition code and position come from the host unchanged.',
	level: DiagnosticLevel.Error,
	message: '{message}',
	sqlstate: 'XX000',
}

export const PCSQL002: DiagnosticDef = {
	code: 'PCSQL002',
	description: 'Checking a statement failed for a reason the host did not classify.',
	level: DiagnosticLevel.Error,
	message: 'internal error while checking statement: {reason}',
	sqlstate: 'XX000',
}

export const PCSQL003: DiagnosticDef = {
	code: 'PCSQL003',
	description:
		'Sequence functions such as nextval take a relation argument. A constant argument naming a table or view fails at run time.',
	level: DiagnosticLevel.Error,
	message: '"{name}" is not a sequence',
	sqlstate: '42809',
}

export const PCSQL004: DiagnosticDef = {
	code: 'PCSQL004',
	description: 'The constant format string has more placeholders than the call supplies arguments.',
	level: DiagnosticLevel.Error,
	message: 'too few arguments for format()',
	sqlstate: '22023',
}

export const PCSQL005: DiagnosticDef = {
	code: 'PCSQL005',
	description: 'Some arguments of a format() call are not referenced by its constant format string.',
	level: DiagnosticLevel.WarningOther,
	message: 'unused parameters of function "format"',
	sqlstate: '00000',
}

export const PCSQL006: DiagnosticDef = {
	code: 'PCSQL006',
	description:
		'Routines run inside the caller transaction. Transaction control statements are rejected inside a routine body.',
	hint: 'Use a BEGIN block with an EXCEPTION clause instead.',
	level: DiagnosticLevel.Error,
	message: 'cannot begin/end transactions in a routine',
	sqlstate: '0A000',
}

// =============================================================================
// CONTROL FLOW (PCFLOW001-099)
// =============================================================================

export const PCFLOW001: DiagnosticDef = {
	code: 'PCFLOW001',
	description: 'Every path before this statement leaves the block, so the statement never runs.',
	level: DiagnosticLevel.WarningExtra,
	message: 'unreachable code',
	sqlstate: '00000',
}

export const PCFLOW002: DiagnosticDef = {
	code: 'PCFLOW002',
	description: 'No path through the function body ends in RETURN or an exception.',
	level: DiagnosticLevel.Error,
	message: 'control reached end of function without RETURN',
	sqlstate: '2F005',
}

export const PCFLOW003: DiagnosticDef = {
	code: 'PCFLOW003',
	description: 'Some paths through the function body end without RETURN.',
	level: DiagnosticLevel.WarningExtra,
	message: 'control reached end of function without RETURN',
	sqlstate: '2F005',
}

export const PCFLOW004: DiagnosticDef = {
	code: 'PCFLOW004',
	description: 'EXIT and CONTINUE can only name a label of an enclosing block or loop.',
	level: DiagnosticLevel.Error,
	message: 'label "{label}" does not exist',
	sqlstate: '42601',
}

export const PCFLOW005: DiagnosticDef = {
	code: 'PCFLOW005',
	description: 'CONTINUE restarts a loop, so its label must belong to a loop.',
	level: DiagnosticLevel.Error,
	message: 'block label "{label}" cannot be used in CONTINUE',
	sqlstate: '42601',
}

export const PCFLOW006: DiagnosticDef = {
	code: 'PCFLOW006',
	description: 'An unlabeled EXIT or CONTINUE needs an enclosing loop.',
	level: DiagnosticLevel.Error,
	message: '{statement} cannot be used outside a loop',
	sqlstate: '42601',
}

export const PCFLOW007: DiagnosticDef = {
	code: 'PCFLOW007',
	description: 'The RAISE format string has more % placeholders than the statement passes values.',
	level: DiagnosticLevel.Error,
	message: 'too few parameters specified for RAISE',
	sqlstate: '42601',
}

export const PCFLOW008: DiagnosticDef = {
	code: 'PCFLOW008',
	description: 'The RAISE statement passes more values than its format string has placeholders.',
	level: DiagnosticLevel.Error,
	message: 'too many parameters specified for RAISE',
	sqlstate: '42601',
}

export const PCFLOW009: DiagnosticDef = {
	code: 'PCFLOW009',
	description: 'Each RAISE USING option may appear once.',
	level: DiagnosticLevel.Error,
	message: 'RAISE option already specified: {option}',
	sqlstate: '42601',
}

export const PCFLOW010: DiagnosticDef = {
	code: 'PCFLOW010',
	description: 'COMMIT and ROLLBACK are only allowed in procedures.',
	level: DiagnosticLevel.Error,
	message: 'invalid transaction termination',
	sqlstate: '2D000',
}

export const PCFLOW011: DiagnosticDef = {
	code: 'PCFLOW011',
	description: 'The exception condition name is not known to the host.',
	level: DiagnosticLevel.Error,
	message: 'unrecognized exception condition "{name}"',
	sqlstate: '42704',
}

export const PCFLOW012: DiagnosticDef = {
	code: 'PCFLOW012',
	description: 'A bare RAISE re-throws the current exception and needs an enclosing handler.',
	level: DiagnosticLevel.Error,
	message: 'RAISE without parameters cannot be used outside an exception handler',
	sqlstate: '0Z002',
}

// =============================================================================
// TYPING (PCTYPE001-099)
// =============================================================================

export const PCTYPE001: DiagnosticDef = {
	code: 'PCTYPE001',
	description: 'A row value is assigned to a scalar variable.',
	level: DiagnosticLevel.Error,
	message: 'cannot cast composite value to a scalar type',
	sqlstate: '42804',
}

export const PCTYPE002: DiagnosticDef = {
	code: 'PCTYPE002',
	description: 'A scalar value is assigned to a row or record variable.',
	level: DiagnosticLevel.Error,
	message: 'cannot assign scalar variable to composite target',
	sqlstate: '42804',
}

export const PCTYPE003: DiagnosticDef = {
	code: 'PCTYPE003',
	description: 'The host has no cast from the source type to the target type, so the assignment fails at run time.',
	detail: 'cast "{source}" value to "{target}" type',
	hint: 'There are no possible explicit coercion between those types, possibly bug!',
	level: DiagnosticLevel.WarningOther,
	message: 'target type is different type than source type',
	sqlstate: '42804',
}

export const PCTYPE004: DiagnosticDef = {
	code: 'PCTYPE004',
	description: 'The types can only be converted with an explicit cast.',
	detail: 'cast "{source}" value to "{target}" type',
	hint: 'The input expression type does not have an assignment cast to the target type.',
	level: DiagnosticLevel.WarningOther,
	message: 'target type is different type than source type',
	sqlstate: '42804',
}

export const PCTYPE005: DiagnosticDef = {
	code: 'PCTYPE005',
	description: 'The assignment works through a hidden cast that runs on every execution.',
	detail: 'cast "{source}" value to "{target}" type',
	hint: 'Hidden casting can be a performance issue.',
	level: DiagnosticLevel.WarningPerformance,
	message: 'target type is different type than source type',
	sqlstate: '42804',
}

export const PCTYPE006: DiagnosticDef = {
	code: 'PCTYPE006',
	description: 'The function returns a composite type but RETURN gives a scalar value.',
	level: DiagnosticLevel.Error,
	message: 'cannot return non-composite value from function returning composite type',
	sqlstate: '42804',
}

export const PCTYPE007: DiagnosticDef = {
	code: 'PCTYPE007',
	description: 'RETURN QUERY produces columns that differ from the declared result.',
	level: DiagnosticLevel.Error,
	message: 'structure of query does not match function result type',
	sqlstate: '42804',
}

export const PCTYPE008: DiagnosticDef = {
	code: 'PCTYPE008',
	description: 'The returned row differs from the declared result row.',
	level: DiagnosticLevel.Error,
	message: 'returned record type does not match expected record type',
	sqlstate: '42804',
}

export const PCTYPE009: DiagnosticDef = {
	code: 'PCTYPE009',
	description: 'RETURN NEXT appends to a result set and needs a SETOF function.',
	level: DiagnosticLevel.Error,
	message: 'cannot use RETURN NEXT in a non-SETOF function',
	sqlstate: '42804',
}

export const PCTYPE010: DiagnosticDef = {
	code: 'PCTYPE010',
	description: 'RETURN QUERY appends to a result set and needs a SETOF function.',
	level: DiagnosticLevel.Error,
	message: 'cannot use RETURN QUERY in a non-SETOF function',
	sqlstate: '42804',
}

export const PCTYPE011: DiagnosticDef = {
	code: 'PCTYPE011',
	description: 'A function returning void, or one with output parameters, ends with a bare RETURN.',
	level: DiagnosticLevel.Error,
	message: 'RETURN cannot have a parameter in function returning void',
	sqlstate: '42804',
}

export const PCTYPE012: DiagnosticDef = {
	code: 'PCTYPE012',
	description: 'A set-returning function builds its result with RETURN NEXT or RETURN QUERY.',
	hint: 'Use RETURN NEXT or RETURN QUERY.',
	level: DiagnosticLevel.Error,
	message: 'RETURN cannot have a parameter in function returning set',
	sqlstate: '42804',
}

export const PCTYPE013: DiagnosticDef = {
	code: 'PCTYPE013',
	description: 'Procedures return through output parameters only.',
	level: DiagnosticLevel.Error,
	message: 'RETURN cannot have a parameter in a procedure',
	sqlstate: '42804',
}

export const PCTYPE014: DiagnosticDef = {
	code: 'PCTYPE014',
	description: 'The function declares a result value, so RETURN needs an expression.',
	level: DiagnosticLevel.Error,
	message: 'missing expression in RETURN',
	sqlstate: '42601',
}

export const PCTYPE015: DiagnosticDef = {
	code: 'PCTYPE015',
	description: 'FOREACH iterates over the elements of an array value.',
	level: DiagnosticLevel.Error,
	message: 'FOREACH expression must yield an array, not type {type}',
	sqlstate: '42804',
}

// =============================================================================
// RECORDS AND TARGETS (PCREC001-099)
// =============================================================================

export const PCREC001: DiagnosticDef = {
	code: 'PCREC001',
	description: 'A record has no shape until something is assigned to it.',
	detail: 'The tuple structure of a not-yet-assigned record is indeterminate.',
	level: DiagnosticLevel.Error,
	message: 'record "{name}" is not assigned yet',
	sqlstate: '55000',
}

export const PCREC002: DiagnosticDef = {
	code: 'PCREC002',
	description: 'The INTO list names more variables than the query returns columns.',
	detail: 'There are more target variables than output columns in query.',
	hint: 'Check target variables in SELECT INTO statement.',
	level: DiagnosticLevel.WarningOther,
	message: 'too few attributes for target variables',
	sqlstate: '00000',
}

export const PCREC003: DiagnosticDef = {
	code: 'PCREC003',
	description: 'The query returns more columns than the INTO list names variables.',
	detail: 'There are less target variables than output columns in query.',
	hint: 'Check target variables in SELECT INTO statement.',
	level: DiagnosticLevel.WarningOther,
	message: 'too many attributes for target variables',
	sqlstate: '00000',
}

export const PCREC004: DiagnosticDef = {
	code: 'PCREC004',
	description: 'The composite variable has more fields than the value assigned to it.',
	level: DiagnosticLevel.WarningOther,
	message: 'too few attributes for composite variable',
	sqlstate: '00000',
}

export const PCREC005: DiagnosticDef = {
	code: 'PCREC005',
	description: 'The value assigned to the composite variable has more fields than the variable.',
	level: DiagnosticLevel.WarningOther,
	message: 'too many attributes for composite variable',
	sqlstate: '00000',
}

export const PCREC006: DiagnosticDef = {
	code: 'PCREC006',
	description:
		'The record already holds a row of a different shape. Field checks follow the newest shape.',
	detail: 'previous shape ({previous}), new shape ({current})',
	level: DiagnosticLevel.WarningExtra,
	message: 'record "{name}" is reassigned with a different structure',
	sqlstate: '00000',
}

export const PCREC007: DiagnosticDef = {
	code: 'PCREC007',
	description: 'The record shape has no field with this name.',
	level: DiagnosticLevel.Error,
	message: 'record "{name}" has no field "{field}"',
	sqlstate: '42703',
}

export const PCREC008: DiagnosticDef = {
	code: 'PCREC008',
	description: 'A SELECT inside a routine must store its result somewhere.',
	hint: 'If you want to discard the results of a SELECT, use PERFORM instead.',
	level: DiagnosticLevel.Error,
	message: 'query has no destination for result data',
	sqlstate: '42601',
}

export const PCREC009: DiagnosticDef = {
	code: 'PCREC009',
	description: 'INTO needs a command that returns rows.',
	level: DiagnosticLevel.Error,
	message: 'INTO used with a command that cannot return data',
	sqlstate: '42601',
}

export const PCREC010: DiagnosticDef = {
	code: 'PCREC010',
	description: 'The variable was declared CONSTANT and cannot be a target.',
	level: DiagnosticLevel.Error,
	message: 'variable "{name}" is declared CONSTANT',
	sqlstate: '22005',
}

// =============================================================================
// CURSORS (PCCUR001-099)
// =============================================================================

export const PCCUR001: DiagnosticDef = {
	code: 'PCCUR001',
	description: 'OPEN passes fewer arguments than the bound cursor declares.',
	level: DiagnosticLevel.Error,
	message: 'not enough arguments for cursor "{name}"',
	sqlstate: '42601',
}

export const PCCUR002: DiagnosticDef = {
	code: 'PCCUR002',
	description: 'OPEN passes more arguments than the bound cursor declares.',
	level: DiagnosticLevel.Error,
	message: 'too many arguments for cursor "{name}"',
	sqlstate: '42601',
}

export const PCCUR003: DiagnosticDef = {
	code: 'PCCUR003',
	description: 'A cursor that was declared with a query cannot be opened with another one.',
	level: DiagnosticLevel.Error,
	message: 'cursor "{name}" is already bound to a query',
	sqlstate: '42601',
}

// =============================================================================
// DYNAMIC SQL (PCDYN001-099)
// =============================================================================

export const PCDYN002: DiagnosticDef = {
	code: 'PCDYN002',
	description: 'The EXECUTE text is a constant and could be written as static SQL.',
	detail: 'the EXECUTE command is not necessary probably',
	hint: "Don't use dynamic SQL when you can use static SQL.",
	level: DiagnosticLevel.WarningPerformance,
	message: 'immutable expression without parameters found',
	sqlstate: '00000',
}

export const PCDYN003: DiagnosticDef = {
	code: 'PCDYN003',
	description: 'USING passes values the dynamic query never references.',
	level: DiagnosticLevel.WarningOther,
	message: 'values passed to EXECUTE statement by USING clause was not used',
	sqlstate: '00000',
}

export const PCDYN004: DiagnosticDef = {
	code: 'PCDYN004',
	description:
		'The result shape of dynamic SQL is only known at run time. Checks on the record that receives it are skipped.',
	detail: 'There is a risk of related false alarms.',
	hint: "Don't use dynamic SQL and record type together, when you would check function.",
	level: DiagnosticLevel.WarningOther,
	message: 'cannot determinate a result of dynamic SQL',
	sqlstate: '00000',
}

// =============================================================================
// SECURITY (PCSEC001-099)
// =============================================================================

export const PCSEC001: DiagnosticDef = {
	code: 'PCSEC001',
	description: 'A text variable reaches dynamic SQL without quoting. This is a heuristic finding.',
	detail: 'The EXECUTE expression is SQL injection vulnerable.',
	hint: 'Use quote_ident, quote_literal or format function to secure variable.',
	level: DiagnosticLevel.WarningSecurity,
	message: 'text type variable is not sanitized',
	sqlstate: '00000',
}

export const PCSEC002: DiagnosticDef = {
	code: 'PCSEC002',
	description: 'The dynamic SQL text cannot be shown to be safe. This is a heuristic finding.',
	detail: 'Cannot ensure so dynamic EXECUTE statement is SQL injection secure.',
	hint: 'Use quote_ident, quote_literal or format function to secure variable.',
	level: DiagnosticLevel.WarningSecurity,
	message: 'the expression is not SQL injection safe',
	sqlstate: '00000',
}

// =============================================================================
// PERFORMANCE (PCPERF001-099)
// =============================================================================

export const PCPERF001: DiagnosticDef = {
	code: 'PCPERF001',
	description:
		'The column is cast to the variable type, so an index on the column cannot serve the predicate. This is a heuristic finding.',
	detail:
		'An index of some attribute cannot be used, when variable, used in predicate, has not right type like a attribute',
	hint: 'Check a variable type - int versus numeric',
	level: DiagnosticLevel.WarningPerformance,
	message: 'implicit cast of attribute caused by different routine variable type in WHERE clause',
	sqlstate: '42804',
}

export const PCPERF002: DiagnosticDef = {
	code: 'PCPERF002',
	description: 'Everything the routine calls allows a stricter volatility class.',
	hint: 'When you fix this issue, please, recheck other functions that uses this function.',
	level: DiagnosticLevel.WarningPerformance,
	message: 'routine is marked as {marked}, should be {inferred}',
	sqlstate: '00000',
}

// =============================================================================
// COMPATIBILITY (PCCOMPAT001-099)
// =============================================================================

export const PCCOMPAT001: DiagnosticDef = {
	code: 'PCCOMPAT001',
	description: 'Cursor portal names are assigned by the host.',
	detail: 'Internal name of cursor should not be specified by users.',
	level: DiagnosticLevel.WarningCompatibility,
	message: 'obsolete setting of refcursor or cursor variable',
	sqlstate: '00000',
}

// =============================================================================
// DECLARATIONS AND USAGE (PCDECL001-099)
// =============================================================================

export const PCDECL001: DiagnosticDef = {
	code: 'PCDECL001',
	description: 'The variable is declared but never used.',
	level: DiagnosticLevel.WarningOther,
	message: 'unused variable "{name}"',
	sqlstate: '00000',
}

export const PCDECL002: DiagnosticDef = {
	code: 'PCDECL002',
	description: 'The variable is written but its value is never read.',
	level: DiagnosticLevel.WarningExtra,
	message: 'never read variable "{name}"',
	sqlstate: '00000',
}

export const PCDECL003: DiagnosticDef = {
	code: 'PCDECL003',
	description: 'The parameter is never used by the body.',
	level: DiagnosticLevel.WarningExtra,
	message: 'unused parameter "{name}"',
	sqlstate: '00000',
}

export const PCDECL004: DiagnosticDef = {
	code: 'PCDECL004',
	description: 'The parameter is overwritten but its value is never read.',
	level: DiagnosticLevel.WarningExtra,
	message: 'parameter "{name}" is never read',
	sqlstate: '00000',
}

export const PCDECL005: DiagnosticDef = {
	code: 'PCDECL005',
	description: 'The output parameter is never assigned, so the routine always returns NULL for it.',
	level: DiagnosticLevel.WarningExtra,
	message: 'unmodified OUT variable "{name}"',
	sqlstate: '00000',
}

export const PCDECL006: DiagnosticDef = {
	code: 'PCDECL006',
	description: 'An inner declaration hides a variable of an enclosing block.',
	level: DiagnosticLevel.WarningExtra,
	message: 'variable "{name}" shadows a previously defined variable',
	sqlstate: '00000',
}

export const PCDECL007: DiagnosticDef = {
	code: 'PCDECL007',
	description: 'A local variable hides a routine parameter with the same name.',
	detail: 'Local variable overlap function parameter.',
	level: DiagnosticLevel.WarningOther,
	message: 'parameter "{name}" is overlapped',
	sqlstate: '00000',
}

export const PCDECL008: DiagnosticDef = {
	code: 'PCDECL008',
	description: 'A NOT NULL variable needs a non-null default value.',
	level: DiagnosticLevel.Error,
	message: 'variable "{name}" declared NOT NULL cannot default to NULL',
	sqlstate: '22004',
}

// =============================================================================
// PRAGMA (PCPRAGMA001-099)
// =============================================================================

export const PCPRAGMA001: DiagnosticDef = {
	code: 'PCPRAGMA001',
	description: 'The directive could not be parsed or names something unknown. It was ignored.',
	detail: '{reason}',
	level: DiagnosticLevel.WarningOther,
	message: 'invalid pragma "{text}"',
	sqlstate: '00000',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CHECKER_DIAGNOSTICS = {
	PCCOMPAT001,
	PCCUR001,
	PCCUR002,
	PCCUR003,
	PCDECL001,
	PCDECL002,
	PCDECL003,
	PCDECL004,
	PCDECL005,
	PCDECL006,
	PCDECL007,
	PCDECL008,
	PCDYN002,
	PCDYN003,
	PCDYN004,
	PCFLOW001,
	PCFLOW002,
	PCFLOW003,
	PCFLOW004,
	PCFLOW005,
	PCFLOW006,
	PCFLOW007,
	PCFLOW008,
	PCFLOW009,
	PCFLOW010,
	PCFLOW011,
	PCFLOW012,
	PCPERF001,
	PCPERF002,
	PCPRAGMA001,
	PCREC001,
	PCREC002,
	PCREC003,
	PCREC004,
	PCREC005,
	PCREC006,
	PCREC007,
	PCREC008,
	PCREC009,
	PCREC010,
	PCSEC001,
	PCSEC002,
	PCSQL001,
	PCSQL002,
	PCSQL003,
	PCSQL004,
	PCSQL005,
	PCSQL006,
	PCTYPE001,
	PCTYPE002,
	PCTYPE003,
	PCTYPE004,
	PCTYPE005,
	PCTYPE006,
	PCTYPE007,
	PCTYPE008,
	PCTYPE009,
	PCTYPE010,
	PCTYPE011,
	PCTYPE012,
	PCTYPE013,
	PCTYPE014,
	PCTYPE015,
} as const

export type CheckerDiagnosticCode = keyof typeof CHECKER_DIAGNOSTICS
