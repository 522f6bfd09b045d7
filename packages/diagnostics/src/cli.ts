/**
 * CLI diagnostic definitions.
 *
 * Code format: PCCLI<NUMBER>
 */

import { type DiagnosticDef, DiagnosticLevel } from './types.ts'

// =============================================================================
// CLI ERRORS (PCCLI001-099)
// =============================================================================

export const PCCLI001: DiagnosticDef = {
	code: 'PCCLI001',
	description: 'No file exists at the given path.',
	hint: 'Double-check the path and make sure the file exists.',
	level: DiagnosticLevel.Error,
	message: 'file not found: {path}',
	sqlstate: '58P01',
}

export const PCCLI002: DiagnosticDef = {
	code: 'PCCLI002',
	description: 'The file exists but cannot be opened.',
	hint: 'Check that you have read permission for this file.',
	level: DiagnosticLevel.Error,
	message: 'cannot read file: {reason}',
	sqlstate: '58030',
}

export const PCCLI003: DiagnosticDef = {
	code: 'PCCLI003',
	description: 'The script could not be loaded into the in-process catalog.',
	hint: 'The script accepts CREATE TABLE, SEQUENCE, TYPE, OPERATOR, FUNCTION and PROCEDURE statements.',
	level: DiagnosticLevel.Error,
	message: 'cannot load script: {reason}',
	sqlstate: '42601',
}

export const PCCLI004: DiagnosticDef = {
	code: 'PCCLI004',
	description: 'The requested output format is not supported.',
	hint: 'Use text, json, xml or tabular.',
	level: DiagnosticLevel.Error,
	message: 'unknown format "{format}"',
	sqlstate: '22023',
}

export const PCCLI005: DiagnosticDef = {
	code: 'PCCLI005',
	description: 'The routine cannot be checked with the given arguments.',
	level: DiagnosticLevel.Error,
	message: 'invalid input: {reason}',
	sqlstate: '22023',
}

export const PCCLI006: DiagnosticDef = {
	code: 'PCCLI006',
	description: 'Something unexpected went wrong while checking.',
	hint: 'Check your script, or report this if it seems like a bug.',
	level: DiagnosticLevel.Error,
	message: 'check failed: {reason}',
	sqlstate: 'XX000',
}

export const PCCLI007: DiagnosticDef = {
	code: 'PCCLI007',
	description: 'The profile file must be a JSON object of statement counters.',
	level: DiagnosticLevel.Error,
	message: 'invalid profile: {reason}',
	sqlstate: '22023',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	PCCLI001,
	PCCLI002,
	PCCLI003,
	PCCLI004,
	PCCLI005,
	PCCLI006,
	PCCLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
