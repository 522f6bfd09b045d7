/**
 * @plcheck/diagnostics
 *
 * Shared diagnostic types and definitions for the plcheck packages.
 */

export * from './checker.ts'
export * from './cli.ts'
export { interpolateMessage, interpolateOptional } from './interpolate.ts'
export { type DiagnosticArgs, type DiagnosticDef, DiagnosticLevel } from './types.ts'

import { CHECKER_DIAGNOSTICS } from './checker.ts'
import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...CHECKER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return Object.hasOwn(DIAGNOSTICS, code)
}
