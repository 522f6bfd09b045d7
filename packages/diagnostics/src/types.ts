/**
 * Diagnostic levels, ordered the way reports print them.
 *
 * Every level except `Error` belongs to a warning category that can be
 * switched off per run or per scope.
 */
export const DiagnosticLevel = {
	Error: 'error',
	WarningCompatibility: 'compatibility',
	WarningExtra: 'warning extra',
	WarningOther: 'warning',
	WarningPerformance: 'performance',
	WarningSecurity: 'security',
} as const

export type DiagnosticLevel = (typeof DiagnosticLevel)[keyof typeof DiagnosticLevel]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly level: DiagnosticLevel
	/** Five character condition code reported alongside the message */
	readonly sqlstate: string
	readonly message: string
	readonly description: string
	readonly detail?: string
	readonly hint?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
