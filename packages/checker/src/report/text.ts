/**
 * Plain text report: one header line per diagnostic followed by optional
 * Query (with caret), Detail, Hint and Context lines.
 */

import type { Diagnostic } from '../core/diagnostics.ts'

const QUERY_PREFIX = 'Query: '
const QUERY_CONTINUATION = '       '
const CARET_PREFIX = '--     '

function headerLine(diagnostic: Diagnostic): string {
	const { level, message, sqlstate } = diagnostic
	if (diagnostic.line !== undefined && diagnostic.line > 0 && diagnostic.statement) {
		return `${level}:${sqlstate}:${diagnostic.line}:${diagnostic.statement}:${message}`
	}
	return `${level}:${sqlstate}:${message}`
}

/**
 * Query lines with the caret placed under the 1-based position.
 */
export function queryLines(query: string, position: number | undefined): string[] {
	const lines = query.split('\n')
	const result: string[] = []
	let offset = 0
	lines.forEach((line, i) => {
		result.push(`${i === 0 ? QUERY_PREFIX : QUERY_CONTINUATION}${line}`)
		const start = offset
		offset += line.length + 1
		if (position === undefined || position <= start || position > offset) return
		result.push(`${CARET_PREFIX}${' '.repeat(position - start - 1)}^`)
	})
	return result
}

export function formatDiagnosticText(diagnostic: Diagnostic): string[] {
	const lines = [headerLine(diagnostic)]
	if (diagnostic.query !== undefined) {
		lines.push(...queryLines(diagnostic.query, diagnostic.position))
	}
	if (diagnostic.detail !== undefined) lines.push(`Detail: ${diagnostic.detail}`)
	if (diagnostic.hint !== undefined) lines.push(`Hint: ${diagnostic.hint}`)
	if (diagnostic.context !== undefined) lines.push(`Context: ${diagnostic.context}`)
	return lines
}

export function renderText(diagnostics: readonly Diagnostic[]): string {
	return diagnostics.flatMap(formatDiagnosticText).join('\n')
}
