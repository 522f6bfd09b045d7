import type { Diagnostic } from '../core/diagnostics.ts'

const XML_ESCAPES: Readonly<Record<string, string>> = {
	'"': '&quot;',
	'&': '&amp;',
	"'": '&apos;',
	'<': '&lt;',
	'>': '&gt;',
}

export function escapeXml(text: string): string {
	return text.replace(/["&'<>]/g, (char) => XML_ESCAPES[char] ?? char)
}

function issue(diagnostic: Diagnostic): string[] {
	const lines = [
		'  <Issue>',
		`    <Level>${diagnostic.level}</Level>`,
		`    <Sqlstate>${diagnostic.sqlstate}</Sqlstate>`,
		`    <Message>${escapeXml(diagnostic.message)}</Message>`,
	]
	if (diagnostic.line !== undefined && diagnostic.statement) {
		lines.push(`    <Stmt lineno="${diagnostic.line}">${escapeXml(diagnostic.statement)}</Stmt>`)
	}
	if (diagnostic.hint !== undefined) lines.push(`    <Hint>${escapeXml(diagnostic.hint)}</Hint>`)
	if (diagnostic.detail !== undefined) {
		lines.push(`    <Detail>${escapeXml(diagnostic.detail)}</Detail>`)
	}
	if (diagnostic.query !== undefined) {
		const position = diagnostic.position ?? 0
		lines.push(`    <Query position="${position}">${escapeXml(diagnostic.query)}</Query>`)
	}
	if (diagnostic.context !== undefined) {
		lines.push(`    <Context>${escapeXml(diagnostic.context)}</Context>`)
	}
	lines.push('  </Issue>')
	return lines
}

/**
 * XML document with one Function element holding one Issue per diagnostic.
 */
export function renderXml(identity: number, diagnostics: readonly Diagnostic[]): string {
	return [`<Function oid="${identity}">`, ...diagnostics.flatMap(issue), '</Function>'].join('\n')
}
