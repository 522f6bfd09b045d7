import type { OutputFormat } from '../check/options.ts'
import type { Diagnostic } from '../core/diagnostics.ts'
import { renderJson } from './json.ts'
import { DIAGNOSTIC_COLUMNS, diagnosticRows, renderTable } from './tabular.ts'
import { renderText } from './text.ts'
import { renderXml } from './xml.ts'

export * from './json.ts'
export * from './tabular.ts'
export * from './text.ts'
export * from './xml.ts'

/**
 * Render the diagnostics of one routine in the requested format.
 */
export function renderReport(
	format: OutputFormat,
	identity: number,
	diagnostics: readonly Diagnostic[]
): string {
	switch (format) {
		case 'text':
			return renderText(diagnostics)
		case 'json':
			return renderJson(identity, diagnostics)
		case 'xml':
			return renderXml(identity, diagnostics)
		case 'tabular':
			return renderTable(DIAGNOSTIC_COLUMNS, diagnosticRows(identity, diagnostics))
	}
}
