import type { DiagnosticArgs } from './types.ts'

/** `{name}`: a word between braces. Anything else in braces is literal text. */
const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Fill the `{name}` placeholders of a catalog template, such as
 * `variable "{name}" is never read`, from the arguments a check passes.
 * A placeholder without an argument stays as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (!args) return template
	return template.replace(PLACEHOLDER, (placeholder, name: string) => {
		const value = args[name]
		return value === undefined ? placeholder : String(value)
	})
}

/** Detail and hint templates are optional in the catalog. */
export function interpolateOptional(
	template: string | undefined,
	args?: DiagnosticArgs
): string | undefined {
	return template === undefined ? undefined : interpolateMessage(template, args)
}
