/**
 * Extraction of the `INTO [STRICT] target, ...` clause from embedded SQL.
 *
 * The clause is blanked out rather than removed so character positions
 * reported by the analyzer still point into the original text.
 */

import type { Target } from './syntax.ts'

export interface IntoExtraction {
	readonly text: string
	readonly into: { readonly targets: readonly Target[]; readonly strict: boolean } | null
}

interface Token {
	readonly start: number
	readonly end: number
	/** Lower-cased word, or the quoted identifier's name */
	readonly word: string | null
	readonly depth: number
	readonly text: string
}

const wordStart = /[A-Za-z_]/
const wordPart = /[A-Za-z0-9_$]/

function skipQuoted(text: string, start: number, quote: string): number {
	let i = start + 1
	while (i < text.length) {
		if (text[i] === quote) {
			if (text[i + 1] === quote) {
				i += 2
				continue
			}
			return i + 1
		}
		i++
	}
	return i
}

function tokenize(text: string): Token[] {
	const tokens: Token[] = []
	let depth = 0
	let i = 0
	while (i < text.length) {
		const char = text[i] ?? ''
		const start = i
		if (/\s/.test(char)) {
			i++
			continue
		}
		if (text.startsWith('--', i)) {
			const newline = text.indexOf('\n', i)
			i = newline < 0 ? text.length : newline
			continue
		}
		if (text.startsWith('/*', i)) {
			const close = text.indexOf('*/', i + 2)
			i = close < 0 ? text.length : close + 2
			continue
		}
		if (char === "'") {
			i = skipQuoted(text, i, "'")
		} else if (char === '"') {
			i = skipQuoted(text, i, '"')
			const name = text.slice(start + 1, i - 1).replaceAll('""', '"')
			tokens.push({ depth, end: i, start, text: text.slice(start, i), word: name })
			continue
		} else if (char === '$' && /^\$[A-Za-z_]*\$/.test(text.slice(i))) {
			const tag = /^\$[A-Za-z_]*\$/.exec(text.slice(i))?.[0] ?? '$$'
			const close = text.indexOf(tag, i + tag.length)
			i = close < 0 ? text.length : close + tag.length
		} else if (wordStart.test(char)) {
			while (i < text.length && wordPart.test(text[i] ?? '')) i++
			const word = text.slice(start, i)
			tokens.push({ depth, end: i, start, text: word, word: word.toLowerCase() })
			continue
		} else {
			if (char === '(' || char === '[') depth++
			if (char === ')' || char === ']') depth--
			i++
		}
		tokens.push({ depth, end: i, start, text: text.slice(start, i), word: null })
	}
	return tokens
}

function blank(text: string, start: number, end: number): string {
	return text.slice(0, start) + text.slice(start, end).replace(/[^\n]/g, ' ') + text.slice(end)
}

/**
 * Find the top-level INTO clause of a statement. For INSERT the first INTO
 * is part of the statement itself and is skipped.
 */
export function extractInto(text: string): IntoExtraction {
	const tokens = tokenize(text)
	let skip = tokens[0]?.word === 'insert' ? 1 : 0

	for (let i = 0; i < tokens.length; i++) {
		const token = tokens[i]
		if (token?.word !== 'into' || token.depth !== 0 || token.text.startsWith('"')) continue
		if (skip > 0) {
			skip--
			continue
		}

		let next = i + 1
		let strict = false
		if (tokens[next]?.word === 'strict') {
			strict = true
			next++
		}

		const targets: Target[] = []
		let end = token.end
		while (next < tokens.length) {
			const parts: string[] = []
			let part = tokens[next]
			while (part !== undefined && part.word !== null) {
				parts.push(part.word)
				end = part.end
				next++
				if (tokens[next]?.text !== '.') break
				next++
				part = tokens[next]
			}
			if (parts.length === 0) break
			targets.push(parts)
			if (tokens[next]?.text !== ',') break
			next++
		}
		if (targets.length === 0) return { into: null, text }
		return { into: { strict, targets }, text: blank(text, token.start, end) }
	}
	return { into: null, text }
}
