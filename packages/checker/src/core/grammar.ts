import * as ohm from 'ohm-js'

const KEYWORD = /kw<("[^"\\]+")>/g

/**
 * Rewrites each `kw<"word">` application as `kw<caseInsensitive<"word">>`.
 * `caseInsensitive` only takes a terminal, so the grammar defines `kw<word> = word ~identPart`.
 */
export function expandKeywords(source: string): string {
	return source.replace(KEYWORD, 'kw<caseInsensitive<$1>>')
}

export function keywordGrammar(source: string): ohm.Grammar {
	return ohm.grammar(expandKeywords(source))
}
