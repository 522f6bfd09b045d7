import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { Dependency } from '../../src/check/dependencies.ts'
import { type Diagnostic, DiagnosticLevel } from '../../src/core/diagnostics.ts'
import {
	DIAGNOSTIC_COLUMNS,
	dependencyRows,
	diagnosticRows,
	escapeXml,
	queryLines,
	renderJson,
	renderReport,
	renderTable,
	renderText,
	renderXml,
} from '../../src/report/index.ts'

const missing: Diagnostic = {
	code: 'PCSQL001',
	level: DiagnosticLevel.Error,
	line: 3,
	message: 'relation "missing" does not exist',
	position: 16,
	query: 'SELECT id FROM missing',
	sqlstate: '42P01',
	statement: 'PERFORM',
}

const unreturned: Diagnostic = {
	code: 'PCFLOW002',
	hint: 'Add a RETURN at the end.',
	level: DiagnosticLevel.Error,
	message: 'control reached end of function without RETURN',
	sqlstate: '2F005',
}

describe('report/text', () => {
	it('should render a located diagnostic with its query and caret', () => {
		assert.strictEqual(
			renderText([missing]),
			[
				'error:42P01:3:PERFORM:relation "missing" does not exist',
				'Query: SELECT id FROM missing',
				`--     ${' '.repeat(15)}^`,
			].join('\n')
		)
	})

	it('should render a routine-level diagnostic without location', () => {
		assert.strictEqual(
			renderText([unreturned]),
			'error:2F005:control reached end of function without RETURN\nHint: Add a RETURN at the end.'
		)
	})

	it('should place the caret on the line holding the position', () => {
		assert.deepStrictEqual(queryLines('SELECT id\nFROM missing', 16), [
			'Query: SELECT id',
			'       FROM missing',
			'--          ^',
		])
	})

	it('should omit the caret without a position', () => {
		assert.deepStrictEqual(queryLines('SELECT 1', undefined), ['Query: SELECT 1'])
	})
})

describe('report/json', () => {
	it('should describe the routine and its issues', () => {
		assert.deepStrictEqual(JSON.parse(renderJson(16385, [missing, unreturned])), {
			function: '16385',
			issues: [
				{
					level: 'error',
					message: 'relation "missing" does not exist',
					query: { position: '16', text: 'SELECT id FROM missing' },
					sqlState: '42P01',
					statement: { lineNumber: '3', text: 'PERFORM' },
				},
				{
					hint: 'Add a RETURN at the end.',
					level: 'error',
					message: 'control reached end of function without RETURN',
					sqlState: '2F005',
				},
			],
		})
	})
})

describe('report/xml', () => {
	it('should escape markup characters', () => {
		assert.strictEqual(escapeXml(`a<b & "c" 'd'>`), 'a&lt;b &amp; &quot;c&quot; &apos;d&apos;&gt;')
	})

	it('should render one Issue element per diagnostic', () => {
		assert.strictEqual(
			renderXml(16385, [missing]),
			[
				'<Function oid="16385">',
				'  <Issue>',
				'    <Level>error</Level>',
				'    <Sqlstate>42P01</Sqlstate>',
				'    <Message>relation &quot;missing&quot; does not exist</Message>',
				'    <Stmt lineno="3">PERFORM</Stmt>',
				'    <Query position="16">SELECT id FROM missing</Query>',
				'  </Issue>',
				'</Function>',
			].join('\n')
		)
	})
})

describe('report/tabular', () => {
	it('should render diagnostic rows with empty cells for absent values', () => {
		assert.strictEqual(
			renderTable(DIAGNOSTIC_COLUMNS, diagnosticRows(16385, [missing])),
			[
				'functionid | lineno | statement | sqlstate | message | detail | hint | level | ' +
					'position | query | context',
				'16385 | 3 | PERFORM | 42P01 | relation "missing" does not exist |  |  | error | ' +
					'16 | SELECT id FROM missing | ',
			].join('\n')
		)
	})

	it('should order dependency rows by type, schema and name', () => {
		const dependencies: Dependency[] = [
			{ identity: 3, kind: 'RELATION', name: 'b', params: null, schema: 'public' },
			{ identity: 2, kind: 'FUNCTION', name: 'a', params: '(integer)', schema: 'public' },
			{ identity: 1, kind: 'RELATION', name: 'a', params: null, schema: 'public' },
		]
		assert.deepStrictEqual(
			dependencyRows(dependencies).map((row) => `${row.type} ${row.name} ${row.oid}`),
			['FUNCTION a 2', 'RELATION a 1', 'RELATION b 3']
		)
	})
})

describe('report/renderReport', () => {
	it('should dispatch on the output format', () => {
		assert.strictEqual(renderReport('text', 1, [missing]), renderText([missing]))
		assert.strictEqual(renderReport('xml', 1, []), '<Function oid="1">\n</Function>')
	})
})
