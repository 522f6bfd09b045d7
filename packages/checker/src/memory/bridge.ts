/**
 * In-process implementation of the host contract, backed by a
 * `MemoryCatalog` filled from definition scripts.
 */

import type { Routine, RoutineRef } from '../host/ast.ts'
import type { AnalyzeRequest, AnalyzeResult, CatalogBridge } from '../host/bridge.ts'
import type { Relation, TypeSystem } from '../host/types.ts'
import { MemoryCatalog } from './catalog.ts'
import conditionData from './data/conditions.json' with { type: 'json' }
import { PROCEDURAL_LANGUAGE } from './routine/compiler.ts'
import { type LoadedScript, loadScript } from './script.ts'
import { analyzeSql } from './sql/analyzer.ts'

const conditions = new Map<string, string>(Object.entries(conditionData.conditions))

export class MemoryBridge implements CatalogBridge {
	readonly language = PROCEDURAL_LANGUAGE

	constructor(readonly catalog: MemoryCatalog = new MemoryCatalog()) {}

	/** Build a bridge over a fresh catalog holding the objects of a script. */
	static fromScript(text: string): { bridge: MemoryBridge; script: LoadedScript } {
		const bridge = new MemoryBridge()
		const script = loadScript(bridge.catalog, text)
		return { bridge, script }
	}

	get types(): TypeSystem {
		return this.catalog.types
	}

	findRoutines(ref: RoutineRef): readonly Routine[] {
		switch (ref.by) {
			case 'identity': {
				const routine = this.catalog.routine(ref.identity)
				return routine ? [routine] : []
			}
			case 'signature': {
				const wanted = this.normalizeSignature(ref.signature)
				return this.catalog
					.allRoutines()
					.filter((routine) => this.normalizeSignature(routine.signature) === wanted)
			}
			case 'name':
				return this.catalog.routinesNamed(ref.name)
		}
	}

	/** Lower-case, unspaced form with argument types in canonical spelling. */
	private normalizeSignature(signature: string): string {
		const match = /^\s*([^(]+?)\s*\((.*)\)\s*$/.exec(signature)
		if (!match) return signature.toLowerCase().replace(/\s+/g, '')
		const name = (match[1] ?? '').toLowerCase().replace(/^public\./, '')
		const args = (match[2] ?? '')
			.split(',')
			.map((arg) => arg.trim())
			.filter((arg) => arg.length > 0)
			.map((arg) => {
				const type = this.types.resolve(arg)
				return type ? this.types.format(type) : arg.toLowerCase()
			})
		return `${name}(${args.join(',')})`
	}

	findRelation(name: string): Relation | null {
		return this.catalog.findRelation(name)
	}

	relationById(identity: number): Relation | null {
		return this.catalog.relationById(identity)
	}

	conditionCode(name: string): string | null {
		return conditions.get(name.toLowerCase()) ?? null
	}

	analyze(request: AnalyzeRequest): AnalyzeResult {
		return analyzeSql(this.catalog, request)
	}
}
