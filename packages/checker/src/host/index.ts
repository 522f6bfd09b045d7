export * from './ast.ts'
export * from './bridge.ts'
export * from './query.ts'
export * from './types.ts'
