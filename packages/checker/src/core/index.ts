export * from './closing.ts'
export * from './diagnostics.ts'
export * from './errors.ts'
