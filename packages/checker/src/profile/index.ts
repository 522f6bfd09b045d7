export * from './coverage.ts'
export * from './inventory.ts'
export * from './store.ts'
