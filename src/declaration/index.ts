export * from './types'
export * from './expressions'
export * from './schema'
export * from './bootstrap'
export * from './default-set'
