/**
 * stackplan - declared stack planning and plan pipelines
 * Main entry point for the package
 */

// Configuration, branded types, validation patterns
export * from './core'

// Declarations
export * from './declaration'

// Evaluation and plans
export * from './engine'

// Plan engines
export * from './providers'

// Pipelines
export * from './pipeline'

// Errors
export * from './errors'

export { getLogger, setLogVerbosity } from './log/utils'
