/**
 * Evaluation, diff and plan files
 */

export * from './parameters'
export * from './graph'
export * from './evaluator'
export * from './state'
export * from './diff'
export * from './plan'
