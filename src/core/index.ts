/**
 * stackplan core module
 */

// Core configuration
export { ConfigLoader, DEFAULT_CORE_CONFIG, type CoreConfig, type CoreConfigInput } from './config'

// Branded types
export type {
  Brand,
  ResourceAddress,
  BranchName
} from './types/branded'

export {
  CoreBrandedTypeCreators
} from './types/branded'

// Validation patterns
export {
  CORE_VALIDATION_PATTERNS
} from './validation/patterns'

// Constants
export {
  SUPPORTED_ENGINES,
  STACKPLAN_VERSION,
  type PlanEngineName
} from './const'
