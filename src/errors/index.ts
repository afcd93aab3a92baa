/**
 * stackplan error system
 */

export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  StackPlanError,
  ConfigurationError,
  DeclarationError,
  EnvironmentError,
  AuthenticationError,
  ProviderError,
  PipelineError,
  BootstrapError,
  createError,
  isStackPlanError,
  extractErrorDetails,
  formatErrorMessage,
  toError,
  type ErrorCode,
  type ErrorContext,
  type ErrorDetails
} from '../core/errors/taxonomy';

export { ERROR_CODES } from '../core/errors/codes';
