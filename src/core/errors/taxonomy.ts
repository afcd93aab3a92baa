/**
 * Structured errors for stackplan.
 *
 * Every failure the tool reports carries a registered {@link ErrorCode}: a stable code,
 * a category deciding the error class, and two message templates. The development
 * template names the offending values; the production one stays generic.
 */

export enum ErrorCategory {
    CONFIGURATION = 'CONFIGURATION',
    DECLARATION = 'DECLARATION',
    ENVIRONMENT = 'ENVIRONMENT',
    AUTHENTICATION = 'AUTHENTICATION',
    PROVIDER = 'PROVIDER',
    PIPELINE = 'PIPELINE',
    BOOTSTRAP = 'BOOTSTRAP',
    SYSTEM = 'SYSTEM',
}

export enum ErrorSeverity {
    /** Nothing else can run */
    CRITICAL = 'CRITICAL',
    ERROR = 'ERROR',
    WARNING = 'WARNING',
}

export enum ErrorEnvironment {
    DEVELOPMENT = 'DEVELOPMENT',
    PRODUCTION = 'PRODUCTION',
}

/**
 * Messages are templates: `{name}` is replaced by `context.name` when the error is built.
 */
export interface ErrorCode {
    readonly code: string
    readonly category: ErrorCategory
    readonly severity: ErrorSeverity
    readonly devMessage: string
    readonly prodMessage: string
    readonly suggestions?: string[]
}

export type ErrorContext = Record<string, unknown>

export interface ErrorDetails {
    code?: string
    message: string
    category?: ErrorCategory
    severity?: ErrorSeverity
    suggestions?: string[]
    context: ErrorContext
}

export class ErrorCodeRegistry {

    private static readonly codes = new Map<string, ErrorCode>()

    static register(errorCode: ErrorCode): void {
        ErrorCodeRegistry.codes.set(errorCode.code, errorCode)
    }

    static get(code: string): ErrorCode | undefined {
        return ErrorCodeRegistry.codes.get(code)
    }
}

/**
 * Replace `{key}` placeholders with context values. Unknown keys are left as-is.
 */
export function formatErrorMessage(template: string, context: ErrorContext): string {
    return template.replace(/\{(\w+)\}/g, (placeholder, key: string) => {
        if (!Object.prototype.hasOwnProperty.call(context, key)) {
            return placeholder
        }
        const value = context[key]
        return Array.isArray(value) ? value.map(String).join(', ') : String(value)
    })
}

function templateFor(errorCode: ErrorCode, environment: ErrorEnvironment): string {
    return environment === ErrorEnvironment.PRODUCTION ? errorCode.prodMessage : errorCode.devMessage
}

export abstract class StackPlanError extends Error {

    readonly code: string
    readonly category: ErrorCategory
    readonly severity: ErrorSeverity
    readonly timestamp: string
    readonly context: ErrorContext
    readonly originalError?: Error

    constructor(errorCode: ErrorCode, context: ErrorContext = {}, originalError?: Error, environment = ErrorEnvironment.DEVELOPMENT) {
        super(formatErrorMessage(templateFor(errorCode, environment), context), { cause: originalError })
        this.name = new.target.name
        this.code = errorCode.code
        this.category = errorCode.category
        this.severity = errorCode.severity
        this.timestamp = new Date().toISOString()
        this.context = context
        this.originalError = originalError
    }

    /**
     * Details fit for display in the given environment. Production gets the
     * generic message of the registered code and no context.
     */
    getDetails(environment = ErrorEnvironment.DEVELOPMENT): ErrorDetails {
        const registered = ErrorCodeRegistry.get(this.code)
        const production = environment === ErrorEnvironment.PRODUCTION
        return {
            code: this.code,
            message: production && registered ? registered.prodMessage : this.message,
            category: this.category,
            severity: this.severity,
            suggestions: registered?.suggestions,
            context: production ? {} : this.context,
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            severity: this.severity,
            message: this.message,
            timestamp: this.timestamp,
            context: this.context,
            stack: this.stack,
            originalError: this.originalError?.message,
        }
    }
}

export class ConfigurationError extends StackPlanError {}

/**
 * Unresolvable references, cycles, bad parameter overrides.
 * Raised before any diff is produced.
 */
export class DeclarationError extends StackPlanError {}

/**
 * Tooling missing or failing to install.
 */
export class EnvironmentError extends StackPlanError {}

export class AuthenticationError extends StackPlanError {}

export class ProviderError extends StackPlanError {}

export class PipelineError extends StackPlanError {}

/**
 * Guest bootstrap failures. Never seen by the pipeline, which only plans.
 */
export class BootstrapError extends StackPlanError {}

class SystemError extends StackPlanError {}

type ErrorClass = new (errorCode: ErrorCode, context?: ErrorContext, originalError?: Error, environment?: ErrorEnvironment) => StackPlanError

const ERROR_CLASSES: Record<ErrorCategory, ErrorClass> = {
    [ErrorCategory.CONFIGURATION]: ConfigurationError,
    [ErrorCategory.DECLARATION]: DeclarationError,
    [ErrorCategory.ENVIRONMENT]: EnvironmentError,
    [ErrorCategory.AUTHENTICATION]: AuthenticationError,
    [ErrorCategory.PROVIDER]: ProviderError,
    [ErrorCategory.PIPELINE]: PipelineError,
    [ErrorCategory.BOOTSTRAP]: BootstrapError,
    [ErrorCategory.SYSTEM]: SystemError,
}

/**
 * Build the error of the class matching the code's category.
 */
export function createError(
    errorCode: ErrorCode,
    context: ErrorContext = {},
    originalError?: Error,
    environment = ErrorEnvironment.DEVELOPMENT,
): StackPlanError {
    const ErrorType = ERROR_CLASSES[errorCode.category]
    return new ErrorType(errorCode, context, originalError, environment)
}

export function isStackPlanError(error: unknown): error is StackPlanError {
    return error instanceof StackPlanError
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}

export function extractErrorDetails(error: unknown, environment = ErrorEnvironment.DEVELOPMENT): ErrorDetails {
    if (isStackPlanError(error)) {
        return error.getDetails(environment)
    }
    if (error instanceof Error) {
        return {
            message: error.message,
            context: environment === ErrorEnvironment.PRODUCTION ? {} : { stack: error.stack },
        }
    }
    return { message: String(error), context: {} }
}
