/**
 * Registered error codes. Importing this module registers every code in ErrorCodeRegistry.
 */

import { ErrorCategory, ErrorCode, ErrorCodeRegistry, ErrorSeverity } from './taxonomy'

export const ERROR_CODES = {
    CONFIG_INVALID: {
        code: 'CONFIG_INVALID',
        category: ErrorCategory.CONFIGURATION,
        severity: ErrorSeverity.CRITICAL,
        devMessage: 'Invalid configuration: {issues}',
        prodMessage: 'Configuration is invalid',
        suggestions: ['Check STACKPLAN_* and AWS_REGION environment variables'],
    },
    DECLARATION_INVALID: {
        code: 'DECLARATION_INVALID',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Declaration set is malformed: {issues}',
        prodMessage: 'Declaration set is malformed',
    },
    DECLARATION_DUPLICATE_NAME: {
        code: 'DECLARATION_DUPLICATE_NAME',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Duplicate {kind} name: {name}',
        prodMessage: 'Declaration set contains duplicate names',
    },
    DECLARATION_DANGLING_REFERENCE: {
        code: 'DECLARATION_DANGLING_REFERENCE',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: '{from} references undeclared resource {target}',
        prodMessage: 'Declaration set references an undeclared resource',
        suggestions: ['Declare the referenced resource or fix the address (type.name)'],
    },
    DECLARATION_UNDECLARED_PARAMETER: {
        code: 'DECLARATION_UNDECLARED_PARAMETER',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: '{from} references undeclared parameter {name}',
        prodMessage: 'Declaration set references an undeclared parameter',
    },
    DECLARATION_DEPENDENCY_CYCLE: {
        code: 'DECLARATION_DEPENDENCY_CYCLE',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Dependency cycle: {cycle}',
        prodMessage: 'Resources depend on each other in a cycle',
    },
    PARAMETER_UNKNOWN: {
        code: 'PARAMETER_UNKNOWN',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Value given for undeclared parameter {name}',
        prodMessage: 'Unknown parameter',
        suggestions: ['Check --var names against the parameters of the declaration set'],
    },
    PARAMETER_TYPE_MISMATCH: {
        code: 'PARAMETER_TYPE_MISMATCH',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Parameter {name} expects a {expected}, got {value}',
        prodMessage: 'Parameter value has the wrong type',
    },
    PARAMETER_MISSING_VALUE: {
        code: 'PARAMETER_MISSING_VALUE',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Parameter {name} has no default and no value was given',
        prodMessage: 'A required parameter is missing',
    },
    PARAMETER_VALIDATION_FAILED: {
        code: 'PARAMETER_VALIDATION_FAILED',
        category: ErrorCategory.DECLARATION,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Parameter {name} value {value} does not match {pattern}',
        prodMessage: 'Parameter value is invalid',
    },
    PLAN_FILE_INVALID: {
        code: 'PLAN_FILE_INVALID',
        category: ErrorCategory.SYSTEM,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Cannot read plan file {path}: {reason}',
        prodMessage: 'Plan file is unreadable',
    },
    STATE_FILE_INVALID: {
        code: 'STATE_FILE_INVALID',
        category: ErrorCategory.SYSTEM,
        severity: ErrorSeverity.CRITICAL,
        devMessage: 'Cannot read state file {path}: {reason}',
        prodMessage: 'State file is unreadable',
    },
    ENVIRONMENT_TOOL_NOT_FOUND: {
        code: 'ENVIRONMENT_TOOL_NOT_FOUND',
        category: ErrorCategory.ENVIRONMENT,
        severity: ErrorSeverity.CRITICAL,
        devMessage: '{tool} is not installed or not on PATH: {reason}',
        prodMessage: 'Required tooling is missing',
        suggestions: ['Install the pinned tool version before planning'],
    },
    AUTH_CREDENTIALS_REJECTED: {
        code: 'AUTH_CREDENTIALS_REJECTED',
        category: ErrorCategory.AUTHENTICATION,
        severity: ErrorSeverity.CRITICAL,
        devMessage: 'Cloud API rejected credentials: {reason}',
        prodMessage: 'Cloud credentials are missing or invalid',
        suggestions: ['Export AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY in the job environment'],
    },
    PROVIDER_PREVIEW_FAILED: {
        code: 'PROVIDER_PREVIEW_FAILED',
        category: ErrorCategory.PROVIDER,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Preview failed: {reason}',
        prodMessage: 'Plan failed',
    },
    PROVIDER_UNSUPPORTED_RESOURCE: {
        code: 'PROVIDER_UNSUPPORTED_RESOURCE',
        category: ErrorCategory.PROVIDER,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Resource type {type} of {address} has no {engine} mapping',
        prodMessage: 'Unsupported resource type',
        suggestions: ['Use the local engine or one of the supported resource types'],
    },
    PIPELINE_DEFINITION_INVALID: {
        code: 'PIPELINE_DEFINITION_INVALID',
        category: ErrorCategory.PIPELINE,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Invalid pipeline definition {path}: {issues}',
        prodMessage: 'Pipeline definition is invalid',
    },
    PIPELINE_ARTIFACT_NOT_PRODUCED: {
        code: 'PIPELINE_ARTIFACT_NOT_PRODUCED',
        category: ErrorCategory.PIPELINE,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Job {job} keeps artifact {path} but none of its commands names it',
        prodMessage: 'Pipeline artifact is never produced',
    },
    PIPELINE_JOB_FAILED: {
        code: 'PIPELINE_JOB_FAILED',
        category: ErrorCategory.PIPELINE,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Job {job} failed: "{command}" exited with {exitCode}',
        prodMessage: 'Pipeline job failed',
        suggestions: ['Read the job log; artifacts kept with when: always are still available'],
    },
    BOOTSTRAP_STEP_FAILED: {
        code: 'BOOTSTRAP_STEP_FAILED',
        category: ErrorCategory.BOOTSTRAP,
        severity: ErrorSeverity.ERROR,
        devMessage: 'Bootstrap step "{command}" exited with {exitCode}: {stderr}',
        prodMessage: 'Instance bootstrap failed',
    },
} satisfies Record<string, ErrorCode>

for (const errorCode of Object.values(ERROR_CODES)) {
    ErrorCodeRegistry.register(errorCode)
}
