/**
 * Branded identifiers used by declarations and pipelines
 */

import { CORE_VALIDATION_PATTERNS } from '../validation/patterns'

/**
 * Brand utility type for creating type-safe branded types
 */
export type Brand<T, TBrand> = T & { readonly __brand: TBrand }

/** `type.name`, eg. `aws_instance.web` */
export type ResourceAddress = Brand<string, 'ResourceAddress'>
export type BranchName = Brand<string, 'BranchName'>

/**
 * Type creators validating and branding values in one step
 */
export class CoreBrandedTypeCreators {
    /**
     * @throws Error if value is not a `type.name` address
     */
    static createResourceAddress(value: string): ResourceAddress {
        if (!CORE_VALIDATION_PATTERNS.RESOURCE_ADDRESS.test(value)) {
            throw new Error(`Invalid resource address format: ${value}`)
        }
        return value as ResourceAddress
    }

    /**
     * @throws Error if value is empty or contains whitespace
     */
    static createBranchName(value: string): BranchName {
        if (!CORE_VALIDATION_PATTERNS.BRANCH_NAME.test(value)) {
            throw new Error(`Invalid branch name: ${value}`)
        }
        return value as BranchName
    }
}
