/**
 * Validation patterns shared by declarations, parameters and pipelines
 * Compiled once and reused
 */

export const CORE_VALIDATION_PATTERNS = {
    /** Declaration identifiers: parameter, output, resource type and name */
    IDENTIFIER: /^[a-z][a-z0-9_]*$/,

    /** `type.name` */
    RESOURCE_ADDRESS: /^[a-z][a-z0-9_]*\.[a-z][a-z0-9_]*$/,

    /** AWS region, eg. `us-east-1`, `eu-west-3`, `ap-southeast-2` */
    AWS_REGION: /^[a-z]{2}(-gov)?-[a-z]+-\d$/,

    /** Machine image id, eg. `ami-0c02fb55956c7d316` */
    AMI_ID: /^ami-[0-9a-f]{8,17}$/,

    /** Instance size class, eg. `t2.micro`, `m5.large` */
    INSTANCE_TYPE: /^[a-z][a-z0-9-]*\.[a-z0-9]+$/,

    /** Human-readable instance name (tag value) */
    INSTANCE_NAME: /^[a-zA-Z][a-zA-Z0-9-]*[a-zA-Z0-9]$/,

    /** Git branch names: no whitespace, not empty */
    BRANCH_NAME: /^[^\s]+$/,
} as const
