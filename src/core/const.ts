export const STACKPLAN_VERSION = "0.4.0"

export const ENGINE_LOCAL = "local"
export const ENGINE_PULUMI = "pulumi"
export const SUPPORTED_ENGINES = [ENGINE_LOCAL, ENGINE_PULUMI] as const
export type PlanEngineName = typeof SUPPORTED_ENGINES[number]

export const DEFAULT_REGION = "us-east-1"
export const DEFAULT_PLAN_FILE = "plan.out"
export const DEFAULT_STATE_FILE = ".stackplan/state.json"
export const DEFAULT_ARTIFACTS_DIR = ".artifacts"
export const DEFAULT_PIPELINE_FILE = "pipeline.yml"

export const PULUMI_DEFAULT_PROJECT = "stackplan"
export const PULUMI_DEFAULT_STACK = "dev"
export const PULUMI_DEFAULT_BACKEND_DIR = ".stackplan/pulumi-backend"

/**
 * Pinned AWS provider plugin installed by `stackplan init` on the pulumi engine.
 */
export const PULUMI_AWS_PLUGIN_VERSION = "6.52.0"

export const PLAN_FORMAT_VERSION = 1
export const STATE_FORMAT_VERSION = 1
