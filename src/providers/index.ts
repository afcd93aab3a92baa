/**
 * Plan engines
 */

export { type PlanEngine, type PlanEngineArgs, type PlanOptions, type PlanResult } from './engine'
export { createPlanEngine } from './factory'
export { LocalPlanEngine } from './local/engine'
export { PulumiPlanEngine, type PulumiPlanEngineArgs, classifyPulumiError } from './pulumi/engine'
export { DeclaredResource, buildPulumiProgram, toPulumiInputs, PULUMI_TYPE_TOKENS } from './pulumi/program'
