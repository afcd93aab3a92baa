import { CoreConfig } from '../core/config/interface'
import { PlanEngineName } from '../core/const'
import { DeclarationSet } from '../declaration/types'
import { ParameterOverrides } from '../engine/parameters'
import { Plan } from '../engine/plan'

export interface PlanOptions {
    /** Plan file path. Defaults to the configured plan file. */
    out?: string
    /** Read actual state before diffing, when the engine can */
    refresh?: boolean
    overrides?: ParameterOverrides
}

export interface PlanResult {
    plan: Plan
    planFile: string
}

/**
 * Produces a plan for a declaration set without changing anything.
 *
 * Implementations write a plan file for every call to plan(), an errored one
 * when planning fails, before rethrowing.
 */
export interface PlanEngine {
    readonly name: PlanEngineName

    /**
     * Prepare whatever the engine needs to plan: state, stack, plugins.
     */
    init(): Promise<void>

    plan(options?: PlanOptions): Promise<PlanResult>
}

export interface PlanEngineArgs {
    config: CoreConfig
    declarations: DeclarationSet
}
