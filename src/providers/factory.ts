import { CoreConfig } from '../core/config/interface'
import { ENGINE_LOCAL, ENGINE_PULUMI, PlanEngineName } from '../core/const'
import { DeclarationSet } from '../declaration/types'
import { PlanEngine } from './engine'
import { LocalPlanEngine } from './local/engine'
import { PulumiPlanEngine } from './pulumi/engine'

/**
 * Create the plan engine named by `engine`, or the configured one.
 */
export function createPlanEngine(config: CoreConfig, declarations: DeclarationSet, engine: PlanEngineName = config.engine): PlanEngine {
    switch (engine) {
        case ENGINE_LOCAL:
            return new LocalPlanEngine({ config, declarations })
        case ENGINE_PULUMI:
            return new PulumiPlanEngine({ config, declarations })
    }
}
