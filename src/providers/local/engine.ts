import { CoreConfig } from '../../core/config/interface'
import { ENGINE_LOCAL, PLAN_FORMAT_VERSION } from '../../core/const'
import { DeclarationSet } from '../../declaration/types'
import { computeChanges } from '../../engine/diff'
import { evaluateDeclarationSet } from '../../engine/evaluator'
import { Plan, erroredPlan, summarize, writePlanFile } from '../../engine/plan'
import { LocalStateStore } from '../../engine/state'
import { getLogger, Logger } from '../../log/utils'
import { PlanEngine, PlanEngineArgs, PlanOptions, PlanResult } from '../engine'

/**
 * Plans in process against the recorded state file.
 */
export class LocalPlanEngine implements PlanEngine {

    readonly name = ENGINE_LOCAL

    private readonly logger: Logger
    private readonly config: CoreConfig
    private readonly declarations: DeclarationSet
    private readonly store: LocalStateStore

    constructor(args: PlanEngineArgs) {
        this.logger = getLogger(LocalPlanEngine.name)
        this.config = args.config
        this.declarations = args.declarations
        this.store = new LocalStateStore(args.config.stateFile)
    }

    async init(): Promise<void> {
        await this.store.initialize()
    }

    async plan(options: PlanOptions = {}): Promise<PlanResult> {
        const planFile = options.out ?? this.config.planFile

        if (options.refresh) {
            this.logger.info('Refresh requested: the local engine plans against recorded state only')
        }

        let plan: Plan
        try {
            const stack = evaluateDeclarationSet(this.declarations, this.config, options.overrides)
            const prior = await this.store.read()
            const { changes, outputs } = computeChanges(stack, prior)
            plan = {
                formatVersion: PLAN_FORMAT_VERSION,
                engine: this.name,
                createdAt: new Date().toISOString(),
                status: 'planned',
                provider: stack.provider,
                parameters: { ...stack.parameters },
                order: stack.order,
                changes,
                outputs,
                summary: summarize(changes),
                errors: [],
            }
        } catch (error: unknown) {
            this.logger.error(`Planning failed, writing errored plan to ${planFile}`)
            await writePlanFile(planFile, erroredPlan(this.name, error))
            throw error
        }

        await writePlanFile(planFile, plan)
        this.logger.info(`Plan written to ${planFile}`, plan.summary)
        return { plan, planFile }
    }
}
