import { EngineEvent, StepEventMetadata } from '@pulumi/pulumi/automation'
import { CoreConfig } from '../../core/config/interface'
import { ENGINE_PULUMI, PLAN_FORMAT_VERSION } from '../../core/const'
import { StackPlanError, createError, isStackPlanError, toError } from '../../core/errors/taxonomy'
import { ERROR_CODES } from '../../core/errors/codes'
import { collectResourceReferences } from '../../declaration/expressions'
import { DeclarationSet } from '../../declaration/types'
import { EvaluatedStack, evaluateDeclarationSet } from '../../engine/evaluator'
import { ChangeAction, OutputChange, Plan, ResourceChange, erroredPlan, summarize, writePlanFile } from '../../engine/plan'
import { getLogger, Logger } from '../../log/utils'
import { PreviewableStack, PreviewableStackFactory, PulumiStackClient } from '../../tools/pulumi/client'
import { PlanEngine, PlanEngineArgs, PlanOptions, PlanResult } from '../engine'
import { buildPulumiProgram, declarationTypeOf, fromPulumiInputs, fromPulumiKey } from './program'

const ROOT_STACK_TYPE = 'pulumi:pulumi:Stack'
const PROVIDER_TYPE_PREFIX = 'pulumi:providers:'

/**
 * The root stack and provider instances (default or explicit) are engine resources, not declared ones.
 */
export function isEngineResource(type: string): boolean {
    return type === ROOT_STACK_TYPE || type.startsWith(PROVIDER_TYPE_PREFIX)
}

export interface PulumiPlanEngineArgs extends PlanEngineArgs {
    /** Replaces the LocalWorkspace stack, mostly for tests */
    stackFactory?: PreviewableStackFactory
}

/**
 * Plan action of a Pulumi step operation. Reads and refreshes change nothing.
 */
export function actionOf(op: string): ChangeAction {
    switch (op) {
        case 'create':
        case 'import':
            return 'create'
        case 'update':
            return 'update'
        case 'replace':
        case 'create-replacement':
        case 'delete-replaced':
        case 'import-replacement':
            return 'replace'
        case 'delete':
        case 'discard':
            return 'delete'
        default:
            return 'no-op'
    }
}

export function addressOfUrn(urn: string, token: string): string {
    const name = urn.split('::').pop() ?? urn
    return `${declarationTypeOf(token)}.${name}`
}

const MISSING_CLI_PATTERNS = [/ENOENT/, /pulumi: (command )?not found/i, /could not find pulumi/i, /failed to run pulumi/i]
const CREDENTIAL_PATTERNS = [/NoCredentialProviders/, /InvalidClientTokenId/, /no valid credential sources/i, /AuthFailure/, /SignatureDoesNotMatch/]

/**
 * Classify an Automation API failure: missing CLI, rejected credentials, anything else.
 */
export function classifyPulumiError(error: unknown): StackPlanError {
    if (isStackPlanError(error)) {
        return error
    }
    const err = toError(error)
    const reason = err.message.split('\n').map(line => line.trim()).filter(line => line.length > 0).slice(-5).join(' ')
    if (MISSING_CLI_PATTERNS.some(pattern => pattern.test(err.message))) {
        return createError(ERROR_CODES.ENVIRONMENT_TOOL_NOT_FOUND, { tool: 'pulumi', reason }, err)
    }
    if (CREDENTIAL_PATTERNS.some(pattern => pattern.test(err.message))) {
        return createError(ERROR_CODES.AUTH_CREDENTIALS_REJECTED, { reason }, err)
    }
    return createError(ERROR_CODES.PROVIDER_PREVIEW_FAILED, { reason }, err)
}

/**
 * Previews the declaration set with Pulumi against the configured backend and the real cloud API.
 */
export class PulumiPlanEngine implements PlanEngine {

    readonly name = ENGINE_PULUMI

    private readonly logger: Logger
    private readonly config: CoreConfig
    private readonly declarations: DeclarationSet
    private readonly stackFactory: PreviewableStackFactory

    constructor(args: PulumiPlanEngineArgs) {
        this.logger = getLogger(PulumiPlanEngine.name)
        this.config = args.config
        this.declarations = args.declarations
        this.stackFactory = args.stackFactory ?? new PulumiStackClient({
            projectName: args.config.pulumi.projectName,
            stackName: args.config.pulumi.stackName,
            backendUrl: args.config.pulumi.backendUrl,
            passphrase: args.config.pulumi.passphrase,
            commandRoot: args.config.pulumi.commandRoot,
        }).factory()
    }

    private async prepareStack(stack: EvaluatedStack): Promise<PreviewableStack> {
        const previewable = await this.stackFactory(buildPulumiProgram(stack))
        await previewable.setConfig('aws:region', { value: stack.provider.region })
        return previewable
    }

    async init(): Promise<void> {
        try {
            const stack = evaluateDeclarationSet(this.declarations, this.config)
            const previewable = await this.prepareStack(stack)
            const version = `v${this.config.pulumi.awsPluginVersion}`
            this.logger.info(`Installing aws plugin ${version}`)
            await previewable.installPlugin('aws', version)
        } catch (error: unknown) {
            throw classifyPulumiError(error)
        }
    }

    async plan(options: PlanOptions = {}): Promise<PlanResult> {
        const planFile = options.out ?? this.config.planFile
        const refresh = options.refresh ?? true

        let plan: Plan
        try {
            const stack = evaluateDeclarationSet(this.declarations, this.config, options.overrides)
            const previewable = await this.prepareStack(stack)

            const steps = new Map<string, StepEventMetadata>()
            const onEvent = (event: EngineEvent) => {
                const metadata = event.resourcePreEvent?.metadata
                if (metadata && !isEngineResource(metadata.type)) {
                    steps.set(addressOfUrn(metadata.urn, metadata.type), metadata)
                }
            }

            this.logger.info(`Previewing ${this.config.pulumi.projectName}/${this.config.pulumi.stackName}`, { refresh })
            const result = await previewable.preview({ refresh, onEvent })
            this.logger.debug('Preview change summary', result.changeSummary)

            const changes = this.toChanges(stack, steps)
            plan = {
                formatVersion: PLAN_FORMAT_VERSION,
                engine: this.name,
                createdAt: new Date().toISOString(),
                status: 'planned',
                provider: stack.provider,
                parameters: { ...stack.parameters },
                order: stack.order,
                changes,
                outputs: this.toOutputs(stack),
                summary: summarize(changes),
                errors: [],
            }
        } catch (error: unknown) {
            const classified = classifyPulumiError(error)
            this.logger.error(`Preview failed, writing errored plan to ${planFile}`)
            await writePlanFile(planFile, erroredPlan(this.name, classified))
            throw classified
        }

        await writePlanFile(planFile, plan)
        this.logger.info(`Plan written to ${planFile}`, plan.summary)
        return { plan, planFile }
    }

    private toChanges(stack: EvaluatedStack, steps: ReadonlyMap<string, StepEventMetadata>): ResourceChange[] {
        const changes: ResourceChange[] = stack.resources.map(resource => {
            const step = steps.get(resource.address)
            const action = step ? actionOf(step.op) : 'no-op'
            return {
                address: resource.address,
                type: resource.type,
                name: resource.name,
                action,
                dependsOn: resource.dependsOn,
                before: step?.old ? fromPulumiInputs(step.old.inputs) : null,
                after: resource.attributes,
                changedAttributes: (step?.diffs ?? []).map(fromPulumiKey).sort(),
                replaceReasons: action === 'replace' ? (step?.keys ?? []).map(fromPulumiKey).sort() : [],
            }
        })

        // resources the stack holds but the declaration set no longer has
        for (const [address, step] of steps) {
            if (stack.resources.some(resource => resource.address === address)) {
                continue
            }
            const [type, ...name] = address.split('.')
            changes.push({
                address,
                type,
                name: name.join('.'),
                action: actionOf(step.op),
                dependsOn: [],
                before: step.old ? fromPulumiInputs(step.old.inputs) : null,
                after: null,
                changedAttributes: [],
                replaceReasons: [],
            })
        }
        return changes
    }

    private toOutputs(stack: EvaluatedStack): OutputChange[] {
        return stack.outputs.map(output => ({
            name: output.name,
            value: output.value,
            known: collectResourceReferences(output.value).length === 0,
            sensitive: output.sensitive,
        }))
    }
}
