import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { PLAN_FORMAT_VERSION, PlanEngineName, SUPPORTED_ENGINES } from '../core/const'
import { createError, extractErrorDetails, toError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { ExpressionSchema } from '../declaration/schema'
import { isResourceReference } from '../declaration/expressions'

export const CHANGE_ACTIONS = ['create', 'update', 'replace', 'delete', 'no-op'] as const
export type ChangeAction = typeof CHANGE_ACTIONS[number]

export const ResourceChangeSchema = z.object({
    address: z.string(),
    type: z.string(),
    name: z.string(),
    action: z.enum(CHANGE_ACTIONS),
    dependsOn: z.array(z.string()),
    /** Recorded attributes, null when the resource does not exist yet */
    before: z.record(z.unknown()).nullable(),
    /** Planned attributes, null when the resource is deleted. References left in are known after apply. */
    after: z.record(ExpressionSchema).nullable(),
    changedAttributes: z.array(z.string()),
    /** Changed attributes that cannot be updated in place */
    replaceReasons: z.array(z.string()),
})

export const OutputChangeSchema = z.object({
    name: z.string(),
    value: ExpressionSchema,
    known: z.boolean(),
    sensitive: z.boolean(),
})

export const PlanSummarySchema = z.object({
    add: z.number().int().nonnegative(),
    change: z.number().int().nonnegative(),
    destroy: z.number().int().nonnegative(),
    unchanged: z.number().int().nonnegative(),
})

export const PlanErrorSchema = z.object({
    code: z.string().optional(),
    category: z.string().optional(),
    message: z.string(),
})

export const PlanSchema = z.object({
    formatVersion: z.literal(PLAN_FORMAT_VERSION),
    engine: z.enum(SUPPORTED_ENGINES),
    createdAt: z.string(),
    status: z.enum(['planned', 'errored']),
    provider: z.object({ name: z.string(), region: z.string() }).nullable(),
    parameters: z.record(z.union([z.string(), z.number(), z.boolean()])),
    order: z.array(z.string()),
    changes: z.array(ResourceChangeSchema),
    outputs: z.array(OutputChangeSchema),
    summary: PlanSummarySchema,
    errors: z.array(PlanErrorSchema),
})

export type ResourceChange = z.infer<typeof ResourceChangeSchema>
export type OutputChange = z.infer<typeof OutputChangeSchema>
export type PlanSummary = z.infer<typeof PlanSummarySchema>
export type PlanErrorRecord = z.infer<typeof PlanErrorSchema>
export type Plan = z.infer<typeof PlanSchema>

export function summarize(changes: readonly ResourceChange[]): PlanSummary {
    const count = (...actions: ChangeAction[]) => changes.filter(c => actions.includes(c.action)).length
    return {
        add: count('create', 'replace'),
        change: count('update'),
        destroy: count('delete', 'replace'),
        unchanged: count('no-op'),
    }
}

export function hasChanges(plan: Plan): boolean {
    return plan.changes.some(change => change.action !== 'no-op')
}

/**
 * Plan recording a failure. Written in place of a regular plan so the artifact
 * exists and tells what went wrong.
 */
export function erroredPlan(engine: PlanEngineName, error: unknown, partial: Partial<Plan> = {}): Plan {
    const details = extractErrorDetails(error)
    const changes = partial.changes ?? []
    return {
        formatVersion: PLAN_FORMAT_VERSION,
        engine,
        createdAt: new Date().toISOString(),
        provider: partial.provider ?? null,
        parameters: partial.parameters ?? {},
        order: partial.order ?? [],
        changes,
        outputs: partial.outputs ?? [],
        summary: summarize(changes),
        status: 'errored',
        errors: [{ code: details.code, category: details.category, message: details.message }],
    }
}

export async function writePlanFile(planPath: string, plan: Plan): Promise<void> {
    await fs.promises.mkdir(path.dirname(planPath), { recursive: true })
    await fs.promises.writeFile(planPath, JSON.stringify(plan, null, 2) + '\n', 'utf8')
}

export async function readPlanFile(planPath: string): Promise<Plan> {
    let raw: unknown
    try {
        raw = JSON.parse(await fs.promises.readFile(planPath, 'utf8'))
    } catch (error: unknown) {
        const err = toError(error)
        throw createError(ERROR_CODES.PLAN_FILE_INVALID, { path: planPath, reason: err.message }, err)
    }

    const result = PlanSchema.safeParse(raw)
    if (!result.success) {
        const reason = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
        throw createError(ERROR_CODES.PLAN_FILE_INVALID, { path: planPath, reason }, toError(result.error))
    }
    return result.data
}

const KNOWN_AFTER_APPLY = '(known after apply)'
const SENSITIVE = '(sensitive value)'

/**
 * One-line rendering of an attribute value. Multi-line strings such as scripts are summarized.
 */
export function formatValue(value: unknown): string {
    if (isResourceReference(value)) {
        return KNOWN_AFTER_APPLY
    }
    if (value === undefined || value === null) {
        return 'null'
    }
    if (typeof value === 'string') {
        return value.includes('\n') ? `<<${value.trimEnd().split('\n').length} lines>>` : JSON.stringify(value)
    }
    if (Array.isArray(value)) {
        return `[${value.map(item => formatValue(item)).join(', ')}]`
    }
    if (typeof value === 'object') {
        const entries = Object.entries(value)
        if (entries.length === 0) {
            return '{}'
        }
        return `{ ${entries.map(([key, item]) => `${key} = ${formatValue(item)}`).join(', ')} }`
    }
    return String(value)
}

const CHANGE_HEADERS: Record<ChangeAction, { symbol: string, verb: string }> = {
    'create': { symbol: '+', verb: 'created' },
    'update': { symbol: '~', verb: 'updated in-place' },
    'replace': { symbol: '-/+', verb: 'replaced' },
    'delete': { symbol: '-', verb: 'destroyed' },
    'no-op': { symbol: ' ', verb: 'left unchanged' },
}

function renderChange(change: ResourceChange): string[] {
    const header = CHANGE_HEADERS[change.action]
    const lines = [`  ${header.symbol} ${change.address} will be ${header.verb}`]

    if (change.action === 'create' && change.after) {
        for (const [name, value] of Object.entries(change.after)) {
            lines.push(`      ${name} = ${formatValue(value)}`)
        }
    }

    if ((change.action === 'update' || change.action === 'replace') && change.after) {
        for (const name of change.changedAttributes) {
            const before = change.before?.[name]
            const after = change.after[name]
            const suffix = change.replaceReasons.includes(name) ? ' # forces replacement' : ''
            lines.push(`      ${name}: ${formatValue(before)} -> ${formatValue(after)}${suffix}`)
        }
    }

    return lines
}

/**
 * Human-readable plan, one line per entry.
 */
export function renderPlan(plan: Plan): string[] {
    const lines: string[] = []

    if (plan.status === 'errored') {
        for (const error of plan.errors) {
            lines.push(`Plan failed: ${error.code ? `[${error.code}] ` : ''}${error.message}`)
        }
        return lines
    }

    const provider = plan.provider ? `${plan.provider.name} in ${plan.provider.region}` : 'unknown provider'
    lines.push(`Plan for ${provider} (engine: ${plan.engine})`)
    lines.push('')

    if (!hasChanges(plan)) {
        lines.push('No changes. Infrastructure matches the declaration set.')
    } else {
        for (const change of plan.changes.filter(c => c.action !== 'no-op')) {
            lines.push(...renderChange(change))
        }
    }

    if (plan.outputs.length > 0) {
        lines.push('')
        lines.push('Outputs:')
        for (const output of plan.outputs) {
            const value = output.sensitive ? SENSITIVE : (output.known ? formatValue(output.value) : KNOWN_AFTER_APPLY)
            lines.push(`  ${output.name} = ${value}`)
        }
    }

    lines.push('')
    lines.push(`Plan: ${plan.summary.add} to add, ${plan.summary.change} to change, ${plan.summary.destroy} to destroy.`)
    return lines
}
