import * as fs from 'fs'
import { parse as parseYaml } from 'yaml'
import { z } from 'zod'
import { createError, toError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { BranchName, CoreBrandedTypeCreators } from '../core/types/branded'
import { CORE_VALIDATION_PATTERNS } from '../core/validation/patterns'

export const ARTIFACT_WHEN = ['on_success', 'on_failure', 'always'] as const
export type ArtifactWhen = typeof ARTIFACT_WHEN[number]

/**
 * Stages of a pipeline file that declares none, and the stage of a job that names none.
 */
export const DEFAULT_STAGES = ['build', 'test', 'deploy'] as const
export const DEFAULT_JOB_STAGE = 'test'

/**
 * Top-level keys that are not jobs.
 */
const GLOBAL_KEYWORDS = new Set(['stages', 'variables', 'before_script', 'after_script', 'default', 'workflow', 'include'])

const CommandListSchema = z.union([z.string(), z.array(z.string())], {
    errorMap: (_issue, ctx) => ({
        message: ctx.data === undefined ? 'a command or a list of commands is required' : 'must be a command or a list of commands',
    }),
})
    .transform(value => typeof value === 'string' ? [value] : value)

const VariablesSchema = z.record(z.union([z.string(), z.number(), z.boolean()]))
    .transform(value => Object.fromEntries(Object.entries(value).map(([key, item]) => [key, String(item)])))

const branchName = z.string().regex(CORE_VALIDATION_PATTERNS.BRANCH_NAME, 'Must be a branch name')

const ArtifactsSchema = z.object({
    paths: z.array(z.string().min(1)).min(1),
    when: z.enum(ARTIFACT_WHEN).default('on_success'),
})

const JobSchema = z.object({
    stage: z.string().min(1).default(DEFAULT_JOB_STAGE),
    script: CommandListSchema,
    before_script: CommandListSchema.optional(),
    after_script: CommandListSchema.optional(),
    variables: VariablesSchema.optional(),
    artifacts: ArtifactsSchema.optional(),
    only: z.union([branchName, z.array(branchName)])
        .transform(value => typeof value === 'string' ? [value] : value)
        .optional(),
})

const GlobalsSchema = z.object({
    stages: z.array(z.string().min(1)).optional(),
    variables: VariablesSchema.optional(),
    before_script: CommandListSchema.optional(),
    after_script: CommandListSchema.optional(),
})

export interface ArtifactsRule {
    paths: string[]
    when: ArtifactWhen
}

export interface PipelineJob {
    name: string
    stage: string
    /** Job's own before_script, or the global one */
    beforeScript: string[]
    script: string[]
    /** Job's own after_script, or the global one */
    afterScript: string[]
    variables: Record<string, string>
    artifacts?: ArtifactsRule
    /** Branches that trigger the job. Absent means every branch. */
    only?: BranchName[]
}

export interface PipelineDefinition {
    source: string
    stages: string[]
    variables: Record<string, string>
    /** In file order */
    jobs: PipelineJob[]
}

function formatIssues(error: z.ZodError, prefix: string): string[] {
    return error.issues.map(issue => `${[prefix, ...issue.path].filter(p => p !== '').join('.')}: ${issue.message}`)
}

/**
 * Every artifact path must appear in one of its job's commands, which is how the file gets produced.
 */
function checkArtifactProducers(job: PipelineJob): void {
    const commands = [...job.beforeScript, ...job.script, ...job.afterScript]
    for (const artifactPath of job.artifacts?.paths ?? []) {
        if (!commands.some(command => command.includes(artifactPath))) {
            throw createError(ERROR_CODES.PIPELINE_ARTIFACT_NOT_PRODUCED, { job: job.name, path: artifactPath })
        }
    }
}

/**
 * Parse a GitLab CI style pipeline file. Hidden jobs (`.name`) are templates and are left out.
 *
 * @param source file path, used in error messages
 */
export function parsePipelineDefinition(content: string, source: string): PipelineDefinition {
    let raw: unknown
    try {
        raw = parseYaml(content)
    } catch (error: unknown) {
        const err = toError(error)
        throw createError(ERROR_CODES.PIPELINE_DEFINITION_INVALID, { path: source, issues: [err.message] }, err)
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw createError(ERROR_CODES.PIPELINE_DEFINITION_INVALID, { path: source, issues: ['top level must be a mapping'] })
    }

    const globals = GlobalsSchema.safeParse(raw)
    if (!globals.success) {
        throw createError(ERROR_CODES.PIPELINE_DEFINITION_INVALID, { path: source, issues: formatIssues(globals.error, '') }, toError(globals.error))
    }

    const stages: string[] = globals.data.stages ?? [...DEFAULT_STAGES]
    const issues: string[] = []
    const jobs: PipelineJob[] = []

    for (const [name, value] of Object.entries(raw)) {
        if (GLOBAL_KEYWORDS.has(name) || name.startsWith('.')) {
            continue
        }
        const parsed = JobSchema.safeParse(value)
        if (!parsed.success) {
            issues.push(...formatIssues(parsed.error, name))
            continue
        }
        const job = parsed.data
        if (!stages.includes(job.stage)) {
            issues.push(`${name}.stage: stage ${job.stage} is not declared in stages`)
            continue
        }
        jobs.push({
            name,
            stage: job.stage,
            beforeScript: job.before_script ?? globals.data.before_script ?? [],
            script: job.script,
            afterScript: job.after_script ?? globals.data.after_script ?? [],
            variables: job.variables ?? {},
            artifacts: job.artifacts,
            only: job.only?.map(branch => CoreBrandedTypeCreators.createBranchName(branch)),
        })
    }

    if (issues.length === 0 && jobs.length === 0) {
        issues.push('no jobs defined')
    }
    if (issues.length > 0) {
        throw createError(ERROR_CODES.PIPELINE_DEFINITION_INVALID, { path: source, issues })
    }

    for (const job of jobs) {
        checkArtifactProducers(job)
    }

    return {
        source,
        stages,
        variables: globals.data.variables ?? {},
        jobs,
    }
}

export async function loadPipelineDefinition(filePath: string): Promise<PipelineDefinition> {
    let content: string
    try {
        content = await fs.promises.readFile(filePath, 'utf8')
    } catch (error: unknown) {
        const err = toError(error)
        throw createError(ERROR_CODES.PIPELINE_DEFINITION_INVALID, { path: filePath, issues: [err.message] }, err)
    }
    return parsePipelineDefinition(content, filePath)
}
