import { getLogger, Logger } from '../log/utils'
import { CommandExecutor } from '../tools/command/executor'
import { StepOutcome, runCommandSequence } from '../tools/command/sequence'
import { ArtifactRecord, ArtifactStore, shouldRetain } from './artifacts'
import { PipelineDefinition, PipelineJob } from './definition'
import { PushEvent, isTriggeredBy } from './trigger'

export type OutcomeStatus = 'success' | 'failed' | 'skipped'

export type SkipReason = 'not-triggered' | 'earlier-stage-failed'

/**
 * Result of one job. The job status and the artifacts kept are reported separately:
 * a failed job can still have retained artifacts.
 */
export interface JobOutcome {
    job: string
    stage: string
    status: OutcomeStatus
    skipReason?: SkipReason
    /** 0 unless the job failed */
    exitCode: number
    failedCommand?: string
    /** before_script and script steps */
    steps: StepOutcome[]
    afterScript: StepOutcome[]
    artifacts: ArtifactRecord[]
}

export interface StageOutcome {
    stage: string
    status: OutcomeStatus
    jobs: JobOutcome[]
}

export interface PipelineOutcome {
    branch: string
    status: OutcomeStatus
    /** 0 on success or when nothing ran, else the exit code of the first failed command */
    exitCode: number
    stages: StageOutcome[]
}

export interface PipelineRunnerArgs {
    definition: PipelineDefinition
    executor: CommandExecutor
    artifacts: ArtifactStore
    /** Directory jobs run in */
    workDir: string
    /** Environment jobs inherit, usually the process environment */
    baseEnv?: Readonly<Record<string, string | undefined>>
}

function skippedJob(job: PipelineJob, reason: SkipReason): JobOutcome {
    return {
        job: job.name,
        stage: job.stage,
        status: 'skipped',
        skipReason: reason,
        exitCode: 0,
        steps: [],
        afterScript: [],
        artifacts: [],
    }
}

function stageStatus(jobs: JobOutcome[]): OutcomeStatus {
    if (jobs.some(job => job.status === 'failed')) {
        return 'failed'
    }
    return jobs.some(job => job.status === 'success') ? 'success' : 'skipped'
}

/**
 * Runs a pipeline for a push event: stages in declared order, jobs of a stage in file order.
 * A failed stage stops every later stage.
 */
export class PipelineRunner {

    private readonly logger: Logger

    constructor(private readonly args: PipelineRunnerArgs) {
        this.logger = getLogger(PipelineRunner.name)
    }

    async run(event: PushEvent): Promise<PipelineOutcome> {
        const { definition } = this.args
        this.logger.info(`Running pipeline ${definition.source} for push to ${event.branch}`)

        const stages: StageOutcome[] = []
        let failed = false

        for (const stage of definition.stages) {
            const jobs: JobOutcome[] = []
            for (const job of definition.jobs.filter(j => j.stage === stage)) {
                if (failed) {
                    jobs.push(skippedJob(job, 'earlier-stage-failed'))
                } else if (!isTriggeredBy(job, event)) {
                    this.logger.info(`Job ${job.name} is not triggered by a push to ${event.branch}`)
                    jobs.push(skippedJob(job, 'not-triggered'))
                } else {
                    jobs.push(await this.runJob(job, event))
                }
            }
            const status = stageStatus(jobs)
            stages.push({ stage, status, jobs })
            failed = failed || status === 'failed'
        }

        const jobs = stages.flatMap(stage => stage.jobs)
        const firstFailure = jobs.find(job => job.status === 'failed')
        const outcome: PipelineOutcome = {
            branch: event.branch,
            status: firstFailure ? 'failed' : stageStatus(jobs),
            exitCode: firstFailure ? firstFailure.exitCode : 0,
            stages,
        }
        this.logger.info(`Pipeline ${outcome.status}`, { exitCode: outcome.exitCode })
        return outcome
    }

    private jobEnv(job: PipelineJob, event: PushEvent): Record<string, string> {
        const env: Record<string, string> = {}
        for (const [key, value] of Object.entries(this.args.baseEnv ?? {})) {
            if (value !== undefined) {
                env[key] = value
            }
        }
        return {
            ...env,
            ...this.args.definition.variables,
            ...job.variables,
            CI: 'true',
            CI_COMMIT_BRANCH: event.branch,
            CI_JOB_NAME: job.name,
            CI_JOB_STAGE: job.stage,
        }
    }

    /**
     * before_script and script run as one fail-fast sequence. after_script always runs,
     * its failures do not change the job status. Artifacts are collected last.
     */
    private async runJob(job: PipelineJob, event: PushEvent): Promise<JobOutcome> {
        this.logger.info(`Job ${job.name} (stage ${job.stage}) started`)
        const options = { cwd: this.args.workDir, env: this.jobEnv(job, event) }
        const hooks = {
            onStepStart: (command: string) => this.logger.info(`$ ${command}`),
            onStepEnd: (step: StepOutcome) => {
                if (step.stdout.trim() !== '') {
                    this.logger.info(step.stdout.trimEnd())
                }
                if (step.status === 'failed') {
                    this.logger.error(`"${step.command}" exited with ${step.exitCode}`, step.stderr.trimEnd())
                }
            },
        }

        const main = await runCommandSequence([...job.beforeScript, ...job.script], this.args.executor, options, hooks)

        const after = await runCommandSequence(job.afterScript, this.args.executor, options, hooks)
        if (after.status === 'failed') {
            this.logger.warn(`after_script of job ${job.name} failed with ${after.exitCode}, ignored`)
        }

        const rule = job.artifacts
        let artifacts: ArtifactRecord[] = []
        if (rule && shouldRetain(rule.when, main.status)) {
            artifacts = await this.args.artifacts.retain(job.name, rule.paths, this.args.workDir)
        } else if (rule) {
            artifacts = rule.paths.map(path => ({ path, retained: false, reason: `when: ${rule.when}` }))
        }

        if (main.status === 'failed') {
            this.logger.error(`Job ${job.name} failed: "${main.failedCommand}" exited with ${main.exitCode}`)
        } else {
            this.logger.info(`Job ${job.name} succeeded`)
        }

        return {
            job: job.name,
            stage: job.stage,
            status: main.status,
            exitCode: main.exitCode,
            failedCommand: main.failedCommand,
            steps: main.steps,
            afterScript: after.steps,
            artifacts,
        }
    }
}
