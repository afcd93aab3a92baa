import * as fs from 'fs'
import * as path from 'path'
import { expect } from 'chai'
import { ArtifactStore, shouldRetain } from '../../../src/pipeline/artifacts'
import { loadPipelineDefinition, parsePipelineDefinition, PipelineDefinition } from '../../../src/pipeline/definition'
import { PipelineRunner } from '../../../src/pipeline/runner'
import { pushEvent } from '../../../src/pipeline/trigger'
import { CommandHandler, RecordingExecutor, createTempDir, fail } from '../utils'

const REPO_PIPELINE = path.resolve(__dirname, '../../../pipeline.yml')
const PLAN_COMMAND = 'node dist/main.js plan --no-refresh --out plan.out'
const PLAN_CONTENT = '{"status":"planned"}\n'

/**
 * The plan command writes plan.out in the job directory, then exits with `exitCode`.
 */
function planWriter(exitCode = 0): CommandHandler {
    return (command, options) => {
        if (command === PLAN_COMMAND) {
            fs.writeFileSync(path.join(options.cwd, 'plan.out'), PLAN_CONTENT)
            return exitCode === 0 ? undefined : fail(exitCode, 'Plan failed')
        }
        return undefined
    }
}

describe('PipelineRunner', () => {

    let workDir: string
    let artifactsDir: string
    let cleanupWork: () => void
    let cleanupArtifacts: () => void
    let definition: PipelineDefinition

    beforeEach(async () => {
        ({ dir: workDir, cleanup: cleanupWork } = createTempDir('stackplan-job-'));
        ({ dir: artifactsDir, cleanup: cleanupArtifacts } = createTempDir('stackplan-artifacts-'))
        definition = await loadPipelineDefinition(REPO_PIPELINE)
    })

    afterEach(() => {
        cleanupWork()
        cleanupArtifacts()
    })

    function runnerFor(executor: RecordingExecutor, pipeline: PipelineDefinition = definition) {
        return new PipelineRunner({
            definition: pipeline,
            executor,
            artifacts: new ArtifactStore(artifactsDir),
            workDir,
            baseEnv: { HOME: '/home/ci', UNSET: undefined, AWS_REGION: 'eu-west-1' },
        })
    }

    it('should run the plan job on a push to main and keep the plan', async () => {
        const executor = new RecordingExecutor(planWriter())
        const outcome = await runnerFor(executor).run(pushEvent('main'))

        expect(executor.commands).to.deep.equal([...definition.jobs[0].beforeScript, ...definition.jobs[0].script])
        expect(outcome.status).to.equal('success')
        expect(outcome.exitCode).to.equal(0)
        expect(outcome.stages.map(s => [s.stage, s.status])).to.deep.equal([['plan', 'success']])

        const job = outcome.stages[0].jobs[0]
        const location = path.join(artifactsDir, 'stack_plan', 'plan.out')
        expect(job.status).to.equal('success')
        expect(job.steps.every(step => step.status === 'success')).to.equal(true)
        expect(job.artifacts).to.deep.equal([{ path: 'plan.out', retained: true, location }])
        expect(fs.readFileSync(location, 'utf8')).to.equal(PLAN_CONTENT)
    })

    it('should give jobs the pipeline variables over the inherited environment', async () => {
        const executor = new RecordingExecutor(planWriter())
        await runnerFor(executor).run(pushEvent('main'))

        const { cwd, env } = executor.calls[0].options
        expect(cwd).to.equal(workDir)
        expect(env).to.deep.equal({
            HOME: '/home/ci',
            AWS_REGION: 'us-east-1',
            PULUMI_VERSION: '3.130.0',
            STACKPLAN_ENGINE: 'pulumi',
            STACKPLAN_PULUMI_ROOT: '.pulumi',
            CI: 'true',
            CI_COMMIT_BRANCH: 'main',
            CI_JOB_NAME: 'stack_plan',
            CI_JOB_STAGE: 'plan',
        })
    })

    it('should keep the plan of a failed plan command and fail with its exit code', async () => {
        const executor = new RecordingExecutor(planWriter(3))
        const outcome = await runnerFor(executor).run(pushEvent('main'))

        const job = outcome.stages[0].jobs[0]
        expect(outcome.status).to.equal('failed')
        expect(outcome.exitCode).to.equal(3)
        expect(job.status).to.equal('failed')
        expect(job.failedCommand).to.equal(PLAN_COMMAND)
        expect(job.steps[8]).to.include({ command: PLAN_COMMAND, status: 'failed', exitCode: 3, stderr: 'Plan failed' })
        expect(job.artifacts[0].retained).to.equal(true)
        expect(fs.readFileSync(path.join(artifactsDir, 'stack_plan', 'plan.out'), 'utf8')).to.equal(PLAN_CONTENT)
    })

    it('should stop at the first failing command and skip the rest', async () => {
        const executor = new RecordingExecutor(command => command.startsWith('npm install') ? fail(1, 'npm ERR! network') : undefined)
        const outcome = await runnerFor(executor).run(pushEvent('main'))

        const job = outcome.stages[0].jobs[0]
        expect(executor.commands).to.deep.equal(['echo "Setting up environment..."', 'npm install --no-audit --no-fund'])
        expect(job.steps.map(step => step.status)).to.deep.equal([
            'success', 'failed', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped', 'skipped',
        ])
        expect(job.exitCode).to.equal(1)
        expect(outcome.exitCode).to.equal(1)
        expect(job.artifacts).to.deep.equal([{ path: 'plan.out', retained: false, reason: 'not produced' }])
    })

    it('should not run the plan job for other branches', async () => {
        const executor = new RecordingExecutor(planWriter())
        const outcome = await runnerFor(executor).run(pushEvent('feature/login'))

        expect(executor.calls).to.have.length(0)
        expect(outcome.status).to.equal('skipped')
        expect(outcome.exitCode).to.equal(0)
        expect(outcome.stages[0].status).to.equal('skipped')
        expect(outcome.stages[0].jobs[0]).to.include({ job: 'stack_plan', status: 'skipped', skipReason: 'not-triggered' })
        expect(fs.existsSync(path.join(artifactsDir, 'stack_plan'))).to.equal(false)
    })

    describe('stages', () => {

        const multiStage = parsePipelineDefinition([
            'stages: [build, test, deploy]',
            'after_script: [echo cleanup]',
            'compile:',
            '  stage: build',
            '  script: [make, make report > report.txt]',
            '  artifacts:',
            '    paths: [report.txt]',
            'lint:',
            '  stage: build',
            '  script: [make lint]',
            'unit:',
            '  stage: test',
            '  script: [make test]',
            'ship:',
            '  stage: deploy',
            '  script: [make ship]',
        ].join('\n'), 'multi.yml')

        it('should run stages in order and jobs of a stage in file order', async () => {
            const executor = new RecordingExecutor()
            const outcome = await runnerFor(executor, multiStage).run(pushEvent('main'))

            expect(executor.commands).to.deep.equal([
                'make', 'make report > report.txt', 'echo cleanup',
                'make lint', 'echo cleanup',
                'make test', 'echo cleanup',
                'make ship', 'echo cleanup',
            ])
            expect(outcome.stages.map(s => s.stage)).to.deep.equal(['build', 'test', 'deploy'])
            expect(outcome.status).to.equal('success')
        })

        it('should skip later stages once a stage fails, after running the whole failed stage', async () => {
            const executor = new RecordingExecutor(command => command === 'make' ? fail(2) : undefined)
            const outcome = await runnerFor(executor, multiStage).run(pushEvent('main'))

            expect(executor.commands).to.deep.equal(['make', 'echo cleanup', 'make lint', 'echo cleanup'])
            expect(outcome.stages.map(s => [s.stage, s.status])).to.deep.equal([
                ['build', 'failed'],
                ['test', 'skipped'],
                ['deploy', 'skipped'],
            ])
            expect(outcome.stages[0].jobs.map(j => j.status)).to.deep.equal(['failed', 'success'])
            expect(outcome.stages[1].jobs[0].skipReason).to.equal('earlier-stage-failed')
            expect(outcome.exitCode).to.equal(2)
            expect(outcome.stages[0].jobs[0].artifacts).to.deep.equal([{ path: 'report.txt', retained: false, reason: 'when: on_success' }])
        })

        it('should ignore after_script failures', async () => {
            const executor = new RecordingExecutor(command => command === 'echo cleanup' ? fail(127) : undefined)
            const outcome = await runnerFor(executor, multiStage).run(pushEvent('main'))

            expect(outcome.status).to.equal('success')
            expect(outcome.stages[2].jobs[0].afterScript[0]).to.include({ status: 'failed', exitCode: 127 })
        })
    })

    describe('artifact rules', () => {

        it('should retain by rule and job status', () => {
            expect(shouldRetain('always', 'success')).to.equal(true)
            expect(shouldRetain('always', 'failed')).to.equal(true)
            expect(shouldRetain('on_success', 'success')).to.equal(true)
            expect(shouldRetain('on_success', 'failed')).to.equal(false)
            expect(shouldRetain('on_failure', 'success')).to.equal(false)
            expect(shouldRetain('on_failure', 'failed')).to.equal(true)
        })

        it('should keep directories recursively', async () => {
            fs.mkdirSync(path.join(workDir, 'reports', 'unit'), { recursive: true })
            fs.writeFileSync(path.join(workDir, 'reports', 'unit', 'junit.xml'), '<testsuites/>')

            const store = new ArtifactStore(artifactsDir)
            const records = await store.retain('unit', ['reports'], workDir)

            expect(records).to.deep.equal([{ path: 'reports', retained: true, location: path.join(artifactsDir, 'unit', 'reports') }])
            expect(fs.readFileSync(path.join(artifactsDir, 'unit', 'reports', 'unit', 'junit.xml'), 'utf8')).to.equal('<testsuites/>')
        })
    })
})
