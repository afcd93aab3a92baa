import * as path from 'path'
import { expect } from 'chai'
import { PipelineError } from '../../../src/core/errors/taxonomy'
import { loadPipelineDefinition, parsePipelineDefinition } from '../../../src/pipeline/definition'
import { isTriggeredBy, pushEvent } from '../../../src/pipeline/trigger'

const REPO_PIPELINE = path.resolve(__dirname, '../../../pipeline.yml')

function parse(content: string) {
    return parsePipelineDefinition(content, 'pipeline.yml')
}

describe('Pipeline definition', () => {

    it('should load the repository pipeline', async () => {
        const definition = await loadPipelineDefinition(REPO_PIPELINE)

        expect(definition.source).to.equal(REPO_PIPELINE)
        expect(definition.stages).to.deep.equal(['plan'])
        expect(definition.variables).to.deep.equal({
            AWS_REGION: 'us-east-1',
            PULUMI_VERSION: '3.130.0',
            STACKPLAN_ENGINE: 'pulumi',
            STACKPLAN_PULUMI_ROOT: '.pulumi',
        })
        expect(definition.jobs).to.have.length(1)

        const job = definition.jobs[0]
        expect(job.name).to.equal('stack_plan')
        expect(job.stage).to.equal('plan')
        expect(job.beforeScript).to.deep.equal([
            'echo "Setting up environment..."',
            'npm install --no-audit --no-fund',
            'npm run build',
            'curl -fsSL https://get.pulumi.com | sh -s -- --version "$PULUMI_VERSION" --install-root .pulumi --no-edit-path',
            '.pulumi/bin/pulumi version',
        ])
        expect(job.script).to.deep.equal([
            'echo "Initializing stack..."',
            'node dist/main.js init',
            'echo "Running plan..."',
            'node dist/main.js plan --no-refresh --out plan.out',
        ])
        expect(job.afterScript).to.deep.equal([])
        expect(job.artifacts).to.deep.equal({ paths: ['plan.out'], when: 'always' })
        expect(job.only).to.deep.equal(['main'])
    })

    it('should apply defaults and skip hidden jobs', () => {
        const definition = parse([
            'variables:',
            '  RETRIES: 3',
            '  DEBUG: true',
            '.template:',
            '  script: echo template',
            'unit:',
            '  script: npm test',
            '  only: main',
            '  artifacts:',
            '    paths: [coverage]',
            '  before_script: mkdir coverage',
        ].join('\n'))

        expect(definition.stages).to.deep.equal(['build', 'test', 'deploy'])
        expect(definition.variables).to.deep.equal({ RETRIES: '3', DEBUG: 'true' })
        expect(definition.jobs.map(j => j.name)).to.deep.equal(['unit'])
        expect(definition.jobs[0]).to.deep.include({
            stage: 'test',
            script: ['npm test'],
            beforeScript: ['mkdir coverage'],
            only: ['main'],
            artifacts: { paths: ['coverage'], when: 'on_success' },
        })
    })

    it('should let a job override the global scripts', () => {
        const definition = parse([
            'before_script: [echo global]',
            'after_script: [echo cleanup]',
            'a:',
            '  script: [echo a]',
            'b:',
            '  before_script: [echo own]',
            '  after_script: []',
            '  script: [echo b]',
        ].join('\n'))

        expect(definition.jobs.map(j => [j.beforeScript, j.afterScript])).to.deep.equal([
            [['echo global'], ['echo cleanup']],
            [['echo own'], []],
        ])
    })

    it('should reject a job in an undeclared stage', () => {
        expect(() => parse('stages: [build]\nship:\n  stage: release\n  script: make ship'))
            .to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: ship.stage: stage release is not declared in stages')
    })

    it('should reject a job without script', () => {
        expect(() => parse('lint:\n  stage: test'))
            .to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: lint.script: a command or a list of commands is required')
    })

    it('should reject a script that is not a command list', () => {
        expect(() => parse('lint:\n  stage: test\n  script:\n    run: make lint'))
            .to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: lint.script: must be a command or a list of commands')
    })

    it('should reject a file without jobs', () => {
        expect(() => parse('stages: [plan]\n.hidden:\n  script: echo'))
            .to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: no jobs defined')
    })

    it('should reject a file that is not a mapping', () => {
        expect(() => parse('- echo one\n- echo two'))
            .to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: top level must be a mapping')
    })

    it('should reject malformed YAML', () => {
        expect(() => parse('job: [unclosed')).to.throw(PipelineError, 'Invalid pipeline definition pipeline.yml: ')
    })

    it('should reject an artifact no command produces', () => {
        expect(() => parse('build:\n  script: make\n  artifacts:\n    paths: [report.xml]'))
            .to.throw(PipelineError, 'Job build keeps artifact report.xml but none of its commands names it')
    })

    it('should reject a missing file', async () => {
        let thrown: unknown
        try {
            await loadPipelineDefinition(path.join(path.dirname(REPO_PIPELINE), 'absent-pipeline.yml'))
        } catch (error: unknown) {
            thrown = error
        }
        expect(thrown).to.be.instanceOf(PipelineError)
    })

    describe('triggers', () => {

        it('should trigger jobs only on listed branches', () => {
            const job = { only: parse('j:\n  script: x\n  only: [main, release]').jobs[0].only }
            expect(isTriggeredBy(job, pushEvent('main'))).to.equal(true)
            expect(isTriggeredBy(job, pushEvent('release'))).to.equal(true)
            expect(isTriggeredBy(job, pushEvent('feature/login'))).to.equal(false)
            expect(isTriggeredBy(job, pushEvent('main-backup'))).to.equal(false)
        })

        it('should trigger jobs without only on every branch', () => {
            expect(isTriggeredBy({ only: undefined }, pushEvent('feature/login'))).to.equal(true)
        })
    })
})
