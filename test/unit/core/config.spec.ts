import * as assert from 'assert'
import * as path from 'path'
import { ConfigLoader, DEFAULT_CORE_CONFIG } from '../../../src/core/config/default'
import { ConfigurationError, ErrorEnvironment } from '../../../src/core/errors/taxonomy'

describe('ConfigLoader', () => {

    const cwd = path.resolve('/work/project')

    it('should build defaults from an empty environment', () => {
        const config = ConfigLoader.load({}, cwd)

        assert.strictEqual(config.region, undefined)
        assert.strictEqual(config.workDir, cwd)
        assert.strictEqual(config.engine, 'local')
        assert.strictEqual(config.environment, ErrorEnvironment.DEVELOPMENT)
        assert.strictEqual(config.logLevel, 3)
        assert.strictEqual(config.stateFile, path.join(cwd, '.stackplan/state.json'))
        assert.strictEqual(config.planFile, path.join(cwd, 'plan.out'))
        assert.strictEqual(config.artifactsDir, path.join(cwd, '.artifacts'))
        assert.strictEqual(config.pulumi.projectName, 'stackplan')
        assert.strictEqual(config.pulumi.stackName, 'dev')
        assert.strictEqual(config.pulumi.backendUrl, `file://${path.join(cwd, '.stackplan/pulumi-backend')}`)
        assert.strictEqual(config.pulumi.commandRoot, undefined)
    })

    it('should read region and settings from the environment', () => {
        const config = ConfigLoader.load({
            AWS_REGION: 'eu-west-3',
            STACKPLAN_ENGINE: 'pulumi',
            STACKPLAN_PLAN_FILE: 'out/plan.json',
            STACKPLAN_ENV: 'production',
            STACKPLAN_LOG_LEVEL: '5',
            STACKPLAN_PULUMI_STACK: 'ci',
            STACKPLAN_PULUMI_ROOT: '.pulumi',
            PULUMI_CONFIG_PASSPHRASE: 'test-passphrase',
        }, cwd)

        assert.strictEqual(config.region, 'eu-west-3')
        assert.strictEqual(config.engine, 'pulumi')
        assert.strictEqual(config.planFile, path.join(cwd, 'out/plan.json'))
        assert.strictEqual(config.environment, ErrorEnvironment.PRODUCTION)
        assert.strictEqual(config.logLevel, 5)
        assert.strictEqual(config.pulumi.stackName, 'ci')
        assert.strictEqual(config.pulumi.commandRoot, path.join(cwd, '.pulumi'))
        assert.strictEqual(config.pulumi.passphrase, 'test-passphrase')
    })

    it('should fall back to AWS_DEFAULT_REGION and ignore blank values', () => {
        const config = ConfigLoader.load({ AWS_REGION: '  ', AWS_DEFAULT_REGION: 'us-west-2' }, cwd)
        assert.strictEqual(config.region, 'us-west-2')
    })

    it('should keep absolute paths as given', () => {
        const config = ConfigLoader.load({ STACKPLAN_STATE_FILE: '/var/lib/stackplan/state.json' }, cwd)
        assert.strictEqual(config.stateFile, '/var/lib/stackplan/state.json')
    })

    it('should reject an invalid region', () => {
        assert.throws(
            () => ConfigLoader.load({ AWS_REGION: 'Mars-1' }, cwd),
            (error: unknown) => error instanceof ConfigurationError
                && error.code === 'CONFIG_INVALID'
                && error.message.includes('region: Invalid AWS region')
        )
    })

    it('should reject an unknown engine', () => {
        assert.throws(
            () => ConfigLoader.load({ STACKPLAN_ENGINE: 'terraform' }, cwd),
            (error: unknown) => error instanceof ConfigurationError && error.message.includes('engine')
        )
    })

    it('should return a deeply frozen config', () => {
        const config = ConfigLoader.load({}, cwd)
        assert.ok(Object.isFrozen(config))
        assert.ok(Object.isFrozen(config.pulumi))
        assert.ok(Object.isFrozen(DEFAULT_CORE_CONFIG))
    })
})
