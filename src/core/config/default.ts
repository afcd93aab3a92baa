import * as path from 'path'
import { CoreConfig, CoreConfigInput, CoreConfigSchema } from './interface'
import {
    DEFAULT_ARTIFACTS_DIR,
    DEFAULT_PLAN_FILE,
    DEFAULT_STATE_FILE,
    ENGINE_LOCAL,
    PULUMI_AWS_PLUGIN_VERSION,
    PULUMI_DEFAULT_BACKEND_DIR,
    PULUMI_DEFAULT_PROJECT,
    PULUMI_DEFAULT_STACK,
} from '../const'
import { ErrorEnvironment, createError, toError } from '../errors/taxonomy'
import { ERROR_CODES } from '../errors/codes'
import { LOG_LEVEL_INFO, parseLogLevel } from '../../log/utils'

export type Environment = Readonly<Record<string, string | undefined>>

export const DEFAULT_CORE_CONFIG: CoreConfig = deepFreeze({
    workDir: '.',
    stateFile: DEFAULT_STATE_FILE,
    planFile: DEFAULT_PLAN_FILE,
    artifactsDir: DEFAULT_ARTIFACTS_DIR,
    engine: ENGINE_LOCAL,
    environment: ErrorEnvironment.DEVELOPMENT,
    logLevel: LOG_LEVEL_INFO,
    pulumi: {
        projectName: PULUMI_DEFAULT_PROJECT,
        stackName: PULUMI_DEFAULT_STACK,
        backendUrl: `file://${PULUMI_DEFAULT_BACKEND_DIR}`,
        awsPluginVersion: PULUMI_AWS_PLUGIN_VERSION,
    },
})

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value)
        for (const child of Object.values(value)) {
            deepFreeze(child)
        }
    }
    return value
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value.trim() === '' ? undefined : value.trim()
}

/**
 * Builds the immutable CoreConfig from environment variables.
 */
export class ConfigLoader {

    /**
     * @param env environment variables, usually process.env
     * @param cwd directory relative paths resolve against
     */
    static load(env: Environment, cwd: string): CoreConfig {
        const workDir = path.resolve(cwd)
        const raw = {
            region: nonEmpty(env.AWS_REGION) ?? nonEmpty(env.AWS_DEFAULT_REGION),
            workDir: workDir,
            stateFile: nonEmpty(env.STACKPLAN_STATE_FILE) ?? DEFAULT_CORE_CONFIG.stateFile,
            planFile: nonEmpty(env.STACKPLAN_PLAN_FILE) ?? DEFAULT_CORE_CONFIG.planFile,
            artifactsDir: nonEmpty(env.STACKPLAN_ARTIFACTS_DIR) ?? DEFAULT_CORE_CONFIG.artifactsDir,
            engine: nonEmpty(env.STACKPLAN_ENGINE) ?? DEFAULT_CORE_CONFIG.engine,
            environment: nonEmpty(env.STACKPLAN_ENV)?.toUpperCase() ?? DEFAULT_CORE_CONFIG.environment,
            logLevel: parseLogLevel(env.STACKPLAN_LOG_LEVEL, DEFAULT_CORE_CONFIG.logLevel),
            pulumi: {
                projectName: DEFAULT_CORE_CONFIG.pulumi.projectName,
                stackName: nonEmpty(env.STACKPLAN_PULUMI_STACK) ?? DEFAULT_CORE_CONFIG.pulumi.stackName,
                backendUrl: nonEmpty(env.STACKPLAN_PULUMI_BACKEND_URL)
                    ?? `file://${path.join(workDir, PULUMI_DEFAULT_BACKEND_DIR)}`,
                passphrase: env.PULUMI_CONFIG_PASSPHRASE,
                commandRoot: nonEmpty(env.STACKPLAN_PULUMI_ROOT),
                awsPluginVersion: DEFAULT_CORE_CONFIG.pulumi.awsPluginVersion,
            },
        }
        return ConfigLoader.fromObject(raw)
    }

    /**
     * Validate a raw config object. Relative paths are resolved against workDir.
     */
    static fromObject(raw: unknown): CoreConfig {
        const result = CoreConfigSchema.safeParse(raw)
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
            throw createError(ERROR_CODES.CONFIG_INVALID, { issues }, toError(result.error))
        }
        return deepFreeze(ConfigLoader.resolvePaths(result.data))
    }

    private static resolvePaths(config: CoreConfigInput): CoreConfigInput {
        const workDir = path.resolve(config.workDir)
        const pulumiRoot = config.pulumi.commandRoot
        return {
            ...config,
            workDir: workDir,
            stateFile: path.resolve(workDir, config.stateFile),
            planFile: path.resolve(workDir, config.planFile),
            artifactsDir: path.resolve(workDir, config.artifactsDir),
            pulumi: {
                ...config.pulumi,
                commandRoot: pulumiRoot === undefined ? undefined : path.resolve(workDir, pulumiRoot),
            },
        }
    }
}
