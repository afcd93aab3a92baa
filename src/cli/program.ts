import * as path from 'path'
import { Command, Option } from '@commander-js/extra-typings'
import { CoreConfig } from '../core/config/interface'
import { DEFAULT_PIPELINE_FILE, STACKPLAN_VERSION, SUPPORTED_ENGINES } from '../core/const'
import { ErrorEnvironment, createError, extractErrorDetails, isStackPlanError, toError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { BOOTSTRAP_CONTAINER_NAME, BOOTSTRAP_SCRIPT, bootstrapCommands } from '../declaration/bootstrap'
import { defaultDeclarationSet } from '../declaration/default-set'
import { DeclarationSet } from '../declaration/types'
import { evaluateDeclarationSet } from '../engine/evaluator'
import { parseOverrideArgs } from '../engine/parameters'
import { readPlanFile, renderPlan } from '../engine/plan'
import { LOG_LEVEL_DEBUG, getLogger, setLogVerbosity } from '../log/utils'
import { ArtifactStore } from '../pipeline/artifacts'
import { loadPipelineDefinition } from '../pipeline/definition'
import { PipelineOutcome, PipelineRunner } from '../pipeline/runner'
import { pushEvent } from '../pipeline/trigger'
import { createPlanEngine } from '../providers/factory'
import { CommandExecutor, ShellCommandExecutor } from '../tools/command/executor'

export interface ProgramOptions {
    config: CoreConfig
    /** Defaults to the web stack */
    declarations?: DeclarationSet
    /** Where command results are printed, one line per call. Defaults to stdout. */
    output?: (line: string) => void
    /** Runs pipeline commands */
    executor?: CommandExecutor
    /** Environment pipeline jobs inherit */
    env?: Readonly<Record<string, string | undefined>>
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value]
}

const engineOption = () => new Option('--engine <engine>', 'Plan engine').choices(SUPPORTED_ENGINES)

const varOption = () => new Option('--var <name=value>', 'Override a parameter, repeatable').argParser(collect).default([])

function describeOutcome(outcome: PipelineOutcome): string[] {
    const lines = [`Pipeline for ${outcome.branch}: ${outcome.status} (exit code ${outcome.exitCode})`]
    for (const stage of outcome.stages) {
        lines.push(`  stage ${stage.stage}: ${stage.status}`)
        for (const job of stage.jobs) {
            const reason = job.skipReason ? ` (${job.skipReason})` : ''
            lines.push(`    job ${job.job}: ${job.status}${reason}`)
            for (const artifact of job.artifacts) {
                lines.push(`      artifact ${artifact.path}: ${artifact.retained ? `kept at ${artifact.location}` : `not kept, ${artifact.reason}`}`)
            }
        }
    }
    return lines
}

/**
 * Log an error with its code, suggestions and cause chain.
 * In production only the generic message is logged.
 */
export function logFullError(error: unknown, environment = ErrorEnvironment.DEVELOPMENT): void {
    const logger = getLogger('cli')
    const details = extractErrorDetails(error, environment)
    logger.error(details.code === undefined ? details.message : `[${details.code}] ${details.message}`)
    for (const suggestion of details.suggestions ?? []) {
        logger.info(`Suggestion: ${suggestion}`)
    }
    if (environment === ErrorEnvironment.PRODUCTION) {
        return
    }

    let cause: unknown = toError(error).cause
    while (cause !== undefined) {
        const causeError = toError(cause)
        logger.debug(`Caused by: ${causeError.message}`)
        cause = causeError.cause
    }
}

/**
 * Process exit code for an error: the failing command's code for a failed pipeline, else 1.
 */
export function exitCodeFor(error: unknown): number {
    if (isStackPlanError(error) && error.code === ERROR_CODES.PIPELINE_JOB_FAILED.code) {
        const exitCode = error.context.exitCode
        if (typeof exitCode === 'number' && exitCode > 0) {
            return exitCode
        }
    }
    return 1
}

export function buildProgram(options: ProgramOptions) {
    const config = options.config
    const declarations = options.declarations ?? defaultDeclarationSet()
    const print = options.output ?? ((line: string) => console.info(line))

    const program = new Command('stackplan')
        .description('Plan a declared stack and run its plan pipeline')
        .version(STACKPLAN_VERSION)
        .option('--verbose', 'Log debug output')

    program.hook('preAction', () => {
        if (program.opts().verbose) {
            setLogVerbosity(LOG_LEVEL_DEBUG)
        }
    })

    program.command('validate')
        .description('Evaluate the declaration set and report the evaluation order')
        .addOption(varOption())
        .action((opts) => {
            const stack = evaluateDeclarationSet(declarations, config, parseOverrideArgs(opts.var))
            print(`Declaration set is valid: ${stack.resources.length} resources, ${stack.outputs.length} outputs, region ${stack.provider.region}`)
            stack.order.forEach((address, index) => print(`  ${index + 1}. ${address}`))
        })

    program.command('graph')
        .description('Print resources in dependency order with their direct dependencies')
        .addOption(varOption())
        .action((opts) => {
            const stack = evaluateDeclarationSet(declarations, config, parseOverrideArgs(opts.var))
            for (const resource of stack.resources) {
                const deps = resource.dependsOn.length > 0 ? resource.dependsOn.join(', ') : '(none)'
                print(`${resource.address} <- ${deps}`)
            }
        })

    program.command('init')
        .description('Prepare state, or the Pulumi stack and plugins')
        .addOption(engineOption())
        .action(async (opts) => {
            const engine = createPlanEngine(config, declarations, opts.engine)
            await engine.init()
            print(`Initialized ${engine.name} engine`)
        })

    program.command('plan')
        .description('Plan changes and write the plan file')
        .addOption(engineOption())
        .addOption(varOption())
        .option('--out <file>', 'Plan file path')
        .option('--no-refresh', 'Plan against recorded state without reading actual resources')
        .action(async (opts) => {
            const engine = createPlanEngine(config, declarations, opts.engine)
            const result = await engine.plan({
                out: opts.out === undefined ? undefined : path.resolve(config.workDir, opts.out),
                refresh: opts.refresh,
                overrides: parseOverrideArgs(opts.var),
            })
            renderPlan(result.plan).forEach(line => print(line))
            print('')
            print(`Plan saved to ${result.planFile}`)
        })

    program.command('show')
        .description('Render a plan file')
        .argument('<planFile>', 'Plan file path')
        .action(async (planFile) => {
            const plan = await readPlanFile(path.resolve(config.workDir, planFile))
            renderPlan(plan).forEach(line => print(line))
        })

    const pipeline = program.command('pipeline')
        .description('Pipeline operations')

    pipeline.command('run')
        .description('Run the pipeline for a push to a branch')
        .requiredOption('--branch <branch>', 'Pushed branch')
        .option('--file <file>', 'Pipeline file', DEFAULT_PIPELINE_FILE)
        .option('--artifacts-dir <dir>', 'Where artifacts are kept')
        .action(async (opts) => {
            const definition = await loadPipelineDefinition(path.resolve(config.workDir, opts.file))
            const artifactsDir = opts.artifactsDir === undefined
                ? config.artifactsDir
                : path.resolve(config.workDir, opts.artifactsDir)

            const runner = new PipelineRunner({
                definition,
                executor: options.executor ?? new ShellCommandExecutor(),
                artifacts: new ArtifactStore(artifactsDir),
                workDir: config.workDir,
                baseEnv: options.env ?? {},
            })
            const outcome = await runner.run(pushEvent(opts.branch))
            describeOutcome(outcome).forEach(line => print(line))

            const failed = outcome.stages.flatMap(stage => stage.jobs).find(job => job.status === 'failed')
            if (failed) {
                throw createError(ERROR_CODES.PIPELINE_JOB_FAILED, {
                    job: failed.job,
                    command: failed.failedCommand,
                    exitCode: failed.exitCode,
                })
            }
        })

    program.command('bootstrap')
        .description('Print the instance bootstrap script')
        .option('--commands', 'List commands in execution order instead of the script')
        .action((opts) => {
            if (opts.commands) {
                bootstrapCommands(BOOTSTRAP_SCRIPT).forEach((command, index) => print(`${index + 1}. ${command}`))
                print(`Not idempotent: a second run fails while container ${BOOTSTRAP_CONTAINER_NAME} exists`)
            } else {
                print(BOOTSTRAP_SCRIPT.trimEnd())
            }
        })

    return program
}
