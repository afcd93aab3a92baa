import { exec } from 'child_process'
import { promisify } from 'util'
import { getLogger, Logger } from '../../log/utils'

const execAsync = promisify(exec)

export interface CommandOptions {
    cwd: string
    env: Record<string, string>
}

export interface CommandResult {
    exitCode: number
    stdout: string
    stderr: string
}

/**
 * Runs a single shell command line. Never throws for a nonzero exit: the exit code is part of the result.
 */
export interface CommandExecutor {
    execute(command: string, options: CommandOptions): Promise<CommandResult>
}

export interface ShellCommandExecutorArgs {
    /** Defaults to /bin/sh */
    shell?: string
    /** Per-command timeout. 0 means none. */
    timeoutMs?: number
}

const DEFAULT_MAX_BUFFER = 50 * 1024 * 1024

function stringField(error: object, field: 'stdout' | 'stderr'): string | undefined {
    if (field in error) {
        const value: unknown = Reflect.get(error, field)
        return typeof value === 'string' ? value : undefined
    }
    return undefined
}

/**
 * Exit code of a failed child process. Spawn failures and signals map to 1.
 */
export function exitCodeOf(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
        return error.code
    }
    return 1
}

export class ShellCommandExecutor implements CommandExecutor {

    private readonly logger: Logger
    private readonly shell: string
    private readonly timeoutMs: number

    constructor(args: ShellCommandExecutorArgs = {}) {
        this.logger = getLogger(ShellCommandExecutor.name)
        this.shell = args.shell ?? '/bin/sh'
        this.timeoutMs = args.timeoutMs ?? 0
    }

    async execute(command: string, options: CommandOptions): Promise<CommandResult> {
        this.logger.debug(`$ ${command}`, { cwd: options.cwd })
        try {
            const { stdout, stderr } = await execAsync(command, {
                cwd: options.cwd,
                env: options.env,
                shell: this.shell,
                timeout: this.timeoutMs,
                maxBuffer: DEFAULT_MAX_BUFFER,
            })
            return { exitCode: 0, stdout, stderr }
        } catch (error: unknown) {
            if (typeof error !== 'object' || error === null) {
                return { exitCode: 1, stdout: '', stderr: String(error) }
            }
            const message = error instanceof Error ? error.message : String(error)
            return {
                exitCode: exitCodeOf(error),
                stdout: stringField(error, 'stdout') ?? '',
                stderr: stringField(error, 'stderr') ?? message,
            }
        }
    }
}
