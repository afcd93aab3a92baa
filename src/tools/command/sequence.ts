import { CommandExecutor, CommandOptions } from './executor'

export type StepStatus = 'success' | 'failed' | 'skipped'

export interface StepOutcome {
    command: string
    status: StepStatus
    /** Absent for skipped steps */
    exitCode?: number
    stdout: string
    stderr: string
    durationMs: number
}

export interface SequenceOutcome {
    status: 'success' | 'failed'
    /** 0 on success, else the exit code of the failed command */
    exitCode: number
    failedCommand?: string
    steps: StepOutcome[]
}

export interface SequenceHooks {
    onStepStart?(command: string, index: number): void
    onStepEnd?(step: StepOutcome, index: number): void
}

/**
 * Run commands one after the other. The first nonzero exit stops the sequence:
 * later commands are not executed and reported as skipped.
 */
export async function runCommandSequence(
    commands: readonly string[],
    executor: CommandExecutor,
    options: CommandOptions,
    hooks: SequenceHooks = {}
): Promise<SequenceOutcome> {
    const steps: StepOutcome[] = []
    let failed: StepOutcome | undefined

    for (const [index, command] of commands.entries()) {
        if (failed) {
            steps.push({ command, status: 'skipped', stdout: '', stderr: '', durationMs: 0 })
            continue
        }

        hooks.onStepStart?.(command, index)
        const startedAt = Date.now()
        const result = await executor.execute(command, options)
        const step: StepOutcome = {
            command,
            status: result.exitCode === 0 ? 'success' : 'failed',
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
            durationMs: Date.now() - startedAt,
        }
        steps.push(step)
        hooks.onStepEnd?.(step, index)

        if (step.status === 'failed') {
            failed = step
        }
    }

    if (failed) {
        return { status: 'failed', exitCode: failed.exitCode ?? 1, failedCommand: failed.command, steps }
    }
    return { status: 'success', exitCode: 0, steps }
}
