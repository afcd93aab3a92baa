/**
 * First-boot script of the web instance, passed as `user_data`.
 *
 * The script is a fixed list of commands with no branching. It is not idempotent: running it
 * again on the same machine re-installs packages and tries to start a second container with the
 * same fixed name, which docker refuses. Kept as-is; see BOOTSTRAP_CONTAINER_NAME.
 */

import { getLogger } from '../log/utils'
import { BootstrapError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { CommandExecutor } from '../tools/command/executor'
import { runCommandSequence, StepOutcome } from '../tools/command/sequence'

export const BOOTSTRAP_CONTAINER_NAME = 'web-app'

export const BOOTSTRAP_SCRIPT = [
    '#!/bin/bash',
    'yum update -y',
    'amazon-linux-extras install docker -y',
    'service docker start',
    'usermod -a -G docker ec2-user',
    `docker run -d --name ${BOOTSTRAP_CONTAINER_NAME} -p 80:80 nginx:latest`,
    '',
].join('\n')

/**
 * Command lines of a script, without shebang, comments and blank lines.
 */
export function bootstrapCommands(script: string = BOOTSTRAP_SCRIPT): string[] {
    return script
        .split('\n')
        .map(line => line.trim())
        .filter(line => line.length > 0 && !line.startsWith('#'))
}

export interface BootstrapOutcome {
    status: 'success' | 'failed'
    steps: StepOutcome[]
    error?: BootstrapError
}

export interface RunBootstrapOptions {
    script?: string
    cwd?: string
    env?: Record<string, string>
}

/**
 * Run the bootstrap script the way the guest init system does: each command once, in order,
 * stopping at the first failure. Failures come back on the outcome, they are not thrown.
 */
export async function runBootstrap(executor: CommandExecutor, options: RunBootstrapOptions = {}): Promise<BootstrapOutcome> {
    const logger = getLogger('bootstrap')
    const sequence = await runCommandSequence(
        bootstrapCommands(options.script),
        executor,
        { cwd: options.cwd ?? '/', env: options.env ?? {} }
    )

    if (sequence.status === 'success') {
        return { status: 'success', steps: sequence.steps }
    }

    const failedStep = sequence.steps.find(step => step.status === 'failed')
    const error = new BootstrapError(ERROR_CODES.BOOTSTRAP_STEP_FAILED, {
        command: sequence.failedCommand,
        exitCode: sequence.exitCode,
        stderr: failedStep?.stderr.trim() ?? '',
    })
    logger.error(error.message)

    return { status: 'failed', steps: sequence.steps, error }
}
