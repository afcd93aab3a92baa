import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import lodash from 'lodash'
import { ConfigLoader, DEFAULT_CORE_CONFIG } from '../../src/core/config/default'
import { CoreConfig, CoreConfigInput } from '../../src/core/config/interface'
import { CommandExecutor, CommandOptions, CommandResult } from '../../src/tools/command/executor'

/**
 * Fresh temporary directory, removed by the returned cleanup.
 */
export function createTempDir(prefix = 'stackplan-test-'): { dir: string, cleanup: () => void } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix))
    return {
        dir,
        cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
    }
}

/**
 * Core config rooted in workDir, no region from the environment.
 */
export function getUnitTestCoreConfig(workDir: string, overrides: Partial<CoreConfigInput> = {}): CoreConfig {
    return ConfigLoader.fromObject({
        ...lodash.cloneDeep(DEFAULT_CORE_CONFIG),
        workDir: workDir,
        pulumi: {
            ...lodash.cloneDeep(DEFAULT_CORE_CONFIG.pulumi),
            backendUrl: `file://${path.join(workDir, 'pulumi-backend')}`,
            passphrase: 'test-passphrase',
        },
        ...overrides,
    })
}

export interface RecordedCommand {
    command: string
    options: CommandOptions
}

export type CommandHandler = (command: string, options: CommandOptions) => CommandResult | undefined | Promise<CommandResult | undefined>

export const ok = (stdout = ''): CommandResult => ({ exitCode: 0, stdout, stderr: '' })

export const fail = (exitCode: number, stderr = ''): CommandResult => ({ exitCode, stdout: '', stderr })

/**
 * Records every command. The handler decides the result, a command it does not answer succeeds.
 */
export class RecordingExecutor implements CommandExecutor {

    readonly calls: RecordedCommand[] = []

    constructor(private readonly handler: CommandHandler = () => undefined) {}

    async execute(command: string, options: CommandOptions): Promise<CommandResult> {
        this.calls.push({ command, options })
        return (await this.handler(command, options)) ?? ok()
    }

    get commands(): string[] {
        return this.calls.map(call => call.command)
    }
}

/**
 * A guest machine keeping track of the docker containers started on it. Starting a container
 * under a name already in use fails the way docker does.
 */
export class FakeGuestExecutor implements CommandExecutor {

    readonly containers = new Set<string>()
    readonly commands: string[] = []

    async execute(command: string): Promise<CommandResult> {
        this.commands.push(command)
        const run = /^docker run .*--name (\S+)/.exec(command)
        if (run) {
            const name = run[1]
            if (this.containers.has(name)) {
                return fail(125, `docker: Error response from daemon: Conflict. The container name "/${name}" is already in use.`)
            }
            this.containers.add(name)
            return ok('0123456789ab\n')
        }
        return ok()
    }
}
