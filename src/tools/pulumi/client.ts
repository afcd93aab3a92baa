import {
    ConfigValue,
    LocalWorkspace,
    PreviewOptions,
    PreviewResult,
    PulumiCommand,
    PulumiFn,
} from '@pulumi/pulumi/automation'
import { getLogger, Logger } from '../../log/utils'

/**
 * What the plan engine needs from a Pulumi stack.
 */
export interface PreviewableStack {
    setConfig(key: string, value: ConfigValue): Promise<void>
    installPlugin(name: string, version: string): Promise<void>
    preview(options: PreviewOptions): Promise<PreviewResult>
}

export type PreviewableStackFactory = (program: PulumiFn) => Promise<PreviewableStack>

export interface PulumiStackClientArgs {
    projectName: string
    stackName: string
    /** State backend, eg. file:///path */
    backendUrl: string
    passphrase?: string
    /** Directory of a pinned Pulumi CLI installation. PATH lookup when unset. */
    commandRoot?: string
}

/**
 * Inline-program stack on a self-managed backend.
 */
export class PulumiStackClient {

    private readonly logger: Logger

    constructor(private readonly args: PulumiStackClientArgs) {
        this.logger = getLogger(PulumiStackClient.name)
    }

    async getStack(program: PulumiFn): Promise<PreviewableStack> {
        this.logger.debug(`Selecting stack ${this.args.projectName}/${this.args.stackName}`, { backend: this.args.backendUrl })

        const pulumiCommand = this.args.commandRoot
            ? await PulumiCommand.get({ root: this.args.commandRoot })
            : undefined

        const envVars: Record<string, string> = {}
        if (this.args.passphrase !== undefined) {
            envVars.PULUMI_CONFIG_PASSPHRASE = this.args.passphrase
        }

        const stack = await LocalWorkspace.createOrSelectStack({
            projectName: this.args.projectName,
            stackName: this.args.stackName,
            program: program,
        }, {
            pulumiCommand: pulumiCommand,
            envVars: envVars,
            projectSettings: {
                name: this.args.projectName,
                runtime: 'nodejs',
                backend: { url: this.args.backendUrl },
            },
        })

        return {
            setConfig: (key, value) => stack.setConfig(key, value),
            installPlugin: (name, version) => stack.workspace.installPlugin(name, version),
            preview: (options) => stack.preview(options),
        }
    }

    factory(): PreviewableStackFactory {
        return (program) => this.getStack(program)
    }
}
