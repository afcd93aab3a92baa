import * as fs from 'fs'
import * as path from 'path'
import { z } from 'zod'
import { STATE_FORMAT_VERSION } from '../core/const'
import { createError, toError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { getLogger, Logger } from '../log/utils'

export const StateResourceSchema = z.object({
    address: z.string(),
    type: z.string(),
    name: z.string(),
    /** Recorded attributes, declared and computed (id, public_ip, ...) */
    attributes: z.record(z.unknown()),
    /** Names of the attributes the declaration set gave when the resource was recorded */
    declaredAttributes: z.array(z.string()).default([]),
    dependsOn: z.array(z.string()).default([]),
})

export const StackStateSchema = z.object({
    version: z.literal(STATE_FORMAT_VERSION),
    serial: z.number().int().nonnegative(),
    resources: z.array(StateResourceSchema),
    outputs: z.record(z.unknown()).default({}),
})

export type StateResource = z.infer<typeof StateResourceSchema>
export type StackState = z.infer<typeof StackStateSchema>

export function emptyState(): StackState {
    return { version: STATE_FORMAT_VERSION, serial: 0, resources: [], outputs: {} }
}

/**
 * Recorded state in a JSON file. This is what the local engine plans against: there is no
 * remote to refresh from, the file is the actual state.
 */
export class LocalStateStore {

    private readonly logger: Logger

    constructor(readonly statePath: string) {
        this.logger = getLogger(LocalStateStore.name)
    }

    /**
     * A missing file is an empty state.
     */
    async read(): Promise<StackState> {
        let content: string
        try {
            content = await fs.promises.readFile(this.statePath, 'utf8')
        } catch (error: unknown) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
                this.logger.debug(`No state at ${this.statePath}, planning against empty state`)
                return emptyState()
            }
            throw createError(ERROR_CODES.STATE_FILE_INVALID, { path: this.statePath, reason: toError(error).message }, toError(error))
        }

        let raw: unknown
        try {
            raw = JSON.parse(content)
        } catch (error: unknown) {
            throw createError(ERROR_CODES.STATE_FILE_INVALID, { path: this.statePath, reason: 'not valid JSON' }, toError(error))
        }

        const result = StackStateSchema.safeParse(raw)
        if (!result.success) {
            const reason = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
            throw createError(ERROR_CODES.STATE_FILE_INVALID, { path: this.statePath, reason }, toError(result.error))
        }
        return result.data
    }

    async write(state: StackState): Promise<void> {
        await fs.promises.mkdir(path.dirname(this.statePath), { recursive: true })
        await fs.promises.writeFile(this.statePath, JSON.stringify(state, null, 2) + '\n', 'utf8')
    }

    /**
     * Create an empty state file unless one exists. Returns true when a file was created.
     */
    async initialize(): Promise<boolean> {
        try {
            await fs.promises.access(this.statePath)
            this.logger.info(`Using existing state ${this.statePath}`)
            return false
        } catch {
            await this.write(emptyState())
            this.logger.info(`Initialized empty state ${this.statePath}`)
            return true
        }
    }
}
