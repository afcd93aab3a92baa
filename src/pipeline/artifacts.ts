import * as fs from 'fs'
import * as path from 'path'
import { toError } from '../core/errors/taxonomy'
import { getLogger, Logger } from '../log/utils'
import { ArtifactWhen } from './definition'

export interface ArtifactRecord {
    /** Path as declared, relative to the job directory */
    path: string
    retained: boolean
    /** Where the artifact was kept */
    location?: string
    /** Why it was not kept */
    reason?: string
}

export function shouldRetain(when: ArtifactWhen, jobStatus: 'success' | 'failed'): boolean {
    switch (when) {
        case 'always':
            return true
        case 'on_success':
            return jobStatus === 'success'
        case 'on_failure':
            return jobStatus === 'failed'
    }
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.promises.access(filePath)
        return true
    } catch {
        return false
    }
}

/**
 * Keeps job artifacts under `<root>/<job>/<path>`.
 */
export class ArtifactStore {

    private readonly logger: Logger

    constructor(readonly root: string) {
        this.logger = getLogger(ArtifactStore.name)
    }

    locationOf(job: string, artifactPath: string): string {
        return path.join(this.root, job, artifactPath)
    }

    /**
     * Copy each declared path from the job directory. A path the job did not produce is
     * reported not retained.
     */
    async retain(job: string, paths: readonly string[], jobDir: string): Promise<ArtifactRecord[]> {
        const records: ArtifactRecord[] = []
        for (const artifactPath of paths) {
            const source = path.resolve(jobDir, artifactPath)
            if (!await exists(source)) {
                this.logger.warn(`Artifact ${artifactPath} of job ${job} was not produced`)
                records.push({ path: artifactPath, retained: false, reason: 'not produced' })
                continue
            }

            const location = this.locationOf(job, artifactPath)
            try {
                await fs.promises.mkdir(path.dirname(location), { recursive: true })
                await fs.promises.cp(source, location, { recursive: true })
            } catch (error: unknown) {
                const message = toError(error).message
                this.logger.error(`Could not keep artifact ${artifactPath} of job ${job}: ${message}`)
                records.push({ path: artifactPath, retained: false, reason: message })
                continue
            }

            this.logger.info(`Kept artifact ${artifactPath} of job ${job} at ${location}`)
            records.push({ path: artifactPath, retained: true, location })
        }
        return records
    }
}
