import { BranchName, CoreBrandedTypeCreators } from '../core/types/branded'
import { PipelineJob } from './definition'

/**
 * A push to a branch. The only event pipelines react to.
 */
export interface PushEvent {
    branch: BranchName
}

export function pushEvent(branch: string): PushEvent {
    return { branch: CoreBrandedTypeCreators.createBranchName(branch) }
}

/**
 * Exact branch-name match against the job's `only` list. A job without `only` runs for every push.
 */
export function isTriggeredBy(job: Pick<PipelineJob, 'only'>, event: PushEvent): boolean {
    if (job.only === undefined) {
        return true
    }
    return job.only.includes(event.branch)
}
