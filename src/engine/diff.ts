import lodash from 'lodash'
import { collectResourceReferences, isResourceReference, mapExpression } from '../declaration/expressions'
import { ExpressionSchema } from '../declaration/schema'
import { Expression, ExpressionMap } from '../declaration/types'
import { EvaluatedStack } from './evaluator'
import { ChangeAction, OutputChange, ResourceChange } from './plan'
import { StackState, StateResource } from './state'

/**
 * Attributes that cannot be changed on an existing resource: a change destroys and recreates it.
 */
export const REPLACE_ON_CHANGE: Readonly<Record<string, readonly string[]>> = {
    aws_instance: ['ami', 'availability_zone', 'subnet_id'],
    aws_security_group: ['name', 'description', 'vpc_id'],
}

export interface ChangeSet {
    changes: ResourceChange[]
    outputs: OutputChange[]
}

/**
 * Replace references with recorded values where the referenced attribute keeps its value.
 * Anything else stays a reference, known after apply.
 */
function resolveKnownReferences(
    value: Expression,
    prior: ReadonlyMap<string, StateResource>,
    planned: ReadonlyMap<string, ResourceChange>
): Expression {
    return mapExpression(value, (leaf) => {
        if (!isResourceReference(leaf)) {
            return leaf
        }
        const target = planned.get(leaf.$ref)
        const recorded = prior.get(leaf.$ref)
        if (!target || !recorded) {
            return leaf
        }
        const keeps = target.action === 'no-op'
            || (target.action === 'update' && !target.changedAttributes.includes(leaf.attribute))
        if (!keeps) {
            return leaf
        }
        const parsed = ExpressionSchema.safeParse(recorded.attributes[leaf.attribute])
        return parsed.success && parsed.data !== null ? parsed.data : leaf
    })
}

/**
 * Attributes whose planned value differs from the recorded one. An attribute declared
 * when the resource was recorded and no longer declared counts as changed.
 */
function changedAttributesOf(recorded: StateResource, after: ExpressionMap): string[] {
    const before = recorded.attributes
    const declared = Object.keys(after)
    const changed = declared
        .filter(name => collectResourceReferences(after[name]).length > 0 || !lodash.isEqual(before[name], after[name]))
    const removed = recorded.declaredAttributes
        .filter(name => !declared.includes(name) && before[name] !== undefined)
    return lodash.uniq([...changed, ...removed]).sort()
}

/**
 * Diff an evaluated stack against recorded state. Changes follow evaluation order,
 * deletions come last in reverse recorded order.
 */
export function computeChanges(stack: EvaluatedStack, priorState: StackState): ChangeSet {
    const prior = new Map(priorState.resources.map(resource => [resource.address, resource]))
    const planned = new Map<string, ResourceChange>()
    const changes: ResourceChange[] = []

    for (const resource of stack.resources) {
        const recorded = prior.get(resource.address)
        const after: ExpressionMap = {}
        for (const [name, value] of Object.entries(resource.attributes)) {
            after[name] = resolveKnownReferences(value, prior, planned)
        }

        let action: ChangeAction = 'create'
        let changedAttributes: string[] = []
        let replaceReasons: string[] = []

        if (recorded) {
            changedAttributes = changedAttributesOf(recorded, after)
            const forceNew = REPLACE_ON_CHANGE[resource.type] ?? []
            replaceReasons = changedAttributes.filter(name => forceNew.includes(name))
            if (replaceReasons.length > 0) {
                action = 'replace'
            } else {
                action = changedAttributes.length > 0 ? 'update' : 'no-op'
            }
        }

        const change: ResourceChange = {
            address: resource.address,
            type: resource.type,
            name: resource.name,
            action,
            dependsOn: resource.dependsOn,
            before: recorded ? recorded.attributes : null,
            after,
            changedAttributes,
            replaceReasons,
        }
        planned.set(resource.address, change)
        changes.push(change)
    }

    const removed = priorState.resources.filter(resource => !planned.has(resource.address)).reverse()
    for (const resource of removed) {
        changes.push({
            address: resource.address,
            type: resource.type,
            name: resource.name,
            action: 'delete',
            dependsOn: resource.dependsOn,
            before: resource.attributes,
            after: null,
            changedAttributes: [],
            replaceReasons: [],
        })
    }

    const outputs: OutputChange[] = stack.outputs.map(output => {
        const value = resolveKnownReferences(output.value, prior, planned)
        return {
            name: output.name,
            value,
            known: collectResourceReferences(value).length === 0,
            sensitive: output.sensitive,
        }
    })

    return { changes, outputs }
}
