import { CoreConfig } from '../core/config/interface'
import { createError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { getLogger } from '../log/utils'
import {
    addressOf,
    collectResourceReferences,
    isParameterReference,
    mapExpression,
} from '../declaration/expressions'
import { validateDeclarationSet } from '../declaration/schema'
import { DeclarationSet, Expression, ExpressionMap } from '../declaration/types'
import { DependencyGraph } from './graph'
import { ParameterOverrides, ResolvedParameters, resolveParameters } from './parameters'

export interface EvaluatedProvider {
    name: string
    region: string
}

export interface EvaluatedResource {
    address: string
    type: string
    name: string
    /** Direct dependencies, sorted */
    dependsOn: string[]
    /** Parameters substituted; only literals and resource references remain */
    attributes: ExpressionMap
}

export interface EvaluatedOutput {
    name: string
    value: Expression
    description?: string
    sensitive: boolean
}

export interface EvaluatedStack {
    provider: EvaluatedProvider
    parameters: ResolvedParameters
    /** Resource addresses in evaluation order, dependencies first */
    order: string[]
    /** Same order as `order` */
    resources: EvaluatedResource[]
    outputs: EvaluatedOutput[]
}

/**
 * Region from configuration (AWS_REGION) when the provider region is bound to a parameter
 * that was not overridden explicitly. The parameter itself keeps its resolved value.
 */
function configRegionFor(set: DeclarationSet, config: CoreConfig, overrides: ParameterOverrides): string | undefined {
    const region = set.provider.region
    if (!isParameterReference(region) || Object.prototype.hasOwnProperty.call(overrides, region.$param)) {
        return undefined
    }
    return config.region
}

function substituteParameters(value: Expression, parameters: ResolvedParameters, from: string): Expression {
    return mapExpression(value, (leaf) => {
        if (!isParameterReference(leaf)) {
            return leaf
        }
        if (!Object.prototype.hasOwnProperty.call(parameters, leaf.$param)) {
            throw createError(ERROR_CODES.DECLARATION_UNDECLARED_PARAMETER, { from, name: leaf.$param })
        }
        return parameters[leaf.$param]
    })
}

function substituteAttributes(attributes: ExpressionMap, parameters: ResolvedParameters, from: string): ExpressionMap {
    const result: ExpressionMap = {}
    for (const [key, value] of Object.entries(attributes)) {
        result[key] = substituteParameters(value, parameters, from)
    }
    return result
}

/**
 * Evaluate a declaration set against a configuration: resolve parameters, substitute them,
 * build the explicit dependency graph from references and `dependsOn`, and order resources.
 *
 * Dangling references, undeclared parameters and cycles are declaration errors: nothing is
 * evaluated past the first one.
 */
export function evaluateDeclarationSet(
    declarations: DeclarationSet,
    config: CoreConfig,
    overrides: ParameterOverrides = {}
): EvaluatedStack {
    const logger = getLogger('evaluator')
    const set = validateDeclarationSet(declarations)
    const parameters = resolveParameters(set.parameters, overrides)

    const declaredRegion = substituteParameters(set.provider.region, parameters, `provider.${set.provider.name}`)
    const region = configRegionFor(set, config, overrides) ?? declaredRegion
    if (typeof region !== 'string') {
        throw createError(ERROR_CODES.DECLARATION_INVALID, {
            issues: [`provider.region: must resolve to a string, got ${JSON.stringify(region)}`],
        })
    }

    const graph = new DependencyGraph()
    for (const resource of set.resources) {
        graph.addNode(addressOf(resource))
    }

    const requireDeclared = (from: string, target: string) => {
        if (!graph.hasNode(target)) {
            throw createError(ERROR_CODES.DECLARATION_DANGLING_REFERENCE, { from, target })
        }
    }

    const byAddress = new Map<string, EvaluatedResource>()
    for (const resource of set.resources) {
        const address = addressOf(resource)
        const attributes = substituteAttributes(resource.attributes, parameters, address)

        const targets = new Set<string>(resource.dependsOn ?? [])
        for (const reference of collectResourceReferences(attributes)) {
            targets.add(reference.$ref)
        }
        for (const target of targets) {
            requireDeclared(address, target)
            graph.addDependency(address, target)
        }

        byAddress.set(address, {
            address,
            type: resource.type,
            name: resource.name,
            dependsOn: graph.dependenciesOf(address),
            attributes,
        })
    }

    const outputs: EvaluatedOutput[] = set.outputs.map(output => {
        const from = `output.${output.name}`
        const value = substituteParameters(output.value, parameters, from)
        for (const reference of collectResourceReferences(value)) {
            requireDeclared(from, reference.$ref)
        }
        return {
            name: output.name,
            value,
            description: output.description,
            sensitive: output.sensitive ?? false,
        }
    })

    const order = graph.topologicalOrder()
    const resources = order.flatMap(address => {
        const resource = byAddress.get(address)
        return resource ? [resource] : []
    })

    logger.debug(`Evaluated ${resources.length} resources`, { order, region })

    return {
        provider: { name: set.provider.name, region },
        parameters,
        order,
        resources,
        outputs,
    }
}
