import { CoreBrandedTypeCreators, ResourceAddress } from '../core/types/branded'
import { Expression, ExpressionMap, ParameterReference, ResourceDeclaration, ResourceReference } from './types'

export function param(name: string): ParameterReference {
    return { $param: name }
}

export function ref(address: string, attribute: string): ResourceReference {
    return { $ref: address, attribute: attribute }
}

export function addressOf(resource: Pick<ResourceDeclaration, 'type' | 'name'>): ResourceAddress {
    return CoreBrandedTypeCreators.createResourceAddress(`${resource.type}.${resource.name}`)
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function isParameterReference(value: unknown): value is ParameterReference {
    return isPlainObject(value)
        && typeof value.$param === 'string'
        && Object.keys(value).length === 1
}

export function isResourceReference(value: unknown): value is ResourceReference {
    return isPlainObject(value)
        && typeof value.$ref === 'string'
        && typeof value.attribute === 'string'
        && Object.keys(value).length === 2
}

export function formatReference(reference: ResourceReference): string {
    return `${reference.$ref}.${reference.attribute}`
}

/**
 * Rebuild an expression bottom-up. `leaf` is called for literals and references;
 * arrays and maps are traversed.
 */
export function mapExpression(value: Expression, leaf: (value: Expression) => Expression): Expression {
    if (isParameterReference(value) || isResourceReference(value)) {
        return leaf(value)
    }
    if (Array.isArray(value)) {
        return value.map(item => mapExpression(item, leaf))
    }
    if (value !== null && typeof value === 'object') {
        const result: ExpressionMap = {}
        for (const [key, item] of Object.entries(value)) {
            result[key] = mapExpression(item, leaf)
        }
        return result
    }
    return leaf(value)
}

/**
 * All resource references in an expression, in traversal order.
 */
export function collectResourceReferences(value: Expression): ResourceReference[] {
    const found: ResourceReference[] = []
    mapExpression(value, (leaf) => {
        if (isResourceReference(leaf)) {
            found.push(leaf)
        }
        return leaf
    })
    return found
}

export function collectParameterReferences(value: Expression): ParameterReference[] {
    const found: ParameterReference[] = []
    mapExpression(value, (leaf) => {
        if (isParameterReference(leaf)) {
            found.push(leaf)
        }
        return leaf
    })
    return found
}
