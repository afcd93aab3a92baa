import * as pulumi from '@pulumi/pulumi'
import { PulumiFn } from '@pulumi/pulumi/automation'
import lodash from 'lodash'
import { createError } from '../../core/errors/taxonomy'
import { ERROR_CODES } from '../../core/errors/codes'
import { collectResourceReferences, isResourceReference } from '../../declaration/expressions'
import { Expression, ExpressionMap, ResourceReference } from '../../declaration/types'
import { EvaluatedStack } from '../../engine/evaluator'

/**
 * Pulumi type tokens of the AWS provider for the declaration types this engine can preview.
 */
export const PULUMI_TYPE_TOKENS: Readonly<Record<string, string>> = {
    aws_security_group: 'aws:ec2/securityGroup:SecurityGroup',
    aws_instance: 'aws:ec2/instance:Instance',
}

/**
 * Attributes whose value is a free-form map: their keys are passed through untouched.
 */
const VERBATIM_MAP_ATTRIBUTES = new Set(['tags'])

export function pulumiTypeOf(type: string, address: string = type): string {
    const token = PULUMI_TYPE_TOKENS[type]
    if (token === undefined) {
        throw createError(ERROR_CODES.PROVIDER_UNSUPPORTED_RESOURCE, { type, address, engine: 'pulumi' })
    }
    return token
}

/**
 * Declaration type for a Pulumi type token, the token itself when unknown.
 */
export function declarationTypeOf(token: string): string {
    const entry = Object.entries(PULUMI_TYPE_TOKENS).find(([, value]) => value === token)
    return entry ? entry[0] : token
}

/**
 * Pulumi property name of a declared attribute: snake_case becomes camelCase.
 */
export function toPulumiKey(name: string): string {
    return name.includes('_') ? lodash.camelCase(name) : name
}

export function fromPulumiKey(name: string): string {
    return /[A-Z]/.test(name) ? lodash.snakeCase(name) : name
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function fromPulumiValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(fromPulumiValue)
    }
    if (isRecord(value)) {
        return Object.fromEntries(Object.entries(value).map(([key, item]) => [fromPulumiKey(key), fromPulumiValue(item)]))
    }
    return value
}

/**
 * Declared attributes of recorded Pulumi inputs. Engine bookkeeping keys (`__defaults`) are dropped.
 */
export function fromPulumiInputs(inputs: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const attributes: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(inputs)) {
        if (key.startsWith('__')) {
            continue
        }
        const name = fromPulumiKey(key)
        attributes[name] = VERBATIM_MAP_ATTRIBUTES.has(name) ? value : fromPulumiValue(value)
    }
    return attributes
}

export type ReferenceResolver = (reference: ResourceReference) => pulumi.Output<unknown>

export function toPulumiInput(value: Expression, resolve: ReferenceResolver, verbatimKeys = false): pulumi.Input<unknown> {
    if (isResourceReference(value)) {
        return resolve(value)
    }
    if (Array.isArray(value)) {
        return value.map(item => toPulumiInput(item, resolve))
    }
    if (value !== null && typeof value === 'object') {
        const result: Record<string, pulumi.Input<unknown>> = {}
        for (const [key, item] of Object.entries(value)) {
            result[verbatimKeys ? key : toPulumiKey(key)] = toPulumiInput(item, resolve)
        }
        return result
    }
    return value
}

/**
 * Resource inputs for declared attributes. Nested map keys are converted too, except inside tags.
 */
export function toPulumiInputs(attributes: ExpressionMap, resolve: ReferenceResolver): pulumi.Inputs {
    const inputs: pulumi.Inputs = {}
    for (const [name, value] of Object.entries(attributes)) {
        inputs[toPulumiKey(name)] = toPulumiInput(value, resolve, VERBATIM_MAP_ATTRIBUTES.has(name))
    }
    return inputs
}

/**
 * A declared resource registered under its provider type token. Every input and every
 * requested output slot is readable back as an Output through attribute().
 */
export class DeclaredResource extends pulumi.CustomResource {

    constructor(
        readonly declaredType: string,
        name: string,
        props: pulumi.Inputs,
        opts: pulumi.CustomResourceOptions = {}
    ) {
        super(pulumiTypeOf(declaredType, `${declaredType}.${name}`), name, props, opts)
    }

    attribute(name: string): pulumi.Output<unknown> {
        if (name === 'id') {
            return this.id
        }
        const value: unknown = Reflect.get(this, toPulumiKey(name))
        if (pulumi.Output.isInstance(value)) {
            return value
        }
        throw new Error(`${this.declaredType} has no attribute ${name}`)
    }
}

/**
 * Attributes other resources and outputs read from each address.
 */
export function referencedAttributes(stack: EvaluatedStack): Map<string, Set<string>> {
    const found = new Map<string, Set<string>>()
    const values: Expression[] = [
        ...stack.resources.map(resource => resource.attributes),
        ...stack.outputs.map(output => output.value),
    ]
    for (const value of values) {
        for (const reference of collectResourceReferences(value)) {
            const attributes = found.get(reference.$ref) ?? new Set<string>()
            attributes.add(reference.attribute)
            found.set(reference.$ref, attributes)
        }
    }
    return found
}

/**
 * Inline program registering the evaluated stack, resources in evaluation order.
 * Outputs are exported under their declared names, sensitive ones as secrets.
 * Unsupported resource types are rejected here, before any preview starts.
 */
export function buildPulumiProgram(stack: EvaluatedStack): PulumiFn {
    for (const resource of stack.resources) {
        pulumiTypeOf(resource.type, resource.address)
    }

    return async () => {
        const slots = referencedAttributes(stack)
        const registered = new Map<string, DeclaredResource>()

        const resolve: ReferenceResolver = (reference) => {
            const target = registered.get(reference.$ref)
            if (!target) {
                throw createError(ERROR_CODES.DECLARATION_DANGLING_REFERENCE, { from: 'pulumi program', target: reference.$ref })
            }
            return target.attribute(reference.attribute)
        }

        for (const resource of stack.resources) {
            const props = toPulumiInputs(resource.attributes, resolve)
            for (const attribute of slots.get(resource.address) ?? []) {
                const key = toPulumiKey(attribute)
                if (attribute !== 'id' && !(key in props)) {
                    props[key] = undefined
                }
            }
            const dependsOn = resource.dependsOn.flatMap(address => {
                const dependency = registered.get(address)
                return dependency ? [dependency] : []
            })
            registered.set(resource.address, new DeclaredResource(resource.type, resource.name, props, { dependsOn }))
        }

        const outputs: Record<string, pulumi.Input<unknown>> = {}
        for (const output of stack.outputs) {
            const value = toPulumiInput(output.value, resolve)
            outputs[output.name] = output.sensitive ? pulumi.secret(value) : value
        }
        return outputs
    }
}
