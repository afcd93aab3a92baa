/**
 * Resource declaration set: parameters, provider, resources and outputs.
 *
 * Attribute values are expressions. Parameter references are substituted during evaluation;
 * resource references become edges of the dependency graph and are only known once the
 * referenced resource exists.
 */

export type Literal = string | number | boolean | null

export interface ParameterReference {
    readonly $param: string
}

export interface ResourceReference {
    /** Address of the referenced resource, `type.name` */
    readonly $ref: string
    readonly attribute: string
}

export type Expression =
    | Literal
    | ParameterReference
    | ResourceReference
    | Expression[]
    | ExpressionMap

export interface ExpressionMap {
    [key: string]: Expression
}

export type ParameterType = 'string' | 'number' | 'bool'

export type ParameterValue = string | number | boolean

export interface ParameterDeclaration {
    name: string
    type: ParameterType
    /** A parameter without default is required */
    default?: ParameterValue
    description?: string
    /** Only checked for string values */
    pattern?: RegExp
}

export interface ProviderDeclaration {
    name: string
    region: Expression
}

export interface ResourceDeclaration {
    type: string
    name: string
    attributes: ExpressionMap
    /** Explicit dependencies, as addresses, on top of the ones implied by references */
    dependsOn?: string[]
}

export interface OutputDeclaration {
    name: string
    value: Expression
    description?: string
    sensitive?: boolean
}

export interface DeclarationSet {
    parameters: ParameterDeclaration[]
    provider: ProviderDeclaration
    resources: ResourceDeclaration[]
    outputs: OutputDeclaration[]
}
