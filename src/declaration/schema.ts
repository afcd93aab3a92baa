import { z } from 'zod'
import { CORE_VALIDATION_PATTERNS } from '../core/validation/patterns'
import { createError, toError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { addressOf } from './expressions'
import {
    DeclarationSet,
    Expression,
    OutputDeclaration,
    ParameterDeclaration,
    ProviderDeclaration,
    ResourceDeclaration,
} from './types'

const identifier = z.string().regex(CORE_VALIDATION_PATTERNS.IDENTIFIER, "Must be lowercase snake_case")

export const ExpressionSchema: z.ZodType<Expression> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.object({ $param: identifier }).strict(),
    z.object({
        $ref: z.string().regex(CORE_VALIDATION_PATTERNS.RESOURCE_ADDRESS, "Must be a type.name address"),
        attribute: z.string().min(1),
    }).strict(),
    z.array(ExpressionSchema),
    z.record(ExpressionSchema),
]))

export const ParameterDeclarationSchema: z.ZodType<ParameterDeclaration> = z.object({
    name: identifier,
    type: z.enum(['string', 'number', 'bool']),
    default: z.union([z.string(), z.number(), z.boolean()]).optional(),
    description: z.string().optional(),
    pattern: z.instanceof(RegExp).optional(),
})

export const ProviderDeclarationSchema: z.ZodType<ProviderDeclaration> = z.object({
    name: identifier,
    region: ExpressionSchema,
})

export const ResourceDeclarationSchema: z.ZodType<ResourceDeclaration> = z.object({
    type: identifier,
    name: identifier,
    attributes: z.record(ExpressionSchema),
    dependsOn: z.array(z.string()).optional(),
})

export const OutputDeclarationSchema: z.ZodType<OutputDeclaration> = z.object({
    name: identifier,
    value: ExpressionSchema,
    description: z.string().optional(),
    sensitive: z.boolean().optional(),
})

export const DeclarationSetSchema: z.ZodType<DeclarationSet> = z.object({
    parameters: z.array(ParameterDeclarationSchema),
    provider: ProviderDeclarationSchema,
    resources: z.array(ResourceDeclarationSchema),
    outputs: z.array(OutputDeclarationSchema),
})

function firstDuplicate(names: string[]): string | undefined {
    const seen = new Set<string>()
    for (const name of names) {
        if (seen.has(name)) {
            return name
        }
        seen.add(name)
    }
    return undefined
}

/**
 * Parse and validate a declaration set: shape first, then name uniqueness
 * of parameters, outputs and resource addresses.
 */
export function validateDeclarationSet(raw: unknown): DeclarationSet {
    const result = DeclarationSetSchema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`)
        throw createError(ERROR_CODES.DECLARATION_INVALID, { issues }, toError(result.error))
    }
    const set = result.data

    const checks: Array<{ kind: string, names: string[] }> = [
        { kind: 'parameter', names: set.parameters.map(p => p.name) },
        { kind: 'output', names: set.outputs.map(o => o.name) },
        { kind: 'resource', names: set.resources.map(r => addressOf(r)) },
    ]
    for (const { kind, names } of checks) {
        const duplicate = firstDuplicate(names)
        if (duplicate !== undefined) {
            throw createError(ERROR_CODES.DECLARATION_DUPLICATE_NAME, { kind, name: duplicate })
        }
    }

    return set
}
