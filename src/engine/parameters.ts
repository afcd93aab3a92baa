import { createError } from '../core/errors/taxonomy'
import { ERROR_CODES } from '../core/errors/codes'
import { ParameterDeclaration, ParameterValue } from '../declaration/types'

/**
 * Override values. Strings are coerced to the declared type, which is what `--var name=value` gives.
 */
export type ParameterOverrides = Readonly<Record<string, ParameterValue>>

export type ResolvedParameters = Readonly<Record<string, ParameterValue>>

function coerce(declaration: ParameterDeclaration, value: ParameterValue): ParameterValue {
    const mismatch = () => createError(ERROR_CODES.PARAMETER_TYPE_MISMATCH, {
        name: declaration.name,
        expected: declaration.type,
        value: JSON.stringify(value),
    })

    switch (declaration.type) {
        case 'string':
            if (typeof value !== 'string') {
                throw mismatch()
            }
            return value
        case 'number': {
            if (typeof value === 'number') {
                return value
            }
            if (typeof value === 'string' && value.trim() !== '') {
                const parsed = Number(value)
                if (Number.isFinite(parsed)) {
                    return parsed
                }
            }
            throw mismatch()
        }
        case 'bool':
            if (typeof value === 'boolean') {
                return value
            }
            if (value === 'true' || value === 'false') {
                return value === 'true'
            }
            throw mismatch()
    }
}

function checkPattern(declaration: ParameterDeclaration, value: ParameterValue): void {
    if (declaration.pattern && typeof value === 'string' && !declaration.pattern.test(value)) {
        throw createError(ERROR_CODES.PARAMETER_VALIDATION_FAILED, {
            name: declaration.name,
            value: value,
            pattern: declaration.pattern.source,
        })
    }
}

/**
 * Resolve every declared parameter to its override or its default.
 * Undeclared overrides, missing required values, type mismatches and pattern failures
 * are declaration errors. The result is frozen.
 */
export function resolveParameters(
    declarations: readonly ParameterDeclaration[],
    overrides: ParameterOverrides = {}
): ResolvedParameters {
    const declaredNames = new Set(declarations.map(d => d.name))
    for (const name of Object.keys(overrides)) {
        if (!declaredNames.has(name)) {
            throw createError(ERROR_CODES.PARAMETER_UNKNOWN, { name, declared: [...declaredNames] })
        }
    }

    const resolved: Record<string, ParameterValue> = {}
    for (const declaration of declarations) {
        const raw = Object.prototype.hasOwnProperty.call(overrides, declaration.name)
            ? overrides[declaration.name]
            : declaration.default

        if (raw === undefined) {
            throw createError(ERROR_CODES.PARAMETER_MISSING_VALUE, { name: declaration.name })
        }

        const value = coerce(declaration, raw)
        checkPattern(declaration, value)
        resolved[declaration.name] = value
    }

    return Object.freeze(resolved)
}

/**
 * Parse `name=value` pairs as given on the command line. The value may contain `=`.
 */
export function parseOverrideArgs(args: readonly string[]): Record<string, string> {
    const overrides: Record<string, string> = {}
    for (const arg of args) {
        const separator = arg.indexOf('=')
        if (separator <= 0) {
            throw createError(ERROR_CODES.PARAMETER_TYPE_MISMATCH, {
                name: arg,
                expected: 'name=value pair',
                value: JSON.stringify(arg),
            })
        }
        overrides[arg.slice(0, separator)] = arg.slice(separator + 1)
    }
    return overrides
}
