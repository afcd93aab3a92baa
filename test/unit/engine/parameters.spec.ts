import * as assert from 'assert'
import { DeclarationError } from '../../../src/core/errors/taxonomy'
import { CORE_VALIDATION_PATTERNS } from '../../../src/core/validation/patterns'
import { ParameterDeclaration } from '../../../src/declaration/types'
import { parseOverrideArgs, resolveParameters } from '../../../src/engine/parameters'

describe('Parameter resolution', () => {

    const declarations: ParameterDeclaration[] = [
        { name: 'region', type: 'string', default: 'us-east-1', pattern: CORE_VALIDATION_PATTERNS.AWS_REGION },
        { name: 'instance_count', type: 'number', default: 1 },
        { name: 'monitoring', type: 'bool', default: false },
    ]

    function expectDeclarationError(fn: () => unknown, code: string, message: string) {
        assert.throws(fn, (error: unknown) => {
            assert.ok(error instanceof DeclarationError)
            assert.strictEqual(error.code, code)
            assert.strictEqual(error.message, message)
            return true
        })
    }

    it('should use defaults without overrides', () => {
        assert.deepStrictEqual(resolveParameters(declarations), {
            region: 'us-east-1',
            instance_count: 1,
            monitoring: false,
        })
    })

    it('should coerce string overrides to the declared type', () => {
        const resolved = resolveParameters(declarations, { region: 'eu-west-3', instance_count: '3', monitoring: 'true' })
        assert.deepStrictEqual(resolved, { region: 'eu-west-3', instance_count: 3, monitoring: true })
        assert.ok(Object.isFrozen(resolved))
    })

    it('should reject an override for an undeclared parameter', () => {
        expectDeclarationError(
            () => resolveParameters(declarations, { zone: 'a' }),
            'PARAMETER_UNKNOWN',
            'Value given for undeclared parameter zone'
        )
    })

    it('should reject values that do not coerce', () => {
        expectDeclarationError(
            () => resolveParameters(declarations, { instance_count: 'three' }),
            'PARAMETER_TYPE_MISMATCH',
            'Parameter instance_count expects a number, got "three"'
        )
        expectDeclarationError(
            () => resolveParameters(declarations, { monitoring: 'yes' }),
            'PARAMETER_TYPE_MISMATCH',
            'Parameter monitoring expects a bool, got "yes"'
        )
        expectDeclarationError(
            () => resolveParameters(declarations, { region: 42 }),
            'PARAMETER_TYPE_MISMATCH',
            'Parameter region expects a string, got 42'
        )
        expectDeclarationError(
            () => resolveParameters(declarations, { instance_count: ' ' }),
            'PARAMETER_TYPE_MISMATCH',
            'Parameter instance_count expects a number, got " "'
        )
    })

    it('should require a value for parameters without default', () => {
        expectDeclarationError(
            () => resolveParameters([{ name: 'ami_id', type: 'string' }]),
            'PARAMETER_MISSING_VALUE',
            'Parameter ami_id has no default and no value was given'
        )
        assert.deepStrictEqual(resolveParameters([{ name: 'ami_id', type: 'string' }], { ami_id: 'ami-12345678' }), { ami_id: 'ami-12345678' })
    })

    it('should check string values against the pattern', () => {
        expectDeclarationError(
            () => resolveParameters(declarations, { region: 'Mars' }),
            'PARAMETER_VALIDATION_FAILED',
            `Parameter region value Mars does not match ${CORE_VALIDATION_PATTERNS.AWS_REGION.source}`
        )
    })

    describe('parseOverrideArgs()', () => {
        it('should split on the first equals sign', () => {
            assert.deepStrictEqual(parseOverrideArgs(['region=eu-west-1', 'instance_name=a=b', 'ami_id=']), {
                region: 'eu-west-1',
                instance_name: 'a=b',
                ami_id: '',
            })
        })

        it('should keep the last of repeated names', () => {
            assert.deepStrictEqual(parseOverrideArgs(['region=eu-west-1', 'region=eu-west-2']), { region: 'eu-west-2' })
        })

        it('should reject arguments without a name', () => {
            expectDeclarationError(
                () => parseOverrideArgs(['=value']),
                'PARAMETER_TYPE_MISMATCH',
                'Parameter =value expects a name=value pair, got "=value"'
            )
            assert.throws(() => parseOverrideArgs(['region']), DeclarationError)
        })
    })
})
