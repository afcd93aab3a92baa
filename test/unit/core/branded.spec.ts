import * as assert from 'assert'
import { CoreBrandedTypeCreators } from '../../../src/core/types/branded'
import { CORE_VALIDATION_PATTERNS } from '../../../src/core/validation/patterns'
import { LOG_LEVEL_DEBUG, parseLogLevel } from '../../../src/log/utils'

describe('Branded types', () => {

    it('should brand valid resource addresses', () => {
        assert.strictEqual(CoreBrandedTypeCreators.createResourceAddress('aws_instance.web'), 'aws_instance.web')
        assert.throws(() => CoreBrandedTypeCreators.createResourceAddress('aws_instance.Web'), /Invalid resource address format: aws_instance.Web/)
    })

    it('should brand branch names without whitespace', () => {
        assert.strictEqual(CoreBrandedTypeCreators.createBranchName('feature/login'), 'feature/login')
        assert.throws(() => CoreBrandedTypeCreators.createBranchName('my branch'), /Invalid branch name/)
        assert.throws(() => CoreBrandedTypeCreators.createBranchName(''), /Invalid branch name/)
    })

    it('should match identifiers and instance names', () => {
        assert.strictEqual(CORE_VALIDATION_PATTERNS.IDENTIFIER.test('web_sg'), true)
        assert.strictEqual(CORE_VALIDATION_PATTERNS.IDENTIFIER.test('2web'), false)
        assert.strictEqual(CORE_VALIDATION_PATTERNS.INSTANCE_NAME.test('web-'), false)
        assert.strictEqual(CORE_VALIDATION_PATTERNS.INSTANCE_NAME.test('stackplan-web'), true)
    })
})

describe('parseLogLevel()', () => {
    it('should accept tslog levels and fall back otherwise', () => {
        assert.strictEqual(parseLogLevel('2', 3), LOG_LEVEL_DEBUG)
        assert.strictEqual(parseLogLevel(undefined, 3), 3)
        assert.strictEqual(parseLogLevel(' ', 3), 3)
        assert.strictEqual(parseLogLevel('7', 3), 3)
        assert.strictEqual(parseLogLevel('debug', 4), 4)
    })
})
