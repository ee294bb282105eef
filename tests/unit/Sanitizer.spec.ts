/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, MaskFailure } from '../../libs/errors/sanitizer.js';
import { CloneError, MaskDepthExceededError } from '../../libs/mask/errors.js';

describe('ErrorSanitizer', () => {
    it('should create MaskFailure with incidentId', () => {
        const error = new MaskFailure('Test error', { secret: 'hidden' }, { code: 'TEST', statusCode: 503 });

        assert.ok(error.incidentId, 'Should have incidentId');
        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.publicMessage, 'Test error');
        assert.strictEqual(error.message, 'Test error');
        assert.strictEqual(error.name, 'MaskFailure');
        assert.strictEqual(error.code, 'TEST');
        assert.strictEqual(error.statusCode, 503);
    });

    it('should default to status 500', () => {
        assert.strictEqual(new MaskFailure('Test error').statusCode, 500);
    });

    it('should sanitize raw errors into MaskFailure', () => {
        const rawError = new Error('Serializer failed on password=placeholder-password');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'GET /users/:id');

        assert.ok(sanitized instanceof MaskFailure, 'Should be MaskFailure');
        assert.strictEqual(
            sanitized.publicMessage,
            'An internal system error occurred. Please contact support with ID: GET /users/:id'
        );
        assert.strictEqual(sanitized.cause, rawError);
        assert.strictEqual(sanitized.code, undefined);
        assert.ok(sanitized.incidentId, 'Should have incidentId for tracking');
    });

    it('should keep the code and status of masking errors and cite the incident', () => {
        const cloneError = new CloneError('WeakMap', '$.owner.cache');
        const sanitized = ErrorSanitizer.sanitize(cloneError, 'GET /users/:id');

        assert.strictEqual(
            sanitized.publicMessage,
            `The response could not be prepared. Please contact support with ID: ${sanitized.incidentId}`
        );
        assert.ok(!sanitized.publicMessage.includes('$.owner.cache'));
        assert.strictEqual(sanitized.code, 'MASK_CLONE_FAILED');
        assert.strictEqual(sanitized.statusCode, 500);
        assert.strictEqual(sanitized.contextLabel, 'GET /users/:id');
        assert.deepStrictEqual(sanitized.internalDetails, {
            originalError: 'Cannot clone WeakMap at $.owner.cache',
            path: '$.owner.cache',
            context: 'GET /users/:id'
        });
    });

    it('should sanitize thrown strings', () => {
        const sanitized = ErrorSanitizer.sanitize('plain failure', 'notes.index');

        assert.deepStrictEqual(sanitized.internalDetails, {
            originalError: 'plain failure',
            stack: undefined,
            context: 'notes.index'
        });
    });

    it('should pass through existing MaskFailure unchanged', () => {
        const original = ErrorSanitizer.sanitize(new MaskDepthExceededError(4, '$.a.a.a.a.a'), 'first');
        const result = ErrorSanitizer.sanitize(original, 'second');

        assert.strictEqual(result, original, 'Should return same instance');
        assert.strictEqual(result.incidentId, original.incidentId);
        assert.strictEqual(result.code, 'MASK_DEPTH_EXCEEDED');
    });
});
