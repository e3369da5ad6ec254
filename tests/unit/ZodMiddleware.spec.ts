/**
 * Unit Tests: Zod Middleware
 *
 * Tests input validation helpers.
 *
 * @see libs/validation/zod-middleware.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { createValidator, validate } from '../../libs/validation/zod-middleware.js';
import { ValidationError } from '../../libs/errors/coordinationErrors.js';

describe('Zod Middleware', () => {
    const TestcaseSchema = z.object({
        taskId: z.number().int().nonnegative(),
        input: z.string().min(1),
        public: z.boolean()
    });

    it('should validate correct input', () => {
        const input = { taskId: 3, input: 'MSAy', public: true };

        const result = validate(TestcaseSchema, input, 'test-context');
        assert.deepStrictEqual(result, input);
    });

    it('should reject invalid input with every issue listed', () => {
        const invalidInput = { taskId: -1, input: '', public: 'yes' };

        assert.throws(
            () => validate(TestcaseSchema, invalidInput, 'test-context'),
            (err: Error) => {
                assert.ok(err instanceof ValidationError);
                assert.ok(err.message.startsWith('Validation failed in test-context'));
                assert.deepStrictEqual(err.issues.map(issue => issue.path), ['taskId', 'input', 'public']);
                assert.strictEqual(err.statusCode, 400);
                return true;
            }
        );
    });

    it('should reject missing required fields', () => {
        assert.throws(
            () => validate(TestcaseSchema, { taskId: 3 }, 'partial-test'),
            /Validation failed in partial-test/
        );
    });

    it('should create reusable validator factory', () => {
        const validateTestcase = createValidator(TestcaseSchema);

        const valid = validateTestcase({ taskId: 4, input: 'MQ==', public: false }, 'factory-test');

        assert.strictEqual(valid.taskId, 4);
    });
});
