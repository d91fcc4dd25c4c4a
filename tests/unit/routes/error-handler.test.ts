import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { toErrorResponse } from '../../../src/routes/error-handler';
import {
    InvalidRequestError,
    NotFoundError,
    ProviderUnavailableError
} from '../../../src/utils/errors';

vi.mock('../../../src/config/logger', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

describe('toErrorResponse', () => {
    it('should map validation failures to 400 with details', () => {
        const result = z.object({ query: z.string().min(1) }).safeParse({ query: '' });
        if (result.success) {
            throw new Error('expected validation to fail');
        }

        const response = toErrorResponse(result.error, 'Product search');

        expect(response.status).toBe(400);
        expect(response.body.error).toBe('Validation failed');
        expect(response.body.details?.[0].path).toEqual(['query']);
    });

    it('should map application errors to their status and code', () => {
        expect(toErrorResponse(new InvalidRequestError('limit must be an integer, got 1.5'), 'Search')).toEqual({
            status: 400,
            body: { error: 'INVALID_REQUEST', message: 'limit must be an integer, got 1.5' }
        });
        expect(toErrorResponse(new NotFoundError('Product PROD-404 not found'), 'Product lookup')).toEqual({
            status: 404,
            body: { error: 'NOT_FOUND', message: 'Product PROD-404 not found' }
        });
        expect(toErrorResponse(new ProviderUnavailableError('Embedding model is unavailable'), 'Review search')).toEqual({
            status: 503,
            body: { error: 'PROVIDER_UNAVAILABLE', message: 'Embedding model is unavailable' }
        });
    });

    it('should map anything else to 500', () => {
        expect(toErrorResponse(new Error('connection terminated'), 'Chat')).toEqual({
            status: 500,
            body: { error: 'Chat failed', message: 'connection terminated' }
        });
        expect(toErrorResponse('boom', 'Chat')).toEqual({
            status: 500,
            body: { error: 'Chat failed', message: 'boom' }
        });
    });
});
