import { describe, it, expect } from 'vitest';
import { parseEnv } from '../../../src/config/env';

describe('parseEnv', () => {
    it('should apply defaults for an empty environment', () => {
        const env = parseEnv({});

        expect(env.NODE_ENV).toBe('development');
        expect(env.PORT).toBe(3000);
        expect(env.REDIS_URL).toBe('redis://localhost:6379');
        expect(env.EMBEDDING_MODEL).toBe('text-embedding-3-small');
        expect(env.DB_MIGRATIONS_RUN).toBe(false);
        expect(env.EMBEDDING_MAX_ATTEMPTS).toBe(5);
        expect(env.EMBEDDING_BACKOFF_MS).toBe(1000);
        expect(env.AZURE_OPENAI_ENDPOINT).toBeUndefined();
    });

    it('should coerce numbers and flags', () => {
        const env = parseEnv({
            PORT: '8080',
            LLM_TEMPERATURE: '0.7',
            DB_MIGRATIONS_RUN: 'true',
            EMBEDDING_MAX_ATTEMPTS: '2'
        });

        expect(env.PORT).toBe(8080);
        expect(env.LLM_TEMPERATURE).toBe(0.7);
        expect(env.DB_MIGRATIONS_RUN).toBe(true);
        expect(env.EMBEDDING_MAX_ATTEMPTS).toBe(2);
    });

    it('should treat empty strings as unset', () => {
        const env = parseEnv({ AZURE_OPENAI_ENDPOINT: '', PORT: '' });

        expect(env.AZURE_OPENAI_ENDPOINT).toBeUndefined();
        expect(env.PORT).toBe(3000);
    });

    it('should report every invalid setting', () => {
        expect(() => parseEnv({ PORT: 'abc', AZURE_OPENAI_ENDPOINT: 'not-a-url' }))
            .toThrow(/^Invalid environment configuration: PORT: .+; AZURE_OPENAI_ENDPOINT: Invalid url$/);
    });

    it('should reject an unknown log level', () => {
        expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(/^Invalid environment configuration: LOG_LEVEL: /);
    });
});
