import { describe, it, expect } from 'vitest';
import { createLogger, logger } from '../../../src/config/logger';
import { parseEnv } from '../../../src/config/env';

describe('logger', () => {
    it('should take its level from the validated environment', () => {
        expect(logger.level).toBe('silent');
    });

    it('should build a logger for a given environment', () => {
        const custom = createLogger(parseEnv({ LOG_LEVEL: 'warn', NODE_ENV: 'test' }));

        expect(custom.level).toBe('warn');
        expect(custom.isLevelEnabled('info')).toBe(false);
        expect(custom.isLevelEnabled('error')).toBe(true);
    });
});
