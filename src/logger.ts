import pino from 'pino';

/**
 * Root logger. Components derive children with `logger.child({ component })`.
 * Level comes from LOG_LEVEL (default warn).
 */
export const logger = pino({
    name: 'paragraph-layout',
    level: process.env.LOG_LEVEL ?? 'warn',
});

export type { Logger } from 'pino';
