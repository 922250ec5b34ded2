import pino from 'pino';

/**
 * Logger Interface
 *
 * Defines the contract for logging operations across the application.
 * Every call takes structured fields first and the message second, the
 * same order pino uses, so the production logger satisfies it directly.
 */
export interface ILogger {
    info(data: Record<string, unknown>, message: string): void;
    error(data: Record<string, unknown>, message: string): void;
    warn(data: Record<string, unknown>, message: string): void;
    debug(data: Record<string, unknown>, message: string): void;
}

/**
 * Logger Configuration
 *
 * Structured JSON logger for the matching service. Pipeline stages log
 * hash prefixes and counts, never JD or résumé text.
 */
export const logger = pino({
    level: process.env.LOG_LEVEL || 'info',
    transport: {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            singleLine: false
        }
    },
    serializers: {
        req: pino.stdSerializers.req,
        res: pino.stdSerializers.res,
        err: pino.stdSerializers.err
    }
});

/**
 * Normalize an unknown thrown value into log fields.
 */
export function errorFields(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return { error: error.message, errorName: error.name };
    }
    return { error: String(error) };
}
