import pino, { type Logger } from 'pino';
import { z } from 'zod';

export type { Logger } from 'pino';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

function levelFromEnv(): LogLevel {
    const parsed = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
    return parsed.success ? parsed.data : 'info';
}

/**
 * Loggers write to stderr so that stdout carries only command output.
 * Synchronous writes keep the last lines when the CLI exits with an error.
 */
export function createLogger(name: string, level: LogLevel = levelFromEnv()): Logger {
    return pino({ name, level }, pino.destination({ dest: 2, sync: true }));
}
