import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. The CLI configures it once via `initLogger()`.
 * Logs always go to stderr; stdout is reserved for rendered reports.
 *
 * Before that, a plain JSON logger is used at the level named by
 * FUNDMETRICS_LOG_LEVEL (default `warn`), so library callers and tests
 * never start a pino-pretty transport worker.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs) {
        loggerInstance = pino({ level, base: { app: 'fundmetrics' } }, pino.destination({ dest: 2, sync: true }));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = pino({ level: envLogLevel() ?? 'warn' }, pino.destination({ dest: 2, sync: true }));
    }
    return loggerInstance;
}

/**
 * Child logger tagged with the pipeline stage that emits it.
 */
export function stageLogger(stage: string): pino.Logger {
    return getLogger().child({ stage });
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Log level requested through FUNDMETRICS_LOG_LEVEL, if valid.
 */
export function envLogLevel(): LogLevel | undefined {
    const raw = process.env['FUNDMETRICS_LOG_LEVEL']?.trim().toLowerCase();
    return raw && isLogLevel(raw) ? raw : undefined;
}
