import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Process-wide pino logger. The CLI configures it from the resolved
 * config; tests set it to `silent`. Pretty output unless `jsonLogs`.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Replaces any previously created instance, so callers should fetch the
 * logger through `getLogger()` at the point of use.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ name: 'hopgraph', level });
    } else {
        loggerInstance = pino({
            name: 'hopgraph',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Current logger, created at `info` on first use.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: 'info' });
    }
    return loggerInstance;
}
