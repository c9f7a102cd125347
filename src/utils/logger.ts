import pino from 'pino';
import type { LogLevel } from '../types/index.js';

let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
    level?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * (Re)configure the process-wide logger. The CLI calls this once per command,
 * after the config is resolved; everything else goes through `getLogger()`.
 *
 * Pretty output goes to stderr so that summaries printed on stdout stay clean.
 */
export function initLogger(options: LoggerOptions = {}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    loggerInstance = jsonLogs
        ? pino({ name: 'deckminer', level }, pino.destination(2))
        : pino({
            name: 'deckminer',
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    destination: 2,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,name',
                },
            },
        });

    return loggerInstance;
}

/**
 * Get the logger instance, creating an info-level one on first use.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger();
    }
    return loggerInstance;
}
