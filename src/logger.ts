export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    readonly level: LogLevel;
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

// stdout belongs to the MCP stdio transport, so everything goes to stderr.
export function createLogger(level: LogLevel = 'info'): Logger {
    const threshold = LOG_LEVELS.indexOf(level);
    const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

    return {
        level,
        debug(message, ...details) {
            if (enabled('debug')) console.error(`[debug] ${message}`, ...details);
        },
        info(message, ...details) {
            if (enabled('info')) console.error(message, ...details);
        },
        warn(message, ...details) {
            if (enabled('warn')) console.warn(message, ...details);
        },
        error(message, ...details) {
            if (enabled('error')) console.error(message, ...details);
        }
    };
}

export const defaultLogger: Logger = createLogger('warn');
