export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

let currentLogger: Logger = {
    debug: (...args: unknown[]) => console.debug(...args),
    info: (...args: unknown[]) => console.info(...args),
    warn: (...args: unknown[]) => console.warn(...args),
    error: (...args: unknown[]) => console.error(...args),
};

export function setLogger(logger: Logger) {
    currentLogger = logger;
}

export function getLogger(): Logger {
    return currentLogger;
}

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Wraps a logger so that messages below `level` are dropped.
 */
export function withLevel(logger: Logger, level: LogLevel): Logger {
    const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
    const noop = () => {};
    return {
        debug: enabled('debug') ? logger.debug : noop,
        info: enabled('info') ? logger.info : noop,
        warn: enabled('warn') ? logger.warn : noop,
        error: enabled('error') ? logger.error : noop,
    };
}

export function debug(message: string, ...args: unknown[]) {
    currentLogger.debug(message, ...args);
}

export function info(message: string, ...args: unknown[]) {
    currentLogger.info(message, ...args);
}

export function warn(message: string, ...args: unknown[]) {
    currentLogger.warn(message, ...args);
}

export function error(message: string, ...args: unknown[]) {
    currentLogger.error(message, ...args);
}
