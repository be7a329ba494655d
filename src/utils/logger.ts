/**
 * Scoped console logger.
 *
 * Debug output is switched per logger instance from configuration,
 * so nothing in the pipeline reads a global flag.
 */

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
    child(scope: string): Logger;
}

export interface LoggerOptions {
    debug?: boolean;
}

function timestamp(): string {
    // 2024-05-01 13:45:10
    return new Date().toISOString().replace("T", " ").slice(0, 19);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const prefix = `[${scope}]`;
    const debugEnabled = options.debug ?? false;

    return {
        debug(message, ...details) {
            if (!debugEnabled) return;
            console.log(`[DEBUG ${timestamp()}] ${prefix} ${message}`, ...details);
        },
        info(message, ...details) {
            console.log(`${prefix} ${message}`, ...details);
        },
        warn(message, ...details) {
            console.warn(`${prefix} ${message}`, ...details);
        },
        error(message, ...details) {
            console.error(`${prefix} ${message}`, ...details);
        },
        child(childScope) {
            return createLogger(`${scope}:${childScope}`, options);
        },
    };
}

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
    child() {
        return silentLogger;
    },
};
