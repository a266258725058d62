import config from './config';

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger with a `[Tag]` prefix. Debug lines only print when DEBUG is on.
 */
export function createLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        debug: (message, ...details) => {
            if (config.debug) console.debug(`${prefix} ${message}`, ...details);
        },
        info: (message, ...details) => console.log(`${prefix} ${message}`, ...details),
        warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
        error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    };
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
