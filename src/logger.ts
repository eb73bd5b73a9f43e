/* eslint-disable no-console */

export interface Logger {
    debug(message: string, meta?: unknown): void;
    info(message: string, meta?: unknown): void;
    warn(message: string, meta?: unknown): void;
    error(message: string, meta?: unknown): void;
}

export function createConsoleLogger(namespace: string): Logger {
    const prefix = `[${namespace}]`;
    return {
        debug(message: string, meta?: unknown): void {
            if (process.env["DEBUG"]) {
                console.debug(prefix, message, meta ?? "");
            }
        },
        info(message: string, meta?: unknown): void {
            console.info(prefix, message, meta ?? "");
        },
        warn(message: string, meta?: unknown): void {
            console.warn(prefix, message, meta ?? "");
        },
        error(message: string, meta?: unknown): void {
            console.error(prefix, message, meta ?? "");
        },
    } satisfies Logger;
}

const noop = (): void => {};

export const silentLogger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
};
