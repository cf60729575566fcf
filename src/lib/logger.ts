/**
 * Leveled console logger. Never throws; the audit ledger, not this, is the
 * record of what the pipeline decided.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
    const threshold = LEVEL_RANK[level];
    const fmt = (lvl: LogLevel, message: string) =>
        `[${scope}][${lvl.toUpperCase()}][${new Date().toISOString()}] ${message}`;

    return {
        debug(message, ...args) {
            if (threshold > LEVEL_RANK.debug) return;
            console.log(fmt("debug", message), ...args);
        },
        info(message, ...args) {
            if (threshold > LEVEL_RANK.info) return;
            console.info(fmt("info", message), ...args);
        },
        warn(message, ...args) {
            if (threshold > LEVEL_RANK.warn) return;
            console.warn(fmt("warn", message), ...args);
        },
        error(message, ...args) {
            console.error(fmt("error", message), ...args);
        },
    };
}

export const silentLogger: Logger = {
    debug() {},
    info() {},
    warn() {},
    error() {},
};
