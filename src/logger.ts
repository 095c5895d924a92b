import pc from "picocolors";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

const rank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console logger with a minimum level. Errors and warnings go to stderr.
 */
export function createLogger(level: LogLevel = "info"): Logger {
    const enabled = (candidate: LogLevel) => rank[candidate] >= rank[level];

    return {
        debug(message) {
            if (enabled("debug")) console.log(pc.dim("·"), pc.dim(message));
        },
        info(message) {
            if (enabled("info")) console.log(pc.cyan("ℹ"), message);
        },
        warn(message) {
            if (enabled("warn")) console.error(pc.yellow("⚠"), message);
        },
        error(message) {
            if (enabled("error")) console.error(pc.red("✗"), message);
        },
    };
}

export const silentLogger: Logger = createLogger("silent");
