import yargs from "yargs/yargs";
import { ConfigError } from "./errors";
import { LOG_LEVELS, isLogLevel, type LogLevel } from "./logger";

export const DEFAULT_CACHE_DIR = "./cache";

export interface ProxyConfig {
    port: number;
    /** Required unless fullProxyMode is set. */
    origin?: string;
    fullProxyMode: boolean;
    cacheDir: string;
    originTimeoutMs?: number;
    logLevel: LogLevel;
}

export interface CliArguments {
    port?: number;
    origin?: string;
    fullCaching: boolean;
    clearCache: boolean;
    cacheDir: string;
    originTimeout?: number;
    logLevel: LogLevel;
    help: boolean;
}

/**
 * Flag parser. `CACHING_PROXY_*` environment variables (and so a `.env` file
 * loaded by dotenv) fill in flags that were not given.
 */
export function createArgumentParser(args: string[]) {
    return yargs(args)
        .scriptName("caching-proxy")
        .usage("Usage: $0 --port <number> --origin <url> [options]")
        .env("CACHING_PROXY")
        .options({
            port: {
                alias: "p",
                type: "number",
                description: "Port on which the proxy server will run",
            },
            origin: {
                alias: "o",
                type: "string",
                description: "URL of the server to which requests will be forwarded",
            },
            "full-caching": {
                type: "boolean",
                default: false,
                description: "Honor each client's Host and proxy every outgoing request",
            },
            "clear-cache": {
                type: "boolean",
                default: false,
                description: "Clear the cache and exit",
            },
            "cache-dir": {
                type: "string",
                default: DEFAULT_CACHE_DIR,
                description: "Directory holding cached responses",
            },
            "origin-timeout": {
                type: "number",
                description: "Fail origin requests idle for this many milliseconds",
            },
            "log-level": {
                choices: LOG_LEVELS,
                default: "info",
                description: "Minimum level of log output",
            },
        })
        .check((argv) => {
            validateArguments({
                port: argv.port,
                origin: argv.origin,
                fullCaching: argv["full-caching"],
                clearCache: argv["clear-cache"],
            });
            return true;
        })
        .example("$0 --port 3000 --origin http://dummyjson.com", "Cache every response from dummyjson.com")
        .example("$0 --port 3000 --full-caching", "Act as a caching forward proxy for any origin")
        .example("$0 --clear-cache", "Remove every cached response")
        .help()
        .alias("h", "help")
        .strict()
        .exitProcess(false)
        .fail((message, error) => {
            throw error ?? new ConfigError(message);
        });
}

export function parseArguments(args: string[]): CliArguments {
    const argv = createArgumentParser(args).parseSync();
    return {
        port: argv.port,
        origin: argv.origin,
        fullCaching: argv["full-caching"],
        clearCache: argv["clear-cache"],
        cacheDir: argv["cache-dir"],
        originTimeout: argv["origin-timeout"],
        logLevel: toLogLevel(argv["log-level"]),
        help: argv.help === true,
    };
}

function toLogLevel(value: unknown): LogLevel {
    if (!isLogLevel(value)) {
        throw new ConfigError(`Invalid log level: ${String(value)}`);
    }
    return value;
}

function validateArguments(args: Pick<CliArguments, "port" | "origin" | "fullCaching" | "clearCache">): void {
    if (args.clearCache) return;

    if (args.port === undefined) {
        throw new ConfigError("Port is required");
    }
    if (!Number.isInteger(args.port) || args.port < 0 || args.port > 65535) {
        throw new ConfigError(`Invalid port: ${args.port}`);
    }
    if (!args.fullCaching && !args.origin) {
        throw new ConfigError("Origin URL is required");
    }
}

/** Turns parsed flags into the server's configuration. */
export function resolveConfig(args: Omit<CliArguments, "help">): ProxyConfig {
    validateArguments(args);
    if (args.port === undefined) {
        throw new ConfigError("Port is required");
    }
    if (args.originTimeout !== undefined && !(args.originTimeout > 0)) {
        throw new ConfigError(`Invalid origin timeout: ${args.originTimeout}`);
    }

    const config: ProxyConfig = {
        port: args.port,
        fullProxyMode: args.fullCaching,
        cacheDir: args.cacheDir,
        logLevel: args.logLevel,
    };
    if (args.origin) config.origin = args.origin;
    if (args.originTimeout !== undefined) config.originTimeoutMs = args.originTimeout;
    return config;
}
