export type ProxyErrorCode =
    | "PARSE_ERROR"
    | "MISSING_HOST"
    | "STORE_ERROR"
    | "FORWARDING_ERROR"
    | "TUNNEL_ERROR"
    | "CLIENT_CONNECTION_ERROR"
    | "CONFIG_ERROR";

/**
 * Base class for every failure the proxy knows how to classify.
 * All of them are local to one connection except ConfigError, which only
 * happens before the server starts.
 */
export class ProxyError extends Error {
    readonly code: ProxyErrorCode;

    constructor(code: ProxyErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Malformed request line, header block or body framing. */
export class ParseError extends ProxyError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("PARSE_ERROR", message, options);
    }
}

export class MissingHostError extends ProxyError {
    constructor(target: string) {
        super("MISSING_HOST", `Host header not found for ${target}`);
    }
}

/** Corrupt cache record or I/O failure against the cache directory. */
export class StoreError extends ProxyError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("STORE_ERROR", message, options);
    }
}

/** Origin unreachable, bad resolved URL, or a failure mid-transfer. */
export class ForwardingError extends ProxyError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("FORWARDING_ERROR", message, options);
    }
}

export class TunnelError extends ProxyError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("TUNNEL_ERROR", message, options);
    }
}

/** The client socket failed while a request was read or a response written. */
export class ClientConnectionError extends ProxyError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CLIENT_CONNECTION_ERROR", message, options);
    }
}

export class ConfigError extends ProxyError {
    constructor(message: string) {
        super("CONFIG_ERROR", message);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
