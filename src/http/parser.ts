import { cachePath } from "../cache/key";
import { ParseError } from "../errors";
import { HeaderMap } from "./headers";

export interface HttpRequest {
    method: string;
    /**
     * Origin-form path or absolute URL as sent. In fixed-origin mode an
     * absolute URL is cut down to its path and query.
     */
    target: string;
    /** Protocol version, echoed back on the response status line. */
    version: string;
    headers: HeaderMap;
    body?: Buffer;
}

/** The subset of SocketReader the parser needs. */
export interface RequestSource {
    readLine(): Promise<string | null>;
    readBytes(length: number): Promise<Buffer | null>;
}

export interface ParseOptions {
    fullProxyMode: boolean;
    /** Replaces the client's Host header and target authority when not in full-proxy mode. */
    origin?: string;
}

const BODY_METHODS = new Set(["POST", "PUT"]);

/**
 * Reads one request from `source`. Resolves to null when the client sent
 * nothing (closed before a request line, or sent an empty one).
 */
export async function parseRequest(source: RequestSource, options: ParseOptions): Promise<HttpRequest | null> {
    const requestLine = await source.readLine();
    if (requestLine === null || requestLine === "") {
        return null;
    }

    const [method, requestTarget, version] = parseRequestLine(requestLine);
    const origin = options.fullProxyMode ? undefined : options.origin;
    const target = origin !== undefined && method !== "CONNECT" ? cachePath(requestTarget) : requestTarget;

    const headers = new HeaderMap();
    let line = await source.readLine();
    while (line !== null && line !== "") {
        const header = parseHeaderLine(line);
        if (header) {
            headers.set(header.name, header.values);
        }
        line = await source.readLine();
    }

    if (origin !== undefined) {
        headers.set("Host", origin);
    }

    const request: HttpRequest = { method, target, version, headers };

    const contentLength = headers.first("Content-Length");
    if (BODY_METHODS.has(method.toUpperCase()) && contentLength !== undefined) {
        const length = parseContentLength(contentLength);
        const body = await source.readBytes(length);
        if (body === null) {
            throw new ParseError(`Request body ended before ${length} bytes were received`);
        }
        if (length > 0) {
            request.body = body;
        }
    }

    return request;
}

export function parseRequestLine(line: string): [string, string, string] {
    const parts = line.split(" ");
    if (parts.length < 3) {
        throw new ParseError(`Malformed request line: ${JSON.stringify(line)}`);
    }
    return [parts[0], parts[1], parts[2]];
}

/**
 * Splits `Name: a, b` at the first colon into a trimmed name and the
 * comma-separated values. Lines without a colon are ignored.
 */
export function parseHeaderLine(line: string): { name: string; values: string[] } | undefined {
    const colon = line.indexOf(":");
    if (colon === -1) return undefined;
    const name = line.slice(0, colon).trim();
    const values = line
        .slice(colon + 1)
        .trim()
        .split(", ");
    return { name, values };
}

function parseContentLength(value: string): number {
    if (!/^\d+$/.test(value)) {
        throw new ParseError(`Invalid Content-Length: ${JSON.stringify(value)}`);
    }
    return Number.parseInt(value, 10);
}
