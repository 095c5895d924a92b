import * as http from "http";
import * as https from "https";
import type { CacheEntry } from "../cache/codec";
import { hasScheme } from "../cache/key";
import { ForwardingError, errorMessage } from "../errors";
import { HeaderMap } from "../http/headers";
import type { HttpRequest } from "../http/parser";

export interface OriginClient {
    fetch(request: HttpRequest): Promise<CacheEntry>;
}

export interface HttpOriginClientOptions {
    /** Idle timeout on the origin socket. Unset means wait indefinitely. */
    timeoutMs?: number;
}

/** Proxy-hop headers the client sent that must not reach the origin. */
export const EXCLUDED_REQUEST_HEADERS = new Set(["host", "connection", "proxy-connection"]);

/** Framing headers that describe the origin hop, not the stored body. */
const HOP_BY_HOP_RESPONSE_HEADERS = new Set(["transfer-encoding", "connection", "keep-alive"]);

/**
 * Resolves the URL a request is forwarded to. Absolute-form targets are used
 * as they are; otherwise the Host value gets `http://` unless it already
 * carries a scheme.
 */
export function resolveOriginUrl(request: HttpRequest): URL {
    let href: string;
    if (hasScheme(request.target)) {
        href = request.target;
    } else {
        const host = request.headers.first("Host");
        if (host === undefined) {
            throw new ForwardingError(`No Host to forward ${request.target} to`);
        }
        const base = hasScheme(host) ? host : `http://${host}`;
        href = base.replace(/\/+$/, "") + request.target;
    }

    try {
        return new URL(href);
    } catch (error) {
        throw new ForwardingError(`Malformed URL: ${href}`, { cause: error });
    }
}

export function forwardedHeaders(headers: HeaderMap): Record<string, string> {
    const forwarded: Record<string, string> = {};
    for (const [name, values] of headers.entries()) {
        if (!EXCLUDED_REQUEST_HEADERS.has(name.toLowerCase())) {
            forwarded[name] = values.join(", ");
        }
    }
    return forwarded;
}

/**
 * Forwards one request over Node's http/https and buffers the whole response.
 * One attempt, one socket: no keep-alive agent and no retry.
 */
export class HttpOriginClient implements OriginClient {
    constructor(private readonly options: HttpOriginClientOptions = {}) {}

    fetch(request: HttpRequest): Promise<CacheEntry> {
        let url: URL;
        try {
            url = resolveOriginUrl(request);
        } catch (error) {
            return Promise.reject(error);
        }

        const requestOptions: http.RequestOptions = {
            method: request.method,
            headers: forwardedHeaders(request.headers),
            agent: false,
        };
        if (this.options.timeoutMs !== undefined) {
            requestOptions.timeout = this.options.timeoutMs;
        }

        return new Promise<CacheEntry>((resolve, reject) => {
            const fail = (error: unknown) => {
                reject(
                    error instanceof ForwardingError
                        ? error
                        : new ForwardingError(`Error forwarding request to ${url.href}: ${errorMessage(error)}`, {
                              cause: error,
                          }),
                );
            };

            let proxyRequest: http.ClientRequest;
            try {
                proxyRequest = send(url, requestOptions, (proxyResponse) => {
                    const body: Buffer[] = [];

                    proxyResponse.on("data", (chunk: Buffer) => {
                        body.push(chunk);
                    });

                    proxyResponse.on("end", () => {
                        if (!proxyResponse.complete) {
                            fail(new ForwardingError(`Origin response for ${url.href} ended early`));
                            return;
                        }
                        resolve({
                            statusLine: `${request.version} ${proxyResponse.statusCode ?? 502} ${proxyResponse.statusMessage ?? ""}`,
                            headers: capturedHeaders(proxyResponse.rawHeaders),
                            body: Buffer.concat(body),
                        });
                    });

                    proxyResponse.on("error", fail);
                });
            } catch (error) {
                // invalid method or header values are rejected synchronously
                fail(error);
                return;
            }

            proxyRequest.on("timeout", () => {
                proxyRequest.destroy(new ForwardingError(`Origin ${url.host} timed out after ${this.options.timeoutMs}ms`));
            });
            proxyRequest.on("error", fail);

            if (request.body) {
                proxyRequest.end(request.body);
            } else {
                proxyRequest.end();
            }
        });
    }
}

function send(
    url: URL,
    options: http.RequestOptions,
    onResponse: (response: http.IncomingMessage) => void,
): http.ClientRequest {
    return url.protocol === "https:" ? https.request(url, options, onResponse) : http.request(url, options, onResponse);
}

function capturedHeaders(rawHeaders: string[]): HeaderMap {
    const headers = new HeaderMap();
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
        const name = rawHeaders[i];
        if (!HOP_BY_HOP_RESPONSE_HEADERS.has(name.toLowerCase())) {
            headers.append(name, rawHeaders[i + 1]);
        }
    }
    return headers;
}
