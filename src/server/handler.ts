import type { Socket } from "net";
import { requestKey } from "../cache/key";
import type { CacheStore } from "../cache/store";
import { MissingHostError, ProxyError } from "../errors";
import { parseRequest } from "../http/parser";
import { SocketReader } from "../http/reader";
import { silentLogger, type Logger } from "../logger";
import type { OriginClient } from "../origin/client";
import { parseTunnelTarget, type TunnelRelay } from "../tunnel/relay";
import { closeAfterResponse, writeResponse, type CacheStatus } from "./response";

export interface ConnectionHandlerOptions {
    fullProxyMode: boolean;
    origin?: string;
    store: CacheStore;
    originClient: OriginClient;
    tunnel: TunnelRelay;
    logger?: Logger;
}

export type ConnectionOutcome =
    | { kind: "empty" }
    | { kind: "tunnel"; host: string; port: number }
    | { kind: "responded"; key: string; cacheStatus: CacheStatus }
    | { kind: "aborted"; error: ProxyError };

/**
 * Drives one client connection: parse, then either tunnel (CONNECT) or
 * answer from the cache, fetching and storing on a miss.
 *
 * Every path closes the socket. Errors outside the ProxyError taxonomy
 * are rethrown after the socket is destroyed.
 */
export class ConnectionHandler {
    private readonly logger: Logger;

    constructor(private readonly options: ConnectionHandlerOptions) {
        this.logger = options.logger ?? silentLogger;
    }

    async handle(socket: Socket): Promise<ConnectionOutcome> {
        const reader = new SocketReader(socket);
        try {
            const request = await parseRequest(reader, {
                fullProxyMode: this.options.fullProxyMode,
                origin: this.options.origin,
            });

            if (!request) {
                this.logger.debug("Empty request");
                reader.detach();
                socket.destroy();
                return { kind: "empty" };
            }

            if (request.method === "CONNECT") {
                const target = parseTunnelTarget(request.target);
                this.logger.info(`Tunnel to ${target.host}:${target.port}`);
                await this.options.tunnel.open(socket, target, reader.detach());
                socket.destroy();
                return { kind: "tunnel", ...target };
            }

            const host = request.headers.first("Host");
            if (host === undefined) {
                throw new MissingHostError(request.target);
            }

            const key = requestKey(request.method, host, request.target);
            reader.detach();

            let cacheStatus: CacheStatus;
            let entry = await this.options.store.get(key);
            if (entry) {
                this.logger.info(`Cache hit for ${request.method} ${host}${request.target}`);
                cacheStatus = "HIT";
            } else {
                this.logger.info(`Cache miss for ${request.method} ${host}${request.target}. Forwarding request to origin`);
                entry = await this.options.originClient.fetch(request);
                await this.options.store.put(key, entry);
                cacheStatus = "MISS";
            }

            await writeResponse(socket, entry, cacheStatus);
            await closeAfterResponse(socket);
            return { kind: "responded", key, cacheStatus };
        } catch (error) {
            reader.detach();
            socket.destroy();
            if (error instanceof ProxyError) {
                this.logger.warn(`${error.name}: ${error.message}`);
                return { kind: "aborted", error };
            }
            throw error;
        }
    }
}
