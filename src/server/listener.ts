import * as net from "net";
import type { CacheStore } from "../cache/store";
import { errorMessage } from "../errors";
import { silentLogger, type Logger } from "../logger";
import type { OriginClient } from "../origin/client";
import type { TunnelRelay } from "../tunnel/relay";
import { ConnectionHandler, type ConnectionOutcome } from "./handler";

export interface ProxyServerOptions {
    port: number;
    host?: string;
    fullProxyMode: boolean;
    origin?: string;
    store: CacheStore;
    originClient: OriginClient;
    tunnel: TunnelRelay;
    logger?: Logger;
    /** Called after each connection finishes, mainly for tests. */
    onOutcome?: (outcome: ConnectionOutcome) => void;
}

/**
 * Accepts client connections and runs a ConnectionHandler for each one,
 * with no limit on how many run at once.
 */
export class ProxyServer {
    private readonly server: net.Server;
    private readonly handler: ConnectionHandler;
    private readonly logger: Logger;
    private readonly sockets = new Set<net.Socket>();

    constructor(private readonly options: ProxyServerOptions) {
        this.logger = options.logger ?? silentLogger;
        this.handler = new ConnectionHandler({
            fullProxyMode: options.fullProxyMode,
            origin: options.origin,
            store: options.store,
            originClient: options.originClient,
            tunnel: options.tunnel,
            logger: this.logger,
        });
        this.server = net.createServer({ allowHalfOpen: true }, (socket) => this.accept(socket));
    }

    /** Binds the listening socket and resolves with the bound port. */
    listen(): Promise<number> {
        return new Promise((resolve, reject) => {
            const onError = (error: Error) => reject(error);
            this.server.once("error", onError);
            this.server.listen(this.options.port, this.options.host, () => {
                this.server.off("error", onError);
                this.server.on("error", (error) => this.logger.error(`Proxy server error: ${error.message}`));
                const address = this.server.address();
                resolve(typeof address === "object" && address !== null ? address.port : this.options.port);
            });
        });
    }

    close(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((error) => (error ? reject(error) : resolve()));
            for (const socket of this.sockets) {
                socket.destroy();
            }
        });
    }

    private accept(socket: net.Socket): void {
        this.sockets.add(socket);
        socket.on("error", (error) => {
            this.logger.debug(`Client socket error: ${error.message}`);
        });
        socket.once("close", () => {
            this.sockets.delete(socket);
        });

        this.handler.handle(socket).then(
            (outcome) => {
                this.options.onOutcome?.(outcome);
            },
            (error: unknown) => {
                socket.destroy();
                this.logger.error(`Unexpected error while handling connection: ${errorMessage(error)}`);
            },
        );
    }
}
