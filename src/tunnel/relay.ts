import * as net from "net";
import { pipeline } from "stream/promises";
import { TunnelError, errorMessage } from "../errors";
import { silentLogger, type Logger } from "../logger";

export interface TunnelTarget {
    host: string;
    port: number;
}

/** Opens the outbound socket; resolves once it is connected. */
export type Connector = (target: TunnelTarget) => Promise<net.Socket>;

export interface TunnelRelayOptions {
    connector?: Connector;
    logger?: Logger;
    agent?: string;
}

export const DEFAULT_TUNNEL_PORT = 443;

/**
 * `host[:port]` or `[v6addr][:port]`; the port defaults to 443.
 */
export function parseTunnelTarget(target: string): TunnelTarget {
    let host: string;
    let port: string | undefined;

    if (target.startsWith("[")) {
        const close = target.indexOf("]");
        if (close === -1) {
            throw new TunnelError(`Malformed CONNECT target: ${target}`);
        }
        host = target.slice(1, close);
        const rest = target.slice(close + 1);
        if (rest !== "" && !rest.startsWith(":")) {
            throw new TunnelError(`Malformed CONNECT target: ${target}`);
        }
        port = rest === "" ? undefined : rest.slice(1);
    } else {
        const colon = target.indexOf(":");
        host = colon === -1 ? target : target.slice(0, colon);
        port = colon === -1 ? undefined : target.slice(colon + 1);
    }

    if (host === "") {
        throw new TunnelError(`CONNECT target has no host: ${target}`);
    }
    if (port === undefined) {
        return { host, port: DEFAULT_TUNNEL_PORT };
    }

    const parsed = /^\d+$/.test(port) ? Number.parseInt(port, 10) : NaN;
    if (!(parsed >= 1 && parsed <= 65535)) {
        throw new TunnelError(`Invalid CONNECT port: ${port}`);
    }
    return { host, port: parsed };
}

export const connectTcp: Connector = ({ host, port }) =>
    new Promise((resolve, reject) => {
        const socket = net.connect({ host, port });
        const onError = (error: Error) => {
            socket.destroy();
            reject(error);
        };
        socket.once("error", onError);
        socket.once("connect", () => {
            socket.off("error", onError);
            resolve(socket);
        });
    });

/**
 * Opaque byte pump for CONNECT. The proxy never looks at what flows through.
 */
export class TunnelRelay {
    private readonly connector: Connector;
    private readonly logger: Logger;
    private readonly agent: string;

    constructor(options: TunnelRelayOptions = {}) {
        this.connector = options.connector ?? connectTcp;
        this.logger = options.logger ?? silentLogger;
        this.agent = options.agent ?? "caching-proxy";
    }

    /**
     * Connects to `target`, acknowledges the client and relays both ways.
     * Resolves when both directions are done; only a failed connect rejects.
     *
     * @param head bytes the client sent after the CONNECT header block
     */
    async open(client: net.Socket, target: TunnelTarget, head: Buffer = Buffer.alloc(0)): Promise<void> {
        let upstream: net.Socket;
        try {
            upstream = await this.connector(target);
        } catch (error) {
            throw new TunnelError(`Cannot reach ${target.host}:${target.port}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        upstream.on("error", (error) => {
            this.logger.debug(`Tunnel to ${target.host}:${target.port} closed: ${error.message}`);
        });
        client.setNoDelay(true);
        upstream.setNoDelay(true);

        client.write(`HTTP/1.1 200 Connection Established\r\nProxy-Agent: ${this.agent}\r\n\r\n`);
        if (head.length > 0) {
            upstream.write(head);
        }

        const directions = await Promise.allSettled([pipeline(client, upstream), pipeline(upstream, client)]);
        for (const result of directions) {
            if (result.status === "rejected") {
                this.logger.debug(`Tunnel relay to ${target.host}:${target.port} ended: ${errorMessage(result.reason)}`);
            }
        }

        upstream.destroy();
    }
}
