import { promises as fs } from "fs";
import * as http from "http";
import * as net from "net";
import * as os from "os";
import path from "path";

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), "caching-proxy-"));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

export interface TestOrigin {
    port: number;
    requests: http.IncomingMessage[];
    bodies: Buffer[];
    close(): Promise<void>;
}

/** In-process origin on 127.0.0.1 that records what it receives. */
export async function startOrigin(
    respond: (request: http.IncomingMessage, body: Buffer, response: http.ServerResponse) => void,
): Promise<TestOrigin> {
    const requests: http.IncomingMessage[] = [];
    const bodies: Buffer[] = [];

    const server = http.createServer((request, response) => {
        const chunks: Buffer[] = [];
        request.on("data", (chunk: Buffer) => chunks.push(chunk));
        request.on("end", () => {
            const body = Buffer.concat(chunks);
            requests.push(request);
            bodies.push(body);
            respond(request, body, response);
        });
    });

    const port = await listenOn(server);
    return {
        port,
        requests,
        bodies,
        close: () => closeServer(server),
    };
}

export interface EchoTarget {
    port: number;
    connections: number;
    close(): Promise<void>;
}

/** TCP server that writes back every byte it reads, then closes when the peer does. */
export async function startEchoTarget(): Promise<EchoTarget> {
    const sockets = new Set<net.Socket>();
    const target: EchoTarget = {
        port: 0,
        connections: 0,
        close: async () => {
            for (const socket of sockets) socket.destroy();
            await closeServer(server);
        },
    };
    const server = net.createServer((socket) => {
        target.connections += 1;
        sockets.add(socket);
        socket.on("error", () => socket.destroy());
        socket.pipe(socket);
    });
    target.port = await listenOn(server);
    return target;
}

/** Sends raw bytes and collects everything the peer writes until it closes. */
export function rawRequest(port: number, data: string | Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        const socket = net.connect(port, "127.0.0.1", () => {
            socket.write(data);
        });
        socket.on("data", (chunk: Buffer) => chunks.push(chunk));
        socket.on("error", reject);
        socket.on("close", () => resolve(Buffer.concat(chunks)));
    });
}

export function connect(port: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const socket = net.connect(port, "127.0.0.1", () => resolve(socket));
        socket.once("error", reject);
    });
}

/** Reads from `socket` until `predicate` holds for everything received so far. */
export function readUntil(socket: net.Socket, predicate: (received: Buffer) => boolean): Promise<Buffer> {
    return new Promise((resolve, reject) => {
        let received = Buffer.alloc(0);
        const onData = (chunk: Buffer) => {
            received = Buffer.concat([received, chunk]);
            if (predicate(received)) {
                cleanup();
                resolve(received);
            }
        };
        const onClose = () => {
            cleanup();
            reject(new Error(`socket closed after ${received.length} bytes`));
        };
        const cleanup = () => {
            socket.off("data", onData);
            socket.off("close", onClose);
        };
        socket.on("data", onData);
        socket.on("close", onClose);
    });
}

export interface ParsedResponse {
    statusLine: string;
    headerLines: string[];
    body: Buffer;
}

export function splitResponse(raw: Buffer): ParsedResponse {
    const end = raw.indexOf("\r\n\r\n");
    if (end === -1) {
        throw new Error(`no header terminator in ${JSON.stringify(raw.toString("utf8"))}`);
    }
    const [statusLine, ...headerLines] = raw.subarray(0, end).toString("utf8").split("\r\n");
    return { statusLine, headerLines, body: raw.subarray(end + 4) };
}

function listenOn(server: net.Server): Promise<number> {
    return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, "127.0.0.1", () => {
            const address = server.address();
            if (address === null || typeof address === "string") {
                reject(new Error("server has no port"));
                return;
            }
            resolve(address.port);
        });
    });
}

function closeServer(server: net.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
