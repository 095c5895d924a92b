import type { Socket } from "net";
import { finished } from "stream/promises";
import type { CacheEntry } from "../cache/codec";
import { ClientConnectionError, errorMessage } from "../errors";

export type CacheStatus = "HIT" | "MISS";

export function formatResponseHead(entry: CacheEntry, cacheStatus: CacheStatus): string {
    let head = `${entry.statusLine}\r\n`;
    for (const [name, value] of entry.headers.pairs()) {
        head += `${name}: ${value}\r\n`;
    }
    head += `X-CACHE: ${cacheStatus}\r\n`;
    head += "Connection: close\r\n";
    head += "\r\n";
    return head;
}

/**
 * Writes the whole response, then ends the socket's write side and waits
 * for the data to be flushed.
 */
export async function writeResponse(socket: Socket, entry: CacheEntry, cacheStatus: CacheStatus): Promise<void> {
    const head = Buffer.from(formatResponseHead(entry, cacheStatus), "utf8");
    const payload = entry.body.length > 0 ? Buffer.concat([head, entry.body]) : head;

    try {
        socket.end(payload);
        await finished(socket, { readable: false });
    } catch (error) {
        throw new ClientConnectionError(`Cannot write response to client: ${errorMessage(error)}`, { cause: error });
    }
}

/** How long a client gets to hang up after its response before the socket is destroyed. */
export const CLOSE_LINGER_MS = 2000;

/**
 * Closes a socket whose write side has already ended. Unread input is
 * drained until the client hangs up, so the close does not reset the
 * connection under a response still in flight.
 */
export function closeAfterResponse(socket: Socket, lingerMs = CLOSE_LINGER_MS): Promise<void> {
    return new Promise((resolve) => {
        if (socket.destroyed) {
            resolve();
            return;
        }
        const timer = setTimeout(() => socket.destroy(), lingerMs);
        socket.once("close", () => {
            clearTimeout(timer);
            resolve();
        });
        socket.resume();
    });
}
