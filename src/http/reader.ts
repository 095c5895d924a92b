import type { Readable } from "stream";
import { ClientConnectionError } from "../errors";

const LF = 0x0a;

/**
 * Pull-style reads (lines, then exact byte counts) over a socket's data events.
 * Call `detach()` before handing the socket to anything else: it pauses the
 * stream and gives back whatever was received but not yet read.
 */
export class SocketReader {
    private buffer: Buffer = Buffer.alloc(0);
    private ended = false;
    private failure: Error | undefined;
    private notify: (() => void) | undefined;
    private attached = true;

    constructor(private readonly stream: Readable) {
        stream.on("data", this.onData);
        stream.on("end", this.onEnd);
        stream.on("close", this.onEnd);
        stream.on("error", this.onError);
    }

    /**
     * Next LF-terminated line without its line ending, or null at end of
     * stream. An unterminated tail is returned as a final line.
     */
    async readLine(): Promise<string | null> {
        for (;;) {
            const index = this.buffer.indexOf(LF);
            if (index !== -1) {
                const line = this.take(index + 1).subarray(0, index);
                return stripCarriageReturn(line.toString("utf8"));
            }
            this.throwIfFailed();
            if (this.ended) {
                if (this.buffer.length === 0) return null;
                return stripCarriageReturn(this.take(this.buffer.length).toString("utf8"));
            }
            await this.waitForData();
        }
    }

    /** Exactly `length` bytes, or null if the stream ends first. */
    async readBytes(length: number): Promise<Buffer | null> {
        while (this.buffer.length < length) {
            this.throwIfFailed();
            if (this.ended) return null;
            await this.waitForData();
        }
        return this.take(length);
    }

    get buffered(): number {
        return this.buffer.length;
    }

    detach(): Buffer {
        if (!this.attached) return Buffer.alloc(0);
        this.attached = false;
        this.stream.pause();
        this.stream.off("data", this.onData);
        this.stream.off("end", this.onEnd);
        this.stream.off("close", this.onEnd);
        this.stream.off("error", this.onError);
        return this.take(this.buffer.length);
    }

    private take(length: number): Buffer {
        const chunk = this.buffer.subarray(0, length);
        this.buffer = this.buffer.subarray(length);
        return chunk;
    }

    private throwIfFailed(): void {
        if (this.failure) {
            throw new ClientConnectionError(`Client socket failed: ${this.failure.message}`, {
                cause: this.failure,
            });
        }
    }

    private waitForData(): Promise<void> {
        return new Promise((resolve) => {
            this.notify = resolve;
        });
    }

    private wake(): void {
        const notify = this.notify;
        this.notify = undefined;
        notify?.();
    }

    private readonly onData = (chunk: Buffer): void => {
        this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
        this.wake();
    };

    private readonly onEnd = (): void => {
        this.ended = true;
        this.wake();
    };

    private readonly onError = (error: Error): void => {
        this.failure = error;
        this.wake();
    };
}

function stripCarriageReturn(line: string): string {
    return line.endsWith("\r") ? line.slice(0, -1) : line;
}
