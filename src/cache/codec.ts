import { StoreError } from "../errors";
import { HeaderMap } from "../http/headers";

export interface CacheEntry {
    /** `<client version> <status code> <reason phrase>` */
    statusLine: string;
    headers: HeaderMap;
    body: Buffer;
}

const MAGIC = Buffer.from("CPX1", "ascii");

/*
 * Record layout, all lengths u32 big-endian:
 *   "CPX1" | status len, status | pair count | (name len, name, value len, value)* | body len, body
 */

export function encodeEntry(entry: CacheEntry): Buffer {
    const parts: Buffer[] = [MAGIC, lengthPrefixed(Buffer.from(entry.statusLine, "utf8"))];

    const pairs = [...entry.headers.pairs()];
    parts.push(uint32(pairs.length));
    for (const [name, value] of pairs) {
        parts.push(lengthPrefixed(Buffer.from(name, "utf8")), lengthPrefixed(Buffer.from(value, "utf8")));
    }

    parts.push(lengthPrefixed(entry.body));
    return Buffer.concat(parts);
}

export function decodeEntry(data: Buffer): CacheEntry {
    const cursor = new Cursor(data);

    const magic = cursor.bytes(MAGIC.length);
    if (!magic.equals(MAGIC)) {
        throw new StoreError("Cache record has an unknown format");
    }

    const statusLine = cursor.prefixed().toString("utf8");

    const headers = new HeaderMap();
    const count = cursor.uint32();
    for (let i = 0; i < count; i++) {
        const name = cursor.prefixed().toString("utf8");
        const value = cursor.prefixed().toString("utf8");
        headers.append(name, value);
    }

    const body = Buffer.from(cursor.prefixed());

    if (cursor.remaining !== 0) {
        throw new StoreError(`Cache record has ${cursor.remaining} trailing bytes`);
    }

    return { statusLine, headers, body };
}

function uint32(value: number): Buffer {
    const buffer = Buffer.alloc(4);
    buffer.writeUInt32BE(value, 0);
    return buffer;
}

function lengthPrefixed(data: Buffer): Buffer {
    return Buffer.concat([uint32(data.length), data]);
}

class Cursor {
    private offset = 0;

    constructor(private readonly data: Buffer) {}

    get remaining(): number {
        return this.data.length - this.offset;
    }

    uint32(): number {
        return this.bytes(4).readUInt32BE(0);
    }

    bytes(length: number): Buffer {
        if (length > this.remaining) {
            throw new StoreError(`Cache record truncated at byte ${this.offset}`);
        }
        const chunk = this.data.subarray(this.offset, this.offset + length);
        this.offset += length;
        return chunk;
    }

    prefixed(): Buffer {
        return this.bytes(this.uint32());
    }
}
