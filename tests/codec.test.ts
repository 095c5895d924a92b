import { describe, expect, it } from "vitest";
import { decodeEntry, encodeEntry, type CacheEntry } from "../src/cache/codec";
import { StoreError } from "../src/errors";
import { HeaderMap } from "../src/http/headers";

function sampleEntry(): CacheEntry {
    return {
        statusLine: "HTTP/1.1 200 OK",
        headers: HeaderMap.from([
            ["Content-Type", "application/json; charset=utf-8"],
            ["Set-Cookie", "a=1"],
            ["Set-Cookie", "b=2"],
        ]),
        body: Buffer.from('{"id":1}'),
    };
}

describe("record codec", () => {
    it("writes the documented layout", () => {
        const entry: CacheEntry = {
            statusLine: "HTTP/1.1 204 No Content",
            headers: HeaderMap.from([["X", "y"]]),
            body: Buffer.alloc(0),
        };

        const expected = Buffer.concat([
            Buffer.from("CPX1"),
            Buffer.from([0, 0, 0, 23]),
            Buffer.from("HTTP/1.1 204 No Content"),
            Buffer.from([0, 0, 0, 1]),
            Buffer.from([0, 0, 0, 1]),
            Buffer.from("X"),
            Buffer.from([0, 0, 0, 1]),
            Buffer.from("y"),
            Buffer.from([0, 0, 0, 0]),
        ]);

        expect(encodeEntry(entry)).toEqual(expected);
    });

    it("restores status line, headers and body exactly", () => {
        const entry = sampleEntry();

        const decoded = decodeEntry(encodeEntry(entry));

        expect(decoded.statusLine).toBe(entry.statusLine);
        expect([...decoded.headers.pairs()]).toEqual([...entry.headers.pairs()]);
        expect(decoded.body).toEqual(entry.body);
    });

    it("keeps binary bodies intact", () => {
        const body = Buffer.from([0x00, 0xff, 0x10, 0x80, 0x0d, 0x0a]);

        const decoded = decodeEntry(encodeEntry({ statusLine: "HTTP/1.0 200 OK", headers: new HeaderMap(), body }));

        expect(decoded.body).toEqual(body);
    });

    it("rejects an unknown format", () => {
        expect(() => decodeEntry(Buffer.from("not a cache record"))).toThrow(StoreError);
    });

    it("rejects a truncated record", () => {
        const encoded = encodeEntry(sampleEntry());

        expect(() => decodeEntry(encoded.subarray(0, encoded.length - 3))).toThrow(/truncated/);
    });

    it("rejects trailing bytes", () => {
        const encoded = Buffer.concat([encodeEntry(sampleEntry()), Buffer.from("!")]);

        expect(() => decodeEntry(encoded)).toThrow("Cache record has 1 trailing bytes");
    });
});
