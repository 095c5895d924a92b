import { PassThrough } from "stream";
import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors";
import { parseHeaderLine, parseRequest, parseRequestLine } from "../src/http/parser";
import { SocketReader } from "../src/http/reader";

function readerFor(data: string | Buffer, end = true): { reader: SocketReader; stream: PassThrough } {
    const stream = new PassThrough();
    const reader = new SocketReader(stream);
    if (end) {
        stream.end(data);
    } else {
        stream.write(data);
    }
    return { reader, stream };
}

const fullProxy = { fullProxyMode: true };

describe("parseRequestLine", () => {
    it("splits method, target and version", () => {
        expect(parseRequestLine("GET /products/1 HTTP/1.1")).toEqual(["GET", "/products/1", "HTTP/1.1"]);
    });

    it("ignores tokens past the third", () => {
        expect(parseRequestLine("GET / HTTP/1.1 extra")).toEqual(["GET", "/", "HTTP/1.1"]);
    });

    it("rejects lines with fewer than three tokens", () => {
        expect(() => parseRequestLine("GET /")).toThrow(ParseError);
    });
});

describe("parseHeaderLine", () => {
    it("splits at the first colon and keeps the rest of the value", () => {
        expect(parseHeaderLine("Host: localhost:3000")).toEqual({ name: "Host", values: ["localhost:3000"] });
    });

    it("splits comma-joined values on comma-space", () => {
        expect(parseHeaderLine("Accept:  text/html, application/json,text/plain ")).toEqual({
            name: "Accept",
            values: ["text/html", "application/json,text/plain"],
        });
    });

    it("ignores lines without a colon", () => {
        expect(parseHeaderLine("garbage")).toBeUndefined();
    });
});

describe("parseRequest", () => {
    it("parses the request line and headers", async () => {
        const { reader } = readerFor("GET /products/1 HTTP/1.1\r\nHost: dummyjson.com\r\nAccept: a, b\r\n\r\n");

        const request = await parseRequest(reader, fullProxy);

        expect(request).not.toBeNull();
        expect(request?.method).toBe("GET");
        expect(request?.target).toBe("/products/1");
        expect(request?.version).toBe("HTTP/1.1");
        expect(request?.headers.first("host")).toBe("dummyjson.com");
        expect(request?.headers.get("Accept")).toEqual(["a", "b"]);
        expect(request?.body).toBeUndefined();
    });

    it("returns null when the client sends nothing", async () => {
        const { reader } = readerFor("");

        await expect(parseRequest(reader, fullProxy)).resolves.toBeNull();
    });

    it("returns null for an empty first line", async () => {
        const { reader } = readerFor("\r\nGET / HTTP/1.1\r\n\r\n");

        await expect(parseRequest(reader, fullProxy)).resolves.toBeNull();
    });

    it("fails on a malformed request line", async () => {
        const { reader } = readerFor("HELLO\r\n\r\n");

        await expect(parseRequest(reader, fullProxy)).rejects.toBeInstanceOf(ParseError);
    });

    it("lets the last duplicate header win", async () => {
        const { reader } = readerFor("GET / HTTP/1.1\r\nX-Trace: one\r\nx-trace: two\r\n\r\n");

        const request = await parseRequest(reader, fullProxy);

        expect(request?.headers.get("X-Trace")).toEqual(["two"]);
    });

    it("overwrites Host with the origin in fixed-origin mode", async () => {
        const { reader } = readerFor("GET /products/1 HTTP/1.1\r\nHost: localhost:3000\r\n\r\n");

        const request = await parseRequest(reader, { fullProxyMode: false, origin: "http://dummyjson.com" });

        expect(request?.headers.get("Host")).toEqual(["http://dummyjson.com"]);
    });

    it("adds Host in fixed-origin mode when the client sent none", async () => {
        const { reader } = readerFor("GET / HTTP/1.0\r\n\r\n");

        const request = await parseRequest(reader, { fullProxyMode: false, origin: "http://dummyjson.com" });

        expect(request?.headers.first("Host")).toBe("http://dummyjson.com");
    });

    it("cuts an absolute-form target down to its path in fixed-origin mode", async () => {
        const { reader } = readerFor("GET http://127.0.0.1:9999/x?y=1 HTTP/1.1\r\nHost: 127.0.0.1:9999\r\n\r\n");

        const request = await parseRequest(reader, { fullProxyMode: false, origin: "http://dummyjson.com" });

        expect(request?.target).toBe("/x?y=1");
        expect(request?.headers.first("Host")).toBe("http://dummyjson.com");
    });

    it("keeps an absolute-form target as sent in full-proxy mode", async () => {
        const { reader } = readerFor("GET http://a.test/x HTTP/1.1\r\nHost: b.test\r\n\r\n");

        const request = await parseRequest(reader, { fullProxyMode: true, origin: "http://dummyjson.com" });

        expect(request?.target).toBe("http://a.test/x");
    });

    it("keeps the client's Host in full-proxy mode", async () => {
        const { reader } = readerFor("GET / HTTP/1.1\r\nHost: example.com\r\n\r\n");

        const request = await parseRequest(reader, { fullProxyMode: true, origin: "http://dummyjson.com" });

        expect(request?.headers.first("Host")).toBe("example.com");
    });

    it("consumes exactly Content-Length bytes of a POST body without waiting for more", async () => {
        const { reader } = readerFor("POST /x HTTP/1.1\r\nHost: a\r\nContent-Length: 5\r\n\r\nhelloGET", false);

        const request = await parseRequest(reader, fullProxy);

        expect(request?.body?.toString("utf8")).toBe("hello");
        expect(reader.detach().toString("utf8")).toBe("GET");
    });

    it("reads binary PUT bodies byte for byte", async () => {
        const body = Buffer.from([0xe2, 0x82, 0xac, 0x00, 0xff]);
        const head = Buffer.from("PUT /blob HTTP/1.1\r\nContent-Length: 5\r\n\r\n");
        const { reader } = readerFor(Buffer.concat([head, body]));

        const request = await parseRequest(reader, fullProxy);

        expect(request?.body).toEqual(body);
    });

    it("matches body methods case-insensitively", async () => {
        const { reader } = readerFor("post /x HTTP/1.1\r\nContent-Length: 2\r\n\r\nok");

        const request = await parseRequest(reader, fullProxy);

        expect(request?.body?.toString("utf8")).toBe("ok");
    });

    it("does not read a body for GET even with Content-Length", async () => {
        const { reader } = readerFor("GET /x HTTP/1.1\r\nContent-Length: 3\r\n\r\nabc");

        const request = await parseRequest(reader, fullProxy);

        expect(request?.body).toBeUndefined();
        expect(reader.detach().toString("utf8")).toBe("abc");
    });

    it("leaves the body absent for Content-Length 0", async () => {
        const { reader } = readerFor("POST /x HTTP/1.1\r\nContent-Length: 0\r\n\r\n");

        const request = await parseRequest(reader, fullProxy);

        expect(request?.body).toBeUndefined();
    });

    it("fails when the body is shorter than Content-Length", async () => {
        const { reader } = readerFor("POST /x HTTP/1.1\r\nContent-Length: 10\r\n\r\nshort");

        await expect(parseRequest(reader, fullProxy)).rejects.toThrow("Request body ended before 10 bytes were received");
    });

    it("fails on a non-numeric Content-Length", async () => {
        const { reader } = readerFor("POST /x HTTP/1.1\r\nContent-Length: five\r\n\r\n");

        await expect(parseRequest(reader, fullProxy)).rejects.toBeInstanceOf(ParseError);
    });
});
