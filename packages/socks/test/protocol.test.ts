import { once } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { buildReply, ChunkReader, readGreeting, readRequest, REP_SUCCESS, SocksProtocolError } from "../src/index.js";

function readerFor(...chunks: number[][]): ChunkReader {
	const stream = new PassThrough();
	const reader = new ChunkReader(stream);
	for (const chunk of chunks) stream.write(Buffer.from(chunk));
	return reader;
}

// ============================================================================
// ChunkReader
// ============================================================================

describe("ChunkReader", () => {
	it("should join reads across chunks", async () => {
		const reader = readerFor([1, 2], [3], [4, 5]);
		expect([...(await reader.read(4))]).toEqual([1, 2, 3, 4]);
		expect([...(await reader.read(1))]).toEqual([5]);
	});

	it("should hand back unread bytes on detach", async () => {
		const reader = readerFor([1, 2, 3]);
		await reader.read(1);
		expect([...reader.detach()]).toEqual([2, 3]);
	});

	it("should pause the stream once too many bytes arrive ahead of a read", async () => {
		const stream = new PassThrough();
		const reader = new ChunkReader(stream, 4);
		const first = once(stream, "data");
		stream.write(Buffer.from([1, 2]));
		await first;
		expect(stream.isPaused()).toBe(false);

		const second = once(stream, "data");
		stream.write(Buffer.from([3, 4, 5]));
		await second;
		expect(stream.isPaused()).toBe(true);

		expect([...(await reader.read(5))]).toEqual([1, 2, 3, 4, 5]);
		const reading = reader.read(1);
		expect(stream.isPaused()).toBe(false);
		stream.write(Buffer.from([6]));
		expect([...(await reading)]).toEqual([6]);
	});

	it("should reject a pending read when the stream ends short", async () => {
		const stream = new PassThrough();
		const reader = new ChunkReader(stream);
		const reading = reader.read(4);
		stream.end(Buffer.from([1]));
		await expect(reading).rejects.toThrow("connection closed during handshake");
	});
});

// ============================================================================
// Requests
// ============================================================================

describe("readGreeting", () => {
	it("should return the offered methods", async () => {
		expect(await readGreeting(readerFor([0x05, 0x02, 0x00, 0x02]))).toEqual([0x00, 0x02]);
	});

	it("should reject other protocol versions without a reply", async () => {
		const attempt = readGreeting(readerFor([0x04, 0x01, 0x00]));
		await expect(attempt).rejects.toBeInstanceOf(SocksProtocolError);
		await expect(attempt).rejects.toMatchObject({ reply: undefined });
	});
});

describe("readRequest", () => {
	it("should parse an IPv4 CONNECT", async () => {
		const request = await readRequest(readerFor([0x05, 0x01, 0x00, 0x01, 192, 0, 2, 1, 0x01, 0xbb]));
		expect(request).toEqual({ command: "connect", addressType: "ipv4", host: "192.0.2.1", port: 443 });
	});

	it("should parse a domain name", async () => {
		const name = [...Buffer.from("example.test", "ascii")];
		const request = await readRequest(readerFor([0x05, 0x01, 0x00, 0x03, name.length, ...name, 0x00, 0x50]));
		expect(request).toEqual({ command: "connect", addressType: "domain", host: "example.test", port: 80 });
	});

	it("should parse and normalize an IPv6 address", async () => {
		const address = [0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x01];
		const request = await readRequest(readerFor([0x05, 0x02, 0x00, 0x04, ...address, 0x1f, 0x90]));
		expect(request).toEqual({ command: "bind", addressType: "ipv6", host: "2001:db8::1", port: 8080 });
	});

	it("should collapse an IPv4-mapped IPv6 address", async () => {
		const address = [0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0xff, 0xff, 10, 0, 0, 5];
		const request = await readRequest(readerFor([0x05, 0x03, 0x00, 0x04, ...address, 0x00, 0x35]));
		expect(request).toEqual({ command: "associate", addressType: "ipv6", host: "10.0.0.5", port: 53 });
	});

	it("should reject unknown commands with command not supported", async () => {
		await expect(readRequest(readerFor([0x05, 0x09, 0x00, 0x01]))).rejects.toMatchObject({ reply: 0x07 });
	});
});

// ============================================================================
// Replies
// ============================================================================

describe("buildReply", () => {
	it("should default to the unspecified IPv4 address", () => {
		expect([...buildReply(0x02)]).toEqual([0x05, 0x02, 0x00, 0x01, 0, 0, 0, 0, 0, 0]);
	});

	it("should encode an IPv4 bound address", () => {
		expect([...buildReply(REP_SUCCESS, { ip: "10.0.0.5", port: 1080 })]).toEqual([
			0x05, 0x00, 0x00, 0x01, 10, 0, 0, 5, 0x04, 0x38,
		]);
	});

	it("should encode an IPv6 bound address", () => {
		const reply = buildReply(REP_SUCCESS, { ip: "2001:db8::1", port: 80 });
		expect(reply.length).toBe(22);
		expect([...reply.subarray(0, 4)]).toEqual([0x05, 0x00, 0x00, 0x04]);
		expect([...reply.subarray(4, 8)]).toEqual([0x20, 0x01, 0x0d, 0xb8]);
		expect([...reply.subarray(18)]).toEqual([0x00, 0x01, 0x00, 0x50]);
	});

	it("should encode an IPv4-mapped bound address as IPv4", () => {
		expect([...buildReply(REP_SUCCESS, { ip: "::ffff:127.0.0.1", port: 1 }).subarray(3)]).toEqual([
			0x01, 127, 0, 0, 1, 0x00, 0x01,
		]);
	});
});
