import { once } from "node:events";
import { connect, type Socket } from "node:net";
import { afterEach, describe, expect, it } from "vitest";
import { type AcquiredListener, acquireListener, BindError, ListenerClosedError } from "../src/index.js";

describe("acquireListener (local)", () => {
	const acquired: AcquiredListener[] = [];
	const clients: Socket[] = [];

	afterEach(async () => {
		for (const client of clients.splice(0)) client.destroy();
		for (const entry of acquired.splice(0)) await entry.release();
	});

	async function bind(port: number): Promise<AcquiredListener> {
		const result = await acquireListener({ kind: "local", host: "127.0.0.1", port });
		acquired.push(result);
		return result;
	}

	it("should bind and report the chosen port", async () => {
		const { listener } = await bind(0);
		expect(listener.address.ip).toBe("127.0.0.1");
		expect(listener.address.port).toBeGreaterThan(0);
	});

	it("should accept a connection with the peer endpoint", async () => {
		const { listener } = await bind(0);
		const client = connect(listener.address.port, "127.0.0.1");
		clients.push(client);
		await once(client, "connect");

		const incoming = await listener.accept();
		expect(incoming.remote.ip).toBe("127.0.0.1");
		expect(incoming.remote.port).toBe(client.localPort);

		client.write("ping");
		const [chunk] = await once(incoming.stream, "data");
		expect(String(chunk)).toBe("ping");
		incoming.stream.destroy();
	});

	it("should fail with BindError when the address is already in use", async () => {
		const { listener } = await bind(0);
		const attempt = acquireListener({ kind: "local", host: "127.0.0.1", port: listener.address.port });

		await expect(attempt).rejects.toBeInstanceOf(BindError);
		await expect(attempt).rejects.toThrow(`could not listen on 127.0.0.1:${listener.address.port}: address already in use`);
	});

	it("should reject accepts after release", async () => {
		const { listener, release } = await bind(0);
		const waiting = expect(listener.accept()).rejects.toBeInstanceOf(ListenerClosedError);
		await release();

		await waiting;
		await expect(listener.accept()).rejects.toMatchObject({ reason: "closed" });
	});
});
