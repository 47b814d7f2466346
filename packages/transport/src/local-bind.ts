/**
 * LocalBindStrategy: a plain TCP listener on a local interface.
 */

import { createServer, type Server } from "node:net";
import { formatEndpoint, type LogSink, silentLogSink } from "@tunnelsocks/policy";
import { ConnectionQueue } from "./connection-queue.js";
import { BindError, errnoCode, errorMessage, ListenerClosedError } from "./errors.js";
import type { AcquiredListener, IncomingConnection, Listener, LocalTransportConfig } from "./types.js";

function describeListenError(error: unknown): string {
	switch (errnoCode(error)) {
		case "EADDRINUSE":
			return "address already in use";
		case "EACCES":
			return "permission denied";
		case "EADDRNOTAVAIL":
			return "address not available";
		case "ENOTFOUND":
		case "EAI_AGAIN":
			return "host could not be resolved";
		default:
			return errorMessage(error);
	}
}

function listen(server: Server, host: string, port: number): Promise<void> {
	return new Promise((resolve, reject) => {
		const onError = (error: Error) => {
			reject(error);
		};
		server.once("error", onError);
		server.listen({ port, host: host || undefined }, () => {
			server.off("error", onError);
			resolve();
		});
	});
}

export async function bindLocal(config: LocalTransportConfig, logger: LogSink = silentLogSink): Promise<AcquiredListener> {
	const requested = `${config.host}:${config.port}`;
	const server = createServer();
	const queue = new ConnectionQueue();

	try {
		await listen(server, config.host, config.port);
	} catch (error) {
		const reason = describeListenError(error);
		throw new BindError(`could not listen on ${requested}: ${reason}`, { cause: error });
	}

	const bound = server.address();
	const address =
		bound !== null && typeof bound === "object"
			? { ip: bound.address, port: bound.port }
			: { ip: config.host, port: config.port };

	server.on("connection", (socket) => {
		const { remoteAddress, remotePort } = socket;
		if (remoteAddress === undefined || remotePort === undefined) {
			// Peer already gone
			socket.destroy();
			return;
		}
		const incoming: IncomingConnection = { stream: socket, remote: { ip: remoteAddress, port: remotePort } };
		queue.push(incoming);
	});
	server.on("error", (error) => {
		logger.error(`listener on ${formatEndpoint(address)} failed: ${error.message}`);
		queue.fail(new ListenerClosedError("lost", `listener failed: ${error.message}`, { cause: error }));
	});
	server.on("close", () => {
		queue.fail(new ListenerClosedError("closed", "listener closed"));
	});

	// Stops accepting at once; connections already handed out keep running.
	let closed = false;
	const close = async (): Promise<void> => {
		if (closed) return;
		closed = true;
		queue.fail(new ListenerClosedError("closed", "listener closed"));
		server.close((error) => {
			if (error && errnoCode(error) !== "ERR_SERVER_NOT_RUNNING") {
				logger.warn(`closing listener on ${formatEndpoint(address)}: ${error.message}`);
			}
		});
	};

	const listener: Listener = {
		address,
		accept: () => queue.next(),
		close,
	};

	logger.debug(`bound local listener on ${formatEndpoint(address)}`);
	return { listener, release: close };
}
