/**
 * SOCKS5 relay engine.
 *
 * Driven by a Listener rather than owning a socket server, so the same engine
 * serves a local bind and an SSH remote forward. Every request is put to the
 * ConnectionRules before anything is dialed or relayed.
 */

import { lookup } from "node:dns/promises";
import { connect, type Socket } from "node:net";
import type { Duplex } from "node:stream";
import {
	type ConnectionRules,
	type Endpoint,
	formatEndpoint,
	type LogSink,
	type OperationKind,
	PolicyViolation,
	silentLogSink,
} from "@tunnelsocks/policy";
import {
	errnoCode,
	errorMessage,
	type IncomingConnection,
	type Listener,
	ListenerClosedError,
} from "@tunnelsocks/transport";
import { ChunkReader } from "./chunk-reader.js";
import {
	AUTH_NO_ACCEPTABLE,
	AUTH_NONE,
	buildMethodSelection,
	buildReply,
	readGreeting,
	readRequest,
	REP_COMMAND_NOT_SUPPORTED,
	REP_CONNECTION_REFUSED,
	REP_FAILURE,
	REP_HOST_UNREACHABLE,
	REP_NETWORK_UNREACHABLE,
	REP_NOT_ALLOWED,
	REP_SUCCESS,
	SocksProtocolError,
	type SocksRequest,
} from "./protocol.js";

// ── Types ───────────────────────────────────────────────────────────────────

/** Turns a domain name into an IP literal. */
export type HostResolver = (host: string) => Promise<string>;

export interface SocksServerOptions {
	rules: ConnectionRules;
	logger?: LogSink;
	/** Defaults to the system resolver */
	resolve?: HostResolver;
}

export interface SocksServer {
	/**
	 * Accept and handle connections until the listener closes.
	 * Resolves when the listener is closed, rejects when the listener is lost.
	 */
	serve(listener: Listener): Promise<void>;
	/** Close the listener being served. In-flight relays keep running. */
	close(): Promise<void>;
}

// ── Helpers ─────────────────────────────────────────────────────────────────

const systemResolver: HostResolver = async (host) => (await lookup(host)).address;

function decide(rules: ConnectionRules, kind: OperationKind, source: Endpoint, destination: Endpoint): boolean {
	switch (kind) {
		case "connect":
			return rules.allowConnect(source, destination);
		case "bind":
			return rules.allowBind(source, destination);
		case "associate":
			return rules.allowAssociate(source, destination);
	}
}

function replyForConnectError(error: unknown): number {
	switch (errnoCode(error)) {
		case "ECONNREFUSED":
			return REP_CONNECTION_REFUSED;
		case "ENETUNREACH":
			return REP_NETWORK_UNREACHABLE;
		case "EHOSTUNREACH":
		case "ENOTFOUND":
			return REP_HOST_UNREACHABLE;
		default:
			return REP_FAILURE;
	}
}

function dial(destination: Endpoint): Promise<Socket> {
	return new Promise((resolve, reject) => {
		const socket = connect({ host: destination.ip, port: destination.port });
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
}

/** Pipe both ways; trace the byte counts once both sides are closed. */
function relay(client: Duplex, target: Socket, label: string, logger: LogSink): void {
	let upstream = 0;
	let downstream = 0;
	let open = 2;
	const onClosed = () => {
		open--;
		if (open === 0) {
			logger.trace(`relay ${label} closed`, { bytesToTarget: upstream, bytesToClient: downstream });
		}
	};

	client.on("data", (chunk: Buffer) => {
		upstream += chunk.length;
	});
	target.on("data", (chunk: Buffer) => {
		downstream += chunk.length;
	});
	client.once("close", onClosed);
	target.once("close", onClosed);

	target.on("error", (error) => {
		logger.debug(`relay ${label}: target error: ${error.message}`);
		client.destroy();
	});
	client.on("error", () => target.destroy());

	client.pipe(target);
	target.pipe(client);
}

// ── Server ──────────────────────────────────────────────────────────────────

export function createSocksServer(options: SocksServerOptions): SocksServer {
	const { rules } = options;
	const logger = options.logger ?? silentLogSink;
	const resolve = options.resolve ?? systemResolver;
	let current: Listener | undefined;

	async function resolveDestination(request: SocksRequest): Promise<Endpoint> {
		if (request.addressType !== "domain") {
			return { ip: request.host, port: request.port };
		}
		return { ip: await resolve(request.host), port: request.port };
	}

	async function handleConnection(incoming: IncomingConnection): Promise<void> {
		const { stream: client, remote: source } = incoming;
		const peer = formatEndpoint(source);
		client.on("error", (error) => logger.debug(`client ${peer}: ${error.message}`));
		logger.trace(`accepted connection from ${peer}`);

		const reader = new ChunkReader(client);
		let request: SocksRequest;
		try {
			const methods = await readGreeting(reader);
			if (!methods.includes(AUTH_NONE)) {
				logger.debug(`client ${peer} offered no acceptable auth method`, { methods });
				client.end(buildMethodSelection(AUTH_NO_ACCEPTABLE));
				return;
			}
			client.write(buildMethodSelection(AUTH_NONE));
			request = await readRequest(reader);
		} catch (error) {
			logger.debug(`socks handshake with ${peer} failed: ${errorMessage(error)}`);
			if (error instanceof SocksProtocolError && error.reply !== undefined) {
				client.end(buildReply(error.reply));
			} else {
				client.destroy();
			}
			return;
		}

		let destination: Endpoint;
		try {
			destination = await resolveDestination(request);
		} catch (error) {
			logger.info(`could not resolve ${request.host} for ${peer}: ${errorMessage(error)}`);
			client.end(buildReply(REP_HOST_UNREACHABLE));
			return;
		}

		if (!decide(rules, request.command, source, destination)) {
			const violation = new PolicyViolation({ source, destination, kind: request.command });
			logger.info(violation.message);
			client.end(buildReply(REP_NOT_ALLOWED));
			return;
		}
		if (request.command !== "connect") {
			logger.debug(`${request.command} from ${peer} allowed but not supported`);
			client.end(buildReply(REP_COMMAND_NOT_SUPPORTED));
			return;
		}

		const label = `${peer} -> ${formatEndpoint(destination)}`;
		let target: Socket;
		try {
			target = await dial(destination);
		} catch (error) {
			logger.info(`connect ${label} failed: ${errorMessage(error)}`);
			client.end(buildReply(replyForConnectError(error)));
			return;
		}

		const bound: Endpoint = { ip: target.localAddress ?? "0.0.0.0", port: target.localPort ?? 0 };
		client.write(buildReply(REP_SUCCESS, bound));
		const early = reader.detach();
		if (early.length > 0) target.write(early);
		relay(client, target, label, logger);
	}

	return {
		async serve(listener: Listener): Promise<void> {
			if (current) throw new Error("socks server is already serving a listener");
			current = listener;
			logger.debug(`serving socks on ${formatEndpoint(listener.address)}`);
			try {
				for (;;) {
					let incoming: IncomingConnection;
					try {
						incoming = await listener.accept();
					} catch (error) {
						if (error instanceof ListenerClosedError && error.reason === "closed") return;
						throw error;
					}
					handleConnection(incoming).catch((error: unknown) => {
						logger.error(`connection from ${formatEndpoint(incoming.remote)} failed: ${errorMessage(error)}`);
						incoming.stream.destroy();
					});
				}
			} finally {
				current = undefined;
			}
		},

		async close(): Promise<void> {
			await current?.close();
		},
	};
}
