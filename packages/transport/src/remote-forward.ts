/**
 * RemoteForwardStrategy: listen on a remote host through an SSH session.
 *
 * Sequence:
 *   1. Parse the ssh:// URL (ConfigError, no I/O yet)
 *   2. Build the auth chain (agent, keyboard-interactive, password)
 *   3. Dial and authenticate (DialError / AuthError)
 *   4. Request tcpip-forward for listenHost:listenPort (ForwardError)
 *   5. Hand back a Listener fed by forwarded channels, and a release that
 *      tears down forward and session together
 *
 * There is no reconnection. If the session drops, the listener fails and
 * every accept() rejects from then on.
 */

import { type Endpoint, formatEndpoint, type LogSink, silentLogSink } from "@tunnelsocks/policy";
import { type AnyAuthMethod, Client, type ConnectConfig } from "ssh2";
import { ConnectionQueue } from "./connection-queue.js";
import {
	AuthError,
	DialError,
	errnoCode,
	errorMessage,
	ForwardError,
	ListenerClosedError,
	type TunnelsocksError,
} from "./errors.js";
import { buildAuthMethods, DEFAULT_CHALLENGE_ANSWERS, describeAuthMethods, probeAgentSocket } from "./ssh-auth.js";
import { parseSshUrl, type SshTarget } from "./ssh-url.js";
import type { AcquiredListener, AcquireOptions, Listener, RemoteTransportConfig } from "./types.js";

// ── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_READY_TIMEOUT_MS = 20_000;
const UNFORWARD_GRACE_MS = 2_000;

// ── Helpers ─────────────────────────────────────────────────────────────────

function errorLevel(error: unknown): string | undefined {
	if (error instanceof Error && "level" in error && typeof error.level === "string") {
		return error.level;
	}
	return undefined;
}

function classifyConnectError(error: unknown, target: SshTarget): TunnelsocksError {
	const where = `${target.username}@${target.host}:${target.port}`;
	if (errorLevel(error) === "client-authentication") {
		return new AuthError(`ssh authentication to ${where} failed: ${errorMessage(error)}`, { cause: error });
	}
	const code = errnoCode(error);
	const detail = code ? `${code} ${errorMessage(error)}` : errorMessage(error);
	return new DialError(`error dialing remote host ${where}: ${detail}`, { cause: error });
}

/** Resolve on "ready"; reject on the first error or an early close. */
function connectClient(client: Client, config: ConnectConfig): Promise<void> {
	return new Promise((resolve, reject) => {
		let settled = false;
		const settleResolve = () => {
			if (settled) return;
			settled = true;
			cleanup();
			resolve();
		};
		const settleReject = (error: unknown) => {
			if (settled) return;
			settled = true;
			cleanup();
			reject(error);
		};
		const onClose = () => settleReject(new Error("connection closed before the session was ready"));
		const cleanup = () => {
			client.off("ready", settleResolve);
			client.off("error", settleReject);
			client.off("close", onClose);
		};

		client.once("ready", settleResolve);
		client.once("error", settleReject);
		client.once("close", onClose);
		client.connect(config);
	});
}

function requestForward(client: Client, host: string, port: number): Promise<number> {
	return new Promise((resolve, reject) => {
		client.forwardIn(host, port, (error, boundPort) => {
			if (error) {
				reject(error);
				return;
			}
			resolve(boundPort || port);
		});
	});
}

// ── Strategy ────────────────────────────────────────────────────────────────

export async function forwardRemote(config: RemoteTransportConfig, options: AcquireOptions = {}): Promise<AcquiredListener> {
	const logger: LogSink = options.logger ?? silentLogSink;
	const env = options.env ?? process.env;
	const ssh = options.ssh ?? {};

	const target = parseSshUrl(config.sshUrl);
	if (target.ignored.length > 0) {
		logger.warn("path, query, and fragment have no meaning in remote listener URL", { ignored: target.ignored });
	}

	const agentPath = env.SSH_AUTH_SOCK;
	const agentReachable = await probeAgentSocket(agentPath);
	if (!agentReachable) {
		logger.debug("ssh agent not reachable, skipping agent authentication", { SSH_AUTH_SOCK: agentPath ?? null });
	}

	const methods: AnyAuthMethod[] = buildAuthMethods({
		username: target.username,
		password: target.password,
		agentSocket: agentReachable ? agentPath : undefined,
		challengeAnswers: ssh.challengeAnswers ?? DEFAULT_CHALLENGE_ANSWERS,
		logger,
	});

	const client = new Client();
	const queue = new ConnectionQueue();
	const where = `${target.username}@${target.host}:${target.port}`;

	logger.info(`dialing ssh server ${where}`);
	logger.debug(`ssh auth methods: ${describeAuthMethods(methods)}`);

	// ssh2 can report a torn-down socket after a failed connect has settled
	const onConnectError = (error: Error) => logger.debug(`ssh client error during connect: ${error.message}`);
	client.on("error", onConnectError);
	try {
		await connectClient(client, {
			host: target.host,
			port: target.port,
			username: target.username,
			authHandler: methods,
			readyTimeout: ssh.readyTimeout ?? DEFAULT_READY_TIMEOUT_MS,
			keepaliveInterval: ssh.keepaliveInterval ?? 0,
		});
	} catch (error) {
		client.end();
		throw classifyConnectError(error, target);
	}
	client.off("error", onConnectError);
	logger.info(`ssh session established with ${where}`);

	let released = false;
	let sessionClosed = false;

	client.on("error", (error) => {
		logger.error(`ssh session error: ${error.message}`);
		queue.fail(new ListenerClosedError("lost", `ssh session failed: ${error.message}`, { cause: error }));
	});
	client.on("close", () => {
		sessionClosed = true;
		if (released) {
			logger.info(`ssh session with ${where} closed`);
			return;
		}
		logger.warn(`ssh session with ${where} lost`);
		queue.fail(new ListenerClosedError("lost", "ssh session closed by remote host"));
	});
	client.on("tcp connection", (details, accept) => {
		const remote: Endpoint = { ip: details.srcIP, port: details.srcPort };
		logger.trace(`forwarded connection from ${formatEndpoint(remote)}`);
		queue.push({ stream: accept(), remote });
	});

	let boundPort: number;
	try {
		boundPort = await requestForward(client, config.listenHost, config.listenPort);
	} catch (error) {
		released = true;
		client.end();
		throw new ForwardError(
			`error listening on remote host: ${config.listenHost}:${config.listenPort}: ${errorMessage(error)}`,
			{ cause: error },
		);
	}

	const address: Endpoint = { ip: config.listenHost, port: boundPort };
	logger.info(`remote forward granted on ${where} for ${config.listenHost}:${boundPort}`);

	let releasing: Promise<void> | undefined;
	const release = (): Promise<void> => {
		if (releasing) return releasing;
		released = true;
		queue.fail(new ListenerClosedError("closed", "tunnel released"));
		releasing = new Promise<void>((resolve) => {
			if (sessionClosed) {
				resolve();
				return;
			}
			client.once("close", () => resolve());
			const grace = setTimeout(() => client.end(), UNFORWARD_GRACE_MS);
			grace.unref();
			client.unforwardIn(config.listenHost, boundPort, (error) => {
				if (error) logger.debug(`cancel remote forward: ${error.message}`);
				clearTimeout(grace);
				client.end();
			});
		});
		return releasing;
	};

	const listener: Listener = {
		address,
		accept: () => queue.next(),
		close: release,
	};

	return { listener, release };
}
