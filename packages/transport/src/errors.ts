/**
 * Transport error taxonomy.
 *
 * Every acquisition failure is fatal at startup, so each class only has to
 * say what went wrong and keep the underlying error as `cause`.
 */

export type TransportErrorCode =
	| "CONFIG_ERROR"
	| "BIND_ERROR"
	| "AUTH_ERROR"
	| "DIAL_ERROR"
	| "FORWARD_ERROR"
	| "LISTENER_CLOSED";

export abstract class TunnelsocksError extends Error {
	abstract readonly code: TransportErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Bad command-line or configuration input. */
export class ConfigError extends TunnelsocksError {
	readonly code = "CONFIG_ERROR";
}

/** Local listen failed (address in use, unresolvable host, no permission). */
export class BindError extends TunnelsocksError {
	readonly code = "BIND_ERROR";
}

/** No SSH authentication method was accepted. */
export class AuthError extends TunnelsocksError {
	readonly code = "AUTH_ERROR";
}

/** Network-level failure reaching the SSH server. */
export class DialError extends TunnelsocksError {
	readonly code = "DIAL_ERROR";
}

/** The SSH server refused the remote-forward request. */
export class ForwardError extends TunnelsocksError {
	readonly code = "FORWARD_ERROR";
}

/**
 * accept() on a listener that can no longer produce connections.
 * "closed" means the owner released it; "lost" means it failed underneath.
 */
export class ListenerClosedError extends TunnelsocksError {
	readonly code = "LISTENER_CLOSED";
	readonly reason: "closed" | "lost";

	constructor(reason: "closed" | "lost", message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.reason = reason;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** `code` of a Node system error, if the value carries one. */
export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
