/**
 * Authorization policy types.
 */

// ── Endpoints ───────────────────────────────────────────────────────────────

/** An observed (IP address, port) pair. */
export interface Endpoint {
	readonly ip: string;
	readonly port: number;
}

/** IP literals, no CIDR, no hostnames. Empty means unrestricted. */
export type AllowList = readonly string[];

// ── Requests ────────────────────────────────────────────────────────────────

/** SOCKS command a client asked for */
export type OperationKind = "connect" | "bind" | "associate";

export interface ConnectionRequest {
	readonly source: Endpoint;
	readonly destination: Endpoint;
	readonly kind: OperationKind;
}

// ── Config ──────────────────────────────────────────────────────────────────

export interface PolicyConfig {
	/** Source addresses allowed to use the proxy */
	allowedSourceIps: readonly string[];
	/** Destination addresses the proxy may relay to */
	allowedDestinationIps: readonly string[];
}

// ── Capability ──────────────────────────────────────────────────────────────

/**
 * The gating capability a protocol engine is constructed with.
 * One decision per SOCKS command.
 */
export interface ConnectionRules {
	allowConnect(source: Endpoint, destination: Endpoint): boolean;
	allowBind(source: Endpoint, destination: Endpoint): boolean;
	allowAssociate(source: Endpoint, destination: Endpoint): boolean;
}

// ── Logging ─────────────────────────────────────────────────────────────────

/** Severity-filtered sink shared by every package. Filtering is the sink's job. */
export interface LogSink {
	trace(message: string, data?: Record<string, unknown>): void;
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}
