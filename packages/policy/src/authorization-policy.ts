/**
 * AuthorizationPolicy: decides whether a SOCKS request may proceed.
 *
 * Two allow-lists are fixed at construction:
 *   - source: addresses of clients allowed to use the proxy
 *   - destination: addresses the proxy may relay to
 *
 * An empty list admits everything. A non-empty list admits an address only
 * on exact equality with one of its entries (after normalization, no subnet
 * matching). CONNECT is the only command this policy ever admits.
 */

import { formatEndpoint, normalizeIp } from "./address.js";
import { silentLogSink } from "./log-sink.js";
import type {
	AllowList,
	ConnectionRequest,
	ConnectionRules,
	Endpoint,
	LogSink,
	OperationKind,
	PolicyConfig,
} from "./types.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

const OPERATION_LABELS: Record<OperationKind, string> = {
	connect: "AllowConnect",
	bind: "AllowBind",
	associate: "AllowAssociate",
};

function freezeList(entries: readonly string[]): AllowList {
	return Object.freeze(entries.map(normalizeIp));
}

function listAdmits(list: AllowList, ip: string): boolean {
	if (list.length === 0) return true;
	const normalized = normalizeIp(ip);
	return list.some((entry) => entry === normalized);
}

// ── Policy ──────────────────────────────────────────────────────────────────

export class AuthorizationPolicy implements ConnectionRules {
	private readonly _sources: AllowList;
	private readonly _destinations: AllowList;
	private readonly _log: LogSink;

	constructor(config: PolicyConfig, log: LogSink = silentLogSink) {
		this._sources = freezeList(config.allowedSourceIps);
		this._destinations = freezeList(config.allowedDestinationIps);
		this._log = log;
	}

	get allowedSourceIps(): AllowList {
		return this._sources;
	}

	get allowedDestinationIps(): AllowList {
		return this._destinations;
	}

	allowConnect(source: Endpoint, destination: Endpoint): boolean {
		const allowed = listAdmits(this._sources, source.ip) && listAdmits(this._destinations, destination.ip);
		this._record("connect", source, destination, allowed);
		return allowed;
	}

	allowBind(source: Endpoint, destination: Endpoint): boolean {
		this._record("bind", source, destination, false);
		return false;
	}

	allowAssociate(source: Endpoint, destination: Endpoint): boolean {
		this._record("associate", source, destination, false);
		return false;
	}

	/** Dispatch on the request's operation kind. */
	allow(request: ConnectionRequest): boolean {
		switch (request.kind) {
			case "connect":
				return this.allowConnect(request.source, request.destination);
			case "bind":
				return this.allowBind(request.source, request.destination);
			case "associate":
				return this.allowAssociate(request.source, request.destination);
		}
	}

	/**
	 * Startup summary of the non-empty lists, one line per entry.
	 */
	describe(): string[] {
		const lines: string[] = [];
		if (this._sources.length > 0) {
			lines.push("Allowed source IPs:");
			for (const ip of this._sources) lines.push(`  - ${ip}`);
		}
		if (this._destinations.length > 0) {
			lines.push("Allowed destination IPs:");
			for (const ip of this._destinations) lines.push(`  - ${ip}`);
		}
		return lines;
	}

	private _record(kind: OperationKind, source: Endpoint, destination: Endpoint, allowed: boolean): void {
		this._log.debug(`${OPERATION_LABELS[kind]}: ${formatEndpoint(source)} --> ${formatEndpoint(destination)}`, {
			allowed,
		});
	}
}
