/**
 * SOCKS5 wire format (RFC 1928), the subset this server speaks:
 * no-auth method negotiation, CONNECT / BIND / UDP ASSOCIATE requests
 * with IPv4, domain and IPv6 addresses, and replies.
 */

import { type Endpoint, normalizeIp, type OperationKind, parseIpLiteral } from "@tunnelsocks/policy";
import type { ChunkReader } from "./chunk-reader.js";

// SOCKS5 constants
export const SOCKS_VERSION = 0x05;
export const AUTH_NONE = 0x00;
export const AUTH_NO_ACCEPTABLE = 0xff;
const CMD_CONNECT = 0x01;
const CMD_BIND = 0x02;
const CMD_UDP_ASSOCIATE = 0x03;
const ATYP_IPV4 = 0x01;
const ATYP_DOMAIN = 0x03;
const ATYP_IPV6 = 0x04;
export const REP_SUCCESS = 0x00;
export const REP_FAILURE = 0x01;
export const REP_NOT_ALLOWED = 0x02;
export const REP_NETWORK_UNREACHABLE = 0x03;
export const REP_HOST_UNREACHABLE = 0x04;
export const REP_CONNECTION_REFUSED = 0x05;
export const REP_COMMAND_NOT_SUPPORTED = 0x07;
export const REP_ADDR_TYPE_NOT_SUPPORTED = 0x08;

const COMMANDS: Record<number, OperationKind> = {
	[CMD_CONNECT]: "connect",
	[CMD_BIND]: "bind",
	[CMD_UDP_ASSOCIATE]: "associate",
};

// ── Types ───────────────────────────────────────────────────────────────────

export type AddressType = "ipv4" | "domain" | "ipv6";

export interface SocksRequest {
	command: OperationKind;
	addressType: AddressType;
	/** IP literal (normalized) or domain name, as sent by the client */
	host: string;
	port: number;
}

/** Malformed or unsupported client input. `reply` is sent before closing, when set. */
export class SocksProtocolError extends Error {
	readonly reply: number | undefined;

	constructor(message: string, reply?: number) {
		super(message);
		this.name = "SocksProtocolError";
		this.reply = reply;
	}
}

// ── Reading ─────────────────────────────────────────────────────────────────

/** Greeting: VER NMETHODS METHODS... Returns the offered methods. */
export async function readGreeting(reader: ChunkReader): Promise<number[]> {
	const header = await reader.read(2);
	if (header[0] !== SOCKS_VERSION) {
		throw new SocksProtocolError(`unsupported SOCKS version ${header[0]}`);
	}
	const methods = await reader.read(header[1] ?? 0);
	return [...methods];
}

/** Request: VER CMD RSV ATYP DST.ADDR DST.PORT */
export async function readRequest(reader: ChunkReader): Promise<SocksRequest> {
	const header = await reader.read(4);
	if (header[0] !== SOCKS_VERSION) {
		throw new SocksProtocolError(`unsupported SOCKS version ${header[0]}`, REP_FAILURE);
	}
	const command = COMMANDS[header[1] ?? 0];
	if (!command) {
		throw new SocksProtocolError(`unsupported command ${header[1]}`, REP_COMMAND_NOT_SUPPORTED);
	}

	let addressType: AddressType;
	let host: string;
	switch (header[3]) {
		case ATYP_IPV4: {
			addressType = "ipv4";
			host = [...(await reader.read(4))].join(".");
			break;
		}
		case ATYP_DOMAIN: {
			addressType = "domain";
			const [length = 0] = await reader.read(1);
			host = (await reader.read(length)).toString("ascii");
			if (host === "") throw new SocksProtocolError("empty domain name", REP_HOST_UNREACHABLE);
			break;
		}
		case ATYP_IPV6: {
			addressType = "ipv6";
			const raw = await reader.read(16);
			const groups: string[] = [];
			for (let i = 0; i < 8; i++) groups.push(raw.readUInt16BE(i * 2).toString(16));
			host = normalizeIp(groups.join(":"));
			break;
		}
		default:
			throw new SocksProtocolError(`unsupported address type ${header[3]}`, REP_ADDR_TYPE_NOT_SUPPORTED);
	}

	const port = (await reader.read(2)).readUInt16BE(0);
	return { command, addressType, host, port };
}

// ── Writing ─────────────────────────────────────────────────────────────────

export function buildMethodSelection(method: number): Buffer {
	return Buffer.from([SOCKS_VERSION, method]);
}

/** VER REP RSV ATYP BND.ADDR BND.PORT; the unspecified IPv4 address when no bound endpoint is known. */
export function buildReply(rep: number, bound?: Endpoint): Buffer {
	const port = bound?.port ?? 0;
	const address = parseIpLiteral(bound ? normalizeIp(bound.ip) : "0.0.0.0");
	const header = [SOCKS_VERSION, rep, 0x00];
	const portBytes = [(port >> 8) & 0xff, port & 0xff];

	const bytes = address?.toByteArray() ?? [0, 0, 0, 0];
	const atyp = bytes.length === 16 ? ATYP_IPV6 : ATYP_IPV4;
	return Buffer.from([...header, atyp, ...bytes, ...portBytes]);
}
