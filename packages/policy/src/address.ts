/**
 * IP literal normalization and endpoint formatting.
 *
 * Allow-list matching is string equality, so both sides go through
 * normalizeIp first: IPv4 stays dotted-quad, IPv4-mapped IPv6 collapses
 * to its IPv4 form, other IPv6 is rendered in RFC 5952 canonical form.
 *
 * IPv6 zone IDs are dropped: `fe80::1%eth0` and `fe80::1%eth1` both
 * normalize to `fe80::1` and match the same allow-list entry.
 */

import ipaddr from "ipaddr.js";
import type { Endpoint } from "./types.js";

function stripZone(ip: string): string {
	const zoneIndex = ip.indexOf("%");
	return zoneIndex === -1 ? ip : ip.slice(0, zoneIndex);
}

/** Parse a strict IP literal: four-part decimal IPv4 or IPv6 (zone dropped). */
export function parseIpLiteral(ip: string): ipaddr.IPv4 | ipaddr.IPv6 | undefined {
	const trimmed = ip.trim();
	if (ipaddr.IPv4.isValidFourPartDecimal(trimmed)) return ipaddr.IPv4.parse(trimmed);
	if (ipaddr.IPv6.isValid(trimmed)) return ipaddr.IPv6.parse(stripZone(trimmed));
	return undefined;
}

/**
 * Normalize an IP literal for comparison.
 * Anything that is not an IP literal is returned trimmed and lower-cased.
 */
export function normalizeIp(ip: string): string {
	const address = parseIpLiteral(ip);
	if (!address) return ip.trim().toLowerCase();
	if (address instanceof ipaddr.IPv4) return address.toString();
	if (address.isIPv4MappedAddress()) return address.toIPv4Address().toString();
	return address.toRFC5952String();
}

/** `ip:port`, with IPv6 addresses bracketed. */
export function formatEndpoint(endpoint: Endpoint): string {
	return ipaddr.IPv6.isValid(endpoint.ip) ? `[${endpoint.ip}]:${endpoint.port}` : `${endpoint.ip}:${endpoint.port}`;
}
