/**
 * A denied connection attempt.
 *
 * Not a fault: engines report it and carry on. It is an Error so it can be
 * logged and inspected like the rest of the taxonomy, but nothing throws it
 * past a per-connection handler.
 */

import { formatEndpoint } from "./address.js";
import type { ConnectionRequest } from "./types.js";

export class PolicyViolation extends Error {
	readonly code = "POLICY_VIOLATION";
	readonly request: ConnectionRequest;

	constructor(request: ConnectionRequest) {
		super(
			`${request.kind} from ${formatEndpoint(request.source)} to ${formatEndpoint(request.destination)} not allowed by ruleset`,
		);
		this.name = "PolicyViolation";
		this.request = request;
	}
}
