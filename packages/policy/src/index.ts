export { formatEndpoint, normalizeIp, parseIpLiteral } from "./address.js";
export { AuthorizationPolicy } from "./authorization-policy.js";
export { silentLogSink } from "./log-sink.js";
export type {
	AllowList,
	ConnectionRequest,
	ConnectionRules,
	Endpoint,
	LogSink,
	OperationKind,
	PolicyConfig,
} from "./types.js";
export { PolicyViolation } from "./violation.js";
