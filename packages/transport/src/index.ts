export { acquireListener } from "./acquire.js";
export { ConnectionQueue } from "./connection-queue.js";
export {
	AuthError,
	BindError,
	ConfigError,
	DialError,
	errnoCode,
	errorMessage,
	ForwardError,
	ListenerClosedError,
	type TransportErrorCode,
	TunnelsocksError,
} from "./errors.js";
export { bindLocal } from "./local-bind.js";
export { forwardRemote } from "./remote-forward.js";
export { answerChallenges, buildAuthMethods, DEFAULT_CHALLENGE_ANSWERS, probeAgentSocket } from "./ssh-auth.js";
export { DEFAULT_SSH_PORT, parseSshUrl, redactSshUrl, type SshTarget } from "./ssh-url.js";
export type {
	AcquiredListener,
	AcquireOptions,
	ChallengeAnswers,
	IncomingConnection,
	Listener,
	LocalTransportConfig,
	RemoteTransportConfig,
	SshOptions,
	TransportConfig,
} from "./types.js";
