/**
 * SSH authentication chain for the remote listener.
 *
 * Methods are tried in order until the server accepts one:
 *   1. agent: only when SSH_AUTH_SOCK names a socket we can connect to
 *   2. keyboard-interactive: answered from a fixed challenge table
 *   3. password: only when the URL carries one
 */

import { connect } from "node:net";
import { type LogSink, silentLogSink } from "@tunnelsocks/policy";
import type { AgentAuthMethod, AnyAuthMethod, KeyboardInteractiveAuthMethod, PasswordAuthMethod } from "ssh2";
import type { ChallengeAnswers } from "./types.js";

// ── Challenge Table ─────────────────────────────────────────────────────────

/**
 * Known keyboard-interactive prompts and the answer each one gets.
 *
 * Covers servers that ask for a one-time code the account does not actually
 * require (an empty answer passes). A lookup table, not an interactive prompt.
 */
export const DEFAULT_CHALLENGE_ANSWERS: ChallengeAnswers = Object.freeze({
	"Verification code: ": "",
});

/** One answer per prompt; prompts missing from the table get "". */
export function answerChallenges(table: ChallengeAnswers, prompts: ReadonlyArray<{ prompt: string }>): string[] {
	return prompts.map(({ prompt }) => (Object.hasOwn(table, prompt) ? (table[prompt] ?? "") : ""));
}

// ── Agent ───────────────────────────────────────────────────────────────────

/** Resolves true when something accepts connections on the agent socket. */
export function probeAgentSocket(path: string | undefined): Promise<boolean> {
	if (!path) return Promise.resolve(false);
	return new Promise((resolve) => {
		const socket = connect({ path });
		socket.once("connect", () => {
			socket.destroy();
			resolve(true);
		});
		socket.once("error", () => {
			socket.destroy();
			resolve(false);
		});
	});
}

// ── Chain ───────────────────────────────────────────────────────────────────

export interface AuthChainOptions {
	username: string;
	password: string | undefined;
	/** Agent socket path, already probed; undefined skips agent auth */
	agentSocket: string | undefined;
	challengeAnswers: ChallengeAnswers;
	logger?: LogSink;
}

export function buildAuthMethods(options: AuthChainOptions): AnyAuthMethod[] {
	const logger = options.logger ?? silentLogSink;
	const { username } = options;
	const methods: AnyAuthMethod[] = [];

	if (options.agentSocket) {
		const agent: AgentAuthMethod = { type: "agent", username, agent: options.agentSocket };
		methods.push(agent);
	}

	const keyboard: KeyboardInteractiveAuthMethod = {
		type: "keyboard-interactive",
		username,
		prompt(_name, _instructions, _lang, prompts, finish) {
			logger.debug("answering keyboard-interactive challenge", {
				prompts: prompts.map((p) => p.prompt),
			});
			finish(answerChallenges(options.challengeAnswers, prompts));
		},
	};
	methods.push(keyboard);

	if (options.password !== undefined) {
		const password: PasswordAuthMethod = { type: "password", username, password: options.password };
		methods.push(password);
	}

	return methods;
}

export function describeAuthMethods(methods: readonly AnyAuthMethod[]): string {
	return methods.map((m) => m.type).join(", ");
}
