/**
 * Resolved configuration, after defaults, config file and flags are merged.
 */

import type { ChallengeAnswers } from "@tunnelsocks/transport";
import type { LogLevel } from "../utils/logger.js";

export interface ListenConfig {
	/** Empty means all interfaces (local) or the server's default (remote) */
	readonly host: string;
	readonly port: number;
}

export interface SshConfig {
	/** Milliseconds allowed for handshake and authentication */
	readonly readyTimeout: number;
	/** Milliseconds between keepalives, 0 disables */
	readonly keepaliveInterval: number;
	/** Limited-challenge table for keyboard-interactive authentication */
	readonly challengeAnswers: ChallengeAnswers;
}

export interface ResolvedConfig {
	readonly listen: ListenConfig;
	readonly allowedSourceIps: readonly string[];
	readonly allowedDestinationIps: readonly string[];
	/** ssh:// URL; undefined binds locally */
	readonly remoteListener: string | undefined;
	readonly logLevel: LogLevel;
	readonly ssh: SshConfig;
}
