/**
 * Startup and shutdown sequencing.
 *
 * parse flags → load config → logger → policy → acquire listener → serve.
 * SIGINT / SIGTERM release the listener (and the SSH session behind it);
 * serve then returns and the process exits cleanly. Any failure before or
 * during serving is reported as a single `error: <message>` line.
 */

import { AuthorizationPolicy, formatEndpoint } from "@tunnelsocks/policy";
import { createSocksServer } from "@tunnelsocks/socks";
import { acquireListener, errorMessage, parseSshUrl, type TransportConfig } from "@tunnelsocks/transport";
import { type CliArgs, parseCliArgs, USAGE } from "./args.js";
import { type FileConfig, loadConfig, type ResolvedConfig } from "./config/index.js";
import { createLogger } from "./utils/logger.js";

export interface MainDependencies {
	/** Help text goes here */
	writeOut(text: string): void;
	/** Log lines and the final error line, without newline */
	writeErr(line: string): void;
	/** Consulted for SSH_AUTH_SOCK */
	env: NodeJS.ProcessEnv;
	/** Register a shutdown handler; returns a function that unregisters it */
	onShutdown(handler: () => void): () => void;
	/** Force log colors on or off */
	color?: boolean;
	/** Custom defaults path (for testing) */
	defaultsPath?: string;
}

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export function processDependencies(): MainDependencies {
	return {
		writeOut: (text) => process.stdout.write(text),
		writeErr: (line) => process.stderr.write(`${line}\n`),
		env: process.env,
		onShutdown(handler) {
			for (const signal of SHUTDOWN_SIGNALS) process.on(signal, handler);
			return () => {
				for (const signal of SHUTDOWN_SIGNALS) process.off(signal, handler);
			};
		},
	};
}

/** Flags as a config layer; options that were not given stay out of the merge. */
export function argsToOverrides(args: CliArgs): FileConfig {
	return {
		listen: { host: args.host, port: args.port },
		allowedSourceIps: args.sourceIps,
		allowedDestinationIps: args.destIps,
		remoteListener: args.remoteListener,
		logLevel: args.logLevel,
	};
}

function transportFor(config: ResolvedConfig): TransportConfig {
	if (config.remoteListener === undefined) {
		return { kind: "local", host: config.listen.host, port: config.listen.port };
	}
	return {
		kind: "remote",
		sshUrl: config.remoteListener,
		listenHost: config.listen.host,
		listenPort: config.listen.port,
	};
}

/** What the startup line calls the listening side. */
function listenHostLabel(config: ResolvedConfig): string {
	if (config.remoteListener === undefined) return "localhost";
	const target = parseSshUrl(config.remoteListener);
	return formatEndpoint({ ip: target.host, port: target.port });
}

async function run(args: CliArgs, deps: MainDependencies): Promise<void> {
	const config = loadConfig({
		configPath: args.configPath,
		overrides: argsToOverrides(args),
		defaultsPath: deps.defaultsPath,
	});
	const logger = createLogger({ level: config.logLevel, write: deps.writeErr, color: deps.color });

	const policy = new AuthorizationPolicy(
		{ allowedSourceIps: config.allowedSourceIps, allowedDestinationIps: config.allowedDestinationIps },
		logger,
	);
	for (const line of policy.describe()) logger.info(line);

	const { listener, release } = await acquireListener(transportFor(config), {
		logger,
		env: deps.env,
		ssh: config.ssh,
	});

	const unregister = deps.onShutdown(() => {
		logger.info("shutting down");
		release().catch((error: unknown) => logger.error(`shutdown: ${errorMessage(error)}`));
	});

	try {
		logger.info(`starting socks proxy on: ${listenHostLabel(config)} (proxy addr: ${formatEndpoint(listener.address)})`);
		const socks = createSocksServer({ rules: policy, logger });
		await socks.serve(listener);
		logger.debug("done");
	} finally {
		unregister();
		await release();
	}
}

/**
 * Run the proxy until shutdown. Resolves to the process exit status.
 */
export async function main(argv: readonly string[], deps: MainDependencies = processDependencies()): Promise<number> {
	try {
		const args = parseCliArgs(argv);
		if (args.help) {
			deps.writeOut(USAGE);
			return 0;
		}
		await run(args, deps);
		return 0;
	} catch (error) {
		deps.writeErr(`error: ${errorMessage(error)}`);
		return 1;
	}
}
