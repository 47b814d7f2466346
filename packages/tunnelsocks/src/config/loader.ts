/**
 * Configuration loader - loads and merges YAML configuration.
 *
 * Load order (later overrides earlier):
 * 1. Embedded defaults (packages/tunnelsocks/config/defaults.yaml)
 * 2. The file named by --config, if any
 * 3. Command-line flags
 *
 * Merge behavior: Deep merge with array replacement. The keyboard-interactive
 * challenge table is replaced as a whole, never merged entry by entry.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parseIpLiteral } from "@tunnelsocks/policy";
import { ConfigError, errorMessage } from "@tunnelsocks/transport";
import { parse as parseYaml } from "yaml";
import { type FileConfig, FileConfigSchema, MergedConfigSchema } from "./schema.js";
import type { ResolvedConfig } from "./types.js";

// =============================================================================
// Constants
// =============================================================================

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DEFAULTS_PATH = path.resolve(__dirname, "../../config/defaults.yaml");

/** Dotted paths whose objects replace rather than merge */
const REPLACED_PATHS: ReadonlySet<string> = new Set(["ssh.challengeAnswers"]);

// =============================================================================
// Deep Merge
// =============================================================================

/**
 * Check if value is a plain object (not array, null, etc.).
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. Arrays are replaced, not merged.
 * Later values override earlier values; undefined never overrides.
 */
export function deepMerge(
	base: Record<string, unknown>,
	override: Record<string, unknown>,
	replaced: ReadonlySet<string> = REPLACED_PATHS,
	prefix = "",
): Record<string, unknown> {
	const result: Record<string, unknown> = { ...base };

	for (const [key, overrideValue] of Object.entries(override)) {
		if (overrideValue === undefined) {
			continue;
		}

		const keyPath = prefix ? `${prefix}.${key}` : key;
		const baseValue = base[key];
		if (isPlainObject(baseValue) && isPlainObject(overrideValue) && !replaced.has(keyPath)) {
			result[key] = deepMerge(baseValue, overrideValue, replaced, keyPath);
		} else {
			// Replace value (including arrays)
			result[key] = overrideValue;
		}
	}

	return result;
}

// =============================================================================
// File Loading
// =============================================================================

function describeSchemaErrors(schema: TSchema, value: unknown): string {
	const first = Value.Errors(schema, value).First();
	if (!first) return "invalid configuration";
	const where = first.path === "" ? "/" : first.path;
	return `${where}: ${first.message}`;
}

/**
 * Load, parse and validate a YAML config file. An empty file is an empty config.
 */
export function loadYamlFile(filePath: string): FileConfig {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`could not read config file ${filePath}: ${errorMessage(error)}`, { cause: error });
	}

	let parsed: unknown;
	try {
		parsed = parseYaml(content);
	} catch (error) {
		throw new ConfigError(`failed to parse ${filePath}: ${errorMessage(error)}`, { cause: error });
	}

	if (parsed === null || parsed === undefined) {
		return {};
	}
	if (!Value.Check(FileConfigSchema, parsed)) {
		throw new ConfigError(`invalid config in ${filePath}: ${describeSchemaErrors(FileConfigSchema, parsed)}`);
	}
	return parsed;
}

// =============================================================================
// Resolution
// =============================================================================

function validateIpList(entries: readonly string[], what: string): readonly string[] {
	for (const entry of entries) {
		if (!parseIpLiteral(entry)) {
			throw new ConfigError(`invalid ${what} IP address "${entry}": expected an IPv4 or IPv6 literal`);
		}
	}
	return Object.freeze([...entries]);
}

/**
 * Configuration loader options.
 */
export interface LoadConfigOptions {
	/** YAML file named on the command line */
	configPath?: string;
	/** Values from command-line flags; undefined entries are ignored */
	overrides?: FileConfig;
	/** Custom defaults path (for testing) */
	defaultsPath?: string;
}

/**
 * Load and merge all configuration sources.
 *
 * @throws ConfigError on unreadable files, invalid YAML, schema violations or bad IP literals
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
	let merged: Record<string, unknown> = { ...loadYamlFile(options.defaultsPath ?? DEFAULTS_PATH) };
	if (options.configPath !== undefined) {
		merged = deepMerge(merged, { ...loadYamlFile(options.configPath) });
	}
	if (options.overrides) {
		if (!Value.Check(FileConfigSchema, options.overrides)) {
			throw new ConfigError(`invalid option: ${describeSchemaErrors(FileConfigSchema, options.overrides)}`);
		}
		merged = deepMerge(merged, { ...options.overrides });
	}

	if (!Value.Check(MergedConfigSchema, merged)) {
		throw new ConfigError(`incomplete configuration: ${describeSchemaErrors(MergedConfigSchema, merged)}`);
	}

	const { listen, ssh, remoteListener } = merged;
	return Object.freeze({
		listen: Object.freeze({ host: listen.host, port: listen.port }),
		allowedSourceIps: validateIpList(merged.allowedSourceIps, "source"),
		allowedDestinationIps: validateIpList(merged.allowedDestinationIps, "destination"),
		remoteListener: remoteListener === "" ? undefined : remoteListener,
		logLevel: merged.logLevel,
		ssh: Object.freeze({
			readyTimeout: ssh.readyTimeout,
			keepaliveInterval: ssh.keepaliveInterval,
			challengeAnswers: Object.freeze({ ...ssh.challengeAnswers }),
		}),
	});
}
