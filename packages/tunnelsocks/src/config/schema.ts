/**
 * TypeBox schemas for the YAML configuration.
 *
 * FileConfigSchema is what a single file may contain (everything optional).
 * MergedConfigSchema is what must hold once defaults, file and flags are merged.
 */

import { type Static, Type } from "@sinclair/typebox";

// =============================================================================
// Shared pieces
// =============================================================================

const Port = Type.Integer({ minimum: 0, maximum: 65535 });

const LogLevelSchema = Type.Union([
	Type.Literal("trace"),
	Type.Literal("debug"),
	Type.Literal("info"),
	Type.Literal("warning"),
	Type.Literal("error"),
]);

const IpList = Type.Array(Type.String());

/** Prompt text → canned answer */
const ChallengeAnswersSchema = Type.Record(Type.String(), Type.String());

// =============================================================================
// File
// =============================================================================

export const FileConfigSchema = Type.Object(
	{
		listen: Type.Optional(
			Type.Object(
				{
					host: Type.Optional(Type.String()),
					port: Type.Optional(Port),
				},
				{ additionalProperties: false },
			),
		),
		allowedSourceIps: Type.Optional(IpList),
		allowedDestinationIps: Type.Optional(IpList),
		remoteListener: Type.Optional(Type.String()),
		logLevel: Type.Optional(LogLevelSchema),
		ssh: Type.Optional(
			Type.Object(
				{
					readyTimeout: Type.Optional(Type.Integer({ minimum: 1 })),
					keepaliveInterval: Type.Optional(Type.Integer({ minimum: 0 })),
					challengeAnswers: Type.Optional(ChallengeAnswersSchema),
				},
				{ additionalProperties: false },
			),
		),
	},
	{ additionalProperties: false },
);

export type FileConfig = Static<typeof FileConfigSchema>;

// =============================================================================
// Merged
// =============================================================================

export const MergedConfigSchema = Type.Object({
	listen: Type.Object({ host: Type.String(), port: Port }),
	allowedSourceIps: IpList,
	allowedDestinationIps: IpList,
	remoteListener: Type.Optional(Type.String()),
	logLevel: LogLevelSchema,
	ssh: Type.Object({
		readyTimeout: Type.Integer({ minimum: 1 }),
		keepaliveInterval: Type.Integer({ minimum: 0 }),
		challengeAnswers: ChallengeAnswersSchema,
	}),
});

export type MergedConfig = Static<typeof MergedConfigSchema>;
