/**
 * @title Configuration
 * @description Runtime configuration read from environment variables.
 *
 * Environment variables:
 * - SCHEMAGRAPH_LOG_LEVEL: pino log level (default: warn)
 * - SCHEMAGRAPH_MODEL_PATH: directory holding model definition files
 *
 * @module config
 */

import type { LevelWithSilent } from "pino";

/** Log levels accepted by SCHEMAGRAPH_LOG_LEVEL. */
export const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

/**
 * Resolved runtime configuration.
 */
export interface SchemaGraphConfig {
	/** Minimum level written by the logger. */
	logLevel: LevelWithSilent;
	/** Default model directory, if configured. */
	modelPath?: string;
}

/**
 * Environment variable names.
 */
export const ENV_KEYS = {
	LOG_LEVEL: "SCHEMAGRAPH_LOG_LEVEL",
	MODEL_PATH: "SCHEMAGRAPH_MODEL_PATH",
} as const;

const DEFAULT_CONFIG: SchemaGraphConfig = {
	logLevel: "warn",
};

function isLogLevel(value: string): value is LevelWithSilent {
	return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse a log level, falling back to the default for unknown values.
 *
 * @param value - Raw environment value
 * @param defaultValue - Level used when the value is missing or invalid
 */
export function parseLogLevel(value: string | undefined, defaultValue: LevelWithSilent = DEFAULT_CONFIG.logLevel): LevelWithSilent {
	if (value === undefined) {
		return defaultValue;
	}
	const normalised = value.trim().toLowerCase();
	return isLogLevel(normalised) ? normalised : defaultValue;
}

/**
 * Load configuration from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Configuration with defaults applied
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchemaGraphConfig {
	const modelPath = env[ENV_KEYS.MODEL_PATH]?.trim();

	return {
		logLevel: parseLogLevel(env[ENV_KEYS.LOG_LEVEL]),
		...(modelPath ? { modelPath } : {}),
	};
}
