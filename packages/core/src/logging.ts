/**
 * @title Logging
 * @description Structured logging built on pino.
 *
 * Logs go to stderr as JSON. Modules ask for a component logger; the root
 * logger is created lazily from the environment unless configured first.
 *
 * @module logging
 */

import pino, { type DestinationStream, type LevelWithSilent, type Logger } from "pino";
import { loadConfig } from "./config.js";

export type { Logger } from "pino";

/**
 * Options for creating a root logger.
 */
export interface LoggerOptions {
	/** Minimum level to write. */
	level: LevelWithSilent;
	/** Custom destination, used by tests to capture output. */
	stream?: DestinationStream;
}

let rootLogger: Logger | null = null;

/**
 * Create a standalone pino logger.
 *
 * @param options - Level and optional destination
 */
export function createLogger(options: LoggerOptions): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: options.level,
		base: undefined,
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => ({ level: label }),
		},
	};

	return pino(pinoOptions, options.stream ?? pino.destination(2));
}

/**
 * Replace the root logger. Component loggers created afterwards use it.
 */
export function configureLogger(options: LoggerOptions): Logger {
	rootLogger = createLogger(options);
	return rootLogger;
}

/**
 * Get the root logger, creating it from the environment on first use.
 */
export function getRootLogger(): Logger {
	if (rootLogger === null) {
		rootLogger = createLogger({ level: loadConfig().logLevel });
	}
	return rootLogger;
}

/**
 * Get a child logger tagged with a component name.
 *
 * @param component - Component name, e.g. "model" or "loader"
 */
export function getComponentLogger(component: string): Logger {
	return getRootLogger().child({ component });
}

/**
 * Drop the root logger so the next call re-reads the environment.
 */
export function resetLogger(): void {
	rootLogger = null;
}
