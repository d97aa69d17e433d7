/**
 * @schemagraph/core - Schema hierarchy resolution and entity validation.
 *
 * This library provides functionality for:
 * - Schema definitions (SchemaSpec, PropertySpec) and their normalisation
 * - Hierarchy resolution with multi-parent property inheritance
 * - Reverse property synthesis for entity-valued properties
 * - Matchable schema sets and edge views
 * - Aggregated validation of property values
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	SchemaGraphError,
	InvalidModelError,
	InvalidDataError,
	isSchemaGraphError,
	getErrorMessage,
	wrapError,
	type SchemaGraphErrorOptions,
} from "./errors.js";

// Property type exports
export * from "./datatypes/index.js";

// Model exports
export * from "./model/index.js";

// Text lookup
export { identityTranslator, translateOptional, type Translator } from "./text.js";

// Configuration and logging
export { loadConfig, parseLogLevel, LOG_LEVELS, ENV_KEYS, type SchemaGraphConfig } from "./config.js";
export {
	createLogger,
	configureLogger,
	getRootLogger,
	getComponentLogger,
	resetLogger,
	type Logger,
	type LoggerOptions,
} from "./logging.js";
