/**
 * @title Errors
 * @description Error types for @schemagraph/core.
 *
 * Configuration errors abort loading a model; data errors are raised per call
 * when user-supplied values do not fit a schema.
 *
 * @module errors
 */

/**
 * Options for constructing a SchemaGraphError.
 */
export interface SchemaGraphErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all schema model errors.
 */
export class SchemaGraphError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: SchemaGraphErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "SchemaGraphError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * A schema definition is broken: an unresolvable parent, a missing property
 * reference, a cycle in `extends` or a malformed definition.
 */
export class InvalidModelError extends SchemaGraphError {
	/** Dot-separated key path to the offending definition, when known. */
	readonly keyPath?: string;

	constructor(message: string, options?: SchemaGraphErrorOptions & { keyPath?: string }) {
		super(message, "INVALID_MODEL", {
			suggestion: options?.suggestion ?? (options?.keyPath ? `Check the definition at: ${options.keyPath}` : undefined),
			cause: options?.cause,
		});
		this.name = "InvalidModelError";
		this.keyPath = options?.keyPath;
	}
}

/**
 * User-supplied data does not fit the model.
 */
export class InvalidDataError extends SchemaGraphError {
	/** Error messages keyed by property name. */
	readonly errors: Readonly<Record<string, string>>;

	constructor(message: string, options?: SchemaGraphErrorOptions & { errors?: Record<string, string> }) {
		super(message, "INVALID_DATA", options);
		this.name = "InvalidDataError";
		this.errors = { ...(options?.errors ?? {}) };
	}

	/**
	 * Format the error, listing every offending property.
	 */
	override format(): string {
		let result = super.format();
		for (const [name, error] of Object.entries(this.errors)) {
			result += `\n  ${name}: ${error}`;
		}
		return result;
	}
}

/**
 * Check if an error is a SchemaGraphError.
 */
export function isSchemaGraphError(error: unknown): error is SchemaGraphError {
	return error instanceof SchemaGraphError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a SchemaGraphError.
 */
export function wrapError(error: unknown, context?: string): SchemaGraphError {
	if (isSchemaGraphError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new SchemaGraphError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
