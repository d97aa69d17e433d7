/**
 * @title Errors
 * @description Error types for @schemagraph/loader.
 *
 * @module errors
 */

import { SchemaGraphError } from "@schemagraph/core";

/**
 * Error when finding, reading or parsing a model file fails.
 */
export class ModelFileError extends SchemaGraphError {
	/** Path to the model file or directory. */
	readonly filePath?: string;

	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "MODEL_FILE_ERROR", {
			suggestion: options?.filePath ? `Check the model file at: ${options.filePath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ModelFileError";
		this.filePath = options?.filePath;
	}
}
