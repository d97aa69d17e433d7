/**
 * @title Model Files Module
 * @description Discovery and parsing of model definition files.
 *
 * A model directory holds any number of `.yml`, `.yaml` or `.json` files,
 * each mapping schema names to schema definitions. Files are read in name
 * order and merged into one model.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import {
	Model,
	getComponentLogger,
	getErrorMessage,
	isRecord,
	isSchemaGraphError,
	loadConfig,
	normaliseModelSpec,
	ENV_KEYS,
	type ModelOptions,
	type ModelSpec,
} from "@schemagraph/core";
import { ModelFileError } from "../errors.js";

/** Supported model file extensions. */
export const MODEL_FILE_EXTENSIONS = [".json", ".yml", ".yaml"] as const;

/** Content format of a model file. */
export type ModelFileFormat = "yaml" | "json";

/**
 * Detect the format of a model file from its extension.
 */
export function detectFormat(filePath: string): ModelFileFormat {
	return filePath.endsWith(".json") ? "json" : "yaml";
}

function isModelFile(filename: string): boolean {
	return MODEL_FILE_EXTENSIONS.some((extension) => filename.endsWith(extension));
}

/**
 * Find the model files in a directory.
 *
 * @param directory - Directory to search (not recursive)
 * @returns Full paths, sorted by file name
 * @throws ModelFileError if the directory cannot be read
 */
export function findModelFiles(directory: string): string[] {
	let entries: fs.Dirent[];
	try {
		entries = fs.readdirSync(directory, { withFileTypes: true });
	} catch (error) {
		throw new ModelFileError(`Failed to read model directory: ${getErrorMessage(error)}`, {
			filePath: directory,
			cause: error,
		});
	}

	return entries
		.filter((entry) => entry.isFile() && isModelFile(entry.name))
		.map((entry) => entry.name)
		.sort()
		.map((name) => path.join(directory, name));
}

/**
 * Parse model definitions from a YAML or JSON string.
 *
 * @param content - File content
 * @param sourcePath - Source path for error messages (optional)
 * @param format - Content format: "yaml" (default) or "json"
 * @returns Normalised schema definitions; empty when the content is empty
 * @throws ModelFileError if the content cannot be parsed or is malformed
 */
export function parseModelContent(content: string, sourcePath?: string, format: ModelFileFormat = "yaml"): ModelSpec {
	try {
		const raw: unknown = format === "json" ? JSON.parse(content) : yaml.load(content);

		if (raw === undefined || raw === null) {
			getComponentLogger("loader").warn({ file: sourcePath }, "Model file defines no schemata");
			return {};
		}
		if (!isRecord(raw)) {
			throw new ModelFileError("Model file must map schema names to definitions", { filePath: sourcePath });
		}

		return normaliseModelSpec(raw);
	} catch (error) {
		if (error instanceof ModelFileError) {
			throw error;
		}
		throw new ModelFileError(`Failed to parse model file: ${getErrorMessage(error)}`, {
			filePath: sourcePath,
			cause: error,
		});
	}
}

/**
 * Parse a model file from a path.
 *
 * @throws ModelFileError if reading or parsing fails
 */
export function parseModelFile(filePath: string): ModelSpec {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ModelFileError(`Failed to read model file: ${getErrorMessage(error)}`, { filePath, cause: error });
	}
	return parseModelContent(content, filePath, detectFormat(filePath));
}

/**
 * Read and merge every model file in a directory.
 *
 * @param directory - Model directory
 * @returns Schema definitions in file order, then definition order
 * @throws ModelFileError if a file fails to parse or a schema is defined twice
 */
export function readModelSpecs(directory: string): ModelSpec {
	const logger = getComponentLogger("loader");
	const specs: ModelSpec = {};
	const origins = new Map<string, string>();

	for (const filePath of findModelFiles(directory)) {
		const fileSpecs = parseModelFile(filePath);
		for (const [name, spec] of Object.entries(fileSpecs)) {
			const origin = origins.get(name);
			if (origin !== undefined) {
				throw new ModelFileError(
					`Schema "${name}" is defined in both ${path.basename(origin)} and ${path.basename(filePath)}`,
					{ filePath },
				);
			}
			origins.set(name, filePath);
			specs[name] = spec;
		}
		logger.debug({ file: filePath, schemata: Object.keys(fileSpecs).length }, "Read model file");
	}

	if (origins.size === 0) {
		logger.warn({ directory }, "No schemata found in model directory");
	}
	return specs;
}

/**
 * Resolve the model directory, falling back to SCHEMAGRAPH_MODEL_PATH.
 *
 * @throws ModelFileError if neither is set
 */
export function resolveModelPath(directory?: string): string {
	const resolved = directory ?? loadConfig().modelPath;
	if (resolved === undefined) {
		throw new ModelFileError(`No model directory given and ${ENV_KEYS.MODEL_PATH} is not set`);
	}
	return resolved;
}

/**
 * Load a model from a directory of definition files.
 *
 * @param directory - Model directory; defaults to SCHEMAGRAPH_MODEL_PATH
 * @param options - Options passed to the model
 * @throws ModelFileError if the files cannot be read
 * @throws InvalidModelError if the definitions do not form a valid model
 */
export function loadModel(directory?: string, options: ModelOptions = {}): Model {
	const modelPath = resolveModelPath(directory);
	const logger = getComponentLogger("loader");
	try {
		return new Model(readModelSpecs(modelPath), options);
	} catch (error) {
		if (isSchemaGraphError(error)) {
			logger.error({ directory: modelPath, code: error.code }, error.message);
		}
		throw error;
	}
}
