/**
 * @title Model Cache Module
 * @description In-memory cache for models loaded from directories.
 *
 * Models are loaded lazily on first access and kept until invalidated.
 * File watching is left to the host application.
 *
 * @module filesystem
 */

import { getComponentLogger, getErrorMessage, type Model, type ModelOptions } from "@schemagraph/core";
import { loadModel } from "./model-files.js";

/**
 * Cache for loaded models, keyed by model directory.
 */
export class ModelCache {
	private cache = new Map<string, Model>();
	private errors = new Map<string, string>();
	private readonly options: ModelOptions;

	/**
	 * @param options - Options passed to every model the cache loads
	 */
	constructor(options: ModelOptions = {}) {
		this.options = options;
	}

	/**
	 * Get the model for a directory.
	 * Loads and caches the model on first access.
	 *
	 * @param directory - Model directory
	 * @returns The model, or null if loading failed (see {@link getError})
	 */
	get(directory: string): Model | null {
		const cached = this.cache.get(directory);
		if (cached !== undefined) {
			return cached;
		}

		try {
			const model = loadModel(directory, this.options);
			this.errors.delete(directory);
			this.cache.set(directory, model);
			return model;
		} catch (error) {
			const message = getErrorMessage(error);
			getComponentLogger("loader").warn({ directory, error: message }, "Model could not be loaded");
			this.errors.set(directory, message);
			return null;
		}
	}

	/**
	 * Get the load error for a directory, if any.
	 *
	 * @returns Error message or null if no error occurred
	 */
	getError(directory: string): string | null {
		return this.errors.get(directory) ?? null;
	}

	/**
	 * Check whether a model is cached for the given directory.
	 */
	has(directory: string): boolean {
		return this.cache.has(directory);
	}

	/**
	 * Invalidate the cached model and error for a directory.
	 */
	invalidate(directory: string): void {
		this.cache.delete(directory);
		this.errors.delete(directory);
	}

	/**
	 * Invalidate all cached models.
	 */
	invalidateAll(): void {
		this.cache.clear();
		this.errors.clear();
	}
}
