/**
 * @schemagraph/loader - Model definition files: discovery, parsing,
 * linting and caching.
 *
 * This library provides functionality for:
 * - Model file discovery and parsing (.yml, .yaml, .json)
 * - Merging a directory of files into one model
 * - Model definition linting (syntax and structure checks)
 * - Model caching (in-memory lazy-loading cache)
 */

// Error exports
export { ModelFileError } from "./errors.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Validation exports
export * from "./validation/index.js";
