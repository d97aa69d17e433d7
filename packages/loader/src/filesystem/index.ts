/**
 * Filesystem module exports.
 */

export {
	MODEL_FILE_EXTENSIONS,
	type ModelFileFormat,
	detectFormat,
	findModelFiles,
	parseModelContent,
	parseModelFile,
	readModelSpecs,
	resolveModelPath,
	loadModel,
} from "./model-files.js";

export { ModelCache } from "./model-cache.js";
