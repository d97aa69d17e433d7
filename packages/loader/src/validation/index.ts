/**
 * @title Validation Module
 * @description Barrel export for model definition validation.
 *
 * @module validation
 */

export {
	validateModelDefinition,
	validateModelDefinitionSyntax,
	validateModelDefinitionStructure,
} from "./model-definition.js";

export type { ModelDefinitionSeverity, ModelDefinitionFinding } from "./model-definition.js";
