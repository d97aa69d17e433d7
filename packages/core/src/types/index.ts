/**
 * Public type exports for @schemagraph/core.
 */

export {
	type ReverseSpec,
	type PropertySpec,
	type EdgeSpec,
	type SchemaSpec,
	type ModelSpec,
	SCHEMA_SPEC_KEYS,
	PROPERTY_SPEC_KEYS,
	EDGE_SPEC_KEYS,
	REVERSE_SPEC_KEYS,
	isRecord,
	normaliseReverseSpec,
	normalisePropertySpec,
	normaliseEdgeSpec,
	normaliseSchemaSpec,
	normaliseModelSpec,
} from "./spec.js";
