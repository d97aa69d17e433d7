/**
 * @title Definition Types Module
 * @description Definition structs for schemata and properties.
 *
 * Raw definitions (as parsed from YAML or JSON) are checked and normalised
 * once, so the model only ever sees well-formed specs.
 *
 * @module types
 */

import { InvalidModelError } from "../errors.js";

/**
 * Declaration of the inverse side of an entity-valued property.
 */
export interface ReverseSpec {
	/** Name of the property synthesised on the range schema. */
	name?: string;
	/** Label of the synthesised property. */
	label?: string;
	/** Hide the synthesised property (defaults to the origin's hidden flag). */
	hidden?: boolean;
}

/**
 * Definition of a single property.
 */
export interface PropertySpec {
	label?: string;
	description?: string;
	/** Property type name (default: "string"). */
	type?: string;
	hidden?: boolean;
	/** Defaults to the type's matchable flag. */
	matchable?: boolean;
	deprecated?: boolean;
	/** Target schema name for entity-valued properties. */
	range?: string;
	reverse?: ReverseSpec;
	maxLength?: number;
	/** External identifier override. */
	rdf?: string;
}

/**
 * Graph-edge view of a schema.
 */
export interface EdgeSpec {
	source?: string;
	target?: string;
	caption?: string[];
	label?: string;
	directed?: boolean;
}

/**
 * Definition of a single schema.
 */
export interface SchemaSpec {
	label?: string;
	plural?: string;
	description?: string;
	/** Direct parents, in precedence order. */
	extends?: string[];
	properties?: Record<string, PropertySpec>;
	featured?: string[];
	required?: string[];
	caption?: string[];
	edge?: EdgeSpec;
	abstract?: boolean;
	hidden?: boolean;
	generated?: boolean;
	matchable?: boolean;
	rdf?: string;
}

/**
 * A full model definition: schema name to spec.
 */
export type ModelSpec = Record<string, SchemaSpec>;

/** Keys accepted on a schema definition. */
export const SCHEMA_SPEC_KEYS: ReadonlySet<string> = new Set([
	"label",
	"plural",
	"description",
	"extends",
	"properties",
	"featured",
	"required",
	"caption",
	"edge",
	"abstract",
	"hidden",
	"generated",
	"matchable",
	"rdf",
]);

/** Keys accepted on a property definition. */
export const PROPERTY_SPEC_KEYS: ReadonlySet<string> = new Set([
	"label",
	"description",
	"type",
	"hidden",
	"matchable",
	"deprecated",
	"range",
	"reverse",
	"maxLength",
	"max-length",
	"rdf",
]);

/** Keys accepted on an edge definition. */
export const EDGE_SPEC_KEYS: ReadonlySet<string> = new Set(["source", "target", "caption", "label", "directed"]);

/** Keys accepted on a reverse definition. */
export const REVERSE_SPEC_KEYS: ReadonlySet<string> = new Set(["name", "label", "hidden"]);

/**
 * Check whether a value is a plain (non-array) object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reject names that would replace an object's prototype instead of adding an entry. */
function checkEntryName(name: string, keyPath: string): void {
	if (name === "__proto__") {
		throw new InvalidModelError(`Invalid name "${name}"`, { keyPath });
	}
}

function expectRecord(value: unknown, keyPath: string): Record<string, unknown> {
	if (!isRecord(value)) {
		throw new InvalidModelError(`Expected an object at ${keyPath}`, { keyPath });
	}
	return value;
}

function rejectUnknownKeys(raw: Record<string, unknown>, allowed: ReadonlySet<string>, keyPath: string): void {
	for (const key of Object.keys(raw)) {
		if (!allowed.has(key)) {
			throw new InvalidModelError(`Unknown key "${key}" at ${keyPath}`, { keyPath: `${keyPath}.${key}` });
		}
	}
}

function optionalString(raw: Record<string, unknown>, key: string, keyPath: string): string | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new InvalidModelError(`"${key}" must be a string`, { keyPath: `${keyPath}.${key}` });
	}
	return value;
}

function optionalBoolean(raw: Record<string, unknown>, key: string, keyPath: string): boolean | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "boolean") {
		throw new InvalidModelError(`"${key}" must be a boolean`, { keyPath: `${keyPath}.${key}` });
	}
	return value;
}

/**
 * Accepts a single string or a list of strings.
 */
function optionalStringList(raw: Record<string, unknown>, key: string, keyPath: string): string[] | undefined {
	const value = raw[key];
	if (value === undefined || value === null) {
		return undefined;
	}
	const values = Array.isArray(value) ? value : [value];
	return values.map((item: unknown, index) => {
		if (typeof item !== "string") {
			throw new InvalidModelError(`"${key}" must contain only strings`, { keyPath: `${keyPath}.${key}[${index}]` });
		}
		return item;
	});
}

/**
 * Normalise a raw reverse definition.
 */
export function normaliseReverseSpec(raw: unknown, keyPath: string): ReverseSpec {
	const record = expectRecord(raw, keyPath);
	rejectUnknownKeys(record, REVERSE_SPEC_KEYS, keyPath);

	const result: ReverseSpec = {};
	const name = optionalString(record, "name", keyPath);
	const label = optionalString(record, "label", keyPath);
	const hidden = optionalBoolean(record, "hidden", keyPath);
	if (name !== undefined) result.name = name;
	if (label !== undefined) result.label = label;
	if (hidden !== undefined) result.hidden = hidden;
	return result;
}

/**
 * Normalise a raw property definition, accepting `max-length` as an alias of `maxLength`.
 *
 * @param raw - Raw property definition
 * @param keyPath - Location used in error messages
 * @throws InvalidModelError if the definition is malformed
 */
export function normalisePropertySpec(raw: unknown, keyPath: string): PropertySpec {
	const record = expectRecord(raw ?? {}, keyPath);
	rejectUnknownKeys(record, PROPERTY_SPEC_KEYS, keyPath);

	const result: PropertySpec = {};
	for (const key of ["label", "description", "type", "range", "rdf"] as const) {
		const value = optionalString(record, key, keyPath);
		if (value !== undefined) {
			result[key] = value;
		}
	}
	for (const key of ["hidden", "matchable", "deprecated"] as const) {
		const value = optionalBoolean(record, key, keyPath);
		if (value !== undefined) {
			result[key] = value;
		}
	}

	const maxLength = record["maxLength"] ?? record["max-length"];
	if (maxLength !== undefined && maxLength !== null) {
		if (typeof maxLength !== "number" || !Number.isInteger(maxLength) || maxLength < 1) {
			throw new InvalidModelError('"maxLength" must be a positive integer', { keyPath: `${keyPath}.maxLength` });
		}
		result.maxLength = maxLength;
	}

	if (record["reverse"] !== undefined && record["reverse"] !== null) {
		result.reverse = normaliseReverseSpec(record["reverse"], `${keyPath}.reverse`);
	}

	return result;
}

/**
 * Normalise a raw edge definition.
 */
export function normaliseEdgeSpec(raw: unknown, keyPath: string): EdgeSpec {
	const record = expectRecord(raw, keyPath);
	rejectUnknownKeys(record, EDGE_SPEC_KEYS, keyPath);

	const result: EdgeSpec = {};
	const source = optionalString(record, "source", keyPath);
	const target = optionalString(record, "target", keyPath);
	const caption = optionalStringList(record, "caption", keyPath);
	const label = optionalString(record, "label", keyPath);
	const directed = optionalBoolean(record, "directed", keyPath);
	if (source !== undefined) result.source = source;
	if (target !== undefined) result.target = target;
	if (caption !== undefined) result.caption = caption;
	if (label !== undefined) result.label = label;
	if (directed !== undefined) result.directed = directed;
	return result;
}

/**
 * Normalise a raw schema definition.
 *
 * @param raw - Raw schema definition
 * @param keyPath - Location used in error messages (usually the schema name)
 * @throws InvalidModelError if the definition is malformed
 */
export function normaliseSchemaSpec(raw: unknown, keyPath: string): SchemaSpec {
	const record = expectRecord(raw ?? {}, keyPath);
	rejectUnknownKeys(record, SCHEMA_SPEC_KEYS, keyPath);

	const result: SchemaSpec = {};
	for (const key of ["label", "plural", "description", "rdf"] as const) {
		const value = optionalString(record, key, keyPath);
		if (value !== undefined) {
			result[key] = value;
		}
	}
	for (const key of ["abstract", "hidden", "generated", "matchable"] as const) {
		const value = optionalBoolean(record, key, keyPath);
		if (value !== undefined) {
			result[key] = value;
		}
	}
	for (const key of ["extends", "featured", "required", "caption"] as const) {
		const value = optionalStringList(record, key, keyPath);
		if (value !== undefined) {
			result[key] = value;
		}
	}

	if (record["edge"] !== undefined && record["edge"] !== null) {
		result.edge = normaliseEdgeSpec(record["edge"], `${keyPath}.edge`);
	}

	if (record["properties"] !== undefined && record["properties"] !== null) {
		const properties: Record<string, PropertySpec> = {};
		const rawProperties = expectRecord(record["properties"], `${keyPath}.properties`);
		for (const [name, value] of Object.entries(rawProperties)) {
			checkEntryName(name, `${keyPath}.properties.${name}`);
			properties[name] = normalisePropertySpec(value, `${keyPath}.properties.${name}`);
		}
		result.properties = properties;
	}

	return result;
}

/**
 * Normalise a raw model definition (schema name to schema definition).
 *
 * @param raw - Parsed YAML/JSON object
 * @throws InvalidModelError if any definition is malformed
 */
export function normaliseModelSpec(raw: unknown): ModelSpec {
	const record = expectRecord(raw, "model");
	const result: ModelSpec = {};
	for (const [name, value] of Object.entries(record)) {
		checkEntryName(name, name);
		result[name] = normaliseSchemaSpec(value, name);
	}
	return result;
}
