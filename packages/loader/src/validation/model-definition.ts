/**
 * @title Model Definition Validation
 * @description Lint checks for model definition files.
 *
 * Unlike loading, which stops at the first broken definition, this collects
 * every finding in a file so an editor can report them together. Checks that
 * need the rest of the model (parents or ranges defined in other files,
 * inherited properties) are reported as warnings or information.
 *
 * @module validation
 */

import * as yaml from "js-yaml";
import {
	EDGE_SPEC_KEYS,
	ENTITY_TYPE,
	PROPERTY_SPEC_KEYS,
	RESERVED_PROPERTY_NAMES,
	REVERSE_SPEC_KEYS,
	SCHEMA_SPEC_KEYS,
	isRecord,
} from "@schemagraph/core";
import type { ModelFileFormat } from "../filesystem/model-files.js";

/**
 * Severity level for a model definition finding.
 */
export type ModelDefinitionSeverity = "error" | "warning" | "information";

/**
 * A single validation finding from model definition analysis.
 */
export interface ModelDefinitionFinding {
	/** Human-readable description of the issue. */
	message: string;
	/** Severity level. */
	severity: ModelDefinitionSeverity;
	/** Machine-readable code identifying the check. */
	code: string;
	/** Zero-based line number (when available from syntax errors). */
	line?: number;
	/** Zero-based column number (when available from syntax errors). */
	column?: number;
	/** Dot-separated key path to the problematic location. */
	keyPath?: string;
}

const SCHEMA_STRING_KEYS = ["label", "plural", "description", "rdf"];
const SCHEMA_BOOLEAN_KEYS = ["abstract", "hidden", "generated", "matchable"];
const SCHEMA_LIST_KEYS = ["extends", "featured", "required", "caption"];
const PROPERTY_STRING_KEYS = ["label", "description", "type", "range", "rdf"];
const PROPERTY_BOOLEAN_KEYS = ["hidden", "matchable", "deprecated"];
const REFERENCE_KEYS = ["featured", "required", "caption"];

/**
 * Validate a model definition file and return all findings.
 *
 * @param content - Raw file content (YAML or JSON string).
 * @param format - File format: "yaml" or "json".
 * @returns Array of validation findings.
 */
export function validateModelDefinition(content: string, format: ModelFileFormat): ModelDefinitionFinding[] {
	const syntaxResult = validateModelDefinitionSyntax(content, format);
	if (syntaxResult.error) {
		return syntaxResult.error;
	}
	return validateModelDefinitionStructure(syntaxResult.parsed);
}

/**
 * Validate syntax of a model definition file.
 *
 * @param content - Raw file content.
 * @param format - File format.
 * @returns Either an error array or the parsed object.
 */
export function validateModelDefinitionSyntax(
	content: string,
	format: ModelFileFormat,
): { error: ModelDefinitionFinding[] } | { error: null; parsed: unknown } {
	const trimmed = content.trim();
	if (trimmed === "") {
		return { error: null, parsed: null };
	}

	try {
		const parsed: unknown = format === "json" ? JSON.parse(content) : yaml.load(content);
		return { error: null, parsed };
	} catch (err: unknown) {
		const finding: ModelDefinitionFinding = {
			message: "",
			severity: "error",
			code: "syntax-error",
		};

		if (format === "yaml" && err instanceof yaml.YAMLException) {
			finding.message = err.reason ?? String(err);
			if (err.mark) {
				finding.line = err.mark.line;
				finding.column = err.mark.column;
			}
		} else if (err instanceof SyntaxError) {
			finding.message = err.message;
		} else {
			finding.message = String(err);
		}

		return { error: [finding] };
	}
}

/**
 * Validate the structure of a parsed model definition.
 *
 * @param parsed - The parsed YAML/JSON object.
 * @returns Array of validation findings.
 */
export function validateModelDefinitionStructure(parsed: unknown): ModelDefinitionFinding[] {
	if (parsed === null || parsed === undefined) {
		return [];
	}

	if (!isRecord(parsed)) {
		return [
			{
				message: "Model definition must map schema names to definitions.",
				severity: "error",
				code: "invalid-root-type",
			},
		];
	}

	const findings: ModelDefinitionFinding[] = [];
	const schemaNames = new Set(Object.keys(parsed));

	for (const [name, value] of Object.entries(parsed)) {
		validateSchemaDefinition(name, value, schemaNames, findings);
	}

	return findings;
}

const PROTO_KEY = "__proto__";

function invalidName(name: string, keyPath: string): ModelDefinitionFinding {
	return { message: `Name "${name}" is not allowed.`, severity: "error", code: "invalid-name", keyPath };
}

/**
 * Validate one schema definition.
 */
function validateSchemaDefinition(
	name: string,
	value: unknown,
	schemaNames: ReadonlySet<string>,
	findings: ModelDefinitionFinding[],
): void {
	if (name === PROTO_KEY) {
		findings.push(invalidName(name, name));
		return;
	}
	if (value === null) {
		return;
	}
	if (!isRecord(value)) {
		findings.push({
			message: `Schema "${name}" must be an object.`,
			severity: "error",
			code: "invalid-schema-type",
			keyPath: name,
		});
		return;
	}

	checkUnknownKeys(value, SCHEMA_SPEC_KEYS, name, "schema", findings);
	checkStrings(value, SCHEMA_STRING_KEYS, name, findings);
	checkBooleans(value, SCHEMA_BOOLEAN_KEYS, name, findings);
	for (const key of SCHEMA_LIST_KEYS) {
		checkStringList(value, key, name, findings);
	}

	for (const parent of stringEntries(value["extends"])) {
		if (parent === name) {
			findings.push({
				message: `Schema "${name}" extends itself.`,
				severity: "error",
				code: "circular-extends",
				keyPath: `${name}.extends`,
			});
		} else if (!schemaNames.has(parent)) {
			findings.push({
				message: `Parent "${parent}" is not defined in this file.`,
				severity: "information",
				code: "external-parent",
				keyPath: `${name}.extends`,
			});
		}
	}

	const declared = new Set<string>();
	const properties = value["properties"];
	if (properties !== undefined && properties !== null) {
		if (isRecord(properties)) {
			for (const [propName, propValue] of Object.entries(properties)) {
				declared.add(propName);
				validatePropertyDefinition(`${name}.properties.${propName}`, propName, propValue, schemaNames, findings);
			}
		} else {
			findings.push({
				message: '"properties" must be an object.',
				severity: "error",
				code: "invalid-section-type",
				keyPath: `${name}.properties`,
			});
		}
	}

	for (const key of REFERENCE_KEYS) {
		for (const propName of stringEntries(value[key])) {
			checkReference(name, key, propName, declared, `${name}.${key}`, findings);
		}
	}

	const edge = value["edge"];
	if (edge !== undefined && edge !== null) {
		validateEdgeDefinition(name, edge, declared, findings);
	}
}

/**
 * Validate one property definition.
 */
function validatePropertyDefinition(
	keyPath: string,
	name: string,
	value: unknown,
	schemaNames: ReadonlySet<string>,
	findings: ModelDefinitionFinding[],
): void {
	if (name === PROTO_KEY) {
		findings.push(invalidName(name, keyPath));
		return;
	}
	if (RESERVED_PROPERTY_NAMES.has(name)) {
		findings.push({
			message: `Property name "${name}" is reserved.`,
			severity: "error",
			code: "reserved-property-name",
			keyPath,
		});
	}
	if (value === null) {
		return;
	}
	if (!isRecord(value)) {
		findings.push({
			message: `Property "${name}" must be an object.`,
			severity: "error",
			code: "invalid-property-type",
			keyPath,
		});
		return;
	}

	checkUnknownKeys(value, PROPERTY_SPEC_KEYS, keyPath, "property", findings);
	checkStrings(value, PROPERTY_STRING_KEYS, keyPath, findings);
	checkBooleans(value, PROPERTY_BOOLEAN_KEYS, keyPath, findings);

	const maxLength = value["maxLength"] ?? value["max-length"];
	if (maxLength !== undefined && maxLength !== null) {
		if (typeof maxLength !== "number" || !Number.isInteger(maxLength) || maxLength < 1) {
			findings.push({
				message: '"maxLength" must be a positive integer.',
				severity: "error",
				code: "invalid-max-length",
				keyPath: `${keyPath}.maxLength`,
			});
		}
	}

	const range = value["range"];
	const type = value["type"] ?? "string";
	if (range !== undefined && range !== null) {
		if (type !== ENTITY_TYPE) {
			findings.push({
				message: `"range" is only allowed on properties of type "${ENTITY_TYPE}".`,
				severity: "error",
				code: "range-on-non-entity",
				keyPath: `${keyPath}.range`,
			});
		}
		if (typeof range === "string" && !schemaNames.has(range)) {
			findings.push({
				message: `Range "${range}" is not defined in this file.`,
				severity: "information",
				code: "external-range",
				keyPath: `${keyPath}.range`,
			});
		}
	}

	const reverse = value["reverse"];
	if (reverse === undefined || reverse === null) {
		return;
	}
	if (range === undefined || range === null) {
		findings.push({
			message: '"reverse" requires a "range".',
			severity: "error",
			code: "reverse-without-range",
			keyPath: `${keyPath}.reverse`,
		});
	}
	if (!isRecord(reverse)) {
		findings.push({
			message: '"reverse" must be an object.',
			severity: "error",
			code: "invalid-reverse",
			keyPath: `${keyPath}.reverse`,
		});
		return;
	}
	checkUnknownKeys(reverse, REVERSE_SPEC_KEYS, `${keyPath}.reverse`, "reverse", findings);
	checkStrings(reverse, ["label"], `${keyPath}.reverse`, findings);
	checkBooleans(reverse, ["hidden"], `${keyPath}.reverse`, findings);
	if (typeof reverse["name"] !== "string" || reverse["name"] === "") {
		findings.push({
			message: '"reverse" must have a "name".',
			severity: "error",
			code: "missing-reverse-name",
			keyPath: `${keyPath}.reverse.name`,
		});
	}
}

/**
 * Validate the edge view of a schema.
 */
function validateEdgeDefinition(
	schemaName: string,
	edge: unknown,
	declared: ReadonlySet<string>,
	findings: ModelDefinitionFinding[],
): void {
	const keyPath = `${schemaName}.edge`;
	if (!isRecord(edge)) {
		findings.push({
			message: '"edge" must be an object.',
			severity: "error",
			code: "invalid-section-type",
			keyPath,
		});
		return;
	}

	checkUnknownKeys(edge, EDGE_SPEC_KEYS, keyPath, "edge", findings);
	checkStrings(edge, ["source", "target", "label"], keyPath, findings);
	checkBooleans(edge, ["directed"], keyPath, findings);
	checkStringList(edge, "caption", keyPath, findings);

	for (const key of ["source", "target"]) {
		const propName = edge[key];
		if (typeof propName === "string") {
			checkReference(schemaName, `edge ${key}`, propName, declared, `${keyPath}.${key}`, findings);
		}
	}
}

/**
 * Warn when a referenced property is not declared on the schema itself.
 */
function checkReference(
	schemaName: string,
	kind: string,
	propName: string,
	declared: ReadonlySet<string>,
	keyPath: string,
	findings: ModelDefinitionFinding[],
): void {
	if (declared.has(propName)) {
		return;
	}
	findings.push({
		message: `The ${kind} property "${propName}" is not declared on "${schemaName}" and must be inherited.`,
		severity: "warning",
		code: "undeclared-reference",
		keyPath,
	});
}

function checkUnknownKeys(
	raw: Record<string, unknown>,
	allowed: ReadonlySet<string>,
	keyPath: string,
	kind: string,
	findings: ModelDefinitionFinding[],
): void {
	for (const key of Object.keys(raw)) {
		if (!allowed.has(key)) {
			findings.push({
				message: `Unknown ${kind} key "${key}".`,
				severity: "error",
				code: `unknown-${kind}-key`,
				keyPath: `${keyPath}.${key}`,
			});
		}
	}
}

function checkStrings(
	raw: Record<string, unknown>,
	keys: readonly string[],
	keyPath: string,
	findings: ModelDefinitionFinding[],
): void {
	for (const key of keys) {
		const value = raw[key];
		if (value !== undefined && value !== null && typeof value !== "string") {
			findings.push({
				message: `"${key}" must be a string.`,
				severity: "error",
				code: "invalid-value-type",
				keyPath: `${keyPath}.${key}`,
			});
		}
	}
}

function checkBooleans(
	raw: Record<string, unknown>,
	keys: readonly string[],
	keyPath: string,
	findings: ModelDefinitionFinding[],
): void {
	for (const key of keys) {
		const value = raw[key];
		if (value !== undefined && value !== null && typeof value !== "boolean") {
			findings.push({
				message: `"${key}" must be a boolean.`,
				severity: "error",
				code: "invalid-value-type",
				keyPath: `${keyPath}.${key}`,
			});
		}
	}
}

/**
 * A list key accepts a single string or an array of strings.
 */
function checkStringList(
	raw: Record<string, unknown>,
	key: string,
	keyPath: string,
	findings: ModelDefinitionFinding[],
): void {
	const value = raw[key];
	if (value === undefined || value === null || typeof value === "string") {
		return;
	}
	if (!Array.isArray(value)) {
		findings.push({
			message: `"${key}" must be a string or a list of strings.`,
			severity: "error",
			code: "invalid-value-type",
			keyPath: `${keyPath}.${key}`,
		});
		return;
	}
	value.forEach((item: unknown, index) => {
		if (typeof item !== "string") {
			findings.push({
				message: `"${key}" must contain only strings.`,
				severity: "error",
				code: "invalid-value-type",
				keyPath: `${keyPath}.${key}[${index}]`,
			});
		}
	});
}

/**
 * The string entries of a list key, ignoring malformed values.
 */
function stringEntries(value: unknown): string[] {
	if (typeof value === "string") {
		return [value];
	}
	if (!Array.isArray(value)) {
		return [];
	}
	return value.filter((item: unknown): item is string => typeof item === "string");
}
