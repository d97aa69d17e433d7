import { describe, it, expect } from "vitest";
import {
	validateModelDefinition,
	validateModelDefinitionSyntax,
	validateModelDefinitionStructure,
} from "../../src/validation/model-definition.js";

describe("validateModelDefinitionSyntax", () => {
	it("parses valid YAML without errors", () => {
		const result = validateModelDefinitionSyntax("Thing:\n  label: Thing\n", "yaml");
		expect(result.error).toBeNull();
	});

	it("parses valid JSON without errors", () => {
		const result = validateModelDefinitionSyntax('{"Thing": {"label": "Thing"}}', "json");
		expect(result.error).toBeNull();
	});

	it("returns no findings for whitespace-only content", () => {
		const result = validateModelDefinitionSyntax("   \n  \n", "yaml");
		expect(result).toEqual({ error: null, parsed: null });
	});

	it("reports YAML syntax errors with line and column", () => {
		const result = validateModelDefinitionSyntax("Thing:\n  extends: [\n", "yaml");
		expect(result.error).toHaveLength(1);
		expect(result.error?.[0]?.code).toBe("syntax-error");
		expect(result.error?.[0]?.severity).toBe("error");
		expect(result.error?.[0]?.line).toBeTypeOf("number");
		expect(result.error?.[0]?.column).toBeTypeOf("number");
	});

	it("reports JSON syntax errors", () => {
		const result = validateModelDefinitionSyntax('{"Thing": }', "json");
		expect(result.error).toHaveLength(1);
		expect(result.error?.[0]?.code).toBe("syntax-error");
	});
});

describe("validateModelDefinitionStructure", () => {
	it("returns no findings for null input", () => {
		expect(validateModelDefinitionStructure(null)).toEqual([]);
		expect(validateModelDefinitionStructure(undefined)).toEqual([]);
	});

	it("returns an error for a non-object root", () => {
		const findings = validateModelDefinitionStructure(["Thing"]);
		expect(findings).toEqual([
			{
				message: "Model definition must map schema names to definitions.",
				severity: "error",
				code: "invalid-root-type",
			},
		]);
	});

	it("accepts a complete model without findings", () => {
		const findings = validateModelDefinitionStructure({
			Thing: {
				abstract: true,
				properties: { name: { type: "name", label: "Name" } },
				caption: ["name"],
				featured: "name",
			},
			Ownership: {
				extends: ["Thing"],
				properties: {
					owner: { type: "entity", range: "Thing", reverse: { name: "ownerships", hidden: true } },
					asset: { type: "entity", range: "Thing", "max-length": 64 },
				},
				edge: { source: "owner", target: "asset", label: "owns", directed: true, caption: ["owner"] },
			},
			Empty: null,
		});

		expect(findings).toEqual([]);
	});

	it("reports a schema that is not an object", () => {
		const findings = validateModelDefinitionStructure({ Thing: "abstract" });
		expect(findings).toEqual([
			{ message: 'Schema "Thing" must be an object.', severity: "error", code: "invalid-schema-type", keyPath: "Thing" },
		]);
	});

	it("reports unknown schema keys", () => {
		const findings = validateModelDefinitionStructure({ Thing: { parents: ["Root"] } });
		expect(findings).toEqual([
			{ message: 'Unknown schema key "parents".', severity: "error", code: "unknown-schema-key", keyPath: "Thing.parents" },
		]);
	});

	it("reports values of the wrong shape", () => {
		const findings = validateModelDefinitionStructure({
			Thing: { label: 3, abstract: "yes", required: ["name", 4], caption: { first: "name" } },
		});

		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([
			["invalid-value-type", "Thing.label"],
			["invalid-value-type", "Thing.abstract"],
			["invalid-value-type", "Thing.required[1]"],
			["invalid-value-type", "Thing.caption"],
			["undeclared-reference", "Thing.required"],
		]);
	});

	it("reports a non-object properties section", () => {
		const findings = validateModelDefinitionStructure({ Thing: { properties: ["name"] } });
		expect(findings).toEqual([
			{ message: '"properties" must be an object.', severity: "error", code: "invalid-section-type", keyPath: "Thing.properties" },
		]);
	});

	it("notes parents defined elsewhere", () => {
		const findings = validateModelDefinitionStructure({ Person: { extends: "LegalEntity" } });
		expect(findings).toEqual([
			{
				message: 'Parent "LegalEntity" is not defined in this file.',
				severity: "information",
				code: "external-parent",
				keyPath: "Person.extends",
			},
		]);
	});

	it("reports a schema named __proto__", () => {
		const findings = validateModelDefinition('{"__proto__": {"label": "P"}, "Thing": {}}', "json");
		expect(findings).toEqual([
			{ message: 'Name "__proto__" is not allowed.', severity: "error", code: "invalid-name", keyPath: "__proto__" },
		]);
	});

	it("reports a schema extending itself", () => {
		const findings = validateModelDefinitionStructure({ Person: { extends: ["Person"] } });
		expect(findings.map((f) => f.code)).toEqual(["circular-extends"]);
		expect(findings[0]?.severity).toBe("error");
	});

	it("warns about references to properties that are not declared locally", () => {
		const findings = validateModelDefinitionStructure({
			Thing: { properties: { name: {} } },
			Company: { extends: ["Thing"], featured: ["name", "country"], required: ["name"] },
		});

		expect(findings).toEqual([
			{
				message: 'The featured property "name" is not declared on "Company" and must be inherited.',
				severity: "warning",
				code: "undeclared-reference",
				keyPath: "Company.featured",
			},
			{
				message: 'The featured property "country" is not declared on "Company" and must be inherited.',
				severity: "warning",
				code: "undeclared-reference",
				keyPath: "Company.featured",
			},
			{
				message: 'The required property "name" is not declared on "Company" and must be inherited.',
				severity: "warning",
				code: "undeclared-reference",
				keyPath: "Company.required",
			},
		]);
	});
});

describe("property definition validation", () => {
	it("reports reserved property names", () => {
		const findings = validateModelDefinitionStructure({ Thing: { properties: { id: {}, schema: null } } });
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([
			["reserved-property-name", "Thing.properties.id"],
			["reserved-property-name", "Thing.properties.schema"],
		]);
	});

	it("reports a property named __proto__", () => {
		const findings = validateModelDefinition('{"Thing": {"properties": {"__proto__": {}}}}', "json");
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([["invalid-name", "Thing.properties.__proto__"]]);
	});

	it("reports a property that is not an object", () => {
		const findings = validateModelDefinitionStructure({ Thing: { properties: { name: "string" } } });
		expect(findings).toEqual([
			{
				message: 'Property "name" must be an object.',
				severity: "error",
				code: "invalid-property-type",
				keyPath: "Thing.properties.name",
			},
		]);
	});

	it("reports unknown property keys", () => {
		const findings = validateModelDefinitionStructure({ Thing: { properties: { name: { format: "text" } } } });
		expect(findings).toEqual([
			{
				message: 'Unknown property key "format".',
				severity: "error",
				code: "unknown-property-key",
				keyPath: "Thing.properties.name.format",
			},
		]);
	});

	it("reports an invalid length limit", () => {
		const findings = validateModelDefinitionStructure({ Thing: { properties: { name: { maxLength: -1 } } } });
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([["invalid-max-length", "Thing.properties.name.maxLength"]]);
	});

	it("reports a range on a non-entity property", () => {
		const findings = validateModelDefinitionStructure({
			Thing: { properties: { owner: { range: "Thing" } } },
		});
		expect(findings.map((f) => f.code)).toEqual(["range-on-non-entity"]);
	});

	it("notes ranges defined elsewhere", () => {
		const findings = validateModelDefinitionStructure({
			Ownership: { properties: { owner: { type: "entity", range: "LegalEntity" } } },
		});
		expect(findings.map((f) => [f.code, f.severity])).toEqual([["external-range", "information"]]);
	});

	it("reports a reverse without a range", () => {
		const findings = validateModelDefinitionStructure({
			Ownership: { properties: { owner: { type: "entity", reverse: { name: "ownerships" } } } },
		});
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([
			["reverse-without-range", "Ownership.properties.owner.reverse"],
		]);
	});

	it("reports malformed reverse definitions", () => {
		const findings = validateModelDefinitionStructure({
			Thing: {},
			Ownership: {
				properties: {
					owner: { type: "entity", range: "Thing", reverse: "ownerships" },
					asset: { type: "entity", range: "Thing", reverse: { label: "Owners", range: "Thing" } },
				},
			},
		});
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([
			["invalid-reverse", "Ownership.properties.owner.reverse"],
			["unknown-reverse-key", "Ownership.properties.asset.reverse.range"],
			["missing-reverse-name", "Ownership.properties.asset.reverse.name"],
		]);
	});
});

describe("edge definition validation", () => {
	it("reports a non-object edge", () => {
		const findings = validateModelDefinitionStructure({ Link: { edge: "owner" } });
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([["invalid-section-type", "Link.edge"]]);
	});

	it("reports unknown edge keys and wrong shapes", () => {
		const findings = validateModelDefinitionStructure({
			Link: { properties: { from: {}, to: {} }, edge: { source: "from", target: "to", weight: 1, directed: "no" } },
		});
		expect(findings.map((f) => [f.code, f.keyPath])).toEqual([
			["unknown-edge-key", "Link.edge.weight"],
			["invalid-value-type", "Link.edge.directed"],
		]);
	});

	it("warns about edge endpoints that are not declared locally", () => {
		const findings = validateModelDefinitionStructure({
			Link: { properties: { from: {} }, edge: { source: "from", target: "to" } },
		});
		expect(findings).toEqual([
			{
				message: 'The edge target property "to" is not declared on "Link" and must be inherited.',
				severity: "warning",
				code: "undeclared-reference",
				keyPath: "Link.edge.target",
			},
		]);
	});
});

describe("validateModelDefinition", () => {
	it("returns syntax errors without checking structure", () => {
		const findings = validateModelDefinition("Thing: [\n", "yaml");
		expect(findings.map((f) => f.code)).toEqual(["syntax-error"]);
	});

	it("checks the structure of parsed content", () => {
		const findings = validateModelDefinition('{"Thing": {"colour": "red"}}', "json");
		expect(findings.map((f) => f.code)).toEqual(["unknown-schema-key"]);
	});

	it("returns no findings for empty content", () => {
		expect(validateModelDefinition("", "yaml")).toEqual([]);
	});
});
