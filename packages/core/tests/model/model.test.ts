import { describe, it, expect } from "vitest";
import { BasicType } from "../../src/datatypes/property-type.js";
import { TypeRegistry, builtinTypes } from "../../src/datatypes/registry.js";
import { InvalidDataError, InvalidModelError } from "../../src/errors.js";
import { createLogger } from "../../src/logging.js";
import { Model } from "../../src/model/model.js";
import { buildModel, namesOf } from "../fixtures/model.js";

const silent = createLogger({ level: "silent" });

describe("Model lookup", () => {
	it("finds schemata by name or instance", () => {
		const model = buildModel();
		const company = model.require("Company");

		expect(model.get("Company")).toBe(company);
		expect(model.get(company)).toBe(company);
		expect(model.get("Nope")).toBeUndefined();
		expect(model.has("Person")).toBe(true);
		expect(model.has("Nope")).toBe(false);
	});

	it("raises a data error for an unknown schema", () => {
		const model = buildModel();

		expect(() => model.require("Vessel")).toThrow(InvalidDataError);
		expect(() => model.require("Vessel")).toThrow("No such schema: Vessel");
	});

	it("iterates schemata in load order", () => {
		const model = buildModel();

		expect([...model].map((schema) => schema.name)).toEqual([
			"Thing",
			"LegalEntity",
			"Asset",
			"Company",
			"Person",
			"Ownership",
		]);
		expect([...model.schemata.keys()]).toEqual([...model].map((schema) => schema.name));
	});

	it("is frozen once constructed", () => {
		expect(buildModel().frozen).toBe(true);
	});
});

describe("Model.getQname", () => {
	it("finds declared properties", () => {
		const model = buildModel();

		expect(model.getQname("LegalEntity:country")).toBe(model.require("LegalEntity").get("country"));
		expect(model.getQname("Asset:country")).toBe(model.require("Asset").get("country"));
		expect(model.getQname("LegalEntity:ownershipOwner")?.stub).toBe(true);
	});

	it("does not index inherited properties under the child", () => {
		const model = buildModel();

		expect(model.getQname("Company:country")).toBeUndefined();
		expect(model.getQname("Company:registrationNumber")?.name).toBe("registrationNumber");
	});
});

describe("Model.properties", () => {
	it("yields every property once", () => {
		const model = buildModel();
		const qnames = [...model.properties()].map((prop) => prop.qname);

		expect(qnames).toHaveLength(12);
		expect(new Set(qnames).size).toBe(12);
		expect(qnames).toContain("Asset:ownershipAsset");
		expect(qnames).toContain("Ownership:percentage");
	});
});

describe("Model.commonSchema", () => {
	it("returns the more specific schema", () => {
		const model = buildModel();

		expect(model.commonSchema("Company", "LegalEntity").name).toBe("Company");
		expect(model.commonSchema("LegalEntity", "Company").name).toBe("Company");
		expect(model.commonSchema("Thing", "Thing").name).toBe("Thing");
		expect(model.commonSchema(model.require("Asset"), "Company").name).toBe("Company");
	});

	it("rejects unrelated schemata", () => {
		const model = buildModel();

		expect(() => model.commonSchema("Person", "Company")).toThrow("No common schema: Person and Company");
	});

	it("rejects unknown schemata", () => {
		expect(() => buildModel().commonSchema("Person", "Vessel")).toThrow("No such schema: Vessel");
	});
});

describe("Model.fromRaw", () => {
	it("normalises untyped definitions", () => {
		const raw: unknown = {
			Thing: { properties: { name: { type: "name" } }, caption: "name" },
			Person: { extends: "Thing", required: ["name"] },
		};
		const model = Model.fromRaw(raw, { logger: silent });

		expect(namesOf(model.require("Person").schemata)).toEqual(["Person", "Thing"]);
		expect(model.require("Thing").caption).toEqual(["name"]);
	});

	it("rejects malformed input", () => {
		expect(() => Model.fromRaw(42, { logger: silent })).toThrow("Expected an object at model");
		expect(() => Model.fromRaw({ Thing: { colour: "red" } }, { logger: silent })).toThrow(InvalidModelError);
		expect(() => Model.fromRaw(JSON.parse('{"__proto__": {"label": "P"}, "Thing": {}}'), { logger: silent })).toThrow(
			'Invalid name "__proto__"',
		);
	});
});

describe("Model options", () => {
	it("passes display text through the translator", () => {
		const model = buildModel(undefined, { gettext: (key) => key.toUpperCase() });
		const company = model.require("Company");

		expect(model.require("LegalEntity").label).toBe("LEGAL ENTITY");
		expect(company.get("country")?.label).toBe("COUNTRY");

		try {
			company.validate({});
			expect.fail("expected an InvalidDataError");
		} catch (error) {
			expect(error).toBeInstanceOf(InvalidDataError);
			if (error instanceof InvalidDataError) {
				expect(error.message).toBe("ENTITY VALIDATION FAILED");
				expect(error.errors).toEqual({ name: "REQUIRED" });
			}
		}
	});

	it("accepts application property types", () => {
		const types = new TypeRegistry([
			...builtinTypes(),
			new BasicType("country", { label: "Country", plural: "Countries", check: (value) => /^[a-z]{2}$/.test(value) }),
		]);
		const model = buildModel({ Place: { properties: { country: { type: "country" } } } }, { types });
		const place = model.require("Place");

		expect(place.get("country")?.type.name).toBe("country");
		expect(() => place.validate({ country: "gb" })).not.toThrow();
		expect(() => place.validate({ country: "GBR" })).toThrow(InvalidDataError);
	});

	it("rejects types that are not registered", () => {
		expect(() => buildModel({ Event: { properties: { date: { type: "date" } } } })).toThrow("Invalid type: date");
	});
});

describe("Model.toDict", () => {
	it("serialises schemata and types", () => {
		const data = buildModel().toDict();

		expect(Object.keys(data.schemata)).toEqual(["Thing", "LegalEntity", "Asset", "Company", "Person", "Ownership"]);
		expect(Object.keys(data.types)).toEqual(["string", "text", "name", "identifier", "entity"]);
		expect(data.types["text"]).toEqual({ label: "Text", plural: "Texts" });
		expect(data.schemata["Person"]?.extends).toEqual(["LegalEntity"]);
	});

	it("serialises to JSON", () => {
		const json = JSON.stringify(buildModel().toDict());
		const parsed: unknown = JSON.parse(json);

		expect(parsed).toEqual(buildModel().toDict());
	});
});

describe("Model logging", () => {
	it("logs a summary once loaded", () => {
		const lines: string[] = [];
		const logger = createLogger({
			level: "info",
			stream: {
				write(message: string) {
					lines.push(message);
				},
			},
		});

		buildModel(undefined, { logger });

		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0] ?? "{}");
		expect(entry).toMatchObject({ level: "info", msg: "Model loaded", schemata: 6, properties: 12 });
	});

	it("logs loading phases at debug level", () => {
		const messages: string[] = [];
		const logger = createLogger({
			level: "debug",
			stream: {
				write(message: string) {
					const entry: unknown = JSON.parse(message);
					if (typeof entry === "object" && entry !== null && "msg" in entry && typeof entry.msg === "string") {
						messages.push(entry.msg);
					}
				},
			},
		});

		buildModel(undefined, { logger });

		expect(messages).toEqual([
			"Constructed schemata",
			"Generated schema hierarchy",
			"Synthesised reverse properties",
			"Model loaded",
		]);
	});
});
