/**
 * @title Model Module
 * @description The set of all schemata, loaded in explicit phases.
 *
 * Loading runs to completion inside the constructor:
 *
 * 1. construct every schema from its spec (declared properties only);
 * 2. generate every schema (parents, inherited properties, references);
 * 3. synthesise reverse properties and spread them to descendants;
 * 4. finalise: index qualified names, compute matchable sets, freeze.
 *
 * A constructed model is read-only.
 *
 * @module model
 */

import { InvalidDataError } from "../errors.js";
import { getComponentLogger, type Logger } from "../logging.js";
import { TypeRegistry } from "../datatypes/registry.js";
import type { PropertyTypeToDict } from "../datatypes/property-type.js";
import { identityTranslator, type Translator } from "../text.js";
import { normaliseModelSpec, type ModelSpec } from "../types/spec.js";
import type { Property } from "./property.js";
import type { SchemaRegistry } from "./registry.js";
import { Schema, type SchemaToDict } from "./schema.js";

/**
 * Options for building a model.
 */
export interface ModelOptions {
	/** Property types; defaults to the built-in set. */
	types?: TypeRegistry;
	/** Translator for display text; defaults to the identity. */
	gettext?: Translator;
	/** Logger; defaults to the "model" component logger. */
	logger?: Logger;
}

/**
 * Serialised form of a model.
 */
export interface ModelToDict {
	schemata: Record<string, SchemaToDict>;
	types: Record<string, PropertyTypeToDict>;
}

/**
 * All schemata of a model, addressable by name.
 */
export class Model implements SchemaRegistry, Iterable<Schema> {
	readonly types: TypeRegistry;
	readonly gettext: Translator;

	private readonly logger: Logger;
	private readonly _schemata = new Map<string, Schema>();
	private readonly qnames = new Map<string, Property>();
	private _frozen = false;

	/**
	 * Build and resolve a model from normalised specs.
	 *
	 * @param specs - Schema name to spec, in load order
	 * @param options - Types, translator and logger
	 * @throws InvalidModelError if any definition is broken
	 */
	constructor(specs: ModelSpec, options: ModelOptions = {}) {
		this.types = options.types ?? new TypeRegistry();
		this.gettext = options.gettext ?? identityTranslator;
		this.logger = options.logger ?? getComponentLogger("model");

		for (const [name, spec] of Object.entries(specs)) {
			this._schemata.set(name, new Schema(this, name, spec));
		}
		this.logger.debug({ schemata: this._schemata.size }, "Constructed schemata");

		for (const schema of this._schemata.values()) {
			schema.generate();
		}
		this.logger.debug("Generated schema hierarchy");

		const stubs = this.synthesiseReverses();
		this.logger.debug({ stubs }, "Synthesised reverse properties");

		this.finalise();
		this.logger.info({ schemata: this._schemata.size, properties: this.qnames.size }, "Model loaded");
	}

	/**
	 * Normalise untyped definitions (e.g. parsed YAML) and build a model.
	 *
	 * @throws InvalidModelError if the definitions are malformed or broken
	 */
	static fromRaw(raw: unknown, options: ModelOptions = {}): Model {
		return new Model(normaliseModelSpec(raw), options);
	}

	/** True once loading has finished. */
	get frozen(): boolean {
		return this._frozen;
	}

	/** Schemata by name, in load order. */
	get schemata(): ReadonlyMap<string, Schema> {
		return this._schemata;
	}

	private synthesiseReverses(): number {
		let created = 0;
		for (const prop of [...this.properties()]) {
			if (prop.stub) {
				continue;
			}
			const reverse = prop.resolveReverse();
			if (reverse?.stub && reverse.reverse === prop) {
				created += 1;
			}
		}
		return created;
	}

	private finalise(): void {
		for (const prop of this.properties()) {
			this.qnames.set(prop.qname, prop);
		}
		for (const schema of this._schemata.values()) {
			schema.finalise();
		}
		this._frozen = true;
	}

	/**
	 * Find a schema by name. A schema argument is looked up by its name.
	 */
	get(name: string | Schema): Schema | undefined {
		return this._schemata.get(typeof name === "string" ? name : name.name);
	}

	has(name: string): boolean {
		return this._schemata.has(name);
	}

	/**
	 * Get a schema by name.
	 *
	 * @throws InvalidDataError if there is no such schema
	 */
	require(name: string | Schema): Schema {
		const schema = this.get(name);
		if (schema === undefined) {
			throw new InvalidDataError(`No such schema: ${typeof name === "string" ? name : name.name}`);
		}
		return schema;
	}

	/**
	 * Find a property by qualified name, e.g. "Company:country".
	 */
	getQname(qname: string): Property | undefined {
		return this.qnames.get(qname);
	}

	/**
	 * Every property once, on the schema that declares it.
	 */
	*properties(): IterableIterator<Property> {
		for (const schema of this._schemata.values()) {
			yield* schema.ownProperties();
		}
	}

	/**
	 * Pick the more specific of two schemata when one inherits from the other.
	 *
	 * @throws InvalidDataError if either schema is unknown or they are unrelated
	 */
	commonSchema(left: string | Schema, right: string | Schema): Schema {
		const leftSchema = this.require(left);
		const rightSchema = this.require(right);
		if (leftSchema.isA(rightSchema)) {
			return leftSchema;
		}
		if (rightSchema.isA(leftSchema)) {
			return rightSchema;
		}
		throw new InvalidDataError(`No common schema: ${leftSchema.name} and ${rightSchema.name}`);
	}

	[Symbol.iterator](): Iterator<Schema> {
		return this._schemata.values();
	}

	/**
	 * Return all schema and type metadata in a serialisable form.
	 */
	toDict(): ModelToDict {
		const schemata: Record<string, SchemaToDict> = {};
		for (const [name, schema] of this._schemata) {
			schemata[name] = schema.toDict();
		}
		return { schemata, types: this.types.toDict() };
	}
}
