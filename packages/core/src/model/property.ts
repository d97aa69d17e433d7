/**
 * @title Property Module
 * @description A named, typed attribute declared on one schema and shared by
 * every schema that inherits it.
 *
 * @module model
 */

import { InvalidModelError } from "../errors.js";
import { DEFAULT_TYPE, ENTITY_TYPE } from "../datatypes/registry.js";
import type { PropertyType } from "../datatypes/property-type.js";
import { isRecord, type PropertySpec, type ReverseSpec } from "../types/spec.js";
import { translateOptional } from "../text.js";
import type { Schema } from "./schema.js";

/** Property names that collide with entity-level fields. */
export const RESERVED_PROPERTY_NAMES: ReadonlySet<string> = new Set(["id", "caption", "schema", "schemata"]);

/**
 * Serialised form of a property.
 */
export interface PropertyToDict {
	name: string;
	qname: string;
	label: string;
	type: string;
	description?: string;
	stub?: boolean;
	hidden?: boolean;
	matchable?: boolean;
	deprecated?: boolean;
	range?: string;
	reverse?: string;
	maxLength?: number;
}

/**
 * Options for synthesised properties.
 */
export interface PropertyOptions {
	/** Mark the property as a synthesised reverse. */
	stub?: boolean;
	/** Inverse property, when already known. */
	reverse?: Property;
}

/**
 * Take the identifier of an entity reference, or the value itself.
 */
function valueOf(value: unknown): unknown {
	if (isRecord(value) && typeof value["id"] === "string") {
		return value["id"];
	}
	return value;
}

/**
 * A property definition. Owned by the schema that declares it; inheriting
 * schemata hold the same instance.
 */
export class Property {
	/** The declaring schema. */
	readonly schema: Schema;
	readonly name: string;
	/** Qualified name, `<schema>:<property>`. */
	readonly qname: string;
	readonly type: PropertyType;
	readonly hidden: boolean;
	readonly matchable: boolean;
	readonly deprecated: boolean;
	readonly maxLength?: number;
	readonly rdf?: string;
	/** Synthesised as the inverse of another schema's property. */
	readonly stub: boolean;

	private readonly _label: string;
	private readonly _description?: string;
	private readonly rangeName?: string;
	private readonly reverseSpec?: ReverseSpec;
	private _range?: Schema;
	private _reverse?: Property;

	constructor(schema: Schema, name: string, spec: PropertySpec, options: PropertyOptions = {}) {
		const keyPath = `${schema.name}.properties.${name}`;
		if (RESERVED_PROPERTY_NAMES.has(name)) {
			throw new InvalidModelError(`Reserved property name: ${name}`, { keyPath });
		}

		const typeName = spec.type ?? DEFAULT_TYPE;
		const type = schema.model.types.get(typeName);
		if (type === undefined) {
			throw new InvalidModelError(`Invalid type: ${typeName}`, { keyPath: `${keyPath}.type` });
		}
		if (spec.range !== undefined && type.name !== ENTITY_TYPE) {
			throw new InvalidModelError(`Range on a non-entity property: ${schema.name}:${name}`, { keyPath: `${keyPath}.range` });
		}
		if (spec.reverse !== undefined && spec.range === undefined) {
			throw new InvalidModelError(`Reverse without a range: ${schema.name}:${name}`, { keyPath: `${keyPath}.reverse` });
		}

		this.schema = schema;
		this.name = name;
		this.qname = `${schema.name}:${name}`;
		this.type = type;
		this._label = spec.label ?? name;
		this._description = spec.description;
		this.hidden = spec.hidden ?? false;
		this.matchable = spec.matchable ?? type.matchable;
		this.deprecated = spec.deprecated ?? false;
		this.maxLength = spec.maxLength;
		this.rdf = spec.rdf;
		this.rangeName = spec.range;
		this.reverseSpec = spec.reverse;
		this.stub = options.stub ?? false;
		this._reverse = options.reverse;
	}

	/** User-facing name of the property. */
	get label(): string {
		return this.schema.model.gettext(this._label);
	}

	get description(): string | undefined {
		return translateOptional(this.schema.model.gettext, this._description);
	}

	/** Target schema of an entity-valued property, once generated. */
	get range(): Schema | undefined {
		return this._range;
	}

	/** The inverse property, once the model has resolved reverses. */
	get reverse(): Property | undefined {
		return this._reverse;
	}

	/**
	 * Resolve the range schema. Safe to call repeatedly.
	 *
	 * @throws InvalidModelError if the range names an unknown schema
	 */
	generate(): void {
		if (this.rangeName === undefined || this._range !== undefined) {
			return;
		}
		const range = this.schema.model.get(this.rangeName);
		if (range === undefined) {
			throw new InvalidModelError(`Invalid range: ${this.rangeName}`, {
				keyPath: `${this.schema.name}.properties.${this.name}.range`,
			});
		}
		this._range = range;
	}

	/**
	 * Create or find the inverse property on the range schema.
	 * Called by the model once every schema has been generated.
	 *
	 * @internal
	 */
	resolveReverse(): Property | undefined {
		if (this._reverse !== undefined || this.reverseSpec === undefined) {
			return this._reverse;
		}
		this.generate();
		const range = this._range;
		if (range === undefined) {
			throw new InvalidModelError(`Reverse without a range: ${this.qname}`);
		}
		this._reverse = range.addReverse(this.reverseSpec, this);
		return this._reverse;
	}

	/**
	 * Validate the values given for this property.
	 *
	 * @returns An error message, or undefined if all values are acceptable
	 */
	validate(values: readonly unknown[]): string | undefined {
		const gettext = this.schema.model.gettext;
		for (const value of values) {
			if (this.stub) {
				return gettext("Property cannot be written");
			}
			if (!this.type.validate(valueOf(value))) {
				return gettext("Invalid value");
			}
		}
		return undefined;
	}

	/**
	 * Return property metadata in a serialisable form.
	 */
	toDict(): PropertyToDict {
		const data: PropertyToDict = {
			name: this.name,
			qname: this.qname,
			label: this.label,
			type: this.type.name,
		};
		const description = this.description;
		if (description) {
			data.description = description;
		}
		if (this.stub) {
			data.stub = true;
		}
		if (this.hidden) {
			data.hidden = true;
		}
		if (this.matchable) {
			data.matchable = true;
		}
		if (this.deprecated) {
			data.deprecated = true;
		}
		if (this._range !== undefined) {
			data.range = this._range.name;
		}
		if (this._reverse !== undefined) {
			data.reverse = this._reverse.name;
		}
		if (this.maxLength !== undefined) {
			data.maxLength = this.maxLength;
		}
		return data;
	}

	toString(): string {
		return `<Property(${this.qname})>`;
	}
}
