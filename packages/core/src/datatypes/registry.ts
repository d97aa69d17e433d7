/**
 * @title Property Type Registry
 * @description Lookup of property types by name.
 *
 * @module datatypes
 */

import { InvalidModelError } from "../errors.js";
import { BasicType, type PropertyType, type PropertyTypeToDict } from "./property-type.js";

/** Name of the entity-reference type. */
export const ENTITY_TYPE = "entity";

/** Type used when a property definition names none. */
export const DEFAULT_TYPE = "string";

/**
 * Create the built-in structural types.
 */
export function builtinTypes(): PropertyType[] {
	return [
		new BasicType("string", { label: "Label", plural: "Labels" }),
		new BasicType("text", { label: "Text", plural: "Texts", matchable: false }),
		new BasicType("name", { label: "Name", plural: "Names" }),
		new BasicType("identifier", { label: "Identifier", plural: "Identifiers" }),
		new BasicType(ENTITY_TYPE, { label: "Entity", plural: "Entities", matchable: false }),
	];
}

/**
 * Registry of property types, keyed by name.
 */
export class TypeRegistry implements Iterable<PropertyType> {
	private readonly types = new Map<string, PropertyType>();

	/**
	 * @param types - Types to register; defaults to the built-in set
	 */
	constructor(types: Iterable<PropertyType> = builtinTypes()) {
		for (const type of types) {
			this.register(type);
		}
	}

	/**
	 * Add or replace a type.
	 */
	register(type: PropertyType): this {
		this.types.set(type.name, type);
		return this;
	}

	get(name: string): PropertyType | undefined {
		return this.types.get(name);
	}

	has(name: string): boolean {
		return this.types.has(name);
	}

	/**
	 * Get a type by name.
	 *
	 * @throws InvalidModelError if no type is registered under the name
	 */
	require(name: string): PropertyType {
		const type = this.types.get(name);
		if (type === undefined) {
			throw new InvalidModelError(`Invalid type: ${name}`, {
				suggestion: `Use one of: ${[...this.types.keys()].join(", ")}`,
			});
		}
		return type;
	}

	/**
	 * The entity-reference type used for ranges and reverse stubs.
	 */
	get entity(): PropertyType {
		return this.require(ENTITY_TYPE);
	}

	[Symbol.iterator](): Iterator<PropertyType> {
		return this.types.values();
	}

	toDict(): Record<string, PropertyTypeToDict> {
		const data: Record<string, PropertyTypeToDict> = {};
		for (const [name, type] of this.types) {
			data[name] = type.toDict();
		}
		return data;
	}
}
