/**
 * @title Property Types
 * @description Value types that properties are declared with.
 *
 * Only a handful of structural types ship with the core. Format-aware types
 * (dates, URLs, countries) are registered by the application.
 *
 * @module datatypes
 */

/**
 * Serialised form of a property type.
 */
export interface PropertyTypeToDict {
	label: string;
	plural: string;
	matchable?: boolean;
}

/**
 * A value type for properties.
 */
export interface PropertyType {
	/** Machine-readable type name used in definitions. */
	readonly name: string;
	/** User-facing name. */
	readonly label: string;
	/** User-facing plural name. */
	readonly plural: string;
	/** Whether values of this type are useful for fuzzy matching. */
	readonly matchable: boolean;
	/**
	 * Check a single value.
	 *
	 * @returns True if the value is acceptable
	 */
	validate(value: unknown): boolean;
	/** Serialisable metadata. */
	toDict(): PropertyTypeToDict;
}

/**
 * Options for a {@link BasicType}.
 */
export interface BasicTypeOptions {
	label?: string;
	plural?: string;
	/** Defaults to true. */
	matchable?: boolean;
	/** Extra check run after the non-empty string check. */
	check?: (value: string) => boolean;
}

/**
 * A property type that accepts non-empty strings, optionally narrowed by a check.
 */
export class BasicType implements PropertyType {
	readonly name: string;
	readonly label: string;
	readonly plural: string;
	readonly matchable: boolean;
	private readonly check?: (value: string) => boolean;

	constructor(name: string, options: BasicTypeOptions = {}) {
		this.name = name;
		this.label = options.label ?? name;
		this.plural = options.plural ?? this.label;
		this.matchable = options.matchable ?? true;
		this.check = options.check;
	}

	validate(value: unknown): boolean {
		if (typeof value !== "string" || value.trim() === "") {
			return false;
		}
		return this.check ? this.check(value) : true;
	}

	toDict(): PropertyTypeToDict {
		const data: PropertyTypeToDict = { label: this.label, plural: this.plural };
		if (this.matchable) {
			data.matchable = true;
		}
		return data;
	}

	toString(): string {
		return `<PropertyType(${this.name})>`;
	}
}
