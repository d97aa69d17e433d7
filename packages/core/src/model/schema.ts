/**
 * @title Schema Module
 * @description One node of the multi-parent schema hierarchy.
 *
 * A schema owns the properties it declares and shares the properties of its
 * ancestors. {@link Schema.generate} resolves the hierarchy once; afterwards
 * the schema is read-only apart from reverse stubs added while the model is
 * still loading.
 *
 * @module model
 */

import { InvalidDataError, InvalidModelError } from "../errors.js";
import { ENTITY_TYPE } from "../datatypes/registry.js";
import { translateOptional } from "../text.js";
import type { EdgeSpec, PropertySpec, ReverseSpec, SchemaSpec } from "../types/spec.js";
import { Property, type PropertyToDict } from "./property.js";
import type { SchemaRegistry } from "./registry.js";

/**
 * Serialised edge view.
 */
export interface EdgeToDict {
	source: string;
	target: string;
	caption: string[];
	label: string;
	directed: boolean;
}

/**
 * Serialised form of a schema. Optional keys are omitted when they hold the default.
 */
export interface SchemaToDict {
	label: string;
	plural: string;
	schemata: string[];
	extends: string[];
	properties: Record<string, PropertyToDict>;
	edge?: EdgeToDict;
	featured?: string[];
	required?: string[];
	caption?: string[];
	description?: string;
	abstract?: boolean;
	hidden?: boolean;
	generated?: boolean;
	matchable?: boolean;
}

/**
 * Values submitted for validation, keyed by property name.
 */
export type PropertyBag = Record<string, unknown>;

type GenerationState = "pending" | "generating" | "generated";

/**
 * Wrap a single value in a list; null and undefined become an empty list.
 */
export function ensureList(value: unknown): unknown[] {
	if (value === undefined || value === null) {
		return [];
	}
	return Array.isArray(value) ? [...value] : [value];
}

/**
 * A type definition for a class of entities that share a set of properties.
 *
 * Schemata form a multi-rooted hierarchy: each schema inherits every property
 * of each of its parents. Identity is the name alone.
 */
export class Schema {
	readonly model: SchemaRegistry;
	/** Machine-readable name, unique within the model. */
	readonly name: string;

	/** Used only for inheritance; entities of this type are never stored. */
	readonly abstract: boolean;
	/** Hidden from listings. Never set on abstract schemata. */
	readonly hidden: boolean;
	/** Entities of this type are created by the system, not by users. */
	readonly generated: boolean;
	/** Eligible for fuzzy cross-entity comparison. */
	readonly matchable: boolean;

	/** Properties shown first or in abridged views. */
	readonly featured: readonly string[];
	/** Properties that must have a value when a user creates an entity. */
	readonly required: readonly string[];
	/** Properties tried in order to build the entity's caption. */
	readonly caption: readonly string[];

	readonly edgeSource?: string;
	readonly edgeTarget?: string;
	/** True when entities of this schema render as graph edges. */
	readonly edge: boolean;
	readonly edgeCaption: readonly string[];
	/** Whether the edge has a meaningful direction. */
	readonly edgeDirected: boolean;

	/** External identifier override. */
	readonly rdf?: string;

	private readonly _label: string;
	private readonly _plural: string;
	private readonly _description?: string;
	private readonly _edgeLabel: string;
	private readonly parentNames: readonly string[];

	private readonly _extends = new Set<Schema>();
	private readonly _schemata = new Set<Schema>();
	private readonly _names = new Set<string>();
	private readonly _descendants = new Set<Schema>();
	private readonly _properties = new Map<string, Property>();
	private _matchableSchemata: ReadonlySet<Schema> | null = null;
	private state: GenerationState = "pending";

	constructor(model: SchemaRegistry, name: string, spec: SchemaSpec) {
		this.model = model;
		this.name = name;
		this._label = spec.label ?? name;
		this._plural = spec.plural ?? this._label;
		this._description = spec.description;
		this.rdf = spec.rdf;

		this.abstract = spec.abstract ?? false;
		this.hidden = (spec.hidden ?? false) && !this.abstract;
		this.generated = spec.generated ?? false;
		this.matchable = spec.matchable ?? true;

		this.featured = [...(spec.featured ?? [])];
		this.required = [...(spec.required ?? [])];
		this.caption = [...(spec.caption ?? [])];

		const edge: EdgeSpec = spec.edge ?? {};
		this.edgeSource = edge.source;
		this.edgeTarget = edge.target;
		this.edge = this.edgeSource !== undefined && this.edgeTarget !== undefined;
		this.edgeCaption = [...(edge.caption ?? [])];
		this._edgeLabel = edge.label ?? this._label;
		this.edgeDirected = edge.directed ?? true;

		this.parentNames = [...(spec.extends ?? [])];
		this._schemata.add(this);
		this._names.add(name);

		for (const [propName, propSpec] of Object.entries(spec.properties ?? {})) {
			this._properties.set(propName, new Property(this, propName, propSpec));
		}
	}

	/** User-facing name of the schema. */
	get label(): string {
		return this.model.gettext(this._label);
	}

	/** Name used in plural constructions. */
	get plural(): string {
		return this.model.gettext(this._plural);
	}

	/** A longer description of the semantics of the schema. */
	get description(): string | undefined {
		return translateOptional(this.model.gettext, this._description);
	}

	/** Label for edges derived from entities of this schema. */
	get edgeLabel(): string {
		return this.model.gettext(this._edgeLabel);
	}

	/** Direct parents, in definition order. */
	get extends(): ReadonlySet<Schema> {
		return this._extends;
	}

	/** All ancestors, including indirect ones and the schema itself. */
	get schemata(): ReadonlySet<Schema> {
		return this._schemata;
	}

	/** Names of {@link schemata}. */
	get names(): ReadonlySet<string> {
		return this._names;
	}

	/** All schemata that inherit from this one, directly or not. */
	get descendants(): ReadonlySet<Schema> {
		return this._descendants;
	}

	/** Declared and inherited properties. */
	get properties(): ReadonlyMap<string, Property> {
		return this._properties;
	}

	/** Whether {@link generate} has completed. */
	get isGenerated(): boolean {
		return this.state === "generated";
	}

	/**
	 * Resolve parents, merge inherited properties and check that every
	 * referenced property exists. A generated schema returns immediately.
	 *
	 * When two parents provide the same property name, the parent listed
	 * first in `extends` wins. Locally declared properties always win.
	 *
	 * @param trail - Schemata currently being generated, used to report cycles
	 * @throws InvalidModelError on a missing parent, a cycle or a missing property
	 */
	generate(trail: readonly string[] = []): void {
		if (this.state === "generated") {
			return;
		}
		if (this.state === "generating") {
			throw new InvalidModelError(`Circular extends: ${[...trail, this.name].join(" -> ")}`, {
				keyPath: `${this.name}.extends`,
			});
		}
		this.state = "generating";
		const path = [...trail, this.name];

		for (const parentName of this.parentNames) {
			const parent = this.model.get(parentName);
			if (parent === undefined) {
				throw new InvalidModelError(`Invalid extends: ${parentName}`, { keyPath: `${this.name}.extends` });
			}
			parent.generate(path);

			for (const [propName, prop] of parent._properties) {
				if (!this._properties.has(propName)) {
					this._properties.set(propName, prop);
				}
			}

			this._extends.add(parent);
			for (const ancestor of parent._schemata) {
				this._schemata.add(ancestor);
				this._names.add(ancestor.name);
				ancestor._descendants.add(this);
			}
		}

		for (const prop of [...this._properties.values()]) {
			prop.generate();
		}

		this.checkReferences("featured", this.featured);
		this.checkReferences("caption", this.caption);
		this.checkReferences("required", this.required);

		if (this.edge) {
			if (this.sourceProp === undefined) {
				throw new InvalidModelError(`Missing edge source: ${this.edgeSource}`, { keyPath: `${this.name}.edge.source` });
			}
			if (this.targetProp === undefined) {
				throw new InvalidModelError(`Missing edge target: ${this.edgeTarget}`, { keyPath: `${this.name}.edge.target` });
			}
		}

		this.state = "generated";
	}

	private checkReferences(kind: "featured" | "caption" | "required", names: readonly string[]): void {
		for (const name of names) {
			if (!this._properties.has(name)) {
				throw new InvalidModelError(`Missing ${kind} property: ${name}`, { keyPath: `${this.name}.${kind}` });
			}
		}
	}

	/**
	 * Find or synthesise the inverse of `other` on this schema. A new stub is
	 * also added to every descendant that lacks the name.
	 *
	 * @internal
	 * @throws InvalidModelError if the reverse has no name, or the model is frozen
	 */
	addReverse(spec: ReverseSpec, other: Property): Property {
		const name = spec.name;
		if (name === undefined) {
			throw new InvalidModelError(`Unnamed reverse: ${other.qname}`, {
				keyPath: `${other.schema.name}.properties.${other.name}.reverse`,
			});
		}

		const existing = this._properties.get(name);
		if (existing !== undefined) {
			return existing;
		}
		if (this.model.frozen) {
			throw new InvalidModelError(`Cannot add reverse property ${this.name}:${name} after loading`);
		}

		const propSpec: PropertySpec = {
			type: ENTITY_TYPE,
			range: other.schema.name,
			hidden: spec.hidden ?? other.hidden,
		};
		if (spec.label !== undefined) {
			propSpec.label = spec.label;
		}
		const prop = new Property(this, name, propSpec, { stub: true, reverse: other });
		prop.generate();
		this._properties.set(name, prop);

		for (const descendant of this._descendants) {
			if (!descendant._properties.has(name)) {
				descendant._properties.set(name, prop);
			}
		}
		return prop;
	}

	/**
	 * Compute the matchable set once; called when the model freezes.
	 *
	 * @internal
	 */
	finalise(): void {
		this._matchableSchemata = this.computeMatchableSchemata();
	}

	private computeMatchableSchemata(): ReadonlySet<Schema> {
		const result = new Set<Schema>();
		if (!this.matchable) {
			return result;
		}
		for (const schema of [...this._schemata, ...this._descendants]) {
			if (schema.matchable) {
				result.add(schema);
			}
		}
		return result;
	}

	/** The entity property used as the edge source. */
	get sourceProp(): Property | undefined {
		return this.get(this.edgeSource);
	}

	/** The entity property used as the edge target. */
	get targetProp(): Property | undefined {
		return this.get(this.edgeTarget);
	}

	/**
	 * All properties in display order: caption properties first, then
	 * featured ones, then alphabetically by label.
	 */
	get sortedProperties(): Property[] {
		const rank = (prop: Property): [number, number, string] => [
			this.caption.includes(prop.name) ? 0 : 1,
			this.featured.includes(prop.name) ? 0 : 1,
			prop.label,
		];
		return [...this._properties.values()].sort((left, right) => {
			const [lc, lf, ll] = rank(left);
			const [rc, rf, rl] = rank(right);
			return lc - rc || lf - rf || (ll < rl ? -1 : ll > rl ? 1 : 0);
		});
	}

	/**
	 * The schemata it makes sense to compare entities of this schema with:
	 * matchable ancestors and descendants, or nothing if this schema is not
	 * matchable. A company may be compared to a legal entity, but not to a
	 * vessel.
	 */
	get matchableSchemata(): ReadonlySet<Schema> {
		return this._matchableSchemata ?? this.computeMatchableSchemata();
	}

	/**
	 * Check whether entities of `other` may be matched against this schema.
	 */
	canMatch(other: Schema): boolean {
		return this.matchableSchemata.has(other);
	}

	/**
	 * Check whether this schema or one of its ancestors is `other`.
	 */
	isA(other: string | Schema): boolean {
		const schema = this.model.get(typeof other === "string" ? other : other.name);
		return schema !== undefined && this._schemata.has(schema);
	}

	/**
	 * Retrieve a declared or inherited property by name.
	 */
	get(name: string | undefined): Property | undefined {
		if (name === undefined) {
			return undefined;
		}
		return this._properties.get(name);
	}

	/**
	 * Declared properties only, including reverse stubs owned by this schema.
	 */
	*ownProperties(): IterableIterator<Property> {
		for (const prop of this._properties.values()) {
			if (prop.schema === this) {
				yield prop;
			}
		}
	}

	/**
	 * Validate property values against the merged property set.
	 *
	 * Every property is checked, so the error lists all offending properties.
	 * Keys of `properties` that are not property names are removed in place.
	 *
	 * @param properties - Values keyed by property name; single values are accepted
	 * @throws InvalidDataError carrying an error message per offending property
	 */
	validate(properties: PropertyBag): void {
		for (const key of Object.keys(properties)) {
			if (!this._properties.has(key)) {
				delete properties[key];
			}
		}

		const errors: Record<string, string> = {};
		for (const [name, prop] of this._properties) {
			const values = ensureList(Object.hasOwn(properties, name) ? properties[name] : undefined);
			let error = prop.validate(values);
			if (error === undefined && values.length === 0 && this.required.includes(name)) {
				error = this.model.gettext("Required");
			}
			if (error !== undefined) {
				errors[name] = error;
			}
		}

		if (Object.keys(errors).length > 0) {
			throw new InvalidDataError(this.model.gettext("Entity validation failed"), { errors });
		}
	}

	/**
	 * Return schema metadata in a serialisable form. Only locally owned
	 * properties are listed; inherited ones appear on their own schema.
	 */
	toDict(): SchemaToDict {
		const data: SchemaToDict = {
			label: this.label,
			plural: this.plural,
			schemata: [...this._names].sort(),
			extends: [...this._extends].map((parent) => parent.name).sort(),
			properties: {},
		};
		const edgeLabel = this.edgeLabel;
		if (this.edgeSource !== undefined && this.edgeTarget !== undefined && edgeLabel) {
			data.edge = {
				source: this.edgeSource,
				target: this.edgeTarget,
				caption: [...this.edgeCaption],
				label: edgeLabel,
				directed: this.edgeDirected,
			};
		}
		if (this.featured.length) {
			data.featured = [...this.featured];
		}
		if (this.required.length) {
			data.required = [...this.required];
		}
		if (this.caption.length) {
			data.caption = [...this.caption];
		}
		const description = this.description;
		if (description) {
			data.description = description;
		}
		if (this.abstract) {
			data.abstract = true;
		}
		if (this.hidden) {
			data.hidden = true;
		}
		if (this.generated) {
			data.generated = true;
		}
		if (this.matchable) {
			data.matchable = true;
		}
		for (const prop of this.ownProperties()) {
			data.properties[prop.name] = prop.toDict();
		}
		return data;
	}

	/**
	 * Compare by name.
	 */
	equals(other: unknown): boolean {
		return other instanceof Schema && other.name === this.name;
	}

	/**
	 * Order by name, for sorting.
	 */
	compare(other: Schema): number {
		return this.name < other.name ? -1 : this.name > other.name ? 1 : 0;
	}

	toString(): string {
		return `<Schema(${this.name})>`;
	}
}
