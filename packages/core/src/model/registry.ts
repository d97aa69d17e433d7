/**
 * @title Schema Registry
 * @description What a schema needs from the model that owns it.
 *
 * @module model
 */

import type { TypeRegistry } from "../datatypes/registry.js";
import type { Translator } from "../text.js";
import type { Schema } from "./schema.js";

/**
 * Lookup surface a schema resolves its parents and ranges through.
 */
export interface SchemaRegistry {
	/** Find a constructed schema by name. */
	get(name: string): Schema | undefined;
	/** Property types available to definitions. */
	readonly types: TypeRegistry;
	/** Translator for display text and messages. */
	readonly gettext: Translator;
	/** True once loading has finished; no property may be added afterwards. */
	readonly frozen: boolean;
}
