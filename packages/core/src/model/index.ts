/**
 * Model exports.
 */

export { Model, type ModelOptions, type ModelToDict } from "./model.js";
export { Schema, ensureList, type SchemaToDict, type EdgeToDict, type PropertyBag } from "./schema.js";
export { Property, RESERVED_PROPERTY_NAMES, type PropertyToDict, type PropertyOptions } from "./property.js";
export type { SchemaRegistry } from "./registry.js";
