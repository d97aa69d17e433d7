/**
 * Property type exports.
 */

export { BasicType, type BasicTypeOptions, type PropertyType, type PropertyTypeToDict } from "./property-type.js";
export { TypeRegistry, builtinTypes, ENTITY_TYPE, DEFAULT_TYPE } from "./registry.js";
