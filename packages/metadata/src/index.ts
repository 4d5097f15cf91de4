/**
 * constraint-metadata
 *
 * Well-known constraint attributes, contract checks for constraint types
 * and synthesis of constraint instances from attribute maps.
 */

export * from './errors.js';
export * from './types/descriptors.js';
export * from './types/constraint.js';
export * from './attributes/attribute-kind.js';
export * from './attributes/registry.js';
export * from './reflection/access.js';
export * from './reflection/accessors.js';
export * from './builder/accessor-cache.js';
export * from './builder/constraint-builder.js';
export * from './builder/synthesized-constraint.js';
export * from './builder/markers.js';
export * from './constraints/builtin.js';
export * from './config/schema.js';
export * from './config/loader.js';
export * from './utils/logger.js';
