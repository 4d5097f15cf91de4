/**
 * Constraint types and the attribute-backed declaration consumed by the
 * rest of the engine.
 *
 * A constraint type is the capability interface of a constraint: a
 * qualified name plus one accessor definition per attribute, each with
 * its declared type and optional default.
 *
 * @module types/constraint
 */

import type { TypeDescriptor } from './descriptors.js';

export interface AttributeDefinition<T = unknown> {
  readonly type: TypeDescriptor<T>;
  /** Declared default; `undefined` means the accessor declares none. */
  readonly defaultValue?: T;
}

export type AttributeDefinitions = Readonly<Record<string, AttributeDefinition>>;

export type AttributeName<D extends AttributeDefinitions> = keyof D & string;

export type AttributeValues<D extends AttributeDefinitions> = {
  [K in keyof D]: D[K] extends AttributeDefinition<infer T> ? T : never;
};

export interface ConstraintType<D extends AttributeDefinitions = AttributeDefinitions> {
  /** Dotted qualified name, e.g. `validation.constraints.Size` */
  readonly name: string;
  readonly attributes: D;
}

/**
 * A constraint declaration. Literal declarations, synthesized instances
 * and the static markers all implement this one interface.
 */
export interface Constraint<D extends AttributeDefinitions = AttributeDefinitions> {
  annotationType(): ConstraintType<D>;
  attribute<K extends AttributeName<D>>(name: K): AttributeValues<D>[K];
  attributeNames(): readonly AttributeName<D>[];
}

export function attribute<T>(type: TypeDescriptor<T>, defaultValue?: T): AttributeDefinition<T> {
  return defaultValue === undefined ? { type } : { type, defaultValue };
}

export function defineConstraintType<D extends AttributeDefinitions>(
  name: string,
  attributes: D
): ConstraintType<D> {
  Object.freeze(attributes);
  return Object.freeze({ name, attributes });
}

export function isAttributeName<D extends AttributeDefinitions>(
  type: ConstraintType<D>,
  name: string
): name is AttributeName<D> {
  return Object.prototype.hasOwnProperty.call(type.attributes, name);
}

export function isConstraint(value: unknown): value is Constraint {
  return (
    typeof value === 'object' &&
    value !== null &&
    'annotationType' in value &&
    typeof value.annotationType === 'function' &&
    'attribute' in value &&
    typeof value.attribute === 'function' &&
    'attributeNames' in value &&
    typeof value.attributeNames === 'function'
  );
}

/**
 * Simple name of a constraint type: `validation.constraints.Size` -> `Size`.
 */
export function simpleName(type: ConstraintType): string {
  const dot = type.name.lastIndexOf('.');
  return dot === -1 ? type.name : type.name.slice(dot + 1);
}
