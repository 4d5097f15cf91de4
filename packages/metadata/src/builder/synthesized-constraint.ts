/**
 * Constraint instances synthesized from an attribute map.
 *
 * @module builder/synthesized-constraint
 */

import { SchemaViolationError, UnknownAttributeError } from '../errors.js';
import type {
  AttributeDefinitions,
  AttributeName,
  AttributeValues,
  Constraint,
  ConstraintType,
} from '../types/constraint.js';
import { isAttributeName, isConstraint, simpleName } from '../types/constraint.js';
import { describeValue } from '../types/descriptors.js';

export class SynthesizedConstraint<D extends AttributeDefinitions>
  implements Constraint<D>
{
  private readonly values: ReadonlyMap<string, unknown>;

  /**
   * @param values - one resolved value per declared accessor
   */
  constructor(
    private readonly type: ConstraintType<D>,
    values: ReadonlyMap<string, unknown>
  ) {
    this.values = new Map(
      [...values].map(([name, value]) => [
        name,
        Array.isArray(value) ? Object.freeze([...value]) : value,
      ])
    );
    Object.freeze(this);
  }

  annotationType(): ConstraintType<D> {
    return this.type;
  }

  attribute<K extends AttributeName<D>>(name: K): AttributeValues<D>[K] {
    if (!isAttributeName(this.type, name)) {
      throw new UnknownAttributeError(this.type.name, name);
    }
    const definition = this.type.attributes[name];
    const value = this.values.get(name);
    if (!definition.type.is(value)) {
      throw new SchemaViolationError(
        name,
        value,
        `Invalid '${name}' value for ${this.type.name}: ${describeValue(value)}`
      );
    }
    return value as AttributeValues<D>[K];
  }

  attributeNames(): readonly AttributeName<D>[] {
    return Object.keys(this.type.attributes).filter(
      (name): name is AttributeName<D> => isAttributeName(this.type, name)
    );
  }

  /**
   * Two constraints are equal when they share a type and every attribute
   * value is equal (arrays element-wise, nested constraints recursively).
   */
  equals(other: unknown): boolean {
    if (other === this) return true;
    if (!isConstraint(other) || other.annotationType() !== this.type) return false;
    return this.attributeNames().every((name) =>
      attributeValuesEqual(this.values.get(name), other.attribute(name))
    );
  }

  toString(): string {
    const parts = this.attributeNames().map(
      (name) => `${name}=${describeValue(this.values.get(name))}`
    );
    return `@${simpleName(this.type)}(${parts.join(', ')})`;
  }

  toJSON(): { type: string; attributes: Record<string, unknown> } {
    const attributes: Record<string, unknown> = {};
    for (const name of this.attributeNames()) {
      attributes[name] = toPlainValue(this.values.get(name));
    }
    return { type: this.type.name, attributes };
  }
}

export function attributeValuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((element, i) => attributeValuesEqual(element, b[i]));
  }
  if (isConstraint(a) && isConstraint(b)) {
    return (
      a.annotationType() === b.annotationType() &&
      a.attributeNames().every((name) => attributeValuesEqual(a.attribute(name), b.attribute(name)))
    );
  }
  return false;
}

function toPlainValue(value: unknown): unknown {
  if (typeof value === 'function') return value.name;
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (isConstraint(value)) {
    const attributes: Record<string, unknown> = {};
    for (const name of value.attributeNames()) {
      attributes[name] = toPlainValue(value.attribute(name));
    }
    return { type: value.annotationType().name, attributes };
  }
  return value;
}
