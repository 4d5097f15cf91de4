/**
 * Hand-written constraint instances for the two marker types the engine
 * uses on almost every cascaded property.
 *
 * @module builder/markers
 */

import { UnknownAttributeError } from '../errors.js';
import type { AttributeValues, Constraint } from '../types/constraint.js';
import { attribute, defineConstraintType } from '../types/constraint.js';
import { Types, type ClassRef } from '../types/descriptors.js';

/** Marks a property for cascaded validation. */
export const Valid = defineConstraintType('validation.Valid', {});

type ValidAttributes = (typeof Valid)['attributes'];

export class ValidConstraint implements Constraint<ValidAttributes> {
  static readonly INSTANCE = new ValidConstraint();

  private constructor() {}

  annotationType(): typeof Valid {
    return Valid;
  }

  attribute(name: never): never {
    throw new UnknownAttributeError(Valid.name, String(name));
  }

  attributeNames(): readonly never[] {
    return [];
  }

  toString(): string {
    return '@Valid()';
  }
}

export const VALID = ValidConstraint.INSTANCE;

/** Converts the validated group when cascading. */
export const ConvertGroup = defineConstraintType('validation.groups.ConvertGroup', {
  from: attribute(Types.classOf()),
  to: attribute(Types.classOf()),
});

type ConvertGroupAttributes = (typeof ConvertGroup)['attributes'];

export class ConvertGroupConstraint implements Constraint<ConvertGroupAttributes> {
  private readonly values: AttributeValues<ConvertGroupAttributes>;

  constructor(from: ClassRef, to: ClassRef) {
    this.values = Object.freeze({ from, to });
  }

  annotationType(): typeof ConvertGroup {
    return ConvertGroup;
  }

  from(): ClassRef {
    return this.values.from;
  }

  to(): ClassRef {
    return this.values.to;
  }

  attribute<K extends keyof ConvertGroupAttributes>(
    name: K
  ): AttributeValues<ConvertGroupAttributes>[K] {
    return this.values[name];
  }

  attributeNames(): readonly (keyof ConvertGroupAttributes)[] {
    return ['from', 'to'];
  }

  toString(): string {
    return `@ConvertGroup(from=${this.values.from.name}, to=${this.values.to.name})`;
  }
}
