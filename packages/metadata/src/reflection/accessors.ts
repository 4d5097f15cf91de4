/**
 * Accessor lookup on constraint types.
 *
 * @module reflection/accessors
 */

import type {
  AttributeDefinitions,
  AttributeName,
  Constraint,
  ConstraintType,
} from '../types/constraint.js';
import { isAttributeName } from '../types/constraint.js';
import type { TypeDescriptor } from '../types/descriptors.js';
import { Permission, type AccessScope } from './access.js';

export interface AccessorDescriptor {
  readonly name: string;
  readonly type: TypeDescriptor;
  /** `undefined` when the accessor declares no default */
  readonly defaultValue: unknown;
}

/**
 * Snapshot every accessor a constraint type declares, in declaration order.
 */
export function getDeclaredAccessors(type: ConstraintType): readonly AccessorDescriptor[] {
  const accessors = Object.entries(type.attributes).map(([name, definition]) =>
    Object.freeze({ name, type: definition.type, defaultValue: definition.defaultValue })
  );
  return Object.freeze(accessors);
}

export function getPublicAccessor(
  type: ConstraintType,
  name: string
): AccessorDescriptor | undefined {
  if (!isAttributeName(type, name)) return undefined;
  const definition = type.attributes[name];
  return { name, type: definition.type, defaultValue: definition.defaultValue };
}

/**
 * Invoke one accessor on a constraint instance. Requires the
 * `read-attributes` permission from `access`.
 */
export function invokeAccessor<D extends AttributeDefinitions>(
  constraint: Constraint<D>,
  name: AttributeName<D>,
  access: AccessScope
): unknown {
  access.checkPermission(Permission.READ_ATTRIBUTES);
  return constraint.attribute(name);
}
