/**
 * The well-known attributes every constraint type may carry.
 *
 * The set is closed: `message`, `groups` and `payload` are mandatory on
 * every constraint type and must declare defaults; `validationAppliesTo`
 * and the multi-valued `value` slot are optional and may omit one.
 *
 * @module attributes/registry
 */

import { ConstraintDefinitionError } from '../errors.js';
import type { ConstraintType } from '../types/constraint.js';
import {
  ConstraintTarget,
  Payload,
  Types,
  type TypeDescriptor,
} from '../types/descriptors.js';
import { AttributeKind } from './attribute-kind.js';

export const ConstraintAttributes = {
  MESSAGE: new AttributeKind('message', Types.string, false),
  GROUPS: new AttributeKind('groups', Types.arrayOf(Types.classOf()), false),
  PAYLOAD: new AttributeKind('payload', Types.arrayOf(Types.classOf(Payload)), false),
  VALIDATION_APPLIES_TO: new AttributeKind(
    'validationAppliesTo',
    Types.enumOf('ConstraintTarget', Object.values(ConstraintTarget)),
    true
  ),
  VALUE: new AttributeKind('value', Types.arrayOf(Types.constraint()), true),
} as const;

export type ConstraintAttributeKey = keyof typeof ConstraintAttributes;

const ALL_KINDS: readonly AttributeKind<unknown>[] = Object.values(ConstraintAttributes);

const BY_NAME = new Map<string, AttributeKind<unknown>>(
  ALL_KINDS.map((kind) => [kind.attributeName, kind])
);

export function attributeKinds(): readonly AttributeKind<unknown>[] {
  return ALL_KINDS;
}

export function attributeKindFor(name: string): AttributeKind<unknown> | undefined {
  return BY_NAME.get(name);
}

export function isWellKnownAttribute(name: string): boolean {
  return BY_NAME.has(name);
}

export function typeOf<T>(kind: AttributeKind<T>): TypeDescriptor<T> {
  return kind.type;
}

/**
 * Collect the contract violations of a constraint type: `message`,
 * `groups` and `payload` must be valid, and `validationAppliesTo` too
 * when declared. The `value` slot is left to multi-valued containers.
 */
export function findContractViolations(type: ConstraintType): ConstraintDefinitionError[] {
  const { MESSAGE, GROUPS, PAYLOAD, VALIDATION_APPLIES_TO } = ConstraintAttributes;
  const checks = [
    MESSAGE.analyze(type),
    GROUPS.analyze(type),
    PAYLOAD.analyze(type),
    VALIDATION_APPLIES_TO.analyze(type),
  ];
  const violations: ConstraintDefinitionError[] = [];
  for (const check of checks) {
    if (!check.error) continue;
    if (check.kind.permitsEmptyDefault && !check.accessor) continue;
    violations.push(check.error);
  }
  return violations;
}

/**
 * Reject a malformed constraint type at registration.
 *
 * @throws ConstraintDefinitionError for the first violation found
 */
export function assertConstraintContract(type: ConstraintType): void {
  const [first] = findContractViolations(type);
  if (first) throw first;
}
