/**
 * Built-in constraint types.
 *
 * Every type here lives in the built-in namespace, so its accessor
 * snapshot is cached process-wide.
 *
 * @module constraints/builtin
 */

import { BUILTIN_CONSTRAINT_NAMESPACE } from '../builder/accessor-cache.js';
import type { AttributeDefinitions, ConstraintType } from '../types/constraint.js';
import { attribute, defineConstraintType } from '../types/constraint.js';
import { Payload, Types } from '../types/descriptors.js';

function standardAttributes(simpleName: string) {
  return {
    message: attribute(Types.string, `{${BUILTIN_CONSTRAINT_NAMESPACE}${simpleName}.message}`),
    groups: attribute(Types.arrayOf(Types.classOf()), []),
    payload: attribute(Types.arrayOf(Types.classOf(Payload)), []),
  };
}

function builtin<D extends AttributeDefinitions>(
  simpleName: string,
  attributes: D
) {
  return defineConstraintType(`${BUILTIN_CONSTRAINT_NAMESPACE}${simpleName}`, {
    ...standardAttributes(simpleName),
    ...attributes,
  });
}

/** Container for repeating a constraint on one element. */
function list(simpleName: string) {
  return defineConstraintType(`${BUILTIN_CONSTRAINT_NAMESPACE}${simpleName}.List`, {
    value: attribute(Types.arrayOf(Types.constraint(`${BUILTIN_CONSTRAINT_NAMESPACE}${simpleName}`))),
  });
}

export const PatternFlag = {
  UNIX_LINES: 'UNIX_LINES',
  CASE_INSENSITIVE: 'CASE_INSENSITIVE',
  COMMENTS: 'COMMENTS',
  MULTILINE: 'MULTILINE',
  DOTALL: 'DOTALL',
  UNICODE_CASE: 'UNICODE_CASE',
  CANON_EQ: 'CANON_EQ',
} as const;

export type PatternFlag = (typeof PatternFlag)[keyof typeof PatternFlag];

export const NotNull = builtin('NotNull', {});
export const Null = builtin('Null', {});
export const AssertTrue = builtin('AssertTrue', {});
export const AssertFalse = builtin('AssertFalse', {});
export const Past = builtin('Past', {});
export const Future = builtin('Future', {});

export const Min = builtin('Min', {
  value: attribute(Types.number),
});

export const Max = builtin('Max', {
  value: attribute(Types.number),
});

export const DecimalMin = builtin('DecimalMin', {
  value: attribute(Types.string),
  inclusive: attribute(Types.boolean, true),
});

export const DecimalMax = builtin('DecimalMax', {
  value: attribute(Types.string),
  inclusive: attribute(Types.boolean, true),
});

export const Digits = builtin('Digits', {
  integer: attribute(Types.number),
  fraction: attribute(Types.number),
});

export const Size = builtin('Size', {
  min: attribute(Types.number, 0),
  max: attribute(Types.number, Number.MAX_SAFE_INTEGER),
});

export const Pattern = builtin('Pattern', {
  regexp: attribute(Types.string),
  flags: attribute(Types.arrayOf(Types.enumOf('Pattern.Flag', Object.values(PatternFlag))), []),
});

export const SizeList = list('Size');
export const PatternList = list('Pattern');

export const BUILTIN_CONSTRAINTS: readonly ConstraintType[] = [
  NotNull,
  Null,
  AssertTrue,
  AssertFalse,
  Past,
  Future,
  Min,
  Max,
  DecimalMin,
  DecimalMax,
  Digits,
  Size,
  Pattern,
  SizeList,
  PatternList,
];

const BY_NAME = new Map<string, ConstraintType>(
  BUILTIN_CONSTRAINTS.map((type) => [type.name, type])
);

export function getBuiltinConstraint(name: string): ConstraintType | undefined {
  return BY_NAME.get(name);
}

export function listBuiltinConstraints(): string[] {
  return BUILTIN_CONSTRAINTS.map((type) => type.name);
}
