/**
 * Runtime type descriptors for constraint attributes.
 *
 * A constraint attribute has a declared type that must be checked at
 * runtime twice: once when a constraint type is registered (is the
 * accessor's type assignable to the well-known attribute type?) and
 * again when a value is read back from an attribute map (is this value
 * an instance of the type?). TypeScript types are erased, so each
 * attribute carries a descriptor with both a structural `shape` for
 * assignability and an `is` guard for instance checks.
 *
 * @module types/descriptors
 */

/** An abstract constructor, used for group tokens and payload classes. */
export type ClassRef<T = unknown> = abstract new (...args: never[]) => T;

/** Marker base class for constraint payloads. */
export abstract class Payload {}

/** The default validation group. */
export abstract class Default {}

export const ConstraintTarget = {
  IMPLICIT: 'IMPLICIT',
  RETURN_VALUE: 'RETURN_VALUE',
  PARAMETERS: 'PARAMETERS',
} as const;

export type ConstraintTarget = (typeof ConstraintTarget)[keyof typeof ConstraintTarget];

export type TypeShape =
  | { kind: 'string' }
  | { kind: 'number' }
  | { kind: 'boolean' }
  | { kind: 'class'; bound?: ClassRef }
  | { kind: 'enum'; name: string; values: readonly string[] }
  | { kind: 'constraint'; typeName?: string }
  | { kind: 'array'; component: TypeShape };

export interface TypeDescriptor<T = unknown> {
  readonly shape: TypeShape;
  /** Display name, e.g. `Class<? extends Payload>[]` */
  readonly name: string;
  is(value: unknown): value is T;
}

/** Structural check for constraint instances, kept here to avoid an import cycle. */
export interface ConstraintLike {
  annotationType(): { readonly name: string };
}

function isConstraintLike(value: unknown): value is ConstraintLike {
  return (
    typeof value === 'object' &&
    value !== null &&
    'annotationType' in value &&
    typeof value.annotationType === 'function' &&
    'attribute' in value &&
    typeof value.attribute === 'function'
  );
}

function isClassRef(value: unknown): value is ClassRef {
  return typeof value === 'function' && value.prototype !== undefined;
}

export function isSubclassOf(candidate: ClassRef, base: ClassRef): boolean {
  return candidate === base || candidate.prototype instanceof base;
}

export const Types = {
  string: {
    shape: { kind: 'string' },
    name: 'string',
    is: (value: unknown): value is string => typeof value === 'string',
  } satisfies TypeDescriptor<string>,

  number: {
    shape: { kind: 'number' },
    name: 'number',
    is: (value: unknown): value is number => typeof value === 'number',
  } satisfies TypeDescriptor<number>,

  boolean: {
    shape: { kind: 'boolean' },
    name: 'boolean',
    is: (value: unknown): value is boolean => typeof value === 'boolean',
  } satisfies TypeDescriptor<boolean>,

  /**
   * A class reference, optionally bounded: `classOf(Payload)` accepts
   * `Payload` and its subclasses.
   */
  classOf<T = unknown>(bound?: ClassRef<T>): TypeDescriptor<ClassRef<T>> {
    return {
      shape: { kind: 'class', bound },
      name: bound ? `Class<? extends ${bound.name}>` : 'Class<?>',
      is: (value: unknown): value is ClassRef<T> =>
        isClassRef(value) && (bound === undefined || isSubclassOf(value, bound)),
    };
  },

  enumOf<E extends string>(name: string, values: readonly E[]): TypeDescriptor<E> {
    return {
      shape: { kind: 'enum', name, values },
      name,
      is: (value: unknown): value is E => values.some((v) => v === value),
    };
  },

  /**
   * A constraint instance; `typeName` restricts it to one constraint type.
   */
  constraint(typeName?: string): TypeDescriptor<ConstraintLike> {
    return {
      shape: { kind: 'constraint', typeName },
      name: typeName ?? 'Constraint',
      is: (value: unknown): value is ConstraintLike =>
        isConstraintLike(value) &&
        (typeName === undefined || value.annotationType().name === typeName),
    };
  },

  arrayOf<E>(component: TypeDescriptor<E>): TypeDescriptor<readonly E[]> {
    return {
      shape: { kind: 'array', component: component.shape },
      name: `${component.name}[]`,
      is: (value: unknown): value is readonly E[] =>
        Array.isArray(value) && value.every((element) => component.is(element)),
    };
  },
} as const;

/**
 * Whether a value declared as `from` may be used where `to` is expected.
 */
export function isAssignable(from: TypeShape, to: TypeShape): boolean {
  switch (to.kind) {
    case 'string':
    case 'number':
    case 'boolean':
      return from.kind === to.kind;
    case 'class':
      if (from.kind !== 'class') return false;
      if (to.bound === undefined) return true;
      return from.bound !== undefined && isSubclassOf(from.bound, to.bound);
    case 'enum':
      return (
        from.kind === 'enum' &&
        from.name === to.name &&
        from.values.every((value) => to.values.includes(value))
      );
    case 'constraint':
      if (from.kind !== 'constraint') return false;
      return to.typeName === undefined || from.typeName === to.typeName;
    case 'array':
      return from.kind === 'array' && isAssignable(from.component, to.component);
  }
}

export function isArrayType(type: TypeDescriptor): boolean {
  return type.shape.kind === 'array';
}

/**
 * Render a value for error messages.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'function') return value.name ? `class ${value.name}` : 'function';
  if (Array.isArray(value)) return `[${value.map(describeValue).join(', ')}]`;
  if (isConstraintLike(value)) return String(value);
  if (typeof value === 'object') return Object.prototype.toString.call(value);
  return String(value);
}
