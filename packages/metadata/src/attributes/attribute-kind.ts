/**
 * A well-known constraint attribute and its contract check.
 *
 * @module attributes/attribute-kind
 */

import {
  ConstraintDefinitionError,
  MetadataErrorCode,
  SchemaViolationError,
  type ContractViolationCode,
} from '../errors.js';
import {
  getPublicAccessor,
  invokeAccessor,
  type AccessorDescriptor,
} from '../reflection/accessors.js';
import { unrestrictedAccess, type AccessScope } from '../reflection/access.js';
import type { AttributeDefinitions, Constraint, ConstraintType } from '../types/constraint.js';
import { isAttributeName } from '../types/constraint.js';
import {
  describeValue,
  isArrayType,
  isAssignable,
  type TypeDescriptor,
} from '../types/descriptors.js';

/** Attribute values keyed by attribute name. */
export type AttributeMap = Map<string, unknown>;

export class AttributeKind<T> {
  constructor(
    readonly attributeName: string,
    readonly type: TypeDescriptor<T>,
    readonly permitsEmptyDefault: boolean
  ) {}

  /**
   * Store `value` under this kind's name.
   *
   * @returns the previous value, if any
   */
  put(map: AttributeMap, value: T): unknown {
    const previous = map.get(this.attributeName);
    map.set(this.attributeName, value);
    return previous;
  }

  /**
   * Read this kind's value from `map`. An absent key yields `undefined`;
   * a present value of the wrong type throws `SchemaViolationError`.
   */
  get(map: ReadonlyMap<string, unknown>): T | undefined {
    if (!map.has(this.attributeName)) return undefined;
    return this.check(map.get(this.attributeName));
  }

  /**
   * Like `get`, but an absent key is a schema violation too.
   */
  require(map: ReadonlyMap<string, unknown>): T {
    if (!map.has(this.attributeName)) {
      throw new SchemaViolationError(
        this.attributeName,
        undefined,
        `Missing '${this.attributeName}' value`
      );
    }
    return this.check(map.get(this.attributeName));
  }

  analyze(constraintType: ConstraintType): ContractCheck<T> {
    return new ContractCheck(this, constraintType);
  }

  toString(): string {
    return this.attributeName;
  }

  private check(value: unknown): T {
    if (!this.type.is(value)) {
      throw new SchemaViolationError(
        this.attributeName,
        value,
        `Invalid '${this.attributeName}' value: ${describeValue(value)}`
      );
    }
    return value;
  }
}

/**
 * Result of checking one constraint type against one attribute kind.
 * The check never throws; call `valid()` to enforce it.
 */
export class ContractCheck<T> {
  readonly accessor: AccessorDescriptor | undefined;
  readonly defaultValue: unknown;
  readonly error: ConstraintDefinitionError | undefined;

  constructor(
    readonly kind: AttributeKind<T>,
    readonly constraintType: ConstraintType
  ) {
    const name = kind.attributeName;
    const accessor = getPublicAccessor(constraintType, name);
    this.accessor = accessor;
    this.defaultValue = accessor?.defaultValue;
    this.error = accessor ? this.inspect(accessor) : this.fail(
      MetadataErrorCode.MISSING_ATTRIBUTE,
      `Constraint ${constraintType.name} has no ${name}() attribute`
    );
  }

  isValid(): boolean {
    return this.error === undefined;
  }

  /**
   * @throws the stored `ConstraintDefinitionError` when the check failed
   */
  valid(): this {
    if (this.error) throw this.error;
    return this;
  }

  /**
   * Read this kind's value off a constraint instance of the checked type.
   */
  read<D extends AttributeDefinitions>(
    constraint: Constraint<D>,
    access: AccessScope = unrestrictedAccess
  ): T {
    const name = this.valid().kind.attributeName;
    if (!isAttributeName(constraint.annotationType(), name)) {
      throw new SchemaViolationError(
        name,
        undefined,
        `Constraint ${constraint.annotationType().name} has no '${name}' value`
      );
    }
    const value = access.runPrivileged(() => invokeAccessor(constraint, name, access));
    if (!this.kind.type.is(value)) {
      throw new SchemaViolationError(name, value, `Invalid '${name}' value: ${describeValue(value)}`);
    }
    return value;
  }

  private inspect(accessor: AccessorDescriptor): ConstraintDefinitionError | undefined {
    const { attributeName: name, type, permitsEmptyDefault } = this.kind;

    if (!isAssignable(accessor.type.shape, type.shape)) {
      return this.fail(
        MetadataErrorCode.INCOMPATIBLE_ATTRIBUTE_TYPE,
        `Return type for ${name}() must be of type ${type.name}, found ${accessor.type.name}`
      );
    }

    const defaultValue = accessor.defaultValue;
    if (defaultValue === undefined) {
      if (permitsEmptyDefault) return undefined;
      return this.fail(
        MetadataErrorCode.MISSING_DEFAULT,
        `Attribute ${name}() of ${this.constraintType.name} must declare a default value`
      );
    }

    if (isArrayType(type) && Array.isArray(defaultValue) && defaultValue.length > 0) {
      return this.fail(
        MetadataErrorCode.NON_EMPTY_ARRAY_DEFAULT,
        `Default value for ${name}() must be an empty array`
      );
    }
    return undefined;
  }

  private fail(
    code: ContractViolationCode,
    message: string
  ): ConstraintDefinitionError {
    return new ConstraintDefinitionError(
      code,
      this.constraintType.name,
      this.kind.attributeName,
      message
    );
  }
}
