/**
 * Builds constraint instances from attribute values.
 *
 * Configuration loaders describe a constraint as a type plus a map of
 * attribute values rather than as a literal declaration. The builder
 * holds that map, lets callers populate or copy it, and synthesizes an
 * instance that the engine treats exactly like a literal one.
 *
 * @module builder/constraint-builder
 */

import { ConstraintAttributes, isWellKnownAttribute } from '../attributes/registry.js';
import type { AttributeMap } from '../attributes/attribute-kind.js';
import {
  ConfigurationReadError,
  InstanceCreationError,
  UnknownAttributeError,
} from '../errors.js';
import { Permission, unrestrictedAccess, type AccessScope } from '../reflection/access.js';
import { invokeAccessor, type AccessorDescriptor } from '../reflection/accessors.js';
import type {
  AttributeDefinitions,
  Constraint,
  ConstraintType,
} from '../types/constraint.js';
import { isAttributeName } from '../types/constraint.js';
import type { ClassRef, ConstraintTarget, Payload } from '../types/descriptors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { defaultAccessorCache, type AccessorCache } from './accessor-cache.js';
import { SynthesizedConstraint } from './synthesized-constraint.js';

export interface ConstraintBuilderOptions {
  /** Accessor snapshot cache; defaults to the process-wide one */
  cache?: AccessorCache;
  /** Scope for reflective reads and instance creation */
  access?: AccessScope;
  logger?: Logger;
}

export type AttributeSource = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

function entriesOf(source: AttributeSource): Iterable<[string, unknown]> {
  return source instanceof Map ? source.entries() : Object.entries(source);
}

export class ConstraintInstanceBuilder<D extends AttributeDefinitions = AttributeDefinitions> {
  private readonly elements: AttributeMap = new Map();
  private readonly accessors: readonly AccessorDescriptor[];
  private readonly access: AccessScope;
  private readonly logger: Logger;

  private constructor(
    private readonly type: ConstraintType<D>,
    options?: ConstraintBuilderOptions
  ) {
    this.accessors = (options?.cache ?? defaultAccessorCache).lookup(type);
    this.access = options?.access ?? unrestrictedAccess;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * Start from an empty attribute map.
   */
  static forType<D extends AttributeDefinitions>(
    type: ConstraintType<D>,
    options?: ConstraintBuilderOptions
  ): ConstraintInstanceBuilder<D> {
    return new ConstraintInstanceBuilder(type, options);
  }

  /**
   * Start from a copy of `attributes`; later changes to `attributes` do
   * not reach the builder.
   */
  static fromAttributes<D extends AttributeDefinitions>(
    type: ConstraintType<D>,
    attributes: AttributeSource,
    options?: ConstraintBuilderOptions
  ): ConstraintInstanceBuilder<D> {
    const builder = new ConstraintInstanceBuilder(type, options);
    for (const [name, value] of entriesOf(attributes)) {
      builder.putValue(name, value);
    }
    return builder;
  }

  /**
   * Start from the attribute values of an existing constraint.
   *
   * @throws ConfigurationReadError naming the first accessor that could not be read
   */
  static fromInstance<D extends AttributeDefinitions>(
    constraint: Constraint<D>,
    options?: ConstraintBuilderOptions
  ): ConstraintInstanceBuilder<D> {
    const type = constraint.annotationType();
    const builder = new ConstraintInstanceBuilder(type, options);
    const { access } = builder;

    for (const accessor of builder.accessors) {
      const name = accessor.name;
      if (!isAttributeName(type, name)) continue;
      let value: unknown;
      try {
        value = access.runPrivileged(() => invokeAccessor(constraint, name, access));
      } catch (error) {
        throw new ConfigurationReadError(type.name, name, error);
      }
      builder.elements.set(name, value);
    }
    return builder;
  }

  getType(): ConstraintType<D> {
    return this.type;
  }

  getAccessors(): readonly AccessorDescriptor[] {
    return this.accessors;
  }

  /**
   * @throws UnknownAttributeError when `name` is neither declared by the
   *   type nor a well-known attribute
   */
  putValue(name: string, value: unknown): void {
    if (!isAttributeName(this.type, name) && !isWellKnownAttribute(name)) {
      throw new UnknownAttributeError(this.type.name, name);
    }
    this.elements.set(name, value);
  }

  getValue(name: string): unknown {
    return this.elements.get(name);
  }

  contains(name: string): boolean {
    return this.elements.has(name);
  }

  size(): number {
    return this.elements.size;
  }

  setMessage(message: string): void {
    ConstraintAttributes.MESSAGE.put(this.elements, message);
  }

  setGroups(groups: readonly ClassRef[]): void {
    ConstraintAttributes.GROUPS.put(this.elements, groups);
  }

  setPayload(payload: readonly ClassRef<Payload>[]): void {
    ConstraintAttributes.PAYLOAD.put(this.elements, payload);
  }

  setValidationAppliesTo(target: ConstraintTarget): void {
    ConstraintAttributes.VALIDATION_APPLIES_TO.put(this.elements, target);
  }

  /**
   * Synthesize a constraint from the current attribute values. Each
   * accessor resolves to its mapped value, else to its declared default.
   *
   * @throws InstanceCreationError when an accessor has neither
   */
  createConstraint(): SynthesizedConstraint<D> {
    const values = new Map<string, unknown>();
    for (const accessor of this.accessors) {
      if (this.elements.has(accessor.name)) {
        values.set(accessor.name, this.elements.get(accessor.name));
      } else if (accessor.defaultValue !== undefined) {
        values.set(accessor.name, accessor.defaultValue);
      } else {
        throw new InstanceCreationError(
          `No value provided for ${accessor.name}() of ${this.type.name}`
        );
      }
    }

    const constraint = this.access.runPrivileged(() => this.instantiate(values));
    this.logger.debug('Synthesized constraint', {
      type: this.type.name,
      attributes: values.size,
    });
    return constraint;
  }

  private instantiate(values: ReadonlyMap<string, unknown>): SynthesizedConstraint<D> {
    try {
      this.access.checkPermission(Permission.CREATE_INSTANCE);
      return new SynthesizedConstraint(this.type, values);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InstanceCreationError(
        `Unable to create constraint for configured ${this.type.name}: ${reason}`,
        error
      );
    }
  }
}
