/**
 * Process-wide cache of accessor snapshots.
 *
 * Only constraint types from allow-listed namespaces are cached. Types
 * defined at configuration-load time are unbounded in number and would
 * otherwise stay reachable for the life of the process.
 *
 * @module builder/accessor-cache
 */

import {
  getDeclaredAccessors,
  type AccessorDescriptor,
} from '../reflection/accessors.js';
import type { ConstraintType } from '../types/constraint.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const BUILTIN_CONSTRAINT_NAMESPACE = 'validation.constraints.';

export interface AccessorCacheOptions {
  /** Qualified-name prefixes whose types may be cached */
  namespaces?: readonly string[];
  /** When false, every lookup scans the type afresh */
  enabled?: boolean;
  logger?: Logger;
}

export class AccessorCache {
  private readonly entries = new Map<ConstraintType, readonly AccessorDescriptor[]>();
  private readonly namespaces: readonly string[];
  private readonly enabled: boolean;
  private readonly logger: Logger;

  constructor(options?: AccessorCacheOptions) {
    this.namespaces = options?.namespaces ?? [BUILTIN_CONSTRAINT_NAMESPACE];
    this.enabled = options?.enabled ?? true;
    this.logger = options?.logger ?? silentLogger;
  }

  isCacheable(type: ConstraintType): boolean {
    return this.enabled && this.namespaces.some((ns) => type.name.startsWith(ns));
  }

  /**
   * Accessor snapshot for `type`. For cacheable types the first stored
   * snapshot wins and is returned to every later caller.
   */
  lookup(type: ConstraintType): readonly AccessorDescriptor[] {
    if (!this.isCacheable(type)) {
      return getDeclaredAccessors(type);
    }
    const cached = this.entries.get(type);
    if (cached) return cached;

    const winner = this.putIfAbsent(type, getDeclaredAccessors(type));
    this.logger.debug('Cached constraint accessors', {
      type: type.name,
      accessors: winner.length,
    });
    return winner;
  }

  has(type: ConstraintType): boolean {
    return this.entries.has(type);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private putIfAbsent(
    type: ConstraintType,
    snapshot: readonly AccessorDescriptor[]
  ): readonly AccessorDescriptor[] {
    const existing = this.entries.get(type);
    if (existing) return existing;
    this.entries.set(type, snapshot);
    return snapshot;
  }
}

export const defaultAccessorCache = new AccessorCache();
