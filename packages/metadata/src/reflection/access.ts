/**
 * Access scopes for reflective operations.
 *
 * Reading attribute values off an existing constraint and constructing a
 * synthesized one are reflective operations. Hosts that run untrusted
 * constraint definitions can supply a restricted scope: reflective
 * permissions are then granted only inside `runPrivileged`. Without one,
 * the unrestricted scope makes every check a pass-through.
 *
 * @module reflection/access
 */

import { AccessDeniedError } from '../errors.js';

export const Permission = {
  READ_ATTRIBUTES: 'read-attributes',
  CREATE_INSTANCE: 'create-instance',
} as const;

export type Permission = (typeof Permission)[keyof typeof Permission];

export interface AccessScope {
  /** Whether the current call stack runs with elevated access. */
  readonly elevated: boolean;
  runPrivileged<T>(action: () => T): T;
  /** Throws `AccessDeniedError` when `permission` is not granted. */
  checkPermission(permission: Permission): void;
}

export const unrestrictedAccess: AccessScope = {
  elevated: false,
  runPrivileged: (action) => action(),
  checkPermission: () => {},
};

/**
 * Denies reflective permissions outside a privileged block.
 */
export class RestrictedAccessScope implements AccessScope {
  private depth = 0;

  get elevated(): boolean {
    return this.depth > 0;
  }

  runPrivileged<T>(action: () => T): T {
    this.depth++;
    try {
      return action();
    } finally {
      this.depth--;
    }
  }

  checkPermission(permission: Permission): void {
    if (!this.elevated) {
      throw new AccessDeniedError(permission);
    }
  }
}

export type AccessMode = 'unrestricted' | 'restricted';

export function createAccessScope(mode: AccessMode): AccessScope {
  return mode === 'restricted' ? new RestrictedAccessScope() : unrestrictedAccess;
}
