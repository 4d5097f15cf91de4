import { describe, it, expect } from 'vitest';
import {
  Permission,
  RestrictedAccessScope,
  createAccessScope,
  unrestrictedAccess,
} from '../../src/reflection/access.js';
import {
  getDeclaredAccessors,
  getPublicAccessor,
  invokeAccessor,
} from '../../src/reflection/accessors.js';
import { AccessDeniedError, MetadataErrorCode } from '../../src/errors.js';
import { ConstraintInstanceBuilder } from '../../src/builder/constraint-builder.js';
import { Size } from '../../src/constraints/builtin.js';

describe('RestrictedAccessScope', () => {
  it('should deny permissions outside a privileged block', () => {
    const access = new RestrictedAccessScope();
    expect(access.elevated).toBe(false);
    expect(() => access.checkPermission(Permission.READ_ATTRIBUTES)).toThrow(AccessDeniedError);
  });

  it('should grant permissions inside a privileged block', () => {
    const access = new RestrictedAccessScope();
    const result = access.runPrivileged(() => {
      access.checkPermission(Permission.CREATE_INSTANCE);
      return access.elevated;
    });
    expect(result).toBe(true);
    expect(access.elevated).toBe(false);
  });

  it('should restore the previous level after nested blocks', () => {
    const access = new RestrictedAccessScope();
    access.runPrivileged(() => {
      access.runPrivileged(() => undefined);
      expect(access.elevated).toBe(true);
    });
    expect(access.elevated).toBe(false);
  });

  it('should restore the previous level when the action throws', () => {
    const access = new RestrictedAccessScope();
    expect(() =>
      access.runPrivileged(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(access.elevated).toBe(false);
  });

  it('should name the denied permission', () => {
    const access = new RestrictedAccessScope();
    try {
      access.checkPermission(Permission.READ_ATTRIBUTES);
      expect.unreachable();
    } catch (e) {
      const err = e as AccessDeniedError;
      expect(err.code).toBe(MetadataErrorCode.ACCESS_DENIED);
      expect(err.permission).toBe('read-attributes');
    }
  });
});

describe('createAccessScope', () => {
  it('should return the pass-through scope for unrestricted mode', () => {
    expect(createAccessScope('unrestricted')).toBe(unrestrictedAccess);
    expect(() => unrestrictedAccess.checkPermission(Permission.READ_ATTRIBUTES)).not.toThrow();
  });

  it('should return a fresh restricted scope for restricted mode', () => {
    const a = createAccessScope('restricted');
    expect(a).toBeInstanceOf(RestrictedAccessScope);
    expect(createAccessScope('restricted')).not.toBe(a);
  });
});

describe('accessors', () => {
  it('should describe a declared accessor', () => {
    const min = getPublicAccessor(Size, 'min');
    expect(min?.type.name).toBe('number');
    expect(min?.defaultValue).toBe(0);
    expect(getPublicAccessor(Size, 'toString')).toBeUndefined();
  });

  it('should freeze the declared snapshot', () => {
    const accessors = getDeclaredAccessors(Size);
    expect(Object.isFrozen(accessors)).toBe(true);
    expect(accessors.every((a) => Object.isFrozen(a))).toBe(true);
  });

  it('should require read permission to invoke an accessor', () => {
    const access = new RestrictedAccessScope();
    const size = ConstraintInstanceBuilder.fromAttributes(Size, { min: 2 }).createConstraint();
    expect(() => invokeAccessor(size, 'min', access)).toThrow(AccessDeniedError);
    expect(access.runPrivileged(() => invokeAccessor(size, 'min', access))).toBe(2);
  });
});
