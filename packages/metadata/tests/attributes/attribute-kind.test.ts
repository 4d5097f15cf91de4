import { describe, it, expect } from 'vitest';
import {
  ConstraintAttributes,
  attributeKindFor,
  attributeKinds,
  isWellKnownAttribute,
  typeOf,
} from '../../src/attributes/registry.js';
import { MetadataErrorCode, SchemaViolationError } from '../../src/errors.js';
import { ConstraintTarget, Default, Payload } from '../../src/types/descriptors.js';
import { VALID } from '../../src/builder/markers.js';

class Audit extends Payload {}

describe('ConstraintAttributes', () => {
  it('should have one kind per canonical name', () => {
    const names = attributeKinds().map((kind) => kind.attributeName);
    expect(names).toEqual(['message', 'groups', 'payload', 'validationAppliesTo', 'value']);
    expect(new Set(names).size).toBe(names.length);
  });

  it('should look kinds up by name', () => {
    expect(attributeKindFor('groups')).toBe(ConstraintAttributes.GROUPS);
    expect(attributeKindFor('min')).toBeUndefined();
    expect(isWellKnownAttribute('validationAppliesTo')).toBe(true);
    expect(isWellKnownAttribute('regexp')).toBe(false);
  });

  it('should permit empty defaults only for optional kinds', () => {
    const permitted = attributeKinds()
      .filter((kind) => kind.permitsEmptyDefault)
      .map((kind) => kind.attributeName);
    expect(permitted).toEqual(['validationAppliesTo', 'value']);
  });

  it('should expose the expected types', () => {
    expect(typeOf(ConstraintAttributes.MESSAGE).name).toBe('string');
    expect(typeOf(ConstraintAttributes.GROUPS).name).toBe('Class<?>[]');
    expect(typeOf(ConstraintAttributes.PAYLOAD).name).toBe('Class<? extends Payload>[]');
    expect(typeOf(ConstraintAttributes.VALIDATION_APPLIES_TO).name).toBe('ConstraintTarget');
    expect(typeOf(ConstraintAttributes.VALUE).name).toBe('Constraint[]');
  });
});

describe('AttributeKind put/get', () => {
  it('should round-trip a value of every kind', () => {
    const { MESSAGE, GROUPS, PAYLOAD, VALIDATION_APPLIES_TO, VALUE } = ConstraintAttributes;
    const map = new Map<string, unknown>();
    const groups = [Default];
    const payload = [Audit];
    const value = [VALID];

    MESSAGE.put(map, 'must not be blank');
    GROUPS.put(map, groups);
    PAYLOAD.put(map, payload);
    VALIDATION_APPLIES_TO.put(map, ConstraintTarget.RETURN_VALUE);
    VALUE.put(map, value);

    expect(MESSAGE.get(map)).toBe('must not be blank');
    expect(GROUPS.get(map)).toBe(groups);
    expect(PAYLOAD.get(map)).toBe(payload);
    expect(VALIDATION_APPLIES_TO.get(map)).toBe('RETURN_VALUE');
    expect(VALUE.get(map)).toBe(value);
    expect(map.get('message')).toBe('must not be blank');
  });

  it('should return the previous value from put', () => {
    const map = new Map<string, unknown>();
    expect(ConstraintAttributes.MESSAGE.put(map, 'first')).toBeUndefined();
    expect(ConstraintAttributes.MESSAGE.put(map, 'second')).toBe('first');
  });

  it('should reject a stored value of the wrong type on read', () => {
    const map = new Map<string, unknown>([['message', 42]]);
    expect(() => ConstraintAttributes.MESSAGE.get(map)).toThrow(SchemaViolationError);
    expect(() => ConstraintAttributes.MESSAGE.get(map)).toThrow("Invalid 'message' value: 42");
  });

  it('should check array components', () => {
    const map = new Map<string, unknown>([['payload', [Audit, Default]]]);
    try {
      ConstraintAttributes.PAYLOAD.get(map);
      expect.unreachable();
    } catch (e) {
      const err = e as SchemaViolationError;
      expect(err.code).toBe(MetadataErrorCode.SCHEMA_VIOLATION);
      expect(err.attributeName).toBe('payload');
      expect(err.message).toBe("Invalid 'payload' value: [class Audit, class Default]");
    }
  });

  it('should stage inconsistent values without failing on write', () => {
    const map = new Map<string, unknown>();
    map.set('groups', 'Default');
    expect(map.get('groups')).toBe('Default');
    expect(() => ConstraintAttributes.GROUPS.get(map)).toThrow(SchemaViolationError);
  });

  it('should return undefined for an absent key from get', () => {
    expect(ConstraintAttributes.GROUPS.get(new Map())).toBeUndefined();
  });

  it('should fail on an absent key from require', () => {
    expect(() => ConstraintAttributes.GROUPS.require(new Map())).toThrow("Missing 'groups' value");
    expect(ConstraintAttributes.GROUPS.require(new Map([['groups', []]]))).toEqual([]);
  });

  it('should reject an explicit undefined value', () => {
    const map = new Map<string, unknown>([['message', undefined]]);
    expect(() => ConstraintAttributes.MESSAGE.get(map)).toThrow("Invalid 'message' value: undefined");
  });
});
