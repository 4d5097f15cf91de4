import { describe, it, expect } from 'vitest';
import {
  BUILTIN_CONSTRAINTS,
  DecimalMin,
  Pattern,
  PatternFlag,
  Size,
  SizeList,
  getBuiltinConstraint,
  listBuiltinConstraints,
} from '../../src/constraints/builtin.js';
import { findContractViolations, ConstraintAttributes } from '../../src/attributes/registry.js';
import { AccessorCache } from '../../src/builder/accessor-cache.js';
import { ConstraintInstanceBuilder } from '../../src/builder/constraint-builder.js';

describe('built-in constraints', () => {
  it('should all satisfy the well-known attribute contract', () => {
    const listTypes = new Set([SizeList.name, `${Pattern.name}.List`]);
    for (const type of BUILTIN_CONSTRAINTS) {
      if (listTypes.has(type.name)) continue;
      expect(findContractViolations(type), type.name).toEqual([]);
    }
  });

  it('should all live in the cached namespace', () => {
    const cache = new AccessorCache();
    expect(BUILTIN_CONSTRAINTS.every((type) => cache.isCacheable(type))).toBe(true);
  });

  it('should look types up by qualified name', () => {
    expect(getBuiltinConstraint('validation.constraints.Size')).toBe(Size);
    expect(getBuiltinConstraint('Size')).toBeUndefined();
    expect(listBuiltinConstraints()).toContain('validation.constraints.Pattern.List');
    expect(listBuiltinConstraints()).toHaveLength(15);
  });

  it('should declare per-constraint message keys', () => {
    expect(ConstraintAttributes.MESSAGE.analyze(DecimalMin).defaultValue).toBe(
      '{validation.constraints.DecimalMin.message}'
    );
  });

  it('should require the regexp of a Pattern', () => {
    const builder = ConstraintInstanceBuilder.forType(Pattern);
    expect(() => builder.createConstraint()).toThrow('No value provided for regexp()');
    builder.putValue('regexp', '^[a-z]+$');
    builder.putValue('flags', [PatternFlag.CASE_INSENSITIVE]);
    const pattern = builder.createConstraint();
    expect(pattern.attribute('regexp')).toBe('^[a-z]+$');
    expect(pattern.attribute('flags')).toEqual(['CASE_INSENSITIVE']);
  });

  it('should hold repeated constraints in a List', () => {
    const short = ConstraintInstanceBuilder.fromAttributes(Size, { max: 5 }).createConstraint();
    const long = ConstraintInstanceBuilder.fromAttributes(Size, { min: 50 }).createConstraint();
    const list = ConstraintInstanceBuilder.fromAttributes(SizeList, { value: [short, long] })
      .createConstraint();
    expect(ConstraintAttributes.VALUE.analyze(SizeList).read(list)).toEqual([short, long]);
    expect(String(list)).toBe(
      `@List(value=[${String(short)}, ${String(long)}])`
    );
  });

  it('should reject foreign constraints in a List on read', () => {
    const pattern = ConstraintInstanceBuilder.fromAttributes(Pattern, { regexp: 'x' })
      .createConstraint();
    const list = ConstraintInstanceBuilder.fromAttributes(SizeList, { value: [pattern] })
      .createConstraint();
    expect(() => list.attribute('value')).toThrow("Invalid 'value' value");
  });
});
