// Tests for boundary validation schemas

import { describe, it, expect } from 'vitest';
import { validateValueInput, ValueSchema } from './values.js';
import { isValidName } from './names.js';
import { isSnapshotDocument } from './snapshot.js';

describe('validateValueInput', () => {
  it('should accept tagged values of every kind', () => {
    expect(validateValueInput({ kind: 'string', value: 'abc' }).valid).toBe(true);
    expect(validateValueInput({ kind: 'boolean', value: false }).valid).toBe(true);
    expect(validateValueInput({ kind: 'integer', value: -12 }).valid).toBe(true);
    expect(validateValueInput({ kind: 'float', value: 0.5 }).valid).toBe(true);
  });

  it('should accept native scalars', () => {
    const result = validateValueInput(42);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value).toBe(42);
    }
  });

  it('should accept non-finite floats', () => {
    expect(validateValueInput({ kind: 'float', value: Number.NaN }).valid).toBe(true);
    expect(validateValueInput({ kind: 'float', value: Number.NEGATIVE_INFINITY }).valid).toBe(true);
    expect(validateValueInput(Number.NaN).valid).toBe(true);
  });

  it('should reject a fractional integer value', () => {
    expect(ValueSchema.safeParse({ kind: 'integer', value: 1.5 }).success).toBe(false);
  });

  it('should reject an integer outside the safe range', () => {
    expect(
      ValueSchema.safeParse({ kind: 'integer', value: Number.MAX_SAFE_INTEGER + 2 }).success
    ).toBe(false);
  });

  it('should reject unknown kinds and non-scalars', () => {
    expect(validateValueInput({ kind: 'decimal', value: 1 }).valid).toBe(false);
    expect(validateValueInput(null).valid).toBe(false);
    expect(validateValueInput(['a']).valid).toBe(false);
  });

  it('should report errors for invalid input', () => {
    const result = validateValueInput({ kind: 'string', value: 3 });

    expect(result.valid).toBe(false);
    expect(result.errors.length).toBeGreaterThan(0);
  });
});

describe('isValidName', () => {
  it('should accept names with visible characters', () => {
    expect(isValidName('score')).toBe(true);
    expect(isValidName('  padded  ')).toBe(true);
  });

  it('should reject empty and whitespace-only names', () => {
    expect(isValidName('')).toBe(false);
    expect(isValidName('   ')).toBe(false);
    expect(isValidName('\t\n')).toBe(false);
  });

  it('should reject non-strings', () => {
    expect(isValidName(7)).toBe(false);
    expect(isValidName(undefined)).toBe(false);
  });
});

describe('isSnapshotDocument', () => {
  it('should accept a flat object of strings', () => {
    expect(isSnapshotDocument({ AppName: 'App', IntValue: '1' })).toBe(true);
    expect(isSnapshotDocument({})).toBe(true);
  });

  it('should reject numbers, booleans and nesting', () => {
    expect(isSnapshotDocument({ IntValue: 1 })).toBe(false);
    expect(isSnapshotDocument({ DebugEnabled: false })).toBe(false);
    expect(isSnapshotDocument({ Variables: { a: '1' } })).toBe(false);
  });
});
