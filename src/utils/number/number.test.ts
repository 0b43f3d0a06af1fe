/**
 * Tests for number utilities
 */

import { isFiniteNumber, isInteger } from './index';

describe('isFiniteNumber', () => {
  it('should accept finite numbers', () => {
    expect(isFiniteNumber(0)).toBe(true);
    expect(isFiniteNumber(-3.5)).toBe(true);
  });

  it('should reject non-numbers and non-finite values', () => {
    expect(isFiniteNumber('5')).toBe(false);
    expect(isFiniteNumber(null)).toBe(false);
    expect(isFiniteNumber(NaN)).toBe(false);
    expect(isFiniteNumber(Infinity)).toBe(false);
  });
});

describe('isInteger', () => {
  it('should accept integers', () => {
    expect(isInteger(20)).toBe(true);
    expect(isInteger(-5)).toBe(true);
  });

  it('should reject fractions and non-numbers', () => {
    expect(isInteger(20.5)).toBe(false);
    expect(isInteger('20')).toBe(false);
  });
});
