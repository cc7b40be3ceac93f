import { describe, it, expect } from 'vitest';
import {
  named,
  bound,
  symbolName,
  symbolsEqual,
  compareSymbols,
  formatSymbol
} from '../../src/ir/Symbol.js';

describe('Symbol', () => {
  it('should create named symbols', () => {
    expect(named('theta')).toEqual({ kind: 'named', name: 'theta' });
  });

  it('should return the name regardless of variant', () => {
    expect(symbolName(named('phi'))).toBe('phi');
    expect(symbolName(bound('phi', 1))).toBe('phi');
  });

  it('should format named and bound symbols', () => {
    expect(formatSymbol(named('theta'))).toBe('theta');
    expect(formatSymbol(bound('theta', 0.5))).toBe('theta=0.5');
  });

  describe('equality', () => {
    it('should never equate a bound symbol with a named one', () => {
      expect(symbolsEqual(named('a'), bound('a', 1))).toBe(false);
      expect(symbolsEqual(bound('a', 1), named('a'))).toBe(false);
    });

    it('should compare every field', () => {
      expect(symbolsEqual(named('a'), named('a'))).toBe(true);
      expect(symbolsEqual(named('a'), named('b'))).toBe(false);
      expect(symbolsEqual(bound('a', 1), bound('a', 1))).toBe(true);
      expect(symbolsEqual(bound('a', 1), bound('a', 2))).toBe(false);
      expect(symbolsEqual(bound('a', 1), bound('b', 1))).toBe(false);
    });
  });

  describe('ordering', () => {
    it('should rank named before bound', () => {
      expect(compareSymbols(named('z'), bound('a', 0))).toBe(-1);
      expect(compareSymbols(bound('a', 0), named('z'))).toBe(1);
    });

    it('should order by name, then value', () => {
      expect(compareSymbols(named('a'), named('b'))).toBe(-1);
      expect(compareSymbols(bound('b', 0), bound('a', 9))).toBe(1);
      expect(compareSymbols(bound('a', 2), bound('a', 1))).toBe(1);
      expect(compareSymbols(named('a'), named('a'))).toBe(0);
    });

    it('should treat NaN values as equal to each other', () => {
      expect(compareSymbols(bound('a', NaN), bound('a', NaN))).toBe(0);
      expect(symbolsEqual(bound('a', NaN), bound('a', NaN))).toBe(true);
    });
  });
});
