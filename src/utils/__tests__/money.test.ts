import { describe, it, expect } from 'vitest';
import { formatMinorUnits, roundHalfUp, toMinorUnits } from '../money';

describe('money', () => {
  describe('roundHalfUp', () => {
    it('should round halves up', () => {
      expect(roundHalfUp(2.5)).toBe(3);
      expect(roundHalfUp(1850.5)).toBe(1851);
    });

    it('should round below half down', () => {
      expect(roundHalfUp(2.4999)).toBe(2);
    });
  });

  describe('toMinorUnits', () => {
    it('should convert dollars to cents', () => {
      expect(toMinorUnits(18.5, 2)).toBe(1850);
      expect(toMinorUnits(16, 2)).toBe(1600);
    });

    it('should treat binary representation noise as the intended half', () => {
      // 1.005 * 100 === 100.49999999999999 in floating point
      expect(toMinorUnits(1.005, 2)).toBe(101);
      expect(toMinorUnits(0.125, 2)).toBe(13);
    });

    it('should round sub-cent remainders below half down', () => {
      expect(toMinorUnits(18.504, 2)).toBe(1850);
    });

    it('should accept a custom rounding policy', () => {
      expect(toMinorUnits(18.509, 2, Math.floor)).toBe(1850);
    });

    it('should handle currencies without minor units', () => {
      expect(toMinorUnits(1234.5, 0)).toBe(1235);
    });
  });

  describe('formatMinorUnits', () => {
    it('should render cents as a decimal string', () => {
      expect(formatMinorUnits(1850, 2)).toBe('18.50');
      expect(formatMinorUnits(5, 2)).toBe('0.05');
      expect(formatMinorUnits(0, 2)).toBe('0.00');
    });

    it('should render negative amounts', () => {
      expect(formatMinorUnits(-5, 2)).toBe('-0.05');
    });

    it('should render whole units when there is no minor unit', () => {
      expect(formatMinorUnits(1234, 0)).toBe('1234');
    });
  });
});
