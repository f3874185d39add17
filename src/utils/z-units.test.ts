import { describe, it, expect } from '@jest/globals';
import { detectZUnit, normalizeZ, ticksToMillimeters } from './z-units';

describe('z-units', () => {
  it('converts motor ticks to millimeters', () => {
    expect(ticksToMillimeters(6400)).toBe(1);
    expect(ticksToMillimeters(3200)).toBe(0.5);
  });

  it('detects the unit by magnitude', () => {
    expect(detectZUnit(150)).toBe('mm');
    expect(detectZUnit(1000)).toBe('mm');
    expect(detectZUnit(15_000)).toBe('um');
    expect(detectZUnit(15_000_000)).toBe('nm');
    expect(detectZUnit(1e12)).toBe('um');
  });

  it('normalizes to millimeters', () => {
    expect(normalizeZ(12.5)).toBe(12.5);
    expect(normalizeZ(15_000)).toBe(15);
    expect(normalizeZ(15_000_000)).toBe(15);
    expect(normalizeZ(-2000)).toBe(-2);
  });
});
