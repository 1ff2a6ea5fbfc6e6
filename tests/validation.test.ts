import { describe, expect, it } from 'vitest';

import { isValidLatLon, parseCoordinate } from '../services/validation';

describe('isValidLatLon', () => {
  it('accepts the inclusive WGS84 bounds', () => {
    expect(isValidLatLon(90, 180)).toBe(true);
    expect(isValidLatLon(-90, -180)).toBe(true);
    expect(isValidLatLon(90, -180)).toBe(true);
    expect(isValidLatLon(0, 0)).toBe(true);
  });

  it('rejects values just outside the bounds', () => {
    expect(isValidLatLon(90.0000001, 0)).toBe(false);
    expect(isValidLatLon(-90.0000001, 0)).toBe(false);
    expect(isValidLatLon(0, 180.0001)).toBe(false);
    expect(isValidLatLon(0, -180.0001)).toBe(false);
  });

  it('rejects NaN', () => {
    expect(isValidLatLon(Number.NaN, 0)).toBe(false);
    expect(isValidLatLon(0, Number.NaN)).toBe(false);
  });
});

describe('parseCoordinate', () => {
  it('parses decimal notation', () => {
    expect(parseCoordinate('45.5')).toBe(45.5);
    expect(parseCoordinate(' -93 ')).toBe(-93);
    expect(parseCoordinate('+12')).toBe(12);
    expect(parseCoordinate('.5')).toBe(0.5);
    expect(parseCoordinate('5.')).toBe(5);
    expect(parseCoordinate('1e2')).toBe(100);
  });

  it('returns null for anything else', () => {
    expect(parseCoordinate('')).toBeNull();
    expect(parseCoordinate('   ')).toBeNull();
    expect(parseCoordinate('abc')).toBeNull();
    expect(parseCoordinate('0x10')).toBeNull();
    expect(parseCoordinate('12abc')).toBeNull();
    expect(parseCoordinate('Infinity')).toBeNull();
    expect(parseCoordinate(undefined)).toBeNull();
  });
});
