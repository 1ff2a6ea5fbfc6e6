import { describe, expect, it } from 'vitest';

import { haversineKm, kmToMiles, measurePair } from '../services/distance';

describe('haversineKm', () => {
  it('measures one degree of longitude on the equator', () => {
    expect(Math.abs(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 }) - 111.19)).toBeLessThan(0.5);
    expect(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 1 })).toBeCloseTo(111.195, 2);
  });

  it('returns 0 for identical points', () => {
    expect(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 0 })).toBe(0);
    expect(haversineKm({ lat: 48.8584, lon: 2.2945 }, { lat: 48.8584, lon: 2.2945 })).toBe(0);
  });

  it('gives half the circumference for antipodal points', () => {
    const km = haversineKm({ lat: -87.5, lon: -180 }, { lat: 87.5, lon: 0 });
    expect(Number.isFinite(km)).toBe(true);
    expect(km).toBeCloseTo(Math.PI * 6371.0088, 3);
    expect(haversineKm({ lat: 0, lon: 0 }, { lat: 0, lon: 180 })).toBeCloseTo(20015.114, 2);
  });

  it('is symmetric', () => {
    const london = { lat: 51.5007, lon: -0.1246 };
    const paris = { lat: 48.8584, lon: 2.2945 };
    expect(haversineKm(london, paris)).toBeCloseTo(haversineKm(paris, london), 9);
    expect(haversineKm(london, paris)).toBeCloseTo(340.539, 2);
  });
});

describe('measurePair', () => {
  it('reports km and miles', () => {
    const row = measurePair({ a: { lat: 0, lon: 0 }, b: { lat: 0, lon: 1 } });
    expect(row.km).toBeCloseTo(111.195, 2);
    expect(row.miles).toBeCloseTo(kmToMiles(row.km), 9);
    expect(kmToMiles(100)).toBeCloseTo(62.1371, 6);
  });
});
