/**
 * Geographic Utilities Unit Tests
 *
 * Haversine distances are cross-checked against turf.
 */

import { describe, it, expect } from 'vitest';
import * as turf from '@turf/turf';
import {
  cumulativeDistances,
  haversineDistance,
  isValidCoordinate,
  speedKmh,
  type GeoPoint,
} from '../../../core/geo-utils.js';

const PARIS: GeoPoint = { lat: 48.8566, lon: 2.3522 };
const LYON: GeoPoint = { lat: 45.764, lon: 4.8357 };
const BREST: GeoPoint = { lat: 48.3904, lon: -4.4861 };

function turfDistance(a: GeoPoint, b: GeoPoint): number {
  return turf.distance(turf.point([a.lon, a.lat]), turf.point([b.lon, b.lat]), { units: 'meters' });
}

describe('haversineDistance', () => {
  it('measures one degree of latitude as about 111.195 km', () => {
    expect(haversineDistance({ lat: 0, lon: 0 }, { lat: 1, lon: 0 })).toBeCloseTo(111195.08, 1);
  });

  it('is zero for identical points', () => {
    expect(haversineDistance(PARIS, PARIS)).toBe(0);
  });

  it('is symmetric', () => {
    expect(haversineDistance(PARIS, LYON)).toBeCloseTo(haversineDistance(LYON, PARIS), 9);
  });

  it('satisfies the triangle inequality', () => {
    expect(haversineDistance(PARIS, BREST)).toBeLessThanOrEqual(
      haversineDistance(PARIS, LYON) + haversineDistance(LYON, BREST)
    );
  });

  it('agrees with turf', () => {
    expect(haversineDistance(PARIS, LYON)).toBeCloseTo(turfDistance(PARIS, LYON), 3);
    expect(haversineDistance(LYON, BREST)).toBeCloseTo(turfDistance(LYON, BREST), 3);
  });

  it('stays finite for antipodal points', () => {
    const distance = haversineDistance({ lat: 0, lon: 0 }, { lat: 0, lon: 180 });
    expect(distance).toBeCloseTo(Math.PI * 6_371_008.8, 3);
  });
});

describe('cumulativeDistances', () => {
  it('starts at zero and adds each leg', () => {
    const result = cumulativeDistances([PARIS, LYON, BREST]);

    expect(result).toHaveLength(3);
    expect(result[0]).toBe(0);
    expect(result[1]).toBeCloseTo(haversineDistance(PARIS, LYON), 6);
    expect(result[2]).toBeCloseTo(haversineDistance(PARIS, LYON) + haversineDistance(LYON, BREST), 6);
  });

  it('is empty for no points', () => {
    expect(cumulativeDistances([])).toEqual([]);
  });
});

describe('speedKmh', () => {
  it('converts meters per second to km/h', () => {
    expect(speedKmh(1000, 36)).toBeCloseTo(100, 9);
    expect(speedKmh(500, 60)).toBeCloseTo(30, 9);
  });
});

describe('isValidCoordinate', () => {
  it('accepts the WGS84 range, bounds included', () => {
    expect(isValidCoordinate(90, 180)).toBe(true);
    expect(isValidCoordinate(-90, -180)).toBe(true);
  });

  it('rejects out of range and non-finite values', () => {
    expect(isValidCoordinate(90.5, 0)).toBe(false);
    expect(isValidCoordinate(0, -181)).toBe(false);
    expect(isValidCoordinate(Number.NaN, 0)).toBe(false);
  });
});
