import { describe, it, expect } from 'vitest';
import { distanceFrom, EARTH_RADIUS_KM, haversineDistance } from '../distance';

describe('distance', () => {
  describe('haversineDistance', () => {
    it('should be zero between a point and itself', () => {
      expect(haversineDistance(37.748, 14.999, 37.748, 14.999)).toBe(0);
    });

    it('should measure half the circumference between antipodal points', () => {
      const distance = haversineDistance(0, 0, 0, 180);
      expect(Math.abs(distance - 20015)).toBeLessThanOrEqual(1);
      expect(distance).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
    });

    it('should handle antipodes off the equator', () => {
      const distance = haversineDistance(37.748, 14.999, -37.748, -165.001);
      expect(Math.abs(distance - 20015)).toBeLessThanOrEqual(1);
    });

    it('should be symmetric', () => {
      const there = haversineDistance(37.748, 14.999, 40.821, 14.426);
      const back = haversineDistance(40.821, 14.426, 37.748, 14.999);
      expect(there).toBeCloseTo(back, 9);
    });

    it('should measure one degree of latitude as about 111 km', () => {
      expect(haversineDistance(0, 0, 1, 0)).toBeCloseTo((Math.PI / 180) * EARTH_RADIUS_KM, 6);
    });
  });

  describe('distanceFrom', () => {
    it('should be infinite without coordinates', () => {
      expect(distanceFrom(null, 14.999, 0, 0)).toBe(Infinity);
      expect(distanceFrom(37.748, null, 0, 0)).toBe(Infinity);
    });

    it('should match haversineDistance with coordinates', () => {
      expect(distanceFrom(10, 20, 11, 21)).toBe(haversineDistance(10, 20, 11, 21));
    });
  });
});
