/**
 * Great-circle helpers
 */

export const EARTH_RADIUS_KM = 6371;
export const METERS_TO_FEET = 3.28084;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Haversine distance between two points given in decimal degrees
 * @returns Distance in kilometers
 */
export function haversineDistance(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const phi1 = toRadians(lat1);
  const phi2 = toRadians(lat2);
  const dPhi = toRadians(lat2 - lat1);
  const dLambda = toRadians(lon2 - lon1);

  const a =
    Math.sin(dPhi / 2) ** 2 +
    Math.cos(phi1) * Math.cos(phi2) * Math.sin(dLambda / 2) ** 2;

  // Rounding can push a just past 1 for antipodal points
  const c = 2 * Math.asin(Math.min(1, Math.sqrt(a)));

  return EARTH_RADIUS_KM * c;
}

/**
 * Distance from an optional position; a missing coordinate is infinitely far away
 */
export function distanceFrom(
  latitude: number | null,
  longitude: number | null,
  lat: number,
  lon: number,
): number {
  if (latitude === null || longitude === null) {
    return Infinity;
  }
  return haversineDistance(latitude, longitude, lat, lon);
}
