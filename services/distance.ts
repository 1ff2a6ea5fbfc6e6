import { EARTH_RADIUS_KM, MILES_PER_KM } from '../config';
import { CoordinatePair, DistanceRow, GeoPoint } from '../types';

const deg2rad = (deg: number) => deg * (Math.PI / 180);

// Great-circle distance in km on a spherical earth
export const haversineKm = (p1: GeoPoint, p2: GeoPoint): number => {
  const phi1 = deg2rad(p1.lat);
  const phi2 = deg2rad(p2.lat);
  const dPhi = deg2rad(p2.lat - p1.lat);
  const dLambda = deg2rad(p2.lon - p1.lon);
  // Rounding can push `a` just past 1 for antipodal points.
  const a = Math.min(
    1,
    Math.sin(dPhi / 2) * Math.sin(dPhi / 2) +
    Math.cos(phi1) * Math.cos(phi2) *
    Math.sin(dLambda / 2) * Math.sin(dLambda / 2)
  );
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS_KM * c;
};

export const kmToMiles = (km: number): number => km * MILES_PER_KM;

export const measurePair = (pair: CoordinatePair): DistanceRow => {
  const km = haversineKm(pair.a, pair.b);
  return { pair, km, miles: kmToMiles(km) };
};
