import type { Coordinate } from './types';

const EARTH_RADIUS_KM = 6371.0088;
const KM_PER_NAUTICAL_MILE = 1.852;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export const isValidLatitude = (value: number) =>
  Number.isFinite(value) && value >= -90 && value <= 90;

export const isValidLongitude = (value: number) =>
  Number.isFinite(value) && value >= -180 && value <= 180;

/** Great-circle distance in kilometers (haversine). */
export const haversineKm = (from: Coordinate, to: Coordinate): number => {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);
  const lat1 = toRadians(from.latitude);
  const lat2 = toRadians(to.latitude);

  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(a)));
};

export const kmToNauticalMiles = (km: number) => km / KM_PER_NAUTICAL_MILE;
