import { HomeReference, RankedRelay, RelayCityRecord } from './types';

export const EARTH_RADIUS_KM = 6371;

interface Point {
  latitude: number;
  longitude: number;
}

const toRad = (deg: number): number => deg * (Math.PI / 180);

/**
 * Great-circle distance between two points (haversine), in kilometres.
 */
export function haversineDistance(from: Point, to: Point): number {
  const dLat = toRad(to.latitude - from.latitude);
  const dLon = toRad(to.longitude - from.longitude);
  const lat1 = toRad(from.latitude);
  const lat2 = toRad(to.latitude);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) * Math.sin(dLon / 2);

  return 2 * EARTH_RADIUS_KM * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Candidate list for one country, nearest first. Array#sort is stable, so
 * cities at the same distance keep their catalog order.
 */
export function rankRelays(home: HomeReference, cities: readonly RelayCityRecord[]): RankedRelay[] {
  return cities
    .map((city) => ({
      countryCode: city.countryCode,
      cityCode: city.cityCode,
      distanceKm: haversineDistance(home, city)
    }))
    .sort((a, b) => a.distanceKm - b.distanceKm);
}

export const formatDistance = (km: number): string => `${km.toFixed(1)} km`;
