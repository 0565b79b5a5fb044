/**
 * Geodetic helpers on a spherical Earth.
 *
 * All functions are total: NaN and Infinity propagate to the result and
 * nothing throws. Callers check validity first where it matters.
 */

import { EARTH_RADIUS } from "../config/constants";
import { degToRad, radToDeg } from "../core/util/MathUtil";
import type { Position } from "./Position";

export const toRadians = degToRad;
export const toDegrees = radToDeg;

/** Wrap a longitude into [-180, 180). */
export function normalizeLongitude(lng: number): number {
  return ((((lng + 180) % 360) + 360) % 360) - 180;
}

/**
 * East-west distance in meters between two longitudes at a latitude,
 * treating the Earth as locally flat along that parallel.
 */
export function calculateDistance(lng1: number, lng2: number, lat: number): number {
  const dLng = toRadians(lng2 - lng1);
  return Math.abs(EARTH_RADIUS * dLng * Math.cos(toRadians(lat)));
}

/**
 * Great-circle distance between two longitudes on the same parallel.
 * Slightly shorter than {@link calculateDistance} for wide spans.
 */
export function calculateDistanceAccurate(
  lng1: number,
  lng2: number,
  lat: number,
): number {
  const cosLat = Math.cos(toRadians(lat));
  const halfDLng = Math.sin(toRadians(lng2 - lng1) / 2);
  const a = cosLat * cosLat * halfDLng * halfDLng;
  return EARTH_RADIUS * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/** Haversine distance between two positions in meters. */
export function haversineDistance(a: Position, b: Position): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;
  return EARTH_RADIUS * 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - Math.min(1, h)));
}

/** Ground length of one degree of longitude at a latitude. */
export function metersPerDegreeLongitude(lat: number): number {
  return EARTH_RADIUS * Math.cos(toRadians(lat)) * (Math.PI / 180);
}

/** Longitude span (degrees) covered by `meters` along a parallel. */
export function metersToLongitudeDelta(meters: number, lat: number): number {
  return toDegrees(meters / (EARTH_RADIUS * Math.cos(toRadians(lat))));
}
