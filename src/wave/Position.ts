/**
 * Geographic primitives shared by the wave engine.
 *
 * Coordinates are plain degrees. Polygons are open rings: the closing vertex
 * is implied and never repeated.
 */

import {
  MAX_LATITUDE,
  MAX_LONGITUDE,
  MIN_LATITUDE,
  MIN_LONGITUDE,
} from "../config/constants";

export interface Position {
  readonly lat: number;
  readonly lng: number;
}

/** Open ring of positions (first vertex is not repeated at the end). */
export type Polygon = readonly Position[];

export interface BoundingBox {
  readonly sw: Position;
  readonly ne: Position;
}

export function position(lat: number, lng: number): Position {
  return { lat, lng };
}

/** True iff both coordinates are finite and inside the valid degree ranges. */
export function isValidPosition(p: Position): boolean {
  return (
    Number.isFinite(p.lat) &&
    Number.isFinite(p.lng) &&
    p.lat >= MIN_LATITUDE &&
    p.lat <= MAX_LATITUDE &&
    p.lng >= MIN_LONGITUDE &&
    p.lng <= MAX_LONGITUDE
  );
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.lat === b.lat && a.lng === b.lng;
}

export function boundingBox(
  swLat: number,
  swLng: number,
  neLat: number,
  neLng: number,
): BoundingBox {
  return {
    sw: position(Math.min(swLat, neLat), Math.min(swLng, neLng)),
    ne: position(Math.max(swLat, neLat), Math.max(swLng, neLng)),
  };
}

/**
 * The latitude inside the box closest to the equator, where a degree of
 * longitude spans the most ground distance.
 */
export function latitudeOfWidestPart(bbox: BoundingBox): number {
  const { sw, ne } = bbox;
  if (sw.lat <= 0 && ne.lat >= 0) return 0;
  return Math.abs(sw.lat) < Math.abs(ne.lat) ? sw.lat : ne.lat;
}

export function bboxWidth(bbox: BoundingBox): number {
  return bbox.ne.lng - bbox.sw.lng;
}

/**
 * Bounding box of a set of polygons, or null when there are no vertices.
 */
export function polygonsBbox(polygons: readonly Polygon[]): BoundingBox | null {
  let minLat = Infinity,
    minLng = Infinity,
    maxLat = -Infinity,
    maxLng = -Infinity;

  for (const polygon of polygons) {
    for (const p of polygon) {
      minLat = Math.min(minLat, p.lat);
      minLng = Math.min(minLng, p.lng);
      maxLat = Math.max(maxLat, p.lat);
      maxLng = Math.max(maxLng, p.lng);
    }
  }

  if (minLat === Infinity) return null;
  return { sw: position(minLat, minLng), ne: position(maxLat, maxLng) };
}

export function formatPosition(p: Position): string {
  return `(${p.lat}, ${p.lng})`;
}
