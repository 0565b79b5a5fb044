/**
 * Geometry utilities.
 *
 * Provides common planar algorithms on geographic rings, treating longitude
 * as x and latitude as y.
 */

import type { Polygon, Position } from "../../wave/Position";

/**
 * Ray casting algorithm for point-in-polygon test.
 *
 * Tests whether a point lies inside a polygon by casting a ray
 * toward the east and counting edge crossings.
 *
 * @param point - The point to test
 * @param polygon - Open ring of vertices
 * @returns True if the point is inside the polygon
 */
export function pointInPolygon(point: Position, polygon: Polygon): boolean {
  const n = polygon.length;
  if (n < 3) return false;

  let inside = false;

  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = polygon[i].lng,
      yi = polygon[i].lat;
    const xj = polygon[j].lng,
      yj = polygon[j].lat;

    if (
      yi > point.lat !== yj > point.lat &&
      point.lng < ((xj - xi) * (point.lat - yi)) / (yj - yi) + xi
    ) {
      inside = !inside;
    }
  }

  return inside;
}

/**
 * Signed area of a ring in square degrees (shoelace formula).
 * Positive = counter-clockwise with latitude pointing up.
 */
export function computeSignedArea(polygon: Polygon): number {
  const n = polygon.length;
  if (n < 3) return 0;

  let area = 0;
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    area += polygon[i].lng * polygon[j].lat;
    area -= polygon[j].lng * polygon[i].lat;
  }

  return area / 2;
}

export function polygonArea(polygon: Polygon): number {
  return Math.abs(computeSignedArea(polygon));
}

/** Sum of the unsigned areas of a set of rings. */
export function totalArea(polygons: readonly Polygon[]): number {
  let sum = 0;
  for (const polygon of polygons) {
    sum += polygonArea(polygon);
  }
  return sum;
}

/**
 * Return the ring with counter-clockwise winding, reversing it if needed.
 */
export function ensureCCW(polygon: Polygon): Polygon {
  return computeSignedArea(polygon) < 0 ? [...polygon].reverse() : polygon;
}

/**
 * Drop repeated consecutive vertices, including a closing vertex equal to
 * the first one.
 */
export function removeConsecutiveDuplicates(polygon: Polygon): Position[] {
  const cleaned: Position[] = [];
  for (const p of polygon) {
    const last = cleaned[cleaned.length - 1];
    if (!last || last.lat !== p.lat || last.lng !== p.lng) {
      cleaned.push(p);
    }
  }
  while (cleaned.length > 1) {
    const first = cleaned[0];
    const last = cleaned[cleaned.length - 1];
    if (first.lat !== last.lat || first.lng !== last.lng) break;
    cleaned.pop();
  }
  return cleaned;
}
