/**
 * Ramer-Douglas-Peucker simplification for geographic rings.
 */

import type { Polygon, Position } from "../../wave/Position";
import { clamp } from "./MathUtil";

/**
 * Perpendicular distance (degrees) from a point to a line segment.
 */
export function perpendicularDistance(
  point: Position,
  lineStart: Position,
  lineEnd: Position,
): number {
  const dx = lineEnd.lng - lineStart.lng;
  const dy = lineEnd.lat - lineStart.lat;
  const lengthSq = dx * dx + dy * dy;

  if (lengthSq === 0) {
    return Math.hypot(point.lng - lineStart.lng, point.lat - lineStart.lat);
  }

  const t =
    ((point.lng - lineStart.lng) * dx + (point.lat - lineStart.lat) * dy) / lengthSq;
  const clampedT = clamp(t, 0, 1);

  const projX = lineStart.lng + clampedT * dx;
  const projY = lineStart.lat + clampedT * dy;
  return Math.hypot(point.lng - projX, point.lat - projY);
}

/**
 * Simplify a polyline. Points closer than `tolerance` to the simplified
 * line are dropped; the endpoints are always kept.
 */
export function simplifyPolyline(
  points: readonly Position[],
  tolerance: number,
): Position[] {
  if (points.length <= 2) return [...points];

  let maxDist = -1;
  let maxIndex = 0;
  const first = points[0];
  const last = points[points.length - 1];

  for (let i = 1; i < points.length - 1; i++) {
    const dist = perpendicularDistance(points[i], first, last);
    if (dist > maxDist) {
      maxDist = dist;
      maxIndex = i;
    }
  }

  if (maxDist > tolerance) {
    const left = simplifyPolyline(points.slice(0, maxIndex + 1), tolerance);
    const right = simplifyPolyline(points.slice(maxIndex), tolerance);
    return [...left.slice(0, -1), ...right];
  }

  return [first, last];
}

/**
 * Simplify an open ring. With a tolerance of 0 this only removes vertices
 * lying exactly on the edge between their neighbours.
 */
export function simplifyRing(ring: Polygon, tolerance: number): Position[] {
  if (ring.length <= 3) return [...ring];

  const simplified = simplifyPolyline([...ring, ring[0]], tolerance);
  simplified.pop();

  return simplified.length >= 3 ? simplified : [...ring];
}
