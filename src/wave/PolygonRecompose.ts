/**
 * Recomposition of cut polygons.
 *
 * Successive wave ticks leave traversed fragments that share seams along
 * earlier wavefronts. Fragments cut from the same ring share the exact seam
 * vertices, so adjoining fragments can be dissolved by cancelling directed
 * edges that appear in both directions and re-linking what is left.
 */

import {
  computeSignedArea,
  ensureCCW,
  polygonArea,
  removeConsecutiveDuplicates,
} from "../core/util/Geometry";
import { simplifyRing } from "../core/util/Simplify";
import type { Polygon, Position } from "./Position";

/** Perpendicular distance (degrees) under which seam leftovers are dropped */
const COLLINEAR_TOLERANCE = 1e-12;

const MIN_RING_AREA = 1e-14;

interface Edge {
  from: Position;
  to: Position;
  used: boolean;
}

function pointKey(p: Position): string {
  return `${p.lat},${p.lng}`;
}

function edgeKey(from: Position, to: Position): string {
  return `${pointKey(from)}|${pointKey(to)}`;
}

/**
 * Dissolve adjoining polygons into as few polygons as possible.
 *
 * Returns the input unchanged when the edges cannot be re-linked into
 * clean counter-clockwise rings, or when dissolving would not reduce the
 * polygon count.
 */
export function recomposeCutPolygons(polygons: readonly Polygon[]): Polygon[] {
  const rings = polygons
    .map((p) => ensureCCW(removeConsecutiveDuplicates(p)))
    .filter((r) => r.length >= 3);
  if (rings.length <= 1) return rings;

  // Multiset of directed edges
  const counts = new Map<string, number>();
  for (const ring of rings) {
    for (let i = 0; i < ring.length; i++) {
      const key = edgeKey(ring[i], ring[(i + 1) % ring.length]);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }

  // Keep only the edges not matched by an opposite twin
  const outgoing = new Map<string, Edge[]>();
  let edgeCount = 0;
  for (const ring of rings) {
    for (let i = 0; i < ring.length; i++) {
      const from = ring[i];
      const to = ring[(i + 1) % ring.length];
      const reverseKey = edgeKey(to, from);
      const reverseCount = counts.get(reverseKey) ?? 0;
      if (reverseCount > 0) {
        counts.set(reverseKey, reverseCount - 1);
        const key = edgeKey(from, to);
        counts.set(key, (counts.get(key) ?? 1) - 1);
        continue;
      }
      if ((counts.get(edgeKey(from, to)) ?? 0) <= 0) continue;

      const list = outgoing.get(pointKey(from)) ?? [];
      list.push({ from, to, used: false });
      outgoing.set(pointKey(from), list);
      edgeCount++;
    }
  }

  const linked = linkRings(outgoing, edgeCount);
  if (!linked) {
    console.warn("[PolygonRecompose] Could not re-link cut polygons, keeping them as-is");
    return rings;
  }

  const result: Polygon[] = [];
  for (const ring of linked) {
    const simplified = simplifyRing(removeConsecutiveDuplicates(ring), COLLINEAR_TOLERANCE);
    if (simplified.length < 3 || polygonArea(simplified) <= MIN_RING_AREA) continue;
    if (computeSignedArea(simplified) < 0) {
      // A clockwise ring would be a hole, which a flat polygon list cannot express
      return rings;
    }
    result.push(simplified);
  }

  return result.length <= rings.length ? result : rings;
}

/**
 * Chain directed edges into closed rings. Returns null if an edge leads
 * to a vertex with no unused outgoing edge.
 */
function linkRings(
  outgoing: Map<string, Edge[]>,
  edgeCount: number,
): Position[][] | null {
  const rings: Position[][] = [];
  let used = 0;

  for (const edges of outgoing.values()) {
    for (const first of edges) {
      if (first.used) continue;

      const ring: Position[] = [];
      const startKey = pointKey(first.from);
      let edge: Edge = first;

      for (;;) {
        edge.used = true;
        used++;
        ring.push(edge.from);

        if (pointKey(edge.to) === startKey) break;

        const candidates = outgoing.get(pointKey(edge.to));
        const next = candidates?.find((e) => !e.used);
        if (!next) return null;
        edge = next;
      }

      rings.push(ring);
    }
  }

  return used === edgeCount ? rings : null;
}
