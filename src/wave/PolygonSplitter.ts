/**
 * Splitting area polygons along a curved wavefront.
 *
 * The cut is a {@link ComposedLongitude}: a polyline that is a function of
 * latitude. Any point on it is identified by its latitude alone, which lets
 * us treat it like a straight cutting line parameterised by latitude:
 *
 * 1. Normalize the ring to counter-clockwise winding.
 * 2. Subdivide every edge at the curve's sample latitudes, so that each
 *    sub-edge crosses the curve at most once.
 * 3. Classify vertices as west (offset <= 0) or east, and insert a crossing
 *    node wherever consecutive vertices change side.
 * 4. Sort crossings by latitude and pair them: each pair bounds a stretch of
 *    the curve lying inside the polygon.
 * 5. Trace fragments on each side, walking the ring and jumping across each
 *    pair along the curve.
 */

import type { WaveDirection } from "./WaveTypes";
import { ensureCCW, polygonArea, removeConsecutiveDuplicates } from "../core/util/Geometry";
import { invLerp, lerp } from "../core/util/MathUtil";
import { ComposedLongitude, type Side } from "./ComposedLongitude";
import { position, type Polygon, type Position } from "./Position";

/** Fragments with a smaller area (square degrees) are dropped as slivers */
const MIN_FRAGMENT_AREA = 1e-14;

/** Crossing latitudes closer than this are treated as the same point */
const CROSSING_LAT_EPSILON = 1e-12;

export interface SplitResult {
  /** Fragments west of the cut */
  left: Polygon[];
  /** Fragments east of the cut */
  right: Polygon[];
}

export interface ClassifiedSplit {
  traversed: Polygon[];
  remaining: Polygon[];
}

type CrossingDirection = "westToEast" | "eastToWest";

interface VertexNode {
  kind: "vertex";
  p: Position;
  side: Side;
  /** Inserted by edge subdivision; dropped from the output */
  auxiliary: boolean;
}

interface CrossingNode {
  kind: "crossing";
  p: Position;
  direction: CrossingDirection;
  /** Index in the node ring */
  index: number;
  partner: CrossingNode | null;
  visited: boolean;
}

type RingNode = VertexNode | CrossingNode;

/**
 * Split a polygon along a meridian.
 */
export function splitByLongitude(polygon: Polygon, lng: number): SplitResult {
  return splitByComposedLongitude(polygon, ComposedLongitude.fromLongitude(lng));
}

/**
 * Split a polygon along a composed longitude into west (left) and east
 * (right) fragments. Vertices exactly on the cut count as west.
 */
export function splitByComposedLongitude(
  polygon: Polygon,
  cut: ComposedLongitude,
): SplitResult {
  const ring = removeConsecutiveDuplicates(polygon);
  if (ring.length < 3) return { left: [], right: [] };

  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const p of ring) {
    minLng = Math.min(minLng, p.lng);
    maxLng = Math.max(maxLng, p.lng);
  }

  // Cut entirely east or west of the polygon
  if (cut.minLongitude() >= maxLng) return { left: [ring], right: [] };
  if (cut.maxLongitude() < minLng) return { left: [], right: [ring] };

  const nodes = buildNodeRing(ensureCCW(ring), cut);
  const crossings = nodes.filter((n): n is CrossingNode => n.kind === "crossing");

  if (crossings.length === 0) {
    const westward = nodes.some((n) => n.kind === "vertex" && n.side === "west");
    return westward ? { left: [ring], right: [] } : { left: [], right: [ring] };
  }

  pairCrossings(crossings);

  return {
    left: traceFragments(nodes, crossings, "eastToWest", cut),
    right: traceFragments(nodes, crossings, "westToEast", cut),
  };
}

/**
 * Assign each side of a split to traversed / remaining for a wave direction.
 * A wave moving east has swept everything west of its front, and vice versa.
 */
export function classifySplit(
  result: SplitResult,
  direction: WaveDirection,
): ClassifiedSplit {
  return direction === "east"
    ? { traversed: result.left, remaining: result.right }
    : { traversed: result.right, remaining: result.left };
}

/**
 * Split every polygon of an area along the wavefront and gather the
 * traversed and remaining fragments.
 */
export function splitAreaToWave(
  polygons: readonly Polygon[],
  cut: ComposedLongitude,
  direction: WaveDirection,
): ClassifiedSplit {
  const traversed: Polygon[] = [];
  const remaining: Polygon[] = [];

  for (const polygon of polygons) {
    const split = classifySplit(splitByComposedLongitude(polygon, cut), direction);
    traversed.push(...split.traversed);
    remaining.push(...split.remaining);
  }

  return { traversed, remaining };
}

// ---------------------------------------------------------------------------
// Internals
// ---------------------------------------------------------------------------

function sideOfOffset(offset: number): Side {
  return offset > 0 ? "east" : "west";
}

function interpolate(a: Position, b: Position, t: number): Position {
  return position(lerp(a.lat, b.lat, t), lerp(a.lng, b.lng, t));
}

/**
 * Densify the ring at the cut's sample latitudes and insert crossing nodes.
 */
function buildNodeRing(ring: Polygon, cut: ComposedLongitude): RingNode[] {
  // Subdivided vertices with their offsets from the cut
  const points: { p: Position; offset: number; auxiliary: boolean }[] = [];
  const n = ring.length;

  for (let i = 0; i < n; i++) {
    const a = ring[i];
    const b = ring[(i + 1) % n];
    points.push({ p: a, offset: cut.offsetOf(a), auxiliary: false });

    if (a.lat !== b.lat) {
      for (const lat of cut.latitudesBetween(a.lat, b.lat)) {
        const p = interpolate(a, b, invLerp(a.lat, b.lat, lat));
        points.push({ p, offset: cut.offsetOf(p), auxiliary: true });
      }
    }
  }

  const nodes: RingNode[] = [];
  const m = points.length;

  for (let i = 0; i < m; i++) {
    const u = points[i];
    const v = points[(i + 1) % m];
    const sideU = sideOfOffset(u.offset);
    const sideV = sideOfOffset(v.offset);

    nodes.push({ kind: "vertex", p: u.p, side: sideU, auxiliary: u.auxiliary });

    if (sideU !== sideV) {
      const t = u.offset / (u.offset - v.offset);
      nodes.push({
        kind: "crossing",
        p: interpolate(u.p, v.p, t),
        direction: sideU === "west" ? "westToEast" : "eastToWest",
        index: nodes.length,
        partner: null,
        visited: false,
      });
    }
  }

  return nodes;
}

/**
 * Pair crossings along the cut.
 *
 * Going north along the cut, crossings alternate between entering and
 * leaving the polygon. For a counter-clockwise ring the entering crossing
 * runs west to east. Crossings at the same latitude are the same point, so
 * within such a group we pick whichever keeps the alternation.
 */
function pairCrossings(crossings: CrossingNode[]): void {
  const sorted = [...crossings].sort((a, b) => a.p.lat - b.p.lat || a.index - b.index);
  const ordered: CrossingNode[] = [];

  let i = 0;
  while (i < sorted.length) {
    let j = i + 1;
    while (j < sorted.length && sorted[j].p.lat - sorted[i].p.lat < CROSSING_LAT_EPSILON) {
      j++;
    }

    const group = sorted.slice(i, j);
    while (group.length > 0) {
      const expected: CrossingDirection =
        ordered.length % 2 === 0 ? "westToEast" : "eastToWest";
      const pick = group.findIndex((c) => c.direction === expected);
      ordered.push(group.splice(pick >= 0 ? pick : 0, 1)[0]);
    }
    i = j;
  }

  for (let k = 0; k + 1 < ordered.length; k += 2) {
    ordered[k].partner = ordered[k + 1];
    ordered[k + 1].partner = ordered[k];
  }
}

/**
 * Trace all fragments on one side of the cut.
 *
 * @param entering - Crossing direction that enters the side being traced
 */
function traceFragments(
  nodes: RingNode[],
  crossings: CrossingNode[],
  entering: CrossingDirection,
  cut: ComposedLongitude,
): Polygon[] {
  for (const c of crossings) c.visited = false;

  const fragments: Polygon[] = [];
  const n = nodes.length;

  for (const start of crossings) {
    if (start.direction !== entering || start.visited) continue;

    const ring: Position[] = [];
    let current: CrossingNode = start;
    let guard = 0;

    while (guard++ <= n) {
      current.visited = true;
      ring.push(current.p);

      // Walk the ring until the side is left again
      let i = (current.index + 1) % n;
      let exit: CrossingNode | null = null;
      while (i !== current.index) {
        const node = nodes[i];
        if (node.kind === "crossing") {
          exit = node;
          break;
        }
        if (!node.auxiliary) ring.push(node.p);
        i = (i + 1) % n;
      }

      if (!exit || !exit.partner) break;
      exit.visited = true;
      ring.push(exit.p);

      // Follow the cut back to the paired crossing
      const next = exit.partner;
      ring.push(...cut.pointsBetween(exit.p.lat, next.p.lat));

      if (next === start || next.visited) break;
      current = next;
    }

    const cleaned = removeConsecutiveDuplicates(ring);
    if (cleaned.length >= 3 && polygonArea(cleaned) > MIN_FRAGMENT_AREA) {
      fragments.push(cleaned);
    }
  }

  return fragments;
}
