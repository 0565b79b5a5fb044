import { pointInPolygon, removeConsecutiveDuplicates } from "../core/util/Geometry";
import {
  isValidPosition,
  polygonsBbox,
  position,
  type BoundingBox,
  type Polygon,
  type Position,
} from "./Position";
import type { WaveArea } from "./WaveTypes";

/**
 * An area defined by a fixed list of polygons. Rings are cleaned of repeated
 * vertices; rings with fewer than three vertices are ignored.
 */
export class PolygonArea implements WaveArea {
  private readonly polygons: readonly Polygon[];
  private readonly boundingBox: BoundingBox | null;

  constructor(polygons: readonly Polygon[]) {
    this.polygons = Object.freeze(
      polygons
        .map((p) => Object.freeze(removeConsecutiveDuplicates(p)))
        .filter((p) => p.length >= 3),
    );
    this.boundingBox = polygonsBbox(this.polygons);
  }

  static fromBoundingBox(bbox: BoundingBox): PolygonArea {
    const { sw, ne } = bbox;
    return new PolygonArea([
      [sw, position(sw.lat, ne.lng), ne, position(ne.lat, sw.lng)],
    ]);
  }

  getPolygons(): readonly Polygon[] {
    return this.polygons;
  }

  isPositionWithin(p: Position): boolean {
    if (!isValidPosition(p)) return false;
    return this.polygons.some((polygon) => pointInPolygon(p, polygon));
  }

  bbox(): BoundingBox | null {
    return this.boundingBox;
  }
}
