/**
 * A wavefront at one instant: longitude as a piecewise-linear function of
 * latitude.
 *
 * Equal elapsed time moves the front through different angular distances at
 * different latitudes, so the front is a curve rather than a meridian.
 * Samples are kept sorted south to north. Between samples the longitude is
 * interpolated linearly; beyond the first and last sample it is held
 * constant, so the curve extends over every latitude.
 */

import { invLerp, lerp } from "../core/util/MathUtil";
import { position, type Position } from "./Position";

export type Side = "west" | "east";

export class ComposedLongitude {
  private readonly samples: readonly Position[];

  constructor(samples: readonly Position[]) {
    if (samples.length === 0) {
      throw new Error("ComposedLongitude needs at least one sample");
    }
    this.samples = [...samples].sort((a, b) => a.lat - b.lat);
  }

  /** A straight meridian at `lng`. */
  static fromLongitude(lng: number): ComposedLongitude {
    return new ComposedLongitude([position(0, lng)]);
  }

  getPositions(): readonly Position[] {
    return this.samples;
  }

  /** Longitude of the curve at a latitude. */
  lngAt(lat: number): number {
    const s = this.samples;
    const n = s.length;
    if (n === 1 || lat <= s[0].lat) return s[0].lng;
    if (lat >= s[n - 1].lat) return s[n - 1].lng;

    // Binary search for the segment containing lat
    let lo = 0;
    let hi = n - 1;
    while (hi - lo > 1) {
      const mid = (lo + hi) >> 1;
      if (s[mid].lat <= lat) lo = mid;
      else hi = mid;
    }

    const a = s[lo];
    const b = s[hi];
    if (b.lat === a.lat) return b.lng;
    return lerp(a.lng, b.lng, invLerp(a.lat, b.lat, lat));
  }

  /**
   * Signed offset of a position from the curve, in degrees of longitude.
   * Negative or zero is west, positive is east.
   */
  offsetOf(p: Position): number {
    return p.lng - this.lngAt(p.lat);
  }

  sideOf(p: Position): Side {
    return this.offsetOf(p) > 0 ? "east" : "west";
  }

  /** Sample latitudes strictly between two latitudes, ordered from `from` to `to`. */
  latitudesBetween(from: number, to: number): number[] {
    const lo = Math.min(from, to);
    const hi = Math.max(from, to);
    const result: number[] = [];
    for (let i = this.firstIndexAbove(lo); i < this.samples.length; i++) {
      const lat = this.samples[i].lat;
      if (lat >= hi) break;
      result.push(lat);
    }
    return from <= to ? result : result.reverse();
  }

  /** Index of the first sample strictly north of `lat`. */
  private firstIndexAbove(lat: number): number {
    let lo = 0;
    let hi = this.samples.length;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (this.samples[mid].lat <= lat) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  /** Points of the curve strictly between two latitudes, ordered from `from` to `to`. */
  pointsBetween(from: number, to: number): Position[] {
    return this.latitudesBetween(from, to).map((lat) => position(lat, this.lngAt(lat)));
  }

  minLongitude(): number {
    return this.samples.reduce((min, p) => Math.min(min, p.lng), Infinity);
  }

  maxLongitude(): number {
    return this.samples.reduce((max, p) => Math.max(max, p.lng), -Infinity);
  }
}
