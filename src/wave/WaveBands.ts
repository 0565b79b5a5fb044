/**
 * Latitude band subdivision for a wave's bounding box.
 *
 * A degree of longitude shrinks toward the poles, so a front moving at a
 * constant ground speed covers more degrees per second at high latitudes.
 * Each band records the longitude width the front crosses during one refresh
 * window at that band's latitude, which keeps the perceived speed uniform.
 */

import {
  COORDINATE_EPSILON,
  MAX_BANDS,
  MIN_BAND_WIDTH,
  MIN_PERCEPTIBLE_DISTANCE,
} from "../config/constants";
import { clamp } from "../core/util/MathUtil";
import {
  metersPerDegreeLongitude,
  metersToLongitudeDelta,
  toRadians,
} from "./GeoUtils";
import { bboxWidth, latitudeOfWidestPart, type BoundingBox } from "./Position";

export interface LatLonBand {
  /** Southern edge of the band (degrees) */
  latitude: number;
  /** Height of the band (degrees) */
  latWidth: number;
  /** Longitude crossed during one refresh window inside this band (degrees) */
  lngWidth: number;
}

export interface BandOptions {
  /** Smallest band height in degrees, default: 0.001 */
  minBandWidth?: number;
  /** Hard cap on the number of bands, default: 20000 */
  maxBands?: number;
  /** Ground distance driving the latitude step, default: 10000 m */
  minPerceptibleDistance?: number;
}

/**
 * Longitude width swept during one refresh window at a latitude.
 */
export function lonBandWidthAtLatitude(
  latitude: number,
  speed: number,
  refreshIntervalMs: number,
): number {
  return metersToLongitudeDelta((speed * refreshIntervalMs) / 1000, latitude);
}

/**
 * Widen a reference longitude width for a band further from the equator.
 */
export function adjustLongitudeWidthAtLatitude(
  latitude: number,
  lonWidthAtReference: number,
): number {
  return lonWidthAtReference / Math.cos(toRadians(latitude));
}

/**
 * Latitude step at which the change in longitude width becomes perceptible.
 */
export function optimalLatBandWidth(
  latitude: number,
  minPerceptibleDistance: number = MIN_PERCEPTIBLE_DISTANCE,
): number {
  return minPerceptibleDistance / metersPerDegreeLongitude(latitude);
}

/**
 * Split a bounding box into latitude bands, south to north.
 *
 * Throws when the configuration cannot produce any band: non-positive speed
 * or refresh interval, or a degenerate box.
 */
export function calculateBands(
  bbox: BoundingBox,
  speed: number,
  refreshIntervalMs: number,
  options: BandOptions = {},
): LatLonBand[] {
  if (!(speed > 0) || !Number.isFinite(speed)) {
    throw new Error(
      `Invalid wave configuration: speed must be a positive number (got ${speed})`,
    );
  }
  if (!(refreshIntervalMs > 0)) {
    throw new Error(
      `Invalid wave configuration: refresh interval must be positive (got ${refreshIntervalMs}ms)`,
    );
  }

  const minBandWidth = options.minBandWidth ?? MIN_BAND_WIDTH;
  const maxBands = options.maxBands ?? MAX_BANDS;
  const minPerceptibleDistance =
    options.minPerceptibleDistance ?? MIN_PERCEPTIBLE_DISTANCE;

  const { sw, ne } = bbox;
  const referenceLat = latitudeOfWidestPart(bbox);
  const lonWidthAtReference = lonBandWidthAtLatitude(
    referenceLat,
    speed,
    refreshIntervalMs,
  );
  const boxWidth = bboxWidth(bbox);

  const bands: LatLonBand[] = [];
  let lat = sw.lat;
  while (lat < ne.lat - COORDINATE_EPSILON && bands.length < maxBands) {
    const remaining = ne.lat - lat;
    const step = clamp(
      Math.max(optimalLatBandWidth(lat, minPerceptibleDistance), minBandWidth),
      0,
      remaining,
    );
    const lngWidth = Math.min(
      adjustLongitudeWidthAtLatitude(lat, lonWidthAtReference),
      boxWidth,
    );

    bands.push({ latitude: lat, latWidth: step, lngWidth });
    lat += step;
  }

  if (bands.length === 0) {
    throw new Error(
      `Invalid wave configuration: no latitude bands for box ` +
        `[${sw.lat}, ${sw.lng}] → [${ne.lat}, ${ne.lng}]`,
    );
  }

  return bands;
}

/** Representative latitude of a band (its centre). */
export function bandCenter(band: LatLonBand): number {
  return band.latitude + band.latWidth / 2;
}
