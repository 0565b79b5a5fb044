/**
 * Unit tests for geodetic helpers and the position model.
 *
 * Run with: npx tsx --test src/wave/GeoUtils.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  calculateDistance,
  calculateDistanceAccurate,
  haversineDistance,
  metersPerDegreeLongitude,
  metersToLongitudeDelta,
  normalizeLongitude,
} from "./GeoUtils";
import {
  boundingBox,
  isValidPosition,
  latitudeOfWidestPart,
  polygonsBbox,
  position,
} from "./Position";

/** Ground length of one degree on the equator */
const DEGREE_AT_EQUATOR = 111319.49079327357;

function assertClose(actual: number, expected: number, epsilon: number) {
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    `expected ${actual} to be within ${epsilon} of ${expected}`,
  );
}

describe("calculateDistance", () => {
  it("measures one degree on the equator", () => {
    assertClose(calculateDistance(0, 1, 0), DEGREE_AT_EQUATOR, 1e-6);
  });

  it("shrinks with the cosine of the latitude", () => {
    assertClose(calculateDistance(1, 0, 60), DEGREE_AT_EQUATOR / 2, 1e-6);
  });

  it("propagates NaN without throwing", () => {
    assert.ok(Number.isNaN(calculateDistance(NaN, 1, 0)));
  });

  it("is slightly longer than the great-circle distance for wide spans", () => {
    const flat = calculateDistance(0, 90, 45);
    const accurate = calculateDistanceAccurate(0, 90, 45);
    assert.ok(accurate < flat);
  });
});

describe("haversineDistance", () => {
  it("is zero for identical positions", () => {
    assert.equal(haversineDistance(position(12, 34), position(12, 34)), 0);
  });

  it("matches the equatorial degree length", () => {
    assertClose(haversineDistance(position(0, 0), position(0, 1)), DEGREE_AT_EQUATOR, 1e-6);
  });
});

describe("longitude conversions", () => {
  it("converts meters to degrees and back", () => {
    assertClose(metersPerDegreeLongitude(0), DEGREE_AT_EQUATOR, 1e-6);
    assertClose(metersToLongitudeDelta(DEGREE_AT_EQUATOR, 0), 1, 1e-12);
  });

  it("wraps longitudes into [-180, 180)", () => {
    assert.equal(normalizeLongitude(190), -170);
    assert.equal(normalizeLongitude(180), -180);
    assert.equal(normalizeLongitude(-180), -180);
    assert.equal(normalizeLongitude(45), 45);
  });
});

describe("isValidPosition", () => {
  it("accepts the range limits", () => {
    assert.equal(isValidPosition(position(0, 0)), true);
    assert.equal(isValidPosition(position(90, 180)), true);
    assert.equal(isValidPosition(position(-90, -180)), true);
  });

  it("rejects out-of-range and non-finite coordinates", () => {
    assert.equal(isValidPosition(position(90.0001, 0)), false);
    assert.equal(isValidPosition(position(0, -180.5)), false);
    assert.equal(isValidPosition(position(NaN, 0)), false);
    assert.equal(isValidPosition(position(0, Infinity)), false);
  });
});

describe("bounding boxes", () => {
  it("normalizes corners", () => {
    assert.deepEqual(boundingBox(1, 2, -1, -2), {
      sw: position(-1, -2),
      ne: position(1, 2),
    });
  });

  it("finds the latitude closest to the equator", () => {
    assert.equal(latitudeOfWidestPart(boundingBox(-10, 0, 20, 1)), 0);
    assert.equal(latitudeOfWidestPart(boundingBox(30, 0, 50, 1)), 30);
    assert.equal(latitudeOfWidestPart(boundingBox(-50, 0, -30, 1)), -30);
  });

  it("covers every vertex of a polygon set", () => {
    const bbox = polygonsBbox([
      [position(0, 0), position(1, 2), position(0, 2)],
      [position(-3, 5), position(-2, 6), position(-3, 6)],
    ]);
    assert.deepEqual(bbox, { sw: position(-3, 0), ne: position(1, 6) });
    assert.equal(polygonsBbox([]), null);
  });
});
