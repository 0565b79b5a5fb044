/**
 * Unit tests for latitude band subdivision.
 *
 * Run with: npx tsx --test src/wave/WaveBands.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MAX_BANDS } from "../config/constants";
import { boundingBox } from "./Position";
import { bandCenter, calculateBands, lonBandWidthAtLatitude } from "./WaveBands";

const unitBox = boundingBox(0, 0, 1, 1);

// 10 m at 50 m/s
const REFRESH_MS = 200;

describe("calculateBands", () => {
  it("tiles the box from south to north without gaps", () => {
    const bands = calculateBands(unitBox, 50, REFRESH_MS);

    assert.ok(bands.length > 0);
    assert.ok(bands.length <= MAX_BANDS);
    assert.equal(bands[0].latitude, 0);

    for (let i = 1; i < bands.length; i++) {
      const previous = bands[i - 1];
      assert.ok(Math.abs(previous.latitude + previous.latWidth - bands[i].latitude) < 1e-12);
    }

    const last = bands[bands.length - 1];
    assert.ok(Math.abs(last.latitude + last.latWidth - 1) < 1e-9);
  });

  it("widens the longitude step away from the equator", () => {
    const bands = calculateBands(unitBox, 50, REFRESH_MS);

    assert.ok(Math.abs(bands[0].lngWidth - lonBandWidthAtLatitude(0, 50, REFRESH_MS)) < 1e-15);
    for (let i = 1; i < bands.length; i++) {
      assert.ok(bands[i].lngWidth >= bands[i - 1].lngWidth);
      assert.ok(bands[i].lngWidth <= 1);
    }
  });

  it("caps the longitude step at the box width", () => {
    const bands = calculateBands(boundingBox(0, 0, 1, 0.0001), 50, 60_000);
    for (const band of bands) {
      assert.equal(band.lngWidth, 0.0001);
    }
  });

  it("honours the minimum band width", () => {
    const bands = calculateBands(unitBox, 50, REFRESH_MS, { minBandWidth: 0.5 });
    assert.deepEqual(
      bands.map((b) => b.latitude),
      [0, 0.5],
    );
    assert.equal(bandCenter(bands[1]), 0.75);
  });

  it("stops at the band cap", () => {
    const bands = calculateBands(unitBox, 50, REFRESH_MS, { maxBands: 5 });
    assert.equal(bands.length, 5);
  });

  it("rejects invalid configurations", () => {
    assert.throws(() => calculateBands(unitBox, 0, REFRESH_MS), /Invalid wave configuration/);
    assert.throws(() => calculateBands(unitBox, -3, REFRESH_MS), /Invalid wave configuration/);
    assert.throws(() => calculateBands(unitBox, NaN, REFRESH_MS), /Invalid wave configuration/);
    assert.throws(() => calculateBands(unitBox, 50, 0), /Invalid wave configuration/);
  });

  it("rejects a box with no height", () => {
    assert.throws(
      () => calculateBands(boundingBox(1, 0, 1, 1), 50, REFRESH_MS),
      /no latitude bands/,
    );
  });
});
