import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ComposedLongitude } from "./ComposedLongitude";
import { position } from "./Position";

describe("ComposedLongitude", () => {
  const curve = new ComposedLongitude([position(10, 20), position(0, 10)]);

  it("sorts samples south to north", () => {
    assert.deepEqual(curve.getPositions(), [position(0, 10), position(10, 20)]);
  });

  it("interpolates between samples and holds beyond them", () => {
    assert.equal(curve.lngAt(5), 15);
    assert.equal(curve.lngAt(-5), 10);
    assert.equal(curve.lngAt(15), 20);
  });

  it("puts points on the curve on the west side", () => {
    assert.equal(curve.offsetOf(position(5, 15)), 0);
    assert.equal(curve.sideOf(position(5, 15)), "west");
    assert.equal(curve.sideOf(position(5, 15.5)), "east");
  });

  it("lists sample latitudes strictly between two latitudes", () => {
    const stairs = new ComposedLongitude([0, 1, 2, 3].map((lat) => position(lat, lat)));
    assert.deepEqual(stairs.latitudesBetween(0.5, 2.5), [1, 2]);
    assert.deepEqual(stairs.latitudesBetween(2.5, 0.5), [2, 1]);
    assert.deepEqual(stairs.latitudesBetween(1, 2), []);
    assert.deepEqual(stairs.pointsBetween(2.5, 1.5), [position(2, 2)]);
  });

  it("finds latitudes inside a dense curve", () => {
    const dense = new ComposedLongitude(
      Array.from({ length: 20_000 }, (_, i) => position(i, 0)),
    );
    assert.deepEqual(dense.latitudesBetween(10.5, 13.5), [11, 12, 13]);
    assert.deepEqual(dense.latitudesBetween(19_998, 30_000), [19_999]);
    assert.deepEqual(dense.latitudesBetween(-5, 0), []);
  });

  it("treats a single sample as a meridian", () => {
    const meridian = ComposedLongitude.fromLongitude(7);
    assert.equal(meridian.lngAt(-80), 7);
    assert.equal(meridian.lngAt(80), 7);
    assert.equal(meridian.minLongitude(), 7);
    assert.equal(meridian.maxLongitude(), 7);
  });

  it("needs at least one sample", () => {
    assert.throws(() => new ComposedLongitude([]), /at least one sample/);
  });
});
