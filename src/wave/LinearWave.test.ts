/**
 * Unit tests for wavefront tracking and hit detection.
 *
 * Run with: npx tsx --test src/wave/LinearWave.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { LinearWave } from "./LinearWave";
import { PolygonArea } from "./PolygonArea";
import { position } from "./Position";
import { assertClose, FakeClock, FakeEvent, unitSquareArea } from "./testFixtures";
import type { WaveDirection } from "./WaveTypes";

// =============================================================================
// Fixtures
// =============================================================================

const START = 1_000_000;

/** Crossing time of the unit square at 1000 m/s: one equatorial degree */
const DURATION = 111319.49079327357;

const HOUR = 3_600_000;
const DAY = 24 * HOUR;

function setup(direction: WaveDirection = "east", speed = 1000) {
  const clock = new FakeClock(START);
  const event = new FakeEvent(clock, START);
  const area = unitSquareArea();
  const wave = new LinearWave({ speed, direction }, { area, event, clock });
  return { clock, event, area, wave };
}

// =============================================================================
// Configuration
// =============================================================================

describe("LinearWave configuration", () => {
  it("rejects non-positive speeds", () => {
    const { area, event, clock } = setup();
    assert.throws(
      () => new LinearWave({ speed: 0, direction: "east" }, { area, event, clock }),
      /Invalid wave configuration/,
    );
    assert.throws(
      () => new LinearWave({ speed: -5, direction: "west" }, { area, event, clock }),
      /Invalid wave configuration/,
    );
  });

  it("fails on first use for an empty area", () => {
    const { event, clock } = setup();
    const wave = new LinearWave(
      { speed: 10, direction: "east" },
      { area: new PolygonArea([]), event, clock },
    );
    assert.throws(() => wave.getBoundingBox(), /area has no polygons/);
  });

  it("memoizes the band table", () => {
    const { wave } = setup();
    assert.equal(wave.getBands(), wave.getBands());
  });

  it("reports speeds above the limit", () => {
    assert.deepEqual(setup("east", 1000).wave.validationErrors(), [
      "LinearWave: Speed must be at most 300 m/s",
    ]);
    assert.equal(setup("east", 50).wave.validationErrors(), null);
  });
});

// =============================================================================
// Front position
// =============================================================================

describe("LinearWave front", () => {
  it("takes one equatorial degree worth of time to cross", () => {
    const { wave } = setup();
    assertClose(wave.getWaveDuration(), DURATION, 1e-6);
    assertClose(wave.getEndTime(), START + 150_000 + DURATION, 1e-6);
  });

  it("starts on the trailing edge", () => {
    assert.equal(setup("east").wave.currentWaveLongitude(0.5, START), 0);
    assert.equal(setup("west").wave.currentWaveLongitude(0.5, START), 1);
  });

  it("stays on the trailing edge before the start", () => {
    assert.equal(setup("east").wave.currentWaveLongitude(0.5, START - 5000), 0);
  });

  it("is halfway across the equator halfway through", () => {
    assertClose(setup("east").wave.currentWaveLongitude(0, START + DURATION / 2), 0.5, 1e-12);
    assertClose(setup("west").wave.currentWaveLongitude(0, START + DURATION / 2), 0.5, 1e-12);
  });

  it("runs ahead where meridians converge", () => {
    const { wave } = setup();
    const now = START + 50_000;
    assert.ok(wave.currentWaveLongitude(1, now) > wave.currentWaveLongitude(0, now));
  });

  it("moves monotonically until it reaches the far edge", () => {
    for (const direction of ["east", "west"] as const) {
      const { wave } = setup(direction);
      let previous = wave.currentWaveLongitude(0.5, START);

      for (let t = 1000; t <= 150_000; t += 1000) {
        const lng = wave.currentWaveLongitude(0.5, START + t);
        if (direction === "east") {
          assert.ok(lng >= previous);
          if (previous < 1) assert.ok(lng > previous);
        } else {
          assert.ok(lng <= previous);
          if (previous > 0) assert.ok(lng < previous);
        }
        previous = lng;
      }

      assert.equal(previous, direction === "east" ? 1 : 0);
    }
  });

  it("samples the front at the box edges and every band centre", () => {
    const { wave } = setup();
    const front = wave.composedLongitude(START);
    const samples = front.getPositions();

    assert.equal(front.getPositions().length, wave.getBands().length + 2);
    assert.equal(samples[0].lat, 0);
    assert.equal(samples[samples.length - 1].lat, 1);
    assert.ok(samples.every((p) => p.lng === 0));
  });
});

// =============================================================================
// Hits
// =============================================================================

describe("LinearWave hits", () => {
  it("hits a position near the far edge once and for good", () => {
    const { wave } = setup();
    const observer = position(0.5, 0.99);

    assert.equal(wave.hasBeenHit(observer, START), false);
    assert.equal(wave.hasBeenHit(observer, START + 100_000), false);

    let firstHit: number | null = null;
    for (let t = 0; t <= 300_000; t += 1000) {
      const hit = wave.hasBeenHit(observer, START + t);
      if (firstHit === null && hit) firstHit = t;
      if (firstHit !== null) assert.equal(hit, true);
    }
    // 0.99 degree at latitude 0.5 takes 110.2s
    assert.equal(firstHit, 111_000);
  });

  it("does not hit the trailing edge before the front moves", () => {
    const { wave } = setup();
    const onTrailingEdge = position(0.5, 0);

    assert.equal(wave.hasBeenHit(onTrailingEdge, 0), false);
    assert.equal(wave.hasBeenHit(onTrailingEdge, START), false);
    assert.equal(wave.hasBeenHit(onTrailingEdge, START + 1000), true);
  });

  it("hits westward waves from the east edge", () => {
    const { wave } = setup("west");
    const observer = position(0.5, 0.01);

    assert.equal(wave.hasBeenHit(observer, START + 110_000), false);
    assert.equal(wave.hasBeenHit(observer, START + 111_000), true);
  });

  it("never hits invalid or outside positions", () => {
    const { wave } = setup();
    const late = START + 10 * DURATION;

    assert.equal(wave.hasBeenHit(position(NaN, 0.5), late), false);
    assert.equal(wave.hasBeenHit(position(2, 0.5), late), false);
  });

  it("estimates the time before a hit", () => {
    const { wave } = setup();
    assertClose(wave.timeBeforeHit(position(0.5, 0.5), START) ?? NaN, 55657.626044, 1e-5);
  });

  it("dates the hit from the event start", () => {
    const { wave } = setup();
    const p = position(0.5, 0.5);

    assert.equal(wave.hitDateTime(p), START + (wave.timeBeforeHit(p, START) ?? NaN));
    const later = START + 20_000;
    assertClose(wave.hitDateTime(p) ?? NaN, later + (wave.timeBeforeHit(p, later) ?? NaN), 1e-6);
    assert.equal(wave.hitDateTime(position(2, 0.5)), null);
  });

  it("places positions along the direction of travel", () => {
    const p = position(0.5, 0.25);
    assert.equal(setup("east").wave.positionRatio(p), 0.25);
    assert.equal(setup("west").wave.positionRatio(p), 0.75);
    assert.equal(setup().wave.positionRatio(position(2, 0.5)), null);
  });

  it("has no hit time outside the area", () => {
    const { wave } = setup();
    assert.equal(wave.timeBeforeHit(position(2, 0.5), START), null);
    assert.equal(wave.timeBeforeHit(position(0.5, -0.5), START), null);
    assert.equal(wave.timeBeforeHit(position(0.5, 200), START), null);
  });
});

// =============================================================================
// Progression and scheduling
// =============================================================================

describe("LinearWave progression", () => {
  it("goes from 0 to 100 over the event", () => {
    const { wave, event, clock } = setup();
    event.runFor = DURATION;

    clock.time = START - 1000;
    assert.equal(wave.getProgression(), 0);

    clock.time = START + DURATION / 2;
    assertClose(wave.getProgression(), 50, 1e-6);
    assert.equal(wave.getLiteralProgression(), "50%");

    clock.time = START + DURATION + 1;
    assert.equal(wave.getProgression(), 100);
  });

  it("warms up between the start and the end of the warming phase", () => {
    const { wave } = setup();

    assert.equal(wave.isWarmingInProgress(START - 1), false);
    assert.equal(wave.isWarmingInProgress(START), false);
    assert.equal(wave.isWarmingInProgress(START + 1), true);
    assert.equal(wave.isWarmingInProgress(START + 149_999), true);
    assert.equal(wave.isWarmingInProgress(START + 150_000), false);
  });

  it("formats speed and total time", () => {
    const { wave } = setup();
    assert.equal(wave.getLiteralSpeed(), "1000 m/s");
    assert.equal(wave.getLiteralTotalTime(), "1 min");
  });

  it("observes more often as the event approaches", () => {
    const { wave, event, clock } = setup();

    assert.equal(wave.getObservationInterval(START - 2 * HOUR), HOUR);
    assert.equal(wave.getObservationInterval(START - 10 * 60_000), 5 * 60_000);
    assert.equal(wave.getObservationInterval(START - 60_000), 1000);
    assert.equal(wave.getObservationInterval(START - 10_000), 500);
    assert.equal(wave.getObservationInterval(START + 1000, position(0.5, 0.9)), 500);

    event.runFor = DURATION;
    clock.time = START + DURATION + 1;
    assert.equal(wave.getObservationInterval(), DAY);
  });

  it("observes fastest when a hit is imminent", () => {
    const { wave } = setup();
    assert.equal(wave.getObservationInterval(START - 10_000, position(0.5, 0.001)), 100);
  });
});
