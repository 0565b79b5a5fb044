/**
 * Stand-ins for the wave's collaborators, shared by the wave tests.
 */

import assert from "node:assert/strict";
import { PolygonArea } from "./PolygonArea";
import { boundingBox, type Polygon } from "./Position";
import type { Clock, WaveEvent, WavePolygonsRenderer } from "./WaveTypes";

export class FakeClock implements Clock {
  constructor(public time: number = 0) {}

  now(): number {
    return this.time;
  }
}

/** Runs from `start` for `runFor` ms, as seen by `clock`. */
export class FakeEvent implements WaveEvent {
  runFor = Infinity;

  constructor(
    private readonly clock: Clock,
    readonly start: number,
  ) {}

  getStartDateTime(): number {
    return this.start;
  }

  isRunning(): boolean {
    const now = this.clock.now();
    return now >= this.start && now <= this.start + this.runFor;
  }

  isDone(): boolean {
    return this.clock.now() > this.start + this.runFor;
  }
}

export class RecordingRenderer implements WavePolygonsRenderer {
  updates: { polygons: readonly Polygon[]; refresh: boolean }[] = [];
  additions: { polygons: readonly Polygon[]; isDone: boolean }[] = [];

  updateWavePolygons(polygons: readonly Polygon[], refresh: boolean): void {
    this.updates.push({ polygons, refresh });
  }

  addWavePolygons(polygons: readonly Polygon[], isDone: boolean): void {
    this.additions.push({ polygons, isDone });
  }
}

/** The one-degree square (0, 0) - (1, 1). */
export function unitSquareArea(): PolygonArea {
  return PolygonArea.fromBoundingBox(boundingBox(0, 0, 1, 1));
}

export function assertClose(actual: number, expected: number, epsilon: number): void {
  assert.ok(
    Math.abs(actual - expected) <= epsilon,
    `expected ${actual} to be within ${epsilon} of ${expected}`,
  );
}
