/**
 * Shared wave types and the contracts of the collaborators the engine
 * consumes (area, event, clock, location source, renderer).
 */

import type { BoundingBox, Polygon, Position } from "./Position";

export type WaveDirection = "east" | "west";

/**
 * How traversed polygons accumulate between ticks:
 * - "add": append the newly traversed fragments (cheap, leaves seams)
 * - "recompose": dissolve traversed fragments into clean polygons
 */
export type WaveMode = "add" | "recompose";

export type EventStatus = "undefined" | "soon" | "running" | "done";

/**
 * Immutable snapshot of the wave at one instant.
 */
export interface WavePolygons {
  /** Epoch ms the snapshot was computed for */
  readonly timestamp: number;
  /** Front longitude at the reference (widest) latitude */
  readonly referenceLongitude: number;
  readonly traversedPolygons: readonly Polygon[];
  readonly remainingPolygons: readonly Polygon[];
  /** Fragments added this tick in "add" mode; null for full replacements */
  readonly addedTraversedPolygons: readonly Polygon[] | null;
}

/** Source of the current time in epoch ms. */
export interface Clock {
  now(): number;
}

/** The geographic area a wave sweeps. Its polygons are read-only. */
export interface WaveArea {
  getPolygons(): readonly Polygon[];
  /** Containment against the real (non-rectangular) area boundary */
  isPositionWithin(position: Position): boolean;
  bbox?(): BoundingBox | null;
}

/** The scheduled event a wave belongs to. */
export interface WaveEvent {
  isRunning(): boolean;
  isDone(): boolean;
  /** Epoch ms */
  getStartDateTime(): number;
  getStatus?(): EventStatus;
}

/** Raw device positions, or null when unavailable. */
export interface LocationSource {
  getCurrentPosition(): Position | null;
}

/** Sink for the snapshots produced by the sampler. */
export interface WavePolygonsRenderer {
  updateWavePolygons(polygons: readonly Polygon[], refresh: boolean): void;
  addWavePolygons(polygons: readonly Polygon[], isDone: boolean): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
