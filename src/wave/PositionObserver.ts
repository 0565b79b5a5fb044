/**
 * Reports the observer's position and answers hit queries for it.
 *
 * Bad fixes never throw: invalid positions give sentinel results so a
 * single corrupt reading cannot break a continuous observation.
 */

import { haversineDistance } from "./GeoUtils";
import type { LinearWave } from "./LinearWave";
import {
  formatPosition,
  isValidPosition,
  positionsEqual,
  type Position,
} from "./Position";
import type { LocationSource } from "./WaveTypes";

export class PositionObserver {
  private observing = false;

  constructor(
    private readonly source: LocationSource,
    private readonly wave: LinearWave | null = null,
  ) {}

  isValidPosition(p: Position): boolean {
    return isValidPosition(p);
  }

  /**
   * Great-circle distance in meters, or +Infinity if either position is
   * invalid.
   */
  calculateDistance(a: Position, b: Position): number {
    if (!isValidPosition(a) || !isValidPosition(b)) {
      console.warn(
        `[PositionObserver] Invalid position in distance query: ${formatPosition(a)} -> ${formatPosition(b)}`,
      );
      return Infinity;
    }
    if (positionsEqual(a, b)) return 0;
    return haversineDistance(a, b);
  }

  getCurrentPosition(): Position | null {
    return this.source.getCurrentPosition();
  }

  startObservation(): void {
    this.observing = true;
  }

  stopObservation(): void {
    this.observing = false;
  }

  isObserving(): boolean {
    return this.observing;
  }

  /** False when there is no wave or no usable position. */
  isCurrentPositionHit(now?: number): boolean {
    const p = this.getCurrentPosition();
    if (this.wave === null || p === null) return false;
    return this.wave.hasBeenHit(p, now);
  }

  currentTimeBeforeHit(now?: number): number | null {
    const p = this.getCurrentPosition();
    if (this.wave === null || p === null) return null;
    return this.wave.timeBeforeHit(p, now);
  }
}
