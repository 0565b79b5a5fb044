/**
 * Builds successive wave snapshots.
 *
 * Each snapshot is derived from the previous one: only the polygons that
 * were still remaining get split by the new front, and the newly traversed
 * fragments join the traversed set. This assumes the front only moves
 * forward; a wave that reversed would need the traversed side re-split too.
 */

import type { LinearWave } from "./LinearWave";
import { splitAreaToWave } from "./PolygonSplitter";
import { recomposeCutPolygons } from "./PolygonRecompose";
import { latitudeOfWidestPart, type Polygon } from "./Position";
import type { WaveMode, WavePolygons } from "./WaveTypes";

export class WaveStateAccumulator {
  constructor(readonly wave: LinearWave) {}

  /**
   * Compute the snapshot at `now`.
   *
   * @param areaPolygons - Full area, split when there is no previous snapshot
   * @param lastState - Previous snapshot of the same chain, if any
   * @throws if the event is not running or `lastState` is newer than `now`
   */
  getWavePolygons(
    areaPolygons: readonly Polygon[],
    lastState: WavePolygons | null,
    mode: WaveMode,
    now: number = this.wave.clock.now(),
  ): WavePolygons {
    if (!this.wave.event.isRunning()) {
      throw new Error("Wave polygons requested while the event is not running");
    }
    if (lastState && lastState.timestamp > now) {
      throw new Error(
        `Previous wave state (${lastState.timestamp}) is newer than the requested time (${now})`,
      );
    }

    const bbox = this.wave.getBoundingBox();
    const referenceLongitude = this.wave.currentWaveLongitude(latitudeOfWidestPart(bbox), now);
    const front = this.wave.composedLongitude(now);

    const source = lastState ? lastState.remainingPolygons : areaPolygons;
    const split = splitAreaToWave(source, front, this.wave.direction);

    let traversed: Polygon[] = split.traversed;
    let added: Polygon[] | null = null;
    if (lastState) {
      if (mode === "add") {
        traversed = [...lastState.traversedPolygons, ...split.traversed];
        added = split.traversed.length > 0 ? split.traversed : null;
      } else {
        traversed = recomposeCutPolygons([...lastState.traversedPolygons, ...split.traversed]);
      }
    }

    return Object.freeze({
      timestamp: now,
      referenceLongitude,
      traversedPolygons: Object.freeze(traversed),
      remainingPolygons: Object.freeze(split.remaining),
      addedTraversedPolygons: added && Object.freeze(added),
    });
  }
}
