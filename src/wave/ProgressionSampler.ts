/**
 * Turns a noisy progression signal into wave snapshots at a bounded rate.
 *
 * Upstream calls {@link ProgressionSampler.notifyProgression} as often as it
 * likes; the sampling loop computes at most one snapshot per interval and
 * pushes its traversed polygons to the renderer.
 */

import { WAVE_SAMPLING_INTERVAL_MS } from "../config/constants";
import { timerScheduler, type TickScheduler } from "../core/util/TickScheduler";
import type { Polygon } from "./Position";
import type { WaveStateAccumulator } from "./WaveStateAccumulator";
import type {
  Clock,
  EventStatus,
  WaveArea,
  WaveMode,
  WavePolygons,
  WavePolygonsRenderer,
} from "./WaveTypes";

export interface ProgressionSamplerOptions {
  /** Minimum time between two snapshots, default: 250 ms */
  intervalMs?: number;
  mode?: WaveMode;
  scheduler?: TickScheduler;
  clock?: Clock;
}

export class ProgressionSampler {
  private readonly intervalMs: number;
  private readonly mode: WaveMode;
  private readonly scheduler: TickScheduler;
  private readonly clock: Clock;

  private status: EventStatus = "undefined";
  private controller: AbortController | null = null;
  private pending = false;
  private lastSnapshot: WavePolygons | null = null;
  /** Last non-empty traversed set pushed to the renderer */
  private lastEmitted: readonly Polygon[] | null = null;

  constructor(
    private readonly accumulator: WaveStateAccumulator,
    private readonly area: WaveArea,
    private readonly renderer: WavePolygonsRenderer,
    options: ProgressionSamplerOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? WAVE_SAMPLING_INTERVAL_MS;
    this.mode = options.mode ?? "add";
    this.scheduler = options.scheduler ?? timerScheduler;
    this.clock = options.clock ?? accumulator.wave.clock;
  }

  getStatus(): EventStatus {
    return this.status;
  }

  isSampling(): boolean {
    return this.controller !== null;
  }

  /** Most recent snapshot; kept across pause and stop. */
  getLastSnapshot(): WavePolygons | null {
    return this.lastSnapshot;
  }

  setStatus(status: EventStatus): void {
    if (status === this.status) return;
    this.status = status;

    switch (status) {
      case "undefined":
      case "soon":
        this.stopObservation();
        break;
      case "running":
        this.startObservation(this.lastSnapshot);
        break;
      case "done":
        this.stopObservation();
        this.renderer.addWavePolygons(this.area.getPolygons(), true);
        break;
    }
  }

  /** Upstream progression changed; the next tick computes a snapshot. */
  notifyProgression(): void {
    this.pending = true;
  }

  /**
   * Start sampling from `lastState`, cancelling any running loop first. The
   * first snapshot is computed right away.
   */
  startObservation(lastState: WavePolygons | null = null): void {
    this.cancel();

    const controller = new AbortController();
    this.controller = controller;
    this.lastSnapshot = lastState;
    this.pending = true;

    this.run(controller.signal, lastState).catch((error) => {
      console.error("[ProgressionSampler] Sampling stopped:", error);
      if (this.controller === controller) this.controller = null;
    });
  }

  pauseObservation(): void {
    this.cancel();
  }

  stopObservation(): void {
    this.cancel();
  }

  private cancel(): void {
    this.controller?.abort();
    this.controller = null;
  }

  private async run(signal: AbortSignal, lastState: WavePolygons | null): Promise<void> {
    let chain = lastState;

    while (!signal.aborted) {
      if (this.pending) {
        chain = this.tick(chain);
      }

      try {
        await this.scheduler.wait(this.intervalMs, signal);
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }

  private tick(chain: WavePolygons | null): WavePolygons | null {
    const now = this.clock.now();
    // Nothing new to show within the same instant
    if (chain && now <= chain.timestamp) return chain;

    const next = this.accumulator.getWavePolygons(
      this.area.getPolygons(),
      chain,
      this.mode,
      now,
    );
    this.pending = false;
    this.lastSnapshot = next;
    this.emit(next.traversedPolygons);
    return next;
  }

  private emit(traversed: readonly Polygon[]): void {
    if (traversed.length > 0) {
      this.lastEmitted = traversed;
      this.renderer.updateWavePolygons(traversed, true);
    } else if (this.lastEmitted !== null) {
      // Keep showing the last known front over a transient empty result
      this.renderer.updateWavePolygons(this.lastEmitted, true);
    }
  }
}
