/**
 * Polls a wave's event status and progression and notifies listeners of
 * changes, along with the observer's own position relative to the wave.
 *
 * The polling rate follows {@link LinearWave.getObservationInterval}: slow
 * while the event is far away, fast while it runs. Observation ends by
 * itself once the event is done.
 */

import { WAVE_WARN_BEFORE_HIT_MS } from "../config/constants";
import { timerScheduler, type TickScheduler } from "../core/util/TickScheduler";
import type { LinearWave } from "./LinearWave";
import type { PositionObserver } from "./PositionObserver";
import type { Clock, EventStatus } from "./WaveTypes";

export type StatusListener = (status: EventStatus) => void;
export type ProgressionListener = (progression: number) => void;
export type HitListener = () => void;

/** What the observer knows about its position relative to the wave. */
export interface WaveObserverState {
  userIsInArea: boolean;
  /** ms, null without a usable position inside the area */
  timeBeforeHit: number | null;
  /** Epoch ms, null without a usable position inside the area */
  hitDateTime: number | null;
  /** Hit expected within {@link WAVE_WARN_BEFORE_HIT_MS} and not hit yet */
  userIsGoingToBeHit: boolean;
  /** 0 on the trailing edge, 1 on the leading edge */
  userPositionRatio: number;
  isStartWarmingInProgress: boolean;
}

type StateListener = (state: WaveObserverState, previous: WaveObserverState | null) => void;

export interface WaveObserverOptions {
  scheduler?: TickScheduler;
  clock?: Clock;
  /** Enables hit notifications for the observer's position */
  positionObserver?: PositionObserver;
}

export class WaveObserver {
  private readonly scheduler: TickScheduler;
  private readonly clock: Clock;
  private readonly positionObserver: PositionObserver | null;

  private statusListeners: StatusListener[] = [];
  private progressionListeners: ProgressionListener[] = [];
  private hitListeners: HitListener[] = [];
  private stateListeners: StateListener[] = [];

  private controller: AbortController | null = null;
  private status: EventStatus | null = null;
  private progression: number | null = null;
  private hit = false;
  private state: WaveObserverState | null = null;

  constructor(
    private readonly wave: LinearWave,
    options: WaveObserverOptions = {},
  ) {
    this.scheduler = options.scheduler ?? timerScheduler;
    this.clock = options.clock ?? wave.clock;
    this.positionObserver = options.positionObserver ?? null;
  }

  onStatusChanged(listener: StatusListener): this {
    this.statusListeners.push(listener);
    return this;
  }

  onProgressionChanged(listener: ProgressionListener): this {
    this.progressionListeners.push(listener);
    return this;
  }

  /** Called once, the first time the observer's position is hit. */
  onHit(listener: HitListener): this {
    this.hitListeners.push(listener);
    return this;
  }

  /** Called with the new value whenever one field of the state changes. */
  onStateChanged<K extends keyof WaveObserverState>(
    key: K,
    listener: (value: WaveObserverState[K]) => void,
  ): this {
    this.stateListeners.push((state, previous) => {
      if (previous === null || state[key] !== previous[key]) listener(state[key]);
    });
    return this;
  }

  isObserving(): boolean {
    return this.controller !== null;
  }

  getStatus(): EventStatus | null {
    return this.status;
  }

  getProgression(): number | null {
    return this.progression;
  }

  getState(): WaveObserverState | null {
    return this.state;
  }

  start(): void {
    if (this.controller) return;

    const controller = new AbortController();
    this.controller = controller;
    this.positionObserver?.startObservation();

    this.run(controller.signal)
      .catch((error) => {
        console.error("[WaveObserver] Observation failed:", error);
      })
      .finally(() => {
        if (this.controller === controller) this.stop();
      });
  }

  stop(): void {
    this.controller?.abort();
    this.controller = null;
    this.positionObserver?.stopObservation();
  }

  /** Read the current state once and notify listeners of any change. */
  poll(now: number = this.clock.now()): EventStatus {
    const status = this.currentStatus();
    const progression = this.wave.getProgression(now);

    if (status !== this.status) {
      this.status = status;
      for (const listener of this.statusListeners) listener(status);
    }
    if (progression !== this.progression) {
      this.progression = progression;
      for (const listener of this.progressionListeners) listener(progression);
    }

    const p = this.positionObserver?.getCurrentPosition() ?? null;
    const hit = p !== null && this.wave.hasBeenHit(p, now);
    if (!this.hit && hit) {
      this.hit = true;
      for (const listener of this.hitListeners) listener();
    }

    const timeBeforeHit = p && this.wave.timeBeforeHit(p, now);
    const state: WaveObserverState = {
      userIsInArea: p !== null && this.wave.area.isPositionWithin(p),
      timeBeforeHit,
      hitDateTime: p && this.wave.hitDateTime(p),
      userIsGoingToBeHit:
        !hit &&
        timeBeforeHit !== null &&
        timeBeforeHit > 0 &&
        timeBeforeHit <= WAVE_WARN_BEFORE_HIT_MS,
      userPositionRatio: (p && this.wave.positionRatio(p)) ?? 0,
      isStartWarmingInProgress: this.wave.isWarmingInProgress(now),
    };
    const previous = this.state;
    this.state = state;
    for (const listener of this.stateListeners) listener(state, previous);

    return status;
  }

  private currentStatus(): EventStatus {
    const event = this.wave.event;
    if (event.getStatus) return event.getStatus();
    if (event.isDone()) return "done";
    if (event.isRunning()) return "running";
    return "soon";
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const now = this.clock.now();
      if (this.poll(now) === "done") return;

      const observer = this.positionObserver?.getCurrentPosition() ?? undefined;
      try {
        await this.scheduler.wait(this.wave.getObservationInterval(now, observer), signal);
      } catch (error) {
        if (signal.aborted) return;
        throw error;
      }
    }
  }
}
