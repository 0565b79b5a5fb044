/**
 * A wave sweeping a geographic area east or west at a constant ground speed.
 *
 * The front starts on the trailing edge of the area's bounding box when the
 * event starts. At every latitude it covers the same ground distance per
 * second, so it crosses more degrees of longitude where meridians are close
 * together and the front curves toward the poles.
 */

import {
  MAX_WAVE_SPEED,
  WAVE_REFRESH_DISTANCE,
  WAVE_WARMING_DURATION_MS,
} from "../config/constants";
import { clamp, invLerp } from "../core/util/MathUtil";
import { ComposedLongitude } from "./ComposedLongitude";
import { calculateDistance } from "./GeoUtils";
import {
  isValidPosition,
  latitudeOfWidestPart,
  polygonsBbox,
  position,
  type BoundingBox,
  type Position,
} from "./Position";
import { bandCenter, calculateBands, type LatLonBand } from "./WaveBands";
import {
  systemClock,
  type Clock,
  type WaveArea,
  type WaveDirection,
  type WaveEvent,
} from "./WaveTypes";

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export interface LinearWaveConfig {
  /** Ground speed of the front in m/s */
  speed: number;
  direction: WaveDirection;
  /** Ground distance covered by one band refresh window, default: 10 m */
  refreshDistance?: number;
  maxBands?: number;
  minBandWidth?: number;
  /** Warm-up phase between the event start and the wave end, default: 2.5 min */
  warmingDurationMs?: number;
}

export interface LinearWaveContext {
  area: WaveArea;
  event: WaveEvent;
  clock?: Clock;
}

export class LinearWave {
  readonly speed: number;
  readonly direction: WaveDirection;
  readonly area: WaveArea;
  readonly event: WaveEvent;
  readonly clock: Clock;

  private readonly refreshDistance: number;
  private readonly maxBands: number | undefined;
  private readonly minBandWidth: number | undefined;
  private readonly warmingDurationMs: number;

  // Memoized on first use
  private bbox: BoundingBox | null = null;
  private bands: LatLonBand[] | null = null;
  private waveDuration: number | null = null;

  constructor(config: LinearWaveConfig, context: LinearWaveContext) {
    if (!(config.speed > 0) || !Number.isFinite(config.speed)) {
      throw new Error(
        `Invalid wave configuration: speed must be a positive number (got ${config.speed})`,
      );
    }

    this.speed = config.speed;
    this.direction = config.direction;
    this.refreshDistance = config.refreshDistance ?? WAVE_REFRESH_DISTANCE;
    this.maxBands = config.maxBands;
    this.minBandWidth = config.minBandWidth;
    this.warmingDurationMs = config.warmingDurationMs ?? WAVE_WARMING_DURATION_MS;

    this.area = context.area;
    this.event = context.event;
    this.clock = context.clock ?? systemClock;
  }

  getBoundingBox(): BoundingBox {
    if (this.bbox === null) {
      const bbox = this.area.bbox?.() ?? polygonsBbox(this.area.getPolygons());
      if (bbox === null) {
        throw new Error("Invalid wave configuration: area has no polygons");
      }
      this.bbox = bbox;
    }
    return this.bbox;
  }

  /** Latitude bands of the bounding box, south to north. */
  getBands(): readonly LatLonBand[] {
    if (this.bands === null) {
      const refreshIntervalMs = (this.refreshDistance / this.speed) * SECOND;
      this.bands = calculateBands(this.getBoundingBox(), this.speed, refreshIntervalMs, {
        maxBands: this.maxBands,
        minBandWidth: this.minBandWidth,
      });
    }
    return this.bands;
  }

  /** Time for the front to cross the box at its widest latitude, in ms. */
  getWaveDuration(): number {
    if (this.waveDuration === null) {
      const bbox = this.getBoundingBox();
      const distance = calculateDistance(
        bbox.sw.lng,
        bbox.ne.lng,
        latitudeOfWidestPart(bbox),
      );
      this.waveDuration = (distance / this.speed) * SECOND;
    }
    return this.waveDuration;
  }

  /** Time since the event started in ms, 0 before the start. */
  getElapsed(now: number = this.clock.now()): number {
    return Math.max(0, now - this.event.getStartDateTime());
  }

  /**
   * Longitude of the front at a latitude. Stays on the trailing edge before
   * the start and on the leading edge once the front has crossed the box.
   */
  currentWaveLongitude(lat: number, now: number = this.clock.now()): number {
    const { sw, ne } = this.getBoundingBox();
    const width = ne.lng - sw.lng;
    const travelled = this.speed * (this.getElapsed(now) / SECOND);

    const span = calculateDistance(sw.lng, ne.lng, lat);
    const delta = span > 0 ? (travelled / span) * width : travelled > 0 ? width : 0;

    return this.direction === "east"
      ? clamp(sw.lng + delta, sw.lng, ne.lng)
      : clamp(ne.lng - delta, sw.lng, ne.lng);
  }

  /** The front as a curve sampled at the box edges and every band centre. */
  composedLongitude(now: number = this.clock.now()): ComposedLongitude {
    const { sw, ne } = this.getBoundingBox();
    const latitudes = [sw.lat, ...this.getBands().map(bandCenter), ne.lat];
    return new ComposedLongitude(
      latitudes.map((lat) => position(lat, this.currentWaveLongitude(lat, now))),
    );
  }

  /**
   * Time in ms for the front to travel from its current longitude to the
   * position, or null for invalid positions and positions outside the area.
   */
  timeBeforeHit(p: Position, now: number = this.clock.now()): number | null {
    if (!isValidPosition(p) || !this.area.isPositionWithin(p)) return null;

    const waveLng = this.currentWaveLongitude(p.lat, now);
    const distance = calculateDistance(waveLng, p.lng, p.lat);
    return (distance / this.speed) * SECOND;
  }

  /**
   * Whether the front has already passed the position. Invalid positions are
   * never hit.
   */
  hasBeenHit(p: Position, now: number = this.clock.now()): boolean {
    if (!isValidPosition(p)) return false;
    // The front rests on the trailing edge until it moves
    if (this.getElapsed(now) === 0) return false;

    const { sw, ne } = this.getBoundingBox();
    const waveLng = this.currentWaveLongitude(p.lat, now);
    const swept =
      this.direction === "east"
        ? p.lng >= sw.lng && p.lng <= waveLng
        : p.lng <= ne.lng && p.lng >= waveLng;

    return swept && this.area.isPositionWithin(p);
  }

  /**
   * Epoch ms at which the front reaches the position, or null for invalid
   * positions and positions outside the area.
   */
  hitDateTime(p: Position): number | null {
    if (!isValidPosition(p) || !this.area.isPositionWithin(p)) return null;

    const { sw, ne } = this.getBoundingBox();
    const trailingLng = this.direction === "east" ? sw.lng : ne.lng;
    const distance = calculateDistance(trailingLng, p.lng, p.lat);
    return this.event.getStartDateTime() + (distance / this.speed) * SECOND;
  }

  /**
   * Where the position sits along the direction of travel: 0 on the
   * trailing edge of the box, 1 on the leading edge. Null outside the area.
   */
  positionRatio(p: Position): number | null {
    if (!isValidPosition(p) || !this.area.isPositionWithin(p)) return null;

    const { sw, ne } = this.getBoundingBox();
    const ratio =
      this.direction === "east" ? invLerp(sw.lng, ne.lng, p.lng) : invLerp(ne.lng, sw.lng, p.lng);
    return Number.isFinite(ratio) ? clamp(ratio, 0, 1) : 0;
  }

  /** True strictly between the event start and the end of the warming phase. */
  isWarmingInProgress(now: number = this.clock.now()): boolean {
    const start = this.event.getStartDateTime();
    return now > start && now < start + this.warmingDurationMs;
  }

  /** Percentage of the wave duration elapsed, 0 to 100. */
  getProgression(now: number = this.clock.now()): number {
    if (this.event.isDone()) return 100;
    if (!this.event.isRunning()) return 0;

    const duration = this.getWaveDuration();
    if (duration <= 0) return 100;
    return Math.min(100, (this.getElapsed(now) / duration) * 100);
  }

  /** Epoch ms at which the wave ends, warming phase included. */
  getEndTime(): number {
    return this.event.getStartDateTime() + this.warmingDurationMs + this.getWaveDuration();
  }

  /**
   * How long to wait before observing the wave again: rarely while the
   * event is far off, often while it runs or a hit is imminent.
   */
  getObservationInterval(now: number = this.clock.now(), observer?: Position): number {
    const timeBeforeEvent = this.event.getStartDateTime() - now;
    const timeBeforeHit = (observer ? this.timeBeforeHit(observer, now) : null) ?? DAY;

    if (timeBeforeEvent > HOUR + 5 * MINUTE) return HOUR;
    if (timeBeforeEvent > 5 * MINUTE + 30 * SECOND) return 5 * MINUTE;
    if (timeBeforeEvent > 35 * SECOND) return SECOND;
    if (timeBeforeHit < 5 * SECOND) return 100;
    if (timeBeforeEvent > 0 || this.event.isRunning()) return 500;
    return DAY;
  }

  getLiteralSpeed(): string {
    return `${this.speed} m/s`;
  }

  getLiteralTotalTime(): string {
    return `${Math.floor(this.getWaveDuration() / MINUTE)} min`;
  }

  getLiteralProgression(now: number = this.clock.now()): string {
    return `${Math.round(this.getProgression(now))}%`;
  }

  /** Configuration problems, or null when the wave is valid. */
  validationErrors(): string[] | null {
    const errors: string[] = [];
    if (this.speed > MAX_WAVE_SPEED) {
      errors.push(`Speed must be at most ${MAX_WAVE_SPEED} m/s`);
    }
    if (!(this.refreshDistance > 0)) {
      errors.push("Refresh distance must be positive");
    }
    if (this.warmingDurationMs < 0) {
      errors.push("Warming duration must not be negative");
    }
    return errors.length > 0 ? errors.map((e) => `LinearWave: ${e}`) : null;
  }
}
