/**
 * Shared constants for wave propagation and sampling.
 */

// Geodesy
export const EARTH_RADIUS = 6_378_137; // m - WGS-84 semi-major axis
export const COORDINATE_EPSILON = 1e-9; // degrees (~0.11mm at the equator)

export const MIN_LATITUDE = -90;
export const MAX_LATITUDE = 90;
export const MIN_LONGITUDE = -180;
export const MAX_LONGITUDE = 180;

// Band subdivision
export const MIN_PERCEPTIBLE_DISTANCE = 10_000; // m - latitude step driver for band splits
export const WAVE_REFRESH_DISTANCE = 10; // m - ground distance covered per band refresh window
export const MIN_BAND_WIDTH = 0.001; // degrees
export const MAX_BANDS = 20_000; // hard cap on bands per wave

// Wave configuration limits
export const DEFAULT_WAVE_SPEED = 50; // m/s
export const MAX_WAVE_SPEED = 300; // m/s

// Timing
export const WAVE_WARMING_DURATION_MS = 150_000; // 2.5 minutes
export const WAVE_SAMPLING_INTERVAL_MS = 250;
export const WAVE_WARN_BEFORE_HIT_MS = 30_000; // observers are warned this long before a hit
