/** Clamp a value between min and max */
export function clamp(value: number, min: number = -1, max: number = 1): number {
  return Math.min(max, Math.max(min, value));
}

/** Linear interpolation from a to b */
export function lerp(a: number, b: number, t: number = 0.5): number {
  return a + (b - a) * t;
}

/** Inverse of lerp: where `value` sits between a and b (0 at a, 1 at b) */
export function invLerp(a: number, b: number, value: number): number {
  return (value - a) / (b - a);
}

/** Convert degrees to radians */
export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/** Convert radians to degrees */
export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

