export const EPSILON = 1e-9;

export function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(value, max));
}

export function clamp01(value: number) {
  return clamp(value, 0, 1);
}

export function round3(value: number) {
  return Number(value.toFixed(3));
}
