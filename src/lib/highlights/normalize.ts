import { EPSILON, clamp01, round3 } from "@/lib/highlights/math";
import { SIGNAL_KINDS, type NormalizedSignal, type SignalKind, type SignalSample, type SignalSet } from "@/lib/highlights/types";

const IMPULSE_SIGNALS: ReadonlySet<SignalKind> = new Set<SignalKind>(["keyword_density", "scene_change", "chapter_marker"]);

/**
 * Min-max rescale onto [0,1] over the signal's own range. Impulse signals are
 * implicitly 0 between samples, so 0 always belongs to their range.
 */
export function normalizeSignal(samples: SignalSample[], options: { impulse: boolean }): NormalizedSignal {
  if (!samples.length) return [];

  let min = options.impulse ? 0 : Number.POSITIVE_INFINITY;
  let max = options.impulse ? 0 : Number.NEGATIVE_INFINITY;
  for (const sample of samples) {
    min = Math.min(min, sample.value);
    max = Math.max(max, sample.value);
  }

  if (max === min) {
    // an impulse signal can only be constant when nothing rose above its baseline
    const flat = options.impulse ? 0 : 0.5;
    return samples.map((sample) => ({ timestamp: sample.timestamp, value: flat }));
  }

  const range = max - min;
  return samples.map((sample) => ({
    timestamp: sample.timestamp,
    value: clamp01((sample.value - min) / range)
  }));
}

export function normalizeSignals(signals: SignalSet): SignalSet {
  const normalized: SignalSet = {};
  for (const kind of SIGNAL_KINDS) {
    const samples = signals[kind];
    if (samples) normalized[kind] = normalizeSignal(samples, { impulse: IMPULSE_SIGNALS.has(kind) });
  }
  return normalized;
}

export function buildTimeGrid(duration: number, step: number) {
  if (!(duration > 0)) return [0];
  const intervals = Math.ceil(duration / step - EPSILON);
  const grid: number[] = [];
  for (let i = 0; i <= intervals; i += 1) {
    grid.push(round3(Math.min(i * step, duration)));
  }
  return grid;
}

/**
 * Spreads each sample forward over the grid with a linear falloff: a sample
 * of value v at t contributes v * (1 - (g - t) / decayWindow) at every grid
 * time g in [t, t + decayWindow). Overlapping contributions keep the maximum.
 */
export function resampleWithDecay(signal: NormalizedSignal, grid: number[], step: number, decayWindow: number) {
  const values = new Array<number>(grid.length).fill(0);
  for (const sample of signal) {
    if (sample.value <= 0) continue;
    const first = Math.max(0, Math.ceil(sample.timestamp / step - EPSILON));
    for (let i = first; i < grid.length; i += 1) {
      const elapsed = Math.max(0, grid[i] - sample.timestamp);
      if (elapsed >= decayWindow) break;
      const contribution = sample.value * (1 - elapsed / decayWindow);
      if (contribution > values[i]) values[i] = contribution;
    }
  }
  return values;
}
