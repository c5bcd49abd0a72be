import { InsufficientSignalError, InvalidConfigurationError } from "@/lib/highlights/errors";
import { clamp01 } from "@/lib/highlights/math";
import { buildTimeGrid, resampleWithDecay } from "@/lib/highlights/normalize";
import {
  SIGNAL_KINDS,
  type ScoreTimeline,
  type SignalKind,
  type SignalSet,
  type SignalWeights
} from "@/lib/highlights/types";

export type FuseOptions = {
  duration: number;
  step: number;
  decayWindow: number;
};

export function validateWeights(weights: SignalWeights) {
  const issues: string[] = [];
  for (const kind of SIGNAL_KINDS) {
    const weight = weights[kind];
    if (!Number.isFinite(weight) || weight < 0) {
      issues.push(`signal_weights.${kind}: must be a finite number >= 0`);
    }
  }
  if (!issues.length && SIGNAL_KINDS.every((kind) => weights[kind] === 0)) {
    issues.push("signal_weights: at least one weight must be greater than 0");
  }
  if (issues.length) throw new InvalidConfigurationError(issues);
}

export function presentSignalKinds(signals: SignalSet): SignalKind[] {
  return SIGNAL_KINDS.filter((kind) => (signals[kind]?.length ?? 0) > 0);
}

/** Scales the weights of the present kinds so they sum to 1; absent kinds get no weight at all. */
export function renormalizeWeights(weights: SignalWeights, present: SignalKind[]) {
  const renormalized: Partial<Record<SignalKind, number>> = {};
  const total = present.reduce((sum, kind) => sum + weights[kind], 0);
  if (total <= 0) return renormalized;
  for (const kind of present) {
    renormalized[kind] = weights[kind] / total;
  }
  return renormalized;
}

export function fuseSignals(signals: SignalSet, weights: SignalWeights, options: FuseOptions): ScoreTimeline {
  validateWeights(weights);

  const present = presentSignalKinds(signals);
  if (!present.length) {
    throw new InsufficientSignalError("no loudness samples, transcript keywords, scene cuts or chapters");
  }
  const renormalized = renormalizeWeights(weights, present);
  const active = present.filter((kind) => (renormalized[kind] ?? 0) > 0);
  if (!active.length) {
    throw new InsufficientSignalError(`every available signal (${present.join(", ")}) has zero weight`);
  }

  const grid = buildTimeGrid(options.duration, options.step);
  const totals = new Array<number>(grid.length).fill(0);
  const contributions: ScoreTimeline["contributions"] = {};

  for (const kind of active) {
    const weight = renormalized[kind] ?? 0;
    const values = resampleWithDecay(signals[kind] ?? [], grid, options.step, options.decayWindow);
    const weighted = values.map((value) => value * weight);
    weighted.forEach((value, index) => {
      totals[index] += value;
    });
    contributions[kind] = weighted;
  }

  return {
    step: options.step,
    duration: options.duration,
    points: grid.map((timestamp, index) => ({ timestamp, score: clamp01(totals[index]) })),
    contributions,
    weights: renormalized
  };
}
