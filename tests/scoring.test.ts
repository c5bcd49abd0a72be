import test from "node:test";
import assert from "node:assert/strict";
import { DEFAULT_SIGNAL_WEIGHTS } from "@/lib/highlights/config";
import { InsufficientSignalError, InvalidConfigurationError } from "@/lib/highlights/errors";
import { clamp, clamp01, round3 } from "@/lib/highlights/math";
import { fuseSignals, presentSignalKinds, renormalizeWeights, validateWeights } from "@/lib/highlights/score";
import type { SignalWeights } from "@/lib/highlights/types";

const EQUAL_WEIGHTS: SignalWeights = { audio_energy: 1, keyword_density: 1, scene_change: 1, chapter_marker: 1 };

function weightSum(weights: Partial<Record<string, number>>) {
  return Object.values(weights).reduce<number>((sum, weight) => sum + (weight ?? 0), 0);
}

test("shared math helpers clamp and round to milliseconds", () => {
  assert.equal(clamp01(1.4), 1);
  assert.equal(clamp01(-0.2), 0);
  assert.equal(clamp(7, 0, 5), 5);
  assert.equal(round3(0.1 + 0.2), 0.3);
  assert.equal(round3(12.34567), 12.346);
});

test("validateWeights rejects all-zero and negative weights", () => {
  assert.throws(
    () => validateWeights({ audio_energy: 0, keyword_density: 0, scene_change: 0, chapter_marker: 0 }),
    (error: unknown) =>
      error instanceof InvalidConfigurationError &&
      error.issues[0] === "signal_weights: at least one weight must be greater than 0"
  );
  assert.throws(
    () => validateWeights({ ...DEFAULT_SIGNAL_WEIGHTS, audio_energy: -0.1 }),
    (error: unknown) =>
      error instanceof InvalidConfigurationError &&
      error.issues[0] === "signal_weights.audio_energy: must be a finite number >= 0"
  );
});

test("renormalized weights sum to 1 with or without chapters", () => {
  const withChapters = renormalizeWeights(DEFAULT_SIGNAL_WEIGHTS, [
    "audio_energy",
    "keyword_density",
    "scene_change",
    "chapter_marker"
  ]);
  const withoutChapters = renormalizeWeights(DEFAULT_SIGNAL_WEIGHTS, ["audio_energy", "keyword_density", "scene_change"]);
  assert.ok(Math.abs(weightSum(withChapters) - 1) < 1e-9);
  assert.ok(Math.abs(weightSum(withoutChapters) - 1) < 1e-9);
  assert.equal(withoutChapters.chapter_marker, undefined);
  assert.equal(renormalizeWeights(DEFAULT_SIGNAL_WEIGHTS, ["audio_energy"]).audio_energy, 1);
});

test("presentSignalKinds ignores empty series", () => {
  assert.deepEqual(presentSignalKinds({ audio_energy: [], scene_change: [{ timestamp: 1, value: 1 }] }), ["scene_change"]);
});

test("fuseSignals fails when no signal is present", () => {
  assert.throws(
    () => fuseSignals({ audio_energy: [], chapter_marker: [] }, DEFAULT_SIGNAL_WEIGHTS, { duration: 60, step: 1, decayWindow: 5 }),
    InsufficientSignalError
  );
});

test("fuseSignals fails when every present signal has zero weight", () => {
  assert.throws(
    () =>
      fuseSignals(
        { chapter_marker: [{ timestamp: 0, value: 1 }] },
        { ...DEFAULT_SIGNAL_WEIGHTS, chapter_marker: 0 },
        { duration: 60, step: 1, decayWindow: 5 }
      ),
    InsufficientSignalError
  );
});

test("fuseSignals mixes present signals with renormalized weights", () => {
  const timeline = fuseSignals(
    {
      audio_energy: [
        { timestamp: 0, value: 1 },
        { timestamp: 1, value: 0 },
        { timestamp: 2, value: 0 },
        { timestamp: 3, value: 0 }
      ],
      scene_change: [{ timestamp: 2, value: 1 }],
      chapter_marker: []
    },
    EQUAL_WEIGHTS,
    { duration: 3, step: 1, decayWindow: 1 }
  );
  assert.deepEqual(timeline.points, [
    { timestamp: 0, score: 0.5 },
    { timestamp: 1, score: 0 },
    { timestamp: 2, score: 0.5 },
    { timestamp: 3, score: 0 }
  ]);
  assert.deepEqual(timeline.weights, { audio_energy: 0.5, scene_change: 0.5 });
  assert.deepEqual(timeline.contributions, {
    audio_energy: [0.5, 0, 0, 0],
    scene_change: [0, 0, 0.5, 0]
  });
});

test("fuseSignals is deterministic", () => {
  const signals = {
    audio_energy: [
      { timestamp: 0, value: 0.3 },
      { timestamp: 5, value: 1 },
      { timestamp: 9, value: 0.6 }
    ],
    keyword_density: [{ timestamp: 6, value: 0.5 }]
  };
  const options = { duration: 12, step: 1, decayWindow: 3 };
  assert.equal(
    JSON.stringify(fuseSignals(signals, DEFAULT_SIGNAL_WEIGHTS, options)),
    JSON.stringify(fuseSignals(signals, DEFAULT_SIGNAL_WEIGHTS, options))
  );
});
