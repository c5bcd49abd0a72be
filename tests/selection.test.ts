import test from "node:test";
import assert from "node:assert/strict";
import { dominantSignal, findPeaks, generateCandidates, windowLengths, type WindowBounds } from "@/lib/highlights/candidates";
import { overlaps, selectClips } from "@/lib/highlights/select";
import type { Candidate, ScoreTimeline, SignalKind } from "@/lib/highlights/types";

function timeline(contributions: Partial<Record<SignalKind, number[]>>): ScoreTimeline {
  const series = Object.values(contributions);
  const length = series[0]?.length ?? 0;
  const points = Array.from({ length }, (_, index) => ({
    timestamp: index,
    score: series.reduce((sum, values) => sum + (values?.[index] ?? 0), 0)
  }));
  return { step: 1, duration: length - 1, points, contributions, weights: {} };
}

function spikes(length: number, values: Record<number, number>) {
  return Array.from({ length }, (_, index) => values[index] ?? 0);
}

function candidate(start: number, end: number, score: number): Candidate {
  return { start, end, score, dominant_signal: "audio_energy", reason: "high energy", peak: start };
}

const bounds: WindowBounds = { min_duration: 10, max_duration: 20, peak_threshold: 0.2 };

test("findPeaks reports the first point of a plateau", () => {
  const scores = timeline({ audio_energy: [0, 0.5, 0.5, 0.2, 0.6, 0.6] });
  assert.deepEqual(findPeaks(scores, 0.3), [1, 4]);
});

test("findPeaks ignores peaks under the threshold", () => {
  assert.deepEqual(findPeaks(timeline({ audio_energy: [0, 0.1, 0] }), 0.2), []);
});

test("findPeaks needs a score strictly above the threshold", () => {
  assert.deepEqual(findPeaks(timeline({ audio_energy: [0, 0.2, 0] }), 0.2), []);
  assert.deepEqual(findPeaks(timeline({ audio_energy: [0, 0.21, 0] }), 0.2), [1]);
});

test("windowLengths covers both bounds and the step multiples between them", () => {
  assert.deepEqual(windowLengths({ ...bounds, min_duration: 15, max_duration: 17 }, 0.7), [15, 15.4, 16.1, 16.8, 17]);
  assert.deepEqual(windowLengths({ ...bounds, min_duration: 30, max_duration: 30 }, 4), [30]);
});

test("generateCandidates picks the best-mean window around a peak", () => {
  const scores = timeline({ audio_energy: spikes(61, { 30: 1, 31: 0.5 }) });
  const candidates = generateCandidates(scores, bounds);
  assert.deepEqual(candidates, [
    {
      start: 21,
      end: 31,
      score: 1.5 / 11,
      dominant_signal: "audio_energy",
      reason: "high energy",
      peak: 30
    }
  ]);
});

test("generateCandidates labels the signal with the largest share", () => {
  const scores = timeline({
    audio_energy: spikes(41, { 20: 0.3 }),
    scene_change: spikes(41, { 20: 0.7 })
  });
  const [first] = generateCandidates(scores, bounds);
  assert.equal(first.dominant_signal, "scene_change");
  assert.equal(first.reason, "scene change");
  assert.equal(first.start, 10);
  assert.equal(first.end, 20);
});

test("generateCandidates merges identical windows from neighbouring peaks", () => {
  const scores = timeline({ audio_energy: spikes(41, { 20: 1, 21: 0.5, 22: 1 }) });
  const candidates = generateCandidates(scores, bounds);
  assert.equal(candidates.length, 1);
  assert.equal(candidates[0].start, 12);
  assert.equal(candidates[0].end, 22);
  assert.equal(candidates[0].peak, 20);
});

test("generateCandidates returns nothing for a video shorter than min_duration", () => {
  const scores = timeline({ audio_energy: spikes(8, { 3: 1 }) });
  assert.deepEqual(generateCandidates(scores, bounds), []);
});

test("candidate durations stay within bounds", () => {
  const scores = timeline({ audio_energy: spikes(200, { 5: 1, 50: 0.8, 51: 0.9, 120: 0.4, 199: 0.7 }) });
  const candidates = generateCandidates(scores, bounds);
  assert.ok(candidates.length > 0);
  for (const item of candidates) {
    assert.ok(item.end - item.start >= bounds.min_duration);
    assert.ok(item.end - item.start <= bounds.max_duration);
    assert.ok(item.start <= item.peak && item.peak <= item.end);
  }
});

test("dominantSignal breaks ties in signal order", () => {
  const scores = timeline({
    audio_energy: spikes(5, { 2: 0.5 }),
    keyword_density: spikes(5, { 2: 0.5 })
  });
  assert.equal(dominantSignal(scores, 0, 4), "audio_energy");
});

test("overlaps treats touching spans as disjoint", () => {
  assert.equal(overlaps({ start: 0, end: 20 }, { start: 20, end: 40 }), false);
  assert.equal(overlaps({ start: 0, end: 20 }, { start: 19.5, end: 40 }), true);
});

test("greedy selection skips a higher candidate that overlaps an accepted one", () => {
  const selected = selectClips([candidate(0, 20, 0.9), candidate(10, 30, 0.85), candidate(40, 60, 0.8)], 2);
  assert.deepEqual(
    selected.map((clip) => clip.score),
    [0.9, 0.8]
  );
  assert.deepEqual(
    selected.map((clip) => clip.rank),
    [1, 2]
  );
});

test("selection returns what exists instead of padding", () => {
  assert.equal(selectClips([candidate(0, 20, 0.5)], 3).length, 1);
  assert.deepEqual(selectClips([], 3), []);
});

test("selected clips come back in chronological order", () => {
  const selected = selectClips([candidate(100, 120, 0.95), candidate(0, 20, 0.7)], 2);
  assert.deepEqual(
    selected.map((clip) => [clip.start, clip.rank]),
    [
      [0, 2],
      [100, 1]
    ]
  );
});

test("equal scores prefer the earlier window", () => {
  const [only] = selectClips([candidate(30, 50, 0.5), candidate(10, 35, 0.5)], 1);
  assert.equal(only.start, 10);
});
