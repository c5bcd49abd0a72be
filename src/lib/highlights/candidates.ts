import { EPSILON, round3 } from "@/lib/highlights/math";
import {
  SIGNAL_KINDS,
  SIGNAL_REASONS,
  type Candidate,
  type HighlightConfig,
  type ScoreTimeline,
  type SignalKind
} from "@/lib/highlights/types";

export type WindowBounds = Pick<HighlightConfig, "min_duration" | "max_duration" | "peak_threshold">;

type WindowPick = {
  from: number;
  last: number;
  end: number;
  mean: number;
};

function prefixSums(timeline: ScoreTimeline) {
  const sums = [0];
  for (const point of timeline.points) {
    sums.push(sums[sums.length - 1] + point.score);
  }
  return sums;
}

/** Indices of local maxima strictly above `threshold`; a plateau reports only its first point. */
export function findPeaks(timeline: ScoreTimeline, threshold: number) {
  const { points } = timeline;
  const peaks: number[] = [];
  for (let i = 0; i < points.length; i += 1) {
    const score = points[i].score;
    if (score <= 0 || score <= threshold) continue;
    const previous = i > 0 ? points[i - 1].score : Number.NEGATIVE_INFINITY;
    const next = i < points.length - 1 ? points[i + 1].score : Number.NEGATIVE_INFINITY;
    if (score > previous && score >= next) peaks.push(i);
  }
  return peaks;
}

export function dominantSignal(timeline: ScoreTimeline, from: number, to: number): SignalKind {
  let dominant: SignalKind = SIGNAL_KINDS[0];
  let bestShare = Number.NEGATIVE_INFINITY;
  for (const kind of SIGNAL_KINDS) {
    const values = timeline.contributions[kind];
    if (!values) continue;
    let share = 0;
    for (let i = from; i <= to; i += 1) share += values[i];
    if (share > bestShare) {
      dominant = kind;
      bestShare = share;
    }
  }
  return dominant;
}

/** Window lengths in seconds: both bounds plus every multiple of `step` between them. */
export function windowLengths(bounds: WindowBounds, step: number) {
  const lengths = new Set<number>([round3(bounds.min_duration), round3(bounds.max_duration)]);
  for (let k = Math.floor(bounds.min_duration / step) + 1; k * step < bounds.max_duration - EPSILON; k += 1) {
    if (k * step > bounds.min_duration + EPSILON) lengths.add(round3(k * step));
  }
  return Array.from(lengths).sort((a, b) => a - b);
}

function lastPointAtOrBefore(timeline: ScoreTimeline, time: number) {
  const { points } = timeline;
  let lo = 0;
  let hi = points.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (points[mid].timestamp <= time + EPSILON) lo = mid + 1;
    else hi = mid;
  }
  return lo - 1;
}

/**
 * Best-mean window containing `peak`, starting on a grid point and lasting
 * one of `lengths` seconds (or running to the end of the video, when that
 * tail fits the bounds). The mean is taken over the grid points inside the
 * window. Starts are scanned ascending and lengths ascending, so ties keep
 * the earliest start and then the shortest window.
 */
function bestWindowAround(
  timeline: ScoreTimeline,
  sums: number[],
  peak: number,
  bounds: WindowBounds,
  lengths: number[]
): WindowPick | null {
  const { points, duration } = timeline;
  const peakTime = points[peak].timestamp;
  let firstStart = peak;
  while (firstStart > 0 && peakTime - points[firstStart - 1].timestamp <= bounds.max_duration + EPSILON) {
    firstStart -= 1;
  }

  let best: WindowPick | null = null;
  for (let from = firstStart; from <= peak; from += 1) {
    const startTime = points[from].timestamp;
    const tail = round3(duration - startTime);
    const spans = lengths.filter((length) => length < tail - EPSILON);
    if (tail >= bounds.min_duration - EPSILON && tail <= bounds.max_duration + EPSILON) spans.push(tail);

    for (const length of spans) {
      const end = round3(startTime + length);
      if (end < peakTime - EPSILON) continue;
      const last = lastPointAtOrBefore(timeline, end);
      const mean = (sums[last + 1] - sums[from]) / (last - from + 1);
      if (!best || mean > best.mean + EPSILON) best = { from, last, end, mean };
    }
  }
  return best;
}

export function generateCandidates(timeline: ScoreTimeline, bounds: WindowBounds): Candidate[] {
  if (timeline.duration < bounds.min_duration - EPSILON) return [];

  const sums = prefixSums(timeline);
  const lengths = windowLengths(bounds, timeline.step);
  const byWindow = new Map<string, Candidate>();
  for (const peak of findPeaks(timeline, bounds.peak_threshold)) {
    const pick = bestWindowAround(timeline, sums, peak, bounds, lengths);
    if (!pick) continue;
    const key = `${pick.from}:${pick.end}`;
    if (byWindow.has(key)) continue;
    const dominant = dominantSignal(timeline, pick.from, pick.last);
    byWindow.set(key, {
      start: timeline.points[pick.from].timestamp,
      end: pick.end,
      score: pick.mean,
      dominant_signal: dominant,
      reason: SIGNAL_REASONS[dominant],
      peak: timeline.points[peak].timestamp
    });
  }

  return Array.from(byWindow.values()).sort((a, b) => a.start - b.start || a.end - b.end);
}
