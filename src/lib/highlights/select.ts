import type { Candidate } from "@/lib/highlights/types";

export type RankedCandidate = Candidate & { rank: number };

type Span = Pick<Candidate, "start" | "end">;

/** True when the spans share positive time; touching endpoints do not overlap. */
export function overlaps(a: Span, b: Span) {
  return Math.max(a.start, b.start) < Math.min(a.end, b.end);
}

export function rankCandidates(candidates: Candidate[]) {
  return [...candidates].sort((a, b) => b.score - a.score || a.start - b.start || a.end - b.end);
}

/**
 * Greedy by score: the best remaining candidate is accepted unless it overlaps
 * one already accepted. Ranks follow acceptance order; the result is returned
 * in chronological order.
 */
export function selectClips(candidates: Candidate[], clipCount: number): RankedCandidate[] {
  const picks: RankedCandidate[] = [];
  for (const candidate of rankCandidates(candidates)) {
    if (picks.length >= clipCount) break;
    if (picks.some((pick) => overlaps(candidate, pick))) continue;
    picks.push({ ...candidate, rank: picks.length + 1 });
  }
  return picks.sort((a, b) => a.start - b.start);
}
