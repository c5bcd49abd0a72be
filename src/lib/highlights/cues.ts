import { clamp, round3 } from "@/lib/highlights/math";
import type { SubtitleCue, TimedWord } from "@/lib/highlights/types";

type ClipSpan = {
  start: number;
  end: number;
};

/** A word belongs to the clip whose half-open span [start, end) holds its midpoint. */
export function wordBelongsToClip(word: TimedWord, clip: ClipSpan) {
  const midpoint = (word.start + word.end) / 2;
  return midpoint >= clip.start && midpoint < clip.end;
}

export function buildSubtitleCues(words: TimedWord[], clip: ClipSpan): SubtitleCue[] {
  const clipLength = clip.end - clip.start;
  const cues: SubtitleCue[] = [];
  let previousEnd = 0;

  for (const word of words) {
    const text = word.text.trim();
    if (!text || !wordBelongsToClip(word, clip)) continue;
    const start = round3(Math.max(previousEnd, clamp(word.start - clip.start, 0, clipLength)));
    const end = round3(Math.max(start, clamp(word.end - clip.start, 0, clipLength)));
    cues.push({ word: text, clip_relative_start: start, clip_relative_end: end });
    previousEnd = end;
  }
  return cues;
}
