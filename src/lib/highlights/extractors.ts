import { round3 } from "@/lib/highlights/math";
import type { Chapter, HighlightConfig, HighlightInput, SignalSample, SignalSet, TimedWord } from "@/lib/highlights/types";

const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

type Token = {
  token: string;
  start: number;
};

export function normalizeToken(raw: string) {
  return raw.toLowerCase().replace(EDGE_PUNCTUATION, "");
}

function tokenize(text: string) {
  return text.split(/\s+/).map(normalizeToken).filter(Boolean);
}

function lowerBound(sorted: number[], target: number) {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid] < target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function upperBound(sorted: number[], target: number) {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (sorted[mid] <= target) lo = mid + 1;
    else hi = mid;
  }
  return lo;
}

function impulses(times: number[]): SignalSample[] {
  return times
    .filter((time) => Number.isFinite(time) && time >= 0)
    .sort((a, b) => a - b)
    .map((timestamp) => ({ timestamp, value: 1 }));
}

export function extractAudioEnergy(loudness: SignalSample[]): SignalSample[] {
  return loudness.filter((sample) => Number.isFinite(sample.timestamp) && Number.isFinite(sample.value));
}

function matchesPhraseAt(tokens: Token[], index: number, phrase: string[]) {
  return phrase.every((part, offset) => tokens[index + offset]?.token === part);
}

/**
 * One sample per word, valued by how many trigger matches start within
 * `windowSec` of that word. Matching is whole-token, so "wait" never matches
 * "waiting"; phrases must match consecutive tokens.
 */
export function extractKeywordDensity(words: TimedWord[], keywords: string[], windowSec: number): SignalSample[] {
  const phrases = new Map<string, string[]>();
  for (const keyword of keywords) {
    const parts = tokenize(keyword);
    if (parts.length) phrases.set(parts.join(" "), parts);
  }
  if (!words.length || !phrases.size) return [];

  const tokens: Token[] = words.flatMap((word) => tokenize(word.text).map((token) => ({ token, start: word.start })));
  const matchTimes: number[] = [];
  for (let i = 0; i < tokens.length; i += 1) {
    for (const phrase of phrases.values()) {
      if (matchesPhraseAt(tokens, i, phrase)) matchTimes.push(tokens[i].start);
    }
  }
  matchTimes.sort((a, b) => a - b);

  return words.map((word) => ({
    timestamp: word.start,
    value: upperBound(matchTimes, word.start + windowSec) - lowerBound(matchTimes, word.start - windowSec)
  }));
}

export function extractSceneChanges(cuts: number[]): SignalSample[] {
  return impulses(cuts);
}

export function extractChapterMarkers(chapters?: Chapter[] | null): SignalSample[] {
  if (!chapters?.length) return [];
  return impulses(chapters.map((chapter) => chapter.start));
}

export function extractSignals(input: HighlightInput, config: HighlightConfig): SignalSet {
  return {
    audio_energy: extractAudioEnergy(input.loudness),
    keyword_density: extractKeywordDensity(input.words, config.keyword_list, config.keyword_window),
    scene_change: extractSceneChanges(input.scene_cuts),
    chapter_marker: extractChapterMarkers(input.chapters)
  };
}

/** RMS loudness of mono PCM in [-1,1], one sample per hop stamped at the window start. */
export function computeRmsEnvelope(
  pcm: ArrayLike<number>,
  sampleRate: number,
  options?: { windowMs?: number; hopMs?: number }
): SignalSample[] {
  const windowSize = Math.floor((sampleRate * (options?.windowMs ?? 500)) / 1000);
  const hop = Math.floor((sampleRate * (options?.hopMs ?? 100)) / 1000);
  if (windowSize <= 0 || hop <= 0) return [];

  const samples: SignalSample[] = [];
  for (let offset = 0; offset + windowSize < pcm.length; offset += hop) {
    let sumSquares = 0;
    for (let i = offset; i < offset + windowSize; i += 1) {
      sumSquares += pcm[i] * pcm[i];
    }
    samples.push({ timestamp: round3(offset / sampleRate), value: Math.sqrt(sumSquares / windowSize) });
  }
  return samples;
}

/** Cut times from an ffmpeg `select='gt(scene,X)',showinfo` stderr log. */
export function parseSceneDetectionLog(stderr: string) {
  const points = new Set<number>();
  const ptsRegex = /pts_time:\s*([0-9.]+)/g;
  let match: RegExpExecArray | null;
  while ((match = ptsRegex.exec(stderr))) {
    const value = Number(match[1]);
    if (Number.isFinite(value)) points.add(value);
  }
  return Array.from(points).sort((a, b) => a - b);
}
