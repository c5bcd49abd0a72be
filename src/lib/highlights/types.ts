export const SIGNAL_KINDS = ["audio_energy", "keyword_density", "scene_change", "chapter_marker"] as const;

export type SignalKind = (typeof SIGNAL_KINDS)[number];

export type TimedWord = {
  text: string;
  start: number;
  end: number;
  confidence: number;
};

export type SignalSample = {
  timestamp: number;
  value: number;
};

/** Samples rescaled onto [0,1]. */
export type NormalizedSignal = SignalSample[];

export type SignalSet = Partial<Record<SignalKind, SignalSample[]>>;

export type SignalWeights = Record<SignalKind, number>;

export type Chapter = {
  start: number;
  title: string;
};

export type ScorePoint = {
  timestamp: number;
  score: number;
};

export type ScoreTimeline = {
  step: number;
  duration: number;
  points: ScorePoint[];
  /** Weighted share of each present signal, aligned with `points`. */
  contributions: Partial<Record<SignalKind, number[]>>;
  weights: Partial<Record<SignalKind, number>>;
};

export type Candidate = {
  start: number;
  end: number;
  score: number;
  dominant_signal: SignalKind;
  reason: string;
  peak: number;
};

export type SubtitleCue = {
  word: string;
  clip_relative_start: number;
  clip_relative_end: number;
};

export type SelectedClip = Candidate & {
  rank: number;
  cues: SubtitleCue[];
};

export type HighlightConfig = {
  clip_count: number;
  min_duration: number;
  max_duration: number;
  signal_weights: SignalWeights;
  keyword_list: string[];
  sample_step: number;
  keyword_window: number;
  decay_window: number;
  peak_threshold: number;
};

export type HighlightInput = {
  words: TimedWord[];
  loudness: SignalSample[];
  scene_cuts: number[];
  chapters?: Chapter[] | null;
  duration: number;
};

export type HighlightResult = {
  clips: SelectedClip[];
  candidate_count: number;
  missing_signals: SignalKind[];
  weights: Partial<Record<SignalKind, number>>;
};

export const SIGNAL_REASONS: Record<SignalKind, string> = {
  audio_energy: "high energy",
  keyword_density: "keyword burst",
  scene_change: "scene change",
  chapter_marker: "chapter start"
};
