import { parseHighlightConfig } from "@/lib/highlights/config";
import { buildSubtitleCues } from "@/lib/highlights/cues";
import { generateCandidates } from "@/lib/highlights/candidates";
import { extractSignals } from "@/lib/highlights/extractors";
import { parseHighlightInput } from "@/lib/highlights/input";
import { normalizeSignals } from "@/lib/highlights/normalize";
import { fuseSignals, presentSignalKinds } from "@/lib/highlights/score";
import { selectClips } from "@/lib/highlights/select";
import { SIGNAL_KINDS, type HighlightResult, type SelectedClip } from "@/lib/highlights/types";

export type HighlightLogger = Pick<Console, "log" | "warn">;

export type DetectHighlightsOptions = {
  logger?: HighlightLogger;
};

/**
 * Runs the whole engine once: extract, normalize, fuse, window, select, cue.
 *
 * Throws `InvalidConfigurationError`, `InvalidInputError` or
 * `InsufficientSignalError`. A video where nothing clears the peak threshold
 * is not an error and comes back with `clips: []`.
 */
export function detectHighlights(rawInput: unknown, rawConfig: unknown, options?: DetectHighlightsOptions): HighlightResult {
  const logger = options?.logger ?? console;
  const config = parseHighlightConfig(rawConfig);
  const input = parseHighlightInput(rawInput);

  const signals = normalizeSignals(extractSignals(input, config));
  const present = presentSignalKinds(signals);
  const missing = SIGNAL_KINDS.filter((kind) => !present.includes(kind));
  if (present.length && missing.length) {
    logger.warn(`[highlights] continuing without ${missing.join(", ")}`);
  }

  const timeline = fuseSignals(signals, config.signal_weights, {
    duration: input.duration,
    step: config.sample_step,
    decayWindow: config.decay_window
  });

  const candidates = generateCandidates(timeline, config);
  if (!candidates.length) {
    logger.log(`[highlights] no window cleared peak threshold ${config.peak_threshold} over ${input.duration}s`);
  }

  const clips: SelectedClip[] = selectClips(candidates, config.clip_count).map((candidate) => ({
    ...candidate,
    cues: buildSubtitleCues(input.words, candidate)
  }));
  logger.log(`[highlights] selected ${clips.length}/${config.clip_count} clips from ${candidates.length} candidates`);

  return {
    clips,
    candidate_count: candidates.length,
    missing_signals: missing,
    weights: timeline.weights
  };
}
