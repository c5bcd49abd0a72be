import { z } from "zod";
import triggerKeywords from "@/data/trigger-keywords.json";
import { InvalidConfigurationError } from "@/lib/highlights/errors";
import { SIGNAL_KINDS, type HighlightConfig, type SignalWeights } from "@/lib/highlights/types";

export const DEFAULT_SIGNAL_WEIGHTS: SignalWeights = {
  audio_energy: 0.4,
  keyword_density: 0.3,
  scene_change: 0.3,
  chapter_marker: 0.2
};

export const DEFAULT_HIGHLIGHT_CONFIG: HighlightConfig = {
  clip_count: 3,
  min_duration: 15,
  max_duration: 60,
  signal_weights: DEFAULT_SIGNAL_WEIGHTS,
  keyword_list: triggerKeywords,
  sample_step: 1,
  keyword_window: 5,
  decay_window: 5,
  peak_threshold: 0.2
};

const weightSchema = z.number().finite().min(0, "weight must be >= 0");

export const signalWeightsSchema = z.object({
  audio_energy: weightSchema,
  keyword_density: weightSchema,
  scene_change: weightSchema,
  chapter_marker: weightSchema
});

export const highlightConfigSchema = z
  .object({
    clip_count: z.number().int().min(1).max(5),
    min_duration: z.number().min(10).max(30),
    max_duration: z.number().min(30).max(60),
    signal_weights: signalWeightsSchema,
    keyword_list: z.array(z.string()),
    sample_step: z.number().positive().max(5),
    keyword_window: z.number().min(0).max(30),
    decay_window: z.number().positive().max(60),
    peak_threshold: z.number().min(0).max(1)
  })
  .superRefine((config, ctx) => {
    if (config.min_duration > config.max_duration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["min_duration"],
        message: `must not exceed max_duration (${config.max_duration})`
      });
    }
    if (config.decay_window < config.sample_step) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["decay_window"],
        message: `must be at least sample_step (${config.sample_step})`
      });
    }
    const totalWeight = SIGNAL_KINDS.reduce((sum, kind) => sum + config.signal_weights[kind], 0);
    if (totalWeight <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["signal_weights"],
        message: "at least one weight must be greater than 0"
      });
    }
  });

export function formatIssues(issues: z.ZodIssue[], fallback: string) {
  return issues.map((issue) => `${issue.path.join(".") || fallback}: ${issue.message}`);
}

/** Validates without clamping; every problem is reported at once. */
export function parseHighlightConfig(raw: unknown): HighlightConfig {
  const parsed = highlightConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigurationError(formatIssues(parsed.error.issues, "config"));
  }
  return parsed.data;
}

export function withDefaults(overrides?: Partial<HighlightConfig>): HighlightConfig {
  return {
    ...DEFAULT_HIGHLIGHT_CONFIG,
    ...overrides,
    signal_weights: { ...DEFAULT_SIGNAL_WEIGHTS, ...overrides?.signal_weights }
  };
}
