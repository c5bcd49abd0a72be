import { z } from "zod";
import { DEFAULT_HIGHLIGHT_CONFIG, DEFAULT_SIGNAL_WEIGHTS } from "@/lib/highlights/config";
import type { HighlightConfig } from "@/lib/highlights/types";

const envSchema = z.object({
  CLIP_COUNT: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.clip_count),
  CLIP_MIN_DURATION: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.min_duration),
  CLIP_MAX_DURATION: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.max_duration),
  AUDIO_ENERGY_WEIGHT: z.coerce.number().default(DEFAULT_SIGNAL_WEIGHTS.audio_energy),
  KEYWORD_WEIGHT: z.coerce.number().default(DEFAULT_SIGNAL_WEIGHTS.keyword_density),
  SCENE_CHANGE_WEIGHT: z.coerce.number().default(DEFAULT_SIGNAL_WEIGHTS.scene_change),
  CHAPTER_MARKER_WEIGHT: z.coerce.number().default(DEFAULT_SIGNAL_WEIGHTS.chapter_marker),
  SAMPLE_STEP: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.sample_step),
  KEYWORD_WINDOW: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.keyword_window),
  DECAY_WINDOW: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.decay_window),
  PEAK_THRESHOLD: z.coerce.number().default(DEFAULT_HIGHLIGHT_CONFIG.peak_threshold),
  TRIGGER_KEYWORDS: z.string().optional(),
  OUTPUT_DIR: z.string().min(1).default("./output")
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const messages = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${messages}`);
  }
  return parsed.data;
}

function parseKeywordList(raw?: string) {
  if (raw === undefined) return DEFAULT_HIGHLIGHT_CONFIG.keyword_list;
  return raw
    .split(",")
    .map((keyword) => keyword.trim())
    .filter(Boolean);
}

/** Range checks happen later in `parseHighlightConfig`; nothing is clamped here. */
export function highlightConfigFromEnv(source: Env): HighlightConfig {
  return {
    clip_count: source.CLIP_COUNT,
    min_duration: source.CLIP_MIN_DURATION,
    max_duration: source.CLIP_MAX_DURATION,
    signal_weights: {
      audio_energy: source.AUDIO_ENERGY_WEIGHT,
      keyword_density: source.KEYWORD_WEIGHT,
      scene_change: source.SCENE_CHANGE_WEIGHT,
      chapter_marker: source.CHAPTER_MARKER_WEIGHT
    },
    keyword_list: parseKeywordList(source.TRIGGER_KEYWORDS),
    sample_step: source.SAMPLE_STEP,
    keyword_window: source.KEYWORD_WINDOW,
    decay_window: source.DECAY_WINDOW,
    peak_threshold: source.PEAK_THRESHOLD
  };
}

export const env = parseEnv(process.env);
