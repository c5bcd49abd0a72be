import { z } from "zod";
import { formatIssues } from "@/lib/highlights/config";
import { InvalidInputError } from "@/lib/highlights/errors";
import type { HighlightInput } from "@/lib/highlights/types";

const timestampSchema = z.number().finite().min(0);

const timedWordSchema = z
  .object({
    text: z.string(),
    start: timestampSchema,
    end: timestampSchema,
    confidence: z.number().finite().default(1)
  })
  .refine((word) => word.end >= word.start, { message: "end must not precede start", path: ["end"] });

const signalSampleSchema = z.object({
  timestamp: timestampSchema,
  value: z.number().finite()
});

const chapterSchema = z.object({
  start: timestampSchema,
  title: z.string().default("")
});

export const highlightInputSchema = z.object({
  words: z.array(timedWordSchema).default([]),
  loudness: z.array(signalSampleSchema).default([]),
  scene_cuts: z.array(timestampSchema).default([]),
  chapters: z.array(chapterSchema).nullish(),
  duration: z.number().finite().positive()
});

/** Validates collaborator output and restores time ordering. */
export function parseHighlightInput(raw: unknown): HighlightInput {
  const parsed = highlightInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(formatIssues(parsed.error.issues, "input"));
  }
  const input = parsed.data;
  return {
    words: [...input.words].sort((a, b) => a.start - b.start),
    loudness: [...input.loudness].sort((a, b) => a.timestamp - b.timestamp),
    scene_cuts: [...input.scene_cuts].sort((a, b) => a - b),
    chapters: input.chapters ? [...input.chapters].sort((a, b) => a.start - b.start) : null,
    duration: input.duration
  };
}
