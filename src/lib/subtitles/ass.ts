import type { SubtitleCue } from "@/lib/highlights/types";

export type AssStyle = {
  fontName: string;
  fontSize: number;
  /** ASS colours are &HAABBGGRR. */
  primaryColor: string;
  highlightColor: string;
  outlineColor: string;
  shadowColor: string;
  bold: boolean;
  outlineWidth: number;
  shadowDepth: number;
  marginV: number;
  wordsPerLine: number;
};

export const DEFAULT_ASS_STYLE: AssStyle = {
  fontName: "Arial",
  fontSize: 72,
  primaryColor: "&H00FFFFFF",
  highlightColor: "&H0000FFFF",
  outlineColor: "&H00000000",
  shadowColor: "&H80000000",
  bold: true,
  outlineWidth: 3,
  shadowDepth: 2,
  marginV: 80,
  wordsPerLine: 4
};

const LINE_TAIL_S = 0.3;
const WORD_TAIL_S = 0.05;

export function toAssTimestamp(sec: number) {
  const totalCs = Math.round(Math.max(0, sec) * 100);
  const cs = totalCs % 100;
  const total = Math.floor(totalCs / 100);
  const s = total % 60;
  const m = Math.floor(total / 60) % 60;
  const h = Math.floor(total / 3600);
  return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}.${String(cs).padStart(2, "0")}`;
}

export function escapeAssText(text: string) {
  return text.replace(/[{}\\]/g, "").replace(/\r?\n/g, " ").trim();
}

function assHeader(style: AssStyle) {
  return [
    "[Script Info]",
    "ScriptType: v4.00+",
    "PlayResX: 1080",
    "PlayResY: 1920",
    "ScaledBorderAndShadow: yes",
    "",
    "[V4+ Styles]",
    "Format: Name,Fontname,Fontsize,PrimaryColour,SecondaryColour,OutlineColour,BackColour,Bold,Italic,Underline,StrikeOut,ScaleX,ScaleY,Spacing,Angle,BorderStyle,Outline,Shadow,Alignment,MarginL,MarginR,MarginV,Encoding",
    `Style: Default,${style.fontName},${style.fontSize},${style.primaryColor},${style.primaryColor},${style.outlineColor},${style.shadowColor},${style.bold ? -1 : 0},0,0,0,100,100,0,0,1,${style.outlineWidth},${style.shadowDepth},2,10,10,${style.marginV},1`,
    "",
    "[Events]",
    "Format: Layer,Start,End,Style,Name,MarginL,MarginR,MarginV,Effect,Text"
  ];
}

function groupCues(cues: SubtitleCue[], size: number) {
  const groups: SubtitleCue[][] = [];
  for (let i = 0; i < cues.length; i += size) {
    groups.push(cues.slice(i, i + size));
  }
  return groups;
}

function dialogue(layer: number, start: number, end: number, text: string) {
  return `Dialogue: ${layer},${toAssTimestamp(start)},${toAssTimestamp(end)},Default,,0,0,0,,{\\an2}${text}`;
}

function highlightedLine(words: string[], index: number, style: AssStyle) {
  return words
    .map((word, i) => (i === index ? `{\\c${style.highlightColor}&}${word}{\\c${style.primaryColor}&}` : word))
    .join(" ");
}

/**
 * Two layers per line: layer 0 keeps the whole line visible, layer 1 repeats
 * it once per word with only that word in the highlight colour.
 */
export function buildAssSubtitles(cues: SubtitleCue[], overrides?: Partial<AssStyle>) {
  const style = { ...DEFAULT_ASS_STYLE, ...overrides };
  const events: string[] = [];

  for (const group of groupCues(cues, Math.max(1, style.wordsPerLine))) {
    const words = group.map((cue) => escapeAssText(cue.word));
    const last = group[group.length - 1];
    events.push(dialogue(0, group[0].clip_relative_start, last.clip_relative_end + LINE_TAIL_S, words.join(" ")));
    group.forEach((cue, index) => {
      events.push(dialogue(1, cue.clip_relative_start, cue.clip_relative_end + WORD_TAIL_S, highlightedLine(words, index, style)));
    });
  }

  return [...assHeader(style), ...events, ""].join("\n");
}
