import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

function loadEnvFile(filename: string) {
  const fullPath = path.resolve(process.cwd(), filename);
  if (!fs.existsSync(fullPath)) return;

  const content = fs.readFileSync(fullPath, "utf8");
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const idx = trimmed.indexOf("=");
    if (idx <= 0) continue;
    const key = trimmed.slice(0, idx).trim();
    const rawValue = trimmed.slice(idx + 1).trim();
    if (process.env[key] !== undefined) continue;
    process.env[key] = rawValue.replace(/^"|"$/g, "");
  }
}

loadEnvFile(".env");
loadEnvFile(".env.local");

function readArg(flag: string) {
  const idx = process.argv.indexOf(flag);
  return idx >= 0 ? process.argv[idx + 1] : undefined;
}

async function main() {
  // env is parsed on import, so it has to load after the .env files
  const { env, highlightConfigFromEnv } = await import("@/lib/env");
  const { detectHighlights } = await import("@/lib/highlights/pipeline");
  const { buildAssSubtitles } = await import("@/lib/subtitles/ass");
  const { computeRmsEnvelope, parseSceneDetectionLog } = await import("@/lib/highlights/extractors");

  const inputPath = process.argv[2];
  if (!inputPath || inputPath.startsWith("--")) {
    throw new Error(
      "Usage: highlight-runner <analysis.json> [--out <dir>] [--scene-log <ffmpeg.log>] [--pcm <mono.f32le> --sample-rate <hz>]"
    );
  }
  const outDir = path.resolve(process.cwd(), readArg("--out") ?? env.OUTPUT_DIR);

  const startedAt = Date.now();
  const parsed: unknown = JSON.parse(await fsp.readFile(inputPath, "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${inputPath} must hold a JSON object`);
  }
  const raw: Record<string, unknown> = { ...parsed };

  const sceneLogPath = readArg("--scene-log");
  if (sceneLogPath) {
    raw.scene_cuts = parseSceneDetectionLog(await fsp.readFile(sceneLogPath, "utf8"));
  }

  const pcmPath = readArg("--pcm");
  if (pcmPath) {
    const sampleRate = Number(readArg("--sample-rate") ?? 16000);
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new Error("--sample-rate must be a positive number");
    }
    const bytes = await fsp.readFile(pcmPath);
    const pcm = Array.from({ length: Math.floor(bytes.byteLength / 4) }, (_, i) => bytes.readFloatLE(i * 4));
    raw.loudness = computeRmsEnvelope(pcm, sampleRate);
  }

  const result = detectHighlights(raw, highlightConfigFromEnv(env));

  await fsp.mkdir(outDir, { recursive: true });
  await fsp.writeFile(path.join(outDir, "clips.json"), JSON.stringify(result, null, 2), "utf8");
  for (const clip of result.clips) {
    await fsp.writeFile(path.join(outDir, `clip_${clip.rank}.ass`), buildAssSubtitles(clip.cues), "utf8");
  }

  const tookSeconds = ((Date.now() - startedAt) / 1000).toFixed(1);
  if (!result.clips.length) {
    console.log(`[highlights] no highlights detected in ${inputPath} (${tookSeconds}s)`);
    return;
  }
  for (const clip of result.clips) {
    console.log(
      `[highlights] #${clip.rank} ${clip.start}s-${clip.end}s score=${clip.score.toFixed(3)} reason=${clip.reason} words=${clip.cues.length}`
    );
  }
  console.log(`[highlights] wrote ${result.clips.length} clips to ${outDir} in ${tookSeconds}s`);
}

main().catch(async (error: unknown) => {
  const { isHighlightError } = await import("@/lib/highlights/errors");
  if (isHighlightError(error)) {
    console.error(`[highlights] ${error.code}: ${error.userMessage} (${error.message})`);
  } else {
    console.error("[highlights] fatal error", error);
  }
  process.exit(1);
});
