import { z } from "zod";
import {
  ConfigError,
  DEFAULT_POLISH_OPTIONS,
  DEFAULT_SYNC_OPTIONS,
  OUTPUT_FORMATS,
  type DiarizeRequest,
  type OutputFormat,
  type RequestedEngine,
} from "@caption-sync/core";

export type Environment = Record<string, string | undefined>;

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envBoolean = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      const normalized = value?.trim().toLowerCase();
      if (!normalized) return fallback;
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a boolean, got "${value}"`,
      });
      return z.NEVER;
    });

const envString = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback));

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const ratio = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().min(0).max(1).default(fallback));

const milliseconds = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const formatList = z.preprocess(
  blankToUndefined,
  z
    .string()
    .default("srt,vtt,txt,timestamped,json")
    .transform((value) => value.split(",").map((item) => item.trim().toLowerCase()).filter(Boolean))
    .pipe(z.array(z.enum(OUTPUT_FORMATS)).min(1))
    .transform((formats) => [...new Set(formats)])
);

const envSchema = z.object({
  CAPTION_OUTPUT_DIR: envString("./output"),
  CAPTION_LANGUAGE: envString("auto"),
  CAPTION_ENGINE: z.preprocess(
    blankToUndefined,
    z.enum(["auto", "base_only", "aligned"]).default("auto")
  ),
  CAPTION_DIARIZE: z.preprocess(blankToUndefined, z.enum(["on", "off", "auto"]).default("auto")),
  CAPTION_ALIGN_SLACK: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).default(DEFAULT_SYNC_OPTIONS.slack)
  ),
  CAPTION_APPROXIMATE: envBoolean(DEFAULT_SYNC_OPTIONS.approximate),
  CAPTION_CLIP_WARN_RATIO: ratio(DEFAULT_SYNC_OPTIONS.clipWarnRatio),
  CAPTION_CLIP_FATAL_RATIO: ratio(DEFAULT_SYNC_OPTIONS.clipFatalRatio),
  CAPTION_KARAOKE: envBoolean(false),
  CAPTION_FORMATS: formatList,
  CAPTION_CONCURRENCY: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).default(1)),
  CAPTION_FORCE: envBoolean(false),
  CAPTION_RECURSIVE: envBoolean(false),
  CAPTION_SPEAKER_PREFIX: envBoolean(false),
  CAPTION_MAX_CHARS_PER_LINE: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().min(0).default(42)
  ),
  CAPTION_MAX_LINES: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(2)),
  CAPTION_POLISH: envBoolean(false),
  CAPTION_MAX_CPS: z.preprocess(
    blankToUndefined,
    z.coerce.number().positive().default(DEFAULT_POLISH_OPTIONS.maxCps)
  ),
  CAPTION_MIN_DURATION_MS: milliseconds(DEFAULT_POLISH_OPTIONS.minDuration * 1000),
  CAPTION_MAX_DURATION_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_POLISH_OPTIONS.maxDuration * 1000)
  ),
  CAPTION_MERGE_GAP_MS: milliseconds(DEFAULT_POLISH_OPTIONS.mergeGap * 1000),
  CAPTION_REDACT_PII: envBoolean(false),
  CAPTION_GLOSSARY: optionalString,
  CAPTION_CHUNK_SECONDS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(0)),
  CAPTION_AUDIO_STREAM: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
  CAPTION_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(60 * 60 * 1000)
  ),
  WHISPER_BIN: envString("whisper-cli"),
  WHISPER_MODEL: envString("models/ggml-large-v3.bin"),
  WHISPER_THREADS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  WHISPER_PROMPT: optionalString,
  WHISPERX_BIN: envString("whisperx"),
  WHISPERX_MODEL: envString("large-v3"),
  WHISPERX_COMPUTE_TYPE: optionalString,
  FFMPEG_BIN: envString("ffmpeg"),
  FFPROBE_BIN: envString("ffprobe"),
  HF_TOKEN_ENV: envString("HF_TOKEN"),
});

export type ConfigKey = keyof typeof envSchema.shape;

export interface CliConfig {
  outputDir: string;
  /** Language hint, `auto` lets the engines detect it */
  language: string;
  engine: RequestedEngine;
  diarize: DiarizeRequest;
  alignSlack: number;
  approximate: boolean;
  clipWarnRatio: number;
  clipFatalRatio: number;
  karaoke: boolean;
  formats: OutputFormat[];
  concurrency: number;
  force: boolean;
  recursive: boolean;
  speakerPrefix: boolean;
  maxCharsPerLine: number;
  maxLines: number;
  /** Reading-oriented cue reshaping, durations in seconds */
  polish: {
    enabled: boolean;
    maxCps: number;
    minDuration: number;
    maxDuration: number;
    mergeGap: number;
  };
  redactPii: boolean;
  /** JSON or `from=to` text file of term replacements */
  glossaryFile?: string;
  /** Transcribe the audio in pieces of this many seconds, 0 for one run */
  chunkSeconds: number;
  audioStream?: number;
  timeoutMs: number;
  whisper: { bin: string; model: string; threads?: number; prompt?: string };
  whisperx: { bin: string; model: string; computeType?: string };
  ffmpegBin: string;
  ffprobeBin: string;
  hfTokenEnv: string;
  hfToken?: string;
}

/**
 * Builds the CLI configuration from environment variables. `overrides`
 * (command-line flags) win over the environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Environment,
  overrides: Partial<Record<ConfigKey, string>> = {}
): CliConfig {
  const parsed = envSchema.safeParse({ ...env, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { cause: parsed.error }
    );
  }

  const values = parsed.data;
  if (values.CAPTION_CLIP_WARN_RATIO > values.CAPTION_CLIP_FATAL_RATIO) {
    throw new ConfigError(
      "Invalid configuration: CAPTION_CLIP_WARN_RATIO must not exceed CAPTION_CLIP_FATAL_RATIO"
    );
  }

  if (values.CAPTION_MIN_DURATION_MS > values.CAPTION_MAX_DURATION_MS) {
    throw new ConfigError(
      "Invalid configuration: CAPTION_MIN_DURATION_MS must not exceed CAPTION_MAX_DURATION_MS"
    );
  }

  const hfToken = env[values.HF_TOKEN_ENV]?.trim() || undefined;

  return {
    outputDir: values.CAPTION_OUTPUT_DIR,
    language: values.CAPTION_LANGUAGE,
    engine: values.CAPTION_ENGINE,
    diarize: values.CAPTION_DIARIZE,
    alignSlack: values.CAPTION_ALIGN_SLACK,
    approximate: values.CAPTION_APPROXIMATE,
    clipWarnRatio: values.CAPTION_CLIP_WARN_RATIO,
    clipFatalRatio: values.CAPTION_CLIP_FATAL_RATIO,
    karaoke: values.CAPTION_KARAOKE,
    formats: values.CAPTION_FORMATS,
    concurrency: values.CAPTION_CONCURRENCY,
    force: values.CAPTION_FORCE,
    recursive: values.CAPTION_RECURSIVE,
    speakerPrefix: values.CAPTION_SPEAKER_PREFIX,
    maxCharsPerLine: values.CAPTION_MAX_CHARS_PER_LINE,
    maxLines: values.CAPTION_MAX_LINES,
    polish: {
      enabled: values.CAPTION_POLISH,
      maxCps: values.CAPTION_MAX_CPS,
      minDuration: values.CAPTION_MIN_DURATION_MS / 1000,
      maxDuration: values.CAPTION_MAX_DURATION_MS / 1000,
      mergeGap: values.CAPTION_MERGE_GAP_MS / 1000,
    },
    redactPii: values.CAPTION_REDACT_PII,
    glossaryFile: values.CAPTION_GLOSSARY,
    chunkSeconds: values.CAPTION_CHUNK_SECONDS,
    audioStream: values.CAPTION_AUDIO_STREAM,
    timeoutMs: values.CAPTION_TIMEOUT_MS,
    whisper: {
      bin: values.WHISPER_BIN,
      model: values.WHISPER_MODEL,
      threads: values.WHISPER_THREADS,
      prompt: values.WHISPER_PROMPT,
    },
    whisperx: {
      bin: values.WHISPERX_BIN,
      model: values.WHISPERX_MODEL,
      computeType: values.WHISPERX_COMPUTE_TYPE,
    },
    ffmpegBin: values.FFMPEG_BIN,
    ffprobeBin: values.FFPROBE_BIN,
    hfTokenEnv: values.HF_TOKEN_ENV,
    hfToken,
  };
}
