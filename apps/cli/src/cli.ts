#!/usr/bin/env tsx
import dotenv from "dotenv";
import meow from "meow";
import { isCaptionSyncError } from "@caption-sync/core";
import { loadConfig, type ConfigKey } from "./config";
import { runBatch } from "./tools/batch";
import { collectInputs } from "./utils/inputs";

dotenv.config();

const cli = meow(
  `
  Usage
    $ caption-sync <file-or-directory> [options]

  Options
    --output-dir      Where captions are written (CAPTION_OUTPUT_DIR, default ./output)
    --language        Language hint or "auto" (CAPTION_LANGUAGE)
    --engine          auto | base_only | aligned (CAPTION_ENGINE)
    --diarize         on | off | auto (CAPTION_DIARIZE)
    --formats         Comma separated: srt,vtt,ass,txt,timestamped,json (CAPTION_FORMATS)
    --karaoke         Also write ASS karaoke subtitles (CAPTION_KARAOKE)
    --speaker-prefix  Prefix cues with [SPEAKER] (CAPTION_SPEAKER_PREFIX)
    --polish          Merge, split and lengthen cues for reading (CAPTION_POLISH)
    --redact-pii      Mask e-mails, phone, CPF and CNPJ numbers (CAPTION_REDACT_PII)
    --glossary        Term replacements, .json or "from=to" lines (CAPTION_GLOSSARY)
    --chunk-seconds   Transcribe long audio in pieces of N seconds (CAPTION_CHUNK_SECONDS)
    --concurrency     Files processed in parallel (CAPTION_CONCURRENCY)
    --audio-stream    Audio track to use instead of the longest one (CAPTION_AUDIO_STREAM)
    --recursive       Descend into sub-directories (CAPTION_RECURSIVE)
    --force           Ignore cached base transcriptions (CAPTION_FORCE)

  Examples
    $ caption-sync talk.mp4 --karaoke
    $ caption-sync ./videos --engine base_only --concurrency 2
    $ caption-sync interview.mkv --polish --glossary terms.txt
`,
  {
    importMeta: import.meta,
    flags: {
      outputDir: { type: "string" },
      language: { type: "string" },
      engine: { type: "string" },
      diarize: { type: "string" },
      formats: { type: "string" },
      karaoke: { type: "boolean" },
      speakerPrefix: { type: "boolean" },
      polish: { type: "boolean" },
      redactPii: { type: "boolean" },
      glossary: { type: "string" },
      chunkSeconds: { type: "number" },
      concurrency: { type: "number" },
      audioStream: { type: "number" },
      recursive: { type: "boolean" },
      force: { type: "boolean" },
    },
  }
);

const asOverride = (value: string | number | boolean | undefined) =>
  value === undefined ? undefined : String(value);

function flagOverrides(): Partial<Record<ConfigKey, string>> {
  const { flags } = cli;
  const overrides: Partial<Record<ConfigKey, string | undefined>> = {
    CAPTION_OUTPUT_DIR: flags.outputDir,
    CAPTION_LANGUAGE: flags.language,
    CAPTION_ENGINE: flags.engine,
    CAPTION_DIARIZE: flags.diarize,
    CAPTION_FORMATS: flags.formats,
    CAPTION_KARAOKE: asOverride(flags.karaoke),
    CAPTION_SPEAKER_PREFIX: asOverride(flags.speakerPrefix),
    CAPTION_POLISH: asOverride(flags.polish),
    CAPTION_REDACT_PII: asOverride(flags.redactPii),
    CAPTION_GLOSSARY: flags.glossary,
    CAPTION_CHUNK_SECONDS: asOverride(flags.chunkSeconds),
    CAPTION_CONCURRENCY: asOverride(flags.concurrency),
    CAPTION_AUDIO_STREAM: asOverride(flags.audioStream),
    CAPTION_RECURSIVE: asOverride(flags.recursive),
    CAPTION_FORCE: asOverride(flags.force),
  };
  return Object.fromEntries(
    Object.entries(overrides).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

async function main() {
  const [input] = cli.input;
  if (!input) {
    cli.showHelp(2);
    return;
  }

  const config = loadConfig(process.env, flagOverrides());
  const files = await collectInputs(input, config.recursive);
  if (!files.length) {
    console.error(`No media files found in ${input}`);
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("[CLI] Interrupted, stopping running engines...");
    controller.abort();
  });

  console.log(`[CLI] Processing ${files.length} file(s) into ${config.outputDir}`);
  const summary = await runBatch(files, config, {
    signal: controller.signal,
    logger: console,
  });

  console.log(
    `[CLI] ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`
  );
  for (const failure of summary.failed) {
    console.error(`  ${failure.input}: [${failure.code}] ${failure.message}`);
  }
  if (summary.failed.length) {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (isCaptionSyncError(error)) {
    console.error(`Error [${error.code}]${error.file ? ` in ${error.file}` : ""}: ${error.message}`);
  } else {
    console.error("Error in CLI:", error);
  }
  process.exit(1);
});
