import fs from "fs/promises";
import path from "path";
import {
  AlignedOutputError,
  CaptionSyncError,
  ErrorCode,
  type OptionalLogger,
  type RuntimeAvailability,
} from "@caption-sync/core";
import { fileExists } from "../utils/file";
import { runCommand, tail } from "./process";

export interface AlignedEngineOptions {
  /** Executable, optionally followed by arguments (`conda run -n asr whisperx`) */
  command: string;
  model: string;
  language?: string;
  diarize: boolean;
  hfToken?: string;
  computeType?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: OptionalLogger;
}

const splitCommand = (command: string) => command.trim().split(/\s+/).filter(Boolean);

const isPath = (command: string) => command.includes("/") || command.includes("\\");

/**
 * Looks for the aligned engine without running it.
 *
 * A path is checked directly and a bare name is looked up on PATH. Launcher
 * commands with arguments (`conda run -n asr whisperx`) and an empty PATH cannot be
 * decided this way and yield `unknown`.
 */
export async function probeAlignedRuntime(
  command: string,
  env: Record<string, string | undefined> = process.env
): Promise<RuntimeAvailability> {
  const parts = splitCommand(command);
  if (parts.length !== 1) return "unknown";

  const [bin] = parts;
  if (isPath(bin)) {
    return (await fileExists(bin)) ? "available" : "unavailable";
  }

  const searchPath = (env.PATH ?? "").split(path.delimiter).filter(Boolean);
  if (!searchPath.length) return "unknown";

  for (const dir of searchPath) {
    if (await fileExists(path.join(dir, bin))) return "available";
  }
  return "unavailable";
}

/**
 * Runs WhisperX on a WAV file and returns the JSON text it writes. The
 * output is only read after a successful exit.
 */
export async function runAlignedEngine(
  wav: string,
  outputDir: string,
  options: AlignedEngineOptions
): Promise<string> {
  const {
    command,
    model,
    language,
    diarize,
    hfToken,
    computeType,
    timeoutMs,
    signal,
    logger,
  } = options;
  const [bin = "whisperx", ...launcherArgs] = splitCommand(command);

  const args = [
    ...launcherArgs,
    wav,
    "--model",
    model,
    "--output_dir",
    outputDir,
    "--output_format",
    "json",
  ];

  if (language && language !== "auto") {
    args.push("--language", language);
  }

  if (diarize) {
    args.push("--diarize");
    if (hfToken) {
      args.push("--hf_token", hfToken);
    }
  }

  if (computeType) {
    args.push("--compute_type", computeType);
  }

  logger?.info?.(`[WhisperX] Aligning words for ${path.basename(wav)}`);
  const result = await runCommand(bin, args, {
    timeoutMs,
    signal,
    dependency: "WhisperX",
    logger,
  });

  if (result.exitCode !== 0) {
    throw new CaptionSyncError(
      ErrorCode.ENGINE_FAILED,
      `WhisperX exited with code ${result.exitCode}:\n${tail(result.stderr || result.stdout)}`
    );
  }

  const jsonFile = path.join(outputDir, `${path.parse(wav).name}.json`);
  if (!(await fileExists(jsonFile))) {
    throw new AlignedOutputError(`WhisperX finished without writing ${jsonFile}`);
  }
  return fs.readFile(jsonFile, "utf8");
}
