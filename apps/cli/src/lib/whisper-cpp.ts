import fs from "fs/promises";
import path from "path";
import {
  CaptionSyncError,
  EngineMissingError,
  ErrorCode,
  type OptionalLogger,
} from "@caption-sync/core";
import { fileExists } from "../utils/file";
import { runCommand, tail } from "./process";

export interface BaseEngineOptions {
  bin: string;
  model: string;
  /** `auto` lets whisper.cpp detect the language */
  language?: string;
  threads?: number;
  prompt?: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: OptionalLogger;
}

const isPath = (command: string) => command.includes("/") || command.includes("\\");

/**
 * Runs the whisper.cpp CLI on a WAV file and returns its SRT output. When no
 * SRT file appears, the console transcript is returned instead; the base
 * adapter reads both.
 *
 * @throws EngineMissingError when the binary or the model is missing
 */
export async function runBaseEngine(
  wav: string,
  workdir: string,
  options: BaseEngineOptions
): Promise<string> {
  const {
    bin,
    model,
    language = "auto",
    threads,
    prompt,
    timeoutMs,
    signal,
    logger,
  } = options;

  if (!(await fileExists(model))) {
    throw new EngineMissingError("whisper.cpp model", model);
  }
  if (isPath(bin) && !(await fileExists(bin))) {
    throw new EngineMissingError("whisper.cpp binary", bin);
  }

  const outputBase = path.join(workdir, "base");
  const args = ["-m", model, "-f", wav, "-osrt", "-of", outputBase, "-l", language || "auto"];

  if (threads) {
    args.push("-t", String(threads));
  }

  if (prompt) {
    args.push("--prompt", prompt);
  }

  logger?.info?.(`[Transcribe] Running whisper.cpp on ${path.basename(wav)}`);
  const result = await runCommand(bin, args, {
    cwd: workdir,
    timeoutMs,
    signal,
    dependency: "whisper.cpp binary",
    logger,
  });

  if (result.exitCode !== 0) {
    throw new CaptionSyncError(
      ErrorCode.ENGINE_FAILED,
      `whisper.cpp exited with code ${result.exitCode}:\n${tail(result.stderr)}`
    );
  }

  const srtFile = `${outputBase}.srt`;
  if (await fileExists(srtFile)) {
    return fs.readFile(srtFile, "utf8");
  }

  logger?.warn?.(`[Transcribe] ${srtFile} was not written, reading console output`);
  return result.stdout;
}
