import fs from "fs/promises";
import path from "path";
import {
  CaptionSyncError,
  ErrorCode,
  type OptionalLogger,
} from "@caption-sync/core";
import { runCommand, tail } from "./process";

export interface MediaToolOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: OptionalLogger;
}

export interface AudioStreamInfo {
  /** Container stream index */
  index: number;
  /** Position among the audio streams, as used by `-map 0:a:N` */
  ordinal: number;
  /** Seconds, `null` when ffprobe reports none */
  duration: number | null;
}

/** Parses `ffprobe -show_entries stream=index,duration -of csv=p=0` output. */
export function parseAudioStreams(output: string): AudioStreamInfo[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .map((line, ordinal) => {
      const [index, duration] = line.split(",");
      const seconds = Number(duration);
      return {
        index: Number(index),
        ordinal,
        duration: duration && Number.isFinite(seconds) ? seconds : null,
      };
    });
}

/** Ordinal of the longest audio stream, the first one on ties. */
export function pickLongestStream(streams: AudioStreamInfo[]): number | null {
  let best: AudioStreamInfo | null = null;
  for (const stream of streams) {
    if (!best || (stream.duration ?? -1) > (best.duration ?? -1)) {
      best = stream;
    }
  }
  return best ? best.ordinal : null;
}

/**
 * Finds the longest audio track of a media file. Returns `null` when ffprobe
 * fails or reports no audio, so extraction falls back to the first track.
 */
export async function probeLongestAudioStream(
  ffprobeBin: string,
  input: string,
  options: MediaToolOptions = {}
): Promise<number | null> {
  const result = await runCommand(
    ffprobeBin,
    [
      "-v",
      "error",
      "-select_streams",
      "a",
      "-show_entries",
      "stream=index,duration",
      "-of",
      "csv=p=0",
      input,
    ],
    { ...options, dependency: "ffprobe" }
  );

  if (result.exitCode !== 0) {
    options.logger?.warn?.(
      `[FFmpeg] ffprobe exited with code ${result.exitCode}, using the first audio track`
    );
    return null;
  }

  const ordinal = pickLongestStream(parseAudioStreams(result.stdout));
  options.logger?.debug?.(`[FFmpeg] Selected audio track ${ordinal ?? 0} of ${input}`);
  return ordinal;
}

/** Extracts one audio track as mono 16 kHz PCM WAV. */
export async function extractWav(
  ffmpegBin: string,
  input: string,
  output: string,
  audioStream: number | null,
  options: MediaToolOptions = {}
): Promise<void> {
  const args = [
    "-y",
    "-i",
    input,
    "-map",
    `0:a:${audioStream ?? 0}`,
    "-vn",
    "-ac",
    "1",
    "-ar",
    "16000",
    "-c:a",
    "pcm_s16le",
    output,
  ];

  const result = await runCommand(ffmpegBin, args, { ...options, dependency: "ffmpeg" });
  if (result.exitCode !== 0) {
    throw new CaptionSyncError(
      ErrorCode.ENGINE_FAILED,
      `ffmpeg exited with code ${result.exitCode}:\n${tail(result.stderr)}`
    );
  }
}

const CHUNK_FILE = /^chunk-\d{5}\.wav$/;

/**
 * Cuts a WAV file into consecutive pieces of `chunkSeconds` and returns
 * their paths in playback order.
 */
export async function splitWav(
  ffmpegBin: string,
  wav: string,
  chunkSeconds: number,
  outputDir: string,
  options: MediaToolOptions = {}
): Promise<string[]> {
  await fs.mkdir(outputDir, { recursive: true });
  const args = [
    "-y",
    "-i",
    wav,
    "-f",
    "segment",
    "-segment_time",
    String(chunkSeconds),
    "-c",
    "copy",
    path.join(outputDir, "chunk-%05d.wav"),
  ];

  const result = await runCommand(ffmpegBin, args, { ...options, dependency: "ffmpeg" });
  if (result.exitCode !== 0) {
    throw new CaptionSyncError(
      ErrorCode.ENGINE_FAILED,
      `ffmpeg exited with code ${result.exitCode} while splitting audio:\n${tail(result.stderr)}`
    );
  }

  const chunks = (await fs.readdir(outputDir)).filter((name) => CHUNK_FILE.test(name)).sort();
  if (!chunks.length) {
    throw new CaptionSyncError(ErrorCode.ENGINE_FAILED, `ffmpeg wrote no audio chunks for ${wav}`);
  }
  options.logger?.debug?.(`[FFmpeg] Split ${wav} into ${chunks.length} chunk(s)`);
  return chunks.map((name) => path.join(outputDir, name));
}
