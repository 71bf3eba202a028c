import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("./process", () => ({
  runCommand: vi.fn(),
  tail: (text: string) => text,
}));

import fs from "fs/promises";
import os from "os";
import path from "path";
import { ErrorCode } from "@caption-sync/core";
import {
  extractWav,
  parseAudioStreams,
  pickLongestStream,
  probeLongestAudioStream,
  splitWav,
} from "./ffmpeg";
import { runCommand } from "./process";

describe("audio stream selection", () => {
  it("should parse ffprobe csv output", () => {
    expect(parseAudioStreams("1,120.5\n2,N/A\r\n3,300\n")).toEqual([
      { index: 1, ordinal: 0, duration: 120.5 },
      { index: 2, ordinal: 1, duration: null },
      { index: 3, ordinal: 2, duration: 300 },
    ]);
  });

  it("should pick the longest stream and the first one on ties", () => {
    expect(
      pickLongestStream([
        { index: 1, ordinal: 0, duration: 10 },
        { index: 2, ordinal: 1, duration: 30 },
        { index: 3, ordinal: 2, duration: 30 },
      ])
    ).toBe(1);
    expect(pickLongestStream([{ index: 4, ordinal: 0, duration: null }])).toBe(0);
    expect(pickLongestStream([])).toBeNull();
  });
});

describe("ffmpeg tools", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should select the longest audio track", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 0, stdout: "1,10\n2,20\n", stderr: "" });

    await expect(probeLongestAudioStream("ffprobe", "in.mkv")).resolves.toBe(1);
    expect(runCommand).toHaveBeenCalledWith(
      "ffprobe",
      ["-v", "error", "-select_streams", "a", "-show_entries", "stream=index,duration", "-of", "csv=p=0", "in.mkv"],
      { dependency: "ffprobe" }
    );
  });

  it("should fall back to the first track when ffprobe fails", async () => {
    const logger = { warn: vi.fn() };
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 1, stdout: "", stderr: "bad" });

    await expect(probeLongestAudioStream("ffprobe", "in.mkv", { logger })).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      "[FFmpeg] ffprobe exited with code 1, using the first audio track"
    );
  });

  it("should extract mono 16 kHz audio from the chosen track", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });

    await extractWav("ffmpeg", "in.mkv", "out.wav", 2, { timeoutMs: 100 });

    expect(runCommand).toHaveBeenCalledWith(
      "ffmpeg",
      ["-y", "-i", "in.mkv", "-map", "0:a:2", "-vn", "-ac", "1", "-ar", "16000", "-c:a", "pcm_s16le", "out.wav"],
      { timeoutMs: 100, dependency: "ffmpeg" }
    );
  });

  it("should fail when ffmpeg exits with an error", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 1, stdout: "", stderr: "no audio" });

    await expect(extractWav("ffmpeg", "in.mkv", "out.wav", null)).rejects.toMatchObject({
      code: ErrorCode.ENGINE_FAILED,
      message: "ffmpeg exited with code 1:\nno audio",
    });
  });
});

describe("splitWav", () => {
  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-sync-split-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should return the written chunks in order", async () => {
    const chunksDir = path.join(dir, "chunks");
    vi.mocked(runCommand).mockImplementation(async () => {
      await fs.writeFile(path.join(chunksDir, "chunk-00001.wav"), "");
      await fs.writeFile(path.join(chunksDir, "chunk-00000.wav"), "");
      await fs.writeFile(path.join(chunksDir, "notes.txt"), "");
      return { exitCode: 0, stdout: "", stderr: "" };
    });

    const chunks = await splitWav("ffmpeg", "in.wav", 600, chunksDir);

    expect(chunks).toEqual([
      path.join(chunksDir, "chunk-00000.wav"),
      path.join(chunksDir, "chunk-00001.wav"),
    ]);
    expect(runCommand).toHaveBeenCalledWith(
      "ffmpeg",
      ["-y", "-i", "in.wav", "-f", "segment", "-segment_time", "600", "-c", "copy", path.join(chunksDir, "chunk-%05d.wav")],
      { dependency: "ffmpeg" }
    );
  });

  it("should fail when ffmpeg writes no chunks", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });

    await expect(splitWav("ffmpeg", "in.wav", 600, dir)).rejects.toMatchObject({
      code: ErrorCode.ENGINE_FAILED,
      message: "ffmpeg wrote no audio chunks for in.wav",
    });
  });
});
