import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("./process", () => ({
  runCommand: vi.fn(),
  tail: (text: string) => text,
}));

vi.mock("../utils/file", () => ({
  fileExists: vi.fn(),
}));

vi.mock("fs/promises", () => ({
  default: { readFile: vi.fn() },
}));

import fs from "fs/promises";
import { AlignedOutputError, ErrorCode } from "@caption-sync/core";
import { fileExists } from "../utils/file";
import { runCommand } from "./process";
import { probeAlignedRuntime, runAlignedEngine } from "./whisperx";

describe("probeAlignedRuntime", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should check explicit paths directly", async () => {
    vi.mocked(fileExists).mockResolvedValue(false);

    await expect(probeAlignedRuntime("/opt/venv/bin/whisperx")).resolves.toBe("unavailable");
    expect(fileExists).toHaveBeenCalledWith("/opt/venv/bin/whisperx");
  });

  it("should look bare names up on PATH", async () => {
    vi.mocked(fileExists).mockImplementation(async (file) => file === "/usr/local/bin/whisperx");

    await expect(
      probeAlignedRuntime("whisperx", { PATH: "/usr/bin:/usr/local/bin" })
    ).resolves.toBe("available");
    await expect(probeAlignedRuntime("whisperx", { PATH: "/usr/bin" })).resolves.toBe(
      "unavailable"
    );
  });

  it("should report unknown for launchers or an empty PATH", async () => {
    await expect(probeAlignedRuntime("conda run -n asr whisperx")).resolves.toBe("unknown");
    await expect(probeAlignedRuntime("whisperx", {})).resolves.toBe("unknown");
    expect(fileExists).not.toHaveBeenCalled();
  });
});

describe("runAlignedEngine", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should run the engine with diarization and read its JSON", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });
    vi.mocked(fileExists).mockResolvedValue(true);
    vi.mocked(fs.readFile).mockResolvedValue('{"segments":[]}');

    const output = await runAlignedEngine("/work/talk.wav", "/work/aligned", {
      command: "conda run -n asr whisperx",
      model: "large-v3",
      language: "en",
      diarize: true,
      hfToken: "test-secret",
      computeType: "int8",
    });

    expect(output).toBe('{"segments":[]}');
    expect(runCommand).toHaveBeenCalledWith(
      "conda",
      [
        "run",
        "-n",
        "asr",
        "whisperx",
        "/work/talk.wav",
        "--model",
        "large-v3",
        "--output_dir",
        "/work/aligned",
        "--output_format",
        "json",
        "--language",
        "en",
        "--diarize",
        "--hf_token",
        "test-secret",
        "--compute_type",
        "int8",
      ],
      expect.objectContaining({ dependency: "WhisperX" })
    );
    expect(fs.readFile).toHaveBeenCalledWith("/work/aligned/talk.json", "utf8");
  });

  it("should fail when the engine exits with an error", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 1, stdout: "", stderr: "CUDA error" });

    await expect(
      runAlignedEngine("/work/talk.wav", "/work/aligned", {
        command: "whisperx",
        model: "large-v3",
        diarize: false,
      })
    ).rejects.toMatchObject({
      code: ErrorCode.ENGINE_FAILED,
      message: "WhisperX exited with code 1:\nCUDA error",
    });
  });

  it("should fail when no JSON was written", async () => {
    vi.mocked(runCommand).mockResolvedValue({ exitCode: 0, stdout: "", stderr: "" });
    vi.mocked(fileExists).mockResolvedValue(false);

    await expect(
      runAlignedEngine("/work/talk.wav", "/work/aligned", {
        command: "whisperx",
        model: "large-v3",
        diarize: false,
      })
    ).rejects.toThrow(AlignedOutputError);
  });
});
