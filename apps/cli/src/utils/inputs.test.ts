import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectInputs, commonDirectory, isMediaFile, outputNames } from "./inputs";

describe("isMediaFile", () => {
  it("should match audio and video extensions case-insensitively", () => {
    expect(isMediaFile("talk.MP4")).toBe(true);
    expect(isMediaFile("/a/b/podcast.flac")).toBe(true);
    expect(isMediaFile("notes.txt")).toBe(false);
    expect(isMediaFile("README")).toBe(false);
  });
});

describe("collectInputs", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-sync-inputs-"));
    await fs.mkdir(path.join(dir, "nested"));
    await Promise.all(
      ["b.mkv", "A.mp4", "notes.txt", "nested/c.wav"].map((file) =>
        fs.writeFile(path.join(dir, file), "")
      )
    );
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should return a single media file as is", async () => {
    const file = path.join(dir, "b.mkv");
    await expect(collectInputs(file)).resolves.toEqual([file]);
    await expect(collectInputs(path.join(dir, "notes.txt"))).resolves.toEqual([]);
  });

  it("should list the media files of a directory sorted by name", async () => {
    await expect(collectInputs(dir)).resolves.toEqual([
      path.join(dir, "A.mp4"),
      path.join(dir, "b.mkv"),
    ]);
  });

  it("should descend into sub-directories when recursive", async () => {
    await expect(collectInputs(dir, true)).resolves.toEqual([
      path.join(dir, "A.mp4"),
      path.join(dir, "b.mkv"),
      path.join(dir, "nested", "c.wav"),
    ]);
  });
});

describe("outputNames", () => {
  it("should find the deepest shared directory", () => {
    expect(commonDirectory(["/media/a/x.mp4", "/media/a/b/y.mp4"])).toBe("/media/a");
    expect(commonDirectory(["/a/x.mp4", "/b/y.mp4"])).toBe("/");
  });

  it("should mirror sub-directories so equal names do not collide", () => {
    expect(outputNames(["/media/a/talk.mp4", "/media/b/talk.mp4", "/media/intro.mkv"])).toEqual(
      new Map([
        ["/media/a/talk.mp4", "a/talk"],
        ["/media/b/talk.mp4", "b/talk"],
        ["/media/intro.mkv", "intro"],
      ])
    );
  });

  it("should keep the extension when only it tells two files apart", () => {
    expect(outputNames(["/media/talk.mp4", "/media/talk.mkv"], "/media")).toEqual(
      new Map([
        ["/media/talk.mp4", "talk.mp4"],
        ["/media/talk.mkv", "talk.mkv"],
      ])
    );
  });
});
