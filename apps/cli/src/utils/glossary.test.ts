import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ErrorCode } from "@caption-sync/core";
import { loadGlossaryFile } from "./glossary";

describe("loadGlossaryFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "caption-sync-glossary-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should read text glossaries", async () => {
    const file = path.join(dir, "terms.txt");
    await fs.writeFile(file, "kubernetis=Kubernetes\n");
    const logger = { info: vi.fn() };

    const glossary = await loadGlossaryFile(file, logger);

    expect([...glossary]).toEqual([["kubernetis", "Kubernetes"]]);
    expect(logger.info).toHaveBeenCalledWith(`[Glossary] Loaded 1 term(s) from ${file}`);
  });

  it("should read JSON glossaries by extension", async () => {
    const file = path.join(dir, "terms.JSON");
    await fs.writeFile(file, '{"open ai": "OpenAI"}');

    await expect(loadGlossaryFile(file)).resolves.toEqual(new Map([["open ai", "OpenAI"]]));
  });

  it("should fail with a configuration error when the file is missing", async () => {
    await expect(loadGlossaryFile(path.join(dir, "missing.txt"))).rejects.toMatchObject({
      code: ErrorCode.CONFIG_INVALID,
    });
  });
});
