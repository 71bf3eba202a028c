import { EventEmitter } from "events";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ErrorCode } from "@caption-sync/core";

type Behaviour = (child: FakeChild) => void;

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  exitCode: number | null = null;
  kill = vi.fn(() => {
    setImmediate(() => this.emit("close", null, "SIGKILL"));
    return true;
  });

  finish(code: number) {
    this.exitCode = code;
    this.emit("close", code, null);
  }
}

const state = vi.hoisted(() => {
  const hoisted: { behaviour: ((child: unknown) => void) | null } = { behaviour: null };
  return hoisted;
});

vi.mock("child_process", () => ({
  spawn: vi.fn(() => {
    const child = new FakeChild();
    setImmediate(() => state.behaviour?.(child));
    return child;
  }),
}));

import { spawn } from "child_process";
import { runCommand, tail } from "./process";

const behave = (behaviour: Behaviour) => {
  state.behaviour = (child) => {
    if (child instanceof FakeChild) behaviour(child);
  };
};

describe("runCommand", () => {
  beforeEach(() => {
    state.behaviour = null;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should collect output and the exit code", async () => {
    behave((child) => {
      child.stdout.emit("data", Buffer.from("hello "));
      child.stdout.emit("data", Buffer.from("world"));
      child.stderr.emit("data", Buffer.from("warn"));
      child.finish(3);
    });

    const result = await runCommand("tool", ["--flag"], { cwd: "/tmp" });

    expect(result).toEqual({ exitCode: 3, stdout: "hello world", stderr: "warn" });
    expect(spawn).toHaveBeenCalledWith("tool", ["--flag"], {
      cwd: "/tmp",
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
    });
  });

  it("should report a missing command as a missing engine", async () => {
    behave((child) => {
      child.emit("error", Object.assign(new Error("spawn tool ENOENT"), { code: "ENOENT" }));
    });

    await expect(runCommand("tool", [], { dependency: "ffmpeg" })).rejects.toMatchObject({
      code: ErrorCode.ENGINE_MISSING,
      message: "Required ffmpeg not found: tool",
    });
  });

  it("should kill the process when it times out", async () => {
    behave(() => undefined);

    await expect(runCommand("slow", [], { timeoutMs: 20 })).rejects.toMatchObject({
      code: ErrorCode.ENGINE_TIMEOUT,
      message: "slow did not finish within 20 ms",
    });
  });

  it("should kill the process when the run is aborted", async () => {
    const controller = new AbortController();
    behave(() => controller.abort());

    await expect(runCommand("slow", [], { signal: controller.signal })).rejects.toMatchObject({
      code: ErrorCode.ABORTED,
    });
  });

  it("should refuse to start after an abort", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(runCommand("tool", [], { signal: controller.signal })).rejects.toMatchObject({
      code: ErrorCode.ABORTED,
      message: "Aborted before running tool",
    });
  });
});

describe("tail", () => {
  it("should keep the last lines", () => {
    expect(tail("a\nb\nc\n", 2)).toBe("b\nc");
  });
});
