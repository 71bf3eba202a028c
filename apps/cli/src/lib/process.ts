import { spawn } from "child_process";
import { once } from "events";
import {
  CaptionSyncError,
  EngineMissingError,
  ErrorCode,
  type OptionalLogger,
} from "@caption-sync/core";

export interface RunCommandOptions {
  cwd?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Kill the process when the run is aborted */
  signal?: AbortSignal;
  /** Name used in the error when the command is not installed */
  dependency?: string;
  logger?: OptionalLogger;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

const isMissingCommand = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** Last lines of a process stream, for error messages. */
export const tail = (text: string, lines = 20) =>
  text.trimEnd().split(/\r?\n/).slice(-lines).join("\n");

/**
 * Runs an external command to completion and collects its output. A
 * non-zero exit code is returned, not thrown; callers decide what it means.
 */
export async function runCommand(
  bin: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  const { cwd, timeoutMs, signal, dependency = "command", logger } = options;

  if (signal?.aborted) {
    throw new CaptionSyncError(ErrorCode.ABORTED, `Aborted before running ${bin}`);
  }

  logger?.debug?.(`[Process] Running command: ${bin} ${args.join(" ")}`);
  const child = spawn(bin, args, {
    cwd,
    stdio: ["ignore", "pipe", "pipe"],
    shell: false,
  });

  let stdoutData = "";
  let stderrData = "";
  child.stdout.on("data", (data: Buffer) => {
    stdoutData += data.toString("utf8");
  });
  child.stderr.on("data", (data: Buffer) => {
    stderrData += data.toString("utf8");
  });

  let timedOut = false;
  const timer =
    timeoutMs && timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          child.kill("SIGKILL");
        }, timeoutMs)
      : undefined;
  const onAbort = () => {
    child.kill("SIGKILL");
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    await once(child, "close");
  } catch (error) {
    if (isMissingCommand(error)) {
      throw new EngineMissingError(dependency, bin, { cause: error });
    }
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }

  if (timedOut) {
    throw new CaptionSyncError(
      ErrorCode.ENGINE_TIMEOUT,
      `${bin} did not finish within ${timeoutMs} ms`
    );
  }
  if (signal?.aborted) {
    throw new CaptionSyncError(ErrorCode.ABORTED, `${bin} was aborted`);
  }

  return { exitCode: child.exitCode, stdout: stdoutData, stderr: stderrData };
}
