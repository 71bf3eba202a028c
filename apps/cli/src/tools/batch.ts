import pLimit from "p-limit";
import {
  ErrorCode,
  isCaptionSyncError,
  type ErrorCodeValue,
  type OptionalLogger,
} from "@caption-sync/core";
import type { CliConfig } from "../config";
import { loadGlossaryFile } from "../utils/glossary";
import { outputNames } from "../utils/inputs";
import { processFile, type FileResult } from "./pipeline";

export interface FailedFile {
  input: string;
  code: ErrorCodeValue | "UNEXPECTED";
  message: string;
}

export interface BatchSummary {
  succeeded: FileResult[];
  failed: FailedFile[];
}

export interface RunBatchOptions {
  signal?: AbortSignal;
  logger?: OptionalLogger;
  /** Directory whose layout the outputs mirror, by default the files' common directory */
  inputRoot?: string;
}

/**
 * Processes files through a bounded worker pool. A failing file is recorded
 * and the others continue, except when an engine is missing: that aborts the
 * whole batch and is rethrown. The glossary is loaded once, before any file
 * starts.
 */
export async function runBatch(
  files: string[],
  config: CliConfig,
  options: RunBatchOptions = {}
): Promise<BatchSummary> {
  const { logger } = options;
  const limit = pLimit(config.concurrency);
  const names = outputNames(files, options.inputRoot);
  const glossary = config.glossaryFile
    ? await loadGlossaryFile(config.glossaryFile, logger)
    : undefined;
  const controller = new AbortController();
  const onAbort = () => controller.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });
  if (options.signal?.aborted) controller.abort();

  const succeeded: FileResult[] = [];
  const failed: FailedFile[] = [];
  let fatal: unknown = null;

  const run = async (input: string, position: number) => {
    if (controller.signal.aborted) return;
    logger?.info?.(`[Batch] (${position + 1}/${files.length}) ${input}`);
    try {
      const result = await processFile(input, config, {
        signal: controller.signal,
        logger,
        outputName: names.get(input),
        glossary,
      });
      succeeded.push(result);
      logger?.info?.(`[Batch] Done: ${result.outputs.length} output(s) for ${input}`);
    } catch (error) {
      if (isCaptionSyncError(error) && error.code === ErrorCode.ENGINE_MISSING) {
        fatal ??= error;
        controller.abort();
        return;
      }
      // Files interrupted by a batch abort are not failures of their own
      if (fatal !== null && isCaptionSyncError(error) && error.code === ErrorCode.ABORTED) {
        return;
      }
      const entry: FailedFile = {
        input,
        code: isCaptionSyncError(error) ? error.code : "UNEXPECTED",
        message: error instanceof Error ? error.message : String(error),
      };
      failed.push(entry);
      logger?.error?.(`[Batch] Failed ${input}: [${entry.code}] ${entry.message}`);
    }
  };

  try {
    await Promise.all(files.map((input, position) => limit(() => run(input, position))));
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }

  if (fatal !== null) throw fatal;

  const order = new Map(files.map((file, index) => [file, index]));
  const byInput = (a: { input: string }, b: { input: string }) =>
    (order.get(a.input) ?? 0) - (order.get(b.input) ?? 0);

  return { succeeded: succeeded.sort(byInput), failed: failed.sort(byInput) };
}
