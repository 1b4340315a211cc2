// --- Batch Conversion ---

import path from "node:path";
import { buildCommand, formatCommand, isPresetOutput } from "./command.js";
import { InputNotFoundError } from "./errors.js";
import type { Transcoder } from "./ffmpeg.js";
import { FileService } from "./files.js";
import { formatDuration, type Logger } from "./logger.js";
import type { Preset } from "./presets.js";

export type FileState = "pending" | "checking_output" | "skipped" | "converting" | "done" | "failed";

export interface FileOutcome {
  input: string;
  output: string;
  state: Extract<FileState, "skipped" | "done" | "failed">;
  error?: Error;
}

export interface BatchSummary {
  total: number;
  converted: number;
  skipped: number;
  failed: number;
  elapsedMs: number;
  outcomes: FileOutcome[];
}

export interface BatchOptions {
  logger: Logger;
  transcoder: Transcoder;
  /** Log a failed file and move on instead of ending the batch */
  continueOnError?: boolean;
  /** Defaults to the filesystem */
  exists?: (filePath: string) => Promise<boolean>;
  /** Millisecond clock used for elapsed time and estimates */
  clock?: () => number;
  onStateChange?: (input: string, state: FileState) => void;
}

const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));

/**
 * Converts each file in order, one external process at a time.
 * Existing outputs, and inputs named like a preset's output, are skipped. The first failure ends the batch and is rethrown
 * unless `continueOnError` is set.
 */
export const runBatch = async (
  files: readonly string[],
  preset: Preset,
  opts: BatchOptions,
): Promise<BatchSummary> => {
  const { logger, transcoder } = opts;
  const exists = opts.exists ?? FileService.exists;
  const clock = opts.clock ?? Date.now;
  const notify = opts.onStateChange ?? (() => {});

  const outcomes: FileOutcome[] = [];
  const startTime = clock();

  for (const file of files) notify(file, "pending");

  for (let i = 0; i < files.length; i++) {
    const file = files[i];
    const { output, args } = buildCommand(file, preset);

    logger.divider();
    logger.info(`[${i + 1}/${files.length}] converting: ${file} to ${output}`);

    try {
      if (!(await exists(file))) throw new InputNotFoundError(file);

      notify(file, "checking_output");
      if (isPresetOutput(file)) {
        // Skip output files to prevent processing loops
        logger.skip(`${file} is the output of an earlier conversion. Skipping.`);
        notify(file, "skipped");
        outcomes.push({ input: file, output, state: "skipped" });
      } else if (await exists(output)) {
        logger.skip(`Output file ${output} already exists. Skipping conversion.`);
        notify(file, "skipped");
        outcomes.push({ input: file, output, state: "skipped" });
      } else {
        logger.info(`Executing command: ${formatCommand(transcoder.binary, args)}`);
        notify(file, "converting");
        await transcoder.run(args);
        logger.success(`Conversion completed successfully. Output file: ${output}`);
        notify(file, "done");
        outcomes.push({ input: file, output, state: "done" });
      }
    } catch (err: unknown) {
      const error = toError(err);
      logger.error(`Conversion of ${path.basename(file)} failed: ${error.message}`);
      notify(file, "failed");
      outcomes.push({ input: file, output, state: "failed", error });
      if (!opts.continueOnError) throw error;
    }

    const elapsedMs = clock() - startTime;
    const processed = i + 1;
    const remainingMs = (files.length - processed) * (elapsedMs / processed);
    logger.info(
      `Processed ${processed}/${files.length}, Elapsed: ${formatDuration(elapsedMs)}, ` +
        `Estimated time left: ${formatDuration(remainingMs)}`,
    );
  }

  const summary: BatchSummary = {
    total: files.length,
    converted: outcomes.filter((o) => o.state === "done").length,
    skipped: outcomes.filter((o) => o.state === "skipped").length,
    failed: outcomes.filter((o) => o.state === "failed").length,
    elapsedMs: clock() - startTime,
    outcomes,
  };

  logger.header("Summary");
  logger.info(`Processed: ${summary.total}`);
  logger.success(`Converted: ${summary.converted}`);
  logger.info(`Skipped: ${summary.skipped}`);
  if (summary.failed > 0) logger.error(`Failed: ${summary.failed}`);
  logger.info(`Total time: ${formatDuration(summary.elapsedMs)}`);

  return summary;
};
