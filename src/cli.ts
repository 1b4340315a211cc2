import { UnknownPresetError } from "./errors.js";
import type { Transcoder } from "./ffmpeg.js";
import { FileService } from "./files.js";
import type { Logger } from "./logger.js";
import { describePreset, formatPresetList, lookupPreset, PRESET_NAMES } from "./presets.js";
import { type BatchOptions, runBatch } from "./runner.js";

/** CLI options for the `convert` command */
export interface ConvertOptions {
  /** Input file or folder; nothing to convert without it */
  input?: string;
  preset: string;
  listPresets: boolean;
  continueOnError: boolean;
}

export interface CliDeps {
  logger: Logger;
  transcoder: Transcoder;
  /** Plain output for `--list-presets` */
  print: (line: string) => void;
  exists?: BatchOptions["exists"];
  clock?: BatchOptions["clock"];
}

/** `--list-presets` ends the run with this status */
export const LIST_PRESETS_EXIT_CODE = 1;

/** Runs the `convert` command and resolves to the process exit status */
export const runConvert = async (opts: ConvertOptions, deps: CliDeps): Promise<number> => {
  const { logger } = deps;

  if (opts.listPresets) {
    for (const line of formatPresetList()) deps.print(line);
    return LIST_PRESETS_EXIT_CODE;
  }

  const preset = lookupPreset(opts.preset);
  if (!preset) {
    logger.error(new UnknownPresetError(opts.preset, PRESET_NAMES).message);
    return 1;
  }

  if (!opts.input) {
    logger.error("No input given. Pass a file or folder with --input.");
    return 1;
  }

  logger.info(`input: ${opts.input}`);
  logger.info(`preset: ${describePreset(preset)}`);

  const files = await FileService.discover(opts.input, logger);
  if (files.length === 0) {
    logger.warn("No .mp4 files found.");
    return 0;
  }
  logger.info(`Found ${files.length} files. Preset: ${preset.name}`);

  try {
    const summary = await runBatch(files, preset, {
      logger,
      transcoder: deps.transcoder,
      continueOnError: opts.continueOnError,
      exists: deps.exists,
      clock: deps.clock,
    });
    return summary.failed > 0 ? 1 : 0;
  } catch (err: unknown) {
    logger.error(`Batch aborted: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
};
