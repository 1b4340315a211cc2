#!/usr/bin/env node

/**
 * preset-transcode
 * Batch converts .mp4 videos with ffmpeg using a fixed set of codec/resolution/bitrate presets.
 * Features: recursive directory scanning, preset-encoded output names, skipping finished outputs.
 */

import clide from "@imlokesh/clide";
import { runConvert } from "./src/cli.js";
import { createFFmpegTranscoder } from "./src/ffmpeg.js";
import { createLogger, isLogLevel, LOG_LEVELS } from "./src/logger.js";
import { DEFAULT_PRESET, PRESET_NAMES } from "./src/presets.js";

const asString = (value: unknown): string | undefined =>
  typeof value === "string" && value.length > 0 ? value : undefined;

// --- Application Entry Point ---

const main = async () => {
  // Initialize CLI framework
  const { command, commandOptions } = await clide({
    description: "preset-transcode - Batch convert .mp4 files with ffmpeg using named presets.",
    defaultCommand: "convert",
    commands: {
      convert: {
        description: "Convert every .mp4 under a file or folder",
        options: {
          input: {
            type: "string",
            short: "i",
            description: "Input file or folder",
          },
          preset: {
            type: "string",
            short: "p",
            choices: [...PRESET_NAMES],
            default: DEFAULT_PRESET.name,
            env: "PRESET_TRANSCODE_PRESET",
            description: `Video preset: ${PRESET_NAMES.join(", ")}`,
          },
          "list-presets": {
            type: "boolean",
            short: "l",
            default: false,
            description: "List the available presets and exit",
          },
          ffmpeg: {
            type: "string",
            default: "ffmpeg",
            env: "FFMPEG_PATH",
            description: "Path to the ffmpeg binary",
          },
          "continue-on-error": {
            type: "boolean",
            default: false,
            description: "Keep converting the remaining files after a failure",
          },
          "log-level": {
            type: "string",
            choices: [...LOG_LEVELS],
            default: "info",
            env: "LOG_LEVEL",
            description: "Minimum level of log records to print",
          },
        },
      },
    },
  });

  if (command !== "convert") return;

  const logLevel = commandOptions["log-level"];
  const logger = createLogger({ level: isLogLevel(logLevel) ? logLevel : "info" });

  const ffmpeg = asString(commandOptions.ffmpeg) ?? "ffmpeg";

  process.exitCode = await runConvert(
    {
      input: asString(commandOptions.input),
      preset: asString(commandOptions.preset) ?? DEFAULT_PRESET.name,
      listPresets: commandOptions["list-presets"] === true,
      continueOnError: commandOptions["continue-on-error"] === true,
    },
    {
      logger,
      transcoder: createFFmpegTranscoder(ffmpeg),
      print: (line) => console.log(line),
    },
  );
};

main().catch((err: unknown) => {
  console.error(`  ❌ ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
