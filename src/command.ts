import path from "node:path";
import { listPresets, type Preset } from "./presets.js";

/** Constant Rate Factor handed to every encode */
export const CRF = "23";
/** Encoder speed/quality tradeoff */
export const ENCODER_PRESET = "medium";
export const FFMPEG_LOG_LEVEL = "error";

export interface TranscodeCommand {
  input: string;
  output: string;
  /** Arguments for the transcoder, binary excluded */
  args: string[];
}

/**
 * `{stem}_{resolution}_{codec}_{bitrate}mbps.{ext}`, beside the input.
 * `movie.mp4` with `av1_fhd_5` becomes `movie_fhd_av1_5mbps.mkv`.
 */
export const buildOutputPath = (input: string, preset: Preset): string => {
  const { dir, name } = path.parse(input);
  return path.join(dir, `${name}${outputSuffix(preset)}.${preset.codec.extension}`);
};

const outputSuffix = (preset: Preset) =>
  `_${preset.resolution.name}_${preset.codec.name}_${preset.bitrateMbps}mbps`;

/** True when the file is named like the output of any preset, e.g. `movie_fhd_h265_6mbps.mp4` */
export const isPresetOutput = (filePath: string): boolean => {
  const { name, ext } = path.parse(filePath);
  return listPresets().some(
    (preset) =>
      name.endsWith(outputSuffix(preset)) &&
      ext.toLowerCase() === `.${preset.codec.extension}`,
  );
};

export const buildCommand = (input: string, preset: Preset): TranscodeCommand => {
  const output = buildOutputPath(input, preset);
  const args = [
    "-i",
    input,
    "-c:v",
    preset.codec.lib,
    "-crf",
    CRF,
    "-preset",
    ENCODER_PRESET,
    "-vf",
    `scale=${preset.resolution.size}`,
    "-c:a",
    "copy", // Passthrough audio
    "-loglevel",
    FFMPEG_LOG_LEVEL,
    output,
  ];
  return { input, output, args };
};

const SAFE_ARG = /^[\w@%+=:,./-]+$/;

/** Shell-style rendering for log output only; the process is never started through a shell. */
export const formatCommand = (binary: string, args: readonly string[]): string =>
  [binary, ...args]
    .map((arg) => (SAFE_ARG.test(arg) ? arg : `"${arg.replace(/(["\\$`])/g, "\\$1")}"`))
    .join(" ");
