// --- Types & Interfaces ---

/** Video codecs the presets can encode to */
export enum Codec {
  H265 = "h265",
  AV1 = "av1",
}

/** Output frame sizes, named by their marketing label */
export enum Resolution {
  FHD = "fhd",
  UHD = "uhd",
}

export interface CodecInfo {
  readonly name: Codec;
  /** Container extension of the output file, without the dot */
  readonly extension: string;
  /** Encoder library passed to `-c:v` */
  readonly lib: string;
}

export interface ResolutionInfo {
  readonly name: Resolution;
  /** `width:height`, as the scale filter takes it */
  readonly size: string;
}

export interface Preset {
  readonly name: PresetName;
  readonly codec: CodecInfo;
  readonly resolution: ResolutionInfo;
  readonly bitrateMbps: number;
}

export const CODECS: Readonly<Record<Codec, CodecInfo>> = Object.freeze({
  [Codec.H265]: Object.freeze({ name: Codec.H265, extension: "mp4", lib: "libx265" }),
  [Codec.AV1]: Object.freeze({ name: Codec.AV1, extension: "mkv", lib: "libaom-av1" }),
});

export const RESOLUTIONS: Readonly<Record<Resolution, ResolutionInfo>> = Object.freeze({
  [Resolution.FHD]: Object.freeze({ name: Resolution.FHD, size: "1920:1080" }),
  [Resolution.UHD]: Object.freeze({ name: Resolution.UHD, size: "3840:2160" }),
});

/** Preset names in declaration order; the first one is the default */
export const PRESET_NAMES = ["h265_fhd_6", "h265_uhd_40", "av1_fhd_5", "av1_uhd_20"] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

const definePreset = (
  name: PresetName,
  codec: Codec,
  resolution: Resolution,
  bitrateMbps: number,
): Preset =>
  Object.freeze({ name, codec: CODECS[codec], resolution: RESOLUTIONS[resolution], bitrateMbps });

const PRESETS: Readonly<Record<PresetName, Preset>> = Object.freeze({
  h265_fhd_6: definePreset("h265_fhd_6", Codec.H265, Resolution.FHD, 6),
  h265_uhd_40: definePreset("h265_uhd_40", Codec.H265, Resolution.UHD, 40),
  av1_fhd_5: definePreset("av1_fhd_5", Codec.AV1, Resolution.FHD, 5),
  av1_uhd_20: definePreset("av1_uhd_20", Codec.AV1, Resolution.UHD, 20),
});

export const DEFAULT_PRESET: Preset = PRESETS[PRESET_NAMES[0]];

// --- Catalog ---

export const isPresetName = (value: string): value is PresetName =>
  PRESET_NAMES.some((name) => name === value);

export const lookupPreset = (name: string): Preset | undefined =>
  isPresetName(name) ? PRESETS[name] : undefined;

export const listPresets = (): readonly Preset[] => PRESET_NAMES.map((name) => PRESETS[name]);

/** e.g. `codec:av1 (ext:mkv, lib:libaom-av1) fhd:1920:1080 5Mbps` */
export const describePreset = (preset: Preset): string => {
  const { codec, resolution } = preset;
  return (
    `codec:${codec.name} (ext:${codec.extension}, lib:${codec.lib}) ` +
    `${resolution.name}:${resolution.size} ${preset.bitrateMbps}Mbps`
  );
};

/** Lines printed by `--list-presets` */
export const formatPresetList = (): string[] => [
  "",
  "PRESETS:",
  ...listPresets().map((preset) => `  * ${preset.name}: ${describePreset(preset)}`),
  "",
];
