import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { type ConvertOptions, LIST_PRESETS_EXIT_CODE, runConvert } from "./cli.js";
import { TranscoderExitError } from "./errors.js";
import type { Transcoder } from "./ffmpeg.js";
import type { Logger } from "./logger.js";
import { captureLogger } from "./test-utils.js";

let root: string;
let logger: Logger;
let messages: () => string[];
let printed: string[];

/** Writes an empty output file for every run, failing for inputs named in `failFor` */
const fakeTranscoder = (failFor: string[] = []) => {
  const run = vi.fn(async (args: readonly string[]) => {
    if (failFor.includes(path.basename(args[1]))) throw new TranscoderExitError(1, null, "");
    await fs.writeFile(args[args.length - 1], "");
  });
  const transcoder: Transcoder = { binary: "ffmpeg", run };
  return { run, transcoder };
};

const convert = (opts: Partial<ConvertOptions>, transcoder: Transcoder) =>
  runConvert(
    { preset: "h265_fhd_6", listPresets: false, continueOnError: false, ...opts },
    {
      logger,
      transcoder,
      print: (line) => printed.push(line),
    },
  );

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "preset-transcode-cli-"));
  ({ logger, messages } = captureLogger());
  printed = [];
  await fs.mkdir(path.join(root, "sub"));
  await fs.writeFile(path.join(root, "a.mp4"), "");
  await fs.writeFile(path.join(root, "sub", "b.mp4"), "");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("runConvert", () => {
  it("lists presets on stdout and exits with the list status", async () => {
    const { run, transcoder } = fakeTranscoder();

    const code = await convert({ listPresets: true, input: root }, transcoder);

    expect(code).toBe(LIST_PRESETS_EXIT_CODE);
    expect(code).toBe(1);
    expect(printed.filter((l) => l.startsWith("  * "))).toHaveLength(4);
    expect(run).not.toHaveBeenCalled();
  });

  it("converts everything under the input folder", async () => {
    const { run, transcoder } = fakeTranscoder();

    const code = await convert({ input: root, preset: "av1_fhd_5" }, transcoder);

    expect(code).toBe(0);
    expect(run).toHaveBeenCalledTimes(2);
    await expect(fs.access(path.join(root, "a_fhd_av1_5mbps.mkv"))).resolves.toBeUndefined();
    await expect(
      fs.access(path.join(root, "sub", "b_fhd_av1_5mbps.mkv")),
    ).resolves.toBeUndefined();
    expect(messages()).toContain(`input: ${root}`);
    expect(messages()).toContain("preset: codec:av1 (ext:mkv, lib:libaom-av1) fhd:1920:1080 5Mbps");
  });

  it("performs no conversions on a rerun and succeeds", async () => {
    const first = fakeTranscoder();
    await convert({ input: root }, first.transcoder);

    const second = fakeTranscoder();
    const code = await convert({ input: root }, second.transcoder);

    expect(code).toBe(0);
    expect(second.run).not.toHaveBeenCalled();
  });

  it("leaves the folder unchanged on repeated runs of an .mp4 preset", async () => {
    await fs.rm(path.join(root, "sub"), { recursive: true });
    const { run, transcoder } = fakeTranscoder();

    for (let i = 0; i < 3; i++) {
      expect(await convert({ input: root, preset: "h265_uhd_40" }, transcoder)).toBe(0);
    }

    expect(run.mock.calls.map(([args]) => path.basename(args[1]))).toEqual(["a.mp4"]);
    expect((await fs.readdir(root)).sort()).toEqual(["a.mp4", "a_uhd_h265_40mbps.mp4"]);
  });

  it("exits non-zero when a conversion fails", async () => {
    const { run, transcoder } = fakeTranscoder(["a.mp4"]);

    const code = await convert({ input: root }, transcoder);

    expect(code).toBe(1);
    expect(run).toHaveBeenCalledTimes(1);
    expect(messages()).toContain("❌ Batch aborted: FFmpeg exited with code 1");
  });

  it("exits non-zero after finishing when failures were tolerated", async () => {
    const { run, transcoder } = fakeTranscoder(["a.mp4"]);

    const code = await convert({ input: root, continueOnError: true }, transcoder);

    expect(code).toBe(1);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("succeeds with nothing to do for a path that is not there", async () => {
    const { run, transcoder } = fakeTranscoder();

    const code = await convert({ input: path.join(root, "missing") }, transcoder);

    expect(code).toBe(0);
    expect(run).not.toHaveBeenCalled();
    expect(messages()).toContain("⚠️  No .mp4 files found.");
  });

  it("rejects an unknown preset", async () => {
    const { run, transcoder } = fakeTranscoder();

    const code = await convert({ input: root, preset: "vp9_fhd_4" }, transcoder);

    expect(code).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(messages()[0]).toBe(
      '❌ Unknown preset "vp9_fhd_4". Choose one of: h265_fhd_6, h265_uhd_40, av1_fhd_5, av1_uhd_20',
    );
  });

  it("requires an input path", async () => {
    const { transcoder } = fakeTranscoder();

    expect(await convert({}, transcoder)).toBe(1);
    expect(messages()).toEqual(["❌ No input given. Pass a file or folder with --input."]);
  });
});
