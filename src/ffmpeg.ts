// --- FFmpeg Utilities ---

import { spawn } from "node:child_process";
import { TranscoderExitError, TranscoderSpawnError } from "./errors.js";

/** Runs the external transcoder once per call */
export interface Transcoder {
  readonly binary: string;
  run(args: readonly string[]): Promise<void>;
}

/** Keep only the end of stderr for error messages */
const STDERR_TAIL = 4096;

export const createFFmpegTranscoder = (binary = "ffmpeg"): Transcoder => ({
  binary,

  /** Executes the binary with a literal argument vector and waits for it to exit */
  run: (args) =>
    new Promise((resolve, reject) => {
      const proc = spawn(binary, [...args], { stdio: ["ignore", "ignore", "pipe"] });

      let stderr = "";
      proc.stderr?.setEncoding("utf8");
      proc.stderr?.on("data", (chunk: string) => {
        stderr = (stderr + chunk).slice(-STDERR_TAIL);
      });

      proc.on("error", (err) => reject(new TranscoderSpawnError(binary, err)));

      proc.on("close", (code, signal) => {
        if (code === 0) resolve();
        else reject(new TranscoderExitError(code, signal, stderr));
      });
    }),
});
