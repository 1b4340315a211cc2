/**
 * Error kinds raised while converting a batch.
 * Every error carries a machine-readable `code` so the CLI can report it uniformly.
 */

export class TranscodeError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "TranscodeError";
    this.code = code;
    this.details = details;
  }
}

/** The input file disappeared between discovery and conversion */
export class InputNotFoundError extends TranscodeError {
  constructor(public readonly inputPath: string) {
    super(`Input file ${inputPath} does not exist.`, "INPUT_NOT_FOUND", { inputPath });
    this.name = "InputNotFoundError";
  }
}

/** The external tool ran but did not exit cleanly */
export class TranscoderExitError extends TranscodeError {
  constructor(
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderr: string,
  ) {
    const reason = signal ? `was killed by ${signal}` : `exited with code ${exitCode}`;
    const tail = stderr.trim();
    super(
      tail ? `FFmpeg ${reason}: ${tail}` : `FFmpeg ${reason}`,
      "TRANSCODER_EXIT",
      { exitCode, signal },
    );
    this.name = "TranscoderExitError";
  }
}

/** The external tool could not be started at all */
export class TranscoderSpawnError extends TranscodeError {
  constructor(
    public readonly binary: string,
    cause: Error,
  ) {
    super(`Could not start ${binary}: ${cause.message}`, "TRANSCODER_SPAWN", { binary });
    this.name = "TranscoderSpawnError";
    this.cause = cause;
  }
}

export class UnknownPresetError extends TranscodeError {
  constructor(
    public readonly presetName: string,
    known: readonly string[],
  ) {
    super(
      `Unknown preset "${presetName}". Choose one of: ${known.join(", ")}`,
      "UNKNOWN_PRESET",
      { presetName },
    );
    this.name = "UnknownPresetError";
  }
}
