/** Manifest text does not start with the #EXTM3U header. */
export class FormatError extends Error {
  constructor(public readonly sourceManifest: string) {
    super(`Invalid M3U format: missing #EXTM3U header in ${sourceManifest}`);
    this.name = "FormatError";
  }
}

/** A checkpoint or sink write failed on every attempt. */
export class SinkWriteError extends Error {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `${operation} failed after ${attempts} attempt(s): ${errorMessage(lastError)}`
    );
    this.name = "SinkWriteError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Thrown when a cancel was requested while a run is in progress. */
export class SyncCancelledError extends Error {
  constructor() {
    super("Sync cancelled by user");
    this.name = "SyncCancelledError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
