export class FileOperationError extends Error {
  constructor(message: string, public path: string, public cause?: unknown) {
    super(message);
    this.name = "FileOperationError";
  }
}

export class VersionNameExhaustedError extends Error {
  constructor(public baseFilename: string, public attempts: number) {
    super(`No free versioned name for ${baseFilename} after ${attempts} attempts`);
    this.name = "VersionNameExhaustedError";
  }
}

export class WatchFolderSetupError extends Error {
  constructor(public folder: string, public cause?: unknown) {
    super(`Could not prepare watch folder ${folder}`);
    this.name = "WatchFolderSetupError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public configPath: string, public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
