export interface BaseFileSpec {
  /** Exact tracked filename, e.g. "invoice.pdf". */
  name: string;
}

export interface WatchFolder {
  /** Absolute, already normalized directory path. */
  path: string;
  baseFilenames: BaseFileSpec[];
}
