import type { WatchFolder } from "@file-versioner/core-domain";

export type WatchConfig = {
  folders: WatchFolder[];
};

export type LoadConfigOptions = {
  // when false, a missing file is an error instead of getting the defaults
  createIfMissing?: boolean;
};

export interface ConfigStore {
  /** Reads the configuration, creating the default one when none exists yet. */
  load(options?: LoadConfigOptions): Promise<WatchConfig>;

  /** Writes the default configuration; returns false if one already exists and `force` is unset. */
  writeDefault(force?: boolean): Promise<boolean>;
}
