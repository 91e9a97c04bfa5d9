export interface FolderRepository {
  exists(absolutePath: string): Promise<boolean>;

  /** Renames a file, never leaving both copies behind. */
  move(fromPath: string, toPath: string): Promise<void>;

  /** Creates the directory (and missing parents) if absent. */
  ensureDir(absolutePath: string): Promise<void>;
}
