import path from "node:path";
import type { WatchFolder } from "@file-versioner/core-domain";

/**
 * Folds entries that point at the same directory into one. Base filenames are
 * appended in configuration order and a name already tracked is not repeated.
 */
export function mergeWatchFolders(folders: readonly WatchFolder[]): WatchFolder[] {
  const byPath = new Map<string, WatchFolder>();

  for (const folder of folders) {
    const key = path.resolve(folder.path);
    const existing = byPath.get(key);

    if (!existing) {
      byPath.set(key, { path: key, baseFilenames: [...folder.baseFilenames] });
      continue;
    }

    for (const spec of folder.baseFilenames) {
      if (!existing.baseFilenames.some((b) => b.name === spec.name)) {
        existing.baseFilenames.push(spec);
      }
    }
  }

  return [...byPath.values()];
}
