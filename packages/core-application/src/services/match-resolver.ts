import path from "node:path";
import type { VariantPattern, WatchFolder } from "@file-versioner/core-domain";
import { compileVariantPatterns, findVariantPattern } from "./variant-patterns";
import { hasVersionMarker } from "./version-naming";
import { mergeWatchFolders } from "./watch-folders";

const PARTIAL_DOWNLOAD_SUFFIXES = [".crdownload", ".download"];

export type IgnoreReason =
  | "hidden"
  | "partial-download"
  | "unwatched-folder"
  | "versioned"
  | "base-file"
  | "no-match";

export type VariantMatch = {
  folder: WatchFolder;
  pattern: VariantPattern;
  path: string;
  filename: string;
  baseFilename: string;
};

export type ResolveOutcome =
  | { status: "matched"; match: VariantMatch }
  | { status: "ignored"; reason: IgnoreReason; filename: string };

type CompiledFolder = {
  folder: WatchFolder;
  patterns: VariantPattern[];
  baseNames: Set<string>;
};

export class MatchResolver {
  private readonly byPath = new Map<string, CompiledFolder>();

  constructor(folders: readonly WatchFolder[]) {
    for (const folder of mergeWatchFolders(folders)) {
      this.byPath.set(folder.path, {
        folder,
        patterns: compileVariantPatterns(folder.baseFilenames),
        baseNames: new Set(folder.baseFilenames.map((b) => b.name)),
      });
    }
  }

  resolve(eventPath: string): VariantMatch | null {
    const outcome = this.inspect(eventPath);
    return outcome.status === "matched" ? outcome.match : null;
  }

  inspect(eventPath: string): ResolveOutcome {
    const absPath = path.resolve(eventPath);
    const filename = path.basename(absPath);
    const ignored = (reason: IgnoreReason): ResolveOutcome => ({ status: "ignored", reason, filename });

    if (filename.startsWith(".")) return ignored("hidden");
    if (PARTIAL_DOWNLOAD_SUFFIXES.some((s) => filename.endsWith(s))) {
      return ignored("partial-download");
    }

    const compiled = this.byPath.get(path.dirname(absPath));
    if (!compiled) return ignored("unwatched-folder");

    // the engine's own output must never be picked up again
    if (hasVersionMarker(filename)) return ignored("versioned");
    if (compiled.baseNames.has(filename)) return ignored("base-file");

    const pattern = findVariantPattern(compiled.patterns, filename);
    if (!pattern) return ignored("no-match");

    return {
      status: "matched",
      match: {
        folder: compiled.folder,
        pattern,
        path: absPath,
        filename,
        baseFilename: pattern.baseFilename,
      },
    };
  }
}
