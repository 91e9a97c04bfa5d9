import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import path from "path";
import type {
  FileWatcher,
  FileWatcherOptions,
  FileChangeEvent,
  FileChangeType,
} from "../ports/file-watcher";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { describeError } from "../application/errors";

export type ChokidarFileWatcherOptions = {
  // how long a file's size must stay unchanged before it is reported
  stabilityThresholdMs?: number;
  pollIntervalMs?: number;
  logger?: Logger;
};

/**
 * Watches the immediate children of each folder. chokidar reports a file
 * moved into a folder as an "add" of its destination, so creations and
 * completed moves arrive through the same event.
 */
export class ChokidarFileWatcher implements FileWatcher {
  private watcher: FSWatcher | null = null;
  private handler: ((event: FileChangeEvent) => void) | null = null;

  constructor(private readonly options: ChokidarFileWatcherOptions = {}) {}

  onEvent(handler: (event: FileChangeEvent) => void): void {
    this.handler = handler;
  }

  async start(options: FileWatcherOptions): Promise<void> {
    if (this.watcher) return;

    const folders = options.folders.map((f) => path.resolve(f));

    const watcher = chokidar.watch(folders, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      awaitWriteFinish: {
        stabilityThreshold: this.options.stabilityThresholdMs ?? 1000,
        pollInterval: this.options.pollIntervalMs ?? 100,
      },
      ignored: (p: string) => options.ignore(path.resolve(p)),
    });
    this.watcher = watcher;

    const emit = (type: FileChangeType, filePath: string) => {
      if (!this.handler) return;

      this.handler({
        type,
        path: path.resolve(filePath),
        occurredAt: new Date(),
      });
    };

    const logger = this.options.logger ?? silentLogger;
    watcher
      .on("add", (p: string) => emit("created", p))
      .on("error", (err: unknown) => logger.error("Watcher error", { error: describeError(err) }));

    await new Promise<void>((resolve) => watcher.once("ready", () => resolve()));
  }

  async stop(): Promise<void> {
    if (!this.watcher) return;
    await this.watcher.close();
    this.watcher = null;
  }
}
