import path from "node:path";
import type { Promotion, WatchFolder } from "@file-versioner/core-domain";
import type { FileChangeEvent, FileWatcher } from "../ports/file-watcher";
import type { FolderRepository } from "../ports/folder-repository";
import type { Logger } from "../ports/logger";
import type { Clock } from "../ports/clock";
import { systemClock } from "../ports/clock";
import { WatchFolderSetupError, describeError } from "../application/errors";
import { EventDebouncer } from "./event-debouncer";
import { MatchResolver } from "./match-resolver";
import { VersioningEngine } from "./versioning-engine";
import { SerialDispatchQueue } from "./dispatch-queue";
import { mergeWatchFolders } from "./watch-folders";

export type WatchCoordinatorOptions = {
  folders: WatchFolder[];
  watcher: FileWatcher;
  repository: FolderRepository;
  logger: Logger;
  clock?: Clock;
  debouncer?: EventDebouncer;
  resolver?: MatchResolver;
  engine?: VersioningEngine;
  queueCapacity?: number;
};

export type WatchStats = {
  received: number;
  debounced: number;
  ignored: number;
  promoted: number;
  failed: number;
  dropped: number;
};

export class WatchCoordinator {
  private readonly folders: WatchFolder[];
  private readonly watcher: FileWatcher;
  private readonly repository: FolderRepository;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly debouncer: EventDebouncer;
  private readonly resolver: MatchResolver;
  private readonly engine: VersioningEngine;
  private readonly queue: SerialDispatchQueue<FileChangeEvent>;
  private readonly counters: WatchStats = {
    received: 0,
    debounced: 0,
    ignored: 0,
    promoted: 0,
    failed: 0,
    dropped: 0,
  };
  private running = false;

  constructor(options: WatchCoordinatorOptions) {
    this.folders = mergeWatchFolders(options.folders);
    this.watcher = options.watcher;
    this.repository = options.repository;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
    this.debouncer = options.debouncer ?? new EventDebouncer();
    this.resolver = options.resolver ?? new MatchResolver(this.folders);
    this.engine =
      options.engine ??
      new VersioningEngine({ repository: this.repository, logger: this.logger, clock: this.clock });

    this.queue = new SerialDispatchQueue<FileChangeEvent>({
      capacity: options.queueCapacity,
      consume: async (event) => {
        await this.handle(event);
      },
      onError: (err, event) => {
        this.counters.failed++;
        this.logger.error(`Failed to process ${event.path}`, { path: event.path, error: describeError(err) });
      },
    });
  }

  async start(): Promise<void> {
    if (this.running) return;

    for (const folder of this.folders) {
      try {
        await this.repository.ensureDir(folder.path);
      } catch (err) {
        throw new WatchFolderSetupError(folder.path, err);
      }

      this.logger.info(`Monitoring folder: ${folder.path}`, {
        baseFilenames: folder.baseFilenames.map((b) => b.name),
      });
    }

    this.watcher.onEvent((event) => this.enqueue(event));
    await this.watcher.start({
      folders: this.folders.map((f) => f.path),
      ignore: (p) => this.isIgnoredByWatcher(p),
    });

    this.running = true;
    this.logger.info("File versioner is running. Press Ctrl+C to stop");
  }

  /** Releases the watcher; the event being processed, if any, finishes first. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    try {
      await this.watcher.stop();
    } finally {
      await this.queue.close();
    }
    this.logger.info("File versioner stopped", { ...this.counters });
  }

  enqueue(event: FileChangeEvent): boolean {
    this.counters.received++;
    const accepted = this.queue.push(event);
    if (!accepted) {
      this.counters.dropped++;
      this.logger.warn(`Dropped event for ${event.path}`, {
        reason: this.queue.isClosed ? "stopped" : "queue-full",
      });
    }
    return accepted;
  }

  /** Resolves once every queued event has been handled. */
  idle(): Promise<void> {
    return this.queue.onIdle();
  }

  stats(): WatchStats {
    return { ...this.counters };
  }

  async handle(event: FileChangeEvent): Promise<Promotion | null> {
    if (!this.debouncer.shouldProcess(event.path, this.clock.now().getTime())) {
      this.counters.debounced++;
      this.logger.debug(`Skipping recently processed ${event.path}`);
      return null;
    }

    const outcome = this.resolver.inspect(event.path);
    if (outcome.status === "ignored") {
      this.counters.ignored++;
      this.logger.debug(`Ignoring ${outcome.filename}`, { reason: outcome.reason, type: event.type });
      return null;
    }

    const { match } = outcome;
    try {
      const promotion = await this.engine.promote(
        match.folder.path,
        match.path,
        match.filename,
        match.baseFilename
      );
      this.counters.promoted++;
      return promotion;
    } catch (err) {
      this.counters.failed++;
      this.logger.error(`Could not promote ${match.filename} to ${match.baseFilename}`, {
        path: match.path,
        error: describeError(err),
      });
      return null;
    }
  }

  // Dotfiles are filtered at the source; the watched roots themselves are not.
  private isIgnoredByWatcher(p: string): boolean {
    const abs = path.resolve(p);
    if (this.folders.some((f) => path.resolve(f.path) === abs)) return false;
    return path.basename(abs).startsWith(".");
  }
}
