// Public API of the core-application package: ports, services and the
// Node adapters, so applications can import what they need without reaching
// into internal file paths.

// Ports (interfaces)
export * from "./ports/clock";
export * from "./ports/logger";
export type { ConfigStore, LoadConfigOptions, WatchConfig } from "./ports/config-store";
export type { FolderRepository } from "./ports/folder-repository";
export type {
  FileChangeType,
  FileChangeEvent,
  FileWatcherOptions,
  FileWatcher,
} from "./ports/file-watcher";

// Errors and environment
export * from "./application/errors";
export * from "./application/env";

// Services
export * from "./services/version-naming";
export * from "./services/variant-patterns";
export * from "./services/event-debouncer";
export * from "./services/watch-folders";
export * from "./services/match-resolver";
export * from "./services/versioning-engine";
export * from "./services/dispatch-queue";
export * from "./services/watch-coordinator";

// Node adapters
export * from "./adapters/chokidar-file-watcher";
export * from "./adapters/node-folder-repository";
export * from "./adapters/node-config-store";
export * from "./adapters/pino-logger";
