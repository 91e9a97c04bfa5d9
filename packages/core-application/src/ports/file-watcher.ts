export type FileChangeType = "created" | "moved";

export type FileChangeEvent = {
  type: FileChangeType;
  // for a move this is the destination path
  path: string;
  occurredAt: Date;
};

export type FileWatcherOptions = {
  folders: string[];
  ignore: (path: string) => boolean;
};

export interface FileWatcher {
  start(options: FileWatcherOptions): Promise<void>;
  stop(): Promise<void>;
  onEvent(handler: (event: FileChangeEvent) => void): void;
}
