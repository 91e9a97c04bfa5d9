import type { Command } from "commander";
import type { CliContext } from "../context";
import { openConfigStore } from "../context";
import { ChokidarFileWatcher } from "../../adapters/chokidar-file-watcher";
import { NodeFolderRepository } from "../../adapters/node-folder-repository";
import { WatchCoordinator } from "../../services/watch-coordinator";

type WatchOptions = {
  config?: string;
  stabilityMs: string;
};

export async function runWatch(ctx: CliContext, options: WatchOptions): Promise<void> {
  const store = openConfigStore(ctx, options.config);
  const { folders } = await store.load();

  const stabilityThresholdMs = Number.parseInt(options.stabilityMs, 10);
  const coordinator = new WatchCoordinator({
    folders,
    watcher: new ChokidarFileWatcher({
      stabilityThresholdMs: Number.isNaN(stabilityThresholdMs) ? undefined : stabilityThresholdMs,
      logger: ctx.logger,
    }),
    repository: new NodeFolderRepository(),
    logger: ctx.logger,
  });

  await coordinator.start();
  const signal = await ctx.waitForShutdown();
  ctx.logger.info(`Received ${signal}, shutting down`);
  await coordinator.stop();
}

export function registerWatchCommand(program: Command, ctx: CliContext): void {
  program
    .command("watch", { isDefault: true })
    .description("Watch the configured folders and promote renamed duplicates")
    .option("-c, --config <path>", "Path to the configuration file")
    .option("--stability-ms <ms>", "Wait until a new file has stopped growing for this long", "1000")
    .action(async (options: WatchOptions) => {
      await runWatch(ctx, options);
    });
}
