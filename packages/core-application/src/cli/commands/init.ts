import type { Command } from "commander";
import type { CliContext } from "../context";
import { openConfigStore } from "../context";

type InitOptions = {
  config?: string;
  force?: boolean;
};

export async function runInit(ctx: CliContext, options: InitOptions): Promise<void> {
  const store = openConfigStore(ctx, options.config);
  const written = await store.writeDefault(options.force ?? false);

  if (written) {
    ctx.print(`Wrote default configuration to ${store.configPath}`);
  } else {
    ctx.print(`Configuration already exists at ${store.configPath} (use --force to overwrite)`);
  }
}

export function registerInitCommand(program: Command, ctx: CliContext): void {
  program
    .command("init")
    .description("Write the default configuration file")
    .option("-c, --config <path>", "Path to the configuration file")
    .option("-f, --force", "Overwrite an existing configuration")
    .action(async (options: InitOptions) => {
      await runInit(ctx, options);
    });
}
