import { Command } from "commander";
import type { CliContext } from "./context";
import { createCliContext } from "./context";
import { registerWatchCommand } from "./commands/watch";
import { registerInitCommand } from "./commands/init";
import { registerExplainCommand } from "./commands/explain";

export function buildProgram(ctx: CliContext): Command {
  const program = new Command();

  program
    .name("file-versioner")
    .description("Promote renamed duplicates of tracked files, keeping dated versions")
    .version("0.1.0");

  registerWatchCommand(program, ctx);
  registerInitCommand(program, ctx);
  registerExplainCommand(program, ctx);

  return program;
}

export async function runCli(argv: string[] = process.argv, ctx: CliContext = createCliContext()): Promise<void> {
  await buildProgram(ctx).parseAsync(argv);
}
