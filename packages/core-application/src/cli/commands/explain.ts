import path from "node:path";
import type { Command } from "commander";
import type { CliContext } from "../context";
import { openConfigStore } from "../context";
import { MatchResolver } from "../../services/match-resolver";
import type { ResolveOutcome } from "../../services/match-resolver";

type ExplainOptions = {
  config?: string;
};

export function formatOutcome(outcome: ResolveOutcome): string {
  if (outcome.status === "ignored") {
    return `ignored: ${outcome.filename} (${outcome.reason})`;
  }
  const { match } = outcome;
  return `matched: ${match.filename} → ${match.baseFilename} (${match.pattern.kind}) in ${match.folder.path}`;
}

export async function runExplain(ctx: CliContext, file: string, options: ExplainOptions): Promise<ResolveOutcome> {
  // a read-only command; it never writes a default config
  const { folders } = await openConfigStore(ctx, options.config).load({ createIfMissing: false });
  const outcome = new MatchResolver(folders).inspect(path.resolve(file));
  ctx.print(formatOutcome(outcome));
  return outcome;
}

export function registerExplainCommand(program: Command, ctx: CliContext): void {
  program
    .command("explain")
    .description("Show whether a file would be promoted, and over which base file")
    .argument("<file>", "Path of the file to check")
    .option("-c, --config <path>", "Path to the configuration file")
    .action(async (file: string, options: ExplainOptions) => {
      await runExplain(ctx, file, options);
    });
}
