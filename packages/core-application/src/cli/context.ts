import type { Logger } from "../ports/logger";
import type { AppEnv } from "../application/env";
import { readEnv } from "../application/env";
import { createPinoLogger } from "../adapters/pino-logger";
import { DEFAULT_CONFIG_PATH, NodeConfigStore } from "../adapters/node-config-store";

export type ShutdownSignal = "SIGINT" | "SIGTERM";

export type CliContext = {
  env: AppEnv;
  logger: Logger;
  print: (line: string) => void;
  waitForShutdown: () => Promise<ShutdownSignal>;
};

export function waitForSignal(): Promise<ShutdownSignal> {
  return new Promise((resolve) => {
    const onSignal = (signal: ShutdownSignal) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

export function createCliContext(env: AppEnv = readEnv()): CliContext {
  return {
    env,
    logger: createPinoLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV === "development" }),
    print: (line) => console.log(line),
    waitForShutdown: waitForSignal,
  };
}

export function openConfigStore(ctx: CliContext, configOption?: string): NodeConfigStore {
  const configPath = configOption ?? ctx.env.FILE_VERSIONER_CONFIG ?? DEFAULT_CONFIG_PATH;
  return new NodeConfigStore(configPath, ctx.logger);
}
