import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

import type { ConfigStore, LoadConfigOptions, WatchConfig } from "../ports/config-store";
import type { Logger } from "../ports/logger";
import { silentLogger } from "../ports/logger";
import { ConfigError } from "../application/errors";

export const DEFAULT_CONFIG_PATH = path.join("~", ".config", "file-versioner", "config.json");

const baseFilenameSchema = z.object({
  name: z
    .string()
    .min(1)
    .refine((n) => !n.includes("/") && !n.includes("\\"), "must be a filename, not a path"),
});

const folderSchema = z.object({
  path: z.string().min(1),
  base_filenames: z.array(baseFilenameSchema),
});

export const configFileSchema = z.object({
  folders: z.array(folderSchema).min(1),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export const DEFAULT_CONFIG: ConfigFile = {
  folders: [
    {
      path: "~/Downloads",
      base_filenames: [{ name: "statement.pdf" }, { name: "invoice.pdf" }, { name: "report.pdf" }],
    },
  ],
};

export function expandHome(p: string, homeDir: string = os.homedir()): string {
  if (p === "~") return homeDir;
  if (p.startsWith("~/") || p.startsWith("~\\")) return path.join(homeDir, p.slice(2));
  return p;
}

export function toWatchConfig(file: ConfigFile, homeDir?: string): WatchConfig {
  return {
    folders: file.folders.map((f) => ({
      path: path.resolve(expandHome(f.path, homeDir)),
      baseFilenames: f.base_filenames.map((b) => ({ name: b.name })),
    })),
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

export class NodeConfigStore implements ConfigStore {
  readonly configPath: string;

  constructor(
    configPath: string = DEFAULT_CONFIG_PATH,
    private readonly logger: Logger = silentLogger,
    private readonly homeDir: string = os.homedir()
  ) {
    this.configPath = path.resolve(expandHome(configPath, homeDir));
  }

  async load({ createIfMissing = true }: LoadConfigOptions = {}): Promise<WatchConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(this.configPath, "utf-8");
    } catch (err) {
      if (!isMissing(err)) {
        throw new ConfigError(`Cannot read config ${this.configPath}`, this.configPath, err);
      }
      if (!createIfMissing) {
        throw new ConfigError(`Config not found at ${this.configPath}`, this.configPath, err);
      }
      this.logger.warn("Config not found, creating a default configuration", { path: this.configPath });
      await this.save(DEFAULT_CONFIG);
      return toWatchConfig(DEFAULT_CONFIG, this.homeDir);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Config ${this.configPath} is not valid JSON`, this.configPath, err);
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(
        `Invalid config ${this.configPath}: ${formatIssues(parsed.error)}`,
        this.configPath,
        parsed.error
      );
    }

    return toWatchConfig(parsed.data, this.homeDir);
  }

  async writeDefault(force = false): Promise<boolean> {
    if (!force && (await exists(this.configPath))) return false;
    await this.save(DEFAULT_CONFIG);
    return true;
  }

  private async save(data: ConfigFile): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.writeFile(this.configPath, JSON.stringify(data, null, 4) + "\n", "utf-8");
    } catch (err) {
      throw new ConfigError(`Cannot write config ${this.configPath}`, this.configPath, err);
    }
    this.logger.info(`Created default configuration at ${this.configPath}`);
  }
}

function isMissing(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function exists(p: string) {
  try {
    await fs.stat(p);
    return true;
  } catch {
    return false;
  }
}
