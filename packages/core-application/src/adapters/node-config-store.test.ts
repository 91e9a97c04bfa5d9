import fs from "node:fs/promises";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { DEFAULT_CONFIG, NodeConfigStore, expandHome } from "./node-config-store";
import { ConfigError } from "../application/errors";
import { makeTempDir, removeTempDir } from "../testing/temp-dir";

describe("NodeConfigStore", () => {
  let home: string;
  let configPath: string;

  beforeEach(async () => {
    home = await makeTempDir();
    configPath = path.join(home, "config", "config.json");
  });

  afterEach(async () => {
    await removeTempDir(home);
  });

  function store() {
    return new NodeConfigStore(configPath, undefined, home);
  }

  async function writeConfig(content: unknown) {
    await fs.mkdir(path.dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, typeof content === "string" ? content : JSON.stringify(content), "utf-8");
  }

  it("writes and returns the default configuration when none exists", async () => {
    const config = await store().load();

    expect(config.folders).toEqual([
      {
        path: path.join(home, "Downloads"),
        baseFilenames: [{ name: "statement.pdf" }, { name: "invoice.pdf" }, { name: "report.pdf" }],
      },
    ]);
    const written = JSON.parse(await fs.readFile(configPath, "utf-8"));
    expect(written).toEqual(DEFAULT_CONFIG);
  });

  it("expands ~ and resolves folder paths", async () => {
    await writeConfig({
      folders: [
        { path: "~/inbox", base_filenames: [{ name: "scan.png" }] },
        { path: "/srv/drop/../exports", base_filenames: [] },
      ],
    });

    const config = await store().load();

    expect(config.folders.map((f) => f.path)).toEqual([path.join(home, "inbox"), "/srv/exports"]);
    expect(config.folders[0]?.baseFilenames).toEqual([{ name: "scan.png" }]);
  });

  it("rejects malformed JSON without touching the file", async () => {
    await writeConfig("{ not json");

    await expect(store().load()).rejects.toBeInstanceOf(ConfigError);
    expect(await fs.readFile(configPath, "utf-8")).toBe("{ not json");
  });

  it("rejects a configuration without folders", async () => {
    await writeConfig({ folders: [] });

    await expect(store().load()).rejects.toThrow(/Invalid config .*folders:/);
  });

  it("rejects base filenames that are paths", async () => {
    await writeConfig({ folders: [{ path: "~/dl", base_filenames: [{ name: "sub/invoice.pdf" }] }] });

    await expect(store().load()).rejects.toThrow(
      "folders.0.base_filenames.0.name: must be a filename, not a path"
    );
  });

  it("fails on a missing file without creating one when asked not to", async () => {
    const loading = store().load({ createIfMissing: false });

    await expect(loading).rejects.toBeInstanceOf(ConfigError);
    await expect(loading).rejects.toMatchObject({ configPath, message: `Config not found at ${configPath}` });
    await expect(fs.stat(path.dirname(configPath))).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("names the offending file on the error", async () => {
    await writeConfig({ folders: [] });

    const err = await store()
      .load()
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err).toMatchObject({ configPath });
  });

  it("only overwrites an existing file when forced", async () => {
    await writeConfig({ folders: [{ path: "~/dl", base_filenames: [] }] });

    expect(await store().writeDefault()).toBe(false);
    expect(JSON.parse(await fs.readFile(configPath, "utf-8")).folders[0].path).toBe("~/dl");

    expect(await store().writeDefault(true)).toBe(true);
    expect(JSON.parse(await fs.readFile(configPath, "utf-8"))).toEqual(DEFAULT_CONFIG);
  });

  it("resolves ~ in the config path itself", () => {
    const s = new NodeConfigStore("~/settings/versioner.json", undefined, "/home/tester");
    expect(s.configPath).toBe("/home/tester/settings/versioner.json");
  });
});

describe("expandHome", () => {
  it("expands only a leading ~", () => {
    expect(expandHome("~", "/home/tester")).toBe("/home/tester");
    expect(expandHome("~/Downloads", "/home/tester")).toBe("/home/tester/Downloads");
    expect(expandHome("/data/~/x", "/home/tester")).toBe("/data/~/x");
    expect(expandHome("~other/x", "/home/tester")).toBe("~other/x");
  });
});
