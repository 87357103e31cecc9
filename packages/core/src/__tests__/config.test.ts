import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, mergeConfig, saveConfig } from "../config.js";
import { DEFAULT_CONFIG } from "../defaults.js";

describe("config", () => {
  it("provides defaults for sources, extraction, search and navigation", () => {
    const config = mergeConfig();
    expect(config.sources.projectsRoots).toEqual(["~/.claude/projects"]);
    expect(config.sources.includeGlobs).toEqual(["*/*.jsonl"]);
    expect(config.sources.maxDepth).toBe(2);
    expect(config.extraction.todoToolMarker).toBe("TodoWrite");
    expect(config.extraction.arcMessageChars).toBe(200);
    expect(config.search.defaultLimit).toBe(10);
    expect(config.search.messageSearchLimit).toBe(20);
    expect(config.navigation).toEqual({
      defaultExpand: 0,
      defaultTurnRadius: 1,
      defaultContextSize: 10,
      recentMessageCount: 20,
    });
  });

  it("replaces invalid values with defaults", () => {
    const config = mergeConfig({
      sources: { includeGlobs: [], maxDepth: -3 },
      extraction: { todoToolMarker: "   ", arcMessageChars: 0 },
      search: { defaultLimit: Number.NaN },
      navigation: { defaultExpand: -1, defaultTurnRadius: 2.4 },
    });
    expect(config.sources.includeGlobs).toEqual(DEFAULT_CONFIG.sources.includeGlobs);
    expect(config.sources.maxDepth).toBe(2);
    expect(config.extraction.todoToolMarker).toBe("TodoWrite");
    expect(config.extraction.arcMessageChars).toBe(200);
    expect(config.search.defaultLimit).toBe(10);
    expect(config.navigation.defaultExpand).toBe(0);
    expect(config.navigation.defaultTurnRadius).toBe(2);
  });

  it("trims and dedupes path lists", () => {
    const config = mergeConfig({
      sources: { projectsRoots: [" /data/a ", "/data/a", "", "/data/b"], excludeGlobs: ["tmp/**"] },
    });
    expect(config.sources.projectsRoots).toEqual(["/data/a", "/data/b"]);
    expect(config.sources.excludeGlobs).toEqual(["tmp/**"]);
  });

  it("falls back to defaults when the file is missing or unreadable", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chapterscope-config-"));
    expect(await loadConfig(path.join(dir, "missing.toml"))).toEqual(mergeConfig());

    const broken = path.join(dir, "broken.toml");
    await writeFile(broken, "[sources\nprojectsRoots = ", "utf8");
    expect(await loadConfig(broken)).toEqual(mergeConfig());
  });

  it("reads partial TOML files", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chapterscope-config-"));
    const configPath = path.join(dir, "config.toml");
    await writeFile(configPath, '[search]\ndefaultLimit = 3\n\n[extraction]\ntodoToolMarker = "TaskList"\n', "utf8");

    const config = await loadConfig(configPath);
    expect(config.search.defaultLimit).toBe(3);
    expect(config.search.messageSearchLimit).toBe(20);
    expect(config.extraction.todoToolMarker).toBe("TaskList");
    expect(config.sources).toEqual(DEFAULT_CONFIG.sources);
  });

  it("saves and reloads a config", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chapterscope-config-"));
    const configPath = path.join(dir, "nested", "config.toml");
    const config = mergeConfig({ sources: { projectsRoots: ["/data/transcripts"] }, navigation: { defaultExpand: 4 } });

    await saveConfig(config, configPath);

    expect(await loadConfig(configPath)).toEqual(config);
  });
});
