import { mkdtemp, mkdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { loadConfig, mergeConfig, saveConfig } from "@chapterscope/core";
import { CommandFailedError, createProgram, parseValue, setPath } from "./program.js";

async function buildFixture(): Promise<{ configPath: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "chapterscope-cli-"));
  const projectDir = path.join(root, "projects", "proj-a");
  await mkdir(projectDir, { recursive: true });
  const rows = [
    { type: "user", sessionId: "cli-1", timestamp: "2026-03-03T09:00:00.000Z", message: { content: "Set up the login page" } },
    {
      type: "assistant",
      sessionId: "cli-1",
      timestamp: "2026-03-03T09:00:01.000Z",
      message: {
        content: [
          {
            type: "tool_use",
            name: "TodoWrite",
            input: { todos: [{ content: "Patch login handler", status: "completed" }] },
          },
        ],
      },
    },
  ];
  await writeFile(path.join(projectDir, "cli-1.jsonl"), `${rows.map((row) => JSON.stringify(row)).join("\n")}\n`, "utf8");

  const configPath = path.join(root, "config.toml");
  await saveConfig(mergeConfig({ sources: { projectsRoots: [path.join(root, "projects")] } }), configPath);
  return { configPath };
}

async function run(configPath: string, ...args: string[]): Promise<string[]> {
  const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
  try {
    await createProgram().parseAsync(["node", "chapterscope", "--config", configPath, ...args]);
    return log.mock.calls.map((call) => String(call[0]));
  } finally {
    log.mockRestore();
  }
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe("cli", () => {
  it("prints search results as JSON", async () => {
    const { configPath } = await buildFixture();
    const [output] = await run(configPath, "search", "login", "handler", "--json");
    const results = JSON.parse(output ?? "[]") as Array<{ sessionId: string; score: number; summary: string }>;
    expect(results).toEqual([
      expect.objectContaining({ sessionId: "cli-1", score: 2, summary: "Patch login handler" }),
    ]);
  });

  it("prints chapters as a table", async () => {
    const { configPath } = await buildFixture();
    const lines = await run(configPath, "chapters", "cli-1");
    expect(lines[0]).toBe("# | range  | messages | title");
    expect(lines[2]).toBe(`1   (0, 2]   2${" ".repeat(10)}Patch login handler`);
  });

  it("prints turn windows", async () => {
    const { configPath } = await buildFixture();
    const lines = await run(configPath, "turns", "cli-1", "--turn", "1", "--radius", "0");
    expect(lines[0]).toBe("[0] user (turn 1): Set up the login page");
    expect(lines[1]).toBe("[1] assistant (turn 1): ");
    expect(lines[2]).toBe("\nturns=1..1 of 1");
  });

  it("lists projects", async () => {
    const { configPath } = await buildFixture();
    expect(await run(configPath, "projects")).toEqual(["proj-a"]);
  });

  it("fails for an unknown session", async () => {
    const { configPath } = await buildFixture();
    const attempt = run(configPath, "show", "nope");
    await expect(attempt).rejects.toBeInstanceOf(CommandFailedError);
    await expect(run(configPath, "show", "nope")).rejects.toThrow("unknown session: nope");
  });

  it("updates a config value", async () => {
    const { configPath } = await buildFixture();
    const lines = await run(configPath, "config", "set", "search.defaultLimit", "3");
    expect(lines).toEqual(["updated search.defaultLimit"]);
    const config = await loadConfig(configPath);
    expect(config.search.defaultLimit).toBe(3);
    expect(config.sources.projectsRoots).toHaveLength(1);
  });
});

describe("config value helpers", () => {
  it("parses booleans, numbers and arrays", () => {
    expect(parseValue("true")).toBe(true);
    expect(parseValue("12")).toBe(12);
    expect(parseValue('["a","b"]')).toEqual(["a", "b"]);
    expect(parseValue("[not json")).toBe("[not json");
    expect(parseValue("TodoWrite")).toBe("TodoWrite");
  });

  it("sets nested keys", () => {
    const target: Record<string, unknown> = { search: { defaultLimit: 10 } };
    setPath(target, "search.defaultLimit", 4);
    setPath(target, "navigation.defaultExpand", 2);
    expect(target).toEqual({ search: { defaultLimit: 4 }, navigation: { defaultExpand: 2 } });
  });
});
