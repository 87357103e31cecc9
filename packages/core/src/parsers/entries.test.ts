import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { assistantText, decodeContent, decodeEntry, parseEntries, readEntries, userText } from "./entries.js";

describe("parseEntries", () => {
  it("skips blank, undecodable and non-object lines and keeps 1-based line numbers", () => {
    const text = [
      JSON.stringify({ type: "user", sessionId: "s-1", timestamp: "2026-03-03T09:00:00.000Z", message: { content: "hi" } }),
      "",
      "not json",
      "[1, 2]",
      JSON.stringify({ type: "summary", summary: "Greeting" }),
    ].join("\n");

    const entries = parseEntries(text);

    expect(entries).toEqual([
      {
        type: "user",
        line: 1,
        timestamp: "2026-03-03T09:00:00.000Z",
        sessionId: "s-1",
        content: [{ type: "text", text: "hi" }],
      },
      { type: "summary", line: 5, timestamp: "", sessionId: "", summary: "Greeting" },
    ]);
  });

  it("keeps unknown entry types as other", () => {
    const [entry] = parseEntries(JSON.stringify({ type: "file-history-snapshot", messageId: "m-1" }));
    expect(entry).toEqual({ type: "other", line: 1, timestamp: "", sessionId: "", rawType: "file-history-snapshot" });
  });

  it("decodes a message entry without a body as empty content", () => {
    const entry = decodeEntry({ type: "assistant" }, 3);
    expect(entry).toEqual({ type: "assistant", line: 3, timestamp: "", sessionId: "", content: [] });
  });
});

describe("decodeContent", () => {
  it("decodes text, tool calls, tool results and unknown items", () => {
    const items = decodeContent([
      { type: "text", text: "hello" },
      { type: "tool_use", name: "TodoWrite", input: { todos: [] } },
      { type: "tool_result", content: [{ type: "text", text: "line one" }, { type: "text", text: "line two" }] },
      { type: "tool_result", content: "plain output" },
      { type: "image", source: {} },
    ]);

    expect(items).toEqual([
      { type: "text", text: "hello" },
      { type: "tool_use", name: "TodoWrite", input: { todos: [] } },
      { type: "tool_result", text: "line one\nline two" },
      { type: "tool_result", text: "plain output" },
      { type: "other", rawType: "image" },
    ]);
  });

  it("treats an empty string body as no content", () => {
    expect(decodeContent("")).toEqual([]);
    expect(decodeContent(undefined)).toEqual([]);
  });
});

describe("message text", () => {
  const content = decodeContent([
    { type: "text", text: "first" },
    { type: "tool_use", name: "Bash", input: { command: "ls" } },
    { type: "text", text: "second" },
  ]);

  it("space-joins user text items", () => {
    expect(userText({ type: "user", line: 1, timestamp: "", sessionId: "", content })).toBe(
      "first second",
    );
  });

  it("newline-joins assistant text items and leaves tool calls out", () => {
    expect(assistantText({ type: "assistant", line: 1, timestamp: "", sessionId: "", content })).toBe(
      "first\nsecond",
    );
  });

  it("gives no user text for a tool result turn", () => {
    const toolTurn = decodeContent([{ type: "tool_result", content: "ok" }]);
    expect(userText({ type: "user", line: 1, timestamp: "", sessionId: "", content: toolTurn })).toBe("");
  });
});

describe("readEntries", () => {
  it("returns an empty transcript for a missing file without warning", async () => {
    const logger = { info: vi.fn(), warn: vi.fn() };
    const entries = await readEntries(path.join(os.tmpdir(), "chapterscope-missing", "nope.jsonl"), logger);
    expect(entries).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("warns and returns an empty transcript when the path cannot be read", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "chapterscope-entries-"));
    const logger = { info: vi.fn(), warn: vi.fn() };
    const entries = await readEntries(dir, logger);
    expect(entries).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
