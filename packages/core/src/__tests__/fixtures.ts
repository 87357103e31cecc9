import { mkdtemp, mkdir, utimes, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { TodoStatus } from "@chapterscope/contracts";
import { mergeConfig } from "../config.js";

const BASE_TS = Date.UTC(2026, 2, 3, 9, 0, 0);

export function ts(second: number): string {
  return new Date(BASE_TS + second * 1000).toISOString();
}

export function userLine(text: string, second: number, sessionId = "sess-a"): string {
  return JSON.stringify({ type: "user", sessionId, timestamp: ts(second), message: { role: "user", content: text } });
}

export function toolResultLine(text: string, second: number, sessionId = "sess-a"): string {
  return JSON.stringify({
    type: "user",
    sessionId,
    timestamp: ts(second),
    message: { role: "user", content: [{ type: "tool_result", tool_use_id: "tu-1", content: text }] },
  });
}

export function assistantLine(text: string, second: number, sessionId = "sess-a"): string {
  return JSON.stringify({
    type: "assistant",
    sessionId,
    timestamp: ts(second),
    message: { role: "assistant", content: [{ type: "text", text }] },
  });
}

export function todoLine(
  todos: Array<[string, TodoStatus]>,
  second: number,
  sessionId = "sess-a",
  toolName = "TodoWrite",
): string {
  return JSON.stringify({
    type: "assistant",
    sessionId,
    timestamp: ts(second),
    message: {
      role: "assistant",
      content: [
        {
          type: "tool_use",
          id: `tu-${second}`,
          name: toolName,
          input: { todos: todos.map(([content, status]) => ({ content, status, activeForm: content })) },
        },
      ],
    },
  });
}

export function summaryLine(summary: string): string {
  return JSON.stringify({ type: "summary", summary, leafUuid: "leaf-1" });
}

/** Eight messages, two todos completed at message 5 and message 7. */
export function authSessionLines(sessionId = "sess-a"): string[] {
  return [
    userLine("Fix the auth bug in login", 0, sessionId),
    assistantLine("On it", 1, sessionId),
    todoLine(
      [
        ["Reproduce auth bug", "in_progress"],
        ["Patch login handler", "pending"],
      ],
      2,
      sessionId,
    ),
    userLine("Also add tests", 3, sessionId),
    todoLine(
      [
        ["Reproduce auth bug", "completed"],
        ["Patch login handler", "in_progress"],
      ],
      4,
      sessionId,
    ),
    assistantLine("Patched the handler", 5, sessionId),
    todoLine(
      [
        ["Reproduce auth bug", "completed"],
        ["Patch login handler", "completed"],
      ],
      6,
      sessionId,
    ),
    userLine("thanks", 7, sessionId),
  ];
}

export function databaseSessionLines(sessionId = "sess-b"): string[] {
  return [
    userLine("How do I configure the database pool?", 0, sessionId),
    assistantLine("Set poolSize in the database config", 1, sessionId),
  ];
}

export async function makeRoot(prefix = "chapterscope-core-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeTranscript(
  root: string,
  project: string,
  fileId: string,
  lines: string[],
  mtime?: Date,
): Promise<string> {
  const dir = path.join(root, project);
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, `${fileId}.jsonl`);
  await writeFile(filePath, `${lines.join("\n")}\n`, "utf8");
  if (mtime) await utimes(filePath, mtime, mtime);
  return filePath;
}

export function configForRoot(root: string) {
  return mergeConfig({ sources: { projectsRoots: [root] } });
}
