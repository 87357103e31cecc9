import { Command } from "commander";
import type {
  AppConfig,
  Chapter,
  ConversationMessage,
  ConversationSummary,
  MessageMatch,
  RecentConversation,
  SearchResult,
  ToolResult,
} from "@chapterscope/contracts";
import {
  DEFAULT_CONFIG_PATH,
  loadConfig,
  loadSnapshot,
  mergeConfig,
  saveConfig,
  type ConversationTools,
  type PartialAppConfigInput,
} from "@chapterscope/core";
import { runServer } from "@chapterscope/server";

const PREVIEW_CHARS = 80;

export class CommandFailedError extends Error {}

function printTable(rows: string[][]): void {
  if (rows.length === 0) return;
  const header = rows[0];
  if (!header) return;
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  for (const [idx, row] of rows.entries()) {
    const line = row
      .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
      .join(idx === 0 ? " | " : "   ")
      .trimEnd();
    console.log(line);
    if (idx === 0) {
      console.log(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
}

function inline(value: string, maxLen = PREVIEW_CHARS): string {
  const oneLine = value.replace(/\s+/g, " ").trim();
  return oneLine.length <= maxLen ? oneLine : `${oneLine.slice(0, maxLen - 1)}…`;
}

export function parseValue(input: string): unknown {
  if (input === "true") return true;
  if (input === "false") return false;
  const numeric = Number(input);
  if (!Number.isNaN(numeric) && input.trim() !== "") return numeric;
  if (input.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(input);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // plain string
    }
  }
  return input;
}

export function setPath(target: Record<string, unknown>, dottedKey: string, value: unknown): void {
  const parts = dottedKey.split(".").filter(Boolean);
  if (parts.length === 0) return;

  let cursor: Record<string, unknown> = target;
  for (let i = 0; i < parts.length - 1; i += 1) {
    const key = parts[i];
    if (!key) continue;
    const next = cursor[key];
    if (!next || typeof next !== "object" || Array.isArray(next)) {
      cursor[key] = {};
    }
    cursor = cursor[key] as Record<string, unknown>;
  }
  const lastKey = parts[parts.length - 1];
  if (!lastKey) return;
  cursor[lastKey] = value;
}

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function unwrap<T extends object>(result: ToolResult<T>): T {
  if (!result.success) {
    throw new CommandFailedError(result.error);
  }
  return result;
}

function renderSearchResults(results: SearchResult[]): void {
  if (results.length === 0) {
    console.log("no matching conversations");
    return;
  }
  printTable([
    ["score", "session", "project", "timestamp", "summary"],
    ...results.map((result) => [
      String(result.score),
      result.sessionId,
      result.project,
      result.timestamp || "-",
      inline(result.summary),
    ]),
  ]);
}

function renderMessageMatches(results: MessageMatch[]): void {
  if (results.length === 0) {
    console.log("no matching messages");
    return;
  }
  printTable([
    ["session", "index", "type", "excerpt"],
    ...results.map((match) => [match.sessionId, String(match.messageIndex), match.matchType, inline(match.excerpt)]),
  ]);
}

function renderRecent(conversations: RecentConversation[]): void {
  printTable([
    ["session", "project", "modified", "summary"],
    ...conversations.map((item) => [
      item.sessionId,
      item.project,
      item.lastModified || "-",
      inline(item.summary || item.firstMessage),
    ]),
  ]);
}

function renderChapters(chapters: Chapter[]): void {
  if (chapters.length === 0) {
    console.log("no chapters");
    return;
  }
  printTable([
    ["#", "range", "messages", "title"],
    ...chapters.map((chapter, idx) => [
      String(idx + 1),
      `(${chapter.messageRange[0]}, ${chapter.messageRange[1]}]`,
      String(chapter.messageCount),
      inline(chapter.title),
    ]),
  ]);
}

function renderSummary(conversation: ConversationSummary): void {
  console.log(`session: ${conversation.sessionId}`);
  console.log(`project: ${conversation.project}`);
  console.log(`file: ${conversation.file}`);
  console.log(`messages: ${conversation.messageCount} (user ${conversation.userMessageCount})`);
  console.log(`summary: ${conversation.summary || "-"}`);
  const { completed, inProgress, pending } = conversation.finalTodos;
  console.log(`todos: ${completed.length} completed, ${inProgress.length} in progress, ${pending.length} pending`);
  console.log("");
  renderChapters(conversation.chapters);
}

function renderMessages(messages: ConversationMessage[]): void {
  for (const message of messages) {
    console.log(`[${message.index}] ${message.role} (turn ${message.turn}): ${inline(message.content, 160)}`);
  }
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function createProgram(): Command {
  const program = new Command();
  program.name("chapterscope").description("Search and navigate coding-assistant session transcripts");
  program.option("--config <path>", "Config path", process.env.CHAPTERSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH);

  const snapshot = (): Promise<ConversationTools> => loadSnapshot(program.opts<{ config: string }>().config);

  program
    .command("search <terms...>")
    .description("Rank conversations by todo and user-message matches")
    .option("--limit <n>", "Maximum results")
    .option("--project <name>", "Only this project")
    .option("--json", "JSON output")
    .action(async (terms: string[], opts: { limit?: string; project?: string; json?: boolean }) => {
      const tools = await snapshot();
      const limit = optionalInt(opts.limit);
      const result = unwrap(
        await tools.searchConversations({
          query: terms.join(" "),
          ...(limit !== undefined ? { limit } : {}),
          ...(opts.project ? { project: opts.project } : {}),
        }),
      );
      if (opts.json) printJson(result.results);
      else renderSearchResults(result.results);
    });

  program
    .command("grep <terms...>")
    .description("Find raw messages containing the query text")
    .option("--limit <n>", "Maximum matches")
    .option("--project <name>", "Only this project")
    .option("--assistant", "Include assistant messages")
    .option("--json", "JSON output")
    .action(async (terms: string[], opts: { limit?: string; project?: string; assistant?: boolean; json?: boolean }) => {
      const tools = await snapshot();
      const limit = optionalInt(opts.limit);
      const result = unwrap(
        await tools.searchMessages({
          query: terms.join(" "),
          includeAssistant: opts.assistant ?? false,
          ...(limit !== undefined ? { limit } : {}),
          ...(opts.project ? { project: opts.project } : {}),
        }),
      );
      if (opts.json) printJson(result.results);
      else renderMessageMatches(result.results);
    });

  program
    .command("recent")
    .description("List recently modified conversations")
    .option("--limit <n>", "Rows to show")
    .option("--json", "JSON output")
    .action(async (opts: { limit?: string; json?: boolean }) => {
      const tools = await snapshot();
      const limit = optionalInt(opts.limit);
      const result = unwrap(await tools.listRecent(limit !== undefined ? { limit } : {}));
      if (opts.json) printJson(result.conversations);
      else renderRecent(result.conversations);
    });

  program
    .command("projects")
    .description("List project names")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const tools = await snapshot();
      const result = unwrap(await tools.listProjects());
      if (opts.json) printJson(result.projects);
      else for (const project of result.projects) console.log(project);
    });

  program
    .command("show <sessionId>")
    .description("Show a conversation summary with its chapters")
    .option("--json", "JSON output")
    .action(async (sessionId: string, opts: { json?: boolean }) => {
      const tools = await snapshot();
      const result = unwrap(await tools.getConversationSummary({ sessionId }));
      if (opts.json) printJson(result.conversation);
      else renderSummary(result.conversation);
    });

  program
    .command("chapters <sessionId>")
    .description("List the chapters of a conversation")
    .option("--json", "JSON output")
    .action(async (sessionId: string, opts: { json?: boolean }) => {
      const tools = await snapshot();
      const result = unwrap(await tools.getChapters({ sessionId }));
      if (opts.json) printJson(result.chapters);
      else renderChapters(result.chapters);
    });

  program
    .command("context <sessionId>")
    .description("Show messages [start, end) with optional expansion")
    .requiredOption("--start <n>", "First message index")
    .requiredOption("--end <n>", "Message index to stop before")
    .option("--expand <n>", "Extra messages on each side")
    .option("--role <role>", "Only user or assistant messages")
    .option("--json", "JSON output")
    .action(
      async (sessionId: string, opts: { start: string; end: string; expand?: string; role?: string; json?: boolean }) => {
        const tools = await snapshot();
        const expand = optionalInt(opts.expand);
        const result = unwrap(
          await tools.getConversationContext({
            sessionId,
            start: Number(opts.start),
            end: Number(opts.end),
            ...(expand !== undefined ? { expand } : {}),
            ...(opts.role ? { role: opts.role } : {}),
          }),
        );
        if (opts.json) {
          printJson(result);
          return;
        }
        renderMessages(result.messages);
        console.log(
          `\nrange=[${result.start}, ${result.end}) total=${result.totalMessages} before=${result.canExpandBefore} after=${result.canExpandAfter}`,
        );
      },
    );

  program
    .command("turns <sessionId>")
    .description("Show messages around a user turn")
    .requiredOption("--turn <n>", "User turn number (from 1)")
    .option("--radius <n>", "Turns on each side")
    .option("--role <role>", "Only user or assistant messages")
    .option("--json", "JSON output")
    .action(async (sessionId: string, opts: { turn: string; radius?: string; role?: string; json?: boolean }) => {
      const tools = await snapshot();
      const radius = optionalInt(opts.radius);
      const result = unwrap(
        await tools.getTurnContext({
          sessionId,
          turn: Number(opts.turn),
          ...(radius !== undefined ? { radius } : {}),
          ...(opts.role ? { role: opts.role } : {}),
        }),
      );
      if (opts.json) {
        printJson(result);
        return;
      }
      renderMessages(result.messages);
      console.log(`\nturns=${result.fromTurn}..${result.toTurn} of ${result.totalUserTurns}`);
    });

  program
    .command("messages <sessionId>")
    .description("Show a conversation's messages, all or a window")
    .option("--around <n>", "Center on this message index")
    .option("--context <n>", "Messages on each side of --around")
    .option("--max <n>", "Only the last N messages")
    .option("--recent", "Only the most recent messages")
    .option("--json", "JSON output")
    .action(
      async (
        sessionId: string,
        opts: { around?: string; context?: string; max?: string; recent?: boolean; json?: boolean },
      ) => {
        const tools = await snapshot();
        const aroundMessage = optionalInt(opts.around);
        const contextSize = optionalInt(opts.context);
        const maxMessages = optionalInt(opts.max);
        const result = unwrap(
          await tools.getConversation({
            sessionId,
            recentOnly: opts.recent ?? false,
            ...(aroundMessage !== undefined ? { aroundMessage } : {}),
            ...(contextSize !== undefined ? { contextSize } : {}),
            ...(maxMessages !== undefined ? { maxMessages } : {}),
          }),
        );
        if (opts.json) {
          printJson(result);
          return;
        }
        renderMessages(result.messages);
        console.log(`\nshowing ${result.messageCount} of ${result.totalMessages}`);
      },
    );

  program
    .command("stats")
    .description("Show cache statistics")
    .option("--json", "JSON output")
    .action(async (opts: { json?: boolean }) => {
      const tools = await snapshot();
      const result = unwrap(await tools.getIndexStats());
      if (opts.json) {
        printJson(result.stats);
        return;
      }
      printTable([
        ["metric", "value"],
        ...Object.entries(result.stats).map(([key, value]) => [key, String(value)]),
      ]);
    });

  program
    .command("serve")
    .description("Serve the HTTP API")
    .option("--host <host>", "Server host")
    .option("--port <port>", "Server port")
    .action(async (opts: { host?: string; port?: string }) => {
      await runServer({
        configPath: program.opts<{ config: string }>().config,
        ...(opts.host ? { host: opts.host } : {}),
        ...(opts.port ? { port: Number(opts.port) } : {}),
      });
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd.command("get").action(async () => {
    const config = await loadConfig(program.opts<{ config: string }>().config);
    printJson(config);
  });

  configCmd.command("set <key> <value>").action(async (key: string, value: string) => {
    const configPath = program.opts<{ config: string }>().config;
    const config: AppConfig = await loadConfig(configPath);
    const mutable = structuredClone(config) as unknown as Record<string, unknown>;
    setPath(mutable, key, parseValue(value));
    const merged = mergeConfig(mutable as PartialAppConfigInput);
    await saveConfig(merged, configPath);
    console.log(`updated ${key}`);
  });

  return program;
}
