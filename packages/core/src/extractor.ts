import type { ConversationRecord, FinalTodos, TodoItem, TodoSnapshot, TodoStatus } from "@chapterscope/contracts";
import { segmentChapters } from "./chapters.js";
import { userText, type TranscriptEntry } from "./parsers/entries.js";
import { asArray, asRecord, asText, fileIdFromPath, projectFromPath, truncate } from "./utils.js";

export const DEFAULT_TODO_TOOL_MARKER = "TodoWrite";
export const DEFAULT_ARC_MESSAGE_CHARS = 200;

export interface ExtractOptions {
  todoToolMarker?: string;
  arcMessageChars?: number;
}

export interface TranscriptFileInfo {
  path: string;
  mtimeMs: number;
}

export type ExtractedConversation = Omit<ConversationRecord, "chapters">;

function normalizeStatus(value: unknown): TodoStatus {
  if (value === "completed" || value === "in_progress" || value === "pending") return value;
  return "pending";
}

export function decodeTodos(input: Record<string, unknown>): TodoItem[] {
  return asArray(input.todos).map((raw) => {
    const todo = asRecord(raw);
    return { content: asText(todo.content), status: normalizeStatus(todo.status) };
  });
}

export function partitionTodos(todos: TodoItem[]): FinalTodos {
  const out: FinalTodos = { completed: [], inProgress: [], pending: [] };
  for (const todo of todos) {
    if (!todo.content) continue;
    if (todo.status === "completed") out.completed.push(todo.content);
    else if (todo.status === "in_progress") out.inProgress.push(todo.content);
    else out.pending.push(todo.content);
  }
  return out;
}

/**
 * Keeps the opening of a conversation and how it ended: messages 1 and 2, then
 * message 3 when there are exactly three, otherwise the last two not already kept.
 */
export function buildUserMessageArc(messages: string[], maxChars = DEFAULT_ARC_MESSAGE_CHARS): string[] {
  const truncated = messages.map((message) => truncate(message, maxChars));
  if (truncated.length <= 3) return truncated;

  const arc = truncated.slice(0, 2);
  for (const message of truncated.slice(-2)) {
    if (!arc.includes(message)) arc.push(message);
  }
  return arc;
}

export function extractConversation(
  entries: TranscriptEntry[],
  file: TranscriptFileInfo,
  options: ExtractOptions = {},
): ExtractedConversation {
  const marker = options.todoToolMarker ?? DEFAULT_TODO_TOOL_MARKER;
  const arcChars = options.arcMessageChars ?? DEFAULT_ARC_MESSAGE_CHARS;
  const fileId = fileIdFromPath(file.path);

  let sessionId = "";
  let messageIndex = 0;
  let timestamp = "";
  let storedSummary = "";
  const userMessages: string[] = [];
  const todoSnapshots: TodoSnapshot[] = [];

  for (const entry of entries) {
    sessionId ||= entry.sessionId;
    if (entry.timestamp) timestamp = entry.timestamp;

    if (entry.type === "summary") {
      if (entry.summary) storedSummary = entry.summary;
      continue;
    }
    if (entry.type === "other") continue;

    // counted before looking at content so indices follow the raw transcript
    messageIndex += 1;

    if (entry.type === "user") {
      const text = userText(entry);
      if (text) userMessages.push(text);
      continue;
    }

    for (const item of entry.content) {
      if (item.type !== "tool_use" || !item.name.includes(marker)) continue;
      todoSnapshots.push({
        messageIndex,
        timestamp: entry.timestamp,
        todos: decodeTodos(item.input),
      });
    }
  }

  const lastSnapshot = todoSnapshots[todoSnapshots.length - 1];

  return {
    sessionId: sessionId || fileId,
    fileId,
    project: projectFromPath(file.path),
    filePath: file.path,
    mtimeMs: file.mtimeMs,
    timestamp,
    messageCount: messageIndex,
    userMessageCount: userMessages.length,
    userMessageArc: buildUserMessageArc(userMessages, arcChars),
    firstMessage: truncate(userMessages[0] ?? "", arcChars),
    summary: storedSummary,
    todoSnapshots,
    finalTodos: lastSnapshot ? partitionTodos(lastSnapshot.todos) : { completed: [], inProgress: [], pending: [] },
  };
}

export function buildConversationRecord(
  entries: TranscriptEntry[],
  file: TranscriptFileInfo,
  options: ExtractOptions = {},
): ConversationRecord {
  const extracted = extractConversation(entries, file, options);
  return { ...extracted, chapters: segmentChapters(extracted.todoSnapshots) };
}
