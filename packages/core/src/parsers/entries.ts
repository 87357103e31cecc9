import { readFile } from "node:fs/promises";
import { consoleLogger, type Logger } from "../logger.js";
import { asArray, asErrorMessage, asRecord, asText } from "../utils.js";
import { parseJsonLines } from "./jsonl.js";

export type ContentItem =
  | { type: "text"; text: string }
  | { type: "tool_use"; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; text: string }
  | { type: "other"; rawType: string };

interface EntryBase {
  line: number;
  timestamp: string;
  sessionId: string;
}

export interface UserEntry extends EntryBase {
  type: "user";
  content: ContentItem[];
}

export interface AssistantEntry extends EntryBase {
  type: "assistant";
  content: ContentItem[];
}

export interface SummaryEntry extends EntryBase {
  type: "summary";
  summary: string;
}

export interface OtherEntry extends EntryBase {
  type: "other";
  rawType: string;
}

export type TranscriptEntry = UserEntry | AssistantEntry | SummaryEntry | OtherEntry;
export type MessageEntry = UserEntry | AssistantEntry;

export function isMessageEntry(entry: TranscriptEntry): entry is MessageEntry {
  return entry.type === "user" || entry.type === "assistant";
}

function decodeContentItem(item: unknown): ContentItem | null {
  if (typeof item === "string") {
    return item ? { type: "text", text: item } : null;
  }
  const record = asRecord(item);
  const itemType = asText(record.type);
  if (itemType === "text") {
    return { type: "text", text: asText(record.text) };
  }
  if (itemType === "tool_use") {
    return { type: "tool_use", name: asText(record.name), input: asRecord(record.input) };
  }
  if (itemType === "tool_result") {
    const nested = asArray(record.content)
      .map((part) => asText(asRecord(part).text))
      .filter((text) => text.length > 0);
    const text = typeof record.content === "string" ? record.content : nested.join("\n");
    return { type: "tool_result", text };
  }
  return { type: "other", rawType: itemType };
}

export function decodeContent(value: unknown): ContentItem[] {
  if (typeof value === "string") {
    return value ? [{ type: "text", text: value }] : [];
  }
  const items: ContentItem[] = [];
  for (const item of asArray(value)) {
    const decoded = decodeContentItem(item);
    if (decoded) items.push(decoded);
  }
  return items;
}

export function decodeEntry(value: Record<string, unknown>, line: number): TranscriptEntry {
  const rawType = asText(value.type);
  const base: EntryBase = {
    line,
    timestamp: asText(value.timestamp),
    sessionId: asText(value.sessionId),
  };

  if (rawType === "user" || rawType === "assistant") {
    return {
      ...base,
      type: rawType,
      content: decodeContent(asRecord(value.message).content),
    };
  }
  if (rawType === "summary") {
    return { ...base, type: "summary", summary: asText(value.summary) };
  }
  return { ...base, type: "other", rawType };
}

export function parseEntries(text: string): TranscriptEntry[] {
  return parseJsonLines(text).map((row) => decodeEntry(row.value, row.line));
}

function isMissingFileError(error: unknown): boolean {
  const code = asRecord(error).code;
  return code === "ENOENT" || code === "ENOTDIR";
}

/**
 * Reads one transcript. A missing file is an empty transcript; any other read
 * failure is logged and also yields an empty transcript.
 */
export async function readEntries(filePath: string, logger: Logger = consoleLogger): Promise<TranscriptEntry[]> {
  let text: string;
  try {
    text = await readFile(filePath, "utf8");
  } catch (error) {
    if (!isMissingFileError(error)) {
      logger.warn(`failed to read transcript ${filePath}: ${asErrorMessage(error)}`);
    }
    return [];
  }
  return parseEntries(text);
}

/** Text a user typed: string content or its text items, space-joined. */
export function userText(entry: MessageEntry): string {
  return entry.content
    .flatMap((item) => (item.type === "text" ? [item.text] : []))
    .join(" ");
}

/** Assistant prose: text items only, newline-joined. Tool calls are left out. */
export function assistantText(entry: MessageEntry): string {
  return entry.content
    .flatMap((item) => (item.type === "text" ? [item.text] : []))
    .join("\n");
}

export function messageText(entry: MessageEntry): string {
  return entry.type === "user" ? userText(entry) : assistantText(entry);
}
