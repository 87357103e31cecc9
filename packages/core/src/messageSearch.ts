import path from "node:path";
import type { MessageMatch, SourcesConfig } from "@chapterscope/contracts";
import { discoverTranscripts } from "./discovery.js";
import type { Logger } from "./logger.js";
import { readEntries, userText, type TranscriptEntry } from "./parsers/entries.js";
import { fileIdFromPath, projectFromPath, truncate } from "./utils.js";

const EXCERPT_CHARS = 200;

export interface MessageSearchOptions {
  limit: number;
  project?: string;
  includeAssistant?: boolean;
}

/**
 * Whole-query, case-insensitive substring matches inside one transcript.
 * `messageIndex` is the 0-based position among user/assistant entries.
 */
export function matchEntries(
  entries: TranscriptEntry[],
  filePath: string,
  needle: string,
  includeAssistant: boolean,
): MessageMatch[] {
  const file = path.basename(filePath);
  const project = projectFromPath(filePath);
  const matches: MessageMatch[] = [];
  let sessionId = fileIdFromPath(filePath);
  let messageIndex = 0;

  for (const entry of entries) {
    if (entry.sessionId) sessionId = entry.sessionId;
    const base = { file, project, sessionId };

    if (entry.type === "summary") {
      if (entry.summary && entry.summary.toLowerCase().includes(needle)) {
        matches.push({ ...base, timestamp: "", excerpt: entry.summary, matchType: "summary", messageIndex: 0 });
      }
      continue;
    }
    if (entry.type === "other") continue;

    const index = messageIndex;
    messageIndex += 1;

    if (entry.type === "user") {
      const text = userText(entry);
      if (text && text.toLowerCase().includes(needle)) {
        matches.push({
          ...base,
          timestamp: entry.timestamp,
          excerpt: truncate(text, EXCERPT_CHARS),
          matchType: "user",
          messageIndex: index,
        });
      }
      continue;
    }

    if (!includeAssistant) continue;
    for (const item of entry.content) {
      if (item.type !== "text" || !item.text.toLowerCase().includes(needle)) continue;
      matches.push({
        ...base,
        timestamp: entry.timestamp,
        excerpt: truncate(item.text, EXCERPT_CHARS),
        matchType: "assistant",
        messageIndex: index,
      });
    }
  }

  return matches;
}

/** Scans raw transcripts directly; the conversation cache holds no message bodies. */
export async function searchMessages(
  sources: SourcesConfig,
  query: string,
  options: MessageSearchOptions,
  logger?: Logger,
): Promise<MessageMatch[]> {
  const needle = query.trim().toLowerCase();
  const limit = Math.max(0, options.limit);
  if (!needle || limit === 0) return [];

  const results: MessageMatch[] = [];
  const files = await discoverTranscripts(sources, options.project);
  for (const file of files) {
    const entries = await readEntries(file.path, logger);
    for (const match of matchEntries(entries, file.path, needle, options.includeAssistant ?? false)) {
      results.push(match);
      if (results.length >= limit) return results;
    }
  }
  return results;
}
