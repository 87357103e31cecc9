import type {
  ConversationMessage,
  ConversationRecord,
  ContextWindow,
  MessageRole,
  TurnWindow,
} from "@chapterscope/contracts";
import type { ConversationCache } from "./conversationCache.js";
import { statTranscript } from "./discovery.js";
import { SessionNotFoundError } from "./errors.js";
import { isMessageEntry, messageText, readEntries, userText, type TranscriptEntry } from "./parsers/entries.js";

export interface IndexRangeOptions {
  start: number;
  end: number;
  expand?: number;
  role?: MessageRole;
}

export interface TurnRangeOptions {
  turn: number;
  radius?: number;
  role?: MessageRole;
}

export interface MessageWindowOptions {
  aroundMessage?: number;
  contextSize?: number;
  maxMessages?: number;
  recentOnly?: boolean;
  recentCount?: number;
}

export type IndexSlice = Omit<ContextWindow, "sessionId">;
export type TurnSlice = Omit<TurnWindow, "sessionId">;

export interface MessageWindow {
  messages: ConversationMessage[];
  totalMessages: number;
  truncated: boolean;
}

/**
 * One message per user/assistant entry, empty ones included, so positions
 * line up with the extractor's message index. `turn` is the ordinal of the
 * latest user entry with text at or before the message.
 */
export function materializeMessages(entries: TranscriptEntry[]): ConversationMessage[] {
  const messages: ConversationMessage[] = [];
  let turn = 0;
  for (const entry of entries) {
    if (!isMessageEntry(entry)) continue;
    if (entry.type === "user" && userText(entry)) turn += 1;
    messages.push({
      index: messages.length,
      role: entry.type,
      content: messageText(entry),
      timestamp: entry.timestamp,
      turn,
    });
  }
  return messages;
}

function filterRole(messages: ConversationMessage[], role?: MessageRole): ConversationMessage[] {
  return role ? messages.filter((message) => message.role === role) : messages;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export function sliceByIndex(messages: ConversationMessage[], options: IndexRangeOptions): IndexSlice {
  const total = messages.length;
  const expand = Math.max(0, options.expand ?? 0);
  const end = Math.min(total, Math.max(0, options.end + expand));
  const start = Math.min(end, Math.max(0, options.start - expand));
  const selected = filterRole(messages.slice(start, end), options.role);
  return {
    messages: selected,
    start,
    end,
    canExpandBefore: start > 0,
    canExpandAfter: end < total,
    totalMessages: total,
    returnedCount: selected.length,
  };
}

export function countUserTurns(messages: ConversationMessage[]): number {
  return messages.reduce((max, message) => Math.max(max, message.turn), 0);
}

export function sliceByTurn(messages: ConversationMessage[], options: TurnRangeOptions): TurnSlice {
  const totalUserTurns = countUserTurns(messages);
  const radius = Math.max(0, options.radius ?? 0);
  if (totalUserTurns === 0) {
    return { messages: [], fromTurn: 0, toTurn: 0, totalUserTurns, totalMessages: messages.length, returnedCount: 0 };
  }

  const fromTurn = clamp(options.turn - radius, 1, totalUserTurns);
  const toTurn = clamp(options.turn + radius, 1, totalUserTurns);
  const inRange = messages.filter((message) => message.turn >= fromTurn && message.turn <= toTurn);
  const selected = filterRole(inRange, options.role);
  return {
    messages: selected,
    fromTurn,
    toTurn,
    totalUserTurns,
    totalMessages: messages.length,
    returnedCount: selected.length,
  };
}

export function windowMessages(messages: ConversationMessage[], options: MessageWindowOptions): MessageWindow {
  const total = messages.length;
  let selected = messages;
  if (options.aroundMessage !== undefined) {
    const contextSize = Math.max(0, options.contextSize ?? 10);
    const start = Math.max(0, options.aroundMessage - contextSize);
    const end = Math.min(total, options.aroundMessage + contextSize + 1);
    selected = messages.slice(start, Math.max(start, end));
  } else if (options.recentOnly) {
    selected = messages.slice(-Math.max(1, options.recentCount ?? 20));
  } else if (options.maxMessages) {
    selected = messages.slice(-Math.max(1, options.maxMessages));
  }
  return { messages: selected, totalMessages: total, truncated: selected.length < total };
}

export interface LoadedConversation {
  record: ConversationRecord;
  messages: ConversationMessage[];
}

/** Materializes full message bodies by re-reading a cached session's file. */
export class NavigationService {
  private readonly cache: ConversationCache;

  constructor(cache: ConversationCache) {
    this.cache = cache;
  }

  async load(sessionId: string): Promise<LoadedConversation> {
    const record = this.cache.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    const file = await statTranscript(record.filePath);
    if (!file) {
      throw new SessionNotFoundError(sessionId, "transcript file no longer exists");
    }
    const entries = await readEntries(record.filePath, this.cache.getLogger());
    return { record, messages: materializeMessages(entries) };
  }

  async getConversationContext(sessionId: string, options: IndexRangeOptions): Promise<ContextWindow> {
    const { record, messages } = await this.load(sessionId);
    return { sessionId: record.sessionId, ...sliceByIndex(messages, options) };
  }

  async getTurnContext(sessionId: string, options: TurnRangeOptions): Promise<TurnWindow> {
    const { record, messages } = await this.load(sessionId);
    return { sessionId: record.sessionId, ...sliceByTurn(messages, options) };
  }
}
