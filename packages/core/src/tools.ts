import path from "node:path";
import type {
  Chapter,
  ConversationRecord,
  ConversationSummary,
  ConversationTranscript,
  ContextWindow,
  IndexStats,
  MessageMatch,
  MessageRole,
  RecentConversation,
  SearchResult,
  ToolFailure,
  ToolFailureCode,
  ToolResult,
  TurnWindow,
} from "@chapterscope/contracts";
import { loadConfig } from "./config.js";
import { ConversationCache, type ConversationCacheOptions } from "./conversationCache.js";
import { listProjectDirectories } from "./discovery.js";
import { InvalidArgumentError, SessionNotFoundError } from "./errors.js";
import { searchMessages } from "./messageSearch.js";
import { NavigationService, windowMessages } from "./navigation.js";
import { recordSummary, searchRecords } from "./queryEngine.js";
import { asErrorMessage, toIsoString } from "./utils.js";

export interface SearchConversationsArgs {
  query: string;
  limit?: number;
  project?: string;
}

export interface SearchMessagesArgs {
  query: string;
  project?: string;
  limit?: number;
  includeAssistant?: boolean;
}

export interface SessionArgs {
  sessionId: string;
}

/** Range fields are checked at run time; a missing one is an invalid argument. */
export interface ConversationContextArgs extends SessionArgs {
  start?: number;
  end?: number;
  expand?: number;
  role?: string;
}

export interface TurnContextArgs extends SessionArgs {
  turn?: number;
  radius?: number;
  role?: string;
}

export interface GetConversationArgs extends SessionArgs {
  aroundMessage?: number;
  contextSize?: number;
  maxMessages?: number;
  recentOnly?: boolean;
}

export interface ListRecentArgs {
  limit?: number;
}

function requireText(value: unknown, name: string): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new InvalidArgumentError(`${name} is required`);
  }
  return value.trim();
}

function optionalInt(value: unknown, name: string, min: number): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new InvalidArgumentError(`${name} must be an integer >= ${min}`);
  }
  return value;
}

function requireInt(value: unknown, name: string, min: number): number {
  const parsed = optionalInt(value, name, min);
  if (parsed === undefined) {
    throw new InvalidArgumentError(`${name} is required`);
  }
  return parsed;
}

function optionalRole(value: unknown): MessageRole | undefined {
  if (value === undefined || value === "") return undefined;
  if (value === "user" || value === "assistant") return value;
  throw new InvalidArgumentError(`role must be "user" or "assistant"`);
}

function failureCode(error: unknown): ToolFailureCode {
  if (error instanceof SessionNotFoundError) return "not_found";
  if (error instanceof InvalidArgumentError) return "invalid_argument";
  return "internal";
}

export function toConversationSummary(record: ConversationRecord): ConversationSummary {
  return {
    sessionId: record.sessionId,
    project: record.project,
    file: path.basename(record.filePath),
    timestamp: record.timestamp,
    lastModified: toIsoString(record.mtimeMs),
    messageCount: record.messageCount,
    userMessageCount: record.userMessageCount,
    summary: recordSummary(record),
    storedSummary: record.summary,
    userMessageArc: record.userMessageArc,
    finalTodos: record.finalTodos,
    chapters: record.chapters,
    snapshotCount: record.todoSnapshots.length,
  };
}

/**
 * The operation surface. Each call refreshes the cache first and never
 * throws: failures come back as `{ success: false, error }`.
 */
export class ConversationTools {
  private readonly cache: ConversationCache;
  private readonly navigation: NavigationService;

  constructor(cache: ConversationCache) {
    this.cache = cache;
    this.navigation = new NavigationService(cache);
  }

  static async fromConfigPath(configPath?: string, options: ConversationCacheOptions = {}): Promise<ConversationTools> {
    const config = await loadConfig(configPath);
    return new ConversationTools(new ConversationCache(config, options));
  }

  getCache(): ConversationCache {
    return this.cache;
  }

  private async run<T extends object>(operation: () => Promise<T>): Promise<ToolResult<T>> {
    try {
      await this.cache.refresh();
      const value = await operation();
      return { success: true as const, ...value };
    } catch (error) {
      const failure: ToolFailure = { success: false, error: asErrorMessage(error), code: failureCode(error) };
      return failure;
    }
  }

  private requireRecord(sessionIdInput: unknown): ConversationRecord {
    const sessionId = requireText(sessionIdInput, "sessionId");
    const record = this.cache.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return record;
  }

  searchConversations(args: SearchConversationsArgs): Promise<ToolResult<{ query: string; results: SearchResult[] }>> {
    return this.run(async () => {
      const query = requireText(args.query, "query");
      const limit = optionalInt(args.limit, "limit", 1) ?? this.cache.getConfig().search.defaultLimit;
      const options = args.project ? { limit, project: args.project } : { limit };
      return { query, results: searchRecords(this.cache.records(), query, options) };
    });
  }

  searchMessages(args: SearchMessagesArgs): Promise<ToolResult<{ query: string; results: MessageMatch[] }>> {
    return this.run(async () => {
      const query = requireText(args.query, "query");
      const config = this.cache.getConfig();
      const limit = optionalInt(args.limit, "limit", 1) ?? config.search.messageSearchLimit;
      const results = await searchMessages(
        config.sources,
        query,
        { limit, includeAssistant: args.includeAssistant ?? false, ...(args.project ? { project: args.project } : {}) },
        this.cache.getLogger(),
      );
      return { query, results };
    });
  }

  getConversationSummary(args: SessionArgs): Promise<ToolResult<{ conversation: ConversationSummary }>> {
    return this.run(async () => ({ conversation: toConversationSummary(this.requireRecord(args.sessionId)) }));
  }

  getChapters(args: SessionArgs): Promise<ToolResult<{ sessionId: string; chapters: Chapter[] }>> {
    return this.run(async () => {
      const record = this.requireRecord(args.sessionId);
      return { sessionId: record.sessionId, chapters: record.chapters };
    });
  }

  getConversationContext(args: ConversationContextArgs): Promise<ToolResult<ContextWindow>> {
    return this.run(async () => {
      const sessionId = requireText(args.sessionId, "sessionId");
      const start = requireInt(args.start, "start", 0);
      const end = requireInt(args.end, "end", 0);
      if (end < start) {
        throw new InvalidArgumentError("end must be >= start");
      }
      const expand = optionalInt(args.expand, "expand", 0) ?? this.cache.getConfig().navigation.defaultExpand;
      const role = optionalRole(args.role);
      return this.navigation.getConversationContext(sessionId, { start, end, expand, ...(role ? { role } : {}) });
    });
  }

  getTurnContext(args: TurnContextArgs): Promise<ToolResult<TurnWindow>> {
    return this.run(async () => {
      const sessionId = requireText(args.sessionId, "sessionId");
      const turn = requireInt(args.turn, "turn", 1);
      const radius = optionalInt(args.radius, "radius", 0) ?? this.cache.getConfig().navigation.defaultTurnRadius;
      const role = optionalRole(args.role);
      return this.navigation.getTurnContext(sessionId, { turn, radius, ...(role ? { role } : {}) });
    });
  }

  getConversation(args: GetConversationArgs): Promise<ToolResult<ConversationTranscript>> {
    return this.run(async () => {
      const sessionId = requireText(args.sessionId, "sessionId");
      const navigationConfig = this.cache.getConfig().navigation;
      const aroundMessage = optionalInt(args.aroundMessage, "aroundMessage", 0);
      const contextSize = optionalInt(args.contextSize, "contextSize", 0) ?? navigationConfig.defaultContextSize;
      const maxMessages = optionalInt(args.maxMessages, "maxMessages", 1);
      const { record, messages } = await this.navigation.load(sessionId);
      const window = windowMessages(messages, {
        contextSize,
        recentCount: navigationConfig.recentMessageCount,
        recentOnly: args.recentOnly ?? false,
        ...(aroundMessage !== undefined ? { aroundMessage } : {}),
        ...(maxMessages !== undefined ? { maxMessages } : {}),
      });
      return {
        sessionId: record.sessionId,
        project: record.project,
        file: path.basename(record.filePath),
        summary: record.summary,
        messages: window.messages,
        totalMessages: window.totalMessages,
        messageCount: window.messages.length,
        truncated: window.truncated,
      };
    });
  }

  listRecent(args: ListRecentArgs = {}): Promise<ToolResult<{ conversations: RecentConversation[] }>> {
    return this.run(async () => {
      const limit = optionalInt(args.limit, "limit", 1) ?? this.cache.getConfig().search.defaultLimit;
      const conversations = this.cache
        .records()
        .sort((a, b) => b.mtimeMs - a.mtimeMs || a.filePath.localeCompare(b.filePath))
        .slice(0, limit)
        .map((record) => ({
          sessionId: record.sessionId,
          project: record.project,
          file: path.basename(record.filePath),
          summary: record.summary || recordSummary(record),
          firstMessage: record.firstMessage,
          lastModified: toIsoString(record.mtimeMs),
        }));
      return { conversations };
    });
  }

  listProjects(): Promise<ToolResult<{ projects: string[] }>> {
    return this.run(async () => {
      const names = new Set(await listProjectDirectories(this.cache.getConfig().sources));
      for (const record of this.cache.records()) names.add(record.project);
      return { projects: Array.from(names).sort() };
    });
  }

  getIndexStats(): Promise<ToolResult<{ stats: IndexStats }>> {
    return this.run(async () => ({ stats: this.cache.stats() }));
  }
}
