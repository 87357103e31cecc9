export type TodoStatus = "pending" | "in_progress" | "completed";
export type MessageRole = "user" | "assistant";
export type MessageMatchType = "user" | "assistant" | "summary";

export interface TodoItem {
  content: string;
  status: TodoStatus;
}

export interface TodoSnapshot {
  messageIndex: number;
  timestamp: string;
  todos: TodoItem[];
}

export interface FinalTodos {
  completed: string[];
  inProgress: string[];
  pending: string[];
}

/** `messageRange` is the half-open interval (start, end] over message indices. */
export interface Chapter {
  title: string;
  messageRange: [number, number];
  completedAt: number;
  messageCount: number;
}

export interface ConversationRecord {
  sessionId: string;
  fileId: string;
  project: string;
  filePath: string;
  mtimeMs: number;
  timestamp: string;
  messageCount: number;
  userMessageCount: number;
  userMessageArc: string[];
  firstMessage: string;
  summary: string;
  todoSnapshots: TodoSnapshot[];
  finalTodos: FinalTodos;
  chapters: Chapter[];
}

export interface SearchResult {
  sessionId: string;
  score: number;
  matchedTodos: string[];
  matchedUserMessages: string[];
  summary: string;
  project: string;
  timestamp: string;
}

export interface ConversationMessage {
  index: number;
  role: MessageRole;
  content: string;
  timestamp: string;
  turn: number;
}

export interface MessageMatch {
  file: string;
  project: string;
  sessionId: string;
  timestamp: string;
  excerpt: string;
  matchType: MessageMatchType;
  messageIndex: number;
}

export interface ConversationSummary {
  sessionId: string;
  project: string;
  file: string;
  timestamp: string;
  lastModified: string;
  messageCount: number;
  userMessageCount: number;
  summary: string;
  storedSummary: string;
  userMessageArc: string[];
  finalTodos: FinalTodos;
  chapters: Chapter[];
  snapshotCount: number;
}

export interface RecentConversation {
  sessionId: string;
  project: string;
  file: string;
  summary: string;
  firstMessage: string;
  lastModified: string;
}

export interface ContextWindow {
  sessionId: string;
  messages: ConversationMessage[];
  start: number;
  end: number;
  canExpandBefore: boolean;
  canExpandAfter: boolean;
  totalMessages: number;
  returnedCount: number;
}

export interface TurnWindow {
  sessionId: string;
  messages: ConversationMessage[];
  fromTurn: number;
  toTurn: number;
  totalUserTurns: number;
  totalMessages: number;
  returnedCount: number;
}

export interface ConversationTranscript {
  sessionId: string;
  project: string;
  file: string;
  summary: string;
  messages: ConversationMessage[];
  totalMessages: number;
  messageCount: number;
  truncated: boolean;
}

export interface IndexStats {
  refreshCount: number;
  parseCount: number;
  trackedSessions: number;
  candidateFiles: number;
  lastRefreshDurationMs: number;
  lastRefreshAtMs: number;
}

export type ToolFailureCode = "not_found" | "invalid_argument" | "internal";
export type ToolFailure = { success: false; error: string; code?: ToolFailureCode };
export type ToolSuccess<T> = { success: true } & T;
export type ToolResult<T> = ToolSuccess<T> | ToolFailure;

export interface SourcesConfig {
  projectsRoots: string[];
  includeGlobs: string[];
  excludeGlobs: string[];
  maxDepth: number;
}

export interface ExtractionConfig {
  todoToolMarker: string;
  arcMessageChars: number;
}

export interface SearchConfig {
  defaultLimit: number;
  messageSearchLimit: number;
}

export interface NavigationConfig {
  defaultExpand: number;
  defaultTurnRadius: number;
  defaultContextSize: number;
  recentMessageCount: number;
}

export interface AppConfig {
  sources: SourcesConfig;
  extraction: ExtractionConfig;
  search: SearchConfig;
  navigation: NavigationConfig;
}
