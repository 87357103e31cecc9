import type { ConversationRecord, SearchResult } from "@chapterscope/contracts";

export interface SearchOptions {
  limit: number;
  project?: string;
}

export function queryTerms(query: string): string[] {
  return query
    .toLowerCase()
    .split(/\s+/)
    .filter((term) => term.length > 0);
}

function allTodos(record: ConversationRecord): string[] {
  const { completed, inProgress, pending } = record.finalTodos;
  return [...completed, ...inProgress, ...pending];
}

/** First three completed todos; the user message arc only when the record has no todos at all. */
export function recordSummary(record: ConversationRecord): string {
  if (allTodos(record).length === 0) return record.userMessageArc.join(" → ");
  return record.finalTodos.completed.slice(0, 3).join("; ");
}

/** One point per (text, term) pair where the term is a substring of the text. */
export function scoreText(text: string, terms: string[]): number {
  const lowered = text.toLowerCase();
  let score = 0;
  for (const term of terms) {
    if (lowered.includes(term)) score += 1;
  }
  return score;
}

export function scoreRecord(record: ConversationRecord, terms: string[]): SearchResult {
  const todos = allTodos(record);
  const usingTodos = todos.length > 0;
  const candidates = usingTodos ? todos : record.userMessageArc;

  let score = 0;
  const matched: string[] = [];
  for (const text of candidates) {
    const textScore = scoreText(text, terms);
    if (textScore === 0) continue;
    score += textScore;
    matched.push(text);
  }

  return {
    sessionId: record.sessionId,
    score,
    matchedTodos: usingTodos ? matched : [],
    matchedUserMessages: usingTodos ? [] : matched,
    summary: recordSummary(record),
    project: record.project,
    timestamp: record.timestamp,
  };
}

function compareTimestampDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

export function searchRecords(records: Iterable<ConversationRecord>, query: string, options: SearchOptions): SearchResult[] {
  const terms = queryTerms(query);
  if (terms.length === 0) return [];

  const results: SearchResult[] = [];
  for (const record of records) {
    if (options.project && record.project !== options.project) continue;
    const result = scoreRecord(record, terms);
    if (result.score > 0) results.push(result);
  }

  results.sort((a, b) => b.score - a.score || compareTimestampDesc(a.timestamp, b.timestamp));
  return results.slice(0, Math.max(0, options.limit));
}
