import type { AppConfig, ConversationRecord, IndexStats } from "@chapterscope/contracts";
import { discoverTranscripts, type DiscoveredTranscript } from "./discovery.js";
import { buildConversationRecord } from "./extractor.js";
import { consoleLogger, type Logger } from "./logger.js";
import { readEntries } from "./parsers/entries.js";
import { nowMs } from "./utils.js";

export interface RefreshStats {
  candidateFiles: number;
  parsedFileCount: number;
  durationMs: number;
}

export interface ConversationCacheOptions {
  logger?: Logger;
}

/**
 * Process-wide map of session id to conversation record.
 *
 * Every refresh stats all candidate files and re-derives a record only when
 * the file is new or its mtime moved past the stored one. Records are replaced
 * whole, never patched, and stay cached after their file disappears.
 * Refreshes are not locked; overlapping callers share the refresh in flight.
 */
export class ConversationCache {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly entries = new Map<string, ConversationRecord>();
  private inFlight: Promise<RefreshStats> | null = null;
  private perf: IndexStats = {
    refreshCount: 0,
    parseCount: 0,
    trackedSessions: 0,
    candidateFiles: 0,
    lastRefreshDurationMs: 0,
    lastRefreshAtMs: 0,
  };

  constructor(config: AppConfig, options: ConversationCacheOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? consoleLogger;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLogger(): Logger {
    return this.logger;
  }

  refresh(): Promise<RefreshStats> {
    if (!this.inFlight) {
      this.inFlight = this.performRefresh().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  get(sessionId: string): ConversationRecord | undefined {
    const byFile = this.entries.get(sessionId);
    if (byFile) return byFile;
    for (const record of this.entries.values()) {
      if (record.sessionId === sessionId) return record;
    }
    return undefined;
  }

  records(): ConversationRecord[] {
    return Array.from(this.entries.values());
  }

  stats(): IndexStats {
    return { ...this.perf, trackedSessions: this.entries.size };
  }

  private async performRefresh(): Promise<RefreshStats> {
    const startedAtMs = nowMs();
    const files = await discoverTranscripts(this.config.sources);
    let parsedFileCount = 0;

    for (const file of files) {
      if (await this.upsertFile(file)) parsedFileCount += 1;
    }

    const finishedAtMs = nowMs();
    const durationMs = Math.max(0, finishedAtMs - startedAtMs);
    this.perf.refreshCount += 1;
    this.perf.candidateFiles = files.length;
    this.perf.trackedSessions = this.entries.size;
    this.perf.lastRefreshDurationMs = durationMs;
    this.perf.lastRefreshAtMs = finishedAtMs;

    return { candidateFiles: files.length, parsedFileCount, durationMs };
  }

  private async upsertFile(file: DiscoveredTranscript): Promise<boolean> {
    const current = this.entries.get(file.id);
    if (current && current.mtimeMs >= file.mtimeMs) return false;

    this.perf.parseCount += 1;
    const entries = await readEntries(file.path, this.logger);
    const record = buildConversationRecord(entries, file, this.config.extraction);
    this.entries.set(file.id, record);
    return true;
  }
}
