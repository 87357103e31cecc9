import type { AppConfig } from "@chapterscope/contracts";

export const DEFAULT_CONFIG: AppConfig = {
  sources: {
    projectsRoots: ["~/.claude/projects"],
    includeGlobs: ["*/*.jsonl"],
    excludeGlobs: [],
    maxDepth: 2,
  },
  extraction: {
    todoToolMarker: "TodoWrite",
    arcMessageChars: 200,
  },
  search: {
    defaultLimit: 10,
    messageSearchLimit: 20,
  },
  navigation: {
    defaultExpand: 0,
    defaultTurnRadius: 1,
    defaultContextSize: 10,
    recentMessageCount: 20,
  },
};
