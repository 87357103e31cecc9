import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import type {
  AppConfig,
  ExtractionConfig,
  NavigationConfig,
  SearchConfig,
  SourcesConfig,
} from "@chapterscope/contracts";
import { DEFAULT_CONFIG } from "./defaults.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".chapterscope", "config.toml");

export interface PartialAppConfigInput {
  sources?: Partial<SourcesConfig>;
  extraction?: Partial<ExtractionConfig>;
  search?: Partial<SearchConfig>;
  navigation?: Partial<NavigationConfig>;
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function stringListOrDefault(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return [...fallback];
  const dedup = new Set<string>();
  for (const item of value) {
    const trimmed = String(item ?? "").trim();
    if (trimmed) dedup.add(trimmed);
  }
  return Array.from(dedup);
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function mergeSources(input?: Partial<SourcesConfig>): SourcesConfig {
  const defaults = DEFAULT_CONFIG.sources;
  const includeGlobs = stringListOrDefault(input?.includeGlobs, defaults.includeGlobs);
  return {
    projectsRoots: stringListOrDefault(input?.projectsRoots, defaults.projectsRoots),
    includeGlobs: includeGlobs.length > 0 ? includeGlobs : [...defaults.includeGlobs],
    excludeGlobs: stringListOrDefault(input?.excludeGlobs, defaults.excludeGlobs),
    maxDepth: positiveIntOrDefault(input?.maxDepth, defaults.maxDepth),
  };
}

function mergeExtraction(input?: Partial<ExtractionConfig>): ExtractionConfig {
  const defaults = DEFAULT_CONFIG.extraction;
  return {
    todoToolMarker: nonEmptyStringOrDefault(input?.todoToolMarker, defaults.todoToolMarker),
    arcMessageChars: positiveIntOrDefault(input?.arcMessageChars, defaults.arcMessageChars),
  };
}

function mergeSearch(input?: Partial<SearchConfig>): SearchConfig {
  const defaults = DEFAULT_CONFIG.search;
  return {
    defaultLimit: positiveIntOrDefault(input?.defaultLimit, defaults.defaultLimit),
    messageSearchLimit: positiveIntOrDefault(input?.messageSearchLimit, defaults.messageSearchLimit),
  };
}

function mergeNavigation(input?: Partial<NavigationConfig>): NavigationConfig {
  const defaults = DEFAULT_CONFIG.navigation;
  return {
    defaultExpand: nonNegativeIntOrDefault(input?.defaultExpand, defaults.defaultExpand),
    defaultTurnRadius: nonNegativeIntOrDefault(input?.defaultTurnRadius, defaults.defaultTurnRadius),
    defaultContextSize: nonNegativeIntOrDefault(input?.defaultContextSize, defaults.defaultContextSize),
    recentMessageCount: positiveIntOrDefault(input?.recentMessageCount, defaults.recentMessageCount),
  };
}

export function mergeConfig(input?: PartialAppConfigInput): AppConfig {
  return {
    sources: mergeSources(input?.sources),
    extraction: mergeExtraction(input?.extraction),
    search: mergeSearch(input?.search),
    navigation: mergeNavigation(input?.navigation),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  try {
    const raw = await readFile(configPath, "utf8");
    const parsed = TOML.parse(raw) as PartialAppConfigInput;
    return mergeConfig(parsed);
  } catch {
    return mergeConfig();
  }
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  const content = TOML.stringify(config as unknown as JsonMap);
  await writeFile(configPath, content, "utf8");
}
