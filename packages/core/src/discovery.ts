import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { SourcesConfig } from "@chapterscope/contracts";
import { expandHome, fileIdFromPath, projectFromPath } from "./utils.js";

export interface DiscoveredTranscript {
  id: string;
  path: string;
  project: string;
  mtimeMs: number;
}

export async function statTranscript(filePath: string): Promise<DiscoveredTranscript | null> {
  try {
    const fileStat = await stat(filePath);
    if (!fileStat.isFile()) return null;
    return {
      id: fileIdFromPath(filePath),
      path: filePath,
      project: projectFromPath(filePath),
      mtimeMs: fileStat.mtimeMs,
    };
  } catch {
    return null;
  }
}

export async function listProjectDirectories(sources: SourcesConfig): Promise<string[]> {
  const names = new Set<string>();
  for (const rootRaw of sources.projectsRoots) {
    const root = path.resolve(expandHome(rootRaw));
    const dirs = await fg("*", {
      cwd: root,
      onlyDirectories: true,
      dot: true,
      deep: 1,
      suppressErrors: true,
    });
    for (const dir of dirs) names.add(dir);
  }
  return Array.from(names).sort();
}

/**
 * Enumerates transcript files under the configured project roots, newest
 * first. The first file seen for a given session id wins.
 */
export async function discoverTranscripts(sources: SourcesConfig, project?: string): Promise<DiscoveredTranscript[]> {
  const dedup = new Map<string, DiscoveredTranscript>();

  for (const rootRaw of sources.projectsRoots) {
    const root = path.resolve(expandHome(rootRaw));
    const matches = await fg(sources.includeGlobs, {
      cwd: root,
      absolute: true,
      onlyFiles: true,
      dot: true,
      deep: sources.maxDepth,
      suppressErrors: true,
      ignore: sources.excludeGlobs,
      unique: true,
      followSymbolicLinks: false,
    });

    for (const match of matches) {
      const filePath = path.resolve(match);
      const file = await statTranscript(filePath);
      if (!file) continue;
      if (project && file.project !== project) continue;
      if (!dedup.has(file.id)) dedup.set(file.id, file);
    }
  }

  const all = Array.from(dedup.values());
  all.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
  return all;
}
