import type { Chapter, TodoSnapshot } from "@chapterscope/contracts";

/**
 * Turns todo completions into chained chapters. Each newly completed todo
 * closes a chapter at the index of the snapshot that first reports it; the
 * next chapter starts where the previous one closed.
 *
 * Completions first seen in the same snapshot all close at that snapshot, so
 * every one after the first has a zero-width range. A completed todo with
 * empty content yields no chapter.
 */
export function segmentChapters(snapshots: TodoSnapshot[]): Chapter[] {
  const seen = new Set<string>();
  const chapters: Chapter[] = [];
  let boundary = 0;

  for (const snapshot of snapshots) {
    for (const todo of snapshot.todos) {
      if (todo.status !== "completed" || !todo.content || seen.has(todo.content)) continue;
      seen.add(todo.content);
      chapters.push({
        title: todo.content,
        messageRange: [boundary, snapshot.messageIndex],
        completedAt: snapshot.messageIndex,
        messageCount: snapshot.messageIndex - boundary,
      });
      boundary = snapshot.messageIndex;
    }
  }

  return chapters;
}
