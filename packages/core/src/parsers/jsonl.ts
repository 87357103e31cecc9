export interface JsonLine {
  line: number;
  value: Record<string, unknown>;
}

/**
 * Splits line-delimited JSON into objects, keeping 1-based line numbers.
 * Blank lines, undecodable lines and non-object values are skipped.
 */
export function parseJsonLines(text: string): JsonLine[] {
  const out: JsonLine[] = [];
  const lines = text.split(/\r?\n/);
  for (let idx = 0; idx < lines.length; idx += 1) {
    const trimmed = (lines[idx] ?? "").trim();
    if (!trimmed) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        out.push({ line: idx + 1, value: parsed as Record<string, unknown> });
      }
    } catch {
      // skip invalid line
    }
  }
  return out;
}
