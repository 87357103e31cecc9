import os from "node:os";
import path from "node:path";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

/** Only real strings survive; anything else becomes "". */
export function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function nowMs(): number {
  return Date.now();
}

/** Cuts by code point so astral characters are never split. */
export function truncate(text: string, maxLen: number): string {
  const limit = Math.max(0, maxLen);
  if (text.length <= limit) return text;
  const codePoints = Array.from(text);
  return codePoints.length <= limit ? text : codePoints.slice(0, limit).join("");
}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Session identity is the transcript's file name without its extension. */
export function fileIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

export function projectFromPath(filePath: string): string {
  return path.basename(path.dirname(filePath));
}

export function toIsoString(ms: number): string {
  return ms > 0 ? new Date(ms).toISOString() : "";
}
