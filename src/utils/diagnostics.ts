import { isDebugEnabled } from "../debug/options";
import { TargetClosedError } from "../error";

const MAX_DIAGNOSTIC_CHARS = 300;

function stringifyUnknownObject(value: object): string {
  const seen = new WeakSet<object>();
  const serialized = JSON.stringify(value, (_key, candidate: unknown) => {
    if (typeof candidate === "bigint") {
      return `${candidate.toString()}n`;
    }
    if (typeof candidate === "object" && candidate !== null) {
      if (seen.has(candidate)) {
        return "[Circular]";
      }
      seen.add(candidate);
    }
    return candidate;
  });
  return serialized ?? String(value);
}

export function formatUnknownError(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object") {
    try {
      return stringifyUnknownObject(error);
    } catch {
      return String(error);
    }
  }
  return String(error);
}

/**
 * Single-line, control-character-free rendering of anything thrown or
 * received, capped so one bad frame cannot flood the log.
 */
export function formatDiagnostic(
  value: unknown,
  maxChars: number = MAX_DIAGNOSTIC_CHARS
): string {
  const normalized = Array.from(formatUnknownError(value), (char) => {
    const code = char.charCodeAt(0);
    return (code >= 0 && code < 32) || code === 127 ? " " : char;
  })
    .join("")
    .replace(/\s+/g, " ")
    .trim();
  const fallback = normalized.length > 0 ? normalized : "unknown error";
  if (fallback.length <= maxChars) {
    return fallback;
  }
  const omittedChars = fallback.length - maxChars;
  return `${fallback.slice(0, maxChars)}... [truncated ${omittedChars} chars]`;
}

/**
 * For fire-and-forget protocol calls made during teardown. A rejection
 * because the target is already gone is expected and only traced; anything
 * else is a warning.
 */
export function logBackgroundFailure(
  tag: string,
  what: string,
  error: unknown
): void {
  if (error instanceof TargetClosedError) {
    if (isDebugEnabled("closeCascade")) {
      console.debug(`[${tag}] ${what} skipped: ${error.message}`);
    }
    return;
  }
  console.warn(`[${tag}] ${what} failed: ${formatDiagnostic(error)}`);
}
