export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)}MB`;
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

const BACKSLASH_PLACEHOLDER = "\u0000BACKSLASH\u0000";

const ESCAPES: Array<[string, string]> = [
  ["\\n", "\n"],
  ["\\t", "\t"],
  ["\\r", "\r"],
  ['\\"', '"'],
  ["\\'", "'"],
  ["\\b", "\b"],
  ["\\f", "\f"],
];

/**
 * Unescapes a response body for display. Must run after any filter or query step,
 * never before: unescaped output is no longer valid JSON.
 */
export function parseEscapeSequences(text: string): string {
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    try {
      const decoded: unknown = JSON.parse(text);
      if (typeof decoded === "string") return decoded;
    } catch {
      // not a JSON string literal, fall through to manual replacement
    }
  }

  let result = text.split("\\\\").join(BACKSLASH_PLACEHOLDER);
  for (const [escaped, actual] of ESCAPES) {
    result = result.split(escaped).join(actual);
  }
  return result.split(BACKSLASH_PLACEHOLDER).join("\\");
}
