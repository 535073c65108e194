import { isSuccessStatus } from "./format";
import { logger } from "./logger";
import type { RequestResult } from "./types";
import type { VariableResolver } from "./variable-resolver";

const AUTO_TOKEN_KEYS = ["access_token", "token"];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Finds the first `"key": "value"` string pair for the last segment of `keyPath`.
 * Nesting is not followed: `data.token` looks for any `token` key.
 */
export function extractJsonToken(body: string, keyPath: string): string | undefined {
  const segments = keyPath.split(".");
  const key = segments[segments.length - 1];
  const match = new RegExp(`"${escapeRegExp(key)}"\\s*:\\s*"([^"]+)"`).exec(body);
  return match?.[1];
}

/**
 * Applies each named pattern and keeps capture group 1. Invalid patterns are skipped.
 */
export function extractTokens(body: string, patterns: Record<string, string>): Record<string, string> {
  const tokens: Record<string, string> = {};
  for (const [name, pattern] of Object.entries(patterns)) {
    let re: RegExp;
    try {
      re = new RegExp(pattern);
    } catch {
      logger.debug(`skipping invalid token pattern for ${name}`);
      continue;
    }
    const match = re.exec(body);
    if (match && match[1] !== undefined) tokens[name] = match[1];
  }
  return tokens;
}

/**
 * Stores `access_token` / `token` from a 2xx body as session variables of the same name.
 * Returns the names that were stored.
 */
export function autoExtractTokens(result: RequestResult, resolver: VariableResolver): string[] {
  if (result.error || !isSuccessStatus(result.status)) return [];

  const stored: string[] = [];
  for (const key of AUTO_TOKEN_KEYS) {
    const token = extractJsonToken(result.body, key);
    if (token !== undefined) {
      resolver.addSessionVariable(key, token);
      stored.push(key);
    }
  }
  return stored;
}
