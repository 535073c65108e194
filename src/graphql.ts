function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pretty-prints a `{data, errors}` envelope: both keys when errors are present, otherwise just
 * `data`. Anything that is not such an envelope comes back untouched.
 */
export function formatGraphQLResponse(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }

  if (!isRecord(parsed) || !("data" in parsed || "errors" in parsed)) return body;

  const data = parsed.data ?? null;
  const errors = parsed.errors ?? [];
  if (!Array.isArray(errors)) return body;

  if (errors.length > 0) {
    return JSON.stringify({ data, errors }, null, 2);
  }
  return JSON.stringify(data, null, 2);
}
