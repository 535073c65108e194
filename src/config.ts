import fs from "fs/promises";
import { ConfigError, errorMessage } from "./errors";
import { validateVariableValue } from "./variable-resolver";
import type { ExecutionOptions, MultiValueVariable, Profile, TlsConfig, VariableValue } from "./types";

export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_RESPONSE_SIZE_BYTES = 100 * 1024 * 1024;

function positive(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

export function resolveExecutionOptions(partial: Partial<ExecutionOptions> = {}): ExecutionOptions {
  return {
    requestTimeoutSeconds: positive(partial.requestTimeoutSeconds, DEFAULT_REQUEST_TIMEOUT_SECONDS),
    maxResponseSizeBytes: positive(partial.maxResponseSizeBytes, DEFAULT_MAX_RESPONSE_SIZE_BYTES),
  };
}

export function profileExecutionOptions(profile?: Profile): ExecutionOptions {
  return resolveExecutionOptions({
    requestTimeoutSeconds: profile?.requestTimeout,
    maxResponseSizeBytes: profile?.maxResponseSize,
  });
}

/**
 * Profile headers go underneath; a request header with the same name (case-insensitive) wins.
 */
export function applyProfileHeaders(
  profileHeaders: Record<string, string> | undefined,
  requestHeaders: Record<string, string>
): Record<string, string> {
  const merged: Record<string, string> = {};
  const overridden = new Set(Object.keys(requestHeaders).map((key) => key.toLowerCase()));
  for (const [key, value] of Object.entries(profileHeaders ?? {})) {
    if (!overridden.has(key.toLowerCase())) merged[key] = value;
  }
  return { ...merged, ...requestHeaders };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown, field: string): Record<string, string> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw new ConfigError(`profile field '${field}' must be an object`);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new ConfigError(`profile field '${field}.${key}' must be a string`);
    }
    out[key] = entry;
  }
  return out;
}

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number") throw new ConfigError(`profile field '${field}' must be a number`);
  return value;
}

function parseVariable(name: string, raw: unknown): VariableValue {
  if (typeof raw === "string") return raw;
  if (isRecord(raw) && Array.isArray(raw.options)) {
    const options = raw.options.filter((option): option is string => typeof option === "string");
    if (options.length !== raw.options.length) {
      throw new ConfigError(`variable '${name}': options must be strings`);
    }
    const value: MultiValueVariable = {
      options,
      active: typeof raw.active === "number" ? raw.active : 0,
    };
    if (isRecord(raw.aliases)) {
      const aliases: Record<string, number> = {};
      for (const [alias, index] of Object.entries(raw.aliases)) {
        if (typeof index !== "number") {
          throw new ConfigError(`variable '${name}': alias '${alias}' must map to an index`);
        }
        aliases[alias] = index;
      }
      value.aliases = aliases;
    }
    if (typeof raw.description === "string") value.description = raw.description;

    const problem = validateVariableValue(name, value);
    if (problem) throw new ConfigError(problem);
    return value;
  }
  if (isRecord(raw) && typeof raw.value === "string") return raw.value;
  throw new ConfigError(`variable '${name}': value must be either a string or a multi-value object`);
}

function parseTls(raw: unknown): TlsConfig | undefined {
  if (raw === undefined) return undefined;
  if (!isRecord(raw)) throw new ConfigError("profile field 'tls' must be an object");
  const text = (field: string): string | undefined => {
    const value = raw[field];
    if (value === undefined) return undefined;
    if (typeof value !== "string") throw new ConfigError(`profile field 'tls.${field}' must be a string`);
    return value;
  };
  return {
    certFile: text("certFile"),
    keyFile: text("keyFile"),
    caFile: text("caFile"),
    insecureSkipVerify: raw.insecureSkipVerify === true,
  };
}

export function parseProfile(raw: unknown): Profile {
  if (!isRecord(raw)) throw new ConfigError("profile must be a JSON object");
  if (typeof raw.name !== "string") throw new ConfigError("profile field 'name' must be a string");

  let variables: Record<string, VariableValue> | undefined;
  if (raw.variables !== undefined) {
    if (!isRecord(raw.variables)) throw new ConfigError("profile field 'variables' must be an object");
    variables = {};
    for (const [name, value] of Object.entries(raw.variables)) {
      variables[name] = parseVariable(name, value);
    }
  }

  return {
    name: raw.name,
    headers: stringMap(raw.headers, "headers"),
    variables,
    tls: parseTls(raw.tls),
    requestTimeout: optionalNumber(raw.requestTimeout, "requestTimeout"),
    maxResponseSize: optionalNumber(raw.maxResponseSize, "maxResponseSize"),
  };
}

export async function loadProfile(path: string): Promise<Profile> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`failed to read profile ${path}: ${errorMessage(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`failed to parse profile ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return parseProfile(raw);
}
