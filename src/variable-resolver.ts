import { execFile } from "child_process";
import fs from "fs/promises";
import dotenv from "dotenv";
import { ConfigError, errorMessage } from "./errors";
import { logger } from "./logger";
import type { HttpRequest, MultiValueVariable, VariableScopes, VariableValue } from "./types";

// {{name}}
const VARIABLE_PATTERN = /\{\{([^}]+)\}\}/g;
// $(command)
const SHELL_PATTERN = /\$\(([^)]+)\)/g;

const ENV_PREFIX = "env.";
const SHELL_TIMEOUT_MS = 5000;

export function getVariableValue(value: VariableValue): string {
  if (typeof value === "string") return value;
  if (value.active >= 0 && value.active < value.options.length) {
    return value.options[value.active];
  }
  return "";
}

/**
 * Returns a description of what is wrong with a multi-value variable, or undefined if it is usable.
 */
export function validateVariableValue(name: string, value: VariableValue): string | undefined {
  if (typeof value === "string") return undefined;
  if (value.options.length === 0) {
    return `variable '${name}': multi-value variable has no options`;
  }
  if (value.active < 0) {
    return `variable '${name}': active index ${value.active} is negative`;
  }
  if (value.active >= value.options.length) {
    return `variable '${name}': active index ${value.active} is out of bounds (have ${value.options.length} options)`;
  }
  return undefined;
}

export function selectVariableOption(value: MultiValueVariable, selector: string | number): MultiValueVariable {
  let index: number;
  if (typeof selector === "number") {
    index = selector;
  } else {
    const aliased = value.aliases?.[selector];
    if (aliased === undefined) {
      throw new ConfigError(`unknown alias '${selector}'`);
    }
    index = aliased;
  }

  if (!Number.isInteger(index) || index < 0 || index >= value.options.length) {
    throw new ConfigError(`option index ${index} is out of bounds (have ${value.options.length} options)`);
  }
  return { ...value, active: index };
}

/**
 * Unique placeholder names in first-seen order, without the braces.
 */
export function extractVariableNames(input: string): string[] {
  const names = new Set<string>();
  for (const match of input.matchAll(VARIABLE_PATTERN)) {
    names.add(match[1].trim());
  }
  return [...names];
}

export function extractRequestVariables(request: HttpRequest): string[] {
  const names = new Set<string>(extractVariableNames(request.url));
  for (const value of Object.values(request.headers)) {
    extractVariableNames(value).forEach((name) => names.add(name));
  }
  if (request.body) {
    extractVariableNames(request.body).forEach((name) => names.add(name));
  }
  return [...names];
}

export async function loadEnvFile(path: string): Promise<Record<string, string>> {
  let content: string;
  try {
    content = await fs.readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`failed to open env file: ${errorMessage(err)}`, { cause: err });
  }
  return dotenv.parse(content);
}

export function loadSystemEnv(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) env[key] = value;
  }
  return env;
}

function runShell(command: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile("sh", ["-c", command], { timeout: SHELL_TIMEOUT_MS, signal }, (err, stdout, stderr) => {
      if (!err) {
        resolve(stdout);
        return;
      }
      const captured = stderr.trim();
      if (captured) {
        reject(new Error(captured));
      } else if (err.killed && !signal?.aborted) {
        reject(new Error(`timed out after ${SHELL_TIMEOUT_MS / 1000}s`));
      } else {
        reject(err);
      }
    });
  });
}

/**
 * Resolves `{{name}}` placeholders and `$(command)` expressions against layered scopes.
 *
 * Precedence for bare names is cli > session > profile; `{{env.NAME}}` reads only the env scope.
 * Anything that cannot be resolved is left in place and recorded, so resolution never fails
 * for bad input. The recorded lists accumulate across calls.
 *
 * An instance is not safe for overlapping `resolve` calls: serialize access or use one
 * resolver per in-flight request.
 */
export class VariableResolver {
  private profileVars: Record<string, VariableValue>;
  private sessionVars: Record<string, string>;
  private cliVars: Record<string, string>;
  private envVars: Record<string, string>;
  private unresolved: string[] = [];
  private shellErrors: string[] = [];

  constructor(scopes: VariableScopes = {}) {
    this.profileVars = scopes.profileVars ?? {};
    this.sessionVars = scopes.sessionVars ?? {};
    this.cliVars = scopes.cliVars ?? {};
    this.envVars = scopes.envVars ?? {};
  }

  /**
   * Shell pass, placeholder pass, then a second shell pass so commands stored inside
   * variable values run too. Placeholders printed by a command from a variable value are
   * left as they are.
   */
  async resolve(input: string, signal?: AbortSignal): Promise<string> {
    const failed = new Set<string>();
    let result = await this.resolveShellCommands(input, failed, signal);
    result = this.resolveVariables(result);
    return this.resolveShellCommands(result, failed, signal);
  }

  async resolveRequest(request: HttpRequest, signal?: AbortSignal): Promise<HttpRequest> {
    const resolved: HttpRequest = { ...request, headers: {} };

    try {
      resolved.url = await this.resolve(request.url, signal);
    } catch (err) {
      throw new Error(`failed to resolve URL: ${errorMessage(err)}`, { cause: err });
    }

    for (const [key, value] of Object.entries(request.headers)) {
      try {
        resolved.headers[key] = await this.resolve(value, signal);
      } catch (err) {
        throw new Error(`failed to resolve header ${key}: ${errorMessage(err)}`, { cause: err });
      }
    }

    if (request.body) {
      try {
        resolved.body = await this.resolve(request.body, signal);
      } catch (err) {
        throw new Error(`failed to resolve body: ${errorMessage(err)}`, { cause: err });
      }
    }

    return resolved;
  }

  addSessionVariable(name: string, value: string): void {
    this.sessionVars[name] = value;
  }

  getSessionVariables(): Record<string, string> {
    return { ...this.sessionVars };
  }

  getUnresolvedVariables(): string[] {
    return [...new Set(this.unresolved)];
  }

  getShellErrors(): string[] {
    return [...this.shellErrors];
  }

  private lookup(name: string): string | undefined {
    if (name.startsWith(ENV_PREFIX)) {
      const key = name.slice(ENV_PREFIX.length);
      return Object.hasOwn(this.envVars, key) ? this.envVars[key] : undefined;
    }
    if (Object.hasOwn(this.cliVars, name)) return this.cliVars[name];
    if (Object.hasOwn(this.sessionVars, name)) return this.sessionVars[name];
    if (Object.hasOwn(this.profileVars, name)) return getVariableValue(this.profileVars[name]);
    return undefined;
  }

  private resolveVariables(input: string): string {
    return input.replace(VARIABLE_PATTERN, (match, rawName: string) => {
      const name = rawName.trim();
      const value = this.lookup(name);
      if (value !== undefined) return value;

      this.unresolved.push(name);
      return match;
    });
  }

  /**
   * `failed` carries commands that already failed during this resolve call; they are kept
   * literally without running them again.
   */
  private async resolveShellCommands(input: string, failed: Set<string>, signal?: AbortSignal): Promise<string> {
    let output = "";
    let lastIndex = 0;

    // Commands run one at a time, left to right.
    for (const match of input.matchAll(SHELL_PATTERN)) {
      const start = match.index ?? 0;
      const command = match[1].trim();
      output += input.slice(lastIndex, start);
      lastIndex = start + match[0].length;

      if (failed.has(command)) {
        output += match[0];
        continue;
      }

      try {
        const stdout = await runShell(command, signal);
        output += stdout.trim();
      } catch (err) {
        const message = `$(${command}): ${errorMessage(err)}`;
        logger.debug(`shell command failed: ${message}`);
        this.shellErrors.push(message);
        failed.add(command);
        output += match[0];
      }
    }

    return output + input.slice(lastIndex);
  }
}
