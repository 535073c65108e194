#!/usr/bin/env node

import fs from "fs";
import path from "path";
import readline from "readline";
import { parseArgs, USAGE, type CommonOptions, type HttpCommandOptions, type WsCommandOptions } from "./cli-args";
import { applyProfileHeaders, loadProfile, resolveExecutionOptions } from "./config";
import { ConfigError, errorMessage } from "./errors";
import { formatDuration, formatSize, isSuccessStatus, parseEscapeSequences } from "./format";
import { execute, executeWithStreaming } from "./http-executor";
import { MessageQueue } from "./message-queue";
import { mergeTlsConfig } from "./tls";
import { loadEnvFile, loadSystemEnv, VariableResolver } from "./variable-resolver";
import { executeWebSocket, executeWebSocketInteractive } from "./websocket-executor";
import type { Profile, ReceivedMessage, TlsConfig, WebSocketMessage, WebSocketRequest } from "./types";

const controller = new AbortController();

function shutdown(): void {
  if (controller.signal.aborted) process.exit(130);
  console.log("\nShutting down...");
  controller.abort();
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

function readVersion(): string {
  const raw: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "../package.json"), "utf8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "unknown";
}

type Context = {
  profile?: Profile;
  resolver: VariableResolver;
  headers: Record<string, string>;
  tls?: TlsConfig;
};

async function prepareContext(options: CommonOptions): Promise<Context> {
  const profile = options.profile ? await loadProfile(options.profile) : undefined;
  const envVars = loadSystemEnv();
  if (options.envFile) Object.assign(envVars, await loadEnvFile(options.envFile));

  return {
    profile,
    resolver: new VariableResolver({
      profileVars: profile?.variables,
      cliVars: options.vars,
      envVars,
    }),
    headers: applyProfileHeaders(profile?.headers, options.headers),
    tls: mergeTlsConfig(profile?.tls, options.tls),
  };
}

function warnUnresolved(resolver: VariableResolver): void {
  const unresolved = resolver.getUnresolvedVariables();
  if (unresolved.length > 0) {
    console.error(`Warning: unresolved variables: ${unresolved.join(", ")}`);
  }
  for (const shellError of resolver.getShellErrors()) {
    console.error(`Warning: shell command failed: ${shellError}`);
  }
}

async function runHttp(options: HttpCommandOptions): Promise<number> {
  const context = await prepareContext(options);
  const request = await context.resolver.resolveRequest(
    {
      method: options.method,
      url: options.url,
      headers: context.headers,
      body: options.body,
      protocol: options.graphql ? "graphql" : "http",
    },
    controller.signal
  );
  warnUnresolved(context.resolver);

  const limits = resolveExecutionOptions({
    requestTimeoutSeconds: options.timeoutSeconds ?? context.profile?.requestTimeout,
    maxResponseSizeBytes: options.maxSizeBytes ?? context.profile?.maxResponseSize,
  });

  let streamed = false;
  const result = options.stream
    ? await executeWithStreaming(controller.signal, request, context.tls, limits, (chunk) => {
        if (!chunk) return;
        streamed = true;
        process.stdout.write(chunk);
      })
    : await execute(request, context.tls, limits, controller.signal);

  if (streamed) process.stdout.write("\n");
  if (result.status > 0) {
    console.log(`${result.statusText}  (${formatDuration(result.durationMs)}, ${formatSize(result.responseSizeBytes)})`);
    for (const [name, value] of Object.entries(result.headers)) {
      console.log(`${name}: ${value}`);
    }
  }
  if (!streamed && result.body) {
    console.log("");
    console.log(options.parseEscapes ? parseEscapeSequences(result.body) : result.body);
  }
  if (result.error) console.error(`Error: ${result.error}`);

  return result.error || !isSuccessStatus(result.status) ? 1 : 0;
}

function printMessage(message: ReceivedMessage | undefined, done: boolean): void {
  if (done || !message) return;
  const marker = message.direction === "sent" ? ">" : message.direction === "received" ? "<" : "*";
  console.log(`${marker} [${message.timestamp}] ${message.content}`);
}

async function resolveWebSocketRequest(request: WebSocketRequest, resolver: VariableResolver): Promise<WebSocketRequest> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers ?? {})) {
    headers[name] = await resolver.resolve(value, controller.signal);
  }
  const messages: WebSocketMessage[] = [];
  for (const message of request.messages) {
    messages.push({ ...message, content: await resolver.resolve(message.content, controller.signal) });
  }
  return { ...request, url: await resolver.resolve(request.url, controller.signal), headers, messages };
}

async function runInteractive(options: WsCommandOptions, context: Context): Promise<number> {
  const lines = readline.createInterface({ input: process.stdin, terminal: false });
  const outbound = new MessageQueue<string>(100, () => lines.resume());
  lines.on("line", (line) => {
    if (!outbound.push(line)) lines.pause();
  });
  lines.on("close", () => controller.abort());

  try {
    const result = await executeWebSocketInteractive(
      controller.signal,
      {
        url: await context.resolver.resolve(options.url, controller.signal),
        headers: context.headers,
        subprotocols: options.subprotocols,
        tls: context.tls,
        resolver: context.resolver,
        outbound,
      },
      printMessage
    );
    console.log(`${result.disconnectReason} (${formatDuration(result.durationMs)})`);
    return result.error ? 1 : 0;
  } finally {
    lines.close();
  }
}

async function runWebSocket(options: WsCommandOptions): Promise<number> {
  const context = await prepareContext(options);
  if (options.interactive) return runInteractive(options, context);

  const request = await resolveWebSocketRequest(
    { url: options.url, headers: context.headers, subprotocols: options.subprotocols, messages: options.messages },
    context.resolver
  );
  warnUnresolved(context.resolver);

  const result = await executeWebSocket(controller.signal, request, context.tls, printMessage);
  console.log(
    `sent ${result.sentCount}, received ${result.receivedCount} in ${formatDuration(result.durationMs)}` +
      (result.disconnectReason ? `: ${result.disconnectReason}` : "")
  );
  if (result.error) console.error(`Error: ${result.error}`);
  return result.error ? 1 : 0;
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  switch (parsed.command) {
    case "help":
      console.log(USAGE);
      return 0;
    case "version":
      console.log(readVersion());
      return 0;
    case "http":
      return runHttp(parsed.options);
    case "ws":
      return runWebSocket(parsed.options);
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`Error: ${errorMessage(err)}`);
    if (err instanceof ConfigError && err.message.startsWith("unknown")) console.error(`\n${USAGE}`);
    process.exit(1);
  }
);
