import { ConfigError } from "./errors";
import type { TlsConfig, WebSocketMessage } from "./types";

export type CommonOptions = {
  url: string;
  headers: Record<string, string>;
  profile?: string;
  envFile?: string;
  vars: Record<string, string>;
  tls?: TlsConfig;
};

export type HttpCommandOptions = CommonOptions & {
  method: string;
  body?: string;
  graphql: boolean;
  stream: boolean;
  timeoutSeconds?: number;
  maxSizeBytes?: number;
  parseEscapes: boolean;
};

export type WsCommandOptions = CommonOptions & {
  messages: WebSocketMessage[];
  subprotocols: string[];
  interactive: boolean;
};

export type Command =
  | { command: "help" }
  | { command: "version" }
  | { command: "http"; options: HttpCommandOptions }
  | { command: "ws"; options: WsCommandOptions };

export const USAGE = `Usage:
  restline http --url <url> [options]
  restline ws --url <ws://url> [options]

Common options:
  --header "K: V"      Request header (repeatable)
  --profile <file>     JSON profile with headers, variables, TLS and limits
  --env-file <file>    .env file for {{env.NAME}} placeholders
  --var k=v            Variable override (repeatable)
  --cert <file>        Client certificate (PEM), used with --key
  --key <file>         Client private key (PEM)
  --ca <file>          CA bundle (PEM)
  --insecure           Skip server certificate verification

http options:
  --method <verb>      HTTP method (default: GET)
  --body <text>        Request body
  --graphql            Send the body as a GraphQL query
  --stream             Print streaming responses as they arrive
  --timeout <s>        Request timeout in seconds (default: 30)
  --max-size <bytes>   Maximum response size (default: 104857600)
  --parse-escapes      Unescape the response body before printing

ws options:
  --send <text>        Send a text message (repeatable, ordered)
  --send-json <json>   Send a JSON message (repeatable, ordered)
  --receive <s>        Wait up to s seconds for a message (repeatable, ordered)
  --subprotocol <p>    Offer a subprotocol (repeatable)
  --interactive        Send lines read from stdin until interrupted

  --help               Show this help
  --version            Show version`;

function positiveNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${flag} expects a positive number, got '${raw}'`);
  }
  return value;
}

function parseHeader(raw: string): [string, string] {
  const colon = raw.indexOf(":");
  if (colon <= 0) throw new ConfigError(`--header expects "Name: value", got '${raw}'`);
  return [raw.slice(0, colon).trim(), raw.slice(colon + 1).trim()];
}

function parseVar(raw: string): [string, string] {
  const eq = raw.indexOf("=");
  if (eq <= 0) throw new ConfigError(`--var expects name=value, got '${raw}'`);
  return [raw.slice(0, eq), raw.slice(eq + 1)];
}

/**
 * Parses `process.argv.slice(2)`. Throws ConfigError on unknown flags or missing values.
 */
export function parseArgs(args: string[]): Command {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) return { command: "help" };
  if (args.includes("--version")) return { command: "version" };

  const [subcommand, ...rest] = args;
  if (subcommand !== "http" && subcommand !== "ws") {
    throw new ConfigError(`unknown command '${subcommand}'`);
  }

  let url: string | undefined;
  const headers: Record<string, string> = {};
  const vars: Record<string, string> = {};
  const tls: TlsConfig = {};
  let tlsGiven = false;
  let profile: string | undefined;
  let envFile: string | undefined;

  let method = "GET";
  let body: string | undefined;
  let graphql = false;
  let stream = false;
  let timeoutSeconds: number | undefined;
  let maxSizeBytes: number | undefined;
  let parseEscapes = false;

  const messages: WebSocketMessage[] = [];
  const subprotocols: string[] = [];
  let interactive = false;

  const httpOnly = new Set(["--method", "--body", "--graphql", "--stream", "--timeout", "--max-size", "--parse-escapes"]);
  const wsOnly = new Set(["--send", "--send-json", "--receive", "--subprotocol", "--interactive"]);

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    if (subcommand === "http" && wsOnly.has(flag)) throw new ConfigError(`${flag} is only valid for ws`);
    if (subcommand === "ws" && httpOnly.has(flag)) throw new ConfigError(`${flag} is only valid for http`);

    const value = (): string => {
      const next = rest[i + 1];
      if (next === undefined) throw new ConfigError(`${flag} requires a value`);
      i++;
      return next;
    };

    switch (flag) {
      case "--url":
        url = value();
        break;
      case "--header": {
        const [name, headerValue] = parseHeader(value());
        headers[name] = headerValue;
        break;
      }
      case "--var": {
        const [name, varValue] = parseVar(value());
        vars[name] = varValue;
        break;
      }
      case "--profile":
        profile = value();
        break;
      case "--env-file":
        envFile = value();
        break;
      case "--cert":
        tls.certFile = value();
        tlsGiven = true;
        break;
      case "--key":
        tls.keyFile = value();
        tlsGiven = true;
        break;
      case "--ca":
        tls.caFile = value();
        tlsGiven = true;
        break;
      case "--insecure":
        tls.insecureSkipVerify = true;
        tlsGiven = true;
        break;
      case "--method":
        method = value().toUpperCase();
        break;
      case "--body":
        body = value();
        break;
      case "--graphql":
        graphql = true;
        break;
      case "--stream":
        stream = true;
        break;
      case "--timeout":
        timeoutSeconds = positiveNumber(flag, value());
        break;
      case "--max-size":
        maxSizeBytes = positiveNumber(flag, value());
        break;
      case "--parse-escapes":
        parseEscapes = true;
        break;
      case "--send":
        messages.push({
          name: `message ${messages.length + 1}`,
          type: "text",
          content: value(),
          direction: "send",
          timeoutSeconds: 0,
        });
        break;
      case "--send-json":
        messages.push({
          name: `message ${messages.length + 1}`,
          type: "json",
          content: value(),
          direction: "send",
          timeoutSeconds: 0,
        });
        break;
      case "--receive":
        messages.push({
          name: `message ${messages.length + 1}`,
          type: "text",
          content: "",
          direction: "receive",
          timeoutSeconds: positiveNumber(flag, value()),
        });
        break;
      case "--subprotocol":
        subprotocols.push(value());
        break;
      case "--interactive":
        interactive = true;
        break;
      default:
        throw new ConfigError(`unknown option '${flag}'`);
    }
  }

  if (!url) throw new ConfigError("--url is required");

  const common: CommonOptions = {
    url,
    headers,
    profile,
    envFile,
    vars,
    tls: tlsGiven ? tls : undefined,
  };

  if (subcommand === "http") {
    return {
      command: "http",
      options: { ...common, method, body, graphql, stream, timeoutSeconds, maxSizeBytes, parseEscapes },
    };
  }

  if (interactive && messages.length > 0) {
    throw new ConfigError("--interactive cannot be combined with --send, --send-json or --receive");
  }
  return { command: "ws", options: { ...common, messages, subprotocols, interactive } };
}
