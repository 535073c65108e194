import http from "http";
import https from "https";
import { REQUEST_CANCELLED, RequestBuildError, errorMessage } from "./errors";
import { formatGraphQLResponse } from "./graphql";
import { logger } from "./logger";
import { buildTlsOptions, type TlsOptions } from "./tls";
import type { ChunkSink, ExecutionOptions, HttpRequest, RequestResult, TlsConfig } from "./types";

const CHUNK_SIZE = 4096;

const STREAMING_CONTENT_TYPES = [
  "text/event-stream",
  "application/stream+json",
  "application/x-ndjson",
  "application/jsonlines",
];

type Outbound = {
  method: string;
  url: URL;
  headers: Record<string, string>;
  body?: Buffer;
  graphql: boolean;
};

type Scope = {
  signal: AbortSignal;
  abortMessage: string;
};

type BodyRead = {
  body: Buffer;
  error?: string;
};

type Notifier = {
  chunk: (data: Buffer) => void;
  done: () => void;
};

function assertNever(value: never): never {
  throw new RequestBuildError(`unsupported protocol: ${String(value)}`);
}

/**
 * Sets a header, replacing any existing key that differs only by case.
 */
function setHeader(headers: Record<string, string>, name: string, value: string): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower) delete headers[key];
  }
  headers[name] = value;
}

function parseUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err) {
    throw new RequestBuildError(`failed to create request: invalid URL '${raw}'`, { cause: err });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new RequestBuildError(`failed to create request: unsupported scheme '${url.protocol}'`);
  }
  return url;
}

function prepare(request: HttpRequest): Outbound {
  const url = parseUrl(request.url);
  const protocol = request.protocol ?? "http";

  switch (protocol) {
    case "http":
      return {
        method: request.method,
        url,
        headers: { ...request.headers },
        body: request.body ? Buffer.from(request.body, "utf8") : undefined,
        graphql: false,
      };
    case "graphql": {
      // Caller headers are layered on top, so an explicit Content-Type wins.
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      for (const [key, value] of Object.entries(request.headers)) {
        setHeader(headers, key, value);
      }
      return {
        method: "POST",
        url,
        headers,
        body: Buffer.from(JSON.stringify({ query: request.body ?? "" }), "utf8"),
        graphql: true,
      };
    }
    default:
      return assertNever(protocol);
  }
}

function collectHeaders(res: http.IncomingMessage): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(res.headers)) {
    if (value) headers[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return headers;
}

export function isStreamingResponse(headers: Record<string, string>): boolean {
  const contentType = headers["content-type"] ?? "";
  const transferEncoding = headers["transfer-encoding"] ?? "";
  return (
    STREAMING_CONTENT_TYPES.some((type) => contentType.includes(type)) ||
    transferEncoding.includes("chunked")
  );
}

function notifier(sink?: ChunkSink): Notifier {
  let finished = false;
  return {
    chunk: (data) => {
      if (!finished) sink?.(data, false);
    },
    done: () => {
      if (finished) return;
      finished = true;
      sink?.(undefined, true);
    },
  };
}

/**
 * Accumulates the body in CHUNK_SIZE slices, checking the scope before each slice
 * and the size cap before appending it. Never throws.
 */
async function readBody(
  res: http.IncomingMessage,
  scope: Scope,
  maxSize: number,
  onChunk?: (data: Buffer) => void
): Promise<BodyRead> {
  const chunks: Buffer[] = [];
  let size = 0;
  const partial = (error?: string): BodyRead => ({ body: Buffer.concat(chunks, size), error });

  try {
    for await (const data of res) {
      const buffer = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
      for (let offset = 0; offset < buffer.length; offset += CHUNK_SIZE) {
        if (scope.signal.aborted) {
          res.destroy();
          return partial(scope.abortMessage);
        }

        const chunk = buffer.subarray(offset, offset + CHUNK_SIZE);
        if (size + chunk.length > maxSize) {
          res.destroy();
          return partial(`response size exceeds maximum allowed size (${maxSize} bytes)`);
        }

        chunks.push(chunk);
        size += chunk.length;
        onChunk?.(chunk);
      }
    }
  } catch (err) {
    if (scope.signal.aborted) return partial(scope.abortMessage);
    return partial(`failed to read response body: ${errorMessage(err)}`);
  }

  if (!res.complete) {
    return partial(scope.signal.aborted ? scope.abortMessage : "failed to read response body: connection closed early");
  }
  return partial();
}

function createAgent(url: URL, tlsOptions: TlsOptions | undefined): http.Agent {
  return url.protocol === "https:"
    ? new https.Agent({ ...tlsOptions, keepAlive: false })
    : new http.Agent({ keepAlive: false });
}

function send(outbound: Outbound, agent: http.Agent, scope: Scope): Promise<http.IncomingMessage> {
  const headers = { ...outbound.headers };
  if (outbound.body) setHeader(headers, "Content-Length", String(outbound.body.length));

  const requestOptions: http.RequestOptions = {
    method: outbound.method,
    headers,
    agent,
    signal: scope.signal,
  };

  let req: http.ClientRequest;
  try {
    req = outbound.url.protocol === "https:"
      ? https.request(outbound.url, requestOptions)
      : http.request(outbound.url, requestOptions);
  } catch (err) {
    throw new RequestBuildError(`failed to create request: ${errorMessage(err)}`, { cause: err });
  }

  const response = new Promise<http.IncomingMessage>((resolve, reject) => {
    req.on("response", resolve);
    req.on("error", reject);
  });

  req.end(outbound.body);
  return response;
}

type Mode =
  | { kind: "buffered" }
  | { kind: "streaming"; sink: Notifier };

async function perform(
  request: HttpRequest,
  tlsConfig: TlsConfig | undefined,
  options: ExecutionOptions,
  scope: Scope,
  mode: Mode
): Promise<RequestResult> {
  const startTime = Date.now();

  // Hard failures: nothing has touched the network yet.
  const outbound = prepare(request);
  const tlsOptions = tlsConfig ? buildTlsOptions(tlsConfig) : undefined;
  const requestSizeBytes = outbound.body?.length ?? 0;

  logger.info(`${outbound.method} ${outbound.url.href}`);

  const agent = createAgent(outbound.url, tlsOptions);
  try {
    const pending = send(outbound, agent, scope);
    let res: http.IncomingMessage;
    try {
      res = await pending;
    } catch (err) {
      const error = scope.signal.aborted ? scope.abortMessage : errorMessage(err);
      logger.warn(`${outbound.method} ${outbound.url.href} failed: ${error}`);
      return {
        status: 0,
        statusText: "",
        headers: {},
        body: "",
        durationMs: Date.now() - startTime,
        requestSizeBytes,
        responseSizeBytes: 0,
        error,
      };
    }

    const headers = collectHeaders(res);
    const status = res.statusCode ?? 0;
    const statusText = res.statusMessage ? `${status} ${res.statusMessage}` : String(status);

    const streaming = mode.kind === "streaming" && !outbound.graphql && isStreamingResponse(headers);
    const read = await readBody(
      res,
      scope,
      options.maxResponseSizeBytes,
      streaming && mode.kind === "streaming" ? mode.sink.chunk : undefined
    );
    if (mode.kind === "streaming") mode.sink.done();

    const raw = read.body.toString("utf8");
    const body = outbound.graphql && !read.error ? formatGraphQLResponse(raw) : raw;

    logger.debug(`${outbound.method} ${outbound.url.href} -> ${statusText} (${read.body.length} bytes)`);

    const result: RequestResult = {
      status,
      statusText,
      headers,
      body,
      durationMs: Date.now() - startTime,
      requestSizeBytes,
      responseSizeBytes: read.body.length,
    };
    if (read.error) result.error = read.error;
    return result;
  } finally {
    agent.destroy();
  }
}

/**
 * Executes a request and reads the whole response. The profile timeout covers the entire call;
 * `signal`, when given, can end it sooner.
 *
 * Rejects only with ConfigError (TLS material) or RequestBuildError; every network outcome is
 * a RequestResult with `error` set on failure.
 */
export async function execute(
  request: HttpRequest,
  tlsConfig: TlsConfig | undefined,
  options: ExecutionOptions,
  signal?: AbortSignal
): Promise<RequestResult> {
  const timeout = AbortSignal.timeout(options.requestTimeoutSeconds * 1000);
  const timedOut = `request timed out after ${options.requestTimeoutSeconds}s`;
  const scope: Scope = {
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    // Read once the request has ended, so it names whichever signal fired.
    get abortMessage() {
      return signal?.aborted ? REQUEST_CANCELLED : timedOut;
    },
  };
  return perform(request, tlsConfig, options, scope, { kind: "buffered" });
}

/**
 * Like execute, but without a client timeout: the signal alone bounds the call. Streaming
 * responses are delivered to `onChunk` as they arrive. GraphQL responses are always read
 * in one piece so they can be reformatted.
 *
 * `onChunk` receives `done=true` exactly once, whatever the outcome.
 */
export async function executeWithStreaming(
  signal: AbortSignal,
  request: HttpRequest,
  tlsConfig: TlsConfig | undefined,
  options: ExecutionOptions,
  onChunk?: ChunkSink
): Promise<RequestResult> {
  const sink = notifier(onChunk);
  try {
    return await perform(request, tlsConfig, options, { signal, abortMessage: REQUEST_CANCELLED }, { kind: "streaming", sink });
  } finally {
    sink.done();
  }
}
