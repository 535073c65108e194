import WebSocket from "ws";
import { CANCELLED_BY_USER, errorMessage } from "./errors";
import { logger } from "./logger";
import { MessageQueue } from "./message-queue";
import { buildTlsOptions, type TlsOptions } from "./tls";
import type {
  InteractiveSessionResult,
  ReceivedMessage,
  TlsConfig,
  WebSocketMessage,
  WebSocketRequest,
  WebSocketResult,
  WebSocketSink,
} from "./types";
import type { VariableResolver } from "./variable-resolver";

const HANDSHAKE_TIMEOUT_MS = 45_000;
const INBOUND_CAPACITY = 100;
const NORMAL_CLOSURE = 1000;
const CLEAN_CLOSE_CODES = new Set([1000, 1001, 1005]);

export const COMPLETED_SUCCESSFULLY = "Completed successfully";

export type InteractiveSession = {
  url: string;
  headers?: Record<string, string>;
  subprotocols?: string[];
  tls?: TlsConfig;
  /** Typed messages are resolved through this before sending, when present. */
  resolver?: VariableResolver;
  outbound: MessageQueue<string>;
};

type ReceiveOutcome =
  | { kind: "closed"; code: number }
  | { kind: "error"; error: Error };

/** Frames in arrival order, then exactly one close outcome. */
type Inbound = { kind: "message"; message: ReceivedMessage } | ReceiveOutcome;

type Connection =
  | { ok: true; ws: WebSocket; inbound: MessageQueue<Inbound> }
  | { ok: false; cancelled: boolean; error: string };

function now(): string {
  return new Date().toISOString();
}

function systemMessage(type: string, content: string): ReceivedMessage {
  return { type, content, timestamp: now(), direction: "system", sizeBytes: 0 };
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function whenAborted(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let listener: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    listener = () => resolve();
    signal.addEventListener("abort", listener, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (listener) signal.removeEventListener("abort", listener);
    },
  };
}

async function connect(
  url: string,
  headers: Record<string, string> | undefined,
  subprotocols: string[] | undefined,
  tlsConfig: TlsConfig | undefined,
  signal: AbortSignal
): Promise<Connection> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (err) {
    return { ok: false, cancelled: false, error: `Invalid URL: ${errorMessage(err)}` };
  }

  let tlsOptions: TlsOptions | undefined;
  if (tlsConfig && (parsed.protocol === "wss:" || parsed.protocol === "https:")) {
    try {
      tlsOptions = buildTlsOptions(tlsConfig);
    } catch (err) {
      return { ok: false, cancelled: false, error: `TLS configuration error: ${errorMessage(err)}` };
    }
  }

  if (signal.aborted) {
    return { ok: false, cancelled: true, error: CANCELLED_BY_USER };
  }

  let ws: WebSocket;
  try {
    ws = new WebSocket(url, subprotocols ?? [], {
      headers,
      handshakeTimeout: HANDSHAKE_TIMEOUT_MS,
      ...tlsOptions,
    });
  } catch (err) {
    return { ok: false, cancelled: false, error: `Connection failed: ${errorMessage(err)}` };
  }
  // Attached before the handshake completes: a server may send its first frame with the upgrade.
  const inbound = startReceiver(ws);

  logger.info(`Connecting to ${url}`);

  return new Promise<Connection>((resolve) => {
    const abort = whenAborted(signal);
    let settled = false;
    const settle = (connection: Connection) => {
      if (settled) return;
      settled = true;
      abort.dispose();
      resolve(connection);
    };

    void abort.promise.then(() => {
      ws.terminate();
      settle({ ok: false, cancelled: true, error: CANCELLED_BY_USER });
    });

    ws.once("open", () => settle({ ok: true, ws, inbound }));

    ws.once("unexpected-response", (_req, res) => {
      const status = res.statusCode ?? 0;
      ws.terminate();
      settle({ ok: false, cancelled: false, error: `Connection failed (HTTP ${status}): Unexpected server response: ${status}` });
    });

    ws.on("error", (err) => {
      if (settled) {
        logger.debug(`WebSocket error after handshake settled: ${err.message}`);
        return;
      }
      settle({ ok: false, cancelled: false, error: `Connection failed: ${err.message}` });
    });
  });
}

/**
 * Owns the inbound side of the socket: frames and then the close outcome go to one bounded
 * queue (the socket is paused while it is full). It never touches a result log.
 */
function startReceiver(ws: WebSocket): MessageQueue<Inbound> {
  const inbound = new MessageQueue<Inbound>(INBOUND_CAPACITY, () => ws.resume());
  let socketError: Error | undefined;

  ws.on("message", (data, isBinary) => {
    const buffer = toBuffer(data);
    const accepted = inbound.push({
      kind: "message",
      message: {
        type: isBinary ? "binary" : "text",
        content: buffer.toString("utf8"),
        timestamp: now(),
        direction: "received",
        sizeBytes: buffer.length,
      },
    });
    if (!accepted) ws.pause();
  });

  ws.on("error", (err) => {
    socketError = err;
  });

  ws.once("close", (code, reason) => {
    if (socketError) {
      inbound.push({ kind: "error", error: socketError });
    } else if (CLEAN_CLOSE_CODES.has(code)) {
      inbound.push({ kind: "closed", code });
    } else {
      const text = reason.toString();
      inbound.push({ kind: "error", error: new Error(`connection closed unexpectedly (${code}${text ? `: ${text}` : ""})`) });
    }
  });

  return inbound;
}

function encode(message: WebSocketMessage): { data: string | Buffer; binary: boolean } {
  switch (message.type) {
    case "json":
      try {
        JSON.parse(message.content);
      } catch (err) {
        throw new Error(`invalid JSON: ${errorMessage(err)}`, { cause: err });
      }
      return { data: message.content, binary: false };
    case "binary":
      return { data: Buffer.from(message.content, "utf8"), binary: true };
    case "text":
      return { data: message.content, binary: false };
  }
}

function sendFrame(ws: WebSocket, data: string | Buffer, binary: boolean): Promise<void> {
  return new Promise((resolve, reject) => {
    ws.send(data, { binary }, (err) => (err ? reject(err) : resolve()));
  });
}

function stepTimer(seconds: number): { expired: Promise<void>; clear: () => void } {
  let handle: NodeJS.Timeout | undefined;
  const expired = new Promise<void>((resolve) => {
    handle = setTimeout(resolve, Math.max(0, seconds) * 1000);
  });
  return { expired, clear: () => clearTimeout(handle) };
}

type StepEvent = Inbound | { kind: "timeout" } | { kind: "cancelled" };

/**
 * Runs the declared send/receive steps in order over one connection.
 *
 * Any receive step is satisfied by whatever message arrives next; content is not compared.
 * A failed step ends the run. The result is always returned, never thrown.
 */
export async function executeWebSocket(
  signal: AbortSignal,
  request: WebSocketRequest,
  tlsConfig?: TlsConfig,
  sink?: WebSocketSink
): Promise<WebSocketResult> {
  const startTime = Date.now();
  const result: WebSocketResult = {
    messages: [],
    sentCount: 0,
    receivedCount: 0,
    durationMs: 0,
    timestamp: new Date(startTime).toISOString(),
  };
  const finish = (): WebSocketResult => {
    result.durationMs = Date.now() - startTime;
    return result;
  };

  const connection = await connect(request.url, request.headers, request.subprotocols, tlsConfig, signal);
  if (!connection.ok) {
    if (connection.cancelled) {
      result.disconnectReason = CANCELLED_BY_USER;
    } else {
      result.error = connection.error;
      logger.warn(`${request.url}: ${connection.error}`);
    }
    return finish();
  }

  const ws = connection.ws;
  sink?.(systemMessage("connect", `Connected to ${request.url}`), false);

  const inbound = connection.inbound;
  const abort = whenAborted(signal);
  const consumer = new AbortController();
  let closedGracefully = false;
  let peerClosed = false;

  const record = (message: ReceivedMessage) => {
    result.messages.push(message);
    sink?.(message, false);
  };

  try {
    for (const step of request.messages) {
      if (signal.aborted) {
        result.disconnectReason = CANCELLED_BY_USER;
        return finish();
      }

      if (step.direction === "send") {
        try {
          const frame = encode(step);
          await sendFrame(ws, frame.data, frame.binary);
        } catch (err) {
          result.error = `Failed to send message '${step.name}': ${errorMessage(err)}`;
          return finish();
        }
        result.sentCount++;
        record({
          type: step.type,
          content: step.content,
          timestamp: now(),
          direction: "sent",
          sizeBytes: Buffer.byteLength(step.content),
        });
        continue;
      }

      const timer = stepTimer(step.timeoutSeconds);
      let event: StepEvent;
      try {
        // A clean close is not a failure: the step then waits out its timer.
        do {
          event = await Promise.race([
            peerClosed ? new Promise<never>(() => undefined) : inbound.take(consumer.signal),
            timer.expired.then((): StepEvent => ({ kind: "timeout" })),
            abort.promise.then((): StepEvent => ({ kind: "cancelled" })),
          ]);
          if (event.kind === "closed") peerClosed = true;
        } while (event.kind === "closed");
      } finally {
        timer.clear();
      }

      switch (event.kind) {
        case "message":
          result.receivedCount++;
          record(event.message);
          break;
        case "error":
          result.error = `Receive error: ${event.error.message}`;
          return finish();
        case "timeout":
          result.error = `Timeout waiting for message '${step.name}' (${step.timeoutSeconds}s)`;
          return finish();
        case "cancelled":
          result.disconnectReason = CANCELLED_BY_USER;
          return finish();
      }
    }

    // The peer may already be gone; close() is a no-op then.
    ws.close(NORMAL_CLOSURE);
    closedGracefully = true;
    result.disconnectReason = COMPLETED_SUCCESSFULLY;
    return finish();
  } finally {
    consumer.abort();
    abort.dispose();
    if (!closedGracefully) ws.terminate();
    logger.info(
      `WebSocket ${request.url} finished: ${result.error ?? result.disconnectReason ?? "closed"} ` +
        `(sent ${result.sentCount}, received ${result.receivedCount})`
    );
    sink?.(undefined, true);
  }
}

type LoopEvent =
  | { kind: "outbound"; text: string }
  | { kind: "inbound"; item: Inbound }
  | { kind: "cancelled" };

/**
 * Keeps one connection open until `signal` fires or the peer goes away, interleaving
 * caller-queued sends with inbound messages as they happen.
 *
 * A send that fails to resolve or write is reported to the sink and skipped. Cancellation
 * is a normal end, not an error.
 */
export async function executeWebSocketInteractive(
  signal: AbortSignal,
  session: InteractiveSession,
  sink?: WebSocketSink
): Promise<InteractiveSessionResult> {
  const startTime = Date.now();
  const elapsed = () => Date.now() - startTime;

  const connection = await connect(session.url, session.headers, session.subprotocols, session.tls, signal);
  if (!connection.ok) {
    if (connection.cancelled) {
      return { durationMs: elapsed(), disconnectReason: CANCELLED_BY_USER };
    }
    logger.warn(`${session.url}: ${connection.error}`);
    return { durationMs: elapsed(), disconnectReason: connection.error, error: connection.error };
  }

  const ws = connection.ws;
  sink?.(systemMessage("system", `Connected to ${session.url}`), false);

  const abort = whenAborted(signal);
  const consumer = new AbortController();

  const nextOutbound = (): Promise<LoopEvent> =>
    session.outbound.take(consumer.signal).then((text): LoopEvent => ({ kind: "outbound", text }));
  const nextInbound = (): Promise<LoopEvent> =>
    connection.inbound.take(consumer.signal).then((item): LoopEvent => ({ kind: "inbound", item }));

  let outbound = nextOutbound();
  let inbound = nextInbound();
  const cancelled: Promise<LoopEvent> = abort.promise.then((): LoopEvent => ({ kind: "cancelled" }));

  try {
    for (;;) {
      const event = await Promise.race([cancelled, inbound, outbound]);

      switch (event.kind) {
        case "cancelled":
          ws.close(NORMAL_CLOSURE);
          return { durationMs: elapsed(), disconnectReason: CANCELLED_BY_USER };

        case "inbound": {
          const item = event.item;
          if (item.kind === "message") {
            inbound = nextInbound();
            sink?.(item.message, false);
            break;
          }
          // The close outcome is queued behind every frame that arrived before it.
          if (item.kind === "error") {
            const error = `Receive error: ${item.error.message}`;
            sink?.(systemMessage("system", error), false);
            return { durationMs: elapsed(), disconnectReason: error, error };
          }
          const durationMs = elapsed();
          sink?.(systemMessage("system", `Disconnected after ${durationMs}ms`), false);
          return { durationMs, disconnectReason: `Peer closed the connection (${item.code})` };
        }

        case "outbound": {
          outbound = nextOutbound();
          if (event.text === "") break;

          let text = event.text;
          if (session.resolver) {
            try {
              text = await session.resolver.resolve(event.text, signal);
            } catch (err) {
              sink?.(systemMessage("system", `Variable resolution failed: ${errorMessage(err)}`), false);
              break;
            }
          }

          try {
            await sendFrame(ws, text, false);
          } catch (err) {
            sink?.(systemMessage("system", `Failed to send: ${errorMessage(err)}`), false);
            break;
          }
          sink?.(
            { type: "text", content: text, timestamp: now(), direction: "sent", sizeBytes: Buffer.byteLength(text) },
            false
          );
          break;
        }
      }
    }
  } finally {
    consumer.abort();
    abort.dispose();
    if (ws.readyState === WebSocket.CONNECTING || ws.readyState === WebSocket.OPEN) {
      if (!signal.aborted) ws.terminate();
    }
    logger.info(`Interactive WebSocket session ${session.url} ended after ${elapsed()}ms`);
    sink?.(undefined, true);
  }
}
