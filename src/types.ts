export type Protocol = "http" | "graphql";

export type TlsConfig = {
  certFile?: string;
  keyFile?: string;
  caFile?: string;
  insecureSkipVerify?: boolean;
};

export type HttpRequest = {
  name?: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
  protocol?: Protocol;
  tls?: TlsConfig;
};

export type RequestResult = {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
  durationMs: number;
  requestSizeBytes: number;
  responseSizeBytes: number;
  error?: string;
};

/**
 * Profile-derived limits applied to a single execution.
 */
export type ExecutionOptions = {
  requestTimeoutSeconds: number;
  maxResponseSizeBytes: number;
};

/**
 * Receives streamed body chunks. Called with `done=false` for each chunk,
 * then exactly once with `(undefined, true)`.
 */
export type ChunkSink = (chunk: Buffer | undefined, done: boolean) => void;

export type MultiValueVariable = {
  options: string[];
  active: number;
  aliases?: Record<string, number>;
  description?: string;
};

export type VariableValue = string | MultiValueVariable;

export type VariableScopes = {
  profileVars?: Record<string, VariableValue>;
  sessionVars?: Record<string, string>;
  cliVars?: Record<string, string>;
  envVars?: Record<string, string>;
};

export type Profile = {
  name: string;
  headers?: Record<string, string>;
  variables?: Record<string, VariableValue>;
  tls?: TlsConfig;
  requestTimeout?: number;
  maxResponseSize?: number;
};

export type WebSocketMessageType = "text" | "json" | "binary";

export type WebSocketMessage = {
  name: string;
  type: WebSocketMessageType;
  content: string;
  direction: "send" | "receive";
  timeoutSeconds: number;
};

export type WebSocketRequest = {
  name?: string;
  url: string;
  headers?: Record<string, string>;
  subprotocols?: string[];
  messages: WebSocketMessage[];
  tls?: TlsConfig;
};

export type ReceivedMessage = {
  type: string;
  content: string;
  timestamp: string;
  direction: "system" | "sent" | "received";
  sizeBytes: number;
};

export type WebSocketResult = {
  messages: ReceivedMessage[];
  sentCount: number;
  receivedCount: number;
  durationMs: number;
  timestamp: string;
  disconnectReason?: string;
  error?: string;
};

/**
 * Receives session events. `done=true` marks termination and never carries a message.
 */
export type WebSocketSink = (message: ReceivedMessage | undefined, done: boolean) => void;

export type InteractiveSessionResult = {
  durationMs: number;
  disconnectReason: string;
  error?: string;
};
