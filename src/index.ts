export * from "./types";
export { ConfigError, RequestBuildError, REQUEST_CANCELLED, CANCELLED_BY_USER, errorMessage } from "./errors";
export { logger } from "./logger";
export {
  VariableResolver,
  getVariableValue,
  validateVariableValue,
  selectVariableOption,
  extractVariableNames,
  extractRequestVariables,
  loadEnvFile,
  loadSystemEnv,
} from "./variable-resolver";
export {
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  DEFAULT_MAX_RESPONSE_SIZE_BYTES,
  resolveExecutionOptions,
  profileExecutionOptions,
  applyProfileHeaders,
  parseProfile,
  loadProfile,
} from "./config";
export { buildTlsOptions, mergeTlsConfig } from "./tls";
export type { TlsOptions } from "./tls";
export { execute, executeWithStreaming, isStreamingResponse } from "./http-executor";
export { formatGraphQLResponse } from "./graphql";
export { formatDuration, formatSize, isSuccessStatus, parseEscapeSequences } from "./format";
export { extractJsonToken, extractTokens, autoExtractTokens } from "./tokens";
export { MessageQueue } from "./message-queue";
export { executeWebSocket, executeWebSocketInteractive, COMPLETED_SUCCESSFULLY } from "./websocket-executor";
export type { InteractiveSession } from "./websocket-executor";
