/**
 * Bad TLS material, unreadable files or an invalid profile.
 * Always raised before any network I/O happens.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * The outbound request object could not be built at all.
 */
export class RequestBuildError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestBuildError";
  }
}

export const REQUEST_CANCELLED = "Request cancelled";
export const CANCELLED_BY_USER = "Cancelled by user";

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
