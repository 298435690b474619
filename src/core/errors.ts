export type RemoteErrorCategory = "rate_limited" | "transient_transport" | "server_fault" | "invalid_input" | "auth";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigurationError";
  }
}

export class ResolutionError extends Error {
  constructor(
    readonly parameter: string,
    message: string
  ) {
    super(`parameter ${parameter}: ${message}`);
    this.name = "ResolutionError";
  }
}

export abstract class RemoteServiceError extends Error {
  abstract readonly retryable: boolean;

  constructor(
    readonly category: RemoteErrorCategory,
    message: string,
    readonly status: number | null = null
  ) {
    super(message);
  }
}

export class TransientRemoteError extends RemoteServiceError {
  readonly retryable = true;

  constructor(category: Extract<RemoteErrorCategory, "rate_limited" | "transient_transport" | "server_fault">, message: string, status: number | null = null) {
    super(category, message, status);
    this.name = "TransientRemoteError";
  }
}

export class FatalRemoteError extends RemoteServiceError {
  readonly retryable = false;

  constructor(category: Extract<RemoteErrorCategory, "invalid_input" | "auth">, message: string, status: number | null = null) {
    super(category, message, status);
    this.name = "FatalRemoteError";
  }
}

export function remoteError(category: RemoteErrorCategory, message: string, status: number | null = null): RemoteServiceError {
  switch (category) {
    case "rate_limited":
    case "transient_transport":
    case "server_fault":
      return new TransientRemoteError(category, message, status);
    case "invalid_input":
    case "auth":
      return new FatalRemoteError(category, message, status);
  }
}

export class PersistenceError extends Error {
  constructor(
    message: string,
    readonly stage: "download" | "write" | "read" | "thumbnail",
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

const NETWORK_ERROR_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN", "ENOTFOUND", "UND_ERR_SOCKET"]);

/**
 * Lifts a bare socket-level failure into a retryable server_fault. Anything
 * else that is not already a RemoteServiceError is returned unchanged.
 */
export function normalizeRemoteError(err: unknown): unknown {
  if (err instanceof RemoteServiceError) return err;
  const code = err instanceof Error ? (err as NodeJS.ErrnoException).code : undefined;
  if (code && NETWORK_ERROR_CODES.has(code)) {
    return new TransientRemoteError("server_fault", `${code}: ${errorMessage(err)}`);
  }
  return err;
}

export type ErrorCategory = RemoteErrorCategory | "persistence" | "unclassified";

export interface ErrorSummary {
  category: ErrorCategory;
  message: string;
}

export function summarizeError(err: unknown): ErrorSummary {
  if (err instanceof RemoteServiceError) return { category: err.category, message: err.message };
  if (err instanceof PersistenceError) return { category: "persistence", message: err.message };
  return { category: "unclassified", message: errorMessage(err) };
}
