/**
 * Error taxonomy for the documentation pipeline.
 *
 * Input errors (bad site index, out-of-scope URL) and render failures reach
 * the caller as structured tool errors. Storage errors never leave the cache.
 */

export type RenderFailureReason =
  | "Timeout"
  | "NetworkFailure"
  | "EngineUnavailable"
  | "InvalidContent";

export type ErrorKind =
  | "IndexError"
  | "ScopeError"
  | "RenderError"
  | "StorageError"
  | "ConfigError";

export abstract class DocsError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SiteIndexError extends DocsError {
  readonly kind = "IndexError";

  constructor(readonly index: number, readonly count: number) {
    super(
      count === 0
        ? `Documentation index ${index} is out of range: no documentation sites are configured`
        : `Documentation index ${index} is out of range: expected an integer from 0 to ${count - 1}`
    );
  }
}

export class ScopeError extends DocsError {
  readonly kind = "ScopeError";

  constructor(readonly url: string, readonly rootUrl: string, detail?: string) {
    super(
      detail ??
        `URL ${url} is outside the documentation site ${rootUrl}`
    );
  }
}

export class RenderError extends DocsError {
  readonly kind = "RenderError";

  constructor(
    readonly reason: RenderFailureReason,
    readonly url: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class StorageError extends DocsError {
  readonly kind = "StorageError";
}

export class ConfigError extends DocsError {
  readonly kind = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
  }
}

export interface ErrorPayload {
  kind: ErrorKind | "InternalError";
  message: string;
  reason?: RenderFailureReason;
}

/**
 * Flattens any thrown value into the `{ kind, message }` shape returned to
 * tool-calling clients.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof RenderError) {
    return { kind: error.kind, reason: error.reason, message: error.message };
  }
  if (error instanceof DocsError) {
    return { kind: error.kind, message: error.message };
  }
  return {
    kind: "InternalError",
    message: error instanceof Error ? error.message : String(error),
  };
}
