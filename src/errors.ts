/**
 * Structured error types for tether.
 *
 * Error boundaries wrap failures with tetherError instead of stringifying
 * e.message, so stack traces, causes and partial state survive to the caller
 * and logs get consistent fields.
 */

import type { ChatMessage } from "./drivers/types.js";

export type TetherErrorKind =
  | "spawn_error"
  | "already_started"
  | "invalid_state"
  | "stream_error"
  | "tool_error"
  | "config_error"
  | "mcp_error"
  | "cancelled"
  | "disposal_error";

export interface ExitSummary {
  code: number | null;
  signal: string | null;
}

export interface TetherError extends Error {
  kind: TetherErrorKind;
  retryable: boolean;
  cause?: unknown;
  /** Release failures collected while unwinding after this error. */
  suppressed?: Error[];
  /** Transcript entries accepted before a stream failed or was cancelled. */
  transcript?: readonly ChatMessage[];
  /** Assistant text accumulated from fragments that never completed. */
  partialContent?: string;
  exit?: ExitSummary;
}

export interface TetherErrorOptions {
  retryable?: boolean;
  cause?: unknown;
  suppressed?: Error[];
  transcript?: readonly ChatMessage[];
  partialContent?: string;
  exit?: ExitSummary;
}

/**
 * Create a TetherError with structured fields.
 */
export function tetherError(
  kind: TetherErrorKind,
  message: string,
  opts: TetherErrorOptions = {},
): TetherError {
  const err: TetherError = Object.assign(new Error(message), {
    kind,
    retryable: opts.retryable ?? false,
  });
  if (opts.cause !== undefined) err.cause = opts.cause;
  if (opts.suppressed && opts.suppressed.length > 0) err.suppressed = opts.suppressed;
  if (opts.transcript) err.transcript = opts.transcript;
  if (opts.partialContent !== undefined) err.partialContent = opts.partialContent;
  if (opts.exit) err.exit = opts.exit;
  return err;
}

/**
 * Normalize an unknown thrown value into an Error.
 * Handles strings, objects, nulls: whatever JS lets you throw.
 */
export function asError(e: unknown): Error {
  if (e instanceof Error) return e;
  if (typeof e === "string") return new Error(e);
  if (e === null || e === undefined) return new Error("Unknown error");
  try {
    return new Error(String(e));
  } catch {
    return new Error("Unknown error");
  }
}

/**
 * Check if an error is a TetherError with structured fields.
 */
export function isTetherError(e: unknown): e is TetherError {
  return e instanceof Error && "kind" in e && "retryable" in e;
}

export function isCancelled(e: unknown): boolean {
  return isTetherError(e) && e.kind === "cancelled";
}

/**
 * Attach release failures to an error that is already propagating.
 * The original error is returned unchanged apart from `suppressed`.
 */
export function withSuppressed(e: unknown, failures: Error[]): Error {
  const err = asError(e);
  if (failures.length === 0) return err;
  if (isTetherError(err)) {
    err.suppressed = [...(err.suppressed ?? []), ...failures];
    return err;
  }
  return Object.assign(err, { suppressed: failures });
}

/**
 * Format a TetherError for structured logging.
 * Returns a plain object suitable for JSON.stringify or structured loggers.
 */
export function errorLogFields(e: TetherError): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    kind: e.kind,
    message: e.message,
    retryable: e.retryable,
  };
  if (e.exit) fields.exit = e.exit;
  if (e.partialContent !== undefined) fields.partial_length = e.partialContent.length;
  if (e.transcript) fields.transcript_length = e.transcript.length;
  if (e.suppressed) fields.suppressed = e.suppressed.map((s) => s.message);
  if (e.cause) {
    const cause = asError(e.cause);
    fields.cause_message = cause.message;
    if (cause.stack) fields.cause_stack = cause.stack;
  }
  if (e.stack) fields.stack = e.stack;
  return fields;
}
