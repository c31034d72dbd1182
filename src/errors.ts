/**
 * Error taxonomy for the relay pipeline.
 *
 * Every error that reaches a user carries a short `userMessage`. Library
 * errors (GramJS RPC errors, grammy HttpErrors, fs errors) are mapped onto
 * this taxonomy by toRelayError at stage boundaries.
 */

import { collectErrorCandidates } from "./channels/telegram-network-errors.js";

export type RelayErrorCode =
  | "invalid_reference"
  | "reference_unavailable"
  | "size_limit"
  | "transfer"
  | "cancelled"
  | "unknown";

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, readonly userMessage: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed post URL or message id. */
export class InvalidReferenceError extends RelayError {
  readonly code = "invalid_reference" as const;

  constructor(message: string) {
    super(message, message);
  }
}

/** The user session cannot see the referenced chat or message. */
export class ReferenceUnavailableError extends RelayError {
  readonly code = "reference_unavailable" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "Ensure the user session has access to the chat.", options);
  }
}

/** Policy rejection. Not a failure: the fetch ends without transferring bytes. */
export class SizeLimitExceeded extends RelayError {
  readonly code = "size_limit" as const;

  constructor(readonly size: number, readonly limit: number, notice: string) {
    super(`File size ${size} exceeds limit ${limit}`, notice);
  }
}

/** Download or upload failure reported by one of the Telegram clients. */
export class TransferError extends RelayError {
  readonly code = "transfer" as const;

  constructor(message: string, options?: { cause?: unknown; userMessage?: string }) {
    super(message, options?.userMessage ?? `❌ Error: ${message}`, options);
  }
}

/** Abort requested through the task manager. */
export class TaskCancelledError extends RelayError {
  readonly code = "cancelled" as const;

  constructor(message = "Task cancelled") {
    super(message, "Cancelled.");
  }
}

export class UnknownError extends RelayError {
  readonly code = "unknown" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, `❌ Error: ${message}`, options);
  }
}

/**
 * Extract a string message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** RPC error messages that mean the session has no access to the peer or message. */
const ACCESS_ERROR_CODES = new Set([
  "CHANNEL_PRIVATE",
  "CHANNEL_INVALID",
  "CHANNEL_PUBLIC_GROUP_NA",
  "CHAT_ADMIN_REQUIRED",
  "CHAT_FORBIDDEN",
  "CHAT_ID_INVALID",
  "PEER_ID_INVALID",
  "USERNAME_INVALID",
  "USERNAME_NOT_OCCUPIED",
  "USER_BANNED_IN_CHANNEL",
  "MSG_ID_INVALID",
]);

/** GramJS raises plain Errors when it cannot resolve an entity locally. */
const ACCESS_MESSAGE_RE = /could not find the input entity|no user has ".*" as username|cannot find any entity/i;

function getRpcMessage(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const value = (err as { errorMessage?: unknown }).errorMessage;
  return typeof value === "string" ? value : undefined;
}

/**
 * True when the error means the user session cannot resolve the referenced
 * chat or message (private channel, unknown username, bad peer id).
 */
export function isAccessError(err: unknown): boolean {
  for (const candidate of collectErrorCandidates(err)) {
    const rpc = getRpcMessage(candidate)?.toUpperCase();
    if (rpc && ACCESS_ERROR_CODES.has(rpc)) return true;
    if (ACCESS_MESSAGE_RE.test(errorMessage(candidate))) return true;
  }
  return false;
}

export type Stage = "resolve" | "download" | "upload";

/**
 * Map any thrown value onto the taxonomy. Already-classified errors pass
 * through unchanged.
 */
export function toRelayError(err: unknown, stage: Stage): RelayError {
  if (err instanceof RelayError) return err;
  if (stage === "resolve" && isAccessError(err)) {
    return new ReferenceUnavailableError(errorMessage(err), { cause: err });
  }
  if (stage === "download" || stage === "upload") {
    return new TransferError(errorMessage(err), { cause: err });
  }
  return new UnknownError(errorMessage(err), { cause: err });
}

/** Result of one fetch stage. */
export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RelayError };

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: RelayError): StageResult<T> {
  return { ok: false, error };
}

/**
 * Run one stage, converting a throw into a failed StageResult.
 */
export async function runStage<T>(stage: Stage, fn: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail(toRelayError(err, stage));
  }
}
