/**
 * Which Bot API failures are transient.
 *
 * Polling and the send retry loop retry only what `isRecoverableTelegramNetworkError`
 * accepts. The cause-chain walk is also used by the session access-error
 * check in errors.ts.
 */

/** Socket, DNS and undici error codes. */
const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ETIMEDOUT",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const TRANSIENT_NAMES = new Set(["AbortError", "TimeoutError", "ConnectTimeoutError"]);

/** Only trusted while polling: a send error carrying these may still have been delivered. */
const TRANSIENT_MESSAGE_RE = /fetch failed|network (?:error|request)|socket hang up|getaddrinfo|timed? ?out/i;

/** Bot API rejects uploads over 50 MB unless a local Bot API server is used. */
const TOO_LARGE_RE = /request entity too large|file is too big/i;

export type TelegramCallPhase = "polling" | "send";

function field(value: unknown, key: string): unknown {
  return value !== null && typeof value === "object" ? Reflect.get(value, key) : undefined;
}

function messageOf(value: unknown): string {
  if (typeof value === "string") return value;
  return value instanceof Error ? value.message : "";
}

/**
 * The error and everything it wraps, breadth first: `cause`, `reason`,
 * `errors[]` (AggregateError), and `error` on grammy's HttpError.
 */
export function collectErrorCandidates(err: unknown): unknown[] {
  const seen = new Set<unknown>();
  const queue: unknown[] = [err];

  for (let i = 0; i < queue.length; i++) {
    const current = queue[i];
    if (current == null || seen.has(current)) continue;
    seen.add(current);

    const nested = field(current, "errors");
    queue.push(
      field(current, "cause"),
      field(current, "reason"),
      ...(Array.isArray(nested) ? nested : []),
      field(current, "name") === "HttpError" ? field(current, "error") : undefined,
    );
  }

  return Array.from(seen);
}

/**
 * True when `err` is a network hiccup worth retrying. API errors (4xx) are
 * permanent. Message matching applies to polling only.
 */
export function isRecoverableTelegramNetworkError(err: unknown, phase: TelegramCallPhase): boolean {
  return collectErrorCandidates(err).some((candidate) => {
    const code = field(candidate, "code") ?? field(candidate, "errno");
    if (typeof code === "string" && TRANSIENT_CODES.has(code.toUpperCase())) return true;

    const name = field(candidate, "name");
    if (typeof name === "string" && TRANSIENT_NAMES.has(name)) return true;

    return phase === "polling" && TRANSIENT_MESSAGE_RE.test(messageOf(candidate));
  });
}

/**
 * True for the Bot API's "too large" upload rejection (HTTP 413).
 */
export function isUploadTooLargeError(err: unknown): boolean {
  if (field(err, "error_code") === 413) return true;
  const description = field(err, "description");
  if (typeof description === "string" && TOO_LARGE_RE.test(description)) return true;
  return err instanceof Error && TOO_LARGE_RE.test(err.message);
}
