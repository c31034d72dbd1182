/**
 * Telegram post link parsing.
 *
 * Public:  https://t.me/<username>/<id>            (and /<username>/<thread>/<id>)
 * Private: https://t.me/c/<internal-id>/<id>       (and /c/<internal-id>/<thread>/<id>)
 *
 * Private channels are addressed by their marked id, "-100" + internal id.
 */

import { InvalidReferenceError } from "./errors.js";

/** Username for public channels, marked numeric id for private ones. */
export type ChannelId = string | number;

export interface PostReference {
  channel: ChannelId;
  messageId: number;
  /** Forum topic the post belongs to, when the link names one. */
  threadId?: number;
}

const HOST_RE = /^(?:https?:\/\/)?(?:www\.)?(?:t\.me|telegram\.me|telegram\.dog)\/(.*)$/i;
const NUMERIC_RE = /^\d+$/;
const USERNAME_RE = /^[A-Za-z][A-Za-z0-9_]{2,}$/;

function toPositiveInt(raw: string, what: string, url: string): number {
  if (!NUMERIC_RE.test(raw)) {
    throw new InvalidReferenceError(`Invalid post URL. The ${what} must be numeric: ${url}`);
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidReferenceError(`Invalid post URL. The ${what} must be a positive integer: ${url}`);
  }
  return value;
}

/** Strip query string and fragment (e.g. "?single", "#comment"). */
export function stripLinkQuery(url: string): string {
  return url.trim().split(/[?#]/, 1)[0] ?? "";
}

/**
 * Parse a post URL into a PostReference. Throws InvalidReferenceError for
 * anything that is not a recognised post link.
 */
export function parsePostLink(url: string): PostReference {
  const clean = stripLinkQuery(url);
  const match = HOST_RE.exec(clean);
  if (!match) {
    throw new InvalidReferenceError("Please send a valid Telegram post URL.");
  }

  const parts = (match[1] ?? "").split("/").filter(Boolean);

  if (parts[0] === "c") {
    if (parts.length !== 3 && parts.length !== 4) {
      throw new InvalidReferenceError("Please send a valid Telegram post URL.");
    }
    const internalId = parts[1] ?? "";
    if (!NUMERIC_RE.test(internalId)) {
      throw new InvalidReferenceError(`Invalid post URL. The channel id must be numeric: ${url}`);
    }
    const channel = Number(`-100${internalId}`);
    if (!Number.isSafeInteger(channel)) {
      throw new InvalidReferenceError(`Invalid post URL. The channel id is out of range: ${url}`);
    }
    if (parts.length === 4) {
      return {
        channel,
        threadId: toPositiveInt(parts[2] ?? "", "topic id", url),
        messageId: toPositiveInt(parts[3] ?? "", "message id", url),
      };
    }
    return { channel, messageId: toPositiveInt(parts[2] ?? "", "message id", url) };
  }

  if (parts.length !== 2 && parts.length !== 3) {
    throw new InvalidReferenceError("Please send a valid Telegram post URL.");
  }

  const username = parts[0] ?? "";
  // t.me/m/<slug> is a business chat link, not a post
  if (username === "m" || !USERNAME_RE.test(username)) {
    throw new InvalidReferenceError(`Invalid post URL. Unknown channel: ${url}`);
  }

  if (parts.length === 3) {
    return {
      channel: username,
      threadId: toPositiveInt(parts[1] ?? "", "topic id", url),
      messageId: toPositiveInt(parts[2] ?? "", "message id", url),
    };
  }
  return { channel: username, messageId: toPositiveInt(parts[1] ?? "", "message id", url) };
}

/** Usernames are case-insensitive; numeric ids compare exactly. */
export function sameChannel(a: PostReference, b: PostReference): boolean {
  if (typeof a.channel === "string" && typeof b.channel === "string") {
    return a.channel.toLowerCase() === b.channel.toLowerCase();
  }
  return a.channel === b.channel;
}

/** Human-readable link back to a post, used in logs and task labels. */
export function formatPostLink(ref: PostReference): string {
  if (typeof ref.channel === "number") {
    const internal = String(ref.channel).replace(/^-100/, "");
    return `https://t.me/c/${internal}/${ref.messageId}`;
  }
  return `https://t.me/${ref.channel}/${ref.messageId}`;
}
