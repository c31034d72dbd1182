/**
 * Content classification.
 *
 * Decides what a fetched post carries. Album membership wins over
 * everything, then binary media (photo > video > audio > document), then
 * text or caption. The function is total: every message maps to exactly one
 * variant.
 */

import type { MediaFile, SourceMessage } from "./source.js";

export type MediaKind = "photo" | "video" | "audio" | "document";

export type Content =
  | { kind: "grouped"; groupedId: string }
  | { kind: MediaKind; file: MediaFile }
  | { kind: "text"; text: string }
  | { kind: "empty" };

const MEDIA_PRIORITY: readonly MediaKind[] = ["photo", "video", "audio", "document"];

export function classifyContent(message: SourceMessage): Content {
  if (message.groupedId) {
    return { kind: "grouped", groupedId: message.groupedId };
  }

  for (const kind of MEDIA_PRIORITY) {
    const file = message[kind];
    if (file) return { kind, file };
  }

  const text = captionFor(message);
  if (text) return { kind: "text", text };

  return { kind: "empty" };
}

/** Narrow a classification to the single-media variants. */
export function isMediaContent(content: Content): content is { kind: MediaKind; file: MediaFile } {
  return (MEDIA_PRIORITY as readonly string[]).includes(content.kind);
}

/** True when the post has anything to relay. Used by the batch skip test. */
export function hasContent(message: SourceMessage | null): message is SourceMessage {
  return message !== null && classifyContent(message).kind !== "empty";
}

/** The caption to relay: the post's caption, falling back to its text. */
export function captionFor(message: SourceMessage): string {
  return message.caption.trim() ? message.caption : message.text.trim() ? message.text : "";
}

const DEFAULT_EXTENSIONS: Record<MediaKind, string> = {
  photo: ".jpg",
  video: ".mp4",
  audio: ".mp3",
  document: "",
};

/**
 * Reduce a sender-supplied name to a safe single path segment.
 */
export function sanitizeFileName(name: string): string {
  const cleaned = name
    .replace(/[\u0000-\u001f\u007f]/g, "")
    .replace(/[\\/:*?"<>|]/g, "_")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^\.+/, "");
  return cleaned.slice(0, 200);
}

/**
 * Local file name for a downloaded media item: the sender's file name when
 * present, otherwise "<message id><default extension>".
 */
export function mediaFileName(messageId: number, kind: MediaKind, file: MediaFile): string {
  if (kind !== "photo" && file.fileName) {
    const safe = sanitizeFileName(file.fileName);
    if (safe) return safe;
  }
  return `${messageId}${DEFAULT_EXTENSIONS[kind]}`;
}
