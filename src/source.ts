/**
 * Post source interface.
 *
 * Abstracts the elevated user session that can read posts the bot itself
 * cannot see. The GramJS implementation lives in session.ts; tests use an
 * in-memory fake.
 */

import type { PostReference } from "./links.js";

export interface MediaFile {
  /** Size in bytes; 0 when the library does not report one. */
  size: number;
  /** Original file name, if the sender attached one. */
  fileName: string | null;
  mimeType: string | null;
}

/**
 * Library-neutral view of a fetched post. At most one of the media slots is
 * set for real Telegram messages, but the classifier does not rely on that.
 */
export interface SourceMessage {
  id: number;
  /** Album id shared by every item of a grouped post. */
  groupedId: string | null;
  photo?: MediaFile;
  video?: MediaFile;
  audio?: MediaFile;
  document?: MediaFile;
  /** Message text rendered as Telegram HTML (posts without media). */
  text: string;
  /** Caption rendered as Telegram HTML (posts with media). */
  caption: string;
}

/** Called synchronously by the download with byte counts. */
export type ProgressFn = (transferred: number, total: number) => void;

export interface PostSource {
  /** Fetch one post. Resolves null when the id holds no message. */
  getMessage(ref: PostReference): Promise<SourceMessage | null>;

  /** Every message of the album `message` belongs to, ordered by id. */
  getMediaGroup(ref: PostReference, message: SourceMessage): Promise<SourceMessage[]>;

  /**
   * Download the media of a previously fetched message to `filePath`.
   * Resolves with the path actually written.
   */
  download(
    message: SourceMessage,
    filePath: string,
    onProgress: ProgressFn,
    signal?: AbortSignal,
  ): Promise<string>;

  /** True when the session account has Telegram Premium. */
  isPremium(): Promise<boolean>;
}
