/**
 * In-memory stand-ins for the two Telegram identities, shared by the
 * fetcher, batch and command tests.
 */

import fs from "node:fs";
import type { OutgoingMedia, ReplyChannel, RequestMessage } from "./channels/types.js";
import type { PostReference } from "./links.js";
import type { MediaFile, PostSource, ProgressFn, SourceMessage } from "./source.js";

export function mediaFile(size: number, fileName: string | null = null): MediaFile {
  return { size, fileName, mimeType: null };
}

export function post(id: number, overrides: Partial<SourceMessage> = {}): SourceMessage {
  return { id, groupedId: null, text: "", caption: "", ...overrides };
}

export const REQUEST: RequestMessage = { chatId: 1, messageId: 77, userId: 9 };

type DownloadHook = (message: SourceMessage, onProgress: ProgressFn) => Promise<void> | void;

export class FakeSource implements PostSource {
  readonly messages = new Map<number, SourceMessage>();
  /** getMessage throws these. */
  readonly resolveErrors = new Map<number, Error>();
  /** download throws these. */
  readonly downloadErrors = new Map<number, Error>();
  readonly downloads: number[] = [];
  premium = false;
  premiumChecks = 0;
  /** Runs inside download before the file is written. */
  onDownload: DownloadHook | null = null;
  /** When set, downloads wait for it (or for their abort signal). */
  hold: Promise<void> | null = null;

  private startedResolve: (() => void) | null = null;
  /** Resolves when the first download starts. */
  readonly downloadStarted = new Promise<void>((resolve) => {
    this.startedResolve = () => resolve();
  });

  add(...messages: SourceMessage[]): this {
    for (const message of messages) this.messages.set(message.id, message);
    return this;
  }

  async getMessage(ref: PostReference): Promise<SourceMessage | null> {
    const error = this.resolveErrors.get(ref.messageId);
    if (error) throw error;
    return this.messages.get(ref.messageId) ?? null;
  }

  async getMediaGroup(_ref: PostReference, message: SourceMessage): Promise<SourceMessage[]> {
    return Array.from(this.messages.values())
      .filter((candidate) => candidate.groupedId === message.groupedId)
      .sort((a, b) => a.id - b.id);
  }

  async download(
    message: SourceMessage,
    filePath: string,
    onProgress: ProgressFn,
    signal?: AbortSignal,
  ): Promise<string> {
    this.downloads.push(message.id);
    this.startedResolve?.();
    if (this.onDownload) await this.onDownload(message, onProgress);
    if (this.hold) await waitOrAbort(this.hold, signal);
    signal?.throwIfAborted();

    const error = this.downloadErrors.get(message.id);
    if (error) throw error;

    await fs.promises.writeFile(filePath, `media ${message.id}`);
    return filePath;
  }

  async isPremium(): Promise<boolean> {
    this.premiumChecks++;
    return this.premium;
  }
}

function waitOrAbort(gate: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) return gate;
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
    gate.then(resolve, reject);
  });
}

export interface SentMedia extends OutgoingMedia {
  /** Whether the local file existed when the upload was made. */
  existed: boolean;
}

export class RecordingReplies implements ReplyChannel {
  readonly texts: Array<{ id: number; text: string }> = [];
  readonly documents: Array<{ filePath: string; caption: string | undefined }> = [];
  readonly media: SentMedia[] = [];
  readonly groups: SentMedia[][] = [];
  /** File contents at upload time, keyed by path. */
  readonly uploadedContents = new Map<string, string>();
  readonly edits: Array<{ messageId: number; text: string }> = [];
  readonly deleted: number[] = [];
  failMedia: Error | null = null;
  failGroup: Error | null = null;
  private nextId = 1000;

  get textBodies(): string[] {
    return this.texts.map((entry) => entry.text);
  }

  async replyText(_request: RequestMessage, text: string): Promise<number> {
    const id = this.nextId++;
    this.texts.push({ id, text });
    return id;
  }

  async replyDocument(_request: RequestMessage, filePath: string, caption?: string): Promise<void> {
    this.documents.push({ filePath, caption });
  }

  async sendMedia(_request: RequestMessage, media: OutgoingMedia): Promise<void> {
    if (this.failMedia) throw this.failMedia;
    const existed = fs.existsSync(media.filePath);
    if (existed) this.uploadedContents.set(media.filePath, fs.readFileSync(media.filePath, "utf-8"));
    this.media.push({ ...media, existed });
  }

  async sendMediaGroup(_request: RequestMessage, items: OutgoingMedia[]): Promise<void> {
    if (this.failGroup) throw this.failGroup;
    this.groups.push(items.map((item) => ({ ...item, existed: fs.existsSync(item.filePath) })));
  }

  async editText(_chatId: number, messageId: number, text: string): Promise<void> {
    this.edits.push({ messageId, text });
  }

  async deleteMessage(_chatId: number, messageId: number): Promise<void> {
    this.deleted.push(messageId);
  }
}
