/**
 * Elevated user session (GramJS).
 *
 * The bot identity cannot read channels it is not a member of, so posts are
 * fetched and downloaded through a logged-in user account instead. The
 * session string is produced once with an interactive GramJS login and
 * supplied through config.
 *
 * Flood waits, reconnects and chunked downloads are handled by GramJS.
 */

import bigInt from "big-integer";
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { HTMLParser } from "telegram/extensions/html.js";
import { LogLevel } from "telegram/extensions/Logger.js";
import { escapeHtml } from "./format.js";
import type { PostReference } from "./links.js";
import type { MediaFile, PostSource, ProgressFn, SourceMessage } from "./source.js";

export interface SessionOptions {
  apiId: number;
  apiHash: string;
  sessionString: string;
}

/** Albums are at most 10 items, so their ids sit within this distance. */
const ALBUM_SEARCH_RADIUS = 9;

function toCount(value: { toString(): string }): number {
  const parsed = Number(value.toString());
  return Number.isFinite(parsed) ? parsed : 0;
}

function documentFile(doc: unknown): MediaFile | undefined {
  if (!(doc instanceof Api.Document)) return undefined;
  const nameAttr = doc.attributes.find(
    (attr): attr is Api.DocumentAttributeFilename => attr instanceof Api.DocumentAttributeFilename,
  );
  return {
    size: toCount(doc.size),
    fileName: nameAttr?.fileName ?? null,
    mimeType: doc.mimeType || null,
  };
}

function photoFile(photo: unknown): MediaFile | undefined {
  if (!(photo instanceof Api.Photo)) return undefined;
  let size = 0;
  for (const variant of photo.sizes) {
    if (variant instanceof Api.PhotoSize) size = Math.max(size, variant.size);
    if (variant instanceof Api.PhotoSizeProgressive) size = Math.max(size, ...variant.sizes);
  }
  return { size, fileName: null, mimeType: "image/jpeg" };
}

/** Render the message body and its entities as Telegram HTML. */
function renderHtml(raw: Api.Message): string {
  const text = raw.message ?? "";
  if (!raw.entities || raw.entities.length === 0) return escapeHtml(text);
  return HTMLParser.unparse(text, raw.entities);
}

export class TelegramSession implements PostSource {
  private client: TelegramClient | null = null;
  private premium = false;
  /** Source views keep a link back to the GramJS message they were built from. */
  private readonly rawMessages = new WeakMap<SourceMessage, Api.Message>();

  constructor(private readonly options: SessionOptions) {}

  async start(): Promise<void> {
    const client = new TelegramClient(
      new StringSession(this.options.sessionString),
      this.options.apiId,
      this.options.apiHash,
      { connectionRetries: 5 },
    );
    client.setLogLevel(LogLevel.WARN);

    await client.connect();
    if (!(await client.checkAuthorization())) {
      await client.destroy();
      throw new Error("User session is not authorized. Generate a new session string.");
    }

    const me = await client.getMe();
    this.premium = me instanceof Api.User && me.premium === true;

    // String sessions carry no entity cache; private channels only resolve
    // by id once the account's dialogs have been seen.
    const dialogs = await client.getDialogs({});
    console.log(`[session] Connected (premium: ${this.premium}, dialogs: ${dialogs.length})`);

    this.client = client;
  }

  async stop(): Promise<void> {
    if (this.client) {
      await this.client.destroy();
      this.client = null;
    }
    console.log("[session] Disconnected");
  }

  async isPremium(): Promise<boolean> {
    return this.premium;
  }

  async getMessage(ref: PostReference): Promise<SourceMessage | null> {
    const client = this.requireClient();
    const [raw] = await client.getMessages(this.entityFor(ref), { ids: [ref.messageId] });
    return raw instanceof Api.Message ? this.toSource(raw) : null;
  }

  async getMediaGroup(ref: PostReference, message: SourceMessage): Promise<SourceMessage[]> {
    if (!message.groupedId) return [message];
    const client = this.requireClient();

    const ids: number[] = [];
    for (let id = message.id - ALBUM_SEARCH_RADIUS; id <= message.id + ALBUM_SEARCH_RADIUS + 1; id++) {
      if (id > 0) ids.push(id);
    }

    const found = await client.getMessages(this.entityFor(ref), { ids });
    const members = found
      .filter((raw): raw is Api.Message => raw instanceof Api.Message)
      .filter((raw) => raw.groupedId?.toString() === message.groupedId)
      .sort((a, b) => a.id - b.id)
      .map((raw) => this.toSource(raw));

    return members.length > 0 ? members : [message];
  }

  async download(
    message: SourceMessage,
    filePath: string,
    onProgress: ProgressFn,
    signal?: AbortSignal,
  ): Promise<string> {
    const client = this.requireClient();
    const raw = this.rawMessages.get(message);
    if (!raw) {
      throw new Error(`Message ${message.id} was not fetched through this session`);
    }

    // GramJS polls isCanceled between chunks.
    const progressCallback = Object.assign(
      (downloaded: { toString(): string }, total: { toString(): string }) => {
        onProgress(toCount(downloaded), toCount(total));
      },
      { isCanceled: false },
    );
    const onAbort = (): void => {
      progressCallback.isCanceled = true;
    };

    signal?.throwIfAborted();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      const result = await client.downloadMedia(raw, { outputFile: filePath, progressCallback });
      signal?.throwIfAborted();
      return typeof result === "string" ? result : filePath;
    } finally {
      signal?.removeEventListener("abort", onAbort);
    }
  }

  private requireClient(): TelegramClient {
    if (!this.client) {
      throw new Error("User session not started");
    }
    return this.client;
  }

  private entityFor(ref: PostReference): string | bigInt.BigInteger {
    return typeof ref.channel === "number" ? bigInt(ref.channel) : ref.channel;
  }

  private toSource(raw: Api.Message): SourceMessage {
    const hasMedia = raw.media !== undefined && !(raw.media instanceof Api.MessageMediaWebPage);
    const rendered = renderHtml(raw);
    const source: SourceMessage = {
      id: raw.id,
      groupedId: raw.groupedId ? raw.groupedId.toString() : null,
      photo: photoFile(raw.photo),
      video: documentFile(raw.video),
      audio: documentFile(raw.audio),
      document: documentFile(raw.document),
      text: hasMedia ? "" : rendered,
      caption: hasMedia ? rendered : "",
    };
    this.rawMessages.set(source, raw);
    return source;
  }
}

export type LoginPrompt = (question: string) => Promise<string>;

/**
 * Interactive GramJS login. Returns the session string to put into
 * session.session_string.
 */
export async function createSessionString(apiId: number, apiHash: string, prompt: LoginPrompt): Promise<string> {
  const session = new StringSession("");
  const client = new TelegramClient(session, apiId, apiHash, { connectionRetries: 5 });
  client.setLogLevel(LogLevel.WARN);

  try {
    await client.start({
      phoneNumber: () => prompt("Phone number (international format): "),
      password: () => prompt("Two-step verification password: "),
      phoneCode: () => prompt("Login code: "),
      onError: (err) => {
        console.error("[session] Login error:", err.message);
      },
    });
    return session.save();
  } finally {
    await client.destroy();
  }
}
