/**
 * Telegram bridge using grammy.
 *
 * ChannelBridge for the bot identity in private chats. Long polling only.
 * Commands are not registered with grammy's router: every text message is
 * handed to the single onMessage handler, which dispatches them.
 *
 * All outgoing messages use HTML parse mode. Uploads read from local files
 * through InputFile and thread under the request message.
 */

import { Bot, InputFile, InputMediaBuilder, type Context } from "grammy";
import type { InputMediaAudio, InputMediaDocument, InputMediaPhoto, InputMediaVideo } from "grammy/types";
import { TransferError } from "../errors.js";
import { unescapeHtml } from "../format.js";
import type { ChannelBridge, IncomingMessage, OutgoingMedia, RequestMessage } from "./types.js";
import { isRecoverableTelegramNetworkError, isUploadTooLargeError } from "./telegram-network-errors.js";

/**
 * Telegram message handler function.
 */
type MessageHandler = (msg: IncomingMessage) => Promise<void>;

export interface TelegramBridgeOptions {
  allowedUsers?: number[];
  /** Local Bot API server; lifts the 50 MB upload cap. */
  apiRoot?: string;
}

/** Telegram's maximum message length in characters. */
const MAX_MESSAGE_LENGTH = 4096;

/** Telegram's maximum caption length, counted without markup. */
const MAX_CAPTION_LENGTH = 1024;

/** Maximum retry attempts for send/edit operations. */
const MAX_SEND_RETRIES = 3;

/** Base delay for retry backoff in milliseconds. */
const RETRY_BASE_DELAY_MS = 1000;

const BOT_COMMANDS = [
  { command: "start", description: "Welcome message" },
  { command: "help", description: "How to use the bot" },
  { command: "dl", description: "Download media from a post link" },
  { command: "bdl", description: "Download a range of posts" },
  { command: "stats", description: "Host statistics" },
  { command: "logs", description: "Send the current log file" },
  { command: "killall", description: "Cancel all running downloads" },
];

type AlbumItem = InputMediaPhoto | InputMediaVideo | InputMediaAudio | InputMediaDocument;

/**
 * Split text into chunks that fit Telegram's message limit.
 * Prefers paragraph boundaries, then newlines, then sentences, then hard cut.
 */
export function chunkMessage(text: string, maxLength = MAX_MESSAGE_LENGTH): string[] {
  if (text.length <= maxLength) {
    return [text];
  }

  const chunks: string[] = [];
  let remaining = text;

  while (remaining.length > 0) {
    if (remaining.length <= maxLength) {
      chunks.push(remaining);
      break;
    }

    // Find best split point within the limit
    let splitAt = -1;

    // Try double newline (paragraph boundary)
    const lastPara = remaining.lastIndexOf("\n\n", maxLength);
    if (lastPara > maxLength * 0.3) {
      splitAt = lastPara;
    }

    // Try single newline
    if (splitAt === -1) {
      const lastNl = remaining.lastIndexOf("\n", maxLength);
      if (lastNl > maxLength * 0.3) {
        splitAt = lastNl;
      }
    }

    // Try sentence boundary (. ! ?)
    if (splitAt === -1) {
      const slice = remaining.slice(0, maxLength);
      const sentenceMatch = slice.match(/.*[.!?]\s/s);
      if (sentenceMatch && sentenceMatch[0].length > maxLength * 0.3) {
        splitAt = sentenceMatch[0].length;
      }
    }

    // Hard cut as last resort
    if (splitAt === -1) {
      splitAt = maxLength;
    }

    chunks.push(remaining.slice(0, splitAt).trimEnd());
    remaining = remaining.slice(splitAt).trimStart();
  }

  return chunks;
}

/** Length of an HTML string as Telegram counts it: tags removed, entities as one char. */
export function visibleLength(html: string): number {
  return html.replace(/<[^>]+>/g, "").replace(/&(?:#\d+|#x[0-9a-f]+|[a-z]+);/gi, "_").length;
}

/**
 * Decide where a caption goes. Captions over Telegram's limit are sent as a
 * follow-up text message instead.
 */
export function splitCaption(caption: string): { caption: string; overflow: string } {
  if (!caption.trim()) return { caption: "", overflow: "" };
  if (visibleLength(caption) <= MAX_CAPTION_LENGTH) return { caption, overflow: "" };
  return { caption: "", overflow: caption };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a Telegram API call with exponential backoff.
 * Retries on 429 (using retry_after), 5xx, and recoverable network errors.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries = MAX_SEND_RETRIES,
  baseDelay = RETRY_BASE_DELAY_MS,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxRetries) break;

      const err = error as Error & {
        error_code?: number;
        parameters?: { retry_after?: number };
      };

      const code = err.error_code;

      // Telegram API rate limit: use retry_after if provided
      if (code === 429) {
        const retryAfter = err.parameters?.retry_after;
        await sleep(retryAfter ? retryAfter * 1000 : baseDelay * 2 ** attempt);
        continue;
      }

      // Telegram server errors (5xx): exponential backoff
      if (code && code >= 500 && code < 600) {
        await sleep(baseDelay * 2 ** attempt);
        continue;
      }

      // Recoverable network errors (ECONNRESET, timeouts, fetch failures, etc.)
      if (isRecoverableTelegramNetworkError(error, "send")) {
        await sleep(baseDelay * 2 ** attempt);
        continue;
      }

      // Permanent error, don't retry
      throw error;
    }
  }

  throw lastError;
}

function isParseEntitiesError(error: unknown): boolean {
  const err = error as Error & { error_code?: number; description?: string };
  return err.error_code === 400 && err.description?.includes("can't parse entities") === true;
}

/** Bot API HTML to the plain text a user would have seen. */
export function toPlainText(html: string): string {
  return unescapeHtml(html.replace(/<[^>]+>/g, ""));
}

function replyTo(request: RequestMessage) {
  return { message_id: request.messageId, allow_sending_without_reply: true };
}

function toAlbumItem(item: OutgoingMedia): AlbumItem {
  const file = new InputFile(item.filePath);
  const options = item.caption ? { caption: item.caption, parse_mode: "HTML" as const } : {};
  switch (item.kind) {
    case "photo":
      return InputMediaBuilder.photo(file, options);
    case "video":
      return InputMediaBuilder.video(file, { ...options, supports_streaming: true });
    case "audio":
      return InputMediaBuilder.audio(file, options);
    case "document":
      return InputMediaBuilder.document(file, options);
  }
}

/**
 * Map the Bot API's upload size rejection onto a message the requester can act on.
 */
function asUploadError(error: unknown): unknown {
  if (!isUploadTooLargeError(error)) return error;
  return new TransferError("Upload rejected by the Bot API as too large", {
    cause: error,
    userMessage: "The file is too large for the Bot API. Configure telegram.api_root to use a local Bot API server.",
  });
}

/**
 * Telegram bridge implementation.
 */
export class TelegramBridge implements ChannelBridge {
  readonly name = "telegram";

  private bot: Bot | null = null;
  private handler: MessageHandler | null = null;
  private readonly allowedUsers: number[];
  private readonly apiRoot: string | undefined;

  constructor(private readonly botToken: string, options: TelegramBridgeOptions = {}) {
    this.allowedUsers = options.allowedUsers ?? [];
    this.apiRoot = options.apiRoot;
  }

  async start(): Promise<void> {
    this.bot = new Bot(this.botToken, this.apiRoot ? { client: { apiRoot: this.apiRoot } } : undefined);

    const privateChats = this.bot.chatType("private");

    privateChats.on("message:text", async (ctx) => {
      if (!this.isAllowed(ctx)) {
        await ctx.reply("Sorry, you're not authorized to use this bot.");
        return;
      }

      if (this.handler) {
        const msg: IncomingMessage = {
          chatId: ctx.chat.id,
          messageId: ctx.message.message_id,
          userId: ctx.from?.id ?? ctx.chat.id,
          text: ctx.message.text,
          raw: ctx.message,
        };
        await this.handler(msg);
      }
    });

    // Errors thrown by the handler would otherwise stop polling.
    this.bot.catch((err) => {
      console.error("[telegram] Handler error:", err.error instanceof Error ? err.error.message : String(err.error));
    });

    // Initialize bot (fetches bot info) then start polling in background
    await this.bot.init();

    try {
      await this.bot.api.setMyCommands(BOT_COMMANDS);
    } catch (err) {
      console.warn("[telegram] Could not register command menu:", (err as Error).message);
    }

    // bot.start() blocks until stopped; run it in background.
    this.bot.start({
      allowed_updates: ["message"],
    }).catch((err) => {
      if (isRecoverableTelegramNetworkError(err, "polling")) {
        console.warn("[telegram] Polling stopped (network error):", (err as Error).message);
      } else {
        console.error("[telegram] Polling error:", err);
      }
    });
    console.log(`[telegram] Bridge started as @${this.bot.botInfo.username} (polling mode)`);
  }

  async stop(): Promise<void> {
    if (this.bot) {
      await this.bot.stop();
      this.bot = null;
    }
    console.log("[telegram] Bridge stopped");
  }

  onMessage(handler: MessageHandler): void {
    this.handler = handler;
  }

  async replyText(request: RequestMessage, text: string): Promise<number> {
    const bot = this.requireBot();

    let lastMessageId = 0;
    for (const chunk of chunkMessage(text)) {
      try {
        const message = await withRetry(() =>
          bot.api.sendMessage(request.chatId, chunk, {
            parse_mode: "HTML",
            reply_parameters: replyTo(request),
            link_preview_options: { is_disabled: true },
          }),
        );
        lastMessageId = message.message_id;
      } catch (error) {
        // If HTML parsing fails, fall back to plain text
        if (!isParseEntitiesError(error)) throw error;
        console.warn("[telegram] HTML parse failed, falling back to plain text:", (error as Error).message);
        const message = await withRetry(() =>
          bot.api.sendMessage(request.chatId, toPlainText(chunk), { reply_parameters: replyTo(request) }),
        );
        lastMessageId = message.message_id;
      }
    }

    return lastMessageId;
  }

  async replyDocument(request: RequestMessage, filePath: string, caption?: string): Promise<void> {
    await this.sendMedia(request, { kind: "document", filePath, caption: caption ?? "" });
  }

  async sendMedia(request: RequestMessage, media: OutgoingMedia): Promise<void> {
    const bot = this.requireBot();
    const { caption, overflow } = splitCaption(media.caption);
    const other = {
      caption: caption || undefined,
      parse_mode: "HTML" as const,
      reply_parameters: replyTo(request),
    };

    try {
      await withRetry(async () => {
        // A fresh InputFile per attempt; a consumed stream can't be re-sent.
        const file = new InputFile(media.filePath);
        switch (media.kind) {
          case "photo":
            return bot.api.sendPhoto(request.chatId, file, other);
          case "video":
            return bot.api.sendVideo(request.chatId, file, { ...other, supports_streaming: true });
          case "audio":
            return bot.api.sendAudio(request.chatId, file, other);
          case "document":
            return bot.api.sendDocument(request.chatId, file, other);
        }
      });
    } catch (error) {
      throw asUploadError(error);
    }

    if (overflow) await this.replyText(request, overflow);
  }

  async sendMediaGroup(request: RequestMessage, items: OutgoingMedia[]): Promise<void> {
    const bot = this.requireBot();
    const overflow: string[] = [];
    const prepared = items.map((item) => {
      const split = splitCaption(item.caption);
      if (split.overflow) overflow.push(split.overflow);
      return { ...item, caption: split.caption };
    });

    try {
      await withRetry(() =>
        bot.api.sendMediaGroup(request.chatId, prepared.map(toAlbumItem), {
          reply_parameters: replyTo(request),
        }),
      );
    } catch (error) {
      throw asUploadError(error);
    }

    for (const text of overflow) {
      await this.replyText(request, text);
    }
  }

  async editText(chatId: number, messageId: number, text: string): Promise<void> {
    const bot = this.requireBot();
    try {
      await withRetry(() => bot.api.editMessageText(chatId, messageId, text, { parse_mode: "HTML" }));
    } catch (error) {
      // Ignore "message is not modified" errors
      const err = error as Error & { description?: string };
      if (!err.description?.includes("message is not modified")) {
        throw error;
      }
    }
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    const bot = this.requireBot();
    await withRetry(() => bot.api.deleteMessage(chatId, messageId));
  }

  private requireBot(): Bot {
    if (!this.bot) {
      throw new Error("Bot not started");
    }
    return this.bot;
  }

  /**
   * Check if user is allowed to use the bot.
   */
  private isAllowed(ctx: Context): boolean {
    // If no allowed users specified, allow all
    if (this.allowedUsers.length === 0) {
      return true;
    }

    const userId = ctx.from?.id;
    if (!userId) {
      return false;
    }

    return this.allowedUsers.includes(userId);
  }
}
