/**
 * Bot-side channel interfaces.
 *
 * The bot identity receives commands and sends everything back to the chat
 * a request came from. Telegram (grammy) is the only implementation; the
 * fetcher and command handlers depend on these interfaces so tests can swap
 * in a recorder.
 */

import type { MediaKind } from "../content.js";

/** The command message a reply belongs to. */
export interface RequestMessage {
  chatId: number;
  /** Id of the request message; replies thread under it. */
  messageId: number;
  userId: number;
}

export interface IncomingMessage extends RequestMessage {
  /** Message text content */
  text: string;
  /** Platform-specific raw message object */
  raw: unknown;
}

export interface OutgoingMedia {
  kind: MediaKind;
  filePath: string;
  /** Telegram HTML caption; empty for none. */
  caption: string;
}

export interface ReplyChannel {
  /** Reply with HTML text. Returns the id of the (last) message sent. */
  replyText(request: RequestMessage, text: string): Promise<number>;

  replyDocument(request: RequestMessage, filePath: string, caption?: string): Promise<void>;

  /** Upload one media file as the given kind. */
  sendMedia(request: RequestMessage, media: OutgoingMedia): Promise<void>;

  /** Upload 2-10 items as one album. */
  sendMediaGroup(request: RequestMessage, items: OutgoingMedia[]): Promise<void>;

  editText(chatId: number, messageId: number, text: string): Promise<void>;

  deleteMessage(chatId: number, messageId: number): Promise<void>;
}

export interface ChannelBridge extends ReplyChannel {
  readonly name: string;

  start(): Promise<void>;
  stop(): Promise<void>;

  /** Register a handler for incoming messages. */
  onMessage(handler: (msg: IncomingMessage) => Promise<void>): void;
}
