/**
 * Command handling.
 *
 * Handles /start, /help, /dl, /bdl, /stats, /logs and /killall, plus bare
 * post links. Long-running work (fetches, batches) is spawned through the
 * task manager and never awaited here: grammy handles updates one at a time,
 * and /killall has to get through while downloads are running.
 */

import { formatBatchSummary, runBatch, type BatchRequest, type BatchResult } from "./batch.js";
import type { IncomingMessage, RequestMessage } from "./channels/types.js";
import { InvalidReferenceError, errorMessage } from "./errors.js";
import { fetchPost, fetchPostFromLink, type FetchContext } from "./fetcher.js";
import { escapeHtml } from "./format.js";
import { formatPostLink, parsePostLink, sameChannel, type PostReference } from "./links.js";
import { latestLogFile } from "./logger.js";
import { collectStats, formatStats, type StatsSnapshot } from "./stats.js";
import type { TaskHandle, TaskManager } from "./task-manager.js";

export const START_TEXT =
  "👋 <b>Welcome to the post relay bot!</b>\n\n" +
  "I can download media from Telegram posts, including restricted channels.\n" +
  "Send a link directly or use <code>/dl &lt;link&gt;</code>.\n" +
  "Use <code>/bdl</code> for batch downloads.\n\n" +
  "ℹ️ Use <code>/help</code> for more details.\n" +
  "🔒 Ensure the user session has access to the channel.";

export const HELP_TEXT =
  "💡 <b>Post relay bot help</b>\n\n" +
  "➤ <b>Download Media</b>\n" +
  "   - Use <code>/dl &lt;post_URL&gt;</code> or paste a Telegram post link.\n\n" +
  "➤ <b>Batch Download</b>\n" +
  "   - Use <code>/bdl &lt;start_link&gt; &lt;end_link&gt;</code> to download a range of posts.\n" +
  "     Example: <code>/bdl https://t.me/channel/100 https://t.me/channel/120</code>\n\n" +
  "➤ <b>Requirements</b>\n" +
  "   - User session must have access to the channel.\n\n" +
  "➤ <b>Commands</b>\n" +
  "   - <code>/killall</code>: Cancel all running downloads.\n" +
  "   - <code>/logs</code>: Download bot logs.\n" +
  "   - <code>/stats</code>: View bot status.\n\n" +
  "Example: <code>/dl https://t.me/channel/547</code>";

export const BDL_USAGE_TEXT =
  "🚀 <b>Batch Download</b>\n" +
  "Use: <code>/bdl &lt;start_link&gt; &lt;end_link&gt;</code>\n" +
  "Example: <code>/bdl https://t.me/channel/100 https://t.me/channel/120</code>";

const BATCH_LINK_PREFIX = "https://t.me/";

export interface CommandContext {
  fetch: FetchContext;
  tasks: TaskManager;
  dataDir: string;
  batchWindow: number;
  /** Process start, in milliseconds. */
  startedAt: number;
  /** Overrides host sampling. Injected by tests. */
  stats?: () => Promise<StatsSnapshot>;
}

interface ParsedCommand {
  name: string;
  args: string[];
}

/**
 * Split "/name@bot arg1 arg2" into its parts. Null for non-command text.
 */
export function parseCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([A-Za-z0-9_]+)(?:@[A-Za-z0-9_]+)?(?:\s+([\s\S]*))?$/);
  if (!match) return null;
  const rest = match[2] ?? "";
  return {
    name: match[1].toLowerCase(),
    args: rest.split(/\s+/).filter(Boolean),
  };
}

async function reply(ctx: CommandContext, msg: RequestMessage, text: string): Promise<void> {
  await ctx.fetch.replies.replyText(msg, text);
}

function track<T>(handle: TaskHandle<T>): TaskHandle<T> {
  handle.promise.catch((err) => {
    console.error(`[commands] Task ${handle.taskId} (${handle.label}) failed:`, errorMessage(err));
  });
  return handle;
}

function spawnFetch(ctx: CommandContext, msg: IncomingMessage, url: string): TaskHandle<unknown> {
  return track(
    ctx.tasks.spawn(`dl ${url}`, (signal) => fetchPostFromLink(ctx.fetch, msg, url, signal)),
  );
}

/**
 * Run one /bdl range: status message, windows, summary reply.
 */
async function runBatchCommand(
  ctx: CommandContext,
  msg: RequestMessage,
  request: BatchRequest,
  signal: AbortSignal,
): Promise<BatchResult> {
  const { replies, source } = ctx.fetch;
  const statusId = await replies.replyText(
    msg,
    `📥 <b>Downloading posts ${request.startId}–${request.endId}…</b>`,
  );

  let result: BatchResult;
  try {
    result = await runBatch(
      request,
      {
        tasks: ctx.tasks,
        resolve: (ref) => source.getMessage(ref),
        fetch: (ref, message, childSignal) =>
          fetchPost(ctx.fetch, { request: msg, reference: ref, message }, childSignal),
      },
      signal,
    );
  } catch (err) {
    await reply(ctx, msg, `<b>❌ Error: ${escapeHtml(errorMessage(err))}</b>`);
    throw err;
  } finally {
    try {
      await replies.deleteMessage(msg.chatId, statusId);
    } catch (err) {
      console.warn("[commands] Could not delete batch status message:", errorMessage(err));
    }
  }

  console.log(
    `[commands] Batch ${request.startId}-${request.endId} done: ` +
    `${result.downloaded} downloaded, ${result.skipped} skipped, ${result.failed} failed` +
    (result.cancelled ? " (cancelled)" : ""),
  );
  await reply(ctx, msg, formatBatchSummary(result));
  return result;
}

async function handleBatch(
  ctx: CommandContext,
  msg: IncomingMessage,
  args: string[],
): Promise<TaskHandle<unknown> | null> {
  if (args.length !== 2 || !args.every((arg) => arg.startsWith(BATCH_LINK_PREFIX))) {
    await reply(ctx, msg, BDL_USAGE_TEXT);
    return null;
  }

  let start: PostReference;
  let end: PostReference;
  try {
    start = parsePostLink(args[0]);
    end = parsePostLink(args[1]);
  } catch (err) {
    const text = err instanceof InvalidReferenceError ? err.userMessage : errorMessage(err);
    await reply(ctx, msg, `<b>${escapeHtml(text)}</b>`);
    return null;
  }

  if (!sameChannel(start, end)) {
    await reply(ctx, msg, "<b>Links must be from the same channel.</b>");
    return null;
  }
  if (start.messageId > end.messageId) {
    await reply(ctx, msg, "<b>Start ID cannot exceed end ID.</b>");
    return null;
  }

  const request: BatchRequest = {
    channel: start.channel,
    startId: start.messageId,
    endId: end.messageId,
    windowSize: ctx.batchWindow,
  };
  return track(
    ctx.tasks.spawn(`bdl ${formatPostLink(start)}-${end.messageId}`, (signal) =>
      runBatchCommand(ctx, msg, request, signal),
    ),
  );
}

async function handleStats(ctx: CommandContext, msg: IncomingMessage): Promise<void> {
  const snapshot = ctx.stats
    ? await ctx.stats()
    : await collectStats({ dataDir: ctx.dataDir, startedAt: ctx.startedAt });
  await reply(ctx, msg, formatStats(snapshot));
}

async function handleLogs(ctx: CommandContext, msg: IncomingMessage): Promise<void> {
  const logFile = latestLogFile(ctx.dataDir);
  if (!logFile) {
    await reply(ctx, msg, "<b>No logs available.</b>");
    return;
  }
  await ctx.fetch.replies.replyDocument(msg, logFile, "<b>Bot Logs</b>");
}

/**
 * Handle one private-chat text message. Returns the spawned task for /dl,
 * /bdl and bare links so callers (and tests) can follow it; null otherwise.
 */
export async function handleMessage(
  msg: IncomingMessage,
  ctx: CommandContext,
): Promise<TaskHandle<unknown> | null> {
  const text = msg.text.trim();
  if (!text) return null;

  const command = parseCommand(text);
  if (!command) {
    return spawnFetch(ctx, msg, text);
  }

  switch (command.name) {
    case "start":
      await reply(ctx, msg, START_TEXT);
      return null;

    case "help":
      await reply(ctx, msg, HELP_TEXT);
      return null;

    case "dl":
      if (command.args.length < 1) {
        await reply(ctx, msg, "<b>Provide a post URL after /dl.</b>");
        return null;
      }
      return spawnFetch(ctx, msg, command.args[0]);

    case "bdl":
      return handleBatch(ctx, msg, command.args);

    case "stats":
      await handleStats(ctx, msg);
      return null;

    case "logs":
      await handleLogs(ctx, msg);
      return null;

    case "killall": {
      const cancelled = ctx.tasks.cancelAll();
      console.log(`[commands] /killall cancelled ${cancelled} task(s)`);
      await reply(ctx, msg, `<b>Cancelled ${cancelled} task(s).</b>`);
      return null;
    }

    default:
      console.log(`[commands] Ignoring unknown command /${command.name}`);
      return null;
  }
}
