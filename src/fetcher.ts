/**
 * Single-post fetcher.
 *
 * Resolving -> SizeCheck -> Downloading -> Uploading -> Cleanup -> Done.
 *
 * Each stage returns a StageResult; the first failed stage becomes the one
 * message the requester sees. Cleanup (local artifacts, the progress status
 * message) runs in finally blocks, so it also happens on errors and on
 * cancellation. fetchPost never throws.
 */

import path from "node:path";
import type { ReplyChannel, RequestMessage, OutgoingMedia } from "./channels/types.js";
import {
  captionFor,
  classifyContent,
  isMediaContent,
  mediaFileName,
  type MediaKind,
  type Content,
} from "./content.js";
import {
  InvalidReferenceError,
  TransferError,
  UnknownError,
  errorMessage,
  ok,
  runStage,
  type RelayError,
  type StageResult,
} from "./errors.js";
import { createFetchDir, removeFetchDir, removeStrayArtifact } from "./files.js";
import { escapeHtml } from "./format.js";
import { formatPostLink, parsePostLink, type PostReference } from "./links.js";
import { createProgressReporter, type ProgressReporter } from "./progress.js";
import { checkFileSize, type SizeLimits } from "./size-guard.js";
import type { MediaFile, PostSource, SourceMessage } from "./source.js";

/** Telegram accepts at most 10 items per album. */
const MAX_ALBUM_SIZE = 10;

export interface FetchContext {
  source: PostSource;
  replies: ReplyChannel;
  /** Root of the ephemeral download directories. */
  downloadsDir: string;
  limits: SizeLimits;
  progressIntervalMs?: number;
  /** Clock for progress throttling. Injected by tests. */
  now?: () => number;
}

export interface FetchJob {
  request: RequestMessage;
  reference: PostReference;
  /**
   * Message already resolved by the caller (batch probing). When present
   * the Resolving stage is skipped; null means "resolved, nothing there".
   */
  message?: SourceMessage | null;
}

export type FetchOutcome =
  | { status: "sent"; kind: MediaKind | "grouped"; items: number }
  | { status: "text" }
  | { status: "skipped"; reason: "size_limit" | "empty" }
  | { status: "failed"; error: RelayError }
  | { status: "cancelled" };

const CANCELLED: FetchOutcome = { status: "cancelled" };

const NO_CONTENT_TEXT = "<b>No media or text found in the post.</b>";
const GROUP_FAILED_TEXT = "Could not extract valid media from the group.";

/**
 * Run a best-effort side step (status edit, cleanup). Failures are logged,
 * never propagated.
 */
async function bestEffort(label: string, fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    console.warn(`[fetch] ${label} failed:`, errorMessage(err));
  }
}

async function sizeCheck(ctx: FetchContext, file: MediaFile) {
  if (!file.size) return null;
  const privileged = await ctx.source.isPremium();
  return checkFileSize(file.size, privileged, ctx.limits);
}

function makeReporter(ctx: FetchContext, request: RequestMessage, statusId: number, action: string): ProgressReporter {
  return createProgressReporter({
    action,
    emit: (text) => ctx.replies.editText(request.chatId, statusId, text),
    intervalMs: ctx.progressIntervalMs,
    now: ctx.now,
  });
}

async function relaySingle(
  ctx: FetchContext,
  job: FetchJob,
  message: SourceMessage,
  content: { kind: MediaKind; file: MediaFile },
  signal?: AbortSignal,
): Promise<FetchOutcome> {
  const rejection = await sizeCheck(ctx, content.file);
  if (rejection) {
    console.log(`[fetch] ${formatPostLink(job.reference)} skipped: ${rejection.message}`);
    await ctx.replies.replyText(job.request, `<b>${escapeHtml(rejection.userMessage)}</b>`);
    return { status: "skipped", reason: "size_limit" };
  }
  if (signal?.aborted) return CANCELLED;

  const statusId = await ctx.replies.replyText(job.request, "📥 <b>Downloading...</b>");
  const reporter = makeReporter(ctx, job.request, statusId, "Downloading");
  let dir: string | null = null;
  let artifact: string | null = null;

  try {
    dir = createFetchDir(ctx.downloadsDir, job.request.messageId, job.reference);
    const filePath = path.join(dir, mediaFileName(message.id, content.kind, content.file));
    const downloaded = await runStage("download", () =>
      ctx.source.download(message, filePath, (done, total) => reporter.report(done, total), signal),
    );
    if (signal?.aborted) return CANCELLED;
    if (!downloaded.ok) return { status: "failed", error: downloaded.error };
    const localFile = downloaded.value;
    artifact = localFile;
    console.log(`[fetch] Downloaded ${formatPostLink(job.reference)} to ${localFile}`);

    await reporter.settle();
    await bestEffort("status edit", () =>
      ctx.replies.editText(job.request.chatId, statusId, "📤 <b>Uploading...</b>"),
    );

    const uploaded = await runStage("upload", () =>
      ctx.replies.sendMedia(job.request, {
        kind: content.kind,
        filePath: localFile,
        caption: captionFor(message),
      }),
    );
    if (!uploaded.ok) return { status: "failed", error: uploaded.error };

    return { status: "sent", kind: content.kind, items: 1 };
  } finally {
    await reporter.settle();
    await cleanupFetch(dir, artifact === null ? [] : [artifact]);
    await bestEffort("status delete", () => ctx.replies.deleteMessage(job.request.chatId, statusId));
  }
}

async function cleanupFetch(dir: string | null, artifacts: string[]): Promise<void> {
  if (dir === null) return;
  const fetchDir = dir;
  for (const artifact of artifacts) {
    await bestEffort("cleanup", () => removeStrayArtifact(fetchDir, artifact));
  }
  await bestEffort("cleanup", () => removeFetchDir(fetchDir));
}

/**
 * Split album items the way Telegram accepts them: photos and videos mix,
 * audio and documents only group with their own kind, at most 10 per album.
 */
export function planAlbums(items: OutgoingMedia[]): OutgoingMedia[][] {
  const buckets = new Map<string, OutgoingMedia[]>();
  for (const item of items) {
    const key = item.kind === "photo" || item.kind === "video" ? "visual" : item.kind;
    const bucket = buckets.get(key) ?? [];
    bucket.push(item);
    buckets.set(key, bucket);
  }

  const albums: OutgoingMedia[][] = [];
  for (const bucket of buckets.values()) {
    for (let i = 0; i < bucket.length; i += MAX_ALBUM_SIZE) {
      albums.push(bucket.slice(i, i + MAX_ALBUM_SIZE));
    }
  }
  return albums;
}

/**
 * Send collected album items. Falls back to one-by-one uploads when an album
 * is rejected. Returns the number of items delivered.
 */
async function deliverAlbums(
  ctx: FetchContext,
  request: RequestMessage,
  items: OutgoingMedia[],
  signal?: AbortSignal,
): Promise<number> {
  let delivered = 0;
  for (const album of planAlbums(items)) {
    if (signal?.aborted) break;

    if (album.length > 1) {
      try {
        await ctx.replies.sendMediaGroup(request, album);
        delivered += album.length;
        continue;
      } catch (err) {
        console.warn("[fetch] Album upload failed, sending items individually:", errorMessage(err));
      }
    }

    for (const item of album) {
      try {
        await ctx.replies.sendMedia(request, item);
        delivered++;
      } catch (err) {
        console.error(`[fetch] Upload of ${item.filePath} failed:`, errorMessage(err));
      }
    }
  }
  return delivered;
}

async function relayMediaGroup(
  ctx: FetchContext,
  job: FetchJob,
  anchor: SourceMessage,
  signal?: AbortSignal,
): Promise<FetchOutcome> {
  const group = await runStage("resolve", () => ctx.source.getMediaGroup(job.reference, anchor));
  if (signal?.aborted) return CANCELLED;
  if (!group.ok) return { status: "failed", error: group.error };

  const members = group.value;
  const statusId = await ctx.replies.replyText(job.request, `📥 <b>Downloading ${members.length} items...</b>`);
  const artifacts: string[] = [];
  const collected: OutgoingMedia[] = [];
  let dir: string | null = null;

  try {
    dir = createFetchDir(ctx.downloadsDir, job.request.messageId, job.reference);
    for (const [index, member] of members.entries()) {
      if (signal?.aborted) return CANCELLED;

      const content: Content = classifyContent({ ...member, groupedId: null });
      if (!isMediaContent(content)) continue;

      const rejection = await sizeCheck(ctx, content.file);
      if (rejection) {
        console.log(`[fetch] Album item ${member.id} skipped: ${rejection.message}`);
        continue;
      }

      const target = path.join(dir, mediaFileName(member.id, content.kind, content.file));
      const reporter = makeReporter(ctx, job.request, statusId, `Downloading ${index + 1}/${members.length}`);

      const result = await runStage("download", () =>
        ctx.source.download(member, target, (done, total) => reporter.report(done, total), signal),
      );
      await reporter.settle();
      if (signal?.aborted) return CANCELLED;
      if (!result.ok) {
        console.warn(`[fetch] Album item ${member.id} failed:`, result.error.message);
        continue;
      }
      artifacts.push(result.value);
      collected.push({ kind: content.kind, filePath: result.value, caption: captionFor(member) });
    }

    const delivered = collected.length > 0 ? await deliverAlbums(ctx, job.request, collected, signal) : 0;
    if (signal?.aborted) return CANCELLED;
    if (delivered === 0) {
      return {
        status: "failed",
        error: new TransferError(`No usable media in album ${anchor.groupedId ?? ""}`, {
          userMessage: GROUP_FAILED_TEXT,
        }),
      };
    }
    return { status: "sent", kind: "grouped", items: delivered };
  } finally {
    await cleanupFetch(dir, artifacts);
    await bestEffort("status delete", () => ctx.replies.deleteMessage(job.request.chatId, statusId));
  }
}

async function relay(ctx: FetchContext, job: FetchJob, signal?: AbortSignal): Promise<FetchOutcome> {
  const resolved: StageResult<SourceMessage | null> =
    job.message !== undefined
      ? ok(job.message)
      : await runStage("resolve", () => ctx.source.getMessage(job.reference));
  if (signal?.aborted) return CANCELLED;
  if (!resolved.ok) return { status: "failed", error: resolved.error };

  const message = resolved.value;
  const content: Content = message ? classifyContent(message) : { kind: "empty" };
  console.log(`[fetch] ${formatPostLink(job.reference)}: ${content.kind}`);

  if (!message || content.kind === "empty") {
    await ctx.replies.replyText(job.request, NO_CONTENT_TEXT);
    return { status: "skipped", reason: "empty" };
  }

  switch (content.kind) {
    case "text":
      await ctx.replies.replyText(job.request, content.text);
      return { status: "text" };
    case "grouped":
      return relayMediaGroup(ctx, job, message, signal);
    default:
      return relaySingle(ctx, job, message, content, signal);
  }
}

async function reportFailure(ctx: FetchContext, job: FetchJob, error: RelayError): Promise<void> {
  console.error(`[fetch] Error relaying ${formatPostLink(job.reference)}:`, error.message);
  await bestEffort("error reply", () => ctx.replies.replyText(job.request, `<b>${escapeHtml(error.userMessage)}</b>`));
}

/**
 * Relay one post to the requester. Never throws: failures are replied to
 * the requester and returned as a "failed" outcome.
 */
export async function fetchPost(ctx: FetchContext, job: FetchJob, signal?: AbortSignal): Promise<FetchOutcome> {
  let outcome: FetchOutcome;
  try {
    outcome = await relay(ctx, job, signal);
  } catch (err) {
    if (signal?.aborted) return CANCELLED;
    outcome = { status: "failed", error: new UnknownError(errorMessage(err), { cause: err }) };
  }
  if (outcome.status === "failed") await reportFailure(ctx, job, outcome.error);
  return outcome;
}

/**
 * Parse `url` and relay the post it names. Invalid links are answered
 * directly without touching the session.
 */
export async function fetchPostFromLink(
  ctx: FetchContext,
  request: RequestMessage,
  url: string,
  signal?: AbortSignal,
): Promise<FetchOutcome> {
  let reference: PostReference;
  try {
    reference = parsePostLink(url);
  } catch (err) {
    const error = err instanceof InvalidReferenceError ? err : new InvalidReferenceError(errorMessage(err));
    await bestEffort("error reply", () => ctx.replies.replyText(request, `<b>${escapeHtml(error.userMessage)}</b>`));
    return { status: "failed", error };
  }
  return fetchPost(ctx, { request, reference }, signal);
}
