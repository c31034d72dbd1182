/**
 * Batch-range controller.
 *
 * Walks an inclusive id range in fixed windows. Inside a window ids are
 * resolved one after another; each post with content is handed to a fetch
 * spawned as a child task, and the whole window settles before the next one
 * starts. Peak concurrency is therefore one window's worth of transfers.
 */

import { hasContent } from "./content.js";
import { errorMessage } from "./errors.js";
import type { FetchOutcome } from "./fetcher.js";
import { formatPostLink, type ChannelId, type PostReference } from "./links.js";
import type { SourceMessage } from "./source.js";
import type { TaskManager } from "./task-manager.js";

export const DEFAULT_BATCH_WINDOW = 10;

export interface BatchRequest {
  channel: ChannelId;
  startId: number;
  endId: number;
  windowSize: number;
}

export interface BatchResult {
  downloaded: number;
  skipped: number;
  failed: number;
  /** True when the batch was aborted before the last window. */
  cancelled: boolean;
}

export interface BatchDeps {
  tasks: TaskManager;
  /** Resolve one id; null when nothing is there. */
  resolve(ref: PostReference): Promise<SourceMessage | null>;
  /** Relay one resolved post. Runs as a child task of the batch. */
  fetch(ref: PostReference, message: SourceMessage, signal: AbortSignal): Promise<FetchOutcome>;
}

/**
 * Consecutive windows covering [startId, endId].
 */
export function planWindows(startId: number, endId: number, windowSize: number): Array<[number, number]> {
  const size = Math.max(1, Math.floor(windowSize));
  const windows: Array<[number, number]> = [];
  for (let first = startId; first <= endId; first += size) {
    windows.push([first, Math.min(first + size - 1, endId)]);
  }
  return windows;
}

function tally(result: BatchResult, outcome: FetchOutcome): void {
  switch (outcome.status) {
    case "sent":
    case "text":
      result.downloaded++;
      break;
    case "skipped":
      result.skipped++;
      break;
    case "failed":
    case "cancelled":
      result.failed++;
      break;
  }
}

/**
 * Promise.allSettled over `running`, or null as soon as `signal` aborts.
 */
async function settleUnlessAborted<T>(
  running: Array<Promise<T>>,
  signal: AbortSignal,
): Promise<Array<PromiseSettledResult<T>> | null> {
  const all = Promise.allSettled(running);
  if (signal.aborted) return null;

  let onAbort = (): void => {};
  const aborted = new Promise<null>((resolve) => {
    onAbort = () => resolve(null);
    signal.addEventListener("abort", onAbort, { once: true });
  });
  try {
    return await Promise.race([all, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}

export async function runBatch(request: BatchRequest, deps: BatchDeps, signal: AbortSignal): Promise<BatchResult> {
  if (request.startId > request.endId) {
    throw new RangeError(`Start id ${request.startId} exceeds end id ${request.endId}`);
  }

  const result: BatchResult = { downloaded: 0, skipped: 0, failed: 0, cancelled: false };

  for (const [first, last] of planWindows(request.startId, request.endId, request.windowSize)) {
    const running: Array<Promise<FetchOutcome>> = [];

    for (let messageId = first; messageId <= last; messageId++) {
      if (signal.aborted) break;
      const ref: PostReference = { channel: request.channel, messageId };

      let message: SourceMessage | null;
      try {
        message = await deps.resolve(ref);
      } catch (err) {
        result.failed++;
        console.error(`[batch] Error at ${formatPostLink(ref)}:`, errorMessage(err));
        continue;
      }

      if (!hasContent(message)) {
        result.skipped++;
        continue;
      }

      const resolved = message;
      const handle = deps.tasks.spawn(
        formatPostLink(ref),
        (childSignal) => deps.fetch(ref, resolved, childSignal),
        { signal },
      );
      running.push(handle.promise);
    }

    // A cancelled window is not waited for; uploads already in flight finish
    // in the background.
    const settled = await settleUnlessAborted(running, signal);

    if (settled === null || signal.aborted) {
      result.cancelled = true;
      console.log(
        `[batch] Cancelled at window ${first}-${last} after ${result.downloaded} posts`,
      );
      return result;
    }

    for (const entry of settled) {
      if (entry.status === "fulfilled") {
        tally(result, entry.value);
      } else {
        result.failed++;
        console.error("[batch] Fetch crashed:", errorMessage(entry.reason));
      }
    }
  }

  return result;
}

export function formatBatchSummary(result: BatchResult): string {
  if (result.cancelled) {
    return `<b>❌ Batch canceled after ${result.downloaded} posts.</b>`;
  }
  return (
    "<b>✅ Batch Complete!</b>\n" +
    `📥 Downloaded: <code>${result.downloaded}</code>\n` +
    `⏭️ Skipped: <code>${result.skipped}</code>\n` +
    `❌ Failed: <code>${result.failed}</code>`
  );
}
