/**
 * Task manager: in-memory tracking of in-flight fetches and batches.
 *
 * Each entry owns an AbortController. Entries register on spawn and are
 * removed when their promise settles, whatever the outcome, so the map only
 * ever holds running work. /killall aborts everything in it.
 */

import crypto from "node:crypto";
import { TaskCancelledError } from "./errors.js";

export interface TaskInfo {
  taskId: string;
  /** Short description, e.g. the post link being fetched. */
  label: string;
  startedAt: Date;
}

export interface TaskHandle<T> extends TaskInfo {
  signal: AbortSignal;
  promise: Promise<T>;
  /** Request cancellation. Returns false when the task already settled or was cancelled. */
  cancel(): boolean;
}

export interface SpawnOptions {
  /** Parent signal: aborting it cancels this task too. */
  signal?: AbortSignal;
}

export interface TaskManager {
  /** Start `run` as a tracked task. */
  spawn<T>(label: string, run: (signal: AbortSignal) => Promise<T>, options?: SpawnOptions): TaskHandle<T>;

  /** Cancel every running task. Returns how many were actually cancelled. */
  cancelAll(): number;

  /** Number of tasks still running. */
  size(): number;

  list(): TaskInfo[];
}

interface TaskEntry extends TaskInfo {
  controller: AbortController;
  settled: boolean;
}

function cancelEntry(entry: TaskEntry): boolean {
  if (entry.settled || entry.controller.signal.aborted) return false;
  entry.controller.abort(new TaskCancelledError());
  return true;
}

export function createTaskManager(): TaskManager {
  const entries = new Map<string, TaskEntry>();

  return {
    spawn<T>(label: string, run: (signal: AbortSignal) => Promise<T>, options: SpawnOptions = {}): TaskHandle<T> {
      const taskId = `t-${crypto.randomUUID().slice(0, 8)}`;
      const controller = new AbortController();
      const entry: TaskEntry = { taskId, label, startedAt: new Date(), controller, settled: false };
      entries.set(taskId, entry);

      const parent = options.signal;
      const onParentAbort = (): void => {
        cancelEntry(entry);
      };
      if (parent?.aborted) {
        cancelEntry(entry);
      } else {
        parent?.addEventListener("abort", onParentAbort, { once: true });
      }

      const promise = (async () => {
        try {
          return await run(controller.signal);
        } finally {
          entry.settled = true;
          entries.delete(taskId);
          parent?.removeEventListener("abort", onParentAbort);
        }
      })();

      return {
        taskId,
        label,
        startedAt: entry.startedAt,
        signal: controller.signal,
        promise,
        cancel: () => cancelEntry(entry),
      };
    },

    cancelAll() {
      // Snapshot first: aborting a batch cascades to its child fetches, which
      // still count as cancelled by this call.
      const live = Array.from(entries.values()).filter(
        (entry) => !entry.settled && !entry.controller.signal.aborted,
      );
      for (const entry of live) cancelEntry(entry);
      return live.length;
    },

    size() {
      return entries.size;
    },

    list() {
      return Array.from(entries.values(), ({ taskId, label, startedAt }) => ({ taskId, label, startedAt }));
    },
  };
}
