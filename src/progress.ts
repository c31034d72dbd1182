/**
 * Throttled transfer progress.
 *
 * Downloads report byte counts many times per second. Each report that comes
 * at least `intervalMs` after the previous emitted update (the first one
 * measured from the transfer start) turns into one status-message edit.
 * Telegram rate-limits message edits, so the default is 10 seconds.
 *
 * Edits are best-effort: a failed edit is logged and the transfer continues.
 */

import { escapeHtml, formatBytes, formatDuration } from "./format.js";

export const DEFAULT_PROGRESS_INTERVAL_MS = 10_000;

export interface ProgressSnapshot {
  transferred: number;
  total: number;
  /** 0-100 */
  percent: number;
  /** Average bytes per second since the transfer started. */
  speed: number;
  /** Seconds remaining at the current average speed; null when speed is 0. */
  eta: number | null;
}

export interface ProgressReporterOptions {
  /** Verb shown in the status message, e.g. "Downloading". */
  action: string;
  /** Edits the status message. */
  emit: (text: string) => Promise<void>;
  intervalMs?: number;
  /** Clock in milliseconds. Injected by tests. */
  now?: () => number;
}

export interface ProgressReporter {
  report(transferred: number, total: number): void;
  /** Number of status updates emitted so far. */
  readonly emitted: number;
  /** Wait for an in-flight status edit to finish. */
  settle(): Promise<void>;
}

/**
 * Compute percentage, average speed and ETA for a transfer that started at
 * `startedAt` (both in milliseconds).
 */
export function computeProgress(
  transferred: number,
  total: number,
  startedAt: number,
  now: number,
): ProgressSnapshot {
  const elapsedSeconds = (now - startedAt) / 1000;
  const percent = total > 0 ? Math.min(100, (transferred / total) * 100) : 0;
  const speed = elapsedSeconds > 0 ? transferred / elapsedSeconds : 0;
  const eta = speed > 0 ? Math.max(0, total - transferred) / speed : null;
  return { transferred, total, percent, speed, eta };
}

export function formatProgress(action: string, snapshot: ProgressSnapshot): string {
  return (
    `<b>${escapeHtml(action)}...</b>\n` +
    `Progress: ${snapshot.percent.toFixed(1)}%\n` +
    `Transferred: ${formatBytes(snapshot.transferred)} / ${formatBytes(snapshot.total)}\n` +
    `Speed: ${formatBytes(snapshot.speed)}/s\n` +
    `ETA: ${formatDuration(snapshot.eta)}`
  );
}

export function createProgressReporter(options: ProgressReporterOptions): ProgressReporter {
  const now = options.now ?? Date.now;
  const intervalMs = options.intervalMs ?? DEFAULT_PROGRESS_INTERVAL_MS;
  const startedAt = now();
  let lastEmitAt = startedAt;
  let emitted = 0;
  let inFlight: Promise<void> | null = null;

  return {
    report(transferred: number, total: number): void {
      const current = now();
      if (current - lastEmitAt < intervalMs || inFlight) return;

      lastEmitAt = current;
      emitted++;
      const text = formatProgress(options.action, computeProgress(transferred, total, startedAt, current));
      inFlight = options
        .emit(text)
        .catch((err) => {
          console.warn("[progress] Status update failed:", (err as Error).message);
        })
        .finally(() => {
          inFlight = null;
        });
    },

    get emitted(): number {
      return emitted;
    },

    async settle(): Promise<void> {
      if (inFlight) await inFlight;
    },
  };
}
