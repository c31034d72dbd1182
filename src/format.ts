/**
 * Human-readable sizes and durations for status messages.
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB", "PB"] as const;

/**
 * Format a byte count with binary multiples, e.g. 1536 -> "1.50 KB".
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return "0 B";
  let value = bytes;
  let index = 0;
  while (value >= 1024 && index < SIZE_UNITS.length - 1) {
    value /= 1024;
    index++;
  }
  return `${value.toFixed(2)} ${SIZE_UNITS[index]}`;
}

/**
 * Format seconds as a compact duration, e.g. 3725 -> "1h2m5s".
 * Null or non-finite values (no speed measured yet) render as "unknown".
 */
export function formatDuration(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds)) return "unknown";
  let remainder = Math.max(0, Math.floor(seconds));
  let result = "";

  const days = Math.floor(remainder / 86_400);
  remainder %= 86_400;
  if (days) result += `${days}d`;

  const hours = Math.floor(remainder / 3_600);
  remainder %= 3_600;
  if (hours) result += `${hours}h`;

  const minutes = Math.floor(remainder / 60);
  remainder %= 60;
  if (minutes) result += `${minutes}m`;

  return `${result}${remainder}s`;
}

/**
 * Escape the three HTML special characters that Telegram HTML mode requires.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

const HTML_ENTITIES: Record<string, string> = { amp: "&", lt: "<", gt: ">", quot: '"', apos: "'" };

/**
 * Decode the named entities Telegram's HTML uses and numeric references.
 * One pass, so "&amp;lt;" becomes "&lt;", not "<".
 */
export function unescapeHtml(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, name: string) => {
    if (name.startsWith("#")) {
      const code = name[1] === "x" || name[1] === "X" ? Number.parseInt(name.slice(2), 16) : Number(name.slice(1));
      return code <= 0x10ffff ? String.fromCodePoint(code) : entity;
    }
    return HTML_ENTITIES[name.toLowerCase()] ?? entity;
  });
}
