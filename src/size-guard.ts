/**
 * Transfer size policy. Accounts with Telegram Premium get the larger
 * ceiling; a size of 0 means "unknown" and is always permitted.
 */

import { SizeLimitExceeded } from "./errors.js";
import { formatBytes } from "./format.js";

export interface SizeLimits {
  /** Ceiling for regular accounts, in bytes. */
  maxFileSize: number;
  /** Ceiling for premium (elevated) accounts, in bytes. */
  premiumMaxFileSize: number;
}

export const DEFAULT_SIZE_LIMITS: SizeLimits = {
  maxFileSize: 2_097_152_000,
  premiumMaxFileSize: 4_194_304_000,
};

/**
 * Returns null when the transfer is permitted, otherwise the rejection with
 * the notice to show the requester.
 */
export function checkFileSize(
  size: number,
  privileged: boolean,
  limits: SizeLimits = DEFAULT_SIZE_LIMITS,
): SizeLimitExceeded | null {
  if (!size || size <= 0) return null;

  const limit = privileged ? limits.premiumMaxFileSize : limits.maxFileSize;
  if (size <= limit) return null;

  return new SizeLimitExceeded(
    size,
    limit,
    `The file size exceeds the ${formatBytes(limit)} limit and cannot be downloaded.`,
  );
}
