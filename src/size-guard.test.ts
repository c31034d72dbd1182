import { describe, it, expect } from "vitest";
import { SizeLimitExceeded } from "./errors.js";
import { DEFAULT_SIZE_LIMITS, checkFileSize } from "./size-guard.js";

describe("checkFileSize", () => {
  it("permits unknown sizes", () => {
    expect(checkFileSize(0, false)).toBeNull();
  });

  it("permits files exactly at the limit", () => {
    expect(checkFileSize(DEFAULT_SIZE_LIMITS.maxFileSize, false)).toBeNull();
  });

  it("rejects files over the regular limit", () => {
    const rejection = checkFileSize(DEFAULT_SIZE_LIMITS.maxFileSize + 1, false);
    expect(rejection).toBeInstanceOf(SizeLimitExceeded);
    expect(rejection?.limit).toBe(2_097_152_000);
    expect(rejection?.userMessage).toBe("The file size exceeds the 1.95 GB limit and cannot be downloaded.");
  });

  it("uses the premium ceiling for premium sessions", () => {
    expect(checkFileSize(DEFAULT_SIZE_LIMITS.maxFileSize + 1, true)).toBeNull();
    expect(checkFileSize(DEFAULT_SIZE_LIMITS.premiumMaxFileSize + 1, true)?.limit).toBe(4_194_304_000);
  });

  it("honours configured limits", () => {
    const rejection = checkFileSize(2000, false, { maxFileSize: 1024, premiumMaxFileSize: 4096 });
    expect(rejection?.userMessage).toBe("The file size exceeds the 1.00 KB limit and cannot be downloaded.");
  });
});
