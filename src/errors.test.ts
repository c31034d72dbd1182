import { describe, it, expect } from "vitest";
import {
  InvalidReferenceError,
  ReferenceUnavailableError,
  TransferError,
  UnknownError,
  errorMessage,
  isAccessError,
  runStage,
  toRelayError,
} from "./errors.js";

function rpcError(code: string): Error {
  return Object.assign(new Error(`400: ${code}`), { errorMessage: code });
}

describe("isAccessError", () => {
  it("recognises RPC access errors, also when nested", () => {
    expect(isAccessError(rpcError("CHANNEL_PRIVATE"))).toBe(true);
    expect(isAccessError(new Error("wrapped", { cause: rpcError("USERNAME_NOT_OCCUPIED") }))).toBe(true);
  });

  it("recognises unresolved entities", () => {
    expect(isAccessError(new Error('Could not find the input entity for {"userId":"1"}'))).toBe(true);
  });

  it("ignores unrelated errors", () => {
    expect(isAccessError(rpcError("FLOOD_WAIT_30"))).toBe(false);
    expect(isAccessError("CHANNEL_PRIVATE")).toBe(false);
  });
});

describe("toRelayError", () => {
  it("passes classified errors through", () => {
    const error = new InvalidReferenceError("bad link");
    expect(toRelayError(error, "download")).toBe(error);
  });

  it("maps access errors while resolving", () => {
    const mapped = toRelayError(rpcError("CHANNEL_PRIVATE"), "resolve");
    expect(mapped).toBeInstanceOf(ReferenceUnavailableError);
    expect(mapped.userMessage).toBe("Ensure the user session has access to the chat.");
  });

  it("maps transfer failures", () => {
    const mapped = toRelayError(new Error("connection reset"), "upload");
    expect(mapped).toBeInstanceOf(TransferError);
    expect(mapped.userMessage).toBe("❌ Error: connection reset");
  });

  it("maps anything else to UnknownError", () => {
    const mapped = toRelayError("boom", "resolve");
    expect(mapped).toBeInstanceOf(UnknownError);
    expect(mapped.code).toBe("unknown");
  });
});

describe("runStage", () => {
  it("wraps the value or the mapped error", async () => {
    await expect(runStage("download", async () => "file")).resolves.toEqual({ ok: true, value: "file" });

    const failed = await runStage("download", async () => {
      throw new Error("disk full");
    });
    expect(failed.ok).toBe(false);
    if (!failed.ok) expect(failed.error.userMessage).toBe("❌ Error: disk full");
  });
});

describe("errorMessage", () => {
  it("stringifies non-errors", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });
});
