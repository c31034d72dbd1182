import { describe, it, expect } from "vitest";
import { TelegramBridge, chunkMessage, splitCaption, toPlainText, visibleLength, withRetry } from "./telegram.js";

describe("TelegramBridge", () => {
  it("has correct name", () => {
    const bridge = new TelegramBridge("test-token", { allowedUsers: [123] });
    expect(bridge.name).toBe("telegram");
  });
});

describe("chunkMessage", () => {
  it("returns single chunk for short text", () => {
    const chunks = chunkMessage("hello world", 100);
    expect(chunks).toEqual(["hello world"]);
  });

  it("returns single chunk for text exactly at limit", () => {
    const text = "a".repeat(100);
    const chunks = chunkMessage(text, 100);
    expect(chunks).toEqual([text]);
  });

  it("splits on paragraph boundary", () => {
    const text = "paragraph one\n\nparagraph two\n\nparagraph three";
    const chunks = chunkMessage(text, 30);
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((c) => c.length <= 30)).toBe(true);
    expect(chunks.join("\n\n")).toContain("paragraph one");
    expect(chunks.join("\n\n")).toContain("paragraph three");
  });

  it("splits on newline when no paragraph boundary fits", () => {
    const text = "line one\nline two\nline three\nline four";
    const chunks = chunkMessage(text, 20);
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((c) => c.length <= 20)).toBe(true);
  });

  it("splits on sentence boundary as fallback", () => {
    const text = "First sentence. Second sentence. Third sentence. Fourth sentence.";
    const chunks = chunkMessage(text, 40);
    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.every((c) => c.length <= 40)).toBe(true);
  });

  it("hard cuts when no good boundary exists", () => {
    const text = "a".repeat(200);
    const chunks = chunkMessage(text, 80);
    expect(chunks.length).toBe(3);
    expect(chunks.every((c) => c.length <= 80)).toBe(true);
    expect(chunks.join("")).toBe(text);
  });

  it("preserves all content across chunks", () => {
    const paragraphs = Array.from({ length: 20 }, (_, i) => `Paragraph ${i + 1} with some text.`);
    const text = paragraphs.join("\n\n");
    const chunks = chunkMessage(text, 100);
    const reassembled = chunks.join("\n\n");
    for (const p of paragraphs) {
      expect(reassembled).toContain(p);
    }
  });

  it("uses default 4096 limit", () => {
    const short = "a".repeat(4096);
    expect(chunkMessage(short)).toEqual([short]);

    const long = "a".repeat(4097);
    expect(chunkMessage(long).length).toBe(2);
  });
});

describe("toPlainText", () => {
  it("drops tags and decodes entities", () => {
    expect(toPlainText("<b>1 &lt; 2 &amp;&amp; 3 &gt; 2</b>")).toBe("1 < 2 && 3 > 2");
  });
});

describe("visibleLength", () => {
  it("ignores tags and counts entities as one character", () => {
    expect(visibleLength("<b>a &amp; b</b>")).toBe(5);
    expect(visibleLength('<a href="https://t.me/x">link</a>')).toBe(4);
  });
});

describe("splitCaption", () => {
  it("drops whitespace-only captions", () => {
    expect(splitCaption("  \n")).toEqual({ caption: "", overflow: "" });
  });

  it("keeps captions up to 1024 visible characters", () => {
    const caption = `<b>${"x".repeat(1024)}</b>`;
    expect(splitCaption(caption)).toEqual({ caption, overflow: "" });
  });

  it("moves longer captions to a follow-up message", () => {
    const caption = "x".repeat(1025);
    expect(splitCaption(caption)).toEqual({ caption: "", overflow: caption });
  });
});

describe("withRetry", () => {
  it("retries server errors", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw Object.assign(new Error("Bad Gateway"), { error_code: 502 });
        return "ok";
      },
      3,
      0,
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  it("does not retry permanent errors", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw Object.assign(new Error("Bad Request: chat not found"), { error_code: 400 });
        },
        3,
        0,
      ),
    ).rejects.toThrow("Bad Request: chat not found");
    expect(calls).toBe(1);
  });

  it("gives up after the last attempt", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
        },
        2,
        0,
      ),
    ).rejects.toThrow("socket hang up");
    expect(calls).toBe(3);
  });
});
