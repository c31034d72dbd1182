import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { fetchPost, fetchPostFromLink, planAlbums, type FetchContext } from "./fetcher.js";
import { DEFAULT_SIZE_LIMITS } from "./size-guard.js";
import { FakeSource, RecordingReplies, REQUEST, mediaFile, post } from "./test-fakes.js";

const REF = { channel: "somechannel", messageId: 5 };

describe("fetchPost", () => {
  let downloadsDir: string;
  let source: FakeSource;
  let replies: RecordingReplies;
  let clock: number;
  let ctx: FetchContext;

  beforeEach(() => {
    downloadsDir = fs.mkdtempSync(path.join(os.tmpdir(), "relay-fetch-test-"));
    source = new FakeSource();
    replies = new RecordingReplies();
    clock = 0;
    ctx = {
      source,
      replies,
      downloadsDir,
      limits: DEFAULT_SIZE_LIMITS,
      progressIntervalMs: 10_000,
      now: () => clock,
    };
  });

  afterEach(() => {
    fs.rmSync(downloadsDir, { recursive: true, force: true });
  });

  it("downloads, uploads and cleans up a single photo", async () => {
    source.add(post(5, { photo: mediaFile(1000), caption: "<b>hi</b>" }));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome).toEqual({ status: "sent", kind: "photo", items: 1 });
    expect(replies.media).toEqual([
      { kind: "photo", filePath: path.join(downloadsDir, "77-somechannel-5", "5.jpg"), caption: "<b>hi</b>", existed: true },
    ]);
    expect(replies.texts[0]).toEqual({ id: 1000, text: "📥 <b>Downloading...</b>" });
    expect(replies.edits).toEqual([{ messageId: 1000, text: "📤 <b>Uploading...</b>" }]);
    expect(replies.deleted).toEqual([1000]);
    expect(fs.readdirSync(downloadsDir)).toEqual([]);
  });

  it("uses the sender's file name for documents", async () => {
    source.add(post(5, { document: mediaFile(10, "report.pdf") }));

    await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(replies.media[0].kind).toBe("document");
    expect(replies.media[0].filePath).toBe(path.join(downloadsDir, "77-somechannel-5", "report.pdf"));
  });

  it("throttles progress edits to the configured interval", async () => {
    source.add(post(5, { video: mediaFile(100) }));
    source.onDownload = (_message, onProgress) => {
      clock = 5_000;
      onProgress(10, 100);
      clock = 12_000;
      onProgress(60, 100);
      clock = 15_000;
      onProgress(90, 100);
    };

    await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(replies.edits).toEqual([
      {
        messageId: 1000,
        text:
          "<b>Downloading...</b>\n" +
          "Progress: 60.0%\n" +
          "Transferred: 60.00 B / 100.00 B\n" +
          "Speed: 5.00 B/s\n" +
          "ETA: 8s",
      },
      { messageId: 1000, text: "📤 <b>Uploading...</b>" },
    ]);
  });

  it("rejects files over the regular limit without downloading", async () => {
    source.add(post(5, { video: mediaFile(3_000_000_000) }));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome).toEqual({ status: "skipped", reason: "size_limit" });
    expect(replies.textBodies).toEqual([
      "<b>The file size exceeds the 1.95 GB limit and cannot be downloaded.</b>",
    ]);
    expect(source.downloads).toEqual([]);
  });

  it("allows the same file for a premium session", async () => {
    source.premium = true;
    source.add(post(5, { video: mediaFile(3_000_000_000) }));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome).toEqual({ status: "sent", kind: "video", items: 1 });
    expect(source.downloads).toEqual([5]);
  });

  it("skips the premium lookup when the size is unknown", async () => {
    source.add(post(5, { photo: mediaFile(0) }));

    await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(source.premiumChecks).toBe(0);
    expect(replies.media).toHaveLength(1);
  });

  it("replies with the text of a text-only post", async () => {
    source.add(post(5, { text: "hello &amp; welcome" }));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome).toEqual({ status: "text" });
    expect(replies.textBodies).toEqual(["hello &amp; welcome"]);
  });

  it("reports posts without content", async () => {
    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome).toEqual({ status: "skipped", reason: "empty" });
    expect(replies.textBodies).toEqual(["<b>No media or text found in the post.</b>"]);
  });

  it("maps access errors to the session access hint", async () => {
    source.resolveErrors.set(5, Object.assign(new Error("CHANNEL_PRIVATE"), { errorMessage: "CHANNEL_PRIVATE" }));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.error.code).toBe("reference_unavailable");
    expect(replies.textBodies).toEqual(["<b>Ensure the user session has access to the chat.</b>"]);
  });

  it("reports download failures and still cleans up", async () => {
    source.add(post(5, { photo: mediaFile(10) }));
    source.downloadErrors.set(5, new Error("disk full"));

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome.status).toBe("failed");
    expect(replies.media).toEqual([]);
    expect(replies.deleted).toEqual([1000]);
    expect(replies.textBodies).toEqual(["📥 <b>Downloading...</b>", "<b>❌ Error: disk full</b>"]);
  });

  it("removes the artifact when the upload fails", async () => {
    source.add(post(5, { photo: mediaFile(10) }));
    replies.failMedia = new Error("Bad Request: wrong file");

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF });

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.error.code).toBe("transfer");
    expect(replies.textBodies.at(-1)).toBe("<b>❌ Error: Bad Request: wrong file</b>");
    expect(fs.readdirSync(downloadsDir)).toEqual([]);
  });

  it("stops without uploading when cancelled mid-download", async () => {
    const controller = new AbortController();
    source.add(post(5, { photo: mediaFile(10) }));
    source.onDownload = () => controller.abort();

    const outcome = await fetchPost(ctx, { request: REQUEST, reference: REF }, controller.signal);

    expect(outcome).toEqual({ status: "cancelled" });
    expect(replies.media).toEqual([]);
    expect(replies.textBodies).toEqual(["📥 <b>Downloading...</b>"]);
    expect(replies.deleted).toEqual([1000]);
    expect(fs.readdirSync(downloadsDir)).toEqual([]);
  });

  it("uses a message the caller already resolved", async () => {
    const outcome = await fetchPost(ctx, {
      request: REQUEST,
      reference: REF,
      message: post(5, { text: "preloaded" }),
    });

    expect(outcome).toEqual({ status: "text" });
    expect(replies.textBodies).toEqual(["preloaded"]);
  });

  describe("media groups", () => {
    beforeEach(() => {
      source.add(
        post(10, { groupedId: "g1", photo: mediaFile(10), caption: "album" }),
        post(11, { groupedId: "g1", video: mediaFile(10) }),
        post(12, { groupedId: "g1", document: mediaFile(10, "notes.pdf") }),
        post(13, { text: "not part of it" }),
      );
    });

    it("sends visual items as one album and documents separately", async () => {
      const outcome = await fetchPost(ctx, { request: REQUEST, reference: { channel: "somechannel", messageId: 11 } });

      expect(outcome).toEqual({ status: "sent", kind: "grouped", items: 3 });
      expect(replies.textBodies[0]).toBe("📥 <b>Downloading 3 items...</b>");
      expect(replies.groups).toHaveLength(1);
      expect(replies.groups[0].map((item) => [item.kind, item.caption, item.existed])).toEqual([
        ["photo", "album", true],
        ["video", "", true],
      ]);
      expect(replies.media.map((item) => item.filePath)).toEqual([path.join(downloadsDir, "77-somechannel-11", "notes.pdf")]);
      expect(replies.deleted).toEqual([1000]);
      expect(fs.readdirSync(downloadsDir)).toEqual([]);
    });

    it("falls back to single uploads when the album is rejected", async () => {
      replies.failGroup = new Error("Bad Request: group send failed");

      const outcome = await fetchPost(ctx, { request: REQUEST, reference: { channel: "somechannel", messageId: 10 } });

      expect(outcome).toEqual({ status: "sent", kind: "grouped", items: 3 });
      expect(replies.media.map((item) => item.kind)).toEqual(["photo", "video", "document"]);
    });

    it("fails when no item could be relayed", async () => {
      for (const id of [10, 11, 12]) source.downloadErrors.set(id, new Error("timeout"));

      const outcome = await fetchPost(ctx, { request: REQUEST, reference: { channel: "somechannel", messageId: 10 } });

      expect(outcome.status).toBe("failed");
      expect(replies.textBodies.at(-1)).toBe("<b>Could not extract valid media from the group.</b>");
    });
  });
});

describe("fetchPostFromLink", () => {
  it("answers invalid links without touching the session", async () => {
    const source = new FakeSource();
    const replies = new RecordingReplies();
    const ctx: FetchContext = { source, replies, downloadsDir: os.tmpdir(), limits: DEFAULT_SIZE_LIMITS };

    const outcome = await fetchPostFromLink(ctx, REQUEST, "hello");

    expect(outcome.status).toBe("failed");
    if (outcome.status === "failed") expect(outcome.error.code).toBe("invalid_reference");
    expect(replies.textBodies).toEqual(["<b>Please send a valid Telegram post URL.</b>"]);
  });
});

describe("planAlbums", () => {
  const item = (kind: "photo" | "video" | "audio" | "document", n: number) => ({
    kind,
    filePath: `/tmp/${n}`,
    caption: "",
  });

  it("keeps photos and videos together and other kinds apart", () => {
    const albums = planAlbums([item("photo", 1), item("audio", 2), item("video", 3), item("document", 4)]);
    expect(albums.map((album) => album.map((entry) => entry.filePath))).toEqual([
      ["/tmp/1", "/tmp/3"],
      ["/tmp/2"],
      ["/tmp/4"],
    ]);
  });

  it("splits more than ten items", () => {
    const items = Array.from({ length: 12 }, (_, i) => item("photo", i));
    expect(planAlbums(items).map((album) => album.length)).toEqual([10, 2]);
  });
});
