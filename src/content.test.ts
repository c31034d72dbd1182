import { describe, it, expect } from "vitest";
import { captionFor, classifyContent, hasContent, mediaFileName, sanitizeFileName } from "./content.js";
import { mediaFile, post } from "./test-fakes.js";

describe("classifyContent", () => {
  it("puts album membership first", () => {
    expect(classifyContent(post(1, { groupedId: "g1", photo: mediaFile(1) }))).toEqual({
      kind: "grouped",
      groupedId: "g1",
    });
  });

  it("puts media ahead of the caption", () => {
    const photo = mediaFile(10);
    expect(classifyContent(post(1, { photo, caption: "look" }))).toEqual({ kind: "photo", file: photo });
  });

  it("prefers video over document", () => {
    const video = mediaFile(10);
    expect(classifyContent(post(1, { video, document: mediaFile(20) }))).toEqual({ kind: "video", file: video });
  });

  it("falls back to the caption, then the text", () => {
    expect(classifyContent(post(1, { caption: "cap", text: "txt" }))).toEqual({ kind: "text", text: "cap" });
    expect(classifyContent(post(1, { text: "txt" }))).toEqual({ kind: "text", text: "txt" });
  });

  it("treats whitespace-only posts as empty", () => {
    expect(classifyContent(post(1, { text: "  \n" }))).toEqual({ kind: "empty" });
    expect(hasContent(post(1, { text: "  \n" }))).toBe(false);
    expect(hasContent(null)).toBe(false);
  });
});

describe("captionFor", () => {
  it("returns an empty caption when neither is set", () => {
    expect(captionFor(post(1))).toBe("");
  });
});

describe("mediaFileName", () => {
  it("uses the message id with a default extension", () => {
    expect(mediaFileName(5, "photo", mediaFile(1, "holiday.png"))).toBe("5.jpg");
    expect(mediaFileName(5, "video", mediaFile(1))).toBe("5.mp4");
    expect(mediaFileName(5, "audio", mediaFile(1))).toBe("5.mp3");
    expect(mediaFileName(5, "document", mediaFile(1))).toBe("5");
  });

  it("keeps a sanitized sender file name", () => {
    expect(mediaFileName(5, "document", mediaFile(1, "../q3/report.pdf"))).toBe("_q3_report.pdf");
  });
});

describe("sanitizeFileName", () => {
  it("strips separators, control characters and leading dots", () => {
    expect(sanitizeFileName("..hidden\u0000 file?.txt")).toBe("hidden file_.txt");
  });
});
