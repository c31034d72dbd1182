import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { createAppLogger, formatLine, latestLogFile, pruneLogs, splitScope } from "./logger.js";

describe("AppLogger", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync("/tmp/relay-log-test-");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("writes structured JSONL records", () => {
    const logger = createAppLogger(tempDir);
    const err = new Error("boom");

    logger.info("startup", { foo: "bar" });
    logger.error("failed", err);

    const today = new Date().toISOString().split("T")[0];
    const logPath = path.join(tempDir, "logs", `${today}.jsonl`);
    expect(fs.existsSync(logPath)).toBe(true);

    const lines = fs.readFileSync(logPath, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(2);

    const first = JSON.parse(lines[0]) as {
      timestamp: string;
      level: string;
      message: string;
      args: Array<{ foo?: string }>;
    };
    expect(first.timestamp).toBeDefined();
    expect(first.level).toBe("info");
    expect(first.message).toBe("startup");
    expect(first.args[0].foo).toBe("bar");

    const second = JSON.parse(lines[1]) as {
      level: string;
      message: string;
      args: Array<{ name?: string; message?: string; stack?: string }>;
    };
    expect(second.level).toBe("error");
    expect(second.message).toBe("failed");
    expect(second.args[0].name).toBe("Error");
    expect(second.args[0].message).toBe("boom");
    expect(typeof second.args[0].stack).toBe("string");
  });

  describe("latestLogFile", () => {
    it("returns null before the logs directory exists", () => {
      expect(latestLogFile(tempDir)).toBeNull();
    });

    it("picks the newest non-empty daily file", () => {
      const logsDir = path.join(tempDir, "logs");
      fs.mkdirSync(logsDir);
      fs.writeFileSync(path.join(logsDir, "2026-03-01.jsonl"), "{}\n");
      fs.writeFileSync(path.join(logsDir, "2026-03-02.jsonl"), "{}\n");
      fs.writeFileSync(path.join(logsDir, "notes.txt"), "ignored");

      expect(latestLogFile(tempDir)).toBe(path.join(logsDir, "2026-03-02.jsonl"));
    });

    it("returns null when the newest file is empty", () => {
      const logsDir = path.join(tempDir, "logs");
      fs.mkdirSync(logsDir);
      fs.writeFileSync(path.join(logsDir, "2026-03-02.jsonl"), "");

      expect(latestLogFile(tempDir)).toBeNull();
    });

    it("finds what the logger wrote today", () => {
      createAppLogger(tempDir).info("hello");

      const today = new Date().toISOString().split("T")[0];
      expect(latestLogFile(tempDir)).toBe(path.join(tempDir, "logs", `${today}.jsonl`));
    });
  });

  it("stores the module prefix as the scope", () => {
    createAppLogger(tempDir).warn("[batch] Cancelled at window 1-10");

    const file = latestLogFile(tempDir);
    expect(file).not.toBeNull();
    const entry = JSON.parse(fs.readFileSync(file ?? "", "utf-8").trim()) as {
      level: string;
      scope?: string;
      message: string;
    };
    expect(entry.level).toBe("warn");
    expect(entry.scope).toBe("batch");
    expect(entry.message).toBe("Cancelled at window 1-10");
  });

  describe("pruneLogs", () => {
    it("removes daily files outside the retention window", () => {
      const logsDir = path.join(tempDir, "logs");
      fs.mkdirSync(logsDir);
      for (const day of ["2026-03-03", "2026-03-04", "2026-03-10"]) {
        fs.writeFileSync(path.join(logsDir, `${day}.jsonl`), "{}\n");
      }
      fs.writeFileSync(path.join(logsDir, "keep.txt"), "x");

      const removed = pruneLogs(tempDir, 7, new Date("2026-03-10T12:00:00Z"));

      expect(removed).toEqual(["2026-03-03.jsonl"]);
      expect(fs.readdirSync(logsDir).sort()).toEqual(["2026-03-04.jsonl", "2026-03-10.jsonl", "keep.txt"]);
    });

    it("does nothing without a logs directory", () => {
      expect(pruneLogs(tempDir, 7)).toEqual([]);
    });
  });
});

describe("splitScope", () => {
  it("splits a bracketed prefix", () => {
    expect(splitScope("[fetch] Downloaded x")).toEqual({ scope: "fetch", message: "Downloaded x" });
    expect(splitScope("post-relay ready!")).toEqual({ message: "post-relay ready!" });
  });
});

describe("formatLine", () => {
  it("writes plain lines when not on a TTY", () => {
    expect(formatLine("warn", "[stats] statfs failed", false, new Date("2026-01-02T10:00:00.500Z"))).toBe(
      "2026-01-02 10:00:00 [WRN] [stats] statfs failed",
    );
  });
});
