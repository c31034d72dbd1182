#!/usr/bin/env node
/**
 * post-relay CLI. Starts the bot or runs setup commands.
 *
 * `post-relay` (no args) or `post-relay serve` starts the bot.
 * `post-relay init` writes a config template into the data directory.
 * `post-relay login` runs the interactive user-session login and prints the
 * session string for session.session_string.
 *
 * See `post-relay help` for the full listing.
 */

import fs from "node:fs";
import path from "node:path";
import readline from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { resolveDataDir as defaultDataDir } from "./config.js";

if (fs.existsSync(".env")) {
  process.loadEnvFile(".env");
}

const PKG_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..");

const VERSION = readVersion();

function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(PKG_ROOT, "package.json"), "utf-8"));
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

// ---------------------------------------------------------------------------
// Arg parsing helpers
// ---------------------------------------------------------------------------

const argv = process.argv.slice(2);

function flag(name: string): boolean {
  return argv.includes(name);
}

function opt(name: string, fallback?: string): string | undefined {
  const idx = argv.indexOf(name);
  return idx !== -1 ? argv[idx + 1] : fallback;
}

function positional(index: number): string | undefined {
  const values: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    if (argv[i].startsWith("--")) {
      i++; // skip the option's value
      continue;
    }
    values.push(argv[i]);
  }
  return values[index];
}

function resolveDataDir(): string {
  return opt("--data-dir") ?? defaultDataDir();
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdInit(target: string): void {
  const resolved = path.resolve(target);
  const configPath = path.join(resolved, "config.yml");

  if (fs.existsSync(configPath)) {
    console.log(`Already initialized: ${configPath} exists.`);
    return;
  }

  fs.mkdirSync(resolved, { recursive: true });
  fs.copyFileSync(path.join(PKG_ROOT, "config.example.yml"), configPath);

  console.log(`Wrote ${configPath}`);
  console.log("Set TELEGRAM_BOT_TOKEN, TELEGRAM_API_ID, TELEGRAM_API_HASH and TELEGRAM_SESSION_STRING");
  console.log("(or edit the file), then run `post-relay login` if you need a session string.");
}

async function cmdLogin(): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const apiId = Number(process.env.TELEGRAM_API_ID ?? (await rl.question("API id: ")));
    const apiHash = process.env.TELEGRAM_API_HASH ?? (await rl.question("API hash: "));
    if (!Number.isInteger(apiId) || apiId <= 0 || !apiHash.trim()) {
      throw new Error("A numeric API id and an API hash from my.telegram.org are required");
    }

    const { createSessionString } = await import("./session.js");
    const sessionString = await createSessionString(apiId, apiHash.trim(), (question) => rl.question(question));

    console.log("\nSession string (keep it secret, it grants full account access):\n");
    console.log(sessionString);
  } finally {
    rl.close();
  }
}

function showHelp(): void {
  console.log(`post-relay ${VERSION}

Usage: post-relay [command] [options]

Commands:
  serve
    Start the bot (default).

  init [dir]
    Write config.example.yml to <dir>/config.yml. Default: the data directory.

  login
    Log in with a user account and print its session string.
    Reads TELEGRAM_API_ID and TELEGRAM_API_HASH, or asks for them.

  version
    Show version number.

  help
    Show this help text.

Global options:
  --data-dir <path>  Data directory (default: ${resolveDataDir()})
`);
}

// ---------------------------------------------------------------------------
// Main dispatcher
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  if (flag("--version") || flag("-v")) {
    console.log(VERSION);
    return;
  }

  if (flag("--help") || flag("-h")) {
    showHelp();
    return;
  }

  const dataDirOption = opt("--data-dir");
  if (dataDirOption) {
    process.env.RELAY_DATA_DIR = dataDirOption;
  }

  const command = positional(0);

  switch (command) {
    case undefined:
    case "serve": {
      const { startServer } = await import("./index.js");
      await startServer();
      break;
    }

    case "init":
      cmdInit(positional(1) ?? resolveDataDir());
      break;

    case "login":
      await cmdLogin();
      break;

    case "version":
      console.log(VERSION);
      break;

    case "help":
      showHelp();
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'post-relay help' for usage.");
      process.exitCode = 1;
  }
}

main().then(
  // GramJS keeps timers alive after disconnect; exit once done.
  () => process.exit(process.exitCode ?? 0),
  (err) => {
    console.error("Fatal:", (err as Error).message);
    process.exit(1);
  },
);
