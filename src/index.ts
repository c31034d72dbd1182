/**
 * post-relay server.
 *
 * Wires together:
 * - Config loading
 * - User session (GramJS) that reads posts
 * - Telegram bridge (grammy) that receives commands and uploads
 * - Task manager shared by every command
 * - Optional liveness endpoint
 *
 * Flow:
 * 1. Load config
 * 2. Ensure data directories exist, install file logging
 * 3. Connect the user session (fatal when not authorized)
 * 4. Start the Telegram bridge and the health server
 * 5. On message: dispatch through handleMessage
 */

import { TelegramBridge } from "./channels/telegram.js";
import type { IncomingMessage } from "./channels/types.js";
import { handleMessage, type CommandContext } from "./commands.js";
import { downloadsDir, ensureDataDirs, loadConfig } from "./config.js";
import { createHealthServer, type HealthServer } from "./health.js";
import { createAppLogger, installConsoleFileLogging, pruneLogs } from "./logger.js";
import { TelegramSession } from "./session.js";
import { createTaskManager } from "./task-manager.js";

interface RunningApp {
  stop(): Promise<void>;
}

async function startApp(): Promise<RunningApp> {
  const startedAt = Date.now();
  const config = loadConfig();
  ensureDataDirs(config);
  installConsoleFileLogging(createAppLogger(config.data_dir));
  const pruned = pruneLogs(config.data_dir, config.logging.retention_days);
  if (pruned.length > 0) console.log(`Pruned ${pruned.length} old log file(s)`);

  console.log("post-relay starting");
  console.log(`Data directory: ${config.data_dir}`);
  console.log(
    `Batch window: ${config.batch.window_size}, progress interval: ${config.progress.interval_seconds}s`,
  );

  const session = new TelegramSession({
    apiId: config.session.api_id,
    apiHash: config.session.api_hash,
    sessionString: config.session.session_string,
  });
  await session.start();

  const bridge = new TelegramBridge(config.telegram.token, {
    allowedUsers: config.telegram.allowed_users,
    apiRoot: config.telegram.api_root,
  });
  const tasks = createTaskManager();

  const context: CommandContext = {
    fetch: {
      source: session,
      replies: bridge,
      downloadsDir: downloadsDir(config),
      limits: {
        maxFileSize: config.limits.max_file_size,
        premiumMaxFileSize: config.limits.premium_max_file_size,
      },
      progressIntervalMs: config.progress.interval_seconds * 1000,
    },
    tasks,
    dataDir: config.data_dir,
    batchWindow: config.batch.window_size,
    startedAt,
  };

  bridge.onMessage(async (msg: IncomingMessage) => {
    await handleMessage(msg, context);
  });

  let health: HealthServer | null = null;
  try {
    await bridge.start();
    if (config.health.enabled) {
      health = createHealthServer(config.health.port);
      await health.start();
    }
  } catch (error) {
    await bridge.stop();
    await session.stop();
    throw error;
  }

  console.log("post-relay ready!");

  let stopped = false;
  return {
    async stop(): Promise<void> {
      if (stopped) {
        return;
      }
      stopped = true;
      console.log("Shutting down...");
      const cancelled = tasks.cancelAll();
      if (cancelled > 0) console.log(`Cancelled ${cancelled} running task(s)`);
      await health?.stop();
      await bridge.stop();
      await session.stop();
    },
  };
}

function asError(reason: unknown): Error {
  if (reason instanceof Error) {
    return reason;
  }
  return new Error(String(reason));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Start the app and keep it running. A startup failure (bad config, session
 * not authorized, bot token rejected) exits the process; a runtime crash
 * restarts the app after a delay.
 */
async function runWithSupervisor(): Promise<void> {
  const restartDelayMs = Number(process.env.RELAY_RESTART_DELAY_MS ?? 2000);
  let shutdownRequested = false;
  let resolver: ((outcome: "shutdown" | "restart") => void) | null = null;

  const resolveOutcome = (outcome: "shutdown" | "restart"): void => {
    if (!resolver) {
      return;
    }
    const current = resolver;
    resolver = null;
    current(outcome);
  };

  const onSignal = (): void => {
    shutdownRequested = true;
    resolveOutcome("shutdown");
  };

  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  while (!shutdownRequested) {
    let app: RunningApp;
    try {
      app = await startApp();
    } catch (error) {
      console.error("Fatal startup error:", asError(error).message);
      process.exitCode = 1;
      break;
    }

    let fatalError: Error | undefined;
    const onUncaughtException = (error: Error): void => {
      fatalError = error;
      resolveOutcome("restart");
    };
    const onUnhandledRejection = (reason: unknown): void => {
      fatalError = asError(reason);
      resolveOutcome("restart");
    };

    process.once("uncaughtException", onUncaughtException);
    process.once("unhandledRejection", onUnhandledRejection);

    const outcome = await new Promise<"shutdown" | "restart">((resolve) => {
      if (shutdownRequested) {
        resolve("shutdown");
        return;
      }
      resolver = resolve;
    });

    process.removeListener("uncaughtException", onUncaughtException);
    process.removeListener("unhandledRejection", onUnhandledRejection);

    await app.stop();

    if (outcome === "shutdown") {
      break;
    }

    console.error("Fatal runtime error:", fatalError);
    if (shutdownRequested) {
      break;
    }
    console.log(`Restarting in ${restartDelayMs}ms...`);
    await sleep(restartDelayMs);
  }

  process.removeListener("SIGINT", onSignal);
  process.removeListener("SIGTERM", onSignal);
}

/**
 * Run the bot until SIGINT/SIGTERM or a startup failure. Used by the CLI.
 */
export async function startServer(): Promise<void> {
  await runWithSupervisor();
}
