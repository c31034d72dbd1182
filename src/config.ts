/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR} references,
 * and validates required fields at startup so misconfigurations fail early.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_BATCH_WINDOW } from "./batch.js";
import { DEFAULT_LOG_RETENTION_DAYS } from "./logger.js";
import { DEFAULT_SIZE_LIMITS } from "./size-guard.js";

export interface Config {
  telegram: {
    /** Bot API token of the bot identity. */
    token: string;
    /** Telegram user ids allowed to use the bot. Empty allows everyone. */
    allowed_users: number[];
    /** Self-hosted Bot API server, e.g. "http://localhost:8081". */
    api_root?: string;
  };
  session: {
    api_id: number;
    api_hash: string;
    /** GramJS StringSession of the user account that reads the channels. */
    session_string: string;
  };
  limits: {
    max_file_size: number;
    premium_max_file_size: number;
  };
  batch: {
    /** Posts fetched concurrently per window of a /bdl range. */
    window_size: number;
  };
  progress: {
    /** Minimum seconds between progress edits of a status message. */
    interval_seconds: number;
  };
  health: {
    enabled: boolean;
    port: number;
  };
  logging: {
    /** Daily log files kept, today included. */
    retention_days: number;
  };
  data_dir: string;
}

const DEFAULT_HEALTH_PORT = 8000;

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

function toStringValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function section(substituted: Record<string, unknown>, name: string): Record<string, unknown> {
  const raw = substituted[name];
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return {};
  return Object.fromEntries(Object.entries(raw));
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only substitute uppercase env-style names (e.g. ${TELEGRAM_BOT_TOKEN}).
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

/**
 * Resolve the data directory from RELAY_DATA_DIR, defaulting to ./data.
 */
export function resolveDataDir(): string {
  return path.resolve(process.env.RELAY_DATA_DIR || "./data");
}

export function loadConfig(configPath?: string): Config {
  const dataDir = resolveDataDir();
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  if (!fs.existsSync(cfgPath)) {
    throw new Error(`Config file not found: ${cfgPath}`);
  }

  const raw = fs.readFileSync(cfgPath, "utf-8");
  const parsed: unknown = parseYaml(raw);
  const substitutedRaw = substituteDeep(parsed ?? {});
  const substituted: Record<string, unknown> =
    substitutedRaw && typeof substitutedRaw === "object" && !Array.isArray(substitutedRaw)
      ? Object.fromEntries(Object.entries(substitutedRaw))
      : {};

  const telegram = section(substituted, "telegram");
  const session = section(substituted, "session");
  const limits = section(substituted, "limits");
  const batch = section(substituted, "batch");
  const progress = section(substituted, "progress");
  const health = section(substituted, "health");
  const logging = section(substituted, "logging");

  const allowedRaw = Array.isArray(telegram.allowed_users) ? telegram.allowed_users : [];
  const apiRoot = toStringValue(telegram.api_root)?.trim();

  // Defaults
  const config: Config = {
    telegram: {
      token: toStringValue(telegram.token) ?? "",
      allowed_users: allowedRaw
        .map(toFiniteNumber)
        .filter((id): id is number => id !== undefined),
      ...(apiRoot ? { api_root: apiRoot.replace(/\/+$/, "") } : {}),
    },
    session: {
      api_id: toFiniteNumber(session.api_id) ?? 0,
      api_hash: toStringValue(session.api_hash) ?? "",
      session_string: toStringValue(session.session_string) ?? "",
    },
    limits: {
      max_file_size: toFiniteNumber(limits.max_file_size) ?? DEFAULT_SIZE_LIMITS.maxFileSize,
      premium_max_file_size:
        toFiniteNumber(limits.premium_max_file_size) ?? DEFAULT_SIZE_LIMITS.premiumMaxFileSize,
    },
    batch: {
      window_size: toFiniteNumber(batch.window_size) ?? DEFAULT_BATCH_WINDOW,
    },
    progress: {
      interval_seconds: toFiniteNumber(progress.interval_seconds) ?? 10,
    },
    health: {
      enabled: toBoolean(health.enabled) ?? false,
      port: toFiniteNumber(health.port) ?? DEFAULT_HEALTH_PORT,
    },
    logging: {
      retention_days: toFiniteNumber(logging.retention_days) ?? DEFAULT_LOG_RETENTION_DAYS,
    },
    data_dir: dataDir,
  };

  // Validate
  validateConfig(config, allowedRaw.length);

  return config;
}

/**
 * Validate config at startup so a bad session or token fails before polling
 * starts rather than on the first /dl.
 */
function validateConfig(config: Config, allowedEntries: number): void {
  const errors: string[] = [];
  const warnings: string[] = [];

  // --- Required fields ---

  if (!config.telegram.token) {
    errors.push("telegram.token is required");
  }
  if (!Number.isInteger(config.session.api_id) || config.session.api_id <= 0) {
    errors.push("session.api_id must be a positive integer");
  }
  if (!config.session.api_hash) {
    errors.push("session.api_hash is required");
  }
  if (!config.session.session_string) {
    errors.push("session.session_string is required");
  }

  // --- Ranges ---

  if (config.limits.max_file_size <= 0) {
    errors.push("limits.max_file_size must be positive");
  }
  if (config.limits.premium_max_file_size < config.limits.max_file_size) {
    errors.push("limits.premium_max_file_size must not be smaller than limits.max_file_size");
  }
  if (!Number.isInteger(config.batch.window_size) || config.batch.window_size < 1) {
    errors.push("batch.window_size must be a positive integer");
  }
  if (config.progress.interval_seconds < 0) {
    errors.push("progress.interval_seconds must not be negative");
  }
  if (config.health.enabled && (!Number.isInteger(config.health.port) || config.health.port < 1 || config.health.port > 65535)) {
    errors.push("health.port must be between 1 and 65535");
  }
  if (!Number.isInteger(config.logging.retention_days) || config.logging.retention_days < 1) {
    errors.push("logging.retention_days must be a positive integer");
  }

  // --- Soft checks ---

  if (config.telegram.allowed_users.length !== allowedEntries) {
    warnings.push("telegram.allowed_users contains entries that are not numeric user ids; they were ignored");
  }
  if (config.telegram.allowed_users.length === 0) {
    warnings.push(
      "telegram.allowed_users is empty. " +
      "Anyone who finds the bot can use the session to download posts.",
    );
  }
  if (config.batch.window_size > 20) {
    warnings.push("batch.window_size above 20 tends to trigger flood waits");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

export function downloadsDir(config: Config): string {
  return path.join(config.data_dir, "downloads");
}

/**
 * Ensure data directories exist.
 */
export function ensureDataDirs(config: Config): void {
  const dirs = [
    config.data_dir,
    path.join(config.data_dir, "logs"),
    downloadsDir(config),
  ];

  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
