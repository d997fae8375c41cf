import path from "path";
import dotenv from "dotenv";
import { DuplicatePolicy } from "./types";

dotenv.config();

const REQUIRED_ENV = ["LEAGUE_BASE_URL"] as const;

type Env = Record<string, string | undefined>;

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

export interface AppConfig {
  baseUrl: string;
  venueFilter: string;
  monitorDays: number;
  cronPattern: string;
  timezone: string;
  storagePath: string;
  exportPath: string;
  requestTimeoutMs: number;
  userAgent: string;
  telegram?: TelegramConfig;
  testMode: boolean;
  duplicatePolicy: DuplicatePolicy;
  notifyOnFirstRun: boolean;
  runOnce: boolean;
}

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = read(env, key);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid ${key}: expected a positive integer, got "${raw}"`);
  }
  return value;
}

function readFlag(env: Env, key: string): boolean {
  const raw = read(env, key)?.toLowerCase();
  return raw === "true" || raw === "1" || raw === "yes";
}

function readDuplicatePolicy(env: Env): DuplicatePolicy {
  const raw = read(env, "DUPLICATE_POLICY")?.toLowerCase() ?? "first";
  if (raw !== "first" && raw !== "last") {
    throw new Error(`Invalid DUPLICATE_POLICY: expected "first" or "last", got "${raw}"`);
  }
  return raw;
}

function readTimezone(env: Env): string {
  const timezone = read(env, "TZ") ?? "America/Halifax";
  try {
    new Intl.DateTimeFormat("en-CA", { timeZone: timezone });
  } catch {
    throw new Error(`Invalid TZ: unknown time zone "${timezone}"`);
  }
  return timezone;
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): AppConfig {
  REQUIRED_ENV.forEach((key) => {
    if (!read(env, key)) {
      throw new Error(`Missing required environment variable: ${key}`);
    }
  });

  const dataDir = path.resolve(cwd, "data");
  const botToken = read(env, "TELEGRAM_BOT_TOKEN");
  const chatId = read(env, "TELEGRAM_CHAT_ID");

  const config: AppConfig = {
    baseUrl: read(env, "LEAGUE_BASE_URL") ?? "",
    venueFilter: read(env, "VENUE_FILTER") ?? "Amherst Stadium",
    monitorDays: readPositiveInt(env, "MONITOR_DAYS", 7),
    cronPattern: read(env, "CRON_PATTERN") ?? "30 1,12,16 * * *",
    timezone: readTimezone(env),
    storagePath: path.resolve(cwd, read(env, "STORAGE_PATH") ?? path.join(dataDir, "snapshot.json")),
    exportPath: path.resolve(cwd, read(env, "EXPORT_PATH") ?? path.join(dataDir, "schedule.json")),
    requestTimeoutMs: readPositiveInt(env, "REQUEST_TIMEOUT_MS", 30000),
    userAgent:
      read(env, "USER_AGENT") ??
      "Mozilla/5.0 (compatible; IceTimeMonitor/1.0)",
    testMode: readFlag(env, "TEST_MODE"),
    duplicatePolicy: readDuplicatePolicy(env),
    notifyOnFirstRun: readFlag(env, "NOTIFY_ON_FIRST_RUN"),
    runOnce: readFlag(env, "RUN_ONCE"),
  };

  if (botToken && chatId) {
    config.telegram = { botToken, chatId };
  } else if (botToken || chatId) {
    throw new Error("TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together");
  }

  return config;
}
