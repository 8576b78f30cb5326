/**
 * Environment configuration loader.
 * All secrets come from .env or the process environment — never hardcoded.
 */
import dotenv from "dotenv";
import type { LogLevel } from "../utils/log.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function required(env: Env, key: string): string {
  const v = env[key]?.trim();
  if (!v) throw new ConfigError(`Missing required env var: ${key}`);
  return v;
}

function optional(env: Env, key: string, fallback: string): string {
  return env[key]?.trim() || fallback;
}

function numeric(env: Env, key: string, fallback: string): number {
  const raw = optional(env, key, fallback);
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got "${raw}"`);
  return n;
}

function logLevel(env: Env): LogLevel {
  const raw = optional(env, "LOG_LEVEL", "info").toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${raw}"`);
  return level;
}

export interface AppConfig {
  telegramToken: string;
  openaiApiKey: string;
  openaiModel: string;
  openaiBaseUrl: string;
  openaiMaxTokens: number;
  openaiTemperature: number;
  openaiTimeoutMs: number;
  dbPath: string;
  logLevel: LogLevel;
}

/**
 * Build the configuration from an environment map.
 * Throws ConfigError when a secret is missing, so the process never starts half-configured.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    telegramToken: required(env, "TELEGRAM_BOT_TOKEN"),
    openaiApiKey: required(env, "OPENAI_API_KEY"),
    openaiModel: optional(env, "OPENAI_MODEL", "gpt-4o-mini"),
    openaiBaseUrl: optional(env, "OPENAI_BASE_URL", "https://api.openai.com/v1").replace(/\/+$/, ""),
    openaiMaxTokens: numeric(env, "OPENAI_MAX_TOKENS", "600"),
    openaiTemperature: numeric(env, "OPENAI_TEMPERATURE", "0.3"),
    openaiTimeoutMs: numeric(env, "OPENAI_TIMEOUT_MS", "60000"),
    dbPath: optional(env, "DB_PATH", "data.db"),
    logLevel: logLevel(env),
  };
}

/** Read .env into process.env (existing variables win), then build the config. */
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
