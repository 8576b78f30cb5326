/**
 * Minimal leveled logger.
 * Writes timestamped lines to the console and scrubs registered secrets.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = "info";
const redactPatterns: RegExp[] = [];

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/** Any match of the pattern is replaced by [REDACTED] in every log line. */
export function addRedactPattern(pattern: RegExp): void {
  redactPatterns.push(pattern);
}

/** Register a literal secret value for redaction. Short values are ignored. */
export function redactSecret(secret: string): void {
  if (!secret || secret.length <= 4) return;
  addRedactPattern(new RegExp(secret.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"), "g"));
}

export function redact(text: string): string {
  let out = text;
  for (const p of redactPatterns) {
    out = out.replace(p, "[REDACTED]");
  }
  return out;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack || `${arg.name}: ${arg.message}`;
  if (typeof arg === "string") return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (LEVELS[level] < LEVELS[currentLevel]) return;
  const parts = [message, ...args.map(formatArg)];
  const line = redact(`${new Date().toISOString()} [${level.toUpperCase()}] ${parts.join(" ")}`);
  if (level === "error" || level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export const log = {
  debug: (message: string, ...args: unknown[]) => write("debug", message, args),
  info: (message: string, ...args: unknown[]) => write("info", message, args),
  warn: (message: string, ...args: unknown[]) => write("warn", message, args),
  error: (message: string, ...args: unknown[]) => write("error", message, args),
};
