/**
 * goalpilot — Entry point
 *
 * Connects Telegram chats to a per-user goal list and an AI assistant.
 */
import { ConfigError, loadEnvConfig } from "./config/env.js";
import { setLogLevel, redactSecret, log } from "./utils/log.js";
import { GoalStore } from "./storage/store.js";
import { CompletionClient } from "./llm/openaiClient.js";
import { createBot } from "./bot/telegram.js";

async function main() {
  const config = loadEnvConfig();

  // Configure logging
  setLogLevel(config.logLevel);
  redactSecret(config.telegramToken);
  redactSecret(config.openaiApiKey);

  log.info("Starting goalpilot...");
  log.info(`Model: ${config.openaiModel} (max_tokens=${config.openaiMaxTokens}, temperature=${config.openaiTemperature})`);

  const goals = new GoalStore(config.dbPath);
  goals.init();

  const completer = new CompletionClient({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
    baseUrl: config.openaiBaseUrl,
    maxTokens: config.openaiMaxTokens,
    temperature: config.openaiTemperature,
    timeoutMs: config.openaiTimeoutMs,
  });

  const bot = createBot(config.telegramToken, { goals, completer });

  const shutdown = (signal: string) => {
    log.info(`Received ${signal} — stopping bot`);
    bot.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("Failed to stop cleanly:", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  log.info("Starting Telegram long polling...");
  await bot.start({
    allowed_updates: ["message"],
    onStart: (botInfo) => {
      log.info(`Bot online as @${botInfo.username} (id: ${botInfo.id})`);
    },
  });
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    log.error(`[config] ${err.message} — bot cannot start`);
  } else {
    log.error("Fatal error:", err);
  }
  process.exit(1);
});
