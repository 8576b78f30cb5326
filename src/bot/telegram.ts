/**
 * Telegram bot setup using grammY with long polling.
 * Every text message is queued on its chat and handed to the command router.
 */
import { Bot, GrammyError, HttpError, Keyboard } from "grammy";
import { enqueue, isChatBusy } from "./chatLock.js";
import { handleText, type Reply, type ReplyOptions, type RouterDeps } from "./router.js";
import { log } from "../utils/log.js";

interface SendOptions {
  parse_mode?: "Markdown";
  reply_markup?: Keyboard;
}

export function buildKeyboard(rows: readonly (readonly string[])[]): Keyboard {
  const kb = new Keyboard();
  rows.forEach((row, i) => {
    for (const label of row) kb.text(label);
    if (i < rows.length - 1) kb.row();
  });
  return kb.resized();
}

export function toSendOptions(options?: ReplyOptions): SendOptions | undefined {
  if (!options) return undefined;
  const out: SendOptions = {};
  if (options.markdown) out.parse_mode = "Markdown";
  if (options.keyboard) out.reply_markup = buildKeyboard(options.keyboard);
  return out;
}

export function createBot(token: string, deps: RouterDeps): Bot {
  const bot = new Bot(token);

  bot.on("message:text", (ctx) => {
    const chatId = ctx.chat.id;
    const ownerId = ctx.from.id;
    const text = ctx.message.text;

    log.info(`Message from user ${ownerId} in chat ${chatId}: ${text.slice(0, 80)}`);
    if (isChatBusy(chatId)) {
      log.debug(`[telegram] Chat ${chatId} busy — message queued`);
    }

    const reply: Reply = async (message, options) => {
      await ctx.reply(message, toSendOptions(options));
    };

    const botUsername = ctx.me.username;

    // Not awaited: polling moves on to the next update while this chat's queue drains.
    void enqueue(chatId, () => handleText(text, { ownerId, reply, botUsername }, deps));
  });

  // Error handler — distinguish error types to avoid unnecessary crashes
  bot.catch((err) => {
    const e = err.error;

    if (e instanceof GrammyError) {
      log.error(`[bot] Telegram API error ${e.error_code}: ${e.description}`);
    } else if (e instanceof HttpError) {
      log.error(`[bot] Network error: ${e.message}`);
    } else {
      log.error("[bot] Unknown error:", e);
    }
  });

  return bot;
}
