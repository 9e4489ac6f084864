import TelegramBot from "node-telegram-bot-api";
import type { PetEngine } from "../engine.js";
import { COMMAND_PATTERN, handleCommand, ownerNameFor, parseCommand } from "./commands.js";
import { UNKNOWN_ERROR_TEXT } from "./messages.js";

export interface PetBotOptions {
  token: string;
  /** Webhook mode when set, long polling otherwise. */
  webhook: { url: string; port: number } | null;
}

/**
 * Telegram transport. Turns command messages into engine calls and sends
 * the rendered reply back to the chat.
 */
export class PetBot {
  private bot: TelegramBot;
  private engine: PetEngine;
  private options: PetBotOptions;

  constructor(engine: PetEngine, options: PetBotOptions) {
    this.engine = engine;
    this.options = options;
    this.bot = options.webhook
      ? new TelegramBot(options.token, { webHook: { port: options.webhook.port, autoOpen: false } })
      : new TelegramBot(options.token, { polling: { autoStart: false } });

    this.bot.onText(COMMAND_PATTERN, async (msg) => {
      await this.onCommand(msg);
    });
    this.bot.on("polling_error", (err) => console.error("[bot] Polling error:", err));
    this.bot.on("webhook_error", (err) => console.error("[bot] Webhook error:", err));
  }

  async start(): Promise<void> {
    const { webhook, token } = this.options;
    if (webhook) {
      await this.bot.openWebHook();
      await this.bot.setWebHook(`${webhook.url}/bot${token}`);
      console.log(`[bot] Webhook server started on port ${webhook.port}, webhook set to ${webhook.url}`);
    } else {
      await this.bot.startPolling();
      console.log("[bot] Starting polling.");
    }
  }

  async stop(): Promise<void> {
    if (this.options.webhook) {
      try {
        await this.bot.deleteWebHook();
      } catch (err) {
        console.error("[bot] Failed to delete webhook:", err);
      }
      await this.bot.closeWebHook();
    } else {
      await this.bot.stopPolling();
    }
  }

  async onCommand(msg: TelegramBot.Message): Promise<void> {
    const parsed = parseCommand(msg.text ?? "");
    if (!parsed) return;

    const chatId = msg.chat.id;
    let reply: string;
    try {
      reply = await handleCommand(this.engine, {
        chatId,
        command: parsed.command,
        args: parsed.args,
        ownerName: ownerNameFor(msg.from),
        username: msg.from?.username,
      });
    } catch (err) {
      console.error(`[bot] /${parsed.command} failed for chat ${chatId}:`, err);
      reply = UNKNOWN_ERROR_TEXT;
    }

    try {
      await this.bot.sendMessage(chatId, reply);
    } catch (err) {
      console.error(`[bot] Failed to send message to chat ${chatId}:`, err);
    }
  }
}
