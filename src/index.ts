import express from "express";
import dotenv from "dotenv";
import TelegramBot from "node-telegram-bot-api";
import type { Server } from "http";
import { loadConfig, type AppConfig } from "./Helper/Config";
import { CompletionService } from "./Helper/Completion";
import { Dispatcher } from "./Helper/Dispatcher";
import { isBotError } from "./Helper/Errors";
import { SessionStore } from "./Helper/Session";
import { TelegramFileSource, attachDispatcher } from "./Helper/Telegram";

dotenv.config();

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (isBotError(error) && error.code === "MissingConfiguration") {
      console.error(`❌ Invalid configuration: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const webhook = config.webhook;

// Polling starts in main(), once the bot knows its own username.
const bot = new TelegramBot(config.telegramToken, { polling: false });

const sessions = new SessionStore({
  maxImages: config.maxPendingImages,
  ttlMs: config.sessionTtlMs,
});
sessions.startSweeper();

const dispatcher = new Dispatcher({
  sessions,
  completion: CompletionService.fromConfig(config.openRouter),
  files: new TelegramFileSource(bot),
  adminContact: config.adminContact,
  adminChatId: config.adminChatId,
});

let server: Server | undefined;

async function main(): Promise<void> {
  const me = await bot.getMe();
  attachDispatcher(bot, dispatcher, me.username);
  console.log(`🤖 Logged in as @${me.username ?? me.first_name}`);

  if (!webhook) {
    console.log("⚠️  WEBHOOK_URL not provided. Bot running in polling mode.");
    await bot.startPolling();
    return;
  }

  const app = express();
  app.use(express.json());

  const fullWebhookPath = `/bot${config.telegramToken}`;

  app.post(fullWebhookPath, (req, res) => {
    bot.processUpdate(req.body);
    res.sendStatus(200);
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  await bot.setWebHook(`${webhook.url}${fullWebhookPath}`);
  console.log(`🚀 Bot running via webhook at ${webhook.url}/bot<token>`);

  server = app.listen(webhook.port, () => {
    console.log(`🚀 Express server listening on port ${webhook.port}`);
  });
}

bot.on("polling_error", (error: Error & { code?: string }) => {
  console.error(`🔴 Polling error: ${error.code || "UNKNOWN"} - ${error.message}`);
});

bot.on("webhook_error", (error: Error & { code?: string }) => {
  console.error(`🔴 Webhook error: ${error.code || "UNKNOWN"} - ${error.message}`);
});

async function shutdown(signal: string): Promise<void> {
  console.log(`🛑 ${signal} received, shutting down gracefully...`);

  sessions.stopSweeper();
  console.log(`🧹 Dropped ${sessions.size} in-progress session(s)`);

  if (bot.isPolling()) {
    await bot.stopPolling();
  }

  if (server) {
    const running = server;
    await new Promise<void>((resolve) => running.close(() => resolve()));
  }

  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error("Error during shutdown:", error);
      process.exit(1);
    });
  });
}

console.log(`🤖 Bot Token: ✅ Loaded`);
console.log(`🧠 OpenRouter model: ${config.openRouter.model}`);
console.log(`📩 Admin forwarding: ${config.adminChatId !== undefined ? "✅ Enabled" : "❌ Disabled"}`);
console.log(`📋 Bot ready to chat, build PDFs and read them!`);

main().catch((error: unknown) => {
  console.error("🔴 Failed to start the bot:", error);
  process.exit(1);
});
