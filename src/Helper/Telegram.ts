import type TelegramBot from "node-telegram-bot-api";
import type { Delivery, FileSource, OutboundReply } from "../types/types";
import { toIncomingEvent } from "./Commands";
import type { Dispatcher } from "./Dispatcher";

export const TELEGRAM_MESSAGE_LIMIT = 4096;

export interface SentMessage {
  message_id: number;
}

// The part of the Bot API client replies go through.
export interface TelegramOutbox {
  sendMessage(chatId: number, text: string): Promise<SentMessage>;
  sendPhoto(chatId: number, photo: string, options: { caption?: string }): Promise<SentMessage>;
  sendDocument(
    chatId: number,
    doc: Buffer,
    options: { caption?: string },
    fileOptions: { filename: string; contentType: string }
  ): Promise<SentMessage>;
}

export interface TelegramClient extends TelegramOutbox {
  on(event: "message", listener: (msg: TelegramBot.Message) => void): unknown;
  sendChatAction(chatId: number, action: "typing"): Promise<unknown>;
}

export class TelegramFileSource implements FileSource {
  constructor(private readonly bot: Pick<TelegramBot, "getFileLink">) {}

  async download(fileId: string): Promise<Buffer> {
    const fileLink = await this.bot.getFileLink(fileId);
    const response = await fetch(fileLink);

    if (!response.ok) {
      throw new Error(`Failed to download file: HTTP ${response.status}`);
    }

    return Buffer.from(await response.arrayBuffer());
  }
}

// Splits on line boundaries where it can, never inside a surrogate pair.
export function chunkText(text: string, limit = TELEGRAM_MESSAGE_LIMIT): string[] {
  if (text.length <= limit) {
    return [text];
  }

  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    const candidate = current.length > 0 ? `${current}\n${line}` : line;

    if (candidate.length <= limit) {
      current = candidate;
      continue;
    }

    if (current.length > 0) {
      chunks.push(current);
    }

    let rest = line;
    while (rest.length > limit) {
      const cut = isHighSurrogate(rest.charCodeAt(limit - 1)) ? limit - 1 : limit;
      chunks.push(rest.slice(0, cut));
      rest = rest.slice(cut);
    }
    current = rest;
  }

  if (current.length > 0) {
    chunks.push(current);
  }

  return chunks;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

async function send(outbox: TelegramOutbox, chatId: number, reply: OutboundReply): Promise<SentMessage[]> {
  switch (reply.kind) {
    case "text": {
      const sent: SentMessage[] = [];
      for (const chunk of chunkText(reply.text)) {
        sent.push(await outbox.sendMessage(chatId, chunk));
      }
      return sent;
    }
    case "photo":
      return [await outbox.sendPhoto(chatId, reply.fileId, { caption: reply.caption })];
    case "file":
      return [
        await outbox.sendDocument(
          chatId,
          reply.data,
          { caption: reply.caption },
          { filename: reply.fileName, contentType: reply.mimeType }
        ),
      ];
  }
}

// A failed delivery is logged and the rest still go out. `onSent` sees every
// message Telegram accepted, chunk by chunk.
export async function deliver(
  outbox: TelegramOutbox,
  deliveries: Delivery[],
  onSent?: (delivery: Delivery, message: SentMessage) => void
): Promise<void> {
  for (const delivery of deliveries) {
    try {
      const sent = await send(outbox, delivery.chatId, delivery.reply);
      for (const message of sent) {
        onSent?.(delivery, message);
      }
    } catch (error) {
      console.error(`Error sending reply to chat ${delivery.chatId}:`, error);
    }
  }
}

export function attachDispatcher(
  bot: TelegramClient,
  dispatcher: Dispatcher,
  botUsername?: string
): void {
  bot.on("message", async (msg) => {
    const event = toIncomingEvent(msg, botUsername);
    if (!event) {
      return;
    }

    if (event.kind === "text") {
      bot.sendChatAction(event.chatId, "typing").catch((error: unknown) => {
        console.error(`Error sending chat action to ${event.chatId}:`, error);
      });
    }

    const deliveries = await dispatcher.dispatch(event);

    await deliver(bot, deliveries, (delivery, message) => {
      if (delivery.forwardedFrom !== undefined) {
        dispatcher.recordForward(message.message_id, delivery.forwardedFrom);
      }
    });
  });
}
