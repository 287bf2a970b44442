import type TelegramBot from "node-telegram-bot-api";
import type { CommandName, IncomingEvent, ReplyRef, Sender } from "../types/types";

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@(\w+))?(?:\s+([\s\S]*))?$/;

function toCommandName(name: string): CommandName | "unknown" {
  switch (name) {
    case "start":
    case "help":
    case "chat":
    case "pdf":
    case "done":
    case "extract":
    case "readpdf":
    case "stylize":
    case "style":
    case "clear":
    case "admin":
    case "contact_admin":
    case "broadcast":
      return name;
    default:
      return "unknown";
  }
}

export interface ParsedCommand {
  command: CommandName | "unknown";
  name: string;
  args: string[];
  // the bot named after "@", as in /pdf@SomeBot
  target?: string;
}

export function parseCommand(text: string): ParsedCommand | undefined {
  const match = text.trim().match(COMMAND_PATTERN);
  if (!match?.[1]) {
    return undefined;
  }

  const name = match[1].toLowerCase();
  const args = (match[3] ?? "").split(/\s+/).filter((arg) => arg.length > 0);

  return { command: toCommandName(name), name, args, target: match[2] };
}

function toSender(msg: TelegramBot.Message): Sender {
  const from = msg.from;
  if (!from) {
    return { id: msg.chat.id, fullName: msg.chat.title ?? "Unknown" };
  }

  return {
    id: from.id,
    username: from.username,
    fullName: [from.first_name, from.last_name].filter(Boolean).join(" "),
  };
}

function largestPhoto(photos: TelegramBot.PhotoSize[] | undefined): TelegramBot.PhotoSize | undefined {
  // Telegram lists the sizes smallest first
  return photos?.[photos.length - 1];
}

function toReplyRef(reply: TelegramBot.Message | undefined): ReplyRef | undefined {
  if (!reply) {
    return undefined;
  }
  return {
    messageId: reply.message_id,
    text: reply.text ?? reply.caption,
    photoFileId: largestPhoto(reply.photo)?.file_id,
  };
}

// Undefined for message kinds the bot does not handle (stickers, voice,
// service messages) and for commands addressed to another bot.
export function toIncomingEvent(
  msg: TelegramBot.Message,
  botUsername?: string
): IncomingEvent | undefined {
  const base = {
    chatId: msg.chat.id,
    sender: toSender(msg),
    replyTo: toReplyRef(msg.reply_to_message),
  };

  const largest = largestPhoto(msg.photo);
  if (largest) {
    return {
      ...base,
      kind: "photo",
      fileId: largest.file_id,
      fileSize: largest.file_size,
      caption: msg.caption,
    };
  }

  if (msg.document) {
    return {
      ...base,
      kind: "document",
      fileId: msg.document.file_id,
      fileName: msg.document.file_name,
      mimeType: msg.document.mime_type,
      fileSize: msg.document.file_size,
      caption: msg.caption,
    };
  }

  if (msg.text !== undefined) {
    const parsed = parseCommand(msg.text);
    if (parsed) {
      const { target, ...command } = parsed;
      if (target && botUsername && target.toLowerCase() !== botUsername.toLowerCase()) {
        return undefined;
      }
      return { ...base, kind: "command", ...command };
    }

    return { ...base, kind: "text", text: msg.text };
  }

  return undefined;
}
