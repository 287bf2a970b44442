import type {
  CommandEvent,
  Delivery,
  DocumentEvent,
  FileSource,
  IncomingEvent,
  OutboundReply,
  PhotoEvent,
  TextEvent,
} from "../types/types";
import { AdminDesk, formatAdminForward, formatAdminReply, formatBroadcast } from "./Admin";
import { BotError, describeError, isBotError } from "./Errors";
import * as Messages from "./Messages";
import {
  MAX_INLINE_TEXT,
  extractPdfText,
  formatExtractedText,
  imagesToPdf,
} from "./Pdf";
import { KeyedLock, type SessionStore } from "./Session";
import { parseStyle, stylizeImage } from "./Stylize";

// Bots may only download files up to 20MB
export const MAX_DOWNLOAD_BYTES = 20 * 1024 * 1024;

export interface Completer {
  complete(prompt: string): Promise<string>;
}

export interface DispatcherDeps {
  sessions: SessionStore;
  completion: Completer;
  files: FileSource;
  adminContact: string;
  adminChatId?: number;
  desk?: AdminDesk;
}

const ADMIN_PHOTO_CAPTION = "📬 Reply from admin";
const BROADCAST_PHOTO_CAPTION = "📣 [Admin broadcast]";

const text = (value: string): OutboundReply => ({ kind: "text", text: value });

export class Dispatcher {
  private readonly locks = new KeyedLock<number>();
  private readonly desk: AdminDesk;

  constructor(private readonly deps: DispatcherDeps) {
    this.desk = deps.desk ?? new AdminDesk();
  }

  // Events of one chat run one after another in call order. Never rejects:
  // failures become a text reply to the originating chat.
  dispatch(event: IncomingEvent): Promise<Delivery[]> {
    if (!this.isAdminChat(event.chatId)) {
      this.desk.trackChat(event.chatId);
    }

    return this.locks.run(event.chatId, async () => {
      try {
        return await this.route(event);
      } catch (error) {
        if (isBotError(error)) {
          console.warn(`⚠️ ${error.code} in chat ${event.chatId}: ${error.message}`);
          return [{ chatId: event.chatId, reply: text(describeError(error)) }];
        }

        console.error(`Error handling ${event.kind} in chat ${event.chatId}:`, error);
        return [{ chatId: event.chatId, reply: text(Messages.GENERIC_ERROR) }];
      }
    });
  }

  // Called once a forward is on Telegram, with the id it got in the admin chat.
  recordForward(messageId: number, chatId: number): void {
    this.desk.recordForward(messageId, chatId);
  }

  private isAdminChat(chatId: number): boolean {
    return this.deps.adminChatId !== undefined && chatId === this.deps.adminChatId;
  }

  private async route(event: IncomingEvent): Promise<Delivery[]> {
    switch (event.kind) {
      case "command":
        return this.onCommand(event);
      case "photo":
        return this.isAdminChat(event.chatId) && event.replyTo
          ? this.relayAdminPhoto(event)
          : this.onImage(event);
      case "document":
        return this.onDocument(event);
      case "text":
        return this.onText(event);
    }
  }

  private reply(event: IncomingEvent, reply: OutboundReply): Delivery[] {
    return [{ chatId: event.chatId, reply }];
  }

  private async onCommand(event: CommandEvent): Promise<Delivery[]> {
    const { sessions } = this.deps;

    switch (event.command) {
      case "start":
        return this.reply(event, text(Messages.WELCOME_MESSAGE));
      case "help":
        return this.reply(event, text(Messages.HELP_MESSAGE));
      case "chat":
        return this.reply(event, text(Messages.CHAT_PROMPT));
      case "pdf":
      case "done":
        return this.reply(event, await this.finalizePdf(event.chatId));
      case "extract":
      case "readpdf":
        return this.reply(event, text(Messages.EXTRACT_PROMPT));
      case "stylize":
      case "style": {
        const style = parseStyle(event.args[0]);
        if (!style) {
          return this.reply(event, text(Messages.STYLIZE_USAGE));
        }
        sessions.armStyle(event.chatId, style);
        return this.reply(event, text(Messages.styleArmed(style)));
      }
      case "clear":
        sessions.clear(event.chatId);
        return this.reply(event, text(Messages.CLEARED_MESSAGE));
      case "admin":
        return this.reply(event, text(this.deps.adminContact));
      case "contact_admin":
        if (this.deps.adminChatId === undefined) {
          return this.reply(event, text(this.deps.adminContact));
        }
        sessions.setAwaitingAdmin(event.chatId, true);
        return this.reply(event, text(Messages.CONTACT_ADMIN_PROMPT));
      case "broadcast":
        return this.broadcast(event);
      case "unknown":
        throw new BotError("UnknownCommand", `/${event.name}`);
    }
  }

  private async finalizePdf(chatId: number): Promise<OutboundReply> {
    const images = this.deps.sessions.images(chatId);
    const pdf = await imagesToPdf(images);

    this.deps.sessions.clearImages(chatId);
    console.log(`📄 Built ${images.length}-page PDF for chat ${chatId}`);

    return {
      kind: "file",
      fileName: "images.pdf",
      mimeType: "application/pdf",
      data: pdf,
      caption: Messages.pdfCaption(images.length),
    };
  }

  private checkSize(fileSize: number | undefined): void {
    if (fileSize !== undefined && fileSize > MAX_DOWNLOAD_BYTES) {
      const megabytes = (fileSize / (1024 * 1024)).toFixed(1);
      throw new BotError("PayloadTooLarge", `the file is ${megabytes}MB, the limit is 20MB.`);
    }
  }

  private async download(fileId: string, fileSize: number | undefined): Promise<Buffer> {
    this.checkSize(fileSize);
    return this.deps.files.download(fileId);
  }

  private async accumulate(event: PhotoEvent | DocumentEvent): Promise<Delivery[]> {
    const { sessions } = this.deps;

    sessions.ensureRoom(event.chatId);
    const image = await this.download(event.fileId, event.fileSize);
    const count = sessions.addImage(event.chatId, image);
    return this.reply(event, text(Messages.imageReceived(count)));
  }

  // Photos and JPEG/PNG documents: stylized when a style is armed, otherwise
  // added to the pending set.
  private async onImage(event: PhotoEvent | DocumentEvent): Promise<Delivery[]> {
    this.checkSize(event.fileSize);

    const style = this.deps.sessions.takeStyle(event.chatId);
    if (!style) {
      return this.accumulate(event);
    }

    const image = await this.download(event.fileId, event.fileSize);
    const result = stylizeImage(image, style);

    switch (result.kind) {
      case "not_implemented":
        throw new BotError(
          "NotImplemented",
          `The ${result.style} style is not available yet. Your photo was not changed or saved.`
        );
      case "stylized":
        return this.reply(event, {
          kind: "file",
          fileName: `${style}.jpg`,
          mimeType: "image/jpeg",
          data: result.image,
          caption: `🎨 ${style} style`,
        });
    }
  }

  private async onDocument(event: DocumentEvent): Promise<Delivery[]> {
    const mimeType = event.mimeType?.toLowerCase();
    const isPdf =
      mimeType === "application/pdf" || event.fileName?.toLowerCase().endsWith(".pdf") === true;

    if (isPdf) {
      const pdf = await this.download(event.fileId, event.fileSize);
      return this.reply(event, extractionReply(await extractPdfText(pdf)));
    }

    if (mimeType === "image/jpeg" || mimeType === "image/png") {
      return this.onImage(event);
    }

    return this.reply(event, text(Messages.UNSUPPORTED_FILE));
  }

  private async onText(event: TextEvent): Promise<Delivery[]> {
    const { sessions, adminChatId } = this.deps;

    if (this.isAdminChat(event.chatId) && event.replyTo) {
      return this.relayAdminReply(event, event.replyTo.messageId, text(formatAdminReply(event.text)));
    }

    if (adminChatId !== undefined && sessions.isAwaitingAdmin(event.chatId)) {
      sessions.setAwaitingAdmin(event.chatId, false);
      return [
        {
          chatId: adminChatId,
          reply: text(formatAdminForward(event.chatId, event.sender, event.text)),
          forwardedFrom: event.chatId,
        },
        { chatId: event.chatId, reply: text(Messages.SENT_TO_ADMIN) },
      ];
    }

    if (event.text.trim().length === 0) {
      return this.reply(event, text(Messages.CHAT_PROMPT));
    }

    return this.reply(event, text(await this.deps.completion.complete(event.text)));
  }

  private relayAdminPhoto(event: PhotoEvent): Delivery[] {
    const messageId = event.replyTo?.messageId;
    if (messageId === undefined) {
      return this.reply(event, text(Messages.ADMIN_TARGET_UNKNOWN));
    }
    return this.relayAdminReply(event, messageId, {
      kind: "photo",
      fileId: event.fileId,
      caption: event.caption ?? ADMIN_PHOTO_CAPTION,
    });
  }

  // The target comes only from the message ids recorded when forwards were
  // sent; nothing in the forwarded text decides where a reply goes.
  private relayAdminReply(event: IncomingEvent, messageId: number, reply: OutboundReply): Delivery[] {
    const target = this.desk.resolveForward(messageId);
    if (target === undefined) {
      return this.reply(event, text(Messages.ADMIN_TARGET_UNKNOWN));
    }
    return [
      { chatId: target, reply },
      { chatId: event.chatId, reply: text(Messages.ADMIN_REPLY_SENT) },
    ];
  }

  private broadcast(event: CommandEvent): Delivery[] {
    if (!this.isAdminChat(event.chatId)) {
      return this.reply(event, text(Messages.ADMIN_ONLY));
    }

    const source = event.replyTo;
    let reply: OutboundReply;
    if (source?.text) {
      reply = text(formatBroadcast(source.text));
    } else if (source?.photoFileId) {
      reply = { kind: "photo", fileId: source.photoFileId, caption: BROADCAST_PHOTO_CAPTION };
    } else {
      return this.reply(event, text(Messages.BROADCAST_USAGE));
    }

    const chats = this.desk.knownChats();
    if (chats.length === 0) {
      return this.reply(event, text(Messages.BROADCAST_NO_USERS));
    }

    console.log(`📣 Broadcasting to ${chats.length} chat(s)`);
    return [
      ...chats.map((chatId) => ({ chatId, reply })),
      { chatId: event.chatId, reply: text(Messages.broadcastQueued(chats.length)) },
    ];
  }
}

export function extractionReply(pages: string[]): OutboundReply {
  const body = formatExtractedText(pages);

  if (body.length <= MAX_INLINE_TEXT) {
    return text(body);
  }

  return {
    kind: "file",
    fileName: "extracted.txt",
    mimeType: "text/plain; charset=utf-8",
    data: Buffer.from(body, "utf-8"),
    caption: `📖 Extracted text (${pages.length} page${pages.length === 1 ? "" : "s"})`,
  };
}
