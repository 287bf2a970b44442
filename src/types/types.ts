export type CommandName =
  | "start"
  | "help"
  | "chat"
  | "pdf"
  | "done"
  | "extract"
  | "readpdf"
  | "stylize"
  | "style"
  | "clear"
  | "admin"
  | "contact_admin"
  | "broadcast";

export type StyleName = "disney" | "pixar" | "anime";

export interface Sender {
  id: number;
  username?: string;
  fullName: string;
}

// The message an incoming one answers, as far as the bot needs it.
export interface ReplyRef {
  messageId: number;
  text?: string;
  photoFileId?: string;
}

interface EventBase {
  chatId: number;
  sender: Sender;
  replyTo?: ReplyRef;
}

export interface TextEvent extends EventBase {
  kind: "text";
  text: string;
}

export interface CommandEvent extends EventBase {
  kind: "command";
  command: CommandName | "unknown";
  name: string;
  args: string[];
}

export interface PhotoEvent extends EventBase {
  kind: "photo";
  fileId: string;
  fileSize?: number;
  caption?: string;
}

export interface DocumentEvent extends EventBase {
  kind: "document";
  fileId: string;
  fileName?: string;
  mimeType?: string;
  fileSize?: number;
  caption?: string;
}

export type IncomingEvent = TextEvent | CommandEvent | PhotoEvent | DocumentEvent;

export type OutboundReply =
  | { kind: "text"; text: string }
  | {
      kind: "file";
      fileName: string;
      mimeType: string;
      data: Buffer;
      caption?: string;
    }
  // a photo already on Telegram's servers, re-sent by file id
  | { kind: "photo"; fileId: string; caption?: string };

export interface Delivery {
  chatId: number;
  reply: OutboundReply;
  // set on messages forwarded to the admin: the chat an admin reply goes back to
  forwardedFrom?: number;
}

export interface Session {
  images: Buffer[];
  style?: StyleName;
  awaitingAdminMessage: boolean;
  touchedAt: number;
}

export type StylizeResult =
  | { kind: "stylized"; image: Buffer }
  | { kind: "not_implemented"; style: StyleName };

export interface FileSource {
  download(fileId: string): Promise<Buffer>;
}
