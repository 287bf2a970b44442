import type { Sender } from "../types/types";

// Forwards the admin can still answer; older ones are forgotten first.
export const MAX_TRACKED_FORWARDS = 1000;

export function formatAdminForward(chatId: number, sender: Sender, text: string): string {
  const username = sender.username ? `@${sender.username}` : "—";

  return `📩 Message for admin

From: ${sender.fullName} (${username})
Chat: ${chatId}

${text}

Reply to this message to answer the user.`;
}

export function formatAdminReply(text: string): string {
  return `📬 Reply from admin:\n\n${text}`;
}

export function formatBroadcast(text: string): string {
  return `📣 [Admin broadcast]\n\n${text}`;
}

// Which admin-chat message came from which user chat, and which chats have
// talked to the bot. In memory only, like the sessions.
export class AdminDesk {
  private readonly forwards = new Map<number, number>();
  private readonly chats = new Set<number>();

  constructor(private readonly maxForwards = MAX_TRACKED_FORWARDS) {}

  recordForward(messageId: number, chatId: number): void {
    this.forwards.delete(messageId);
    this.forwards.set(messageId, chatId);

    while (this.forwards.size > this.maxForwards) {
      const oldest = this.forwards.keys().next();
      if (oldest.done) break;
      this.forwards.delete(oldest.value);
    }
  }

  resolveForward(messageId: number): number | undefined {
    return this.forwards.get(messageId);
  }

  trackChat(chatId: number): void {
    this.chats.add(chatId);
  }

  knownChats(): number[] {
    return [...this.chats];
  }
}
