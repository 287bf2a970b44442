export const WELCOME_MESSAGE = `👋 Hi! I'm an AI assistant running on OpenRouter.

Here is what I can do:
🗣 /chat - talk to the AI (just send text)
📄 /pdf - send one or more photos, then /done to get them as one PDF
📖 /extract - send a PDF and I'll pull the text out of it
🎨 /stylize <disney|pixar|anime> - restyle your next photo
🧹 /clear - forget your photos and pending actions
📩 /contact_admin - send a message to the admin
ℹ️ /admin - admin contact`;

export const HELP_MESSAGE = `🆘 Help

• Send any text to chat with the AI
• Send photos, then /done (or /pdf) to receive them as one PDF, pages in the order you sent them
• Send a PDF file to get its text back
• /clear resets your session
• /start shows the menu again`;

export const CHAT_PROMPT = "🗣 Send me any text and I'll answer through the AI.";

export const EXTRACT_PROMPT = "📖 Send me a PDF file and I'll extract its text.";

export const STYLIZE_USAGE = "🎨 Usage: /stylize disney, /stylize pixar or /stylize anime";

export const CLEARED_MESSAGE = "🧹 Your session has been cleared.";

export const CONTACT_ADMIN_PROMPT = "📩 Write the message you want to send to the admin:";

export const SENT_TO_ADMIN = "✅ Your message was sent to the admin.";

export const ADMIN_REPLY_SENT = "✅ Reply delivered to the user.";

export const ADMIN_TARGET_UNKNOWN =
  "❓ Could not find the user for that message. Reply directly to a forwarded user message.";

export const ADMIN_ONLY = "⛔ This command is for the admin only.";

export const BROADCAST_USAGE = "📣 Reply to a text or photo message with /broadcast to send it to every user.";

export const BROADCAST_NO_USERS = "📣 No users to broadcast to yet.";

export const UNSUPPORTED_FILE =
  "❌ Unsupported file type. Send a PDF to extract text, or a JPEG/PNG image to add it to your PDF.";

export const GENERIC_ERROR = "❌ Something went wrong while handling your message. Please try again.";

export function imageReceived(count: number): string {
  return `✅ Image ${count} received. Send more, or type /done to get your PDF.`;
}

export function styleArmed(style: string): string {
  return `🎨 ${style} style selected. Now send me a photo.`;
}

export function broadcastQueued(chats: number): string {
  return `📣 Broadcast sent to ${chats} chat${chats === 1 ? "" : "s"}.`;
}

export function pdfCaption(pages: number): string {
  return `📄 Your PDF (${pages} page${pages === 1 ? "" : "s"})`;
}
