export type BotErrorCode =
  | "PayloadTooLarge"
  | "UpstreamUnavailable"
  | "TooManyImages"
  | "EmptyImageSet"
  | "RenderError"
  | "UnreadablePDF"
  | "NoExtractableText"
  | "NotImplemented"
  | "UnknownCommand"
  | "MissingConfiguration";

export class BotError extends Error {
  readonly code: BotErrorCode;

  constructor(code: BotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BotError";
    this.code = code;
  }
}

export function isBotError(error: unknown): error is BotError {
  return error instanceof BotError;
}

// User-facing text for each failure category. RenderError and NotImplemented
// carry details from the message, everything else is fixed.
export function describeError(error: BotError): string {
  switch (error.code) {
    case "PayloadTooLarge":
      return `❌ Too large: ${error.message}`;
    case "UpstreamUnavailable":
      return "⚠️ The AI service is not responding right now. Please try again later.";
    case "TooManyImages":
      return `❌ ${error.message}\n\nSend /done to build the PDF or /clear to start over.`;
    case "EmptyImageSet":
      return "🖼 No images yet. Send me one or more photos, then /done to get a PDF.";
    case "RenderError":
      return `❌ Could not build the PDF: ${error.message}\n\nNothing was created. Send /clear to start over.`;
    case "UnreadablePDF":
      return "❌ Text extraction failed: this file is not a readable PDF.";
    case "NoExtractableText":
      return "📄 This PDF has no embedded text (it may be scanned images only).";
    case "NotImplemented":
      return `🎨 ${error.message}`;
    case "UnknownCommand":
      return `❓ Unknown command ${error.message}. Send /help to see what I can do.`;
    case "MissingConfiguration":
      return `⚙️ Bot is misconfigured: ${error.message}`;
  }
}
