import { PDFDocument, type PDFImage } from "pdf-lib";
import { extractText, getDocumentProxy } from "unpdf";
import { BotError } from "./Errors";

// Telegram caps a text message at 4096 characters; longer extractions go
// out as a .txt file instead.
export const MAX_INLINE_TEXT = 3000;

export type ImageFormat = "jpeg" | "png";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

export function detectImageFormat(data: Uint8Array): ImageFormat | undefined {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return "jpeg";
  }
  if (
    data.length >= PNG_SIGNATURE.length &&
    PNG_SIGNATURE.every((byte, index) => data[index] === byte)
  ) {
    return "png";
  }
  return undefined;
}

// One full page per image, in order. All or nothing: a RenderError names the
// first bad position.
export async function imagesToPdf(images: Buffer[]): Promise<Buffer> {
  if (images.length === 0) {
    throw new BotError("EmptyImageSet", "no images to convert");
  }

  const doc = await PDFDocument.create();

  for (const [index, image] of images.entries()) {
    const position = index + 1;
    const format = detectImageFormat(image);

    if (!format) {
      throw new BotError(
        "RenderError",
        `image #${position} is not a JPEG or PNG file.`
      );
    }

    // pdf-lib reads through `.buffer`, which for a pooled Buffer starts
    // before the image bytes; embed from a copy that owns its memory.
    const bytes = new Uint8Array(image);

    let embedded: PDFImage;
    try {
      embedded = format === "jpeg" ? await doc.embedJpg(bytes) : await doc.embedPng(bytes);
    } catch (error) {
      console.error(`Failed to decode image #${position}:`, error);
      throw new BotError("RenderError", `image #${position} could not be decoded.`, {
        cause: error,
      });
    }

    const page = doc.addPage([embedded.width, embedded.height]);
    page.drawImage(embedded, {
      x: 0,
      y: 0,
      width: embedded.width,
      height: embedded.height,
    });
  }

  return Buffer.from(await doc.save());
}

export async function extractPdfText(pdf: Buffer): Promise<string[]> {
  let pages: string[];

  try {
    const document = await getDocumentProxy(new Uint8Array(pdf));
    try {
      const { text } = await extractText(document, { mergePages: false });
      pages = Array.isArray(text) ? text : [text];
    } finally {
      await document.destroy();
    }
  } catch (error) {
    console.error("Failed to read PDF:", error);
    throw new BotError("UnreadablePDF", "not a valid PDF document", { cause: error });
  }

  const trimmed = pages.map((page) => page.trim());
  if (trimmed.every((page) => page.length === 0)) {
    throw new BotError("NoExtractableText", "no embedded text on any page");
  }

  return trimmed;
}

export function formatExtractedText(pages: string[]): string {
  return pages.map((page, index) => `--- Page ${index + 1} ---\n${page}`).join("\n\n");
}
