import type TelegramBot from "node-telegram-bot-api";
import { describe, expect, it } from "vitest";
import { parseCommand, toIncomingEvent } from "./Commands";

function message(fields: Partial<TelegramBot.Message>): TelegramBot.Message {
  return {
    message_id: 1,
    date: 0,
    chat: { id: 42, type: "private" },
    from: { id: 42, is_bot: false, first_name: "Ada", last_name: "Lovelace", username: "ada" },
    ...fields,
  };
}

describe("parseCommand", () => {
  it("splits the command name from its arguments", () => {
    expect(parseCommand("/stylize anime")).toEqual({
      command: "stylize",
      name: "stylize",
      args: ["anime"],
    });
  });

  it("reads the bot mention and ignores letter case", () => {
    expect(parseCommand("/Done@SomeBot")).toEqual({
      command: "done",
      name: "done",
      args: [],
      target: "SomeBot",
    });
  });

  it("marks commands outside the known set as unknown", () => {
    expect(parseCommand("/translate en")).toEqual({
      command: "unknown",
      name: "translate",
      args: ["en"],
    });
  });

  it("leaves plain text alone", () => {
    expect(parseCommand("hello /pdf")).toBeUndefined();
    expect(parseCommand("/")).toBeUndefined();
  });
});

describe("toIncomingEvent", () => {
  it("classifies commands", () => {
    expect(toIncomingEvent(message({ text: "/pdf" }))).toEqual({
      kind: "command",
      chatId: 42,
      sender: { id: 42, username: "ada", fullName: "Ada Lovelace" },
      command: "pdf",
      name: "pdf",
      args: [],
    });
  });

  it("picks the largest photo size", () => {
    const event = toIncomingEvent(
      message({
        photo: [
          { file_id: "small", file_unique_id: "s", width: 90, height: 90, file_size: 1000 },
          { file_id: "large", file_unique_id: "l", width: 1280, height: 1280, file_size: 90000 },
        ],
      })
    );

    expect(event).toMatchObject({ kind: "photo", fileId: "large", fileSize: 90000 });
  });

  it("classifies documents with their mime type", () => {
    const event = toIncomingEvent(
      message({
        document: {
          file_id: "doc",
          file_unique_id: "d",
          file_name: "notes.pdf",
          mime_type: "application/pdf",
          file_size: 2048,
        },
      })
    );

    expect(event).toMatchObject({
      kind: "document",
      fileId: "doc",
      fileName: "notes.pdf",
      mimeType: "application/pdf",
      fileSize: 2048,
    });
  });

  it("keeps the id and text of the message being replied to", () => {
    const event = toIncomingEvent(
      message({
        text: "Thanks",
        reply_to_message: message({ message_id: 0, text: "Chat: 7 asked something" }),
      })
    );

    expect(event).toMatchObject({
      kind: "text",
      text: "Thanks",
      replyTo: { messageId: 0, text: "Chat: 7 asked something" },
    });
  });

  it("keeps the caption and replied-to photo of a photo reply", () => {
    const event = toIncomingEvent(
      message({
        caption: "See this",
        photo: [{ file_id: "answer", file_unique_id: "a", width: 10, height: 10 }],
        reply_to_message: message({
          message_id: 31,
          photo: [
            { file_id: "thumb", file_unique_id: "t", width: 90, height: 90 },
            { file_id: "full", file_unique_id: "f", width: 900, height: 900 },
          ],
        }),
      })
    );

    expect(event).toMatchObject({
      kind: "photo",
      fileId: "answer",
      caption: "See this",
      replyTo: { messageId: 31, photoFileId: "full" },
    });
  });

  it("accepts commands addressed to this bot", () => {
    expect(toIncomingEvent(message({ text: "/pdf@MyBot" }), "mybot")).toMatchObject({
      kind: "command",
      command: "pdf",
    });
    expect(toIncomingEvent(message({ text: "/pdf" }), "MyBot")).toMatchObject({
      kind: "command",
      command: "pdf",
    });
  });

  it("drops commands addressed to another bot", () => {
    expect(toIncomingEvent(message({ text: "/pdf@otherbot" }), "MyBot")).toBeUndefined();
  });

  it("skips messages it does not handle", () => {
    expect(toIncomingEvent(message({}))).toBeUndefined();
  });
});
