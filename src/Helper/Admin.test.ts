import { describe, expect, it } from "vitest";
import { AdminDesk, formatAdminForward, formatAdminReply, formatBroadcast } from "./Admin";

describe("admin forwarding", () => {
  it("shows the sender and origin chat", () => {
    const forward = formatAdminForward(42, { id: 42, username: "ada", fullName: "Ada Lovelace" }, "Hi");

    expect(forward).toBe(
      "📩 Message for admin\n\nFrom: Ada Lovelace (@ada)\nChat: 42\n\nHi\n\nReply to this message to answer the user."
    );
  });

  it("marks a missing username", () => {
    const forward = formatAdminForward(-100500, { id: 7, fullName: "Group member" }, "Hello");

    expect(forward).toContain("From: Group member (—)\nChat: -100500");
  });

  it("prefixes relayed replies and broadcasts", () => {
    expect(formatAdminReply("On it")).toBe("📬 Reply from admin:\n\nOn it");
    expect(formatBroadcast("News")).toBe("📣 [Admin broadcast]\n\nNews");
  });
});

describe("AdminDesk", () => {
  it("resolves recorded forwards by message id", () => {
    const desk = new AdminDesk();
    desk.recordForward(500, 42);
    desk.recordForward(501, -100500);

    expect(desk.resolveForward(500)).toBe(42);
    expect(desk.resolveForward(501)).toBe(-100500);
    expect(desk.resolveForward(502)).toBeUndefined();
  });

  it("forgets the oldest forwards past its capacity", () => {
    const desk = new AdminDesk(2);
    desk.recordForward(1, 10);
    desk.recordForward(2, 20);
    desk.recordForward(1, 10);
    desk.recordForward(3, 30);

    expect(desk.resolveForward(2)).toBeUndefined();
    expect(desk.resolveForward(1)).toBe(10);
    expect(desk.resolveForward(3)).toBe(30);
  });

  it("lists each known chat once", () => {
    const desk = new AdminDesk();
    desk.trackChat(1);
    desk.trackChat(2);
    desk.trackChat(1);

    expect(desk.knownChats()).toEqual([1, 2]);
  });
});
