import { describe, expect, it } from "vitest";
import { BotError } from "./Errors";
import { KeyedLock, SessionStore } from "./Session";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("KeyedLock", () => {
  it("runs tasks for the same key in call order", async () => {
    const lock = new KeyedLock<number>();
    const finished: string[] = [];

    await Promise.all([
      lock.run(1, async () => {
        await delay(20);
        finished.push("slow");
      }),
      lock.run(1, async () => {
        finished.push("fast");
      }),
    ]);

    expect(finished).toEqual(["slow", "fast"]);
  });

  it("does not make different keys wait for each other", async () => {
    const lock = new KeyedLock<number>();
    const finished: number[] = [];

    await Promise.all([
      lock.run(1, async () => {
        await delay(20);
        finished.push(1);
      }),
      lock.run(2, async () => {
        finished.push(2);
      }),
    ]);

    expect(finished).toEqual([2, 1]);
  });

  it("keeps going after a task fails and forgets idle keys", async () => {
    const lock = new KeyedLock<string>();

    await expect(lock.run("a", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(lock.run("a", async () => "ok")).resolves.toBe("ok");

    await delay(0);
    expect(lock.size).toBe(0);
  });
});

describe("SessionStore", () => {
  it("keeps images in arrival order per chat", () => {
    const store = new SessionStore({ maxImages: 5, ttlMs: 1000 });
    const [a1, a2, b1] = [Buffer.from("a1"), Buffer.from("a2"), Buffer.from("b1")];

    expect(store.addImage(1, a1)).toBe(1);
    expect(store.addImage(2, b1)).toBe(1);
    expect(store.addImage(1, a2)).toBe(2);

    expect(store.images(1)).toEqual([a1, a2]);
    expect(store.images(2)).toEqual([b1]);
  });

  it("refuses images past the limit without changing the set", () => {
    const store = new SessionStore({ maxImages: 2, ttlMs: 1000 });
    store.addImage(1, Buffer.from("1"));
    store.addImage(1, Buffer.from("2"));

    expect(() => store.addImage(1, Buffer.from("3"))).toThrow(BotError);
    expect(() => store.addImage(1, Buffer.from("3"))).toThrow(
      "You already sent 2 images, the limit is 2."
    );
    expect(store.imageCount(1)).toBe(2);
  });

  it("checks for room without adding anything", () => {
    const store = new SessionStore({ maxImages: 1, ttlMs: 1000 });

    expect(() => store.ensureRoom(1)).not.toThrow();
    expect(store.get(1)).toBeUndefined();

    store.addImage(1, Buffer.from("1"));
    expect(() => store.ensureRoom(1)).toThrow("You already sent 1 images, the limit is 1.");
  });

  it("hands out a style once", () => {
    const store = new SessionStore({ maxImages: 2, ttlMs: 1000 });
    store.armStyle(7, "pixar");

    expect(store.takeStyle(7)).toBe("pixar");
    expect(store.takeStyle(7)).toBeUndefined();
  });

  it("clears images but keeps the rest of the session", () => {
    const store = new SessionStore({ maxImages: 2, ttlMs: 1000 });
    store.addImage(3, Buffer.from("x"));
    store.setAwaitingAdmin(3, true);

    store.clearImages(3);

    expect(store.imageCount(3)).toBe(0);
    expect(store.isAwaitingAdmin(3)).toBe(true);
  });

  it("evicts sessions idle for longer than the ttl", () => {
    let now = 0;
    const store = new SessionStore({ maxImages: 5, ttlMs: 30 * 60_000, now: () => now });

    store.addImage(1, Buffer.from("old"));
    now = 20 * 60_000;
    store.addImage(2, Buffer.from("recent"));

    now = 31 * 60_000;
    expect(store.sweep()).toBe(1);
    expect(store.get(1)).toBeUndefined();
    expect(store.imageCount(2)).toBe(1);
  });
});
