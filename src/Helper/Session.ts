import { BotError } from "./Errors";
import type { Session, StyleName } from "../types/types";

// Runs tasks one at a time per key, in the order `run` was called. Tasks
// under different keys do not wait for each other.
export class KeyedLock<K> {
  private readonly tails = new Map<K, Promise<void>>();

  run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get size(): number {
    return this.tails.size;
  }
}

export interface SessionStoreOptions {
  maxImages: number;
  ttlMs: number;
  now?: () => number;
}

// Per-chat state: pending images, an armed style and the admin-message flag.
// Process-local; a restart loses it.
export class SessionStore {
  private readonly sessions = new Map<number, Session>();
  private readonly now: () => number;
  private sweeper?: NodeJS.Timeout;

  constructor(private readonly options: SessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  private touch(chatId: number): Session {
    let session = this.sessions.get(chatId);
    if (!session) {
      session = { images: [], awaitingAdminMessage: false, touchedAt: 0 };
      this.sessions.set(chatId, session);
    }
    session.touchedAt = this.now();
    return session;
  }

  get(chatId: number): Session | undefined {
    return this.sessions.get(chatId);
  }

  imageCount(chatId: number): number {
    return this.sessions.get(chatId)?.images.length ?? 0;
  }

  images(chatId: number): Buffer[] {
    return [...(this.sessions.get(chatId)?.images ?? [])];
  }

  ensureRoom(chatId: number): void {
    const count = this.imageCount(chatId);
    if (count >= this.options.maxImages) {
      throw new BotError(
        "TooManyImages",
        `You already sent ${count} images, the limit is ${this.options.maxImages}.`
      );
    }
  }

  addImage(chatId: number, image: Buffer): number {
    this.ensureRoom(chatId);

    const session = this.touch(chatId);
    session.images.push(image);
    return session.images.length;
  }

  clearImages(chatId: number): void {
    const session = this.sessions.get(chatId);
    if (session) {
      session.images = [];
      session.touchedAt = this.now();
    }
  }

  armStyle(chatId: number, style: StyleName): void {
    this.touch(chatId).style = style;
  }

  takeStyle(chatId: number): StyleName | undefined {
    const session = this.sessions.get(chatId);
    const style = session?.style;
    if (session) {
      session.style = undefined;
    }
    return style;
  }

  setAwaitingAdmin(chatId: number, awaiting: boolean): void {
    this.touch(chatId).awaitingAdminMessage = awaiting;
  }

  isAwaitingAdmin(chatId: number): boolean {
    return this.sessions.get(chatId)?.awaitingAdminMessage ?? false;
  }

  clear(chatId: number): boolean {
    return this.sessions.delete(chatId);
  }

  // returns how many sessions were evicted
  sweep(now = this.now()): number {
    let evicted = 0;
    for (const [chatId, session] of this.sessions) {
      if (now - session.touchedAt > this.options.ttlMs) {
        this.sessions.delete(chatId);
        evicted++;
      }
    }
    return evicted;
  }

  startSweeper(intervalMs = 60_000): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => {
      const evicted = this.sweep();
      if (evicted > 0) {
        console.log(`🧹 Evicted ${evicted} idle session(s)`);
      }
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  get size(): number {
    return this.sessions.size;
  }
}
