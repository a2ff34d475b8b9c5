import type { UserId } from "@app/proto";

export interface NotificationOutboxOptions {
  /** Newest entries kept per user */
  maxPerUser?: number;
  /** Users with queued entries; the least recently notified is dropped first */
  maxUsers?: number;
  ttlMs?: number;
  now?: () => number;
}

interface Entry {
  text: string;
  queuedAt: number;
}

/**
 * Per-user queue of messages produced outside a request/reply exchange
 * (e.g. "authorization complete"), handed out with the user's next reply.
 * Bounded per user and in users; entries older than the TTL are dropped.
 */
export class NotificationOutbox {
  private pending = new Map<UserId, Entry[]>();
  private readonly maxPerUser: number;
  private readonly maxUsers: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: NotificationOutboxOptions = {}) {
    this.maxPerUser = options.maxPerUser ?? 10;
    this.maxUsers = options.maxUsers ?? 10_000;
    this.ttlMs = options.ttlMs ?? 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  push(userId: UserId, text: string): void {
    const queue = this.fresh(userId);
    queue.push({ text, queuedAt: this.now() });

    // Re-insert so Map order is least recently notified first
    this.pending.delete(userId);
    this.pending.set(userId, queue.slice(-this.maxPerUser));

    while (this.pending.size > this.maxUsers) {
      const oldest = this.pending.keys().next();
      if (oldest.done) break;
      this.pending.delete(oldest.value);
    }
  }

  /** Remove and return everything queued for the user */
  drain(userId: UserId): string[] {
    const queue = this.fresh(userId);
    this.pending.delete(userId);
    return queue.map((entry) => entry.text);
  }

  private fresh(userId: UserId): Entry[] {
    const cutoff = this.now() - this.ttlMs;
    return (this.pending.get(userId) ?? []).filter(
      (entry) => entry.queuedAt > cutoff
    );
  }
}
