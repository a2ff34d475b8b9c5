/**
 * Credential Store: the only owner of Credential and AuthSession records.
 *
 * Credentials are durable; pending authorization sessions are short-lived and
 * kept in memory by every implementation. Operations for the same user are
 * linearizable, operations for different users never wait on each other.
 */

import createDebug from "debug";
import type { UserId } from "@app/proto";
import { KeyedMutex } from "./mutex";
import type { AuthSession, Credential } from "./types";

const debug = createDebug("calbot:connectors:store");

export interface CredentialStore {
  get(userId: UserId): Promise<Credential | undefined>;
  /** Upsert; replaces any existing record atomically */
  put(userId: UserId, credential: Credential): Promise<void>;
  /** Idempotent; no-op if absent or already revoked */
  markRevoked(userId: UserId): Promise<void>;
  /** Physically delete the credential. Only on explicit user request. */
  delete(userId: UserId): Promise<void>;

  /** Store a pending session, replacing any pending session of the same user */
  savePendingSession(session: AuthSession): Promise<void>;
  /** Never returns an expired session */
  findSessionByState(stateToken: string): Promise<AuthSession | undefined>;
  findSessionByUser(userId: UserId): Promise<AuthSession | undefined>;
  /** Atomic fetch-and-delete; undefined if already consumed or expired */
  consumeSession(stateToken: string): Promise<AuthSession | undefined>;
  /** Drop the pending session of a user, if any */
  discardSession(userId: UserId): Promise<void>;
  /** Physically evict expired sessions; returns how many were removed */
  sweepExpiredSessions(): Promise<number>;
  /** Number of pending sessions, expired ones included until swept */
  countPendingSessions(): Promise<number>;
  /** Remove the oldest pending session (pending-session cap) */
  evictOldestSession(): Promise<AuthSession | undefined>;
}

/**
 * In-memory table of pending authorization sessions, indexed by state token
 * and by user.
 *
 * All methods are synchronous: a check and the delete that follows it can never
 * be separated by another caller.
 */
export class PendingSessionTable {
  private byState = new Map<string, AuthSession>();
  private byUser = new Map<UserId, string>();

  constructor(private readonly now: () => number = Date.now) {}

  save(session: AuthSession): void {
    const previous = this.byUser.get(session.userId);
    if (previous !== undefined) {
      this.byState.delete(previous);
      debug("Superseded pending session for %s", session.userId);
    }
    this.byState.set(session.stateToken, session);
    this.byUser.set(session.userId, session.stateToken);
  }

  findByState(stateToken: string): AuthSession | undefined {
    const session = this.byState.get(stateToken);
    if (!session) return undefined;
    if (this.isExpired(session)) {
      this.remove(session);
      return undefined;
    }
    return session;
  }

  findByUser(userId: UserId): AuthSession | undefined {
    const stateToken = this.byUser.get(userId);
    return stateToken === undefined ? undefined : this.findByState(stateToken);
  }

  consume(stateToken: string): AuthSession | undefined {
    const session = this.byState.get(stateToken);
    if (!session) return undefined;
    this.remove(session);
    return this.isExpired(session) ? undefined : session;
  }

  discard(userId: UserId): void {
    const stateToken = this.byUser.get(userId);
    if (stateToken === undefined) return;
    const session = this.byState.get(stateToken);
    if (session) this.remove(session);
  }

  sweep(): number {
    let removed = 0;
    for (const session of [...this.byState.values()]) {
      if (this.isExpired(session)) {
        this.remove(session);
        removed++;
      }
    }
    return removed;
  }

  /** Remove the session created first. Returns the evicted session, if any. */
  evictOldest(): AuthSession | undefined {
    let oldest: AuthSession | undefined;
    for (const session of this.byState.values()) {
      if (!oldest || session.createdAt < oldest.createdAt) {
        oldest = session;
      }
    }
    if (oldest) this.remove(oldest);
    return oldest;
  }

  /** Visible for testing. */
  get size(): number {
    return this.byState.size;
  }

  private isExpired(session: AuthSession): boolean {
    return this.now() >= session.expiresAt;
  }

  private remove(session: AuthSession): void {
    this.byState.delete(session.stateToken);
    if (this.byUser.get(session.userId) === session.stateToken) {
      this.byUser.delete(session.userId);
    }
  }
}

/**
 * Shared session handling and per-user serialization; subclasses provide
 * credential persistence.
 */
export abstract class BaseCredentialStore implements CredentialStore {
  protected readonly sessions: PendingSessionTable;
  protected readonly locks = new KeyedMutex();

  constructor(now: () => number = Date.now) {
    this.sessions = new PendingSessionTable(now);
  }

  protected abstract read(userId: UserId): Promise<Credential | undefined>;
  protected abstract write(
    userId: UserId,
    credential: Credential
  ): Promise<void>;
  protected abstract remove(userId: UserId): Promise<void>;

  async get(userId: UserId): Promise<Credential | undefined> {
    return this.read(userId);
  }

  async put(userId: UserId, credential: Credential): Promise<void> {
    if (credential.userId !== userId) {
      throw new Error(
        `Credential for ${credential.userId} cannot be stored under ${userId}`
      );
    }
    await this.locks.run(userId, () =>
      this.write(userId, { ...credential, scopes: [...credential.scopes] })
    );
  }

  async markRevoked(userId: UserId): Promise<void> {
    await this.locks.run(userId, async () => {
      const current = await this.read(userId);
      if (!current || current.revoked) return;
      await this.write(userId, {
        ...current,
        revoked: true,
        updatedAt: Date.now(),
      });
      debug("Marked credential revoked for %s", userId);
    });
  }

  async delete(userId: UserId): Promise<void> {
    await this.locks.run(userId, () => this.remove(userId));
  }

  async savePendingSession(session: AuthSession): Promise<void> {
    this.sessions.save({ ...session });
  }

  async findSessionByState(
    stateToken: string
  ): Promise<AuthSession | undefined> {
    return this.sessions.findByState(stateToken);
  }

  async findSessionByUser(userId: UserId): Promise<AuthSession | undefined> {
    return this.sessions.findByUser(userId);
  }

  async consumeSession(stateToken: string): Promise<AuthSession | undefined> {
    return this.sessions.consume(stateToken);
  }

  async discardSession(userId: UserId): Promise<void> {
    this.sessions.discard(userId);
  }

  async sweepExpiredSessions(): Promise<number> {
    return this.sessions.sweep();
  }

  async countPendingSessions(): Promise<number> {
    return this.sessions.size;
  }

  async evictOldestSession(): Promise<AuthSession | undefined> {
    return this.sessions.evictOldest();
  }
}

/**
 * Credential store held entirely in memory. Used by tests and by the
 * server's --ephemeral mode.
 */
export class MemoryCredentialStore extends BaseCredentialStore {
  private credentials = new Map<UserId, Credential>();

  protected async read(userId: UserId): Promise<Credential | undefined> {
    const credential = this.credentials.get(userId);
    return credential
      ? { ...credential, scopes: [...credential.scopes] }
      : undefined;
  }

  protected async write(
    userId: UserId,
    credential: Credential
  ): Promise<void> {
    this.credentials.set(userId, credential);
  }

  protected async remove(userId: UserId): Promise<void> {
    this.credentials.delete(userId);
  }

  /** Visible for testing. */
  get size(): number {
    return this.credentials.size;
  }
}
