/**
 * AuthorizationCoordinator - drives the three-legged OAuth redirect flow.
 *
 * Issues authorization URLs bound to a single-use random state token, receives
 * the redirect callback, exchanges the code and writes the user's Credential.
 * The state token is the only thing tying a callback to a user, since one
 * redirect endpoint is shared by all users.
 */

import createDebug from "debug";
import { randomBytes } from "crypto";
import { AuthFlowError, type UserId } from "@app/proto";
import { KeyedMutex } from "./mutex";
import { OAuthHandler } from "./oauth";
import type { CredentialStore } from "./store";
import type {
  AuthSession,
  AuthState,
  Credential,
  OAuthAppCredentials,
  ProviderDefinition,
  TokenResponse,
} from "./types";

const debug = createDebug("calbot:connectors:authorization");

/** Pending authorization TTL: 10 minutes */
export const DEFAULT_SESSION_TTL_MS = 10 * 60 * 1000;

/** Maximum pending sessions before the oldest is evicted */
export const DEFAULT_MAX_PENDING_SESSIONS = 10_000;

/** Cleanup interval for expired sessions (60 seconds) */
const SESSION_SWEEP_INTERVAL_MS = 60 * 1000;

/** Fallback access token lifetime when the provider omits expires_in */
const DEFAULT_TOKEN_LIFETIME_S = 3600;

export interface AuthorizationCoordinatorOptions {
  store: CredentialStore;
  provider: ProviderDefinition;
  app: OAuthAppCredentials;
  /** Per-user critical section shared with the TokenRefresher */
  locks: KeyedMutex;
  sessionTtlMs?: number;
  maxPendingSessions?: number;
  tokenTimeoutMs?: number;
  /** Called after a credential was stored for the user (chat notification) */
  onAuthorized?: (userId: UserId) => void | Promise<void>;
  now?: () => number;
}

export interface AuthorizationStart {
  authorizationUrl: string;
  stateToken: string;
  expiresAt: number;
}

export interface CallbackParams {
  state?: string;
  code?: string;
  error?: string;
}

export class AuthorizationCoordinator {
  private readonly store: CredentialStore;
  private readonly locks: KeyedMutex;
  private readonly handler: OAuthHandler;
  private readonly sessionTtlMs: number;
  private readonly maxPendingSessions: number;
  private readonly onAuthorized?: (userId: UserId) => void | Promise<void>;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: AuthorizationCoordinatorOptions) {
    this.store = options.store;
    this.locks = options.locks;
    this.handler = new OAuthHandler(options.provider.oauthConfig, options.app, {
      timeoutMs: options.tokenTimeoutMs,
    });
    this.sessionTtlMs = options.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS;
    this.maxPendingSessions =
      options.maxPendingSessions ?? DEFAULT_MAX_PENDING_SESSIONS;
    this.onAuthorized = options.onAuthorized;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start an authorization attempt for a user.
   * Any earlier pending session of this user stops being completable.
   */
  async beginAuthorization(userId: UserId): Promise<AuthorizationStart> {
    if (await this.store.findSessionByUser(userId)) {
      debug("Replacing pending session for %s", userId);
    } else if (await this.atSessionLimit()) {
      await this.store.sweepExpiredSessions();
      if (await this.atSessionLimit()) {
        const evicted = await this.store.evictOldestSession();
        debug(
          "Pending session limit reached (%d), evicted session of %s",
          this.maxPendingSessions,
          evicted?.userId
        );
      }
    }

    const now = this.now();
    const session: AuthSession = {
      userId,
      stateToken: await this.newStateToken(),
      createdAt: now,
      expiresAt: now + this.sessionTtlMs,
    };
    await this.store.savePendingSession(session);

    debug(
      "Started authorization for %s, state=%s…",
      userId,
      session.stateToken.slice(0, 8)
    );
    return {
      authorizationUrl: this.handler.getAuthUrl(session.stateToken),
      stateToken: session.stateToken,
      expiresAt: session.expiresAt,
    };
  }

  /**
   * Complete an authorization from the redirect callback.
   * Resolves to the user the state token was issued to; rejects with
   * AuthFlowError.
   */
  async handleCallback(params: CallbackParams): Promise<UserId> {
    if (params.error) {
      // Pending session stays: a denial is not proof the state was ours
      debug("Authorization denied at provider: %s", params.error);
      throw new AuthFlowError("denied");
    }

    if (!params.state || !params.code) {
      debug("Callback without state or code");
      throw new AuthFlowError("invalid_state");
    }

    const session = await this.store.consumeSession(params.state);
    if (!session) {
      debug(
        "Unknown, expired or already used state %s…",
        params.state.slice(0, 8)
      );
      throw new AuthFlowError("invalid_state");
    }

    const { userId } = session;
    let tokens: TokenResponse;
    try {
      tokens = await this.handler.exchangeCode(params.code);
    } catch (error) {
      debug("Code exchange failed for %s: %s", userId, error);
      throw new AuthFlowError("exchange_failed", {
        cause: error instanceof Error ? error : undefined,
      });
    }

    await this.locks.run(userId, async () => {
      const existing = await this.store.get(userId);
      // Google only returns a refresh token on consent; keep a live one
      const refreshToken =
        tokens.refresh_token ??
        (existing && !existing.revoked ? existing.refreshToken : undefined);
      if (!refreshToken) {
        debug("No refresh token issued for %s", userId);
        throw new AuthFlowError("exchange_failed");
      }

      const now = this.now();
      const credential: Credential = {
        userId,
        accessToken: tokens.access_token,
        refreshToken,
        accessTokenExpiresAt:
          now + (tokens.expires_in ?? DEFAULT_TOKEN_LIFETIME_S) * 1000,
        scopes: tokens.scope
          ? tokens.scope.split(" ").filter(Boolean)
          : this.handler.scopes,
        revoked: false,
        updatedAt: now,
      };
      await this.store.put(userId, credential);
    });

    debug("Authorization completed for %s", userId);
    await this.notifyAuthorized(userId);
    return userId;
  }

  /**
   * Current authorization state of a user.
   */
  async getState(userId: UserId): Promise<AuthState> {
    const [session, credential] = await Promise.all([
      this.store.findSessionByUser(userId),
      this.store.get(userId),
    ]);

    if (session) {
      return credential
        ? { status: "pending", session, credential }
        : { status: "pending", session };
    }
    if (!credential) {
      return { status: "unauthenticated" };
    }
    return credential.revoked
      ? { status: "revoked", credential }
      : { status: "authenticated", credential };
  }

  /**
   * Explicit de-authorization: revoke at the provider (best-effort) and mark
   * the stored credential revoked. Returns false if there was nothing to
   * revoke.
   */
  async deauthorize(userId: UserId): Promise<boolean> {
    return this.locks.run(userId, async () => {
      const credential = await this.store.get(userId);
      if (!credential || credential.revoked) {
        return false;
      }

      // Revoking the refresh token also invalidates its access tokens
      const result = await this.handler.revokeToken(credential.refreshToken);
      debug("Provider revocation for %s: %s", userId, result.reason);

      await this.store.markRevoked(userId);
      return true;
    });
  }

  /**
   * Delete everything stored for a user. Only on explicit user request.
   */
  async forget(userId: UserId): Promise<void> {
    await this.locks.run(userId, async () => {
      await this.store.discardSession(userId);
      await this.store.delete(userId);
    });
    debug("Forgot credentials of %s", userId);
  }

  /**
   * Start periodic physical eviction of expired sessions.
   * Expired sessions are already ignored without it.
   */
  startSweep(intervalMs: number = SESSION_SWEEP_INTERVAL_MS): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      void this.store
        .sweepExpiredSessions()
        .then((removed) => {
          if (removed > 0) debug("Swept %d expired session(s)", removed);
        })
        .catch((error: unknown) => debug("Session sweep failed: %s", error));
    }, intervalMs);
    this.sweepTimer.unref();
  }

  /**
   * Shutdown the coordinator, cleaning up resources.
   */
  shutdown(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private async atSessionLimit(): Promise<boolean> {
    const count = await this.store.countPendingSessions();
    return count >= this.maxPendingSessions;
  }

  private async newStateToken(): Promise<string> {
    for (;;) {
      const token = randomBytes(32).toString("hex");
      if (!(await this.store.findSessionByState(token))) {
        return token;
      }
    }
  }

  private async notifyAuthorized(userId: UserId): Promise<void> {
    if (!this.onAuthorized) return;
    try {
      await this.onAuthorized(userId);
    } catch (error) {
      debug("onAuthorized hook failed for %s: %s", userId, error);
    }
  }
}
