/**
 * TokenRefresher - hands out usable access tokens, refreshing them on demand.
 *
 * At most one refresh runs per user: concurrent callers share the in-flight
 * promise, and the refresh itself runs under the per-user lock so it cannot
 * interleave with an authorization completion or a de-authorization.
 */

import createDebug from "debug";
import { AuthError, classifyTransportError, type UserId } from "@app/proto";
import { KeyedMutex } from "./mutex";
import { OAuthHandler } from "./oauth";
import type { CredentialStore } from "./store";
import type {
  Credential,
  OAuthAppCredentials,
  ProviderDefinition,
  TokenStatus,
} from "./types";

const debug = createDebug("calbot:connectors:refresher");

/** Refresh tokens this long before they expire */
export const DEFAULT_REFRESH_MARGIN_MS = 60 * 1000;

/** Assumed lifetime when the token endpoint omits expires_in */
const DEFAULT_TOKEN_LIFETIME_S = 3600;

export interface TokenRefresherOptions {
  store: CredentialStore;
  provider: ProviderDefinition;
  app: OAuthAppCredentials;
  /** Per-user critical section shared with the AuthorizationCoordinator */
  locks: KeyedMutex;
  marginMs?: number;
  tokenTimeoutMs?: number;
  now?: () => number;
}

export class TokenRefresher {
  private readonly store: CredentialStore;
  private readonly locks: KeyedMutex;
  private readonly handler: OAuthHandler;
  private readonly marginMs: number;
  private readonly now: () => number;
  private inflight = new Map<UserId, Promise<TokenStatus>>();

  constructor(options: TokenRefresherOptions) {
    this.store = options.store;
    this.locks = options.locks;
    this.handler = new OAuthHandler(options.provider.oauthConfig, options.app, {
      timeoutMs: options.tokenTimeoutMs,
    });
    this.marginMs = options.marginMs ?? DEFAULT_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return a usable access token for the user, refreshing it if it expires
   * within the margin. Never retries; the caller decides.
   */
  async ensureValid(userId: UserId): Promise<TokenStatus> {
    const credential = await this.store.get(userId);
    const status = this.check(credential);
    if (status) return status;

    const existing = this.inflight.get(userId);
    if (existing) {
      debug("Joining in-flight refresh for %s", userId);
      return existing;
    }

    const refresh = this.locks
      .run(userId, () => this.refreshLocked(userId))
      .finally(() => {
        this.inflight.delete(userId);
      });
    this.inflight.set(userId, refresh);
    return refresh;
  }

  /**
   * Forget that an access token is usable after the provider rejected it, so
   * the next ensureValid refreshes. A token that was already replaced is
   * left alone. A refresh token the provider no longer accepts then marks
   * the credential revoked.
   */
  async invalidate(userId: UserId, accessToken: string): Promise<void> {
    await this.locks.run(userId, async () => {
      const credential = await this.store.get(userId);
      if (
        !credential ||
        credential.revoked ||
        credential.accessToken !== accessToken
      ) {
        return;
      }
      debug("Access token of %s was rejected, expiring it", userId);
      await this.store.put(userId, {
        ...credential,
        accessTokenExpiresAt: 0,
        updatedAt: this.now(),
      });
    });
  }

  /** Number of refreshes in progress. Visible for testing. */
  get inflightCount(): number {
    return this.inflight.size;
  }

  /** Status that needs no refresh, or undefined when one is due */
  private check(credential: Credential | undefined): TokenStatus | undefined {
    if (!credential) return { status: "auth_required" };
    if (credential.revoked) return { status: "revoked" };
    if (credential.accessTokenExpiresAt > this.now() + this.marginMs) {
      return {
        status: "valid",
        accessToken: credential.accessToken,
        expiresAt: credential.accessTokenExpiresAt,
      };
    }
    return undefined;
  }

  private async refreshLocked(userId: UserId): Promise<TokenStatus> {
    // The credential may have changed while we waited for the lock
    const credential = await this.store.get(userId);
    const status = this.check(credential);
    if (status || !credential) return status ?? { status: "auth_required" };

    debug("Refreshing access token for %s", userId);
    try {
      const tokens = await this.handler.refreshToken(credential.refreshToken);
      const now = this.now();
      const refreshed: Credential = {
        ...credential,
        accessToken: tokens.access_token,
        // Kept unless the provider rotated it
        refreshToken: tokens.refresh_token ?? credential.refreshToken,
        accessTokenExpiresAt:
          now + (tokens.expires_in ?? DEFAULT_TOKEN_LIFETIME_S) * 1000,
        scopes: tokens.scope
          ? tokens.scope.split(" ").filter(Boolean)
          : credential.scopes,
        updatedAt: now,
      };
      await this.store.put(userId, refreshed);
      debug("Refreshed access token for %s", userId);
      return {
        status: "valid",
        accessToken: refreshed.accessToken,
        expiresAt: refreshed.accessTokenExpiresAt,
      };
    } catch (error) {
      if (error instanceof AuthError && error.errorCode === "invalid_grant") {
        debug("Refresh token of %s is no longer valid, revoking", userId);
        await this.store.markRevoked(userId);
        return { status: "revoked" };
      }

      // Already classified by OAuthHandler; anything else is unexpected
      const classified = classifyTransportError(
        error,
        "refresher.ensureValid"
      );
      debug(
        "Token refresh for %s failed (%s): %s",
        userId,
        classified.type,
        classified.message
      );
      return { status: "unavailable", error: classified };
    }
  }
}
