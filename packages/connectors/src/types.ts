/**
 * Types for the connectors package.
 *
 * This package owns the per-user OAuth credential lifecycle: pending
 * authorization sessions, stored credentials, the redirect flow and token
 * refresh.
 */

import type { ClassifiedError, UserId } from "@app/proto";

/**
 * OAuth2 URL/scope configuration (static per provider).
 */
export interface OAuthConfig {
  authUrl: string;
  tokenUrl: string;
  /** Token revocation endpoint, if the provider has one */
  revokeUrl?: string;
  scopes: string[];
  /** Additional params to include in auth URL (e.g., access_type, prompt) */
  extraAuthParams?: Record<string, string>;
}

/**
 * OAuth app credentials (client ID and secret) plus the single redirect URI
 * registered with the provider for this deployment.
 */
export interface OAuthAppCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

/**
 * One in-flight authorization attempt.
 */
export interface AuthSession {
  userId: UserId;
  /** Random, unguessable, single-use; unique among pending sessions */
  stateToken: string;
  /** Unix timestamp in milliseconds */
  createdAt: number;
  /** Unix timestamp in milliseconds */
  expiresAt: number;
}

/**
 * Durable per-user authorization record.
 */
export interface Credential {
  userId: UserId;
  accessToken: string;
  refreshToken: string;
  /** Unix timestamp in milliseconds; the authoritative freshness signal */
  accessTokenExpiresAt: number;
  scopes: string[];
  revoked: boolean;
  /** Unix timestamp in milliseconds of the last write */
  updatedAt: number;
}

/**
 * Per-user authorization state, derived from the store.
 * Unauthenticated → PendingAuth → Authenticated → (Revoked | PendingAuth)
 */
export type AuthState =
  | { status: "unauthenticated" }
  | { status: "pending"; session: AuthSession; credential?: Credential }
  | { status: "authenticated"; credential: Credential }
  | { status: "revoked"; credential: Credential };

/**
 * Outcome of TokenRefresher.ensureValid.
 * `unavailable` is a transient or unexpected failure and never means revoked.
 */
export type TokenStatus =
  | { status: "valid"; accessToken: string; expiresAt: number }
  | { status: "auth_required" }
  | { status: "revoked" }
  | { status: "unavailable"; error: ClassifiedError };

/**
 * Raw token response from OAuth provider.
 */
export interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
  token_type?: string;
  scope?: string;
  id_token?: string;
}

/**
 * Provider definition (one per calendar backend).
 */
export interface ProviderDefinition {
  /** Provider ID, e.g., "gcal" */
  id: string;
  /** Display name, e.g., "Google Calendar" */
  name: string;
  /** OAuth configuration (URLs, scopes) */
  oauthConfig: OAuthConfig;
}
