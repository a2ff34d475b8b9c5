/**
 * Google Calendar provider definition.
 */

import type { OAuthConfig, ProviderDefinition } from "../types";

export const GOOGLE_CALENDAR_SCOPES = [
  "https://www.googleapis.com/auth/calendar",
  "https://www.googleapis.com/auth/calendar.events",
];

/**
 * Shared Google OAuth configuration.
 */
export const googleOAuthBase = {
  authUrl: "https://accounts.google.com/o/oauth2/v2/auth",
  tokenUrl: "https://oauth2.googleapis.com/token",
  revokeUrl: "https://oauth2.googleapis.com/revoke",
  extraAuthParams: {
    access_type: "offline",
    prompt: "consent", // Force refresh token on every auth
    include_granted_scopes: "true",
  },
};

/**
 * Build the Google Calendar provider, optionally overriding endpoints
 * (GOOGLE_AUTH_URI / GOOGLE_TOKEN_URI / GOOGLE_REVOKE_URI).
 */
export function createGoogleCalendarProvider(
  overrides: Partial<
    Pick<OAuthConfig, "authUrl" | "tokenUrl" | "revokeUrl">
  > = {}
): ProviderDefinition {
  return {
    id: "gcal",
    name: "Google Calendar",
    oauthConfig: {
      ...googleOAuthBase,
      ...overrides,
      scopes: [...GOOGLE_CALENDAR_SCOPES],
    },
  };
}

export const googleCalendarProvider: ProviderDefinition =
  createGoogleCalendarProvider();
