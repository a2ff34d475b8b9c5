// User-facing messages shared by the server, the chat router and the CLI

/** Uniform reply for every failed authorization flow, whatever the reason */
export const AUTH_FLOW_FAILED_MESSAGE =
  'Authorization link invalid or expired, please try again with /auth.';

export const AUTH_FLOW_SUCCESS_MESSAGE =
  'Authorization complete! You can close this window and return to the chat.';

export const AUTH_REQUIRED_MESSAGE =
  'Please use the /auth command first (or again) ' +
  'to connect your Google Calendar.';

export const AUTHORIZED_NOTIFICATION =
  '✅ Google Calendar authorization complete! ' +
  'You can now manage your calendar here.';

export const CLASSIFIER_FAILED_MESSAGE =
  "Sorry, I couldn't process that right now. Please try again.";

export const CHAT_COMMANDS = {
  START: '/start',
  HELP: '/help',
  AUTH: '/auth',
  STATUS: '/status',
  REVOKE: '/revoke',
  FORGET: '/forget',
} as const;
