// Calendar tools and toolset
export {
  makeToolset,
  registerTool,
  defineTool,
  deriveEventId,
  clampMaxResults,
  compareEvents,
  formatZodError,
  toUtcIso,
  DEFAULT_CALENDAR_ID,
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_LIMIT,
  type Tool,
  type ToolContext,
  type Toolset,
  type RegisteredTool,
  type PreparedCall,
  type PrepareResult,
} from "./tools";

// Calendar backend
export type {
  CalendarBackend,
  NewEvent,
  EventChanges,
  EventQuery,
  EventPage,
} from "./backend";
export {
  GoogleCalendarBackend,
  classifyGoogleApiError,
  toCalendarEvent,
  DEFAULT_BACKEND_TIMEOUT_MS,
  type GoogleCalendarBackendOptions,
} from "./google-calendar";

// Dispatch
export {
  ToolDispatcher,
  classifyBackendFailure,
  type TokenSource,
  type ToolDispatcherOptions,
} from "./dispatch";
export {
  withRetry,
  calculateBackoff,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryOptions,
} from "./retry";

// Classifier
export {
  OpenRouterClassifier,
  buildSystemPrompt,
  DEFAULT_CLASSIFIER_TIMEOUT_MS,
  type Classifier,
  type Classification,
  type ToolSpec,
  type OpenRouterClassifierOptions,
} from "./classifier";

// Chat
export {
  ChatRouter,
  hasUsableCredential,
  describeState,
  type AuthorizationService,
  type ChatRouterOptions,
} from "./router";
export {
  formatDispatchResult,
  formatEvent,
  formatEventTime,
  formatTime,
  MAX_EVENTS_DISPLAYED,
} from "./format";

// Environment configuration
export { setEnv, getEnv, type Env } from "./env";

// Model configuration
export {
  getOpenRouter,
  getModelName,
  getDefaultModel,
  resetOpenRouter,
  DEFAULT_AGENT_MODEL,
} from "./model";
