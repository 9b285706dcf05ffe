export {
  SearchNavigator,
  clampCursor,
  type NavigationState,
  type NavigationOutcome,
  type NavigationResult,
  type NavigationSnapshot,
  type NavigationChangeEvent,
  type NavigationChangeListener,
} from "./navigator.js";
export {
  createSessionStore,
  ACTIVE_SESSION_NAME,
  type SessionStore,
  type SessionStoreOptions,
  type SessionSummary,
} from "./session-store.js";
