export const LOG_SOURCES = {
  SIGNALS: "SIGNALS",
  STORE: "STORE",
  RESOLVER: "RESOLVER",
  AGGREGATOR: "AGGREGATOR",
  PUBLISHER: "PUBLISHER",
  MEMBERSHIP: "MEMBERSHIP",
  LLM: "LLM",
  CONFIG: "CONFIG",
  SERVER: "SERVER",
  AUTH: "AUTH"
} as const;

export const LOG_MESSAGES = {
  // Store messages
  STORE_INITIALIZED: "Signal store initialized",
  STORE_CLOSED: "Signal store closed",
  SIGNAL_RECORDED: "Signal recorded",
  SIGNAL_REJECTED: "Signal rejected",

  // Ingestion messages
  MESSAGE_ANALYSIS_STARTED: "Message analysis started",
  MESSAGE_ANALYSIS_FINISHED: "Message analysis finished",
  EXTRACTED_ITEM_DROPPED: "Extracted preference dropped",

  // Publisher messages
  PROFILE_INVALIDATED: "Profile invalidated",
  PROFILE_RECOMPUTED: "Profile recomputed",
  PROFILE_RECOMPUTE_SUPERSEDED: "Recompute superseded by newer event",
  PROFILE_RECOMPUTE_FAILED: "Profile recompute failed",
  PROFILE_SERVED_STALE: "Serving last good profile",
  LISTENER_FAILED: "Profile listener threw",
  FEASIBILITY_REPORTED: "Feasibility reported",

  // Aggregator messages
  NO_MEMBERS: "Group has no current members",
  CONFLICT_DETECTED: "Conflict detected",

  // Membership messages
  MEMBER_JOINED: "Member joined",
  MEMBER_LEFT: "Member left",
  MEMBERSHIP_FETCH_STARTED: "Membership fetch started",
  MEMBERSHIP_FETCH_FAILED: "Membership fetch failed",
  MEMBERSHIP_CHANGE_NOTIFIED: "Membership change notified by groups service",

  // LLM messages
  EXTRACTION_STARTED: "Extraction started",
  EXTRACTION_SUCCESSFUL: "Extraction successful",
  INVALID_JSON_RETURNED: "Invalid JSON returned",
  JSON_PARSE_FAILED: "JSON parse failed",
  SCHEMA_VALIDATION_FAILED: "Schema validation failed",

  // Config messages
  CONFIG_LOADED: "Engine configuration loaded",

  // Server messages
  SERVER_LISTENING: "Server listening",
  GRACEFUL_SHUTDOWN: "Graceful shutdown initiated",
  FAILED_TO_START_SERVER: "Failed to start server",

  // Auth messages
  API_KEY_MISSING: "API key missing",
  API_KEY_INVALID: "Invalid API key",
  API_KEY_VALID: "API key valid",
  API_KEY_NOT_CONFIGURED: "API_KEY not configured in environment",

  UNKNOWN_ERROR: "Unknown error"
} as const;

export const SERVER_CONFIG = {
  DEFAULT_PORT: 3000,
  JSON_BODY_LIMIT: "100kb",
  REQUEST_TIMEOUT_MS: 30000
} as const;
