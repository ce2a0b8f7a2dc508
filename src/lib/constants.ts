// src/lib/constants.ts

export const constants = {
  // External tool
  TOOL_BIN: "dr",
  TOOL_SUBCOMMAND: "mup1cc",

  // HTTP
  DEFAULT_PORT: 8000,
  DEFAULT_HOST: "0.0.0.0",
  RUN_ROUTE: "/api/run-mup1cc",

  // Timeouts (ms)
  TOOL_TIMEOUT: 30_000,

  // Captured stdout/stderr ceiling per stream
  TOOL_MAX_BUFFER: 16 * 1024 * 1024,

  // Temp artifacts
  TEMP_DIR_PREFIX: "mup1-gateway-",
  TEMP_FILE_BASENAME: "input",
  DEFAULT_INPUT_SUFFIX: ".yaml",
  TEMP_FILE_MODE: 0o600,

  // Error bodies
  TOOL_FAILED_MESSAGE: "mup1cc failed",
  TOOL_TIMEOUT_MESSAGE: "mup1cc timeout",

  // Static page
  INDEX_FILE: "index.html",
} as const;
