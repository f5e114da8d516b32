export const CLI_NAME = "deskfleet";

export const CONFIG_DIR_NAME = ".deskfleet";
export const CONFIG_FILE_NAME = "config.json";
export const LOG_DIR_NAME = "logs";

export const DEFAULT_OUTPUT_FOLDER = "deskfleet";
export const DEFAULT_NAME_PREFIX = "win-client";
export const DEFAULT_USERNAME = "Administrator";
export const DEFAULT_TERRAFORM_DIR = "terraform";

export const CREDENTIAL_RECORD_FILE = "PASSWORDS.txt";
export const DEFAULT_PASSWORD_LENGTH = 16;
export const PASSWORD_SYMBOLS = "!@#$%^&*";

export const READINESS_TIMEOUT_MINUTES = 15;
export const READINESS_INTERVAL_SECONDS = 30;

export const COMMAND_POLL_INTERVAL_MS = 2_000;
export const COMMAND_POLL_MAX_ATTEMPTS = 30;

export const POWER_POLL_INTERVAL_MS = 15_000;
export const POWER_POLL_MAX_ATTEMPTS = 40;

// Operator-facing excerpts of remote stdout/stderr; the log keeps the full text.
export const DISPLAY_EXCERPT_LENGTH = 200;

export const DCV_PORT = 8443;
export const RDP_PORT = 3389;
