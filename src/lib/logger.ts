import path from "node:path";
import pino, { type Logger } from "pino";
import { resolveHomeDir } from "./config";
import { CLI_NAME, LOG_DIR_NAME } from "./constants";

export type { Logger };

/**
 * NDJSON log file for one CLI run. The console stays reserved for operator output, so the full
 * remote stdout/stderr that only gets excerpted on screen ends up here.
 */
export function createSessionLogger(logDir = path.join(resolveHomeDir(), LOG_DIR_NAME)): { logger: Logger; logPath: string } {
  const stamp = new Date().toISOString().replace(/[:.]/g, "-");
  const logPath = path.join(logDir, `${CLI_NAME}-${stamp}.log`);

  const logger = pino(
    {
      level: process.env.DESKFLEET_LOG_LEVEL ?? "info",
      base: { service: CLI_NAME },
      redact: {
        paths: ["credential", "*.credential", "password", "*.password"],
        censor: "[redacted]"
      }
    },
    pino.destination({ dest: logPath, mkdir: true, sync: true })
  );

  return { logger, logPath };
}

export function createSilentLogger(): Logger {
  return pino({ enabled: false });
}
