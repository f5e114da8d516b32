import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { FleetContext } from "../../src/lib/command-context";
import type { SessionConfig } from "../../src/lib/config";
import pino from "pino";
import { createSilentLogger, type Logger } from "../../src/lib/logger";
import type { CloudProvider } from "../../src/lib/providers";
import { recordingSleep } from "./fake-provider";

export async function makeTempDir(prefix = "deskfleet-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function makeConfig(outputDir: string, overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    provider: { kind: "aws", region: "us-east-1" },
    terraformDir: path.join(outputDir, "terraform"),
    outputDir,
    namePrefix: "win-client",
    username: "Administrator",
    descriptorFormat: "dcv",
    readinessTimeoutMinutes: 1,
    readinessIntervalSeconds: 30,
    ...overrides
  };
}

export function makeContext(provider: CloudProvider, config: SessionConfig): FleetContext {
  return { config, provider, logger: createSilentLogger(), sleep: recordingSleep().sleep };
}

/** Logger that keeps every emitted line in memory. */
export function createCapturingLogger(): { logger: Logger; records: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
  return { logger, records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)) };
}
