import { READINESS_INTERVAL_SECONDS, READINESS_TIMEOUT_MINUTES } from "./constants";
import { describeError } from "./errors";
import type { Logger } from "./logger";
import { pollUntil } from "./poll";
import type { CloudProvider } from "./providers";
import type { ReadinessState } from "./types";
import type { Sleep } from "./utils";

export interface InstanceReadiness {
  id: string;
  state: ReadinessState;
  agentStatus: string;
}

export interface ReadinessRound {
  round: number;
  totalRounds: number;
  readyCount: number;
  instances: InstanceReadiness[];
}

export interface WaitForReadyOptions {
  timeoutMinutes?: number;
  intervalSeconds?: number;
  sleep?: Sleep;
  logger?: Logger;
  onRound?: (round: ReadinessRound) => void;
}

export function readinessRounds(timeoutMinutes: number, intervalSeconds: number): number {
  return Math.max(1, Math.floor((timeoutMinutes * 60) / intervalSeconds));
}

/**
 * Polls the management agent of every instance until all report the provider's online status or
 * the timeout runs out. Ready is sticky: a ready instance is not queried again. A failed status
 * query only means "not ready this round".
 */
export async function waitForReady(
  provider: CloudProvider,
  instanceIds: Iterable<string>,
  options: WaitForReadyOptions = {}
): Promise<Map<string, boolean>> {
  const ids = [...new Set(instanceIds)];
  if (ids.length === 0) {
    return new Map();
  }

  const timeoutMinutes = options.timeoutMinutes ?? READINESS_TIMEOUT_MINUTES;
  const intervalSeconds = options.intervalSeconds ?? READINESS_INTERVAL_SECONDS;
  const totalRounds = readinessRounds(timeoutMinutes, intervalSeconds);

  const tracked = new Map<string, InstanceReadiness>(
    ids.map((id) => [id, { id, state: "unknown", agentStatus: "Unknown" }])
  );

  await pollUntil<true>(
    async (round) => {
      for (const entry of tracked.values()) {
        if (entry.state === "ready") {
          continue;
        }

        entry.agentStatus = await queryStatus(provider, entry.id, options.logger);
        entry.state = entry.agentStatus === provider.onlineStatus ? "ready" : "polling";
        if (entry.state === "ready") {
          options.logger?.info({ instanceId: entry.id, round }, "agent online");
        }
      }

      const readyCount = countReady(tracked);
      options.onRound?.({
        round,
        totalRounds,
        readyCount,
        instances: [...tracked.values()].map((entry) => ({ ...entry }))
      });

      return readyCount === tracked.size ? { done: true, value: true } : { done: false };
    },
    { intervalMs: intervalSeconds * 1000, maxAttempts: totalRounds, sleep: options.sleep }
  );

  const result = new Map<string, boolean>();
  for (const entry of tracked.values()) {
    const ready = entry.state === "ready";
    if (!ready) {
      entry.state = "timed_out";
      options.logger?.warn({ instanceId: entry.id, agentStatus: entry.agentStatus, state: entry.state }, "agent not online before timeout");
    }
    result.set(entry.id, ready);
  }
  return result;
}

async function queryStatus(provider: CloudProvider, id: string, logger?: Logger): Promise<string> {
  try {
    return await provider.getAgentStatus(id);
  } catch (error) {
    logger?.debug({ instanceId: id, error: describeError(error) }, "agent status query failed");
    return "Unknown";
  }
}

function countReady(tracked: Map<string, InstanceReadiness>): number {
  let count = 0;
  for (const entry of tracked.values()) {
    if (entry.state === "ready") {
      count += 1;
    }
  }
  return count;
}
