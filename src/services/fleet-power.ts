import type { FleetContext } from "../lib/command-context";
import { POWER_POLL_INTERVAL_MS, POWER_POLL_MAX_ATTEMPTS } from "../lib/constants";
import { readCredentialRecord } from "../lib/credential-record";
import { pollUntil } from "../lib/poll";
import type { InstanceState, InstanceTarget } from "../lib/types";
import { writeConnectionFiles, type WrittenDescriptor } from "./connection-files";

export interface PowerOptions {
  intervalMs?: number;
  maxAttempts?: number;
  onWait?: (instances: InstanceTarget[]) => void;
}

export interface PowerResult {
  /** Instances a start or stop was requested for. */
  changed: string[];
  /** Whether every changed instance reached the target state before the attempts ran out. */
  settled: boolean;
  instances: InstanceTarget[];
}

export interface RefreshResult {
  written: WrittenDescriptor[];
  withCredential: number;
  recordFound: boolean;
}

export async function startFleet(context: FleetContext, ids: string[], options: PowerOptions = {}): Promise<PowerResult> {
  const instances = await context.provider.listInstances(ids);
  const toStart = instances.filter((instance) => instance.state === "stopped").map((instance) => instance.id);
  if (toStart.length === 0) {
    context.logger.info("no stopped instances to start");
    return { changed: [], settled: true, instances };
  }

  context.logger.info({ instances: toStart }, "starting instances");
  await context.provider.startInstances(toStart);
  return waitForPowerState(context, ids, toStart, "running", options);
}

export async function stopFleet(context: FleetContext, ids: string[], options: PowerOptions = {}): Promise<PowerResult> {
  const instances = await context.provider.listInstances(ids);
  const toStop = instances.filter((instance) => instance.state === "running").map((instance) => instance.id);
  if (toStop.length === 0) {
    context.logger.info("no running instances to stop");
    return { changed: [], settled: true, instances };
  }

  context.logger.info({ instances: toStop }, "stopping instances");
  await context.provider.stopInstances(toStop);
  return waitForPowerState(context, ids, toStop, "stopped", options);
}

async function waitForPowerState(
  context: FleetContext,
  ids: string[],
  changed: string[],
  target: InstanceState,
  options: PowerOptions
): Promise<PowerResult> {
  let latest: InstanceTarget[] = [];
  const outcome = await pollUntil<true>(
    async () => {
      latest = await context.provider.listInstances(ids);
      options.onWait?.(latest);
      const reached = changed.every((id) => latest.find((instance) => instance.id === id)?.state === target);
      return reached ? { done: true, value: true } : { done: false };
    },
    {
      intervalMs: options.intervalMs ?? POWER_POLL_INTERVAL_MS,
      maxAttempts: options.maxAttempts ?? POWER_POLL_MAX_ATTEMPTS,
      leadingDelay: true,
      sleep: context.sleep
    }
  );

  if (!outcome.ok) {
    context.logger.warn({ target, attempts: outcome.attempts }, "instances did not reach the target state in time");
  }
  return { changed, settled: outcome.ok, instances: latest };
}

/**
 * Rewrites connection files with the current IPs. Only instances the last record marks as
 * applied get the recorded credential; the rest prompt for it.
 */
export async function refreshDescriptors(context: FleetContext, ids: string[]): Promise<RefreshResult> {
  const record = await readCredentialRecord(context.config.outputDir);
  if (!record) {
    context.logger.info("no credential record found, connection files will prompt for credentials");
  }

  const applied = new Set(record?.entries.filter((entry) => entry.status === "applied").map((entry) => entry.id) ?? []);
  const instances = await context.provider.listInstances(ids);
  const byId = new Map(instances.map((instance) => [instance.id, instance]));

  const written = await writeConnectionFiles(
    context,
    ids.map((id, index) => ({ index, id, ip: byId.get(id)?.ip, embedCredential: applied.has(id) })),
    record ? { username: record.username, credential: record.credential } : undefined
  );

  return {
    written,
    withCredential: written.filter((descriptor) => descriptor.withCredential).length,
    recordFound: record !== undefined
  };
}
