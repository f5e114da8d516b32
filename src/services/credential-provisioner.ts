import type { FleetContext } from "../lib/command-context";
import { writeCredentialRecord } from "../lib/credential-record";
import { setCredential } from "../lib/dispatch";
import { describeError } from "../lib/errors";
import { generateSecurePassword } from "../lib/password";
import { waitForReady, type ReadinessRound } from "../lib/readiness";
import type {
  BatchResult,
  CredentialRecordEntry,
  DispatchResult,
  InstanceOutcome,
  InstanceTarget,
  RecordedStatus
} from "../lib/types";
import { writeConnectionFiles } from "./connection-files";

export interface ProvisionReporter {
  onReadinessRound?(round: ReadinessRound): void;
  onDispatchStart?(instanceId: string, position: number, total: number): void;
  onDispatchResult?(instanceId: string, result: DispatchResult): void;
}

export interface ProvisionOptions {
  timeoutMinutes?: number;
  intervalSeconds?: number;
  commandIntervalMs?: number;
  commandMaxAttempts?: number;
  reporter?: ProvisionReporter;
  now?: () => Date;
  generatePassword?: () => string;
}

const NOT_READY_MESSAGE = "Management agent did not come online before the timeout";

/**
 * Runs one credential batch: wait for the agents, set one shared password on every ready
 * instance, record the outcome, then write connection files with the current IPs.
 */
export async function provisionCredentials(
  context: FleetContext,
  instanceIds: string[],
  options: ProvisionOptions = {}
): Promise<BatchResult> {
  const { config, provider, logger, sleep } = context;
  const ids = [...new Set(instanceIds)];
  const perInstance = new Map<string, InstanceOutcome>();
  if (ids.length === 0) {
    logger.info("no instances to provision");
    return { perInstance, descriptorPaths: [] };
  }

  logger.info({ instances: ids, provider: provider.kind }, "waiting for management agents");
  const readiness = await waitForReady(provider, ids, {
    timeoutMinutes: options.timeoutMinutes ?? config.readinessTimeoutMinutes,
    intervalSeconds: options.intervalSeconds ?? config.readinessIntervalSeconds,
    sleep,
    logger,
    onRound: options.reporter?.onReadinessRound
  });

  const readyIds = ids.filter((id) => readiness.get(id) === true);
  if (readyIds.length === 0) {
    logger.warn({ instances: ids }, "no instance became ready, credential not generated");
    for (const id of ids) {
      perInstance.set(id, { status: "skipped", message: NOT_READY_MESSAGE });
    }
    return { perInstance, descriptorPaths: [] };
  }

  const credential = (options.generatePassword ?? generateSecurePassword)();
  const generatedAt = (options.now ?? (() => new Date()))();
  logger.info({ ready: readyIds.length, total: ids.length }, "credential generated");

  for (const id of ids) {
    if (readiness.get(id) !== true) {
      perInstance.set(id, { status: "skipped", message: NOT_READY_MESSAGE });
      continue;
    }

    options.reporter?.onDispatchStart?.(id, readyIds.indexOf(id) + 1, readyIds.length);
    const result = await setCredential(provider, id, credential, {
      username: config.username,
      intervalMs: options.commandIntervalMs,
      maxAttempts: options.commandMaxAttempts,
      sleep,
      logger
    });
    options.reporter?.onDispatchResult?.(id, result);
    perInstance.set(id, result.ok ? { status: "applied" } : { status: "failed", reason: result.reason, message: result.message });
  }

  const current = await lookupInstances(context, ids);

  const entries: CredentialRecordEntry[] = ids.map((id, index) => ({
    index: index + 1,
    id,
    ip: current.get(id)?.ip,
    status: recordedStatus(perInstance.get(id))
  }));
  let recordPath: string | undefined;
  let recordError: string | undefined;
  try {
    recordPath = await writeCredentialRecord(config.outputDir, {
      credential,
      generatedAt,
      username: config.username,
      entries
    });
    logger.info({ path: recordPath }, "credential record written");
  } catch (error) {
    recordError = describeError(error);
    logger.error({ outputDir: config.outputDir, error: recordError }, "failed to write credential record");
  }

  const written = await writeConnectionFiles(
    context,
    ids.map((id, index) => ({
      index,
      id,
      ip: current.get(id)?.ip,
      embedCredential: perInstance.get(id)?.status === "applied"
    })),
    { username: config.username, credential }
  );

  return {
    credential,
    generatedAt,
    perInstance,
    recordPath,
    recordError,
    descriptorPaths: written.map((descriptor) => descriptor.path)
  };
}

async function lookupInstances(context: FleetContext, ids: string[]): Promise<Map<string, InstanceTarget>> {
  try {
    const instances = await context.provider.listInstances(ids);
    return new Map(instances.map((instance) => [instance.id, instance]));
  } catch (error) {
    context.logger.warn({ error: describeError(error) }, "could not look up instance IPs");
    return new Map();
  }
}

function recordedStatus(outcome?: InstanceOutcome): RecordedStatus {
  switch (outcome?.status) {
    case "applied":
      return "applied";
    case "failed":
      return "failed";
    default:
      return "not_attempted";
  }
}
