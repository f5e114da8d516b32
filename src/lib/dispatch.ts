import { COMMAND_POLL_INTERVAL_MS, COMMAND_POLL_MAX_ATTEMPTS, DEFAULT_USERNAME } from "./constants";
import { describeError, InvocationPendingError, redactSecret } from "./errors";
import type { Logger } from "./logger";
import { pollUntil } from "./poll";
import type { CloudProvider } from "./providers";
import type { CommandResult, DispatchResult } from "./types";
import type { Sleep } from "./utils";

export interface SetCredentialOptions {
  username?: string;
  intervalMs?: number;
  maxAttempts?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export const CREDENTIAL_APPLIED_MARKER = "Credential applied for";

export function buildSetPasswordScript(username: string, credential: string): string[] {
  const user = quotePowerShell(username);
  return [
    `$password = ConvertTo-SecureString ${quotePowerShell(credential)} -AsPlainText -Force`,
    `Set-LocalUser -Name ${user} -Password $password`,
    `Write-Host ${quotePowerShell(`${CREDENTIAL_APPLIED_MARKER} ${username}`)}`,
    `Get-LocalUser -Name ${user} | Select-Object Name, Enabled, PasswordLastSet | Format-List`
  ];
}

/**
 * Sets the local account password on one instance. The command is sent exactly once; the result
 * is then polled until it reaches a terminal state or the attempts run out. Failures come back as
 * a value so the caller can carry on with the next instance.
 */
export async function setCredential(
  provider: CloudProvider,
  instanceId: string,
  credential: string,
  options: SetCredentialOptions = {}
): Promise<DispatchResult> {
  const logger = options.logger?.child({ instanceId });
  const username = options.username ?? DEFAULT_USERNAME;

  let commandId: string;
  try {
    commandId = await provider.sendCommand(instanceId, buildSetPasswordScript(username, credential));
  } catch (error) {
    const message = redactSecret(describeError(error), credential);
    logger?.error({ error: message }, "failed to send credential command");
    return { ok: false, reason: "backend_unavailable", message: `Could not send command: ${message}` };
  }
  logger?.info({ commandId }, "credential command sent");

  const outcome = await pollUntil<DispatchResult>(
    async (attempt) => {
      let result: CommandResult;
      try {
        result = await provider.getCommandResult(commandId, instanceId);
      } catch (error) {
        if (error instanceof InvocationPendingError) {
          logger?.debug({ commandId, attempt }, "command not registered yet");
          return { done: false };
        }
        const message = redactSecret(describeError(error), credential);
        logger?.error({ commandId, error: message }, "failed to read command result");
        return {
          done: true,
          value: { ok: false, reason: "backend_unavailable", message: `Could not read command result: ${message}`, commandId }
        };
      }

      switch (result.status) {
        case "pending":
        case "in_progress":
          return { done: false };
        case "success":
          logger?.info({ commandId, stdout: result.stdout, stderr: result.stderr }, "credential command succeeded");
          return { done: true, value: { ok: true, commandId, stdout: result.stdout } };
        case "failed":
        case "cancelled":
        case "timed_out":
          logger?.error(
            { commandId, status: result.rawStatus, stdout: result.stdout, stderr: result.stderr },
            "credential command did not succeed"
          );
          return {
            done: true,
            value: {
              ok: false,
              reason: "remote_failure",
              message: `Remote command ended with status ${result.rawStatus}`,
              commandId,
              stdout: result.stdout,
              stderr: result.stderr
            }
          };
      }
    },
    {
      intervalMs: options.intervalMs ?? COMMAND_POLL_INTERVAL_MS,
      maxAttempts: options.maxAttempts ?? COMMAND_POLL_MAX_ATTEMPTS,
      leadingDelay: true,
      sleep: options.sleep
    }
  );

  // Released whatever the outcome; the command may still hold the script.
  await releaseCommand(provider, commandId, instanceId, credential, logger);

  if (!outcome.ok) {
    logger?.warn({ commandId, attempts: outcome.attempts }, "credential command timed out");
    return {
      ok: false,
      reason: "timeout",
      message: `No terminal result after ${outcome.attempts} checks`,
      commandId
    };
  }
  return outcome.value;
}

async function releaseCommand(
  provider: CloudProvider,
  commandId: string,
  instanceId: string,
  credential: string,
  logger?: Logger
): Promise<void> {
  try {
    await provider.releaseCommand(commandId, instanceId);
  } catch (error) {
    logger?.warn({ commandId, error: redactSecret(describeError(error), credential) }, "failed to release command");
  }
}

function quotePowerShell(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
