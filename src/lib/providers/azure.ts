import { randomBytes } from "node:crypto";
import { InvocationPendingError } from "../errors";
import { CommandError, formatCommand, runCommand, withSecretFile, type CommandRunner, type RunResult } from "../exec";
import type { CommandResult, CommandStatus, InstanceState, InstanceTarget } from "../types";
import { isRecord, normalizeIp, parseJson, stringField } from "../utils";
import type { ProviderClientOptions } from "./aws";
import type { CloudProvider } from "./types";

export interface AzureProviderSettings {
  resourceGroup: string;
  subscription?: string;
}

const NOT_READY = "NotReady";

const EXECUTION_STATE_MAP: Record<string, CommandStatus> = {
  Pending: "pending",
  Unknown: "pending",
  Running: "in_progress",
  Succeeded: "success",
  Failed: "failed",
  Canceled: "cancelled",
  TimedOut: "timed_out"
};

const POWER_STATE_MAP: Record<string, InstanceState> = {
  "VM running": "running",
  "VM stopped": "stopped",
  "VM deallocated": "stopped",
  "VM starting": "pending",
  "VM stopping": "stopping",
  "VM deallocating": "stopping"
};

/**
 * Azure VMs reached through the `az` CLI. Instance ids are VM names inside one resource group;
 * the command id is the name of a managed run command created with async execution.
 */
export class AzureProvider implements CloudProvider {
  readonly kind = "azure" as const;
  readonly label: string;
  readonly onlineStatus = "Ready";

  private readonly bin: string;
  private readonly runner: CommandRunner;

  constructor(private readonly settings: AzureProviderSettings, options: ProviderClientOptions = {}) {
    this.bin = options.bin ?? process.env.DESKFLEET_AZ_BIN ?? "az";
    this.runner = options.runner ?? runCommand;
    this.label = `Azure VM (${settings.resourceGroup})`;
  }

  async listInstances(ids: string[]): Promise<InstanceTarget[]> {
    const instances: InstanceTarget[] = [];
    for (const id of ids) {
      const parsed = parseJson((await this.az(["vm", "show", "--show-details", "--name", id])).stdout);
      const vm = isRecord(parsed) ? parsed : {};
      instances.push({
        id,
        state: POWER_STATE_MAP[stringField(vm.powerState) ?? ""] ?? "unknown",
        ip: normalizeIp(stringField(vm.publicIps))
      });
    }
    return instances;
  }

  async getAgentStatus(id: string): Promise<string> {
    const parsed = parseJson((await this.az(["vm", "get-instance-view", "--name", id])).stdout);
    const instanceView = isRecord(parsed) && isRecord(parsed.instanceView) ? parsed.instanceView : {};
    const vmAgent = isRecord(instanceView.vmAgent) ? instanceView.vmAgent : {};
    const statuses = Array.isArray(vmAgent.statuses) ? vmAgent.statuses : [];
    const first = statuses[0];
    return (isRecord(first) ? stringField(first.displayStatus) : undefined) ?? NOT_READY;
  }

  async sendCommand(id: string, scriptLines: string[]): Promise<string> {
    const commandName = `deskfleet-credential-${randomBytes(4).toString("hex")}`;
    await withSecretFile("script.ps1", scriptLines.join("\n"), (scriptPath) =>
      this.az([
        "vm",
        "run-command",
        "create",
        "--vm-name",
        id,
        "--name",
        commandName,
        "--script",
        `@${scriptPath}`,
        "--async-execution",
        "true",
        "--timeout-in-seconds",
        "120"
      ])
    );
    return commandName;
  }

  async getCommandResult(commandId: string, id: string): Promise<CommandResult> {
    const args = ["vm", "run-command", "show", "--vm-name", id, "--name", commandId, "--instance-view"];
    const result = await this.az(args, true);
    if (result.exitCode !== 0) {
      if (/ResourceNotFound|NotFound/.test(result.stderr)) {
        throw new InvocationPendingError(commandId);
      }
      throw new CommandError(formatCommand(this.bin, args), result.exitCode, result.stdout, result.stderr);
    }

    const parsed = parseJson(result.stdout);
    const instanceView = isRecord(parsed) && isRecord(parsed.instanceView) ? parsed.instanceView : {};
    const rawStatus = stringField(instanceView.executionState) ?? "Unknown";
    return {
      status: EXECUTION_STATE_MAP[rawStatus] ?? "pending",
      rawStatus,
      stdout: stringField(instanceView.output) ?? "",
      stderr: stringField(instanceView.error) ?? ""
    };
  }

  // The run command resource keeps the script, password included, until it is deleted.
  async releaseCommand(commandId: string, id: string): Promise<void> {
    await this.az(["vm", "run-command", "delete", "--vm-name", id, "--name", commandId, "--yes"]);
  }

  async startInstances(ids: string[]): Promise<void> {
    for (const id of ids) {
      await this.az(["vm", "start", "--name", id, "--no-wait"]);
    }
  }

  async stopInstances(ids: string[]): Promise<void> {
    for (const id of ids) {
      await this.az(["vm", "deallocate", "--name", id, "--no-wait"]);
    }
  }

  private async az(args: string[], allowNonZeroExit = false): Promise<RunResult> {
    const scoped = [...args, "--resource-group", this.settings.resourceGroup, "--output", "json"];
    if (this.settings.subscription) {
      scoped.push("--subscription", this.settings.subscription);
    }
    return await this.runner(this.bin, scoped, { timeoutMs: 120_000, allowNonZeroExit });
  }
}
