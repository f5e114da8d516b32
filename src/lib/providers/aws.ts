import { InvocationPendingError } from "../errors";
import { CommandError, formatCommand, runCommand, withSecretFile, type CommandRunner, type RunResult } from "../exec";
import type { CommandResult, CommandStatus, InstanceState, InstanceTarget } from "../types";
import { isRecord, normalizeIp, parseJson, stringField } from "../utils";
import type { CloudProvider } from "./types";

export interface AwsProviderSettings {
  region: string;
  profile?: string;
}

export interface ProviderClientOptions {
  bin?: string;
  runner?: CommandRunner;
}

const RUN_POWERSHELL_DOCUMENT = "AWS-RunPowerShellScript";
const NOT_REGISTERED = "NotRegistered";

const COMMAND_STATUS_MAP: Record<string, CommandStatus> = {
  Pending: "pending",
  Delayed: "pending",
  InProgress: "in_progress",
  Cancelling: "in_progress",
  Success: "success",
  Failed: "failed",
  Cancelled: "cancelled",
  TimedOut: "timed_out"
};

const INSTANCE_STATE_MAP: Record<string, InstanceState> = {
  running: "running",
  stopped: "stopped",
  pending: "pending",
  stopping: "stopping",
  "shutting-down": "stopping"
};

/** EC2 instances reached through the `aws` CLI; SSM is both the agent status and the run channel. */
export class AwsProvider implements CloudProvider {
  readonly kind = "aws" as const;
  readonly label: string;
  readonly onlineStatus = "Online";

  private readonly bin: string;
  private readonly runner: CommandRunner;

  constructor(private readonly settings: AwsProviderSettings, options: ProviderClientOptions = {}) {
    this.bin = options.bin ?? process.env.DESKFLEET_AWS_BIN ?? "aws";
    this.runner = options.runner ?? runCommand;
    this.label = `AWS EC2 (${settings.region})`;
  }

  async listInstances(ids: string[]): Promise<InstanceTarget[]> {
    if (ids.length === 0) {
      return [];
    }

    const parsed = parseJson((await this.aws(["ec2", "describe-instances", "--instance-ids", ...ids])).stdout);
    const found = new Map<string, InstanceTarget>();
    const reservations = isRecord(parsed) && Array.isArray(parsed.Reservations) ? parsed.Reservations : [];
    for (const reservation of reservations) {
      const instances = isRecord(reservation) && Array.isArray(reservation.Instances) ? reservation.Instances : [];
      for (const instance of instances) {
        if (!isRecord(instance)) {
          continue;
        }
        const id = stringField(instance.InstanceId);
        if (!id) {
          continue;
        }
        const stateName = isRecord(instance.State) ? stringField(instance.State.Name) : undefined;
        found.set(id, {
          id,
          state: INSTANCE_STATE_MAP[stateName ?? ""] ?? "unknown",
          ip: normalizeIp(stringField(instance.PublicIpAddress))
        });
      }
    }

    return ids.map((id): InstanceTarget => found.get(id) ?? { id, state: "unknown" });
  }

  async getAgentStatus(id: string): Promise<string> {
    const result = await this.aws([
      "ssm",
      "describe-instance-information",
      "--filters",
      `Key=InstanceIds,Values=${id}`
    ]);
    const parsed = parseJson(result.stdout);
    const list = isRecord(parsed) && Array.isArray(parsed.InstanceInformationList) ? parsed.InstanceInformationList : [];
    const info = list.find((item) => isRecord(item) && stringField(item.InstanceId) === id) ?? list[0];
    if (!isRecord(info)) {
      return NOT_REGISTERED;
    }
    return stringField(info.PingStatus) ?? "Unknown";
  }

  async sendCommand(id: string, scriptLines: string[]): Promise<string> {
    const result = await withSecretFile("parameters.json", JSON.stringify({ commands: scriptLines }), (parametersPath) =>
      this.aws([
        "ssm",
        "send-command",
        "--instance-ids",
        id,
        "--document-name",
        RUN_POWERSHELL_DOCUMENT,
        "--parameters",
        `file://${parametersPath}`,
        "--comment",
        "Set administrator password via deskfleet"
      ])
    );
    const parsed = parseJson(result.stdout);
    const commandId = isRecord(parsed) && isRecord(parsed.Command) ? stringField(parsed.Command.CommandId) : undefined;
    if (!commandId) {
      throw new Error(`send-command returned no CommandId for ${id}`);
    }
    return commandId;
  }

  async getCommandResult(commandId: string, id: string): Promise<CommandResult> {
    const args = ["ssm", "get-command-invocation", "--command-id", commandId, "--instance-id", id];
    const result = await this.aws(args, true);
    if (result.exitCode !== 0) {
      if (result.stderr.includes("InvocationDoesNotExist")) {
        throw new InvocationPendingError(commandId);
      }
      throw new CommandError(formatCommand(this.bin, args), result.exitCode, result.stdout, result.stderr);
    }

    const parsed = parseJson(result.stdout);
    const invocation = isRecord(parsed) ? parsed : {};
    const rawStatus = stringField(invocation.Status) ?? "Unknown";
    return {
      status: COMMAND_STATUS_MAP[rawStatus] ?? "pending",
      rawStatus,
      stdout: stringField(invocation.StandardOutputContent) ?? "",
      stderr: stringField(invocation.StandardErrorContent) ?? ""
    };
  }

  async releaseCommand(): Promise<void> {
    // SSM invocations expire on their own.
  }

  async startInstances(ids: string[]): Promise<void> {
    if (ids.length > 0) {
      await this.aws(["ec2", "start-instances", "--instance-ids", ...ids]);
    }
  }

  async stopInstances(ids: string[]): Promise<void> {
    if (ids.length > 0) {
      await this.aws(["ec2", "stop-instances", "--instance-ids", ...ids]);
    }
  }

  private async aws(args: string[], allowNonZeroExit = false): Promise<RunResult> {
    const scoped = [...args, "--region", this.settings.region, "--output", "json"];
    if (this.settings.profile) {
      scoped.push("--profile", this.settings.profile);
    }
    return await this.runner(this.bin, scoped, { timeoutMs: 60_000, allowNonZeroExit });
  }
}
