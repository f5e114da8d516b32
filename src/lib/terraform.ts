import fs from "node:fs";
import path from "node:path";
import { CliError } from "./errors";
import { runCommand, type CommandRunner } from "./exec";
import { isRecord, normalizeIp, parseJson, stringArray } from "./utils";

export interface ProvisionedInstance {
  id: string;
  ip?: string;
}

export interface TerraformBackendOptions {
  bin?: string;
  runner?: CommandRunner;
}

// AWS stacks export `instance_ids`, Azure stacks `vm_names`.
const ID_OUTPUT_KEYS = ["instance_ids", "vm_names"] as const;
const IP_OUTPUT_KEY = "public_ips";

/** Read-only view of what the last `terraform apply` created. */
export class TerraformBackend {
  private readonly bin: string;
  private readonly runner: CommandRunner;

  constructor(readonly directory: string, options: TerraformBackendOptions = {}) {
    this.bin = options.bin ?? process.env.DESKFLEET_TERRAFORM_BIN ?? "terraform";
    this.runner = options.runner ?? runCommand;
  }

  async readOutputs(): Promise<Record<string, unknown>> {
    const resolved = path.resolve(this.directory);
    const stat = fs.statSync(resolved, { throwIfNoEntry: false });
    if (!stat || !stat.isDirectory()) {
      throw new CliError({
        kind: "not_found",
        message: `Terraform directory not found: ${resolved}`,
        hint: "Set terraformDir with `deskfleet configure` or pass --terraform-dir."
      });
    }

    const result = await this.runner(this.bin, ["output", "-json"], { cwd: resolved, timeoutMs: 60_000 });
    return unwrapOutputs(parseJson(result.stdout));
  }

  /** Instances in Terraform's order; IPs may still be missing right after creation. */
  async getInstances(): Promise<ProvisionedInstance[]> {
    const outputs = await this.readOutputs();
    const key = ID_OUTPUT_KEYS.find((candidate) => stringArray(outputs[candidate]).length > 0);
    if (!key) {
      return [];
    }

    const ids = stringArray(outputs[key]);
    const ips = stringArray(outputs[IP_OUTPUT_KEY]);
    return ids.map((id, idx) => ({ id, ip: normalizeIp(ips[idx]) }));
  }
}

function unwrapOutputs(parsed: unknown): Record<string, unknown> {
  if (!isRecord(parsed)) {
    return {};
  }

  const outputs: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(parsed)) {
    if (isRecord(entry) && "value" in entry) {
      outputs[key] = entry.value;
    }
  }
  return outputs;
}
