import fs from "node:fs";
import path from "node:path";
import { readConfig, resolveConfigPath, type SessionConfig } from "./config";
import { describeError } from "./errors";
import { isBinaryAvailable, runCommand, type CommandRunner } from "./exec";
import type { ProviderKind } from "./types";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export interface PreflightOptions {
  runner?: CommandRunner;
  configPath?: string;
}

const CLOUD_CLIS: Record<ProviderKind, { bin: () => string; name: string; install: string; login: string }> = {
  aws: {
    bin: () => process.env.DESKFLEET_AWS_BIN ?? "aws",
    name: "AWS CLI",
    install: "Install AWS CLI v2 and make sure `aws` is on PATH.",
    login: "aws configure"
  },
  azure: {
    bin: () => process.env.DESKFLEET_AZ_BIN ?? "az",
    name: "Azure CLI",
    install: "Install the Azure CLI and make sure `az` is on PATH.",
    login: "az login"
  }
};

export async function runPreflight(options: PreflightOptions = {}): Promise<PreflightReport> {
  const runner = options.runner ?? runCommand;
  const checks: PreflightCheck[] = [];

  const nodeMajor = Number(process.versions.node.split(".")[0] ?? "0");
  checks.push({
    key: "node",
    ok: Number.isFinite(nodeMajor) && nodeMajor >= 20,
    message: `Node.js ${process.version}`,
    fix: nodeMajor >= 20 ? undefined : "Install Node.js 20 or newer."
  });

  let config: SessionConfig | undefined;
  const configPath = options.configPath ?? resolveConfigPath();
  try {
    config = await readConfig(configPath);
    checks.push({
      key: "config",
      ok: config !== undefined,
      message: config ? `Configuration found at ${configPath}` : `No configuration at ${configPath}`,
      fix: config ? undefined : "Create one with the configure command.",
      suggestedCommands: config ? undefined : ["deskfleet configure"]
    });
  } catch (error) {
    checks.push({
      key: "config",
      ok: false,
      message: describeError(error),
      fix: "Fix the file or re-run the configure command.",
      suggestedCommands: ["deskfleet configure"]
    });
  }

  const terraformBin = process.env.DESKFLEET_TERRAFORM_BIN ?? "terraform";
  const terraformFound = await isBinaryAvailable(terraformBin, runner);
  checks.push({
    key: "terraform-bin",
    ok: terraformFound,
    message: terraformFound ? `terraform found (${terraformBin})` : "terraform not found.",
    fix: terraformFound ? undefined : "Install Terraform and make sure it is on PATH."
  });

  if (config) {
    const resolved = path.resolve(config.terraformDir);
    const exists = fs.statSync(resolved, { throwIfNoEntry: false })?.isDirectory() ?? false;
    checks.push({
      key: "terraform-dir",
      ok: exists,
      message: exists ? `Terraform directory: ${resolved}` : `Terraform directory not found: ${resolved}`,
      fix: exists ? undefined : "Point terraformDir at the directory you ran `terraform apply` in."
    });
  }

  const kinds: ProviderKind[] = config ? [config.provider.kind] : ["aws", "azure"];
  for (const kind of kinds) {
    const cli = CLOUD_CLIS[kind];
    const bin = cli.bin();
    const found = await isBinaryAvailable(bin, runner);
    checks.push({
      key: `${kind}-bin`,
      // Without a config either CLI is enough, so a missing one is reported but not fatal.
      ok: found || !config,
      message: found ? `${cli.name} found (${bin})` : `${cli.name} not found.`,
      fix: found ? undefined : cli.install,
      suggestedCommands: found ? undefined : [cli.login]
    });
  }

  return { checks, ok: checks.every((check) => check.ok) };
}
