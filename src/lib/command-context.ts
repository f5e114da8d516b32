import { readConfig, resolveConfigPath, type SessionConfig } from "./config";
import { CliError } from "./errors";
import { createSessionLogger, type Logger } from "./logger";
import { createProvider, type CloudProvider } from "./providers";
import { TerraformBackend, type ProvisionedInstance } from "./terraform";
import type { DescriptorFormat } from "./types";
import type { Sleep } from "./utils";

/** What services need: one provider client and one logger for the whole run. */
export interface FleetContext {
  config: SessionConfig;
  provider: CloudProvider;
  logger: Logger;
  sleep?: Sleep;
}

export interface Session extends FleetContext {
  backend: TerraformBackend;
  logPath: string;
}

export interface SessionOverrides {
  terraformDir?: string;
  outputDir?: string;
  descriptorFormat?: string;
}

export async function getSession(overrides: SessionOverrides = {}): Promise<Session> {
  const stored = await readConfig();
  if (!stored) {
    throw new CliError({
      kind: "not_found",
      message: `No configuration found at ${resolveConfigPath()}.`,
      hint: "Run `deskfleet configure` first."
    });
  }

  const config: SessionConfig = {
    ...stored,
    terraformDir: overrides.terraformDir ?? stored.terraformDir,
    outputDir: overrides.outputDir ?? stored.outputDir,
    descriptorFormat: parseFormatOverride(overrides.descriptorFormat) ?? stored.descriptorFormat
  };

  const { logger, logPath } = createSessionLogger();
  const provider = createProvider(config.provider);
  logger.info({ provider: provider.label, terraformDir: config.terraformDir }, "session started");

  return {
    config,
    provider,
    backend: new TerraformBackend(config.terraformDir),
    logger,
    logPath
  };
}

function parseFormatOverride(value?: string): DescriptorFormat | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === "dcv" || value === "rdp") {
    return value;
  }
  throw new CliError({
    kind: "validation",
    message: `--format must be "dcv" or "rdp", got "${value}".`
  });
}

/** Instances from the Terraform outputs, in Terraform's order. */
export async function loadFleet(session: Session): Promise<ProvisionedInstance[]> {
  const instances = await session.backend.getInstances();
  if (instances.length === 0) {
    throw new CliError({
      kind: "not_found",
      message: `Terraform in ${session.config.terraformDir} reports no instances.`,
      hint: "Run `terraform apply` first, and check that it outputs instance_ids or vm_names."
    });
  }
  session.logger.info({ instances: instances.map((instance) => instance.id) }, "fleet loaded from terraform");
  return instances;
}
