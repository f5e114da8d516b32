import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import {
  defaultOutputDir,
  isValidDisplayName,
  parseConfig,
  readConfig,
  resolveConfigPath,
  writeConfig,
  type SessionConfig
} from "../lib/config";
import { DEFAULT_NAME_PREFIX, DEFAULT_TERRAFORM_DIR, DEFAULT_USERNAME } from "../lib/constants";
import { CliError } from "../lib/errors";

interface ConfigureOptions {
  provider?: string;
  region?: string;
  profile?: string;
  resourceGroup?: string;
  subscription?: string;
  terraformDir?: string;
  outputDir?: string;
  namePrefix?: string;
  username?: string;
  format?: string;
  yes?: boolean;
}

type ConfigureAnswers = {
  kind: "aws" | "azure";
  region: string;
  profile: string;
  resourceGroup: string;
  subscription: string;
  terraformDir: string;
  outputDir: string;
  namePrefix: string;
  username: string;
  descriptorFormat: "dcv" | "rdp";
};

export function registerConfigureCommand(program: Command): void {
  program
    .command("configure")
    .description("Write the provider and output settings used by every other command")
    .option("--provider <kind>", "Cloud provider: aws or azure")
    .option("--region <region>", "AWS region")
    .option("--profile <profile>", "AWS CLI profile")
    .option("--resource-group <name>", "Azure resource group")
    .option("--subscription <id>", "Azure subscription")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .option("--output-dir <path>", "Where PASSWORDS.txt and connection files are written")
    .option("--name-prefix <prefix>", "Connection file name prefix")
    .option("--username <name>", "Windows account whose password is set")
    .option("--format <format>", "Connection file format: dcv or rdp")
    .option("-y, --yes", "Use flags and defaults without prompting")
    .action(async (options: ConfigureOptions) => {
      const configPath = resolveConfigPath();
      const existing = await readExistingConfig();

      let raw: Record<string, unknown>;
      if (options.yes || !process.stdout.isTTY) {
        raw = fromFlags(options, existing);
      } else {
        const answers = await promptForSettings(options, existing);
        raw = {
          provider:
            answers.kind === "aws"
              ? { kind: "aws", region: answers.region, profile: answers.profile }
              : { kind: "azure", resourceGroup: answers.resourceGroup, subscription: answers.subscription },
          terraformDir: answers.terraformDir,
          outputDir: answers.outputDir,
          namePrefix: answers.namePrefix,
          username: answers.username,
          descriptorFormat: answers.descriptorFormat
        };
      }

      const config = parseConfig(
        {
          readinessTimeoutMinutes: existing?.readinessTimeoutMinutes,
          readinessIntervalSeconds: existing?.readinessIntervalSeconds,
          ...raw
        },
        "the given settings"
      );
      await writeConfig(config, configPath);

      console.log(chalk.green(`Saved configuration to ${configPath}`));
      console.log(`provider: ${describeProvider(config)}`);
      console.log(`terraform: ${config.terraformDir}`);
      console.log(`output: ${config.outputDir}`);
      console.log(chalk.dim("Next: run `deskfleet doctor`, then `deskfleet credentials`."));
    });
}

async function readExistingConfig(): Promise<SessionConfig | undefined> {
  try {
    return await readConfig();
  } catch (error) {
    if (error instanceof CliError && error.kind === "validation") {
      console.log(chalk.yellow("Existing configuration is invalid and will be replaced."));
      return undefined;
    }
    throw error;
  }
}

function fromFlags(options: ConfigureOptions, existing?: SessionConfig): Record<string, unknown> {
  const kind = options.provider ?? existing?.provider.kind;
  if (!kind) {
    throw new CliError({
      kind: "validation",
      message: "--provider is required when not running interactively.",
      hint: "Example: deskfleet configure --provider aws --region us-east-1 --yes"
    });
  }

  const previous = existing?.provider;
  const provider =
    kind === "azure"
      ? {
          kind,
          resourceGroup: options.resourceGroup ?? (previous?.kind === "azure" ? previous.resourceGroup : undefined),
          subscription: options.subscription ?? (previous?.kind === "azure" ? previous.subscription : undefined)
        }
      : {
          kind,
          region: options.region ?? (previous?.kind === "aws" ? previous.region : undefined),
          profile: options.profile ?? (previous?.kind === "aws" ? previous.profile : undefined)
        };

  return {
    provider,
    terraformDir: options.terraformDir ?? existing?.terraformDir,
    outputDir: options.outputDir ?? existing?.outputDir,
    namePrefix: options.namePrefix ?? existing?.namePrefix,
    username: options.username ?? existing?.username,
    descriptorFormat: options.format ?? existing?.descriptorFormat
  };
}

async function promptForSettings(options: ConfigureOptions, existing?: SessionConfig): Promise<ConfigureAnswers> {
  const previous = existing?.provider;
  const required = (label: string) => (input: string) => (input.trim() ? true : `${label} is required.`);

  return inquirer.prompt<ConfigureAnswers>([
    {
      type: "list",
      name: "kind",
      message: "Cloud provider:",
      choices: [
        { name: "AWS EC2 (Systems Manager)", value: "aws" },
        { name: "Azure VM (Run Command)", value: "azure" }
      ],
      default: options.provider ?? previous?.kind ?? "aws"
    },
    {
      type: "input",
      name: "region",
      message: "AWS region:",
      default: options.region ?? (previous?.kind === "aws" ? previous.region : "us-east-1"),
      when: (answers: Partial<ConfigureAnswers>) => answers.kind === "aws",
      validate: required("Region")
    },
    {
      type: "input",
      name: "profile",
      message: "AWS CLI profile (blank for default):",
      default: options.profile ?? (previous?.kind === "aws" ? previous.profile : undefined),
      when: (answers: Partial<ConfigureAnswers>) => answers.kind === "aws"
    },
    {
      type: "input",
      name: "resourceGroup",
      message: "Azure resource group:",
      default: options.resourceGroup ?? (previous?.kind === "azure" ? previous.resourceGroup : undefined),
      when: (answers: Partial<ConfigureAnswers>) => answers.kind === "azure",
      validate: required("Resource group")
    },
    {
      type: "input",
      name: "subscription",
      message: "Azure subscription (blank for the CLI default):",
      default: options.subscription ?? (previous?.kind === "azure" ? previous.subscription : undefined),
      when: (answers: Partial<ConfigureAnswers>) => answers.kind === "azure"
    },
    {
      type: "input",
      name: "terraformDir",
      message: "Terraform directory:",
      default: options.terraformDir ?? existing?.terraformDir ?? DEFAULT_TERRAFORM_DIR
    },
    {
      type: "input",
      name: "outputDir",
      message: "Folder for PASSWORDS.txt and connection files:",
      default: options.outputDir ?? existing?.outputDir ?? defaultOutputDir()
    },
    {
      type: "input",
      name: "namePrefix",
      message: "Connection file prefix:",
      default: options.namePrefix ?? existing?.namePrefix ?? DEFAULT_NAME_PREFIX,
      validate: (input: string) => (isValidDisplayName(input.trim()) ? true : "Use letters, digits, '.', '_' and '-'.")
    },
    {
      type: "input",
      name: "username",
      message: "Windows account to set the password for:",
      default: options.username ?? existing?.username ?? DEFAULT_USERNAME
    },
    {
      type: "list",
      name: "descriptorFormat",
      message: "Connection file format:",
      choices: [
        { name: "Amazon DCV (.dcv, includes the password)", value: "dcv" },
        { name: "Remote Desktop (.rdp, prompts for the password)", value: "rdp" }
      ],
      default: options.format ?? existing?.descriptorFormat ?? "dcv"
    }
  ]);
}

function describeProvider(config: SessionConfig): string {
  const settings = config.provider;
  switch (settings.kind) {
    case "aws":
      return `aws (${settings.region}${settings.profile ? `, profile ${settings.profile}` : ""})`;
    case "azure":
      return `azure (${settings.resourceGroup}${settings.subscription ? `, subscription ${settings.subscription}` : ""})`;
  }
}
