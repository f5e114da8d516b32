import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  DEFAULT_NAME_PREFIX,
  DEFAULT_OUTPUT_FOLDER,
  DEFAULT_TERRAFORM_DIR,
  DEFAULT_USERNAME,
  READINESS_INTERVAL_SECONDS,
  READINESS_TIMEOUT_MINUTES
} from "./constants";
import { CliError } from "./errors";
import type { DescriptorFormat } from "./types";
import { isRecord, normalizeInputPath, parseMaybeNumber, stringField } from "./utils";

export type ProviderSettings =
  | { kind: "aws"; region: string; profile?: string }
  | { kind: "azure"; resourceGroup: string; subscription?: string };

export interface SessionConfig {
  provider: ProviderSettings;
  terraformDir: string;
  outputDir: string;
  namePrefix: string;
  username: string;
  descriptorFormat: DescriptorFormat;
  readinessTimeoutMinutes: number;
  readinessIntervalSeconds: number;
}

const DISPLAY_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

export function resolveHomeDir(): string {
  const override = process.env.DESKFLEET_HOME;
  return override ? normalizeInputPath(override) : path.join(os.homedir(), CONFIG_DIR_NAME);
}

export function resolveConfigPath(): string {
  return path.join(resolveHomeDir(), CONFIG_FILE_NAME);
}

export function defaultOutputDir(): string {
  return path.join(os.homedir(), "Desktop", DEFAULT_OUTPUT_FOLDER);
}

export async function readConfig(configPath = resolveConfigPath()): Promise<SessionConfig | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(configPath, "utf8");
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliError({
      kind: "validation",
      message: `Config file is not valid JSON: ${configPath}`,
      detail: error instanceof Error ? error.message : String(error),
      hint: "Fix the file by hand or re-run `deskfleet configure`."
    });
  }

  return parseConfig(parsed, configPath);
}

export async function writeConfig(config: SessionConfig, configPath = resolveConfigPath()): Promise<void> {
  await fs.promises.mkdir(path.dirname(configPath), { recursive: true });
  await fs.promises.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, "utf8");
}

export function parseConfig(input: unknown, source = "config"): SessionConfig {
  const problems: string[] = [];
  if (!isRecord(input)) {
    throw invalidConfig(source, ["expected a JSON object"]);
  }

  const provider = parseProviderSettings(input.provider, problems);

  const namePrefix = stringField(input.namePrefix)?.trim() || DEFAULT_NAME_PREFIX;
  if (!DISPLAY_NAME_PATTERN.test(namePrefix)) {
    problems.push("namePrefix may only contain letters, digits, '.', '_' and '-'");
  }

  const descriptorFormat = parseDescriptorFormat(input.descriptorFormat, problems);

  const readinessTimeoutMinutes = positiveInteger(input.readinessTimeoutMinutes, READINESS_TIMEOUT_MINUTES, "readinessTimeoutMinutes", problems);
  const readinessIntervalSeconds = positiveInteger(input.readinessIntervalSeconds, READINESS_INTERVAL_SECONDS, "readinessIntervalSeconds", problems);

  if (!provider || problems.length > 0) {
    throw invalidConfig(source, problems);
  }

  return {
    provider,
    terraformDir: normalizeInputPath(stringField(input.terraformDir) || DEFAULT_TERRAFORM_DIR),
    outputDir: normalizeInputPath(stringField(input.outputDir) || defaultOutputDir()),
    namePrefix,
    username: stringField(input.username)?.trim() || DEFAULT_USERNAME,
    descriptorFormat,
    readinessTimeoutMinutes,
    readinessIntervalSeconds
  };
}

export function isValidDisplayName(name: string): boolean {
  return DISPLAY_NAME_PATTERN.test(name);
}

function parseProviderSettings(value: unknown, problems: string[]): ProviderSettings | undefined {
  if (!isRecord(value)) {
    problems.push("provider is required");
    return undefined;
  }

  const kind = stringField(value.kind);
  if (kind === "aws") {
    const region = stringField(value.region)?.trim();
    if (!region) {
      problems.push("provider.region is required for aws");
      return undefined;
    }
    const profile = stringField(value.profile)?.trim();
    return profile ? { kind, region, profile } : { kind, region };
  }

  if (kind === "azure") {
    const resourceGroup = stringField(value.resourceGroup)?.trim();
    if (!resourceGroup) {
      problems.push("provider.resourceGroup is required for azure");
      return undefined;
    }
    const subscription = stringField(value.subscription)?.trim();
    return subscription ? { kind, resourceGroup, subscription } : { kind, resourceGroup };
  }

  problems.push(`provider.kind must be "aws" or "azure", got ${kind ? `"${kind}"` : "nothing"}`);
  return undefined;
}

function parseDescriptorFormat(value: unknown, problems: string[]): DescriptorFormat {
  if (value === undefined || value === "dcv" || value === "rdp") {
    return value ?? "dcv";
  }
  problems.push(`descriptorFormat must be "dcv" or "rdp", got ${JSON.stringify(value)}`);
  return "dcv";
}

function positiveInteger(value: unknown, fallback: number, field: string, problems: string[]): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  const numeric = parseMaybeNumber(value);
  if (typeof numeric !== "number" || !Number.isInteger(numeric) || numeric < 1) {
    problems.push(`${field} must be a positive integer`);
    return fallback;
  }
  return numeric;
}

function invalidConfig(source: string, problems: string[]): CliError {
  return new CliError({
    kind: "validation",
    message: `Invalid configuration in ${source}.`,
    detail: problems.map((problem) => `  - ${problem}`).join("\n"),
    hint: "Re-run `deskfleet configure` or edit the file by hand."
  });
}
