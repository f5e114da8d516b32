import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import ora from "ora";
import { getSession, loadFleet } from "../lib/command-context";
import { CliError, excerpt } from "../lib/errors";
import type { BatchResult, InstanceOutcome } from "../lib/types";
import { parseMaybeNumber } from "../lib/utils";
import { provisionCredentials } from "../services/credential-provisioner";

interface CredentialsOptions {
  timeout?: string;
  interval?: string;
  terraformDir?: string;
  outputDir?: string;
  format?: string;
  yes?: boolean;
}

export function registerCredentialsCommand(program: Command): void {
  program
    .command("credentials")
    .description("Wait for the fleet's agents, set one shared administrator password and write connection files")
    .option("--timeout <minutes>", "How long to wait for management agents")
    .option("--interval <seconds>", "Seconds between readiness checks")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .option("--output-dir <path>", "Where PASSWORDS.txt and connection files are written")
    .option("--format <format>", "Connection file format: dcv or rdp")
    .option("-y, --yes", "Skip confirmation")
    .action(async (options: CredentialsOptions) => {
      const timeoutMinutes = parsePositiveOption(options.timeout, "--timeout");
      const intervalSeconds = parsePositiveOption(options.interval, "--interval");

      const session = await getSession({
        terraformDir: options.terraformDir,
        outputDir: options.outputDir,
        descriptorFormat: options.format
      });
      const fleet = await loadFleet(session);
      const ids = fleet.map((instance) => instance.id);

      console.log(`${chalk.bold(String(ids.length))} instance(s) on ${session.provider.label}: ${ids.join(", ")}`);
      console.log(chalk.dim(`Account: ${session.config.username}. Output: ${session.config.outputDir}`));

      if (!options.yes) {
        if (!process.stdout.isTTY) {
          throw new CliError({
            kind: "validation",
            message: "Setting passwords needs confirmation. Re-run with --yes."
          });
        }
        const confirm = await inquirer.prompt<{ proceed: boolean }>([
          {
            type: "confirm",
            name: "proceed",
            message: "Set a new shared password on every ready instance?",
            default: true
          }
        ]);
        if (!confirm.proceed) {
          console.log("Cancelled.");
          return;
        }
      }

      const spinner = ora("Waiting for management agents...").start();
      let result: BatchResult;
      try {
        result = await provisionCredentials(session, ids, {
          timeoutMinutes,
          intervalSeconds,
          reporter: {
            onReadinessRound: (round) => {
              spinner.text = `Waiting for management agents (${round.readyCount}/${round.instances.length} ready, check ${round.round}/${round.totalRounds})...`;
            },
            onDispatchStart: (instanceId, position, total) => {
              if (!spinner.isSpinning) {
                spinner.start();
              }
              spinner.text = `Setting password on ${instanceId} (${position}/${total})...`;
            },
            onDispatchResult: (instanceId, dispatch) => {
              if (dispatch.ok) {
                spinner.succeed(`Password set on ${instanceId}.`);
              } else {
                const output = dispatch.stderr || dispatch.stdout;
                spinner.fail(`${instanceId}: ${dispatch.message}${output ? `\n  ${excerpt(output.trim())}` : ""}`);
              }
            }
          }
        });
        if (spinner.isSpinning) {
          spinner.stop();
        }
      } catch (error) {
        spinner.fail("Credential provisioning failed.");
        throw error;
      }

      renderBatch(result, session.logPath);

      const applied = [...result.perInstance.values()].filter((outcome) => outcome.status === "applied").length;
      if (applied === 0) {
        throw new CliError({
          kind: "runtime",
          message: "No instance received the new password.",
          hint: `See ${session.logPath} for the full command output.`
        });
      }
    });
}

function renderBatch(result: BatchResult, logPath: string): void {
  console.log("");
  for (const [id, outcome] of result.perInstance) {
    console.log(`${outcomeSymbol(outcome)} ${id}: ${describeOutcome(outcome)}`);
  }

  if (result.credential) {
    const line = `Password: ${result.credential}`;
    const border = "=".repeat(line.length + 4);
    console.log("");
    console.log(chalk.yellow(border));
    console.log(chalk.yellow(`  ${chalk.bold(line)}  `));
    console.log(chalk.yellow(border));
    console.log(chalk.dim("Same password for every instance of this batch. Keep it secure."));
  }

  if (result.recordPath) {
    console.log(`Record: ${result.recordPath}`);
  } else if (result.recordError) {
    console.log(chalk.red(`PASSWORDS.txt was not written: ${result.recordError}`));
    console.log(chalk.yellow("Copy the password above now. It is not stored anywhere else."));
  }
  for (const descriptorPath of result.descriptorPaths) {
    console.log(`Connection file: ${descriptorPath}`);
  }
  console.log(chalk.dim(`Log: ${logPath}`));
}

function outcomeSymbol(outcome: InstanceOutcome): string {
  switch (outcome.status) {
    case "applied":
      return chalk.green("✔");
    case "failed":
      return chalk.red("✖");
    case "skipped":
      return chalk.yellow("-");
  }
}

function describeOutcome(outcome: InstanceOutcome): string {
  switch (outcome.status) {
    case "applied":
      return "password set";
    case "failed":
      return `${outcome.reason.replace(/_/g, " ")}: ${excerpt(outcome.message)}`;
    case "skipped":
      return `skipped (${outcome.message})`;
  }
}

function parsePositiveOption(input: string | undefined, flag: string): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  const value = parseMaybeNumber(input);
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new CliError({ kind: "validation", message: `${flag} must be a positive whole number.` });
  }
  return value;
}
