import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import ora from "ora";
import { getSession, loadFleet, type Session } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { refreshDescriptors, startFleet, stopFleet, type RefreshResult } from "../services/fleet-power";

interface PowerCommandOptions {
  terraformDir?: string;
  outputDir?: string;
  format?: string;
  yes?: boolean;
}

export function registerStartCommand(program: Command): void {
  program
    .command("start")
    .description("Start every stopped instance, then refresh connection files with the new IPs")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .option("--output-dir <path>", "Where connection files are written")
    .option("--format <format>", "Connection file format: dcv or rdp")
    .option("-y, --yes", "Skip confirmation")
    .action(async (options: PowerCommandOptions) => {
      const session = await openSession(options);
      const ids = (await loadFleet(session)).map((instance) => instance.id);
      if (!(await confirm(options, `Start ${ids.length} instance(s) on ${session.provider.label}?`))) {
        console.log("Cancelled.");
        return;
      }

      const spinner = ora("Starting instances...").start();
      try {
        const result = await startFleet(session, ids, {
          onWait: (instances) => {
            const running = instances.filter((instance) => instance.state === "running").length;
            spinner.text = `Starting instances (${running}/${instances.length} running)...`;
          }
        });
        if (result.changed.length === 0) {
          spinner.info("No stopped instances to start.");
        } else if (result.settled) {
          spinner.succeed(`Started ${result.changed.length} instance(s).`);
        } else {
          spinner.warn("Some instances are still starting; connection files may lack their IPs.");
        }
      } catch (error) {
        spinner.fail("Start failed.");
        throw error;
      }

      await refreshWithSpinner(session, ids);
    });
}

export function registerStopCommand(program: Command): void {
  program
    .command("stop")
    .description("Stop every running instance")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .option("-y, --yes", "Skip confirmation")
    .action(async (options: PowerCommandOptions) => {
      const session = await openSession(options);
      const ids = (await loadFleet(session)).map((instance) => instance.id);
      if (!(await confirm(options, `Stop ${ids.length} instance(s) on ${session.provider.label}?`))) {
        console.log("Cancelled.");
        return;
      }

      const spinner = ora("Stopping instances...").start();
      try {
        const result = await stopFleet(session, ids, {
          onWait: (instances) => {
            const stopped = instances.filter((instance) => instance.state === "stopped").length;
            spinner.text = `Stopping instances (${stopped}/${instances.length} stopped)...`;
          }
        });
        if (result.changed.length === 0) {
          spinner.info("No running instances to stop.");
        } else if (result.settled) {
          spinner.succeed(`Stopped ${result.changed.length} instance(s).`);
        } else {
          spinner.warn("Some instances are still stopping. Check again with `deskfleet status`.");
        }
      } catch (error) {
        spinner.fail("Stop failed.");
        throw error;
      }
    });
}

export function registerRefreshCommand(program: Command): void {
  program
    .command("refresh")
    .description("Rewrite connection files from current IPs and the last credential record")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .option("--output-dir <path>", "Where connection files are written")
    .option("--format <format>", "Connection file format: dcv or rdp")
    .action(async (options: PowerCommandOptions) => {
      const session = await openSession(options);
      const ids = (await loadFleet(session)).map((instance) => instance.id);
      await refreshWithSpinner(session, ids);
    });
}

function openSession(options: PowerCommandOptions): Promise<Session> {
  return getSession({
    terraformDir: options.terraformDir,
    outputDir: options.outputDir,
    descriptorFormat: options.format
  });
}

async function confirm(options: PowerCommandOptions, message: string): Promise<boolean> {
  if (options.yes) {
    return true;
  }
  if (!process.stdout.isTTY) {
    throw new CliError({ kind: "validation", message: "Confirmation requires a TTY. Re-run with --yes." });
  }
  const answer = await inquirer.prompt<{ proceed: boolean }>([
    { type: "confirm", name: "proceed", message, default: false }
  ]);
  return answer.proceed;
}

async function refreshWithSpinner(session: Session, ids: string[]): Promise<void> {
  const spinner = ora("Writing connection files...").start();
  let result: RefreshResult;
  try {
    result = await refreshDescriptors(session, ids);
  } catch (error) {
    spinner.fail("Refreshing connection files failed.");
    throw error;
  }

  if (result.written.length === 0) {
    spinner.warn("No instance has a public IP yet; no connection files written.");
    return;
  }
  spinner.succeed(`Wrote ${result.written.length} connection file(s), ${result.withCredential} with the saved password.`);
  for (const descriptor of result.written) {
    console.log(`${descriptor.displayName}: ${descriptor.ip} ${chalk.dim(descriptor.path)}`);
  }
  if (!result.recordFound) {
    console.log(chalk.dim("No PASSWORDS.txt found; files will prompt for credentials. Run `deskfleet credentials` to set one."));
  }
}
