import chalk from "chalk";
import { Command } from "commander";
import { CliError } from "../lib/errors";
import { runPreflight } from "../lib/preflight";

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check the configuration and the terraform, aws and az binaries")
    .action(async () => {
      const report = await runPreflight();
      const suggestedCommands = new Set<string>();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
        for (const command of check.suggestedCommands ?? []) {
          console.log(`  please run: ${chalk.bold(command)}`);
          suggestedCommands.add(command);
        }
      }

      if (!report.ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow("Action required: run the command(s) above, then re-run `deskfleet doctor`."));
        }
        throw new CliError({ kind: "dependency", message: "Preflight failed." });
      }
    });
}
