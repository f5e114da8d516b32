import chalk from "chalk";
import { Command } from "commander";
import { registerConfigureCommand } from "./commands/configure";
import { registerCredentialsCommand } from "./commands/credentials";
import { registerDoctorCommand } from "./commands/doctor";
import { registerRefreshCommand, registerStartCommand, registerStopCommand } from "./commands/power";
import { registerStatusCommand } from "./commands/status";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/utils";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Set one administrator password on a Terraform-built Windows fleet and write its connection files")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerConfigureCommand(program);
registerDoctorCommand(program);
registerStatusCommand(program);
registerCredentialsCommand(program);
registerRefreshCommand(program);
registerStartCommand(program);
registerStopCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});
