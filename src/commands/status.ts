import chalk from "chalk";
import { Command } from "commander";
import ora from "ora";
import { getSession, loadFleet, type Session } from "../lib/command-context";
import { displayNameFor } from "../lib/descriptors";
import { describeError } from "../lib/errors";
import { renderTable } from "../lib/table";
import type { InstanceState } from "../lib/types";

interface StatusOptions {
  terraformDir?: string;
}

export function registerStatusCommand(program: Command): void {
  program
    .command("status")
    .description("List fleet instances with power state, IP and agent status")
    .option("--terraform-dir <path>", "Directory holding the Terraform state")
    .action(async (options: StatusOptions) => {
      const session = await getSession({ terraformDir: options.terraformDir });
      const fleet = await loadFleet(session);
      const { provider } = session;

      const spinner = ora(`Querying ${provider.label}...`).start();
      let rows: string[][];
      try {
        const current = new Map((await provider.listInstances(fleet.map((item) => item.id))).map((item) => [item.id, item]));
        rows = [];
        for (const [index, item] of fleet.entries()) {
          const instance = current.get(item.id);
          const state = instance?.state ?? "unknown";
          const agent = state === "running" ? await agentStatus(session, item.id) : "-";
          rows.push([
            displayNameFor(session.config.namePrefix, index),
            item.id,
            colorState(state),
            instance?.ip ?? item.ip ?? "-",
            agent === provider.onlineStatus ? chalk.green(agent) : agent
          ]);
        }
        spinner.stop();
      } catch (error) {
        spinner.fail("Status query failed.");
        throw error;
      }

      console.log(renderTable(["NAME", "ID", "STATE", "IP", "AGENT"], rows));
    });
}

async function agentStatus(session: Session, id: string): Promise<string> {
  try {
    return await session.provider.getAgentStatus(id);
  } catch (error) {
    session.logger.debug({ instanceId: id, error: describeError(error) }, "agent status query failed");
    return "unknown";
  }
}

function colorState(state: InstanceState): string {
  switch (state) {
    case "running":
      return chalk.green(state);
    case "stopped":
      return chalk.yellow(state);
    default:
      return state;
  }
}
