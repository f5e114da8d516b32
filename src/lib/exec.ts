import { spawn } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CLI_NAME } from "./constants";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

// Providers and the Terraform backend take one of these so tests can swap in a fake.
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    super(`Command failed (${exitCode}): ${command}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const env = options.env ? { ...process.env, ...options.env } : process.env;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (fn: () => void) => {
      clearTimeout(timeoutHandle);
      if (!settled) {
        settled = true;
        fn();
      }
    };

    const timeoutHandle = setTimeout(() => {
      child.kill("SIGTERM");
      settle(() => reject(new Error(`Command timed out after ${timeoutMs}ms: ${formatCommand(command, args)}`)));
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      settle(() => reject(error));
    });

    child.on("close", (code) => {
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0 && !options.allowNonZeroExit) {
        settle(() => reject(new CommandError(formatCommand(command, args), exitCode, stdout.trim(), stderr.trim())));
        return;
      }
      settle(() => resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode }));
    });
  });
};

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].join(" ");
}

/**
 * Hands `use` the path of an owner-only temp file holding `contents`, then removes it. Secrets
 * passed this way never appear in argv.
 */
export async function withSecretFile<T>(fileName: string, contents: string, use: (filePath: string) => Promise<T>): Promise<T> {
  const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), `${CLI_NAME}-`));
  const filePath = path.join(dir, fileName);
  try {
    await fs.promises.writeFile(filePath, contents, { encoding: "utf8", mode: 0o600 });
    return await use(filePath);
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}

export async function isBinaryAvailable(binary: string, runner: CommandRunner = runCommand): Promise<boolean> {
  try {
    const result = await runner(binary, ["--version"], { allowNonZeroExit: true, timeoutMs: 15_000 });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
