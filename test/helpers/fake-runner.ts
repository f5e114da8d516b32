import fs from "node:fs";
import type { CommandRunner, RunOptions, RunResult } from "../../src/lib/exec";

export interface RecordedCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

type Responder = (call: RecordedCall) => Partial<RunResult> | Error | undefined;

/** Answers each call with the first responder that returns something; unanswered calls get empty output. */
export function fakeRunner(...responders: Responder[]): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    const call = { command, args, options };
    calls.push(call);
    for (const responder of responders) {
      const answer = responder(call);
      if (answer instanceof Error) {
        throw answer;
      }
      if (answer) {
        return { stdout: "", stderr: "", exitCode: 0, ...answer };
      }
    }
    return { stdout: "", stderr: "", exitCode: 0 };
  };
  return { runner, calls };
}

export function when(subcommand: string[], answer: Partial<RunResult> | Error): Responder {
  return (call) => (subcommand.every((part, idx) => call.args[idx] === part) ? answer : undefined);
}

export const json = (value: unknown): Partial<RunResult> => ({ stdout: JSON.stringify(value) });

export interface CapturedFile {
  path: string;
  body: string;
  mode: number;
}

/** Reads the file an argument points at while the call is running; answers nothing itself. */
export function captureArgFile(flag: string, prefix: string, into: CapturedFile[]): Responder {
  return (call) => {
    const position = call.args.indexOf(flag);
    if (position >= 0 && call.args[position + 1]?.startsWith(prefix)) {
      const filePath = call.args[position + 1].slice(prefix.length);
      into.push({ path: filePath, body: fs.readFileSync(filePath, "utf8"), mode: fs.statSync(filePath).mode & 0o777 });
    }
    return undefined;
  };
}
