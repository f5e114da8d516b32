import test from "node:test";
import assert from "node:assert/strict";
import { buildSetPasswordScript, setCredential } from "../src/lib/dispatch";
import { InvocationPendingError } from "../src/lib/errors";
import { CommandError } from "../src/lib/exec";
import { createCapturingLogger } from "./helpers/context";
import { FakeProvider, inProgress, recordingSleep, success } from "./helpers/fake-provider";

test("buildSetPasswordScript doubles single quotes in the password and account name", () => {
  const lines = buildSetPasswordScript("O'Neil", "ab'c1D");
  assert.deepEqual(lines, [
    "$password = ConvertTo-SecureString 'ab''c1D' -AsPlainText -Force",
    "Set-LocalUser -Name 'O''Neil' -Password $password",
    "Write-Host 'Credential applied for O''Neil'",
    "Get-LocalUser -Name 'O''Neil' | Select-Object Name, Enabled, PasswordLastSet | Format-List"
  ]);
});

test("setCredential keeps polling through InvocationPendingError and sends once", async () => {
  const provider = new FakeProvider({
    commandResults: {
      "i-a": [new InvocationPendingError("cmd-1"), new InvocationPendingError("cmd-1"), inProgress, success("done")]
    }
  });
  const { sleep, calls } = recordingSleep();

  const result = await setCredential(provider, "i-a", "Secret1x", { sleep, intervalMs: 2000 });

  assert.deepEqual(result, { ok: true, commandId: "cmd-1", stdout: "done" });
  assert.equal(provider.sent.length, 1);
  assert.equal(provider.resultQueries.length, 4);
  assert.deepEqual(calls, [2000, 2000, 2000, 2000]);
  assert.deepEqual(provider.released, ["cmd-1"]);
});

test("setCredential embeds the username and password in the script it sends", async () => {
  const provider = new FakeProvider();
  const { sleep } = recordingSleep();

  await setCredential(provider, "i-a", "Pw1abcde", { username: "deskadmin", sleep });

  assert.deepEqual(provider.sent[0].scriptLines, buildSetPasswordScript("deskadmin", "Pw1abcde"));
});

test("setCredential reports a remote failure with the captured output", async () => {
  const provider = new FakeProvider({
    commandResults: {
      "i-a": [{ status: "failed", rawStatus: "Failed", stdout: "", stderr: "Set-LocalUser : access denied" }]
    }
  });
  const { sleep } = recordingSleep();

  const result = await setCredential(provider, "i-a", "Secret1x", { sleep });

  assert.deepEqual(result, {
    ok: false,
    reason: "remote_failure",
    message: "Remote command ended with status Failed",
    commandId: "cmd-1",
    stdout: "",
    stderr: "Set-LocalUser : access denied"
  });
  assert.deepEqual(provider.released, ["cmd-1"]);
});

test("setCredential returns backend_unavailable when the command cannot be sent", async () => {
  const provider = new FakeProvider({
    sendErrors: { "i-a": new CommandError("aws ssm send-command", 255, "", "InvalidInstanceId") }
  });
  const { sleep, calls } = recordingSleep();

  const result = await setCredential(provider, "i-a", "Secret1x", { sleep });

  assert.deepEqual(result, {
    ok: false,
    reason: "backend_unavailable",
    message: "Could not send command: InvalidInstanceId"
  });
  assert.equal(provider.resultQueries.length, 0);
  assert.equal(calls.length, 0);
});

test("setCredential returns backend_unavailable when a result query fails", async () => {
  const provider = new FakeProvider({
    commandResults: { "i-a": [new Error("expired token")] }
  });
  const { sleep } = recordingSleep();

  const result = await setCredential(provider, "i-a", "Secret1x", { sleep });

  assert.deepEqual(result, {
    ok: false,
    reason: "backend_unavailable",
    message: "Could not read command result: expired token",
    commandId: "cmd-1"
  });
  assert.deepEqual(provider.released, ["cmd-1"]);
});

test("setCredential times out without re-sending the command", async () => {
  const provider = new FakeProvider({
    commandResults: { "i-a": [inProgress] }
  });
  const { sleep } = recordingSleep();

  const result = await setCredential(provider, "i-a", "Secret1x", { sleep, maxAttempts: 5 });

  assert.deepEqual(result, {
    ok: false,
    reason: "timeout",
    message: "No terminal result after 5 checks",
    commandId: "cmd-1"
  });
  assert.equal(provider.sent.length, 1);
  assert.equal(provider.resultQueries.length, 5);
  assert.deepEqual(provider.released, ["cmd-1"]);
});

test("setCredential deletes an azure run command that never finished", async () => {
  const provider = new FakeProvider({ kind: "azure", onlineStatus: "Ready", commandResults: { "vm-1": [inProgress] } });
  const { sleep } = recordingSleep();

  const result = await setCredential(provider, "vm-1", "Secret1x", { sleep, maxAttempts: 3 });

  assert.equal(result.ok, false);
  assert.equal(result.ok ? undefined : result.reason, "timeout");
  assert.deepEqual(provider.released, ["cmd-1"]);
});

test("setCredential keeps the password out of the failure message and the log", async () => {
  const credential = "Top'Secret9x";
  const script = buildSetPasswordScript("Administrator", credential).join("\n");
  const provider = new FakeProvider({
    sendErrors: { "i-a": new CommandError(`az vm run-command create --script ${script}`, 1, "", "") }
  });
  const { logger, records } = createCapturingLogger();
  const { sleep } = recordingSleep();

  const result = await setCredential(provider, "i-a", credential, { sleep, logger });

  const masked = `Command failed (1): az vm run-command create --script ${script.replace("'Top''Secret9x'", "'[redacted]'")}`;
  assert.deepEqual(result, {
    ok: false,
    reason: "backend_unavailable",
    message: `Could not send command: ${masked}`
  });
  const entry = records().find((record) => record.msg === "failed to send credential command");
  assert.equal(entry?.error, masked);
  assert.equal(records().some((record) => JSON.stringify(record).includes("Secret9x")), false);
});
