import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { InvocationPendingError } from "../src/lib/errors";
import { AzureProvider } from "../src/lib/providers";
import { captureArgFile, fakeRunner, json, when, type CapturedFile } from "./helpers/fake-runner";

const settings = { resourceGroup: "rg-lab", subscription: "sub-test" };

test("AzureProvider reads the VM agent display status", async () => {
  const ready = fakeRunner(
    when(["vm", "get-instance-view"], json({ instanceView: { vmAgent: { statuses: [{ displayStatus: "Ready" }] } } }))
  );
  const noAgent = fakeRunner(when(["vm", "get-instance-view"], json({ instanceView: {} })));

  const provider = new AzureProvider(settings, { bin: "az-test", runner: ready.runner });
  assert.equal(await provider.getAgentStatus("vm-1"), "Ready");
  assert.deepEqual(ready.calls[0].args, [
    "vm",
    "get-instance-view",
    "--name",
    "vm-1",
    "--resource-group",
    "rg-lab",
    "--output",
    "json",
    "--subscription",
    "sub-test"
  ]);
  assert.equal(await new AzureProvider(settings, { runner: noAgent.runner }).getAgentStatus("vm-1"), "NotReady");
});

test("AzureProvider creates an async run command and returns its name", async () => {
  const files: CapturedFile[] = [];
  const { runner, calls } = fakeRunner(captureArgFile("--script", "@", files));
  const provider = new AzureProvider(settings, { runner });

  const commandId = await provider.sendCommand("vm-1", ["Write-Host 'one'", "Write-Host 'two'"]);

  assert.match(commandId, /^deskfleet-credential-[0-9a-f]{8}$/);
  const args = calls[0].args;
  assert.deepEqual(args.slice(0, 3), ["vm", "run-command", "create"]);
  assert.equal(args[args.indexOf("--vm-name") + 1], "vm-1");
  assert.equal(args[args.indexOf("--name") + 1], commandId);
  assert.equal(args[args.indexOf("--async-execution") + 1], "true");
  assert.equal(files.length, 1);
  assert.equal(files[0].body, "Write-Host 'one'\nWrite-Host 'two'");
  assert.equal(args.some((arg) => arg.includes("Write-Host")), false);
  if (process.platform !== "win32") {
    assert.equal(files[0].mode, 0o600);
  }
  assert.equal(fs.existsSync(files[0].path), false);
});

test("AzureProvider maps the run command execution state and output", async () => {
  const { runner } = fakeRunner(
    when(["vm", "run-command", "show"], json({ instanceView: { executionState: "Succeeded", output: "Credential applied for Administrator", error: "" } }))
  );

  const result = await new AzureProvider(settings, { runner }).getCommandResult("deskfleet-credential-0011aabb", "vm-1");

  assert.deepEqual(result, {
    status: "success",
    rawStatus: "Succeeded",
    stdout: "Credential applied for Administrator",
    stderr: ""
  });

  for (const [raw, expected] of [
    ["Pending", "pending"],
    ["Running", "in_progress"],
    ["Failed", "failed"],
    ["Canceled", "cancelled"],
    ["TimedOut", "timed_out"]
  ]) {
    const scripted = fakeRunner(when(["vm", "run-command", "show"], json({ instanceView: { executionState: raw } })));
    const mapped = await new AzureProvider(settings, { runner: scripted.runner }).getCommandResult("c", "vm-1");
    assert.equal(mapped.status, expected, raw);
  }
});

test("AzureProvider treats a run command that does not exist yet as pending", async () => {
  const { runner } = fakeRunner(
    when(["vm", "run-command", "show"], { exitCode: 3, stderr: "(ResourceNotFound) The Resource was not found." })
  );
  await assert.rejects(
    new AzureProvider(settings, { runner }).getCommandResult("deskfleet-credential-0011aabb", "vm-1"),
    (error: unknown) => error instanceof InvocationPendingError
  );
});

test("AzureProvider deletes the run command when released", async () => {
  const { runner, calls } = fakeRunner();
  await new AzureProvider(settings, { runner }).releaseCommand("deskfleet-credential-0011aabb", "vm-1");
  assert.deepEqual(calls[0].args.slice(0, 8), [
    "vm",
    "run-command",
    "delete",
    "--vm-name",
    "vm-1",
    "--name",
    "deskfleet-credential-0011aabb",
    "--yes"
  ]);
});

test("AzureProvider lists power state and the first public IP of each VM", async () => {
  const { runner } = fakeRunner(
    (call) => (call.args.includes("vm-1") ? json({ powerState: "VM running", publicIps: "203.0.113.5,203.0.113.6" }) : undefined),
    (call) => (call.args.includes("vm-2") ? json({ powerState: "VM deallocated", publicIps: "" }) : undefined)
  );

  const instances = await new AzureProvider(settings, { runner }).listInstances(["vm-1", "vm-2"]);

  assert.deepEqual(instances, [
    { id: "vm-1", state: "running", ip: "203.0.113.5" },
    { id: "vm-2", state: "stopped", ip: undefined }
  ]);
});

test("AzureProvider deallocates VMs one by one without waiting", async () => {
  const { runner, calls } = fakeRunner();
  await new AzureProvider(settings, { runner }).stopInstances(["vm-1", "vm-2"]);
  assert.deepEqual(
    calls.map((call) => call.args.slice(0, 5)),
    [
      ["vm", "deallocate", "--name", "vm-1", "--no-wait"],
      ["vm", "deallocate", "--name", "vm-2", "--no-wait"]
    ]
  );
});
