import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { CliError } from "../src/lib/errors";
import { TerraformBackend } from "../src/lib/terraform";
import { makeTempDir } from "./helpers/context";
import { fakeRunner, json } from "./helpers/fake-runner";

test("TerraformBackend reads instance ids and public IPs from terraform output", async () => {
  const dir = await makeTempDir();
  const { runner, calls } = fakeRunner(() =>
    json({
      instance_ids: { sensitive: false, type: ["list", "string"], value: ["i-0aa", "i-0bb", "i-0cc"] },
      public_ips: { sensitive: false, type: ["list", "string"], value: ["198.51.100.1", "", "N/A"] }
    })
  );

  const instances = await new TerraformBackend(dir, { bin: "terraform-test", runner }).getInstances();

  assert.deepEqual(instances, [
    { id: "i-0aa", ip: "198.51.100.1" },
    { id: "i-0bb", ip: undefined },
    { id: "i-0cc", ip: undefined }
  ]);
  assert.equal(calls[0].command, "terraform-test");
  assert.deepEqual(calls[0].args, ["output", "-json"]);
  assert.equal(calls[0].options?.cwd, path.resolve(dir));
});

test("TerraformBackend falls back to vm_names for Azure stacks", async () => {
  const dir = await makeTempDir();
  const { runner } = fakeRunner(() => json({ vm_names: { value: ["vm-1", "vm-2"] } }));

  const instances = await new TerraformBackend(dir, { runner }).getInstances();

  assert.deepEqual(instances, [
    { id: "vm-1", ip: undefined },
    { id: "vm-2", ip: undefined }
  ]);
});

test("TerraformBackend returns no instances before anything was applied", async () => {
  const dir = await makeTempDir();
  const { runner } = fakeRunner(() => ({ stdout: "{}" }));
  assert.deepEqual(await new TerraformBackend(dir, { runner }).getInstances(), []);
});

test("TerraformBackend reports a missing directory without running terraform", async () => {
  const dir = path.join(await makeTempDir(), "missing");
  const { runner, calls } = fakeRunner();

  await assert.rejects(
    new TerraformBackend(dir, { runner }).readOutputs(),
    (error: unknown) => error instanceof CliError && error.kind === "not_found"
  );
  assert.equal(calls.length, 0);
});
