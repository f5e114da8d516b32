import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { writeCredentialRecord } from "../src/lib/credential-record";
import { createSilentLogger } from "../src/lib/logger";
import { refreshDescriptors, startFleet, stopFleet } from "../src/services/fleet-power";
import { makeConfig, makeContext, makeTempDir } from "./helpers/context";
import { FakeProvider, recordingSleep } from "./helpers/fake-provider";

test("startFleet starts only stopped instances and waits until they run", async () => {
  const dir = await makeTempDir();
  const provider = new FakeProvider({
    instances: [
      { id: "i-a", state: "stopped" },
      { id: "i-b", state: "running", ip: "192.0.2.20" }
    ]
  });
  const { sleep, calls } = recordingSleep();

  const result = await startFleet(
    { config: makeConfig(dir), provider, logger: createSilentLogger(), sleep },
    ["i-a", "i-b"],
    { intervalMs: 15_000 }
  );

  assert.deepEqual(provider.started, [["i-a"]]);
  assert.deepEqual(result.changed, ["i-a"]);
  assert.equal(result.settled, true);
  assert.deepEqual(result.instances.map((instance) => instance.state), ["running", "running"]);
  assert.deepEqual(calls, [15_000]);
});

test("startFleet does nothing when every instance already runs", async () => {
  const dir = await makeTempDir();
  const provider = new FakeProvider({ instances: [{ id: "i-a", state: "running" }] });

  const result = await startFleet(makeContext(provider, makeConfig(dir)), ["i-a"]);

  assert.deepEqual(provider.started, []);
  assert.deepEqual(result, { changed: [], settled: true, instances: [{ id: "i-a", state: "running" }] });
});

test("stopFleet reports instances that never reach stopped", async () => {
  const dir = await makeTempDir();
  const provider = new FakeProvider({
    instances: [{ id: "i-a", state: "running" }],
    ignorePowerRequests: true
  });

  const result = await stopFleet(makeContext(provider, makeConfig(dir)), ["i-a"], { maxAttempts: 3 });

  assert.deepEqual(provider.stopped, [["i-a"]]);
  assert.equal(result.settled, false);
  // One listing before the stop request, then one per attempt.
  assert.equal(provider.listCalls, 4);
});

test("refreshDescriptors re-uses the recorded credential only for applied instances", async () => {
  const dir = await makeTempDir();
  await writeCredentialRecord(dir, {
    credential: "Saved1pass",
    generatedAt: new Date("2026-02-02T08:00:00.000Z"),
    username: "deskadmin",
    entries: [
      { index: 1, id: "i-a", ip: "192.0.2.1", status: "applied" },
      { index: 2, id: "i-b", ip: "192.0.2.2", status: "failed" }
    ]
  });
  const provider = new FakeProvider({
    instances: [
      { id: "i-a", state: "running", ip: "192.0.2.101" },
      { id: "i-b", state: "running", ip: "192.0.2.102" },
      { id: "i-c", state: "running" }
    ]
  });

  const result = await refreshDescriptors(makeContext(provider, makeConfig(dir)), ["i-a", "i-b", "i-c"]);

  assert.equal(result.recordFound, true);
  assert.equal(result.withCredential, 1);
  assert.deepEqual(result.written.map((descriptor) => descriptor.displayName), ["win-client-1", "win-client-2"]);

  const first = fs.readFileSync(path.join(dir, "win-client-1.dcv"), "utf8");
  assert.match(first, /^host=192\.0\.2\.101$/m);
  assert.match(first, /^user=deskadmin$/m);
  assert.match(first, /^password=Saved1pass$/m);

  const second = fs.readFileSync(path.join(dir, "win-client-2.dcv"), "utf8");
  assert.match(second, /^host=192\.0\.2\.102$/m);
  assert.doesNotMatch(second, /^password=/m);
});

test("refreshDescriptors writes prompting files when there is no record", async () => {
  const dir = await makeTempDir();
  const provider = new FakeProvider({ instances: [{ id: "vm-1", state: "running", ip: "192.0.2.50" }] });

  const result = await refreshDescriptors(
    makeContext(provider, makeConfig(dir, { descriptorFormat: "rdp", namePrefix: "lab" })),
    ["vm-1"]
  );

  assert.equal(result.recordFound, false);
  assert.equal(result.withCredential, 0);
  assert.equal(
    fs.readFileSync(path.join(dir, "lab-1.rdp"), "utf8"),
    "full address:s:192.0.2.50:3389\r\nscreen mode id:i:2\r\nsession bpp:i:32\r\nauthentication level:i:2\r\nprompt for credentials:i:1\r\n"
  );
});
