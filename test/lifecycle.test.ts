import test from "node:test";
import assert from "node:assert/strict";
import { CliError } from "../src/lib/errors";
import { findOwned, RESERVATION_GRACE_MS } from "../src/lib/lifecycle";
import { settle } from "../src/lib/result";
import type { LabInstance } from "../src/lib/types";
import { createHarness } from "./support/harness";

const HOUR_MS = 3_600_000;

function isCliError(kind: string, message?: string) {
  return (error: unknown): boolean =>
    error instanceof CliError && error.kind === kind && (message === undefined || error.message === message);
}

test("create starts a hardened container and records it as running", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");

  assert.match(lab.name, /^dvwa-alice-[0-9a-f]{4}$/);
  assert.deepEqual(lab, {
    name: lab.name,
    labType: "dvwa",
    ip: "172.20.0.2",
    port: 80,
    url: "http://172.20.0.2:80",
    ttlHours: 4
  });

  const stored = await harness.registry.get(lab.name);
  assert.equal(stored?.status, "running");
  assert.equal(stored?.ip, "172.20.0.2");
  assert.equal(stored?.startedAt, "2026-03-01T12:00:00.000Z");

  const container = harness.driver.containers.get(lab.name);
  assert.equal(container?.spec.network, "lab-isolated");
  assert.equal(container?.spec.security.readOnlyRoot, true);
  assert.deepEqual(container?.spec.labels, {
    "labkeeper.managed": "true",
    "labkeeper.owner": "alice",
    "labkeeper.lab-type": "dvwa"
  });
  assert.deepEqual(harness.audit.events(), ["LAB_RESERVED", "NETWORK_CREATED", "LAB_STARTED"]);
});

test("a lab's resource profile reaches the engine", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "crypto-lab");
  const spec = harness.driver.containers.get(lab.name)?.spec;
  assert.deepEqual(spec?.resources, { memory: "4g", cpus: "1", pidsLimit: 100 });
  assert.deepEqual(spec?.tmpfs, [{ path: "/work", size: "20m" }]);
});

test("egress toward the protected range is blocked once, when the network is created", async (t) => {
  const harness = await createHarness(t, { LABKEEPER_PROTECTED_RANGE: "10.0.0.0/8" });
  await harness.controller.create("alice", "dvwa");
  await harness.controller.create("alice", "webgoat");
  assert.deepEqual(harness.driver.egressRules, ["172.20.0.0/16->10.0.0.0/8"]);
  assert.equal(harness.audit.events().filter((event) => event === "EGRESS_BLOCKED").length, 1);
});

test("unknown lab types are rejected before anything is reserved", async (t) => {
  const harness = await createHarness(t);
  await assert.rejects(
    () => harness.controller.create("alice", "nope"),
    (error: unknown) => isCliError("not_found", "Unknown lab type: nope")(error)
      && error instanceof CliError
      && error.data?.available === "dvwa, webgoat, juice-shop, crypto-lab"
  );
  assert.deepEqual(await harness.registry.list(), []);
});

test("alice can hold three labs and the fourth is refused with her running labs", async (t) => {
  const harness = await createHarness(t);
  for (const labType of ["dvwa", "webgoat", "juice-shop"]) {
    await harness.controller.create("alice", labType);
  }

  await assert.rejects(
    () => harness.controller.create("alice", "webgoat"),
    (error: unknown) => error instanceof CliError
      && error.kind === "quota"
      && error.message === "You already have 3 labs running."
      && JSON.stringify(error.data) === JSON.stringify({ runningLabs: ["dvwa", "webgoat", "juice-shop"], limit: 3 })
  );
  assert.equal((await harness.registry.list()).length, 3);
  assert.equal(harness.driver.calls.filter((call) => call.startsWith("create:")).length, 3);
});

test("the global ceiling holds across owners", async (t) => {
  const harness = await createHarness(t, { LABKEEPER_MAX_TOTAL_LABS: "2" });
  await harness.controller.create("alice", "dvwa");
  await harness.controller.create("bob", "dvwa");

  await assert.rejects(
    () => harness.controller.create("carol", "dvwa"),
    (error: unknown) => error instanceof CliError
      && error.message === "Server lab capacity reached. Try again later."
      && error.data?.activeLabs === 2
      && error.data?.limit === 2
  );
});

test("concurrent creates for one owner never exceed the ceiling", async (t) => {
  const harness = await createHarness(t);
  const labTypes = ["dvwa", "webgoat", "juice-shop", "crypto-lab", "dvwa"];
  const results = await Promise.all(labTypes.map((labType) => settle(() => harness.controller.create("alice", labType))));

  assert.equal(results.filter((result) => result.success).length, 3);
  assert.deepEqual(
    results.flatMap((result) => (result.success ? [] : [result.kind])),
    ["quota", "quota"]
  );
  assert.equal(harness.driver.containers.size, 3);
});

test("a lab that died outside the orchestrator stops counting toward quota", async (t) => {
  const harness = await createHarness(t, { LABKEEPER_MAX_LABS_PER_USER: "1" });
  const first = await harness.controller.create("alice", "dvwa");
  harness.driver.kill(first.name);

  assert.deepEqual(await harness.controller.status("alice"), []);
  assert.equal((await harness.registry.get(first.name))?.status, "stopped");

  const second = await harness.controller.create("alice", "webgoat");
  assert.equal((await harness.registry.get(second.name))?.status, "running");
});

test("create, status and delete round trip", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.clock.advance(HOUR_MS + 30 * 60_000);

  assert.deepEqual(await harness.controller.status("alice"), [
    { name: lab.name, labType: "dvwa", ip: "172.20.0.2", port: 80, uptimeHours: 1.5, remainingHours: 2.5 }
  ]);

  assert.deepEqual(await harness.controller.delete("alice", "dvwa"), { name: lab.name, labType: "dvwa" });
  assert.deepEqual(await harness.controller.status("alice"), []);
  assert.deepEqual(await harness.registry.list(), []);
  assert.equal(harness.driver.containers.has(lab.name), false);
  assert.equal(harness.audit.find("LAB_DELETED")?.previousStatus, "running");
});

test("stop keeps the entry as stopped until it is deleted", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");

  assert.deepEqual(await harness.controller.stop("alice", lab.name), { name: lab.name, labType: "dvwa" });
  assert.equal((await harness.registry.get(lab.name))?.status, "stopped");
  assert.equal(harness.driver.containers.get(lab.name)?.running, false);

  await assert.rejects(() => harness.controller.stop("alice", "dvwa"), isCliError("not_found", "You don't have a running dvwa lab."));

  await harness.controller.delete("alice", "dvwa");
  assert.equal(harness.driver.containers.has(lab.name), false);
  assert.deepEqual(harness.driver.calls.filter((call) => call.startsWith("stop:")), [`stop:${lab.name}`]);
});

test("owners cannot touch each other's labs", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  await assert.rejects(() => harness.controller.delete("bob", lab.name), isCliError("not_found", `You don't have a ${lab.name} lab.`));
  assert.equal((await harness.registry.get(lab.name))?.status, "running");
});

test("a failed launch is rolled back and reported without detail", async (t) => {
  const harness = await createHarness(t);
  harness.driver.failOn("create");

  await assert.rejects(() => harness.controller.create("alice", "dvwa"), isCliError("runtime", "Failed to start dvwa. Check the server logs."));
  assert.deepEqual(await harness.registry.list(), []);

  const logged = harness.errors.find("LAB_CREATE_FAILED");
  assert.equal(logged?.reason, "launch failed");
  assert.equal(logged?.detail, "Command failed (1): docker create: create exploded");
});

test("a launch timeout surfaces as a timeout", async (t) => {
  const harness = await createHarness(t);
  harness.driver.failOn("create", "timeout");
  await assert.rejects(() => harness.controller.create("alice", "dvwa"), isCliError("timeout", "Starting dvwa timed out. Try again."));
  assert.deepEqual(await harness.registry.list(), []);
});

test("a container without an address is removed again", async (t) => {
  const harness = await createHarness(t);
  harness.driver.assignAddresses = false;

  await assert.rejects(
    () => harness.controller.create("alice", "dvwa"),
    isCliError("runtime", "Container started but no IP address was assigned.")
  );
  assert.equal(harness.driver.containers.size, 0);
  assert.deepEqual(await harness.registry.list(), []);
});

test("a rollback that cannot remove the container leaves a failed entry for the sweeper", async (t) => {
  const harness = await createHarness(t);
  harness.driver.failOn("inspectAddress");
  harness.driver.failOn("remove");

  await assert.rejects(() => harness.controller.create("alice", "dvwa"), isCliError("runtime"));
  const [entry] = await harness.registry.list();
  assert.equal(entry?.status, "failed");
  assert.equal(harness.errors.find("LAB_REMOVE_FAILED")?.reason, "rollback");

  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: [] });

  harness.driver.clearFailure("remove");
  harness.driver.clearFailure("inspectAddress");
  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: [entry?.name] });
  assert.equal(harness.driver.containers.size, 0);
});

test("a failing stop leaves the lab running and hides engine output", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.driver.failOn("stop");

  await assert.rejects(
    () => harness.controller.stop("alice", "dvwa"),
    isCliError("runtime", `Failed to stop ${lab.name}. Try again or contact an officer.`)
  );
  assert.equal((await harness.registry.get(lab.name))?.status, "running");
  assert.equal(harness.errors.find("LAB_STOP_FAILED")?.owner, "alice");
});

test("stop succeeds when a status check downgrades the lab while it is stopping", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  const stop = harness.driver.stop.bind(harness.driver);
  harness.driver.stop = async (name) => {
    await stop(name);
    await harness.controller.status("alice");
  };

  assert.deepEqual(await harness.controller.stop("alice", "dvwa"), { name: lab.name, labType: "dvwa" });
  assert.equal((await harness.registry.get(lab.name))?.status, "stopped");
  assert.equal(harness.audit.find("LAB_STOPPED")?.lab, lab.name);
});

test("delete removes a lab that a status check downgraded mid-stop", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  const stop = harness.driver.stop.bind(harness.driver);
  harness.driver.stop = async (name) => {
    await stop(name);
    await harness.controller.status("alice");
  };

  assert.deepEqual(await harness.controller.delete("alice", "dvwa"), { name: lab.name, labType: "dvwa" });
  assert.deepEqual(await harness.registry.list(), []);
  assert.equal(harness.driver.containers.has(lab.name), false);
});

test("a failed remove keeps the entry so the delete can be retried", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.driver.failOn("remove");

  await assert.rejects(
    () => harness.controller.delete("alice", "dvwa"),
    isCliError("runtime", `Failed to remove ${lab.name}. Try again or contact an officer.`)
  );
  assert.equal((await harness.registry.get(lab.name))?.status, "stopped");
  assert.equal(harness.errors.find("LAB_REMOVE_FAILED")?.lab, lab.name);

  harness.driver.clearFailure("remove");
  assert.deepEqual(await harness.controller.delete("alice", lab.name), { name: lab.name, labType: "dvwa" });
  assert.deepEqual(await harness.registry.list(), []);
  assert.equal(harness.driver.containers.size, 0);
});

test("a stale reservation stops counting toward quota on the next create", async (t) => {
  const harness = await createHarness(t, { LABKEEPER_MAX_LABS_PER_USER: "1" });
  await harness.registry.transaction((view) => {
    view.insert({
      name: "dvwa-alice-dead",
      owner: "alice",
      labType: "dvwa",
      status: "created",
      port: 80,
      createdAt: new Date(harness.clock.now() - RESERVATION_GRACE_MS).toISOString()
    });
  });

  const lab = await harness.controller.create("alice", "webgoat");
  assert.equal((await harness.registry.get(lab.name))?.status, "running");
  assert.equal((await harness.registry.get("dvwa-alice-dead"))?.status, "failed");
  assert.deepEqual(harness.audit.events().slice(0, 2), ["RESERVATION_ABANDONED", "LAB_RESERVED"]);
});

test("a fresh reservation still counts toward quota", async (t) => {
  const harness = await createHarness(t, { LABKEEPER_MAX_LABS_PER_USER: "1" });
  await harness.registry.transaction((view) => {
    view.insert({
      name: "dvwa-alice-busy",
      owner: "alice",
      labType: "dvwa",
      status: "created",
      port: 80,
      createdAt: new Date(harness.clock.now() - 1000).toISOString()
    });
  });

  await assert.rejects(() => harness.controller.create("alice", "webgoat"), isCliError("quota"));
  assert.equal((await harness.registry.get("dvwa-alice-busy"))?.status, "created");
});

test("autoCleanup expires labs past their TTL and is idempotent", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.clock.advance(4 * HOUR_MS + 60_000);

  assert.deepEqual(await harness.controller.autoCleanup(), {
    cleaned: [{ name: lab.name, owner: "alice", uptimeHours: 4 }],
    purged: []
  });
  assert.deepEqual(await harness.registry.list(), []);
  assert.equal(harness.driver.containers.has(lab.name), false);
  assert.equal(harness.audit.find("AUTO_CLEANUP")?.lab, lab.name);

  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: [] });
});

test("autoCleanup keeps labs inside their TTL", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.clock.advance(3 * HOUR_MS);

  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: [] });
  assert.equal((await harness.registry.get(lab.name))?.status, "running");
});

test("autoCleanup purges entries whose container vanished", async (t) => {
  const harness = await createHarness(t);
  const lab = await harness.controller.create("alice", "dvwa");
  harness.driver.kill(lab.name, true);

  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: [lab.name] });
  assert.deepEqual(await harness.registry.list(), []);
});

test("autoCleanup purges abandoned reservations but not fresh ones", async (t) => {
  const harness = await createHarness(t);
  const reservation = (name: string, createdAt: number): LabInstance => ({
    name,
    owner: "alice",
    labType: "dvwa",
    status: "created",
    port: 80,
    createdAt: new Date(createdAt).toISOString()
  });
  await harness.registry.transaction((view) => {
    view.insert(reservation("dvwa-alice-old0", harness.clock.now() - RESERVATION_GRACE_MS - 1000));
    view.insert(reservation("dvwa-alice-new0", harness.clock.now()));
  });

  assert.deepEqual(await harness.controller.autoCleanup(), { cleaned: [], purged: ["dvwa-alice-old0"] });
  assert.deepEqual((await harness.registry.list()).map((entry) => entry.name), ["dvwa-alice-new0"]);
});

test("forceCleanup removes every lab of the owner whatever its status", async (t) => {
  const harness = await createHarness(t);
  const first = await harness.controller.create("alice", "dvwa");
  const second = await harness.controller.create("alice", "webgoat");
  const other = await harness.controller.create("bob", "dvwa");
  await harness.controller.stop("alice", first.name);

  assert.deepEqual(await harness.controller.forceCleanup("alice"), { removed: [first.name, second.name] });
  assert.deepEqual((await harness.registry.list()).map((entry) => entry.name), [other.name]);
  assert.deepEqual(harness.audit.find("FORCE_CLEANUP")?.removed, [first.name, second.name]);
});

test("forceCleanup finishes the sweep when one container cannot be removed", async (t) => {
  const harness = await createHarness(t);
  const first = await harness.controller.create("alice", "dvwa");
  const second = await harness.controller.create("alice", "webgoat");
  harness.driver.failOn("remove", "error", first.name);

  assert.deepEqual(await harness.controller.forceCleanup("alice"), { removed: [first.name, second.name] });
  assert.deepEqual(await harness.registry.list(), []);
  assert.equal(harness.driver.containers.has(second.name), false);
  assert.equal(harness.errors.find("LAB_REMOVE_FAILED")?.lab, first.name);
  assert.equal(harness.errors.find("LAB_REMOVE_FAILED")?.reason, "force-cleanup");
});

test("forceCleanup of an owner without labs is a quiet no-op", async (t) => {
  const harness = await createHarness(t);
  assert.deepEqual(await harness.controller.forceCleanup("nobody"), { removed: [] });
  assert.equal(harness.audit.find("FORCE_CLEANUP"), undefined);
});

test("serverStats counts running labs against the global ceiling", async (t) => {
  const harness = await createHarness(t);
  await harness.controller.create("alice", "dvwa");
  assert.deepEqual(await harness.controller.serverStats(), {
    activeLabs: 1,
    maxLabs: 50,
    disk: "Images: 1GB",
    cpuCores: "8",
    memory: "2 GB used / 16 GB total",
    gpu: "N/A"
  });
});

test("findOwned prefers an exact name and otherwise the newest of the type", () => {
  const base = { owner: "alice", labType: "dvwa", status: "running" as const, port: 80 };
  const instances: LabInstance[] = [
    { ...base, name: "dvwa-alice-0001", createdAt: "2026-03-01T10:00:00.000Z" },
    { ...base, name: "dvwa-alice-0002", createdAt: "2026-03-01T11:00:00.000Z" },
    { ...base, name: "dvwa-bob-0003", owner: "bob", createdAt: "2026-03-01T12:00:00.000Z" }
  ];
  assert.equal(findOwned(instances, "alice", "dvwa")?.name, "dvwa-alice-0002");
  assert.equal(findOwned(instances, "alice", "dvwa-alice-0001")?.name, "dvwa-alice-0001");
  assert.equal(findOwned(instances, "alice", "dvwa-bob-0003"), undefined);
  assert.equal(findOwned(instances, "carol", "dvwa"), undefined);
});
