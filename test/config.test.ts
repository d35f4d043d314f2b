import test from "node:test";
import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { dataDir, loadConfig, logsDir } from "../src/lib/config";
import { CliError } from "../src/lib/errors";

test("loadConfig applies defaults", () => {
  const config = loadConfig({ LABKEEPER_HOME: "/srv/labkeeper" });
  assert.equal(config.home, "/srv/labkeeper");
  assert.equal(config.network, "lab-isolated");
  assert.equal(config.subnet, "172.20.0.0/16");
  assert.equal(config.protectedRange, undefined);
  assert.equal(config.egressSudo, true);
  assert.deepEqual(config.quota, { maxLabsPerUser: 3, maxTotalLabs: 50, ttlHours: 4 });
  assert.deepEqual(config.rateLimit, { soft: 10, warn: 15, hard: 20, blockSeconds: 60 });
  assert.deepEqual(config.access, { superusers: [], allowedRoles: ["Operator", "Officer"] });
});

test("loadConfig defaults the home under the user's home directory", () => {
  assert.equal(loadConfig({}).home, path.join(os.homedir(), ".labkeeper"));
  assert.equal(loadConfig({ LABKEEPER_HOME: "~/labs" }).home, path.join(os.homedir(), "labs"));
});

test("loadConfig reads overrides and treats blank values as unset", () => {
  const config = loadConfig({
    LABKEEPER_HOME: "/srv/labkeeper",
    LABKEEPER_NETWORK: "   ",
    LABKEEPER_PROTECTED_RANGE: "10.0.0.0/8",
    LABKEEPER_EGRESS_SUDO: "NO",
    LABKEEPER_MAX_LABS_PER_USER: "5",
    LABKEEPER_TTL_HOURS: "1.5",
    LABKEEPER_SUPERUSERS: "123, 456",
    LABKEEPER_ALLOWED_ROLES: "Member,Admin"
  });
  assert.equal(config.network, "lab-isolated");
  assert.equal(config.protectedRange, "10.0.0.0/8");
  assert.equal(config.egressSudo, false);
  assert.equal(config.quota.maxLabsPerUser, 5);
  assert.equal(config.quota.ttlHours, 1.5);
  assert.deepEqual(config.access.superusers, ["123", "456"]);
  assert.deepEqual(config.access.allowedRoles, ["Member", "Admin"]);
});

test("loadConfig names the offending variable", () => {
  assert.throws(
    () => loadConfig({ LABKEEPER_HOME: "/srv/labkeeper", LABKEEPER_MAX_LABS_PER_USER: "zero" }),
    (error: unknown) => error instanceof CliError
      && error.kind === "validation"
      && error.message.startsWith("Invalid configuration: LABKEEPER_MAX_LABS_PER_USER: ")
  );
  assert.throws(
    () => loadConfig({ LABKEEPER_HOME: "/srv/labkeeper", LABKEEPER_SUPERUSERS: "not-a-number" }),
    /LABKEEPER_SUPERUSERS: superuser ids must be numeric/
  );
  assert.throws(
    () => loadConfig({ LABKEEPER_HOME: "/srv/labkeeper", LABKEEPER_SUBNET: "172.20.0.0" }),
    /LABKEEPER_SUBNET: must be CIDR notation/
  );
});

test("loadConfig rejects rate thresholds out of order", () => {
  assert.throws(
    () => loadConfig({ LABKEEPER_HOME: "/srv/labkeeper", LABKEEPER_RATE_SOFT: "30" }),
    /LABKEEPER_RATE_SOFT\/WARN\/HARD: thresholds must satisfy soft <= warn <= hard/
  );
});

test("state directories live under the home", () => {
  const config = loadConfig({ LABKEEPER_HOME: "/srv/labkeeper" });
  assert.equal(dataDir(config), path.join("/srv/labkeeper", "data"));
  assert.equal(logsDir(config), path.join("/srv/labkeeper", "logs"));
});
