import { type LabCatalog, resourcesFor, tmpfsFor } from "./catalog";
import { DRIVER_TIMEOUTS_MS, LAB_TYPE_LABEL, MANAGED_LABEL, OWNER_LABEL } from "./constants";
import { LAB_SECURITY_POLICY, type LaunchSpec, type RuntimeDriver } from "./driver";
import { CliError, describeError, notFound, toCliError } from "./errors";
import { KeyedMutex } from "./lock";
import type { Logger } from "./logger";
import { deriveInstanceName, type SuffixSource } from "./names";
import type { Reconciler } from "./reconciler";
import { type LabRegistry, occupiesQuota } from "./registry";
import type { LabInstance, LabTypeDefinition, QuotaPolicy } from "./types";
import { type Clock, hoursSince, roundTo } from "./utils";

/** A `created` reservation older than this belongs to a launch that never finished. */
export const RESERVATION_GRACE_MS = DRIVER_TIMEOUTS_MS.network * 2 + DRIVER_TIMEOUTS_MS.create + DRIVER_TIMEOUTS_MS.inspect * 2;

export interface NetworkPolicy {
  name: string;
  subnet: string;
  protectedRange?: string;
}

export interface LabControllerOptions {
  catalog: LabCatalog;
  registry: LabRegistry;
  driver: RuntimeDriver;
  reconciler: Reconciler;
  logger: Logger;
  quota: QuotaPolicy;
  network: NetworkPolicy;
  now?: Clock;
  mutex?: KeyedMutex;
  suffix?: SuffixSource;
}

export interface CreatedLab {
  name: string;
  labType: string;
  ip: string;
  port: number;
  url: string;
  ttlHours: number;
}

export interface LabSummary {
  name: string;
  labType: string;
}

export interface ActiveLab {
  name: string;
  labType: string;
  ip: string;
  port: number;
  uptimeHours: number;
  remainingHours: number;
}

export interface CleanedLab {
  name: string;
  owner: string;
  uptimeHours: number;
}

export interface CleanupReport {
  cleaned: CleanedLab[];
  purged: string[];
}

export interface ServerStats {
  activeLabs: number;
  maxLabs: number;
  disk: string;
  cpuCores: string;
  memory: string;
  gpu: string;
}

/**
 * Picks the owner's instance addressed by `target`: an exact instance name
 * wins, otherwise the newest instance of that lab type.
 */
export function findOwned(instances: LabInstance[], owner: string, target: string): LabInstance | undefined {
  const owned = instances.filter((instance) => instance.owner === owner);
  const byName = owned.find((instance) => instance.name === target);
  if (byName) {
    return byName;
  }
  return owned
    .filter((instance) => instance.labType === target)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt))[0];
}

export class LabController {
  private readonly now: Clock;
  private readonly mutex: KeyedMutex;

  constructor(private readonly options: LabControllerOptions) {
    this.now = options.now ?? Date.now;
    this.mutex = options.mutex ?? new KeyedMutex();
  }

  list(): LabTypeDefinition[] {
    return this.options.catalog.list();
  }

  async create(owner: string, labType: string): Promise<CreatedLab> {
    const lab = this.options.catalog.require(labType);
    return await this.mutex.run(ownerKey(owner), async () => {
      const reservation = await this.reserve(owner, lab);
      const ip = await this.launch(reservation, lab);
      const startedAt = new Date(this.now()).toISOString();

      try {
        await this.options.registry.transaction((view) => view.transition(reservation.name, "running", { ip, startedAt }));
      } catch (error) {
        await this.rollback(reservation.name, "registry update failed", error);
        throw error;
      }

      await this.options.logger.audit("LAB_STARTED", { owner, lab: reservation.name, labType, ip, port: lab.port });
      return {
        name: reservation.name,
        labType,
        ip,
        port: lab.port,
        url: `http://${ip}:${lab.port}`,
        ttlHours: this.options.quota.ttlHours
      };
    });
  }

  async stop(owner: string, target: string): Promise<LabSummary> {
    return await this.mutex.run(ownerKey(owner), async () => {
      const running = (await this.options.registry.list()).filter((instance) => instance.status === "running");
      const instance = findOwned(running, owner, target);
      if (!instance) {
        throw notFound(`You don't have a running ${target} lab.`);
      }

      await this.driverStep("stop", instance, () => this.options.driver.stop(instance.name));
      await this.markStopped(instance.name);
      await this.options.logger.audit("LAB_STOPPED", { owner, lab: instance.name });
      return { name: instance.name, labType: instance.labType };
    });
  }

  async delete(owner: string, target: string): Promise<LabSummary> {
    return await this.mutex.run(ownerKey(owner), async () => {
      const instance = findOwned(await this.options.registry.list(), owner, target);
      if (!instance) {
        throw notFound(`You don't have a ${target} lab.`);
      }

      if (instance.status === "running") {
        await this.driverStep("stop", instance, () => this.options.driver.stop(instance.name));
        await this.markStopped(instance.name);
      }

      await this.driverStep("remove", instance, () => this.options.driver.remove(instance.name));
      await this.options.registry.transaction((view) => view.remove(instance.name));
      await this.options.logger.audit("LAB_DELETED", { owner, lab: instance.name, previousStatus: instance.status });
      return { name: instance.name, labType: instance.labType };
    });
  }

  async status(owner: string): Promise<ActiveLab[]> {
    const owned = (await this.options.registry.list()).filter((instance) => instance.owner === owner);
    const corrected = await this.options.reconciler.reconcile(owned);
    const now = this.now();
    const ttl = this.options.quota.ttlHours;

    return corrected
      .filter((instance) => instance.status === "running")
      .map((instance) => {
        const uptime = hoursSince(instance.startedAt ?? instance.createdAt, now);
        return {
          name: instance.name,
          labType: instance.labType,
          ip: instance.ip ?? "",
          port: instance.port,
          uptimeHours: roundTo(uptime, 1),
          remainingHours: roundTo(Math.max(0, ttl - uptime), 1)
        };
      });
  }

  /** Removes every instance of `owner` whatever its status. Driver failures are logged and skipped. */
  async forceCleanup(owner: string): Promise<{ removed: string[] }> {
    return await this.mutex.run(ownerKey(owner), async () => {
      const owned = (await this.options.registry.list()).filter((instance) => instance.owner === owner);
      for (const instance of owned) {
        await this.teardown(instance.name, "force-cleanup");
      }

      const removed = await this.options.registry.transaction((view) =>
        owned.map((instance) => instance.name).filter((name) => view.remove(name))
      );
      if (removed.length > 0) {
        await this.options.logger.audit("FORCE_CLEANUP", { target: owner, removed });
      }
      return { removed };
    });
  }

  /**
   * Expires running instances past the TTL, downgrades entries the runtime
   * no longer runs, and purges entries whose container is gone.
   */
  async autoCleanup(): Promise<CleanupReport> {
    const ttl = this.options.quota.ttlHours;
    const cleaned: CleanedLab[] = [];

    const expired = (await this.options.registry.list()).filter(
      (instance) => instance.status === "running" && hoursSince(instance.startedAt ?? instance.createdAt, this.now()) > ttl
    );

    for (const candidate of expired) {
      await this.mutex.run(ownerKey(candidate.owner), async () => {
        const current = await this.options.registry.get(candidate.name);
        if (current?.status !== "running") {
          return;
        }
        if (!(await this.teardown(current.name, "auto-cleanup"))) {
          return;
        }
        await this.options.registry.transaction((view) => view.remove(current.name));
        const uptimeHours = roundTo(hoursSince(current.startedAt ?? current.createdAt, this.now()), 1);
        cleaned.push({ name: current.name, owner: current.owner, uptimeHours });
        await this.options.logger.audit("AUTO_CLEANUP", { lab: current.name, owner: current.owner, uptimeHours });
      });
    }

    const remaining = await this.options.reconciler.reconcile(await this.options.registry.list());
    const purge: string[] = [];
    for (const instance of remaining) {
      if (instance.status === "created" && this.ageMs(instance) < RESERVATION_GRACE_MS) {
        continue;
      }
      if (instance.status === "created" || instance.status === "failed") {
        if (await this.teardown(instance.name, "abandoned")) {
          purge.push(instance.name);
        }
        continue;
      }
      if (!(await this.exists(instance.name))) {
        purge.push(instance.name);
      }
    }

    const purged = purge.length === 0
      ? []
      : await this.options.registry.transaction((view) => purge.filter((name) => view.remove(name)));

    return { cleaned, purged };
  }

  async serverStats(): Promise<ServerStats> {
    const instances = await this.options.registry.list();
    const host = await this.options.driver.hostStats();
    return {
      activeLabs: instances.filter((instance) => instance.status === "running").length,
      maxLabs: this.options.quota.maxTotalLabs,
      ...host
    };
  }

  private async reserve(owner: string, lab: LabTypeDefinition): Promise<LabInstance> {
    const { registry, reconciler, quota } = this.options;

    const snapshot = await registry.list();
    await reconciler.reconcile(snapshot.filter((instance) => instance.owner === owner));
    if (snapshot.filter(occupiesQuota).length >= quota.maxTotalLabs) {
      await reconciler.reconcile(await registry.list());
    }

    const { reservation, abandoned } = await registry.transaction((view) => {
      const stale = view
        .occupied()
        .filter((instance) => instance.status === "created" && this.ageMs(instance) >= RESERVATION_GRACE_MS)
        .map((instance) => view.transition(instance.name, "failed").name);

      const mine = view.occupied(owner);
      if (mine.length >= quota.maxLabsPerUser) {
        throw new CliError({
          kind: "quota",
          message: `You already have ${quota.maxLabsPerUser} labs running.`,
          data: { runningLabs: mine.map((instance) => instance.labType), limit: quota.maxLabsPerUser }
        });
      }

      const total = view.occupied().length;
      if (total >= quota.maxTotalLabs) {
        throw new CliError({
          kind: "quota",
          message: "Server lab capacity reached. Try again later.",
          data: { activeLabs: total, limit: quota.maxTotalLabs }
        });
      }

      const instance: LabInstance = {
        name: deriveInstanceName(lab.id, owner, (name) => view.has(name), this.options.suffix),
        owner,
        labType: lab.id,
        status: "created",
        port: lab.port,
        createdAt: new Date(this.now()).toISOString()
      };
      view.insert(instance);
      return { reservation: instance, abandoned: stale };
    });

    for (const name of abandoned) {
      await this.options.logger.audit("RESERVATION_ABANDONED", { lab: name }, "warn");
    }
    await this.options.logger.audit("LAB_RESERVED", { owner, lab: reservation.name, labType: lab.id });
    return reservation;
  }

  /** Runs the driver side of a create. Any failure rolls the reservation back before surfacing. */
  private async launch(reservation: LabInstance, lab: LabTypeDefinition): Promise<string> {
    const { driver, network } = this.options;
    let launched = false;
    let ip: string | undefined;

    try {
      if (await driver.ensureNetwork(network.name, network.subnet)) {
        await this.options.logger.audit("NETWORK_CREATED", { network: network.name, subnet: network.subnet });
        if (network.protectedRange) {
          await driver.blockEgress(network.subnet, network.protectedRange);
          await this.options.logger.audit("EGRESS_BLOCKED", { subnet: network.subnet, destination: network.protectedRange });
        }
      }

      launched = true;
      await driver.create(this.launchSpec(reservation, lab));
      ip = await driver.inspectAddress(reservation.name);
    } catch (error) {
      await this.rollback(reservation.name, "launch failed", error, launched);
      const cause = toCliError(error);
      throw new CliError({
        kind: cause.kind === "timeout" ? "timeout" : "runtime",
        message: cause.kind === "timeout"
          ? `Starting ${lab.id} timed out. Try again.`
          : `Failed to start ${lab.id}. Check the server logs.`
      });
    }

    if (!ip) {
      await this.rollback(reservation.name, "no address assigned", undefined);
      throw new CliError({
        kind: "runtime",
        message: "Container started but no IP address was assigned."
      });
    }
    return ip;
  }

  private launchSpec(reservation: LabInstance, lab: LabTypeDefinition): LaunchSpec {
    return {
      name: reservation.name,
      image: lab.image,
      network: this.options.network.name,
      resources: resourcesFor(lab),
      security: LAB_SECURITY_POLICY,
      tmpfs: tmpfsFor(lab),
      labels: {
        [MANAGED_LABEL]: "true",
        [OWNER_LABEL]: reservation.owner,
        [LAB_TYPE_LABEL]: lab.id
      }
    };
  }

  /**
   * Removes a half-created container and its reservation. When the container
   * cannot be removed the reservation is kept as `failed` so a later sweep or
   * delete can retry.
   */
  private async rollback(name: string, reason: string, error: unknown, removeContainer = true): Promise<void> {
    await this.options.logger.error("LAB_CREATE_FAILED", {
      lab: name,
      reason,
      detail: error === undefined ? undefined : describeError(error)
    });

    const removed = removeContainer ? await this.teardown(name, "rollback", false) : true;
    await this.options.registry.transaction((view) => {
      const current = view.get(name);
      if (!current) {
        return;
      }
      if (removed) {
        view.remove(name);
      } else if (current.status === "created" || current.status === "running") {
        view.transition(name, "failed");
      }
    });
  }

  /** Best-effort stop and remove. Resolves false when the container may still exist. */
  private async teardown(name: string, reason: string, stopFirst = true): Promise<boolean> {
    const { driver, logger } = this.options;
    if (stopFirst) {
      try {
        await driver.stop(name);
      } catch (error) {
        await logger.error("LAB_STOP_FAILED", { lab: name, reason, detail: describeError(error) });
      }
    }
    try {
      await driver.remove(name);
      return true;
    } catch (error) {
      await logger.error("LAB_REMOVE_FAILED", { lab: name, reason, detail: describeError(error) });
      return false;
    }
  }

  /** A concurrent reconcile may already have downgraded the entry, or a sweep removed it. */
  private async markStopped(name: string): Promise<void> {
    await this.options.registry.transaction((view) => {
      if (view.get(name)?.status === "running") {
        view.transition(name, "stopped");
      }
    });
  }

  private async exists(name: string): Promise<boolean> {
    try {
      return await this.options.driver.inspectExists(name);
    } catch (error) {
      await this.options.logger.error("EXISTENCE_CHECK_FAILED", { lab: name, reason: describeError(error) });
      return false;
    }
  }

  /** Wraps a driver call on a registered instance: failures are logged in full and surfaced without detail. */
  private async driverStep(step: "stop" | "remove", instance: LabInstance, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      await this.options.logger.error(step === "stop" ? "LAB_STOP_FAILED" : "LAB_REMOVE_FAILED", {
        lab: instance.name,
        owner: instance.owner,
        detail: describeError(error)
      });
      const cause = toCliError(error);
      throw new CliError({
        kind: cause.kind === "timeout" ? "timeout" : "runtime",
        message: `Failed to ${step} ${instance.name}. Try again or contact an officer.`
      });
    }
  }

  private ageMs(instance: LabInstance): number {
    const created = Date.parse(instance.createdAt);
    return Number.isNaN(created) ? Number.POSITIVE_INFINITY : this.now() - created;
  }
}

function ownerKey(owner: string): string {
  return `owner:${owner}`;
}
