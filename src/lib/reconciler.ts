import type { RuntimeDriver } from "./driver";
import { describeError } from "./errors";
import type { Logger } from "./logger";
import type { LabRegistry } from "./registry";
import type { LabInstance } from "./types";

/**
 * Registry entries are believed running only until the runtime says otherwise.
 * A negative or failed liveness probe is taken as the truth.
 */
export class Reconciler {
  constructor(
    private readonly driver: RuntimeDriver,
    private readonly registry: LabRegistry,
    private readonly logger: Logger
  ) {}

  async isAlive(name: string): Promise<boolean> {
    try {
      return await this.driver.inspectRunning(name);
    } catch (error) {
      await this.logger.error("LIVENESS_CHECK_FAILED", { lab: name, reason: describeError(error) });
      return false;
    }
  }

  /**
   * Probes every running entry in `instances` and downgrades the dead ones to
   * `stopped`. Returns `instances` with corrected statuses.
   */
  async reconcile(instances: LabInstance[]): Promise<LabInstance[]> {
    const dead = new Set<string>();
    for (const instance of instances) {
      if (instance.status === "running" && !(await this.isAlive(instance.name))) {
        dead.add(instance.name);
      }
    }
    if (dead.size === 0) {
      return instances;
    }

    const downgraded = await this.registry.transaction((view) => {
      const changed: string[] = [];
      for (const name of dead) {
        if (view.get(name)?.status === "running") {
          view.transition(name, "stopped");
          changed.push(name);
        }
      }
      return changed;
    });

    for (const name of downgraded) {
      const instance = instances.find((candidate) => candidate.name === name);
      await this.logger.audit("LAB_RECONCILED", { lab: name, owner: instance?.owner, from: "running", to: "stopped" }, "warn");
    }

    return instances.map((instance): LabInstance => (dead.has(instance.name) ? { ...instance, status: "stopped" } : instance));
  }
}
