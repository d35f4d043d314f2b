import { CliError } from "./errors";
import type { JsonStore } from "./store";
import type { LabInstance, LabStatus, RegistryData } from "./types";

/** Allowed status changes. Deletion is removal from the registry, never a status. */
export const LAB_TRANSITIONS: Readonly<Record<LabStatus, readonly LabStatus[]>> = {
  created: ["running", "failed"],
  running: ["stopped", "failed"],
  stopped: [],
  failed: []
};

export function canTransition(from: LabStatus, to: LabStatus): boolean {
  return LAB_TRANSITIONS[from].includes(to);
}

/** Statuses that occupy quota: reservations being launched plus live instances. */
export function occupiesQuota(instance: LabInstance): boolean {
  return instance.status === "running" || instance.status === "created";
}

/** Mutable view over one registry snapshot, handed out inside a transaction. */
export class RegistryView {
  constructor(private readonly data: RegistryData) {}

  all(): LabInstance[] {
    return Object.values(this.data);
  }

  get(name: string): LabInstance | undefined {
    return this.data[name];
  }

  has(name: string): boolean {
    return name in this.data;
  }

  occupied(owner?: string): LabInstance[] {
    return this.all().filter((instance) => occupiesQuota(instance) && (owner === undefined || instance.owner === owner));
  }

  insert(instance: LabInstance): void {
    if (this.has(instance.name)) {
      throw new CliError({ kind: "runtime", message: `Instance ${instance.name} already exists in the registry.` });
    }
    this.data[instance.name] = instance;
  }

  transition(name: string, to: LabStatus, patch: Partial<Pick<LabInstance, "ip" | "startedAt">> = {}): LabInstance {
    const current = this.data[name];
    if (!current) {
      throw new CliError({ kind: "not_found", message: `Instance ${name} is not in the registry.` });
    }
    if (!canTransition(current.status, to)) {
      throw new CliError({
        kind: "runtime",
        message: `Invalid lab state transition for ${name}: ${current.status} -> ${to}`
      });
    }
    const next: LabInstance = { ...current, ...patch, status: to };
    this.data[name] = next;
    return next;
  }

  remove(name: string): boolean {
    if (!this.has(name)) {
      return false;
    }
    delete this.data[name];
    return true;
  }
}

export class LabRegistry {
  constructor(private readonly store: JsonStore<RegistryData>) {}

  async list(): Promise<LabInstance[]> {
    return Object.values(await this.store.read());
  }

  async get(name: string): Promise<LabInstance | undefined> {
    const data = await this.store.read();
    return data[name];
  }

  async transaction<R>(work: (view: RegistryView) => R | Promise<R>): Promise<R> {
    return await this.store.update((data) => work(new RegistryView(data)));
  }
}
