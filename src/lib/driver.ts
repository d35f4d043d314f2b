import type { ResourceProfile, TmpfsMount } from "./types";

export interface SecurityPolicy {
  noNewPrivileges: boolean;
  dropCapabilities: string[];
  addCapabilities: string[];
  readOnlyRoot: boolean;
}

export const LAB_SECURITY_POLICY: SecurityPolicy = {
  noNewPrivileges: true,
  dropCapabilities: ["ALL"],
  addCapabilities: ["NET_BIND_SERVICE"],
  readOnlyRoot: true
};

export interface LaunchSpec {
  name: string;
  image: string;
  network: string;
  resources: ResourceProfile;
  security: SecurityPolicy;
  tmpfs: TmpfsMount[];
  labels: Record<string, string>;
}

export interface HostStats {
  disk: string;
  cpuCores: string;
  memory: string;
  gpu: string;
}

/**
 * What the orchestrator needs from a container engine. Every call has its own
 * timeout ceiling; a timeout rejects with `CommandTimeoutError`.
 *
 * `stop` and `remove` succeed when the container is already gone.
 */
export interface RuntimeDriver {
  /** Creates the network when missing. Resolves true only when it was created by this call. */
  ensureNetwork(name: string, subnet: string): Promise<boolean>;
  blockEgress(subnet: string, protectedRange: string): Promise<void>;
  /** Launches a detached container and resolves its handle. */
  create(spec: LaunchSpec): Promise<string>;
  inspectAddress(name: string): Promise<string | undefined>;
  inspectRunning(name: string): Promise<boolean>;
  inspectExists(name: string): Promise<boolean>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
  hostStats(): Promise<HostStats>;
}
