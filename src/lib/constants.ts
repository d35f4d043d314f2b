export const CLI_NAME = "labkeeper";
export const HOME_DIR_NAME = ".labkeeper";

export const MANAGED_LABEL = "labkeeper.managed";
export const OWNER_LABEL = "labkeeper.owner";
export const LAB_TYPE_LABEL = "labkeeper.lab-type";

export const DEFAULT_NETWORK = "lab-isolated";
export const DEFAULT_SUBNET = "172.20.0.0/16";

export const DEFAULT_MEMORY = "2g";
export const DEFAULT_CPUS = "1";
export const DEFAULT_PIDS_LIMIT = 100;
export const DEFAULT_TMPFS = [{ path: "/tmp", size: "50m" }] as const;

export const DEFAULT_MAX_LABS_PER_USER = 3;
export const DEFAULT_MAX_TOTAL_LABS = 50;
export const DEFAULT_TTL_HOURS = 4;

export const RATE_WINDOW_MS = 60_000;
export const DEFAULT_RATE_SOFT = 10;
export const DEFAULT_RATE_WARN = 15;
export const DEFAULT_RATE_HARD = 20;
export const DEFAULT_RATE_BLOCK_SECONDS = 60;

export const DEFAULT_ALLOWED_ROLES = ["Operator", "Officer"] as const;

export const DRIVER_TIMEOUTS_MS = {
  create: 30_000,
  stop: 30_000,
  remove: 15_000,
  inspect: 10_000,
  network: 15_000,
  stats: 10_000
} as const;

export const STORE_LOCK_RETRY_MS = 25;
export const STORE_LOCK_TIMEOUT_MS = 5_000;
export const STORE_LOCK_STALE_MS = 30_000;

export const AUDIT_INPUT_PREVIEW_CHARS = 80;
