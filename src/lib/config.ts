import os from "node:os";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_ALLOWED_ROLES,
  DEFAULT_MAX_LABS_PER_USER,
  DEFAULT_MAX_TOTAL_LABS,
  DEFAULT_NETWORK,
  DEFAULT_RATE_BLOCK_SECONDS,
  DEFAULT_RATE_HARD,
  DEFAULT_RATE_SOFT,
  DEFAULT_RATE_WARN,
  DEFAULT_SUBNET,
  DEFAULT_TTL_HOURS,
  HOME_DIR_NAME
} from "./constants";
import { CliError } from "./errors";
import { normalizeInputPath, parseCsv } from "./utils";

const CIDR_PATTERN = /^(\d{1,3}\.){3}\d{1,3}\/\d{1,2}$/;

const booleanish = z
  .enum(["true", "false", "1", "0", "yes", "no", "on", "off"])
  .transform((value) => ["true", "1", "yes", "on"].includes(value));

const configSchema = z.object({
  home: z.string().min(1),
  containerBin: z.string().min(1).optional(),
  network: z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, "must be a valid network name").default(DEFAULT_NETWORK),
  subnet: z.string().regex(CIDR_PATTERN, "must be CIDR notation").default(DEFAULT_SUBNET),
  /** Egress from the lab subnet toward this range is dropped. */
  protectedRange: z.string().regex(CIDR_PATTERN, "must be CIDR notation").optional(),
  egressSudo: booleanish.default("true"),
  catalogPath: z.string().min(1).optional(),

  quota: z.object({
    maxLabsPerUser: z.coerce.number().int().min(1).default(DEFAULT_MAX_LABS_PER_USER),
    maxTotalLabs: z.coerce.number().int().min(1).default(DEFAULT_MAX_TOTAL_LABS),
    ttlHours: z.coerce.number().positive().default(DEFAULT_TTL_HOURS)
  }),

  rateLimit: z
    .object({
      soft: z.coerce.number().int().min(1).default(DEFAULT_RATE_SOFT),
      warn: z.coerce.number().int().min(1).default(DEFAULT_RATE_WARN),
      hard: z.coerce.number().int().min(1).default(DEFAULT_RATE_HARD),
      blockSeconds: z.coerce.number().int().min(1).default(DEFAULT_RATE_BLOCK_SECONDS)
    })
    .refine((value) => value.soft <= value.warn && value.warn <= value.hard, {
      message: "thresholds must satisfy soft <= warn <= hard"
    }),

  access: z.object({
    superusers: z.array(z.string().regex(/^\d+$/, "superuser ids must be numeric")),
    allowedRoles: z.array(z.string().min(1)).min(1)
  })
});

export type LabkeeperConfig = z.infer<typeof configSchema>;

const ENV_NAMES: Record<string, string> = {
  home: "LABKEEPER_HOME",
  containerBin: "LABKEEPER_CONTAINER_BIN",
  network: "LABKEEPER_NETWORK",
  subnet: "LABKEEPER_SUBNET",
  protectedRange: "LABKEEPER_PROTECTED_RANGE",
  egressSudo: "LABKEEPER_EGRESS_SUDO",
  catalogPath: "LABKEEPER_CATALOG",
  "quota.maxLabsPerUser": "LABKEEPER_MAX_LABS_PER_USER",
  "quota.maxTotalLabs": "LABKEEPER_MAX_TOTAL_LABS",
  "quota.ttlHours": "LABKEEPER_TTL_HOURS",
  "rateLimit.soft": "LABKEEPER_RATE_SOFT",
  "rateLimit.warn": "LABKEEPER_RATE_WARN",
  "rateLimit.hard": "LABKEEPER_RATE_HARD",
  "rateLimit.blockSeconds": "LABKEEPER_RATE_BLOCK_SECONDS",
  rateLimit: "LABKEEPER_RATE_SOFT/WARN/HARD",
  "access.superusers": "LABKEEPER_SUPERUSERS",
  "access.allowedRoles": "LABKEEPER_ALLOWED_ROLES"
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LabkeeperConfig {
  const value = (key: string): string | undefined => {
    const raw = env[key]?.trim();
    return raw ? raw : undefined;
  };

  const roles = parseCsv(value("LABKEEPER_ALLOWED_ROLES"));
  const home = value("LABKEEPER_HOME");

  const result = configSchema.safeParse({
    home: home ? path.resolve(normalizeInputPath(home)) : path.join(os.homedir(), HOME_DIR_NAME),
    containerBin: value("LABKEEPER_CONTAINER_BIN"),
    network: value("LABKEEPER_NETWORK"),
    subnet: value("LABKEEPER_SUBNET"),
    protectedRange: value("LABKEEPER_PROTECTED_RANGE"),
    egressSudo: value("LABKEEPER_EGRESS_SUDO")?.toLowerCase(),
    catalogPath: value("LABKEEPER_CATALOG"),
    quota: {
      maxLabsPerUser: value("LABKEEPER_MAX_LABS_PER_USER"),
      maxTotalLabs: value("LABKEEPER_MAX_TOTAL_LABS"),
      ttlHours: value("LABKEEPER_TTL_HOURS")
    },
    rateLimit: {
      soft: value("LABKEEPER_RATE_SOFT"),
      warn: value("LABKEEPER_RATE_WARN"),
      hard: value("LABKEEPER_RATE_HARD"),
      blockSeconds: value("LABKEEPER_RATE_BLOCK_SECONDS")
    },
    access: {
      superusers: parseCsv(value("LABKEEPER_SUPERUSERS")),
      allowedRoles: roles.length > 0 ? roles : [...DEFAULT_ALLOWED_ROLES]
    }
  });

  if (!result.success) {
    const problems = result.error.issues.map((issue) => {
      const key = issue.path.filter((part) => typeof part === "string").join(".");
      return `${ENV_NAMES[key] ?? (key || "config")}: ${issue.message}`;
    });
    throw new CliError({
      kind: "validation",
      message: `Invalid configuration: ${problems.join("; ")}`
    });
  }
  return result.data;
}

export function dataDir(config: LabkeeperConfig): string {
  return path.join(config.home, "data");
}

export function logsDir(config: LabkeeperConfig): string {
  return path.join(config.home, "logs");
}
