import { CliError } from "./errors";
import type { Logger } from "./logger";
import type { JsonStore } from "./store";
import type { VerifiedData, VerifiedMember } from "./types";
import type { Clock } from "./utils";

export const REMEDIATION_MESSAGE = [
  "You need to be verified to use the labs.",
  "",
  "To get access:",
  "1. Ask an officer in the server",
  "2. They will give you the Operator role or verify you directly",
  "3. Then you can start labs"
].join("\n");

export type AccessDecision =
  | { allowed: true; admin: boolean; via: "superuser" | "role" | "verified" }
  | { allowed: false; reason: "no_role"; message: string };

export interface AccessControlOptions {
  store: JsonStore<VerifiedData>;
  superusers: string[];
  allowedRoles: string[];
  logger: Logger;
  now?: Clock;
}

/** Ids that are not plain digits collapse to "0", which never matches a superuser. */
export function normalizeNumericId(raw: string): string {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return "0";
  }
  return BigInt(trimmed).toString();
}

export class AccessControl {
  private readonly superusers: Set<string>;
  private readonly allowedRoles: Set<string>;
  private readonly now: Clock;

  constructor(private readonly options: AccessControlOptions) {
    this.superusers = new Set(options.superusers.map(normalizeNumericId));
    this.allowedRoles = new Set(options.allowedRoles);
    this.now = options.now ?? Date.now;
  }

  async check(identity: string, numericId: string, roles: string[]): Promise<AccessDecision> {
    const id = normalizeNumericId(numericId);
    const cleanRoles = roles.map((role) => role.trim()).filter(Boolean);
    const logger = this.options.logger;

    if (id !== "0" && this.superusers.has(id)) {
      await logger.audit("ACCESS_GRANTED", { identity, id, via: "superuser" });
      return { allowed: true, admin: true, via: "superuser" };
    }

    if (cleanRoles.some((role) => this.allowedRoles.has(role))) {
      await logger.audit("ACCESS_GRANTED", { identity, id, roles: cleanRoles, via: "role" });
      return { allowed: true, admin: false, via: "role" };
    }

    const verified = await this.options.store.read();
    const isVerified = (id !== "0" && id in verified)
      || Object.values(verified).some((member) => member.identity === identity);
    if (isVerified) {
      await logger.audit("ACCESS_GRANTED", { identity, id, via: "verified" });
      return { allowed: true, admin: false, via: "verified" };
    }

    await logger.audit("ACCESS_DENIED", { identity, id, roles: cleanRoles }, "warn");
    return { allowed: false, reason: "no_role", message: REMEDIATION_MESSAGE };
  }

  async verify(identity: string, numericId: string, grantedBy?: string): Promise<VerifiedMember> {
    const id = normalizeNumericId(numericId);
    if (id === "0") {
      throw new CliError({ kind: "validation", message: `Member id must be numeric: ${numericId}` });
    }
    if (!identity.trim()) {
      throw new CliError({ kind: "validation", message: "Member identity is required." });
    }

    const member: VerifiedMember = {
      identity: identity.trim(),
      verifiedAt: new Date(this.now()).toISOString(),
      ...(grantedBy ? { grantedBy } : {})
    };
    await this.options.store.update((data) => {
      data[id] = member;
    });
    await this.options.logger.audit("MEMBER_VERIFIED", { identity: member.identity, id, grantedBy });
    return member;
  }
}
