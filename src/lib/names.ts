import { randomBytes } from "node:crypto";

const MAX_OWNER_SLUG = 32;
const MAX_ATTEMPTS = 16;

export type SuffixSource = (bytes: number) => string;

const randomSuffix: SuffixSource = (bytes) => randomBytes(bytes).toString("hex");

/** Reduces an owner identity to characters the container engine accepts in names. */
export function ownerSlug(owner: string): string {
  const slug = owner
    .toLowerCase()
    .replace(/[^a-z0-9_.-]+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^[-_.]+|[-_.]+$/g, "")
    .slice(0, MAX_OWNER_SLUG);
  return slug || "user";
}

export function deriveInstanceName(
  labType: string,
  owner: string,
  isTaken: (name: string) => boolean,
  suffix: SuffixSource = randomSuffix
): string {
  const base = `${labType}-${ownerSlug(owner)}`;
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt += 1) {
    const candidate = `${base}-${suffix(2)}`;
    if (!isTaken(candidate)) {
      return candidate;
    }
  }

  const candidate = `${base}-${suffix(6)}`;
  if (isTaken(candidate)) {
    throw new Error(`Could not derive a unique instance name for ${base}`);
  }
  return candidate;
}
