import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DEFAULT_CPUS, DEFAULT_MEMORY, DEFAULT_PIDS_LIMIT, DEFAULT_TMPFS } from "./constants";
import { CliError, notFound } from "./errors";
import { labTypeSchema, type LabTypeDefinition, type ResourceProfile, type TmpfsMount } from "./types";

const catalogSchema = z
  .array(labTypeSchema)
  .min(1)
  .refine((labs) => new Set(labs.map((lab) => lab.id)).size === labs.length, {
    message: "lab ids must be unique"
  });

export class LabCatalog {
  private readonly byId: Map<string, LabTypeDefinition>;

  constructor(labs: LabTypeDefinition[]) {
    this.byId = new Map(labs.map((lab) => [lab.id, lab]));
  }

  list(): LabTypeDefinition[] {
    return [...this.byId.values()];
  }

  ids(): string[] {
    return [...this.byId.keys()];
  }

  require(id: string): LabTypeDefinition {
    const lab = this.byId.get(id);
    if (!lab) {
      const available = this.ids();
      throw notFound(`Unknown lab type: ${id}`, { available: available.join(", ") });
    }
    return lab;
  }
}

export function resourcesFor(lab: LabTypeDefinition): ResourceProfile {
  return {
    memory: lab.resources?.memory ?? DEFAULT_MEMORY,
    cpus: lab.resources?.cpus ?? DEFAULT_CPUS,
    pidsLimit: lab.resources?.pidsLimit ?? DEFAULT_PIDS_LIMIT
  };
}

export function tmpfsFor(lab: LabTypeDefinition): TmpfsMount[] {
  return lab.tmpfs && lab.tmpfs.length > 0 ? lab.tmpfs : DEFAULT_TMPFS.map((mount) => ({ ...mount }));
}

export function parseCatalog(raw: unknown, source = "catalog"): LabCatalog {
  const result = catalogSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new CliError({
      kind: "validation",
      message: `Invalid lab catalog in ${source}`,
      detail: problems.join("\n")
    });
  }
  return new LabCatalog(result.data);
}

export function loadCatalog(explicitPath?: string): LabCatalog {
  const catalogPath = explicitPath ?? resolveBundledCatalogPath();
  let raw: string;
  try {
    raw = fs.readFileSync(catalogPath, "utf8");
  } catch (error) {
    throw new CliError({
      kind: "dependency",
      message: `Lab catalog not readable: ${catalogPath}`,
      detail: error instanceof Error ? error.message : String(error)
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CliError({
      kind: "validation",
      message: `Lab catalog is not valid JSON: ${catalogPath}`,
      detail: error instanceof Error ? error.message : String(error)
    });
  }
  return parseCatalog(parsed, catalogPath);
}

function resolveBundledCatalogPath(): string {
  const candidates = [
    path.resolve(__dirname, "../../catalog/labs.json"),
    path.resolve(__dirname, "../../../catalog/labs.json"),
    path.resolve(process.cwd(), "catalog/labs.json")
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new CliError({
    kind: "dependency",
    message: "Bundled lab catalog not found.",
    hint: "Set LABKEEPER_CATALOG to the path of a catalog JSON file."
  });
}
