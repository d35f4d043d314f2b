import fs from "node:fs";
import { runCommand } from "./exec";

const DOCKER_BINARY_CANDIDATES = ["/usr/bin/docker", "/usr/local/bin/docker", "/opt/homebrew/bin/docker"];

export interface EngineStatus {
  running: boolean;
  rawStatus: string;
}

export async function resolveContainerBinary(configured?: string): Promise<string | null> {
  const candidates = configured ? [configured, ...DOCKER_BINARY_CANDIDATES] : DOCKER_BINARY_CANDIDATES;
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  const whichResult = await runCommand("which", ["docker"], { allowNonZeroExit: true, timeoutMs: 5000 });
  if (whichResult.exitCode === 0 && whichResult.stdout) {
    const resolved = whichResult.stdout.split("\n")[0]?.trim();
    if (resolved) {
      return resolved;
    }
  }

  return null;
}

export async function requireContainerBinary(configured?: string): Promise<string> {
  const binary = await resolveContainerBinary(configured);
  if (binary) {
    return binary;
  }

  throw new Error("Docker CLI was not found. Install Docker Engine or set LABKEEPER_CONTAINER_BIN.");
}

export async function getEngineVersion(containerBin: string): Promise<string> {
  const result = await runCommand(containerBin, ["--version"], { timeoutMs: 10_000 });
  return result.stdout || "unknown";
}

export async function getEngineStatus(containerBin: string): Promise<EngineStatus> {
  const result = await runCommand(containerBin, ["info", "--format", "{{.ServerVersion}}"], {
    allowNonZeroExit: true,
    timeoutMs: 15_000
  });
  const raw = [result.stdout, result.stderr].filter(Boolean).join("\n").trim();
  return {
    running: result.exitCode === 0 && isServerVersion(result.stdout),
    rawStatus: raw || "unknown"
  };
}

export function isServerVersion(raw: string): boolean {
  return /^\d+\.\d+/.test(raw.trim());
}
