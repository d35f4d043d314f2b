import fs from "node:fs/promises";
import path from "node:path";
import type { LabkeeperConfig } from "./config";
import { getEngineStatus, getEngineVersion, resolveContainerBinary } from "./runtime";

export const MIN_NODE_MAJOR = 20;

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export function checkNodeVersion(version: string = process.versions.node): PreflightCheck {
  const major = Number(version.split(".")[0] ?? "0");
  const ok = Number.isFinite(major) && major >= MIN_NODE_MAJOR;
  return {
    key: "node",
    ok,
    message: `Node.js v${version}`,
    fix: ok ? undefined : `Install Node.js ${MIN_NODE_MAJOR} or newer.`
  };
}

export async function checkWritableHome(home: string): Promise<PreflightCheck> {
  const probe = path.join(home, `.preflight-${process.pid}`);
  try {
    await fs.mkdir(home, { recursive: true });
    await fs.writeFile(probe, "ok", "utf8");
    await fs.rm(probe, { force: true });
    return { key: "state-dir", ok: true, message: `State directory is writable (${home})` };
  } catch (error) {
    return {
      key: "state-dir",
      ok: false,
      message: `State directory is not writable (${home}): ${error instanceof Error ? error.message : String(error)}`,
      fix: "Fix its permissions or point LABKEEPER_HOME somewhere writable."
    };
  }
}

export async function runPreflight(config: LabkeeperConfig): Promise<PreflightReport> {
  const checks: PreflightCheck[] = [checkNodeVersion(), await checkWritableHome(config.home)];

  const containerBin = await resolveContainerBinary(config.containerBin);
  if (!containerBin) {
    checks.push({
      key: "container-bin",
      ok: false,
      message: "Docker CLI not found.",
      fix: "Install Docker Engine, or set LABKEEPER_CONTAINER_BIN.",
      suggestedCommands: ["curl -fsSL https://get.docker.com | sh"]
    });
    return { checks, ok: checks.every((check) => check.ok) };
  }

  checks.push({
    key: "container-bin",
    ok: true,
    message: `Docker CLI found at ${containerBin}`
  });

  try {
    checks.push({ key: "container-version", ok: true, message: await getEngineVersion(containerBin) });
  } catch (error) {
    checks.push({
      key: "container-version",
      ok: false,
      message: error instanceof Error ? error.message : String(error),
      fix: "Verify the Docker CLI is correctly installed."
    });
  }

  try {
    const engine = await getEngineStatus(containerBin);
    checks.push({
      key: "container-engine",
      ok: engine.running,
      message: engine.running ? `Docker engine is reachable (server ${engine.rawStatus})` : `Docker engine is not reachable: ${engine.rawStatus}`,
      fix: engine.running ? undefined : "Start the Docker daemon and make sure this user may talk to it.",
      suggestedCommands: engine.running ? undefined : ["sudo systemctl start docker"]
    });
  } catch (error) {
    checks.push({
      key: "container-engine",
      ok: false,
      message: error instanceof Error ? error.message : String(error),
      fix: "Start the Docker daemon and retry.",
      suggestedCommands: ["sudo systemctl start docker"]
    });
  }

  return { checks, ok: checks.every((check) => check.ok) };
}
