import os from "node:os";
import { DRIVER_TIMEOUTS_MS } from "./constants";
import type { HostStats, LaunchSpec, RuntimeDriver } from "./driver";
import { CommandError, type CommandRunner, formatCommand, runCommand } from "./exec";
import { roundTo } from "./utils";

export interface DockerDriverOptions {
  runner?: CommandRunner;
  /** Prefix firewall commands with sudo. */
  egressSudo?: boolean;
}

export class DockerDriver implements RuntimeDriver {
  private readonly run: CommandRunner;
  private readonly egressSudo: boolean;

  constructor(private readonly containerBin: string, options: DockerDriverOptions = {}) {
    this.run = options.runner ?? runCommand;
    this.egressSudo = options.egressSudo ?? true;
  }

  async ensureNetwork(name: string, subnet: string): Promise<boolean> {
    const check = await this.run(this.containerBin, ["network", "inspect", name], {
      allowNonZeroExit: true,
      timeoutMs: DRIVER_TIMEOUTS_MS.network
    });
    if (check.exitCode === 0) {
      return false;
    }

    await this.run(this.containerBin, ["network", "create", "--driver", "bridge", "--subnet", subnet, name], {
      timeoutMs: DRIVER_TIMEOUTS_MS.network
    });
    return true;
  }

  async blockEgress(subnet: string, protectedRange: string): Promise<void> {
    const rule = ["DOCKER-USER", "-s", subnet, "-d", protectedRange, "-j", "DROP"];
    const command = this.egressSudo ? "sudo" : "iptables";
    const prefix: string[] = this.egressSudo ? ["-n", "iptables"] : [];

    const existing = await this.run(command, [...prefix, "-C", ...rule], {
      allowNonZeroExit: true,
      timeoutMs: DRIVER_TIMEOUTS_MS.network
    });
    if (existing.exitCode === 0) {
      return;
    }
    await this.run(command, [...prefix, "-I", ...rule], { timeoutMs: DRIVER_TIMEOUTS_MS.network });
  }

  async create(spec: LaunchSpec): Promise<string> {
    const result = await this.run(this.containerBin, buildRunArgs(spec), { timeoutMs: DRIVER_TIMEOUTS_MS.create });
    return result.stdout.split("\n").pop()?.trim() || spec.name;
  }

  async inspectAddress(name: string): Promise<string | undefined> {
    const result = await this.run(
      this.containerBin,
      ["inspect", "-f", "{{range .NetworkSettings.Networks}}{{.IPAddress}} {{end}}", name],
      { allowNonZeroExit: true, timeoutMs: DRIVER_TIMEOUTS_MS.inspect }
    );
    if (result.exitCode !== 0) {
      return undefined;
    }
    return parseFirstAddress(result.stdout);
  }

  async inspectRunning(name: string): Promise<boolean> {
    const result = await this.run(this.containerBin, ["inspect", "-f", "{{.State.Running}}", name], {
      allowNonZeroExit: true,
      timeoutMs: DRIVER_TIMEOUTS_MS.inspect
    });
    return result.exitCode === 0 && result.stdout.trim() === "true";
  }

  async inspectExists(name: string): Promise<boolean> {
    const result = await this.run(this.containerBin, ["inspect", "-f", "{{.Id}}", name], {
      allowNonZeroExit: true,
      timeoutMs: DRIVER_TIMEOUTS_MS.inspect
    });
    return result.exitCode === 0 && result.stdout.trim() !== "";
  }

  async stop(name: string): Promise<void> {
    await this.runToleratingMissing(["stop", "-t", "10", name], DRIVER_TIMEOUTS_MS.stop);
  }

  async remove(name: string): Promise<void> {
    await this.runToleratingMissing(["rm", "-f", name], DRIVER_TIMEOUTS_MS.remove);
  }

  async hostStats(): Promise<HostStats> {
    const disk = await this.run(this.containerBin, ["system", "df", "--format", "{{.Type}}: {{.Size}}"], {
      allowNonZeroExit: true,
      timeoutMs: DRIVER_TIMEOUTS_MS.stats
    });

    return {
      disk: disk.exitCode === 0 && disk.stdout ? disk.stdout.split("\n").join(", ") : "unknown",
      cpuCores: String(os.cpus().length),
      memory: formatHostMemory(os.totalmem(), os.freemem()),
      gpu: await this.gpuSummary()
    };
  }

  private async runToleratingMissing(args: string[], timeoutMs: number): Promise<void> {
    const result = await this.run(this.containerBin, args, { allowNonZeroExit: true, timeoutMs });
    if (result.exitCode === 0 || isMissingContainer(result.stderr)) {
      return;
    }
    throw new CommandError(formatCommand(this.containerBin, args), result.exitCode, result.stdout, result.stderr);
  }

  private async gpuSummary(): Promise<string> {
    try {
      const gpu = await this.run(
        "nvidia-smi",
        ["--query-gpu=utilization.gpu,memory.used,memory.total", "--format=csv,noheader,nounits"],
        { allowNonZeroExit: true, timeoutMs: DRIVER_TIMEOUTS_MS.stats }
      );
      return gpu.exitCode === 0 && gpu.stdout ? gpu.stdout : "N/A";
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return "N/A";
      }
      throw error;
    }
  }
}

export function buildRunArgs(spec: LaunchSpec): string[] {
  const args = [
    "run",
    "-d",
    "--name",
    spec.name,
    "--network",
    spec.network,
    `--memory=${spec.resources.memory}`,
    `--cpus=${spec.resources.cpus}`,
    `--pids-limit=${spec.resources.pidsLimit}`
  ];

  if (spec.security.noNewPrivileges) {
    args.push("--security-opt=no-new-privileges");
  }
  for (const capability of spec.security.dropCapabilities) {
    args.push(`--cap-drop=${capability}`);
  }
  for (const capability of spec.security.addCapabilities) {
    args.push(`--cap-add=${capability}`);
  }
  if (spec.security.readOnlyRoot) {
    args.push("--read-only");
  }

  for (const mount of spec.tmpfs) {
    args.push("--tmpfs", `${mount.path}:rw,noexec,nosuid,size=${mount.size}`);
  }

  for (const [key, value] of Object.entries(spec.labels)) {
    args.push("--label", `${key}=${value}`);
  }

  args.push(spec.image);
  return args;
}

export function parseFirstAddress(raw: string): string | undefined {
  const first = raw
    .split(/\s+/)
    .map((token) => token.trim())
    .find(Boolean);
  return first || undefined;
}

export function isMissingContainer(stderr: string): boolean {
  return /no such container/i.test(stderr);
}

export function formatHostMemory(totalBytes: number, freeBytes: number): string {
  const gb = 1024 ** 3;
  const total = roundTo(totalBytes / gb, 1);
  const used = roundTo((totalBytes - freeBytes) / gb, 1);
  return `${used} GB used / ${total} GB total`;
}
