import fs from "node:fs";
import path from "node:path";
import type { z } from "zod";
import { CliError } from "./errors";
import { withFileLock } from "./lock";
import type { Logger } from "./logger";

export interface JsonStoreOptions<T> {
  label: string;
  filePath: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  empty: () => T;
  logger: Logger;
}

/**
 * A JSON document on disk. A missing file reads as empty; an unreadable or
 * invalid one is logged as corrupt and also reads as empty, so the next write
 * replaces it.
 */
export class JsonStore<T> {
  constructor(private readonly options: JsonStoreOptions<T>) {}

  get filePath(): string {
    return this.options.filePath;
  }

  async read(): Promise<T> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.options.filePath, "utf8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return this.options.empty();
      }
      await this.reportCorrupt(error instanceof Error ? error.message : String(error));
      return this.options.empty();
    }

    if (!raw.trim()) {
      return this.options.empty();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      await this.reportCorrupt(error instanceof Error ? error.message : String(error));
      return this.options.empty();
    }

    const result = this.options.schema.safeParse(parsed);
    if (!result.success) {
      await this.reportCorrupt(result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; "));
      return this.options.empty();
    }
    return result.data;
  }

  /** Read-modify-write under the store's lock file. `mutate` may change `data` in place. */
  async update<R>(mutate: (data: T) => R | Promise<R>): Promise<R> {
    return await withFileLock(`${this.options.filePath}.lock`, async () => {
      const data = await this.read();
      const result = await mutate(data);
      await this.write(data);
      return result;
    });
  }

  private async write(data: T): Promise<void> {
    const target = this.options.filePath;
    const temp = `${target}.${process.pid}.tmp`;
    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(temp, `${JSON.stringify(data, null, 2)}\n`, "utf8");
      await fs.promises.rename(temp, target);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      await this.options.logger.error("PERSISTENCE_WRITE_FAILED", { store: this.options.label, path: target, reason: message });
      throw new CliError({
        kind: "persistence",
        message: `Could not save ${this.options.label} state.`,
        detail: message
      });
    }
  }

  private async reportCorrupt(reason: string): Promise<void> {
    await this.options.logger.error("PERSISTENCE_CORRUPT", {
      store: this.options.label,
      path: this.options.filePath,
      reason
    });
  }
}
