import fs from "node:fs";
import path from "node:path";
import { STORE_LOCK_RETRY_MS, STORE_LOCK_STALE_MS, STORE_LOCK_TIMEOUT_MS } from "./constants";
import { CliError } from "./errors";
import { sleep } from "./utils";

/**
 * Serializes async work per key inside one process. Tasks for the same key run
 * in submission order; different keys never wait on each other.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export interface FileLockOptions {
  retryMs?: number;
  timeoutMs?: number;
  staleMs?: number;
}

/** Cross-process exclusion through an exclusively created lock file. */
export async function withFileLock<T>(lockPath: string, task: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
  await acquireFileLock(lockPath, options);
  try {
    return await task();
  } finally {
    await fs.promises.rm(lockPath, { force: true });
  }
}

async function acquireFileLock(lockPath: string, options: FileLockOptions): Promise<void> {
  const retryMs = options.retryMs ?? STORE_LOCK_RETRY_MS;
  const timeoutMs = options.timeoutMs ?? STORE_LOCK_TIMEOUT_MS;
  const staleMs = options.staleMs ?? STORE_LOCK_STALE_MS;
  const deadline = Date.now() + timeoutMs;

  await fs.promises.mkdir(path.dirname(lockPath), { recursive: true });

  while (true) {
    try {
      const handle = await fs.promises.open(lockPath, "wx");
      try {
        await handle.writeFile(`${process.pid}\n`, "utf8");
      } finally {
        await handle.close();
      }
      return;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") {
        throw error;
      }
    }

    if (await isStaleLock(lockPath, staleMs)) {
      await fs.promises.rm(lockPath, { force: true });
      continue;
    }

    if (Date.now() >= deadline) {
      throw new CliError({
        kind: "persistence",
        message: `Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`,
        hint: `Remove ${lockPath} if no other labkeeper process is running.`
      });
    }
    await sleep(retryMs);
  }
}

async function isStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(lockPath);
    return Date.now() - stat.mtimeMs > staleMs;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
