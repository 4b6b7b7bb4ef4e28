import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";

import { AssetError, defaultSleep, isErrnoException, isNotFoundError, silentLogger } from "@guidedeck/shared";
import type { Logger } from "@guidedeck/shared";

export type FileLockOptions = {
  lockPath: string;
  timeoutMs: number;
  /** A lock file older than this is assumed abandoned and removed. */
  staleMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

const LOCK_POLL_MS = 50;

/**
 * Exclusive-create lock file. Each holder writes its own token, and release
 * only removes the file while it still carries that token, so a writer whose
 * lock was taken over as stale never deletes the new holder's lock.
 */
export class FileLock {
  readonly lockPath: string;

  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  constructor(options: FileLockOptions) {
    this.lockPath = options.lockPath;
    this.timeoutMs = options.timeoutMs;
    this.staleMs = options.staleMs;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const token = await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release(token);
    }
  }

  /** Returns the token written into the lock file. */
  async acquire(): Promise<string> {
    const token = `${process.pid}:${randomUUID()}`;
    const deadline = this.now() + this.timeoutMs;
    for (;;) {
      try {
        const handle = await fs.open(this.lockPath, "wx");
        try {
          await handle.writeFile(token);
        } finally {
          await handle.close();
        }
        return token;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== "EEXIST") {
          throw new AssetError(`Unable to create cache lock ${this.lockPath}`, { cause: error });
        }
      }

      if (await this.removeStaleLock()) continue;
      if (this.now() >= deadline) {
        throw new AssetError(`Timed out waiting for cache lock ${this.lockPath}`);
      }
      await this.sleep(LOCK_POLL_MS);
    }
  }

  async release(token: string): Promise<void> {
    let holder: string;
    try {
      holder = await fs.readFile(this.lockPath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) return;
      throw error;
    }
    if (holder !== token) {
      this.logger.warn("Cache lock now belongs to another writer, leaving it", { lockPath: this.lockPath });
      return;
    }
    await fs.rm(this.lockPath, { force: true });
  }

  private async removeStaleLock(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.lockPath);
      if (this.now() - stat.mtimeMs < this.staleMs) return false;
      this.logger.warn("Removing abandoned cache lock", { lockPath: this.lockPath });
      await fs.rm(this.lockPath, { force: true });
      return true;
    } catch (error) {
      if (isNotFoundError(error)) return true;
      throw error;
    }
  }
}
