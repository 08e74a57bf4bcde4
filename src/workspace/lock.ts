import fs from "fs";
import { LockTimeoutError } from "../errors";
import { createModuleLogger } from "../utils/logger";
import { errnoCode, readTextIfExists } from "./files";

const log = createModuleLogger("lock");

export type LockOptions = {
  retryMs?: number;
  waitMs?: number;
  staleMs?: number;
};

const LOCK_RETRY_MS = 25;
const LOCK_WAIT_MS = 10000;
const LOCK_STALE_MS = 30000;

// Serializes holders inside this process; the lock file serializes processes.
const inProcess = new Map<string, Promise<unknown>>();
let acquisitions = 0;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function isStaleLock(lockPath: string, staleMs: number): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(lockPath);
    return Date.now() - stats.mtimeMs > staleMs;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function acquire(lockPath: string, options: Required<LockOptions>): Promise<string> {
  const start = Date.now();
  while (true) {
    try {
      const handle = await fs.promises.open(lockPath, "wx");
      acquisitions += 1;
      const owner = `${process.pid}:${acquisitions}`;
      try {
        await handle.writeFile(JSON.stringify({ pid: process.pid, owner, createdAt: new Date().toISOString() }), "utf-8");
      } finally {
        await handle.close();
      }
      return owner;
    } catch (error) {
      if (errnoCode(error) !== "EEXIST") {
        throw error;
      }
      if (await isStaleLock(lockPath, options.staleMs)) {
        log.warn({ lockPath }, "reclaiming stale lock");
        await fs.promises.rm(lockPath, { force: true });
        continue;
      }
      const waited = Date.now() - start;
      if (waited > options.waitMs) {
        throw new LockTimeoutError(lockPath, waited);
      }
      await delay(options.retryMs);
    }
  }
}

function lockOwner(raw: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === "object" && parsed !== null && "owner" in parsed && typeof parsed.owner === "string") {
      return parsed.owner;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

// A holder that outlived staleMs may have lost the lock to another writer; only the owner removes it.
async function release(lockPath: string, owner: string): Promise<void> {
  const raw = await readTextIfExists(lockPath);
  if (raw === null) {
    return;
  }
  if (lockOwner(raw) !== owner) {
    log.warn({ lockPath }, "lock was taken over by another writer, leaving it in place");
    return;
  }
  await fs.promises.rm(lockPath, { force: true });
}

export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: LockOptions = {}): Promise<T> {
  const resolved: Required<LockOptions> = {
    retryMs: options.retryMs ?? LOCK_RETRY_MS,
    waitMs: options.waitMs ?? LOCK_WAIT_MS,
    staleMs: options.staleMs ?? LOCK_STALE_MS
  };
  const previous = inProcess.get(lockPath) ?? Promise.resolve();
  const run = previous
    .catch(() => undefined)
    .then(async () => {
      const owner = await acquire(lockPath, resolved);
      try {
        return await fn();
      } finally {
        await release(lockPath, owner);
      }
    });
  inProcess.set(lockPath, run);
  try {
    return await run;
  } finally {
    if (inProcess.get(lockPath) === run) {
      inProcess.delete(lockPath);
    }
  }
}
