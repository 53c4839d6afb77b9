import { mkdir, open, readFile, rename, stat, unlink, type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { LabState } from "../types/state.js";
import { StateError, errorMessage } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

const log = createLogger("store");

export const STATE_FILE = "state.json";
export const LOCK_FILE = "lock";

export function emptyState(project: string, now: string): LabState {
  return {
    schema_version: 1,
    project,
    branches: {},
    batches: [],
    baselines: [],
    active_baseline_id: null,
    pending_baseline: null,
    regressions: [],
    rollbacks: [],
    updated_at: now,
  };
}

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

export async function atomicWriteJson(file: string, data: unknown): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  const tmp = `${file}.tmp.${process.pid}.${Date.now()}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, file);
  } catch (e) {
    if (fh) await fh.close().catch((closeErr: unknown) => log.warn({ error: errorMessage(closeErr) }, "close failed"));
    await unlink(tmp).catch((unlinkErr: unknown) => {
      if (errnoCode(unlinkErr) !== "ENOENT") log.warn({ tmp, error: errorMessage(unlinkErr) }, "temp cleanup failed");
    });
    throw e;
  }
}

export type StateStoreOptions = {
  /** Age after which a lock file is considered abandoned. */
  staleLockMs: number;
  lockTimeoutMs?: number;
  schemas?: SchemaRegistry;
};

/**
 * Persists LabState in {stateDir}/state.json. Every write replaces the file
 * atomically, so a halted command always leaves the last consistent state.
 */
export class StateStore {
  readonly statePath: string;
  readonly lockPath: string;
  private readonly schemas: SchemaRegistry;

  constructor(
    readonly stateDir: string,
    private readonly opts: StateStoreOptions,
  ) {
    this.statePath = path.join(stateDir, STATE_FILE);
    this.lockPath = path.join(stateDir, LOCK_FILE);
    this.schemas = opts.schemas ?? createRegistry();
  }

  /** Load the state, or an empty one for `project` when none was saved yet. */
  async load(project: string): Promise<LabState> {
    let raw: string;
    try {
      raw = await readFile(this.statePath, "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return emptyState(project, new Date().toISOString());
      throw new StateError(`Failed to read ${this.statePath}: ${errorMessage(e)}`, { operation: "load_state", cause: e });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      throw new StateError(`State file is not valid JSON: ${this.statePath}`, { operation: "load_state", cause: e });
    }
    if (!this.schemas.is<LabState>("lab-state", data)) {
      const { errors } = this.schemas.validate("lab-state", data);
      throw new StateError(`State file does not match schema: ${errors}`, { operation: "load_state" });
    }
    return data;
  }

  async save(state: LabState): Promise<void> {
    state.updated_at = new Date().toISOString();
    await atomicWriteJson(this.statePath, state);
  }

  /**
   * Load, mutate and save under the lock. The state is saved even when `fn`
   * throws, so transitions recorded before a halt are kept.
   */
  async update<T>(project: string, fn: (state: LabState) => Promise<T>): Promise<T> {
    const release = await this.acquireLock();
    try {
      const state = await this.load(project);
      try {
        return await fn(state);
      } finally {
        await this.save(state);
      }
    } finally {
      await release();
    }
  }

  private async acquireLock(): Promise<() => Promise<void>> {
    await mkdir(this.stateDir, { recursive: true });
    const timeoutMs = this.opts.lockTimeoutMs ?? 5000;
    const started = Date.now();
    const pid = process.pid;
    let retries = 0;

    for (;;) {
      await this.reclaimAbandonedLock(pid);
      try {
        const fh = await open(this.lockPath, "wx");
        try {
          await fh.writeFile(`${pid}\n${Date.now()}\n`, "utf8");
          await fh.sync();
        } finally {
          await fh.close();
        }
        return () => this.releaseLock(pid);
      } catch (e) {
        if (errnoCode(e) !== "EEXIST") throw e;

        retries++;
        if (Date.now() - started > timeoutMs) {
          throw new StateError(`Timed out acquiring state lock after ${retries} retries: ${this.lockPath}`, {
            operation: "lock",
          });
        }
        const backoff = Math.min(50 * Math.pow(1.5, retries), 1000);
        await new Promise((r) => setTimeout(r, backoff + Math.random() * backoff * 0.1));
      }
    }
  }

  private async reclaimAbandonedLock(pid: number): Promise<void> {
    let age: number;
    try {
      age = Date.now() - (await stat(this.lockPath)).mtimeMs;
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return;
      throw e;
    }

    if (age > this.opts.staleLockMs) {
      log.warn({ lock: this.lockPath, ageSeconds: Math.round(age / 1000) }, "removing stale lock");
      await this.removeLock();
      return;
    }

    const content = await readFile(this.lockPath, "utf8").catch(() => "");
    const [lockPid] = content.split("\n");
    if (!lockPid || lockPid === String(pid)) return;
    try {
      process.kill(Number(lockPid), 0);
    } catch (e) {
      if (errnoCode(e) !== "ESRCH") return;
      log.warn({ lock: this.lockPath, pid: lockPid }, "removing orphaned lock");
      await this.removeLock();
    }
  }

  private async removeLock(): Promise<void> {
    await unlink(this.lockPath).catch((e: unknown) => {
      if (errnoCode(e) !== "ENOENT") throw e;
    });
  }

  private async releaseLock(pid: number): Promise<void> {
    const content = await readFile(this.lockPath, "utf8");
    const [lockPid] = content.split("\n");
    if (lockPid === String(pid)) {
      await unlink(this.lockPath);
    } else {
      log.warn({ lock: this.lockPath, owner: lockPid, pid }, "lock was taken by another process");
    }
  }
}
