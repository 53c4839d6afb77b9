import fs from "node:fs/promises";
import path from "node:path";
import type { HistoryStep, Run, RunFilter } from "../types/run.js";
import type { MetricsTracker } from "./tracker.js";
import { normalizeHistory, normalizeRun, type RunRecord } from "./normalize.js";
import {
  AuthError,
  InvalidRunRecordError,
  LabError,
  NotFoundError,
  TransientServiceError,
  errorMessage,
} from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

const log = createLogger("file-tracker");

const TRANSIENT_CODES = new Set(["EBUSY", "EAGAIN", "EMFILE", "ENFILE", "ETIMEDOUT", "ECONNRESET"]);
const AUTH_CODES = new Set(["EACCES", "EPERM"]);

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

/** Map a filesystem failure onto the tracker error taxonomy. */
export function classifyFsError(e: unknown, runId: string, operation: string): LabError {
  const code = errnoCode(e);
  const context = { runId, operation, cause: e };
  if (code === "ENOENT") return new NotFoundError(`Run not found: ${runId}`, context);
  if (code && AUTH_CODES.has(code)) return new AuthError(`Access denied to run ${runId}: ${errorMessage(e)}`, context);
  if (code && TRANSIENT_CODES.has(code)) return new TransientServiceError(`Run store busy: ${errorMessage(e)}`, context);
  return new LabError("STATE_ERROR", `Failed to ${operation} run ${runId}: ${errorMessage(e)}`, context);
}

/**
 * Tracker backed by a directory of exported run records: `{runsDir}/{id}.json`
 * plus an optional `{id}.log` with the console output.
 */
export class FileMetricsTracker implements MetricsTracker {
  private readonly schemas: SchemaRegistry;

  constructor(
    private readonly runsDir: string,
    schemas?: SchemaRegistry,
  ) {
    this.schemas = schemas ?? createRegistry();
  }

  private recordPath(runId: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(runId) || runId.startsWith(".")) {
      throw new NotFoundError(`Invalid run id: ${runId}`, { runId });
    }
    return path.join(this.runsDir, `${runId}.json`);
  }

  private async readRecord(runId: string): Promise<RunRecord> {
    const file = this.recordPath(runId);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      throw classifyFsError(e, runId, "read");
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (e) {
      // A writer may be mid-way through replacing the file.
      throw new TransientServiceError(`Run record is not valid JSON yet: ${runId}`, { runId, cause: e });
    }
    if (!this.schemas.is<RunRecord>("run-record", data)) {
      const { errors } = this.schemas.validate("run-record", data);
      throw new InvalidRunRecordError(`Run record ${runId} does not match schema: ${errors}`, { runId });
    }
    return data;
  }

  private async writeRecord(record: RunRecord): Promise<void> {
    const file = this.recordPath(record.id);
    const tmp = `${file}.tmp.${process.pid}.${Date.now()}`;
    try {
      await fs.writeFile(tmp, JSON.stringify(record, null, 2) + "\n", "utf8");
      await fs.rename(tmp, file);
    } catch (e) {
      throw classifyFsError(e, record.id, "write");
    }
  }

  async getRun(runId: string): Promise<Run> {
    const record = await this.readRecord(runId);
    const { history: _history, ...rest } = record;
    return normalizeRun(rest);
  }

  async listRuns(filter: RunFilter): Promise<Run[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.runsDir);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw classifyFsError(e, "*", "list");
    }

    const runs: Run[] = [];
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      const runId = file.slice(0, -".json".length);
      let record: RunRecord;
      let run: Run;
      try {
        record = await this.readRecord(runId);
        const { history: _history, ...rest } = record;
        run = normalizeRun(rest);
      } catch (e) {
        // One unreadable or vanished record must not hide the others.
        if (!(e instanceof InvalidRunRecordError || e instanceof NotFoundError)) throw e;
        log.warn({ runId, err: e.message }, "skipping run record");
        continue;
      }
      if (filter.project && record.project !== undefined && record.project !== filter.project) continue;
      if (filter.queue && record.queue !== filter.queue) continue;
      if (filter.branch && run.branch !== filter.branch) continue;
      if (filter.state && run.state !== filter.state) continue;
      runs.push(run);
    }
    return runs;
  }

  async getHistory(runId: string): Promise<HistoryStep[]> {
    const record = await this.readRecord(runId);
    return normalizeHistory(record.history ?? []);
  }

  async setTag(runId: string, tag: string): Promise<void> {
    const record = await this.readRecord(runId);
    const tags = record.tags ?? [];
    if (tags.includes(tag)) return;
    await this.writeRecord({ ...record, tags: [...tags, tag] });
  }

  async addNote(runId: string, note: string): Promise<void> {
    const record = await this.readRecord(runId);
    const notes = record.notes ?? [];
    if (notes.includes(note)) return;
    await this.writeRecord({ ...record, notes: [...notes, note] });
  }

  async cancel(runId: string): Promise<void> {
    const record = await this.readRecord(runId);
    const run = normalizeRun(record);
    if (run.state !== "queued" && run.state !== "running") return;
    await this.writeRecord({ ...record, state: "cancelled", finished_at: new Date().toISOString() });
  }

  async delete(runId: string, deleteArtifacts = false): Promise<void> {
    const file = this.recordPath(runId);
    const targets = deleteArtifacts ? [file, path.join(this.runsDir, `${runId}.log`)] : [file];
    for (const target of targets) {
      try {
        await fs.rm(target, { force: true });
      } catch (e) {
        throw classifyFsError(e, runId, "delete");
      }
    }
  }

  async getLogTail(runId: string, lines: number): Promise<string[]> {
    this.recordPath(runId);
    let raw: string;
    try {
      raw = await fs.readFile(path.join(this.runsDir, `${runId}.log`), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw classifyFsError(e, runId, "read_log");
    }
    const all = raw.split("\n");
    if (all[all.length - 1] === "") all.pop();
    return all.slice(-lines);
  }
}
