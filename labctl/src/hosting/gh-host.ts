import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Issue, IssueFilter, ReviewHost, ReviewRequestInput } from "./review-host.js";
import {
  AuthError,
  ConflictError,
  NotFoundError,
  ServiceError,
  TransientServiceError,
  errorMessage,
  type LabError,
} from "../core/errors.js";
import { DEFAULT_RETRY, withRetry, type RetryOptions } from "../registry/retry.js";

const pExecFile = promisify(execFile);

export type GhExec = (args: string[]) => Promise<{ stdout: string; stderr: string }>;

const CONFLICT = /not mergeable|merge conflict|conflicts? (with|in)|is not clean/i;
const AUTH = /authentication|gh auth login|not logged in|HTTP 401|HTTP 403|must have (admin|write|push)|permission/i;
const NOT_FOUND = /not found|HTTP 404|could not resolve|no pull requests? found/i;
const TRANSIENT = /timed? ?out|HTTP 5\d\d|HTTP 429|rate limit|ECONNRESET|ETIMEDOUT|EAI_AGAIN|connection (reset|refused)/i;

function stderrOf(e: unknown): string {
  if (e instanceof Error && "stderr" in e && typeof e.stderr === "string" && e.stderr.length > 0) return e.stderr;
  return errorMessage(e);
}

/** Map a failed gh invocation onto the error taxonomy. */
export function classifyGhError(e: unknown, operation: string, id?: string): LabError {
  const stderr = stderrOf(e).trim();
  const context = { operation, cause: e };
  const what = id ? `${operation} ${id}` : operation;
  if (CONFLICT.test(stderr)) return new ConflictError(`${what}: ${stderr}`, { branches: [] }, context);
  if (AUTH.test(stderr)) return new AuthError(`${what}: ${stderr}`, context);
  if (NOT_FOUND.test(stderr)) return new NotFoundError(`${what}: ${stderr}`, context);
  if (TRANSIENT.test(stderr)) return new TransientServiceError(`${what}: ${stderr}`, context);
  return new ServiceError(`${what}: ${stderr}`, context);
}

type GhIssue = { number: number; title: string; url: string; labels: Array<{ name: string }> };

function isGhIssue(value: unknown): value is GhIssue {
  if (value === null || typeof value !== "object") return false;
  return (
    "number" in value &&
    typeof value.number === "number" &&
    "title" in value &&
    typeof value.title === "string" &&
    "url" in value &&
    typeof value.url === "string" &&
    "labels" in value &&
    Array.isArray(value.labels)
  );
}

function toIssue(raw: GhIssue): Issue {
  return { number: raw.number, title: raw.title, url: raw.url, labels: raw.labels.map((l) => l.name).sort() };
}

/** ReviewHost driven through the GitHub CLI. */
export class GhReviewHost implements ReviewHost {
  private readonly exec: GhExec;

  constructor(
    private readonly opts: { repo?: string | null; cwd?: string; retry?: RetryOptions; exec?: GhExec } = {},
  ) {
    this.exec = opts.exec ?? ((args) => pExecFile("gh", args, { cwd: opts.cwd }));
  }

  private async gh(operation: string, args: string[], id?: string): Promise<string> {
    const full = this.opts.repo ? [...args, "--repo", this.opts.repo] : args;
    return withRetry(
      operation,
      async () => {
        try {
          const { stdout } = await this.exec(full);
          return stdout.trim();
        } catch (e) {
          throw classifyGhError(e, operation, id);
        }
      },
      this.opts.retry ?? DEFAULT_RETRY,
    );
  }

  /** Returns the review request URL gh prints. */
  createReviewRequest(input: ReviewRequestInput): Promise<string> {
    return this.gh("pr_create", [
      "pr",
      "create",
      "--head",
      input.branch,
      "--base",
      input.base,
      "--title",
      input.title,
      "--body",
      input.body,
    ]);
  }

  async comment(id: string, body: string): Promise<void> {
    await this.gh("pr_comment", ["pr", "comment", id, "--body", body], id);
  }

  async close(id: string, comment?: string): Promise<void> {
    const args = ["pr", "close", id];
    if (comment) args.push("--comment", comment);
    await this.gh("pr_close", args, id);
  }

  async merge(id: string): Promise<void> {
    await this.gh("pr_merge", ["pr", "merge", id, "--merge"], id);
  }

  async addLabels(id: string, labels: string[]): Promise<void> {
    if (labels.length === 0) return;
    await this.gh("pr_add_labels", ["pr", "edit", id, "--add-label", labels.join(",")], id);
  }

  async removeLabels(id: string, labels: string[]): Promise<void> {
    if (labels.length === 0) return;
    await this.gh("pr_remove_labels", ["pr", "edit", id, "--remove-label", labels.join(",")], id);
  }

  async createRelease(tag: string, title: string, notes: string): Promise<void> {
    await this.gh("release_create", ["release", "create", tag, "--title", title, "--notes", notes], tag);
  }

  async listIssues(filter: IssueFilter = {}): Promise<Issue[]> {
    const args = ["issue", "list", "--json", "number,title,url,labels", "--state", filter.state ?? "open"];
    if (filter.label) args.push("--label", filter.label);
    if (filter.limit) args.push("--limit", String(filter.limit));
    const out = await this.gh("issue_list", args);
    const parsed: unknown = JSON.parse(out || "[]");
    if (!Array.isArray(parsed)) throw new ServiceError("issue_list: gh returned a non-array", { operation: "issue_list" });
    return parsed.filter(isGhIssue).map(toIssue);
  }

  async createIssue(title: string, body: string, labels: string[] = []): Promise<Issue> {
    const args = ["issue", "create", "--title", title, "--body", body];
    if (labels.length > 0) args.push("--label", labels.join(","));
    const url = await this.gh("issue_create", args);
    const number = Number(/\/issues\/(\d+)/.exec(url)?.[1] ?? NaN);
    if (!Number.isInteger(number)) {
      throw new ServiceError(`issue_create: unexpected gh output '${url}'`, { operation: "issue_create" });
    }
    return { number, title, url, labels: [...labels].sort() };
  }
}
