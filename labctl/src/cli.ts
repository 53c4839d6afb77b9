#!/usr/bin/env node

import { Argument, Command, InvalidArgumentError, Option } from "commander";
import type { MetricDirection } from "./types/comparison.js";
import type { Branch, OperatorDecision } from "./types/branch.js";
import type { CommonOptions } from "./commands/context.js";
import { isFailure, type Failure } from "./commands/result.js";
import { EXIT, type ExitCode } from "./commands/exit-codes.js";
import { status } from "./commands/status.js";
import { compare } from "./commands/compare.js";
import { history } from "./commands/history.js";
import { diagnose } from "./commands/diagnose.js";
import { report } from "./commands/report.js";
import { postResult } from "./commands/post-result.js";
import { abandon, accept, archive, cancel, decide, ideas, launch, propose, retry, sync } from "./commands/lifecycle.js";
import { reconcile } from "./commands/reconcile.js";
import { establish, showBaselines } from "./commands/baseline.js";
import { rollback, undoRollback } from "./commands/rollback.js";
import { exportRuns } from "./commands/export.js";
import { validateAll } from "./commands/validate.js";

type Format = "human" | "jsonl";

type GlobalOpts = {
  config?: string;
  env?: string;
  project?: string;
  queue?: string;
  format: Format;
};

function common(opts: GlobalOpts): CommonOptions {
  return { configDir: opts.config, env: opts.env, project: opts.project, queue: opts.queue };
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <dir>", "Config directory (base.yaml and <env>.yaml)")
    .option("--env <name>", "Config environment overlay")
    .option("--project <name>", "Tracking project")
    .option("--queue <name>", "Run queue")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"));
}

function list(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function direction(value: string, previous: Record<string, MetricDirection>): Record<string, MetricDirection> {
  const [metric, dir] = value.split("=");
  if (!metric || (dir !== "lower" && dir !== "higher")) {
    throw new InvalidArgumentError("Expected <metric>=lower or <metric>=higher.");
  }
  return { ...previous, [metric]: dir };
}

function isDecision(value: string): value is OperatorDecision {
  return value === "merge" || value === "fix" || value === "close";
}

/**
 * Print a command result and set the exit code. jsonl writes one JSON object
 * per line on stdout; human writes `human(res)` lines, errors on stderr.
 */
function emit<S extends { ok: true }>(
  format: Format,
  res: S | Failure,
  human: (res: S) => string[],
  exitCode: ExitCode = EXIT.SUCCESS,
): void {
  if (isFailure(res)) {
    if (format === "jsonl") {
      const { ok: _ok, error, ...rest } = res;
      process.stdout.write(JSON.stringify({ level: "error", message: error, ...rest }) + "\n");
    } else {
      console.error(`${res.code}: ${res.error}`);
    }
    process.exitCode = res.exitCode;
    return;
  }

  if (format === "jsonl") {
    const { ok: _ok, ...payload } = res;
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...payload }) + "\n");
  } else {
    for (const line of human(res)) process.stdout.write(line + "\n");
  }
  process.exitCode = exitCode;
}

function table(rows: string[][]): string[] {
  const widths = rows[0].map((_, i) => Math.max(...rows.map((r) => r[i].length)));
  return rows.map((r) => r.map((cell, i) => cell.padEnd(widths[i])).join("  ").trimEnd());
}

function branchLine(b: Branch): string[] {
  const extra = b.worktree ? ` (${b.worktree})` : "";
  return [`${b.name}: ${b.state}${extra}`];
}

const program = new Command();

program
  .name("labctl")
  .description("Experiment lifecycle and winner selection for multi-branch ML runs")
  .version("0.1.0");

// --- Inspection ---

withCommon(program.command("status"))
  .description("Branches with lifecycle state, run state and verdict")
  .option("--branch <name>", "Only this branch")
  .action(async (opts: GlobalOpts & { branch?: string }) => {
    const res = await status({ ...common(opts), branch: opts.branch });
    emit(opts.format, res, (r) => [
      `active baseline: ${r.active_baseline ?? "none"}`,
      ...table([
        ["BRANCH", "LIFECYCLE", "VERDICT", "RUN", "RUN STATE", "WINS", "RETRIES"],
        ...r.rows.map((row) => [
          row.branch,
          row.lifecycle ?? "untracked",
          row.verdict ?? "-",
          row.run_id ?? "-",
          row.run_state ?? "-",
          row.win_count === null ? "-" : String(row.win_count),
          String(row.retry_count),
        ]),
      ]),
    ]);
  });

withCommon(program.command("compare"))
  .description("Deltas against the baseline and win counts")
  .option("--branches <list>", "Comma-separated branches", list)
  .option("--baseline <runId>", "Compare against this run instead of the active baseline")
  .option("--metrics <list>", "Comma-separated metric names or patterns", list)
  .option("--direction <metric=dir>", "Metric direction override (repeatable)", direction, {})
  .action(
    async (
      opts: GlobalOpts & {
        branches?: string[];
        baseline?: string;
        metrics?: string[];
        direction: Record<string, MetricDirection>;
      },
    ) => {
      const res = await compare({
        ...common(opts),
        branches: opts.branches,
        baseline: opts.baseline,
        metrics: opts.metrics,
        directions: opts.direction,
      });
      const exit = res.ok && res.ambiguous ? EXIT.AMBIGUOUS : EXIT.SUCCESS;
      emit(
        opts.format,
        res,
        (r) => {
          const lines = [`baseline: ${r.baseline ? `${r.baseline.id ?? "run"} ${r.baseline.run_id}` : "none"}`];
          for (const c of r.comparisons) {
            lines.push(`${c.branch} (${c.run_id}, ${c.run_state})${c.win_count === null ? "" : ` wins=${c.win_count}`}`);
            for (const d of c.deltas) {
              const verdict = d.improved ? "better" : d.sign === -1 ? "worse" : "same";
              lines.push(`  ${d.metric}: ${d.candidate} vs ${d.baseline} (${d.delta >= 0 ? "+" : ""}${d.delta}, ${verdict})`);
            }
          }
          for (const reason of r.ambiguous_reasons) lines.push(`ambiguous: ${reason}`);
          return lines;
        },
        exit,
      );
    },
  );

withCommon(program.command("history"))
  .description("Metric history of a branch's run")
  .argument("<branch>", "Branch name")
  .option("--metrics <list>", "Comma-separated metric names or patterns", list)
  .option("--samples <n>", "Evenly spaced steps to keep", positiveInt)
  .action(async (branch: string, opts: GlobalOpts & { metrics?: string[]; samples?: number }) => {
    const res = await history({ ...common(opts), branch, metrics: opts.metrics, samples: opts.samples });
    emit(opts.format, res, (r) => [
      `${r.branch}: run ${r.run_id} (${r.run_state}), ${r.steps.length} of ${r.total_steps} steps`,
      ...r.steps.map(
        (s) =>
          `step ${s.step}: ${Object.entries(s.values)
            .map(([k, v]) => `${k}=${v}`)
            .join(", ")}`,
      ),
    ]);
  });

withCommon(program.command("diagnose"))
  .description("Log tail, config inspection and history anomalies of a branch's run")
  .argument("<branch>", "Branch name")
  .option("--lines <n>", "Log lines to show", positiveInt)
  .action(async (branch: string, opts: GlobalOpts & { lines?: number }) => {
    const res = await diagnose({ ...common(opts), branch, lines: opts.lines });
    emit(opts.format, res, (r) => [
      `${r.branch}: run ${r.run_id} (${r.run_state})${r.retries_left === null ? "" : `, ${r.retries_left} retries left`}`,
      ...r.anomalies.map((a) => `anomaly: ${a}`),
      ...r.config_check.errors.map((e) => `config: ${e}`),
      ...r.log_errors.map((l) => `error: ${l}`),
      "--- log tail ---",
      ...r.log_tail,
    ]);
  });

withCommon(program.command("report"))
  .description("Batch report")
  .option("--batch <id>", "Batch id (default: current batch)")
  .option("--output <file>", "Write the report to a file")
  .option("--json", "JSON instead of markdown")
  .action(async (opts: GlobalOpts & { batch?: string; output?: string; json?: boolean }) => {
    const res = await report({
      ...common(opts),
      batch: opts.batch,
      output: opts.output,
      format: opts.json ? "json" : "markdown",
    });
    emit(opts.format, res, (r) => (r.output ? [`wrote ${r.output}`] : [r.rendered.trimEnd()]));
  });

withCommon(program.command("post-result"))
  .description("Post a branch result to its review request")
  .argument("<branch>", "Branch name")
  .option("--create", "Open a review request when the branch has none")
  .action(async (branch: string, opts: GlobalOpts & { create?: boolean }) => {
    const res = await postResult({ ...common(opts), branch, create: opts.create });
    emit(opts.format, res, (r) => [`${r.created ? "opened" : "commented on"} ${r.review_request}`]);
  });

// --- Lifecycle ---

withCommon(program.command("propose"))
  .description("Register an idea as a proposed branch")
  .argument("<branch>", "Branch name")
  .option("--idea <text>", "What the branch tries")
  .option("--issue", "Also open an idea issue on the code host")
  .action(async (branch: string, opts: GlobalOpts & { idea?: string; issue?: boolean }) => {
    emit(opts.format, await propose({ ...common(opts), branch, idea: opts.idea, issue: opts.issue }), (r) =>
      branchLine(r.branch),
    );
  });

withCommon(program.command("accept"))
  .description("Start implementing a proposed branch")
  .argument("<branch>", "Branch name")
  .option("--no-worktree", "Do not create a working copy")
  .action(async (branch: string, opts: GlobalOpts & { worktree: boolean }) => {
    emit(opts.format, await accept({ ...common(opts), branch, worktree: opts.worktree }), (r) => branchLine(r.branch));
  });

withCommon(program.command("launch"))
  .description("Attach a submitted run to a branch")
  .argument("<branch>", "Branch name")
  .argument("<runId>", "Run id on the tracker")
  .action(async (branch: string, runId: string, opts: GlobalOpts) => {
    emit(opts.format, await launch({ ...common(opts), branch, runId }), (r) => branchLine(r.branch));
  });

withCommon(program.command("sync"))
  .description("Poll active runs once and advance branch states")
  .action(async (opts: GlobalOpts) => {
    emit(opts.format, await sync(common(opts)), (r) => [
      ...r.report.changes.map((c) => `${c.branch}: ${c.from} -> ${c.to} (${c.reason})`),
      ...r.report.missing.map((b) => `${b}: active run not found`),
      ...r.report.failed.map((f) => `${f.branch}: ${f.error}`),
      `polled ${r.report.polled.length}, discarded ${r.report.discarded.length}`,
    ]);
  });

withCommon(program.command("cancel"))
  .description("Cancel a branch and its active run")
  .argument("<branch>", "Branch name")
  .option("--reason <text>", "Why")
  .action(async (branch: string, opts: GlobalOpts & { reason?: string }) => {
    emit(opts.format, await cancel({ ...common(opts), branch, reason: opts.reason }), (r) => branchLine(r.branch));
  });

withCommon(program.command("retry"))
  .description("Send a failed or crashed branch back for a fix")
  .argument("<branch>", "Branch name")
  .requiredOption("--diagnosis <text>", "What went wrong")
  .action(async (branch: string, opts: GlobalOpts & { diagnosis: string }) => {
    emit(opts.format, await retry({ ...common(opts), branch, diagnosis: opts.diagnosis }), (r) => [
      `${r.branch.name}: ${r.branch.state} (retry ${r.branch.retry_count})`,
    ]);
  });

withCommon(program.command("abandon"))
  .description("Give up on a failed, crashed or cancelled branch")
  .argument("<branch>", "Branch name")
  .option("--reason <text>", "Why")
  .action(async (branch: string, opts: GlobalOpts & { reason?: string }) => {
    emit(opts.format, await abandon({ ...common(opts), branch, reason: opts.reason }), (r) => branchLine(r.branch));
  });

withCommon(program.command("decide"))
  .description("Operator decision on a held winner")
  .argument("<branch>", "Branch name")
  .addArgument(new Argument("<decision>", "What to do").choices(["merge", "fix", "close"]))
  .action(async (branch: string, decision: string, opts: GlobalOpts) => {
    if (!isDecision(decision)) throw new InvalidArgumentError(`Unknown decision: ${decision}`);
    emit(opts.format, await decide({ ...common(opts), branch, decision }), (r) => [
      `${r.branch.name}: ${r.branch.decision ?? "no decision"}`,
    ]);
  });

withCommon(program.command("archive"))
  .description("Archive merged and closed branches")
  .option("--branch <name>", "Only this branch")
  .action(async (opts: GlobalOpts & { branch?: string }) => {
    emit(opts.format, await archive({ ...common(opts), branch: opts.branch }), (r) =>
      r.archived.length > 0 ? r.archived.map((b) => `${b}: archived`) : ["nothing to archive"],
    );
  });

withCommon(program.command("ideas"))
  .description("Open idea issues on the code host")
  .option("--limit <n>", "Maximum issues", positiveInt)
  .action(async (opts: GlobalOpts & { limit?: number }) => {
    emit(opts.format, await ideas({ ...common(opts), limit: opts.limit }), (r) =>
      r.ideas.map((i) => `#${i.number} ${i.title}`),
    );
  });

// --- Reconciliation ---

withCommon(program.command("reconcile"))
  .description("Rank a finished batch and merge its winners into trunk")
  .option("--batch <id>", "Batch id (default: current batch)")
  .action(async (opts: GlobalOpts & { batch?: string }) => {
    const res = await reconcile({ ...common(opts), batch: opts.batch });
    emit(
      opts.format,
      res,
      (r) => {
        const result = r.result;
        switch (result.status) {
          case "waiting":
            return [`${result.batch}: waiting on ${result.pending.join(", ")}`];
          case "held":
            return result.held.map((h) => `${result.batch}: ${h.branch} held (${h.reason})`);
          case "no-winners":
            return [`${result.batch}: no winners`];
          case "merged":
            return [
              ...result.merged.map((m) => `${result.batch}: merged ${m.branch} as ${m.commit}`),
              result.pending_baseline
                ? `launch a baseline run from ${result.pending_baseline.commit}`
                : `${result.batch}: baseline established`,
            ];
        }
      },
      res.ok ? res.exitCode : EXIT.SUCCESS,
    );
  });

// --- Baseline ---

withCommon(program.command("baseline"))
  .description("Show baselines, or establish one from a finished run")
  .option("--establish <runId>", "Make this finished run the active baseline")
  .option("--commit <sha>", "Trunk commit, for runs that record none")
  .option("--release", "Publish a release for the new baseline")
  .action(async (opts: GlobalOpts & { establish?: string; commit?: string; release?: boolean }) => {
    if (opts.establish) {
      const res = await establish({ ...common(opts), runId: opts.establish, commit: opts.commit, release: opts.release });
      emit(opts.format, res, (r) => [
        `${r.baseline.id}: run ${r.baseline.run_id} at ${r.baseline.commit}`,
        ...(r.release ? [`release ${r.release}`] : []),
      ]);
      return;
    }
    emit(opts.format, await showBaselines(common(opts)), (r) => [
      ...r.baselines.map((b) => `${b.id === r.active?.id ? "*" : " "} ${b.id}: run ${b.run_id} at ${b.commit}`),
      ...(r.pending ? [`pending: ${r.pending.batch_id} at ${r.pending.commit}`] : []),
    ]);
  });

withCommon(program.command("rollback"))
  .description("Revert the active baseline's merges and reactivate the previous baseline")
  .action(async (opts: GlobalOpts) => {
    emit(opts.format, await rollback(common(opts)), (r) => [
      `${r.rollback.id}: ${r.rollback.from_baseline_id} -> ${r.rollback.to_baseline_id}, trunk at ${r.rollback.trunk_head}`,
    ]);
  });

withCommon(program.command("undo-rollback"))
  .description("Revert the latest rollback")
  .action(async (opts: GlobalOpts) => {
    emit(opts.format, await undoRollback(common(opts)), (r) => [
      `${r.rollback.id} undone: ${r.rollback.from_baseline_id} active, trunk at ${r.rollback.trunk_head}`,
    ]);
  });

// --- Maintenance ---

withCommon(program.command("export"))
  .description("CSV of finished runs")
  .option("--output <file>", "Output path", "results.csv")
  .option("--metrics <list>", "Comma-separated metrics (default: all)", list)
  .action(async (opts: GlobalOpts & { output: string; metrics?: string[] }) => {
    emit(opts.format, await exportRuns({ ...common(opts), output: opts.output, metrics: opts.metrics }), (r) => [
      `exported ${r.rows} runs to ${r.output}`,
      `metrics: ${r.columns.join(", ")}`,
    ]);
  });

withCommon(program.command("validate"))
  .description("Validate every config layering and the state file")
  .option("--state-dir <dir>", "Also check this state directory")
  .action(async (opts: GlobalOpts & { stateDir?: string }) => {
    const res = validateAll({ configDir: opts.config, stateDir: opts.stateDir });
    emit(opts.format, res, (r) => [...r.checked.map((c) => `ok: ${c}`), ...r.diagnostics.map((d) => d.message)]);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exitCode = EXIT.INVALID_ARGS;
});
